/**
 * Error taxonomy for server creation.
 *
 * Transient connectivity failures are not errors here: probes report them as
 * outcomes and the pollers retry. Everything below aborts the whole run.
 */

export enum HoistErrorType {
  CONFIGURATION = "CONFIGURATION",
  PROVISIONING = "PROVISIONING",
  TIMEOUT = "TIMEOUT",
  BOOTSTRAP = "BOOTSTRAP",
}

export class HoistError extends Error {
  constructor(
    message: string,
    public readonly type: HoistErrorType,
    public readonly originalError?: Error
  ) {
    super(message);
    this.name = "HoistError";
  }
}

/**
 * Invalid or missing option, detected before anything is provisioned.
 */
export class ConfigurationError extends HoistError {
  constructor(message: string) {
    super(message, HoistErrorType.CONFIGURATION);
    this.name = "ConfigurationError";
  }
}

/**
 * The instance reached a terminal state or never reached its target state.
 */
export class ProvisioningError extends HoistError {
  constructor(
    message: string,
    public readonly instanceId?: string,
    public readonly lastState?: string
  ) {
    super(message, HoistErrorType.PROVISIONING);
    this.name = "ProvisioningError";
  }
}

export class WaitTimeoutError extends HoistError {
  constructor(
    message: string,
    public readonly waitedSeconds: number
  ) {
    super(message, HoistErrorType.TIMEOUT);
    this.name = "WaitTimeoutError";
  }
}

export class BootstrapError extends HoistError {
  constructor(
    message: string,
    public readonly exitCode: number | null = null,
    originalError?: Error
  ) {
    super(message, HoistErrorType.BOOTSTRAP, originalError);
    this.name = "BootstrapError";
  }
}

export function isHoistError(error: unknown): error is HoistError {
  return error instanceof HoistError;
}
