/** Log callback for streaming provisioning output */
export type ProvisionLogCallback = (line: string, stream?: "stdout" | "stderr") => void;

/**
 * Per-attempt progress for a wait. `tick` fires once for every attempt that
 * did not succeed; `done` fires exactly once when the wait ends.
 */
export interface ProgressReporter {
  tick(): void;
  done(): void;
}

export const noopLog: ProvisionLogCallback = () => undefined;

export const noopProgress: ProgressReporter = {
  tick: () => undefined,
  done: () => undefined,
};
