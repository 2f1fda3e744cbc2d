import { z } from "zod";
import { ConfigurationError } from "./errors";

export const WaitPolicySchema = z.object({
  intervalSeconds: z.number().finite().positive(),
  maxWaitSeconds: z.number().finite().nonnegative(),
});

export type WaitPolicy = Readonly<z.infer<typeof WaitPolicySchema>>;

/**
 * Build an immutable wait policy. Rejects a non-positive interval or a
 * negative maximum with a ConfigurationError.
 */
export function createWaitPolicy(input: { intervalSeconds: number; maxWaitSeconds: number }): WaitPolicy {
  const result = WaitPolicySchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigurationError(`Invalid wait policy: ${issue.path.join(".")} ${issue.message}`);
  }
  return Object.freeze(result.data);
}

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Parse a wait option given in seconds on the command line.
 *
 * Blank or absent values fall back to the default. The option name is the
 * long flag without dashes, e.g. "wait-for-ssh-max".
 */
export function parseWaitOption(
  name: string,
  raw: string | number | undefined | null,
  defaultSeconds: number
): number {
  const flag = `--${name}`;

  if (raw === undefined || raw === null) return defaultSeconds;

  let value: number;
  if (typeof raw === "number") {
    if (!Number.isInteger(raw)) {
      throw new ConfigurationError(`${flag} must be numeric`);
    }
    value = raw;
  } else {
    const text = raw.trim();
    if (text === "") return defaultSeconds;
    if (!INTEGER_PATTERN.test(text)) {
      throw new ConfigurationError(`${flag} must be numeric`);
    }
    value = Number.parseInt(text, 10);
  }

  if (value < 0) {
    throw new ConfigurationError(`${flag} must be 0 or greater`);
  }
  return value;
}
