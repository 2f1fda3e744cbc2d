import { isHoistError } from "@hoist/core";

/**
 * Text shown after "Error:" when a command fails. Hoist errors are already
 * worded for the user; anything else (SDK, network) keeps its error name.
 */
export function describeFailure(error: unknown): string {
  if (isHoistError(error)) return error.message;
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  return String(error);
}
