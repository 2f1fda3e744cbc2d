/**
 * Result of a single reachability probe. Errors are kept apart from a plain
 * "unreachable" for logging, but both mean "not yet" to the pollers.
 */
export type ProbeOutcome =
  | { status: "reachable" }
  | { status: "unreachable"; reason?: string }
  | { status: "error"; cause: Error };

export const REACHABLE: ProbeOutcome = { status: "reachable" };

export function unreachable(reason?: string): ProbeOutcome {
  return { status: "unreachable", reason };
}

export function probeError(cause: unknown): ProbeOutcome {
  return { status: "error", cause: cause instanceof Error ? cause : new Error(String(cause)) };
}

export function isReachable(outcome: ProbeOutcome): boolean {
  return outcome.status === "reachable";
}

/**
 * Checks whether a host is accepting SSH connections. One attempt per call;
 * implementations never throw and never retry.
 */
export interface Prober {
  probe(host: string, port: number): Promise<ProbeOutcome>;
}
