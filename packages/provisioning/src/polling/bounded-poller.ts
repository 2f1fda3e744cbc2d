/**
 * Bounded Poller
 *
 * Repeats an attempt with a fixed delay until it succeeds, asks to abort, or
 * an overall deadline passes. The deadline is fixed once at entry, so slow
 * attempts eat into the budget rather than extending it.
 */

import type { WaitPolicy } from "@hoist/core";
import { noopProgress, type ProgressReporter } from "../interface/logging";
import { systemClock, type PollerClock } from "./clock";

/** Outcome of a single attempt */
export type AttemptResult<T> =
  | { status: "continue"; value: T }
  | { status: "succeeded"; value: T }
  | { status: "abort"; value: T; reason: string };

export interface PollResult<T> {
  succeeded: boolean;
  /** Reason given by an attempt that aborted the poll */
  aborted?: string;
  /** Value reported by the last attempt */
  last?: T;
  attempts: number;
  elapsedMs: number;
}

export class BoundedPoller {
  constructor(private readonly clock: PollerClock = systemClock) {}

  /**
   * Run tagged attempts until one succeeds or aborts, or the deadline passes.
   *
   * At least one attempt always runs, even with a zero maximum wait. An
   * error thrown by the attempt propagates; `progress.done()` still runs.
   */
  async run<T>(
    policy: WaitPolicy,
    attempt: () => Promise<AttemptResult<T>>,
    progress: ProgressReporter = noopProgress
  ): Promise<PollResult<T>> {
    const start = this.clock.now();
    const deadline = start + policy.maxWaitSeconds * 1000;
    const intervalMs = policy.intervalSeconds * 1000;

    let attempts = 0;
    let last: T | undefined;

    try {
      for (;;) {
        const result = await attempt();
        attempts++;
        last = result.value;

        if (result.status === "succeeded") {
          return { succeeded: true, last, attempts, elapsedMs: this.clock.now() - start };
        }
        if (result.status === "abort") {
          return {
            succeeded: false,
            aborted: result.reason,
            last,
            attempts,
            elapsedMs: this.clock.now() - start,
          };
        }

        progress.tick();

        if (this.clock.now() >= deadline) break;
        await this.clock.sleep(intervalMs);
        if (this.clock.now() >= deadline) break;
      }
    } finally {
      progress.done();
    }

    return { succeeded: false, last, attempts, elapsedMs: this.clock.now() - start };
  }

  /**
   * Boolean form: poll until the predicate returns true.
   */
  async poll(
    policy: WaitPolicy,
    predicate: () => Promise<boolean>,
    progress?: ProgressReporter
  ): Promise<PollResult<boolean>> {
    return this.run<boolean>(
      policy,
      async () => {
        const ok = await predicate();
        return ok ? { status: "succeeded", value: true } : { status: "continue", value: false };
      },
      progress
    );
  }
}
