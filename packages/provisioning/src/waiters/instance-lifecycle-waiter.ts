/**
 * Instance Lifecycle Waiter
 *
 * Polls an instance until it reaches a target lifecycle state. A terminal
 * state (terminated, shutting down) ends the wait at once instead of running
 * out the clock.
 */

import {
  createWaitPolicy,
  LIFECYCLE_MAX_WAIT_SECONDS,
  LIFECYCLE_POLL_INTERVAL_SECONDS,
  ProvisioningError,
} from "@hoist/core";
import type { InstanceSnapshot, ProvisioningBackend } from "../interface/provisioning-backend";
import { noopLog, noopProgress, type ProgressReporter, type ProvisionLogCallback } from "../interface/logging";
import { BoundedPoller, type AttemptResult } from "../polling/bounded-poller";

export interface LifecycleWaitOptions {
  pollIntervalSeconds?: number;
  maxWaitSeconds?: number;
  progress?: ProgressReporter;
}

export class InstanceLifecycleWaiter {
  constructor(
    private readonly backend: ProvisioningBackend,
    private readonly poller: BoundedPoller = new BoundedPoller(),
    private readonly log: ProvisionLogCallback = noopLog
  ) {}

  /**
   * Wait for `instanceId` to reach `target` and return its snapshot.
   *
   * @throws ProvisioningError if the instance ends in any other state
   */
  async awaitState(instanceId: string, target: string, options: LifecycleWaitOptions = {}): Promise<InstanceSnapshot> {
    const policy = createWaitPolicy({
      intervalSeconds: options.pollIntervalSeconds ?? LIFECYCLE_POLL_INTERVAL_SECONDS,
      maxWaitSeconds: options.maxWaitSeconds ?? LIFECYCLE_MAX_WAIT_SECONDS,
    });
    const terminal = this.backend.lifecycle.terminal;

    const result = await this.poller.run<InstanceSnapshot>(
      policy,
      async (): Promise<AttemptResult<InstanceSnapshot>> => {
        const snapshot = await this.backend.getInstance(instanceId);
        if (snapshot.lifecycleState === target) {
          return { status: "succeeded", value: snapshot };
        }
        if (terminal.includes(snapshot.lifecycleState)) {
          return { status: "abort", value: snapshot, reason: `instance is ${snapshot.lifecycleState}` };
        }
        return { status: "continue", value: snapshot };
      },
      options.progress ?? noopProgress
    );

    const final = result.last;
    if (!final || final.lifecycleState !== target) {
      const state = final?.lifecycleState ?? "unknown";
      this.log(`Instance ${instanceId} ended in state ${state} after ${result.attempts} checks`, "stderr");
      throw new ProvisioningError("Instance failed to provision.", instanceId, final?.lifecycleState);
    }
    return final;
  }
}
