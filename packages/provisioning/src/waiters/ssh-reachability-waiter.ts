import type { GatewaySpec, WaitPolicy } from "@hoist/core";
import { noopLog, noopProgress, type ProgressReporter, type ProvisionLogCallback } from "../interface/logging";
import { BoundedPoller } from "../polling/bounded-poller";
import { createProber, isReachable, type Prober } from "../connectivity";

export type ProberFactory = (gateway: GatewaySpec | undefined) => Prober;

/**
 * Polls until the SSH service on a new host answers, directly or through a
 * gateway. Connection failures only mean "not yet"; the deadline is the one
 * thing that ends the wait unsuccessfully.
 */
export class SshReachabilityWaiter {
  constructor(
    private readonly poller: BoundedPoller = new BoundedPoller(),
    private readonly proberFactory: ProberFactory = (gateway) => createProber(gateway),
    private readonly log: ProvisionLogCallback = noopLog
  ) {}

  /**
   * @returns false when the deadline passes without a successful probe
   */
  async awaitReachable(
    address: string,
    port: number,
    policy: WaitPolicy,
    gateway?: GatewaySpec,
    progress: ProgressReporter = noopProgress
  ): Promise<boolean> {
    const prober = this.proberFactory(gateway);
    const via = gateway ? ` via ${gateway.host}` : "";
    this.log(`Probing ${address}:${port}${via}`);

    const result = await this.poller.poll(
      policy,
      async () => isReachable(await prober.probe(address, port)),
      progress
    );

    return result.succeeded;
  }
}
