/**
 * Server Create Orchestrator
 *
 * Drives one instance through launch, lifecycle wait, network resolution,
 * SSH wait, stabilization pause and bootstrap, strictly in that order. Any
 * failure along the way aborts the run; nothing loops back.
 */

import {
  createWaitPolicy,
  ProvisioningError,
  SSH_PORT,
  WAIT_FOR_SSH_INTERVAL_SECONDS,
  WaitTimeoutError,
  type SshCredentials,
} from "@hoist/core";
import type {
  InstanceSnapshot,
  LaunchInstanceRequest,
  NetworkInterfaceDetails,
  ProvisioningBackend,
} from "../interface/provisioning-backend";
import type { BootstrapAgent } from "../interface/bootstrap-agent";
import { noopLog, noopProgress, type ProgressReporter, type ProvisionLogCallback } from "../interface/logging";
import { BoundedPoller } from "../polling/bounded-poller";
import { systemClock, type PollerClock } from "../polling/clock";
import { InstanceLifecycleWaiter } from "../waiters/instance-lifecycle-waiter";
import { SshReachabilityWaiter, type ProberFactory } from "../waiters/ssh-reachability-waiter";

export type ServerCreateStage =
  | "submitted"
  | "running"
  | "network_resolved"
  | "reachable"
  | "stabilized"
  | "bootstrapped";

export type StageCallback = (stage: ServerCreateStage, message: string) => void;

export interface ServerCreateRequest {
  launch: LaunchInstanceRequest;
  usePrivateIp: boolean;
  ssh: SshCredentials;
  /** Chef node name; defaults to the instance display name */
  nodeName?: string;
  runList: string[];
  waitToStabilizeSeconds: number;
  waitForSshMaxSeconds: number;
  yes?: boolean;
}

export interface ServerCreateResult {
  instance: InstanceSnapshot;
  networkInterface: NetworkInterfaceDetails;
  address: string;
  nodeName: string;
}

export interface ServerCreateOrchestratorOptions {
  backend: ProvisioningBackend;
  bootstrapAgent: BootstrapAgent;
  clock?: PollerClock;
  lifecycleWaiter?: InstanceLifecycleWaiter;
  sshWaiter?: SshReachabilityWaiter;
  /** Prober selection for the default SSH waiter */
  proberFactory?: ProberFactory;
  log?: ProvisionLogCallback;
  onStage?: StageCallback;
  /** Builds the progress indicator for a wait, given its banner */
  createProgress?: (label: string) => ProgressReporter;
}

export class ServerCreateOrchestrator {
  private readonly backend: ProvisioningBackend;
  private readonly bootstrapAgent: BootstrapAgent;
  private readonly clock: PollerClock;
  private readonly lifecycleWaiter: InstanceLifecycleWaiter;
  private readonly sshWaiter: SshReachabilityWaiter;
  private readonly log: ProvisionLogCallback;
  private readonly onStage?: StageCallback;
  private readonly createProgress: (label: string) => ProgressReporter;

  constructor(options: ServerCreateOrchestratorOptions) {
    this.backend = options.backend;
    this.bootstrapAgent = options.bootstrapAgent;
    this.clock = options.clock ?? systemClock;
    this.log = options.log ?? noopLog;
    this.onStage = options.onStage;
    this.createProgress = options.createProgress ?? (() => noopProgress);

    const poller = new BoundedPoller(this.clock);
    this.lifecycleWaiter = options.lifecycleWaiter ?? new InstanceLifecycleWaiter(this.backend, poller, this.log);
    this.sshWaiter = options.sshWaiter ?? new SshReachabilityWaiter(poller, options.proberFactory, this.log);
  }

  async run(request: ServerCreateRequest): Promise<ServerCreateResult> {
    const launched = await this.backend.createInstance(request.launch);
    this.advance("submitted", `Launched instance '${launched.displayName}' [${launched.id}]`);

    const instance = await this.lifecycleWaiter.awaitState(launched.id, this.backend.lifecycle.running, {
      progress: this.createProgress("Waiting for instance to reach running state..."),
    });
    this.advance("running", `Instance '${instance.displayName}' is now running.`);

    const networkInterface = await this.resolveNetworkInterface(instance);
    const address = this.selectAddress(instance, networkInterface, request.usePrivateIp);
    this.advance("network_resolved", `Using ${request.usePrivateIp ? "private" : "public"} IP address ${address}`);

    const sshPolicy = createWaitPolicy({
      intervalSeconds: WAIT_FOR_SSH_INTERVAL_SECONDS,
      maxWaitSeconds: request.waitForSshMaxSeconds,
    });
    const reachable = await this.sshWaiter.awaitReachable(
      address,
      SSH_PORT,
      sshPolicy,
      request.ssh.gateway,
      this.createProgress("Waiting for ssh access...")
    );
    if (!reachable) {
      throw new WaitTimeoutError("Timed out while waiting for SSH access.", request.waitForSshMaxSeconds);
    }
    this.advance("reachable", `SSH is reachable at ${address}`);

    // sshd answers before the image accepts bootstrap logins; keep this pause.
    await this.clock.sleep(request.waitToStabilizeSeconds * 1000);
    this.advance("stabilized", `Waited ${request.waitToStabilizeSeconds}s for the instance to stabilize`);

    const nodeName = request.nodeName ?? instance.displayName;
    this.log(`Bootstrapping with node name '${nodeName}'.`);

    await this.bootstrapAgent.bootstrap({
      address,
      gateway: request.ssh.gateway,
      nodeName,
      sshUser: request.ssh.user,
      sshPassword: request.ssh.password,
      identityFile: request.ssh.identityFile,
      runList: request.runList,
      useSudo: true,
      yes: request.yes,
    });
    this.advance("bootstrapped", `Created and bootstrapped node '${nodeName}'.`);

    return { instance, networkInterface, address, nodeName };
  }

  /**
   * The first network interface attached to the instance. A freshly
   * launched instance has exactly one.
   */
  private async resolveNetworkInterface(instance: InstanceSnapshot): Promise<NetworkInterfaceDetails> {
    const attachments = await this.backend.listNetworkAttachments(instance.compartmentId, instance.id);
    const first = attachments[0];
    if (!first) {
      throw new ProvisioningError(
        `No network interface found for instance ${instance.id}.`,
        instance.id,
        instance.lifecycleState
      );
    }
    return this.backend.getNetworkInterface(first.networkInterfaceId);
  }

  private selectAddress(
    instance: InstanceSnapshot,
    networkInterface: NetworkInterfaceDetails,
    usePrivateIp: boolean
  ): string {
    const address = usePrivateIp ? networkInterface.privateAddress : networkInterface.publicAddress;
    if (!address) {
      throw new ProvisioningError(
        `Instance ${instance.id} has no ${usePrivateIp ? "private" : "public"} IP address.`,
        instance.id,
        instance.lifecycleState
      );
    }
    return address;
  }

  private advance(stage: ServerCreateStage, message: string): void {
    this.log(message);
    this.onStage?.(stage, message);
  }
}
