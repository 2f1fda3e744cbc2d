// Interfaces
export * from "./interface/logging";
export * from "./interface/provisioning-backend";
export * from "./interface/bootstrap-agent";

// Polling
export { BoundedPoller } from "./polling/bounded-poller";
export type { AttemptResult, PollResult } from "./polling/bounded-poller";
export { systemClock, sleep } from "./polling/clock";
export type { PollerClock } from "./polling/clock";

// Connectivity
export * from "./connectivity";

// Waiters
export { InstanceLifecycleWaiter } from "./waiters/instance-lifecycle-waiter";
export type { LifecycleWaitOptions } from "./waiters/instance-lifecycle-waiter";
export { SshReachabilityWaiter } from "./waiters/ssh-reachability-waiter";
export type { ProberFactory } from "./waiters/ssh-reachability-waiter";

// Orchestration
export { ServerCreateOrchestrator } from "./orchestrator/server-create-orchestrator";
export type {
  ServerCreateOrchestratorOptions,
  ServerCreateRequest,
  ServerCreateResult,
  ServerCreateStage,
  StageCallback,
} from "./orchestrator/server-create-orchestrator";

// Backends and agents
export { Ec2ProvisioningBackend, EC2_LIFECYCLE, createEc2Backend } from "./backends/ec2/ec2-provisioning-backend";
export type { Ec2BackendConfig } from "./backends/ec2/ec2-provisioning-backend";
export { KnifeBootstrapAgent, buildKnifeBootstrapArgs } from "./bootstrap/knife-bootstrap-agent";
export type { KnifeBootstrapAgentOptions } from "./bootstrap/knife-bootstrap-agent";
