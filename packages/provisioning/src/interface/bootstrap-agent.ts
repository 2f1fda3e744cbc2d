import type { GatewaySpec } from "@hoist/core";

export interface BootstrapRequest {
  address: string;
  gateway?: GatewaySpec;
  nodeName: string;
  sshUser: string;
  sshPassword?: string;
  identityFile: string;
  runList: string[];
  useSudo: boolean;
  /** Answer yes to any prompt from the agent */
  yes?: boolean;
}

/**
 * Installs and configures software on a reachable host. A rejected promise
 * is a failed bootstrap.
 */
export interface BootstrapAgent {
  bootstrap(request: BootstrapRequest): Promise<void>;
}
