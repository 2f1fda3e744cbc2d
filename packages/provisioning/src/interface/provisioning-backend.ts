import type { InstanceMetadata } from "@hoist/core";

/**
 * Launch request handed to the provisioning backend.
 */
export interface LaunchInstanceRequest {
  availabilityDomain: string;
  compartmentId?: string;
  displayName?: string;
  imageId: string;
  shape: string;
  subnetId: string;
  /** Hostname for the primary network interface */
  hostnameLabel?: string;
  metadata: InstanceMetadata;
}

/**
 * Point-in-time view of a compute instance.
 */
export interface InstanceSnapshot {
  id: string;
  displayName: string;
  /** Backend-specific lifecycle state, e.g. "pending" or "running" */
  lifecycleState: string;
  compartmentId?: string;
  availabilityDomain?: string;
  shape?: string;
  imageId?: string;
  launchedAt?: Date;
}

export interface NetworkAttachment {
  networkInterfaceId: string;
}

export interface NetworkInterfaceDetails {
  id: string;
  privateAddress?: string;
  publicAddress?: string;
  /** VPC / VCN the interface belongs to */
  networkId?: string;
  subnetId?: string;
  hostname?: string;
}

/**
 * The lifecycle states a waiter needs to recognize. Anything not listed
 * here means "keep polling".
 */
export interface LifecycleStates {
  running: string;
  terminal: readonly string[];
}

/**
 * Cloud API used by the orchestrator. Each method is a single
 * request/response; retries and waiting happen above this layer.
 */
export interface ProvisioningBackend {
  readonly lifecycle: LifecycleStates;

  createInstance(request: LaunchInstanceRequest): Promise<InstanceSnapshot>;

  getInstance(instanceId: string): Promise<InstanceSnapshot>;

  listNetworkAttachments(compartmentId: string | undefined, instanceId: string): Promise<NetworkAttachment[]>;

  getNetworkInterface(networkInterfaceId: string): Promise<NetworkInterfaceDetails>;
}
