/**
 * EC2 provisioning backend.
 *
 * Maps the launch request onto RunInstances: the shape is the instance type,
 * the availability domain the availability zone, and the owning account
 * stands in for the compartment when listing network interfaces. Authorized
 * keys are imported as an EC2 key pair; other metadata becomes instance tags.
 */

import { createHash } from "node:crypto";
import {
  EC2Client,
  DescribeInstancesCommand,
  DescribeNetworkInterfacesCommand,
  ImportKeyPairCommand,
  RunInstancesCommand,
  type DescribeInstancesCommandOutput,
  type Filter,
  type Instance,
  type _InstanceType,
} from "@aws-sdk/client-ec2";
import {
  METADATA_SSH_AUTHORIZED_KEYS,
  METADATA_USER_DATA,
  ProvisioningError,
} from "@hoist/core";
import type {
  InstanceSnapshot,
  LaunchInstanceRequest,
  LifecycleStates,
  NetworkAttachment,
  NetworkInterfaceDetails,
  ProvisioningBackend,
} from "../../interface/provisioning-backend";
import { noopLog, type ProvisionLogCallback } from "../../interface/logging";

const EC2_PENDING_STATE = "pending";

export const EC2_LIFECYCLE: LifecycleStates = {
  running: "running",
  terminal: ["shutting-down", "terminated"],
};

const KEY_PAIR_PREFIX = "hoist";
const HOSTNAME_TAG = "hoist:hostname-label";

export class Ec2ProvisioningBackend implements ProvisioningBackend {
  readonly lifecycle = EC2_LIFECYCLE;

  constructor(
    private readonly ec2: EC2Client,
    private readonly log: ProvisionLogCallback = noopLog,
  ) {}

  async createInstance(request: LaunchInstanceRequest): Promise<InstanceSnapshot> {
    const {
      [METADATA_SSH_AUTHORIZED_KEYS]: authorizedKeys,
      [METADATA_USER_DATA]: userData,
      ...extraMetadata
    } = request.metadata;

    const keyName = authorizedKeys ? await this.ensureKeyPair(authorizedKeys) : undefined;

    const tags: Record<string, string> = { ...extraMetadata };
    if (request.displayName) tags["Name"] = request.displayName;
    if (request.hostnameLabel) tags[HOSTNAME_TAG] = request.hostnameLabel;

    const result = await this.ec2.send(
      new RunInstancesCommand({
        ImageId: request.imageId,
        InstanceType: request.shape as _InstanceType,
        MinCount: 1,
        MaxCount: 1,
        SubnetId: request.subnetId,
        Placement: { AvailabilityZone: request.availabilityDomain },
        KeyName: keyName,
        UserData: userData,
        TagSpecifications:
          Object.keys(tags).length > 0
            ? [
                {
                  ResourceType: "instance" as const,
                  Tags: Object.entries(tags).map(([Key, Value]) => ({ Key, Value })),
                },
              ]
            : undefined,
      }),
    );

    const instance = result.Instances?.[0];
    if (!instance?.InstanceId) {
      throw new ProvisioningError("RunInstances returned no instance.");
    }
    return this.toSnapshot(instance, result.OwnerId);
  }

  /**
   * A freshly launched instance can be missing from DescribeInstances for a
   * short while; that is reported as "pending" so the waiter keeps polling.
   */
  async getInstance(instanceId: string): Promise<InstanceSnapshot> {
    let result: DescribeInstancesCommandOutput;
    try {
      result = await this.ec2.send(new DescribeInstancesCommand({ InstanceIds: [instanceId] }));
    } catch (error: unknown) {
      if (!this.isNotFoundError(error)) throw error;
      this.log(`Instance ${instanceId} not visible yet`, "stderr");
      return { id: instanceId, displayName: instanceId, lifecycleState: EC2_PENDING_STATE };
    }
    const reservation = result.Reservations?.[0];
    const instance = reservation?.Instances?.[0];
    if (!instance) {
      throw new ProvisioningError(`Instance ${instanceId} not found.`, instanceId);
    }
    return this.toSnapshot(instance, reservation?.OwnerId);
  }

  async listNetworkAttachments(
    compartmentId: string | undefined,
    instanceId: string,
  ): Promise<NetworkAttachment[]> {
    const filters: Filter[] = [{ Name: "attachment.instance-id", Values: [instanceId] }];
    if (compartmentId) filters.push({ Name: "owner-id", Values: [compartmentId] });

    const result = await this.ec2.send(new DescribeNetworkInterfacesCommand({ Filters: filters }));

    return (result.NetworkInterfaces ?? [])
      .filter((ni) => ni.NetworkInterfaceId)
      .sort((a, b) => (a.Attachment?.DeviceIndex ?? 0) - (b.Attachment?.DeviceIndex ?? 0))
      .map((ni) => ({ networkInterfaceId: ni.NetworkInterfaceId ?? "" }));
  }

  async getNetworkInterface(networkInterfaceId: string): Promise<NetworkInterfaceDetails> {
    const result = await this.ec2.send(
      new DescribeNetworkInterfacesCommand({ NetworkInterfaceIds: [networkInterfaceId] }),
    );
    const ni = result.NetworkInterfaces?.[0];
    if (!ni) {
      throw new ProvisioningError(`Network interface ${networkInterfaceId} not found.`);
    }

    return {
      id: networkInterfaceId,
      privateAddress: ni.PrivateIpAddress,
      publicAddress: ni.Association?.PublicIp,
      networkId: ni.VpcId,
      subnetId: ni.SubnetId,
      hostname: ni.PrivateDnsName,
    };
  }

  // ── Private Helpers ──────────────────────────────────────────────────

  /**
   * Import the first authorized key as a key pair named after its
   * fingerprint, reusing the pair when it was imported before.
   */
  private async ensureKeyPair(authorizedKeys: string): Promise<string> {
    const keys = authorizedKeys
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line.length > 0 && !line.startsWith("#"));
    if (keys.length === 0) {
      throw new ProvisioningError("SSH authorized keys file contains no keys.");
    }
    if (keys.length > 1) {
      this.log(`EC2 accepts one launch key; using the first of ${keys.length} authorized keys`, "stderr");
    }

    const digest = createHash("sha256").update(keys[0]).digest("hex").slice(0, 16);
    const keyName = `${KEY_PAIR_PREFIX}-${digest}`;

    try {
      await this.ec2.send(
        new ImportKeyPairCommand({
          KeyName: keyName,
          PublicKeyMaterial: Buffer.from(keys[0], "utf8"),
        }),
      );
      this.log(`Key pair imported: ${keyName}`);
    } catch (error: unknown) {
      if (!this.isDuplicateError(error)) throw error;
      this.log(`Key pair already exists: ${keyName}`);
    }
    return keyName;
  }

  private toSnapshot(instance: Instance, ownerId: string | undefined): InstanceSnapshot {
    const id = instance.InstanceId ?? "";
    const name = instance.Tags?.find((tag) => tag.Key === "Name")?.Value;

    return {
      id,
      displayName: name ?? id,
      lifecycleState: instance.State?.Name ?? "unknown",
      compartmentId: ownerId,
      availabilityDomain: instance.Placement?.AvailabilityZone,
      shape: instance.InstanceType,
      imageId: instance.ImageId,
      launchedAt: instance.LaunchTime,
    };
  }

  private isDuplicateError(error: unknown): boolean {
    if (!(error instanceof Error)) return false;
    return error.name.includes("Duplicate");
  }

  private isNotFoundError(error: unknown): boolean {
    if (!(error instanceof Error)) return false;
    return error.name.includes("NotFound");
  }
}

export interface Ec2BackendConfig {
  region?: string;
  log?: ProvisionLogCallback;
}

/**
 * Build a backend on a default-credentials EC2 client.
 */
export function createEc2Backend(config: Ec2BackendConfig = {}): Ec2ProvisioningBackend {
  const ec2 = new EC2Client(config.region ? { region: config.region } : {});
  return new Ec2ProvisioningBackend(ec2, config.log);
}
