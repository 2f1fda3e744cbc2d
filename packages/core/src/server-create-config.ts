import { z } from "zod";
import { ConfigurationError } from "./errors";
import { parseWaitOption } from "./wait-policy";
import { parseGatewaySpec, type GatewaySpec } from "./gateway-spec";
import {
  DEFAULT_SSH_USER,
  DEFAULT_WAIT_FOR_SSH_MAX_SECONDS,
  DEFAULT_WAIT_TO_STABILIZE_SECONDS,
} from "./constants";

// Options as they arrive from the command line, before validation
export const ServerCreateOptionsSchema = z.object({
  availabilityDomain: z.string().optional(),
  compartmentId: z.string().optional(),
  displayName: z.string().optional(),
  hostnameLabel: z.string().optional(),
  imageId: z.string().optional(),
  metadata: z.string().optional(),
  shape: z.string().optional(),
  sshAuthorizedKeysFile: z.string().optional(),
  subnetId: z.string().optional(),
  usePrivateIp: z.boolean().default(false),
  userDataFile: z.string().optional(),
  sshUser: z.string().default(DEFAULT_SSH_USER),
  sshGateway: z.string().optional(),
  sshPassword: z.string().optional(),
  identityFile: z.string().optional(),
  nodeName: z.string().optional(),
  runList: z.union([z.string(), z.array(z.string())]).default([]),
  waitToStabilize: z.union([z.string(), z.number()]).optional(),
  waitForSshMax: z.union([z.string(), z.number()]).optional(),
  region: z.string().optional(),
  yes: z.boolean().default(false),
});

export type ServerCreateOptions = z.input<typeof ServerCreateOptionsSchema>;

export interface SshCredentials {
  user: string;
  password?: string;
  identityFile: string;
  gateway?: GatewaySpec;
}

/**
 * Validated configuration for one `server create` run.
 */
export interface ServerCreateConfig {
  availabilityDomain: string;
  compartmentId?: string;
  imageId: string;
  shape: string;
  subnetId: string;
  displayName?: string;
  hostnameLabel?: string;
  metadataJson?: string;
  sshAuthorizedKeysFile: string;
  userDataFile?: string;
  usePrivateIp: boolean;
  ssh: SshCredentials;
  nodeName?: string;
  runList: string[];
  waitToStabilizeSeconds: number;
  waitForSshMaxSeconds: number;
  region?: string;
  yes: boolean;
}

const REQUIRED_OPTIONS = [
  ["availabilityDomain", "availability-domain"],
  ["imageId", "image-id"],
  ["shape", "shape"],
  ["subnetId", "subnet-id"],
  ["identityFile", "identity-file"],
  ["sshAuthorizedKeysFile", "ssh-authorized-keys-file"],
] as const;

/**
 * Split a run list given as "role[base], recipe[nginx]" or "a b".
 */
export function parseRunList(value: string | string[]): string[] {
  const items = Array.isArray(value) ? value : [value];
  return items.flatMap((item) => item.split(/[\s,]+/)).filter((item) => item.length > 0);
}

/**
 * Validate raw options. Every problem found here is a ConfigurationError
 * raised before any cloud call is made.
 */
export function validateServerCreateOptions(input: ServerCreateOptions): ServerCreateConfig {
  const parsed = ServerCreateOptionsSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(`Invalid option ${issue.path.join(".")}: ${issue.message}`);
  }
  const options = parsed.data;

  const missing = REQUIRED_OPTIONS.filter(([key]) => !options[key]?.trim()).map(([, flag]) => flag);
  if (missing.length > 0) {
    throw new ConfigurationError(`Missing the following required parameters: ${missing.join(", ")}`);
  }

  const waitToStabilizeSeconds = parseWaitOption(
    "wait-to-stabilize",
    options.waitToStabilize,
    DEFAULT_WAIT_TO_STABILIZE_SECONDS
  );
  const waitForSshMaxSeconds = parseWaitOption(
    "wait-for-ssh-max",
    options.waitForSshMax,
    DEFAULT_WAIT_FOR_SSH_MAX_SECONDS
  );

  return {
    availabilityDomain: requireValue(options.availabilityDomain),
    compartmentId: blankToUndefined(options.compartmentId),
    imageId: requireValue(options.imageId),
    shape: requireValue(options.shape),
    subnetId: requireValue(options.subnetId),
    displayName: blankToUndefined(options.displayName),
    hostnameLabel: blankToUndefined(options.hostnameLabel),
    metadataJson: options.metadata,
    sshAuthorizedKeysFile: requireValue(options.sshAuthorizedKeysFile),
    userDataFile: blankToUndefined(options.userDataFile),
    usePrivateIp: options.usePrivateIp,
    ssh: {
      user: options.sshUser,
      password: options.sshPassword,
      identityFile: requireValue(options.identityFile),
      gateway: parseGatewaySpec(options.sshGateway),
    },
    nodeName: blankToUndefined(options.nodeName),
    runList: parseRunList(options.runList),
    waitToStabilizeSeconds,
    waitForSshMaxSeconds,
    region: blankToUndefined(options.region),
    yes: options.yes,
  };
}

function blankToUndefined(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

// Only called after the required-options check
function requireValue(value: string | undefined): string {
  const trimmed = blankToUndefined(value);
  if (trimmed === undefined) {
    throw new ConfigurationError("Missing required option");
  }
  return trimmed;
}
