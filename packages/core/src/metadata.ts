import { z } from "zod";
import { ConfigurationError } from "./errors";
import { METADATA_SSH_AUTHORIZED_KEYS, METADATA_USER_DATA } from "./constants";

export const InstanceMetadataSchema = z.record(z.string(), z.string());
export type InstanceMetadata = z.infer<typeof InstanceMetadataSchema>;

export interface MetadataSources {
  /** Raw `--metadata` JSON text */
  metadataJson?: string;
  /** Contents of the authorized keys file */
  sshAuthorizedKeys?: string;
  /** Contents of the cloud-init user-data file, not yet encoded */
  userData?: string;
}

const JSON_EXAMPLE = `'{"key1":"value1", "key2":"value2"}'`;

/**
 * Combine `--metadata` with the convenience file options.
 *
 * User data is base64 encoded. Giving a key both ways is an error, as is
 * ending up without authorized keys.
 */
export function mergeMetadata(sources: MetadataSources): InstanceMetadata {
  const metadata = parseMetadataJson(sources.metadataJson);

  if (sources.sshAuthorizedKeys !== undefined) {
    if (METADATA_SSH_AUTHORIZED_KEYS in metadata) {
      throw new ConfigurationError(
        "Cannot specify ssh-authorized-keys as part of both --ssh-authorized-keys-file and --metadata."
      );
    }
    metadata[METADATA_SSH_AUTHORIZED_KEYS] = sources.sshAuthorizedKeys;
  }

  if (sources.userData !== undefined) {
    if (METADATA_USER_DATA in metadata) {
      throw new ConfigurationError(
        "Cannot specify CloudInit user-data as part of both --user-data-file and --metadata."
      );
    }
    metadata[METADATA_USER_DATA] = Buffer.from(sources.userData, "utf8").toString("base64");
  }

  // An empty keys file counts as given
  if (metadata[METADATA_SSH_AUTHORIZED_KEYS] === undefined) {
    throw new ConfigurationError("SSH authorized keys must be specified.");
  }

  return metadata;
}

function parseMetadataJson(text: string | undefined): InstanceMetadata {
  if (text === undefined || text.trim() === "") return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new ConfigurationError(`Metadata value must be in JSON format. Example: ${JSON_EXAMPLE}`);
  }

  const result = InstanceMetadataSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigurationError(
      `Metadata must be a JSON object of string values. Example: ${JSON_EXAMPLE}`
    );
  }
  return { ...result.data };
}
