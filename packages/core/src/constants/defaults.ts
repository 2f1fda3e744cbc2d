/**
 * Default values for server creation.
 */

/** SSH port probed on the new instance and assumed for gateways */
export const SSH_PORT = 22;

/** Login user on the launched image when --ssh-user is not given */
export const DEFAULT_SSH_USER = "opc";

/** Seconds to pause after SSH becomes reachable */
export const DEFAULT_WAIT_TO_STABILIZE_SECONDS = 40;

/** Seconds to wait for SSH before giving up */
export const DEFAULT_WAIT_FOR_SSH_MAX_SECONDS = 300;

// Metadata keys understood by cloud-init on the instance
export const METADATA_SSH_AUTHORIZED_KEYS = "ssh_authorized_keys";
export const METADATA_USER_DATA = "user_data";
