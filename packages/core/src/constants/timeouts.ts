/**
 * Timing constants for the reachability waits.
 */

/** Delay between SSH reachability probes */
export const WAIT_FOR_SSH_INTERVAL_SECONDS = 2;

/** How long a connected probe waits for the server's first bytes */
export const SSH_BANNER_TIMEOUT_MS = 5_000;

/** Upper bound on the TCP connect phase of a single probe */
export const TCP_CONNECT_TIMEOUT_MS = 10_000;

/** Delay between instance lifecycle queries */
export const LIFECYCLE_POLL_INTERVAL_SECONDS = 3;

/** Overall cap on waiting for an instance to reach its target state (20 minutes) */
export const LIFECYCLE_MAX_WAIT_SECONDS = 1_200;

/** Timeout for establishing the gateway SSH session */
export const GATEWAY_READY_TIMEOUT_MS = 20_000;
