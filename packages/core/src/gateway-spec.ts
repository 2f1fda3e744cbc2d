import { ConfigurationError } from "./errors";
import { SSH_PORT } from "./constants";

/**
 * An SSH gateway that probes and the bootstrap tunnel through.
 *
 * `user`, `port` and `keys` left unset are filled from the local SSH client
 * configuration when the tunnel is opened.
 */
export interface GatewaySpec {
  host: string;
  user?: string;
  port: number;
  /** Explicit port given in the address, as opposed to the default */
  portSpecified: boolean;
  /** Private key file paths */
  keys?: string[];
}

/**
 * Parse a `[user@]host[:port]` gateway address.
 *
 * Returns undefined for an absent or blank address, meaning direct
 * connectivity.
 */
export function parseGatewaySpec(address: string | undefined | null): GatewaySpec | undefined {
  if (address === undefined || address === null) return undefined;
  const text = address.trim();
  if (text === "") return undefined;

  // The host part is whatever follows the last "@"
  const at = text.lastIndexOf("@");
  const user = at >= 0 ? text.slice(0, at) : undefined;
  const hostPort = at >= 0 ? text.slice(at + 1) : text;

  const colon = hostPort.indexOf(":");
  const host = colon >= 0 ? hostPort.slice(0, colon) : hostPort;
  const portText = colon >= 0 ? hostPort.slice(colon + 1) : undefined;

  if (host === "") {
    throw new ConfigurationError(`Invalid SSH gateway '${address}': missing host`);
  }

  let port = SSH_PORT;
  if (portText !== undefined) {
    if (!/^\d+$/.test(portText)) {
      throw new ConfigurationError(`Invalid SSH gateway '${address}': port must be numeric`);
    }
    port = Number.parseInt(portText, 10);
    if (port < 1 || port > 65535) {
      throw new ConfigurationError(`Invalid SSH gateway '${address}': port out of range`);
    }
  }

  return {
    host,
    user: user ? user : undefined,
    port,
    portSpecified: portText !== undefined,
  };
}

/**
 * Render a gateway back to the `user@host:port` form accepted by knife.
 */
export function formatGatewaySpec(spec: GatewaySpec): string {
  const user = spec.user ? `${spec.user}@` : "";
  const port = spec.portSpecified ? `:${spec.port}` : "";
  return `${user}${spec.host}${port}`;
}
