import type { GatewaySpec } from "@hoist/core";
import { DirectProber, type DirectProberOptions } from "./direct-prober";
import { GatewayTunnelManager } from "./gateway-tunnel";
import { TunneledProber } from "./tunneled-prober";
import type { Prober } from "./probe-outcome";

export * from "./probe-outcome";
export * from "./direct-prober";
export * from "./gateway-tunnel";
export * from "./tunneled-prober";

export interface CreateProberOptions extends DirectProberOptions {
  tunnels?: GatewayTunnelManager;
}

/**
 * Pick the probe variant: tunneled when a gateway is configured, direct
 * otherwise.
 */
export function createProber(gateway: GatewaySpec | undefined, options: CreateProberOptions = {}): Prober {
  const direct = new DirectProber(options);
  if (!gateway) return direct;
  return new TunneledProber(gateway, options.tunnels ?? new GatewayTunnelManager(), direct);
}
