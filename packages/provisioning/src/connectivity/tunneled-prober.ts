import type { GatewaySpec } from "@hoist/core";
import { DirectProber } from "./direct-prober";
import { GatewayTunnelManager, LOOPBACK_HOST } from "./gateway-tunnel";
import { probeError, type ProbeOutcome, type Prober } from "./probe-outcome";

/**
 * Probes a host through an SSH gateway: opens a tunnel for the one probe,
 * runs a direct probe against the local end, and tears the tunnel down.
 */
export class TunneledProber implements Prober {
  constructor(
    private readonly gateway: GatewaySpec,
    private readonly tunnels: GatewayTunnelManager = new GatewayTunnelManager(),
    private readonly direct: Prober = new DirectProber()
  ) {}

  async probe(host: string, port: number): Promise<ProbeOutcome> {
    try {
      return await this.tunnels.withTunnel(this.gateway, host, port, (localPort) =>
        this.direct.probe(LOOPBACK_HOST, localPort)
      );
    } catch (error) {
      return probeError(error);
    }
  }
}
