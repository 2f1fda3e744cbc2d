import net from "node:net";
import { SSH_BANNER_TIMEOUT_MS, TCP_CONNECT_TIMEOUT_MS } from "@hoist/core";
import { REACHABLE, probeError, unreachable, type ProbeOutcome, type Prober } from "./probe-outcome";

export interface DirectProberOptions {
  /** Upper bound on the TCP handshake */
  connectTimeoutMs?: number;
  /** How long to wait for the first bytes after connecting */
  bannerTimeoutMs?: number;
}

/**
 * Probes a host with a plain TCP connection.
 *
 * A listening port alone is not enough: the server has to send something
 * (the SSH identification line) within the banner timeout.
 */
export class DirectProber implements Prober {
  private readonly connectTimeoutMs: number;
  private readonly bannerTimeoutMs: number;

  constructor(options: DirectProberOptions = {}) {
    this.connectTimeoutMs = options.connectTimeoutMs ?? TCP_CONNECT_TIMEOUT_MS;
    this.bannerTimeoutMs = options.bannerTimeoutMs ?? SSH_BANNER_TIMEOUT_MS;
  }

  probe(host: string, port: number): Promise<ProbeOutcome> {
    return new Promise((resolve) => {
      const socket = new net.Socket();
      let bannerTimer: NodeJS.Timeout | undefined;
      let settled = false;

      const finish = (outcome: ProbeOutcome) => {
        if (settled) return;
        settled = true;
        if (bannerTimer) clearTimeout(bannerTimer);
        socket.removeAllListeners();
        // Swallow late errors from the socket being torn down
        socket.on("error", () => undefined);
        socket.destroy();
        resolve(outcome);
      };

      socket.setTimeout(this.connectTimeoutMs);

      socket.once("connect", () => {
        socket.setTimeout(0);
        bannerTimer = setTimeout(() => finish(unreachable("no data received")), this.bannerTimeoutMs);
      });
      socket.on("data", (chunk: Buffer) => {
        if (chunk.length > 0) finish(REACHABLE);
      });
      socket.once("end", () => finish(unreachable("connection closed without data")));
      socket.once("close", () => finish(unreachable("connection closed without data")));
      socket.once("timeout", () => finish(probeError(new Error(`connect to ${host}:${port} timed out`))));
      socket.once("error", (error: Error) => finish(probeError(error)));

      socket.connect({ host, port });
    });
  }
}
