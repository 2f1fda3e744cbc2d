/**
 * Gateway Tunnel Manager
 *
 * Opens a short-lived SSH port forward through a gateway host so a probe can
 * reach an instance that is only routable from inside its network. Each
 * `withTunnel` call owns exactly one gateway session and closes it before
 * returning, whatever happens inside.
 */

import net from "node:net";
import os from "node:os";
import path from "node:path";
import { readFile } from "node:fs/promises";
import type { Duplex } from "node:stream";
import { Client, utils, type ClientChannel } from "ssh2";
import SSHConfig from "ssh-config";
import { GATEWAY_READY_TIMEOUT_MS, SSH_PORT, type GatewaySpec } from "@hoist/core";
import { noopLog, type ProvisionLogCallback } from "../interface/logging";

export const LOOPBACK_HOST = "127.0.0.1";

/** Gateway coordinates after filling gaps from the SSH client config */
export interface ResolvedGatewayOptions {
  host: string;
  port: number;
  username: string;
  identityFiles: string[];
}

export interface GatewayConnectOptions extends ResolvedGatewayOptions {
  /** Contents of the first identity file usable without a passphrase */
  privateKey?: Buffer;
  /** Path of the SSH agent socket */
  agent?: string;
}

/** An authenticated session on the gateway host */
export interface GatewayConnection {
  forwardOut(srcHost: string, srcPort: number, dstHost: string, dstPort: number): Promise<Duplex>;
  end(): void;
}

export interface GatewayConnector {
  connect(options: GatewayConnectOptions): Promise<GatewayConnection>;
}

/**
 * Fill in user, port and keys the gateway spec leaves unset, using the
 * matching `Host` block of the user's SSH config.
 */
export function resolveGatewayOptions(
  spec: GatewaySpec,
  sshConfigText = "",
  fallbackUser: string = os.userInfo().username
): ResolvedGatewayOptions {
  const computed: Record<string, string | string[]> = sshConfigText
    ? SSHConfig.parse(sshConfigText).compute(spec.host)
    : {};

  const configPort = firstValue(computed["Port"]);
  const configKeys = allValues(computed["IdentityFile"]);

  return {
    host: firstValue(computed["HostName"]) ?? spec.host,
    port: spec.portSpecified ? spec.port : configPort ? Number.parseInt(configPort, 10) : SSH_PORT,
    username: spec.user ?? firstValue(computed["User"]) ?? fallbackUser,
    identityFiles: (spec.keys ?? configKeys).map(expandHome),
  };
}

export function expandHome(filePath: string): string {
  if (filePath === "~") return os.homedir();
  if (filePath.startsWith("~/")) return path.join(os.homedir(), filePath.slice(2));
  return filePath;
}

function firstValue(value: string | string[] | undefined): string | undefined {
  if (Array.isArray(value)) return value[0];
  return value;
}

function allValues(value: string | string[] | undefined): string[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

// ── ssh2 transport ──────────────────────────────────────────────────────

class Ssh2GatewayConnection implements GatewayConnection {
  constructor(private readonly client: Client) {}

  forwardOut(srcHost: string, srcPort: number, dstHost: string, dstPort: number): Promise<Duplex> {
    return new Promise((resolve, reject) => {
      this.client.forwardOut(srcHost, srcPort, dstHost, dstPort, (err: Error | undefined, channel: ClientChannel) => {
        if (err) {
          reject(err);
          return;
        }
        resolve(channel);
      });
    });
  }

  end(): void {
    this.client.end();
  }
}

export class Ssh2GatewayConnector implements GatewayConnector {
  connect(options: GatewayConnectOptions): Promise<GatewayConnection> {
    return new Promise((resolve, reject) => {
      const client = new Client();

      client.once("ready", () => resolve(new Ssh2GatewayConnection(client)));
      client.once("error", (err: Error) => {
        client.end();
        reject(err);
      });

      client.connect({
        host: options.host,
        port: options.port,
        username: options.username,
        privateKey: options.privateKey,
        agent: options.agent,
        readyTimeout: GATEWAY_READY_TIMEOUT_MS,
      });
    });
  }
}

// ── Tunnel manager ──────────────────────────────────────────────────────

export interface GatewayTunnelManagerOptions {
  connector?: GatewayConnector;
  /** Reads the SSH client config; defaults to ~/.ssh/config */
  readSshConfig?: () => Promise<string>;
  log?: ProvisionLogCallback;
}

export class GatewayTunnelManager {
  private readonly connector: GatewayConnector;
  private readonly readSshConfig: () => Promise<string>;
  private readonly log: ProvisionLogCallback;

  constructor(options: GatewayTunnelManagerOptions = {}) {
    this.connector = options.connector ?? new Ssh2GatewayConnector();
    this.readSshConfig = options.readSshConfig ?? readUserSshConfig;
    this.log = options.log ?? noopLog;
  }

  /**
   * Forward a loopback port to `targetHost:targetPort` through the gateway
   * and run `fn` with that port. The listener and the gateway session are
   * closed on every exit path.
   */
  async withTunnel<T>(
    spec: GatewaySpec,
    targetHost: string,
    targetPort: number,
    fn: (localPort: number) => Promise<T>
  ): Promise<T> {
    const options = resolveGatewayOptions(spec, await this.readSshConfig());
    const connectOptions: GatewayConnectOptions = {
      ...options,
      privateKey: await readUsableKey(options.identityFiles, this.log),
      agent: process.env.SSH_AUTH_SOCK,
    };

    let connection: GatewayConnection | undefined;
    let tunnel: LocalForward | undefined;
    try {
      connection = await this.connector.connect(connectOptions);
      tunnel = await LocalForward.open(connection, targetHost, targetPort, this.log);
      return await fn(tunnel.port);
    } finally {
      if (tunnel) await tunnel.close();
      // Tear down the gateway so no tunnel sockets stay connected
      connection?.end();
    }
  }
}

/**
 * Loopback listener whose accepted sockets are piped through the gateway.
 */
class LocalForward {
  private readonly sockets = new Set<net.Socket>();

  private constructor(
    private readonly server: net.Server,
    readonly port: number
  ) {}

  static open(
    connection: GatewayConnection,
    targetHost: string,
    targetPort: number,
    log: ProvisionLogCallback
  ): Promise<LocalForward> {
    return new Promise((resolve, reject) => {
      let forward: LocalForward | undefined;

      const server = net.createServer((socket) => {
        forward?.sockets.add(socket);
        socket.once("close", () => forward?.sockets.delete(socket));
        socket.on("error", () => socket.destroy());

        connection.forwardOut(LOOPBACK_HOST, socket.remotePort ?? 0, targetHost, targetPort).then(
          (stream) => {
            stream.on("error", () => socket.destroy());
            socket.once("close", () => stream.destroy());
            socket.pipe(stream).pipe(socket);
          },
          (error: unknown) => {
            const message = error instanceof Error ? error.message : String(error);
            log(`Gateway forward to ${targetHost}:${targetPort} failed: ${message}`, "stderr");
            socket.destroy();
          }
        );
      });

      server.once("error", reject);
      server.listen(0, LOOPBACK_HOST, () => {
        const address = server.address();
        if (address === null || typeof address === "string") {
          server.close();
          reject(new Error("Tunnel listener has no TCP address"));
          return;
        }
        forward = new LocalForward(server, address.port);
        resolve(forward);
      });
    });
  }

  close(): Promise<void> {
    for (const socket of this.sockets) socket.destroy();
    this.sockets.clear();
    return new Promise((resolve) => this.server.close(() => resolve()));
  }
}

async function readUserSshConfig(): Promise<string> {
  try {
    return await readFile(path.join(os.homedir(), ".ssh", "config"), "utf8");
  } catch {
    // No SSH config: fall back to built-in defaults
    return "";
  }
}

/**
 * First identity file that reads and parses without a passphrase.
 * Passphrase-protected keys are left to the SSH agent.
 */
export async function readUsableKey(
  files: string[],
  log: ProvisionLogCallback = noopLog
): Promise<Buffer | undefined> {
  for (const file of files) {
    let data: Buffer;
    try {
      data = await readFile(file);
    } catch {
      // Missing or unreadable key: try the next one
      continue;
    }

    const parsed = utils.parseKey(data);
    if (parsed instanceof Error) {
      log(`Skipping identity file ${file}: ${parsed.message}`, "stderr");
      continue;
    }
    return data;
  }
  return undefined;
}
