import net from "node:net";
import { DirectProber } from "./direct-prober";
import { isReachable } from "./probe-outcome";

const SSH_BANNER = "SSH-2.0-OpenSSH_9.6\r\n";

interface TestServer {
  server: net.Server;
  port: number;
  sockets: Set<net.Socket>;
}

function startServer(onConnection: (socket: net.Socket) => void): Promise<TestServer> {
  return new Promise((resolve) => {
    const sockets = new Set<net.Socket>();
    const server = net.createServer((socket) => {
      sockets.add(socket);
      socket.on("error", () => undefined);
      onConnection(socket);
    });
    server.listen(0, "127.0.0.1", () => {
      const address = server.address();
      const port = address !== null && typeof address === "object" ? address.port : 0;
      resolve({ server, port, sockets });
    });
  });
}

function stopServer(test: TestServer): Promise<void> {
  for (const socket of test.sockets) socket.destroy();
  return new Promise((resolve) => test.server.close(() => resolve()));
}

async function unusedPort(): Promise<number> {
  const test = await startServer(() => undefined);
  await stopServer(test);
  return test.port;
}

describe("DirectProber", () => {
  let server: TestServer | undefined;

  afterEach(async () => {
    if (server) await stopServer(server);
    server = undefined;
  });

  it("is reachable when the server sends a banner", async () => {
    server = await startServer((socket) => socket.write(SSH_BANNER));

    const outcome = await new DirectProber().probe("127.0.0.1", server.port);

    expect(outcome).toEqual({ status: "reachable" });
  });

  it("is unreachable when the server closes without sending anything", async () => {
    server = await startServer((socket) => socket.end());

    const outcome = await new DirectProber().probe("127.0.0.1", server.port);

    expect(outcome).toEqual({ status: "unreachable", reason: "connection closed without data" });
  });

  it("is unreachable when the server stays silent past the banner timeout", async () => {
    server = await startServer(() => undefined);

    const outcome = await new DirectProber({ bannerTimeoutMs: 50 }).probe("127.0.0.1", server.port);

    expect(outcome).toEqual({ status: "unreachable", reason: "no data received" });
  });

  it("reports a refused connection as an error outcome", async () => {
    const port = await unusedPort();

    const outcome = await new DirectProber().probe("127.0.0.1", port);

    expect(outcome.status).toBe("error");
    expect(isReachable(outcome)).toBe(false);
  });

  it("closes its socket after probing", async () => {
    let serverSide: net.Socket | undefined;
    server = await startServer((socket) => {
      serverSide = socket;
      socket.write(SSH_BANNER);
    });

    await new DirectProber().probe("127.0.0.1", server.port);
    const closed = await new Promise<boolean>((resolve) => {
      if (!serverSide || serverSide.destroyed) {
        resolve(true);
        return;
      }
      serverSide.once("close", () => resolve(true));
    });

    expect(closed).toBe(true);
  });
});
