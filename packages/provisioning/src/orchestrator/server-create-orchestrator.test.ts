import { BootstrapError, ProvisioningError, WaitTimeoutError } from "@hoist/core";
import { BoundedPoller } from "../polling/bounded-poller";
import { SshReachabilityWaiter } from "../waiters/ssh-reachability-waiter";
import {
  ServerCreateOrchestrator,
  type ServerCreateRequest,
  type ServerCreateStage,
} from "./server-create-orchestrator";
import { FakeBackend, FakeClock, RecordingBootstrapAgent, ScriptedProber } from "../__tests__/fakes";
import type { ProbeOutcome } from "../connectivity";

const UNREACHABLE: ProbeOutcome = { status: "unreachable" };
const REACHABLE: ProbeOutcome = { status: "reachable" };

function makeRequest(overrides: Partial<ServerCreateRequest> = {}): ServerCreateRequest {
  return {
    launch: {
      availabilityDomain: "us-east-1a",
      imageId: "ami-0123456789abcdef0",
      shape: "t3.micro",
      subnetId: "subnet-1",
      displayName: "web-1",
      metadata: { ssh_authorized_keys: "ssh-ed25519 AAAAtestkey user@host" },
    },
    usePrivateIp: false,
    ssh: { user: "opc", identityFile: "/home/test/.ssh/id_ed25519" },
    runList: ["role[web]"],
    waitToStabilizeSeconds: 40,
    waitForSshMaxSeconds: 300,
    ...overrides,
  };
}

describe("ServerCreateOrchestrator", () => {
  let clock: FakeClock;
  let agent: RecordingBootstrapAgent;
  let stages: ServerCreateStage[];
  let log: jest.Mock;

  beforeEach(() => {
    clock = new FakeClock();
    agent = new RecordingBootstrapAgent();
    stages = [];
    log = jest.fn();
  });

  const makeOrchestrator = (backend: FakeBackend, prober: ScriptedProber, bootstrapAgent = agent) =>
    new ServerCreateOrchestrator({
      backend,
      bootstrapAgent,
      clock,
      sshWaiter: new SshReachabilityWaiter(new BoundedPoller(clock), () => prober),
      log,
      onStage: (stage) => stages.push(stage),
    });

  it("runs through every stage and bootstraps once with the resolved address", async () => {
    const backend = new FakeBackend(["pending", "pending", "running"]);
    const prober = new ScriptedProber([UNREACHABLE, UNREACHABLE, REACHABLE]);

    const result = await makeOrchestrator(backend, prober).run(makeRequest());

    expect(stages).toEqual(["submitted", "running", "network_resolved", "reachable", "stabilized", "bootstrapped"]);
    expect(backend.stateQueries).toBe(3);
    expect(prober.calls).toHaveLength(3);
    expect(prober.calls[0]).toEqual({ host: "203.0.113.10", port: 22 });
    expect(clock.sleeps).toEqual([3000, 3000, 2000, 2000, 40000]);

    expect(agent.requests).toEqual([
      {
        address: "203.0.113.10",
        gateway: undefined,
        nodeName: "web-1",
        sshUser: "opc",
        sshPassword: undefined,
        identityFile: "/home/test/.ssh/id_ed25519",
        runList: ["role[web]"],
        useSudo: true,
        yes: undefined,
      },
    ]);
    expect(result.address).toBe("203.0.113.10");
    expect(result.nodeName).toBe("web-1");
    expect(result.instance.lifecycleState).toBe("running");
    expect(result.networkInterface.id).toBe("eni-1");
  });

  it("logs each stage message", async () => {
    const backend = new FakeBackend(["running"]);
    const prober = new ScriptedProber([REACHABLE]);

    await makeOrchestrator(backend, prober).run(makeRequest({ nodeName: "chef-web-1" }));

    expect(log.mock.calls.map(([line]) => line)).toEqual([
      "Launched instance 'web-1' [i-0abc]",
      "Instance 'web-1' is now running.",
      "Using public IP address 203.0.113.10",
      "SSH is reachable at 203.0.113.10",
      "Waited 40s for the instance to stabilize",
      "Bootstrapping with node name 'chef-web-1'.",
      "Created and bootstrapped node 'chef-web-1'.",
    ]);
  });

  it("stops before network resolution when the instance terminates", async () => {
    const backend = new FakeBackend(["pending", "terminated"]);
    const prober = new ScriptedProber([REACHABLE]);

    await expect(makeOrchestrator(backend, prober).run(makeRequest())).rejects.toThrow(ProvisioningError);

    expect(stages).toEqual(["submitted"]);
    expect(backend.attachmentQueries).toBe(0);
    expect(prober.calls).toHaveLength(0);
    expect(agent.requests).toHaveLength(0);
  });

  it("probes exactly once and fails when the SSH wait is zero", async () => {
    const backend = new FakeBackend(["running"]);
    const prober = new ScriptedProber([UNREACHABLE]);

    const error = await makeOrchestrator(backend, prober)
      .run(makeRequest({ waitForSshMaxSeconds: 0 }))
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(WaitTimeoutError);
    expect(error).toMatchObject({ message: "Timed out while waiting for SSH access.", waitedSeconds: 0 });
    expect(prober.calls).toHaveLength(1);
    expect(clock.sleeps).toEqual([]);
    expect(stages).toEqual(["submitted", "running", "network_resolved"]);
    expect(agent.requests).toHaveLength(0);
  });

  it("uses the private address when asked", async () => {
    const backend = new FakeBackend(["running"]);
    const prober = new ScriptedProber([REACHABLE]);

    const result = await makeOrchestrator(backend, prober).run(makeRequest({ usePrivateIp: true }));

    expect(result.address).toBe("10.0.1.15");
    expect(prober.calls).toEqual([{ host: "10.0.1.15", port: 22 }]);
    expect(log).toHaveBeenCalledWith("Using private IP address 10.0.1.15");
  });

  it("fails when the selected address is missing", async () => {
    const backend = new FakeBackend(["running"]);
    backend.networkInterface = { id: "eni-1", privateAddress: "10.0.1.15" };
    const prober = new ScriptedProber([REACHABLE]);

    await expect(makeOrchestrator(backend, prober).run(makeRequest())).rejects.toThrow(
      "Instance i-0abc has no public IP address."
    );
    expect(prober.calls).toHaveLength(0);
  });

  it("fails when the instance has no network interface", async () => {
    const backend = new FakeBackend(["running"]);
    backend.attachments = [];
    const prober = new ScriptedProber([REACHABLE]);

    await expect(makeOrchestrator(backend, prober).run(makeRequest())).rejects.toThrow(
      "No network interface found for instance i-0abc."
    );
    expect(backend.attachmentQueries).toBe(1);
  });

  it("hands the gateway and password to the bootstrap agent", async () => {
    const backend = new FakeBackend(["running"]);
    const prober = new ScriptedProber([REACHABLE]);
    const gateway = { host: "bastion", user: "ops", port: 2222, portSpecified: true };

    await makeOrchestrator(backend, prober).run(
      makeRequest({
        ssh: { user: "opc", password: "test-secret", identityFile: "/tmp/key", gateway },
        yes: true,
      })
    );

    expect(agent.requests[0]).toMatchObject({ gateway, sshPassword: "test-secret", yes: true });
  });

  it("propagates a bootstrap failure", async () => {
    const backend = new FakeBackend(["running"]);
    const prober = new ScriptedProber([REACHABLE]);
    const failing = new RecordingBootstrapAgent(new BootstrapError("knife bootstrap exited with code 1", 1));

    await expect(makeOrchestrator(backend, prober, failing).run(makeRequest())).rejects.toThrow(
      "knife bootstrap exited with code 1"
    );
    expect(stages).toEqual(["submitted", "running", "network_resolved", "reachable", "stabilized"]);
  });

  it("passes the launch request to the backend unchanged", async () => {
    const backend = new FakeBackend(["running"]);
    const request = makeRequest();

    await makeOrchestrator(backend, new ScriptedProber([REACHABLE])).run(request);

    expect(backend.launches).toEqual([request.launch]);
  });
});
