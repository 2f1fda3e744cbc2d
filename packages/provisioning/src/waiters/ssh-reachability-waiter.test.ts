import { createWaitPolicy, type GatewaySpec } from "@hoist/core";
import { BoundedPoller } from "../polling/bounded-poller";
import { SshReachabilityWaiter } from "./ssh-reachability-waiter";
import { FakeClock, ScriptedProber } from "../__tests__/fakes";
import type { Prober } from "../connectivity";

describe("SshReachabilityWaiter", () => {
  let clock: FakeClock;

  beforeEach(() => {
    clock = new FakeClock();
  });

  it("keeps probing through unreachable and error outcomes", async () => {
    const prober = new ScriptedProber([
      { status: "unreachable" },
      { status: "error", cause: new Error("connect ECONNREFUSED") },
      { status: "reachable" },
    ]);
    const waiter = new SshReachabilityWaiter(new BoundedPoller(clock), () => prober);

    const reachable = await waiter.awaitReachable(
      "203.0.113.10",
      22,
      createWaitPolicy({ intervalSeconds: 2, maxWaitSeconds: 300 })
    );

    expect(reachable).toBe(true);
    expect(prober.calls).toEqual([
      { host: "203.0.113.10", port: 22 },
      { host: "203.0.113.10", port: 22 },
      { host: "203.0.113.10", port: 22 },
    ]);
    expect(clock.sleeps).toEqual([2000, 2000]);
  });

  it("probes exactly once and does not sleep when the maximum wait is zero", async () => {
    const prober = new ScriptedProber([{ status: "unreachable" }]);
    const waiter = new SshReachabilityWaiter(new BoundedPoller(clock), () => prober);

    const reachable = await waiter.awaitReachable(
      "203.0.113.10",
      22,
      createWaitPolicy({ intervalSeconds: 2, maxWaitSeconds: 0 })
    );

    expect(reachable).toBe(false);
    expect(prober.calls).toHaveLength(1);
    expect(clock.sleeps).toEqual([]);
  });

  it("returns false after the deadline instead of throwing", async () => {
    const prober = new ScriptedProber([{ status: "unreachable" }]);
    const waiter = new SshReachabilityWaiter(new BoundedPoller(clock), () => prober);

    const reachable = await waiter.awaitReachable(
      "203.0.113.10",
      22,
      createWaitPolicy({ intervalSeconds: 2, maxWaitSeconds: 6 })
    );

    expect(reachable).toBe(false);
    expect(prober.calls).toHaveLength(3);
    expect(clock.current).toBe(6000);
  });

  it("builds the prober for the configured gateway", async () => {
    const gateway: GatewaySpec = { host: "bastion", user: "ops", port: 22, portSpecified: false };
    const prober = new ScriptedProber([{ status: "reachable" }]);
    const factory = jest.fn((): Prober => prober);
    const waiter = new SshReachabilityWaiter(new BoundedPoller(clock), factory);

    await waiter.awaitReachable("10.0.1.15", 22, createWaitPolicy({ intervalSeconds: 2, maxWaitSeconds: 10 }), gateway);

    expect(factory).toHaveBeenCalledWith(gateway);
  });
});
