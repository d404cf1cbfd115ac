import { describe, expect, it, vi } from "vitest";
import { AlertRouter } from "../../alerts/alert-router.js";
import type { NotificationSink } from "../../alerts/notification-sink.js";
import { ManualClock } from "../../clock.js";
import { AlreadyRunningError, NotFoundError } from "../../errors.js";
import { emptyResult } from "../../handlers/types.js";
import { silentLogger } from "../../logging.js";
import { MemoryGateway } from "../../persistence/memory-gateway.js";
import { RecommendationLedger } from "../../recommendations/recommendation-ledger.js";
import { StaticMetricSource } from "../../sources/static-metric-source.js";
import type { AlertDelta } from "../../types.js";
import { JobRegistry, type JobDefinition } from "../job-registry.js";
import { Scheduler } from "../scheduler.js";
import { TimeoutEnforcer } from "../timeout-enforcer.js";

const T0 = "2026-03-02T10:00:00.000Z";
const INTERVAL = 60_000;

function definition(name: string, overrides: Partial<JobDefinition> = {}): JobDefinition {
  return {
    name,
    kind: "monitoring",
    enabled: true,
    intervalMs: INTERVAL,
    timeoutMs: 5_000,
    initialDelayMs: 0,
    execute: async () => emptyResult(),
    ...overrides,
  };
}

async function setup(definitions: JobDefinition[]) {
  const clock = new ManualClock(T0);
  const gateway = new MemoryGateway();
  const timeoutEnforcer = new TimeoutEnforcer(undefined, silentLogger);
  const registry = new JobRegistry({ gateway, clock, timeoutEnforcer, logger: silentLogger });
  for (const d of definitions) {
    await registry.register(d);
  }
  const notify = vi.fn<NotificationSink["notify"]>(async () => undefined);
  const scheduler = new Scheduler(
    {
      gateway,
      registry,
      source: new StaticMetricSource(clock),
      router: new AlertRouter({ onCallPool: "oncall", reopenCooldownMs: 30 * 60_000, logger: silentLogger }),
      ledger: new RecommendationLedger(() => "rec-1", silentLogger),
      sink: { notify },
      clock,
      timeoutEnforcer,
      logger: silentLogger,
    },
    { shutdownGraceMs: 1000, degradedAfterFailures: 3 },
  );
  return { clock, gateway, scheduler, notify };
}

/** A promise and the function that settles it */
function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("Scheduler.tick", () => {
  it("runs a job once per interval and advances its schedule", async () => {
    const { clock, gateway, scheduler } = await setup([definition("sampler")]);

    for (let cycle = 0; cycle < 3; cycle++) {
      const outcomes = await scheduler.tick();
      expect(outcomes.map((o) => o.status)).toEqual(["success"]);
      expect(await scheduler.tick()).toEqual([]);
      clock.advance(INTERVAL);
    }

    expect(await gateway.getJob("sampler")).toMatchObject({
      runCount: 3,
      successCount: 3,
      failureCount: 0,
      lastRun: "2026-03-02T10:02:00.000Z",
      nextRun: "2026-03-02T10:03:00.000Z",
      claim: null,
    });
  });

  it("records a failure on the failing job only", async () => {
    const { gateway, scheduler } = await setup([
      definition("broken", {
        execute: async () => {
          throw new Error("boom");
        },
      }),
      definition("healthy"),
    ]);

    const outcomes = await scheduler.tick();

    expect(outcomes.map((o) => [o.jobName, o.status])).toEqual([
      ["broken", "failure"],
      ["healthy", "success"],
    ]);
    expect(await gateway.getJob("broken")).toMatchObject({
      runCount: 1,
      successCount: 0,
      failureCount: 1,
      nextRun: "2026-03-02T10:01:00.000Z",
      claim: null,
      metadata: {
        consecutiveFailures: 1,
        lastOutcome: "failure",
        lastError: { name: "Error", message: "boom", at: T0 },
      },
    });
    expect(await gateway.getJob("healthy")).toMatchObject({ runCount: 1, successCount: 1 });
  });

  it("keeps a sibling on schedule while another job fails every run", async () => {
    const { clock, gateway, scheduler } = await setup([
      definition("broken", {
        execute: async () => {
          throw new Error("boom");
        },
      }),
      definition("healthy"),
    ]);

    for (let cycle = 0; cycle < 5; cycle++) {
      await scheduler.tick();
      clock.advance(INTERVAL);
    }

    expect(await gateway.getJob("broken")).toMatchObject({
      runCount: 5,
      successCount: 0,
      failureCount: 5,
      nextRun: "2026-03-02T10:05:00.000Z",
      metadata: { consecutiveFailures: 5 },
    });
    expect(await gateway.getJob("healthy")).toMatchObject({
      runCount: 5,
      successCount: 5,
      failureCount: 0,
      lastRun: "2026-03-02T10:04:00.000Z",
      nextRun: "2026-03-02T10:05:00.000Z",
    });
  });

  it("commits a cycle's runs in due order whatever their latency", async () => {
    const alertFrom = (name: string): AlertDelta => ({
      title: `${name} is down`,
      description: `${name} stopped responding`,
      severity: "warning",
      source: name,
      tags: [],
    });
    const secondDone = deferred();
    const { gateway, scheduler } = await setup([
      definition("first", {
        execute: async () => {
          await secondDone.promise;
          return emptyResult({ alerts: [alertFrom("first")] });
        },
      }),
      definition("second", {
        execute: async () => {
          secondDone.resolve();
          return emptyResult({ alerts: [alertFrom("second")] });
        },
      }),
    ]);

    const outcomes = await scheduler.tick();

    expect(outcomes.map((o) => o.status)).toEqual(["success", "success"]);
    expect((await gateway.listAlerts()).map((a) => a.source)).toEqual(["first", "second"]);
  });

  it("notifies once when a job reaches the degraded threshold", async () => {
    let failing = true;
    const { clock, gateway, scheduler, notify } = await setup([
      definition("flaky", {
        execute: async () => {
          if (failing) throw new Error("boom");
          return emptyResult();
        },
      }),
    ]);

    for (let run = 0; run < 4; run++) {
      await scheduler.tick();
      clock.advance(INTERVAL);
    }

    expect(notify).toHaveBeenCalledTimes(1);
    expect(notify).toHaveBeenCalledWith("warning", "Job flaky is degraded", {
      job: "flaky",
      consecutiveFailures: 3,
      lastError: "boom",
    });

    failing = false;
    await scheduler.tick();
    expect((await gateway.getJob("flaky"))?.metadata.consecutiveFailures).toBe(0);
  });

  it("carries handler state from one run to the next", async () => {
    const seen: unknown[] = [];
    const { clock, gateway, scheduler } = await setup([
      definition("counter", {
        execute: async (_context, state) => {
          seen.push(state);
          const count = typeof state?.count === "number" ? state.count : 0;
          return emptyResult({ state: { count: count + 1 } });
        },
      }),
    ]);

    await scheduler.tick();
    clock.advance(INTERVAL);
    await scheduler.tick();

    expect(seen).toEqual([undefined, { count: 1 }]);
    expect((await gateway.getJob("counter"))?.metadata.state).toEqual({ count: 2 });
  });

  it("fails runs that exceed their timeout", async () => {
    const { scheduler } = await setup([
      definition("stuck", { timeoutMs: 100, execute: () => new Promise(() => undefined) }),
    ]);

    const [outcome] = await scheduler.tick();

    expect(outcome?.status).toBe("failure");
    expect(outcome?.error).toMatchObject({
      name: "HandlerTimeoutError",
      message: "Job stuck exceeded its 100ms timeout",
    });
  });

  it("pages new critical alerts after the run commits", async () => {
    const disk: AlertDelta = {
      title: "Disk full",
      description: "disk at 99%",
      severity: "critical",
      source: "infrastructure_monitor",
      tags: ["disk"],
    };
    const { clock, gateway, scheduler, notify } = await setup([
      definition("pager", { execute: async () => emptyResult({ alerts: [disk] }) }),
    ]);
    const storedWhenPaged: number[] = [];
    notify.mockImplementation(async () => {
      storedWhenPaged.push((await gateway.listAlerts()).length);
    });

    const [first] = await scheduler.tick();
    clock.advance(INTERVAL);
    const [second] = await scheduler.tick();

    expect(first?.summary).toMatchObject({ alertsCreated: 1, pages: 1 });
    expect(second?.summary).toMatchObject({ alertsUpdated: 1, pages: 0 });
    expect(storedWhenPaged).toEqual([1]);
    expect(notify).toHaveBeenCalledWith(
      "critical",
      "Disk full: disk at 99%",
      expect.objectContaining({ assignedTo: "oncall", source: "infrastructure_monitor" }),
    );
  });
});

describe("Scheduler.runJob", () => {
  it("rejects unknown jobs", async () => {
    const { scheduler } = await setup([]);
    await expect(scheduler.runJob("nope")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("surfaces a held claim as AlreadyRunningError", async () => {
    const entered = deferred();
    const gate = deferred();
    const { scheduler } = await setup([
      definition("slow", {
        execute: async () => {
          entered.resolve();
          await gate.promise;
          return emptyResult();
        },
      }),
    ]);

    const first = scheduler.runJob("slow");
    await entered.promise;

    await expect(scheduler.runJob("slow")).rejects.toBeInstanceOf(AlreadyRunningError);
    expect(await scheduler.tick()).toEqual([]);
    expect(scheduler.inFlight()).toEqual(["slow"]);

    gate.resolve();
    await expect(first).resolves.toMatchObject({ status: "success" });
    expect(scheduler.inFlight()).toEqual([]);
  });
});

describe("Scheduler.stop", () => {
  it("aborts runs that outlast the grace period and releases their claims", async () => {
    const entered = deferred();
    const { gateway, scheduler } = await setup([
      definition("stuck", {
        execute: () => {
          entered.resolve();
          return new Promise(() => undefined);
        },
      }),
    ]);

    const run = scheduler.runJob("stuck");
    await entered.promise;
    await scheduler.stop(10);

    await expect(run).resolves.toMatchObject({ jobName: "stuck", status: "aborted" });
    expect(await gateway.getJob("stuck")).toMatchObject({ runCount: 0, claim: null });
  });

  it("lets short runs finish within the grace period", async () => {
    const { gateway, scheduler } = await setup([definition("quick")]);

    const run = scheduler.runJob("quick");
    await scheduler.stop(1000);

    await expect(run).resolves.toMatchObject({ status: "success" });
    expect(await gateway.getJob("quick")).toMatchObject({ runCount: 1 });
  });
});
