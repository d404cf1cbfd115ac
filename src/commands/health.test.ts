import { describe, expect, it } from "vitest";
import { createTestHub, createTestRuntime, printed } from "../__tests__/fixtures.js";
import { healthCommand } from "./health.js";

describe("healthCommand", () => {
  it("prints the health report", async () => {
    const { hub } = await createTestHub();
    const runtime = createTestRuntime();

    await healthCommand(hub, {}, runtime);

    expect(printed(runtime.log)).toEqual([
      [
        "status: healthy",
        "scheduler: stopped",
        "uptime: 0s",
        "alerts: 0 open, 0 critical",
        "",
        "jobs:",
        "  ✓ deployment_monitor: active (0/0 ok)",
        "  ✓ infrastructure_monitor: active (0/0 ok)",
        "  ✓ cost_optimizer: active (0/0 ok)",
        "  ✓ alert_processor: active (0/0 ok)",
      ].join("\n"),
    ]);
    expect(runtime.exit).not.toHaveBeenCalled();
  });

  it("exits 1 when every job is degraded", async () => {
    const { hub, gateway } = await createTestHub();
    await gateway.transaction(async (tx) => {
      for (const job of await tx.listJobs()) {
        await tx.putJob({ ...job, metadata: { consecutiveFailures: 3 } });
      }
    });
    const runtime = createTestRuntime();

    await healthCommand(hub, { json: true }, runtime);

    const [output] = printed(runtime.log);
    expect(typeof output === "string" ? JSON.parse(output).status : null).toBe("unhealthy");
    expect(runtime.exit).toHaveBeenCalledWith(1);
  });
});
