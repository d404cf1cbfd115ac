import { describe, expect, it } from "vitest";
import { makeJob } from "../../__tests__/fixtures.js";
import { formatHealthText, jobHealth, overallStatus, type JobHealth } from "../job-health.js";

const NOW = new Date("2026-03-02T10:00:00.000Z");

function health(overrides: Partial<JobHealth>): JobHealth {
  return { ...jobHealth(makeJob(), 3, NOW), ...overrides };
}

describe("jobHealth", () => {
  it("marks a job degraded at the failure threshold", () => {
    const job = makeJob({ metadata: { consecutiveFailures: 3 } });
    expect(jobHealth(job, 3, NOW).health).toBe("degraded");
    expect(jobHealth(job, 4, NOW).health).toBe("healthy");
  });

  it("flags active jobs more than one interval past their next run", () => {
    const late = new Date(NOW.getTime() + 300_001);
    expect(jobHealth(makeJob(), 3, new Date(NOW.getTime() + 300_000)).overdue).toBe(false);
    expect(jobHealth(makeJob(), 3, late).overdue).toBe(true);
    expect(jobHealth(makeJob({ status: "paused" }), 3, late).overdue).toBe(false);
  });
});

describe("overallStatus", () => {
  it("is healthy with no degraded jobs", () => {
    expect(overallStatus([health({}), health({ name: "b" })])).toBe("healthy");
    expect(overallStatus([])).toBe("healthy");
  });

  it("is degraded when some jobs are", () => {
    expect(overallStatus([health({ health: "degraded" }), health({ name: "b" })])).toBe("degraded");
  });

  it("is unhealthy when every enabled job is degraded", () => {
    expect(
      overallStatus([
        health({ health: "degraded" }),
        health({ name: "b", status: "disabled" }),
      ]),
    ).toBe("unhealthy");
  });
});

describe("formatHealthText", () => {
  it("renders one line per job", () => {
    const text = formatHealthText({
      status: "degraded",
      scheduler: "running",
      uptime: 42,
      alerts: { open: 2, critical: 1 },
      jobs: [
        health({ name: "deployment_monitor", runCount: 4, successCount: 4 }),
        health({
          name: "cost_optimizer",
          health: "degraded",
          runCount: 5,
          successCount: 2,
          consecutiveFailures: 3,
        }),
        health({ name: "alert_processor", status: "paused" }),
      ],
    });

    expect(text).toBe(
      [
        "status: degraded",
        "scheduler: running",
        "uptime: 42s",
        "alerts: 2 open, 1 critical",
        "",
        "jobs:",
        "  ✓ deployment_monitor: active (4/4 ok)",
        "  ✗ cost_optimizer: active (2/5 ok, 3 failing)",
        "  ○ alert_processor: paused (0/0 ok)",
      ].join("\n"),
    );
  });
});
