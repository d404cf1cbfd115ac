import { beforeEach, describe, expect, it } from "vitest";
import { createTestHub, createTestRuntime, makeAlert, printed, type TestHub } from "../__tests__/fixtures.js";
import {
  alertsAckCommand,
  alertsListCommand,
  alertsResolveCommand,
  alertsSummaryCommand,
  alertsSuppressCommand,
  formatAlertLine,
} from "./alerts.js";

let context: TestHub;
let runtime: ReturnType<typeof createTestRuntime>;

beforeEach(async () => {
  context = await createTestHub();
  runtime = createTestRuntime();
  await context.gateway.transaction(async (tx) => {
    await tx.putAlert(makeAlert());
    await tx.putAlert(
      makeAlert({ id: "alert-2", severity: "critical", status: "acknowledged", assignedTo: "oncall" }),
    );
  });
});

describe("formatAlertLine", () => {
  it("shows id, severity, status, title and assignee", () => {
    expect(formatAlertLine(makeAlert())).toBe("alert-1  warning  new          High CPU usage");
    expect(formatAlertLine(makeAlert({ severity: "critical", status: "acknowledged", assignedTo: "oncall" }))).toBe(
      "alert-1  critical acknowledged  High CPU usage  @oncall",
    );
  });
});

describe("alertsListCommand", () => {
  it("lists every alert without filters", async () => {
    await alertsListCommand(context.hub, {}, runtime);
    expect(printed(runtime.log)).toEqual([
      "alert-1  warning  new          High CPU usage",
      "alert-2  critical acknowledged  High CPU usage  @oncall",
    ]);
  });

  it("filters by comma-separated severities", async () => {
    await alertsListCommand(context.hub, { severity: "critical, info" }, runtime);
    expect(printed(runtime.log)).toEqual(["alert-2  critical acknowledged  High CPU usage  @oncall"]);
  });

  it("says so when nothing matches", async () => {
    await alertsListCommand(context.hub, { status: "suppressed" }, runtime);
    expect(printed(runtime.log)).toEqual(["No alerts."]);
  });

  it("rejects unknown statuses", async () => {
    await alertsListCommand(context.hub, { status: "new,bogus" }, runtime);

    expect(runtime.error).toHaveBeenCalledWith(
      'Invalid status: "bogus". Expected one of: new, acknowledged, resolved, suppressed.',
    );
    expect(runtime.exit).toHaveBeenCalledWith(1);
    expect(runtime.log).not.toHaveBeenCalled();
  });
});

describe("alert transitions", () => {
  it("acknowledges, resolves and suppresses", async () => {
    await alertsAckCommand(context.hub, "alert-1", {}, runtime);
    await alertsResolveCommand(context.hub, "alert-1", {}, runtime);
    await alertsSuppressCommand(context.hub, "alert-2", {}, runtime);

    expect(printed(runtime.log)).toEqual([
      "Alert alert-1 acknowledged.",
      "Alert alert-1 resolved.",
      "Alert alert-2 suppressed.",
    ]);
  });

  it("reports transitions the alert's state does not allow", async () => {
    await alertsAckCommand(context.hub, "alert-2", {}, runtime);

    expect(runtime.error).toHaveBeenCalledWith("Cannot acknowledge alert alert-2 in state acknowledged");
    expect(runtime.exit).toHaveBeenCalledWith(1);
  });

  it("reports unknown alerts", async () => {
    await alertsResolveCommand(context.hub, "alert-9", {}, runtime);
    expect(runtime.error).toHaveBeenCalledWith("alert not found: alert-9");
  });
});

describe("alertsSummaryCommand", () => {
  it("prints open counts by severity", async () => {
    await alertsSummaryCommand(context.hub, {}, runtime);
    expect(printed(runtime.log)).toEqual([
      "open: 2 (1 critical, 1 warning, 0 info)",
      "raised in the last 24h: 2",
    ]);
  });
});
