import { describe, expect, it } from "vitest";
import { InvalidTransitionError } from "../../errors.js";
import { ALERT_TRANSITIONS, canTransition, maxSeverity, nextAlertStatus } from "../alert-state.js";
import { alertDedupKey, alertId, normalizeTitle, severityClass } from "../dedup.js";

describe("alert lifecycle", () => {
  it("allows the operator transitions of the lifecycle", () => {
    expect(nextAlertStatus({ id: "a", status: "new" }, "acknowledge")).toBe("acknowledged");
    expect(nextAlertStatus({ id: "a", status: "new" }, "resolve")).toBe("resolved");
    expect(nextAlertStatus({ id: "a", status: "acknowledged" }, "resolve")).toBe("resolved");
    expect(nextAlertStatus({ id: "a", status: "acknowledged" }, "suppress")).toBe("suppressed");
    expect(nextAlertStatus({ id: "a", status: "resolved" }, "suppress")).toBe("suppressed");
  });

  it("rejects acknowledging a resolved alert", () => {
    expect(() => nextAlertStatus({ id: "a", status: "resolved" }, "acknowledge")).toThrow(
      InvalidTransitionError,
    );
    expect(() => nextAlertStatus({ id: "a", status: "resolved" }, "acknowledge")).toThrow(
      "Cannot acknowledge alert a in state resolved",
    );
  });

  it("treats suppressed as terminal", () => {
    expect(ALERT_TRANSITIONS.suppressed).toEqual({});
    expect(canTransition("suppressed", "resolve")).toBe(false);
    expect(canTransition("acknowledged", "acknowledge")).toBe(false);
  });

  it("orders severities", () => {
    expect(maxSeverity("warning", "critical")).toBe("critical");
    expect(maxSeverity("critical", "info")).toBe("critical");
    expect(maxSeverity("info", "info")).toBe("info");
  });
});

describe("dedup keys", () => {
  it("ignores case and whitespace in titles", () => {
    expect(normalizeTitle("  High   CPU\tUsage ")).toBe("high cpu usage");
  });

  it("keeps digits so distinct resources stay distinct", () => {
    const v1 = alertDedupKey({ source: "deployment_monitor", title: "Deployment prod/api-v1 under-replicated", severity: "warning" });
    const v2 = alertDedupKey({ source: "deployment_monitor", title: "Deployment prod/api-v2 under-replicated", severity: "warning" });
    expect(v1).not.toBe(v2);
  });

  it("groups warning and critical into one class", () => {
    expect(severityClass("warning")).toBe("actionable");
    expect(severityClass("critical")).toBe("actionable");
    expect(severityClass("info")).toBe("informational");
    expect(alertDedupKey({ source: "s", title: "T", severity: "critical" })).toBe("s|t|actionable");
  });

  it("derives a stable 16-hex id per generation", () => {
    const key = "s|t|actionable";
    expect(alertId(key, 0)).toMatch(/^[0-9a-f]{16}$/);
    expect(alertId(key, 0)).toBe(alertId(key, 0));
    expect(alertId(key, 1)).not.toBe(alertId(key, 0));
  });
});
