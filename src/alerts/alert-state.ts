/**
 * Alert lifecycle
 *
 * Exhaustive transition table for operator commands. `resolved -> new` is
 * not a command: it only happens when the router reopens a recurring alert.
 *
 * @module alerts/alert-state
 */

import { InvalidTransitionError } from "../errors.js";
import type { Alert, AlertStatus, Severity } from "../types.js";

export type AlertAction = "acknowledge" | "resolve" | "suppress";

export const ALERT_TRANSITIONS: Readonly<
  Record<AlertStatus, Readonly<Partial<Record<AlertAction, AlertStatus>>>>
> = {
  new: { acknowledge: "acknowledged", resolve: "resolved", suppress: "suppressed" },
  acknowledged: { resolve: "resolved", suppress: "suppressed" },
  resolved: { suppress: "suppressed" },
  suppressed: {},
};

export const OPEN_STATUSES: readonly AlertStatus[] = ["new", "acknowledged"];

export function canTransition(from: AlertStatus, action: AlertAction): boolean {
  return ALERT_TRANSITIONS[from][action] !== undefined;
}

/**
 * Target status for `action`, or InvalidTransitionError.
 */
export function nextAlertStatus(alert: Pick<Alert, "id" | "status">, action: AlertAction): AlertStatus {
  const next = ALERT_TRANSITIONS[alert.status][action];
  if (next === undefined) {
    throw new InvalidTransitionError("alert", alert.id, alert.status, action);
  }
  return next;
}

export const SEVERITY_RANK: Readonly<Record<Severity, number>> = {
  info: 0,
  warning: 1,
  critical: 2,
};

export function maxSeverity(a: Severity, b: Severity): Severity {
  return SEVERITY_RANK[b] > SEVERITY_RANK[a] ? b : a;
}
