import type { AlertAction } from "../alerts/alert-state.js";
import type { AutomationHub } from "../hub/automation-hub.js";
import type { RuntimeEnv } from "../runtime.js";
import { ALERT_STATUSES, SEVERITIES, type Alert, type AlertFilter } from "../types.js";
import { parseChoices, printJson, rejectChoice, reportHubError, type OutputOpts } from "./shared.js";

export function formatAlertLine(alert: Alert): string {
  const assignee = alert.assignedTo ? `  @${alert.assignedTo}` : "";
  return `${alert.id}  ${alert.severity.padEnd(9)}${alert.status.padEnd(13)}${alert.title}${assignee}`;
}

// ---------------------------------------------------------------------------
// List
// ---------------------------------------------------------------------------

export type AlertsListOpts = OutputOpts & {
  status?: string;
  severity?: string;
  source?: string;
  assignedTo?: string;
};

export async function alertsListCommand(
  hub: AutomationHub,
  opts: AlertsListOpts,
  runtime: RuntimeEnv,
): Promise<void> {
  const status = parseChoices(opts.status, ALERT_STATUSES);
  if (status.invalid !== undefined) {
    rejectChoice(runtime, "status", status.invalid, ALERT_STATUSES);
    return;
  }
  const severity = parseChoices(opts.severity, SEVERITIES);
  if (severity.invalid !== undefined) {
    rejectChoice(runtime, "severity", severity.invalid, SEVERITIES);
    return;
  }

  const filter: AlertFilter = {
    status: status.values,
    severity: severity.values,
    source: opts.source,
    assignedTo: opts.assignedTo,
  };
  const alerts = await hub.listAlerts(filter);

  if (opts.json) {
    printJson(runtime, alerts);
    return;
  }
  if (alerts.length === 0) {
    runtime.log("No alerts.");
    return;
  }
  for (const alert of alerts) {
    runtime.log(formatAlertLine(alert));
  }
}

// ---------------------------------------------------------------------------
// Transitions
// ---------------------------------------------------------------------------

const ACTION_VERBS: Record<AlertAction, string> = {
  acknowledge: "acknowledged",
  resolve: "resolved",
  suppress: "suppressed",
};

async function applyAlertAction(
  hub: AutomationHub,
  action: AlertAction,
  alertId: string,
  opts: OutputOpts,
  runtime: RuntimeEnv,
): Promise<void> {
  let alert: Alert;
  try {
    if (action === "acknowledge") alert = await hub.acknowledge(alertId);
    else if (action === "resolve") alert = await hub.resolve(alertId);
    else alert = await hub.suppress(alertId);
  } catch (e) {
    reportHubError(e, runtime);
    return;
  }
  if (opts.json) {
    printJson(runtime, alert);
    return;
  }
  runtime.log(`Alert ${alert.id} ${ACTION_VERBS[action]}.`);
}

export async function alertsAckCommand(
  hub: AutomationHub,
  alertId: string,
  opts: OutputOpts,
  runtime: RuntimeEnv,
): Promise<void> {
  await applyAlertAction(hub, "acknowledge", alertId, opts, runtime);
}

export async function alertsResolveCommand(
  hub: AutomationHub,
  alertId: string,
  opts: OutputOpts,
  runtime: RuntimeEnv,
): Promise<void> {
  await applyAlertAction(hub, "resolve", alertId, opts, runtime);
}

export async function alertsSuppressCommand(
  hub: AutomationHub,
  alertId: string,
  opts: OutputOpts,
  runtime: RuntimeEnv,
): Promise<void> {
  await applyAlertAction(hub, "suppress", alertId, opts, runtime);
}

// ---------------------------------------------------------------------------
// Summary
// ---------------------------------------------------------------------------

export async function alertsSummaryCommand(
  hub: AutomationHub,
  opts: OutputOpts,
  runtime: RuntimeEnv,
): Promise<void> {
  const summary = await hub.getAlertSummary();
  if (opts.json) {
    printJson(runtime, summary);
    return;
  }
  const { info, warning, critical } = summary.openBySeverity;
  runtime.log(`open: ${summary.open} (${critical} critical, ${warning} warning, ${info} info)`);
  runtime.log(`raised in the last 24h: ${summary.last24h}`);
}
