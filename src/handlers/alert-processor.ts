/**
 * alert_processor
 *
 * Reconciles open alerts against the latest observations:
 * - auto-resolves alerts nobody has touched for `stalenessMs` whose
 *   condition no longer holds
 * - escalates `new` alerts left unacknowledged past their severity's SLA
 *
 * @module handlers/alert-processor
 */

import { elapsedMs } from "../clock.js";
import type { AlertProcessorConfig } from "../config/config.js";
import type {
  Alert,
  AlertCondition,
  AlertTransition,
  DeploymentStatus,
  InfrastructureMetricSample,
  Severity,
} from "../types.js";
import { emptyResult, type JobHandler } from "./types.js";

export interface AlertProcessorSnapshot {
  openAlerts: Alert[];
  latestSample: InfrastructureMetricSample | null;
  /** Null when no open alert watches a deployment */
  deployments: DeploymentStatus[] | null;
}

const ESCALATION: Record<Severity, Severity> = {
  info: "warning",
  warning: "critical",
  critical: "critical",
};

/**
 * Whether the condition that raised an alert still holds. Without the
 * observation needed to tell, the condition is assumed to hold.
 */
export function conditionHolds(
  condition: AlertCondition | null,
  snapshot: Pick<AlertProcessorSnapshot, "latestSample" | "deployments">,
): boolean {
  if (!condition) return false;
  switch (condition.type) {
    case "metric":
      return snapshot.latestSample ? snapshot.latestSample[condition.metric] > condition.threshold : true;
    case "deployment": {
      if (!snapshot.deployments) return true;
      const deployment = snapshot.deployments.find(
        (d) => d.namespace === condition.namespace && d.name === condition.name,
      );
      return deployment !== undefined && deployment.readyReplicas < deployment.replicas;
    }
  }
}

/** Start of the current SLA period: creation, last escalation or last reopen */
export function slaAnchor(alert: Alert): string {
  const candidates = [alert.createdAt];
  if (alert.escalatedAt) candidates.push(alert.escalatedAt);
  const reopenedAt = alert.metadata.reopenedAt;
  if (typeof reopenedAt === "string") candidates.push(reopenedAt);
  return candidates.reduce((latest, at) => (Date.parse(at) > Date.parse(latest) ? at : latest));
}

export const alertProcessor: JobHandler<AlertProcessorSnapshot, AlertProcessorConfig> = {
  name: "alert_processor",
  kind: "alerting",

  async collect(context) {
    const openAlerts = await context.store.listAlerts({ status: ["new", "acknowledged"] });
    const [latestSample] = await context.store.recentSamples(1);
    const watchesDeployments = openAlerts.some((a) => a.condition?.type === "deployment");
    return {
      openAlerts,
      latestSample: latestSample ?? null,
      deployments: watchesDeployments ? await context.source.deployments() : null,
    };
  },

  evaluate(snapshot, { now, config }) {
    const transitions: AlertTransition[] = [];

    for (const alert of snapshot.openAlerts) {
      const stale = elapsedMs(alert.updatedAt, now) > config.stalenessMs;
      if (stale && !conditionHolds(alert.condition, snapshot)) {
        transitions.push({
          alertId: alert.id,
          action: "resolve",
          reason: `condition cleared, no update for ${Math.round(config.stalenessMs / 60000)} minutes`,
        });
        continue;
      }

      if (alert.status === "new" && elapsedMs(slaAnchor(alert), now) > config.slaMs[alert.severity]) {
        transitions.push({
          alertId: alert.id,
          action: "escalate",
          severity: ESCALATION[alert.severity],
          reason: `unacknowledged past the ${alert.severity} SLA`,
        });
      }
    }

    return emptyResult({ transitions });
  },
};
