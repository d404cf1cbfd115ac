/**
 * deployment_monitor
 *
 * Flags deployments running fewer ready replicas than desired. The first
 * sighting is remembered in handler state: within the grace period the
 * alert is a warning, after it the same alert escalates to critical.
 *
 * @module handlers/deployment-monitor
 */

import { elapsedMs } from "../clock.js";
import type { DeploymentMonitorConfig } from "../config/config.js";
import type { AlertDelta, DeploymentStatus } from "../types.js";
import { emptyResult, type HandlerState, type JobHandler } from "./types.js";

export interface DeploymentSnapshot {
  deployments: DeploymentStatus[];
}

export function deploymentKey(deployment: Pick<DeploymentStatus, "namespace" | "name">): string {
  return `${deployment.namespace}/${deployment.name}`;
}

/**
 * First-seen times keyed by `namespace/name`. Anything malformed in stored
 * state is dropped.
 */
export function readUnderReplicatedSince(state: HandlerState | undefined): Record<string, string> {
  const raw = state?.underReplicatedSince;
  const result: Record<string, string> = {};
  if (typeof raw !== "object" || raw === null) return result;
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === "string") result[key] = value;
  }
  return result;
}

export const deploymentMonitor: JobHandler<DeploymentSnapshot, DeploymentMonitorConfig> = {
  name: "deployment_monitor",
  kind: "monitoring",

  async collect(context) {
    return { deployments: await context.source.deployments() };
  },

  evaluate(snapshot, { now, state, config }) {
    const previous = readUnderReplicatedSince(state);
    const underReplicatedSince: Record<string, string> = {};
    const alerts: AlertDelta[] = [];

    for (const deployment of snapshot.deployments) {
      if (deployment.readyReplicas >= deployment.replicas) continue;

      const key = deploymentKey(deployment);
      const since = previous[key] ?? now.toISOString();
      underReplicatedSince[key] = since;

      const severity = elapsedMs(since, now) > config.gracePeriodMs ? "critical" : "warning";
      alerts.push({
        title: `Deployment ${key} under-replicated`,
        description:
          `${deployment.readyReplicas}/${deployment.replicas} replicas ready ` +
          `since ${since}`,
        severity,
        source: "deployment_monitor",
        tags: ["deployment", deployment.namespace],
        condition: { type: "deployment", namespace: deployment.namespace, name: deployment.name },
        metadata: {
          replicas: deployment.replicas,
          readyReplicas: deployment.readyReplicas,
          underReplicatedSince: since,
        },
      });
    }

    return emptyResult({ alerts, state: { underReplicatedSince } });
  },
};
