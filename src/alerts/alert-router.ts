/**
 * AlertRouter - deduplication, routing and lifecycle
 *
 * Every mutation runs inside a gateway transaction supplied by the caller,
 * so ingestion of one dedup key is serialized with everything else that
 * touches the store. Alerts that need paging are returned, never sent from
 * here: the caller pages after its transaction commits.
 *
 * @module alerts/alert-router
 */

import { elapsedMs } from "../clock.js";
import { NotFoundError } from "../errors.js";
import { createLogger, type Logger } from "../logging.js";
import type { GatewayTransaction } from "../persistence/gateway.js";
import type { Alert, AlertDelta, AlertTransition, Severity } from "../types.js";
import {
  canTransition,
  maxSeverity,
  nextAlertStatus,
  type AlertAction,
} from "./alert-state.js";
import { alertDedupKey, alertId } from "./dedup.js";

export interface AlertRouterOptions {
  /** Assignee token for critical alerts */
  onCallPool: string;
  /** A resolved alert recurring within this window is reopened */
  reopenCooldownMs: number;
  logger?: Logger;
}

export type IngestAction = "created" | "updated" | "reopened";

export interface IngestResult {
  alert: Alert;
  action: IngestAction;
  /** True when the alert just became critical and must be paged */
  page: boolean;
}

export interface TransitionResult {
  alert: Alert;
  page: boolean;
}

const RESPONSE_TIME: Record<Severity, string> = {
  info: "4 hours",
  warning: "1 hour",
  critical: "15 minutes",
};

function uniqueSorted(tags: Iterable<string>): string[] {
  return [...new Set(tags)].sort();
}

/** Tags derived from the UTC hour an alert was first raised at */
export function timeOfDayTags(at: Date): string[] {
  const hour = at.getUTCHours();
  if (hour < 6) return ["night_hours"];
  if (hour >= 9 && hour < 17) return ["business_hours"];
  return [];
}

function isOpen(alert: Alert): boolean {
  return alert.status === "new" || alert.status === "acknowledged";
}

export class AlertRouter {
  private readonly logger: Logger;

  constructor(private readonly options: AlertRouterOptions) {
    this.logger = options.logger ?? createLogger("alert-router");
  }

  // ===========================================================================
  // Ingestion
  // ===========================================================================

  /**
   * Create, update or reopen the alert a delta belongs to.
   */
  async ingest(tx: GatewayTransaction, delta: AlertDelta, now: Date): Promise<IngestResult> {
    const dedupKey = alertDedupKey(delta);
    const at = now.toISOString();
    const decision: { action: IngestAction; wasCritical: boolean } = {
      action: "created",
      wasCritical: false,
    };

    const alert = await tx.upsertAlertByDedupKey(dedupKey, (latest, nextGeneration) => {
      if (latest && latest.status !== "resolved") {
        decision.action = "updated";
        decision.wasCritical = latest.severity === "critical";
        return this.refresh(latest, delta, at);
      }
      if (latest?.resolvedAt && elapsedMs(latest.resolvedAt, now) <= this.options.reopenCooldownMs) {
        decision.action = "reopened";
        return this.reopen(latest, delta, at);
      }
      return this.create(dedupKey, nextGeneration, delta, now);
    });

    const page =
      alert.severity === "critical" && isOpen(alert) && !decision.wasCritical;
    this.logger.debug(`${decision.action} alert ${alert.id} (${alert.severity}): ${alert.title}`);
    return { alert, action: decision.action, page };
  }

  private create(dedupKey: string, generation: number, delta: AlertDelta, now: Date): Alert {
    const at = now.toISOString();
    return this.route({
      id: alertId(dedupKey, generation),
      dedupKey,
      generation,
      title: delta.title,
      description: delta.description,
      severity: delta.severity,
      source: delta.source,
      status: "new",
      tags: uniqueSorted([...delta.tags, ...timeOfDayTags(now)]),
      assignedTo: null,
      condition: delta.condition ?? null,
      metadata: { ...delta.metadata },
      createdAt: at,
      updatedAt: at,
      resolvedAt: null,
      escalatedAt: null,
    });
  }

  private refresh(latest: Alert, delta: AlertDelta, at: string): Alert {
    return this.route({
      ...latest,
      description: delta.description,
      severity: maxSeverity(latest.severity, delta.severity),
      tags: uniqueSorted([...latest.tags, ...delta.tags]),
      condition: delta.condition ?? latest.condition,
      metadata: { ...latest.metadata, ...delta.metadata },
      updatedAt: at,
    });
  }

  private reopen(latest: Alert, delta: AlertDelta, at: string): Alert {
    return this.route({
      ...latest,
      description: delta.description,
      severity: delta.severity,
      status: "new",
      tags: uniqueSorted([...latest.tags, ...delta.tags, "reopened"]),
      condition: delta.condition ?? latest.condition,
      metadata: { ...latest.metadata, ...delta.metadata, reopenedAt: at },
      updatedAt: at,
      resolvedAt: null,
      escalatedAt: null,
    });
  }

  /**
   * Severity-based routing: critical alerts go to the on-call pool, the rest
   * wait for manual triage.
   */
  private route(alert: Alert): Alert {
    const metadata = { ...alert.metadata, maxResponseTime: RESPONSE_TIME[alert.severity] };
    if (alert.severity === "critical" && alert.assignedTo === null) {
      return { ...alert, metadata, assignedTo: this.options.onCallPool };
    }
    return { ...alert, metadata };
  }

  // ===========================================================================
  // Handler transitions
  // ===========================================================================

  /**
   * Apply a resolve or escalate produced by a handler. The alert may have
   * moved on since the handler's snapshot (an operator acknowledged or
   * suppressed it); such transitions are skipped and null is returned.
   */
  async applyTransition(
    tx: GatewayTransaction,
    transition: AlertTransition,
    now: Date,
  ): Promise<TransitionResult | null> {
    const alert = await tx.getAlert(transition.alertId);
    if (!alert) {
      this.logger.debug(`Skipping ${transition.action} of missing alert ${transition.alertId}`);
      return null;
    }
    const at = now.toISOString();

    if (transition.action === "resolve") {
      if (!canTransition(alert.status, "resolve")) {
        this.logger.debug(`Skipping resolve of ${alert.id} in state ${alert.status}`);
        return null;
      }
      const resolved: Alert = {
        ...alert,
        status: "resolved",
        resolvedAt: at,
        updatedAt: at,
        tags: uniqueSorted([...alert.tags, "auto_resolved"]),
        metadata: { ...alert.metadata, resolution: transition.reason },
      };
      await tx.putAlert(resolved);
      return { alert: resolved, page: false };
    }

    if (alert.status !== "new") {
      this.logger.debug(`Skipping escalation of ${alert.id} in state ${alert.status}`);
      return null;
    }
    const severity = maxSeverity(alert.severity, transition.severity);
    const extraTags =
      alert.severity === "critical" ? ["auto_escalated", "sla_breached"] : ["auto_escalated"];
    const escalated = this.route({
      ...alert,
      severity,
      tags: uniqueSorted([...alert.tags, ...extraTags]),
      metadata: { ...alert.metadata, escalation: transition.reason },
      escalatedAt: at,
      updatedAt: at,
    });
    await tx.putAlert(escalated);
    return {
      alert: escalated,
      page: escalated.severity === "critical" && alert.severity !== "critical",
    };
  }

  // ===========================================================================
  // Operator commands
  // ===========================================================================

  async transition(
    tx: GatewayTransaction,
    id: string,
    action: AlertAction,
    now: Date,
  ): Promise<Alert> {
    const alert = await tx.getAlert(id);
    if (!alert) {
      throw new NotFoundError("alert", id);
    }
    const status = nextAlertStatus(alert, action);
    const at = now.toISOString();
    const updated: Alert = {
      ...alert,
      status,
      updatedAt: at,
      resolvedAt: status === "resolved" ? at : alert.resolvedAt,
    };
    await tx.putAlert(updated);
    this.logger.info(`Alert ${id}: ${alert.status} -> ${status}`);
    return updated;
  }
}
