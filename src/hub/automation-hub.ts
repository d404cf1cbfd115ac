/**
 * Automation Hub
 *
 * Owns the scheduler and the command surface an API layer or the CLI calls:
 * force-runs, read-only projections, and the alert, recommendation and job
 * state transitions. Every command runs in one gateway transaction and is
 * appended to the audit log when one is configured.
 *
 * @module hub/automation-hub
 */

import { AlertRouter } from "../alerts/alert-router.js";
import type { AlertAction } from "../alerts/alert-state.js";
import { createNotificationSink, type NotificationSink } from "../alerts/notification-sink.js";
import { systemClock, type Clock } from "../clock.js";
import type { OpsHubConfig } from "../config/config.js";
import { InvalidTransitionError, NotFoundError, toError } from "../errors.js";
import {
  jobHealth,
  overallStatus,
  type HubHealthResponse,
  type JobHealth,
} from "../health/job-health.js";
import { createLogger, type Logger } from "../logging.js";
import type { PersistenceGateway } from "../persistence/gateway.js";
import { JsonFileGateway } from "../persistence/json-file-gateway.js";
import { MemoryGateway } from "../persistence/memory-gateway.js";
import {
  RecommendationLedger,
  type RecommendationAction,
} from "../recommendations/recommendation-ledger.js";
import { summarizeSavings, type SavingsSummary } from "../recommendations/savings-summary.js";
import { createDefaultRegistry, type JobRegistry } from "../scheduler/job-registry.js";
import { Scheduler, type RunOutcome } from "../scheduler/scheduler.js";
import { TimeoutEnforcer } from "../scheduler/timeout-enforcer.js";
import {
  AuditLogger,
  type AuditEntry,
  type VerificationResult,
} from "../security/audit-logger.js";
import { HostMetricSource } from "../sources/host-metric-source.js";
import type { MetricSource } from "../sources/metric-source.js";
import type {
  Alert,
  AlertFilter,
  AlertStatus,
  CostRecommendation,
  Job,
  RecommendationFilter,
  Severity,
} from "../types.js";

// =============================================================================
// Types
// =============================================================================

export interface AutomationHubDeps {
  config: OpsHubConfig;
  gateway: PersistenceGateway;
  registry: JobRegistry;
  scheduler: Scheduler;
  router: AlertRouter;
  ledger: RecommendationLedger;
  clock: Clock;
  audit?: AuditLogger | null;
  logger?: Logger;
}

export interface AlertSummary {
  open: number;
  openBySeverity: Record<Severity, number>;
  byStatus: Record<AlertStatus, number>;
  /** Alerts created in the 24 hours before now */
  last24h: number;
}

export type JobCommand = "pause" | "resume";

export interface AuditQuery {
  /** Most recent entries to return (default 100) */
  count?: number;
  action?: string;
}

const DAY_MS = 24 * 60 * 60 * 1000;

function countSeverities(alerts: readonly Alert[]): Record<Severity, number> {
  const counts: Record<Severity, number> = { info: 0, warning: 0, critical: 0 };
  for (const alert of alerts) {
    counts[alert.severity]++;
  }
  return counts;
}

function countStatuses(alerts: readonly Alert[]): Record<AlertStatus, number> {
  const counts: Record<AlertStatus, number> = { new: 0, acknowledged: 0, resolved: 0, suppressed: 0 };
  for (const alert of alerts) {
    counts[alert.status]++;
  }
  return counts;
}

// =============================================================================
// AutomationHub
// =============================================================================

export class AutomationHub {
  private readonly deps: AutomationHubDeps;
  private readonly logger: Logger;
  private startedAt: number | null = null;

  constructor(deps: AutomationHubDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? createLogger("hub");
  }

  get scheduler(): Scheduler {
    return this.deps.scheduler;
  }

  start(): void {
    if (this.deps.scheduler.isRunning()) return;
    this.startedAt = this.deps.clock.now().getTime();
    this.deps.scheduler.start();
  }

  async stop(graceMs?: number): Promise<void> {
    await this.deps.scheduler.stop(graceMs);
    this.startedAt = null;
  }

  // ===========================================================================
  // Jobs
  // ===========================================================================

  /**
   * Run a job now. Unlike the scheduled path, a held claim surfaces as
   * AlreadyRunningError.
   */
  async trigger(jobName: string): Promise<RunOutcome> {
    const outcome = await this.deps.scheduler.runJob(jobName);
    await this.audit("job.trigger", { job: jobName, status: outcome.status });
    return outcome;
  }

  async getJobStatus(jobName: string): Promise<Job> {
    const job = this.deps.registry.get(jobName) ? await this.deps.gateway.getJob(jobName) : null;
    if (!job) {
      throw new NotFoundError("job", jobName);
    }
    return job;
  }

  /** Registration order */
  async listJobs(): Promise<Job[]> {
    const jobs = await this.deps.gateway.listJobs();
    const byName = new Map(jobs.map((job) => [job.name, job]));
    return this.deps.registry
      .names()
      .map((name) => byName.get(name))
      .filter((job): job is Job => job !== undefined);
  }

  pause(jobName: string): Promise<Job> {
    return this.setJobStatus(jobName, "pause");
  }

  /** Back to active; the stored nextRun is kept */
  resume(jobName: string): Promise<Job> {
    return this.setJobStatus(jobName, "resume");
  }

  private async setJobStatus(jobName: string, command: JobCommand): Promise<Job> {
    if (!this.deps.registry.get(jobName)) {
      throw new NotFoundError("job", jobName);
    }
    const [from, to] = command === "pause" ? (["active", "paused"] as const) : (["paused", "active"] as const);

    const job = await this.deps.gateway.transaction(async (tx) => {
      const current = await tx.getJob(jobName);
      if (!current) {
        throw new NotFoundError("job", jobName);
      }
      if (current.status !== from) {
        throw new InvalidTransitionError("job", jobName, current.status, command);
      }
      const updated: Job = { ...current, status: to };
      await tx.putJob(updated);
      return updated;
    });

    this.logger.info(`Job ${jobName}: ${from} -> ${to}`);
    await this.audit(`job.${command}`, { job: jobName });
    return job;
  }

  // ===========================================================================
  // Alerts
  // ===========================================================================

  listAlerts(filter?: AlertFilter): Promise<Alert[]> {
    return this.deps.gateway.listAlerts(filter);
  }

  acknowledge(alertId: string): Promise<Alert> {
    return this.transitionAlert(alertId, "acknowledge");
  }

  resolve(alertId: string): Promise<Alert> {
    return this.transitionAlert(alertId, "resolve");
  }

  suppress(alertId: string): Promise<Alert> {
    return this.transitionAlert(alertId, "suppress");
  }

  private async transitionAlert(alertId: string, action: AlertAction): Promise<Alert> {
    const now = this.deps.clock.now();
    const alert = await this.deps.gateway.transaction((tx) =>
      this.deps.router.transition(tx, alertId, action, now),
    );
    await this.audit(`alert.${action}`, { alertId, status: alert.status });
    return alert;
  }

  async getAlertSummary(): Promise<AlertSummary> {
    const alerts = await this.deps.gateway.listAlerts();
    const open = alerts.filter((a) => a.status === "new" || a.status === "acknowledged");
    const since = this.deps.clock.now().getTime() - DAY_MS;
    return {
      open: open.length,
      openBySeverity: countSeverities(open),
      byStatus: countStatuses(alerts),
      last24h: alerts.filter((a) => Date.parse(a.createdAt) >= since).length,
    };
  }

  // ===========================================================================
  // Recommendations
  // ===========================================================================

  listRecommendations(filter?: RecommendationFilter): Promise<CostRecommendation[]> {
    return this.deps.gateway.listRecommendations(filter);
  }

  accept(recommendationId: string): Promise<CostRecommendation> {
    return this.transitionRecommendation(recommendationId, "accept");
  }

  dismiss(recommendationId: string): Promise<CostRecommendation> {
    return this.transitionRecommendation(recommendationId, "dismiss");
  }

  private async transitionRecommendation(
    recommendationId: string,
    action: Exclude<RecommendationAction, "expire">,
  ): Promise<CostRecommendation> {
    const now = this.deps.clock.now();
    const recommendation = await this.deps.gateway.transaction((tx) =>
      this.deps.ledger.transition(tx, recommendationId, action, now),
    );
    await this.audit(`recommendation.${action}`, {
      recommendationId,
      status: recommendation.status,
    });
    return recommendation;
  }

  async getSavingsSummary(): Promise<SavingsSummary> {
    return summarizeSavings(await this.deps.gateway.listRecommendations({ status: "pending" }));
  }

  // ===========================================================================
  // Health
  // ===========================================================================

  async getHealth(): Promise<HubHealthResponse> {
    const now = this.deps.clock.now();
    const jobs: JobHealth[] = (await this.listJobs()).map((job) =>
      jobHealth(job, this.deps.config.scheduler.degradedAfterFailures, now),
    );
    const open = await this.deps.gateway.listAlerts({ status: ["new", "acknowledged"] });

    return {
      status: overallStatus(jobs),
      scheduler: this.deps.scheduler.isRunning() ? "running" : "stopped",
      uptime: this.startedAt === null ? 0 : Math.floor((now.getTime() - this.startedAt) / 1000),
      jobs,
      alerts: {
        open: open.length,
        critical: open.filter((a) => a.severity === "critical").length,
      },
    };
  }

  // ===========================================================================
  // Audit
  // ===========================================================================

  /** Null when no audit log is configured */
  async verifyAuditLog(): Promise<VerificationResult | null> {
    return this.deps.audit ? this.deps.audit.verify() : null;
  }

  /** Null when no audit log is configured */
  async auditEntries(query: AuditQuery = {}): Promise<AuditEntry[] | null> {
    const { audit } = this.deps;
    if (!audit) return null;
    const count = query.count ?? 100;
    if (query.action === undefined) {
      return audit.getRecentEntries(count);
    }
    return (await audit.searchByAction(query.action)).slice(-count);
  }

  private async audit(action: string, details: Record<string, unknown>): Promise<void> {
    if (!this.deps.audit) return;
    try {
      await this.deps.audit.log(action, details, "user");
    } catch (e) {
      this.logger.error(`Audit log write failed for ${action}: ${toError(e).message}`);
    }
  }
}

// =============================================================================
// Factory
// =============================================================================

export interface CreateHubOptions {
  clock?: Clock;
  gateway?: PersistenceGateway;
  source?: MetricSource;
  sink?: NotificationSink;
  audit?: AuditLogger | null;
  /** Recommendation id generator */
  newId?: () => string;
  logger?: Logger;
}

/**
 * Wire a hub from configuration. Anything passed in `options` replaces the
 * component the configuration would build.
 */
export async function createHub(
  config: OpsHubConfig,
  options: CreateHubOptions = {},
): Promise<AutomationHub> {
  const clock = options.clock ?? systemClock;
  const retention = {
    maxSamples: config.storage.maxSamples,
    maxUsageSamples: config.storage.maxUsageSamples,
  };
  const gateway =
    options.gateway ??
    (config.storage.stateFile
      ? JsonFileGateway.open(config.storage.stateFile, retention)
      : new MemoryGateway(undefined, retention));
  const source =
    options.source ??
    new HostMetricSource({
      diskPath: config.sources.diskPath,
      deploymentsFile: config.sources.deploymentsFile,
      resourceUsageFile: config.sources.resourceUsageFile,
      clock,
      logger: options.logger,
    });
  const sink = options.sink ?? createNotificationSink(config.notifications, options.logger);
  const audit =
    options.audit === undefined
      ? config.auditLogPath
        ? new AuditLogger({ logPath: config.auditLogPath, clock, logger: options.logger })
        : null
      : options.audit;

  const timeoutEnforcer = new TimeoutEnforcer(undefined, options.logger);
  const registry = await createDefaultRegistry(config, {
    gateway,
    clock,
    timeoutEnforcer,
    shutdownGraceMs: config.scheduler.shutdownGraceMs,
    logger: options.logger,
  });
  const router = new AlertRouter({
    onCallPool: config.alerts.onCallPool,
    reopenCooldownMs: config.alerts.reopenCooldownMs,
    logger: options.logger,
  });
  const ledger = new RecommendationLedger(options.newId, options.logger);
  const scheduler = new Scheduler(
    { gateway, registry, source, router, ledger, sink, clock, timeoutEnforcer, logger: options.logger },
    config.scheduler,
  );

  return new AutomationHub({
    config,
    gateway,
    registry,
    scheduler,
    router,
    ledger,
    clock,
    audit,
    logger: options.logger,
  });
}
