/**
 * Job Registry
 *
 * Static table of job definitions. Each definition captures its typed
 * configuration at registration; a changed threshold means a new registry.
 * Schedule and counters live in the job rows of the Persistence Gateway,
 * so a restart against a persisted store picks up where it left off.
 *
 * @module scheduler/job-registry
 */

import { addMs, elapsedMs, type Clock } from "../clock.js";
import type { OpsHubConfig } from "../config/config.js";
import { ConfigError, DuplicateJobError } from "../errors.js";
import { alertProcessor } from "../handlers/alert-processor.js";
import { costOptimizer } from "../handlers/cost-optimizer.js";
import { deploymentMonitor } from "../handlers/deployment-monitor.js";
import { infrastructureMonitor } from "../handlers/infrastructure-monitor.js";
import type { CollectContext, HandlerResult, HandlerState, JobHandler } from "../handlers/types.js";
import { createLogger, type Logger } from "../logging.js";
import type { PersistenceGateway } from "../persistence/gateway.js";
import type { Job, JobKind } from "../types.js";
import { TimeoutEnforcer } from "./timeout-enforcer.js";

export interface JobSchedule {
  enabled: boolean;
  intervalMs: number;
  timeoutMs: number;
}

export interface JobDefinition {
  readonly name: string;
  readonly kind: JobKind;
  readonly enabled: boolean;
  readonly intervalMs: number;
  readonly timeoutMs: number;
  /** Delay before the first run of a newly created job row */
  readonly initialDelayMs: number;
  /** Collect, then evaluate */
  execute(context: CollectContext, state: HandlerState | undefined): Promise<HandlerResult>;
}

/**
 * Bind a handler to its configuration.
 */
export function defineJob<TSnapshot, TConfig extends JobSchedule>(
  handler: JobHandler<TSnapshot, TConfig>,
  config: TConfig,
  options: { initialDelayMs?: number } = {},
): JobDefinition {
  Object.freeze(config);
  return {
    name: handler.name,
    kind: handler.kind,
    enabled: config.enabled,
    intervalMs: config.intervalMs,
    timeoutMs: config.timeoutMs,
    initialDelayMs: options.initialDelayMs ?? 0,
    async execute(context, state) {
      const snapshot = await handler.collect(context, config);
      return handler.evaluate(snapshot, { now: context.now, state, config });
    },
  };
}

export interface JobRegistryOptions {
  gateway: PersistenceGateway;
  clock: Clock;
  timeoutEnforcer?: TimeoutEnforcer;
  /** Added to a job's timeout to give the lease of a run's claim */
  shutdownGraceMs?: number;
  logger?: Logger;
}

const DEFAULT_SHUTDOWN_GRACE_MS = 10_000;

export class JobRegistry {
  private readonly definitions = new Map<string, JobDefinition>();
  private readonly gateway: PersistenceGateway;
  private readonly clock: Clock;
  private readonly timeouts: TimeoutEnforcer;
  private readonly shutdownGraceMs: number;
  private readonly logger: Logger;

  constructor(options: JobRegistryOptions) {
    this.gateway = options.gateway;
    this.clock = options.clock;
    this.timeouts = options.timeoutEnforcer ?? new TimeoutEnforcer();
    this.shutdownGraceMs = options.shutdownGraceMs ?? DEFAULT_SHUTDOWN_GRACE_MS;
    this.logger = options.logger ?? createLogger("registry");
  }

  /**
   * Register a job and create its row if the store has none. An existing
   * row keeps its counters and schedule. A claim on it older than the lease
   * was left by a dead process and is dropped; a live one is kept, since
   * another process sharing the store may be running the job.
   */
  async register(definition: JobDefinition): Promise<Job> {
    if (this.definitions.has(definition.name)) {
      throw new DuplicateJobError(definition.name);
    }

    const validation = this.timeouts.validateTimeout(
      definition.name,
      definition.timeoutMs,
      definition.intervalMs,
    );
    if (validation.blocked) {
      throw new ConfigError("Invalid job timeout", [validation.blockReason ?? definition.name]);
    }
    const now = this.clock.now();
    const job = await this.gateway.transaction(async (tx) => {
      const existing = await tx.getJob(definition.name);
      if (existing) {
        const leaseMs = validation.adjustedMs + this.shutdownGraceMs;
        const expired =
          existing.claim !== null && elapsedMs(existing.claim.claimedAt, now) > leaseMs;
        if (expired) {
          this.logger.warn(`Dropping expired claim on ${definition.name}`);
        }
        const row: Job = {
          ...existing,
          kind: definition.kind,
          intervalMs: definition.intervalMs,
          status: resolveStatus(existing.status, definition.enabled),
          claim: expired ? null : existing.claim,
        };
        await tx.putJob(row);
        return row;
      }

      const row: Job = {
        name: definition.name,
        kind: definition.kind,
        intervalMs: definition.intervalMs,
        status: definition.enabled ? "active" : "disabled",
        lastRun: null,
        nextRun: addMs(now.toISOString(), definition.initialDelayMs),
        runCount: 0,
        successCount: 0,
        failureCount: 0,
        claim: null,
        metadata: { consecutiveFailures: 0 },
      };
      await tx.putJob(row);
      return row;
    });
    this.definitions.set(definition.name, { ...definition, timeoutMs: validation.adjustedMs });

    this.logger.info(
      `Registered job: ${job.name} (${job.kind}, every ${job.intervalMs}ms, ${job.status})`,
    );
    return job;
  }

  get(name: string): JobDefinition | undefined {
    return this.definitions.get(name);
  }

  /** Registration order */
  names(): string[] {
    return [...this.definitions.keys()];
  }

  /**
   * Active jobs due at `now`, by ascending nextRun, ties in registration
   * order.
   */
  async listDue(now: Date): Promise<Job[]> {
    const order = this.names();
    const jobs = await this.gateway.listJobs();
    return jobs
      .filter(
        (job) =>
          this.definitions.has(job.name) &&
          job.status === "active" &&
          Date.parse(job.nextRun) <= now.getTime(),
      )
      .sort(
        (a, b) =>
          Date.parse(a.nextRun) - Date.parse(b.nextRun) ||
          order.indexOf(a.name) - order.indexOf(b.name),
      );
  }
}

function resolveStatus(current: Job["status"], enabled: boolean): Job["status"] {
  if (!enabled) return "disabled";
  return current === "disabled" ? "active" : current;
}

/**
 * The four standard jobs, configured from `config.jobs`.
 */
export function standardJobs(config: OpsHubConfig): JobDefinition[] {
  return [
    defineJob(deploymentMonitor, config.jobs.deployment_monitor),
    defineJob(infrastructureMonitor, config.jobs.infrastructure_monitor),
    defineJob(costOptimizer, config.jobs.cost_optimizer),
    defineJob(alertProcessor, config.jobs.alert_processor),
  ];
}

export async function createDefaultRegistry(
  config: OpsHubConfig,
  options: JobRegistryOptions,
): Promise<JobRegistry> {
  const registry = new JobRegistry(options);
  for (const definition of standardJobs(config)) {
    await registry.register(definition);
  }
  return registry;
}
