/**
 * Scheduler - polling loop, claims and run bookkeeping
 *
 * One loop polls the registry for due jobs and dispatches them onto a
 * bounded worker pool. Each run:
 *
 * 1. claims its job row by compare-and-set (a held, unexpired claim means
 *    AlreadyRunningError)
 * 2. collects and evaluates under the job's timeout
 * 3. commits bookkeeping, handler state and every delta in one transaction
 * 4. pages for newly critical alerts after the commit
 *
 * Runs dispatched by one poll cycle collect and evaluate concurrently, but
 * commit in due order: each run's final transaction waits for the run
 * dispatched before it, so the committed sequence does not depend on
 * handler latency.
 *
 * A failing run is recorded on its own job row and never reaches other
 * jobs or the loop. Runs still in flight when `stop()` runs out of grace
 * are aborted: nothing they produced is committed and their claims are
 * released.
 *
 * @module scheduler/scheduler
 */

import { v4 as uuidv4 } from "uuid";
import type { AlertRouter } from "../alerts/alert-router.js";
import { pageAlert, type NotificationSink } from "../alerts/notification-sink.js";
import { addMs, elapsedMs, type Clock } from "../clock.js";
import { AlreadyRunningError, NotFoundError, toError } from "../errors.js";
import type { HandlerResult } from "../handlers/types.js";
import { createLogger, type Logger } from "../logging.js";
import type { GatewayTransaction, PersistenceGateway } from "../persistence/gateway.js";
import type { RecommendationLedger } from "../recommendations/recommendation-ledger.js";
import type { MetricSource } from "../sources/metric-source.js";
import type { Alert, Job, JobError, RunOutcomeStatus, Severity } from "../types.js";
import type { JobDefinition, JobRegistry } from "./job-registry.js";
import { TimeoutEnforcer } from "./timeout-enforcer.js";
import { WorkerPool } from "./worker-pool.js";

// =============================================================================
// Types
// =============================================================================

export interface SchedulerConfig {
  pollIntervalMs: number;
  maxConcurrentJobs: number;
  shutdownGraceMs: number;
  degradedAfterFailures: number;
}

export interface SchedulerDeps {
  gateway: PersistenceGateway;
  registry: JobRegistry;
  source: MetricSource;
  router: AlertRouter;
  ledger: RecommendationLedger;
  sink: NotificationSink;
  clock: Clock;
  timeoutEnforcer?: TimeoutEnforcer;
  logger?: Logger;
}

export interface RunSummary {
  alertsCreated: number;
  alertsUpdated: number;
  alertsReopened: number;
  transitionsApplied: number;
  recommendationsCreated: number;
  recommendationsRefreshed: number;
  recommendationsExpired: number;
  pages: number;
}

export interface RunOutcome {
  jobName: string;
  /** "aborted" runs changed nothing but their claim */
  status: RunOutcomeStatus | "aborted";
  dispatchedAt: string;
  durationMs: number;
  error?: JobError;
  summary: RunSummary;
}

const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = {
  pollIntervalMs: 1000,
  maxConcurrentJobs: 4,
  shutdownGraceMs: 10_000,
  degradedAfterFailures: 3,
};

function emptySummary(): RunSummary {
  return {
    alertsCreated: 0,
    alertsUpdated: 0,
    alertsReopened: 0,
    transitionsApplied: 0,
    recommendationsCreated: 0,
    recommendationsRefreshed: 0,
    recommendationsExpired: 0,
    pages: 0,
  };
}

/** The run's claim was taken over or released while it was running */
class ClaimLostError extends Error {
  constructor(readonly jobName: string) {
    super(`Claim on ${jobName} was lost`);
    this.name = "ClaimLostError";
  }
}

/** Abort reason for runs cut off by shutdown */
class ShutdownAbortError extends Error {
  constructor(readonly jobName: string) {
    super(`Run of ${jobName} aborted by shutdown`);
    this.name = "ShutdownAbortError";
  }
}

interface InFlightRun {
  token: string;
  controller: AbortController;
}

/** A run's place in its poll cycle's commit order */
interface CommitTurn {
  /** Settles once the previous run of the cycle has finished */
  previous: Promise<void>;
  release(): void;
}

type Evaluation = { ok: true; result: HandlerResult } | { ok: false; error: unknown };

// =============================================================================
// Scheduler
// =============================================================================

export class Scheduler {
  private readonly config: SchedulerConfig;
  private readonly deps: SchedulerDeps;
  private readonly pool: WorkerPool;
  private readonly timeouts: TimeoutEnforcer;
  private readonly logger: Logger;
  private readonly inFlightRuns = new Map<string, InFlightRun>();
  private readonly dispatched = new Set<Promise<unknown>>();
  /** Jobs dispatched by the loop and not yet finished, queued or running */
  private readonly scheduledJobs = new Set<string>();
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private stopping = false;

  constructor(deps: SchedulerDeps, config?: Partial<SchedulerConfig>) {
    this.deps = deps;
    this.config = { ...DEFAULT_SCHEDULER_CONFIG, ...config };
    this.pool = new WorkerPool(this.config.maxConcurrentJobs);
    this.timeouts = deps.timeoutEnforcer ?? new TimeoutEnforcer();
    this.logger = deps.logger ?? createLogger("scheduler");
  }

  // ===========================================================================
  // Loop
  // ===========================================================================

  start(): void {
    if (this.running) return;
    this.running = true;
    this.stopping = false;
    this.logger.info(
      `Started with ${this.deps.registry.names().length} jobs ` +
        `(poll ${this.config.pollIntervalMs}ms, ${this.config.maxConcurrentJobs} workers)`,
    );
    this.schedulePoll(0);
  }

  /**
   * Stop polling and wait up to `graceMs` for in-flight runs, then abort
   * the stragglers.
   */
  async stop(graceMs: number = this.config.shutdownGraceMs): Promise<void> {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.running = false;
    this.stopping = true;

    if (this.dispatched.size > 0) {
      const finished = await this.settleWithin(graceMs);
      if (!finished) {
        for (const [jobName, run] of this.inFlightRuns) {
          this.logger.warn(`Aborting ${jobName} after ${graceMs}ms shutdown grace`);
          run.controller.abort(new ShutdownAbortError(jobName));
        }
        await Promise.allSettled([...this.dispatched]);
      }
    }
    this.logger.info("Stopped");
  }

  isRunning(): boolean {
    return this.running;
  }

  /** Names of jobs with a run in progress */
  inFlight(): string[] {
    return [...this.inFlightRuns.keys()];
  }

  /**
   * One poll cycle: dispatch every due job and resolve with the outcomes of
   * the runs that claimed their job.
   */
  async tick(): Promise<RunOutcome[]> {
    const runs = await this.dispatchDue();
    const outcomes = await Promise.all(runs);
    return outcomes.filter((outcome): outcome is RunOutcome => outcome !== null);
  }

  private schedulePoll(delayMs: number = this.config.pollIntervalMs): void {
    if (!this.running) return;
    this.timer = setTimeout(() => {
      this.poll().catch((e: unknown) => {
        this.logger.error(`Poll cycle failed: ${toError(e).message}`);
      });
    }, delayMs);
  }

  private async poll(): Promise<void> {
    try {
      await this.dispatchDue();
    } finally {
      this.schedulePoll();
    }
  }

  private async dispatchDue(): Promise<Array<Promise<RunOutcome | null>>> {
    const now = this.deps.clock.now();
    const due = await this.deps.registry.listDue(now);
    const runs: Array<Promise<RunOutcome | null>> = [];
    let previous: Promise<void> = Promise.resolve();

    for (const job of due) {
      if (this.scheduledJobs.has(job.name) || this.inFlightRuns.has(job.name)) continue;
      this.scheduledJobs.add(job.name);
      let release: () => void = () => undefined;
      const finished = new Promise<void>((resolve) => {
        release = resolve;
      });
      const turn: CommitTurn = { previous, release };
      previous = finished;
      const run = this.pool.run(() => this.runScheduled(job.name, now, turn));
      this.track(run);
      runs.push(run);
    }
    return runs;
  }

  private async runScheduled(
    jobName: string,
    dispatchedAt: Date,
    turn: CommitTurn,
  ): Promise<RunOutcome | null> {
    try {
      if (this.stopping) return null;
      return await this.execute(jobName, dispatchedAt, turn);
    } catch (e) {
      if (e instanceof AlreadyRunningError) {
        this.logger.debug(`${jobName} skipped: already running`);
      } else {
        this.logger.error(`${jobName} could not be dispatched: ${toError(e).message}`);
      }
      return null;
    } finally {
      this.scheduledJobs.delete(jobName);
      turn.release();
    }
  }

  private track(run: Promise<unknown>): void {
    this.dispatched.add(run);
    const settle = () => {
      this.dispatched.delete(run);
    };
    void run.then(settle, settle);
  }

  private async settleWithin(graceMs: number): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), graceMs);
    });
    const settled = Promise.allSettled([...this.dispatched]).then(() => true);
    try {
      return await Promise.race([settled, expired]);
    } finally {
      clearTimeout(timer);
    }
  }

  // ===========================================================================
  // Runs
  // ===========================================================================

  /**
   * Run a job now, outside its schedule. Surfaces NotFoundError and
   * AlreadyRunningError.
   */
  async runJob(jobName: string, now: Date = this.deps.clock.now()): Promise<RunOutcome> {
    if (!this.deps.registry.get(jobName)) {
      throw new NotFoundError("job", jobName);
    }
    const run = this.pool.run(() => this.execute(jobName, now));
    this.track(run);
    return run;
  }

  private async execute(
    jobName: string,
    dispatchedAt: Date,
    turn?: CommitTurn,
  ): Promise<RunOutcome> {
    const definition = this.deps.registry.get(jobName);
    if (!definition) {
      throw new NotFoundError("job", jobName);
    }

    const token = uuidv4();
    const job = await this.claim(definition, token, dispatchedAt);
    const controller = new AbortController();
    this.inFlightRuns.set(jobName, { token, controller });
    const startedAt = Date.now();

    try {
      const evaluation: Evaluation = await this.timeouts
        .enforce(
          jobName,
          definition.timeoutMs,
          (signal) =>
            definition.execute(
              { now: dispatchedAt, source: this.deps.source, store: this.deps.gateway, signal },
              job.metadata.state,
            ),
          controller.signal,
        )
        .then(
          (result): Evaluation => ({ ok: true, result }),
          (error: unknown): Evaluation => ({ ok: false, error }),
        );

      await turn?.previous;

      if (!evaluation.ok) {
        return await this.finishFailed(
          definition,
          token,
          dispatchedAt,
          startedAt,
          evaluation.error,
          controller,
        );
      }

      if (controller.signal.aborted) {
        return await this.finishAborted(jobName, token, dispatchedAt, startedAt);
      }

      try {
        return await this.commit(definition, token, dispatchedAt, startedAt, evaluation.result);
      } catch (e) {
        return await this.finishFailed(definition, token, dispatchedAt, startedAt, e, controller);
      }
    } finally {
      this.inFlightRuns.delete(jobName);
    }
  }

  private async claim(definition: JobDefinition, token: string, now: Date): Promise<Job> {
    const leaseMs = definition.timeoutMs + this.config.shutdownGraceMs;
    return this.deps.gateway.transaction(async (tx) => {
      const job = await tx.getJob(definition.name);
      if (!job) {
        throw new NotFoundError("job", definition.name);
      }
      if (job.claim && elapsedMs(job.claim.claimedAt, now) <= leaseMs) {
        throw new AlreadyRunningError(definition.name);
      }
      if (job.claim) {
        this.logger.warn(`Taking over expired claim on ${definition.name}`);
      }
      const claimed = await tx.compareAndSetClaim(definition.name, job.claim?.token ?? null, {
        token,
        claimedAt: now.toISOString(),
      });
      if (!claimed) {
        throw new AlreadyRunningError(definition.name);
      }
      return job;
    });
  }

  /**
   * Current row of a job whose claim this run still holds.
   */
  private async ownedJob(tx: GatewayTransaction, jobName: string, token: string): Promise<Job> {
    const job = await tx.getJob(jobName);
    if (!job || job.claim?.token !== token) {
      throw new ClaimLostError(jobName);
    }
    return job;
  }

  private async commit(
    definition: JobDefinition,
    token: string,
    dispatchedAt: Date,
    startedAt: number,
    result: HandlerResult,
  ): Promise<RunOutcome> {
    const { router, ledger } = this.deps;
    const summary = emptySummary();
    const pages: Alert[] = [];
    const durationMs = Date.now() - startedAt;

    await this.deps.gateway.transaction(async (tx) => {
      const job = await this.ownedJob(tx, definition.name, token);

      for (const sample of result.samples) {
        await tx.appendSample(sample);
      }
      if (result.usage.length > 0) {
        await tx.appendUsage(result.usage);
      }

      for (const delta of result.alerts) {
        const ingested = await router.ingest(tx, delta, dispatchedAt);
        if (ingested.action === "created") summary.alertsCreated++;
        else if (ingested.action === "updated") summary.alertsUpdated++;
        else summary.alertsReopened++;
        if (ingested.page) pages.push(ingested.alert);
      }

      for (const transition of result.transitions) {
        const applied = await router.applyTransition(tx, transition, dispatchedAt);
        if (!applied) continue;
        summary.transitionsApplied++;
        if (applied.page) pages.push(applied.alert);
      }

      for (const delta of result.recommendations) {
        const applied = await ledger.apply(tx, delta, dispatchedAt);
        if (applied.action === "created") summary.recommendationsCreated++;
        else summary.recommendationsRefreshed++;
      }
      for (const id of result.expirations) {
        if (await ledger.expire(tx, id, dispatchedAt)) summary.recommendationsExpired++;
      }

      await tx.putJob({
        ...job,
        runCount: job.runCount + 1,
        successCount: job.successCount + 1,
        lastRun: dispatchedAt.toISOString(),
        nextRun: addMs(dispatchedAt.toISOString(), definition.intervalMs),
        claim: null,
        metadata: {
          ...job.metadata,
          lastOutcome: "success",
          lastDurationMs: durationMs,
          consecutiveFailures: 0,
          state: result.state,
        },
      });
    });

    summary.pages = pages.length;
    await this.page(pages);
    this.logger.info(`${definition.name} completed in ${durationMs}ms`);
    return {
      jobName: definition.name,
      status: "success",
      dispatchedAt: dispatchedAt.toISOString(),
      durationMs,
      summary,
    };
  }

  private async finishFailed(
    definition: JobDefinition,
    token: string,
    dispatchedAt: Date,
    startedAt: number,
    cause: unknown,
    controller: AbortController,
  ): Promise<RunOutcome> {
    if (controller.signal.aborted && controller.signal.reason instanceof ShutdownAbortError) {
      return this.finishAborted(definition.name, token, dispatchedAt, startedAt);
    }
    if (cause instanceof ClaimLostError) {
      this.logger.warn(`${definition.name}: ${cause.message}, discarding its results`);
      return this.abortedOutcome(definition.name, dispatchedAt, startedAt);
    }

    const error = toError(cause);
    const jobError: JobError = {
      name: error.name,
      message: error.message,
      at: this.deps.clock.now().toISOString(),
    };
    const durationMs = Date.now() - startedAt;

    let consecutiveFailures = 0;
    try {
      await this.deps.gateway.transaction(async (tx) => {
        const job = await this.ownedJob(tx, definition.name, token);
        consecutiveFailures = job.metadata.consecutiveFailures + 1;
        await tx.putJob({
          ...job,
          runCount: job.runCount + 1,
          failureCount: job.failureCount + 1,
          lastRun: dispatchedAt.toISOString(),
          nextRun: addMs(dispatchedAt.toISOString(), definition.intervalMs),
          claim: null,
          metadata: {
            ...job.metadata,
            lastOutcome: "failure",
            lastError: jobError,
            lastDurationMs: durationMs,
            consecutiveFailures,
          },
        });
      });
    } catch (e) {
      if (e instanceof ClaimLostError) {
        this.logger.warn(`${definition.name}: ${e.message}, failure not recorded`);
        return this.abortedOutcome(definition.name, dispatchedAt, startedAt, jobError);
      }
      throw e;
    }

    this.logger.warn(
      `${definition.name} failed (${consecutiveFailures} in a row): ${jobError.name}: ${jobError.message}`,
    );
    if (consecutiveFailures === this.config.degradedAfterFailures) {
      await this.notify("warning", `Job ${definition.name} is degraded`, {
        job: definition.name,
        consecutiveFailures,
        lastError: jobError.message,
      });
    }

    return {
      jobName: definition.name,
      status: "failure",
      dispatchedAt: dispatchedAt.toISOString(),
      durationMs,
      error: jobError,
      summary: emptySummary(),
    };
  }

  private async finishAborted(
    jobName: string,
    token: string,
    dispatchedAt: Date,
    startedAt: number,
  ): Promise<RunOutcome> {
    const released = await this.deps.gateway.transaction((tx) =>
      tx.compareAndSetClaim(jobName, token, null),
    );
    this.logger.warn(`${jobName} aborted${released ? ", claim released" : ""}`);
    return this.abortedOutcome(jobName, dispatchedAt, startedAt);
  }

  private abortedOutcome(
    jobName: string,
    dispatchedAt: Date,
    startedAt: number,
    error?: JobError,
  ): RunOutcome {
    return {
      jobName,
      status: "aborted",
      dispatchedAt: dispatchedAt.toISOString(),
      durationMs: Date.now() - startedAt,
      error,
      summary: emptySummary(),
    };
  }

  // ===========================================================================
  // Notifications
  // ===========================================================================

  private async page(alerts: readonly Alert[]): Promise<void> {
    for (const alert of alerts) {
      try {
        await pageAlert(this.deps.sink, alert);
      } catch (e) {
        this.logger.error(`Paging for alert ${alert.id} failed: ${toError(e).message}`);
      }
    }
  }

  private async notify(
    severity: Severity,
    message: string,
    context: Record<string, unknown>,
  ): Promise<void> {
    try {
      await this.deps.sink.notify(severity, message, context);
    } catch (e) {
      this.logger.error(`Notification failed: ${toError(e).message}`);
    }
  }
}
