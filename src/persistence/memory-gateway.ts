/**
 * In-memory Persistence Gateway
 *
 * Transactions run against a structured clone of the committed state and
 * swap it in on success. A promise chain serializes them, so there is a
 * single writer at a time: claim compare-and-set and alert upserts by dedup
 * key cannot interleave.
 *
 * @module persistence/memory-gateway
 */

import type {
  Alert,
  AlertFilter,
  CostRecommendation,
  InfrastructureMetricSample,
  Job,
  JobClaim,
  RecommendationFilter,
  ResourceUsageSample,
  SavingsStrategy,
} from "../types.js";
import {
  matchesAlertFilter,
  matchesRecommendationFilter,
  type AlertUpsert,
  type GatewayReader,
  type GatewayTransaction,
  type PersistenceGateway,
  type RetentionLimits,
} from "./gateway.js";

export interface GatewayState {
  version: 1;
  jobs: Job[];
  alerts: Alert[];
  recommendations: CostRecommendation[];
  samples: InfrastructureMetricSample[];
  usage: Record<string, ResourceUsageSample[]>;
}

export function emptyGatewayState(): GatewayState {
  return {
    version: 1,
    jobs: [],
    alerts: [],
    recommendations: [],
    samples: [],
    usage: {},
  };
}

export const DEFAULT_RETENTION: RetentionLimits = {
  maxSamples: 1000,
  maxUsageSamples: 500,
};

// =============================================================================
// State view (reads)
// =============================================================================

abstract class StateReader implements GatewayReader {
  protected abstract state(): GatewayState;

  async getJob(name: string): Promise<Job | null> {
    const job = this.state().jobs.find((j) => j.name === name);
    return job ? structuredClone(job) : null;
  }

  async listJobs(): Promise<Job[]> {
    return structuredClone(this.state().jobs);
  }

  async getAlert(id: string): Promise<Alert | null> {
    const alert = this.state().alerts.find((a) => a.id === id);
    return alert ? structuredClone(alert) : null;
  }

  async listAlerts(filter?: AlertFilter): Promise<Alert[]> {
    return structuredClone(this.state().alerts.filter((a) => matchesAlertFilter(a, filter)));
  }

  async findLatestAlertByDedupKey(dedupKey: string): Promise<Alert | null> {
    const latest = this.latestAlert(dedupKey);
    return latest ? structuredClone(latest) : null;
  }

  async getRecommendation(id: string): Promise<CostRecommendation | null> {
    const recommendation = this.state().recommendations.find((r) => r.id === id);
    return recommendation ? structuredClone(recommendation) : null;
  }

  async listRecommendations(filter?: RecommendationFilter): Promise<CostRecommendation[]> {
    return structuredClone(
      this.state().recommendations.filter((r) => matchesRecommendationFilter(r, filter)),
    );
  }

  async findPendingRecommendation(
    resourceId: string,
    strategy: SavingsStrategy,
  ): Promise<CostRecommendation | null> {
    const match = this.state().recommendations.find(
      (r) => r.resourceId === resourceId && r.strategy === strategy && r.status === "pending",
    );
    return match ? structuredClone(match) : null;
  }

  async recentSamples(limit: number): Promise<InfrastructureMetricSample[]> {
    return structuredClone(takeLast(this.state().samples, limit));
  }

  async usageResourceIds(): Promise<string[]> {
    return Object.keys(this.state().usage).sort();
  }

  async usageHistory(resourceId: string, limit: number): Promise<ResourceUsageSample[]> {
    return structuredClone(takeLast(this.state().usage[resourceId] ?? [], limit));
  }

  protected latestAlert(dedupKey: string): Alert | undefined {
    const alerts = this.state().alerts;
    for (let i = alerts.length - 1; i >= 0; i--) {
      if (alerts[i].dedupKey === dedupKey) return alerts[i];
    }
    return undefined;
  }
}

function takeLast<T>(items: readonly T[], limit: number): T[] {
  if (limit <= 0) return [];
  return items.slice(Math.max(0, items.length - limit));
}

// =============================================================================
// Transaction (writes against a draft)
// =============================================================================

class DraftTransaction extends StateReader implements GatewayTransaction {
  constructor(
    private readonly draft: GatewayState,
    private readonly retention: RetentionLimits,
  ) {
    super();
  }

  protected state(): GatewayState {
    return this.draft;
  }

  async putJob(job: Job): Promise<void> {
    const copy = structuredClone(job);
    const index = this.draft.jobs.findIndex((j) => j.name === job.name);
    if (index === -1) {
      this.draft.jobs.push(copy);
    } else {
      this.draft.jobs[index] = copy;
    }
  }

  async compareAndSetClaim(
    jobName: string,
    expectedToken: string | null,
    next: JobClaim | null,
  ): Promise<boolean> {
    const job = this.draft.jobs.find((j) => j.name === jobName);
    if (!job) return false;
    const currentToken = job.claim?.token ?? null;
    if (currentToken !== expectedToken) return false;
    job.claim = next ? { ...next } : null;
    return true;
  }

  async putAlert(alert: Alert): Promise<void> {
    const copy = structuredClone(alert);
    const index = this.draft.alerts.findIndex((a) => a.id === alert.id);
    if (index === -1) {
      this.draft.alerts.push(copy);
    } else {
      this.draft.alerts[index] = copy;
    }
  }

  async upsertAlertByDedupKey(dedupKey: string, upsert: AlertUpsert): Promise<Alert> {
    const latest = this.latestAlert(dedupKey) ?? null;
    const generations = this.draft.alerts.filter((a) => a.dedupKey === dedupKey).length;
    const next = upsert(latest ? structuredClone(latest) : null, generations);
    await this.putAlert({ ...next, dedupKey });
    return structuredClone({ ...next, dedupKey });
  }

  async putRecommendation(recommendation: CostRecommendation): Promise<void> {
    const copy = structuredClone(recommendation);
    const index = this.draft.recommendations.findIndex((r) => r.id === recommendation.id);
    if (index === -1) {
      this.draft.recommendations.push(copy);
    } else {
      this.draft.recommendations[index] = copy;
    }
  }

  async appendSample(sample: InfrastructureMetricSample): Promise<void> {
    this.draft.samples.push(structuredClone(sample));
    const overflow = this.draft.samples.length - this.retention.maxSamples;
    if (overflow > 0) {
      this.draft.samples.splice(0, overflow);
    }
  }

  async appendUsage(samples: readonly ResourceUsageSample[]): Promise<void> {
    for (const sample of samples) {
      const history = (this.draft.usage[sample.resourceId] ??= []);
      history.push(structuredClone(sample));
      const overflow = history.length - this.retention.maxUsageSamples;
      if (overflow > 0) {
        history.splice(0, overflow);
      }
    }
  }
}

// =============================================================================
// MemoryGateway
// =============================================================================

export class MemoryGateway extends StateReader implements PersistenceGateway {
  private committed: GatewayState;
  private queue: Promise<unknown> = Promise.resolve();
  protected readonly retention: RetentionLimits;

  constructor(initial?: GatewayState, retention?: Partial<RetentionLimits>) {
    super();
    this.committed = initial ?? emptyGatewayState();
    this.retention = { ...DEFAULT_RETENTION, ...retention };
  }

  protected state(): GatewayState {
    return this.committed;
  }

  transaction<T>(work: (tx: GatewayTransaction) => Promise<T>): Promise<T> {
    const run = this.queue.then(() =>
      this.exclusive(async () => {
        const draft = structuredClone(this.state());
        const result = await work(new DraftTransaction(draft, this.retention));
        this.commit(draft);
        return result;
      }),
    );
    // Keep the chain alive after a failed transaction
    this.queue = run.catch(() => undefined);
    return run;
  }

  /**
   * Hold whatever lock a transaction needs beyond this process.
   */
  protected exclusive<T>(work: () => Promise<T>): Promise<T> {
    return work();
  }

  /**
   * Swap in a committed draft. Subclasses persist it first.
   */
  protected commit(draft: GatewayState): void {
    this.committed = draft;
  }

  /** Committed state snapshot (copy) */
  snapshot(): GatewayState {
    return structuredClone(this.state());
  }
}
