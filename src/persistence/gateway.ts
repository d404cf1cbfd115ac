/**
 * Persistence Gateway
 *
 * Transactional record store for jobs, alerts, recommendations and the
 * append-only sample streams. The core only talks to these interfaces;
 * `MemoryGateway` and `JsonFileGateway` are the shipped implementations.
 *
 * @module persistence/gateway
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

export interface GatewayReader {
  getJob(name: string): Promise<Job | null>;
  listJobs(): Promise<Job[]>;

  getAlert(id: string): Promise<Alert | null>;
  /** Creation order */
  listAlerts(filter?: AlertFilter): Promise<Alert[]>;
  /** Most recent row for the key, whatever its status */
  findLatestAlertByDedupKey(dedupKey: string): Promise<Alert | null>;

  getRecommendation(id: string): Promise<CostRecommendation | null>;
  /** Creation order */
  listRecommendations(filter?: RecommendationFilter): Promise<CostRecommendation[]>;
  findPendingRecommendation(
    resourceId: string,
    strategy: SavingsStrategy,
  ): Promise<CostRecommendation | null>;

  /** Newest `limit` samples, oldest first */
  recentSamples(limit: number): Promise<InfrastructureMetricSample[]>;
  /** Sorted resource ids with usage history */
  usageResourceIds(): Promise<string[]>;
  /** Newest `limit` usage samples of a resource, oldest first */
  usageHistory(resourceId: string, limit: number): Promise<ResourceUsageSample[]>;
}

/**
 * Upsert decision callback: receives the latest row for the dedup key (or
 * null) and the generation a new row would take, returns the row to store.
 * Returning a row with the latest row's id replaces it; any other id inserts.
 */
export type AlertUpsert = (latest: Alert | null, nextGeneration: number) => Alert;

export interface GatewayTransaction extends GatewayReader {
  putJob(job: Job): Promise<void>;
  /**
   * Atomically replace a job's claim when the current claim token equals
   * `expectedToken` (null meaning unclaimed). Returns false otherwise.
   */
  compareAndSetClaim(
    jobName: string,
    expectedToken: string | null,
    next: JobClaim | null,
  ): Promise<boolean>;

  putAlert(alert: Alert): Promise<void>;
  upsertAlertByDedupKey(dedupKey: string, upsert: AlertUpsert): Promise<Alert>;

  putRecommendation(recommendation: CostRecommendation): Promise<void>;

  appendSample(sample: InfrastructureMetricSample): Promise<void>;
  appendUsage(samples: readonly ResourceUsageSample[]): Promise<void>;
}

export interface PersistenceGateway extends GatewayReader {
  /**
   * Run `work` against a transaction handle. Writes become visible only if
   * `work` resolves; a rejection discards all of them.
   */
  transaction<T>(work: (tx: GatewayTransaction) => Promise<T>): Promise<T>;
}

export interface RetentionLimits {
  maxSamples: number;
  maxUsageSamples: number;
}

// =============================================================================
// Filter helpers
// =============================================================================

function matchesOne<T>(value: T, expected: T | T[] | undefined): boolean {
  if (expected === undefined) return true;
  return Array.isArray(expected) ? expected.includes(value) : value === expected;
}

export function matchesAlertFilter(alert: Alert, filter: AlertFilter = {}): boolean {
  return (
    matchesOne(alert.status, filter.status) &&
    matchesOne(alert.severity, filter.severity) &&
    (filter.source === undefined || alert.source === filter.source) &&
    (filter.assignedTo === undefined || alert.assignedTo === filter.assignedTo)
  );
}

export function matchesRecommendationFilter(
  recommendation: CostRecommendation,
  filter: RecommendationFilter = {},
): boolean {
  return (
    matchesOne(recommendation.status, filter.status) &&
    (filter.resourceType === undefined || recommendation.resourceType === filter.resourceType) &&
    (filter.confidence === undefined || recommendation.confidence === filter.confidence)
  );
}
