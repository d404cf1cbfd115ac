/**
 * Ops Automation Hub - Core Types
 *
 * Data model shared by the scheduler, handlers, alert router and
 * persistence gateway.
 */

// =============================================================================
// Jobs
// =============================================================================

export const JOB_KINDS = ["monitoring", "optimization", "alerting"] as const;
export type JobKind = (typeof JOB_KINDS)[number];

export const JOB_STATUSES = ["active", "paused", "disabled"] as const;
export type JobStatus = (typeof JOB_STATUSES)[number];

export type RunOutcomeStatus = "success" | "failure";

/**
 * Claim held by an in-flight run. Acquired and released by compare-and-set.
 */
export interface JobClaim {
  token: string;
  /** ISO timestamp */
  claimedAt: string;
}

export interface JobError {
  name: string;
  message: string;
  /** ISO timestamp */
  at: string;
}

export interface JobMetadata {
  lastOutcome?: RunOutcomeStatus;
  lastError?: JobError;
  lastDurationMs?: number;
  consecutiveFailures: number;
  /** Opaque handler state carried between runs */
  state?: Record<string, unknown>;
}

export interface Job {
  name: string;
  kind: JobKind;
  intervalMs: number;
  status: JobStatus;
  /** ISO timestamp of the last completed run, null before the first run */
  lastRun: string | null;
  /** ISO timestamp of the next scheduled run */
  nextRun: string;
  runCount: number;
  successCount: number;
  failureCount: number;
  claim: JobClaim | null;
  metadata: JobMetadata;
}

// =============================================================================
// Alerts
// =============================================================================

export const SEVERITIES = ["info", "warning", "critical"] as const;
export type Severity = (typeof SEVERITIES)[number];

export const ALERT_STATUSES = ["new", "acknowledged", "resolved", "suppressed"] as const;
export type AlertStatus = (typeof ALERT_STATUSES)[number];

/**
 * Condition that raised an alert, re-evaluated by the alert processor.
 */
export type AlertCondition =
  | { type: "metric"; metric: InfrastructureMetric; threshold: number }
  | { type: "deployment"; namespace: string; name: string };

export interface Alert {
  id: string;
  dedupKey: string;
  /** Number of earlier rows with the same dedup key */
  generation: number;
  title: string;
  description: string;
  severity: Severity;
  source: string;
  status: AlertStatus;
  /** Sorted, unique */
  tags: string[];
  assignedTo: string | null;
  condition: AlertCondition | null;
  metadata: Record<string, unknown>;
  createdAt: string;
  updatedAt: string;
  resolvedAt: string | null;
  escalatedAt: string | null;
}

/**
 * An alert observation produced by a handler. The router turns it into a
 * new row or an update of the existing one.
 */
export interface AlertDelta {
  title: string;
  description: string;
  severity: Severity;
  source: string;
  tags: string[];
  condition?: AlertCondition;
  metadata?: Record<string, unknown>;
}

export type AlertTransition =
  | { alertId: string; action: "resolve"; reason: string }
  | { alertId: string; action: "escalate"; severity: Severity; reason: string };

export interface AlertFilter {
  status?: AlertStatus | AlertStatus[];
  severity?: Severity | Severity[];
  source?: string;
  assignedTo?: string;
}

// =============================================================================
// Cost recommendations
// =============================================================================

export const LEVELS = ["low", "medium", "high"] as const;
export type Confidence = (typeof LEVELS)[number];
export type Effort = (typeof LEVELS)[number];

export const RECOMMENDATION_STATUSES = ["pending", "accepted", "dismissed", "expired"] as const;
export type RecommendationStatus = (typeof RECOMMENDATION_STATUSES)[number];

export type SavingsStrategy = "rightsize" | "reserved_capacity" | "spot_capacity";

export interface CostRecommendation {
  id: string;
  resourceType: string;
  resourceId: string;
  strategy: SavingsStrategy;
  recommendation: string;
  /** Monthly cost */
  currentCost: number;
  /** Monthly savings, 0 <= potentialSavings <= currentCost */
  potentialSavings: number;
  confidence: Confidence;
  effort: Effort;
  status: RecommendationStatus;
  sampleCount: number;
  createdAt: string;
  updatedAt: string;
}

export type RecommendationDelta = Omit<
  CostRecommendation,
  "id" | "status" | "createdAt" | "updatedAt"
>;

export interface RecommendationFilter {
  status?: RecommendationStatus | RecommendationStatus[];
  resourceType?: string;
  confidence?: Confidence;
}

// =============================================================================
// Source records
// =============================================================================

export type InfrastructureMetric = "cpuPercent" | "memoryPercent" | "diskPercent";

export interface NetworkIo {
  bytesSent: number;
  bytesRecv: number;
  packetsSent: number;
  packetsRecv: number;
}

export interface InfrastructureMetricSample {
  readonly timestamp: string;
  readonly cpuPercent: number;
  readonly memoryPercent: number;
  readonly diskPercent: number;
  readonly networkIo: Readonly<NetworkIo>;
  readonly processCount: number;
  /** 1, 5 and 15 minute load averages */
  readonly loadAverage: readonly number[];
}

export interface DeploymentStatus {
  name: string;
  namespace: string;
  replicas: number;
  readyReplicas: number;
}

export interface ResourceUsageSample {
  readonly timestamp: string;
  readonly resourceId: string;
  readonly resourceType: string;
  readonly cpuPercent: number;
  readonly memoryPercent: number;
  readonly costPerHour: number;
}
