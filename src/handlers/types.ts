/**
 * Job handler contract
 *
 * A handler is split in two: `collect` does the I/O (source reads, gateway
 * reads) and `evaluate` is a pure function of the collected snapshot, the
 * clock and the state carried over from the previous run. Everything a run
 * changes is described by the returned `HandlerResult` and committed by the
 * scheduler in one transaction.
 *
 * @module handlers/types
 */

import type { GatewayReader } from "../persistence/gateway.js";
import type { MetricSource } from "../sources/metric-source.js";
import type {
  AlertDelta,
  AlertTransition,
  InfrastructureMetricSample,
  JobKind,
  RecommendationDelta,
  ResourceUsageSample,
} from "../types.js";

export type JobName =
  | "infrastructure_monitor"
  | "deployment_monitor"
  | "cost_optimizer"
  | "alert_processor";

export type HandlerState = Record<string, unknown>;

export interface CollectContext {
  now: Date;
  source: MetricSource;
  store: GatewayReader;
  /** Aborted on timeout or forced shutdown */
  signal: AbortSignal;
}

export interface EvaluateInput<TConfig> {
  now: Date;
  /** State returned by the previous successful run */
  state: HandlerState | undefined;
  config: TConfig;
}

export interface HandlerResult {
  alerts: AlertDelta[];
  transitions: AlertTransition[];
  recommendations: RecommendationDelta[];
  /** Ids of pending recommendations to expire */
  expirations: string[];
  samples: InfrastructureMetricSample[];
  usage: ResourceUsageSample[];
  /** Replaces the stored handler state; undefined keeps none */
  state: HandlerState | undefined;
}

export interface JobHandler<TSnapshot, TConfig> {
  readonly name: JobName;
  readonly kind: JobKind;
  collect(context: CollectContext, config: TConfig): Promise<TSnapshot>;
  evaluate(snapshot: TSnapshot, input: EvaluateInput<TConfig>): HandlerResult;
}

export function emptyResult(overrides: Partial<HandlerResult> = {}): HandlerResult {
  return {
    alerts: [],
    transitions: [],
    recommendations: [],
    expirations: [],
    samples: [],
    usage: [],
    state: undefined,
    ...overrides,
  };
}
