/**
 * Metric/Event Source
 *
 * Supplies infrastructure samples, deployment status and resource usage on
 * demand. Implementations wrap their failures in `SourceUnavailableError`.
 *
 * @module sources/metric-source
 */

import type {
  DeploymentStatus,
  InfrastructureMetricSample,
  ResourceUsageSample,
} from "../types.js";

export interface MetricSource {
  sample(): Promise<InfrastructureMetricSample>;
  deployments(): Promise<DeploymentStatus[]>;
  resourceUsage(): Promise<ResourceUsageSample[]>;
}

export type MetricSourceOperation = keyof MetricSource;
