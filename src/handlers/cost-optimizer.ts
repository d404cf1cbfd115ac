/**
 * cost_optimizer
 *
 * Records resource usage and, for every resource reported this run, picks
 * the savings strategy that saves most over its usage window:
 *
 * - rightsize: peak utilization below the target, savings scale with the
 *   headroom (`1 - peak / target`)
 * - reserved_capacity: steady, busy workloads
 * - spot_capacity: bursty, mostly idle workloads
 *
 * Savings below both an absolute and a relative floor are not worth an
 * operator's time and produce nothing. Pending recommendations nobody
 * refreshed within the staleness window expire.
 *
 * @module handlers/cost-optimizer
 */

import { elapsedMs } from "../clock.js";
import type { CostOptimizerConfig } from "../config/config.js";
import { clampSavings } from "../recommendations/recommendation-ledger.js";
import type {
  Confidence,
  CostRecommendation,
  Effort,
  RecommendationDelta,
  ResourceUsageSample,
  SavingsStrategy,
} from "../types.js";
import { emptyResult, type JobHandler } from "./types.js";

/** 24 hours x 30 days */
export const HOURS_PER_MONTH = 720;

export interface CostSnapshot {
  /** Usage reported this run */
  usage: ResourceUsageSample[];
  /** Stored usage preceding this run, per resource reported this run */
  history: Record<string, ResourceUsageSample[]>;
  pending: CostRecommendation[];
}

export interface UsageStats {
  sampleCount: number;
  peakUtilization: number;
  averageCpu: number;
  /** Coefficient of variation of CPU */
  cpuVariation: number;
}

interface Candidate {
  strategy: SavingsStrategy;
  fraction: number;
  recommendation: string;
}

const EFFORT_BY_RESOURCE_TYPE: Record<string, Effort> = {
  compute: "medium",
  database: "high",
  storage: "low",
  container: "low",
  serverless: "low",
};

export function effortFor(resourceType: string): Effort {
  return EFFORT_BY_RESOURCE_TYPE[resourceType.toLowerCase()] ?? "medium";
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function usageStats(window: readonly ResourceUsageSample[]): UsageStats {
  const cpu = window.map((s) => s.cpuPercent);
  const averageCpu = cpu.reduce((sum, v) => sum + v, 0) / Math.max(1, cpu.length);
  const variance = cpu.reduce((sum, v) => sum + (v - averageCpu) ** 2, 0) / Math.max(1, cpu.length);
  return {
    sampleCount: window.length,
    peakUtilization: Math.max(0, ...window.map((s) => Math.max(s.cpuPercent, s.memoryPercent))),
    averageCpu,
    cpuVariation: averageCpu > 0 ? Math.sqrt(variance) / averageCpu : 0,
  };
}

export function confidenceFor(sampleCount: number, config: CostOptimizerConfig): Confidence {
  if (sampleCount < config.mediumConfidenceSamples) return "low";
  if (sampleCount < config.highConfidenceSamples) return "medium";
  return "high";
}

function candidates(stats: UsageStats, config: CostOptimizerConfig): Candidate[] {
  const found: Candidate[] = [];
  const consistent = stats.cpuVariation < config.consistentUsageMaxCv;

  if (stats.peakUtilization < config.targetUtilization) {
    found.push({
      strategy: "rightsize",
      fraction: 1 - stats.peakUtilization / config.targetUtilization,
      recommendation:
        `Right-size to a smaller instance: peak utilization ${round2(stats.peakUtilization)}% ` +
        `against a ${config.targetUtilization}% target`,
    });
  }
  if (consistent && stats.averageCpu >= config.reservedMinCpu) {
    found.push({
      strategy: "reserved_capacity",
      fraction: config.reservedDiscount,
      recommendation: `Purchase reserved capacity for a steady workload (average CPU ${round2(stats.averageCpu)}%)`,
    });
  }
  if (!consistent && stats.averageCpu < config.spotMaxCpu) {
    found.push({
      strategy: "spot_capacity",
      fraction: config.spotDiscount,
      recommendation: `Move to spot capacity: variable, mostly idle workload (average CPU ${round2(stats.averageCpu)}%)`,
    });
  }
  return found;
}

/**
 * Best recommendation for one resource's usage window, or null when no
 * strategy clears the savings floors.
 */
export function recommendFor(
  window: readonly ResourceUsageSample[],
  config: CostOptimizerConfig,
): RecommendationDelta | null {
  const latest = window.at(-1);
  if (!latest) return null;

  const currentCost = round2(latest.costPerHour * HOURS_PER_MONTH);
  if (currentCost <= 0) return null;

  const stats = usageStats(window);
  let best: { candidate: Candidate; savings: number } | null = null;
  for (const candidate of candidates(stats, config)) {
    const savings = clampSavings(currentCost, round2(currentCost * candidate.fraction));
    if (!best || savings > best.savings) {
      best = { candidate, savings };
    }
  }
  if (!best) return null;

  const percent = (best.savings / currentCost) * 100;
  if (best.savings < config.minSavingsAbsolute || percent < config.minSavingsPercent) {
    return null;
  }

  return {
    resourceType: latest.resourceType,
    resourceId: latest.resourceId,
    strategy: best.candidate.strategy,
    recommendation: best.candidate.recommendation,
    currentCost,
    potentialSavings: best.savings,
    confidence: confidenceFor(stats.sampleCount, config),
    effort: effortFor(latest.resourceType),
    sampleCount: stats.sampleCount,
  };
}

function groupByResource(usage: readonly ResourceUsageSample[]): Map<string, ResourceUsageSample[]> {
  const groups = new Map<string, ResourceUsageSample[]>();
  for (const sample of usage) {
    const group = groups.get(sample.resourceId);
    if (group) {
      group.push(sample);
    } else {
      groups.set(sample.resourceId, [sample]);
    }
  }
  return groups;
}

export const costOptimizer: JobHandler<CostSnapshot, CostOptimizerConfig> = {
  name: "cost_optimizer",
  kind: "optimization",

  async collect(context, config) {
    const usage = await context.source.resourceUsage();
    const history: Record<string, ResourceUsageSample[]> = {};
    for (const [resourceId, fresh] of groupByResource(usage)) {
      const needed = Math.max(0, config.usageWindowSamples - fresh.length);
      history[resourceId] = await context.store.usageHistory(resourceId, needed);
    }
    const pending = await context.store.listRecommendations({ status: "pending" });
    return { usage, history, pending };
  },

  evaluate(snapshot, { now, config }) {
    const recommendations: RecommendationDelta[] = [];
    const groups = groupByResource(snapshot.usage);

    for (const resourceId of [...groups.keys()].sort()) {
      const window = [...(snapshot.history[resourceId] ?? []), ...(groups.get(resourceId) ?? [])].slice(
        -config.usageWindowSamples,
      );
      const delta = recommendFor(window, config);
      if (delta) recommendations.push(delta);
    }

    const refreshed = new Set(recommendations.map((r) => `${r.resourceId}|${r.strategy}`));
    const expirations = snapshot.pending
      .filter(
        (r) =>
          !refreshed.has(`${r.resourceId}|${r.strategy}`) &&
          elapsedMs(r.updatedAt, now) > config.recommendationStaleMs,
      )
      .map((r) => r.id);

    return emptyResult({ recommendations, expirations, usage: snapshot.usage });
  },
};
