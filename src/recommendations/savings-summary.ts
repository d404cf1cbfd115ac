import type { Confidence, CostRecommendation, Effort } from "../types.js";

export interface PriorityItem {
  recommendationId: string;
  resourceId: string;
  strategy: CostRecommendation["strategy"];
  savings: number;
  effort: Effort;
  /** Monthly savings per unit of effort */
  priorityScore: number;
}

export interface SavingsSummary {
  recommendationCount: number;
  totalMonthlySavings: number;
  totalAnnualSavings: number;
  /** Share of the covered monthly cost, in percent */
  savingsPercentage: number;
  savingsByConfidence: Record<Confidence, number>;
  /** Top five by priority score */
  priorities: PriorityItem[];
}

const EFFORT_WEIGHT: Record<Effort, number> = { low: 1, medium: 2, high: 3 };

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Business impact of the pending recommendations.
 */
export function summarizeSavings(recommendations: readonly CostRecommendation[]): SavingsSummary {
  const pending = recommendations.filter((r) => r.status === "pending");
  const totalCost = pending.reduce((sum, r) => sum + r.currentCost, 0);
  const totalSavings = pending.reduce((sum, r) => sum + r.potentialSavings, 0);

  const savingsByConfidence: Record<Confidence, number> = { low: 0, medium: 0, high: 0 };
  for (const r of pending) {
    savingsByConfidence[r.confidence] += r.potentialSavings;
  }

  const priorities = pending
    .map((r) => ({
      recommendationId: r.id,
      resourceId: r.resourceId,
      strategy: r.strategy,
      savings: r.potentialSavings,
      effort: r.effort,
      priorityScore: round2(r.potentialSavings / EFFORT_WEIGHT[r.effort]),
    }))
    .sort((a, b) => b.priorityScore - a.priorityScore || a.resourceId.localeCompare(b.resourceId))
    .slice(0, 5);

  return {
    recommendationCount: pending.length,
    totalMonthlySavings: round2(totalSavings),
    totalAnnualSavings: round2(totalSavings * 12),
    savingsPercentage: totalCost > 0 ? Math.round((totalSavings / totalCost) * 1000) / 10 : 0,
    savingsByConfidence: {
      low: round2(savingsByConfidence.low),
      medium: round2(savingsByConfidence.medium),
      high: round2(savingsByConfidence.high),
    },
    priorities,
  };
}
