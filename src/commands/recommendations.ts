import type { AutomationHub } from "../hub/automation-hub.js";
import type { RuntimeEnv } from "../runtime.js";
import {
  LEVELS,
  RECOMMENDATION_STATUSES,
  type CostRecommendation,
  type RecommendationFilter,
} from "../types.js";
import { parseChoices, printJson, rejectChoice, reportHubError, type OutputOpts } from "./shared.js";

function money(value: number): string {
  return `$${value.toFixed(2)}`;
}

export function formatRecommendationLine(rec: CostRecommendation): string {
  return (
    `${rec.id}  ${rec.status.padEnd(10)}${rec.resourceId} (${rec.strategy}) ` +
    `saves ${money(rec.potentialSavings)}/mo of ${money(rec.currentCost)}, ` +
    `${rec.confidence} confidence, ${rec.effort} effort`
  );
}

// ---------------------------------------------------------------------------
// List
// ---------------------------------------------------------------------------

export type RecommendationsListOpts = OutputOpts & {
  status?: string;
  resourceType?: string;
  confidence?: string;
};

export async function recommendationsListCommand(
  hub: AutomationHub,
  opts: RecommendationsListOpts,
  runtime: RuntimeEnv,
): Promise<void> {
  const status = parseChoices(opts.status, RECOMMENDATION_STATUSES);
  if (status.invalid !== undefined) {
    rejectChoice(runtime, "status", status.invalid, RECOMMENDATION_STATUSES);
    return;
  }
  const confidence = parseChoices(opts.confidence, LEVELS);
  if (confidence.invalid !== undefined) {
    rejectChoice(runtime, "confidence", confidence.invalid, LEVELS);
    return;
  }
  if (confidence.values && confidence.values.length > 1) {
    runtime.error("Only one confidence level can be given.");
    runtime.exit(1);
    return;
  }

  const filter: RecommendationFilter = {
    status: status.values,
    resourceType: opts.resourceType,
    confidence: confidence.values?.[0],
  };
  const recommendations = await hub.listRecommendations(filter);

  if (opts.json) {
    printJson(runtime, recommendations);
    return;
  }
  if (recommendations.length === 0) {
    runtime.log("No recommendations.");
    return;
  }
  for (const rec of recommendations) {
    runtime.log(formatRecommendationLine(rec));
  }
}

// ---------------------------------------------------------------------------
// Accept / dismiss
// ---------------------------------------------------------------------------

async function settle(
  hub: AutomationHub,
  action: "accept" | "dismiss",
  recommendationId: string,
  opts: OutputOpts,
  runtime: RuntimeEnv,
): Promise<void> {
  let rec: CostRecommendation;
  try {
    rec = action === "accept" ? await hub.accept(recommendationId) : await hub.dismiss(recommendationId);
  } catch (e) {
    reportHubError(e, runtime);
    return;
  }
  if (opts.json) {
    printJson(runtime, rec);
    return;
  }
  runtime.log(`Recommendation ${rec.id} ${rec.status}.`);
}

export async function recommendationsAcceptCommand(
  hub: AutomationHub,
  recommendationId: string,
  opts: OutputOpts,
  runtime: RuntimeEnv,
): Promise<void> {
  await settle(hub, "accept", recommendationId, opts, runtime);
}

export async function recommendationsDismissCommand(
  hub: AutomationHub,
  recommendationId: string,
  opts: OutputOpts,
  runtime: RuntimeEnv,
): Promise<void> {
  await settle(hub, "dismiss", recommendationId, opts, runtime);
}

// ---------------------------------------------------------------------------
// Savings
// ---------------------------------------------------------------------------

export async function recommendationsSavingsCommand(
  hub: AutomationHub,
  opts: OutputOpts,
  runtime: RuntimeEnv,
): Promise<void> {
  const summary = await hub.getSavingsSummary();
  if (opts.json) {
    printJson(runtime, summary);
    return;
  }
  runtime.log(
    `${summary.recommendationCount} pending: ${money(summary.totalMonthlySavings)}/mo, ` +
      `${money(summary.totalAnnualSavings)}/yr (${summary.savingsPercentage}% of current cost)`,
  );
  for (const item of summary.priorities) {
    runtime.log(`  ${item.resourceId} (${item.strategy}) ${money(item.savings)}/mo, score ${item.priorityScore}`);
  }
}
