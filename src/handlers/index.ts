export { alertProcessor, conditionHolds, slaAnchor, type AlertProcessorSnapshot } from "./alert-processor.js";
export {
  HOURS_PER_MONTH,
  confidenceFor,
  costOptimizer,
  effortFor,
  recommendFor,
  usageStats,
  type CostSnapshot,
  type UsageStats,
} from "./cost-optimizer.js";
export {
  deploymentKey,
  deploymentMonitor,
  readUnderReplicatedSince,
  type DeploymentSnapshot,
} from "./deployment-monitor.js";
export {
  METRIC_LABELS,
  classifyWindow,
  infrastructureMonitor,
  type InfrastructureSnapshot,
} from "./infrastructure-monitor.js";
export {
  emptyResult,
  type CollectContext,
  type EvaluateInput,
  type HandlerResult,
  type HandlerState,
  type JobHandler,
  type JobName,
} from "./types.js";
