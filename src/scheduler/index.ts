export {
  JobRegistry,
  createDefaultRegistry,
  defineJob,
  standardJobs,
  type JobDefinition,
  type JobRegistryOptions,
  type JobSchedule,
} from "./job-registry.js";
export {
  Scheduler,
  type RunOutcome,
  type RunSummary,
  type SchedulerConfig,
  type SchedulerDeps,
} from "./scheduler.js";
export {
  TimeoutEnforcer,
  type TimeoutConfig,
  type TimeoutValidationResult,
} from "./timeout-enforcer.js";
export { WorkerPool } from "./worker-pool.js";
