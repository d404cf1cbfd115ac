/**
 * Ops Automation Hub
 *
 * Single-process scheduler for recurring ops jobs: deployment and
 * infrastructure monitoring, cost recommendations and alert processing.
 */

export * from "./types.js";
export * from "./errors.js";
export { ManualClock, addMs, elapsedMs, systemClock, type Clock } from "./clock.js";
export { createLogger, resolveLogLevel, silentLogger, type LogLevel, type Logger } from "./logging.js";
export {
  DEFAULT_CONFIG,
  loadConfig,
  mergeConfig,
  parseConfig,
  validateConfig,
  type LoadConfigOptions,
  type OpsHubConfig,
} from "./config/config.js";
export * from "./alerts/index.js";
export * from "./handlers/index.js";
export * from "./recommendations/index.js";
export * from "./scheduler/index.js";
export * from "./sources/index.js";
export type {
  GatewayReader,
  GatewayTransaction,
  PersistenceGateway,
  RetentionLimits,
} from "./persistence/gateway.js";
export { MemoryGateway, emptyGatewayState, type GatewayState } from "./persistence/memory-gateway.js";
export { JsonFileGateway } from "./persistence/json-file-gateway.js";
export {
  formatHealthText,
  jobHealth,
  overallStatus,
  type HealthStatus,
  type HubHealthResponse,
  type JobHealth,
} from "./health/job-health.js";
export { AuditLogger, type AuditEntry, type VerificationResult } from "./security/audit-logger.js";
export {
  AutomationHub,
  createHub,
  type AlertSummary,
  type AuditQuery,
  type AutomationHubDeps,
  type CreateHubOptions,
} from "./hub/automation-hub.js";
