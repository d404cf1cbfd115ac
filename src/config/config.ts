/**
 * Configuration loader
 *
 * Reads an optional YAML file, deep-merges it over the built-in defaults,
 * applies environment overrides and validates the result against a TypeBox
 * schema. The returned config is frozen: changing a job's thresholds means
 * building a new registry.
 *
 * Environment variables:
 * - OPS_HUB_CONFIG: path to the YAML file
 * - OPS_HUB_STATE_FILE: JSON state file (omit for in-memory state)
 * - OPS_HUB_POLL_INTERVAL_MS / OPS_HUB_MAX_CONCURRENT_JOBS
 * - OPS_HUB_AUDIT_LOG: JSONL audit log path
 * - OPS_HUB_NOTIFY_WEBHOOK_URL / OPS_HUB_NOTIFY_SLACK_URL
 * - OPS_HUB_NOTIFY_MIN_SEVERITY: info | warning | critical
 *
 * @module config/config
 */

import { existsSync, readFileSync } from "node:fs";
import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import * as yaml from "yaml";
import { ConfigError } from "../errors.js";

// =============================================================================
// Schema
// =============================================================================

const Nullable = <T extends TSchema>(schema: T) => Type.Union([schema, Type.Null()]);
const Positive = (description: string) => Type.Integer({ minimum: 1, description });
const Percent = (description: string) => Type.Number({ minimum: 0, maximum: 100, description });
const Fraction = (description: string) => Type.Number({ minimum: 0, maximum: 1, description });
const SeverityLiteral = Type.Union([
  Type.Literal("info"),
  Type.Literal("warning"),
  Type.Literal("critical"),
]);

const JobBase = {
  enabled: Type.Boolean(),
  intervalMs: Positive("Run cadence"),
  timeoutMs: Positive("Maximum handler duration"),
};

const MetricThresholds = Type.Object({
  cpuPercent: Percent("CPU threshold"),
  memoryPercent: Percent("Memory threshold"),
  diskPercent: Percent("Disk threshold"),
});

export const InfrastructureMonitorConfigSchema = Type.Object({
  ...JobBase,
  hysteresisSamples: Positive("Consecutive samples required before alerting"),
  warning: MetricThresholds,
  critical: MetricThresholds,
});

export const DeploymentMonitorConfigSchema = Type.Object({
  ...JobBase,
  gracePeriodMs: Type.Integer({ minimum: 0 }),
});

export const CostOptimizerConfigSchema = Type.Object({
  ...JobBase,
  usageWindowSamples: Positive("Usage samples evaluated per resource"),
  targetUtilization: Percent("Utilization a right-sized resource should run at"),
  consistentUsageMaxCv: Type.Number({ minimum: 0 }),
  reservedMinCpu: Percent("Average CPU above which reserved capacity pays off"),
  reservedDiscount: Fraction("Reserved capacity discount"),
  spotMaxCpu: Percent("Average CPU below which spot capacity is suggested"),
  spotDiscount: Fraction("Spot capacity discount"),
  minSavingsAbsolute: Type.Number({ minimum: 0 }),
  minSavingsPercent: Percent("Minimum savings relative to current cost"),
  mediumConfidenceSamples: Positive("Samples needed for medium confidence"),
  highConfidenceSamples: Positive("Samples needed for high confidence"),
  recommendationStaleMs: Positive("Pending recommendations expire after this"),
});

export const AlertProcessorConfigSchema = Type.Object({
  ...JobBase,
  stalenessMs: Type.Integer({ minimum: 0 }),
  slaMs: Type.Object({
    info: Positive("Unacknowledged info SLA"),
    warning: Positive("Unacknowledged warning SLA"),
    critical: Positive("Unacknowledged critical SLA"),
  }),
});

export const NotificationChannelSchema = Type.Object({
  type: Type.Union([
    Type.Literal("log"),
    Type.Literal("webhook"),
    Type.Literal("slack"),
    Type.Literal("email"),
  ]),
  url: Type.Optional(Type.String()),
  channel: Type.Optional(Type.String()),
  name: Type.Optional(Type.String()),
  /** SMTP relay of an email channel */
  host: Type.Optional(Type.String()),
  port: Type.Optional(Type.Integer({ minimum: 1, maximum: 65535 })),
  secure: Type.Optional(Type.Boolean()),
  from: Type.Optional(Type.String()),
  to: Type.Optional(Type.Array(Type.String(), { minItems: 1 })),
});

export const OpsHubConfigSchema = Type.Object({
  scheduler: Type.Object({
    pollIntervalMs: Positive("Polling interval"),
    maxConcurrentJobs: Positive("Worker pool size"),
    shutdownGraceMs: Type.Integer({ minimum: 0 }),
    degradedAfterFailures: Positive("Consecutive failures before a job reports degraded"),
  }),
  storage: Type.Object({
    stateFile: Nullable(Type.String({ minLength: 1 })),
    maxSamples: Positive("Retained infrastructure samples"),
    maxUsageSamples: Positive("Retained usage samples per resource"),
  }),
  sources: Type.Object({
    diskPath: Type.String({ minLength: 1 }),
    deploymentsFile: Nullable(Type.String({ minLength: 1 })),
    resourceUsageFile: Nullable(Type.String({ minLength: 1 })),
  }),
  alerts: Type.Object({
    onCallPool: Type.String({ minLength: 1 }),
    reopenCooldownMs: Type.Integer({ minimum: 0 }),
  }),
  notifications: Type.Object({
    enabled: Type.Boolean(),
    minSeverity: SeverityLiteral,
    channels: Type.Array(NotificationChannelSchema),
  }),
  auditLogPath: Nullable(Type.String({ minLength: 1 })),
  jobs: Type.Object({
    infrastructure_monitor: InfrastructureMonitorConfigSchema,
    deployment_monitor: DeploymentMonitorConfigSchema,
    cost_optimizer: CostOptimizerConfigSchema,
    alert_processor: AlertProcessorConfigSchema,
  }),
});

export type OpsHubConfig = Static<typeof OpsHubConfigSchema>;
export type InfrastructureMonitorConfig = Static<typeof InfrastructureMonitorConfigSchema>;
export type DeploymentMonitorConfig = Static<typeof DeploymentMonitorConfigSchema>;
export type CostOptimizerConfig = Static<typeof CostOptimizerConfigSchema>;
export type AlertProcessorConfig = Static<typeof AlertProcessorConfigSchema>;
export type NotificationChannelConfig = Static<typeof NotificationChannelSchema>;

// =============================================================================
// Defaults
// =============================================================================

const MINUTE = 60 * 1000;
const HOUR = 60 * MINUTE;

export const DEFAULT_CONFIG: OpsHubConfig = {
  scheduler: {
    pollIntervalMs: 1000,
    maxConcurrentJobs: 4,
    shutdownGraceMs: 10 * 1000,
    degradedAfterFailures: 3,
  },
  storage: {
    stateFile: null,
    maxSamples: 1000,
    maxUsageSamples: 500,
  },
  sources: {
    diskPath: "/",
    deploymentsFile: null,
    resourceUsageFile: null,
  },
  alerts: {
    onCallPool: "oncall",
    reopenCooldownMs: 30 * MINUTE,
  },
  notifications: {
    enabled: true,
    minSeverity: "warning",
    channels: [{ type: "log" }],
  },
  auditLogPath: null,
  jobs: {
    infrastructure_monitor: {
      enabled: true,
      intervalMs: 5 * MINUTE,
      timeoutMs: 30 * 1000,
      hysteresisSamples: 3,
      warning: { cpuPercent: 80, memoryPercent: 85, diskPercent: 90 },
      critical: { cpuPercent: 95, memoryPercent: 95, diskPercent: 95 },
    },
    deployment_monitor: {
      enabled: true,
      intervalMs: 5 * MINUTE,
      timeoutMs: 30 * 1000,
      gracePeriodMs: 5 * MINUTE,
    },
    cost_optimizer: {
      enabled: true,
      intervalMs: HOUR,
      timeoutMs: 2 * MINUTE,
      usageWindowSamples: 168,
      targetUtilization: 70,
      consistentUsageMaxCv: 0.25,
      reservedMinCpu: 70,
      reservedDiscount: 0.4,
      spotMaxCpu: 30,
      spotDiscount: 0.7,
      minSavingsAbsolute: 10,
      minSavingsPercent: 10,
      mediumConfidenceSamples: 24,
      highConfidenceSamples: 72,
      recommendationStaleMs: 7 * 24 * HOUR,
    },
    alert_processor: {
      enabled: true,
      intervalMs: MINUTE,
      timeoutMs: 30 * 1000,
      stalenessMs: 15 * MINUTE,
      slaMs: {
        info: 4 * HOUR,
        warning: HOUR,
        critical: 15 * MINUTE,
      },
    },
  },
};

// =============================================================================
// Loading
// =============================================================================

export interface LoadConfigOptions {
  /** YAML file; falls back to OPS_HUB_CONFIG, then to defaults only */
  path?: string;
  env?: NodeJS.ProcessEnv;
  /** Extra overrides applied after the file and environment */
  overrides?: unknown;
}

export function loadConfig(options: LoadConfigOptions = {}): OpsHubConfig {
  const env = options.env ?? process.env;
  const path = options.path ?? env.OPS_HUB_CONFIG;

  let merged: unknown = structuredClone(DEFAULT_CONFIG);
  if (path) {
    merged = mergeConfig(merged, readConfigFile(path));
  }
  merged = mergeConfig(merged, envOverrides(env));
  if (options.overrides !== undefined) {
    merged = mergeConfig(merged, options.overrides);
  }

  return deepFreeze(validateConfig(merged));
}

export function parseConfig(text: string, source = "<inline>"): unknown {
  try {
    const parsed: unknown = yaml.parse(text);
    return parsed ?? {};
  } catch (e) {
    throw new ConfigError(`Failed to parse ${source}`, [e instanceof Error ? e.message : String(e)]);
  }
}

export function validateConfig(value: unknown): OpsHubConfig {
  if (Value.Check(OpsHubConfigSchema, value)) {
    const cost = value.jobs.cost_optimizer;
    if (cost.mediumConfidenceSamples > cost.highConfidenceSamples) {
      throw new ConfigError("Invalid configuration", [
        "/jobs/cost_optimizer: mediumConfidenceSamples must not exceed highConfidenceSamples",
      ]);
    }
    return value;
  }

  const issues: string[] = [];
  for (const error of Value.Errors(OpsHubConfigSchema, value)) {
    issues.push(`${error.path || "/"}: ${error.message}`);
  }
  throw new ConfigError("Invalid configuration", issues);
}

function readConfigFile(path: string): unknown {
  if (!existsSync(path)) {
    throw new ConfigError(`Config file not found: ${path}`);
  }
  return parseConfig(readFileSync(path, "utf8"), path);
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const scheduler: Record<string, unknown> = {};
  const storage: Record<string, unknown> = {};
  const notifications: Record<string, unknown> = {};
  const overrides: Record<string, unknown> = {};

  if (env.OPS_HUB_POLL_INTERVAL_MS) {
    scheduler.pollIntervalMs = parseEnvInteger("OPS_HUB_POLL_INTERVAL_MS", env.OPS_HUB_POLL_INTERVAL_MS);
  }
  if (env.OPS_HUB_MAX_CONCURRENT_JOBS) {
    scheduler.maxConcurrentJobs = parseEnvInteger(
      "OPS_HUB_MAX_CONCURRENT_JOBS",
      env.OPS_HUB_MAX_CONCURRENT_JOBS,
    );
  }
  if (env.OPS_HUB_STATE_FILE) {
    storage.stateFile = env.OPS_HUB_STATE_FILE;
  }
  if (env.OPS_HUB_AUDIT_LOG) {
    overrides.auditLogPath = env.OPS_HUB_AUDIT_LOG;
  }
  if (env.OPS_HUB_NOTIFY_MIN_SEVERITY) {
    notifications.minSeverity = env.OPS_HUB_NOTIFY_MIN_SEVERITY;
  }

  const channels: NotificationChannelConfig[] = [];
  if (env.OPS_HUB_NOTIFY_WEBHOOK_URL) {
    channels.push({ type: "webhook", url: env.OPS_HUB_NOTIFY_WEBHOOK_URL });
  }
  if (env.OPS_HUB_NOTIFY_SLACK_URL) {
    channels.push({ type: "slack", url: env.OPS_HUB_NOTIFY_SLACK_URL });
  }
  if (channels.length > 0) {
    notifications.channels = [{ type: "log" }, ...channels];
  }

  if (Object.keys(scheduler).length > 0) overrides.scheduler = scheduler;
  if (Object.keys(storage).length > 0) overrides.storage = storage;
  if (Object.keys(notifications).length > 0) overrides.notifications = notifications;
  return overrides;
}

function parseEnvInteger(name: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigError(`Invalid ${name}="${raw}": expected an integer`);
  }
  return value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge where objects merge key by key and everything else (arrays
 * included) replaces.
 */
export function mergeConfig(base: unknown, override: unknown): unknown {
  if (!isPlainObject(base) || !isPlainObject(override)) {
    return override === undefined ? base : override;
  }
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    result[key] = mergeConfig(base[key], value);
  }
  return result;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
