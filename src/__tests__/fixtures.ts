import { vi, type Mock } from "vitest";
import { NullNotificationSink } from "../alerts/notification-sink.js";
import { ManualClock } from "../clock.js";
import { loadConfig, type OpsHubConfig } from "../config/config.js";
import { createHub, type AutomationHub } from "../hub/automation-hub.js";
import { silentLogger } from "../logging.js";
import { MemoryGateway } from "../persistence/memory-gateway.js";
import type { RuntimeEnv } from "../runtime.js";
import type { AuditLogger } from "../security/audit-logger.js";
import { StaticMetricSource } from "../sources/static-metric-source.js";
import type { Alert, CostRecommendation, InfrastructureMetricSample, Job } from "../types.js";

export const T0 = "2026-03-02T10:00:00.000Z";

/** Defaults plus `overrides`, with no environment or file */
export function testConfig(overrides: unknown = {}): OpsHubConfig {
  return loadConfig({ env: {}, overrides });
}

/** A mutable copy of a job's config section */
export function jobConfig<K extends keyof OpsHubConfig["jobs"]>(
  name: K,
  overrides: Partial<OpsHubConfig["jobs"][K]> = {},
): OpsHubConfig["jobs"][K] {
  return { ...structuredClone(testConfig().jobs[name]), ...overrides };
}

export function makeSample(
  overrides: Partial<InfrastructureMetricSample> = {},
): InfrastructureMetricSample {
  return {
    timestamp: T0,
    cpuPercent: 10,
    memoryPercent: 20,
    diskPercent: 30,
    networkIo: { bytesSent: 0, bytesRecv: 0, packetsSent: 0, packetsRecv: 0 },
    processCount: 100,
    loadAverage: [0.1, 0.1, 0.1],
    ...overrides,
  };
}

export function makeAlert(overrides: Partial<Alert> = {}): Alert {
  return {
    id: "alert-1",
    dedupKey: "infrastructure_monitor|high cpu usage|actionable",
    generation: 0,
    title: "High CPU usage",
    description: "CPU usage is 96%",
    severity: "warning",
    source: "infrastructure_monitor",
    status: "new",
    tags: ["cpu", "infrastructure"],
    assignedTo: null,
    condition: { type: "metric", metric: "cpuPercent", threshold: 80 },
    metadata: {},
    createdAt: T0,
    updatedAt: T0,
    resolvedAt: null,
    escalatedAt: null,
    ...overrides,
  };
}

export function makeRecommendation(
  overrides: Partial<CostRecommendation> = {},
): CostRecommendation {
  return {
    id: "rec-1",
    resourceType: "vm",
    resourceId: "vm-1",
    strategy: "rightsize",
    recommendation: "Downsize vm-1",
    currentCost: 100,
    potentialSavings: 40,
    confidence: "medium",
    effort: "medium",
    status: "pending",
    sampleCount: 30,
    createdAt: T0,
    updatedAt: T0,
    ...overrides,
  };
}

export function makeJob(overrides: Partial<Job> = {}): Job {
  return {
    name: "infrastructure_monitor",
    kind: "monitoring",
    intervalMs: 300_000,
    status: "active",
    lastRun: null,
    nextRun: T0,
    runCount: 0,
    successCount: 0,
    failureCount: 0,
    claim: null,
    metadata: { consecutiveFailures: 0 },
    ...overrides,
  };
}


export interface TestHub {
  hub: AutomationHub;
  gateway: MemoryGateway;
  source: StaticMetricSource;
  clock: ManualClock;
}

/** A hub on an in-memory store with scripted sources and a silent sink */
export async function createTestHub(audit: AuditLogger | null = null): Promise<TestHub> {
  const clock = new ManualClock(T0);
  const gateway = new MemoryGateway();
  const source = new StaticMetricSource(clock);
  const hub = await createHub(testConfig(), {
    clock,
    gateway,
    source,
    sink: new NullNotificationSink(),
    audit,
    logger: silentLogger,
  });
  return { hub, gateway, source, clock };
}

export function createTestRuntime() {
  return {
    log: vi.fn<RuntimeEnv["log"]>(),
    error: vi.fn<RuntimeEnv["error"]>(),
    exit: vi.fn<RuntimeEnv["exit"]>(),
  };
}

/** First argument of every call */
export function printed(fn: Mock<(...args: unknown[]) => void>): unknown[] {
  return fn.mock.calls.map((call) => call[0]);
}
