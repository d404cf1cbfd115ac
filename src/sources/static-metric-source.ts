/**
 * StaticMetricSource - scripted records for tests, demos and replays.
 *
 * Returns whatever it was last given, stamped with the clock's time.
 * `failNext` makes the next call of an operation raise
 * `SourceUnavailableError`.
 *
 * @module sources/static-metric-source
 */

import { systemClock, type Clock } from "../clock.js";
import { SourceUnavailableError } from "../errors.js";
import type {
  DeploymentStatus,
  InfrastructureMetricSample,
  ResourceUsageSample,
} from "../types.js";
import type { MetricSource, MetricSourceOperation } from "./metric-source.js";

export type SampleReading = Omit<InfrastructureMetricSample, "timestamp">;
export type UsageReading = Omit<ResourceUsageSample, "timestamp">;

export const IDLE_READING: SampleReading = {
  cpuPercent: 10,
  memoryPercent: 20,
  diskPercent: 30,
  networkIo: { bytesSent: 0, bytesRecv: 0, packetsSent: 0, packetsRecv: 0 },
  processCount: 100,
  loadAverage: [0.1, 0.1, 0.1],
};

export class StaticMetricSource implements MetricSource {
  private reading: SampleReading = IDLE_READING;
  private deploymentList: DeploymentStatus[] = [];
  private usageList: UsageReading[] = [];
  private failures = new Map<MetricSourceOperation, string>();

  constructor(private readonly clock: Clock = systemClock) {}

  setReading(reading: Partial<SampleReading>): this {
    this.reading = { ...this.reading, ...reading };
    return this;
  }

  setDeployments(deployments: DeploymentStatus[]): this {
    this.deploymentList = deployments.map((d) => ({ ...d }));
    return this;
  }

  setUsage(usage: UsageReading[]): this {
    this.usageList = usage.map((u) => ({ ...u }));
    return this;
  }

  failNext(operation: MetricSourceOperation, reason = "scripted failure"): this {
    this.failures.set(operation, reason);
    return this;
  }

  async sample(): Promise<InfrastructureMetricSample> {
    this.throwIfScripted("sample");
    return { ...this.reading, timestamp: this.clock.now().toISOString() };
  }

  async deployments(): Promise<DeploymentStatus[]> {
    this.throwIfScripted("deployments");
    return this.deploymentList.map((d) => ({ ...d }));
  }

  async resourceUsage(): Promise<ResourceUsageSample[]> {
    this.throwIfScripted("resourceUsage");
    const timestamp = this.clock.now().toISOString();
    return this.usageList.map((u) => ({ ...u, timestamp }));
  }

  private throwIfScripted(operation: MetricSourceOperation): void {
    const reason = this.failures.get(operation);
    if (reason !== undefined) {
      this.failures.delete(operation);
      throw new SourceUnavailableError(`static:${operation}`, reason);
    }
  }
}
