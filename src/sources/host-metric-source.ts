/**
 * HostMetricSource - best-effort sampler for the machine the hub runs on.
 *
 * CPU and memory come from `node:os`, disk usage from `statfs` on the
 * configured path, network counters and process count from procfs where it
 * exists. Deployment status and resource usage are read from JSON inventory
 * files maintained by whatever exports them (a kubectl cron, a billing
 * export); without a file the corresponding list is empty.
 *
 * @module sources/host-metric-source
 */

import os from "node:os";
import { readFile, readdir, statfs } from "node:fs/promises";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { systemClock, type Clock } from "../clock.js";
import { SourceUnavailableError } from "../errors.js";
import { createLogger, type Logger } from "../logging.js";
import type {
  DeploymentStatus,
  InfrastructureMetricSample,
  NetworkIo,
  ResourceUsageSample,
} from "../types.js";
import type { MetricSource } from "./metric-source.js";

// =============================================================================
// Inventory schemas
// =============================================================================

const Count = Type.Integer({ minimum: 0 });
const Percent = Type.Number({ minimum: 0, maximum: 100 });

export const DeploymentInventorySchema = Type.Array(
  Type.Object({
    name: Type.String({ minLength: 1 }),
    namespace: Type.String({ minLength: 1 }),
    replicas: Count,
    readyReplicas: Count,
  }),
);

export const UsageInventorySchema = Type.Array(
  Type.Object({
    resourceId: Type.String({ minLength: 1 }),
    resourceType: Type.String({ minLength: 1 }),
    cpuPercent: Percent,
    memoryPercent: Percent,
    costPerHour: Type.Number({ minimum: 0 }),
  }),
);

type UsageInventory = Static<typeof UsageInventorySchema>;

export interface HostMetricSourceOptions {
  diskPath: string;
  deploymentsFile: string | null;
  resourceUsageFile: string | null;
  clock?: Clock;
  logger?: Logger;
}

interface CpuTimes {
  idle: number;
  total: number;
}

const ZERO_NETWORK: NetworkIo = { bytesSent: 0, bytesRecv: 0, packetsSent: 0, packetsRecv: 0 };

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

function readCpuTimes(): CpuTimes {
  let idle = 0;
  let total = 0;
  for (const cpu of os.cpus()) {
    const t = cpu.times;
    idle += t.idle;
    total += t.user + t.nice + t.sys + t.idle + t.irq;
  }
  return { idle, total };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Parse /proc/net/dev, summing every interface except loopback.
 */
export function parseNetDev(text: string): NetworkIo {
  const totals = { ...ZERO_NETWORK };
  for (const line of text.split("\n").slice(2)) {
    const [iface, rest] = line.split(":");
    if (!rest || iface.trim() === "lo") continue;
    const fields = rest.trim().split(/\s+/).map(Number);
    totals.bytesRecv += fields[0] ?? 0;
    totals.packetsRecv += fields[1] ?? 0;
    totals.bytesSent += fields[8] ?? 0;
    totals.packetsSent += fields[9] ?? 0;
  }
  return totals;
}

// =============================================================================
// HostMetricSource
// =============================================================================

export class HostMetricSource implements MetricSource {
  private previousCpu: CpuTimes = readCpuTimes();
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(private readonly options: HostMetricSourceOptions) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger("host-source");
  }

  async sample(): Promise<InfrastructureMetricSample> {
    let diskPercent: number;
    try {
      const stats = await statfs(this.options.diskPath);
      const used = stats.blocks - stats.bfree;
      const capacity = used + stats.bavail;
      diskPercent = capacity > 0 ? round1((used / capacity) * 100) : 0;
    } catch (e) {
      throw new SourceUnavailableError(`statfs:${this.options.diskPath}`, e);
    }

    const total = os.totalmem();
    return {
      timestamp: this.clock.now().toISOString(),
      cpuPercent: this.cpuPercent(),
      memoryPercent: total > 0 ? round1(((total - os.freemem()) / total) * 100) : 0,
      diskPercent,
      networkIo: await this.networkIo(),
      processCount: await this.processCount(),
      loadAverage: os.loadavg().map(round1),
    };
  }

  async deployments(): Promise<DeploymentStatus[]> {
    const records = await this.readInventory(this.options.deploymentsFile, "deployments");
    if (records === undefined) return [];
    if (!Value.Check(DeploymentInventorySchema, records)) {
      throw new SourceUnavailableError(
        `deployments:${this.options.deploymentsFile}`,
        firstIssue(Value.Errors(DeploymentInventorySchema, records)),
      );
    }
    return records;
  }

  async resourceUsage(): Promise<ResourceUsageSample[]> {
    const records = await this.readInventory(this.options.resourceUsageFile, "usage");
    if (records === undefined) return [];
    if (!Value.Check(UsageInventorySchema, records)) {
      throw new SourceUnavailableError(
        `usage:${this.options.resourceUsageFile}`,
        firstIssue(Value.Errors(UsageInventorySchema, records)),
      );
    }
    const timestamp = this.clock.now().toISOString();
    return records.map((record: UsageInventory[number]) => ({ ...record, timestamp }));
  }

  /** Utilization since the previous call (since boot on the first) */
  private cpuPercent(): number {
    const current = readCpuTimes();
    const total = current.total - this.previousCpu.total;
    const idle = current.idle - this.previousCpu.idle;
    this.previousCpu = current;
    return total > 0 ? round1(((total - idle) / total) * 100) : 0;
  }

  private async networkIo(): Promise<NetworkIo> {
    try {
      return parseNetDev(await readFile("/proc/net/dev", "utf8"));
    } catch (e) {
      this.logger.debug(`Network counters unavailable: ${e instanceof Error ? e.message : String(e)}`);
      return { ...ZERO_NETWORK };
    }
  }

  private async processCount(): Promise<number> {
    try {
      const entries = await readdir("/proc");
      return entries.filter((entry) => /^\d+$/.test(entry)).length;
    } catch (e) {
      this.logger.debug(`Process count unavailable: ${e instanceof Error ? e.message : String(e)}`);
      return 0;
    }
  }

  private async readInventory(pathname: string | null, label: string): Promise<unknown> {
    if (!pathname) return undefined;
    let text: string;
    try {
      text = await readFile(pathname, "utf8");
    } catch (e) {
      if (isMissingFile(e)) {
        this.logger.debug(`No ${label} inventory at ${pathname}`);
        return undefined;
      }
      throw new SourceUnavailableError(`${label}:${pathname}`, e);
    }
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (e) {
      throw new SourceUnavailableError(`${label}:${pathname}`, e);
    }
  }
}

function firstIssue(errors: Iterable<{ path: string; message: string }>): string {
  for (const error of errors) {
    return `${error.path || "/"}: ${error.message}`;
  }
  return "unexpected content";
}
