import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ManualClock } from "../../clock.js";
import { SourceUnavailableError } from "../../errors.js";
import { silentLogger } from "../../logging.js";
import { HostMetricSource, parseNetDev } from "../host-metric-source.js";
import { StaticMetricSource } from "../static-metric-source.js";

const T0 = "2026-03-02T10:00:00.000Z";

describe("StaticMetricSource", () => {
  it("stamps samples with the clock time", async () => {
    const source = new StaticMetricSource(new ManualClock(T0)).setReading({ cpuPercent: 91 });
    const sample = await source.sample();

    expect(sample.timestamp).toBe(T0);
    expect(sample.cpuPercent).toBe(91);
    expect(sample.memoryPercent).toBe(20);
  });

  it("fails a scripted operation once", async () => {
    const source = new StaticMetricSource(new ManualClock(T0)).failNext("deployments", "api down");

    await expect(source.deployments()).rejects.toThrow(SourceUnavailableError);
    await expect(source.deployments()).resolves.toEqual([]);
  });

  it("returns copies of scripted deployments", async () => {
    const source = new StaticMetricSource(new ManualClock(T0)).setDeployments([
      { namespace: "prod", name: "api", replicas: 3, readyReplicas: 2 },
    ]);
    const [first] = await source.deployments();
    if (first) first.readyReplicas = 3;

    expect((await source.deployments())[0]?.readyReplicas).toBe(2);
  });
});

describe("parseNetDev", () => {
  it("sums every interface except loopback", () => {
    const text = [
      "Inter-|   Receive                                                |  Transmit",
      " face |bytes    packets errs drop fifo frame compressed multicast|bytes    packets errs drop fifo colls carrier compressed",
      "    lo:  1000      10    0    0    0     0          0         0     1000      10    0    0    0     0       0          0",
      "  eth0:  5000      50    0    0    0     0          0         0     3000      30    0    0    0     0       0          0",
      "  eth1:   200       2    0    0    0     0          0         0      100       1    0    0    0     0       0          0",
      "",
    ].join("\n");

    expect(parseNetDev(text)).toEqual({
      bytesRecv: 5200,
      packetsRecv: 52,
      bytesSent: 3100,
      packetsSent: 31,
    });
  });
});

describe("HostMetricSource", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "ops-hub-source-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function source(files: { deployments?: string; usage?: string } = {}): HostMetricSource {
    return new HostMetricSource({
      diskPath: dir,
      deploymentsFile: files.deployments ?? null,
      resourceUsageFile: files.usage ?? null,
      clock: new ManualClock(T0),
      logger: silentLogger,
    });
  }

  it("samples the host", async () => {
    const sample = await source().sample();

    expect(sample.timestamp).toBe(T0);
    for (const value of [sample.cpuPercent, sample.memoryPercent, sample.diskPercent]) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThanOrEqual(100);
    }
    expect(sample.loadAverage).toHaveLength(3);
  });

  it("reports a missing disk path as unavailable", async () => {
    const missing = new HostMetricSource({
      diskPath: join(dir, "does-not-exist"),
      deploymentsFile: null,
      resourceUsageFile: null,
      logger: silentLogger,
    });
    await expect(missing.sample()).rejects.toThrow(SourceUnavailableError);
  });

  it("returns empty lists without inventory files", async () => {
    const host = source({ deployments: join(dir, "none.json") });
    expect(await host.deployments()).toEqual([]);
    expect(await host.resourceUsage()).toEqual([]);
  });

  it("reads the deployment inventory", async () => {
    const path = join(dir, "deployments.json");
    writeFileSync(path, JSON.stringify([{ namespace: "prod", name: "api", replicas: 3, readyReplicas: 1 }]));

    expect(await source({ deployments: path }).deployments()).toEqual([
      { namespace: "prod", name: "api", replicas: 3, readyReplicas: 1 },
    ]);
  });

  it("stamps usage records with the clock time", async () => {
    const path = join(dir, "usage.json");
    writeFileSync(
      path,
      JSON.stringify([
        { resourceId: "vm-1", resourceType: "vm", cpuPercent: 12, memoryPercent: 30, costPerHour: 0.5 },
      ]),
    );

    expect(await source({ usage: path }).resourceUsage()).toEqual([
      {
        resourceId: "vm-1",
        resourceType: "vm",
        cpuPercent: 12,
        memoryPercent: 30,
        costPerHour: 0.5,
        timestamp: T0,
      },
    ]);
  });

  it("rejects an inventory that does not match the schema", async () => {
    const path = join(dir, "deployments.json");
    writeFileSync(path, JSON.stringify([{ namespace: "prod", name: "api", replicas: -1, readyReplicas: 0 }]));

    await expect(source({ deployments: path }).deployments()).rejects.toThrow(/Source unavailable: deployments:/);
  });

  it("rejects an inventory that is not JSON", async () => {
    const path = join(dir, "usage.json");
    writeFileSync(path, "not json");

    await expect(source({ usage: path }).resourceUsage()).rejects.toThrow(SourceUnavailableError);
  });
});
