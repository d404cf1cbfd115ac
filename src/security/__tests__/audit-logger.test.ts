import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ManualClock } from "../../clock.js";
import { silentLogger } from "../../logging.js";
import { AuditLogger, computeChecksum } from "../audit-logger.js";

describe("AuditLogger", () => {
  let dir: string;
  let logPath: string;
  const clock = new ManualClock("2026-03-02T10:00:00.000Z");

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "audit-"));
    logPath = join(dir, "nested", "audit.jsonl");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function createAuditLogger(): AuditLogger {
    return new AuditLogger({ logPath, clock, logger: silentLogger });
  }

  it("chains each entry to the one before", async () => {
    const audit = createAuditLogger();
    const first = await audit.log("alert.acknowledge", { alertId: "a-1" }, "user");
    const second = await audit.log("job.pause", { job: "cost_optimizer" });

    expect(first.previous_checksum).toBeNull();
    expect(second.previous_checksum).toBe(first.checksum);
    expect(second.actor).toBe("system");
    expect(first.timestamp).toBe("2026-03-02T10:00:00.000Z");

    const { checksum, ...rest } = first;
    expect(computeChecksum(rest)).toBe(checksum);
    expect(await audit.verify()).toEqual({ valid: true, entries: 2, errors: [] });
  });

  it("checksums independently of key order", () => {
    const base = {
      timestamp: "2026-03-02T10:00:00.000Z",
      action: "x",
      actor: "user" as const,
      previous_checksum: null,
    };
    expect(computeChecksum({ ...base, details: { a: 1, b: 2 } })).toBe(
      computeChecksum({ ...base, details: { b: 2, a: 1 } }),
    );
  });

  it("serializes concurrent appends", async () => {
    const audit = createAuditLogger();
    await Promise.all([1, 2, 3].map((n) => audit.log("job.trigger", { n })));

    const entries = await audit.getRecentEntries();
    expect(entries.map((e) => e.details.n)).toEqual([1, 2, 3]);
    expect((await audit.verify()).valid).toBe(true);
  });

  it("detects an edited entry", async () => {
    const audit = createAuditLogger();
    await audit.log("alert.resolve", { alertId: "a-1" });
    await audit.log("alert.resolve", { alertId: "a-2" });

    const content = await readFile(logPath, "utf8");
    await writeFile(logPath, content.replace('"a-1"', '"a-9"'), "utf8");

    const result = await audit.verify();
    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => [e.line, e.type])).toEqual([[1, "checksum_mismatch"]]);
  });

  it("detects a deleted entry and unreadable lines", async () => {
    const audit = createAuditLogger();
    await audit.log("a", {});
    await audit.log("b", {});
    await audit.log("c", {});

    const lines = (await readFile(logPath, "utf8")).trimEnd().split("\n");
    await writeFile(logPath, [lines[0], "not json", lines[2]].join("\n") + "\n", "utf8");

    const result = await audit.verify();
    expect(result.entries).toBe(3);
    expect(result.errors.map((e) => [e.line, e.type])).toEqual([
      [2, "parse_error"],
      [3, "chain_broken"],
    ]);
  });

  it("continues the chain of an existing log", async () => {
    const first = await createAuditLogger().log("a", {});
    const second = await createAuditLogger().log("b", {});

    expect(second.previous_checksum).toBe(first.checksum);
    expect(await createAuditLogger().searchByAction("b")).toEqual([second]);
  });

  it("reports an empty result for a missing log", async () => {
    const audit = createAuditLogger();
    expect(await audit.verify()).toEqual({ valid: true, entries: 0, errors: [] });
    expect(await audit.getRecentEntries()).toEqual([]);
  });
});
