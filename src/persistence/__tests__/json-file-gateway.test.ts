import { existsSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { makeAlert, makeJob } from "../../__tests__/fixtures.js";
import { JsonFileGateway } from "../json-file-gateway.js";
import { JsonFileError } from "../json-file.js";

describe("JsonFileGateway", () => {
  let dir: string;
  let statePath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "ops-hub-state-"));
    statePath = join(dir, "nested", "state.json");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("starts empty without a file and creates it on the first commit", async () => {
    const gateway = JsonFileGateway.open(statePath);
    expect(await gateway.listJobs()).toEqual([]);
    expect(existsSync(statePath)).toBe(false);

    await gateway.transaction((tx) => tx.putJob(makeJob()));

    expect(existsSync(statePath)).toBe(true);
  });

  it("round-trips committed state into a new instance", async () => {
    const first = JsonFileGateway.open(statePath);
    await first.transaction(async (tx) => {
      await tx.putJob(makeJob({ runCount: 3 }));
      await tx.putAlert(makeAlert());
    });

    const second = JsonFileGateway.open(statePath);

    expect((await second.getJob("infrastructure_monitor"))?.runCount).toBe(3);
    expect(await second.getAlert("alert-1")).toEqual(makeAlert());
  });

  it("does not write a rejected transaction", async () => {
    const gateway = JsonFileGateway.open(statePath);
    await gateway.transaction((tx) => tx.putJob(makeJob()));
    const before = readFileSync(statePath, "utf8");

    await expect(
      gateway.transaction(async (tx) => {
        await tx.putJob(makeJob({ runCount: 99 }));
        throw new Error("abort");
      }),
    ).rejects.toThrow("abort");

    expect(readFileSync(statePath, "utf8")).toBe(before);
  });

  it("leaves no temp files behind", async () => {
    const gateway = JsonFileGateway.open(statePath);
    await gateway.transaction((tx) => tx.putJob(makeJob()));
    await gateway.transaction((tx) => tx.putAlert(makeAlert()));

    expect(readdirSync(join(dir, "nested"))).toEqual(["state.json"]);
  });

  it("applies each transaction to the file as another instance left it", async () => {
    const runner = JsonFileGateway.open(statePath);
    await runner.transaction(async (tx) => {
      await tx.putJob(makeJob());
      await tx.putAlert(makeAlert());
    });

    const cli = JsonFileGateway.open(statePath);
    await cli.transaction(async (tx) => {
      await tx.putAlert(makeAlert({ status: "acknowledged" }));
    });
    await runner.transaction(async (tx) => {
      await tx.putJob(makeJob({ runCount: 1 }));
    });

    const reopened = JsonFileGateway.open(statePath);
    expect((await reopened.getAlert("alert-1"))?.status).toBe("acknowledged");
    expect((await reopened.getJob("infrastructure_monitor"))?.runCount).toBe(1);
    expect((await runner.getAlert("alert-1"))?.status).toBe("acknowledged");
  });

  it("holds a lock on the state file for the length of a transaction", async () => {
    const gateway = JsonFileGateway.open(statePath);
    let lockedDuringWork = false;

    await gateway.transaction(async (tx) => {
      lockedDuringWork = existsSync(`${statePath}.lock`);
      await tx.putJob(makeJob());
    });

    expect(lockedDuringWork).toBe(true);
    expect(existsSync(`${statePath}.lock`)).toBe(false);
  });

  it("refuses a file with the wrong shape", () => {
    writeFileSync(join(dir, "bad.json"), JSON.stringify({ version: 2 }));
    expect(() => JsonFileGateway.open(join(dir, "bad.json"))).toThrow(JsonFileError);
  });

  it("refuses corrupt JSON", () => {
    writeFileSync(join(dir, "corrupt.json"), "{ not json");
    expect(() => JsonFileGateway.open(join(dir, "corrupt.json"))).toThrow(/Corrupt JSON/);
  });
});
