/**
 * JSON-file Persistence Gateway
 *
 * Same semantics as `MemoryGateway`, shared between processes: the CLI and
 * a running scheduler open the same state file. Every transaction holds a
 * lock on the file, re-reads it, and writes the result with a temp-file
 * rename before it becomes visible. Reads outside a transaction see the
 * last committed file. A failed write rejects the transaction and leaves
 * the file untouched.
 *
 * @module persistence/json-file-gateway
 */

import fs from "node:fs";
import path from "node:path";
import lockfile from "proper-lockfile";
import type { RetentionLimits } from "./gateway.js";
import { readJsonFile, writeJsonFileAtomic } from "./json-file.js";
import { MemoryGateway, emptyGatewayState, type GatewayState } from "./memory-gateway.js";

/** A lock untouched for this long belongs to a dead process */
const LOCK_STALE_MS = 10_000;

const LOCK_RETRIES = { retries: 50, factor: 1.5, minTimeout: 10, maxTimeout: 250 };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isGatewayState(value: unknown): value is GatewayState {
  return (
    isRecord(value) &&
    value.version === 1 &&
    Array.isArray(value.jobs) &&
    Array.isArray(value.alerts) &&
    Array.isArray(value.recommendations) &&
    Array.isArray(value.samples) &&
    isRecord(value.usage)
  );
}

export class JsonFileGateway extends MemoryGateway {
  private constructor(
    readonly pathname: string,
    retention?: Partial<RetentionLimits>,
  ) {
    super(undefined, retention);
  }

  /**
   * Open (or create on first commit) the state file at `pathname`. A file
   * that exists but is not a gateway state throws here.
   */
  static open(pathname: string, retention?: Partial<RetentionLimits>): JsonFileGateway {
    readJsonFile(pathname, isGatewayState);
    return new JsonFileGateway(pathname, retention);
  }

  protected override state(): GatewayState {
    return readJsonFile(this.pathname, isGatewayState) ?? emptyGatewayState();
  }

  protected override async exclusive<T>(work: () => Promise<T>): Promise<T> {
    fs.mkdirSync(path.dirname(this.pathname), { recursive: true, mode: 0o700 });
    const release = await lockfile.lock(this.pathname, {
      realpath: false,
      stale: LOCK_STALE_MS,
      retries: LOCK_RETRIES,
    });
    try {
      return await work();
    } finally {
      await release();
    }
  }

  protected override commit(draft: GatewayState): void {
    writeJsonFileAtomic(this.pathname, draft);
  }
}
