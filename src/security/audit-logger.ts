/**
 * Audit Logger - tamper-evident record of operator commands
 *
 * JSONL, append-only. Every entry carries a SHA-256 checksum of its content
 * and the checksum of the entry before it, so an edited or deleted line
 * breaks the chain.
 *
 * @module security/audit-logger
 */

import { createHash } from "node:crypto";
import { existsSync } from "node:fs";
import { appendFile, mkdir, readFile, rename, stat } from "node:fs/promises";
import { dirname } from "node:path";
import { systemClock, type Clock } from "../clock.js";
import { createLogger, type Logger } from "../logging.js";

export type AuditActor = "system" | "user" | "automated";

export interface AuditEntry {
  timestamp: string;
  action: string;
  actor: AuditActor;
  details: Record<string, unknown>;
  checksum: string;
  previous_checksum: string | null;
}

export interface AuditLoggerConfig {
  logPath: string;
  maxSizeBytes?: number;
  rotateOnSize?: boolean;
  clock?: Clock;
  logger?: Logger;
}

export interface VerificationError {
  line: number;
  type: "chain_broken" | "checksum_mismatch" | "parse_error";
  message: string;
}

export interface VerificationResult {
  valid: boolean;
  entries: number;
  errors: VerificationError[];
}

const DEFAULT_MAX_SIZE_BYTES = 10 * 1024 * 1024;
const ACTORS: readonly string[] = ["system", "user", "automated"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isAuditEntry(value: unknown): value is AuditEntry {
  return (
    isRecord(value) &&
    typeof value.timestamp === "string" &&
    typeof value.action === "string" &&
    typeof value.actor === "string" &&
    ACTORS.includes(value.actor) &&
    isRecord(value.details) &&
    typeof value.checksum === "string" &&
    (value.previous_checksum === null || typeof value.previous_checksum === "string")
  );
}

/** JSON with object keys sorted at every depth */
function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(",")}]`;
  }
  if (isRecord(value)) {
    const fields = Object.keys(value)
      .filter((key) => value[key] !== undefined)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${canonicalJson(value[key])}`);
    return `{${fields.join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}

export function computeChecksum(entry: Omit<AuditEntry, "checksum">): string {
  return createHash("sha256").update(canonicalJson(entry)).digest("hex");
}

function parseLines(content: string): string[] {
  return content.split("\n").filter((line) => line.trim().length > 0);
}

function parseEntry(line: string): AuditEntry {
  const parsed: unknown = JSON.parse(line);
  if (!isAuditEntry(parsed)) {
    throw new Error("not an audit entry");
  }
  return parsed;
}

export class AuditLogger {
  private readonly config: Required<Omit<AuditLoggerConfig, "clock" | "logger">>;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private lastChecksum: string | null = null;
  private initialized = false;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(logPathOrConfig: string | AuditLoggerConfig) {
    const config = typeof logPathOrConfig === "string" ? { logPath: logPathOrConfig } : logPathOrConfig;
    this.config = {
      logPath: config.logPath,
      maxSizeBytes: config.maxSizeBytes ?? DEFAULT_MAX_SIZE_BYTES,
      rotateOnSize: config.rotateOnSize ?? true,
    };
    this.clock = config.clock ?? systemClock;
    this.logger = config.logger ?? createLogger("audit-logger");
  }

  /**
   * Create the log directory and pick up the chain of an existing log.
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;

    await mkdir(dirname(this.config.logPath), { recursive: true });
    if (existsSync(this.config.logPath)) {
      const lines = parseLines(await readFile(this.config.logPath, "utf8"));
      const last = lines.at(-1);
      if (last !== undefined) {
        try {
          this.lastChecksum = parseEntry(last).checksum;
        } catch (e) {
          this.logger.warn(`Last entry of ${this.config.logPath} is unreadable, starting a new chain`, e);
        }
      }
    }

    this.initialized = true;
  }

  /**
   * Append an entry chained to the previous one. Appends are serialized.
   */
  log(action: string, details: Record<string, unknown>, actor: AuditActor = "system"): Promise<AuditEntry> {
    const run = this.queue.then(() => this.append(action, details, actor));
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async append(
    action: string,
    details: Record<string, unknown>,
    actor: AuditActor,
  ): Promise<AuditEntry> {
    await this.initialize();
    if (this.config.rotateOnSize) {
      await this.maybeRotate();
    }

    const partial: Omit<AuditEntry, "checksum"> = {
      timestamp: this.clock.now().toISOString(),
      action,
      actor,
      details,
      previous_checksum: this.lastChecksum,
    };
    const entry: AuditEntry = { ...partial, checksum: computeChecksum(partial) };

    await appendFile(this.config.logPath, JSON.stringify(entry) + "\n", "utf8");
    this.lastChecksum = entry.checksum;
    return entry;
  }

  /**
   * Check every line's checksum and its link to the line before.
   */
  async verify(): Promise<VerificationResult> {
    if (!existsSync(this.config.logPath)) {
      return { valid: true, entries: 0, errors: [] };
    }

    const lines = parseLines(await readFile(this.config.logPath, "utf8"));
    const errors: VerificationError[] = [];
    let previousChecksum: string | null = null;

    lines.forEach((line, index) => {
      let entry: AuditEntry;
      try {
        entry = parseEntry(line);
      } catch (e) {
        errors.push({
          line: index + 1,
          type: "parse_error",
          message: `Failed to parse entry: ${e instanceof Error ? e.message : String(e)}`,
        });
        return;
      }

      if (entry.previous_checksum !== previousChecksum) {
        errors.push({
          line: index + 1,
          type: "chain_broken",
          message: `Chain broken: expected ${previousChecksum}, got ${entry.previous_checksum}`,
        });
      }

      const { checksum, ...rest } = entry;
      const computed = computeChecksum(rest);
      if (computed !== checksum) {
        errors.push({
          line: index + 1,
          type: "checksum_mismatch",
          message: `Checksum mismatch: expected ${checksum}, computed ${computed}`,
        });
      }
      previousChecksum = checksum;
    });

    return { valid: errors.length === 0, entries: lines.length, errors };
  }

  private async maybeRotate(): Promise<void> {
    if (!existsSync(this.config.logPath)) return;

    const stats = await stat(this.config.logPath);
    if (stats.size < this.config.maxSizeBytes) return;

    const stamp = this.clock.now().toISOString().replace(/[:.]/g, "-");
    const archivePath = this.config.logPath.endsWith(".jsonl")
      ? this.config.logPath.replace(/\.jsonl$/, `-${stamp}.jsonl`)
      : `${this.config.logPath}-${stamp}`;
    await rename(this.config.logPath, archivePath);
    this.lastChecksum = null;
    this.logger.info(`Rotated log to ${archivePath}`);
  }

  async getRecentEntries(count = 100): Promise<AuditEntry[]> {
    if (!existsSync(this.config.logPath)) {
      return [];
    }
    const lines = parseLines(await readFile(this.config.logPath, "utf8"));
    return lines.slice(-count).map(parseEntry);
  }

  async searchByAction(action: string): Promise<AuditEntry[]> {
    const entries = await this.getRecentEntries(Number.POSITIVE_INFINITY);
    return entries.filter((entry) => entry.action === action);
  }

  getLogPath(): string {
    return this.config.logPath;
  }
}
