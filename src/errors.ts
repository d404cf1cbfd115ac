/**
 * Error taxonomy
 *
 * Every error raised by the hub carries a stable `code` so callers (CLI,
 * an API layer) can map it without string matching.
 *
 * @module errors
 */

export type OpsHubErrorCode =
  | "DUPLICATE_JOB"
  | "ALREADY_RUNNING"
  | "SOURCE_UNAVAILABLE"
  | "HANDLER_TIMEOUT"
  | "INVALID_TRANSITION"
  | "NOT_FOUND"
  | "CONFIG_INVALID";

export class OpsHubError extends Error {
  constructor(
    message: string,
    public readonly code: OpsHubErrorCode,
  ) {
    super(message);
    this.name = "OpsHubError";
  }
}

export class DuplicateJobError extends OpsHubError {
  constructor(public readonly jobName: string) {
    super(`Job already registered: ${jobName}`, "DUPLICATE_JOB");
    this.name = "DuplicateJobError";
  }
}

/**
 * Raised when a job's claim is held by another run. Benign on the
 * scheduled path.
 */
export class AlreadyRunningError extends OpsHubError {
  constructor(public readonly jobName: string) {
    super(`Job is already running: ${jobName}`, "ALREADY_RUNNING");
    this.name = "AlreadyRunningError";
  }
}

export class SourceUnavailableError extends OpsHubError {
  constructor(
    public readonly sourceName: string,
    public readonly reason?: unknown,
  ) {
    super(`Source unavailable: ${sourceName}${describeCause(reason)}`, "SOURCE_UNAVAILABLE");
    this.name = "SourceUnavailableError";
  }
}

export class HandlerTimeoutError extends OpsHubError {
  constructor(
    public readonly jobName: string,
    public readonly timeoutMs: number,
  ) {
    super(`Job ${jobName} exceeded its ${timeoutMs}ms timeout`, "HANDLER_TIMEOUT");
    this.name = "HandlerTimeoutError";
  }
}

export class InvalidTransitionError extends OpsHubError {
  constructor(
    public readonly entity: "alert" | "recommendation" | "job",
    public readonly entityId: string,
    public readonly from: string,
    public readonly action: string,
  ) {
    super(`Cannot ${action} ${entity} ${entityId} in state ${from}`, "INVALID_TRANSITION");
    this.name = "InvalidTransitionError";
  }
}

export class NotFoundError extends OpsHubError {
  constructor(
    public readonly entity: "alert" | "recommendation" | "job",
    public readonly entityId: string,
  ) {
    super(`${entity} not found: ${entityId}`, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}

export class ConfigError extends OpsHubError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message, "CONFIG_INVALID");
    this.name = "ConfigError";
  }
}

function describeCause(cause: unknown): string {
  if (cause === undefined) return "";
  return ` (${cause instanceof Error ? cause.message : String(cause)})`;
}

/**
 * Normalize anything thrown into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
