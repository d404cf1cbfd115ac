import { OpsHubError } from "../errors.js";
import type { RuntimeEnv } from "../runtime.js";

export type OutputOpts = {
  json?: boolean;
};

export function printJson(runtime: RuntimeEnv, value: unknown): void {
  runtime.log(JSON.stringify(value, null, 2));
}

/**
 * Report an expected hub error (unknown id, invalid transition, job
 * already running) and exit 1. Anything else is rethrown.
 */
export function reportHubError(e: unknown, runtime: RuntimeEnv): void {
  if (!(e instanceof OpsHubError)) {
    throw e;
  }
  runtime.error(e.message);
  runtime.exit(1);
}

export type ParsedChoices<T extends string> = { values?: T[]; invalid?: string };

/**
 * Parse a comma-separated option against its allowed values.
 */
export function parseChoices<T extends string>(
  raw: string | undefined,
  allowed: readonly T[],
): ParsedChoices<T> {
  if (raw === undefined || raw.trim() === "") return {};
  const values: T[] = [];
  for (const part of raw.split(",").map((p) => p.trim()).filter(Boolean)) {
    const match = allowed.find((candidate) => candidate === part);
    if (match === undefined) {
      return { invalid: part };
    }
    values.push(match);
  }
  return { values };
}

export function rejectChoice(
  runtime: RuntimeEnv,
  option: string,
  value: string,
  allowed: readonly string[],
): void {
  runtime.error(`Invalid ${option}: "${value}". Expected one of: ${allowed.join(", ")}.`);
  runtime.exit(1);
}
