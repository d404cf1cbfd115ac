/**
 * Alert identity
 *
 * The dedup key is the source, the normalized title and the severity
 * class. Each generation of a key gets its own stable id.
 *
 * @module alerts/dedup
 */

import { createHash } from "node:crypto";
import type { AlertDelta, Severity } from "../types.js";

export type SeverityClass = "informational" | "actionable";

/** Case and whitespace differences do not split an alert. */
export function normalizeTitle(title: string): string {
  return title.toLowerCase().replace(/\s+/g, " ").trim();
}

/** Warning and critical share a class so escalation keeps the alert identity. */
export function severityClass(severity: Severity): SeverityClass {
  return severity === "info" ? "informational" : "actionable";
}

export function alertDedupKey(delta: Pick<AlertDelta, "source" | "title" | "severity">): string {
  return `${delta.source}|${normalizeTitle(delta.title)}|${severityClass(delta.severity)}`;
}

export function alertId(dedupKey: string, generation: number): string {
  return createHash("sha256").update(`${dedupKey}#${generation}`).digest("hex").slice(0, 16);
}
