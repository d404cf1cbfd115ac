import type { AutomationHub } from "../hub/automation-hub.js";
import type { RuntimeEnv } from "../runtime.js";
import type { AuditEntry } from "../security/audit-logger.js";
import { printJson, type OutputOpts } from "./shared.js";

export type AuditTailOpts = OutputOpts & {
  count?: string;
  action?: string;
};

const NOT_CONFIGURED = "Audit log is not configured (set auditLogPath or OPS_HUB_AUDIT_LOG).";

function notConfigured(runtime: RuntimeEnv): void {
  runtime.error(NOT_CONFIGURED);
  runtime.exit(1);
}

export function formatAuditEntry(entry: AuditEntry): string {
  return `${entry.timestamp}  ${entry.actor.padEnd(9)}  ${entry.action}  ${JSON.stringify(entry.details)}`;
}

// ----------------------------------------------------------------------------
// audit verify
// ----------------------------------------------------------------------------

/**
 * Check the audit log's hash chain. Exits 1 when it is broken.
 */
export async function auditVerifyCommand(
  hub: AutomationHub,
  opts: OutputOpts,
  runtime: RuntimeEnv,
): Promise<void> {
  const result = await hub.verifyAuditLog();
  if (!result) {
    notConfigured(runtime);
    return;
  }

  if (opts.json) {
    printJson(runtime, result);
  } else if (result.valid) {
    runtime.log(`Audit log intact: ${result.entries} entries.`);
  } else {
    runtime.log(`Audit log broken: ${result.errors.length} problems in ${result.entries} entries.`);
    for (const error of result.errors) {
      runtime.log(`  line ${error.line}: ${error.type}: ${error.message}`);
    }
  }
  if (!result.valid) {
    runtime.exit(1);
  }
}

// ----------------------------------------------------------------------------
// audit tail
// ----------------------------------------------------------------------------

export async function auditTailCommand(
  hub: AutomationHub,
  opts: AuditTailOpts,
  runtime: RuntimeEnv,
): Promise<void> {
  let count: number | undefined;
  if (opts.count !== undefined) {
    count = Number(opts.count);
    if (!Number.isInteger(count) || count < 1) {
      runtime.error(`Invalid --count: "${opts.count}". Expected a positive integer.`);
      runtime.exit(1);
      return;
    }
  }

  const entries = await hub.auditEntries({ count, action: opts.action });
  if (!entries) {
    notConfigured(runtime);
    return;
  }

  if (opts.json) {
    printJson(runtime, entries);
    return;
  }
  if (entries.length === 0) {
    runtime.log("No audit entries.");
    return;
  }
  for (const entry of entries) {
    runtime.log(formatAuditEntry(entry));
  }
}
