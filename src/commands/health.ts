import { formatHealthText } from "../health/job-health.js";
import type { AutomationHub } from "../hub/automation-hub.js";
import type { RuntimeEnv } from "../runtime.js";
import { printJson, type OutputOpts } from "./shared.js";

/**
 * Print hub health. Exits 1 when unhealthy.
 */
export async function healthCommand(
  hub: AutomationHub,
  opts: OutputOpts,
  runtime: RuntimeEnv,
): Promise<void> {
  const health = await hub.getHealth();
  if (opts.json) {
    printJson(runtime, health);
  } else {
    runtime.log(formatHealthText(health));
  }
  if (health.status === "unhealthy") {
    runtime.exit(1);
  }
}
