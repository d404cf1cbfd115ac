import { toError } from "../errors.js";
import type { RuntimeEnv } from "../runtime.js";

/**
 * Run a command action, reporting anything it throws and exiting non-zero.
 */
export async function runCommandWithRuntime(
  runtime: RuntimeEnv,
  action: () => Promise<void>,
): Promise<void> {
  try {
    await action();
  } catch (e) {
    runtime.error(toError(e).message);
    runtime.exit(1);
  }
}
