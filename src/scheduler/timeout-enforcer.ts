/**
 * TimeoutEnforcer - per-job execution limits
 *
 * Validates each job's configured timeout when it is registered and races
 * every handler invocation against it. A handler that overruns is aborted
 * through its AbortSignal and the run fails with `HandlerTimeoutError`.
 *
 * @module scheduler/timeout-enforcer
 */

import { HandlerTimeoutError } from "../errors.js";
import { createLogger, type Logger } from "../logging.js";

// =============================================================================
// Interfaces
// =============================================================================

export interface TimeoutConfig {
  /** Hard floor - registration is refused below this (default: 100) */
  hardFloorMs: number;
  /** Warning threshold - log a warning below this (default: 1000) */
  warnBelowMs: number;
}

export interface TimeoutValidationResult {
  valid: boolean;
  adjustedMs: number;
  warnings: string[];
  blocked: boolean;
  blockReason?: string;
}

const DEFAULT_TIMEOUT_CONFIG: TimeoutConfig = {
  hardFloorMs: 100,
  warnBelowMs: 1000,
};

// =============================================================================
// TimeoutEnforcer Class
// =============================================================================

export class TimeoutEnforcer {
  private readonly config: TimeoutConfig;
  private readonly logger: Logger;

  constructor(config?: Partial<TimeoutConfig>, logger?: Logger) {
    this.config = { ...DEFAULT_TIMEOUT_CONFIG, ...config };
    this.logger = logger ?? createLogger("timeout-enforcer");
  }

  /**
   * Validate a job's timeout against the floor. Timeouts above the job's
   * interval are clamped to it.
   */
  validateTimeout(jobName: string, requestedMs: number, intervalMs: number): TimeoutValidationResult {
    if (requestedMs < this.config.hardFloorMs) {
      return {
        valid: false,
        adjustedMs: requestedMs,
        warnings: [],
        blocked: true,
        blockReason:
          `Timeout ${requestedMs}ms for ${jobName} is below the hard floor ` +
          `${this.config.hardFloorMs}ms`,
      };
    }

    const warnings: string[] = [];
    let adjustedMs = requestedMs;

    if (requestedMs > intervalMs) {
      adjustedMs = intervalMs;
      warnings.push(
        `Timeout ${requestedMs}ms for ${jobName} exceeds its ${intervalMs}ms interval - clamped`,
      );
    }
    if (adjustedMs < this.config.warnBelowMs) {
      warnings.push(
        `Timeout ${adjustedMs}ms for ${jobName} is below ${this.config.warnBelowMs}ms - consider increasing`,
      );
    }

    for (const warning of warnings) {
      this.logger.warn(warning);
    }
    return { valid: true, adjustedMs, warnings, blocked: false };
  }

  /**
   * Run `work` with a deadline. The signal handed to `work` aborts on the
   * deadline or when `parent` aborts; either way the returned promise
   * rejects without waiting for `work` to notice.
   */
  async enforce<T>(
    jobName: string,
    timeoutMs: number,
    work: (signal: AbortSignal) => Promise<T>,
    parent?: AbortSignal,
  ): Promise<T> {
    const controller = new AbortController();
    let fail: (reason: unknown) => void = () => undefined;
    const deadline = new Promise<never>((_, reject) => {
      fail = reject;
    });
    const abort = (reason: unknown) => {
      controller.abort(reason);
      fail(reason);
    };

    const timer = setTimeout(() => abort(new HandlerTimeoutError(jobName, timeoutMs)), timeoutMs);
    const onParentAbort = () => abort(parent?.reason);
    if (parent?.aborted) {
      onParentAbort();
    } else {
      parent?.addEventListener("abort", onParentAbort, { once: true });
    }

    try {
      return await Promise.race([work(controller.signal), deadline]);
    } finally {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    }
  }
}
