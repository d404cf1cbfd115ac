/**
 * Job health
 *
 * Derives a degraded signal from persisted job rows: a job whose
 * consecutive failures reach the threshold is degraded. Jobs are never
 * disabled because of it.
 *
 * @module health/job-health
 */

import type { Job, JobError, JobStatus } from "../types.js";

export type HealthStatus = "healthy" | "degraded" | "unhealthy";

export interface JobHealth {
  name: string;
  status: JobStatus;
  health: "healthy" | "degraded";
  runCount: number;
  successCount: number;
  failureCount: number;
  consecutiveFailures: number;
  lastRun: string | null;
  nextRun: string;
  /** Active and past its next run by more than one interval */
  overdue: boolean;
  lastError?: JobError;
}

export interface HubHealthResponse {
  status: HealthStatus;
  scheduler: "running" | "stopped";
  uptime: number;
  jobs: JobHealth[];
  alerts: {
    open: number;
    critical: number;
  };
}

export function jobHealth(job: Job, degradedAfterFailures: number, now: Date): JobHealth {
  const consecutiveFailures = job.metadata.consecutiveFailures;
  return {
    name: job.name,
    status: job.status,
    health: consecutiveFailures >= degradedAfterFailures ? "degraded" : "healthy",
    runCount: job.runCount,
    successCount: job.successCount,
    failureCount: job.failureCount,
    consecutiveFailures,
    lastRun: job.lastRun,
    nextRun: job.nextRun,
    overdue: job.status === "active" && now.getTime() - Date.parse(job.nextRun) > job.intervalMs,
    lastError: job.metadata.lastError,
  };
}

/**
 * Overall status: unhealthy when every enabled job is degraded, degraded
 * when any is.
 */
export function overallStatus(jobs: readonly JobHealth[]): HealthStatus {
  const enabled = jobs.filter((j) => j.status !== "disabled");
  const degraded = enabled.filter((j) => j.health === "degraded").length;
  if (degraded > 0 && degraded === enabled.length) return "unhealthy";
  if (degraded > 0) return "degraded";
  return "healthy";
}

/**
 * Plain-text rendering for simple health checks
 */
export function formatHealthText(health: HubHealthResponse): string {
  const lines: string[] = [
    `status: ${health.status}`,
    `scheduler: ${health.scheduler}`,
    `uptime: ${health.uptime}s`,
    `alerts: ${health.alerts.open} open, ${health.alerts.critical} critical`,
    "",
    "jobs:",
  ];

  for (const job of health.jobs) {
    const icon = job.status !== "active" ? "○" : job.health === "degraded" ? "✗" : "✓";
    const failures = job.consecutiveFailures > 0 ? `, ${job.consecutiveFailures} failing` : "";
    lines.push(
      `  ${icon} ${job.name}: ${job.status} (${job.successCount}/${job.runCount} ok${failures})`,
    );
  }

  return lines.join("\n");
}
