import type { AutomationHub } from "../hub/automation-hub.js";
import type { RuntimeEnv } from "../runtime.js";
import type { RunOutcome } from "../scheduler/scheduler.js";
import type { Job } from "../types.js";
import { printJson, reportHubError, type OutputOpts } from "./shared.js";

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

export function formatJobLine(job: Job): string {
  return (
    `${job.name.padEnd(24)}${job.status.padEnd(10)}` +
    `runs ${job.runCount} (${job.successCount} ok, ${job.failureCount} failed)  next ${job.nextRun}`
  );
}

export function formatOutcome(outcome: RunOutcome): string[] {
  const { summary } = outcome;
  const lines = [`${outcome.jobName}: ${outcome.status} in ${outcome.durationMs}ms`];
  if (outcome.error) {
    lines.push(`  error: ${outcome.error.name}: ${outcome.error.message}`);
  }
  if (outcome.status === "success") {
    lines.push(
      `  alerts: ${summary.alertsCreated} created, ${summary.alertsUpdated} updated, ` +
        `${summary.alertsReopened} reopened, ${summary.transitionsApplied} transitioned`,
      `  recommendations: ${summary.recommendationsCreated} created, ` +
        `${summary.recommendationsRefreshed} refreshed, ${summary.recommendationsExpired} expired`,
      `  pages: ${summary.pages}`,
    );
  }
  return lines;
}

// ---------------------------------------------------------------------------
// List / status
// ---------------------------------------------------------------------------

export async function jobsListCommand(
  hub: AutomationHub,
  opts: OutputOpts,
  runtime: RuntimeEnv,
): Promise<void> {
  const jobs = await hub.listJobs();
  if (opts.json) {
    printJson(runtime, jobs);
    return;
  }
  if (jobs.length === 0) {
    runtime.log("No jobs registered.");
    return;
  }
  for (const job of jobs) {
    runtime.log(formatJobLine(job));
  }
}

export async function jobStatusCommand(
  hub: AutomationHub,
  jobName: string,
  opts: OutputOpts,
  runtime: RuntimeEnv,
): Promise<void> {
  let job: Job;
  try {
    job = await hub.getJobStatus(jobName);
  } catch (e) {
    reportHubError(e, runtime);
    return;
  }
  if (opts.json) {
    printJson(runtime, job);
    return;
  }
  runtime.log(formatJobLine(job));
  runtime.log(`  last run: ${job.lastRun ?? "never"}`);
  runtime.log(`  consecutive failures: ${job.metadata.consecutiveFailures}`);
  if (job.metadata.lastError) {
    runtime.log(`  last error: ${job.metadata.lastError.name}: ${job.metadata.lastError.message}`);
  }
}

// ---------------------------------------------------------------------------
// Pause / resume
// ---------------------------------------------------------------------------

async function setJobStatus(
  hub: AutomationHub,
  command: "pause" | "resume",
  jobName: string,
  opts: OutputOpts,
  runtime: RuntimeEnv,
): Promise<void> {
  let job: Job;
  try {
    job = command === "pause" ? await hub.pause(jobName) : await hub.resume(jobName);
  } catch (e) {
    reportHubError(e, runtime);
    return;
  }
  if (opts.json) {
    printJson(runtime, job);
    return;
  }
  runtime.log(`${job.name} is ${job.status}.`);
}

export async function jobsPauseCommand(
  hub: AutomationHub,
  jobName: string,
  opts: OutputOpts,
  runtime: RuntimeEnv,
): Promise<void> {
  await setJobStatus(hub, "pause", jobName, opts, runtime);
}

export async function jobsResumeCommand(
  hub: AutomationHub,
  jobName: string,
  opts: OutputOpts,
  runtime: RuntimeEnv,
): Promise<void> {
  await setJobStatus(hub, "resume", jobName, opts, runtime);
}

// ---------------------------------------------------------------------------
// Trigger
// ---------------------------------------------------------------------------

/**
 * Force-run a job. A failed run exits 1.
 */
export async function triggerCommand(
  hub: AutomationHub,
  jobName: string,
  opts: OutputOpts,
  runtime: RuntimeEnv,
): Promise<void> {
  let outcome: RunOutcome;
  try {
    outcome = await hub.trigger(jobName);
  } catch (e) {
    reportHubError(e, runtime);
    return;
  }
  if (opts.json) {
    printJson(runtime, outcome);
  } else {
    for (const line of formatOutcome(outcome)) {
      runtime.log(line);
    }
  }
  if (outcome.status !== "success") {
    runtime.exit(1);
  }
}

// ---------------------------------------------------------------------------
// Run
// ---------------------------------------------------------------------------

export function waitForSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals) => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
      resolve(signal);
    };
    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);
  });
}

/**
 * Start the scheduler and run until `shutdown` resolves.
 */
export async function runCommand(
  hub: AutomationHub,
  runtime: RuntimeEnv,
  shutdown: () => Promise<string> = waitForSignal,
): Promise<void> {
  hub.start();
  runtime.log("ops-hub running. Press Ctrl+C to stop.");
  const signal = await shutdown();
  runtime.log(`Received ${signal}, stopping...`);
  await hub.stop();
  runtime.log("Stopped.");
}
