import { Command } from "commander";
import {
  alertsAckCommand,
  alertsListCommand,
  alertsResolveCommand,
  alertsSummaryCommand,
  alertsSuppressCommand,
} from "../commands/alerts.js";
import { auditTailCommand, auditVerifyCommand } from "../commands/audit.js";
import { healthCommand } from "../commands/health.js";
import {
  jobStatusCommand,
  jobsListCommand,
  jobsPauseCommand,
  jobsResumeCommand,
  runCommand,
  triggerCommand,
} from "../commands/jobs.js";
import {
  recommendationsAcceptCommand,
  recommendationsDismissCommand,
  recommendationsListCommand,
  recommendationsSavingsCommand,
} from "../commands/recommendations.js";
import { loadConfig } from "../config/config.js";
import { createHub, type AutomationHub } from "../hub/automation-hub.js";
import { defaultRuntime, type RuntimeEnv } from "../runtime.js";
import { runCommandWithRuntime } from "./cli-utils.js";

export type OpenHub = (configPath: string | undefined) => Promise<AutomationHub>;

export interface OpsHubCliOptions {
  runtime?: RuntimeEnv;
  openHub?: OpenHub;
}

const openConfiguredHub: OpenHub = async (configPath) => createHub(loadConfig({ path: configPath }));

function stringOpt(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function outputOpts(opts: { json?: unknown }): { json: boolean } {
  return { json: Boolean(opts.json) };
}

export function buildProgram(options: OpsHubCliOptions = {}): Command {
  const runtime = options.runtime ?? defaultRuntime;
  const openHub = options.openHub ?? openConfiguredHub;

  const program = new Command()
    .name("ops-hub")
    .description("Recurring ops jobs, alert routing and cost recommendations")
    .option("-c, --config <path>", "YAML config file (default: $OPS_HUB_CONFIG)");

  const withHub = (action: (hub: AutomationHub) => Promise<void>) =>
    runCommandWithRuntime(runtime, async () => {
      const hub = await openHub(stringOpt(program.opts().config));
      await action(hub);
    });

  program
    .command("run")
    .description("Run the scheduler until SIGINT or SIGTERM")
    .action(async () => {
      await withHub((hub) => runCommand(hub, runtime));
    });

  program
    .command("trigger")
    .description("Run a job now, outside its schedule")
    .argument("<job>", "Job name (e.g. infrastructure_monitor)")
    .option("--json", "Output JSON", false)
    .action(async (job: string, opts) => {
      await withHub((hub) => triggerCommand(hub, job, outputOpts(opts), runtime));
    });

  program
    .command("health")
    .description("Per-job health and overall status")
    .option("--json", "Output JSON", false)
    .action(async (opts) => {
      await withHub((hub) => healthCommand(hub, outputOpts(opts), runtime));
    });

  // -------------------------------------------------------------------------
  // jobs
  // -------------------------------------------------------------------------

  const jobs = program.command("jobs").description("Registered jobs");

  jobs
    .command("list", { isDefault: true })
    .description("List jobs and their counters")
    .option("--json", "Output JSON", false)
    .action(async (opts) => {
      await withHub((hub) => jobsListCommand(hub, outputOpts(opts), runtime));
    });

  jobs
    .command("status")
    .description("Show one job")
    .argument("<job>", "Job name")
    .option("--json", "Output JSON", false)
    .action(async (job: string, opts) => {
      await withHub((hub) => jobStatusCommand(hub, job, outputOpts(opts), runtime));
    });

  jobs
    .command("pause")
    .description("Stop scheduling a job")
    .argument("<job>", "Job name")
    .option("--json", "Output JSON", false)
    .action(async (job: string, opts) => {
      await withHub((hub) => jobsPauseCommand(hub, job, outputOpts(opts), runtime));
    });

  jobs
    .command("resume")
    .description("Resume a paused job on its stored schedule")
    .argument("<job>", "Job name")
    .option("--json", "Output JSON", false)
    .action(async (job: string, opts) => {
      await withHub((hub) => jobsResumeCommand(hub, job, outputOpts(opts), runtime));
    });

  // -------------------------------------------------------------------------
  // alerts
  // -------------------------------------------------------------------------

  const alerts = program.command("alerts").description("Alert management");

  alerts
    .command("list", { isDefault: true })
    .description("List alerts")
    .option("--status <statuses>", "Comma-separated statuses (new,acknowledged,resolved,suppressed)")
    .option("--severity <severities>", "Comma-separated severities (info,warning,critical)")
    .option("--source <source>", "Raising job")
    .option("--assigned-to <assignee>", "Assignee")
    .option("--json", "Output JSON", false)
    .action(async (opts) => {
      await withHub((hub) =>
        alertsListCommand(
          hub,
          {
            status: stringOpt(opts.status),
            severity: stringOpt(opts.severity),
            source: stringOpt(opts.source),
            assignedTo: stringOpt(opts.assignedTo),
            json: Boolean(opts.json),
          },
          runtime,
        ),
      );
    });

  alerts
    .command("ack")
    .description("Acknowledge an alert")
    .argument("<id>", "Alert id")
    .option("--json", "Output JSON", false)
    .action(async (id: string, opts) => {
      await withHub((hub) => alertsAckCommand(hub, id, outputOpts(opts), runtime));
    });

  alerts
    .command("resolve")
    .description("Resolve an alert")
    .argument("<id>", "Alert id")
    .option("--json", "Output JSON", false)
    .action(async (id: string, opts) => {
      await withHub((hub) => alertsResolveCommand(hub, id, outputOpts(opts), runtime));
    });

  alerts
    .command("suppress")
    .description("Suppress an alert")
    .argument("<id>", "Alert id")
    .option("--json", "Output JSON", false)
    .action(async (id: string, opts) => {
      await withHub((hub) => alertsSuppressCommand(hub, id, outputOpts(opts), runtime));
    });

  alerts
    .command("summary")
    .description("Open alerts by severity and the last 24 hours")
    .option("--json", "Output JSON", false)
    .action(async (opts) => {
      await withHub((hub) => alertsSummaryCommand(hub, outputOpts(opts), runtime));
    });

  // -------------------------------------------------------------------------
  // recommendations
  // -------------------------------------------------------------------------

  const recommendations = program
    .command("recommendations")
    .description("Cost recommendations");

  recommendations
    .command("list", { isDefault: true })
    .description("List recommendations")
    .option("--status <statuses>", "Comma-separated statuses (pending,accepted,dismissed,expired)")
    .option("--resource-type <type>", "Resource type")
    .option("--confidence <level>", "low, medium or high")
    .option("--json", "Output JSON", false)
    .action(async (opts) => {
      await withHub((hub) =>
        recommendationsListCommand(
          hub,
          {
            status: stringOpt(opts.status),
            resourceType: stringOpt(opts.resourceType),
            confidence: stringOpt(opts.confidence),
            json: Boolean(opts.json),
          },
          runtime,
        ),
      );
    });

  recommendations
    .command("accept")
    .description("Accept a pending recommendation")
    .argument("<id>", "Recommendation id")
    .option("--json", "Output JSON", false)
    .action(async (id: string, opts) => {
      await withHub((hub) => recommendationsAcceptCommand(hub, id, outputOpts(opts), runtime));
    });

  recommendations
    .command("dismiss")
    .description("Dismiss a pending recommendation")
    .argument("<id>", "Recommendation id")
    .option("--json", "Output JSON", false)
    .action(async (id: string, opts) => {
      await withHub((hub) => recommendationsDismissCommand(hub, id, outputOpts(opts), runtime));
    });

  recommendations
    .command("savings")
    .description("Pending savings and the top priorities")
    .option("--json", "Output JSON", false)
    .action(async (opts) => {
      await withHub((hub) => recommendationsSavingsCommand(hub, outputOpts(opts), runtime));
    });

  // -------------------------------------------------------------------------
  // audit
  // -------------------------------------------------------------------------

  const audit = program.command("audit").description("Operator command audit log");

  audit
    .command("tail", { isDefault: true })
    .description("Show the most recent audit entries")
    .option("-n, --count <n>", "Entries to show (default 100)")
    .option("--action <action>", "Only this action (e.g. alert.acknowledge)")
    .option("--json", "Output JSON", false)
    .action(async (opts) => {
      await withHub((hub) =>
        auditTailCommand(
          hub,
          { count: stringOpt(opts.count), action: stringOpt(opts.action), json: Boolean(opts.json) },
          runtime,
        ),
      );
    });

  audit
    .command("verify")
    .description("Check the audit log's hash chain")
    .option("--json", "Output JSON", false)
    .action(async (opts) => {
      await withHub((hub) => auditVerifyCommand(hub, outputOpts(opts), runtime));
    });

  return program;
}
