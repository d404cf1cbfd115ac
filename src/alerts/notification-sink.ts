/**
 * NotificationSink - paging and operational notices
 *
 * Fans a notification out to every configured channel: log, Slack webhook,
 * generic webhook or email over SMTP. Channel failures are logged with the
 * webhook URL masked and never reach the caller.
 *
 * @module alerts/notification-sink
 */

import nodemailer from "nodemailer";
import type { NotificationChannelConfig } from "../config/config.js";
import { createLogger, type Logger } from "../logging.js";
import type { Alert, Severity } from "../types.js";
import { SEVERITY_RANK } from "./alert-state.js";

// =============================================================================
// Security Utilities
// =============================================================================

/**
 * Mask everything after the first path segment of a webhook URL so tokens
 * never reach the logs.
 *
 * @example
 * sanitizeWebhookUrl('https://hooks.slack.com/services/T00/B00/xxxx')
 * // => 'https://hooks.slack.com/services/***MASKED***'
 */
export function sanitizeWebhookUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return "***INVALID_URL***";
  }
  const pathParts = parsed.pathname.split("/").filter(Boolean);
  if (pathParts.length > 1) {
    return `${parsed.protocol}//${parsed.host}/${pathParts[0]}/***MASKED***`;
  }
  return `${parsed.protocol}//${parsed.host}/***MASKED***`;
}

// =============================================================================
// Types and Interfaces
// =============================================================================

export interface NotificationSink {
  notify(severity: Severity, message: string, context?: Record<string, unknown>): Promise<void>;
}

export interface NotificationConfig {
  enabled: boolean;
  channels: readonly NotificationChannelConfig[];
  minSeverity: Severity;
}

export interface NotificationPayload {
  timestamp: string;
  severity: Severity;
  message: string;
  context?: Record<string, unknown>;
  source: string;
}

export interface MailMessage {
  from: string;
  to: string;
  subject: string;
  text: string;
}

/** The part of a nodemailer transporter the sink uses */
export interface MailTransport {
  sendMail(message: MailMessage): Promise<unknown>;
}

export type MailTransportFactory = (channel: NotificationChannelConfig) => MailTransport;

export const smtpTransport: MailTransportFactory = (channel) =>
  nodemailer.createTransport({
    host: channel.host,
    port: channel.port ?? 587,
    secure: channel.secure ?? false,
  });

const DEFAULT_NOTIFICATION_CONFIG: NotificationConfig = {
  enabled: true,
  channels: [{ type: "log" }],
  minSeverity: "warning",
};

// =============================================================================
// CompositeNotificationSink
// =============================================================================

export class CompositeNotificationSink implements NotificationSink {
  private readonly config: NotificationConfig;
  private readonly logger: Logger;
  private readonly transports = new Map<NotificationChannelConfig, MailTransport>();

  constructor(
    config?: Partial<NotificationConfig>,
    private readonly source = "ops-hub",
    logger?: Logger,
    private readonly createTransport: MailTransportFactory = smtpTransport,
  ) {
    this.config = { ...DEFAULT_NOTIFICATION_CONFIG, ...config };
    this.logger = logger ?? createLogger("notification-sink");
  }

  async notify(
    severity: Severity,
    message: string,
    context?: Record<string, unknown>,
  ): Promise<void> {
    if (!this.config.enabled) {
      return;
    }
    if (SEVERITY_RANK[severity] < SEVERITY_RANK[this.config.minSeverity]) {
      return;
    }

    const payload: NotificationPayload = {
      timestamp: new Date().toISOString(),
      severity,
      message,
      context,
      source: this.source,
    };

    const results = await Promise.allSettled(
      this.config.channels.map((channel) => this.sendToChannel(channel, payload)),
    );

    results.forEach((result, index) => {
      if (result.status === "rejected") {
        const channel = this.config.channels[index];
        const target = channel.url ? sanitizeWebhookUrl(channel.url) : (channel.host ?? "N/A");
        const errorMessage =
          result.reason instanceof Error ? result.reason.message : String(result.reason);
        this.logger.error(`Failed to send to ${channel.type} (${target}): ${errorMessage}`);
      }
    });
  }

  private async sendToChannel(
    channel: NotificationChannelConfig,
    payload: NotificationPayload,
  ): Promise<void> {
    switch (channel.type) {
      case "slack":
        await this.sendSlack(channel, payload);
        break;
      case "webhook":
        await this.post(channel, payload, "Webhook");
        break;
      case "email":
        await this.sendEmail(channel, payload);
        break;
      case "log":
        this.sendLog(payload);
        break;
    }
  }

  private async sendEmail(
    channel: NotificationChannelConfig,
    payload: NotificationPayload,
  ): Promise<void> {
    if (!channel.host || !channel.from || !channel.to) {
      throw new Error("Email channel requires host, from and to");
    }
    let transport = this.transports.get(channel);
    if (!transport) {
      transport = this.createTransport(channel);
      this.transports.set(channel, transport);
    }

    const details = Object.entries(payload.context ?? {}).map(
      ([key, value]) => `${key}: ${String(value)}`,
    );
    const text = [
      payload.message,
      "",
      ...(details.length > 0 ? [...details, ""] : []),
      "--",
      `${payload.source} | ${payload.timestamp}`,
    ].join("\n");

    await transport.sendMail({
      from: channel.from,
      to: channel.to.join(", "),
      subject: `[${payload.severity.toUpperCase()}] ${payload.message}`,
      text,
    });
  }

  private async sendSlack(
    channel: NotificationChannelConfig,
    payload: NotificationPayload,
  ): Promise<void> {
    const emoji =
      payload.severity === "critical"
        ? ":rotating_light:"
        : payload.severity === "warning"
          ? ":warning:"
          : ":information_source:";

    await this.post(
      channel,
      {
        text: `${emoji} *${payload.severity.toUpperCase()}*: ${payload.message}`,
        attachments: payload.context
          ? [
              {
                color:
                  payload.severity === "critical"
                    ? "#ff0000"
                    : payload.severity === "warning"
                      ? "#ffaa00"
                      : "#00aaff",
                fields: Object.entries(payload.context).map(([key, value]) => ({
                  title: key,
                  value: String(value),
                  short: true,
                })),
                footer: `${payload.source} | ${payload.timestamp}`,
              },
            ]
          : undefined,
        channel: channel.channel,
      },
      "Slack",
    );
  }

  private async post(
    channel: NotificationChannelConfig,
    body: unknown,
    label: string,
  ): Promise<void> {
    if (!channel.url) {
      throw new Error(`${label} channel requires url`);
    }
    const response = await fetch(channel.url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });
    if (!response.ok) {
      throw new Error(`${label} error: ${response.status} ${response.statusText}`);
    }
  }

  private sendLog(payload: NotificationPayload): void {
    const line = `[${payload.severity.toUpperCase()}] ${payload.message}`;
    if (payload.severity === "critical") {
      this.logger.error(line, payload.context ?? "");
    } else if (payload.severity === "warning") {
      this.logger.warn(line, payload.context ?? "");
    } else {
      this.logger.info(line, payload.context ?? "");
    }
  }
}

// =============================================================================
// Null Sink
// =============================================================================

export class NullNotificationSink implements NotificationSink {
  async notify(): Promise<void> {
    // No-op
  }
}

// =============================================================================
// Helpers
// =============================================================================

export function createNotificationSink(
  config?: Partial<NotificationConfig>,
  logger?: Logger,
): NotificationSink {
  if (config?.enabled === false) {
    return new NullNotificationSink();
  }
  return new CompositeNotificationSink(config, "ops-hub", logger);
}

/**
 * Page for a critical alert.
 */
export async function pageAlert(sink: NotificationSink, alert: Alert): Promise<void> {
  await sink.notify(alert.severity, `${alert.title}: ${alert.description}`, {
    alertId: alert.id,
    source: alert.source,
    assignedTo: alert.assignedTo ?? "unassigned",
    tags: alert.tags.join(", "),
  });
}
