export {
  ALERT_TRANSITIONS,
  OPEN_STATUSES,
  SEVERITY_RANK,
  canTransition,
  maxSeverity,
  nextAlertStatus,
  type AlertAction,
} from "./alert-state.js";
export { alertDedupKey, alertId, normalizeTitle, severityClass, type SeverityClass } from "./dedup.js";
export {
  AlertRouter,
  timeOfDayTags,
  type AlertRouterOptions,
  type IngestAction,
  type IngestResult,
  type TransitionResult,
} from "./alert-router.js";
export {
  CompositeNotificationSink,
  NullNotificationSink,
  createNotificationSink,
  pageAlert,
  sanitizeWebhookUrl,
  smtpTransport,
  type MailMessage,
  type MailTransport,
  type MailTransportFactory,
  type NotificationConfig,
  type NotificationPayload,
  type NotificationSink,
} from "./notification-sink.js";
