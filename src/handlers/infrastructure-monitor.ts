/**
 * infrastructure_monitor
 *
 * Samples the host and raises one alert per metric whose last
 * `hysteresisSamples` readings all exceed a threshold. A single spike never
 * alerts; fewer readings than the window raise nothing.
 *
 * @module handlers/infrastructure-monitor
 */

import type { InfrastructureMonitorConfig } from "../config/config.js";
import type { AlertDelta, InfrastructureMetric, InfrastructureMetricSample } from "../types.js";
import { emptyResult, type JobHandler } from "./types.js";

export interface InfrastructureSnapshot {
  sample: InfrastructureMetricSample;
  /** Stored samples preceding `sample`, oldest first */
  history: InfrastructureMetricSample[];
}

export const METRIC_LABELS: Record<InfrastructureMetric, { title: string; label: string; tag: string }> = {
  cpuPercent: { title: "High CPU usage", label: "CPU", tag: "cpu" },
  memoryPercent: { title: "High memory usage", label: "Memory", tag: "memory" },
  diskPercent: { title: "High disk usage", label: "Disk", tag: "disk" },
};

const METRICS: readonly InfrastructureMetric[] = ["cpuPercent", "memoryPercent", "diskPercent"];

/**
 * Severity for one metric over the window, or null when no threshold holds
 * for every reading.
 */
export function classifyWindow(
  window: readonly InfrastructureMetricSample[],
  metric: InfrastructureMetric,
  config: Pick<InfrastructureMonitorConfig, "warning" | "critical">,
): "warning" | "critical" | null {
  if (window.length === 0) return null;
  if (window.every((s) => s[metric] > config.critical[metric])) return "critical";
  if (window.every((s) => s[metric] > config.warning[metric])) return "warning";
  return null;
}

export const infrastructureMonitor: JobHandler<InfrastructureSnapshot, InfrastructureMonitorConfig> = {
  name: "infrastructure_monitor",
  kind: "monitoring",

  async collect(context, config) {
    const sample = await context.source.sample();
    const history = await context.store.recentSamples(config.hysteresisSamples - 1);
    return { sample, history };
  },

  evaluate(snapshot, { config }) {
    const window = [...snapshot.history, snapshot.sample].slice(-config.hysteresisSamples);
    const alerts: AlertDelta[] = [];

    if (window.length >= config.hysteresisSamples) {
      for (const metric of METRICS) {
        const severity = classifyWindow(window, metric, config);
        if (!severity) continue;
        const { title, label, tag } = METRIC_LABELS[metric];
        const threshold = config[severity][metric];
        const value = snapshot.sample[metric];
        alerts.push({
          title,
          description:
            `${label} usage is ${value}%, above the ${threshold}% ${severity} threshold ` +
            `for ${window.length} consecutive samples`,
          severity,
          source: "infrastructure_monitor",
          tags: ["infrastructure", tag],
          condition: { type: "metric", metric, threshold: config.warning[metric] },
          metadata: { value, threshold },
        });
      }
    }

    return emptyResult({ alerts, samples: [snapshot.sample] });
  },
};
