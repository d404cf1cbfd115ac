export type { MetricSource, MetricSourceOperation } from "./metric-source.js";
export {
  IDLE_READING,
  StaticMetricSource,
  type SampleReading,
  type UsageReading,
} from "./static-metric-source.js";
export {
  HostMetricSource,
  parseNetDev,
  type HostMetricSourceOptions,
} from "./host-metric-source.js";
