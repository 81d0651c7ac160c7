export { Aggregator } from "./aggregator";
export { DEFAULT_SNAPSHOT_FILE, PerformanceCollector, tryLog } from "./collector";
export { sampleMemoryUsage, toMemoryReading } from "./memory";
export type { ProcessMemorySample } from "./memory";
export { MetricStore } from "./metric-store";
export { formatNarrativeLine } from "./narrative";
export { mergeBuckets, Reporter, ZERO_SNAPSHOT } from "./reporter";
export { createSequenceClock, createStepClock, SAMPLE_START_ISO } from "./samples";
export { measure, startTimer } from "./timer";
export type {
  AggregateBucket,
  BucketSummary,
  CollectorInitResult,
  CollectorState,
  MeasuredResult,
  MetricSnapshot,
  MetricStoreOptions,
  PerformanceCollectorOptions,
  PerformanceOverview,
  PerformanceSummary,
  RecordBuilder,
  Timer
} from "./types";
