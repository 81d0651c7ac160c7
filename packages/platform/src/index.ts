export { InMemoryNarrativeSink, InMemoryStructuredSink } from "./memory-sinks";
export { FileNarrativeSink, StreamNarrativeSink } from "./narrative-sinks";
export { SqliteMetricSink } from "./sqlite-metric-sink";
export type { NarrativeSink, SqliteMetricSinkOptions, StructuredMetricSink } from "./persistence-types";
