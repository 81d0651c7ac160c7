import type { EventKind, EventRecord } from "../../schema/src/types";
import type { NarrativeSink, StructuredMetricSink } from "../../platform/src/persistence-types";

export interface AggregateBucket {
  readonly kind: EventKind;
  readonly subject: string;
  readonly count: number;
  readonly sumDuration: number;
  readonly minDuration: number;
  readonly maxDuration: number;
  readonly successCount: number;
  readonly errorCount: number;
}

export interface MetricSnapshot {
  readonly count: number;
  readonly totalDuration: number;
  readonly averageDuration: number;
  readonly minDuration: number;
  readonly maxDuration: number;
  readonly successCount: number;
  readonly errorCount: number;
  readonly errorRate: number;
}

export interface BucketSummary extends MetricSnapshot {
  readonly kind: EventKind;
  readonly subject: string;
}

export interface PerformanceOverview {
  readonly kinds: Readonly<Record<EventKind, MetricSnapshot>>;
  readonly totalEvents: number;
  readonly errorRate: number;
}

export interface PerformanceSummary {
  readonly generatedAt: string;
  readonly buckets: readonly BucketSummary[];
  readonly overview: PerformanceOverview;
}

export interface MetricStoreOptions {
  readonly structured: StructuredMetricSink;
  readonly narrative?: readonly NarrativeSink[];
}

export type CollectorState = "idle" | "open" | "closed";

export interface PerformanceCollectorOptions {
  /** Called once by init(); defaults to an in-memory sink. */
  readonly openStructuredSink?: () => StructuredMetricSink;
  readonly openNarrativeSinks?: () => readonly NarrativeSink[];
  /** Wall clock in epoch milliseconds. */
  readonly clock?: () => number;
  readonly snapshotPath?: string;
  readonly hydrateOnInit?: boolean;
}

export interface CollectorInitResult {
  readonly hydratedEvents: number;
}

export interface Timer {
  readonly startedAtMs: number;
  elapsedSeconds(): number;
}

export interface MeasuredResult<TResult> {
  readonly result: TResult;
  readonly durationSeconds: number;
}

export type RecordBuilder<TRecord extends EventRecord> = (timestamp: () => string) => TRecord;
