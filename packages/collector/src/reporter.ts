import { EVENT_KINDS } from "../../schema/src/constants";
import { computeRate } from "../../schema/src/records";
import type { EventKind } from "../../schema/src/types";
import type { Aggregator } from "./aggregator";
import type { AggregateBucket, BucketSummary, MetricSnapshot, PerformanceOverview } from "./types";

export const ZERO_SNAPSHOT: MetricSnapshot = Object.freeze({
  count: 0,
  totalDuration: 0,
  averageDuration: 0,
  minDuration: 0,
  maxDuration: 0,
  successCount: 0,
  errorCount: 0,
  errorRate: 0
});

export function mergeBuckets(buckets: readonly AggregateBucket[]): MetricSnapshot {
  if (buckets.length === 0) {
    return ZERO_SNAPSHOT;
  }

  let count = 0;
  let totalDuration = 0;
  let minDuration = Number.POSITIVE_INFINITY;
  let maxDuration = 0;
  let successCount = 0;
  let errorCount = 0;
  buckets.forEach((bucket) => {
    count += bucket.count;
    totalDuration += bucket.sumDuration;
    minDuration = Math.min(minDuration, bucket.minDuration);
    maxDuration = Math.max(maxDuration, bucket.maxDuration);
    successCount += bucket.successCount;
    errorCount += bucket.errorCount;
  });

  return {
    count,
    totalDuration,
    averageDuration: computeRate(totalDuration, count),
    minDuration,
    maxDuration,
    successCount,
    errorCount,
    errorRate: computeRate(errorCount, successCount + errorCount)
  };
}

function compareBuckets(left: AggregateBucket, right: AggregateBucket): number {
  const byKind = EVENT_KINDS.indexOf(left.kind) - EVENT_KINDS.indexOf(right.kind);
  if (byKind !== 0) {
    return byKind;
  }
  if (left.subject === right.subject) {
    return 0;
  }
  return left.subject < right.subject ? -1 : 1;
}

export class Reporter {
  private readonly aggregator: Aggregator;

  public constructor(aggregator: Aggregator) {
    this.aggregator = aggregator;
  }

  public summary(kind: EventKind, subject?: string): MetricSnapshot {
    if (subject !== undefined) {
      const bucket = this.aggregator.bucket(kind, subject);
      return bucket === undefined ? ZERO_SNAPSHOT : mergeBuckets([bucket]);
    }

    return mergeBuckets(this.aggregator.buckets().filter((bucket) => bucket.kind === kind));
  }

  public summaryAll(): readonly BucketSummary[] {
    return [...this.aggregator.buckets()].sort(compareBuckets).map((bucket) => ({
      kind: bucket.kind,
      subject: bucket.subject,
      ...mergeBuckets([bucket])
    }));
  }

  public overview(): PerformanceOverview {
    const all = mergeBuckets(this.aggregator.buckets());
    return {
      kinds: {
        ModelLoad: this.summary("ModelLoad"),
        Inference: this.summary("Inference"),
        Preprocessing: this.summary("Preprocessing"),
        TotalProcessing: this.summary("TotalProcessing"),
        Error: this.summary("Error")
      },
      totalEvents: all.count,
      errorRate: all.errorRate
    };
  }
}
