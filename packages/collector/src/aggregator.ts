import { isFailedRecord } from "../../schema/src/records";
import type { EventKind, EventRecord } from "../../schema/src/types";
import type { AggregateBucket } from "./types";

interface MutableBucket {
  kind: EventKind;
  subject: string;
  count: number;
  sumDuration: number;
  minDuration: number;
  maxDuration: number;
  successCount: number;
  errorCount: number;
}

function bucketKey(kind: EventKind, subject: string): string {
  return JSON.stringify([kind, subject]);
}

function copyBucket(bucket: MutableBucket): AggregateBucket {
  return { ...bucket };
}

export class Aggregator {
  private readonly bucketsByKey = new Map<string, MutableBucket>();

  public update(record: EventRecord): void {
    const key = bucketKey(record.kind, record.subject);
    const duration = record.durationSeconds;
    const failed = isFailedRecord(record);
    const existing = this.bucketsByKey.get(key);

    if (existing === undefined) {
      this.bucketsByKey.set(key, {
        kind: record.kind,
        subject: record.subject,
        count: 1,
        sumDuration: duration,
        minDuration: duration,
        maxDuration: duration,
        successCount: failed ? 0 : 1,
        errorCount: failed ? 1 : 0
      });
      return;
    }

    existing.count += 1;
    existing.sumDuration += duration;
    existing.minDuration = Math.min(existing.minDuration, duration);
    existing.maxDuration = Math.max(existing.maxDuration, duration);
    if (failed) {
      existing.errorCount += 1;
    } else {
      existing.successCount += 1;
    }
  }

  public replay(records: Iterable<EventRecord>): number {
    let replayed = 0;
    for (const record of records) {
      this.update(record);
      replayed += 1;
    }
    return replayed;
  }

  public absorb(other: Aggregator): void {
    other.buckets().forEach((incoming) => {
      const key = bucketKey(incoming.kind, incoming.subject);
      const existing = this.bucketsByKey.get(key);
      if (existing === undefined) {
        this.bucketsByKey.set(key, { ...incoming });
        return;
      }
      existing.count += incoming.count;
      existing.sumDuration += incoming.sumDuration;
      existing.minDuration = Math.min(existing.minDuration, incoming.minDuration);
      existing.maxDuration = Math.max(existing.maxDuration, incoming.maxDuration);
      existing.successCount += incoming.successCount;
      existing.errorCount += incoming.errorCount;
    });
  }

  public bucket(kind: EventKind, subject: string): AggregateBucket | undefined {
    const bucket = this.bucketsByKey.get(bucketKey(kind, subject));
    return bucket === undefined ? undefined : copyBucket(bucket);
  }

  public buckets(): readonly AggregateBucket[] {
    return [...this.bucketsByKey.values()].map((bucket) => copyBucket(bucket));
  }

  public reset(): void {
    this.bucketsByKey.clear();
  }
}
