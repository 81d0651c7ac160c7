import fs from "node:fs";
import path from "node:path";

import { PersistenceError } from "../../schema/src/errors";
import type { PersistenceOperation } from "../../schema/src/errors";
import { toMetricEntry } from "../../schema/src/records";
import type { EventRecord } from "../../schema/src/types";
import type { NarrativeSink, StructuredMetricSink } from "../../platform/src/persistence-types";
import { formatNarrativeLine } from "./narrative";
import type { MetricStoreOptions } from "./types";

interface SinkFailure {
  readonly sink: string;
  readonly error: unknown;
}

function toPersistenceError(
  failures: readonly SinkFailure[],
  operation: PersistenceOperation
): PersistenceError | undefined {
  const [first] = failures;
  if (first === undefined) {
    return undefined;
  }
  if (failures.length === 1) {
    return new PersistenceError(first.sink, first.error, operation);
  }

  return new PersistenceError(
    failures.map((failure) => failure.sink).join(", "),
    new AggregateError(
      failures.map((failure) => failure.error),
      failures.map((failure) => `${failure.sink}: ${String(failure.error)}`).join("; ")
    ),
    operation
  );
}

function* readRecords(sink: StructuredMetricSink): IterableIterator<EventRecord> {
  try {
    yield* sink.records();
  } catch (error: unknown) {
    throw new PersistenceError(sink.name, error, "read");
  }
}

// The structured sink backs export and replay; narrative sinks only get lines.
export class MetricStore {
  private readonly structured: StructuredMetricSink;
  private readonly narrative: readonly NarrativeSink[];

  public constructor(options: MetricStoreOptions) {
    this.structured = options.structured;
    this.narrative = options.narrative ?? [];
  }

  public append(record: EventRecord): void {
    const failures: SinkFailure[] = [];

    try {
      this.structured.append(record);
    } catch (error: unknown) {
      failures.push({ sink: this.structured.name, error });
    }

    if (this.narrative.length > 0) {
      const line = formatNarrativeLine(record);
      this.narrative.forEach((sink) => {
        try {
          sink.write(line);
        } catch (error: unknown) {
          failures.push({ sink: sink.name, error });
        }
      });
    }

    const failure = toPersistenceError(failures, "write");
    if (failure !== undefined) {
      throw failure;
    }
  }

  public structuredSinkName(): string {
    return this.structured.name;
  }

  public export(): Iterable<EventRecord> {
    const structured = this.structured;
    return {
      [Symbol.iterator]: (): Iterator<EventRecord> => readRecords(structured)
    };
  }

  public count(): number {
    try {
      return this.structured.count();
    } catch (error: unknown) {
      throw new PersistenceError(this.structured.name, error, "read");
    }
  }

  public writeSnapshot(filePath: string): number {
    try {
      const entries = [...readRecords(this.structured)].map((record) => toMetricEntry(record));
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      fs.writeFileSync(filePath, `${JSON.stringify(entries, null, 2)}\n`, "utf8");
      return entries.length;
    } catch (error: unknown) {
      if (error instanceof PersistenceError) {
        throw error;
      }
      throw new PersistenceError("metrics_snapshot", error);
    }
  }

  public close(): void {
    const failures: SinkFailure[] = [];
    [this.structured, ...this.narrative].forEach((sink) => {
      try {
        sink.close();
      } catch (error: unknown) {
        failures.push({ sink: sink.name, error });
      }
    });

    const failure = toPersistenceError(failures, "close");
    if (failure !== undefined) {
      throw failure;
    }
  }
}
