import type { EventRecord } from "../../schema/src/types";

export interface StructuredMetricSink {
  readonly name: string;
  append(record: EventRecord): void;
  /** Lazily yields every stored record in insertion order. Each call starts over. */
  records(): IterableIterator<EventRecord>;
  count(): number;
  close(): void;
}

export interface NarrativeSink {
  readonly name: string;
  write(line: string): void;
  close(): void;
}

export interface SqliteMetricSinkOptions {
  readonly tableName?: string;
}
