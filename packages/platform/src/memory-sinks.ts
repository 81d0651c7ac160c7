import type { EventRecord } from "../../schema/src/types";
import type { NarrativeSink, StructuredMetricSink } from "./persistence-types";

export class InMemoryStructuredSink implements StructuredMetricSink {
  public readonly name = "memory_metric_entries";
  private readonly stored: EventRecord[] = [];

  public append(record: EventRecord): void {
    this.stored.push(record);
  }

  public *records(): IterableIterator<EventRecord> {
    const length = this.stored.length;
    for (let index = 0; index < length; index += 1) {
      const record = this.stored[index];
      if (record !== undefined) {
        yield record;
      }
    }
  }

  public count(): number {
    return this.stored.length;
  }

  public close(): void {}
}

export class InMemoryNarrativeSink implements NarrativeSink {
  public readonly name = "memory_narrative_log";
  private readonly written: string[] = [];

  public write(line: string): void {
    this.written.push(line);
  }

  public lines(): readonly string[] {
    return [...this.written];
  }

  public close(): void {}
}
