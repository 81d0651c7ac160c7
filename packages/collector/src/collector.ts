import { isMetricsError, PersistenceError } from "../../schema/src/errors";
import type { MetricsError } from "../../schema/src/errors";
import {
  createErrorRecord,
  createInferenceRecord,
  createModelLoadRecord,
  createPreprocessingRecord,
  createTotalProcessingRecord
} from "../../schema/src/records";
import type {
  ErrorRecord,
  EventKind,
  EventRecord,
  InferenceRecord,
  MemoryReading,
  MetricExtra,
  ModelLoadRecord,
  PreprocessingRecord,
  TotalProcessingRecord
} from "../../schema/src/types";
import { InMemoryStructuredSink } from "../../platform/src/memory-sinks";
import type { NarrativeSink, StructuredMetricSink } from "../../platform/src/persistence-types";
import { Aggregator } from "./aggregator";
import { MetricStore } from "./metric-store";
import { Reporter } from "./reporter";
import type {
  CollectorInitResult,
  CollectorState,
  MetricSnapshot,
  PerformanceCollectorOptions,
  PerformanceSummary,
  RecordBuilder
} from "./types";

export const DEFAULT_SNAPSHOT_FILE = "performance_metrics.json";

function shutDownError(): PersistenceError {
  return new PersistenceError("collector", new Error("collector has been shut down"), "access");
}

function openSinks(options: PerformanceCollectorOptions): MetricStore {
  let structured: StructuredMetricSink;
  try {
    structured = options.openStructuredSink !== undefined ? options.openStructuredSink() : new InMemoryStructuredSink();
  } catch (error: unknown) {
    throw new PersistenceError("structured_sink", error, "open");
  }

  let narrative: readonly NarrativeSink[];
  try {
    narrative = options.openNarrativeSinks !== undefined ? options.openNarrativeSinks() : [];
  } catch (error: unknown) {
    structured.close();
    throw new PersistenceError("narrative_sink", error, "open");
  }

  return new MetricStore({ structured, narrative });
}

/**
 * Entry point for instrumented call sites. Every log method validates its input,
 * counts the event in memory and appends it to the store, in that order, without
 * yielding, so concurrent tasks never interleave inside one call.
 *
 * Throws ValidationError when the input is malformed (nothing counted) and
 * PersistenceError when a sink failed (the event is already counted).
 */
export class PerformanceCollector {
  private readonly options: PerformanceCollectorOptions;
  private readonly clock: () => number;
  private readonly aggregator: Aggregator;
  private readonly reporter: Reporter;
  private store: MetricStore | undefined;
  private state: CollectorState;
  private lastTimestampMs: number;

  public constructor(options: PerformanceCollectorOptions = {}) {
    this.options = options;
    this.clock = options.clock ?? Date.now;
    this.aggregator = new Aggregator();
    this.reporter = new Reporter(this.aggregator);
    this.store = undefined;
    this.state = "idle";
    this.lastTimestampMs = Number.NEGATIVE_INFINITY;
  }

  public getState(): CollectorState {
    return this.state;
  }

  public init(): CollectorInitResult {
    if (this.state === "open") {
      return { hydratedEvents: 0 };
    }
    if (this.state === "closed") {
      throw shutDownError();
    }

    const store = openSinks(this.options);
    let hydratedEvents = 0;
    if (this.options.hydrateOnInit === true) {
      // Replayed separately so a failed replay leaves live counts untouched.
      const replayed = new Aggregator();
      try {
        hydratedEvents = replayed.replay(store.export());
      } catch (error: unknown) {
        store.close();
        throw new PersistenceError(store.structuredSinkName(), error, "hydrate");
      }
      this.aggregator.absorb(replayed);
    }

    this.store = store;
    this.state = "open";
    return { hydratedEvents };
  }

  public shutdown(): void {
    const store = this.store;
    const wasOpen = this.state === "open";
    this.state = "closed";
    this.store = undefined;
    if (!wasOpen || store === undefined) {
      return;
    }

    const failures: unknown[] = [];
    if (this.options.snapshotPath !== undefined) {
      try {
        store.writeSnapshot(this.options.snapshotPath);
      } catch (error: unknown) {
        failures.push(error);
      }
    }
    try {
      store.close();
    } catch (error: unknown) {
      failures.push(error);
    }

    const [first] = failures;
    if (failures.length === 1 && first instanceof PersistenceError) {
      throw first;
    }
    if (failures.length > 0) {
      throw new PersistenceError("collector", new AggregateError(failures, "sinks failed during shutdown"), "close");
    }
  }

  public logModelLoading(
    modelId: string,
    durationSeconds: number,
    device: string,
    memory?: MemoryReading
  ): ModelLoadRecord {
    return this.route((timestamp) =>
      createModelLoadRecord(timestamp, {
        modelId,
        durationSeconds,
        device,
        ...(memory !== undefined ? { memory } : {})
      })
    );
  }

  public logInferencePerformance(
    modelId: string,
    durationSeconds: number,
    inputLength: number,
    outputLength: number,
    subject?: string,
    metadata?: MetricExtra
  ): InferenceRecord {
    return this.route((timestamp) =>
      createInferenceRecord(timestamp, {
        modelId,
        durationSeconds,
        inputLength,
        outputLength,
        ...(subject !== undefined ? { subject } : {}),
        ...(metadata !== undefined ? { metadata } : {})
      })
    );
  }

  public logPreprocessing(
    durationSeconds: number,
    textLength: number,
    chunkCount: number,
    operation: string,
    metadata?: MetricExtra
  ): PreprocessingRecord {
    return this.route((timestamp) =>
      createPreprocessingRecord(timestamp, {
        durationSeconds,
        textLength,
        chunkCount,
        operation,
        ...(metadata !== undefined ? { metadata } : {})
      })
    );
  }

  public logTotalProcessing(
    durationSeconds: number,
    chunkCount: number,
    successCount: number,
    errorCount: number,
    memory?: MemoryReading
  ): TotalProcessingRecord {
    return this.route((timestamp) =>
      createTotalProcessingRecord(timestamp, {
        durationSeconds,
        chunkCount,
        successCount,
        errorCount,
        ...(memory !== undefined ? { memory } : {})
      })
    );
  }

  public logError(context: string, message: string, metadata?: MetricExtra, durationSeconds = 0): ErrorRecord {
    return this.route((timestamp) =>
      createErrorRecord(timestamp, {
        context,
        message,
        durationSeconds,
        ...(metadata !== undefined ? { metadata } : {})
      })
    );
  }

  public summary(kind: EventKind, subject?: string): MetricSnapshot {
    return this.reporter.summary(kind, subject);
  }

  public getPerformanceSummary(): PerformanceSummary {
    return {
      generatedAt: new Date(this.clock()).toISOString(),
      buckets: this.reporter.summaryAll(),
      overview: this.reporter.overview()
    };
  }

  public export(): Iterable<EventRecord> {
    return this.requireStore().export();
  }

  public saveMetricsToFile(filePath?: string): string {
    const target = filePath ?? this.options.snapshotPath ?? DEFAULT_SNAPSHOT_FILE;
    this.requireStore().writeSnapshot(target);
    return target;
  }

  public reset(): void {
    this.aggregator.reset();
  }

  private nextTimestamp(): string {
    this.lastTimestampMs = Math.max(this.lastTimestampMs, this.clock());
    return new Date(this.lastTimestampMs).toISOString();
  }

  private requireStore(): MetricStore {
    if (this.state === "idle") {
      this.init();
    }
    if (this.state === "closed" || this.store === undefined) {
      throw shutDownError();
    }
    return this.store;
  }

  private route<TRecord extends EventRecord>(build: RecordBuilder<TRecord>): TRecord {
    const record = build(() => this.nextTimestamp());

    let store: MetricStore;
    try {
      store = this.requireStore();
    } catch (error: unknown) {
      this.aggregator.update(record);
      throw error;
    }

    this.aggregator.update(record);
    store.append(record);
    return record;
  }
}

function reportMetricsFailure(error: MetricsError): void {
  console.error(`[summarizer-perf] ${error.name}: ${error.message}`);
}

/**
 * Runs a logging call and keeps metrics failures away from the operation being
 * measured. Anything that is not a metrics error is rethrown.
 */
export function tryLog<TResult>(
  log: () => TResult,
  onError: (error: MetricsError) => void = reportMetricsFailure
): TResult | undefined {
  try {
    return log();
  } catch (error: unknown) {
    if (isMetricsError(error)) {
      onError(error);
      return undefined;
    }
    throw error;
  }
}
