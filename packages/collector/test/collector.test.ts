import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import test from "node:test";

import Database from "better-sqlite3";

import { InMemoryNarrativeSink, InMemoryStructuredSink, SqliteMetricSink } from "../../platform/src";
import type { StructuredMetricSink } from "../../platform/src";
import { PersistenceError, toMetricEntry, ValidationError } from "../../schema/src";
import type { EventRecord, MetricsError } from "../../schema/src";
import { createSequenceClock, createStepClock, PerformanceCollector, tryLog, ZERO_SNAPSHOT } from "../src";

function createTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "summarizer-perf-collector-test-"));
}

// Leaves one Inference row whose extra lacks the model and throughput keys.
function seedMalformedRow(dbPath: string): void {
  new SqliteMetricSink(dbPath).close();
  const db = new Database(dbPath);
  db.prepare(
    "INSERT INTO metric_entries (kind, subject, timestamp, duration_seconds, input_size, output_size, extra) VALUES (?, ?, ?, ?, ?, ?, ?)"
  ).run("Inference", "chunk_1", "2026-03-02T09:00:00.000Z", 1, 54, 54, "{}");
  db.close();
}

const MALFORMED_ROW_MESSAGE =
  "sqlite_metric_entries row 1 is malformed: extra.model: must be a string; " +
  "extra.throughput: must be a non-negative number";

class FailingStructuredSink implements StructuredMetricSink {
  public readonly name = "failing_sink";

  public append(): void {
    throw new Error("disk full");
  }

  public *records(): IterableIterator<EventRecord> {}

  public count(): number {
    return 0;
  }

  public close(): void {}
}

test("logModelLoading records a single model load", () => {
  const collector = new PerformanceCollector({ clock: createStepClock() });
  const record = collector.logModelLoading("t5-small", 3.5869, "cpu");

  assert.equal(record.timestamp, "2026-03-02T09:00:00.000Z");
  assert.deepEqual(collector.summary("ModelLoad", "t5-small"), {
    count: 1,
    totalDuration: 3.5869,
    averageDuration: 3.5869,
    minDuration: 3.5869,
    maxDuration: 3.5869,
    successCount: 1,
    errorCount: 0,
    errorRate: 0
  });
});

test("inference durations for one subject average across calls", () => {
  const collector = new PerformanceCollector({ clock: createStepClock() });
  [0.5, 1.25, 2, 0.75].forEach((duration) => {
    collector.logInferencePerformance("t5-small", duration, 54, 54, "chunk_1");
  });

  const snapshot = collector.summary("Inference", "chunk_1");
  assert.equal(snapshot.count, 4);
  assert.ok(Math.abs(snapshot.averageDuration - 1.125) < 1e-9);
  assert.equal(snapshot.minDuration, 0.5);
  assert.equal(snapshot.maxDuration, 2);
});

test("inference without a chunk id is keyed by model", () => {
  const collector = new PerformanceCollector({ clock: createStepClock() });
  const record = collector.logInferencePerformance("t5-small", 1, 10, 5);

  assert.equal(record.subject, "t5-small");
  assert.equal(collector.summary("Inference", "t5-small").count, 1);
});

test("failed inference calls raise the error rate", () => {
  const collector = new PerformanceCollector({ clock: createStepClock() });
  for (let index = 0; index < 8; index += 1) {
    collector.logInferencePerformance("t5-small", 1, 54, 54, "chunk_1");
  }
  collector.logInferencePerformance("t5-small", 1, 54, 0, "chunk_1", { failed: true });
  collector.logInferencePerformance("t5-small", 1, 54, 0, "chunk_1", { failed: true });

  const snapshot = collector.summary("Inference", "chunk_1");
  assert.equal(snapshot.successCount, 8);
  assert.equal(snapshot.errorCount, 2);
  assert.equal(snapshot.errorRate, 0.2);
});

test("logError counts every call as a failure", () => {
  const collector = new PerformanceCollector({ clock: createStepClock() });
  const record = collector.logError("API_ERROR", "upstream timeout", { endpoint: "/summarize" });

  assert.deepEqual(record.extra, { endpoint: "/summarize", message: "upstream timeout" });
  assert.equal(record.durationSeconds, 0);
  assert.equal(collector.summary("Error", "API_ERROR").errorRate, 1);
});

test("a chunk inference followed by the run total lands in export with a zero run error rate", () => {
  const collector = new PerformanceCollector({ clock: createStepClock() });
  collector.logInferencePerformance("t5-small", 1.9426, 54, 54, "chunk_1");
  collector.logTotalProcessing(3.0424, 2, 2, 0);

  assert.equal(collector.summary("TotalProcessing").count, 1);
  const entries = [...collector.export()].map((record) => toMetricEntry(record));
  assert.deepEqual(
    entries.map((entry) => entry.kind),
    ["Inference", "TotalProcessing"]
  );
  assert.equal(entries[1]?.extra["error_rate"], 0);
  assert.equal(entries[1]?.extra["average_chunk_seconds"], 3.0424 / 2);
});

test("preprocessing is keyed by operation", () => {
  const collector = new PerformanceCollector({ clock: createStepClock() });
  collector.logPreprocessing(0.5, 1000, 3, "full_pipeline");

  assert.equal(collector.summary("Preprocessing", "full_pipeline").count, 1);
  assert.equal(collector.summary("Preprocessing", "chunking").count, 0);
});

test("a negative duration is rejected and nothing is counted or stored", () => {
  const collector = new PerformanceCollector({ clock: createStepClock() });

  assert.throws(
    () => collector.logInferencePerformance("t5-small", -1, 54, 54, "chunk_1"),
    (error: unknown) =>
      error instanceof ValidationError &&
      error.issues.length === 1 &&
      error.issues[0] === "durationSeconds: must be a non-negative finite number"
  );
  assert.deepEqual(collector.getPerformanceSummary().buckets, []);
  assert.deepEqual([...collector.export()], []);
});

test("non-finite and fractional counts are rejected", () => {
  const collector = new PerformanceCollector({ clock: createStepClock() });

  assert.throws(() => collector.logModelLoading("t5-small", Number.NaN, "cpu"), ValidationError);
  assert.throws(() => collector.logTotalProcessing(1, 2.5, 2, 0), ValidationError);
  assert.throws(() => collector.logPreprocessing(1, -3, 1, "chunking"), ValidationError);
  assert.equal(collector.getPerformanceSummary().overview.totalEvents, 0);
});

test("export returns the same sequence when called twice", () => {
  const collector = new PerformanceCollector({ clock: createStepClock() });
  collector.logModelLoading("t5-small", 3, "cpu");
  collector.logPreprocessing(0.5, 1000, 3, "full_pipeline");
  collector.logInferencePerformance("t5-small", 1, 54, 54, "chunk_1");
  collector.logInferencePerformance("t5-small", 1, 54, 54, "chunk_2");
  collector.logTotalProcessing(2.5, 2, 2, 0);

  const first = [...collector.export()];
  const second = [...collector.export()];

  assert.equal(first.length, 5);
  assert.deepEqual(second, first);
  assert.deepEqual(
    first.map((record) => record.timestamp),
    [
      "2026-03-02T09:00:00.000Z",
      "2026-03-02T09:00:01.000Z",
      "2026-03-02T09:00:02.000Z",
      "2026-03-02T09:00:03.000Z",
      "2026-03-02T09:00:04.000Z"
    ]
  );
});

test("timestamps never go backwards when the wall clock does", () => {
  const collector = new PerformanceCollector({ clock: createSequenceClock([2000, 1000, 3000]) });
  const timestamps = [
    collector.logModelLoading("a", 1, "cpu").timestamp,
    collector.logModelLoading("b", 1, "cpu").timestamp,
    collector.logModelLoading("c", 1, "cpu").timestamp
  ];

  assert.deepEqual(timestamps, [
    "1970-01-01T00:00:02.000Z",
    "1970-01-01T00:00:02.000Z",
    "1970-01-01T00:00:03.000Z"
  ]);
});

test("interleaved tasks lose no events", async () => {
  const tempDir = createTempDir();
  const dbPath = path.join(tempDir, "metrics.db");
  const collector = new PerformanceCollector({
    clock: createStepClock(),
    openStructuredSink: () => new SqliteMetricSink(dbPath)
  });

  try {
    await Promise.all(
      Array.from({ length: 10 }, async (_, task) => {
        for (let index = 0; index < 25; index += 1) {
          await new Promise<void>((resolve) => setImmediate(resolve));
          collector.logInferencePerformance("t5-small", 0.01, task + 1, 5, "chunk_shared");
        }
      })
    );

    assert.equal(collector.summary("Inference", "chunk_shared").count, 250);
    assert.equal([...collector.export()].length, 250);
  } finally {
    collector.shutdown();
    fs.rmSync(tempDir, { recursive: true, force: true });
  }
});

test("getPerformanceSummary on a fresh collector is empty", () => {
  const collector = new PerformanceCollector({ clock: createStepClock() });
  const summary = collector.getPerformanceSummary();

  assert.equal(summary.generatedAt, "2026-03-02T09:00:00.000Z");
  assert.deepEqual(summary.buckets, []);
  assert.equal(summary.overview.totalEvents, 0);
  assert.equal(summary.overview.errorRate, 0);
  assert.deepEqual(summary.overview.kinds.Inference, ZERO_SNAPSHOT);
});

test("narrative sinks receive one line per event", () => {
  const narrative = new InMemoryNarrativeSink();
  const collector = new PerformanceCollector({
    clock: createStepClock(),
    openNarrativeSinks: () => [narrative]
  });
  collector.logModelLoading("t5-small", 3.5869, "cpu");
  collector.logTotalProcessing(3.0424, 2, 2, 0);

  assert.deepEqual(narrative.lines(), [
    "2026-03-02T09:00:00.000Z - ModelLoad - t5-small - 3.5869s - device=cpu",
    "2026-03-02T09:00:01.000Z - TotalProcessing - - - 3.0424s - chunks=2 success=2 errors=0 (0.0%) avg_per_chunk=1.5212s"
  ]);
});

test("a failing sink raises PersistenceError after the event is counted", () => {
  const collector = new PerformanceCollector({
    clock: createStepClock(),
    openStructuredSink: () => new FailingStructuredSink()
  });

  assert.throws(
    () => collector.logModelLoading("t5-small", 3, "cpu"),
    (error: unknown) => error instanceof PersistenceError && error.sink === "failing_sink"
  );
  assert.equal(collector.summary("ModelLoad", "t5-small").count, 1);
});

test("a store that cannot be replayed keeps counting live calls", () => {
  const tempDir = createTempDir();
  const dbPath = path.join(tempDir, "metrics.db");
  seedMalformedRow(dbPath);
  const collector = new PerformanceCollector({
    clock: createStepClock(),
    hydrateOnInit: true,
    openStructuredSink: () => new SqliteMetricSink(dbPath)
  });
  const reported: MetricsError[] = [];

  try {
    for (let index = 0; index < 5; index += 1) {
      tryLog(
        () => collector.logModelLoading("t5-small", 1, "cpu"),
        (error) => {
          reported.push(error);
        }
      );
    }

    assert.equal(collector.summary("ModelLoad", "t5-small").count, 5);
    assert.equal(reported.length, 5);
    assert.equal(
      reported.every((error) => error instanceof PersistenceError && error.operation === "hydrate"),
      true
    );
    assert.equal(collector.getState(), "idle");
    assert.throws(
      () => collector.init(),
      (error: unknown) =>
        error instanceof PersistenceError &&
        error.sink === "sqlite_metric_entries" &&
        error.message === `sqlite_metric_entries hydrate failed: sqlite_metric_entries read failed: ${MALFORMED_ROW_MESSAGE}`
    );
  } finally {
    fs.rmSync(tempDir, { recursive: true, force: true });
  }
});

test("reading a malformed stored row raises PersistenceError", () => {
  const tempDir = createTempDir();
  const dbPath = path.join(tempDir, "metrics.db");
  seedMalformedRow(dbPath);
  const collector = new PerformanceCollector({
    clock: createStepClock(),
    openStructuredSink: () => new SqliteMetricSink(dbPath)
  });
  const reported: MetricsError[] = [];

  try {
    assert.throws(
      () => [...collector.export()],
      (error: unknown) =>
        error instanceof PersistenceError &&
        error.sink === "sqlite_metric_entries" &&
        error.operation === "read" &&
        error.message === `sqlite_metric_entries read failed: ${MALFORMED_ROW_MESSAGE}`
    );
    const result = tryLog(
      () => [...collector.export()],
      (error) => {
        reported.push(error);
      }
    );
    assert.equal(result, undefined);
    assert.equal(reported.length, 1);
    assert.throws(() => collector.saveMetricsToFile(path.join(tempDir, "out.json")), PersistenceError);
  } finally {
    collector.shutdown();
    fs.rmSync(tempDir, { recursive: true, force: true });
  }
});

test("an export iterated after shutdown raises PersistenceError", () => {
  const tempDir = createTempDir();
  const dbPath = path.join(tempDir, "metrics.db");
  const collector = new PerformanceCollector({
    clock: createStepClock(),
    openStructuredSink: () => new SqliteMetricSink(dbPath)
  });

  try {
    collector.logModelLoading("t5-small", 3, "cpu");
    const exported = collector.export();
    collector.shutdown();

    assert.throws(
      () => [...exported],
      (error: unknown) => error instanceof PersistenceError && error.operation === "read"
    );
    assert.throws(
      () => collector.export(),
      (error: unknown) =>
        error instanceof PersistenceError &&
        error.message === "collector access failed: collector has been shut down"
    );
  } finally {
    fs.rmSync(tempDir, { recursive: true, force: true });
  }
});

test("a rejected call does not consume a clock reading", () => {
  const collector = new PerformanceCollector({ clock: createSequenceClock([1000, 2000]) });

  assert.throws(() => collector.logModelLoading("t5-small", -1, "cpu"), ValidationError);
  const record = collector.logModelLoading("t5-small", 1, "cpu");

  assert.equal(record.timestamp, "1970-01-01T00:00:01.000Z");
});

test("memory readings travel with model loads and run totals", () => {
  const collector = new PerformanceCollector({ clock: createStepClock() });
  const load = collector.logModelLoading("t5-small", 3.5869, "cpu", { peakMb: 512, currentMb: 256.5, modelMb: 230.25 });
  const total = collector.logTotalProcessing(3.0424, 2, 2, 0, { currentMb: 300 });

  assert.deepEqual(load.extra, {
    model: "t5-small",
    memory_peak_mb: 512,
    memory_current_mb: 256.5,
    memory_model_mb: 230.25
  });
  assert.equal(total.extra.memory_current_mb, 300);
  assert.equal(total.extra.memory_peak_mb, undefined);
  assert.throws(() => collector.logModelLoading("t5-small", 1, "cpu", { peakMb: -5 }), ValidationError);
});

test("a sink that cannot be opened surfaces as PersistenceError", () => {
  const collector = new PerformanceCollector({
    openStructuredSink: () => {
      throw new Error("permission denied");
    }
  });

  assert.throws(
    () => collector.init(),
    (error: unknown) =>
      error instanceof PersistenceError &&
      error.operation === "open" &&
      error.message === "structured_sink open failed: permission denied"
  );
  assert.equal(collector.getState(), "idle");
});

test("reset clears aggregates but keeps stored events", () => {
  const collector = new PerformanceCollector({ clock: createStepClock() });
  collector.logModelLoading("t5-small", 3, "cpu");
  collector.reset();

  assert.deepEqual(collector.summary("ModelLoad", "t5-small"), ZERO_SNAPSHOT);
  assert.equal([...collector.export()].length, 1);
});

test("init is idempotent and shutdown rejects further logging", () => {
  const collector = new PerformanceCollector({ clock: createStepClock() });

  assert.deepEqual(collector.init(), { hydratedEvents: 0 });
  assert.deepEqual(collector.init(), { hydratedEvents: 0 });
  assert.equal(collector.getState(), "open");

  collector.shutdown();
  collector.shutdown();
  assert.equal(collector.getState(), "closed");
  assert.throws(() => collector.logModelLoading("t5-small", 3, "cpu"), PersistenceError);
  assert.throws(() => collector.init(), PersistenceError);
});

test("shutdown writes the snapshot file", () => {
  const tempDir = createTempDir();
  const snapshotPath = path.join(tempDir, "performance_metrics.json");
  const collector = new PerformanceCollector({ clock: createStepClock(), snapshotPath });
  collector.logModelLoading("t5-small", 3.5869, "cpu");

  try {
    collector.shutdown();
    const entries: unknown = JSON.parse(fs.readFileSync(snapshotPath, "utf8"));
    assert.deepEqual(entries, [
      {
        kind: "ModelLoad",
        subject: "t5-small",
        timestamp: "2026-03-02T09:00:00.000Z",
        duration_seconds: 3.5869,
        device: "cpu",
        extra: { model: "t5-small" }
      }
    ]);
  } finally {
    fs.rmSync(tempDir, { recursive: true, force: true });
  }
});

test("saveMetricsToFile writes to the given path and returns it", () => {
  const tempDir = createTempDir();
  const target = path.join(tempDir, "out", "metrics.json");
  const collector = new PerformanceCollector({ clock: createStepClock() });
  collector.logError("API_ERROR", "timeout");
  collector.logError("API_ERROR", "timeout");

  try {
    assert.equal(collector.saveMetricsToFile(target), target);
    const entries: unknown = JSON.parse(fs.readFileSync(target, "utf8"));
    assert.equal(Array.isArray(entries) ? entries.length : -1, 2);
  } finally {
    fs.rmSync(tempDir, { recursive: true, force: true });
  }
});

test("a new collector rebuilds aggregates from the sqlite store on init", () => {
  const tempDir = createTempDir();
  const dbPath = path.join(tempDir, "metrics.db");

  try {
    const first = new PerformanceCollector({
      clock: createStepClock(),
      openStructuredSink: () => new SqliteMetricSink(dbPath)
    });
    first.logModelLoading("t5-small", 3, "cpu");
    first.logInferencePerformance("t5-small", 1, 54, 54, "chunk_1");
    first.logInferencePerformance("t5-small", 2, 54, 0, "chunk_1", { failed: true });
    first.shutdown();

    const second = new PerformanceCollector({
      clock: createStepClock(),
      hydrateOnInit: true,
      openStructuredSink: () => new SqliteMetricSink(dbPath)
    });
    assert.deepEqual(second.init(), { hydratedEvents: 3 });
    const snapshot = second.summary("Inference", "chunk_1");
    assert.equal(snapshot.count, 2);
    assert.equal(snapshot.averageDuration, 1.5);
    assert.equal(snapshot.errorRate, 0.5);
    second.shutdown();
  } finally {
    fs.rmSync(tempDir, { recursive: true, force: true });
  }
});

test("tryLog hands metrics failures to the callback and rethrows anything else", () => {
  const collector = new PerformanceCollector({ clock: createStepClock() });
  const reported: MetricsError[] = [];

  const result = tryLog(
    () => collector.logModelLoading("t5-small", -1, "cpu"),
    (error) => {
      reported.push(error);
    }
  );

  assert.equal(result, undefined);
  assert.equal(reported.length, 1);
  assert.ok(reported[0] instanceof ValidationError);
  assert.equal(
    tryLog(() => collector.logModelLoading("t5-small", 1, "cpu"))?.subject,
    "t5-small"
  );
  assert.throws(
    () =>
      tryLog(() => {
        throw new TypeError("not a metrics failure");
      }),
    TypeError
  );
});

test("a plain in-memory sink can be shared through the factory", () => {
  const structured = new InMemoryStructuredSink();
  const collector = new PerformanceCollector({ clock: createStepClock(), openStructuredSink: () => structured });
  collector.logModelLoading("t5-small", 3, "cpu");

  assert.equal(structured.count(), 1);
});
