import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import test from "node:test";

import { InMemoryNarrativeSink, InMemoryStructuredSink } from "../../platform/src";
import type { NarrativeSink, StructuredMetricSink } from "../../platform/src";
import { createInferenceRecord, createModelLoadRecord, PersistenceError } from "../../schema/src";
import type { EventRecord } from "../../schema/src";
import { MetricStore } from "../src";

const TIMESTAMP = "2026-03-02T09:00:00.000Z";

class RejectingStructuredSink implements StructuredMetricSink {
  public readonly name = "rejecting_structured";

  public append(): void {
    throw new Error("disk full");
  }

  public *records(): IterableIterator<EventRecord> {}

  public count(): number {
    return 0;
  }

  public close(): void {
    throw new Error("close failed");
  }
}

class RejectingNarrativeSink implements NarrativeSink {
  public readonly name = "rejecting_narrative";

  public write(): void {
    throw new Error("log rotated away");
  }

  public close(): void {}
}

class UnreadableStructuredSink implements StructuredMetricSink {
  public readonly name = "unreadable_structured";

  public append(): void {}

  public records(): IterableIterator<EventRecord> {
    throw new Error("page checksum mismatch");
  }

  public count(): number {
    throw new Error("database is locked");
  }

  public close(): void {}
}

function modelLoad(modelId: string): EventRecord {
  return createModelLoadRecord(TIMESTAMP, { modelId, durationSeconds: 3.5869, device: "cpu" });
}

test("metric store appends to the structured sink and every narrative sink", () => {
  const structured = new InMemoryStructuredSink();
  const narrative = new InMemoryNarrativeSink();
  const store = new MetricStore({ structured, narrative: [narrative] });

  store.append(modelLoad("t5-small"));

  assert.equal(store.count(), 1);
  assert.deepEqual(narrative.lines(), ["2026-03-02T09:00:00.000Z - ModelLoad - t5-small - 3.5869s - device=cpu"]);
});

test("metric store export yields every record in append order and can be iterated again", () => {
  const store = new MetricStore({ structured: new InMemoryStructuredSink() });
  ["model_a", "model_b", "model_c", "model_d"].forEach((modelId) => {
    store.append(modelLoad(modelId));
  });

  const exported = store.export();
  const first = [...exported].map((record) => record.subject);
  const second = [...exported].map((record) => record.subject);

  assert.deepEqual(first, ["model_a", "model_b", "model_c", "model_d"]);
  assert.deepEqual(second, first);
});

test("metric store reports a failing structured sink by name and still writes the narrative line", () => {
  const narrative = new InMemoryNarrativeSink();
  const store = new MetricStore({ structured: new RejectingStructuredSink(), narrative: [narrative] });

  assert.throws(
    () => store.append(modelLoad("t5-small")),
    (error: unknown) =>
      error instanceof PersistenceError &&
      error.sink === "rejecting_structured" &&
      error.message === "rejecting_structured write failed: disk full"
  );
  assert.equal(narrative.lines().length, 1);
});

test("metric store names every failing sink when more than one rejects a write", () => {
  const store = new MetricStore({
    structured: new RejectingStructuredSink(),
    narrative: [new RejectingNarrativeSink()]
  });

  assert.throws(
    () => store.append(modelLoad("t5-small")),
    (error: unknown) =>
      error instanceof PersistenceError &&
      error.sink === "rejecting_structured, rejecting_narrative" &&
      error.cause instanceof AggregateError &&
      error.cause.errors.length === 2
  );
});

test("metric store writes a JSON snapshot of the wire entries", () => {
  const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "summarizer-perf-store-test-"));
  const snapshotPath = path.join(tempDir, "nested", "metrics.json");
  const store = new MetricStore({ structured: new InMemoryStructuredSink() });
  store.append(
    createInferenceRecord(TIMESTAMP, {
      modelId: "t5-small",
      durationSeconds: 2,
      inputLength: 100,
      outputLength: 40,
      subject: "chunk_1"
    })
  );

  try {
    assert.equal(store.writeSnapshot(snapshotPath), 1);
    const entries: unknown = JSON.parse(fs.readFileSync(snapshotPath, "utf8"));
    assert.deepEqual(entries, [
      {
        kind: "Inference",
        subject: "chunk_1",
        timestamp: TIMESTAMP,
        duration_seconds: 2,
        input_size: 100,
        output_size: 40,
        extra: { model: "t5-small", throughput: 50 }
      }
    ]);
  } finally {
    fs.rmSync(tempDir, { recursive: true, force: true });
  }
});

test("metric store close reports sinks that fail to close", () => {
  const store = new MetricStore({ structured: new RejectingStructuredSink() });

  assert.throws(
    () => store.close(),
    (error: unknown) =>
      error instanceof PersistenceError &&
      error.sink === "rejecting_structured" &&
      error.operation === "close" &&
      error.message === "rejecting_structured close failed: close failed"
  );
});

test("metric store reports read failures as PersistenceError", () => {
  const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "summarizer-perf-store-test-"));
  const store = new MetricStore({ structured: new UnreadableStructuredSink() });
  const isReadFailure =
    (message: string) =>
    (error: unknown): boolean =>
      error instanceof PersistenceError &&
      error.sink === "unreadable_structured" &&
      error.operation === "read" &&
      error.message === message;

  try {
    assert.throws(
      () => [...store.export()],
      isReadFailure("unreadable_structured read failed: page checksum mismatch")
    );
    assert.throws(
      () => store.writeSnapshot(path.join(tempDir, "metrics.json")),
      isReadFailure("unreadable_structured read failed: page checksum mismatch")
    );
    assert.equal(fs.existsSync(path.join(tempDir, "metrics.json")), false);
    assert.throws(() => store.count(), isReadFailure("unreadable_structured read failed: database is locked"));
  } finally {
    fs.rmSync(tempDir, { recursive: true, force: true });
  }
});
