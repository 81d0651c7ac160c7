import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { InMemoryNarrativeSink, SqliteMetricSink } from "../../platform/src";
import { PerformanceCollector } from "../src";

function fail(message: string): never {
  throw new Error(message);
}

function main(): void {
  const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "summarizer-perf-smoke-"));
  const dbPath = path.join(tempDir, "metrics.db");
  const narrative = new InMemoryNarrativeSink();

  try {
    const collector = new PerformanceCollector({
      openStructuredSink: () => new SqliteMetricSink(dbPath),
      openNarrativeSinks: () => [narrative],
      snapshotPath: path.join(tempDir, "performance_metrics.json")
    });
    collector.logModelLoading("t5-small", 3.5869, "cpu");
    collector.logInferencePerformance("t5-small", 1.9426, 54, 54, "chunk_1");
    collector.logTotalProcessing(3.0424, 1, 1, 0);
    collector.shutdown();

    const reopened = new PerformanceCollector({
      openStructuredSink: () => new SqliteMetricSink(dbPath),
      hydrateOnInit: true
    });
    const { hydratedEvents } = reopened.init();
    if (hydratedEvents !== 3) {
      fail(`expected 3 hydrated events, got ${String(hydratedEvents)}`);
    }
    const summary = reopened.getPerformanceSummary();
    reopened.shutdown();

    console.log("collector manual smoke passed");
    console.log(`totalEvents=${String(summary.overview.totalEvents)}`);
    console.log(`narrativeLines=${String(narrative.lines().length)}`);
  } finally {
    fs.rmSync(tempDir, { recursive: true, force: true });
  }
}

main();
