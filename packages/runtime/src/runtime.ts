import { PerformanceCollector } from "../../collector/src/collector";
import { InMemoryStructuredSink } from "../../platform/src/memory-sinks";
import { FileNarrativeSink, StreamNarrativeSink } from "../../platform/src/narrative-sinks";
import type { NarrativeSink, StructuredMetricSink } from "../../platform/src/persistence-types";
import { SqliteMetricSink } from "../../platform/src/sqlite-metric-sink";
import type { PerformanceRuntime, PerformanceRuntimeConfig, PerformanceRuntimeOptions } from "./types";

function openStructuredSink(config: PerformanceRuntimeConfig): StructuredMetricSink {
  return config.dbPath !== undefined ? new SqliteMetricSink(config.dbPath) : new InMemoryStructuredSink();
}

function openNarrativeSinks(config: PerformanceRuntimeConfig, options: PerformanceRuntimeOptions): NarrativeSink[] {
  const sinks: NarrativeSink[] = [];
  if (config.logFile !== undefined) {
    sinks.push(new FileNarrativeSink(config.logFile));
  }
  if (config.logToStderr) {
    sinks.push(new StreamNarrativeSink(options.stderr ?? process.stderr));
  }
  return sinks;
}

export function createPerformanceRuntime(
  config: PerformanceRuntimeConfig,
  options: PerformanceRuntimeOptions = {}
): PerformanceRuntime {
  const collector = new PerformanceCollector({
    openStructuredSink: () => openStructuredSink(config),
    openNarrativeSinks: () => openNarrativeSinks(config, options),
    hydrateOnInit: config.hydrateOnInit && config.dbPath !== undefined,
    ...(config.snapshotPath !== undefined ? { snapshotPath: config.snapshotPath } : {}),
    ...(options.clock !== undefined ? { clock: options.clock } : {})
  });

  const { hydratedEvents } = collector.init();
  if (hydratedEvents > 0 && config.dbPath !== undefined) {
    console.error(`[summarizer-perf] hydrated ${String(hydratedEvents)} events from ${config.dbPath}`);
  }

  return {
    config,
    collector,
    hydratedEvents,
    close: (): void => {
      collector.shutdown();
    }
  };
}
