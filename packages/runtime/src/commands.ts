import fs from "node:fs";

import { isMetricsError } from "../../schema/src/errors";
import { toMetricEntry } from "../../schema/src/records";
import { createPerformanceRuntime } from "./runtime";
import type {
  CommandResult,
  ExportCommandOutput,
  PerformanceRuntime,
  PerformanceRuntimeOptions,
  SummaryCommandOutput
} from "./types";

function openStoredRuntime(
  dbPath: string,
  hydrateOnInit: boolean,
  options: PerformanceRuntimeOptions
): PerformanceRuntime {
  return createPerformanceRuntime({ dbPath, logToStderr: false, hydrateOnInit }, options);
}

function withStoredRuntime<TValue>(
  dbPath: string,
  hydrateOnInit: boolean,
  options: PerformanceRuntimeOptions,
  run: (runtime: PerformanceRuntime) => TValue
): CommandResult<TValue> {
  if (!fs.existsSync(dbPath)) {
    return { ok: false, error: `metrics database not found: ${dbPath}` };
  }

  try {
    const runtime = openStoredRuntime(dbPath, hydrateOnInit, options);
    try {
      return { ok: true, value: run(runtime) };
    } finally {
      runtime.close();
    }
  } catch (error: unknown) {
    if (isMetricsError(error)) {
      return { ok: false, error: error.message };
    }
    throw error;
  }
}

export function runSummary(
  dbPath: string,
  options: PerformanceRuntimeOptions = {}
): CommandResult<SummaryCommandOutput> {
  return withStoredRuntime(dbPath, true, options, (runtime) => runtime.collector.getPerformanceSummary());
}

export function runExport(
  dbPath: string,
  outPath?: string,
  options: PerformanceRuntimeOptions = {}
): CommandResult<ExportCommandOutput> {
  return withStoredRuntime(dbPath, false, options, (runtime) => {
    if (outPath !== undefined) {
      runtime.collector.saveMetricsToFile(outPath);
      return { count: [...runtime.collector.export()].length, outPath };
    }

    const entries = [...runtime.collector.export()].map((record) => toMetricEntry(record));
    return { count: entries.length, entries };
  });
}
