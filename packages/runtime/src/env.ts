import path from "node:path";

import type { PerformanceRuntimeConfig, RuntimeEnv } from "./types";

function readNonEmpty(env: RuntimeEnv, key: string): string | undefined {
  const value = env[key];
  if (value === undefined) {
    return undefined;
  }
  if (value.trim().length === 0) {
    return undefined;
  }
  return value;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (value === "1" || value.toLowerCase() === "true") {
    return true;
  }
  if (value === "0" || value.toLowerCase() === "false") {
    return false;
  }
  return undefined;
}

/**
 * `logs/perf.log` becomes `logs/perf_metrics.json`; other names keep their extension.
 */
export function deriveSnapshotPath(logFile: string): string {
  const parsed = path.parse(logFile);
  const stem = parsed.ext === ".log" ? parsed.name : parsed.base;
  return path.join(parsed.dir, `${stem}_metrics.json`);
}

export function parseCollectorConfigFromEnv(env: RuntimeEnv): PerformanceRuntimeConfig {
  const dbPath = readNonEmpty(env, "PERF_METRICS_DB_PATH");
  const logFile = readNonEmpty(env, "PERF_LOG_FILE");
  const explicitSnapshotPath = readNonEmpty(env, "PERF_METRICS_SNAPSHOT_PATH");
  const snapshotPath =
    explicitSnapshotPath ?? (logFile !== undefined ? deriveSnapshotPath(logFile) : undefined);

  return {
    ...(dbPath !== undefined ? { dbPath } : {}),
    ...(logFile !== undefined ? { logFile } : {}),
    logToStderr: parseBoolean(readNonEmpty(env, "PERF_LOG_STDERR")) ?? true,
    ...(snapshotPath !== undefined ? { snapshotPath } : {}),
    hydrateOnInit: parseBoolean(readNonEmpty(env, "PERF_HYDRATE_ON_INIT")) ?? true
  };
}
