export { parseArgs } from "./args";
export { runExport, runSummary } from "./commands";
export { deriveSnapshotPath, parseCollectorConfigFromEnv } from "./env";
export { createPerformanceRuntime } from "./runtime";
export type {
  CommandResult,
  ExportCommandOutput,
  PerformanceRuntime,
  PerformanceRuntimeConfig,
  PerformanceRuntimeOptions,
  RuntimeCommand,
  RuntimeEnv,
  RuntimeParsedArgs,
  SummaryCommandOutput
} from "./types";
