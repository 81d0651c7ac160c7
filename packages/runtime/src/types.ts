import type { Writable } from "node:stream";

import type { PerformanceCollector } from "../../collector/src/collector";
import type { PerformanceSummary } from "../../collector/src/types";
import type { MetricEntry } from "../../schema/src/types";

export type RuntimeEnv = Readonly<Record<string, string | undefined>>;

export interface PerformanceRuntimeConfig {
  readonly dbPath?: string;
  readonly logFile?: string;
  readonly logToStderr: boolean;
  readonly snapshotPath?: string;
  readonly hydrateOnInit: boolean;
}

export interface PerformanceRuntimeOptions {
  readonly clock?: () => number;
  readonly stderr?: Writable;
}

export interface PerformanceRuntime {
  readonly config: PerformanceRuntimeConfig;
  readonly collector: PerformanceCollector;
  readonly hydratedEvents: number;
  close(): void;
}

export type RuntimeCommand = "summary" | "export";

export interface RuntimeParsedArgs {
  readonly command: RuntimeCommand | undefined;
  readonly dbPath?: string;
  readonly outPath?: string;
  readonly help?: boolean;
}

export type CommandResult<TValue> =
  | {
      readonly ok: true;
      readonly value: TValue;
    }
  | {
      readonly ok: false;
      readonly error: string;
    };

export type SummaryCommandOutput = PerformanceSummary;

export interface ExportCommandOutput {
  readonly count: number;
  readonly entries?: readonly MetricEntry[];
  readonly outPath?: string;
}
