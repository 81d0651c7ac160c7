import { EVENT_KINDS } from "./constants";
import { freezeRecord } from "./records";
import type { EventKind, EventRecord, MemoryExtra, MetricExtra, MetricValue, ValidationResult } from "./types";

const MEMORY_EXTRA_KEYS = ["memory_peak_mb", "memory_current_mb", "memory_model_mb"] as const;

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNonNegativeFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value) && value >= 0;
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function isValidIsoDate(value: unknown): value is string {
  if (typeof value !== "string" || value.trim().length === 0) {
    return false;
  }

  if (Number.isNaN(Date.parse(value))) {
    return false;
  }

  return value.endsWith("Z") || /[+-]\d{2}:\d{2}$/.test(value);
}

function isEventKind(value: unknown): value is EventKind {
  return EVENT_KINDS.some((kind) => kind === value);
}

function isMetricValue(value: unknown): value is MetricValue {
  return (
    value === null ||
    typeof value === "string" ||
    typeof value === "boolean" ||
    (typeof value === "number" && Number.isFinite(value))
  );
}

function addError(errors: string[], path: string, message: string): void {
  errors.push(`${path}: ${message}`);
}

function readRequiredString(source: UnknownRecord, key: string, errors: string[], path: string): string | undefined {
  const value = source[key];
  if (typeof value !== "string") {
    addError(errors, path, "must be a string");
    return undefined;
  }
  return value;
}

function readRequiredCount(source: UnknownRecord, key: string, errors: string[], path: string): number | undefined {
  const value = source[key];
  if (!isNonNegativeInteger(value)) {
    addError(errors, path, "must be a non-negative integer");
    return undefined;
  }
  return value;
}

function readRequiredNumber(source: UnknownRecord, key: string, errors: string[], path: string): number | undefined {
  const value = source[key];
  if (!isNonNegativeFiniteNumber(value)) {
    addError(errors, path, "must be a non-negative number");
    return undefined;
  }
  return value;
}

function readMemoryExtra(extra: MetricExtra, errors: string[]): MemoryExtra {
  const memory: Record<string, number> = {};
  MEMORY_EXTRA_KEYS.forEach((key) => {
    if (extra[key] === undefined) {
      return;
    }
    const value = readRequiredNumber(extra, key, errors, `extra.${key}`);
    if (value !== undefined) {
      memory[key] = value;
    }
  });
  return memory;
}

function parseExtra(source: UnknownRecord, errors: string[]): MetricExtra | undefined {
  const rawExtra = source["extra"];
  if (!isRecord(rawExtra)) {
    addError(errors, "extra", "must be an object");
    return undefined;
  }

  const extra: Record<string, MetricValue> = {};
  for (const [key, value] of Object.entries(rawExtra)) {
    if (!isMetricValue(value)) {
      addError(errors, `extra.${key}`, "must be a string, finite number, boolean or null");
      continue;
    }
    extra[key] = value;
  }
  return extra;
}

function buildRecord(
  kind: EventKind,
  common: { readonly subject: string; readonly timestamp: string; readonly durationSeconds: number },
  source: UnknownRecord,
  extra: MetricExtra,
  errors: string[]
): EventRecord | undefined {
  switch (kind) {
    case "ModelLoad": {
      const device = readRequiredString(source, "device", errors, "device");
      const model = readRequiredString(extra, "model", errors, "extra.model");
      const memory = readMemoryExtra(extra, errors);
      if (device === undefined || model === undefined) {
        return undefined;
      }
      return { kind, ...common, device, extra: { ...extra, ...memory, model } };
    }
    case "Inference": {
      const inputSize = readRequiredCount(source, "input_size", errors, "input_size");
      const outputSize = readRequiredCount(source, "output_size", errors, "output_size");
      const model = readRequiredString(extra, "model", errors, "extra.model");
      const throughput = readRequiredNumber(extra, "throughput", errors, "extra.throughput");
      if (inputSize === undefined || outputSize === undefined || model === undefined || throughput === undefined) {
        return undefined;
      }
      return { kind, ...common, inputSize, outputSize, extra: { ...extra, model, throughput } };
    }
    case "Preprocessing": {
      const inputSize = readRequiredCount(source, "input_size", errors, "input_size");
      const operation = readRequiredString(extra, "operation", errors, "extra.operation");
      const chunkCount = readRequiredCount(extra, "chunk_count", errors, "extra.chunk_count");
      const throughput = readRequiredNumber(extra, "throughput", errors, "extra.throughput");
      if (inputSize === undefined || operation === undefined || chunkCount === undefined || throughput === undefined) {
        return undefined;
      }
      return {
        kind,
        ...common,
        inputSize,
        extra: { ...extra, operation, chunk_count: chunkCount, throughput }
      };
    }
    case "TotalProcessing": {
      const chunkCount = readRequiredCount(extra, "chunk_count", errors, "extra.chunk_count");
      const successCount = readRequiredCount(extra, "success_count", errors, "extra.success_count");
      const errorCount = readRequiredCount(extra, "error_count", errors, "extra.error_count");
      const errorRate = readRequiredNumber(extra, "error_rate", errors, "extra.error_rate");
      const averageChunkSeconds = readRequiredNumber(
        extra,
        "average_chunk_seconds",
        errors,
        "extra.average_chunk_seconds"
      );
      const memory = readMemoryExtra(extra, errors);
      if (
        chunkCount === undefined ||
        successCount === undefined ||
        errorCount === undefined ||
        errorRate === undefined ||
        averageChunkSeconds === undefined
      ) {
        return undefined;
      }
      return {
        kind,
        ...common,
        extra: {
          ...extra,
          ...memory,
          chunk_count: chunkCount,
          success_count: successCount,
          error_count: errorCount,
          error_rate: errorRate,
          average_chunk_seconds: averageChunkSeconds
        }
      };
    }
    case "Error": {
      const message = readRequiredString(extra, "message", errors, "extra.message");
      if (message === undefined) {
        return undefined;
      }
      return { kind, ...common, extra: { ...extra, message } };
    }
  }
}

export function validateMetricEntry(input: unknown): ValidationResult<EventRecord> {
  const errors: string[] = [];
  if (!isRecord(input)) {
    return {
      ok: false,
      value: undefined,
      errors: ["entry: must be an object"]
    };
  }

  const kind = input["kind"];
  if (!isEventKind(kind)) {
    addError(errors, "kind", `must be one of ${EVENT_KINDS.join(", ")}`);
  }
  const subject = readRequiredString(input, "subject", errors, "subject");
  const timestamp = input["timestamp"];
  if (!isValidIsoDate(timestamp)) {
    addError(errors, "timestamp", "must be a valid ISO-8601 date");
  }
  const durationSeconds = readRequiredNumber(input, "duration_seconds", errors, "duration_seconds");
  const extra = parseExtra(input, errors);

  if (
    !isEventKind(kind) ||
    subject === undefined ||
    !isValidIsoDate(timestamp) ||
    durationSeconds === undefined ||
    extra === undefined
  ) {
    return {
      ok: false,
      value: undefined,
      errors
    };
  }

  const record = buildRecord(kind, { subject, timestamp, durationSeconds }, input, extra, errors);
  if (record === undefined || errors.length > 0) {
    return {
      ok: false,
      value: undefined,
      errors
    };
  }

  return {
    ok: true,
    value: freezeRecord(record),
    errors: []
  };
}
