import { FAILED_EXTRA_KEY } from "./constants";
import { ValidationError } from "./errors";
import type {
  ErrorInput,
  ErrorRecord,
  EventRecord,
  InferenceInput,
  InferenceRecord,
  MemoryExtra,
  MemoryReading,
  MetricEntry,
  MetricExtra,
  ModelLoadInput,
  ModelLoadRecord,
  PreprocessingInput,
  PreprocessingRecord,
  TimestampSource,
  TotalProcessingInput,
  TotalProcessingRecord
} from "./types";

function addError(errors: string[], path: string, message: string): void {
  errors.push(`${path}: ${message}`);
}

function checkDuration(value: number, errors: string[], path = "durationSeconds"): void {
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
    addError(errors, path, "must be a non-negative finite number");
  }
}

function checkCount(value: number, errors: string[], path: string): void {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    addError(errors, path, "must be a non-negative integer");
  }
}

function checkString(value: string, errors: string[], path: string): void {
  if (typeof value !== "string") {
    addError(errors, path, "must be a string");
  }
}

function checkExtra(extra: MetricExtra | undefined, errors: string[], path: string): void {
  if (extra === undefined) {
    return;
  }

  for (const [key, value] of Object.entries(extra)) {
    if (value === null || typeof value === "string" || typeof value === "boolean") {
      continue;
    }
    if (typeof value === "number" && Number.isFinite(value)) {
      continue;
    }
    addError(errors, `${path}.${key}`, "must be a string, finite number, boolean or null");
  }
}

function checkMemory(memory: MemoryReading | undefined, errors: string[]): void {
  if (memory === undefined) {
    return;
  }
  if (memory.peakMb !== undefined) {
    checkDuration(memory.peakMb, errors, "memory.peakMb");
  }
  if (memory.currentMb !== undefined) {
    checkDuration(memory.currentMb, errors, "memory.currentMb");
  }
  if (memory.modelMb !== undefined) {
    checkDuration(memory.modelMb, errors, "memory.modelMb");
  }
}

function toMemoryExtra(memory: MemoryReading | undefined): MemoryExtra {
  if (memory === undefined) {
    return {};
  }
  return {
    ...(memory.peakMb !== undefined ? { memory_peak_mb: memory.peakMb } : {}),
    ...(memory.currentMb !== undefined ? { memory_current_mb: memory.currentMb } : {}),
    ...(memory.modelMb !== undefined ? { memory_model_mb: memory.modelMb } : {})
  };
}

function throwIfInvalid(errors: readonly string[]): void {
  if (errors.length > 0) {
    throw new ValidationError(errors);
  }
}

export function resolveTimestamp(source: TimestampSource): string {
  return typeof source === "string" ? source : source();
}

export function freezeRecord<TRecord extends EventRecord>(record: TRecord): TRecord {
  Object.freeze(record.extra);
  Object.freeze(record);
  return record;
}

export function computeRate(numerator: number, denominator: number): number {
  return denominator > 0 ? numerator / denominator : 0;
}

export function createModelLoadRecord(timestamp: TimestampSource, input: ModelLoadInput): ModelLoadRecord {
  const errors: string[] = [];
  checkString(input.modelId, errors, "modelId");
  checkDuration(input.durationSeconds, errors);
  checkString(input.device, errors, "device");
  checkMemory(input.memory, errors);
  throwIfInvalid(errors);

  return freezeRecord({
    kind: "ModelLoad",
    subject: input.modelId,
    timestamp: resolveTimestamp(timestamp),
    durationSeconds: input.durationSeconds,
    device: input.device,
    extra: { model: input.modelId, ...toMemoryExtra(input.memory) }
  });
}

export function createInferenceRecord(timestamp: TimestampSource, input: InferenceInput): InferenceRecord {
  const errors: string[] = [];
  checkString(input.modelId, errors, "modelId");
  checkDuration(input.durationSeconds, errors);
  checkCount(input.inputLength, errors, "inputLength");
  checkCount(input.outputLength, errors, "outputLength");
  if (input.subject !== undefined) {
    checkString(input.subject, errors, "subject");
  }
  checkExtra(input.metadata, errors, "metadata");
  throwIfInvalid(errors);

  return freezeRecord({
    kind: "Inference",
    subject: input.subject ?? input.modelId,
    timestamp: resolveTimestamp(timestamp),
    durationSeconds: input.durationSeconds,
    inputSize: input.inputLength,
    outputSize: input.outputLength,
    extra: {
      ...input.metadata,
      model: input.modelId,
      throughput: computeRate(input.inputLength, input.durationSeconds)
    }
  });
}

export function createPreprocessingRecord(timestamp: TimestampSource, input: PreprocessingInput): PreprocessingRecord {
  const errors: string[] = [];
  checkDuration(input.durationSeconds, errors);
  checkCount(input.textLength, errors, "textLength");
  checkCount(input.chunkCount, errors, "chunkCount");
  checkString(input.operation, errors, "operation");
  checkExtra(input.metadata, errors, "metadata");
  throwIfInvalid(errors);

  return freezeRecord({
    kind: "Preprocessing",
    subject: input.operation,
    timestamp: resolveTimestamp(timestamp),
    durationSeconds: input.durationSeconds,
    inputSize: input.textLength,
    extra: {
      ...input.metadata,
      operation: input.operation,
      chunk_count: input.chunkCount,
      throughput: computeRate(input.textLength, input.durationSeconds)
    }
  });
}

export function createTotalProcessingRecord(timestamp: TimestampSource, input: TotalProcessingInput): TotalProcessingRecord {
  const errors: string[] = [];
  checkDuration(input.durationSeconds, errors);
  checkCount(input.chunkCount, errors, "chunkCount");
  checkCount(input.successCount, errors, "successCount");
  checkCount(input.errorCount, errors, "errorCount");
  checkMemory(input.memory, errors);
  throwIfInvalid(errors);

  return freezeRecord({
    kind: "TotalProcessing",
    subject: "",
    timestamp: resolveTimestamp(timestamp),
    durationSeconds: input.durationSeconds,
    extra: {
      chunk_count: input.chunkCount,
      success_count: input.successCount,
      error_count: input.errorCount,
      error_rate: computeRate(input.errorCount, input.chunkCount),
      average_chunk_seconds: computeRate(input.durationSeconds, input.chunkCount),
      ...toMemoryExtra(input.memory)
    }
  });
}

export function createErrorRecord(timestamp: TimestampSource, input: ErrorInput): ErrorRecord {
  const durationSeconds = input.durationSeconds ?? 0;
  const errors: string[] = [];
  checkString(input.context, errors, "context");
  checkString(input.message, errors, "message");
  checkDuration(durationSeconds, errors);
  checkExtra(input.metadata, errors, "metadata");
  throwIfInvalid(errors);

  return freezeRecord({
    kind: "Error",
    subject: input.context,
    timestamp: resolveTimestamp(timestamp),
    durationSeconds,
    extra: {
      ...input.metadata,
      message: input.message
    }
  });
}

export function isFailedRecord(record: EventRecord): boolean {
  return record.kind === "Error" || record.extra[FAILED_EXTRA_KEY] === true;
}

export function toMetricEntry(record: EventRecord): MetricEntry {
  const base = {
    kind: record.kind,
    subject: record.subject,
    timestamp: record.timestamp,
    duration_seconds: record.durationSeconds
  };

  switch (record.kind) {
    case "ModelLoad":
      return { ...base, device: record.device, extra: record.extra };
    case "Inference":
      return { ...base, input_size: record.inputSize, output_size: record.outputSize, extra: record.extra };
    case "Preprocessing":
      return { ...base, input_size: record.inputSize, extra: record.extra };
    case "TotalProcessing":
    case "Error":
      return { ...base, extra: record.extra };
  }
}
