export type EventKind = "ModelLoad" | "Inference" | "Preprocessing" | "TotalProcessing" | "Error";

export type MetricValue = string | number | boolean | null;
export type MetricExtra = Readonly<Record<string, MetricValue>>;

export interface ValidationSuccess<TValue> {
  ok: true;
  value: TValue;
  errors: readonly [];
}

export interface ValidationFailure {
  ok: false;
  value: undefined;
  errors: readonly string[];
}

export type ValidationResult<TValue> = ValidationSuccess<TValue> | ValidationFailure;

interface EventRecordBase<TKind extends EventKind, TExtra extends MetricExtra> {
  readonly kind: TKind;
  readonly subject: string;
  readonly timestamp: string;
  readonly durationSeconds: number;
  readonly extra: TExtra;
}

export interface MemoryExtra extends MetricExtra {
  readonly memory_peak_mb?: number;
  readonly memory_current_mb?: number;
  readonly memory_model_mb?: number;
}

export interface ModelLoadExtra extends MemoryExtra {
  readonly model: string;
}

export interface InferenceExtra extends MetricExtra {
  readonly model: string;
  readonly throughput: number;
}

export interface PreprocessingExtra extends MetricExtra {
  readonly operation: string;
  readonly chunk_count: number;
  readonly throughput: number;
}

export interface TotalProcessingExtra extends MemoryExtra {
  readonly chunk_count: number;
  readonly success_count: number;
  readonly error_count: number;
  readonly error_rate: number;
  readonly average_chunk_seconds: number;
}

export interface ErrorExtra extends MetricExtra {
  readonly message: string;
}

export interface ModelLoadRecord extends EventRecordBase<"ModelLoad", ModelLoadExtra> {
  readonly device: string;
}

export interface InferenceRecord extends EventRecordBase<"Inference", InferenceExtra> {
  readonly inputSize: number;
  readonly outputSize: number;
}

export interface PreprocessingRecord extends EventRecordBase<"Preprocessing", PreprocessingExtra> {
  readonly inputSize: number;
}

export interface TotalProcessingRecord extends EventRecordBase<"TotalProcessing", TotalProcessingExtra> {}

export interface ErrorRecord extends EventRecordBase<"Error", ErrorExtra> {}

export type EventRecord =
  | ModelLoadRecord
  | InferenceRecord
  | PreprocessingRecord
  | TotalProcessingRecord
  | ErrorRecord;

// snake_case on the wire: JSON export and SQLite rows share it.
export interface MetricEntry {
  readonly kind: EventKind;
  readonly subject: string;
  readonly timestamp: string;
  readonly duration_seconds: number;
  readonly device?: string;
  readonly input_size?: number;
  readonly output_size?: number;
  readonly extra: MetricExtra;
}

/** Megabytes. */
export interface MemoryReading {
  readonly peakMb?: number;
  readonly currentMb?: number;
  readonly modelMb?: number;
}

export type TimestampSource = string | (() => string);

export interface ModelLoadInput {
  readonly modelId: string;
  readonly durationSeconds: number;
  readonly device: string;
  readonly memory?: MemoryReading;
}

export interface InferenceInput {
  readonly modelId: string;
  readonly durationSeconds: number;
  readonly inputLength: number;
  readonly outputLength: number;
  readonly subject?: string;
  readonly metadata?: MetricExtra;
}

export interface PreprocessingInput {
  readonly durationSeconds: number;
  readonly textLength: number;
  readonly chunkCount: number;
  readonly operation: string;
  readonly metadata?: MetricExtra;
}

export interface TotalProcessingInput {
  readonly durationSeconds: number;
  readonly chunkCount: number;
  readonly successCount: number;
  readonly errorCount: number;
  readonly memory?: MemoryReading;
}

export interface ErrorInput {
  readonly context: string;
  readonly message: string;
  readonly metadata?: MetricExtra;
  readonly durationSeconds?: number;
}
