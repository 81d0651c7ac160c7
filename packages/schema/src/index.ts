export { EVENT_KINDS, FAILED_EXTRA_KEY } from "./constants";
export { isMetricsError, MetricsError, PersistenceError, ValidationError } from "./errors";
export type { PersistenceOperation } from "./errors";
export {
  computeRate,
  createErrorRecord,
  createInferenceRecord,
  createModelLoadRecord,
  createPreprocessingRecord,
  createTotalProcessingRecord,
  freezeRecord,
  isFailedRecord,
  resolveTimestamp,
  toMetricEntry
} from "./records";
export { createSampleEntry, SAMPLE_TIMESTAMP } from "./samples";
export { validateMetricEntry } from "./validators";
export type * from "./types";
