import type { MetricEntry } from "./types";

export const SAMPLE_TIMESTAMP = "2026-03-02T09:00:00.000Z";

export function createSampleEntry(overrides: Partial<MetricEntry> = {}): MetricEntry {
  return {
    kind: "Inference",
    subject: "chunk_1",
    timestamp: SAMPLE_TIMESTAMP,
    duration_seconds: 1.9426,
    input_size: 54,
    output_size: 54,
    extra: {
      model: "t5-small",
      throughput: 54 / 1.9426
    },
    ...overrides
  };
}
