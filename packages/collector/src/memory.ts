import type { MemoryReading } from "../../schema/src/types";

const BYTES_PER_MB = 1024 * 1024;
const KILOBYTES_PER_MB = 1024;

export interface ProcessMemorySample {
  readonly rssBytes: number;
  readonly maxRssKilobytes: number;
}

export function toMemoryReading(sample: ProcessMemorySample, modelMb?: number): MemoryReading {
  return {
    peakMb: sample.maxRssKilobytes / KILOBYTES_PER_MB,
    currentMb: sample.rssBytes / BYTES_PER_MB,
    ...(modelMb !== undefined ? { modelMb } : {})
  };
}

// Peak is the process high-water mark (maxRSS), current is the resident set now.
export function sampleMemoryUsage(modelMb?: number): MemoryReading {
  return toMemoryReading(
    {
      rssBytes: process.memoryUsage.rss(),
      maxRssKilobytes: process.resourceUsage().maxRSS
    },
    modelMb
  );
}
