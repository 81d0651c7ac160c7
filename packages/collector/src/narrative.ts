import type { EventRecord, MemoryExtra, MetricExtra, MetricValue } from "../../schema/src/types";

function formatSeconds(value: number): string {
  return `${value.toFixed(4)}s`;
}

function formatRate(value: number): string {
  return value.toFixed(2);
}

function withoutKeys(extra: MetricExtra, keys: readonly string[]): MetricExtra {
  const rest: Record<string, MetricValue> = {};
  for (const [key, value] of Object.entries(extra)) {
    if (!keys.includes(key)) {
      rest[key] = value;
    }
  }
  return rest;
}

function formatMemory(extra: MemoryExtra): string {
  const parts: string[] = [];
  if (extra.memory_peak_mb !== undefined) {
    parts.push(`peak=${extra.memory_peak_mb.toFixed(2)} MB`);
  }
  if (extra.memory_current_mb !== undefined) {
    parts.push(`current=${extra.memory_current_mb.toFixed(2)} MB`);
  }
  if (extra.memory_model_mb !== undefined) {
    parts.push(`model=${extra.memory_model_mb.toFixed(2)} MB`);
  }
  return parts.length > 0 ? ` memory(${parts.join(" ")})` : "";
}

function formatContext(extra: MetricExtra, typedKeys: readonly string[]): string {
  const rest = withoutKeys(extra, typedKeys);
  return Object.keys(rest).length > 0 ? ` | context=${JSON.stringify(rest)}` : "";
}

function formatDetails(record: EventRecord): string {
  switch (record.kind) {
    case "ModelLoad":
      return `device=${record.device}${formatMemory(record.extra)}`;
    case "Inference":
      return (
        `model=${record.extra.model} input=${String(record.inputSize)} chars ` +
        `output=${String(record.outputSize)} chars throughput=${formatRate(record.extra.throughput)} chars/s` +
        formatContext(record.extra, ["model", "throughput"])
      );
    case "Preprocessing":
      return (
        `operation=${record.extra.operation} text=${String(record.inputSize)} chars ` +
        `chunks=${String(record.extra.chunk_count)} throughput=${formatRate(record.extra.throughput)} chars/s` +
        formatContext(record.extra, ["operation", "chunk_count", "throughput"])
      );
    case "TotalProcessing":
      return (
        `chunks=${String(record.extra.chunk_count)} success=${String(record.extra.success_count)} ` +
        `errors=${String(record.extra.error_count)} (${(record.extra.error_rate * 100).toFixed(1)}%) ` +
        `avg_per_chunk=${formatSeconds(record.extra.average_chunk_seconds)}` +
        formatMemory(record.extra)
      );
    case "Error":
      return `message=${record.extra.message}${formatContext(record.extra, ["message"])}`;
  }
}

export function formatNarrativeLine(record: EventRecord): string {
  const subject = record.subject.length > 0 ? record.subject : "-";
  return `${record.timestamp} - ${record.kind} - ${subject} - ${formatSeconds(record.durationSeconds)} - ${formatDetails(record)}`;
}
