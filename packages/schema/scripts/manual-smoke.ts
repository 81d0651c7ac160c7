import { createSampleEntry, toMetricEntry, validateMetricEntry } from "../src";

function fail(message: string): never {
  throw new Error(message);
}

function main(): void {
  const entry = createSampleEntry({ subject: "chunk_manual_001" });

  const result = validateMetricEntry(entry);
  if (!result.ok) {
    fail(`metric entry validation failed: ${result.errors.join(" | ")}`);
  }

  const rejected = validateMetricEntry({ ...entry, duration_seconds: -1 });
  if (rejected.ok) {
    fail("negative duration was accepted");
  }

  console.log("schema manual smoke passed");
  console.log(`kind=${result.value.kind}`);
  console.log(`subject=${toMetricEntry(result.value).subject}`);
}

main();
