export const SAMPLE_START_ISO = "2026-03-02T09:00:00.000Z";

export function createStepClock(startIso: string = SAMPLE_START_ISO, stepMs = 1000): () => number {
  let next = Date.parse(startIso);
  return (): number => {
    const current = next;
    next += stepMs;
    return current;
  };
}

/** Returns the given readings in order, then repeats the last one. */
export function createSequenceClock(readings: readonly number[]): () => number {
  let index = 0;
  return (): number => {
    const reading = readings[Math.min(index, readings.length - 1)] ?? 0;
    index += 1;
    return reading;
  };
}
