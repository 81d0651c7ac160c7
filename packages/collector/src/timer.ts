import type { MeasuredResult, Timer } from "./types";

type MonotonicClock = () => number;

const defaultMonotonicClock: MonotonicClock = () => performance.now();

export function startTimer(now: MonotonicClock = defaultMonotonicClock): Timer {
  const startedAtMs = now();
  return {
    startedAtMs,
    elapsedSeconds: (): number => Math.max(0, now() - startedAtMs) / 1000
  };
}

export async function measure<TResult>(
  operation: () => TResult | Promise<TResult>,
  now: MonotonicClock = defaultMonotonicClock
): Promise<MeasuredResult<TResult>> {
  const timer = startTimer(now);
  const result = await operation();
  return {
    result,
    durationSeconds: timer.elapsedSeconds()
  };
}
