import type { EventKind } from "./types";

export const EVENT_KINDS: readonly EventKind[] = [
  "ModelLoad",
  "Inference",
  "Preprocessing",
  "TotalProcessing",
  "Error"
];

export const FAILED_EXTRA_KEY = "failed";
