export class MetricsError extends Error {
  public constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "MetricsError";
  }
}

export class ValidationError extends MetricsError {
  public readonly issues: readonly string[];

  public constructor(issues: readonly string[]) {
    super(`invalid metric event: ${issues.join("; ")}`);
    this.name = "ValidationError";
    this.issues = issues;
  }
}

export type PersistenceOperation = "open" | "write" | "read" | "hydrate" | "close" | "access";

/**
 * A sink failed or the collector is no longer usable. An event passed to a
 * failing log call has still been counted in memory.
 */
export class PersistenceError extends MetricsError {
  public readonly sink: string;
  public readonly operation: PersistenceOperation;

  public constructor(sink: string, cause: unknown, operation: PersistenceOperation = "write") {
    super(`${sink} ${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = "PersistenceError";
    this.sink = sink;
    this.operation = operation;
  }
}

export function isMetricsError(value: unknown): value is MetricsError {
  return value instanceof MetricsError;
}
