export type JobStateErrorCode = "invalid_transition" | "progress_regression" | "progress_out_of_range";

/** Raised for illegal job transitions. These are programming errors, never user-facing faults. */
export class JobStateError extends Error {
  constructor(
    readonly code: JobStateErrorCode,
    message: string
  ) {
    super(message);
    this.name = "JobStateError";
  }
}

/** Stage 10 failure. The only stage error that ends a job as FAILED. */
export class PackagingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PackagingError";
  }
}

export class CancellationError extends Error {
  constructor(message = "Job cancelled") {
    super(message);
    this.name = "CancellationError";
  }
}

export class RequestValidationError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid course generation request: ${issues.join("; ")}`);
    this.name = "RequestValidationError";
  }
}

export function formatError(value: unknown): string {
  if (value instanceof Error) {
    return value.message;
  }
  return "Unknown runtime error.";
}

export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new CancellationError();
  }
}
