import { formatError } from "../../domain/errors.js";
import { Failed, failed } from "../../runtime/outcome.js";

const CREDENTIAL_STATUSES = new Set([401, 402, 403]);

/** Maps a thrown SDK or transport error onto a tier failure. */
export function failureFromError(error: unknown, signal?: AbortSignal): Failed {
  if (signal?.aborted) {
    return failed("cancelled", "Request aborted");
  }

  const status = statusCodeOf(error);
  if (status !== undefined && CREDENTIAL_STATUSES.has(status)) {
    return failed("configuration", `Provider rejected the credentials (HTTP ${status}): ${formatError(error)}`);
  }

  return failed("provider", formatError(error));
}

export function failureFromStatus(status: number, body: string): Failed {
  const detail = body.slice(0, 300);
  if (CREDENTIAL_STATUSES.has(status)) {
    return failed("configuration", `Provider rejected the credentials (HTTP ${status}): ${detail}`);
  }
  return failed("provider", `HTTP ${status}: ${detail}`);
}

function statusCodeOf(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null || !("statusCode" in error)) {
    return undefined;
  }
  return typeof error.statusCode === "number" ? error.statusCode : undefined;
}
