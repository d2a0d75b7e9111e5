import { delay } from "../utils/delay.js";
import { Outcome, failed, succeeded } from "../runtime/outcome.js";
import { VideoProvider } from "./types.js";

export interface VideoPollOptions {
  intervalMs: number;
  maxWaitMs: number;
  /** When true, a failed status check uses up wait budget like a pending one. */
  countTransientErrors: boolean;
  signal?: AbortSignal;
  verbose?: boolean;
}

/** Caps consecutive failed status checks when they do not count against the budget. */
export const MAX_CONSECUTIVE_POLL_ERRORS = 5;

/**
 * Polls a submitted render until it is done, errors or the wait budget runs out.
 * Resolves with the result URL. Never loops past `maxWaitMs` of counted waiting.
 */
export async function pollVideo(
  provider: VideoProvider,
  jobId: string,
  options: VideoPollOptions
): Promise<Outcome<string>> {
  let waitedMs = 0;
  let consecutiveErrors = 0;

  while (waitedMs < options.maxWaitMs) {
    if (options.signal?.aborted) {
      return failed("cancelled", `Polling for ${jobId} was cancelled`);
    }

    const status = await provider.poll(jobId, options.signal);

    if (!status.ok) {
      if (status.failure.kind === "configuration" || status.failure.kind === "cancelled") {
        return status;
      }

      consecutiveErrors += 1;
      if (options.verbose) {
        console.log(`[video-poll] ${jobId} status check failed (${consecutiveErrors}): ${status.failure.message}`);
      }
      if (!options.countTransientErrors && consecutiveErrors >= MAX_CONSECUTIVE_POLL_ERRORS) {
        return failed("provider", `Status checks for ${jobId} failed ${consecutiveErrors} times in a row`);
      }

      await delay(options.intervalMs, options.signal);
      if (options.countTransientErrors) {
        waitedMs += options.intervalMs;
      }
      continue;
    }

    consecutiveErrors = 0;
    const job = status.value;
    if (job.status === "done") {
      return succeeded(job.resultUrl);
    }
    if (job.status === "error") {
      return failed("provider", `Video render ${jobId} failed: ${job.error}`);
    }

    await delay(options.intervalMs, options.signal);
    waitedMs += options.intervalMs;
  }

  return failed("timeout", `Video ${jobId} was not ready after ${options.maxWaitMs}ms`);
}
