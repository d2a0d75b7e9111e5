import { execFile } from "node:child_process";
import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { Failed, failed } from "../../runtime/outcome.js";

export interface ProcessResult {
  stdout: string;
  stderr: string;
}

/** Runs a binary without a shell. Rejects with the child-process error on a non-zero exit. */
export function runProcess(command: string, args: string[], signal?: AbortSignal): Promise<ProcessResult> {
  return new Promise((resolve, reject) => {
    execFile(command, args, { signal, encoding: "utf8", maxBuffer: 16 * 1024 * 1024 }, (error, stdout, stderr) => {
      if (error) {
        reject(error);
        return;
      }
      resolve({ stdout, stderr });
    });
  });
}

/** ENOENT from spawn means the binary is not installed: a configuration problem, not a transient one. */
export function failureFromProcessError(command: string, error: unknown, signal?: AbortSignal): Failed {
  if (signal?.aborted) {
    return failed("cancelled", `${command} was aborted`);
  }
  if (error instanceof Error && "code" in error && error.code === "ENOENT") {
    return failed("configuration", `${command} is not installed or not on PATH`);
  }
  const detail = error instanceof Error ? error.message : String(error);
  return failed("provider", `${command} failed: ${detail.slice(0, 400)}`);
}

export async function withScratchDirectory<T>(task: (directory: string) => Promise<T>): Promise<T> {
  const directory = await mkdtemp(path.join(os.tmpdir(), "course-forge-"));
  try {
    return await task(directory);
  } finally {
    await rm(directory, { recursive: true, force: true });
  }
}
