import { afterEach, describe, expect, it, vi } from "vitest";

import { JobStateError } from "../src/domain/errors.js";
import { JobStateMachine } from "../src/jobs/jobStateMachine.js";
import { InMemoryJobStore, JsonFileJobStore } from "../src/jobs/jobStore.js";
import { createTempDirectory, removeDirectory } from "./helpers/testConfig.js";

function captureError(action: () => void): unknown {
  try {
    action();
  } catch (error) {
    return error;
  }
  return undefined;
}

function newJob(store = new InMemoryJobStore()): { job: JobStateMachine; store: InMemoryJobStore } {
  return { job: JobStateMachine.create({ topic: "Python", documentIds: ["intro"] }, store), store };
}

describe("JobStateMachine", () => {
  it("creates a pending job at zero progress and persists it", () => {
    const { job, store } = newJob();

    expect(job.snapshot).toMatchObject({ topic: "Python", documentIds: ["intro"], status: "PENDING", progress: 0 });
    expect(store.load(job.id)?.status).toBe("PENDING");
  });

  it("persists every transition before returning", () => {
    const store = new InMemoryJobStore();
    const save = vi.spyOn(store, "save");
    const { job } = newJob(store);

    job.start();
    expect(store.load(job.id)?.status).toBe("PROCESSING");
    job.advance(9);
    expect(store.load(job.id)?.progress).toBe(9);
    job.complete("/tmp/course.zip");

    expect(save).toHaveBeenCalledTimes(4);
    expect(store.load(job.id)).toMatchObject({
      status: "COMPLETED",
      progress: 100,
      resultReference: "/tmp/course.zip"
    });
  });

  it("rejects progress that moves backwards", () => {
    const { job } = newJob();
    job.start();
    job.advance(18);

    expect(captureError(() => job.advance(9))).toMatchObject({ code: "progress_regression" });
    expect(job.snapshot.progress).toBe(18);
  });

  it("keeps progress below 100 and whole while processing", () => {
    const { job } = newJob();
    job.start();

    expect(captureError(() => job.advance(100))).toMatchObject({ code: "progress_out_of_range" });
    expect(captureError(() => job.advance(-1))).toMatchObject({ code: "progress_out_of_range" });
    expect(captureError(() => job.advance(9.5))).toMatchObject({ code: "progress_out_of_range" });
  });

  it("accepts repeating the current progress", () => {
    const { job } = newJob();
    job.start();
    job.advance(27);
    job.advance(27);

    expect(job.snapshot.progress).toBe(27);
  });

  it("refuses to start twice or advance before starting", () => {
    const { job } = newJob();

    expect(captureError(() => job.advance(9))).toBeInstanceOf(JobStateError);
    job.start();
    expect(captureError(() => job.start())).toMatchObject({ code: "invalid_transition" });
  });

  it("leaves a completed job untouched", () => {
    const { job } = newJob();
    job.start();
    job.complete("archive.zip");

    expect(captureError(() => job.fail("late failure"))).toMatchObject({ code: "invalid_transition" });
    expect(captureError(() => job.advance(50))).toMatchObject({ code: "invalid_transition" });
    expect(job.snapshot.status).toBe("COMPLETED");
    expect(job.isTerminal).toBe(true);
  });

  it("keeps progress short of 100 when a job fails", () => {
    const { job } = newJob();
    job.start();
    job.advance(90);
    job.fail("Packaging failed");

    expect(job.snapshot).toMatchObject({ status: "FAILED", progress: 90, errorMessage: "Packaging failed" });
    expect(captureError(() => job.complete("archive.zip"))).toMatchObject({ code: "invalid_transition" });
  });
});

describe("JsonFileJobStore", () => {
  let directory: string | undefined;

  afterEach(async () => {
    if (directory) {
      await removeDirectory(directory);
      directory = undefined;
    }
  });

  it("reads back the record it wrote", async () => {
    directory = await createTempDirectory();
    const store = new JsonFileJobStore(directory);
    const { job } = newJob();
    job.start();
    store.save(job.snapshot);

    expect(store.load(job.id)).toEqual(job.snapshot);
    expect(store.load("missing")).toBeUndefined();
  });
});
