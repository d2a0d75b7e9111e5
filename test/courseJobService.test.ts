import { afterEach, describe, expect, it } from "vitest";

import { RequestValidationError } from "../src/domain/errors.js";
import { CourseJobService } from "../src/jobs/courseJobService.js";
import { InMemoryJobStore } from "../src/jobs/jobStore.js";
import { InMemoryDocumentLibrary } from "../src/layers/input/documentLibrary.js";
import { createPipelineOrchestrator } from "../src/layers/orchestration/pipelineOrchestrator.js";
import { createProviders } from "../src/providers/index.js";
import { createTempDirectory, removeDirectory, testConfig } from "./helpers/testConfig.js";

let outputDirectory: string | undefined;

afterEach(async () => {
  if (outputDirectory) {
    await removeDirectory(outputDirectory);
    outputDirectory = undefined;
  }
});

async function createService(): Promise<CourseJobService> {
  outputDirectory = await createTempDirectory();
  const config = testConfig({ outputDirectory, lessonCount: 2 });
  const orchestrator = createPipelineOrchestrator(config, createProviders(config), new InMemoryDocumentLibrary([]));
  return new CourseJobService(orchestrator, new InMemoryJobStore());
}

function captureError(action: () => void): unknown {
  try {
    action();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe("CourseJobService", () => {
  it("rejects a request without a topic", async () => {
    const service = await createService();

    const error = captureError(() => service.submit({ topic: "   " }));

    expect(error).toBeInstanceOf(RequestValidationError);
    expect(error).toMatchObject({ issues: ["topic: topic is required"] });
  });

  it("rejects document ids that are not strings", async () => {
    const service = await createService();

    expect(() => service.submit({ topic: "Python", documentIds: [42] })).toThrow(RequestValidationError);
  });

  it("runs a submitted job to completion", async () => {
    const service = await createService();

    const submitted = service.submit({ topic: "Python" });
    expect(submitted.status).toBe("PROCESSING");

    const status = await service.waitFor(submitted.jobId);

    expect(status).toMatchObject({ jobId: submitted.jobId, status: "COMPLETED", progress: 100 });
    expect(status?.resultUrl?.endsWith("course_package.zip")).toBe(true);
    expect(status?.errorMessage).toBeUndefined();
    expect(service.cancel(submitted.jobId)).toBe(false);
  });

  it("reports where each artifact came from", async () => {
    const service = await createService();
    const { jobId } = service.submit({ topic: "Python" });

    expect(service.getArtifacts(jobId)).toBeNull();
    await service.waitFor(jobId);

    const artifacts = service.getArtifacts(jobId) ?? [];
    expect(artifacts[0]).toEqual({
      stage: "curriculum",
      lessonNumber: null,
      providerUsed: "mock-text",
      tier: 1,
      degraded: false,
      attemptCount: 1
    });
    expect(artifacts.filter((artifact) => artifact.stage === "notebooks").map((artifact) => artifact.lessonNumber)).toEqual([2]);
  });

  it("fails a cancelled job", async () => {
    const service = await createService();
    const { jobId } = service.submit({ topic: "Python" });

    expect(service.cancel(jobId)).toBe(true);
    const status = await service.waitFor(jobId);

    expect(status?.status).toBe("FAILED");
    expect(status?.errorMessage).toBe("Job cancelled");
    expect(status?.progress).toBeLessThan(100);
  });

  it("returns null for an unknown job", async () => {
    const service = await createService();

    expect(service.getStatus("missing")).toBeNull();
    expect(await service.waitFor("missing")).toBeNull();
  });
});
