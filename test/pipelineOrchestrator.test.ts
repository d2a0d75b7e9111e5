import { mkdir, readFile, readdir, stat } from "node:fs/promises";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { RuntimeConfig } from "../src/config/runtimeConfig.js";
import { PackagingError } from "../src/domain/errors.js";
import { Curriculum, LessonContent, LessonSpec, StageArtifact } from "../src/domain/models.js";
import { JobStateMachine } from "../src/jobs/jobStateMachine.js";
import { InMemoryJobStore } from "../src/jobs/jobStore.js";
import { LessonContentGenerator } from "../src/layers/content/lessonContentGenerator.js";
import { FileDocumentLibrary, InMemoryDocumentLibrary } from "../src/layers/input/documentLibrary.js";
import {
  PROGRESS_INCREMENT,
  PipelineDependencies,
  PipelineOrchestrator,
  createPipelineDependencies
} from "../src/layers/orchestration/pipelineOrchestrator.js";
import { summarizeCourse } from "../src/layers/orchestration/courseSummary.js";
import { CoursePackager, PackageResult } from "../src/layers/storage/coursePackager.js";
import { createProviders } from "../src/providers/index.js";
import { MockTextProvider } from "../src/providers/mock/mockProviders.js";
import { MediaComposer, ProviderSet, VideoProvider } from "../src/providers/types.js";
import { failed } from "../src/runtime/outcome.js";
import { createTempDirectory, removeDirectory, testConfig } from "./helpers/testConfig.js";

let outputDirectory: string | undefined;

afterEach(async () => {
  if (outputDirectory) {
    await removeDirectory(outputDirectory);
    outputDirectory = undefined;
  }
});

async function setup(
  configOverrides: Partial<RuntimeConfig> = {},
  providerOverrides: Partial<ProviderSet> = {},
  dependencyOverrides: (config: RuntimeConfig) => Partial<PipelineDependencies> = () => ({})
) {
  outputDirectory = await createTempDirectory();
  const config = testConfig({ outputDirectory, ...configOverrides });
  const providers = { ...createProviders(config), ...providerOverrides };
  const documents = new InMemoryDocumentLibrary([
    { id: "notes", title: "Course notes", text: "Loops repeat work. Functions name work." }
  ]);
  const orchestrator = new PipelineOrchestrator({
    ...createPipelineDependencies(config, providers, documents),
    ...dependencyOverrides(config)
  });
  const store = new InMemoryJobStore();
  const job = JobStateMachine.create({ topic: "Test", documentIds: ["notes"] }, store);
  return { config, orchestrator, job, store };
}

async function listFiles(directory: string): Promise<string[]> {
  return (await readdir(directory)).sort();
}

describe("PipelineOrchestrator", () => {
  it("builds a complete package for a two-lesson course", async () => {
    const { orchestrator, job } = await setup({ lessonCount: 2 });

    const result = await orchestrator.run(job);

    expect(job.snapshot.status).toBe("COMPLETED");
    expect(job.snapshot.progress).toBe(100);
    expect(job.snapshot.resultReference).toBe(result.archivePath);
    expect((await stat(result.archivePath)).size).toBeGreaterThan(0);

    const packageDirectory = result.packageDirectory;
    expect(await listFiles(path.join(packageDirectory, "scripts"))).toEqual([
      "lesson_01_script.txt",
      "lesson_02_script.txt"
    ]);
    expect(await listFiles(path.join(packageDirectory, "notebooks"))).toEqual(["lesson_02_notebook.ipynb"]);
    expect(await listFiles(path.join(packageDirectory, "videos"))).toEqual(["lesson_01.mp4", "lesson_02.mp4"]);

    const metadata: unknown = JSON.parse(await readFile(path.join(packageDirectory, "course_metadata.json"), "utf8"));
    expect(metadata).toMatchObject({ lessons: 2, course_info: { title: "Complete Test Course", topic: "Test" } });
    expect(result.validation.status).toBe("complete");
  });

  it("creates notebooks only for lessons with coding", async () => {
    const { orchestrator, job } = await setup({ lessonCount: 3 });

    const result = await orchestrator.run(job);

    expect([...result.course.notebooks.keys()]).toEqual([2]);
    expect(result.course.curriculum.value.lessons.filter((lesson) => lesson.hasCoding)).toHaveLength(1);
  });

  it("completes when a source document cannot be read", async () => {
    const documentDirectory = await createTempDirectory();
    await mkdir(path.join(documentDirectory, "notes.md"));
    try {
      const { orchestrator, job } = await setup({ lessonCount: 2 }, {}, () => ({
        documents: new FileDocumentLibrary(documentDirectory)
      }));

      const result = await orchestrator.run(job);

      expect(job.snapshot.status).toBe("COMPLETED");
      expect(result.validation.status).toBe("complete");
    } finally {
      await removeDirectory(documentDirectory);
    }
  });

  it("completes with placeholder clips when every video provider fails", async () => {
    const brokenVideo: VideoProvider = {
      name: "broken-video",
      submit: async () => failed("provider", "HTTP 503"),
      poll: async () => failed("provider", "unused"),
      download: async () => failed("provider", "unused")
    };
    const brokenComposer: MediaComposer = {
      name: "broken-composer",
      composeStill: async () => failed("provider", "encoder crashed"),
      overlay: async () => failed("provider", "encoder crashed")
    };
    const { orchestrator, job } = await setup({ lessonCount: 2 }, { video: brokenVideo, composer: brokenComposer });

    const result = await orchestrator.run(job);

    expect(job.snapshot.status).toBe("COMPLETED");
    for (const lessonNumber of [1, 2]) {
      const presenter = result.course.presenterVideos.get(lessonNumber);
      expect(presenter?.providerUsed).toBe("placeholder-clip");
      expect(presenter?.tier).toBe(3);
      expect(presenter?.degraded).toBe(true);
      expect(result.course.finalVideos.get(lessonNumber)?.providerUsed).toBe("presenter-passthrough");
    }
    expect(await listFiles(path.join(result.packageDirectory, "videos"))).toEqual(["lesson_01.svg", "lesson_02.svg"]);
    expect(summarizeCourse(result)).toContain("Degraded artifacts: 4");
  });

  it("fails only the lesson whose content is missing", async () => {
    class PartialContent extends LessonContentGenerator {
      async generate(curriculum: Curriculum, lesson: LessonSpec, signal?: AbortSignal): Promise<StageArtifact<LessonContent>> {
        if (lesson.lessonNumber === 2) {
          throw new Error("content store unavailable");
        }
        return super.generate(curriculum, lesson, signal);
      }
    }
    const { orchestrator, job } = await setup({ lessonCount: 3 }, {}, (config) => ({
      contentGenerator: new PartialContent(new MockTextProvider({ lessonCount: 3 }), config)
    }));

    const result = await orchestrator.run(job);

    expect(job.snapshot.status).toBe("COMPLETED");
    expect([...result.course.content.keys()]).toEqual([1, 3]);
    expect([...result.course.scripts.keys()]).toEqual([1, 3]);
    expect([...result.course.finalVideos.keys()]).toEqual([1, 3]);
    expect(result.course.backgrounds.size).toBe(3);
    expect(result.validation.status).toBe("mostly_complete");
    expect(result.validation.checks.all_lessons_have_video).toBe(false);
  });

  it("fails the job when packaging fails", async () => {
    class FailingPackager extends CoursePackager {
      async createPackage(): Promise<PackageResult> {
        throw new PackagingError("disk full");
      }
    }
    const { orchestrator, job } = await setup({}, {}, () => ({ packager: new FailingPackager() }));

    await expect(orchestrator.run(job)).rejects.toBeInstanceOf(PackagingError);
    expect(job.snapshot).toMatchObject({
      status: "FAILED",
      errorMessage: "disk full",
      progress: 10 * PROGRESS_INCREMENT
    });
  });

  it("fails a cancelled job with a cancellation message", async () => {
    const { orchestrator, job } = await setup();
    const controller = new AbortController();

    const running = orchestrator.run(job, controller.signal);
    controller.abort();

    await expect(running).rejects.toThrow("Job cancelled");
    expect(job.snapshot.status).toBe("FAILED");
    expect(job.snapshot.errorMessage).toBe("Job cancelled");
    expect(job.snapshot.progress).toBeLessThan(100);
  });
});
