import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { RuntimeConfig, loadRuntimeConfig } from "../../src/config/runtimeConfig.js";
import { LessonSpec, LessonType, StageArtifact, StageName, hasCodingFor } from "../../src/domain/models.js";

/** Mock-mode config with quiet logs, no retries and short timeouts. */
export function testConfig(overrides: Partial<RuntimeConfig> = {}): RuntimeConfig {
  const base = loadRuntimeConfig({
    COURSE_FORGE_PROVIDER_MODE: "mock",
    COURSE_FORGE_VERBOSE_LOGS: "false",
    COURSE_FORGE_RETRY_COUNT: "0",
    COURSE_FORGE_LESSON_COUNT: "2",
    COURSE_FORGE_TEXT_TIMEOUT_MS: "2000",
    COURSE_FORGE_IMAGE_TIMEOUT_MS: "2000",
    COURSE_FORGE_SPEECH_TIMEOUT_MS: "2000",
    COURSE_FORGE_VIDEO_TIMEOUT_MS: "5000",
    COURSE_FORGE_VIDEO_POLL_INTERVAL_MS: "1",
    COURSE_FORGE_VIDEO_MAX_WAIT_MS: "20"
  });
  return { ...base, ...overrides };
}

export async function createTempDirectory(prefix = "course-forge-"): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDirectory(directory: string): Promise<void> {
  await rm(directory, { recursive: true, force: true });
}

export function makeLesson(lessonNumber: number, type: LessonType = "theory"): LessonSpec {
  return {
    lessonNumber,
    title: `Lesson ${lessonNumber}`,
    type,
    durationMinutes: 30,
    learningObjectives: [],
    prerequisites: [],
    hasCoding: hasCodingFor(type)
  };
}

export function makeArtifact<T>(
  stage: StageName,
  lessonNumber: number | null,
  value: T,
  external = false
): StageArtifact<T> {
  return {
    stage,
    lessonNumber,
    value,
    providerUsed: "test",
    tier: 1,
    attemptCount: 1,
    degraded: false,
    external,
    failures: [],
    producedAt: "2026-01-01T00:00:00.000Z"
  };
}
