import { StageArtifact } from "../../domain/models.js";
import { PipelineRunResult } from "./pipelineOrchestrator.js";

/** Human-readable report of a finished run, one line per fact. */
export function summarizeCourse(result: PipelineRunResult): string[] {
  const { course } = result;
  const lessons = course.curriculum.value.lessons;
  const lessonArtifacts: StageArtifact<unknown>[] = [
    ...course.content.values(),
    ...course.scripts.values(),
    ...course.notebooks.values(),
    ...course.backgrounds.values(),
    ...course.presenterVideos.values(),
    ...course.finalVideos.values()
  ];
  const degraded = [
    course.curriculum,
    course.description,
    ...(course.thumbnail ? [course.thumbnail] : []),
    ...lessonArtifacts
  ].filter(
    (artifact) => artifact.degraded
  );

  const lines = [
    `Course: ${result.courseTitle}`,
    `Lessons: ${lessons.length} (${lessons.filter((lesson) => lesson.hasCoding).length} with notebooks)`,
    `Final videos: ${course.finalVideos.size}/${lessons.length}`,
    `Degraded artifacts: ${degraded.length}`,
    `Validation: ${result.validation.status} (${result.validation.checksPassed}/${result.validation.totalChecks} checks)`,
    `Package: ${result.packageDirectory}`,
    `Archive: ${result.archivePath}`
  ];

  for (const artifact of degraded) {
    const scope = artifact.lessonNumber === null ? "course" : `lesson ${artifact.lessonNumber}`;
    lines.push(`  - ${artifact.stage} ${scope}: tier ${artifact.tier} (${artifact.providerUsed})`);
  }

  return lines;
}
