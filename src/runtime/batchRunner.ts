import { CancellationError, formatError } from "../domain/errors.js";
import { LessonArtifacts, LessonNumber, LessonSpec, StageArtifact, StageName } from "../domain/models.js";
import { mapWithConcurrency } from "../utils/concurrency.js";
import { Pacer } from "./pacer.js";

export type LessonStageFn<T> = (lesson: LessonSpec, signal?: AbortSignal) => Promise<StageArtifact<T>>;

export interface BatchFailure {
  lessonNumber: LessonNumber;
  message: string;
}

export interface BatchResult<T> {
  /** Only the lessons that produced an artifact, in curriculum order. */
  artifacts: LessonArtifacts<T>;
  failures: BatchFailure[];
}

export interface BatchRunnerOptions {
  concurrency: number;
  /** Absent in mock mode: no pacing at all. */
  pacer?: Pacer;
  verbose?: boolean;
}

export class BatchRunner {
  constructor(private readonly options: BatchRunnerOptions) {}

  async run<T>(
    stage: StageName,
    lessons: readonly LessonSpec[],
    stageFn: LessonStageFn<T>,
    signal?: AbortSignal
  ): Promise<BatchResult<T>> {
    const completed = new Map<LessonNumber, StageArtifact<T>>();
    const failures: BatchFailure[] = [];

    await mapWithConcurrency(
      lessons,
      this.options.concurrency,
      async (lesson) => {
        try {
          const artifact = await stageFn(lesson, signal);
          completed.set(lesson.lessonNumber, artifact);
          this.log(stage, `lesson ${lesson.lessonNumber} via ${artifact.providerUsed} (tier ${artifact.tier})`);

          if (artifact.external && this.options.pacer) {
            await this.options.pacer.wait(signal);
          }
        } catch (error) {
          if (error instanceof CancellationError) {
            throw error;
          }

          failures.push({ lessonNumber: lesson.lessonNumber, message: formatError(error) });
          console.warn(`[batch:${stage}] lesson ${lesson.lessonNumber} failed: ${formatError(error)}`);
        }
      },
      signal
    );

    const artifacts: LessonArtifacts<T> = new Map();
    for (const lesson of lessons) {
      const artifact = completed.get(lesson.lessonNumber);
      if (artifact) {
        artifacts.set(lesson.lessonNumber, artifact);
      }
    }

    return { artifacts, failures };
  }

  private log(stage: StageName, message: string): void {
    if (this.options.verbose) {
      console.log(`[batch:${stage}] ${message}`);
    }
  }
}
