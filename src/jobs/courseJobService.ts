import { z } from "zod";

import { RequestValidationError, formatError } from "../domain/errors.js";
import { JobStatus, StageName } from "../domain/models.js";
import { PipelineOrchestrator, PipelineRunResult } from "../layers/orchestration/pipelineOrchestrator.js";
import { JobStateMachine } from "./jobStateMachine.js";
import { JobStore } from "./jobStore.js";

export const GenerateCourseRequestSchema = z.object({
  topic: z.string().trim().min(1, "topic is required").max(200, "topic must be at most 200 characters"),
  documentIds: z.array(z.string().trim().min(1, "document ids cannot be empty")).max(50).default([])
});

export type GenerateCourseRequest = z.input<typeof GenerateCourseRequestSchema>;

export interface SubmitResponse {
  jobId: string;
  status: JobStatus;
}

export interface JobStatusResponse {
  jobId: string;
  status: JobStatus;
  progress: number;
  resultUrl?: string;
  errorMessage?: string;
  createdAt: string;
  completedAt?: string;
}

export interface ArtifactSummary {
  stage: StageName;
  lessonNumber: number | null;
  providerUsed: string;
  tier: number;
  degraded: boolean;
  attemptCount: number;
}

interface RunningJob {
  controller: AbortController;
  settled: Promise<void>;
}

/**
 * Job control surface: submit a course, poll its status, cancel it. Each job
 * runs in the background on its own orchestrator call.
 */
export class CourseJobService {
  private readonly running = new Map<string, RunningJob>();
  private readonly results = new Map<string, PipelineRunResult>();

  constructor(
    private readonly orchestrator: PipelineOrchestrator,
    private readonly store: JobStore
  ) {}

  submit(request: unknown): SubmitResponse {
    const parsed = GenerateCourseRequestSchema.safeParse(request);
    if (!parsed.success) {
      throw new RequestValidationError(
        parsed.error.issues.map((issue) => `${issue.path.join(".") || "request"}: ${issue.message}`)
      );
    }

    const job = JobStateMachine.create(parsed.data, this.store);
    const controller = new AbortController();
    const settled = this.orchestrator
      .run(job, controller.signal)
      .then((result) => {
        this.results.set(job.id, result);
      })
      .catch((error: unknown) => {
        console.warn(`[jobs] ${job.id} ended with an error: ${formatError(error)}`);
      })
      .finally(() => {
        this.running.delete(job.id);
      });

    this.running.set(job.id, { controller, settled });
    return { jobId: job.id, status: job.snapshot.status };
  }

  getStatus(jobId: string): JobStatusResponse | null {
    const job = this.store.load(jobId);
    if (!job) {
      return null;
    }

    return {
      jobId: job.id,
      status: job.status,
      progress: job.progress,
      resultUrl: job.resultReference,
      errorMessage: job.errorMessage,
      createdAt: job.createdAt,
      completedAt: job.completedAt
    };
  }

  /** Per-artifact provenance of a finished job. Null until the job has completed. */
  getArtifacts(jobId: string): ArtifactSummary[] | null {
    const result = this.results.get(jobId);
    if (!result) {
      return null;
    }

    const { course } = result;
    return [
      course.curriculum,
      ...course.content.values(),
      course.description,
      ...course.scripts.values(),
      ...course.notebooks.values(),
      ...course.backgrounds.values(),
      ...(course.thumbnail ? [course.thumbnail] : []),
      ...course.presenterVideos.values(),
      ...course.finalVideos.values()
    ].map((artifact) => ({
      stage: artifact.stage,
      lessonNumber: artifact.lessonNumber,
      providerUsed: artifact.providerUsed,
      tier: artifact.tier,
      degraded: artifact.degraded,
      attemptCount: artifact.attemptCount
    }));
  }

  getResult(jobId: string): PipelineRunResult | undefined {
    return this.results.get(jobId);
  }

  /** Returns false when the job is unknown or already finished. */
  cancel(jobId: string): boolean {
    const running = this.running.get(jobId);
    if (!running) {
      return false;
    }

    running.controller.abort();
    return true;
  }

  async waitFor(jobId: string): Promise<JobStatusResponse | null> {
    await this.running.get(jobId)?.settled;
    return this.getStatus(jobId);
  }
}
