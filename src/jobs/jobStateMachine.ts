import { randomUUID } from "node:crypto";

import { JobStateError } from "../domain/errors.js";
import { GenerationJob, JobStatus } from "../domain/models.js";
import { JobStore } from "./jobStore.js";

export interface NewJobInput {
  topic: string;
  documentIds: string[];
}

/**
 * Lifecycle of one generation job: PENDING -> PROCESSING -> COMPLETED | FAILED.
 *
 * Every transition replaces the record and persists it before returning.
 * Terminal states accept no further calls; attempts throw {@link JobStateError}.
 * Progress only moves forward and stays below 100 until completion, so a
 * terminal job reports 100 exactly when it is COMPLETED.
 */
export class JobStateMachine {
  private constructor(
    private job: GenerationJob,
    private readonly store: JobStore
  ) {}

  static create(input: NewJobInput, store: JobStore): JobStateMachine {
    const job: GenerationJob = {
      id: randomUUID(),
      topic: input.topic,
      documentIds: [...input.documentIds],
      status: "PENDING",
      progress: 0,
      createdAt: new Date().toISOString()
    };
    store.save(job);
    return new JobStateMachine(job, store);
  }

  get snapshot(): Readonly<GenerationJob> {
    return this.job;
  }

  get id(): string {
    return this.job.id;
  }

  get isTerminal(): boolean {
    return this.job.status === "COMPLETED" || this.job.status === "FAILED";
  }

  start(): void {
    this.expectStatus("PENDING", "start");
    this.commit({ ...this.job, status: "PROCESSING", startedAt: new Date().toISOString() });
  }

  advance(progress: number): void {
    this.expectStatus("PROCESSING", "advance");

    if (!Number.isInteger(progress) || progress < 0 || progress >= 100) {
      throw new JobStateError(
        "progress_out_of_range",
        `Progress must be an integer in [0, 100) while processing; received ${progress}.`
      );
    }
    if (progress < this.job.progress) {
      throw new JobStateError(
        "progress_regression",
        `Progress cannot move backwards (${this.job.progress} -> ${progress}).`
      );
    }

    this.commit({ ...this.job, progress });
  }

  complete(resultReference: string): void {
    this.expectStatus("PROCESSING", "complete");
    this.commit({
      ...this.job,
      status: "COMPLETED",
      progress: 100,
      resultReference,
      completedAt: new Date().toISOString()
    });
  }

  fail(errorMessage: string): void {
    this.expectStatus("PROCESSING", "fail");
    this.commit({
      ...this.job,
      status: "FAILED",
      errorMessage,
      completedAt: new Date().toISOString()
    });
  }

  private expectStatus(expected: JobStatus, operation: string): void {
    if (this.job.status !== expected) {
      throw new JobStateError(
        "invalid_transition",
        `Cannot ${operation} job ${this.job.id}: status is ${this.job.status}, expected ${expected}.`
      );
    }
  }

  private commit(next: GenerationJob): void {
    this.store.save(next);
    this.job = next;
    console.log(`[job] ${next.id} ${next.status} ${next.progress}%`);
  }
}
