import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import path from "node:path";

import { GenerationJob, JobStatus } from "../domain/models.js";
import { asNumber, asObject, asString, asStringArray } from "../utils/json.js";

/**
 * Persistence for job records. `save` is synchronous: a transition has been
 * persisted by the time it returns. Each job has exactly one writer.
 */
export interface JobStore {
  save(job: GenerationJob): void;
  load(jobId: string): GenerationJob | undefined;
}

export class InMemoryJobStore implements JobStore {
  private readonly jobs = new Map<string, GenerationJob>();

  save(job: GenerationJob): void {
    this.jobs.set(job.id, { ...job, documentIds: [...job.documentIds] });
  }

  load(jobId: string): GenerationJob | undefined {
    const job = this.jobs.get(jobId);
    return job ? { ...job, documentIds: [...job.documentIds] } : undefined;
  }
}

export class JsonFileJobStore implements JobStore {
  private readonly directory: string;

  constructor(outputDirectory: string) {
    this.directory = path.join(outputDirectory, "jobs");
  }

  save(job: GenerationJob): void {
    mkdirSync(this.directory, { recursive: true });
    const filePath = this.filePath(job.id);
    const tempPath = `${filePath}.tmp`;
    writeFileSync(tempPath, JSON.stringify(job, null, 2), "utf8");
    renameSync(tempPath, filePath);
  }

  load(jobId: string): GenerationJob | undefined {
    const filePath = this.filePath(jobId);
    if (!existsSync(filePath)) {
      return undefined;
    }

    return parseJobRecord(JSON.parse(readFileSync(filePath, "utf8")));
  }

  private filePath(jobId: string): string {
    return path.join(this.directory, `${path.basename(jobId)}.json`);
  }
}

const JOB_STATUSES: JobStatus[] = ["PENDING", "PROCESSING", "COMPLETED", "FAILED"];

function parseJobRecord(value: unknown): GenerationJob {
  const root = asObject(value);
  const status = JOB_STATUSES.find((candidate) => candidate === root.status);
  if (!status) {
    throw new Error(`Job record has an unknown status: ${String(root.status)}`);
  }

  return {
    id: asString(root.id),
    topic: asString(root.topic),
    documentIds: asStringArray(root.documentIds),
    status,
    progress: asNumber(root.progress, 0),
    resultReference: asString(root.resultReference) || undefined,
    errorMessage: asString(root.errorMessage) || undefined,
    createdAt: asString(root.createdAt),
    startedAt: asString(root.startedAt) || undefined,
    completedAt: asString(root.completedAt) || undefined
  };
}
