import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";

import { MediaAsset, StoredFile } from "../../domain/models.js";
import { slugify } from "../../utils/text.js";

/**
 * Per-job output namespace: `<output>/<topic-slug>-<timestamp>-<job id prefix>/`.
 * Two jobs for the same topic never share a directory.
 */
export class JobWorkspace {
  readonly directoryPath: string;

  constructor(outputDirectory: string, readonly directoryName: string) {
    this.directoryPath = path.join(outputDirectory, directoryName);
  }

  static forJob(outputDirectory: string, topic: string, jobId: string, now = new Date()): JobWorkspace {
    const timestamp = now.toISOString().replace(/[-:]/g, "").replace(/\..+$/, "").replace("T", "-");
    const name = `${slugify(topic).slice(0, 48) || "course"}-${timestamp}-${jobId.slice(0, 8)}`;
    return new JobWorkspace(outputDirectory, name);
  }

  get workDirectory(): string {
    return path.join(this.directoryPath, "work");
  }

  get runDirectory(): string {
    return path.join(this.directoryPath, "runs");
  }

  get packageDirectory(): string {
    return path.join(this.directoryPath, "course_package");
  }

  async writeAsset(category: string, baseName: string, asset: MediaAsset): Promise<StoredFile> {
    const directory = path.join(this.workDirectory, category);
    await mkdir(directory, { recursive: true });
    const filePath = path.join(directory, `${baseName}.${asset.extension}`);
    await writeFile(filePath, asset.bytes);
    return { path: filePath, mediaType: asset.mediaType, sizeBytes: asset.bytes.length };
  }

  async persistStageArtifact(stage: string, artifact: unknown): Promise<string> {
    return this.writeRunFile(`${stage}.artifact.json`, artifact);
  }

  async persistFallbackTrace(trace: unknown): Promise<string> {
    return this.writeRunFile("fallback-trace.json", trace);
  }

  async persistRunSummary(summary: unknown): Promise<string> {
    return this.writeRunFile("run-summary.json", summary);
  }

  private async writeRunFile(fileName: string, value: unknown): Promise<string> {
    await mkdir(this.runDirectory, { recursive: true });
    const filePath = path.join(this.runDirectory, fileName);
    await writeFile(filePath, JSON.stringify(value, null, 2), "utf8");
    return filePath;
  }
}

export async function readStoredFile(file: StoredFile): Promise<MediaAsset> {
  const bytes = await readFile(file.path);
  return {
    bytes: new Uint8Array(bytes),
    mediaType: file.mediaType,
    extension: path.extname(file.path).slice(1) || "bin"
  };
}
