import { copyFile, mkdir, readdir, stat, writeFile } from "node:fs/promises";
import path from "node:path";

import AdmZip from "adm-zip";

import { PackagingError, formatError } from "../../domain/errors.js";
import { CourseData, LessonContent, LessonSpec, StageArtifact, StoredFile } from "../../domain/models.js";
import { JobWorkspace } from "./jobWorkspace.js";

export const PACKAGE_DIRECTORIES = [
  "videos",
  "notebooks",
  "resources",
  "marketing",
  "scripts",
  "backgrounds",
  "assessments"
] as const;

const REQUIRED_FILES = ["course_metadata.json", "curriculum.json", "README.md", "setup_instructions.md"] as const;

export type ValidationStatus = "complete" | "mostly_complete" | "incomplete";

export interface ValidationReport {
  packagePath: string;
  validatedAt: string;
  checks: Record<string, boolean>;
  checksPassed: number;
  totalChecks: number;
  status: ValidationStatus;
  valid: boolean;
  lessonsWithVideo: number;
  lessonCount: number;
}

export interface PackageResult {
  packageDirectory: string;
  archivePath: string;
  validation: ValidationReport;
}

/**
 * Stage 10: lays out the course package, validates it and zips it. Any failure
 * is raised as a {@link PackagingError}, which fails the job.
 */
export class CoursePackager {
  constructor(private readonly verbose = false) {}

  async createPackage(course: CourseData, workspace: JobWorkspace): Promise<PackageResult> {
    const packageDirectory = workspace.packageDirectory;

    try {
      for (const directory of PACKAGE_DIRECTORIES) {
        await mkdir(path.join(packageDirectory, directory), { recursive: true });
      }

      const lessons = course.curriculum.value.lessons;
      for (const lesson of lessons) {
        await this.writeLessonFiles(course, lesson, packageDirectory);
      }

      await this.writeMarketing(course, packageDirectory);
      await writeJson(path.join(packageDirectory, "course_metadata.json"), buildMetadata(course));
      await writeJson(path.join(packageDirectory, "curriculum.json"), {
        ...course.curriculum.value,
        description: course.description.value
      });
      await writeFile(path.join(packageDirectory, "README.md"), buildReadme(course), "utf8");
      await writeFile(path.join(packageDirectory, "setup_instructions.md"), SETUP_INSTRUCTIONS, "utf8");

      const validation = await validatePackage(packageDirectory, lessons);
      await writeJson(path.join(packageDirectory, "validation_report.json"), validation);

      const archivePath = `${packageDirectory}.zip`;
      const zip = new AdmZip();
      zip.addLocalFolder(packageDirectory, path.basename(packageDirectory));
      await writeFile(archivePath, zip.toBuffer());

      this.log(`${validation.checksPassed}/${validation.totalChecks} checks passed (${validation.status})`);
      return { packageDirectory, archivePath, validation };
    } catch (error) {
      throw new PackagingError(`Packaging failed for job ${course.jobId}: ${formatError(error)}`, { cause: error });
    }
  }

  private async writeLessonFiles(course: CourseData, lesson: LessonSpec, packageDirectory: string): Promise<void> {
    const prefix = `lesson_${pad(lesson.lessonNumber)}`;

    const video = course.finalVideos.get(lesson.lessonNumber);
    if (video) {
      await copyInto(video.value, path.join(packageDirectory, "videos"), prefix);
    }

    const notebook = course.notebooks.get(lesson.lessonNumber);
    if (notebook) {
      await copyInto(notebook.value, path.join(packageDirectory, "notebooks"), `${prefix}_notebook`);
    }

    const background = course.backgrounds.get(lesson.lessonNumber);
    if (background) {
      await copyInto(background.value, path.join(packageDirectory, "backgrounds"), `${prefix}_background`);
    }

    const script = course.scripts.get(lesson.lessonNumber);
    if (script) {
      await writeFile(path.join(packageDirectory, "scripts", `${prefix}_script.txt`), `${script.value.text}\n`, "utf8");
    }

    const content = course.content.get(lesson.lessonNumber);
    if (content) {
      const materials = path.join(packageDirectory, "resources", "lesson_materials");
      await mkdir(materials, { recursive: true });
      await writeJson(path.join(materials, `${prefix}_content.json`), content.value);

      if (content.value.exercises.length > 0) {
        const exercises = path.join(packageDirectory, "assessments", "exercises");
        await mkdir(exercises, { recursive: true });
        await writeFile(path.join(exercises, `${prefix}_exercises.md`), renderExercises(content.value), "utf8");
      }
    }
  }

  private async writeMarketing(course: CourseData, packageDirectory: string): Promise<void> {
    const marketing = path.join(packageDirectory, "marketing");
    if (course.thumbnail) {
      await copyInto(course.thumbnail.value, marketing, "course_thumbnail");
    }
    await writeFile(path.join(marketing, "course_description.txt"), `${course.description.value}\n`, "utf8");
  }

  private log(message: string): void {
    if (this.verbose) {
      console.log(`[packager] ${message}`);
    }
  }
}

export async function validatePackage(packageDirectory: string, lessons: LessonSpec[]): Promise<ValidationReport> {
  const checks: Record<string, boolean> = {};

  for (const directory of PACKAGE_DIRECTORIES) {
    checks[`directory_${directory}`] = await exists(path.join(packageDirectory, directory));
  }
  for (const file of REQUIRED_FILES) {
    checks[`file_${file}`] = await exists(path.join(packageDirectory, file));
  }

  let lessonsWithVideo = 0;
  for (const lesson of lessons) {
    const hasVideo = await hasFileWithPrefix(path.join(packageDirectory, "videos"), `lesson_${pad(lesson.lessonNumber)}.`);
    if (hasVideo) {
      lessonsWithVideo += 1;
    }
  }
  checks.all_lessons_have_video = lessonsWithVideo === lessons.length;

  const totalChecks = Object.keys(checks).length;
  const checksPassed = Object.values(checks).filter(Boolean).length;
  const status: ValidationStatus =
    checksPassed === totalChecks ? "complete" : checksPassed >= totalChecks * 0.8 ? "mostly_complete" : "incomplete";

  return {
    packagePath: packageDirectory,
    validatedAt: new Date().toISOString(),
    checks,
    checksPassed,
    totalChecks,
    status,
    valid: status !== "incomplete",
    lessonsWithVideo,
    lessonCount: lessons.length
  };
}

function buildMetadata(course: CourseData): Record<string, unknown> {
  const { curriculum } = course;
  const allArtifacts: StageArtifact<unknown>[] = [
    curriculum,
    course.description,
    ...optional(course.thumbnail),
    ...course.content.values(),
    ...course.scripts.values(),
    ...course.notebooks.values(),
    ...course.backgrounds.values(),
    ...course.presenterVideos.values(),
    ...course.finalVideos.values()
  ];

  return {
    lessons: curriculum.value.lessons.length,
    course_info: {
      title: curriculum.value.courseTitle,
      topic: course.topic,
      description: course.description.value,
      difficulty: curriculum.value.difficulty,
      duration_hours: curriculum.value.totalDurationHours,
      prerequisites: curriculum.value.prerequisites,
      learning_objectives: curriculum.value.learningObjectives,
      target_audience: curriculum.value.targetAudience
    },
    lesson_index: curriculum.value.lessons.map((lesson) => ({
      lesson_number: lesson.lessonNumber,
      title: lesson.title,
      type: lesson.type,
      has_coding: lesson.hasCoding,
      duration_minutes: lesson.durationMinutes,
      estimated_script_minutes: course.scripts.get(lesson.lessonNumber)?.value.estimatedMinutes ?? null,
      has_video: course.finalVideos.has(lesson.lessonNumber),
      has_notebook: course.notebooks.has(lesson.lessonNumber)
    })),
    technical_info: {
      notebook_format: "Jupyter (.ipynb)",
      total_file_size_mb: totalSizeMb(course)
    },
    generation_info: {
      job_id: course.jobId,
      created_date: new Date().toISOString(),
      providers_used: [...new Set(allArtifacts.map((artifact) => artifact.providerUsed))].sort(),
      degraded_artifacts: allArtifacts.filter((artifact) => artifact.degraded).length
    }
  };
}

function buildReadme(course: CourseData): string {
  const curriculum = course.curriculum.value;
  const lessonLines = curriculum.lessons.map((lesson) => {
    const extras = [lesson.type, `${lesson.durationMinutes} min`];
    if (course.notebooks.has(lesson.lessonNumber)) {
      extras.push("notebook");
    }
    return `${lesson.lessonNumber}. **${lesson.title}** (${extras.join(", ")})`;
  });

  return [
    `# ${curriculum.courseTitle}`,
    "",
    course.description.value,
    "",
    "## Course overview",
    "",
    `- Difficulty: ${curriculum.difficulty}`,
    `- Duration: ${curriculum.totalDurationHours} hours`,
    `- Lessons: ${curriculum.lessons.length}`,
    `- Audience: ${curriculum.targetAudience}`,
    "",
    "## Lessons",
    "",
    ...lessonLines,
    "",
    "## Package contents",
    "",
    "- `videos/`: one video per lesson",
    "- `notebooks/`: Jupyter notebooks for the coding lessons",
    "- `scripts/`: presenter scripts with timing cues",
    "- `resources/`: lesson materials",
    "- `assessments/`: exercises",
    "- `backgrounds/` and `marketing/`: artwork and the course description",
    "",
    "See `setup_instructions.md` to run the notebooks.",
    ""
  ].join("\n");
}

function renderExercises(content: LessonContent): string {
  const blocks = content.exercises.map((exercise, index) =>
    [
      `## Exercise ${index + 1}: ${exercise.title}`,
      "",
      `Difficulty: ${exercise.difficulty}`,
      "",
      exercise.description,
      ...(exercise.starterCode ? ["", "```python", exercise.starterCode, "```"] : [])
    ].join("\n")
  );
  return [`# Lesson ${content.lessonNumber}: ${content.title}`, "", blocks.join("\n\n"), ""].join("\n");
}

const SETUP_INSTRUCTIONS = [
  "# Setup instructions",
  "",
  "## Requirements",
  "",
  "- Python 3.10 or newer",
  "- Jupyter Notebook or JupyterLab",
  "",
  "## Steps",
  "",
  "1. Create a virtual environment: `python -m venv .venv`",
  "2. Activate it: `source .venv/bin/activate` (Windows: `.venv\\Scripts\\activate`)",
  "3. Install Jupyter: `pip install jupyter`",
  "4. Start it from the package folder: `jupyter notebook notebooks/`",
  "",
  "Watch each lesson video in `videos/` before opening its notebook.",
  ""
].join("\n");

async function copyInto(file: StoredFile, directory: string, baseName: string): Promise<void> {
  await copyFile(file.path, path.join(directory, `${baseName}${path.extname(file.path)}`));
}

async function writeJson(filePath: string, value: unknown): Promise<void> {
  await writeFile(filePath, `${JSON.stringify(value, null, 2)}\n`, "utf8");
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch {
    return false;
  }
}

async function hasFileWithPrefix(directory: string, prefix: string): Promise<boolean> {
  const entries = await readdir(directory);
  return entries.some((entry) => entry.startsWith(prefix));
}

function totalSizeMb(course: CourseData): number {
  const files: StoredFile[] = [
    ...optional(course.thumbnail).map((artifact) => artifact.value),
    ...[...course.finalVideos.values()].map((artifact) => artifact.value),
    ...[...course.notebooks.values()].map((artifact) => artifact.value),
    ...[...course.backgrounds.values()].map((artifact) => artifact.value)
  ];
  const bytes = files.reduce((sum, file) => sum + file.sizeBytes, 0);
  return Math.round((bytes / (1024 * 1024)) * 100) / 100;
}

function optional<T>(artifact: T | undefined): T[] {
  return artifact ? [artifact] : [];
}

function pad(lessonNumber: number): string {
  return String(lessonNumber).padStart(2, "0");
}
