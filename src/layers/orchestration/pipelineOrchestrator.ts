import { RuntimeConfig } from "../../config/runtimeConfig.js";
import { CancellationError, formatError, throwIfCancelled } from "../../domain/errors.js";
import {
  CourseData,
  LessonArtifacts,
  LessonSpec,
  MediaAsset,
  PIPELINE_STAGES,
  StageArtifact,
  StageName,
  StoredFile
} from "../../domain/models.js";
import { JobStateMachine } from "../../jobs/jobStateMachine.js";
import { BatchFailure, BatchRunner, LessonStageFn } from "../../runtime/batchRunner.js";
import { withArtifactValue } from "../../runtime/fallbackChain.js";
import { Pacer } from "../../runtime/pacer.js";
import { ProviderSet } from "../../providers/types.js";
import { ContentRepairer } from "../content/contentRepairer.js";
import { CourseDescriptionWriter } from "../content/courseDescriptionWriter.js";
import { LessonContentGenerator } from "../content/lessonContentGenerator.js";
import { BackgroundGenerator } from "../graphics/backgroundGenerator.js";
import { DocumentLibrary } from "../input/documentLibrary.js";
import { SpeechSynthesizer } from "../media/speechSynthesizer.js";
import { NotebookCreator } from "../notebook/notebookCreator.js";
import { CurriculumPlanner } from "../planning/curriculumPlanner.js";
import { SpeechScriptWriter } from "../script/speechScriptWriter.js";
import { CoursePackager, ValidationReport } from "../storage/coursePackager.js";
import { JobWorkspace } from "../storage/jobWorkspace.js";
import { FinalVideoComposer } from "../video/finalVideoComposer.js";
import { PresenterVideoGenerator } from "../video/presenterVideoGenerator.js";

export interface PipelineDependencies {
  planner: CurriculumPlanner;
  contentGenerator: LessonContentGenerator;
  descriptionWriter: CourseDescriptionWriter;
  scriptWriter: SpeechScriptWriter;
  notebookCreator: NotebookCreator;
  backgroundGenerator: BackgroundGenerator;
  presenterGenerator: PresenterVideoGenerator;
  finalComposer: FinalVideoComposer;
  packager: CoursePackager;
  documents: DocumentLibrary;
  batchRunner: BatchRunner;
  outputDirectory: string;
}

export interface PipelineRunResult {
  jobId: string;
  courseTitle: string;
  workspaceDirectory: string;
  packageDirectory: string;
  archivePath: string;
  validation: ValidationReport;
  stageArtifacts: Partial<Record<StageName, string>>;
  course: CourseData;
}

/** Stage `n` (1-based) enters at `n * PROGRESS_INCREMENT`, so packaging enters at 90. */
export const PROGRESS_INCREMENT = Math.floor(100 / (PIPELINE_STAGES.length + 1));

interface TraceEntry {
  stage: StageName;
  lessonNumber: number | null;
  providerUsed: string;
  tier: number;
  degraded: boolean;
  attemptCount: number;
  failures: StageArtifact<unknown>["failures"];
}

/**
 * Drives one job through the ten stages in order. Lesson-level problems are
 * absorbed by fallback chains and the batch runner; packaging failures,
 * cancellation and unexpected errors fail the job.
 */
export class PipelineOrchestrator {
  constructor(private readonly dependencies: PipelineDependencies) {}

  async run(job: JobStateMachine, signal?: AbortSignal): Promise<PipelineRunResult> {
    try {
      job.start();
      return await this.execute(job, signal);
    } catch (error) {
      const message = error instanceof CancellationError || signal?.aborted ? "Job cancelled" : formatError(error);
      if (job.snapshot.status === "PROCESSING") {
        job.fail(message);
      }
      this.log(`[${job.id}] failed: ${message}`);
      throw error;
    }
  }

  private async execute(job: JobStateMachine, signal?: AbortSignal): Promise<PipelineRunResult> {
    const { topic, documentIds } = job.snapshot;
    const deps = this.dependencies;
    const workspace = JobWorkspace.forJob(deps.outputDirectory, topic, job.id);
    const stageArtifacts: Partial<Record<StageName, string>> = {};
    const batchFailures: Partial<Record<StageName, BatchFailure[]>> = {};
    const trace: TraceEntry[] = [];

    const enter = (stage: StageName): void => {
      throwIfCancelled(signal);
      const index = PIPELINE_STAGES.indexOf(stage);
      job.advance((index + 1) * PROGRESS_INCREMENT);
      this.log(`[${job.id}] stage ${index + 1}/${PIPELINE_STAGES.length} ${stage}`);
    };
    const record = async (stage: StageName, artifacts: StageArtifact<unknown>[], failures: BatchFailure[] = []) => {
      trace.push(...artifacts.map((artifact) => toTraceEntry(artifact)));
      if (failures.length > 0) {
        batchFailures[stage] = failures;
      }
      const written = await this.tryWrite(`${stage} artifact`, () =>
        workspace.persistStageArtifact(stage, { artifacts, failures })
      );
      if (written) {
        stageArtifacts[stage] = written;
      }
    };
    const batch = async <T>(stage: StageName, lessons: readonly LessonSpec[], stageFn: LessonStageFn<T>) => {
      const result = await deps.batchRunner.run(stage, lessons, stageFn, signal);
      await record(stage, [...result.artifacts.values()], result.failures);
      return result.artifacts;
    };

    this.log(`[${job.id}] starting "${topic}" in ${workspace.directoryPath}`);

    enter("curriculum");
    const documents = await deps.documents.summarize(documentIds);
    const curriculum = await deps.planner.plan({ topic, documents }, signal);
    await record("curriculum", [curriculum]);
    const lessons = curriculum.value.lessons;

    enter("lesson_content");
    const content = await batch("lesson_content", lessons, (lesson, lessonSignal) =>
      deps.contentGenerator.generate(curriculum.value, lesson, lessonSignal)
    );

    enter("course_description");
    const description = await deps.descriptionWriter.write(curriculum.value, signal);
    await record("course_description", [description]);

    enter("speech_scripts");
    const scripts = await batch("speech_scripts", lessons, (lesson, lessonSignal) =>
      deps.scriptWriter.write(required(content, lesson, "lesson content"), lessonSignal)
    );

    enter("notebooks");
    const notebooks = await batch(
      "notebooks",
      lessons.filter((lesson) => lesson.hasCoding),
      async (lesson, lessonSignal) => {
        const artifact = await deps.notebookCreator.create(required(content, lesson, "lesson content"), lessonSignal);
        return store(workspace, "notebooks", lesson, artifact);
      }
    );

    enter("backgrounds");
    const backgrounds = await batch("backgrounds", lessons, async (lesson, lessonSignal) => {
      const artifact = await deps.backgroundGenerator.generateBackground(topic, lesson, lessonSignal);
      return store(workspace, "backgrounds", lesson, artifact);
    });

    enter("course_thumbnail");
    const thumbnailArtifact = await deps.backgroundGenerator.createThumbnail(curriculum.value, description.value, signal);
    const thumbnailFile = await this.tryWrite("course thumbnail", () =>
      workspace.writeAsset("marketing", "course_thumbnail", thumbnailArtifact.value)
    );
    const thumbnail = thumbnailFile ? withArtifactValue(thumbnailArtifact, thumbnailFile) : undefined;
    await record("course_thumbnail", [thumbnail ?? withArtifactValue(thumbnailArtifact, null)]);

    enter("presenter_videos");
    const presenterVideos = await batch("presenter_videos", lessons, async (lesson, lessonSignal) => {
      const artifact = await deps.presenterGenerator.generate(
        {
          lesson,
          script: required(scripts, lesson, "speech script"),
          background: backgrounds.get(lesson.lessonNumber)?.value
        },
        lessonSignal
      );
      return store(workspace, "presenter", lesson, artifact);
    });

    enter("final_videos");
    const finalVideos = await batch("final_videos", lessons, async (lesson, lessonSignal) => {
      const artifact = await deps.finalComposer.compose(
        {
          lesson,
          presenter: required(presenterVideos, lesson, "presenter video"),
          background: backgrounds.get(lesson.lessonNumber)?.value
        },
        lessonSignal
      );
      const video = artifact.value;
      const file =
        video.kind === "composed"
          ? await workspace.writeAsset("final", fileStem(lesson), video.asset)
          : video.file;
      return withArtifactValue(artifact, file);
    });

    enter("package");
    const course: CourseData = {
      jobId: job.id,
      topic,
      curriculum,
      content,
      description,
      scripts,
      notebooks,
      backgrounds,
      thumbnail,
      presenterVideos,
      finalVideos
    };
    const packaged = await deps.packager.createPackage(course, workspace);
    const packageArtifact = await this.tryWrite("package artifact", () =>
      workspace.persistStageArtifact("package", packaged)
    );
    if (packageArtifact) {
      stageArtifacts.package = packageArtifact;
    }

    await this.tryWrite("fallback trace", () => workspace.persistFallbackTrace({ entries: trace, batchFailures }));
    const summary = {
      jobId: job.id,
      topic,
      courseTitle: curriculum.value.courseTitle,
      lessons: lessons.length,
      degradedArtifacts: trace.filter((entry) => entry.degraded).length,
      stageArtifacts,
      archivePath: packaged.archivePath,
      completedAt: new Date().toISOString()
    };
    await this.tryWrite("run summary", () => workspace.persistRunSummary(summary));

    job.complete(packaged.archivePath);
    this.log(`[${job.id}] completed -> ${packaged.archivePath}`);

    return {
      jobId: job.id,
      courseTitle: curriculum.value.courseTitle,
      workspaceDirectory: workspace.directoryPath,
      packageDirectory: packaged.packageDirectory,
      archivePath: packaged.archivePath,
      validation: packaged.validation,
      stageArtifacts,
      course
    };
  }

  /** Run records and the thumbnail are not part of the package contract; losing one is a warning. */
  private async tryWrite<T>(label: string, write: () => Promise<T>): Promise<T | undefined> {
    try {
      return await write();
    } catch (error) {
      console.warn(`[orchestrator] could not write ${label}: ${formatError(error)}`);
      return undefined;
    }
  }

  private log(message: string): void {
    console.log(`[orchestrator] ${message}`);
  }
}

export function createPipelineOrchestrator(
  config: RuntimeConfig,
  providers: ProviderSet,
  documents: DocumentLibrary
): PipelineOrchestrator {
  return new PipelineOrchestrator(createPipelineDependencies(config, providers, documents));
}

/** Wires every stage executor from one config and provider set. */
export function createPipelineDependencies(
  config: RuntimeConfig,
  providers: ProviderSet,
  documents: DocumentLibrary
): PipelineDependencies {
  const speech = new SpeechSynthesizer(providers.neuralSpeech, providers.systemSpeech, config);

  return {
    planner: new CurriculumPlanner(providers.text, config),
    contentGenerator: new LessonContentGenerator(providers.text, config, new ContentRepairer()),
    descriptionWriter: new CourseDescriptionWriter(providers.text, config),
    scriptWriter: new SpeechScriptWriter(providers.text, config),
    notebookCreator: new NotebookCreator(config),
    backgroundGenerator: new BackgroundGenerator(providers.image, config),
    presenterGenerator: new PresenterVideoGenerator(providers.video, providers.composer, speech, config),
    finalComposer: new FinalVideoComposer(providers.composer, config),
    packager: new CoursePackager(config.verboseLogs),
    documents,
    batchRunner: new BatchRunner({
      concurrency: config.lessonConcurrency,
      pacer: config.pacingDelayMs > 0 ? new Pacer(config.pacingDelayMs) : undefined,
      verbose: config.verboseLogs
    }),
    outputDirectory: config.outputDirectory
  };
}

/** Earlier-stage output a lesson needs. Its absence fails only that lesson. */
function required<T>(artifacts: LessonArtifacts<T>, lesson: LessonSpec, what: string): T {
  const artifact = artifacts.get(lesson.lessonNumber);
  if (!artifact) {
    throw new Error(`No ${what} for lesson ${lesson.lessonNumber}`);
  }
  return artifact.value;
}

async function store(
  workspace: JobWorkspace,
  category: string,
  lesson: LessonSpec,
  artifact: StageArtifact<MediaAsset>
): Promise<StageArtifact<StoredFile>> {
  return withArtifactValue(artifact, await workspace.writeAsset(category, fileStem(lesson), artifact.value));
}

function fileStem(lesson: LessonSpec): string {
  return `lesson_${String(lesson.lessonNumber).padStart(2, "0")}`;
}

function toTraceEntry(artifact: StageArtifact<unknown>): TraceEntry {
  return {
    stage: artifact.stage,
    lessonNumber: artifact.lessonNumber,
    providerUsed: artifact.providerUsed,
    tier: artifact.tier,
    degraded: artifact.degraded,
    attemptCount: artifact.attemptCount,
    failures: artifact.failures
  };
}
