export type LessonType = "theory" | "hands-on" | "mixed";

export type LessonNumber = number;

export const PIPELINE_STAGES = [
  "curriculum",
  "lesson_content",
  "course_description",
  "speech_scripts",
  "notebooks",
  "backgrounds",
  "course_thumbnail",
  "presenter_videos",
  "final_videos",
  "package"
] as const;

export type StageName = (typeof PIPELINE_STAGES)[number];

export interface LessonSpec {
  lessonNumber: LessonNumber;
  title: string;
  type: LessonType;
  durationMinutes: number;
  learningObjectives: string[];
  prerequisites: string[];
  hasCoding: boolean;
}

export interface Curriculum {
  courseTitle: string;
  difficulty: string;
  totalDurationHours: number;
  prerequisites: string[];
  learningObjectives: string[];
  targetAudience: string;
  lessons: LessonSpec[];
}

export interface ContentSection {
  heading: string;
  body: string;
}

export interface CodeExample {
  title: string;
  description: string;
  code: string;
  explanation: string;
}

export interface Exercise {
  title: string;
  description: string;
  difficulty: string;
  starterCode: string;
  solution: string;
}

/** The lesson body as produced by a text provider or the template. */
export interface LessonBody {
  introduction: string;
  sections: ContentSection[];
  codeExamples: CodeExample[];
  exercises: Exercise[];
  keyTakeaways: string[];
  summary: string;
}

export interface LessonContent extends LessonBody {
  lessonNumber: LessonNumber;
  title: string;
  type: LessonType;
  durationMinutes: number;
  hasCoding: boolean;
}

export interface SpeechScript {
  lessonNumber: LessonNumber;
  title: string;
  text: string;
  estimatedMinutes: number;
}

/** Media produced in memory by a producer, before it is written to the job workspace. */
export interface MediaAsset {
  bytes: Uint8Array;
  mediaType: string;
  extension: string;
}

export interface StoredFile {
  path: string;
  mediaType: string;
  sizeBytes: number;
}

export type FailureKind = "configuration" | "provider" | "validation" | "timeout" | "cancelled";

export interface TierFailure {
  tier: number;
  producer: string;
  kind: FailureKind;
  message: string;
  attempt: number;
}

export interface StageArtifact<T> {
  stage: StageName;
  lessonNumber: LessonNumber | null;
  value: T;
  providerUsed: string;
  tier: number;
  attemptCount: number;
  degraded: boolean;
  external: boolean;
  failures: TierFailure[];
  producedAt: string;
}

export type LessonArtifacts<T> = Map<LessonNumber, StageArtifact<T>>;

export interface CourseData {
  jobId: string;
  topic: string;
  curriculum: StageArtifact<Curriculum>;
  content: LessonArtifacts<LessonContent>;
  description: StageArtifact<string>;
  scripts: LessonArtifacts<SpeechScript>;
  notebooks: LessonArtifacts<StoredFile>;
  backgrounds: LessonArtifacts<StoredFile>;
  /** Absent when the thumbnail could not be written to the workspace. */
  thumbnail?: StageArtifact<StoredFile>;
  presenterVideos: LessonArtifacts<StoredFile>;
  finalVideos: LessonArtifacts<StoredFile>;
}

export interface DocumentSummary {
  id: string;
  title: string;
  summary: string;
}

export function hasCodingFor(type: LessonType): boolean {
  return type === "hands-on";
}

export type JobStatus = "PENDING" | "PROCESSING" | "COMPLETED" | "FAILED";

export interface GenerationJob {
  id: string;
  topic: string;
  documentIds: string[];
  status: JobStatus;
  progress: number;
  resultReference?: string;
  errorMessage?: string;
  createdAt: string;
  startedAt?: string;
  completedAt?: string;
}
