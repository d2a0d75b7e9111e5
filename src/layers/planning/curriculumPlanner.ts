import { RuntimeConfig } from "../../config/runtimeConfig.js";
import {
  Curriculum,
  DocumentSummary,
  LessonSpec,
  LessonType,
  StageArtifact,
  hasCodingFor
} from "../../domain/models.js";
import { FallbackChain, toStageArtifact, withArtifactValue } from "../../runtime/fallbackChain.js";
import { Outcome, failed, succeeded } from "../../runtime/outcome.js";
import { TextProvider } from "../../providers/types.js";
import { asNumber, asObjectArray, asString, asStringArray } from "../../utils/json.js";
import { ContentRepairer } from "../content/contentRepairer.js";
import { createTextProducer } from "../shared/textProducer.js";
import curriculumTracks from "./curriculumTracks.json" with { type: "json" };

export interface CurriculumRequest {
  topic: string;
  documents: DocumentSummary[];
}

const CURRICULUM_SYSTEM_PROMPT = [
  "You are the Curriculum Planner for an automated course production pipeline.",
  "Return ONLY valid JSON.",
  "Lessons progress from fundamentals to a final project.",
  "Lesson type is one of theory, hands-on or mixed. Hands-on lessons include coding.",
  "Output schema:",
  "{",
  '  "course_title": string,',
  '  "difficulty": "Beginner|Intermediate|Advanced",',
  '  "prerequisites": string[],',
  '  "learning_objectives": string[],',
  '  "target_audience": string,',
  '  "lessons": [{ "title": string, "type": "theory|hands-on|mixed", "duration_minutes": number, "learning_objectives": string[] }]',
  "}"
].join("\n");

const DEFAULT_LESSON_MINUTES = 30;

/** Stage 1: the lesson plan every later stage keys on. */
export class CurriculumPlanner {
  private readonly chain: FallbackChain<CurriculumRequest, Curriculum>;

  constructor(text: TextProvider, private readonly config: RuntimeConfig) {
    const repairer = new ContentRepairer(["lessons"]);

    this.chain = new FallbackChain<CurriculumRequest, Curriculum>(
      {
        stage: "curriculum",
        producers: [
          createTextProducer<CurriculumRequest, Curriculum>({
            provider: text,
            config,
            purpose: "curriculum",
            prompt: (request) => ({
              subject: request.topic,
              systemPrompt: CURRICULUM_SYSTEM_PROMPT,
              userPrompt: this.buildUserPrompt(request)
            }),
            parse: (raw, request) => {
              const repaired = repairer.repair(raw);
              return repaired.ok ? parseCurriculum(repaired.value, request.topic) : repaired;
            }
          })
        ],
        terminal: {
          name: "curriculum-template",
          produce: (request) => buildTemplateCurriculum(request.topic, config.lessonCount)
        }
      },
      { retryCount: config.retryCount, verbose: config.verboseLogs }
    );
  }

  async plan(request: CurriculumRequest, signal?: AbortSignal): Promise<StageArtifact<Curriculum>> {
    const result = await this.chain.execute(request, signal, request.topic);
    const artifact = toStageArtifact("curriculum", null, result);
    return withArtifactValue(artifact, capLessons(result.value, this.config.maxLessons));
  }

  private buildUserPrompt(request: CurriculumRequest): string {
    const sources = request.documents
      .map((document) => `- ${document.title}: ${document.summary}`)
      .join("\n");

    return [
      `Course topic: ${request.topic}`,
      `Number of lessons: ${this.config.lessonCount}`,
      sources ? `Source material:\n${sources}` : "No source material was provided.",
      "Plan the course now."
    ].join("\n\n");
  }
}

export function parseCurriculum(value: Record<string, unknown>, topic: string): Outcome<Curriculum> {
  const lessons = asObjectArray(value.lessons)
    .filter((lesson) => asString(lesson.title).length > 0)
    .map((lesson, index) => parseLesson(lesson, index));

  if (lessons.length === 0) {
    return failed("validation", `Curriculum for "${topic}" has no lessons`);
  }

  return succeeded({
    courseTitle: asString(value.course_title ?? value.courseTitle) || `Complete ${topic} Course`,
    difficulty: asString(value.difficulty) || "Intermediate",
    totalDurationHours: totalHours(lessons),
    prerequisites: asStringArray(value.prerequisites),
    learningObjectives: asStringArray(value.learning_objectives ?? value.learningObjectives),
    targetAudience: asString(value.target_audience ?? value.targetAudience) || "Learners and practitioners",
    lessons
  });
}

export function buildTemplateCurriculum(topic: string, lessonCount: number): Curriculum {
  const topics = topicsFor(topic);
  const lessonTypes = curriculumTracks.lessonTypes.map(toLessonType);

  const lessons = Array.from({ length: lessonCount }, (_, index): LessonSpec => {
    const title = topics[index] ?? `${topic}: Extended Practice ${index - topics.length + 1}`;
    const type = lessonTypes[index % lessonTypes.length];
    return {
      lessonNumber: index + 1,
      title,
      type,
      durationMinutes: DEFAULT_LESSON_MINUTES,
      learningObjectives: objectivesFor(title, type),
      prerequisites: prerequisitesFor(index + 1),
      hasCoding: hasCodingFor(type)
    };
  });

  return {
    courseTitle: `Complete ${topic} Course`,
    difficulty: "Intermediate",
    totalDurationHours: totalHours(lessons),
    prerequisites: ["Basic computer literacy"],
    learningObjectives: [
      `Understand the fundamentals of ${topic}`,
      `Apply ${topic} to practical problems`,
      `Complete a final project using ${topic}`
    ],
    targetAudience: "Learners and practitioners",
    lessons
  };
}

/** Keeps the first `maxLessons` lessons; numbering is already contiguous. */
export function capLessons(curriculum: Curriculum, maxLessons: number | undefined): Curriculum {
  if (maxLessons === undefined || curriculum.lessons.length <= maxLessons) {
    return curriculum;
  }

  const lessons = curriculum.lessons.slice(0, maxLessons);
  return { ...curriculum, lessons, totalDurationHours: totalHours(lessons) };
}

export function toLessonType(value: unknown): LessonType {
  const normalized = asString(value).toLowerCase().replace(/[\s_]+/g, "-");
  if (["hands-on", "handson", "practical", "advanced", "project", "lab"].includes(normalized)) {
    return "hands-on";
  }
  if (["mixed", "case-study", "workshop"].includes(normalized)) {
    return "mixed";
  }
  return "theory";
}

function parseLesson(value: Record<string, unknown>, index: number): LessonSpec {
  const type = toLessonType(value.type);
  const title = asString(value.title);
  const objectives = asStringArray(value.learning_objectives ?? value.learningObjectives);
  const prerequisites = asStringArray(value.prerequisites);

  return {
    lessonNumber: index + 1,
    title,
    type,
    durationMinutes: Math.max(1, Math.round(asNumber(value.duration_minutes ?? value.durationMinutes, DEFAULT_LESSON_MINUTES))),
    learningObjectives: objectives.length > 0 ? objectives : objectivesFor(title, type),
    prerequisites: prerequisites.length > 0 ? prerequisites : prerequisitesFor(index + 1),
    hasCoding: hasCodingFor(type)
  };
}

function topicsFor(topic: string): string[] {
  const lowered = topic.toLowerCase();
  const track = curriculumTracks.tracks.find((candidate) =>
    candidate.keywords.some((keyword) => lowered.includes(keyword))
  );
  if (track) {
    return track.topics;
  }
  return curriculumTracks.genericTopics.map((template) => template.replace("{topic}", topic));
}

function objectivesFor(title: string, type: LessonType): string[] {
  switch (type) {
    case "theory":
      return [
        `Understand the fundamental concepts of ${title}`,
        "Learn the theoretical foundations and principles",
        "Identify key components and their relationships"
      ];
    case "hands-on":
      return [
        `Apply ${title} concepts in practical scenarios`,
        "Practice implementation techniques",
        "Build working examples and solutions"
      ];
    case "mixed":
      return [
        `Analyze real-world applications of ${title}`,
        "Learn from worked examples",
        "Understand common practice in the field"
      ];
  }
}

function prerequisitesFor(lessonNumber: number): string[] {
  if (lessonNumber === 1) {
    return ["Basic computer literacy"];
  }
  if (lessonNumber <= 3) {
    return [`Completion of Lesson ${lessonNumber - 1}`];
  }
  return ["Completion of previous lessons"];
}

function totalHours(lessons: LessonSpec[]): number {
  const minutes = lessons.reduce((sum, lesson) => sum + lesson.durationMinutes, 0);
  return Math.round((minutes / 60) * 100) / 100;
}
