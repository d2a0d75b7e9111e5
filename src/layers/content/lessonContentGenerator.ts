import { RuntimeConfig } from "../../config/runtimeConfig.js";
import { Curriculum, LessonBody, LessonContent, LessonSpec, StageArtifact } from "../../domain/models.js";
import { FallbackChain, toStageArtifact, withArtifactValue } from "../../runtime/fallbackChain.js";
import { TextProvider } from "../../providers/types.js";
import { createTextProducer } from "../shared/textProducer.js";
import { ContentRepairer } from "./contentRepairer.js";
import { parseLessonBody } from "./lessonBody.js";

export interface LessonContentRequest {
  courseTitle: string;
  lesson: LessonSpec;
}

const CONTENT_SYSTEM_PROMPT = [
  "You are the Lesson Writer for an automated course production pipeline.",
  "Return ONLY valid JSON. Escape quotes and line breaks inside string values.",
  "Hands-on lessons must include runnable Python code examples and exercises.",
  "Output schema:",
  "{",
  '  "introduction": string,',
  '  "sections": [{ "heading": string, "body": string }],',
  '  "code_examples": [{ "title": string, "description": string, "code": string, "explanation": string }],',
  '  "exercises": [{ "title": string, "description": string, "difficulty": "Easy|Medium|Hard", "starter_code": string, "solution": string }],',
  '  "key_takeaways": string[],',
  '  "summary": string',
  "}"
].join("\n");

export class LessonContentGenerator {
  private readonly chain: FallbackChain<LessonContentRequest, LessonBody>;

  constructor(text: TextProvider, config: RuntimeConfig, repairer = new ContentRepairer()) {
    this.chain = new FallbackChain<LessonContentRequest, LessonBody>(
      {
        stage: "lesson_content",
        producers: [
          createTextProducer<LessonContentRequest, LessonBody>({
            provider: text,
            config,
            purpose: "lesson_content",
            prompt: (request) => ({
              subject: request.lesson.title,
              systemPrompt: CONTENT_SYSTEM_PROMPT,
              userPrompt: buildContentPrompt(request)
            }),
            parse: (raw, request) => {
              const repaired = repairer.repair(raw);
              return repaired.ok ? parseLessonBody(repaired.value, request.lesson.title) : repaired;
            }
          })
        ],
        terminal: {
          name: "lesson-template",
          produce: (request) => repairer.templateFor(request.lesson.title)
        }
      },
      { retryCount: config.retryCount, verbose: config.verboseLogs }
    );
  }

  async generate(curriculum: Curriculum, lesson: LessonSpec, signal?: AbortSignal): Promise<StageArtifact<LessonContent>> {
    const result = await this.chain.execute(
      { courseTitle: curriculum.courseTitle, lesson },
      signal,
      `lesson ${lesson.lessonNumber}`
    );

    return withArtifactValue(toStageArtifact("lesson_content", lesson.lessonNumber, result), {
      lessonNumber: lesson.lessonNumber,
      title: lesson.title,
      type: lesson.type,
      durationMinutes: lesson.durationMinutes,
      hasCoding: lesson.hasCoding,
      ...result.value
    });
  }
}

function buildContentPrompt(request: LessonContentRequest): string {
  const { lesson } = request;
  return [
    `Course: ${request.courseTitle}`,
    `Lesson ${lesson.lessonNumber}: ${lesson.title}`,
    `Type: ${lesson.type}`,
    `Duration: ${lesson.durationMinutes} minutes`,
    `Learning objectives:\n${lesson.learningObjectives.map((objective) => `- ${objective}`).join("\n")}`,
    lesson.hasCoding ? "Include at least two code examples and two exercises." : "Focus on concepts; code is optional."
  ].join("\n");
}
