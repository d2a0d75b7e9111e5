import { RuntimeConfig } from "../../config/runtimeConfig.js";
import { Curriculum, StageArtifact } from "../../domain/models.js";
import { FallbackChain, toStageArtifact } from "../../runtime/fallbackChain.js";
import { failed, succeeded } from "../../runtime/outcome.js";
import { TextProvider } from "../../providers/types.js";
import { normalizeWhitespace } from "../../utils/text.js";
import { createTextProducer } from "../shared/textProducer.js";

const DESCRIPTION_SYSTEM_PROMPT = [
  "You write marketing copy for online courses.",
  "Return two or three plain-text paragraphs, no markdown headings, under 200 words."
].join("\n");

/** Stage 3: the course description used on the thumbnail and in the package marketing folder. */
export class CourseDescriptionWriter {
  private readonly chain: FallbackChain<Curriculum, string>;

  constructor(text: TextProvider, config: RuntimeConfig) {
    this.chain = new FallbackChain<Curriculum, string>(
      {
        stage: "course_description",
        producers: [
          createTextProducer<Curriculum, string>({
            provider: text,
            config,
            purpose: "course_description",
            prompt: (curriculum) => ({
              subject: curriculum.courseTitle,
              systemPrompt: DESCRIPTION_SYSTEM_PROMPT,
              userPrompt: [
                `Course: ${curriculum.courseTitle}`,
                `Audience: ${curriculum.targetAudience}`,
                `Level: ${curriculum.difficulty}`,
                `Lessons:\n${curriculum.lessons.map((lesson) => `- ${lesson.title}`).join("\n")}`
              ].join("\n"),
              maxOutputTokens: 600
            }),
            parse: (raw) => {
              const text = normalizeWhitespace(raw.replace(/^#+\s.*$/gm, ""));
              return text.length >= 40 ? succeeded(text) : failed("validation", "Description is too short");
            }
          })
        ],
        terminal: { name: "description-template", produce: templateDescription }
      },
      { retryCount: config.retryCount, verbose: config.verboseLogs }
    );
  }

  async write(curriculum: Curriculum, signal?: AbortSignal): Promise<StageArtifact<string>> {
    const result = await this.chain.execute(curriculum, signal, curriculum.courseTitle);
    return toStageArtifact("course_description", null, result);
  }
}

export function templateDescription(curriculum: Curriculum): string {
  const hours = curriculum.totalDurationHours;
  return [
    `${curriculum.courseTitle} is a ${curriculum.difficulty.toLowerCase()} course for ${curriculum.targetAudience.toLowerCase()}.`,
    `Across ${curriculum.lessons.length} lessons and about ${hours} hours of video you move from the fundamentals to a complete final project.`,
    "Every lesson pairs a short presentation with notes, and the practical lessons come with notebooks and exercises."
  ].join(" ");
}
