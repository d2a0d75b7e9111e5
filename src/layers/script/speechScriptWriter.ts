import { RuntimeConfig } from "../../config/runtimeConfig.js";
import { LessonContent, SpeechScript, StageArtifact } from "../../domain/models.js";
import { FallbackChain, toStageArtifact, withArtifactValue } from "../../runtime/fallbackChain.js";
import { failed, succeeded } from "../../runtime/outcome.js";
import { TextProvider } from "../../providers/types.js";
import { createTextProducer } from "../shared/textProducer.js";
import { addTimingCues, estimateScriptMinutes } from "./scriptCues.js";

const MIN_SCRIPT_WORDS = 20;

const SCRIPT_SYSTEM_PROMPT = [
  "You turn lesson notes into a spoken script for a video presenter.",
  "Write conversational plain text in short paragraphs. No markdown, no lists, no code blocks.",
  "Describe code in words instead of reading it out."
].join("\n");

/** Stage 4: presenter scripts with timing cues and a duration estimate. */
export class SpeechScriptWriter {
  private readonly chain: FallbackChain<LessonContent, string>;

  constructor(text: TextProvider, config: RuntimeConfig) {
    this.chain = new FallbackChain<LessonContent, string>(
      {
        stage: "speech_scripts",
        producers: [
          createTextProducer<LessonContent, string>({
            provider: text,
            config,
            purpose: "speech_script",
            prompt: (content) => ({
              subject: content.title,
              systemPrompt: SCRIPT_SYSTEM_PROMPT,
              userPrompt: buildScriptPrompt(content),
              maxOutputTokens: 1500
            }),
            parse: (raw) => {
              const words = raw.split(/\s+/).filter((word) => word.length > 0).length;
              return words >= MIN_SCRIPT_WORDS
                ? succeeded(raw.trim())
                : failed("validation", `Script has ${words} words, expected at least ${MIN_SCRIPT_WORDS}`);
            }
          })
        ],
        terminal: { name: "script-from-content", produce: scriptFromContent }
      },
      { retryCount: config.retryCount, verbose: config.verboseLogs }
    );
  }

  async write(content: LessonContent, signal?: AbortSignal): Promise<StageArtifact<SpeechScript>> {
    const result = await this.chain.execute(content, signal, `lesson ${content.lessonNumber}`);
    const text = addTimingCues(result.value);

    return withArtifactValue(toStageArtifact("speech_scripts", content.lessonNumber, result), {
      lessonNumber: content.lessonNumber,
      title: content.title,
      text,
      estimatedMinutes: estimateScriptMinutes(text)
    });
  }
}

/** Reads the lesson body aloud in order. Cues are added afterwards. */
export function scriptFromContent(content: LessonContent): string {
  const paragraphs = [
    `Welcome to lesson ${content.lessonNumber}: ${content.title}.`,
    content.introduction,
    ...content.sections.map((section) => `${section.heading}. ${section.body}`)
  ];

  if (content.codeExamples.length > 0) {
    paragraphs.push(
      `Now let's look at some code. ${content.codeExamples
        .map((example) => `${example.title}: ${example.explanation || example.description}`)
        .join(" ")}`
    );
  }
  if (content.keyTakeaways.length > 0) {
    paragraphs.push(`Remember these key points. ${content.keyTakeaways.join(" ")}`);
  }

  paragraphs.push(content.summary, "Thanks for joining me in this lesson. See you in the next one!");
  return paragraphs.filter((paragraph) => paragraph.trim().length > 0).join("\n\n");
}

function buildScriptPrompt(content: LessonContent): string {
  return [
    `Lesson ${content.lessonNumber}: ${content.title} (${content.type}, ${content.durationMinutes} minutes)`,
    `Introduction: ${content.introduction}`,
    `Sections:\n${content.sections.map((section) => `- ${section.heading}: ${section.body}`).join("\n")}`,
    content.codeExamples.length > 0
      ? `Code examples:\n${content.codeExamples.map((example) => `- ${example.title}: ${example.description}`).join("\n")}`
      : "",
    `Key takeaways: ${content.keyTakeaways.join("; ")}`,
    `Summary: ${content.summary}`
  ]
    .filter((line) => line.length > 0)
    .join("\n\n");
}
