import { RuntimeConfig } from "../../config/runtimeConfig.js";
import { Curriculum, LessonSpec, MediaAsset, StageArtifact } from "../../domain/models.js";
import { FallbackChain, Producer, toStageArtifact } from "../../runtime/fallbackChain.js";
import { ImageProvider, ImageSize } from "../../providers/types.js";
import { COURSE_PALETTE, renderTitleCard } from "../media/placeholderMedia.js";

interface ImageRequest {
  prompt: string;
  title: string;
  subtitle?: string;
  background: string;
}

const IMAGE_SIZE: ImageSize = "1792x1024";
const CARD_WIDTH = 1792;
const CARD_HEIGHT = 1024;
const LESSON_BACKGROUNDS = [COURSE_PALETTE.primary, COURSE_PALETTE.secondary, COURSE_PALETTE.ink];

/** Stages 6 and 7: lesson backgrounds and the course thumbnail. */
export class BackgroundGenerator {
  private readonly backgroundChain: FallbackChain<ImageRequest, MediaAsset>;
  private readonly thumbnailChain: FallbackChain<ImageRequest, MediaAsset>;

  constructor(image: ImageProvider, config: RuntimeConfig) {
    const producer: Producer<ImageRequest, MediaAsset> = {
      name: image.name,
      timeoutMs: config.imageTimeoutMs,
      retryable: true,
      external: true,
      produce: (request, context) => image.generate(request.prompt, IMAGE_SIZE, context.signal)
    };
    const terminal = {
      name: "title-card",
      produce: (request: ImageRequest): MediaAsset =>
        renderTitleCard({
          title: request.title,
          subtitle: request.subtitle,
          width: CARD_WIDTH,
          height: CARD_HEIGHT,
          background: request.background,
          foreground: COURSE_PALETTE.surface
        })
    };
    const options = { retryCount: config.retryCount, verbose: config.verboseLogs };

    this.backgroundChain = new FallbackChain<ImageRequest, MediaAsset>({ stage: "backgrounds", producers: [producer], terminal }, options);
    this.thumbnailChain = new FallbackChain<ImageRequest, MediaAsset>({ stage: "course_thumbnail", producers: [producer], terminal }, options);
  }

  async generateBackground(topic: string, lesson: LessonSpec, signal?: AbortSignal): Promise<StageArtifact<MediaAsset>> {
    const request: ImageRequest = {
      prompt: [
        `A clean, modern presentation background for a lesson titled "${lesson.title}" in a course about ${topic}.`,
        "Abstract shapes, soft gradients, plenty of empty space on the left for a presenter. No text, no people."
      ].join(" "),
      title: lesson.title,
      subtitle: `Lesson ${lesson.lessonNumber}`,
      background: LESSON_BACKGROUNDS[(lesson.lessonNumber - 1) % LESSON_BACKGROUNDS.length]
    };

    const result = await this.backgroundChain.execute(request, signal, `lesson ${lesson.lessonNumber}`);
    return toStageArtifact("backgrounds", lesson.lessonNumber, result);
  }

  async createThumbnail(curriculum: Curriculum, description: string, signal?: AbortSignal): Promise<StageArtifact<MediaAsset>> {
    const request: ImageRequest = {
      prompt: [
        `An eye-catching course thumbnail for "${curriculum.courseTitle}".`,
        `The course is about: ${description.slice(0, 400)}`,
        "Bold composition, vivid colours, no text."
      ].join(" "),
      title: curriculum.courseTitle,
      subtitle: `${curriculum.lessons.length} lessons · ${curriculum.difficulty}`,
      background: COURSE_PALETTE.accent
    };

    const result = await this.thumbnailChain.execute(request, signal, curriculum.courseTitle);
    return toStageArtifact("course_thumbnail", null, result);
  }
}
