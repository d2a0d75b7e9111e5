import { readFile } from "node:fs/promises";
import path from "node:path";

import { RuntimeConfig } from "../../config/runtimeConfig.js";
import { formatError } from "../../domain/errors.js";
import { LessonSpec, MediaAsset, SpeechScript, StageArtifact, StoredFile } from "../../domain/models.js";
import { FallbackChain, toStageArtifact } from "../../runtime/fallbackChain.js";
import { Outcome, failed, succeeded } from "../../runtime/outcome.js";
import { MediaComposer, VideoProvider } from "../../providers/types.js";
import { pollVideo } from "../../providers/videoPolling.js";
import { toSpeakableText } from "../script/scriptCues.js";
import { readStoredFile } from "../storage/jobWorkspace.js";
import { COURSE_PALETTE, isRasterImage, renderTitleCard } from "../media/placeholderMedia.js";
import { SpeechSynthesizer } from "../media/speechSynthesizer.js";

export interface PresenterRequest {
  lesson: LessonSpec;
  script: SpeechScript;
  background?: StoredFile;
}

const STILL_MEDIA_TYPES: Record<string, string> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".webp": "image/webp"
};

/**
 * Stage 8: one presenter clip per lesson. Tiers: a talking-head render from the
 * video provider, a still image composited with narration, a title-card clip.
 */
export class PresenterVideoGenerator {
  private readonly chain: FallbackChain<PresenterRequest, MediaAsset>;

  constructor(
    video: VideoProvider,
    composer: MediaComposer,
    speech: SpeechSynthesizer,
    private readonly config: RuntimeConfig
  ) {
    this.chain = new FallbackChain<PresenterRequest, MediaAsset>(
      {
        stage: "presenter_videos",
        producers: [
          {
            name: `talking-head:${video.name}`,
            timeoutMs: config.videoTimeoutMs,
            retryable: false,
            external: true,
            produce: async (request, context) => {
              const submitted = await video.submit(
                toSpeakableText(request.script.text),
                config.didPresenterImageUrl,
                context.signal
              );
              if (!submitted.ok) {
                return submitted;
              }

              const resultUrl = await pollVideo(video, submitted.value, {
                intervalMs: config.videoPollIntervalMs,
                maxWaitMs: config.videoMaxWaitMs,
                countTransientErrors: config.countTransientPollErrors,
                signal: context.signal,
                verbose: config.verboseLogs
              });
              return resultUrl.ok ? video.download(resultUrl.value, context.signal) : resultUrl;
            }
          },
          {
            name: `composited-still:${composer.name}`,
            timeoutMs: config.videoTimeoutMs,
            retryable: false,
            external: false,
            produce: async (request, context) => {
              const still = await this.loadStill(request.background);
              if (!still.ok) {
                return still;
              }

              const audio = await speech.synthesize(request.script, context.signal);
              return composer.composeStill({ image: still.value, audio: audio.value, signal: context.signal });
            }
          }
        ],
        terminal: {
          name: "placeholder-clip",
          produce: (request) =>
            renderTitleCard({
              title: request.lesson.title,
              subtitle: `Lesson ${request.lesson.lessonNumber}`,
              width: 1280,
              height: 720,
              background: COURSE_PALETTE.ink,
              foreground: COURSE_PALETTE.surface,
              durationSeconds: Math.max(5, Math.round(request.script.estimatedMinutes * 60))
            })
        }
      },
      { retryCount: config.retryCount, verbose: config.verboseLogs }
    );
  }

  async generate(request: PresenterRequest, signal?: AbortSignal): Promise<StageArtifact<MediaAsset>> {
    const result = await this.chain.execute(request, signal, `lesson ${request.lesson.lessonNumber}`);
    return toStageArtifact("presenter_videos", request.lesson.lessonNumber, result);
  }

  /** The lesson background when it is a raster image, else the configured presenter still. */
  private async loadStill(background: StoredFile | undefined): Promise<Outcome<MediaAsset>> {
    if (background && isRasterImage(background.mediaType)) {
      return succeeded(await readStoredFile(background));
    }

    const stillPath = this.config.presenterImagePath;
    if (!stillPath) {
      return failed("configuration", "No raster background and COURSE_FORGE_PRESENTER_IMAGE is not set");
    }

    const mediaType = STILL_MEDIA_TYPES[path.extname(stillPath).toLowerCase()];
    if (!mediaType) {
      return failed("configuration", `Unsupported presenter image type: ${stillPath}`);
    }

    try {
      const bytes = await readFile(stillPath);
      return succeeded({ bytes: new Uint8Array(bytes), mediaType, extension: path.extname(stillPath).slice(1) });
    } catch (error) {
      return failed("configuration", `Cannot read presenter image ${stillPath}: ${formatError(error)}`);
    }
  }
}
