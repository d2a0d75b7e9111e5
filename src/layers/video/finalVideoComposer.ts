import { RuntimeConfig } from "../../config/runtimeConfig.js";
import { LessonSpec, MediaAsset, StageArtifact, StoredFile } from "../../domain/models.js";
import { FallbackChain, toStageArtifact } from "../../runtime/fallbackChain.js";
import { failed, succeeded } from "../../runtime/outcome.js";
import { MediaComposer } from "../../providers/types.js";
import { readStoredFile } from "../storage/jobWorkspace.js";

export interface FinalVideoRequest {
  lesson: LessonSpec;
  presenter: StoredFile;
  background?: StoredFile;
}

export type FinalVideo =
  | { kind: "composed"; asset: MediaAsset }
  | { kind: "passthrough"; file: StoredFile };

/** Stage 9: presenter over background, or the presenter clip unchanged. */
export class FinalVideoComposer {
  private readonly chain: FallbackChain<FinalVideoRequest, FinalVideo>;

  constructor(composer: MediaComposer, config: RuntimeConfig) {
    this.chain = new FallbackChain<FinalVideoRequest, FinalVideo>(
      {
        stage: "final_videos",
        producers: [
          {
            name: `overlay:${composer.name}`,
            timeoutMs: config.videoTimeoutMs,
            retryable: false,
            external: false,
            produce: async (request, context) => {
              if (!request.background) {
                return failed("validation", `Lesson ${request.lesson.lessonNumber} has no background to compose onto`);
              }
              if (request.presenter.mediaType !== "video/mp4") {
                return failed("validation", `Presenter clip is ${request.presenter.mediaType}, not a video`);
              }

              const composed = await composer.overlay({
                presenter: await readStoredFile(request.presenter),
                background: await readStoredFile(request.background),
                title: request.lesson.title,
                signal: context.signal
              });
              return composed.ok ? succeeded<FinalVideo>({ kind: "composed", asset: composed.value }) : composed;
            }
          }
        ],
        terminal: {
          name: "presenter-passthrough",
          produce: (request) => ({ kind: "passthrough", file: request.presenter })
        }
      },
      { retryCount: config.retryCount, verbose: config.verboseLogs }
    );
  }

  async compose(request: FinalVideoRequest, signal?: AbortSignal): Promise<StageArtifact<FinalVideo>> {
    const result = await this.chain.execute(request, signal, `lesson ${request.lesson.lessonNumber}`);
    return toStageArtifact("final_videos", request.lesson.lessonNumber, result);
  }
}
