import { RuntimeConfig } from "../../config/runtimeConfig.js";
import { MediaAsset, SpeechScript } from "../../domain/models.js";
import { ChainResult, FallbackChain, Producer } from "../../runtime/fallbackChain.js";
import { TtsProvider } from "../../providers/types.js";
import { toSpeakableText } from "../script/scriptCues.js";
import { synthesizeTone } from "./placeholderMedia.js";

interface SpeechRequest {
  text: string;
  durationSeconds: number;
}

const MAX_TONE_SECONDS = 300;

/** Narration audio: neural TTS, then the system speech command, then a synthesized tone. */
export class SpeechSynthesizer {
  private readonly chain: FallbackChain<SpeechRequest, MediaAsset>;

  constructor(neural: TtsProvider, system: TtsProvider, config: RuntimeConfig) {
    this.chain = new FallbackChain<SpeechRequest, MediaAsset>(
      {
        stage: "presenter_videos",
        producers: [
          speechProducer(neural, config.speechTimeoutMs, true),
          speechProducer(system, config.speechTimeoutMs, false)
        ],
        terminal: {
          name: "synthesized-tone",
          produce: (request) => synthesizeTone({ durationSeconds: request.durationSeconds })
        }
      },
      { retryCount: config.retryCount, verbose: config.verboseLogs }
    );
  }

  synthesize(script: SpeechScript, signal?: AbortSignal): Promise<ChainResult<MediaAsset>> {
    const durationSeconds = Math.min(MAX_TONE_SECONDS, Math.max(2, Math.round(script.estimatedMinutes * 60)));
    return this.chain.execute({ text: toSpeakableText(script.text), durationSeconds }, signal, `speech ${script.lessonNumber}`);
  }
}

function speechProducer(provider: TtsProvider, timeoutMs: number, external: boolean): Producer<SpeechRequest, MediaAsset> {
  return {
    name: provider.name,
    timeoutMs,
    retryable: external,
    external,
    produce: (request, context) => provider.synthesize(request.text, context.signal)
  };
}
