import { createOpenAI } from "@ai-sdk/openai";
import { experimental_generateImage as generateImage, experimental_generateSpeech as generateSpeech } from "ai";

import { RuntimeConfig } from "../../config/runtimeConfig.js";
import { MediaAsset } from "../../domain/models.js";
import { extensionForMediaType } from "../../layers/media/placeholderMedia.js";
import { Outcome, failed, succeeded } from "../../runtime/outcome.js";
import { ImageProvider, ImageSize, TtsProvider } from "../types.js";
import { failureFromError } from "./providerErrors.js";

type OpenAiClient = ReturnType<typeof createOpenAI>;

export class OpenAiImageProvider implements ImageProvider {
  readonly name: string;
  private readonly client?: OpenAiClient;

  constructor(private readonly config: RuntimeConfig) {
    this.name = `openai-image:${config.imageModel}`;
    this.client = config.openaiApiKey ? createOpenAI({ apiKey: config.openaiApiKey }) : undefined;
  }

  async generate(prompt: string, size: ImageSize, signal?: AbortSignal): Promise<Outcome<MediaAsset>> {
    if (!this.client) {
      return failed("configuration", "OPENAI_API_KEY is not set");
    }

    try {
      const { image } = await generateImage({
        model: this.client.image(this.config.imageModel),
        prompt,
        size,
        n: 1,
        maxRetries: 0,
        abortSignal: signal
      });

      return succeeded({
        bytes: image.uint8Array,
        mediaType: image.mediaType,
        extension: extensionForMediaType(image.mediaType)
      });
    } catch (error) {
      return failureFromError(error, signal);
    }
  }
}

export class OpenAiSpeechProvider implements TtsProvider {
  readonly name: string;
  private readonly client?: OpenAiClient;

  constructor(private readonly config: RuntimeConfig) {
    this.name = `openai-speech:${config.speechModel}`;
    this.client = config.openaiApiKey ? createOpenAI({ apiKey: config.openaiApiKey }) : undefined;
  }

  async synthesize(text: string, signal?: AbortSignal): Promise<Outcome<MediaAsset>> {
    if (!this.client) {
      return failed("configuration", "OPENAI_API_KEY is not set");
    }

    try {
      const { audio } = await generateSpeech({
        model: this.client.speech(this.config.speechModel),
        text,
        voice: this.config.speechVoice,
        outputFormat: "mp3",
        maxRetries: 0,
        abortSignal: signal
      });

      return succeeded({
        bytes: audio.uint8Array,
        mediaType: audio.mediaType,
        extension: extensionForMediaType(audio.mediaType)
      });
    } catch (error) {
      return failureFromError(error, signal);
    }
  }
}
