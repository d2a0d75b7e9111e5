import { RuntimeConfig } from "../config/runtimeConfig.js";
import { DidVideoProvider } from "./live/didVideoProvider.js";
import { FfmpegMediaComposer } from "./live/ffmpegMediaComposer.js";
import { GatewayTextProvider } from "./live/gatewayTextProvider.js";
import { OpenAiImageProvider, OpenAiSpeechProvider } from "./live/openAiMediaProviders.js";
import { SystemSpeechProvider } from "./live/systemSpeechProvider.js";
import {
  MockImageProvider,
  MockMediaComposer,
  MockTextProvider,
  MockTtsProvider,
  MockVideoProvider
} from "./mock/mockProviders.js";
import { ProviderSet } from "./types.js";

/** Chooses live or mock collaborators once, from the configured mode. */
export function createProviders(config: RuntimeConfig): ProviderSet {
  if (config.mode === "mock") {
    return {
      text: new MockTextProvider({ lessonCount: config.lessonCount }),
      image: new MockImageProvider(),
      neuralSpeech: new MockTtsProvider(),
      systemSpeech: new MockTtsProvider(),
      video: new MockVideoProvider(),
      composer: new MockMediaComposer()
    };
  }

  return {
    text: new GatewayTextProvider(config),
    image: new OpenAiImageProvider(config),
    neuralSpeech: new OpenAiSpeechProvider(config),
    systemSpeech: new SystemSpeechProvider(config.systemTtsCommand),
    video: new DidVideoProvider(config),
    composer: new FfmpegMediaComposer(config.ffmpegPath)
  };
}

export type { ProviderSet } from "./types.js";
