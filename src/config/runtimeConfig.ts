export type ProviderMode = "live" | "mock";

type Env = Record<string, string | undefined>;

export interface RuntimeConfig {
  mode: ProviderMode;
  gatewayApiKey?: string;
  gatewayModel: string;
  openaiApiKey?: string;
  imageModel: string;
  speechModel: string;
  speechVoice: string;
  didApiKey?: string;
  didApiUrl: string;
  didPresenterImageUrl: string;
  systemTtsCommand?: string;
  ffmpegPath: string;
  presenterImagePath?: string;
  maxOutputTokens: number;
  temperature: number;
  retryCount: number;
  textTimeoutMs: number;
  imageTimeoutMs: number;
  speechTimeoutMs: number;
  videoTimeoutMs: number;
  videoPollIntervalMs: number;
  videoMaxWaitMs: number;
  countTransientPollErrors: boolean;
  lessonConcurrency: number;
  pacingDelayMs: number;
  lessonCount: number;
  maxLessons?: number;
  outputDirectory: string;
  documentDirectory: string;
  verboseLogs: boolean;
}

const DEFAULT_MODEL = "anthropic/claude-sonnet-4";

export function loadRuntimeConfig(env: Env = process.env): Readonly<RuntimeConfig> {
  const reader = new EnvReader(env);
  const gatewayApiKey = reader.optional("AI_GATEWAY_API_KEY");
  const openaiApiKey = reader.optional("OPENAI_API_KEY");
  const didApiKey = reader.optional("DID_API_KEY");
  const mode = resolveMode(reader, [gatewayApiKey, openaiApiKey, didApiKey]);

  if (mode === "live" && !gatewayApiKey && !openaiApiKey && !didApiKey) {
    throw new Error(
      "Live provider mode needs at least one of AI_GATEWAY_API_KEY, OPENAI_API_KEY or DID_API_KEY. Set COURSE_FORGE_PROVIDER_MODE=mock to run without API calls."
    );
  }

  const maxLessons = reader.number("COURSE_FORGE_MAX_LESSONS", 0, 0);

  return Object.freeze({
    mode,
    gatewayApiKey,
    gatewayModel: reader.string("AI_GATEWAY_MODEL", DEFAULT_MODEL),
    openaiApiKey,
    imageModel: reader.string("COURSE_FORGE_IMAGE_MODEL", "dall-e-3"),
    speechModel: reader.string("COURSE_FORGE_SPEECH_MODEL", "tts-1"),
    speechVoice: reader.string("COURSE_FORGE_SPEECH_VOICE", "alloy"),
    didApiKey,
    didApiUrl: reader.string("DID_API_URL", "https://api.d-id.com"),
    didPresenterImageUrl: reader.string(
      "DID_PRESENTER_IMAGE_URL",
      "https://d-id-public-bucket.s3.amazonaws.com/alice.jpg"
    ),
    systemTtsCommand: reader.optional("COURSE_FORGE_SYSTEM_TTS_COMMAND"),
    ffmpegPath: reader.string("COURSE_FORGE_FFMPEG_PATH", "ffmpeg"),
    presenterImagePath: reader.optional("COURSE_FORGE_PRESENTER_IMAGE"),
    maxOutputTokens: reader.number("COURSE_FORGE_MAX_OUTPUT_TOKENS", 3000, 256),
    temperature: reader.number("COURSE_FORGE_TEMPERATURE", 0.7, 0),
    retryCount: reader.number("COURSE_FORGE_RETRY_COUNT", 2, 0),
    textTimeoutMs: reader.number("COURSE_FORGE_TEXT_TIMEOUT_MS", 90000, 1),
    imageTimeoutMs: reader.number("COURSE_FORGE_IMAGE_TIMEOUT_MS", 120000, 1),
    speechTimeoutMs: reader.number("COURSE_FORGE_SPEECH_TIMEOUT_MS", 60000, 1),
    videoTimeoutMs: reader.number("COURSE_FORGE_VIDEO_TIMEOUT_MS", 360000, 1),
    videoPollIntervalMs: reader.number("COURSE_FORGE_VIDEO_POLL_INTERVAL_MS", 10000, 1),
    videoMaxWaitMs: reader.number("COURSE_FORGE_VIDEO_MAX_WAIT_MS", 300000, 1),
    countTransientPollErrors: reader.boolean("COURSE_FORGE_COUNT_POLL_ERRORS", true),
    lessonConcurrency: reader.number("COURSE_FORGE_LESSON_CONCURRENCY", 1, 1),
    pacingDelayMs: mode === "mock" ? 0 : reader.number("COURSE_FORGE_PACING_DELAY_MS", 30000, 0),
    lessonCount: reader.number("COURSE_FORGE_LESSON_COUNT", 10, 1),
    maxLessons: maxLessons > 0 ? maxLessons : undefined,
    outputDirectory: reader.string("COURSE_FORGE_OUTPUT_DIR", mode === "mock" ? "output_test" : "output"),
    documentDirectory: reader.string("COURSE_FORGE_DOCUMENT_DIR", "documents"),
    verboseLogs: reader.boolean("COURSE_FORGE_VERBOSE_LOGS", true)
  });
}

function resolveMode(reader: EnvReader, keys: Array<string | undefined>): ProviderMode {
  const raw = reader.string("COURSE_FORGE_PROVIDER_MODE", "auto").toLowerCase();

  if (raw === "live") {
    return "live";
  }
  if (raw === "mock") {
    return "mock";
  }
  if (raw !== "auto") {
    throw new Error(`COURSE_FORGE_PROVIDER_MODE must be live, mock or auto. Received: ${raw}`);
  }

  return keys.some((key) => Boolean(key)) ? "live" : "mock";
}

class EnvReader {
  constructor(private readonly env: Env) {}

  optional(name: string): string | undefined {
    const value = this.env[name]?.trim();
    return value && value.length > 0 ? value : undefined;
  }

  string(name: string, fallback: string): string {
    return this.optional(name) ?? fallback;
  }

  number(name: string, fallback: number, min: number): number {
    const raw = this.optional(name);
    if (!raw) {
      return fallback;
    }

    const parsed = Number(raw);
    if (!Number.isFinite(parsed) || parsed < min) {
      throw new Error(`${name} must be a number greater than or equal to ${min}. Received: ${raw}`);
    }

    return parsed;
  }

  boolean(name: string, fallback: boolean): boolean {
    const raw = this.optional(name)?.toLowerCase();
    if (!raw) {
      return fallback;
    }

    if (["1", "true", "yes", "on"].includes(raw)) {
      return true;
    }
    if (["0", "false", "no", "off"].includes(raw)) {
      return false;
    }

    throw new Error(`${name} must be a boolean (true/false). Received: ${raw}`);
  }
}
