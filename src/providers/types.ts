import { MediaAsset } from "../domain/models.js";
import { Outcome } from "../runtime/outcome.js";

export type TextPurpose = "curriculum" | "lesson_content" | "course_description" | "speech_script";

export interface TextRequest {
  purpose: TextPurpose;
  /** What the text is about: the course topic or a lesson title. */
  subject: string;
  systemPrompt: string;
  userPrompt: string;
  maxOutputTokens?: number;
  signal?: AbortSignal;
}

export interface TextProvider {
  readonly name: string;
  generate(request: TextRequest): Promise<Outcome<string>>;
}

export type ImageSize = `${number}x${number}`;

export interface ImageProvider {
  readonly name: string;
  generate(prompt: string, size: ImageSize, signal?: AbortSignal): Promise<Outcome<MediaAsset>>;
}

export interface TtsProvider {
  readonly name: string;
  synthesize(text: string, signal?: AbortSignal): Promise<Outcome<MediaAsset>>;
}

export type VideoJobStatus =
  | { status: "pending" }
  | { status: "done"; resultUrl: string }
  | { status: "error"; error: string };

export interface VideoProvider {
  readonly name: string;
  submit(script: string, avatarRef: string, signal?: AbortSignal): Promise<Outcome<string>>;
  poll(jobId: string, signal?: AbortSignal): Promise<Outcome<VideoJobStatus>>;
  download(resultUrl: string, signal?: AbortSignal): Promise<Outcome<MediaAsset>>;
}

export interface StillCompositionRequest {
  image: MediaAsset;
  audio: MediaAsset;
  signal?: AbortSignal;
}

export interface OverlayCompositionRequest {
  presenter: MediaAsset;
  background: MediaAsset;
  title: string;
  signal?: AbortSignal;
}

/** Video encoding collaborator. Codec work stays behind this boundary. */
export interface MediaComposer {
  readonly name: string;
  composeStill(request: StillCompositionRequest): Promise<Outcome<MediaAsset>>;
  overlay(request: OverlayCompositionRequest): Promise<Outcome<MediaAsset>>;
}

/** Used by the document search subsystem; the pipeline itself does not embed. */
export interface EmbeddingProvider {
  readonly name: string;
  embed(text: string, signal?: AbortSignal): Promise<Outcome<number[]>>;
}

export interface ProviderSet {
  text: TextProvider;
  image: ImageProvider;
  neuralSpeech: TtsProvider;
  systemSpeech: TtsProvider;
  video: VideoProvider;
  composer: MediaComposer;
}
