import { MediaAsset } from "../../domain/models.js";
import { synthesizeTone } from "../../layers/media/placeholderMedia.js";
import { Outcome, succeeded } from "../../runtime/outcome.js";
import {
  ImageProvider,
  MediaComposer,
  OverlayCompositionRequest,
  StillCompositionRequest,
  TextProvider,
  TextRequest,
  TtsProvider,
  VideoJobStatus,
  VideoProvider
} from "../types.js";

const MOCK_LESSON_TYPES = ["theory", "hands-on", "mixed"] as const;

// 1x1 transparent PNG
const PIXEL_PNG_BASE64 =
  "iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mNkYPhfDwAChwGA60e6kgAAAABJRU5ErkJggg==";

export interface MockTextProviderOptions {
  lessonCount: number;
}

/** Deterministic text for every purpose. The same request always yields the same text. */
export class MockTextProvider implements TextProvider {
  readonly name = "mock-text";

  constructor(private readonly options: MockTextProviderOptions) {}

  async generate(request: TextRequest): Promise<Outcome<string>> {
    switch (request.purpose) {
      case "curriculum":
        return succeeded(JSON.stringify(this.curriculumFor(request.subject), null, 2));
      case "lesson_content":
        return succeeded(["```json", JSON.stringify(lessonBodyFor(request.subject), null, 2), "```"].join("\n"));
      case "course_description":
        return succeeded(
          `${request.subject} takes you from first principles to confident practice through short lessons, worked examples and exercises.`
        );
      case "speech_script":
        return succeeded(
          [
            `Welcome to this lesson on ${request.subject}.`,
            `We will walk through the main ideas of ${request.subject} one at a time, look at how they fit together and finish with a short recap you can come back to later.`,
            "Let's get started."
          ].join(" ")
        );
    }
  }

  private curriculumFor(topic: string): Record<string, unknown> {
    const lessons = Array.from({ length: this.options.lessonCount }, (_, index) => ({
      title: `${topic} Part ${index + 1}`,
      type: MOCK_LESSON_TYPES[index % MOCK_LESSON_TYPES.length],
      duration_minutes: 30,
      learning_objectives: [`Explain part ${index + 1} of ${topic}`]
    }));

    return {
      course_title: `Complete ${topic} Course`,
      difficulty: "Intermediate",
      total_duration_hours: lessons.length * 0.5,
      prerequisites: ["Basic computer literacy"],
      learning_objectives: [`Understand the fundamentals of ${topic}`],
      target_audience: "Students and working professionals",
      lessons
    };
  }
}

function lessonBodyFor(title: string): Record<string, unknown> {
  return {
    introduction: `This lesson covers ${title}.`,
    sections: [{ heading: `Core ideas of ${title}`, body: `${title} builds on a small set of ideas.` }],
    code_examples: [
      {
        title: `${title} in code`,
        description: "A minimal runnable example.",
        code: `print("${title}")`,
        explanation: "Prints the lesson title."
      }
    ],
    exercises: [
      {
        title: `Practice ${title}`,
        description: "Change the example to print your own message.",
        difficulty: "Easy",
        starter_code: "# your code here",
        solution: 'print("hello")'
      }
    ],
    key_takeaways: [`${title} is easier with practice.`],
    summary: `You learned the basics of ${title}.`
  };
}

export class MockImageProvider implements ImageProvider {
  readonly name = "mock-image";

  async generate(): Promise<Outcome<MediaAsset>> {
    return succeeded({
      bytes: new Uint8Array(Buffer.from(PIXEL_PNG_BASE64, "base64")),
      mediaType: "image/png",
      extension: "png"
    });
  }
}

export class MockTtsProvider implements TtsProvider {
  readonly name = "mock-tts";

  async synthesize(text: string): Promise<Outcome<MediaAsset>> {
    const words = text.split(/\s+/).filter((word) => word.length > 0).length;
    return succeeded(synthesizeTone({ durationSeconds: Math.min(2, Math.max(0.25, words / 150)) }));
  }
}

export class MockVideoProvider implements VideoProvider {
  readonly name = "mock-video";
  private submitted = 0;

  async submit(): Promise<Outcome<string>> {
    this.submitted += 1;
    return succeeded(`mock-talk-${this.submitted}`);
  }

  async poll(jobId: string): Promise<Outcome<VideoJobStatus>> {
    return succeeded({ status: "done", resultUrl: `mock://talks/${jobId}.mp4` });
  }

  async download(resultUrl: string): Promise<Outcome<MediaAsset>> {
    return succeeded(mockVideo(`talk ${resultUrl}`));
  }
}

export class MockMediaComposer implements MediaComposer {
  readonly name = "mock-composer";

  async composeStill(request: StillCompositionRequest): Promise<Outcome<MediaAsset>> {
    return succeeded(mockVideo(`still ${request.image.bytes.length}+${request.audio.bytes.length}`));
  }

  async overlay(request: OverlayCompositionRequest): Promise<Outcome<MediaAsset>> {
    return succeeded(mockVideo(`overlay ${request.title}`));
  }
}

function mockVideo(label: string): MediaAsset {
  return {
    bytes: new TextEncoder().encode(`MOCK-MP4 ${label}`),
    mediaType: "video/mp4",
    extension: "mp4"
  };
}
