import { describe, expect, it } from "vitest";

import { LessonContent } from "../src/domain/models.js";
import { lessonTemplate } from "../src/layers/content/lessonBody.js";
import {
  addTimingCues,
  estimateScriptMinutes,
  stripTimingCues,
  toSpeakableText
} from "../src/layers/script/scriptCues.js";
import { SpeechScriptWriter } from "../src/layers/script/speechScriptWriter.js";
import { failed } from "../src/runtime/outcome.js";
import { TextProvider } from "../src/providers/types.js";
import { testConfig } from "./helpers/testConfig.js";

describe("addTimingCues", () => {
  it("adds sentence pauses, paragraph pauses and emphasis", () => {
    expect(addTimingCues("Hello there. This is important.\n\nNext part.")).toBe(
      "Hello there. [PAUSE:0.5s] This is [EMPHASIS]important[/EMPHASIS].\n\n[PAUSE:1s]\n\nNext part."
    );
  });

  it("leaves a script that already has cues alone", () => {
    expect(addTimingCues("  Intro. [PAUSE:2s] Key idea.  ")).toBe("Intro. [PAUSE:2s] Key idea.");
  });
});

describe("estimateScriptMinutes", () => {
  it("counts words at 150 per minute plus pause cues", () => {
    const script = `${Array.from({ length: 150 }, () => "word").join(" ")} [PAUSE:30s]`;

    expect(estimateScriptMinutes(script)).toBe(1.5);
  });

  it("is zero for an empty script", () => {
    expect(estimateScriptMinutes("")).toBe(0);
  });
});

describe("toSpeakableText", () => {
  it("removes cues and spells out acronyms", () => {
    expect(toSpeakableText("[EMPHASIS]Call the API[/EMPHASIS] [PAUSE:1s] now.")).toBe("Call the A-P-I now.");
  });

  it("removes visual cues", () => {
    expect(stripTimingCues("Look here [VISUAL_CUE: Show example] please.")).toBe("Look here please.");
  });
});

describe("SpeechScriptWriter", () => {
  const content: LessonContent = {
    ...lessonTemplate("Loops"),
    lessonNumber: 1,
    title: "Loops",
    type: "theory",
    durationMinutes: 30,
    hasCoding: false
  };

  it("reads the lesson content aloud when the text provider is unavailable", async () => {
    const offline: TextProvider = {
      name: "offline",
      generate: async () => failed("configuration", "no key")
    };
    const writer = new SpeechScriptWriter(offline, testConfig());

    const artifact = await writer.write(content);

    expect(artifact.providerUsed).toBe("script-from-content");
    expect(artifact.tier).toBe(2);
    expect(artifact.value.text.startsWith("Welcome to lesson 1: Loops.\n\n[PAUSE:1s]\n\nWelcome to Loops. [PAUSE:0.5s] ")).toBe(true);
    expect(artifact.value.estimatedMinutes).toBeGreaterThan(0);
  });
});
