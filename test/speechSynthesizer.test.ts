import { describe, expect, it, vi } from "vitest";

import { MediaAsset, SpeechScript } from "../src/domain/models.js";
import { SpeechSynthesizer } from "../src/layers/media/speechSynthesizer.js";
import { TtsProvider } from "../src/providers/types.js";
import { Outcome, failed, succeeded } from "../src/runtime/outcome.js";
import { testConfig } from "./helpers/testConfig.js";

type Synthesize = (text: string, signal?: AbortSignal) => Promise<Outcome<MediaAsset>>;

const MP3: MediaAsset = { bytes: new Uint8Array([1, 2, 3]), mediaType: "audio/mpeg", extension: "mp3" };
const SYSTEM_WAV: MediaAsset = { bytes: new Uint8Array([4, 5]), mediaType: "audio/wav", extension: "wav" };

function tts(name: string, synthesize: Synthesize): TtsProvider {
  return { name, synthesize };
}

function script(estimatedMinutes: number): SpeechScript {
  return {
    lessonNumber: 1,
    title: "Loops",
    text: "[EMPHASIS]Call the API[/EMPHASIS] [PAUSE:1s] now.",
    estimatedMinutes
  };
}

describe("SpeechSynthesizer", () => {
  it("uses neural speech when it answers", async () => {
    const neural = vi.fn<Synthesize>(async () => succeeded(MP3));
    const system = vi.fn<Synthesize>(async () => succeeded(SYSTEM_WAV));
    const synthesizer = new SpeechSynthesizer(tts("neural", neural), tts("system", system), testConfig());

    const result = await synthesizer.synthesize(script(1));

    expect(result).toMatchObject({ value: MP3, tier: 1, providerUsed: "neural", degraded: false, external: true });
    expect(neural).toHaveBeenCalledWith("Call the A-P-I now.", expect.any(AbortSignal));
    expect(system).not.toHaveBeenCalled();
  });

  it("skips a misconfigured neural provider without retrying it", async () => {
    const neural = vi.fn<Synthesize>(async () => failed("configuration", "OPENAI_API_KEY is not set"));
    const system = vi.fn<Synthesize>(async () => succeeded(SYSTEM_WAV));
    const synthesizer = new SpeechSynthesizer(tts("neural", neural), tts("system", system), testConfig({ retryCount: 2 }));

    const result = await synthesizer.synthesize(script(1));

    expect(result).toMatchObject({ value: SYSTEM_WAV, tier: 2, providerUsed: "system", degraded: true, external: false });
    expect(neural).toHaveBeenCalledTimes(1);
    expect(result.failures).toEqual([
      { tier: 1, producer: "neural", attempt: 1, kind: "configuration", message: "OPENAI_API_KEY is not set" }
    ]);
  });

  it("falls back to a synthesized tone sized to the script", async () => {
    const neural = tts("neural", async () => failed("provider", "HTTP 500"));
    const system = tts("system", async () => {
      throw new Error("espeak-ng: command not found");
    });
    const synthesizer = new SpeechSynthesizer(neural, system, testConfig());

    const result = await synthesizer.synthesize(script(0.05));

    expect(result.tier).toBe(3);
    expect(result.providerUsed).toBe("synthesized-tone");
    expect(result.attemptCount).toBe(3);
    expect(result.value.mediaType).toBe("audio/wav");
    // 3 seconds of 8 kHz 16-bit mono plus the header
    expect(result.value.bytes.length).toBe(44 + 3 * 8000 * 2);
    expect(result.failures.map((failure) => [failure.producer, failure.kind, failure.message])).toEqual([
      ["neural", "provider", "HTTP 500"],
      ["system", "provider", "espeak-ng: command not found"]
    ]);
  });

  it("keeps the fallback tone at least two seconds long", async () => {
    const neural = tts("neural", async () => failed("configuration", "no key"));
    const system = tts("system", async () => failed("configuration", "no command"));
    const synthesizer = new SpeechSynthesizer(neural, system, testConfig());

    const result = await synthesizer.synthesize(script(0));

    expect(result.value.bytes.length).toBe(44 + 2 * 8000 * 2);
  });

  it("goes straight to the tone when the job is cancelled", async () => {
    const neural = vi.fn<Synthesize>(async () => succeeded(MP3));
    const synthesizer = new SpeechSynthesizer(tts("neural", neural), tts("system", neural), testConfig());
    const controller = new AbortController();
    controller.abort();

    const result = await synthesizer.synthesize(script(1), controller.signal);

    expect(result.providerUsed).toBe("synthesized-tone");
    expect(neural).not.toHaveBeenCalled();
  });
});
