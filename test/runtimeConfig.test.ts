import { describe, expect, it } from "vitest";

import { loadRuntimeConfig } from "../src/config/runtimeConfig.js";

describe("loadRuntimeConfig", () => {
  it("falls back to mock mode when no provider key is set", () => {
    const config = loadRuntimeConfig({});

    expect(config.mode).toBe("mock");
    expect(config.pacingDelayMs).toBe(0);
    expect(config.outputDirectory).toBe("output_test");
    expect(config.lessonCount).toBe(10);
    expect(config.maxLessons).toBeUndefined();
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("switches to live mode when a key is present", () => {
    const config = loadRuntimeConfig({ OPENAI_API_KEY: "test-secret" });

    expect(config.mode).toBe("live");
    expect(config.openaiApiKey).toBe("test-secret");
    expect(config.pacingDelayMs).toBe(30000);
    expect(config.outputDirectory).toBe("output");
  });

  it("refuses live mode without any key", () => {
    expect(() => loadRuntimeConfig({ COURSE_FORGE_PROVIDER_MODE: "live" })).toThrow(/at least one of/);
  });

  it("rejects an unknown provider mode", () => {
    expect(() => loadRuntimeConfig({ COURSE_FORGE_PROVIDER_MODE: "staging" })).toThrow(
      "COURSE_FORGE_PROVIDER_MODE must be live, mock or auto. Received: staging"
    );
  });

  it("rejects numbers below their minimum", () => {
    expect(() => loadRuntimeConfig({ COURSE_FORGE_RETRY_COUNT: "-1" })).toThrow(
      "COURSE_FORGE_RETRY_COUNT must be a number greater than or equal to 0. Received: -1"
    );
    expect(() => loadRuntimeConfig({ COURSE_FORGE_LESSON_COUNT: "many" })).toThrow(/COURSE_FORGE_LESSON_COUNT/);
  });

  it("reads the lesson cap and boolean switches", () => {
    const config = loadRuntimeConfig({
      COURSE_FORGE_MAX_LESSONS: "3",
      COURSE_FORGE_VERBOSE_LOGS: "off",
      COURSE_FORGE_COUNT_POLL_ERRORS: "no"
    });

    expect(config.maxLessons).toBe(3);
    expect(config.verboseLogs).toBe(false);
    expect(config.countTransientPollErrors).toBe(false);
  });

  it("treats a zero lesson cap as no cap", () => {
    expect(loadRuntimeConfig({ COURSE_FORGE_MAX_LESSONS: "0" }).maxLessons).toBeUndefined();
  });

  it("rejects a malformed boolean", () => {
    expect(() => loadRuntimeConfig({ COURSE_FORGE_VERBOSE_LOGS: "maybe" })).toThrow(
      "COURSE_FORGE_VERBOSE_LOGS must be a boolean (true/false). Received: maybe"
    );
  });
});
