import { describe, expect, it } from "vitest";

import {
  CurriculumPlanner,
  buildTemplateCurriculum,
  capLessons,
  toLessonType
} from "../src/layers/planning/curriculumPlanner.js";
import { MockTextProvider } from "../src/providers/mock/mockProviders.js";
import { TextProvider } from "../src/providers/types.js";
import { failed, succeeded } from "../src/runtime/outcome.js";
import { testConfig } from "./helpers/testConfig.js";

const offline: TextProvider = {
  name: "offline",
  generate: async () => failed("configuration", "no key")
};

describe("CurriculumPlanner", () => {
  it("numbers provider lessons contiguously and derives hasCoding from the type", async () => {
    const planner = new CurriculumPlanner(new MockTextProvider({ lessonCount: 3 }), testConfig());

    const artifact = await planner.plan({ topic: "Gardening", documents: [] });

    expect(artifact.tier).toBe(1);
    expect(artifact.providerUsed).toBe("mock-text");
    expect(artifact.value.courseTitle).toBe("Complete Gardening Course");
    expect(
      artifact.value.lessons.map((lesson) => [lesson.lessonNumber, lesson.type, lesson.hasCoding])
    ).toEqual([
      [1, "theory", false],
      [2, "hands-on", true],
      [3, "mixed", false]
    ]);
  });

  it("drops untitled lessons before numbering", async () => {
    const provider: TextProvider = {
      name: "gappy",
      generate: async () =>
        succeeded(JSON.stringify({ lessons: [{ title: "One" }, { title: "" }, { title: "Three", type: "lab" }] }))
    };
    const planner = new CurriculumPlanner(provider, testConfig());

    const artifact = await planner.plan({ topic: "Gardening", documents: [] });

    expect(artifact.value.lessons.map((lesson) => [lesson.lessonNumber, lesson.title, lesson.type])).toEqual([
      [1, "One", "theory"],
      [2, "Three", "hands-on"]
    ]);
  });

  it("falls back to the template curriculum with the configured lesson count", async () => {
    const planner = new CurriculumPlanner(offline, testConfig({ lessonCount: 4 }));

    const artifact = await planner.plan({ topic: "Gardening", documents: [] });

    expect(artifact.providerUsed).toBe("curriculum-template");
    expect(artifact.degraded).toBe(true);
    expect(artifact.value.lessons).toHaveLength(4);
    expect(artifact.value.lessons[0].title).toBe("Introduction to Gardening");
  });

  it("caps the plan at maxLessons", async () => {
    const planner = new CurriculumPlanner(new MockTextProvider({ lessonCount: 5 }), testConfig({ maxLessons: 2 }));

    const artifact = await planner.plan({ topic: "Gardening", documents: [] });

    expect(artifact.value.lessons.map((lesson) => lesson.lessonNumber)).toEqual([1, 2]);
    expect(artifact.value.totalDurationHours).toBe(1);
  });
});

describe("buildTemplateCurriculum", () => {
  it("uses the matching keyword track", () => {
    const curriculum = buildTemplateCurriculum("Python for data analysis", 10);

    expect(curriculum.lessons[0].title).toBe("Introduction to Python and Setup");
    expect(curriculum.lessons[9].title).toBe("Final Project: Building a Complete Application");
    expect(curriculum.lessons.map((lesson) => lesson.type).slice(0, 3)).toEqual(["theory", "theory", "hands-on"]);
    expect(curriculum.totalDurationHours).toBe(5);
  });

  it("extends past the track with practice lessons", () => {
    const curriculum = buildTemplateCurriculum("Gardening", 12);

    expect(curriculum.lessons[10].title).toBe("Gardening: Extended Practice 1");
    expect(curriculum.lessons[11].lessonNumber).toBe(12);
  });
});

describe("capLessons", () => {
  it("returns the curriculum unchanged without a cap", () => {
    const curriculum = buildTemplateCurriculum("Gardening", 3);

    expect(capLessons(curriculum, undefined)).toBe(curriculum);
  });
});

describe("toLessonType", () => {
  it("maps loose labels onto the three lesson types", () => {
    expect(toLessonType("Hands On")).toBe("hands-on");
    expect(toLessonType("case_study")).toBe("mixed");
    expect(toLessonType("lecture")).toBe("theory");
    expect(toLessonType(undefined)).toBe("theory");
  });
});
