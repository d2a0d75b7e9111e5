import { describe, expect, it } from "vitest";

import { LessonContent, MediaAsset } from "../src/domain/models.js";
import { lessonTemplate } from "../src/layers/content/lessonBody.js";
import { NotebookCreator } from "../src/layers/notebook/notebookCreator.js";
import { isRecord } from "../src/utils/json.js";
import { testConfig } from "./helpers/testConfig.js";

function contentFor(overrides: Partial<LessonContent> = {}): LessonContent {
  return {
    ...lessonTemplate("Loops"),
    lessonNumber: 4,
    title: "Loops",
    type: "hands-on",
    durationMinutes: 30,
    hasCoding: true,
    ...overrides
  };
}

function decode(asset: MediaAsset): Record<string, unknown> {
  const parsed: unknown = JSON.parse(new TextDecoder().decode(asset.bytes));
  if (!isRecord(parsed)) {
    throw new Error("notebook is not an object");
  }
  return parsed;
}

describe("NotebookCreator", () => {
  const creator = new NotebookCreator(testConfig());

  it("writes code examples and exercises into an nbformat 4.5 notebook", async () => {
    const content = contentFor({
      codeExamples: [{ title: "Counting", description: "Count to three.", code: "for i in range(3):\n    print(i)", explanation: "" }]
    });

    const artifact = await creator.create(content);
    const notebook = decode(artifact.value);

    expect(artifact.providerUsed).toBe("full-notebook");
    expect(artifact.external).toBe(false);
    expect(artifact.value.extension).toBe("ipynb");
    expect(notebook).toMatchObject({ nbformat: 4, nbformat_minor: 5 });
    expect(notebook.cells).toContainEqual({
      id: "cell-5",
      cell_type: "code",
      metadata: {},
      source: ["for i in range(3):\n", "    print(i)"],
      execution_count: null,
      outputs: []
    });
  });

  it("falls back to a minimal notebook when the lesson has no code", async () => {
    const artifact = await creator.create(contentFor());
    const notebook = decode(artifact.value);

    expect(artifact.providerUsed).toBe("minimal-notebook");
    expect(artifact.tier).toBe(2);
    expect(Array.isArray(notebook.cells) && notebook.cells.length).toBe(3);
  });
});
