import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { FileDocumentLibrary, InMemoryDocumentLibrary } from "../src/layers/input/documentLibrary.js";
import { createTempDirectory, removeDirectory } from "./helpers/testConfig.js";

describe("InMemoryDocumentLibrary", () => {
  it("summarizes known documents in request order and skips unknown ids", async () => {
    const library = new InMemoryDocumentLibrary([
      { id: "a", title: "Alpha", text: "First. Second. Third. Fourth." },
      { id: "b", title: "Beta", text: "" }
    ]);

    const summaries = await library.summarize(["b", "missing", "a"]);

    expect(summaries).toEqual([
      { id: "b", title: "Beta", summary: 'Source document "Beta".' },
      { id: "a", title: "Alpha", summary: "First. Second. Third." }
    ]);
  });
});

describe("FileDocumentLibrary", () => {
  let directory: string | undefined;

  afterEach(async () => {
    if (directory) {
      await removeDirectory(directory);
      directory = undefined;
    }
  });

  it("resolves ids to text and markdown files by extension", async () => {
    directory = await createTempDirectory();
    await writeFile(path.join(directory, "soil.txt"), "Soil matters.\n\nCompost helps.", "utf8");
    await writeFile(path.join(directory, "water.md"), "# Watering\n\nWater early.", "utf8");
    const library = new FileDocumentLibrary(directory);

    const summaries = await library.summarize(["soil", "water.md", "nowhere"]);

    expect(summaries).toEqual([
      { id: "soil", title: "soil", summary: "Soil matters. Compost helps." },
      { id: "water.md", title: "water", summary: "# Watering Water early." }
    ]);
  });

  it("falls back to the file name when a document cannot be read", async () => {
    directory = await createTempDirectory();
    await mkdir(path.join(directory, "notes.md"));
    const library = new FileDocumentLibrary(directory);

    const summaries = await library.summarize(["notes"]);

    expect(summaries).toEqual([{ id: "notes", title: "notes", summary: 'Source document "notes".' }]);
  });
});
