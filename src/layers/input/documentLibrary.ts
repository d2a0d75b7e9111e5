import { access, readFile } from "node:fs/promises";
import path from "node:path";

import { DocumentSummary } from "../../domain/models.js";
import { normalizeWhitespace, splitIntoParagraphs, summarizeParagraphs } from "../../utils/text.js";

/** Source documents a course can be planned from. Unknown ids are skipped. */
export interface DocumentLibrary {
  summarize(documentIds: readonly string[]): Promise<DocumentSummary[]>;
}

export interface StoredDocument {
  id: string;
  title: string;
  text: string;
}

const SUPPORTED_EXTENSIONS = [".pdf", ".txt", ".md"];
const SUMMARY_SENTENCES = 3;

export class InMemoryDocumentLibrary implements DocumentLibrary {
  private readonly documents: Map<string, StoredDocument>;

  constructor(documents: StoredDocument[]) {
    this.documents = new Map(documents.map((document) => [document.id, document]));
  }

  async summarize(documentIds: readonly string[]): Promise<DocumentSummary[]> {
    return documentIds
      .map((id) => this.documents.get(id))
      .filter((document): document is StoredDocument => Boolean(document))
      .map((document) => toSummary(document.id, document.title, document.text));
  }
}

/** Resolves ids to `.pdf`, `.txt` or `.md` files in one directory. */
export class FileDocumentLibrary implements DocumentLibrary {
  constructor(private readonly directory: string) {}

  async summarize(documentIds: readonly string[]): Promise<DocumentSummary[]> {
    const summaries: DocumentSummary[] = [];

    for (const id of documentIds) {
      const filePath = await this.resolve(id);
      if (!filePath) {
        console.warn(`[input] document "${id}" not found in ${this.directory}`);
        continue;
      }

      const title = path.basename(filePath, path.extname(filePath));
      summaries.push(toSummary(id, title, await this.extractText(filePath)));
    }

    return summaries;
  }

  private async resolve(id: string): Promise<string | undefined> {
    const baseName = path.basename(id);
    const candidates = SUPPORTED_EXTENSIONS.includes(path.extname(baseName).toLowerCase())
      ? [baseName]
      : SUPPORTED_EXTENSIONS.map((extension) => `${baseName}${extension}`);

    for (const candidate of candidates) {
      const filePath = path.join(this.directory, candidate);
      const found = await access(filePath).then(
        () => true,
        () => false
      );
      if (found) {
        return filePath;
      }
    }
    return undefined;
  }

  private async extractText(filePath: string): Promise<string> {
    const fileName = path.basename(filePath);
    const isPdf = path.extname(filePath).toLowerCase() === ".pdf";

    try {
      if (!isPdf) {
        return await readFile(filePath, "utf8");
      }

      const pdfBuffer = await readFile(filePath);
      const pdfParse = (await import("pdf-parse")).default;
      const extracted = await pdfParse(pdfBuffer);
      return normalizeWhitespace(extracted.text ?? "");
    } catch (error) {
      const message = error instanceof Error ? error.message : "unknown error";
      console.warn(
        `[input] ${isPdf ? "PDF" : "Document"} "${fileName}" could not be read: ${message}. Using its file name only.`
      );
      return "";
    }
  }
}

function toSummary(id: string, title: string, text: string): DocumentSummary {
  const paragraphs = splitIntoParagraphs(text);
  return {
    id,
    title,
    summary: paragraphs.length > 0 ? summarizeParagraphs(paragraphs, SUMMARY_SENTENCES) : `Source document "${title}".`
  };
}
