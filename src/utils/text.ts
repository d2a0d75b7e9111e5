export function normalizeWhitespace(value: string): string {
  return value.replace(/\r\n?/g, "\n").replace(/\t/g, " ").replace(/ {2,}/g, " ").trim();
}

export function splitIntoParagraphs(text: string): string[] {
  return normalizeWhitespace(text)
    .split(/\n{2,}/)
    .map((paragraph) => paragraph.replace(/\s*\n\s*/g, " ").trim())
    .filter((paragraph) => paragraph.length > 0);
}

/** First `maxSentences` sentences of the text, or its first 220 characters. */
export function summarizeParagraphs(paragraphs: string[], maxSentences = 2): string {
  const text = normalizeWhitespace(paragraphs.join(" "));
  if (!text) {
    return "";
  }

  const sentences = text
    .split(/(?<=[.!?])\s+/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0)
    .slice(0, maxSentences);

  if (sentences.length === 0) {
    return text.slice(0, 220);
  }

  return sentences.join(" ");
}

export function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .replace(/--+/g, "-");
}
