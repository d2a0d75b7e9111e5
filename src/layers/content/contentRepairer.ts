import { LessonBody } from "../../domain/models.js";
import { Outcome, failed, succeeded } from "../../runtime/outcome.js";
import { isRecord } from "../../utils/json.js";
import { REQUIRED_LESSON_KEYS, lessonTemplate } from "./lessonBody.js";

const CONTROL_CHARACTERS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g;
const STRING_TERMINATORS = new Set([",", "}", "]", ":"]);

/**
 * Turns model text that should hold one JSON object into that object.
 *
 * The trimmed text is parsed as it is first. Only when that fails is a leading
 * code fence removed and the outermost `{...}` kept, then parsed again. After
 * that, quotes, tabs and line breaks inside string values are escaped for a
 * last parse, whose output is only accepted when it still carries
 * `requiredKeys`. Quote sequences that are already escaped stay escaped; they
 * are never un-escaped.
 */
export class ContentRepairer {
  constructor(private readonly requiredKeys: readonly string[] = REQUIRED_LESSON_KEYS) {}

  repair(raw: string): Outcome<Record<string, unknown>> {
    const text = removeControlCharacters(raw.replace(/\r\n?/g, "\n").trim());
    if (!text) {
      return failed("validation", "Response was empty");
    }

    const direct = tryParse(text) ?? tryParse(stripCodeFence(text));
    if (direct !== undefined) {
      return isRecord(direct) ? succeeded(direct) : failed("validation", "Response is JSON but not an object");
    }

    const repaired = tryParse(escapeStringContents(stripCodeFence(text)));
    if (!isRecord(repaired)) {
      return failed("validation", "Response could not be repaired into a JSON object");
    }

    const missing = this.requiredKeys.filter((key) => !(key in repaired));
    if (missing.length > 0) {
      return failed("validation", `Repaired response is missing ${missing.join(", ")}`);
    }

    return succeeded(repaired);
  }

  templateFor(title: string): LessonBody {
    return lessonTemplate(title);
  }
}

/** Drops a fence that opens the text, up to its last closing fence, and keeps the outermost object. */
export function stripCodeFence(raw: string): string {
  const text = raw.replace(/\r\n?/g, "\n").trim();
  let body = text;
  if (text.startsWith("```")) {
    const fenced = text.match(/^```[a-zA-Z]*\n?([\s\S]*)```/);
    body = fenced ? fenced[1].trim() : text.replace(/^```[a-zA-Z]*\n?/, "").trim();
  }

  const start = body.indexOf("{");
  const end = body.lastIndexOf("}");
  return start >= 0 && end > start ? body.slice(start, end + 1) : body;
}

export function removeControlCharacters(text: string): string {
  return text.replace(CONTROL_CHARACTERS, "");
}

/**
 * Escapes characters that break string values written across several lines.
 *
 * A quote closes an open string only when the next non-blank character on the
 * same line is `,` `}` `]` `:` or the line ends there; any other quote inside a
 * string is treated as content. Line breaks inside a string become `\n` and the
 * lines are joined. Quotes that are already escaped are left as they are.
 */
export function escapeStringContents(text: string): string {
  let output = "";
  let inString = false;

  for (let index = 0; index < text.length; index += 1) {
    const char = text[index];

    if (!inString) {
      output += char;
      if (char === '"' && !isEscaped(text, index)) {
        inString = true;
      }
      continue;
    }

    if (char === "\\") {
      output += char + (text[index + 1] ?? "");
      index += 1;
    } else if (char === '"') {
      if (closesString(text, index)) {
        output += char;
        inString = false;
      } else {
        output += '\\"';
      }
    } else if (char === "\n") {
      output += "\\n";
    } else if (char === "\t") {
      output += "\\t";
    } else {
      output += char;
    }
  }

  return output;
}

function closesString(text: string, quoteIndex: number): boolean {
  for (let index = quoteIndex + 1; index < text.length; index += 1) {
    const char = text[index];
    if (char === "\n") {
      return true;
    }
    if (char !== " " && char !== "\t") {
      return STRING_TERMINATORS.has(char);
    }
  }
  return true;
}

function isEscaped(text: string, index: number): boolean {
  let backslashes = 0;
  for (let cursor = index - 1; cursor >= 0 && text[cursor] === "\\"; cursor -= 1) {
    backslashes += 1;
  }
  return backslashes % 2 === 1;
}

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
