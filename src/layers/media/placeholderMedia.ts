import { MediaAsset } from "../../domain/models.js";

export interface Palette {
  primary: string;
  secondary: string;
  accent: string;
  surface: string;
  ink: string;
}

export const COURSE_PALETTE: Palette = {
  primary: "#0D3B66",
  secondary: "#3A86FF",
  accent: "#FF9F1C",
  surface: "#F8F4E3",
  ink: "#1F2933"
};

export interface TitleCardOptions {
  title: string;
  subtitle?: string;
  width: number;
  height: number;
  background: string;
  foreground?: string;
  /** Turns the card into a clip: the title fades in and holds for this long. */
  durationSeconds?: number;
}

export function renderTitleCard(options: TitleCardOptions): MediaAsset {
  const foreground = options.foreground ?? "#FFFFFF";
  const titleLines = wrapWords(options.title, 32).slice(0, 3);
  const titleSize = Math.round(options.height / 12);
  const subtitleSize = Math.round(titleSize * 0.5);
  const centerX = Math.round(options.width / 2);
  const firstLineY = Math.round(options.height / 2 - ((titleLines.length - 1) * titleSize * 1.2) / 2);
  const animation =
    options.durationSeconds !== undefined
      ? `<animate attributeName="opacity" values="0;1;1" keyTimes="0;0.1;1" dur="${formatSeconds(options.durationSeconds)}" fill="freeze"/>`
      : "";

  const lines = titleLines
    .map(
      (line, index) =>
        `<text x="${centerX}" y="${firstLineY + Math.round(index * titleSize * 1.2)}" font-size="${titleSize}" text-anchor="middle">${escapeXml(line)}</text>`
    )
    .join("");
  const subtitle = options.subtitle
    ? `<text x="${centerX}" y="${firstLineY + Math.round(titleLines.length * titleSize * 1.2 + subtitleSize)}" font-size="${subtitleSize}" text-anchor="middle" opacity="0.8">${escapeXml(options.subtitle)}</text>`
    : "";

  const svg = [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${options.width}" height="${options.height}" viewBox="0 0 ${options.width} ${options.height}">`,
    `<rect width="100%" height="100%" fill="${options.background}"/>`,
    `<g fill="${foreground}" font-family="Work Sans, Arial, sans-serif">${animation}${lines}${subtitle}</g>`,
    "</svg>"
  ].join("");

  return {
    bytes: new TextEncoder().encode(svg),
    mediaType: "image/svg+xml",
    extension: "svg"
  };
}

export interface ToneOptions {
  durationSeconds: number;
  frequencyHz?: number;
  sampleRate?: number;
}

/** 16-bit mono PCM WAV of a sine tone with a slow syllable-like envelope. */
export function synthesizeTone(options: ToneOptions): MediaAsset {
  const sampleRate = options.sampleRate ?? 8000;
  const frequency = options.frequencyHz ?? 220;
  const sampleCount = Math.max(1, Math.round(options.durationSeconds * sampleRate));
  const dataLength = sampleCount * 2;
  const buffer = Buffer.alloc(44 + dataLength);

  buffer.write("RIFF", 0, "ascii");
  buffer.writeUInt32LE(36 + dataLength, 4);
  buffer.write("WAVE", 8, "ascii");
  buffer.write("fmt ", 12, "ascii");
  buffer.writeUInt32LE(16, 16);
  buffer.writeUInt16LE(1, 20);
  buffer.writeUInt16LE(1, 22);
  buffer.writeUInt32LE(sampleRate, 24);
  buffer.writeUInt32LE(sampleRate * 2, 28);
  buffer.writeUInt16LE(2, 32);
  buffer.writeUInt16LE(16, 34);
  buffer.write("data", 36, "ascii");
  buffer.writeUInt32LE(dataLength, 40);

  for (let index = 0; index < sampleCount; index += 1) {
    const time = index / sampleRate;
    const envelope = 0.5 + 0.5 * Math.sin(2 * Math.PI * 3 * time);
    const sample = Math.round(0.2 * 32767 * envelope * Math.sin(2 * Math.PI * frequency * time));
    buffer.writeInt16LE(sample, 44 + index * 2);
  }

  return {
    bytes: new Uint8Array(buffer),
    mediaType: "audio/wav",
    extension: "wav"
  };
}

export function extensionForMediaType(mediaType: string): string {
  const known: Record<string, string> = {
    "image/png": "png",
    "image/jpeg": "jpg",
    "image/webp": "webp",
    "image/svg+xml": "svg",
    "audio/mpeg": "mp3",
    "audio/wav": "wav",
    "audio/x-wav": "wav",
    "video/mp4": "mp4",
    "application/x-ipynb+json": "ipynb"
  };
  return known[mediaType.toLowerCase()] ?? "bin";
}

export function isRasterImage(mediaType: string): boolean {
  return mediaType === "image/png" || mediaType === "image/jpeg" || mediaType === "image/webp";
}

function wrapWords(text: string, maxChars: number): string[] {
  const lines: string[] = [];
  let current = "";

  for (const word of text.split(/\s+/).filter((item) => item.length > 0)) {
    const candidate = current ? `${current} ${word}` : word;
    if (candidate.length > maxChars && current) {
      lines.push(current);
      current = word;
    } else {
      current = candidate;
    }
  }

  if (current) {
    lines.push(current);
  }
  return lines.length > 0 ? lines : [text];
}

function escapeXml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

function formatSeconds(value: number): string {
  return `${Math.max(1, Math.round(value))}s`;
}
