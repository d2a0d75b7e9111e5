const WORDS_PER_MINUTE = 150;

const SPOKEN_ACRONYMS: Record<string, string> = {
  API: "A-P-I",
  APIs: "A-P-I-s",
  SQL: "S-Q-L",
  JSON: "J-S-O-N",
  HTML: "H-T-M-L",
  CSS: "C-S-S",
  HTTP: "H-T-T-P",
  HTTPS: "H-T-T-P-S",
  URL: "U-R-L",
  UUID: "U-U-I-D",
  CRUD: "C-R-U-D",
  JWT: "J-W-T",
  GPU: "G-P-U",
  CPU: "C-P-U",
  AI: "A-I",
  ML: "M-L",
  NLP: "N-L-P"
};

/**
 * Adds presenter cues: a short pause after each sentence, a longer one between
 * paragraphs and emphasis around signal words. Text that already carries cues
 * is returned unchanged.
 */
export function addTimingCues(script: string): string {
  if (/\[PAUSE:[\d.]+s\]/.test(script)) {
    return script.trim();
  }

  return script
    .trim()
    .replace(/([.!?])[ \t]+(?=\S)/g, "$1 [PAUSE:0.5s] ")
    .replace(/\n{2,}/g, "\n\n[PAUSE:1s]\n\n")
    .replace(/\b(important|key|critical|essential|remember)\b/gi, "[EMPHASIS]$1[/EMPHASIS]");
}

/** Speaking time at 150 words per minute plus every `[PAUSE:n s]` cue, in minutes to one decimal. */
export function estimateScriptMinutes(script: string): number {
  const words = stripTimingCues(script).match(/\b\w+\b/g)?.length ?? 0;
  const pauseSeconds = [...script.matchAll(/\[PAUSE:(\d+(?:\.\d+)?)s\]/g)].reduce(
    (sum, match) => sum + Number(match[1]),
    0
  );
  return Math.round((words / WORDS_PER_MINUTE + pauseSeconds / 60) * 10) / 10;
}

export function stripTimingCues(script: string): string {
  return script
    .replace(/\[\/?[A-Z_]+(?::[^\]]*)?\]/g, " ")
    .replace(/[ \t]{2,}/g, " ")
    .replace(/ *\n */g, "\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

/** Text handed to speech engines: no cues, acronyms spelled out. */
export function toSpeakableText(script: string): string {
  return stripTimingCues(script).replace(/\b[A-Za-z]+\b/g, (word) => SPOKEN_ACRONYMS[word] ?? word);
}
