import { readFile } from "node:fs/promises";
import path from "node:path";

import { MediaAsset } from "../../domain/models.js";
import { Outcome, failed, succeeded } from "../../runtime/outcome.js";
import { TtsProvider } from "../types.js";
import { failureFromProcessError, runProcess, withScratchDirectory } from "./processRunner.js";

/** Offline speech through an espeak-compatible command (`<command> -w out.wav "text"`). */
export class SystemSpeechProvider implements TtsProvider {
  readonly name: string;

  constructor(private readonly command: string | undefined) {
    this.name = `system-tts:${command ?? "none"}`;
  }

  async synthesize(text: string, signal?: AbortSignal): Promise<Outcome<MediaAsset>> {
    const command = this.command;
    if (!command) {
      return failed("configuration", "COURSE_FORGE_SYSTEM_TTS_COMMAND is not set");
    }

    try {
      const bytes = await withScratchDirectory(async (directory) => {
        const outputPath = path.join(directory, "speech.wav");
        await runProcess(command, ["-w", outputPath, text], signal);
        return readFile(outputPath);
      });

      if (bytes.length <= 44) {
        return failed("validation", `${command} produced no audio`);
      }
      return succeeded({ bytes: new Uint8Array(bytes), mediaType: "audio/wav", extension: "wav" });
    } catch (error) {
      return failureFromProcessError(command, error, signal);
    }
  }
}
