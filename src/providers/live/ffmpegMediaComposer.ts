import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";

import { MediaAsset } from "../../domain/models.js";
import { Outcome, succeeded } from "../../runtime/outcome.js";
import { MediaComposer, OverlayCompositionRequest, StillCompositionRequest } from "../types.js";
import { failureFromProcessError, runProcess, withScratchDirectory } from "./processRunner.js";

export class FfmpegMediaComposer implements MediaComposer {
  readonly name: string;

  constructor(private readonly ffmpegPath: string) {
    this.name = `ffmpeg:${path.basename(ffmpegPath)}`;
  }

  composeStill(request: StillCompositionRequest): Promise<Outcome<MediaAsset>> {
    return this.encode(request.signal, async (directory) => {
      const imagePath = await writeInput(directory, "still", request.image);
      const audioPath = await writeInput(directory, "speech", request.audio);
      return [
        "-loop", "1",
        "-i", imagePath,
        "-i", audioPath,
        "-vf", "scale=1280:720:force_original_aspect_ratio=decrease,pad=1280:720:(ow-iw)/2:(oh-ih)/2",
        "-c:v", "libx264",
        "-tune", "stillimage",
        "-c:a", "aac",
        "-b:a", "192k",
        "-pix_fmt", "yuv420p",
        "-shortest"
      ];
    });
  }

  overlay(request: OverlayCompositionRequest): Promise<Outcome<MediaAsset>> {
    return this.encode(request.signal, async (directory) => {
      const backgroundPath = await writeInput(directory, "background", request.background);
      const presenterPath = await writeInput(directory, "presenter", request.presenter);
      return [
        "-loop", "1",
        "-i", backgroundPath,
        "-i", presenterPath,
        "-filter_complex",
        "[0:v]scale=1920:1080[bg];[1:v]scale=640:-2[fg];[bg][fg]overlay=W-w-40:H-h-40:shortest=1[out]",
        "-map", "[out]",
        "-map", "1:a?",
        "-c:v", "libx264",
        "-c:a", "aac",
        "-pix_fmt", "yuv420p",
        "-metadata", `title=${request.title}`
      ];
    });
  }

  private async encode(
    signal: AbortSignal | undefined,
    buildArgs: (directory: string) => Promise<string[]>
  ): Promise<Outcome<MediaAsset>> {
    try {
      const bytes = await withScratchDirectory(async (directory) => {
        const outputPath = path.join(directory, "output.mp4");
        const args = await buildArgs(directory);
        await runProcess(this.ffmpegPath, ["-y", "-loglevel", "error", ...args, outputPath], signal);
        return readFile(outputPath);
      });

      return succeeded({ bytes: new Uint8Array(bytes), mediaType: "video/mp4", extension: "mp4" });
    } catch (error) {
      return failureFromProcessError(this.ffmpegPath, error, signal);
    }
  }
}

async function writeInput(directory: string, baseName: string, asset: MediaAsset): Promise<string> {
  const filePath = path.join(directory, `${baseName}.${asset.extension}`);
  await writeFile(filePath, asset.bytes);
  return filePath;
}
