/**
 * normalize.ts — Input normalisation
 *
 * PURPOSE:
 *   Two re-encodes that run before anything is composited:
 *
 *   normalizeAudio — narration tracks arrive as mp3 or wav at whatever rate
 *     the recording tool used. Each one is decoded once to 24-bit PCM stereo
 *     at 48kHz so duration probes are sample-accurate (mp3 container
 *     durations are estimates) and every later mux sees the same format.
 *
 *   standardizeVideo — raw footage for the clip library comes from anywhere.
 *     It is letterboxed/pillarboxed to the frame size at a constant 30fps
 *     through the encoder ladder, so every clip cut from it can later be
 *     joined by stream copy.
 *
 * ARCHITECTURE:
 *   - Called by: render/hook-video.ts, render/main-video.ts (audio),
 *     library.ts (video)
 *   - Depends on: commands.ts, encoder.ts, specs.ts
 */

import { existsSync } from "fs";
import { runFFmpeg } from "./commands";
import type { EncodeOptions } from "./cut";
import { encoderLadder, runEncoderLadder, type EncoderArgSet } from "./encoder";
import { AUDIO_NORMALIZATION, type AudioNormalizationSpec } from "./specs";
import { EncodeError } from "../utils/errors";

export function normalizeAudioArgs(
  inputPath: string,
  outputPath: string,
  spec: AudioNormalizationSpec = AUDIO_NORMALIZATION
): string[] {
  return [
    "-i", inputPath,
    "-vn",
    "-c:a", spec.codec,
    "-ar", String(spec.sampleRate),
    "-ac", String(spec.channels),
    outputPath,
  ];
}

/**
 * Decode `inputPath` to a PCM wav at `outputPath`.
 */
export async function normalizeAudio(inputPath: string, outputPath: string): Promise<string> {
  if (!existsSync(inputPath)) {
    throw new EncodeError(`Audio file not found: ${inputPath}`);
  }
  await runFFmpeg(normalizeAudioArgs(inputPath, outputPath));
  if (!existsSync(outputPath)) {
    throw new EncodeError(`Audio normalisation finished but ${outputPath} was not written`);
  }
  return outputPath;
}

export function standardizeArgs(inputPath: string, outputPath: string, encoder: EncoderArgSet): string[] {
  // scale + pad + set SAR + force fps
  const videoFilter = [
    `scale=${encoder.width}:${encoder.height}:force_original_aspect_ratio=decrease`,
    `pad=${encoder.width}:${encoder.height}:(ow-iw)/2:(oh-ih)/2`,
    "setsar=1",
    `fps=${encoder.fps}`,
  ].join(",");

  return [
    "-i", inputPath,
    "-vf", videoFilter,
    // Limit threads to keep memory bounded on small containers
    "-threads", "4",
    "-an",
    ...encoder.args,
    outputPath,
  ];
}

export async function standardizeVideo(
  inputPath: string,
  outputPath: string,
  options: EncodeOptions
): Promise<string> {
  if (!existsSync(inputPath)) {
    throw new EncodeError(`Input file not found: ${inputPath}`);
  }
  const ladder = options.ladder ?? encoderLadder(options.gpu, options.vertical);

  await runEncoderLadder(
    ladder,
    async (encoder) => {
      await runFFmpeg(standardizeArgs(inputPath, outputPath, encoder));
      if (!existsSync(outputPath)) {
        throw new EncodeError(`Standardisation finished but ${outputPath} was not written`);
      }
    },
    { scope: "standardize", jobId: options.jobId, onFallback: options.onFallback }
  );
  return outputPath;
}
