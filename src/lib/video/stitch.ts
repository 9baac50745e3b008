/**
 * stitch.ts — Segment concatenation
 *
 * PURPOSE:
 *   Joins an ordered list of media files into one, in one of two modes:
 *
 *   stream_copy — FFmpeg's concat demuxer with `-c copy`. Only valid when
 *     every input shares codec, resolution and frame rate.
 *
 *   re_encode — same manifest, but decoded and re-encoded in one pass through
 *     the encoder ladder. Used for background joins (whole pool clips next to
 *     ladder-encoded cuts) and for the final hook + main join.
 *
 * MANIFEST:
 *   One `file '<absolute path>'` line per input, in order. Its name is derived
 *   from the output file so concurrent jobs never share one, and it is removed
 *   whether or not ffmpeg succeeds.
 *
 * ARCHITECTURE:
 *   - Called by: render/hook-video.ts, render/main-video.ts
 *   - Depends on: commands.ts, encoder.ts
 */

import { existsSync } from "fs";
import { rm, writeFile } from "fs/promises";
import { basename, join, parse, resolve } from "path";
import { runFFmpeg } from "./commands";
import { encoderLadder, runEncoderLadder, type EncoderArgSet } from "./encoder";
import { OUTPUT_AUDIO_ARGS } from "./specs";
import { EncodeError } from "../utils/errors";
import { log } from "../utils/logger";

export type ConcatMode = "stream_copy" | "re_encode";

export interface ConcatOptions {
  mode: ConcatMode;
  /** Directory for the manifest file. */
  workDir: string;
  jobId?: string;
  /** Required for re_encode. */
  gpu?: boolean;
  vertical?: boolean;
  ladder?: EncoderArgSet[];
  /** Drop audio streams (background joins, whose audio is replaced later). */
  videoOnly?: boolean;
  onFallback?: () => void;
}

/**
 * Manifest body for the concat demuxer. Backslashes become forward slashes
 * (ffmpeg accepts both on Windows) and single quotes are escaped the way the
 * demuxer's parser expects.
 */
export function buildConcatManifest(paths: readonly string[]): string {
  return (
    paths
      .map((p) => resolve(p).replace(/\\/g, "/").replace(/'/g, "'\\''"))
      .map((p) => `file '${p}'`)
      .join("\n") + "\n"
  );
}

export function manifestPath(workDir: string, outputPath: string): string {
  return join(workDir, `${parse(basename(outputPath)).name}.concat.txt`);
}

export function streamCopyArgs(manifest: string, outputPath: string, videoOnly = false): string[] {
  return [
    "-f", "concat",
    "-safe", "0",
    "-i", manifest,
    "-c", "copy",
    ...(videoOnly ? ["-an"] : []),
    // Fix timestamp discontinuities at segment boundaries
    "-fflags", "+genpts",
    "-avoid_negative_ts", "make_zero",
    "-movflags", "+faststart",
    outputPath,
  ];
}

export function reEncodeArgs(
  manifest: string,
  outputPath: string,
  encoder: EncoderArgSet,
  videoOnly = false
): string[] {
  return [
    "-f", "concat",
    "-safe", "0",
    "-i", manifest,
    "-vf", `scale=${encoder.width}:${encoder.height},setsar=1,fps=${encoder.fps}`,
    ...encoder.args,
    ...(videoOnly ? ["-an"] : OUTPUT_AUDIO_ARGS),
    outputPath,
  ];
}

export async function concatenate(
  paths: readonly string[],
  outputPath: string,
  options: ConcatOptions
): Promise<string> {
  if (paths.length === 0) {
    throw new EncodeError("No segments to concatenate");
  }

  const manifest = manifestPath(options.workDir, outputPath);
  await writeFile(manifest, buildConcatManifest(paths), "utf-8");

  try {
    if (options.mode === "stream_copy") {
      await runFFmpeg(streamCopyArgs(manifest, outputPath, options.videoOnly));
      if (!existsSync(outputPath)) {
        throw new EncodeError(`Concatenation finished but ${outputPath} was not written`);
      }
    } else {
      const ladder = options.ladder ?? encoderLadder(options.gpu ?? false, options.vertical ?? false);
      await runEncoderLadder(
        ladder,
        async (encoder) => {
          await runFFmpeg(reEncodeArgs(manifest, outputPath, encoder, options.videoOnly));
          if (!existsSync(outputPath)) {
            throw new EncodeError(`Concatenation finished but ${outputPath} was not written`);
          }
        },
        { scope: "concat", jobId: options.jobId, onFallback: options.onFallback }
      );
    }
  } finally {
    await rm(manifest, { force: true });
  }

  log("info", "concat", options.jobId, `Joined ${paths.length} segments`, {
    mode: options.mode,
    output: outputPath,
  });
  return outputPath;
}
