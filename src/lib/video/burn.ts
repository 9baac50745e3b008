/**
 * burn.ts — Subtitle burn-in (main part of every video)
 *
 * PURPOSE:
 *   Renders the background with the subtitle track drawn into the frames and
 *   muxes the narration audio. Optional overlay images (logos, lower thirds)
 *   are centred over the background before the subtitles, so text always sits
 *   on top.
 *
 * HOW IT WORKS:
 *   1. `.srt` input is converted to a styled `.ass` through the styler
 *      (subtitles/processor.ts). No result → SubtitleBurnError.
 *   2. Filter graph:
 *        [0:v] scale to frame, fps=30, setpts=PTS-STARTPTS  [base]
 *        [base][2:v] overlay centred                        [ov1]   (optional)
 *        [ov1][3:v]  overlay centred                        [ov2]   (optional)
 *        [..] ass='<escaped path>'                          [final]
 *   3. Encode through the GPU → CPU ladder; audio from input 1.
 *   4. ffmpeg exiting cleanly without writing the output → SubtitleBurnError.
 *
 * ESCAPING:
 *   The ass filter takes its path inside a filtergraph, where `:` separates
 *   options and `'` closes the quoted value. Windows paths also need forward
 *   slashes.
 */

import { existsSync } from "fs";
import { extname } from "path";
import { runFFmpeg } from "./commands";
import type { EncodeOptions } from "./cut";
import { encoderLadder, runEncoderLadder, type EncoderArgSet } from "./encoder";
import { OUTPUT_AUDIO_ARGS } from "./specs";
import type { SubtitleStyleConfig } from "../settings/style";
import { styleSubtitles, type StyleSubtitlesOptions } from "../subtitles/processor";
import { SubtitleBurnError } from "../utils/errors";
import { log } from "../utils/logger";

export type SubtitleStyler = (
  srtPath: string,
  config: Partial<SubtitleStyleConfig>,
  vertical: boolean,
  options?: StyleSubtitlesOptions
) => Promise<string | null>;

export interface BurnOptions extends EncodeOptions {
  /** Images centred over the background, bottom-most first. */
  overlays?: readonly string[];
  styler?: SubtitleStyler;
  /** Where the styled .ass goes when the subtitle is an .srt. */
  assPath?: string;
  /** Seconds the subtitle timings are shifted by. */
  startOffset?: number;
  fontDirs?: readonly string[];
}

export function escapeFilterPath(path: string): string {
  return path.replace(/\\/g, "/").replace(/:/g, "\\:").replace(/'/g, "\\'");
}

export function burnFilterGraph(assPath: string, overlayCount: number, encoder: EncoderArgSet): string {
  const parts = [
    `[0:v]scale=${encoder.width}:${encoder.height},fps=${encoder.fps},setpts=PTS-STARTPTS[base]`,
  ];
  let last = "base";
  for (let i = 0; i < overlayCount; i++) {
    const label = `ov${i + 1}`;
    parts.push(`[${last}][${i + 2}:v]overlay=(W-w)/2:(H-h)/2[${label}]`);
    last = label;
  }
  parts.push(`[${last}]ass='${escapeFilterPath(assPath)}'[final]`);
  return parts.join(";");
}

export function burnArgs(
  backgroundPath: string,
  audioPath: string,
  overlays: readonly string[],
  outputPath: string,
  filterGraph: string,
  encoder: EncoderArgSet
): string[] {
  return [
    "-i", backgroundPath,
    "-i", audioPath,
    ...overlays.flatMap((overlay) => ["-i", overlay]),
    "-filter_complex", filterGraph,
    "-map", "[final]",
    "-map", "1:a",
    ...encoder.args,
    ...OUTPUT_AUDIO_ARGS,
    outputPath,
  ];
}

async function prepareSubtitle(
  subtitlePath: string,
  style: Partial<SubtitleStyleConfig>,
  options: BurnOptions
): Promise<string> {
  if (extname(subtitlePath).toLowerCase() === ".srt") {
    const styler = options.styler ?? styleSubtitles;
    const assPath = await styler(subtitlePath, style, options.vertical, {
      startOffset: options.startOffset,
      fontDirs: options.fontDirs,
      outputPath: options.assPath,
      jobId: options.jobId,
    });
    if (!assPath || !existsSync(assPath)) {
      throw new SubtitleBurnError(`Could not convert ${subtitlePath} to a styled subtitle`);
    }
    return assPath;
  }
  if (!existsSync(subtitlePath)) {
    throw new SubtitleBurnError(`Subtitle file not found: ${subtitlePath}`);
  }
  return subtitlePath;
}

export async function burnSubtitles(
  backgroundPath: string,
  audioPath: string,
  subtitlePath: string,
  style: Partial<SubtitleStyleConfig>,
  outputPath: string,
  options: BurnOptions
): Promise<string> {
  const assPath = await prepareSubtitle(subtitlePath, style, options);
  const overlays = options.overlays ?? [];
  const ladder = options.ladder ?? encoderLadder(options.gpu, options.vertical);

  await runEncoderLadder(
    ladder,
    async (encoder) => {
      const graph = burnFilterGraph(assPath, overlays.length, encoder);
      await runFFmpeg(burnArgs(backgroundPath, audioPath, overlays, outputPath, graph, encoder));
      if (!existsSync(outputPath)) {
        throw new SubtitleBurnError(`Subtitle burn finished but ${outputPath} was not written`);
      }
    },
    { scope: "burn", jobId: options.jobId, onFallback: options.onFallback }
  );

  log("info", "burn", options.jobId, "Burned subtitles", {
    subtitle: assPath,
    overlays: overlays.length,
    output: outputPath,
  });
  return outputPath;
}
