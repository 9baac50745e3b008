/**
 * thumbnail.ts — Hook-part thumbnail compositing
 *
 * PURPOSE:
 *   Builds the hook part of a video: the hook background with the thumbnail
 *   image laid over it from (0,0) for the whole clip, a 0.5s fade in from
 *   black at the start and a 0.5s fade out at the end, muxed with the hook
 *   narration.
 *
 * INPUTS (ffmpeg order):
 *   0 — background clip (video only is used)
 *   1 — thumbnail image; scaled to fit the frame when its size differs
 *   2 — narration audio, taken verbatim into the AAC encoder
 *
 * FALLBACK:
 *   Filter graphs sometimes fail only on the GPU path (driver-specific pixel
 *   format negotiation), so a failure retries once with the libx264 bundle.
 */

import { existsSync } from "fs";
import { runFFmpeg } from "./commands";
import type { EncodeOptions } from "./cut";
import { encoderLadder, runEncoderLadder, type EncoderArgSet } from "./encoder";
import { getDimensions, getDuration, type Dimensions } from "./ffprobe";
import { OUTPUT_AUDIO_ARGS, THUMBNAIL_FADE_SECONDS } from "./specs";
import { EncodeError } from "../utils/errors";

export function thumbnailFilterGraph(
  duration: number,
  encoder: EncoderArgSet,
  thumbnailSize: Dimensions
): string {
  const d = duration.toFixed(3);
  const fadeOutStart = Math.max(0, duration - THUMBNAIL_FADE_SECONDS).toFixed(3);
  const fade = THUMBNAIL_FADE_SECONDS;
  const needsScale =
    thumbnailSize.width !== encoder.width || thumbnailSize.height !== encoder.height;
  const thumb = needsScale
    ? `[1:v]scale=${encoder.width}:${encoder.height}:force_original_aspect_ratio=decrease[thumb];`
    : "";

  return (
    `[0:v]scale=${encoder.width}:${encoder.height},setsar=1,fps=${encoder.fps}[bg];` +
    thumb +
    `[bg]${needsScale ? "[thumb]" : "[1:v]"}overlay=0:0:enable='between(t,0,${d})',` +
    `fade=t=in:st=0:d=${fade},fade=t=out:st=${fadeOutStart}:d=${fade}[v]`
  );
}

export function thumbnailArgs(
  backgroundPath: string,
  thumbnailPath: string,
  audioPath: string,
  outputPath: string,
  filterGraph: string,
  encoder: EncoderArgSet
): string[] {
  return [
    "-i", backgroundPath,
    "-i", thumbnailPath,
    "-i", audioPath,
    "-filter_complex", filterGraph,
    "-map", "[v]",
    "-map", "2:a",
    ...encoder.args,
    ...OUTPUT_AUDIO_ARGS,
    outputPath,
  ];
}

export async function compositeThumbnail(
  backgroundPath: string,
  thumbnailPath: string,
  audioPath: string,
  outputPath: string,
  options: EncodeOptions
): Promise<string> {
  const duration = await getDuration(backgroundPath);
  if (!(duration > 0)) {
    throw new EncodeError(`Cannot composite thumbnail: background ${backgroundPath} has no duration`);
  }
  const thumbnailSize = await getDimensions(thumbnailPath);
  const ladder = options.ladder ?? encoderLadder(options.gpu, options.vertical);

  await runEncoderLadder(
    ladder,
    async (encoder) => {
      const graph = thumbnailFilterGraph(duration, encoder, thumbnailSize);
      await runFFmpeg(thumbnailArgs(backgroundPath, thumbnailPath, audioPath, outputPath, graph, encoder));
      if (!existsSync(outputPath)) {
        throw new EncodeError(`Thumbnail composite finished but ${outputPath} was not written`);
      }
    },
    { scope: "thumbnail", jobId: options.jobId, onFallback: options.onFallback }
  );

  return outputPath;
}
