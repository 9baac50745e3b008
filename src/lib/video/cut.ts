/**
 * cut.ts — Single-clip trimming
 *
 * PURPOSE:
 *   Writes the [start, start + duration) window of a clip to a new file,
 *   scaled to the job's orientation at 30fps and without audio (background
 *   audio is always replaced by the narration track downstream).
 *
 *   The output is re-encoded rather than stream-copied so the cut lands on the
 *   exact frame the selector asked for. A `-c copy` trim snaps to the nearest
 *   keyframe and can leave the summed background shorter than the audio.
 *
 * ARCHITECTURE:
 *   - Called by: select.ts (final overshooting clip), library.ts (clip pool)
 *   - Depends on: commands.ts, encoder.ts (GPU → CPU ladder)
 */

import { existsSync } from "fs";
import { runFFmpeg } from "./commands";
import { encoderLadder, runEncoderLadder, type EncoderArgSet } from "./encoder";
import { EncodeError } from "../utils/errors";

export interface Segment {
  /** File holding the segment's frames. */
  path: string;
  /** Pool clip it came from. */
  source: string;
  start: number;
  duration: number;
  /** True when `path` is a new temp file rather than the pool clip itself. */
  cut: boolean;
}

export interface EncodeOptions {
  gpu: boolean;
  vertical: boolean;
  jobId?: string;
  /** Overrides encoderLadder(gpu, vertical). */
  ladder?: EncoderArgSet[];
  onFallback?: () => void;
}

export function cutArgs(
  input: string,
  start: number,
  duration: number,
  outputPath: string,
  encoder: EncoderArgSet
): string[] {
  return [
    "-ss", start.toFixed(3),
    "-i", input,
    "-t", duration.toFixed(3),
    "-vf", `scale=${encoder.width}:${encoder.height},setsar=1,fps=${encoder.fps}`,
    "-an",
    ...encoder.args,
    outputPath,
  ];
}

export async function cutSegment(
  clip: string,
  start: number,
  duration: number,
  outputPath: string,
  options: EncodeOptions
): Promise<Segment> {
  if (!(duration > 0)) {
    throw new EncodeError(`Refusing to cut a ${duration}s window from ${clip}`);
  }
  const ladder = options.ladder ?? encoderLadder(options.gpu, options.vertical);

  await runEncoderLadder(
    ladder,
    async (encoder) => {
      await runFFmpeg(cutArgs(clip, start, duration, outputPath, encoder));
      if (!existsSync(outputPath)) {
        throw new EncodeError(`Cut of ${clip} finished but ${outputPath} was not written`);
      }
    },
    { scope: "cut", jobId: options.jobId, onFallback: options.onFallback }
  );

  return { path: outputPath, source: clip, start, duration, cut: true };
}
