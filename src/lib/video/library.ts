/**
 * library.ts — Clip library cutter
 *
 * PURPOSE:
 *   Builds the `cut/` pool that main-video jobs draw backgrounds from. Each
 *   raw video is standardised once, then cut into consecutive clips of random
 *   length (4–7s by default) so that backgrounds assembled from the pool
 *   don't change shot on a fixed beat. The last clip takes whatever is left.
 *
 *   Processed raw files move to `used/` so a second run doesn't cut them
 *   again. A raw file that fails stays in `raw/` and the run carries on; the
 *   run only fails when nothing at all was produced.
 */

import { rm } from "fs/promises";
import { join, parse } from "path";
import { cutSegment } from "./cut";
import type { EncodeOptions } from "./cut";
import { probeDuration } from "./ffprobe";
import { standardizeVideo } from "./normalize";
import { secureRandom, type RandomSource } from "./select";
import { listClips, moveToUsed } from "../storage/clips";
import type { WorkspaceLayout } from "../storage/paths";
import { describeError, InsufficientMediaError, InvalidInputError } from "../utils/errors";
import { log } from "../utils/logger";

export interface SplitOptions extends EncodeOptions {
  minDuration?: number;
  maxDuration?: number;
  random?: RandomSource;
  /** Directory for the standardised intermediate; defaults to the cut directory. */
  workDir?: string;
}

/** Remainders shorter than this are not worth a clip of their own. */
const MIN_CLIP_SECONDS = 0.1;

/**
 * Clip windows covering [0, total): random lengths in [min, max], last one truncated.
 */
export function planClipWindows(
  total: number,
  minDuration: number,
  maxDuration: number,
  random: RandomSource = secureRandom
): Array<{ start: number; duration: number }> {
  if (!(minDuration > 0) || maxDuration < minDuration) {
    throw new InvalidInputError(`Invalid clip length range ${minDuration}–${maxDuration}s`);
  }
  const windows: Array<{ start: number; duration: number }> = [];
  let start = 0;
  while (total - start >= MIN_CLIP_SECONDS) {
    const length = minDuration + random() * (maxDuration - minDuration);
    const duration = Math.min(length, total - start);
    windows.push({ start, duration });
    start += duration;
  }
  return windows;
}

/**
 * Standardise `inputPath` into `cutDir` and cut it into clips.
 * Returns the clip paths in playback order.
 */
export async function splitIntoClips(
  inputPath: string,
  cutDir: string,
  options: SplitOptions
): Promise<string[]> {
  const stem = parse(inputPath).name;
  const standardized = join(options.workDir ?? cutDir, `std_${stem}.mp4`);

  try {
    await standardizeVideo(inputPath, standardized, options);
    const total = await probeDuration(standardized);
    const windows = planClipWindows(
      total,
      options.minDuration ?? 4,
      options.maxDuration ?? 7,
      options.random
    );

    const clips: string[] = [];
    for (const [index, window] of windows.entries()) {
      const output = join(cutDir, `cut_${String(index).padStart(4, "0")}_${stem}.mp4`);
      try {
        await cutSegment(standardized, window.start, window.duration, output, options);
        clips.push(output);
      } catch (error) {
        log("error", "library", options.jobId, `Failed to cut ${stem} at ${window.start.toFixed(2)}s`, {
          error: describeError(error),
        });
      }
    }

    log("info", "library", options.jobId, `Cut ${clips.length} clips from ${stem}`, {
      durationSec: Number(total.toFixed(3)),
    });
    return clips;
  } finally {
    await rm(standardized, { force: true });
  }
}

export interface ProcessRawResult {
  clips: string[];
  processed: string[];
  failed: string[];
}

/**
 * Cut every raw video in the workspace into the clip library.
 */
export async function processRawVideos(
  layout: WorkspaceLayout,
  options: SplitOptions
): Promise<ProcessRawResult> {
  const rawVideos = await listClips(layout.rawDir);
  if (rawVideos.length === 0) {
    throw new InsufficientMediaError(`No raw videos found in ${layout.rawDir}`);
  }

  const result: ProcessRawResult = { clips: [], processed: [], failed: [] };
  for (const raw of rawVideos) {
    try {
      const clips = await splitIntoClips(raw, layout.cutDir, { workDir: layout.tempDir, ...options });
      if (clips.length === 0) {
        result.failed.push(raw);
        continue;
      }
      result.clips.push(...clips);
      result.processed.push(await moveToUsed(layout, raw));
    } catch (error) {
      log("error", "library", options.jobId, `Failed to process ${raw}`, { error: describeError(error) });
      result.failed.push(raw);
    }
  }

  if (result.clips.length === 0) {
    throw new InsufficientMediaError(`No clips were created from ${rawVideos.length} raw videos`);
  }
  log("info", "library", options.jobId, `Created ${result.clips.length} clips from ${result.processed.length} raw videos`);
  return result;
}
