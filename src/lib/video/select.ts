/**
 * select.ts — Duration-driven background clip selection
 *
 * PURPOSE:
 *   Given a target duration (the length of an audio track) and a directory of
 *   background clips, returns an ordered list of segments whose summed length
 *   covers the target exactly: whole clips while they fit, then one clip cut
 *   down to the remaining need.
 *
 * HOW IT WORKS:
 *   1. List the pool (sorted *.mp4). No files → InsufficientMediaError.
 *   2. Pick an eligible clip uniformly at random (pickNextClip). Eligible means
 *      usable and not yet consumed in this pass.
 *   3. Probe it. Duration 0 → the clip is unusable for the rest of the call.
 *   4. Longer than the remaining need → cut [0, remaining) into a temp file
 *      and stop. Otherwise consume it whole and continue.
 *   5. Pass exhausted before the target → replenish: clips already in the
 *      result stay excluded where that still leaves something to pick,
 *      otherwise the whole usable pool comes back.
 *
 * STATE:
 *   The candidate list is immutable and the exclusion set is owned by one
 *   call, so concurrent jobs reading the same pool never see each other's
 *   picks. Two jobs may pick the same clip; pool clips are only read.
 *
 * BOUNDS:
 *   Every probe failure shrinks the usable set, and replenishment cycles are
 *   capped by maxReplenishments. A pool of unprobeable or vanishingly short
 *   clips ends in InsufficientMediaError instead of spinning.
 */

import { randomInt } from "crypto";
import { listClips } from "../storage/clips";
import { tempFilePath } from "../storage/paths";
import type { DurationLookup } from "../storage/video-cache";
import { cutSegment, type EncodeOptions, type Segment } from "./cut";
import { getDuration } from "./ffprobe";
import { FRAME_EPSILON } from "./specs";
import { InsufficientMediaError, InvalidInputError } from "../utils/errors";
import { log } from "../utils/logger";

/** Below this the target counts as met (float noise from summing durations). */
const DURATION_TOLERANCE = 1e-6;

export const DEFAULT_MAX_REPLENISHMENTS = 100;

/** Uniform float in [0, 1). */
export type RandomSource = () => number;

export const secureRandom: RandomSource = () => randomInt(0, 2 ** 32) / 2 ** 32;

export interface ClipPick {
  clip: string;
  exclusion: ReadonlySet<string>;
}

/**
 * Choose one clip not in `exclusion`. Returns the clip and a new exclusion
 * set containing it, or null when every candidate is excluded.
 */
export function pickNextClip(
  candidates: readonly string[],
  exclusion: ReadonlySet<string>,
  random: RandomSource = secureRandom
): ClipPick | null {
  const eligible = candidates.filter((clip) => !exclusion.has(clip));
  if (eligible.length === 0) return null;

  const index = Math.min(Math.floor(random() * eligible.length), eligible.length - 1);
  const clip = eligible[index];
  return { clip, exclusion: new Set([...exclusion, clip]) };
}

/**
 * Exclusion set for a fresh pass: keep clips already in the result out when
 * some other usable clip remains, otherwise start from an empty set.
 */
export function replenishedExclusion(
  usable: readonly string[],
  selected: readonly Segment[]
): ReadonlySet<string> {
  const inResult = new Set(selected.map((segment) => segment.source));
  const excluded = usable.filter((clip) => inResult.has(clip));
  return excluded.length < usable.length ? new Set(excluded) : new Set();
}

/** Round up to whole milliseconds, ignoring float noise below a microsecond. */
function ceilToMillis(seconds: number): number {
  return Math.ceil(seconds * 1000 - 1e-6) / 1000;
}

export interface SelectOptions extends EncodeOptions {
  jobId: string;
  /** Names the temp files of this selection, e.g. "hook" or "main". */
  label: string;
  random?: RandomSource;
  probe?: (path: string) => Promise<number>;
  cache?: DurationLookup;
  maxReplenishments?: number;
  /** Called with each temp path before it is written, so the caller can clean it up even on failure. */
  onTempFile?: (path: string) => void;
  cut?: typeof cutSegment;
}

export function totalDuration(segments: readonly Segment[]): number {
  return segments.reduce((sum, segment) => sum + segment.duration, 0);
}

export async function selectSegments(
  targetDuration: number,
  poolDir: string,
  tempDir: string,
  options: SelectOptions
): Promise<Segment[]> {
  if (!(targetDuration > 0)) {
    throw new InvalidInputError(`Target duration must be positive, got ${targetDuration}`);
  }

  const random = options.random ?? secureRandom;
  const probe = options.probe ?? getDuration;
  const cut = options.cut ?? cutSegment;
  const maxReplenishments = options.maxReplenishments ?? DEFAULT_MAX_REPLENISHMENTS;

  const candidates = await listClips(poolDir);
  if (candidates.length === 0) {
    throw new InsufficientMediaError(`No clips found in ${poolDir}`);
  }

  const durations = new Map<string, number>();
  const unusable = new Set<string>();

  async function clipDuration(clip: string): Promise<number> {
    const known = durations.get(clip) ?? options.cache?.get(clip);
    if (known !== undefined) {
      durations.set(clip, known);
      return known;
    }
    const probed = await probe(clip);
    durations.set(clip, probed);
    if (probed > 0) await options.cache?.set(clip, probed);
    return probed;
  }

  const segments: Segment[] = [];
  let exclusion: ReadonlySet<string> = new Set();
  let total = 0;
  let replenishments = 0;

  while (targetDuration - total > DURATION_TOLERANCE) {
    const usable = candidates.filter((clip) => !unusable.has(clip));
    if (usable.length === 0) {
      throw new InsufficientMediaError(`No usable clips in ${poolDir} (${candidates.length} unprobeable)`);
    }

    const pick = pickNextClip(usable, exclusion, random);
    if (!pick) {
      replenishments++;
      if (replenishments > maxReplenishments) {
        throw new InsufficientMediaError(
          `Pool ${poolDir} exhausted ${maxReplenishments} times before reaching ${targetDuration.toFixed(2)}s ` +
            `(reached ${total.toFixed(2)}s)`
        );
      }
      log("info", "select", options.jobId, `Reusing clips from ${poolDir}`, {
        label: options.label,
        reachedSec: Number(total.toFixed(3)),
        targetSec: targetDuration,
      });
      exclusion = replenishedExclusion(usable, segments);
      continue;
    }
    exclusion = pick.exclusion;

    const duration = await clipDuration(pick.clip);
    if (!(duration > 0)) {
      log("warn", "select", options.jobId, `Skipping unusable clip ${pick.clip}`);
      unusable.add(pick.clip);
      continue;
    }

    const remaining = targetDuration - total;
    if (duration > remaining) {
      const cutDuration = Math.max(ceilToMillis(remaining), FRAME_EPSILON);
      if (cutDuration >= duration) {
        segments.push({ path: pick.clip, source: pick.clip, start: 0, duration, cut: false });
        total += duration;
        break;
      }
      const index = String(segments.length).padStart(4, "0");
      const outputPath = tempFilePath(tempDir, options.jobId, `${options.label}_cut_${index}`, "mp4");
      options.onTempFile?.(outputPath);
      const segment = await cut(pick.clip, 0, cutDuration, outputPath, options);
      segments.push(segment);
      total += segment.duration;
      break;
    }

    segments.push({ path: pick.clip, source: pick.clip, start: 0, duration, cut: false });
    total += duration;
  }

  log("info", "select", options.jobId, `Selected ${segments.length} segments`, {
    label: options.label,
    targetSec: targetDuration,
    totalSec: Number(total.toFixed(3)),
    cuts: segments.filter((segment) => segment.cut).length,
  });
  return segments;
}
