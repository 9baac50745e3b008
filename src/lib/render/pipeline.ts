/**
 * pipeline.ts — Shared render job machinery
 *
 * PURPOSE:
 *   Both job kinds (hook videos and main videos) run the same outer loop:
 *
 *     attempt 1 ──fail──▶ wait retryDelayMs ──▶ attempt 2 ──fail──▶ FAILED
 *        │                                         │
 *        └─────────────▶ DONE ◀────────────────────┘
 *
 *   Each attempt gets a fresh TempFileSet that is cleaned up when the attempt
 *   ends, whatever the outcome, so a failed first attempt never leaves its
 *   intermediates behind for the second. The finished file is rendered into
 *   temp/ and only moved to its output path at the very end.
 *
 *   Errors that a second attempt cannot fix (empty clip pool, missing input
 *   files) fail the job on the first attempt.
 */

import { existsSync } from "fs";
import { mkdir } from "fs/promises";
import { setTimeout as delay } from "timers/promises";
import { dirname } from "path";
import { moveFile } from "../storage/clips";
import type { WorkspaceLayout } from "../storage/paths";
import type { DurationLookup } from "../storage/video-cache";
import type { SubtitleStyler } from "../video/burn";
import type { Segment } from "../video/cut";
import { EncoderCapabilityCache } from "../video/encoder";
import type { RandomSource } from "../video/select";
import { concatenate } from "../video/stitch";
import {
  describeError,
  InsufficientMediaError,
  InvalidInputError,
} from "../utils/errors";
import { log } from "../utils/logger";
import { TempFileSet, type TempFileSetOptions } from "./temp-files";

export type PipelineState =
  | "NORMALIZING_AUDIO"
  | "PROBING_DURATIONS"
  | "SELECTING_BACKGROUNDS"
  | "COMPOSITING_HOOK"
  | "BURNING_SUBTITLES"
  | "CONCATENATING"
  | "DONE"
  | "FAILED";

export interface StateChange {
  jobId: string;
  state: PipelineState;
  attempt: number;
  error?: string;
}

export const DEFAULT_MAX_ATTEMPTS = 2;
export const DEFAULT_RETRY_DELAY_MS = 5000;

export interface RenderDeps {
  workspace: WorkspaceLayout;
  capabilities?: EncoderCapabilityCache;
  durationCache?: DurationLookup;
  random?: RandomSource;
  styler?: SubtitleStyler;
  fontDirs?: readonly string[];
  maxAttempts?: number;
  retryDelayMs?: number;
  onState?: (change: StateChange) => void;
  sleep?: (ms: number) => Promise<unknown>;
  cleanup?: Omit<TempFileSetOptions, "jobId">;
}

export interface AttemptContext {
  jobId: string;
  attempt: number;
  temp: TempFileSet;
  gpu: boolean;
  enter(state: PipelineState): void;
  /** Passed to every encoding stage; a GPU failure invalidates the capability cache. */
  onFallback(): void;
}

function isRetryable(error: unknown): boolean {
  return !(error instanceof InsufficientMediaError || error instanceof InvalidInputError);
}

export function requireInputs(inputs: Record<string, string>): void {
  for (const [label, path] of Object.entries(inputs)) {
    if (!existsSync(path)) {
      throw new InvalidInputError(`${label} file not found: ${path}`);
    }
  }
}

/**
 * Runs `attempt` up to maxAttempts times and moves its result to `outputPath`.
 */
export async function runRenderJob(
  jobId: string,
  outputPath: string,
  deps: RenderDeps,
  attempt: (ctx: AttemptContext) => Promise<string>
): Promise<string> {
  const maxAttempts = deps.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const retryDelayMs = deps.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  const sleep = deps.sleep ?? delay;
  const capabilities = deps.capabilities ?? new EncoderCapabilityCache();

  for (let n = 1; ; n++) {
    const temp = new TempFileSet({ ...deps.cleanup, jobId });
    const enter = (state: PipelineState) => {
      log("info", "render", jobId, `State ${state}`, { attempt: n });
      deps.onState?.({ jobId, state, attempt: n });
    };

    try {
      const gpu = await capabilities.hasGpuEncoder();
      const rendered = await attempt({
        jobId,
        attempt: n,
        temp,
        gpu,
        enter,
        onFallback: () => capabilities.invalidate(),
      });
      await mkdir(dirname(outputPath), { recursive: true });
      await moveFile(rendered, outputPath);
      enter("DONE");
      log("info", "render", jobId, `Rendered ${outputPath}`, { attempts: n });
      return outputPath;
    } catch (error) {
      const message = describeError(error);
      if (!isRetryable(error) || n >= maxAttempts) {
        log("error", "render", jobId, `Render failed after ${n} attempt(s)`, { error: message });
        deps.onState?.({ jobId, state: "FAILED", attempt: n, error: message });
        throw error;
      }
      log("warn", "render", jobId, `Attempt ${n} failed, retrying in ${retryDelayMs}ms`, { error: message });
    } finally {
      await temp.cleanup();
    }
    await sleep(retryDelayMs);
  }
}

/**
 * One file holding the selected background segments: the segment itself when
 * there is only one, otherwise a re-encoded join in temp/. Whole pool clips
 * keep their source codec, size and frame rate while cuts come out of the
 * encoder ladder, so the demuxer cannot copy them side by side.
 */
export async function joinBackground(
  segments: readonly Segment[],
  outputPath: string,
  ctx: AttemptContext,
  options: { workDir: string; vertical: boolean }
): Promise<string> {
  if (segments.length === 1) return segments[0].path;
  ctx.temp.track(outputPath);
  return concatenate(
    segments.map((segment) => segment.path),
    outputPath,
    {
      mode: "re_encode",
      workDir: options.workDir,
      jobId: ctx.jobId,
      gpu: ctx.gpu,
      vertical: options.vertical,
      videoOnly: true,
      onFallback: ctx.onFallback,
    }
  );
}
