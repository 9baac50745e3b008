/**
 * commands.ts — Low-level FFmpeg/FFprobe execution wrapper
 *
 * PURPOSE:
 *   Thin, typed wrapper around the ffmpeg and ffprobe binaries. Every media
 *   operation in the render pipeline (probing, cutting, compositing, burning,
 *   concatenating) goes through runFFmpeg / runFFprobe, which is also the one
 *   seam tests replace with a fake.
 *
 * WHY NOT fluent-ffmpeg:
 *   We want to see and log the exact argument list of every invocation. The
 *   encoder fallback ladder swaps whole argument bundles, which is easier to
 *   reason about as plain string arrays than as a fluent builder chain.
 *
 * ERRORS:
 *   Non-zero exits and timeouts both surface as EncodeError carrying ffmpeg's
 *   stderr, so callers can walk the GPU → CPU ladder on either.
 */

import { execFile } from "child_process";
import { promisify } from "util";
import { EncodeError } from "../utils/errors";
import { log } from "../utils/logger";

const execFileAsync = promisify(execFile);

/**
 * Resolve the binary paths lazily so env vars loaded via dotenv are visible.
 * Falls back to "ffmpeg"/"ffprobe" on PATH.
 */
export function getFFmpegPath(): string {
  return process.env.FFMPEG_PATH || "ffmpeg";
}

export function getFFprobePath(): string {
  if (process.env.FFPROBE_PATH) return process.env.FFPROBE_PATH;
  const ffmpegPath = process.env.FFMPEG_PATH;
  if (!ffmpegPath) return "ffprobe";
  return ffmpegPath.replace("ffmpeg.exe", "ffprobe.exe").replace(/ffmpeg$/, "ffprobe");
}

export interface ExecResult {
  stdout: string;
  stderr: string;
}

interface ExecFailure {
  message: string;
  stderr: string;
  timedOut: boolean;
}

function readFailure(error: unknown): ExecFailure {
  if (!(error instanceof Error)) {
    return { message: String(error), stderr: "", timedOut: false };
  }
  const stderr = "stderr" in error && typeof error.stderr === "string" ? error.stderr : "";
  const killed = "killed" in error && error.killed === true;
  const signal = "signal" in error ? error.signal : undefined;
  return {
    message: error.message,
    stderr,
    timedOut: killed && signal === "SIGTERM",
  };
}

export const quoteArg = (value: string): string => {
  if (value === "") return '""';
  if (/[^\w./:=+,-]/.test(value)) return `"${value.replace(/"/g, '\\"')}"`;
  return value;
};

/**
 * Execute ffmpeg. `-y` is always prepended so an interrupted earlier attempt
 * never blocks the next one on an overwrite prompt.
 *
 * @param timeoutMs - Defaults to 30 minutes; a timeout is reported as EncodeError.
 */
export async function runFFmpeg(
  args: string[],
  timeoutMs = 1_800_000
): Promise<ExecResult> {
  const fullArgs = ["-hide_banner", "-y", ...args];
  log("debug", "ffmpeg", undefined, [getFFmpegPath(), ...fullArgs].map(quoteArg).join(" "));
  try {
    const result = await execFileAsync(getFFmpegPath(), fullArgs, {
      maxBuffer: 50 * 1024 * 1024, // ffmpeg is chatty on stderr
      timeout: timeoutMs,
      windowsHide: true,
    });
    return { stdout: result.stdout, stderr: result.stderr };
  } catch (error: unknown) {
    const failure = readFailure(error);
    const reason = failure.timedOut
      ? `FFmpeg timed out after ${Math.round(timeoutMs / 1000)}s`
      : `FFmpeg failed: ${failure.message}`;
    throw new EncodeError(reason, failure.stderr, { cause: error });
  }
}

/**
 * Execute ffprobe. Probing should be near-instant, so the timeout is short.
 */
export async function runFFprobe(args: string[]): Promise<ExecResult> {
  try {
    const result = await execFileAsync(getFFprobePath(), args, {
      maxBuffer: 10 * 1024 * 1024,
      timeout: 30_000,
      windowsHide: true,
    });
    return { stdout: result.stdout, stderr: result.stderr };
  } catch (error: unknown) {
    const failure = readFailure(error);
    throw new EncodeError(`FFprobe failed: ${failure.message}`, failure.stderr, {
      cause: error,
    });
  }
}
