/**
 * encoder.ts — Encoder capability detection and the GPU → CPU fallback ladder
 *
 * PURPOSE:
 *   Decides which H.264 encoder each ffmpeg invocation uses. When the ffmpeg
 *   build lists NVENC we try it first, but NVENC fails in ways a build listing
 *   can't predict (driver mismatch, session limits, filter graphs the GPU path
 *   rejects), so every encoding stage carries the libx264 bundle as a second
 *   attempt.
 *
 * THE LADDER:
 *   The fallback is a value, not nested try/catch: encoderLadder() returns
 *   [gpuArgs, cpuArgs] (or just [cpuArgs]) and runEncoderLadder() walks it in
 *   order, stopping at the first success. A ladder of N entries means at most
 *   N ffmpeg runs.
 *
 * BUNDLES:
 *   Both bundles target the same frame size, 30fps, a 2-second GOP and roughly
 *   the same bitrate ceiling, so a job that falls back mid-pipeline still
 *   produces parts that concatenate cleanly.
 */

import { runFFmpeg } from "./commands";
import { frameSpec, GOP_SIZE } from "./specs";
import { EncodeError, describeError } from "../utils/errors";
import { log } from "../utils/logger";

export const GPU_ENCODER = "h264_nvenc";
export const CPU_ENCODER = "libx264";

export type EncoderKind = "gpu" | "cpu";

export interface EncoderArgSet {
  kind: EncoderKind;
  codec: string;
  /** Appended to every ffmpeg invocation that encodes video. */
  args: string[];
  width: number;
  height: number;
  fps: number;
}

/**
 * Ask the ffmpeg binary whether it was built with NVENC.
 * Any failure to run the query counts as "no GPU".
 */
export async function hasGpuEncoder(): Promise<boolean> {
  try {
    const { stdout } = await runFFmpeg(["-encoders"], 30_000);
    return stdout.includes(GPU_ENCODER);
  } catch (error) {
    log("warn", "encoder", undefined, `Encoder listing failed, assuming CPU only: ${describeError(error)}`);
    return false;
  }
}

export function encodingSettings(kind: EncoderKind, vertical: boolean): EncoderArgSet {
  const spec = frameSpec(vertical);
  const common = ["-profile:v", "high", "-pix_fmt", "yuv420p", "-r", String(spec.fps), "-g", String(GOP_SIZE)];

  if (kind === "gpu") {
    return {
      kind,
      codec: GPU_ENCODER,
      args: [
        "-c:v", GPU_ENCODER,
        "-preset", "p4",
        "-tune", "hq",
        "-rc", "cbr",
        "-b:v", "4M",
        "-minrate", "4M",
        "-maxrate", "4M",
        "-bufsize", "4M",
        ...common,
      ],
      ...spec,
    };
  }

  return {
    kind,
    codec: CPU_ENCODER,
    args: [
      "-c:v", CPU_ENCODER,
      "-preset", "medium",
      "-crf", "23",
      "-maxrate", "5M",
      "-bufsize", "8M",
      ...common,
      "-movflags", "+faststart",
    ],
    ...spec,
  };
}

/**
 * The ordered list of argument bundles an encoding stage tries.
 */
export function encoderLadder(gpu: boolean, vertical: boolean): EncoderArgSet[] {
  const cpu = encodingSettings("cpu", vertical);
  return gpu ? [encodingSettings("gpu", vertical), cpu] : [cpu];
}

export interface LadderOptions {
  scope: string;
  jobId?: string;
  /** Called once when an attempt fails and a later rung is about to run. */
  onFallback?: (failed: EncoderArgSet, error: EncodeError) => void;
}

/**
 * Run `attempt` with each rung of the ladder until one succeeds.
 * Only EncodeError advances the ladder; anything else is rethrown at once.
 * When every rung fails, the last EncodeError is rethrown.
 */
export async function runEncoderLadder<T>(
  ladder: EncoderArgSet[],
  attempt: (encoder: EncoderArgSet) => Promise<T>,
  options: LadderOptions
): Promise<T> {
  if (ladder.length === 0) {
    throw new EncodeError(`${options.scope}: no encoder configured`);
  }

  let lastError: EncodeError | undefined;
  for (let i = 0; i < ladder.length; i++) {
    const encoder = ladder[i];
    try {
      return await attempt(encoder);
    } catch (error) {
      if (!(error instanceof EncodeError)) throw error;
      lastError = error;
      const next = ladder[i + 1];
      if (next) {
        log("warn", options.scope, options.jobId, `${encoder.codec} failed, retrying with ${next.codec}`, {
          error: describeError(error),
        });
        options.onFallback?.(encoder, error);
      }
    }
  }
  throw lastError ?? new EncodeError(`${options.scope}: all encoders failed`);
}

/**
 * Memoises hasGpuEncoder() for a number of calls.
 *
 * `maxCalls` of 0 disables memoisation: every pipeline run re-probes, which is
 * cheap next to an encode. invalidate() is called on the first GPU fallback so
 * a driver that fell over mid-session is re-checked before the next job.
 */
export class EncoderCapabilityCache {
  private cached: boolean | null = null;
  private served = 0;

  constructor(
    private readonly maxCalls = 0,
    private readonly probe: () => Promise<boolean> = hasGpuEncoder
  ) {}

  async hasGpuEncoder(): Promise<boolean> {
    if (this.cached !== null && this.served < this.maxCalls) {
      this.served++;
      return this.cached;
    }
    const value = await this.probe();
    if (this.maxCalls > 0) {
      this.cached = value;
      this.served = 1;
    }
    return value;
  }

  invalidate(): void {
    this.cached = null;
    this.served = 0;
  }
}
