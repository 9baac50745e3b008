/**
 * errors.ts — Render pipeline error taxonomy
 *
 * PURPOSE:
 *   Typed errors for every way a render job can go wrong. The orchestrator
 *   branches on these classes (InsufficientMediaError is never retried), the
 *   worker stores `describeError()` output in the task history, and the
 *   encoder ladder only advances on EncodeError.
 *
 * TAXONOMY:
 *   - ProbeFailure           duration/dimensions unknown; the clip is unusable
 *   - InsufficientMediaError no usable clips in the pool; fatal, no retry
 *   - EncodeError            ffmpeg exited non-zero, timed out, or wrote nothing
 *   - SubtitleBurnError      styling delegate or burn step produced no file
 *   - CleanupWarning         a temp file survived every delete attempt; logged only
 */

export type RenderErrorCode =
  | "PROBE_FAILURE"
  | "INSUFFICIENT_MEDIA"
  | "ENCODE_ERROR"
  | "SUBTITLE_BURN_ERROR"
  | "CLEANUP_WARNING"
  | "INVALID_INPUT";

export class RenderError extends Error {
  constructor(
    message: string,
    public code: RenderErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "RenderError";
  }
}

export class ProbeFailure extends RenderError {
  constructor(public path: string, reason: string) {
    super(`Could not probe ${path}: ${reason}`, "PROBE_FAILURE");
    this.name = "ProbeFailure";
  }
}

export class InsufficientMediaError extends RenderError {
  constructor(message: string) {
    super(message, "INSUFFICIENT_MEDIA");
    this.name = "InsufficientMediaError";
  }
}

export class EncodeError extends RenderError {
  constructor(
    message: string,
    public stderr: string = "",
    options?: { cause?: unknown }
  ) {
    super(message, "ENCODE_ERROR", options);
    this.name = "EncodeError";
  }
}

export class SubtitleBurnError extends RenderError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "SUBTITLE_BURN_ERROR", options);
    this.name = "SubtitleBurnError";
  }
}

export class CleanupWarning extends RenderError {
  constructor(public path: string, public attempts: number, reason: string) {
    super(
      `Could not delete ${path} after ${attempts} attempts: ${reason}`,
      "CLEANUP_WARNING"
    );
    this.name = "CleanupWarning";
  }
}

export class InvalidInputError extends RenderError {
  constructor(message: string) {
    super(message, "INVALID_INPUT");
    this.name = "InvalidInputError";
  }
}

/**
 * Human-readable message for any thrown value. EncodeErrors keep the last
 * stderr lines, which is where ffmpeg puts the actual reason.
 */
export function describeError(error: unknown): string {
  if (error instanceof EncodeError && error.stderr) {
    const tail = error.stderr.trim().split(/\r?\n/).slice(-5).join("\n");
    return `${error.message}\n${tail}`;
  }
  if (error instanceof Error) return error.message;
  return "Unknown error";
}

/** Node's fs errors carry a string `code`; anything else has none. */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}
