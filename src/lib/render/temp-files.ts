/**
 * temp-files.ts — Per-job intermediate file tracking
 *
 * Every intermediate a render job creates is registered here *before* it is
 * written, so a job that fails halfway still knows what to remove. cleanup()
 * runs on every terminal state.
 *
 * Deletes are retried with exponential backoff (500ms, 1s, 2s, 4s) when the
 * OS reports the file busy or locked, which happens on Windows hosts while a
 * just-killed ffmpeg still holds a handle. A file that is already gone counts
 * as deleted. A file that outlives every attempt is logged as a
 * CleanupWarning and reported back; it never fails the job.
 */

import { unlink as fsUnlink } from "fs/promises";
import { setTimeout as delay } from "timers/promises";
import { CleanupWarning, describeError, errnoCode } from "../utils/errors";
import { log } from "../utils/logger";

const RETRYABLE_CODES = new Set(["EPERM", "EACCES", "EBUSY"]);

export interface TempFileSetOptions {
  jobId?: string;
  maxAttempts?: number;
  initialDelayMs?: number;
  unlink?: (path: string) => Promise<void>;
  sleep?: (ms: number) => Promise<unknown>;
}

export class TempFileSet {
  private readonly files: string[] = [];
  private readonly maxAttempts: number;
  private readonly initialDelayMs: number;
  private readonly unlink: (path: string) => Promise<void>;
  private readonly sleep: (ms: number) => Promise<unknown>;

  constructor(private readonly options: TempFileSetOptions = {}) {
    this.maxAttempts = options.maxAttempts ?? 5;
    this.initialDelayMs = options.initialDelayMs ?? 500;
    this.unlink = options.unlink ?? fsUnlink;
    this.sleep = options.sleep ?? delay;
  }

  /** Registers `path` and returns it, so it can wrap a path expression. */
  track(path: string): string {
    if (!this.files.includes(path)) this.files.push(path);
    return path;
  }

  paths(): readonly string[] {
    return [...this.files];
  }

  /**
   * Deletes every tracked file. Returns the warnings for files that could not
   * be removed; the set is empty afterwards either way.
   */
  async cleanup(): Promise<CleanupWarning[]> {
    const files = this.files.splice(0);
    const warnings: CleanupWarning[] = [];
    for (const file of files) {
      const warning = await this.remove(file);
      if (warning) warnings.push(warning);
    }
    log("info", "cleanup", this.options.jobId, `Removed ${files.length - warnings.length}/${files.length} temp files`);
    return warnings;
  }

  private async remove(file: string): Promise<CleanupWarning | null> {
    let wait = this.initialDelayMs;
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        await this.unlink(file);
        return null;
      } catch (error) {
        const code = errnoCode(error);
        if (code === "ENOENT") return null;

        const retryable = code !== undefined && RETRYABLE_CODES.has(code);
        if (!retryable || attempt === this.maxAttempts) {
          const warning = new CleanupWarning(file, attempt, describeError(error));
          log("warn", "cleanup", this.options.jobId, warning.message, { error: warning.name });
          return warning;
        }
        await this.sleep(wait);
        wait *= 2;
      }
    }
    return null;
  }
}
