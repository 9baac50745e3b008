/**
 * logger.ts — Structured one-line JSON logging
 *
 * PURPOSE:
 *   Every module in the render pipeline logs through this helper so a single
 *   job can be followed across the worker output by its jobId. Entries are
 *   plain JSON lines, which log collectors (Railway, Docker, journald) index
 *   without extra parsing configuration.
 *
 * LEVELS:
 *   - error → stderr
 *   - warn  → stderr (console.warn)
 *   - info  → stdout
 *   - debug → stdout, only when LOG_LEVEL=debug (ffmpeg command lines live here)
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

function debugEnabled(): boolean {
  return (process.env.LOG_LEVEL || "info").toLowerCase() === "debug";
}

export function log(
  level: LogLevel,
  scope: string,
  jobId: string | undefined,
  message: string,
  extra?: Record<string, unknown>
): void {
  if (level === "debug" && !debugEnabled()) return;

  const entry = {
    ts: new Date().toISOString(),
    level,
    job: scope,
    jobId: jobId || "unknown",
    msg: message,
    ...extra,
  };
  const line = JSON.stringify(entry);

  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}
