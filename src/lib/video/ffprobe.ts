/**
 * ffprobe.ts — Media duration and dimension probing
 *
 * PURPOSE:
 *   Answers the two questions the pipeline asks of a media file: how long is
 *   it, and how big is its frame. getDuration and getDimensions never throw:
 *   selection treats a 0 duration as "skip this clip" and compositing falls
 *   back to 1920x1080. probeDuration is the throwing variant, used for the
 *   narration tracks a job cannot do without.
 *
 * ARCHITECTURE:
 *   - Called by: select.ts (clip durations), render/* (audio durations),
 *     thumbnail.ts (thumbnail size), library.ts (raw video length)
 *   - Depends on: commands.ts (ffprobe execution)
 */

import { readdir, stat } from "fs/promises";
import { basename, dirname, extname, join, resolve } from "path";
import { runFFprobe } from "./commands";
import { ProbeFailure, describeError } from "../utils/errors";
import { log } from "../utils/logger";

export interface Dimensions {
  width: number;
  height: number;
}

export const DEFAULT_DIMENSIONS: Dimensions = { width: 1920, height: 1080 };

async function fileSize(path: string): Promise<number | null> {
  try {
    return (await stat(path)).size;
  } catch {
    return null;
  }
}

/**
 * A file can be renamed between listing and probing (another job's cleanup,
 * an editor saving over it). Look for `<stem>*<ext>` next to it before giving up.
 */
async function findSibling(path: string): Promise<string | null> {
  const dir = dirname(path);
  const ext = extname(path);
  const stem = basename(path, ext);
  try {
    const entries = await readdir(dir);
    const match = entries
      .filter((name) => name.startsWith(stem) && name.endsWith(ext))
      .sort()[0];
    return match ? join(dir, match) : null;
  } catch {
    return null;
  }
}

function parseDuration(stdout: string): number {
  const data: unknown = JSON.parse(stdout);
  if (typeof data !== "object" || data === null || !("format" in data)) {
    throw new Error("missing format section");
  }
  const format = data.format;
  if (typeof format !== "object" || format === null || !("duration" in format)) {
    throw new Error("missing duration field");
  }
  const duration = parseFloat(String(format.duration));
  if (!Number.isFinite(duration)) {
    throw new Error(`unparsable duration "${String(format.duration)}"`);
  }
  return duration;
}

/**
 * Strict variant of getDuration: throws ProbeFailure instead of returning 0.
 */
export async function probeDuration(path: string): Promise<number> {
  let target = resolve(path);

  let size = await fileSize(target);
  if (size === null) {
    const sibling = await findSibling(target);
    if (!sibling) throw new ProbeFailure(target, "file not found");
    log("warn", "probe", undefined, `Using sibling file ${sibling} for missing ${target}`);
    target = sibling;
    size = await fileSize(target);
  }
  if (size === null) throw new ProbeFailure(target, "file not found");
  if (size === 0) throw new ProbeFailure(target, "file is empty");

  try {
    const { stdout } = await runFFprobe([
      "-v",
      "error",
      "-show_entries",
      "format=duration",
      "-print_format",
      "json",
      target,
    ]);
    return parseDuration(stdout);
  } catch (error) {
    throw new ProbeFailure(target, describeError(error));
  }
}

/**
 * Container duration in seconds, or 0 when it cannot be determined.
 * Callers must treat 0 as "unusable".
 */
export async function getDuration(path: string): Promise<number> {
  try {
    return await probeDuration(path);
  } catch (error) {
    log("warn", "probe", undefined, describeError(error));
    return 0;
  }
}

/**
 * Frame size of the first video stream, or 1920x1080 when unknown.
 */
export async function getDimensions(path: string): Promise<Dimensions> {
  try {
    const { stdout } = await runFFprobe([
      "-v",
      "error",
      "-select_streams",
      "v:0",
      "-show_entries",
      "stream=width,height",
      "-print_format",
      "json",
      path,
    ]);
    const data: unknown = JSON.parse(stdout);
    const stream =
      typeof data === "object" && data !== null && "streams" in data && Array.isArray(data.streams)
        ? data.streams[0]
        : undefined;
    const width = parseInt(String(stream?.width), 10);
    const height = parseInt(String(stream?.height), 10);
    if (!(width > 0) || !(height > 0)) {
      throw new Error("no video stream dimensions");
    }
    return { width, height };
  } catch (error) {
    log("warn", "probe", undefined, `Using default dimensions for ${path}: ${describeError(error)}`);
    return { ...DEFAULT_DIMENSIONS };
  }
}
