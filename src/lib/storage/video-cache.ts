/**
 * video-cache.ts — Persistent clip duration cache
 *
 * PURPOSE:
 *   Probing a pool of a few hundred clips costs one ffprobe process per clip
 *   per job. Pool clips never change once cut, so their durations are kept in
 *   config/video_cache.json keyed by absolute path. The selector consults the
 *   cache when it is given one and writes back every fresh probe.
 *
 *   Entries for files that no longer exist are dropped by cleanMissing(),
 *   which the worker runs at startup.
 */

import { existsSync } from "fs";
import { mkdir } from "fs/promises";
import { basename, dirname, resolve } from "path";
import { z } from "zod";
import { describeError } from "../utils/errors";
import { log } from "../utils/logger";
import { readJsonFile, writeJsonAtomic, WriteQueue } from "./json-file";

const cacheEntrySchema = z.object({
  path: z.string(),
  filename: z.string(),
  duration: z.number().positive(),
  lastUpdated: z.number(),
});

const cacheFileSchema = z.record(cacheEntrySchema);

export type VideoCacheEntry = z.infer<typeof cacheEntrySchema>;

/** What the selector needs from a duration cache. */
export interface DurationLookup {
  get(path: string): number | undefined;
  set(path: string, duration: number): Promise<void>;
}

export class VideoCache implements DurationLookup {
  private readonly writes = new WriteQueue();

  private constructor(
    private readonly file: string,
    private entries: Record<string, VideoCacheEntry>
  ) {}

  static async open(file: string): Promise<VideoCache> {
    await mkdir(dirname(file), { recursive: true });
    let entries: Record<string, VideoCacheEntry> = {};
    try {
      const raw = await readJsonFile(file);
      if (raw !== undefined) entries = cacheFileSchema.parse(raw);
    } catch (error) {
      log("warn", "video-cache", undefined, `Ignoring unreadable cache ${file}: ${describeError(error)}`);
    }
    return new VideoCache(file, entries);
  }

  get(path: string): number | undefined {
    return this.entries[resolve(path)]?.duration;
  }

  async set(path: string, duration: number): Promise<void> {
    if (!(duration > 0)) return;
    const key = resolve(path);
    this.entries[key] = {
      path: key,
      filename: basename(key),
      duration,
      lastUpdated: Date.now(),
    };
    await this.save();
  }

  all(): VideoCacheEntry[] {
    return Object.values(this.entries);
  }

  /** Drops entries whose file is gone. Returns how many were removed. */
  async cleanMissing(): Promise<number> {
    const missing = Object.keys(this.entries).filter((key) => !existsSync(key));
    for (const key of missing) delete this.entries[key];
    if (missing.length > 0) {
      await this.save();
      log("info", "video-cache", undefined, `Removed ${missing.length} missing files from cache`);
    }
    return missing.length;
  }

  /** Jobs share one instance, so writes are queued and each one lands whole. */
  private save(): Promise<void> {
    return this.writes.run(() => writeJsonAtomic(this.file, this.entries));
  }
}
