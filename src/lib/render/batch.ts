/**
 * batch.ts — Folder-driven hook video batches
 *
 * A batch folder holds any number of videos' inputs, tied together by a
 * shared base name:
 *
 *   intro_hook.png            thumbnail
 *   intro_hook.mp3 / .wav     hook narration
 *   intro_audio.mp3 / .wav    main narration
 *   intro.srt                 subtitles
 *
 * Matching is case-insensitive. Groups missing any of the four are reported
 * and skipped. Complete groups render one after another; a failed group is
 * recorded and the batch moves on.
 */

import { readdir } from "fs/promises";
import { basename, extname, join } from "path";
import type { SubtitleStyleConfig } from "../settings/style";
import { finalOutputPath } from "../storage/paths";
import type { BatchItemResult } from "../tasks/history";
import { describeError, InvalidInputError } from "../utils/errors";
import { log } from "../utils/logger";
import { renderHookVideo } from "./hook-video";
import type { RenderDeps } from "./pipeline";

export interface BatchGroup {
  name: string;
  hookAudio: string;
  mainAudio: string;
  subtitle: string;
  thumbnail: string;
}

export interface GroupedInputs {
  complete: BatchGroup[];
  /** Base names that are missing at least one input. */
  incomplete: string[];
}

type Role = "thumbnail" | "hookAudio" | "mainAudio" | "subtitle";

function classify(file: string): { name: string; role: Role } | null {
  const lower = basename(file).toLowerCase();
  const ext = extname(lower);
  const stem = lower.slice(0, lower.length - ext.length);

  if (ext === ".png" && stem.endsWith("_hook")) {
    return { name: stem.slice(0, -"_hook".length), role: "thumbnail" };
  }
  if ((ext === ".wav" || ext === ".mp3") && stem.endsWith("_hook")) {
    return { name: stem.slice(0, -"_hook".length), role: "hookAudio" };
  }
  if ((ext === ".wav" || ext === ".mp3") && stem.endsWith("_audio")) {
    return { name: stem.slice(0, -"_audio".length), role: "mainAudio" };
  }
  if (ext === ".srt") {
    return { name: stem, role: "subtitle" };
  }
  return null;
}

export function groupBatchInputs(files: readonly string[]): GroupedInputs {
  const groups = new Map<string, Partial<Record<Role, string>>>();
  for (const file of [...files].sort()) {
    const match = classify(file);
    if (!match || !match.name) continue;
    const group = groups.get(match.name) ?? {};
    group[match.role] ??= file;
    groups.set(match.name, group);
  }

  const result: GroupedInputs = { complete: [], incomplete: [] };
  for (const name of [...groups.keys()].sort()) {
    const group = groups.get(name) ?? {};
    const { hookAudio, mainAudio, subtitle, thumbnail } = group;
    if (hookAudio && mainAudio && subtitle && thumbnail) {
      result.complete.push({ name, hookAudio, mainAudio, subtitle, thumbnail });
    } else {
      result.incomplete.push(name);
    }
  }
  return result;
}

export interface HookBatchOptions {
  jobId: string;
  inputDir: string;
  style: Partial<SubtitleStyleConfig>;
  vertical: boolean;
  /** Defaults to the workspace's final/ directory. */
  outputDir?: string;
  now?: () => number;
  onProgress?: (progress: number, items: readonly BatchItemResult[]) => Promise<void> | void;
}

export async function renderHookBatch(options: HookBatchOptions, deps: RenderDeps): Promise<BatchItemResult[]> {
  let entries: string[];
  try {
    entries = await readdir(options.inputDir);
  } catch (error) {
    throw new InvalidInputError(`Cannot read batch folder ${options.inputDir}: ${describeError(error)}`);
  }

  const { complete, incomplete } = groupBatchInputs(entries.map((entry) => join(options.inputDir, entry)));
  const items: BatchItemResult[] = incomplete.map((name) => ({
    name,
    status: "skipped",
    error: "Missing one of _hook.png, _hook audio, _audio audio, .srt",
  }));
  if (complete.length === 0) {
    throw new InvalidInputError(`No complete input groups in ${options.inputDir}`);
  }

  log("info", "batch", options.jobId, `Found ${complete.length} complete groups`, {
    skipped: incomplete.length,
  });

  const outputDir = options.outputDir ?? deps.workspace.finalDir;
  const now = options.now ?? Date.now;

  for (const [index, group] of complete.entries()) {
    try {
      const outputPath = await renderHookVideo(
        {
          jobId: `${options.jobId}_${String(index + 1).padStart(3, "0")}`,
          hookAudio: group.hookAudio,
          mainAudio: group.mainAudio,
          subtitle: group.subtitle,
          thumbnail: group.thumbnail,
          style: options.style,
          outputPath: finalOutputPath(outputDir, group.name, now()),
          vertical: options.vertical,
        },
        deps
      );
      items.push({ name: group.name, status: "completed", outputPath });
    } catch (error) {
      log("error", "batch", options.jobId, `Group ${group.name} failed`, { error: describeError(error) });
      items.push({ name: group.name, status: "failed", error: describeError(error) });
    }
    await options.onProgress?.(Math.round(((index + 1) / complete.length) * 100), items);
  }

  const failed = items.filter((item) => item.status === "failed").length;
  log("info", "batch", options.jobId, `Batch finished: ${complete.length - failed} succeeded, ${failed} failed`);
  return items;
}
