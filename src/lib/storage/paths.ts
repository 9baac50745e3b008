/**
 * paths.ts — Workspace directory layout and per-job file names
 *
 * PURPOSE:
 *   Builds every path the worker reads or writes. The layout under the
 *   workspace root:
 *
 *   input_16_9/   horizontal background pool (hook jobs)
 *   input_9_16/   vertical background pool (hook jobs)
 *   raw/          source footage waiting to be cut into the clip library
 *   cut/          clip library (main-video jobs)
 *   used/         raw footage already cut
 *   temp/         per-job intermediates, always prefixed with the job id
 *   final/        rendered outputs
 *   config/       presets.json, task_history.json, video_cache.json
 *
 * NAMESPACING:
 *   Concurrent jobs share temp/. Every temp name starts with the job id, so two
 *   jobs never write the same file.
 */

import { join, parse } from "path";

export interface WorkspaceLayout {
  root: string;
  horizontalPoolDir: string;
  verticalPoolDir: string;
  rawDir: string;
  cutDir: string;
  usedDir: string;
  tempDir: string;
  finalDir: string;
  configDir: string;
}

export function workspaceLayout(root: string): WorkspaceLayout {
  return {
    root,
    horizontalPoolDir: join(root, "input_16_9"),
    verticalPoolDir: join(root, "input_9_16"),
    rawDir: join(root, "raw"),
    cutDir: join(root, "cut"),
    usedDir: join(root, "used"),
    tempDir: join(root, "temp"),
    finalDir: join(root, "final"),
    configDir: join(root, "config"),
  };
}

export function backgroundPoolDir(layout: WorkspaceLayout, vertical: boolean): string {
  return vertical ? layout.verticalPoolDir : layout.horizontalPoolDir;
}

export function presetsFile(layout: WorkspaceLayout): string {
  return join(layout.configDir, "presets.json");
}

export function taskHistoryFile(layout: WorkspaceLayout): string {
  return join(layout.configDir, "task_history.json");
}

export function videoCacheFile(layout: WorkspaceLayout): string {
  return join(layout.configDir, "video_cache.json");
}

/** `<tempDir>/<jobId>_<name>.<ext>` */
export function tempFilePath(tempDir: string, jobId: string, name: string, ext: string): string {
  return join(tempDir, `${jobId}_${name}.${ext}`);
}

/** `<finalDir>/<stem>_<timestamp>.mp4` */
export function finalOutputPath(finalDir: string, sourceName: string, now = Date.now()): string {
  return join(finalDir, `${parse(sourceName).name}_${Math.floor(now / 1000)}.mp4`);
}
