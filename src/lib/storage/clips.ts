/**
 * clips.ts — Clip pool listing and workspace file moves
 *
 * The selector only ever sees the sorted `*.mp4` listing of a pool directory;
 * sorting keeps a seeded selection reproducible across filesystems.
 */

import { copyFile, mkdir, readdir, rename, unlink } from "fs/promises";
import { basename, join } from "path";
import type { WorkspaceLayout } from "./paths";
import { errnoCode } from "../utils/errors";

export async function listClips(dir: string, ext = ".mp4"): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (error) {
    if (errnoCode(error) === "ENOENT") return [];
    throw error;
  }
  return entries
    .filter((name) => name.toLowerCase().endsWith(ext))
    .sort()
    .map((name) => join(dir, name));
}

export async function ensureWorkspace(layout: WorkspaceLayout): Promise<void> {
  const dirs = [
    layout.horizontalPoolDir,
    layout.verticalPoolDir,
    layout.rawDir,
    layout.cutDir,
    layout.usedDir,
    layout.tempDir,
    layout.finalDir,
    layout.configDir,
  ];
  await Promise.all(dirs.map((dir) => mkdir(dir, { recursive: true })));
}

/**
 * rename() fails across devices (temp on tmpfs, final on a mounted volume);
 * fall back to copy + unlink there.
 */
export async function moveFile(from: string, to: string): Promise<void> {
  try {
    await rename(from, to);
  } catch (error) {
    if (errnoCode(error) !== "EXDEV") throw error;
    await copyFile(from, to);
    await unlink(from);
  }
}

export async function moveToUsed(layout: WorkspaceLayout, file: string): Promise<string> {
  const target = join(layout.usedDir, basename(file));
  await moveFile(file, target);
  return target;
}
