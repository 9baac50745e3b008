/**
 * json-file.ts — Small JSON documents under config/
 *
 * Presets, the task history and the duration cache are read by the worker
 * and the operator scripts at the same time, so writes go to `<file>.tmp`
 * first and are renamed over the real file: a reader sees either the old document or the
 * new one, never half of one.
 */

import { mkdir, readFile, rename, rm, writeFile } from "fs/promises";
import { dirname } from "path";
import { errnoCode } from "../utils/errors";

/** Parsed contents, or `undefined` when the file does not exist. Parse errors propagate. */
export async function readJsonFile(file: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(file, "utf-8");
  } catch (error) {
    if (errnoCode(error) === "ENOENT") return undefined;
    throw error;
  }
  return JSON.parse(raw);
}

export async function writeJsonAtomic(file: string, value: unknown): Promise<void> {
  await mkdir(dirname(file), { recursive: true });
  const temp = `${file}.tmp`;
  try {
    await writeFile(temp, JSON.stringify(value, null, 2), "utf-8");
    await rename(temp, file);
  } catch (error) {
    await rm(temp, { force: true });
    throw error;
  }
}

/**
 * Serialises read-modify-write cycles within one process.
 */
export class WriteQueue {
  private tail: Promise<unknown> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const next = this.tail.then(task, task);
    this.tail = next.catch(() => undefined);
    return next;
  }
}
