/**
 * history.ts — Persistent task status history
 *
 * PURPOSE:
 *   The worker records every render task's lifecycle (queued → processing →
 *   completed | failed) in config/task_history.json so operators can look a
 *   task up after the fact (scripts/task-status.ts) without Redis, whose job
 *   records BullMQ trims.
 *
 * RETENTION:
 *   Every save stamps `savedAt` and drops records older than 30 days. Records
 *   whose stamp doesn't parse are kept.
 *
 * DURABILITY:
 *   Writes are atomic (temp file + rename). A file that no longer parses is
 *   moved aside to `task_history.json.bak` and history starts over empty.
 */

import { rename } from "fs/promises";
import { z } from "zod";
import { readJsonFile, writeJsonAtomic, WriteQueue } from "../storage/json-file";
import { describeError } from "../utils/errors";
import { log } from "../utils/logger";

export const HISTORY_RETENTION_DAYS = 30;
const DAY_MS = 24 * 60 * 60 * 1000;

export const taskStatusSchema = z.enum(["queued", "processing", "completed", "failed"]);
export type TaskStatus = z.infer<typeof taskStatusSchema>;

export const batchItemResultSchema = z.object({
  name: z.string(),
  status: z.enum(["completed", "failed", "skipped"]),
  outputPath: z.string().optional(),
  error: z.string().optional(),
});

export type BatchItemResult = z.infer<typeof batchItemResultSchema>;

export const taskRecordSchema = z.object({
  status: taskStatusSchema,
  kind: z.string().optional(),
  progress: z.number().min(0).max(100).optional(),
  outputPath: z.string().optional(),
  error: z.string().optional(),
  message: z.string().optional(),
  items: z.array(batchItemResultSchema).optional(),
  createdAt: z.string().optional(),
  savedAt: z.string(),
});

export type TaskRecord = z.infer<typeof taskRecordSchema>;
export type TaskUpdate = Omit<TaskRecord, "savedAt">;

const historyFileSchema = z.record(taskRecordSchema);
type HistoryMap = z.infer<typeof historyFileSchema>;

export class TaskHistory {
  private readonly writes = new WriteQueue();

  constructor(
    private readonly file: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  private async readAll(): Promise<HistoryMap> {
    let data: unknown;
    try {
      data = await readJsonFile(this.file);
    } catch (error) {
      if (!(error instanceof SyntaxError)) throw error;
      await this.quarantine(error);
      return {};
    }
    if (data === undefined) return {};

    const parsed = historyFileSchema.safeParse(data);
    if (!parsed.success) {
      await this.quarantine(parsed.error);
      return {};
    }
    return parsed.data;
  }

  private async quarantine(reason: unknown): Promise<void> {
    const backup = `${this.file}.bak`;
    await rename(this.file, backup);
    log("warn", "task-history", undefined, `Corrupted history moved to ${backup}`, {
      reason: describeError(reason),
    });
  }

  private evictExpired(history: HistoryMap): HistoryMap {
    const cutoff = this.now().getTime() - HISTORY_RETENTION_DAYS * DAY_MS;
    const kept: HistoryMap = {};
    for (const [taskId, record] of Object.entries(history)) {
      const savedAt = Date.parse(record.savedAt);
      if (Number.isNaN(savedAt) || savedAt >= cutoff) kept[taskId] = record;
    }
    return kept;
  }

  async save(taskId: string, update: TaskUpdate): Promise<TaskRecord> {
    return this.write(taskId, () => update);
  }

  /** Merges `changes` into the existing record, or starts one. */
  async update(
    taskId: string,
    changes: Partial<TaskUpdate> & Pick<TaskUpdate, "status">
  ): Promise<TaskRecord> {
    return this.write(taskId, (existing) => {
      if (!existing) return changes;
      const { savedAt: _savedAt, ...previous } = existing;
      return { ...previous, ...changes };
    });
  }

  private async write(
    taskId: string,
    build: (existing: TaskRecord | undefined) => TaskUpdate
  ): Promise<TaskRecord> {
    return this.writes.run(async () => {
      const history = this.evictExpired(await this.readAll());
      const record: TaskRecord = { ...build(history[taskId]), savedAt: this.now().toISOString() };
      history[taskId] = record;
      await writeJsonAtomic(this.file, history);
      return record;
    });
  }

  async get(taskId: string): Promise<TaskRecord | null> {
    const history = await this.readAll();
    return history[taskId] ?? null;
  }

  async all(): Promise<Record<string, TaskRecord>> {
    return this.readAll();
  }
}
