/**
 * queues.ts — The render queue
 *
 * One BullMQ queue, "render", carries all four job kinds; the job name picks
 * the handler. Queue-level retries are off (attempts: 1) because render
 * pipelines already retry internally and a blind re-run would redo every
 * stage from scratch.
 *
 * JOB OPTIONS:
 *   - Completed jobs kept for 24 hours
 *   - Failed jobs kept for 7 days
 */

import { Queue } from "bullmq";
import { getRedisConnection } from "./connection";
import { RENDER_QUEUE, type RenderJobData, type RenderJobResult } from "./types";

let _queue: Queue<RenderJobData, RenderJobResult> | null = null;

export function getRenderQueue(): Queue<RenderJobData, RenderJobResult> {
  if (!_queue) {
    _queue = new Queue<RenderJobData, RenderJobResult>(RENDER_QUEUE, {
      connection: getRedisConnection(),
      defaultJobOptions: {
        attempts: 1,
        removeOnComplete: { age: 86400 }, // keep completed jobs for 24h
        removeOnFail: { age: 604800 }, // keep failed jobs for 7 days
      },
    });
  }
  return _queue;
}

export async function closeRenderQueue(): Promise<void> {
  if (_queue) {
    await _queue.close();
    _queue = null;
  }
}
