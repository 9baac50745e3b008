/**
 * jobs.ts — Job enqueue helpers
 *
 * The BullMQ job id is the task id, so enqueueing the same task twice is a
 * no-op. A "queued" record is written to the task history before the job is
 * added, so the task can be looked up even before a worker picks it up.
 */

import type { TaskHistory } from "../tasks/history";
import { getRenderQueue } from "./queues";
import type { RenderJobName, RenderJobPayloads } from "./types";

export async function enqueueRenderJob<N extends RenderJobName>(
  name: N,
  data: RenderJobPayloads[N],
  history?: TaskHistory
): Promise<string> {
  await history?.save(data.taskId, {
    status: "queued",
    kind: name,
    progress: 0,
    createdAt: new Date().toISOString(),
  });
  await getRenderQueue().add(name, data, { jobId: data.taskId });
  return data.taskId;
}
