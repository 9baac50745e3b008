/**
 * Submit a hook video job to the render queue.
 *
 * Run:
 *   npx tsx scripts/enqueue-hook.ts --hook-audio in/hook.mp3 --main-audio in/main.mp3 \
 *     --subtitle in/main.srt --thumbnail in/thumb.png [--preset bold] [--vertical] [--output out.mp4]
 *
 * Prints the task id; follow it with scripts/task-status.ts.
 */
import dotenv from "dotenv";
import { resolve } from "path";
import { parseArgs } from "util";
import { getConfig } from "../src/lib/config";
import { enqueueRenderJob } from "../src/lib/queue/jobs";
import { closeRenderQueue } from "../src/lib/queue/queues";
import { taskHistoryFile } from "../src/lib/storage/paths";
import { TaskHistory } from "../src/lib/tasks/history";
import { generateTaskId } from "../src/lib/utils/ids";

function required(values: Record<string, string | boolean | undefined>, key: string): string {
  const value = values[key];
  if (typeof value !== "string" || !value) {
    throw new Error(`--${key} is required`);
  }
  return resolve(value);
}

async function main() {
  dotenv.config({ path: ".env.local" });

  const { values } = parseArgs({
    options: {
      "hook-audio": { type: "string" },
      "main-audio": { type: "string" },
      subtitle: { type: "string" },
      thumbnail: { type: "string" },
      preset: { type: "string" },
      output: { type: "string" },
      vertical: { type: "boolean", default: false },
    },
  });

  const history = new TaskHistory(taskHistoryFile(getConfig().workspace));
  const taskId = await enqueueRenderJob(
    "hook",
    {
      taskId: generateTaskId(),
      hookAudio: required(values, "hook-audio"),
      mainAudio: required(values, "main-audio"),
      subtitle: required(values, "subtitle"),
      thumbnail: required(values, "thumbnail"),
      preset: values.preset,
      outputPath: values.output ? resolve(values.output) : undefined,
      vertical: values.vertical,
    },
    history
  );
  await closeRenderQueue();

  console.log(`Queued hook job ${taskId}`);
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
