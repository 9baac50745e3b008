/**
 * Queue a clip library run: cut everything in raw/ into cut/.
 * Run: npx tsx scripts/cut-library.ts [minSeconds] [maxSeconds]
 */
import dotenv from "dotenv";
import { getConfig } from "../src/lib/config";
import { enqueueRenderJob } from "../src/lib/queue/jobs";
import { closeRenderQueue } from "../src/lib/queue/queues";
import { taskHistoryFile } from "../src/lib/storage/paths";
import { TaskHistory } from "../src/lib/tasks/history";
import { generateTaskId } from "../src/lib/utils/ids";

async function main() {
  dotenv.config({ path: ".env.local" });
  const [min, max] = process.argv.slice(2).map(Number);

  const history = new TaskHistory(taskHistoryFile(getConfig().workspace));
  const taskId = await enqueueRenderJob(
    "cut-library",
    {
      taskId: generateTaskId(),
      minDuration: Number.isFinite(min) ? min : undefined,
      maxDuration: Number.isFinite(max) ? max : undefined,
    },
    history
  );
  await closeRenderQueue();
  console.log(`Queued clip library job ${taskId}`);
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
