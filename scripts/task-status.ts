/**
 * Print a task's record from the task history.
 * Run: npx tsx scripts/task-status.ts <taskId>
 *      npx tsx scripts/task-status.ts --all
 */
import dotenv from "dotenv";
import { getConfig } from "../src/lib/config";
import { taskHistoryFile } from "../src/lib/storage/paths";
import { TaskHistory } from "../src/lib/tasks/history";

async function main() {
  dotenv.config({ path: ".env.local" });

  const taskId = process.argv[2];
  if (!taskId) {
    console.error("Usage: task-status.ts <taskId> | --all");
    process.exitCode = 1;
    return;
  }

  const history = new TaskHistory(taskHistoryFile(getConfig().workspace));
  if (taskId === "--all") {
    const all = await history.all();
    for (const [id, record] of Object.entries(all)) {
      console.log(`${id}  ${record.status.padEnd(10)} ${record.kind ?? "-"}  ${record.savedAt}`);
    }
    return;
  }

  const record = await history.get(taskId);
  if (!record) {
    console.error(`Task not found: ${taskId}`);
    process.exitCode = 1;
    return;
  }
  console.log(JSON.stringify(record, null, 2));
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
