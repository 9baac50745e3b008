/**
 * Flush the render queue to clear stuck/failed jobs.
 * Run: npx tsx scripts/flush-queues.ts
 */
import dotenv from "dotenv";
import { closeRenderQueue, getRenderQueue } from "../src/lib/queue/queues";

async function main() {
  dotenv.config({ path: ".env.local" });

  console.log("Obliterating render queue...");
  await getRenderQueue().obliterate({ force: true });
  await closeRenderQueue();

  console.log("Done! Queue cleared. Task history is left as it was.");
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
