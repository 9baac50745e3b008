/**
 * render-worker.ts — Render queue worker process
 *
 * PURPOSE:
 *   Long-running process that consumes the "render" queue. It runs separately
 *   from whatever enqueues jobs (operator scripts, an upload service) because
 *   a single render holds ffmpeg busy for minutes and needs the workspace
 *   directories on local disk.
 *
 * STARTUP:
 *   1. Load .env.local (if present) and validate configuration.
 *   2. Create the workspace layout, drop stale duration cache entries.
 *   3. Start the BullMQ worker and a /health endpoint.
 *
 * HOW TO RUN:
 *   Development:  npm run worker
 *   Production:   node --import tsx src/workers/render-worker.ts, with ffmpeg on PATH
 */

import dotenv from "dotenv";
import { createServer } from "http";
import { Worker } from "bullmq";
import { getConfig } from "../lib/config";
import { getRedisConnection } from "../lib/queue/connection";
import { RENDER_QUEUE, type RenderJobData, type RenderJobResult } from "../lib/queue/types";
import { PresetStore } from "../lib/settings/presets";
import { ensureWorkspace } from "../lib/storage/clips";
import { presetsFile, taskHistoryFile, videoCacheFile } from "../lib/storage/paths";
import { VideoCache } from "../lib/storage/video-cache";
import { TaskHistory } from "../lib/tasks/history";
import { describeError } from "../lib/utils/errors";
import { log } from "../lib/utils/logger";
import { EncoderCapabilityCache } from "../lib/video/encoder";
import { processRenderJob, type WorkerContext } from "./handlers";

// Log fatal errors before the process dies
process.on("uncaughtException", (err) => {
  log("error", "worker", undefined, `Uncaught exception: ${err.message}`, { stack: err.stack });
  process.exit(1);
});
process.on("unhandledRejection", (reason) => {
  log("error", "worker", undefined, `Unhandled rejection: ${describeError(reason)}`);
});

// Render timeout: a main video of several minutes with CPU fallback can take a while
const RENDER_LOCK_MS = 60 * 60 * 1000;

async function main(): Promise<void> {
  dotenv.config({ path: ".env.local" });
  const config = getConfig();

  await ensureWorkspace(config.workspace);
  const durationCache = await VideoCache.open(videoCacheFile(config.workspace));
  await durationCache.cleanMissing();

  const ctx: WorkerContext = {
    config,
    history: new TaskHistory(taskHistoryFile(config.workspace)),
    presets: new PresetStore(presetsFile(config.workspace)),
    capabilities: new EncoderCapabilityCache(config.gpuProbeCacheCalls),
    durationCache,
  };

  const connection = getRedisConnection();
  log("info", "worker", undefined, "Starting render worker", {
    redis: `${connection.host}:${connection.port}`,
    workspace: config.workspace.root,
    concurrency: config.concurrency,
  });

  const worker = new Worker<RenderJobData, RenderJobResult>(
    RENDER_QUEUE,
    (job) => processRenderJob(job, ctx),
    {
      connection,
      concurrency: config.concurrency,
      lockDuration: RENDER_LOCK_MS,
    }
  );

  worker.on("completed", (job) => {
    log("info", "worker", job.id, "Job completed", { outputs: job.returnvalue.outputPaths });
  });
  worker.on("failed", (job, err) => {
    log("error", "worker", job?.id, `Job failed: ${err.message}`);
  });
  worker.on("error", (err) => {
    log("error", "worker", undefined, `Worker error: ${err.message}`);
  });

  // Health check server; keeps container platforms from treating the worker as dead
  const server = createServer((req, res) => {
    if (req.url !== "/health") {
      res.writeHead(404).end();
      return;
    }
    res.writeHead(200, { "Content-Type": "application/json" });
    res.end(JSON.stringify({ status: "ok", queue: RENDER_QUEUE, concurrency: config.concurrency }));
  });
  server.listen(config.port, () => {
    log("info", "worker", undefined, `Health check listening on port ${config.port}`);
  });

  const shutdown = async (signal: string) => {
    log("info", "worker", undefined, `${signal} received, shutting down`);
    server.close();
    await worker.close();
    process.exit(0);
  };
  for (const signal of ["SIGTERM", "SIGINT"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        log("error", "worker", undefined, `Shutdown failed: ${describeError(error)}`);
        process.exit(1);
      });
    });
  }
}

main().catch((error: unknown) => {
  log("error", "worker", undefined, `Worker failed to start: ${describeError(error)}`);
  process.exit(1);
});
