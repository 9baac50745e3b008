/**
 * handlers.ts — Render queue job handlers
 *
 * PURPOSE:
 *   Turns a job off the "render" queue into a render call, and keeps the task
 *   history in step with it:
 *
 *     queued (enqueue) → processing → completed | failed
 *
 *   Handlers take a job-shaped object rather than a BullMQ Job so they can
 *   run without Redis (tests, one-off scripts). Payloads are validated here;
 *   an invalid payload fails the task without touching any media.
 *
 * PROGRESS:
 *   Pipeline state changes map onto a 0–100 progress value reported through
 *   job.updateProgress() and the task history. Progress writes are chained so
 *   they land in order, and awaited before the handler returns.
 */

import { basename } from "path";
import type { AppConfig } from "../lib/config";
import {
  cutLibraryJobSchema,
  hookBatchJobSchema,
  hookJobSchema,
  jobNames,
  mainJobSchema,
  type RenderJobName,
  type RenderJobResult,
} from "../lib/queue/types";
import { renderHookBatch } from "../lib/render/batch";
import { renderHookVideo } from "../lib/render/hook-video";
import { renderMainVideo } from "../lib/render/main-video";
import type { PipelineState, RenderDeps } from "../lib/render/pipeline";
import type { PresetStore } from "../lib/settings/presets";
import { parsePartialStyle, type SubtitleStyleConfig } from "../lib/settings/style";
import { finalOutputPath } from "../lib/storage/paths";
import type { DurationLookup } from "../lib/storage/video-cache";
import type { TaskHistory } from "../lib/tasks/history";
import { describeError, InvalidInputError } from "../lib/utils/errors";
import { log } from "../lib/utils/logger";
import type { EncoderCapabilityCache } from "../lib/video/encoder";
import { processRawVideos } from "../lib/video/library";

export interface JobLike {
  id?: string;
  name: string;
  data: unknown;
  updateProgress(progress: number): Promise<void>;
}

export interface WorkerContext {
  config: Pick<AppConfig, "workspace" | "fontDirs" | "retryDelayMs">;
  history: TaskHistory;
  presets: PresetStore;
  capabilities: EncoderCapabilityCache;
  durationCache?: DurationLookup;
  /** Overrides for tests. */
  renderDeps?: Partial<RenderDeps>;
  now?: () => number;
}

export const STATE_PROGRESS: Record<PipelineState, number> = {
  NORMALIZING_AUDIO: 5,
  PROBING_DURATIONS: 15,
  SELECTING_BACKGROUNDS: 25,
  COMPOSITING_HOOK: 45,
  BURNING_SUBTITLES: 65,
  CONCATENATING: 85,
  DONE: 100,
  FAILED: 100,
};

function isJobName(name: string): name is RenderJobName {
  return jobNames.some((known) => known === name);
}

/** Preset fields, overridden by inline fields. */
export async function resolveJobStyle(
  presets: PresetStore,
  preset: string | undefined,
  inline: Record<string, unknown> | undefined
): Promise<Partial<SubtitleStyleConfig>> {
  let base: Partial<SubtitleStyleConfig> = {};
  if (preset) {
    const loaded = await presets.load(preset);
    if (!loaded) throw new InvalidInputError(`Preset not found: ${preset}`);
    base = loaded;
  }
  return { ...base, ...parsePartialStyle(inline ?? {}) };
}

class ProgressReporter {
  private chain: Promise<void> = Promise.resolve();

  constructor(
    private readonly job: JobLike,
    private readonly history: TaskHistory,
    private readonly taskId: string
  ) {}

  report(progress: number): void {
    this.chain = this.chain.then(async () => {
      try {
        await this.job.updateProgress(progress);
        await this.history.update(this.taskId, { status: "processing", progress });
      } catch (error) {
        log("warn", "worker", this.taskId, `Progress update failed: ${describeError(error)}`);
      }
    });
  }

  flush(): Promise<void> {
    return this.chain;
  }
}

function renderDeps(ctx: WorkerContext, reporter: ProgressReporter): RenderDeps {
  return {
    workspace: ctx.config.workspace,
    capabilities: ctx.capabilities,
    durationCache: ctx.durationCache,
    fontDirs: ctx.config.fontDirs,
    retryDelayMs: ctx.config.retryDelayMs,
    onState: ({ state }) => {
      if (state !== "FAILED") reporter.report(STATE_PROGRESS[state]);
    },
    ...ctx.renderDeps,
  };
}

async function runJob(
  name: RenderJobName,
  data: unknown,
  job: JobLike,
  ctx: WorkerContext,
  taskId: string
): Promise<string[]> {
  const reporter = new ProgressReporter(job, ctx.history, taskId);
  const deps = renderDeps(ctx, reporter);
  const now = ctx.now ?? Date.now;
  const finalDir = ctx.config.workspace.finalDir;

  try {
    switch (name) {
      case "hook": {
        const payload = hookJobSchema.parse(data);
        const output = await renderHookVideo(
          {
            jobId: taskId,
            hookAudio: payload.hookAudio,
            mainAudio: payload.mainAudio,
            subtitle: payload.subtitle,
            thumbnail: payload.thumbnail,
            style: await resolveJobStyle(ctx.presets, payload.preset, payload.style),
            outputPath: payload.outputPath ?? finalOutputPath(finalDir, basename(payload.mainAudio), now()),
            vertical: payload.vertical,
          },
          deps
        );
        return [output];
      }
      case "main": {
        const payload = mainJobSchema.parse(data);
        const output = await renderMainVideo(
          {
            jobId: taskId,
            audio: payload.audio,
            subtitle: payload.subtitle,
            overlays: payload.overlays,
            style: await resolveJobStyle(ctx.presets, payload.preset, payload.style),
            outputPath: payload.outputPath ?? finalOutputPath(finalDir, basename(payload.audio), now()),
            vertical: payload.vertical,
          },
          deps
        );
        return [output];
      }
      case "hook-batch": {
        const payload = hookBatchJobSchema.parse(data);
        const items = await renderHookBatch(
          {
            jobId: taskId,
            inputDir: payload.inputDir,
            outputDir: payload.outputDir,
            vertical: payload.vertical,
            style: await resolveJobStyle(ctx.presets, payload.preset, payload.style),
            now,
            onProgress: async (progress, results) => {
              await job.updateProgress(progress);
              await ctx.history.update(taskId, { status: "processing", progress, items: [...results] });
            },
          },
          { ...deps, onState: undefined }
        );
        await ctx.history.update(taskId, { status: "processing", items });
        return items.flatMap((item) => (item.outputPath ? [item.outputPath] : []));
      }
      case "cut-library": {
        const payload = cutLibraryJobSchema.parse(data);
        const result = await processRawVideos(ctx.config.workspace, {
          jobId: taskId,
          gpu: await ctx.capabilities.hasGpuEncoder(),
          vertical: false,
          minDuration: payload.minDuration,
          maxDuration: payload.maxDuration,
          random: deps.random,
        });
        return result.clips;
      }
    }
  } finally {
    await reporter.flush();
  }
}

function taskIdOf(job: JobLike): string {
  const { data } = job;
  if (typeof data === "object" && data !== null && "taskId" in data && typeof data.taskId === "string") {
    return data.taskId;
  }
  return job.id ?? "unknown";
}

/**
 * Process one render queue job. Resolves with the produced files; rejects
 * (after recording the failure) with the render error.
 */
export async function processRenderJob(job: JobLike, ctx: WorkerContext): Promise<RenderJobResult> {
  const taskId = taskIdOf(job);

  try {
    if (!isJobName(job.name)) {
      throw new InvalidInputError(`Unknown job type: ${job.name}`);
    }
    await ctx.history.update(taskId, { status: "processing", kind: job.name, progress: 0 });
    log("info", "worker", taskId, `Processing ${job.name} job`);

    const outputPaths = await runJob(job.name, job.data, job, ctx, taskId);

    await ctx.history.update(taskId, {
      status: "completed",
      progress: 100,
      outputPath: outputPaths[0],
      message: `Produced ${outputPaths.length} file(s)`,
    });
    return { taskId, outputPaths };
  } catch (error) {
    const message = describeError(error);
    log("error", "worker", taskId, `Job failed: ${message}`);
    await ctx.history.update(taskId, { status: "failed", error: message });
    throw error;
  }
}
