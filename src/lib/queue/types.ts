/**
 * types.ts — Render queue job payloads
 *
 * Every job on the "render" queue carries a taskId (the key of its task
 * history record) plus the inputs of one of four job kinds. Payloads are
 * validated with zod when the worker picks them up, since anything with Redis
 * access can enqueue.
 *
 * Style: a job may name a saved preset, give style fields inline, or both;
 * inline fields win over the preset's.
 */

import { z } from "zod";

export const RENDER_QUEUE = "render";

export const jobNames = ["hook", "main", "hook-batch", "cut-library"] as const;
export type RenderJobName = (typeof jobNames)[number];

const styleFields = {
  preset: z.string().min(1).optional(),
  style: z.record(z.unknown()).optional(),
};

export const hookJobSchema = z.object({
  taskId: z.string().min(1),
  hookAudio: z.string().min(1),
  mainAudio: z.string().min(1),
  subtitle: z.string().min(1),
  thumbnail: z.string().min(1),
  /** Defaults to final/<main audio stem>_<unix time>.mp4 */
  outputPath: z.string().min(1).optional(),
  vertical: z.boolean().default(false),
  ...styleFields,
});

export const mainJobSchema = z.object({
  taskId: z.string().min(1),
  audio: z.string().min(1),
  subtitle: z.string().min(1),
  overlays: z.array(z.string().min(1)).max(2).default([]),
  outputPath: z.string().min(1).optional(),
  vertical: z.boolean().default(false),
  ...styleFields,
});

export const hookBatchJobSchema = z.object({
  taskId: z.string().min(1),
  inputDir: z.string().min(1),
  outputDir: z.string().min(1).optional(),
  vertical: z.boolean().default(false),
  ...styleFields,
});

export const cutLibraryJobSchema = z
  .object({
    taskId: z.string().min(1),
    minDuration: z.number().positive().default(4),
    maxDuration: z.number().positive().default(7),
  })
  .refine((data) => data.maxDuration >= data.minDuration, {
    message: "maxDuration must not be less than minDuration",
  });

export type HookJobData = z.input<typeof hookJobSchema>;
export type MainJobData = z.input<typeof mainJobSchema>;
export type HookBatchJobData = z.input<typeof hookBatchJobSchema>;
export type CutLibraryJobData = z.input<typeof cutLibraryJobSchema>;

export interface RenderJobPayloads {
  hook: HookJobData;
  main: MainJobData;
  "hook-batch": HookBatchJobData;
  "cut-library": CutLibraryJobData;
}

export type RenderJobData = RenderJobPayloads[RenderJobName];

export interface RenderJobResult {
  taskId: string;
  outputPaths: string[];
}
