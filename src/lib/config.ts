/**
 * config.ts — Worker configuration from environment variables
 *
 * Read lazily (first call to getConfig) so that scripts can load .env.local
 * with dotenv before anything asks for a value. Invalid values fail fast with
 * the zod message naming the variable.
 */

import { resolve } from "path";
import { z } from "zod";
import { workspaceLayout, type WorkspaceLayout } from "./storage/paths";
import { defaultFontDirs } from "./subtitles/fonts";

const envSchema = z.object({
  WORKSPACE_DIR: z.string().min(1).default("./workspace"),
  REDIS_URL: z.string().url().default("redis://localhost:6379"),
  RENDER_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(1),
  RENDER_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(5000),
  GPU_PROBE_CACHE_CALLS: z.coerce.number().int().min(0).default(0),
  FONTS_DIRS: z.string().optional(),
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
});

export interface AppConfig {
  workspace: WorkspaceLayout;
  redisUrl: string;
  concurrency: number;
  retryDelayMs: number;
  gpuProbeCacheCalls: number;
  fontDirs: string[];
  port: number;
}

let cached: AppConfig | null = null;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  const fontDirs = parsed.FONTS_DIRS
    ? parsed.FONTS_DIRS.split(/[;,]/).map((dir) => dir.trim()).filter(Boolean)
    : defaultFontDirs();

  return {
    workspace: workspaceLayout(resolve(parsed.WORKSPACE_DIR)),
    redisUrl: parsed.REDIS_URL,
    concurrency: parsed.RENDER_CONCURRENCY,
    retryDelayMs: parsed.RENDER_RETRY_DELAY_MS,
    gpuProbeCacheCalls: parsed.GPU_PROBE_CACHE_CALLS,
    fontDirs,
    port: parsed.PORT,
  };
}

export function getConfig(): AppConfig {
  if (!cached) cached = loadConfig();
  return cached;
}
