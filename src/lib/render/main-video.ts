/**
 * main-video.ts — Main video render job (single narration track)
 *
 * Backgrounds come from the clip library (cut/) rather than an orientation
 * pool, and are joined by re-encode because library clips are cut from
 * different raw sources. Up to two overlay images are centred over the
 * background under the subtitles. Overlays that don't exist are skipped with
 * a warning; a missing audio or subtitle file fails the job.
 */

import { existsSync } from "fs";
import type { SubtitleStyleConfig } from "../settings/style";
import { tempFilePath } from "../storage/paths";
import { burnSubtitles } from "../video/burn";
import { probeDuration } from "../video/ffprobe";
import { normalizeAudio } from "../video/normalize";
import { selectSegments } from "../video/select";
import { log } from "../utils/logger";
import { joinBackground, requireInputs, runRenderJob, type RenderDeps } from "./pipeline";

export const MAX_OVERLAYS = 2;

export interface MainRenderJob {
  jobId: string;
  audio: string;
  subtitle: string;
  overlays: string[];
  style: Partial<SubtitleStyleConfig>;
  outputPath: string;
  vertical?: boolean;
}

export function usableOverlays(jobId: string, overlays: readonly string[]): string[] {
  const present = overlays.filter((overlay) => {
    if (existsSync(overlay)) return true;
    log("warn", "render", jobId, `Overlay not found, skipping: ${overlay}`);
    return false;
  });
  if (present.length > MAX_OVERLAYS) {
    log("warn", "render", jobId, `Only the first ${MAX_OVERLAYS} overlays are used`, { given: present.length });
  }
  return present.slice(0, MAX_OVERLAYS);
}

export async function renderMainVideo(job: MainRenderJob, deps: RenderDeps): Promise<string> {
  const { jobId } = job;
  const vertical = job.vertical ?? false;
  const tempDir = deps.workspace.tempDir;
  const name = (stem: string, ext: string) => tempFilePath(tempDir, jobId, stem, ext);

  const overlays = usableOverlays(jobId, job.overlays);

  return runRenderJob(jobId, job.outputPath, deps, async (ctx) => {
    requireInputs({ Audio: job.audio, Subtitle: job.subtitle });
    const encode = { gpu: ctx.gpu, vertical, jobId, onFallback: ctx.onFallback };

    ctx.enter("NORMALIZING_AUDIO");
    const wav = await normalizeAudio(job.audio, ctx.temp.track(name("audio", "wav")));

    ctx.enter("PROBING_DURATIONS");
    const duration = await probeDuration(wav);

    ctx.enter("SELECTING_BACKGROUNDS");
    const segments = await selectSegments(duration, deps.workspace.cutDir, tempDir, {
      ...encode,
      label: "main",
      random: deps.random,
      cache: deps.durationCache,
      onTempFile: (path: string) => {
        ctx.temp.track(path);
      },
    });

    ctx.enter("CONCATENATING");
    const background = await joinBackground(segments, name("background", "mp4"), ctx, {
      workDir: tempDir,
      vertical,
    });

    ctx.enter("BURNING_SUBTITLES");
    return burnSubtitles(background, wav, job.subtitle, job.style, ctx.temp.track(name("final", "mp4")), {
      ...encode,
      overlays,
      styler: deps.styler,
      fontDirs: deps.fontDirs,
      assPath: ctx.temp.track(name("subtitles", "ass")),
    });
  });
}
