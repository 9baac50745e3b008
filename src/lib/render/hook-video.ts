/**
 * hook-video.ts — Hook video render job
 *
 * PURPOSE:
 *   Produces a finished short from two narration tracks:
 *
 *     ┌──────── hook part ────────┐┌──────────── main part ────────────┐
 *     thumbnail over background,   background with burned-in subtitles,
 *     fade in/out, hook audio      main audio
 *
 * HOW IT WORKS (one attempt):
 *   1. NORMALIZING_AUDIO      both tracks → 24-bit 48kHz stereo wav
 *   2. PROBING_DURATIONS      exact length of each track
 *   3. SELECTING_BACKGROUNDS  two independent selections from the
 *                             orientation's pool, each joined by stream copy
 *   4. COMPOSITING_HOOK       thumbnail + fades + hook audio
 *   5. BURNING_SUBTITLES      styled subtitles + main audio
 *   6. CONCATENATING          [hook part, main part], re-encoded in one pass
 *
 *   Retry, cleanup and the final move live in pipeline.ts.
 */

import type { SubtitleStyleConfig } from "../settings/style";
import { backgroundPoolDir, tempFilePath } from "../storage/paths";
import { burnSubtitles } from "../video/burn";
import { probeDuration } from "../video/ffprobe";
import { normalizeAudio } from "../video/normalize";
import { selectSegments } from "../video/select";
import { concatenate } from "../video/stitch";
import { compositeThumbnail } from "../video/thumbnail";
import { log } from "../utils/logger";
import { joinBackground, requireInputs, runRenderJob, type RenderDeps } from "./pipeline";

export interface HookRenderJob {
  jobId: string;
  hookAudio: string;
  mainAudio: string;
  subtitle: string;
  thumbnail: string;
  style: Partial<SubtitleStyleConfig>;
  outputPath: string;
  vertical: boolean;
}

export async function renderHookVideo(job: HookRenderJob, deps: RenderDeps): Promise<string> {
  const { jobId, vertical } = job;
  const tempDir = deps.workspace.tempDir;
  const poolDir = backgroundPoolDir(deps.workspace, vertical);
  const name = (stem: string, ext: string) => tempFilePath(tempDir, jobId, stem, ext);

  return runRenderJob(jobId, job.outputPath, deps, async (ctx) => {
    requireInputs({
      "Hook audio": job.hookAudio,
      "Main audio": job.mainAudio,
      Subtitle: job.subtitle,
      Thumbnail: job.thumbnail,
    });
    const encode = { gpu: ctx.gpu, vertical, jobId, onFallback: ctx.onFallback };

    ctx.enter("NORMALIZING_AUDIO");
    const hookWav = await normalizeAudio(job.hookAudio, ctx.temp.track(name("hook_audio", "wav")));
    const mainWav = await normalizeAudio(job.mainAudio, ctx.temp.track(name("main_audio", "wav")));

    ctx.enter("PROBING_DURATIONS");
    const hookDuration = await probeDuration(hookWav);
    const mainDuration = await probeDuration(mainWav);
    log("info", "render", jobId, "Audio durations", { hookSec: hookDuration, mainSec: mainDuration });

    ctx.enter("SELECTING_BACKGROUNDS");
    const selection = {
      ...encode,
      random: deps.random,
      cache: deps.durationCache,
      onTempFile: (path: string) => {
        ctx.temp.track(path);
      },
    };
    const hookSegments = await selectSegments(hookDuration, poolDir, tempDir, { ...selection, label: "hook" });
    const mainSegments = await selectSegments(mainDuration, poolDir, tempDir, { ...selection, label: "main" });
    const joinOptions = { workDir: tempDir, vertical };
    const hookBackground = await joinBackground(hookSegments, name("hook_bg", "mp4"), ctx, joinOptions);
    const mainBackground = await joinBackground(mainSegments, name("main_bg", "mp4"), ctx, joinOptions);

    ctx.enter("COMPOSITING_HOOK");
    const hookPart = await compositeThumbnail(
      hookBackground,
      job.thumbnail,
      hookWav,
      ctx.temp.track(name("hook_part", "mp4")),
      encode
    );

    ctx.enter("BURNING_SUBTITLES");
    const mainPart = await burnSubtitles(
      mainBackground,
      mainWav,
      job.subtitle,
      job.style,
      ctx.temp.track(name("main_part", "mp4")),
      {
        ...encode,
        styler: deps.styler,
        fontDirs: deps.fontDirs,
        assPath: ctx.temp.track(name("subtitles", "ass")),
      }
    );

    ctx.enter("CONCATENATING");
    return concatenate([hookPart, mainPart], ctx.temp.track(name("final", "mp4")), {
      mode: "re_encode",
      workDir: tempDir,
      ...encode,
    });
  });
}
