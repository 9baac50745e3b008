/**
 * processor.ts — SRT → styled ASS conversion
 *
 * PURPOSE:
 *   Turns a plain transcript subtitle file into the .ass document the burn
 *   step feeds to ffmpeg's `ass` filter, with the job's style applied:
 *
 *   1. Parse the SRT (srt.ts).
 *   2. Start from the orientation default (vertical: middle-centre, 20px
 *      margins; horizontal: bottom-centre, 10px margins) and lay the job's
 *      style config over it. Colors are normalised, the font is checked
 *      against the installed fonts.
 *   3. Per cue: strip existing override tags, wrap at maxChars, prefix the
 *      alignment override and shift by startOffset.
 *   4. Write the document next to the SRT (or to `outputPath`).
 *
 *   Any failure is logged and reported as null; the burn step turns that
 *   into a SubtitleBurnError.
 */

import { readFile, writeFile } from "fs/promises";
import { format, parse } from "path";
import { buildAssDocument } from "./ass";
import { resolveFontName } from "./fonts";
import { parseSrt, type SubtitleCue } from "./srt";
import {
  normalizeStyleInput,
  subtitleStyleSchema,
  type SubtitleStyleConfig,
} from "../settings/style";
import { describeError } from "../utils/errors";
import { log } from "../utils/logger";

export interface StyleSubtitlesOptions {
  /** Seconds added to every cue. */
  startOffset?: number;
  fontDirs?: readonly string[];
  outputPath?: string;
  jobId?: string;
}

export function orientationDefaults(vertical: boolean): Partial<SubtitleStyleConfig> {
  return vertical
    ? { alignment: 5, marginV: 20, marginH: 20 }
    : { alignment: 2, marginV: 10, marginH: 10 };
}

/** Greedy word wrap; words longer than the limit get a line of their own. */
export function wrapText(text: string, maxChars: number): string[] {
  const lines: string[] = [];
  for (const paragraph of text.split("\n")) {
    let current = "";
    for (const word of paragraph.split(/\s+/).filter(Boolean)) {
      if (!current) {
        current = word;
      } else if (current.length + 1 + word.length <= maxChars) {
        current += ` ${word}`;
      } else {
        lines.push(current);
        current = word;
      }
    }
    if (current) lines.push(current);
  }
  return lines;
}

export function stripOverrideTags(text: string): string {
  return text.replace(/\{[^}]*\}/g, "").trim();
}

export function styleCue(cue: SubtitleCue, style: SubtitleStyleConfig, startOffset: number): SubtitleCue {
  const shift = startOffset > 0 ? Math.round(startOffset * 1000) : 0;
  const body = wrapText(stripOverrideTags(cue.text), style.maxChars).join("\n");
  return {
    start: cue.start + shift,
    end: cue.end + shift,
    text: `{\\an${style.alignment}}${body}`,
  };
}

export function resolveStyle(
  config: Partial<SubtitleStyleConfig> | Record<string, unknown>,
  vertical: boolean
): SubtitleStyleConfig {
  return subtitleStyleSchema.parse({
    ...orientationDefaults(vertical),
    ...normalizeStyleInput(config),
  });
}

/**
 * @returns Path of the written .ass file, or null when the subtitle could not be styled.
 */
export async function styleSubtitles(
  srtPath: string,
  config: Partial<SubtitleStyleConfig> | Record<string, unknown>,
  vertical: boolean,
  options: StyleSubtitlesOptions = {}
): Promise<string | null> {
  try {
    const cues = parseSrt(await readFile(srtPath, "utf-8"));
    if (cues.length === 0) {
      log("error", "subtitles", options.jobId, `No subtitle cues in ${srtPath}`);
      return null;
    }

    const resolved = resolveStyle(config, vertical);
    const style = { ...resolved, fontName: await resolveFontName(resolved.fontName, options.fontDirs) };
    const styled = cues.map((cue) => styleCue(cue, style, options.startOffset ?? 0));

    const { dir, name } = parse(srtPath);
    const outputPath = options.outputPath ?? format({ dir, name, ext: ".ass" });
    await writeFile(outputPath, buildAssDocument(styled, style), "utf-8");

    log("info", "subtitles", options.jobId, `Styled ${styled.length} cues`, {
      output: outputPath,
      font: style.fontName,
      alignment: style.alignment,
    });
    return outputPath;
  } catch (error) {
    log("error", "subtitles", options.jobId, `Could not style ${srtPath}: ${describeError(error)}`);
    return null;
  }
}
