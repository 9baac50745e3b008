/**
 * ass.ts — Advanced SubStation Alpha document writer
 *
 * Writes the minimal document libass needs: script info, one "Default"
 * style and a Dialogue line per cue. No PlayResX/PlayResY is written, so
 * libass uses its 384x288 default script resolution and font sizes and
 * margins scale with the video frame.
 */

import type { SubtitleCue } from "./srt";
import { toStyleColor } from "./colors";
import type { SubtitleStyleConfig } from "../settings/style";

const STYLE_FORMAT =
  "Name, Fontname, Fontsize, PrimaryColour, SecondaryColour, OutlineColour, BackColour, " +
  "Bold, Italic, Underline, StrikeOut, ScaleX, ScaleY, Spacing, Angle, BorderStyle, " +
  "Outline, Shadow, Alignment, MarginL, MarginR, MarginV, Encoding";

const EVENT_FORMAT = "Layer, Start, End, Style, Name, MarginL, MarginR, MarginV, Effect, Text";

/** `H:MM:SS.cc`; ASS timestamps have centisecond precision. */
export function formatAssTime(ms: number): string {
  const total = Math.max(0, Math.round(ms / 10));
  const cs = total % 100;
  const seconds = Math.floor(total / 100) % 60;
  const minutes = Math.floor(total / 6000) % 60;
  const hours = Math.floor(total / 360_000);
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${hours}:${pad(minutes)}:${pad(seconds)}.${pad(cs)}`;
}

export function styleLine(style: SubtitleStyleConfig): string {
  const fields = [
    "Default",
    style.fontName,
    String(style.fontSize),
    toStyleColor(style.primaryColor),
    toStyleColor(style.primaryColor),
    toStyleColor(style.outlineColor),
    toStyleColor(style.backColor),
    "0", "0", "0", "0",
    "100", "100", "0", "0",
    "1",
    String(style.outline),
    String(style.shadow),
    String(style.alignment),
    String(style.marginH),
    String(style.marginH),
    String(style.marginV),
    "1",
  ];
  return `Style: ${fields.join(",")}`;
}

export function dialogueLine(cue: SubtitleCue): string {
  const text = cue.text.replace(/\n/g, "\\N");
  return `Dialogue: 0,${formatAssTime(cue.start)},${formatAssTime(cue.end)},Default,,0,0,0,,${text}`;
}

export function buildAssDocument(cues: readonly SubtitleCue[], style: SubtitleStyleConfig): string {
  return [
    "[Script Info]",
    "ScriptType: v4.00+",
    "WrapStyle: 0",
    "ScaledBorderAndShadow: yes",
    "",
    "[V4+ Styles]",
    `Format: ${STYLE_FORMAT}`,
    styleLine(style),
    "",
    "[Events]",
    `Format: ${EVENT_FORMAT}`,
    ...cues.map(dialogueLine),
    "",
  ].join("\n");
}
