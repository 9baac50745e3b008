/**
 * style.ts — Subtitle style configuration schema
 *
 * PURPOSE:
 *   One validated shape for subtitle styling, whether it comes from a saved
 *   preset, a job payload or an operator script. Older preset files and
 *   clients use snake_case keys, send numbers as strings and name the outline
 *   and shadow fields `outline_width` / `shadow_width`; normalizeStyleInput()
 *   folds all of that into the camelCase shape before validation.
 *
 * RANGES:
 *   fontSize 10–100, outline/shadow 0–10, margins 0–300, alignment 1–9
 *   (numpad layout: 1 bottom-left … 5 middle-centre … 9 top-right),
 *   maxChars 10–100.
 */

import { z } from "zod";
import { isAssColor, normalizeColor, DEFAULT_OUTLINE_COLOR, DEFAULT_PRIMARY_COLOR } from "../subtitles/colors";

const assColor = z.string().refine(isAssColor, { message: "expected &HBBGGRR& color" });

export const subtitleStyleSchema = z.object({
  fontName: z.string().min(1).default("Arial"),
  fontSize: z.number().int().min(10).max(100).default(48),
  primaryColor: assColor.default(DEFAULT_PRIMARY_COLOR),
  outlineColor: assColor.default(DEFAULT_OUTLINE_COLOR),
  backColor: assColor.default(DEFAULT_OUTLINE_COLOR),
  outline: z.number().min(0).max(10).default(2),
  shadow: z.number().min(0).max(10).default(0),
  marginV: z.number().int().min(0).max(300).default(20),
  marginH: z.number().int().min(0).max(300).default(20),
  alignment: z.number().int().min(1).max(9).default(2),
  maxChars: z.number().int().min(10).max(100).default(40),
});

export type SubtitleStyleConfig = z.infer<typeof subtitleStyleSchema>;

const KEY_ALIASES: Record<string, keyof SubtitleStyleConfig> = {
  font_name: "fontName",
  fontname: "fontName",
  font_size: "fontSize",
  fontsize: "fontSize",
  primary_color: "primaryColor",
  primarycolor: "primaryColor",
  outline_color: "outlineColor",
  outlinecolor: "outlineColor",
  back_color: "backColor",
  backcolor: "backColor",
  outline_width: "outline",
  shadow_width: "shadow",
  margin_v: "marginV",
  marginv: "marginV",
  margin_h: "marginH",
  max_chars: "maxChars",
};

const NUMERIC_KEYS = new Set<string>([
  "fontSize",
  "outline",
  "shadow",
  "marginV",
  "marginH",
  "alignment",
  "maxChars",
]);

const COLOR_KEYS = new Set<string>(["primaryColor", "outlineColor", "backColor"]);

/**
 * Rename legacy keys, coerce numeric strings and normalise colors.
 * Unknown keys are dropped; values that still don't fit fail validation.
 */
export function normalizeStyleInput(input: unknown): Record<string, unknown> {
  if (typeof input !== "object" || input === null || Array.isArray(input)) return {};
  const known = new Set(Object.keys(subtitleStyleSchema.shape));
  const out: Record<string, unknown> = {};

  for (const [rawKey, value] of Object.entries(input)) {
    const key = KEY_ALIASES[rawKey] ?? rawKey;
    if (!known.has(key) || value === null || value === undefined) continue;

    if (NUMERIC_KEYS.has(key) && typeof value === "string" && value.trim() !== "") {
      const parsed = Number(value);
      out[key] = Number.isFinite(parsed) ? parsed : value;
    } else if (COLOR_KEYS.has(key) && typeof value === "string") {
      out[key] = normalizeColor(value, value);
    } else {
      out[key] = value;
    }
  }
  return out;
}

export function parseStyleConfig(input: unknown): SubtitleStyleConfig {
  return subtitleStyleSchema.parse(normalizeStyleInput(input));
}

export const partialStyleSchema = subtitleStyleSchema.partial();

export function parsePartialStyle(input: unknown): Partial<SubtitleStyleConfig> {
  const parsed = partialStyleSchema.parse(normalizeStyleInput(input));
  const out: Partial<SubtitleStyleConfig> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (value !== undefined) Object.assign(out, { [key]: value });
  }
  return out;
}
