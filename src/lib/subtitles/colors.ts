/**
 * colors.ts — Subtitle color normalisation
 *
 * ASS colors are written &HBBGGRR&, blue first. Presets and API callers send
 * whatever their color picker produced, so every color goes through
 * normalizeColor() before it reaches a style.
 *
 *   "&H00FFFF&"  → "&H00FFFF&"   (already ASS)
 *   "#FFCC00"    → "&H00CCFF&"   (RGB, swapped)
 *   "FC0"        → "&H00CCFF&"   (short RGB, expanded and swapped)
 *   anything else → the fallback
 */

const ASS_COLOR = /^&H([0-9A-Fa-f]{6})&$/;
const HEX6 = /^[0-9A-Fa-f]{6}$/;
const HEX3 = /^[0-9A-Fa-f]{3}$/;

export const DEFAULT_PRIMARY_COLOR = "&HFFFFFF&";
export const DEFAULT_OUTLINE_COLOR = "&H000000&";

export function isAssColor(value: string): boolean {
  return ASS_COLOR.test(value);
}

export function normalizeColor(input: string | null | undefined, fallback = DEFAULT_PRIMARY_COLOR): string {
  if (!input) return fallback;
  const trimmed = input.trim();

  const ass = ASS_COLOR.exec(trimmed);
  if (ass) return `&H${ass[1].toUpperCase()}&`;

  const hex = trimmed.replace(/^#/, "").replace(/^0x/i, "");
  if (HEX6.test(hex)) {
    const [r, g, b] = [hex.slice(0, 2), hex.slice(2, 4), hex.slice(4, 6)];
    return `&H${b}${g}${r}&`.toUpperCase();
  }
  if (HEX3.test(hex)) {
    const [r, g, b] = [hex[0].repeat(2), hex[1].repeat(2), hex[2].repeat(2)];
    return `&H${b}${g}${r}&`.toUpperCase();
  }
  return fallback;
}

/**
 * Style lines in [V4+ Styles] take the 8-digit form with an alpha byte:
 * "&HBBGGRR&" → "&H00BBGGRR".
 */
export function toStyleColor(color: string): string {
  const match = ASS_COLOR.exec(normalizeColor(color));
  return `&H00${match ? match[1].toUpperCase() : "FFFFFF"}`;
}
