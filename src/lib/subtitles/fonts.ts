/**
 * fonts.ts — Installed font lookup
 *
 * libass resolves fonts by family name through fontconfig, so a preset naming
 * a font the machine doesn't have silently renders in some other face. We
 * check the name against the font files in the configured directories first
 * and fall back to Arial explicitly, with a warning, instead.
 *
 * A font's name here is its file stem ("Montserrat-Bold.ttf" → "Montserrat-Bold").
 */

import { readdir } from "fs/promises";
import { homedir } from "os";
import { extname, join, parse } from "path";
import { errnoCode } from "../utils/errors";
import { log } from "../utils/logger";

export const FALLBACK_FONT = "Arial";

const FONT_EXTENSIONS = new Set([".ttf", ".otf"]);

export function defaultFontDirs(): string[] {
  if (process.platform === "win32") {
    const dirs = [join(process.env.WINDIR || "C:\\Windows", "Fonts")];
    if (process.env.LOCALAPPDATA) {
      dirs.push(join(process.env.LOCALAPPDATA, "Microsoft", "Windows", "Fonts"));
    }
    return dirs;
  }
  if (process.platform === "darwin") {
    return ["/System/Library/Fonts", "/Library/Fonts", join(homedir(), "Library", "Fonts")];
  }
  return ["/usr/share/fonts", "/usr/local/share/fonts", join(homedir(), ".fonts")];
}

/** Font name → file path, first directory wins on duplicates. */
export async function listFonts(dirs: readonly string[] = defaultFontDirs()): Promise<Map<string, string>> {
  const fonts = new Map<string, string>();
  for (const dir of dirs) {
    let entries: string[];
    try {
      entries = await readdir(dir, { recursive: true });
    } catch (error) {
      if (errnoCode(error) === "ENOENT") continue;
      throw error;
    }
    for (const entry of entries.sort()) {
      if (!FONT_EXTENSIONS.has(extname(entry).toLowerCase())) continue;
      const name = parse(entry).name;
      if (!fonts.has(name)) fonts.set(name, join(dir, entry));
    }
  }
  return fonts;
}

/**
 * The installed spelling of `name` (case-insensitive match), or Arial.
 */
export async function resolveFontName(name: string, dirs?: readonly string[]): Promise<string> {
  const wanted = name.trim();
  if (!wanted) return FALLBACK_FONT;

  const fonts = await listFonts(dirs);
  if (fonts.has(wanted)) return wanted;

  const lower = wanted.toLowerCase();
  for (const installed of fonts.keys()) {
    if (installed.toLowerCase() === lower) return installed;
  }

  if (wanted !== FALLBACK_FONT) {
    log("warn", "fonts", undefined, `Font "${wanted}" not found, using ${FALLBACK_FONT}`);
  }
  return FALLBACK_FONT;
}
