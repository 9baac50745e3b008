/**
 * presets.ts — Named subtitle style presets
 *
 * PURPOSE:
 *   Operators save a subtitle look once ("bold-yellow", "podcast") and jobs
 *   refer to it by name. Presets live in config/presets.json as a map of
 *   name → SubtitleStyleConfig.
 *
 *   Input goes through normalizeStyleInput(), so preset files written by
 *   older tools (snake_case keys, numbers as strings, `#RRGGBB` colors) load
 *   and save cleanly. Whatever is stored is a complete, validated config.
 */

import { z } from "zod";
import { readJsonFile, writeJsonAtomic, WriteQueue } from "../storage/json-file";
import { parseStyleConfig, type SubtitleStyleConfig } from "./style";
import { describeError, InvalidInputError } from "../utils/errors";
import { log } from "../utils/logger";

const presetMapSchema = z.record(z.unknown());

type PresetMap = z.infer<typeof presetMapSchema>;

export class PresetStore {
  private readonly writes = new WriteQueue();

  constructor(private readonly file: string) {}

  private async readAll(): Promise<PresetMap> {
    const data = await readJsonFile(this.file);
    if (data === undefined) return {};
    const parsed = presetMapSchema.safeParse(data);
    if (!parsed.success) {
      throw new InvalidInputError(`${this.file} does not hold a preset map`);
    }
    return parsed.data;
  }

  async names(): Promise<string[]> {
    return Object.keys(await this.readAll()).sort();
  }

  /**
   * The preset as a complete config, or null when it doesn't exist or no
   * longer validates.
   */
  async load(name: string): Promise<SubtitleStyleConfig | null> {
    const presets = await this.readAll();
    if (!(name in presets)) {
      log("warn", "presets", undefined, `Preset not found: ${name}`);
      return null;
    }
    try {
      return parseStyleConfig(presets[name]);
    } catch (error) {
      log("error", "presets", undefined, `Preset ${name} is invalid: ${describeError(error)}`);
      return null;
    }
  }

  /** Creates or replaces a preset. Missing fields take the style defaults. */
  async save(name: string, config: unknown): Promise<SubtitleStyleConfig> {
    if (!name.trim()) throw new InvalidInputError("Preset name must not be empty");
    const parsed = parseStyleConfig(config);
    await this.writes.run(async () => {
      const presets = await this.readAll();
      presets[name] = parsed;
      await writeJsonAtomic(this.file, presets);
    });
    log("info", "presets", undefined, `Saved preset ${name}`);
    return parsed;
  }

  /** Merges `changes` into an existing preset. Returns null when it doesn't exist. */
  async update(name: string, changes: unknown): Promise<SubtitleStyleConfig | null> {
    return this.writes.run(async () => {
      const presets = await this.readAll();
      const current = presets[name];
      if (typeof current !== "object" || current === null) return null;
      const changeSet = typeof changes === "object" && changes !== null ? changes : {};
      const merged = parseStyleConfig({ ...current, ...changeSet });
      presets[name] = merged;
      await writeJsonAtomic(this.file, presets);
      log("info", "presets", undefined, `Updated preset ${name}`);
      return merged;
    });
  }

  async delete(name: string): Promise<boolean> {
    return this.writes.run(async () => {
      const presets = await this.readAll();
      if (!(name in presets)) return false;
      delete presets[name];
      await writeJsonAtomic(this.file, presets);
      log("info", "presets", undefined, `Deleted preset ${name}`);
      return true;
    });
  }
}
