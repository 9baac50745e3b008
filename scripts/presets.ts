/**
 * Manage subtitle style presets.
 *
 * Run:
 *   npx tsx scripts/presets.ts list
 *   npx tsx scripts/presets.ts show <name>
 *   npx tsx scripts/presets.ts save <name> '{"fontName":"Montserrat","fontSize":56}'
 *   npx tsx scripts/presets.ts update <name> '{"primaryColor":"#FFCC00"}'
 *   npx tsx scripts/presets.ts delete <name>
 */
import dotenv from "dotenv";
import { getConfig } from "../src/lib/config";
import { PresetStore } from "../src/lib/settings/presets";
import { presetsFile } from "../src/lib/storage/paths";

function parseJson(raw: string | undefined): unknown {
  if (!raw) throw new Error("Style JSON is required");
  return JSON.parse(raw);
}

async function main() {
  dotenv.config({ path: ".env.local" });
  const [command, name, json] = process.argv.slice(2);
  const store = new PresetStore(presetsFile(getConfig().workspace));

  switch (command) {
    case "list":
      for (const preset of await store.names()) console.log(preset);
      return;
    case "show":
      console.log(JSON.stringify(await store.load(name ?? ""), null, 2));
      return;
    case "save":
      console.log(JSON.stringify(await store.save(name ?? "", parseJson(json)), null, 2));
      return;
    case "update": {
      const updated = await store.update(name ?? "", parseJson(json));
      if (!updated) throw new Error(`Preset not found: ${name}`);
      console.log(JSON.stringify(updated, null, 2));
      return;
    }
    case "delete":
      if (!(await store.delete(name ?? ""))) throw new Error(`Preset not found: ${name}`);
      console.log(`Deleted ${name}`);
      return;
    default:
      throw new Error("Usage: presets.ts list | show <name> | save <name> <json> | update <name> <json> | delete <name>");
  }
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
