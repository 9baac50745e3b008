import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { buildAssDocument, formatAssTime } from "../src/lib/subtitles/ass";
import { normalizeColor, toStyleColor } from "../src/lib/subtitles/colors";
import { listFonts, resolveFontName } from "../src/lib/subtitles/fonts";
import {
  resolveStyle,
  stripOverrideTags,
  styleCue,
  styleSubtitles,
  wrapText,
} from "../src/lib/subtitles/processor";
import { parseSrt } from "../src/lib/subtitles/srt";
import { parseStyleConfig } from "../src/lib/settings/style";
import { quietLogs } from "./helpers/fake-media";

describe("normalizeColor", () => {
  it.each([
    ["&H00ff00&", "&H00FF00&"],
    ["#FFCC00", "&H00CCFF&"],
    ["fc0", "&H00CCFF&"],
    ["0x112233", "&H332211&"],
  ])("%s → %s", (input, expected) => {
    expect(normalizeColor(input)).toBe(expected);
  });

  it("falls back on anything else", () => {
    expect(normalizeColor("blue")).toBe("&HFFFFFF&");
    expect(normalizeColor(undefined, "&H000000&")).toBe("&H000000&");
  });

  it("adds the alpha byte for style lines", () => {
    expect(toStyleColor("&H00CCFF&")).toBe("&H0000CCFF");
  });
});

describe("parseSrt", () => {
  it("reads cues with either millisecond separator", () => {
    const content =
      "\uFEFF1\r\n00:00:01,000 --> 00:00:03,500\r\nHello\r\nworld\r\n\r\n" +
      "2\r\n00:00:04.2 --> 00:00:05.75\r\nBye\r\n";

    expect(parseSrt(content)).toEqual([
      { start: 1000, end: 3500, text: "Hello\nworld" },
      { start: 4200, end: 5750, text: "Bye" },
    ]);
  });

  it("skips blocks without timing or text", () => {
    const content = "1\nnot a timing line\n\n2\n00:00:01,000 --> 00:00:02,000\n\n3\n00:00:02,000 --> 00:00:03,000\nok\n";
    expect(parseSrt(content)).toEqual([{ start: 2000, end: 3000, text: "ok" }]);
  });
});

describe("formatAssTime", () => {
  it("writes centiseconds", () => {
    expect(formatAssTime(3_723_456)).toBe("1:02:03.46");
    expect(formatAssTime(0)).toBe("0:00:00.00");
  });
});

describe("wrapText", () => {
  it("wraps greedily at the limit", () => {
    expect(wrapText("the quick brown fox jumps", 10)).toEqual(["the quick", "brown fox", "jumps"]);
  });

  it("keeps existing line breaks", () => {
    expect(wrapText("one\ntwo three", 40)).toEqual(["one", "two three"]);
  });
});

describe("styleCue", () => {
  it("strips override tags, shifts and sets the alignment", () => {
    const style = parseStyleConfig({ alignment: 8 });
    const cue = styleCue({ start: 1000, end: 2000, text: "{\\b1}Hello{\\b0} world" }, style, 0.25);

    expect(stripOverrideTags("{\\b1}Hello{\\b0} world")).toBe("Hello world");
    expect(cue).toEqual({ start: 1250, end: 2250, text: "{\\an8}Hello world" });
  });
});

describe("resolveStyle", () => {
  it("uses bottom-centre with small margins for horizontal video", () => {
    expect(resolveStyle({}, false)).toMatchObject({ alignment: 2, marginV: 10, marginH: 10, fontSize: 48 });
  });

  it("lets the config override the orientation default", () => {
    expect(resolveStyle({ alignment: 8 }, true)).toMatchObject({ alignment: 8, marginV: 20 });
  });
});

describe("buildAssDocument", () => {
  it("writes script info, one style and the events", () => {
    const style = parseStyleConfig({});
    const lines = buildAssDocument([{ start: 0, end: 1000, text: "a\nb" }], style).split("\n");

    expect(lines[0]).toBe("[Script Info]");
    expect(lines[5]).toBe("[V4+ Styles]");
    expect(lines[9]).toBe("[Events]");
    expect(lines[11]).toBe("Dialogue: 0,0:00:00.00,0:00:01.00,Default,,0,0,0,,a\\Nb");
    expect(lines[12]).toBe("");
  });
});

describe("styleSubtitles", () => {
  let dir: string;

  beforeEach(() => {
    quietLogs();
    dir = mkdtempSync(join(tmpdir(), "hookreel-subs-"));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it("writes a styled document next to the srt", async () => {
    const srt = join(dir, "talk.srt");
    writeFileSync(
      srt,
      "1\n00:00:01,000 --> 00:00:03,500\nHello there, this is a long subtitle line\n\n" +
        "2\n00:00:04,200 --> 00:00:05,750\n{\\i1}Bye{\\i0}\n"
    );

    const out = await styleSubtitles(
      srt,
      { fontSize: "60", primary_color: "#FFCC00", maxChars: 20 },
      true,
      { startOffset: 1.5, fontDirs: [] }
    );

    expect(out).toBe(join(dir, "talk.ass"));
    const lines = readFileSync(join(dir, "talk.ass"), "utf-8").split("\n");
    expect(lines).toContain(
      "Style: Default,Arial,60,&H0000CCFF,&H0000CCFF,&H00000000,&H00000000,0,0,0,0,100,100,0,0,1,2,0,5,20,20,20,1"
    );
    expect(lines.filter((line) => line.startsWith("Dialogue:"))).toEqual([
      "Dialogue: 0,0:00:02.50,0:00:05.00,Default,,0,0,0,,{\\an5}Hello there, this is\\Na long subtitle line",
      "Dialogue: 0,0:00:05.70,0:00:07.25,Default,,0,0,0,,{\\an5}Bye",
    ]);
  });

  it("writes to the requested output path", async () => {
    const srt = join(dir, "talk.srt");
    writeFileSync(srt, "1\n00:00:00,000 --> 00:00:01,000\nHi\n");

    const out = await styleSubtitles(srt, {}, false, { outputPath: join(dir, "job_subtitles.ass"), fontDirs: [] });

    expect(out).toBe(join(dir, "job_subtitles.ass"));
  });

  it("returns null for a missing file", async () => {
    await expect(styleSubtitles(join(dir, "missing.srt"), {}, false, { fontDirs: [] })).resolves.toBeNull();
  });

  it("returns null when the file has no cues", async () => {
    const srt = join(dir, "empty.srt");
    writeFileSync(srt, "\n\n");
    await expect(styleSubtitles(srt, {}, false, { fontDirs: [] })).resolves.toBeNull();
  });

  it("returns null for an out-of-range style", async () => {
    const srt = join(dir, "talk.srt");
    writeFileSync(srt, "1\n00:00:00,000 --> 00:00:01,000\nHi\n");
    await expect(styleSubtitles(srt, { fontSize: 500 }, false, { fontDirs: [] })).resolves.toBeNull();
  });
});

describe("fonts", () => {
  let dir: string;

  beforeEach(() => {
    quietLogs();
    dir = mkdtempSync(join(tmpdir(), "hookreel-fonts-"));
    mkdirSync(join(dir, "sub"));
    writeFileSync(join(dir, "Montserrat-Bold.ttf"), "");
    writeFileSync(join(dir, "sub", "Roboto.otf"), "");
    writeFileSync(join(dir, "readme.txt"), "");
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it("lists font files by stem, including subdirectories", async () => {
    const fonts = await listFonts([dir, join(dir, "missing")]);
    expect([...fonts.keys()].sort()).toEqual(["Montserrat-Bold", "Roboto"]);
    expect(fonts.get("Roboto")).toBe(join(dir, "sub", "Roboto.otf"));
  });

  it("matches names case-insensitively", async () => {
    await expect(resolveFontName("montserrat-bold", [dir])).resolves.toBe("Montserrat-Bold");
  });

  it("falls back to Arial with a warning", async () => {
    await expect(resolveFontName("Comic Neue", [dir])).resolves.toBe("Arial");
    expect(console.warn).toHaveBeenCalledTimes(1);
  });
});
