import { existsSync, readdirSync } from "fs";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { planClipWindows, processRawVideos } from "../src/lib/video/library";
import { InsufficientMediaError, InvalidInputError } from "../src/lib/utils/errors";
import { FakeMedia, makeWorkspace, quietLogs, type TestWorkspace } from "./helpers/fake-media";

vi.mock("../src/lib/video/commands", () => ({ runFFmpeg: vi.fn(), runFFprobe: vi.fn() }));

describe("planClipWindows", () => {
  it("covers the whole video and truncates the last window", () => {
    expect(planClipWindows(20, 4, 7, () => 0.5)).toEqual([
      { start: 0, duration: 5.5 },
      { start: 5.5, duration: 5.5 },
      { start: 11, duration: 5.5 },
      { start: 16.5, duration: 3.5 },
    ]);
  });

  it("drops a remainder too short to be a clip", () => {
    expect(planClipWindows(8.05, 4, 4, () => 0)).toEqual([
      { start: 0, duration: 4 },
      { start: 4, duration: 4 },
    ]);
  });

  it("rejects an inverted range", () => {
    expect(() => planClipWindows(20, 7, 4)).toThrow(InvalidInputError);
  });
});

describe("processRawVideos", () => {
  let ws: TestWorkspace;
  let media: FakeMedia;

  beforeEach(async () => {
    quietLogs();
    ws = await makeWorkspace();
    media = new FakeMedia();
    media.install();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    ws.remove();
  });

  it("cuts raw videos into the library and moves them to used/", async () => {
    const raw = media.addFile(join(ws.layout.rawDir, "a.mp4"), 12);

    const result = await processRawVideos(ws.layout, {
      gpu: false,
      vertical: false,
      minDuration: 4,
      maxDuration: 7,
      random: () => 0,
    });

    expect(result.clips).toEqual([
      join(ws.layout.cutDir, "cut_0000_a.mp4"),
      join(ws.layout.cutDir, "cut_0001_a.mp4"),
      join(ws.layout.cutDir, "cut_0002_a.mp4"),
    ]);
    expect(result.processed).toEqual([join(ws.layout.usedDir, "a.mp4")]);
    expect(existsSync(raw)).toBe(false);
    expect(readdirSync(ws.layout.tempDir)).toEqual([]);
    expect(media.calls.filter((args) => args[0] === "-ss").map((args) => args[1])).toEqual([
      "0.000",
      "4.000",
      "8.000",
    ]);
  });

  it("keeps going when one raw video fails", async () => {
    media.addFile(join(ws.layout.rawDir, "a.mp4"), 4);
    const broken = media.addFile(join(ws.layout.rawDir, "b.mp4"), 4);
    media.failWhen = (args) => args.includes(broken);

    const result = await processRawVideos(ws.layout, { gpu: false, vertical: false, random: () => 0 });

    expect(result.clips).toEqual([join(ws.layout.cutDir, "cut_0000_a.mp4")]);
    expect(result.failed).toEqual([broken]);
    expect(existsSync(broken)).toBe(true);
  });

  it("fails when there is nothing to cut", async () => {
    await expect(processRawVideos(ws.layout, { gpu: false, vertical: false })).rejects.toBeInstanceOf(
      InsufficientMediaError
    );
  });
});
