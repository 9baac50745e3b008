import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { VideoCache } from "../src/lib/storage/video-cache";
import { getDimensions, getDuration, probeDuration } from "../src/lib/video/ffprobe";
import { normalizeAudio, normalizeAudioArgs } from "../src/lib/video/normalize";
import { runFFprobe } from "../src/lib/video/commands";
import { EncodeError, ProbeFailure } from "../src/lib/utils/errors";
import { FakeMedia, quietLogs } from "./helpers/fake-media";

vi.mock("../src/lib/video/commands", () => ({ runFFmpeg: vi.fn(), runFFprobe: vi.fn() }));

describe("media probing", () => {
  let dir: string;
  let media: FakeMedia;

  beforeEach(() => {
    quietLogs();
    dir = mkdtempSync(join(tmpdir(), "hookreel-probe-"));
    media = new FakeMedia();
    media.install();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it("reads the container duration", async () => {
    const clip = media.addFile(join(dir, "clip.mp4"), 2.5);
    await expect(getDuration(clip)).resolves.toBe(2.5);
  });

  it("returns 0 for empty and unreadable files", async () => {
    writeFileSync(join(dir, "empty.mp4"), "");
    writeFileSync(join(dir, "junk.mp4"), "junk");

    await expect(getDuration(join(dir, "empty.mp4"))).resolves.toBe(0);
    await expect(getDuration(join(dir, "junk.mp4"))).resolves.toBe(0);
  });

  it("throws ProbeFailure from the strict variant", async () => {
    await expect(probeDuration(join(dir, "gone.mp4"))).rejects.toBeInstanceOf(ProbeFailure);
  });

  it("falls back to a renamed sibling", async () => {
    media.addFile(join(dir, "clip_v2.mp4"), 4);
    await expect(getDuration(join(dir, "clip.mp4"))).resolves.toBe(4);
  });

  it("rejects output without a duration", async () => {
    const clip = media.addFile(join(dir, "clip.mp4"), 2);
    vi.mocked(runFFprobe).mockResolvedValueOnce({ stdout: JSON.stringify({ format: {} }), stderr: "" });
    await expect(getDuration(clip)).resolves.toBe(0);
  });

  it("reads frame dimensions and defaults on failure", async () => {
    await expect(getDimensions(join(dir, "thumb.png"))).resolves.toEqual({ width: 1920, height: 1080 });

    vi.mocked(runFFprobe).mockResolvedValueOnce({ stdout: JSON.stringify({ streams: [{ width: 720, height: 1280 }] }), stderr: "" });
    await expect(getDimensions(join(dir, "thumb.png"))).resolves.toEqual({ width: 720, height: 1280 });

    vi.mocked(runFFprobe).mockResolvedValueOnce({ stdout: JSON.stringify({ streams: [] }), stderr: "" });
    await expect(getDimensions(join(dir, "thumb.png"))).resolves.toEqual({ width: 1920, height: 1080 });
  });
});

describe("normalizeAudio", () => {
  let dir: string;
  let media: FakeMedia;

  beforeEach(() => {
    quietLogs();
    dir = mkdtempSync(join(tmpdir(), "hookreel-audio-"));
    media = new FakeMedia();
    media.install();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it("decodes to 24-bit 48kHz stereo", () => {
    expect(normalizeAudioArgs("in.mp3", "out.wav")).toEqual([
      "-i", "in.mp3", "-vn", "-c:a", "pcm_s24le", "-ar", "48000", "-ac", "2", "out.wav",
    ]);
  });

  it("writes the wav", async () => {
    const input = media.addFile(join(dir, "talk.mp3"), 3.2);
    const out = join(dir, "talk.wav");

    await expect(normalizeAudio(input, out)).resolves.toBe(out);
    expect(media.durationOf(out)).toBe(3.2);
  });

  it("fails on a missing input", async () => {
    await expect(normalizeAudio(join(dir, "none.mp3"), join(dir, "out.wav"))).rejects.toBeInstanceOf(EncodeError);
  });
});

describe("VideoCache", () => {
  let dir: string;

  beforeEach(() => {
    quietLogs();
    dir = mkdtempSync(join(tmpdir(), "hookreel-cache-"));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it("persists durations by absolute path", async () => {
    const file = join(dir, "config", "video_cache.json");
    const clip = join(dir, "clip.mp4");
    writeFileSync(clip, "media");

    const cache = await VideoCache.open(file);
    await cache.set(clip, 2.5);
    await cache.set(join(dir, "zero.mp4"), 0);

    const reopened = await VideoCache.open(file);
    expect(reopened.get(clip)).toBe(2.5);
    expect(reopened.all()).toHaveLength(1);
    expect(JSON.parse(readFileSync(file, "utf-8"))[clip].filename).toBe("clip.mp4");
  });

  it("keeps every entry when jobs write concurrently", async () => {
    const file = join(dir, "video_cache.json");
    const clips = Array.from({ length: 20 }, (_, i) => join(dir, `clip_${i}.mp4`));
    const cache = await VideoCache.open(file);

    await Promise.all(clips.map((clip, i) => cache.set(clip, i + 1)));

    const reopened = await VideoCache.open(file);
    expect(reopened.all()).toHaveLength(20);
    expect(reopened.get(clips[7])).toBe(8);
    expect(existsSync(`${file}.tmp`)).toBe(false);
  });

  it("drops entries whose file is gone", async () => {
    const file = join(dir, "video_cache.json");
    const clip = join(dir, "clip.mp4");
    writeFileSync(clip, "media");
    const cache = await VideoCache.open(file);
    await cache.set(clip, 2.5);
    rmSync(clip);

    await expect(cache.cleanMissing()).resolves.toBe(1);
    expect(cache.get(clip)).toBeUndefined();
    expect(existsSync(file)).toBe(true);
  });

  it("starts empty from an unreadable file", async () => {
    const file = join(dir, "video_cache.json");
    writeFileSync(file, "[broken");

    const cache = await VideoCache.open(file);

    expect(cache.all()).toEqual([]);
  });
});
