import { existsSync, mkdtempSync, readdirSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  buildConcatManifest,
  concatenate,
  manifestPath,
  streamCopyArgs,
} from "../src/lib/video/stitch";
import { EncodeError } from "../src/lib/utils/errors";
import { FakeMedia, quietLogs } from "./helpers/fake-media";

vi.mock("../src/lib/video/commands", () => ({ runFFmpeg: vi.fn(), runFFprobe: vi.fn() }));

describe("buildConcatManifest", () => {
  it("writes one quoted absolute path per line", () => {
    expect(buildConcatManifest(["/media/a b/clip.mp4", "/media/it's.mp4"])).toBe(
      "file '/media/a b/clip.mp4'\nfile '/media/it'\\''s.mp4'\n"
    );
  });
});

describe("manifestPath", () => {
  it("derives the manifest name from the output", () => {
    expect(manifestPath("/work/temp", "/work/temp/job1_final.mp4")).toBe("/work/temp/job1_final.concat.txt");
  });
});

describe("streamCopyArgs", () => {
  it("drops audio for background joins", () => {
    expect(streamCopyArgs("list.txt", "out.mp4", true)).toEqual([
      "-f", "concat",
      "-safe", "0",
      "-i", "list.txt",
      "-c", "copy",
      "-an",
      "-fflags", "+genpts",
      "-avoid_negative_ts", "make_zero",
      "-movflags", "+faststart",
      "out.mp4",
    ]);
  });
});

describe("concatenate", () => {
  let dir: string;
  let media: FakeMedia;

  beforeEach(() => {
    quietLogs();
    dir = mkdtempSync(join(tmpdir(), "hookreel-stitch-"));
    media = new FakeMedia();
    media.install();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it("joins by stream copy and removes the manifest", async () => {
    const a = media.addFile(join(dir, "a.mp4"), 2);
    const b = media.addFile(join(dir, "b.mp4"), 1.5);
    const out = join(dir, "joined.mp4");

    await concatenate([a, b], out, { mode: "stream_copy", workDir: dir });

    expect(media.durationOf(out)).toBe(3.5);
    expect(media.calls).toHaveLength(1);
    expect(media.calls[0]).toContain("copy");
    expect(readdirSync(dir).sort()).toEqual(["a.mp4", "b.mp4", "joined.mp4"]);
  });

  it("re-encodes with the CPU bundle after an NVENC failure", async () => {
    const a = media.addFile(join(dir, "a.mp4"), 2);
    media.failWhen = (args) => args.includes("h264_nvenc");
    const onFallback = vi.fn();

    await concatenate([a], join(dir, "out.mp4"), {
      mode: "re_encode",
      workDir: dir,
      gpu: true,
      vertical: false,
      onFallback,
    });

    expect(media.calls.map((args) => args[args.indexOf("-c:v") + 1])).toEqual(["h264_nvenc", "libx264"]);
    expect(onFallback).toHaveBeenCalledTimes(1);
  });

  it("removes the manifest when ffmpeg fails", async () => {
    const a = media.addFile(join(dir, "a.mp4"), 2);
    media.failWhen = () => true;

    await expect(
      concatenate([a], join(dir, "out.mp4"), { mode: "stream_copy", workDir: dir })
    ).rejects.toBeInstanceOf(EncodeError);
    expect(existsSync(join(dir, "out.concat.txt"))).toBe(false);
  });

  it("fails when ffmpeg writes nothing", async () => {
    const a = media.addFile(join(dir, "a.mp4"), 2);
    media.skipOutputWhen = () => true;

    await expect(
      concatenate([a], join(dir, "out.mp4"), { mode: "stream_copy", workDir: dir })
    ).rejects.toThrow("was not written");
  });

  it("rejects an empty segment list", async () => {
    await expect(
      concatenate([], join(dir, "out.mp4"), { mode: "stream_copy", workDir: dir })
    ).rejects.toThrow("No segments to concatenate");
  });
});
