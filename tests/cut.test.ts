import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { cutArgs, cutSegment } from "../src/lib/video/cut";
import { encodingSettings } from "../src/lib/video/encoder";
import { EncodeError } from "../src/lib/utils/errors";
import { FakeMedia, quietLogs } from "./helpers/fake-media";

vi.mock("../src/lib/video/commands", () => ({ runFFmpeg: vi.fn(), runFFprobe: vi.fn() }));

describe("cutArgs", () => {
  it("seeks before the input and re-encodes at the frame size", () => {
    const cpu = encodingSettings("cpu", true);
    expect(cutArgs("in.mp4", 1.5, 2.25, "out.mp4", cpu).slice(0, 10)).toEqual([
      "-ss", "1.500",
      "-i", "in.mp4",
      "-t", "2.250",
      "-vf", "scale=1080:1920,setsar=1,fps=30",
      "-an",
      "-c:v",
    ]);
  });
});

describe("cutSegment", () => {
  let dir: string;
  let media: FakeMedia;

  beforeEach(() => {
    quietLogs();
    dir = mkdtempSync(join(tmpdir(), "hookreel-cut-"));
    media = new FakeMedia();
    media.install();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it("returns the cut as a new segment", async () => {
    const clip = media.addFile(join(dir, "clip.mp4"), 4);
    const out = join(dir, "cut.mp4");

    const segment = await cutSegment(clip, 0, 1.2, out, { gpu: false, vertical: false });

    expect(segment).toEqual({ path: out, source: clip, start: 0, duration: 1.2, cut: true });
    expect(media.durationOf(out)).toBe(1.2);
  });

  it("retries on the CPU when the GPU run writes nothing", async () => {
    const clip = media.addFile(join(dir, "clip.mp4"), 4);
    media.skipOutputWhen = (args) => args.includes("h264_nvenc");

    await cutSegment(clip, 0, 1, join(dir, "cut.mp4"), { gpu: true, vertical: false });

    expect(media.calls).toHaveLength(2);
    expect(media.calls[1]).toContain("libx264");
  });

  it("refuses an empty window", async () => {
    await expect(
      cutSegment(join(dir, "clip.mp4"), 0, 0, join(dir, "cut.mp4"), { gpu: false, vertical: false })
    ).rejects.toBeInstanceOf(EncodeError);
    expect(media.calls).toHaveLength(0);
  });
});
