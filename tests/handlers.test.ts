import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import { renderHookBatch } from "../src/lib/render/batch";
import { renderHookVideo } from "../src/lib/render/hook-video";
import { renderMainVideo } from "../src/lib/render/main-video";
import { PresetStore } from "../src/lib/settings/presets";
import { workspaceLayout } from "../src/lib/storage/paths";
import { TaskHistory } from "../src/lib/tasks/history";
import { InvalidInputError } from "../src/lib/utils/errors";
import { EncoderCapabilityCache } from "../src/lib/video/encoder";
import { processRawVideos } from "../src/lib/video/library";
import { processRenderJob, resolveJobStyle, type JobLike, type WorkerContext } from "../src/workers/handlers";
import { quietLogs } from "./helpers/fake-media";

vi.mock("../src/lib/render/hook-video", () => ({ renderHookVideo: vi.fn() }));
vi.mock("../src/lib/render/main-video", () => ({ renderMainVideo: vi.fn() }));
vi.mock("../src/lib/render/batch", () => ({ renderHookBatch: vi.fn() }));
vi.mock("../src/lib/video/library", () => ({ processRawVideos: vi.fn() }));

describe("worker handlers", () => {
  let dir: string;
  let ctx: WorkerContext;
  let history: TaskHistory;
  let presets: PresetStore;

  type TestJob = JobLike & { updateProgress: Mock<(progress: number) => Promise<void>> };

  function job(name: string, data: unknown): TestJob {
    return { id: "bull-1", name, data, updateProgress: vi.fn<(progress: number) => Promise<void>>(async () => undefined) };
  }

  const hookData = {
    taskId: "t1",
    hookAudio: "/in/a_hook.mp3",
    mainAudio: "/in/a_audio.mp3",
    subtitle: "/in/a.srt",
    thumbnail: "/in/a_hook.png",
  };

  beforeEach(() => {
    quietLogs();
    dir = mkdtempSync(join(tmpdir(), "hookreel-worker-"));
    const workspace = workspaceLayout(dir);
    history = new TaskHistory(join(workspace.configDir, "task_history.json"));
    presets = new PresetStore(join(workspace.configDir, "presets.json"));
    ctx = {
      config: { workspace, fontDirs: [], retryDelayMs: 0 },
      history,
      presets,
      capabilities: new EncoderCapabilityCache(0, async () => false),
      now: () => 1_700_000_000_000,
    };
    vi.mocked(renderHookVideo).mockImplementation(async (renderJob, deps) => {
      deps.onState?.({ jobId: renderJob.jobId, state: "NORMALIZING_AUDIO", attempt: 1 });
      deps.onState?.({ jobId: renderJob.jobId, state: "DONE", attempt: 1 });
      return renderJob.outputPath;
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it("renders a hook job and records its progress", async () => {
    const hook = job("hook", hookData);

    const result = await processRenderJob(hook, ctx);

    const output = join(dir, "final", "a_audio_1700000000.mp4");
    expect(result).toEqual({ taskId: "t1", outputPaths: [output] });
    expect(hook.updateProgress.mock.calls).toEqual([[5], [100]]);
    await expect(history.get("t1")).resolves.toMatchObject({
      status: "completed",
      kind: "hook",
      progress: 100,
      outputPath: output,
      message: "Produced 1 file(s)",
    });
  });

  it("lays inline style fields over the preset", async () => {
    await presets.save("bold", { fontSize: 64, primary_color: "#FFCC00" });

    await processRenderJob(job("hook", { ...hookData, preset: "bold", style: { font_size: "50" } }), ctx);

    const [renderJob] = vi.mocked(renderHookVideo).mock.calls[0];
    expect(renderJob.style).toMatchObject({ fontSize: 50, primaryColor: "&H00CCFF&" });
  });

  it("fails the task when the preset does not exist", async () => {
    await expect(processRenderJob(job("hook", { ...hookData, preset: "nope" }), ctx)).rejects.toThrow(
      "Preset not found: nope"
    );

    expect(renderHookVideo).not.toHaveBeenCalled();
    await expect(history.get("t1")).resolves.toMatchObject({ status: "failed", error: "Preset not found: nope" });
  });

  it("fails unknown job types", async () => {
    await expect(processRenderJob(job("resize", { taskId: "t9" }), ctx)).rejects.toBeInstanceOf(InvalidInputError);
    await expect(history.get("t9")).resolves.toMatchObject({ status: "failed", error: "Unknown job type: resize" });
  });

  it("fails payloads that do not validate", async () => {
    await expect(processRenderJob(job("main", { taskId: "t2", subtitle: "/in/a.srt" }), ctx)).rejects.toThrow();

    expect(renderMainVideo).not.toHaveBeenCalled();
    await expect(history.get("t2")).resolves.toMatchObject({ status: "failed", kind: "main" });
  });

  it("passes main job overlays through", async () => {
    vi.mocked(renderMainVideo).mockImplementation(async (renderJob) => renderJob.outputPath);

    await processRenderJob(
      job("main", { taskId: "t3", audio: "/in/ep.wav", subtitle: "/in/ep.srt", overlays: ["/in/logo.png"], outputPath: "/out/ep.mp4" }),
      ctx
    );

    expect(vi.mocked(renderMainVideo).mock.calls[0][0]).toMatchObject({
      jobId: "t3",
      overlays: ["/in/logo.png"],
      outputPath: "/out/ep.mp4",
      vertical: false,
    });
  });

  it("records batch items", async () => {
    const items = [
      { name: "a", status: "completed" as const, outputPath: "/out/a.mp4" },
      { name: "b", status: "failed" as const, error: "encoder crashed" },
    ];
    vi.mocked(renderHookBatch).mockImplementation(async (options) => {
      await options.onProgress?.(100, items);
      return items;
    });
    const batch = job("hook-batch", { taskId: "t4", inputDir: "/in" });

    const result = await processRenderJob(batch, ctx);

    expect(result.outputPaths).toEqual(["/out/a.mp4"]);
    expect(batch.updateProgress).toHaveBeenCalledWith(100);
    await expect(history.get("t4")).resolves.toMatchObject({ status: "completed", items });
  });

  it("cuts the clip library with the detected encoder", async () => {
    vi.mocked(processRawVideos).mockResolvedValue({ clips: ["/ws/cut/cut_0000_a.mp4"], processed: [], failed: [] });

    const result = await processRenderJob(job("cut-library", { taskId: "t5" }), ctx);

    expect(result.outputPaths).toEqual(["/ws/cut/cut_0000_a.mp4"]);
    expect(vi.mocked(processRawVideos).mock.calls[0][1]).toMatchObject({
      jobId: "t5",
      gpu: false,
      minDuration: 4,
      maxDuration: 7,
    });
  });
});

describe("resolveJobStyle", () => {
  let dir: string;

  beforeEach(() => {
    quietLogs();
    dir = mkdtempSync(join(tmpdir(), "hookreel-style-"));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it("returns only inline fields without a preset", async () => {
    const presets = new PresetStore(join(dir, "presets.json"));
    await expect(resolveJobStyle(presets, undefined, { alignment: "8" })).resolves.toEqual({ alignment: 8 });
  });
});
