import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { TaskHistory } from "../src/lib/tasks/history";
import { quietLogs } from "./helpers/fake-media";

describe("TaskHistory", () => {
  const now = new Date("2026-03-01T00:00:00.000Z");
  let dir: string;
  let file: string;
  let history: TaskHistory;

  beforeEach(() => {
    quietLogs();
    dir = mkdtempSync(join(tmpdir(), "hookreel-history-"));
    mkdirSync(join(dir, "config"));
    file = join(dir, "config", "task_history.json");
    history = new TaskHistory(file, () => now);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it("stamps saved records", async () => {
    await history.save("t1", { status: "queued", kind: "hook", progress: 0 });

    await expect(history.get("t1")).resolves.toEqual({
      status: "queued",
      kind: "hook",
      progress: 0,
      savedAt: "2026-03-01T00:00:00.000Z",
    });
    expect(existsSync(`${file}.tmp`)).toBe(false);
  });

  it("merges updates into the existing record", async () => {
    await history.save("t1", { status: "queued", kind: "hook", progress: 0 });

    const record = await history.update("t1", { status: "processing", progress: 25 });

    expect(record).toEqual({
      status: "processing",
      kind: "hook",
      progress: 25,
      savedAt: "2026-03-01T00:00:00.000Z",
    });
  });

  it("returns null for unknown tasks", async () => {
    await expect(history.get("missing")).resolves.toBeNull();
  });

  it("drops records older than thirty days on save", async () => {
    writeFileSync(
      file,
      JSON.stringify({
        old: { status: "completed", savedAt: "2026-01-20T00:00:00.000Z" },
        recent: { status: "completed", savedAt: "2026-02-19T00:00:00.000Z" },
        odd: { status: "failed", savedAt: "sometime" },
      })
    );

    await history.save("new", { status: "queued" });

    expect(Object.keys(await history.all()).sort()).toEqual(["new", "odd", "recent"]);
  });

  it("moves a corrupted file aside and starts over", async () => {
    writeFileSync(file, "{not json");

    await expect(history.get("t1")).resolves.toBeNull();
    expect(readFileSync(`${file}.bak`, "utf-8")).toBe("{not json");

    await history.save("t1", { status: "queued" });
    expect(Object.keys(await history.all())).toEqual(["t1"]);
  });

  it("treats records of the wrong shape as corruption", async () => {
    writeFileSync(file, JSON.stringify({ t1: { status: "lost" } }));

    await expect(history.all()).resolves.toEqual({});
    expect(existsSync(`${file}.bak`)).toBe(true);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it("serialises concurrent writes", async () => {
    await Promise.all(
      Array.from({ length: 5 }, (_, i) => history.save(`t${i}`, { status: "queued" }))
    );

    expect(Object.keys(await history.all()).sort()).toEqual(["t0", "t1", "t2", "t3", "t4"]);
  });
});
