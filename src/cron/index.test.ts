import { beforeEach, describe, expect, it, vi } from "vitest";
import { createPublishTick, CronWorker } from "./index";
import { RunSummary } from "../scheduledPost/scheduledPost.worker";

const summary: RunSummary = {
  runId: "run-1",
  startedAt: new Date("2026-03-02T10:00:00.000Z"),
  finishedAt: new Date("2026-03-02T10:00:05.000Z"),
  due: 0,
  claimed: 0,
  skipped: 0,
  posted: 0,
  failed: 0,
  results: [],
};

beforeEach(() => {
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

describe("createPublishTick", () => {
  it("skips a tick while the previous run is in flight", async () => {
    let finish: (value: RunSummary) => void = () => undefined;
    const worker = {
      processScheduledPosts: vi.fn<CronWorker["processScheduledPosts"]>(
        () => new Promise<RunSummary>((resolve) => (finish = resolve))
      ),
    };
    const tick = createPublishTick(worker);

    const first = tick();
    await tick();
    expect(worker.processScheduledPosts).toHaveBeenCalledTimes(1);

    finish(summary);
    await first;
    worker.processScheduledPosts.mockResolvedValueOnce(summary);
    await tick();
    expect(worker.processScheduledPosts).toHaveBeenCalledTimes(2);
  });

  it("logs a failed run and stays usable", async () => {
    const worker = {
      processScheduledPosts: vi
        .fn<CronWorker["processScheduledPosts"]>()
        .mockRejectedValueOnce(new Error("store down"))
        .mockResolvedValueOnce(summary),
    };
    const tick = createPublishTick(worker);

    await tick();
    await tick();

    expect(worker.processScheduledPosts).toHaveBeenCalledTimes(2);
    expect(console.error).toHaveBeenCalledWith("[Cron] publishing run failed:", new Error("store down"));
  });
});
