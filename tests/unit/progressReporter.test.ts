import { describe, expect, it, vi } from "vitest";
import { createProgressReporter, normalizeProgress } from "../../src/services/business/progressReporter.js";
import type { TaskProgress } from "../../src/types/task.js";

describe("normalizeProgress", () => {
  it("computes the percentage and formatted fields from byte counters", () => {
    const progress = normalizeProgress({
      status: "downloading",
      downloadedBytes: 524288,
      totalBytes: 1048576,
      speed: 1048576,
      eta: 75,
      filename: "/out/clip.mp4",
    });

    expect(progress).toEqual({
      stage: "downloading",
      percentage: 50,
      downloadedBytes: 524288,
      totalBytes: 1048576,
      totalIsEstimate: false,
      speedBytesPerSecond: 1048576,
      etaSeconds: 75,
      filename: "/out/clip.mp4",
      formatted: {
        downloaded: "512.00KiB",
        total: "1.00MiB",
        speed: "1.00MiB/s",
        eta: "01:15",
        percentage: "50.0%",
      },
    });
  });

  it("leaves unknown counters absent instead of zero", () => {
    const progress = normalizeProgress({ status: "downloading", downloadedBytes: 2048 });

    expect(progress.percentage).toBe(0);
    expect(progress).not.toHaveProperty("totalBytes");
    expect(progress).not.toHaveProperty("speedBytesPerSecond");
    expect(progress).not.toHaveProperty("etaSeconds");
    expect(progress.formatted).toEqual({
      downloaded: "2.00KiB",
      total: "unknown",
      speed: "unknown",
      eta: "unknown",
      percentage: "0.0%",
    });
  });

  it("falls back to the estimated total and flags it", () => {
    const progress = normalizeProgress({ status: "downloading", downloadedBytes: 1024, totalBytesEstimate: 4096 });

    expect(progress.percentage).toBe(25);
    expect(progress.totalBytes).toBe(4096);
    expect(progress.totalIsEstimate).toBe(true);
  });

  it("uses fragment counts when no total is known", () => {
    const progress = normalizeProgress({ status: "downloading", fragmentIndex: 3, fragmentCount: 12 });

    expect(progress.percentage).toBe(25);
    expect(progress.fragmentIndex).toBe(3);
    expect(progress.fragmentCount).toBe(12);
  });

  it("stays below 100 when the last stream finishes", () => {
    const progress = normalizeProgress({ status: "finished", downloadedBytes: 10 });

    expect(progress.percentage).toBe(99.9);
    expect(progress.formatted.percentage).toBe("99.9%");
  });

  it("clamps overshooting counters", () => {
    expect(normalizeProgress({ status: "downloading", downloadedBytes: 3000, totalBytes: 2000 }).percentage).toBe(99.9);
  });

  it("spreads the percentage over every requested stream", () => {
    const progress = normalizeProgress(
      { status: "downloading", downloadedBytes: 50, totalBytes: 100 },
      0,
      { index: 1, count: 2 }
    );

    expect(progress.percentage).toBe(75);
    expect(progress.streamIndex).toBe(2);
    expect(progress.streamCount).toBe(2);
  });

  it("never goes below the previous percentage", () => {
    const progress = normalizeProgress({ status: "downloading", downloadedBytes: 10, totalBytes: 100 }, 60);

    expect(progress.percentage).toBe(60);
    expect(progress.formatted.percentage).toBe("60.0%");
  });
});

describe("createProgressReporter", () => {
  function recordingRegistry() {
    const updates: TaskProgress[] = [];
    return {
      updates,
      updateProgress: vi.fn(async (_id: string, progress: TaskProgress) => {
        // Let later reports queue up behind this write.
        await new Promise((resolve) => setTimeout(resolve, 1));
        updates.push(progress);
        return true;
      }),
    };
  }

  it("forwards updates in emission order", async () => {
    const registry = recordingRegistry();
    const reporter = createProgressReporter("t-1", registry);

    reporter.report({ status: "downloading", downloadedBytes: 10, totalBytes: 100 });
    reporter.report({ status: "downloading", downloadedBytes: 50, totalBytes: 100 });
    reporter.report({ status: "finished", downloadedBytes: 100, totalBytes: 100 });
    await reporter.flush();

    expect(registry.updates.map((p) => p.percentage)).toEqual([10, 50, 99.9]);
    expect(registry.updateProgress).toHaveBeenCalledWith("t-1", expect.objectContaining({ stage: "finished" }));
  });

  it("moves on to the next stream when the file name changes and stays below 100", async () => {
    const registry = recordingRegistry();
    const reporter = createProgressReporter("t-1", registry);
    const video = "/out/clip.f137.mp4";
    const audio = "/out/clip.f140.m4a";

    reporter.report({ status: "downloading", downloadedBytes: 50, totalBytes: 100, filename: video, streamCount: 2 });
    reporter.report({ status: "finished", downloadedBytes: 100, totalBytes: 100, filename: video, streamCount: 2 });
    reporter.report({ status: "downloading", downloadedBytes: 1, totalBytes: 100, filename: audio, streamCount: 2 });
    reporter.report({ status: "finished", downloadedBytes: 100, totalBytes: 100, filename: audio, streamCount: 2 });
    await reporter.flush();

    expect(registry.updates.map((p) => p.percentage)).toEqual([25, 50, 50.5, 99.9]);
    expect(registry.updates.map((p) => p.streamIndex)).toEqual([1, 1, 2, 2]);
    expect(registry.updates[2]?.downloadedBytes).toBe(1);
  });

  it("counts a stream it was not told about", async () => {
    const registry = recordingRegistry();
    const reporter = createProgressReporter("t-1", registry);

    reporter.report({ status: "downloading", downloadedBytes: 40, totalBytes: 100, filename: "/out/a.mp4" });
    reporter.report({ status: "downloading", downloadedBytes: 90, totalBytes: 100, filename: "/out/b.m4a" });
    await reporter.flush();

    expect(registry.updates.map((p) => p.percentage)).toEqual([40, 95]);
    expect(registry.updates[1]?.streamCount).toBe(2);
  });

  it("logs registry failures and keeps going", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const updateProgress = vi
      .fn<(id: string, progress: TaskProgress) => Promise<boolean>>()
      .mockRejectedValueOnce(new Error("write failed"))
      .mockResolvedValue(true);
    const reporter = createProgressReporter("t-1", { updateProgress });

    reporter.report({ status: "downloading", downloadedBytes: 1, totalBytes: 4 });
    reporter.report({ status: "downloading", downloadedBytes: 2, totalBytes: 4 });
    await expect(reporter.flush()).resolves.toBeUndefined();

    expect(updateProgress).toHaveBeenCalledTimes(2);
    expect(errorSpy).toHaveBeenCalledWith(
      "[progress] Failed to record progress for task t-1:",
      expect.any(Error)
    );
  });
});
