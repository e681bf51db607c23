import { beforeEach, describe, expect, it, vi } from "vitest";
import { TaskRegistry } from "../../src/services/business/taskRegistry.js";
import type { ErrorRecord, TaskProgress, TaskRequest } from "../../src/types/task.js";
import { MemoryTaskStore, makeResult, makeTask } from "../helpers/fakes.js";

const request: TaskRequest = { url: "https://example.com/v1", outputPath: "/out", format: "best" };

const failure: ErrorRecord = {
  kind: "network",
  message: "connection reset",
  timestamp: "2026-01-01T00:00:00.000Z",
  trace: "Error: connection reset",
  context: {},
  retryPossible: true,
  suggestions: ["Retry the download in a few minutes"],
};

const halfway: TaskProgress = {
  stage: "downloading",
  percentage: 50,
  downloadedBytes: 50,
  totalBytes: 100,
  totalIsEstimate: false,
  etaSeconds: 12,
  formatted: { downloaded: "50B", total: "100B", speed: "unknown", eta: "00:12", percentage: "50.0%" },
};

function steppingClock(start = Date.parse("2026-01-01T00:00:00.000Z")): () => Date {
  let tick = 0;
  return () => new Date(start + 1000 * tick++);
}

describe("TaskRegistry", () => {
  let store: MemoryTaskStore;
  let registry: TaskRegistry;

  beforeEach(() => {
    store = new MemoryTaskStore();
    registry = new TaskRegistry(store, steppingClock());
  });

  describe("submit", () => {
    it("creates a pending task and writes it through", async () => {
      const { task, created } = await registry.submit(request);

      expect(created).toBe(true);
      expect(task).toMatchObject({ ...request, status: "pending" });
      expect(task.id).toMatch(/^[0-9a-f-]{36}$/);
      expect(store.records.get(task.id)?.status).toBe("pending");
    });

    it("returns the same task for an equivalent request", async () => {
      const first = await registry.submit(request);
      const second = await registry.submit({ ...request });

      expect(second.created).toBe(false);
      expect(second.task.id).toBe(first.task.id);
      expect(registry.list()).toHaveLength(1);
    });

    it("treats a different format as different work", async () => {
      const first = await registry.submit(request);
      const second = await registry.submit({ ...request, format: "worst" });

      expect(second.created).toBe(true);
      expect(second.task.id).not.toBe(first.task.id);
    });

    it("creates exactly one task for concurrent equivalent submits", async () => {
      const results = await Promise.all([registry.submit(request), registry.submit(request), registry.submit(request)]);

      expect(new Set(results.map((r) => r.task.id)).size).toBe(1);
      expect(results.filter((r) => r.created)).toHaveLength(1);
    });

    it("creates a fresh task once the previous one failed", async () => {
      const first = await registry.submit(request);
      await registry.updateStatus(first.task.id, { status: "failed", error: failure });

      const second = await registry.submit(request);

      expect(second.created).toBe(true);
      expect(second.task.id).not.toBe(first.task.id);
      expect(registry.get(first.task.id)?.status).toBe("failed");
    });

    it("keeps returning a completed task", async () => {
      const first = await registry.submit(request);
      await registry.updateStatus(first.task.id, { status: "downloading" });
      await registry.updateStatus(first.task.id, { status: "completed", result: makeResult() });

      const second = await registry.submit(request);

      expect(second.created).toBe(false);
      expect(second.task.id).toBe(first.task.id);
      expect(second.task.status).toBe("completed");
    });
  });

  describe("updateStatus", () => {
    it("follows pending → downloading → completed", async () => {
      const { task } = await registry.submit(request);

      expect(await registry.updateStatus(task.id, { status: "downloading" })).toBe(true);
      expect(await registry.updateStatus(task.id, { status: "completed", result: makeResult() })).toBe(true);

      const stored = registry.get(task.id);
      expect(stored?.status).toBe("completed");
      expect(stored?.result?.filename).toBe("Sample Clip [abc123].mp4");
      expect(stored?.error).toBeUndefined();
      expect(store.records.get(task.id)?.status).toBe("completed");
    });

    it("rejects skipping the downloading state", async () => {
      const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
      const { task } = await registry.submit(request);

      expect(await registry.updateStatus(task.id, { status: "completed", result: makeResult() })).toBe(false);
      expect(registry.get(task.id)?.status).toBe("pending");
      expect(warnSpy).toHaveBeenCalledOnce();
    });

    it("never leaves a terminal state", async () => {
      vi.spyOn(console, "warn").mockImplementation(() => {});
      const { task } = await registry.submit(request);
      await registry.updateStatus(task.id, { status: "downloading" });
      await registry.updateStatus(task.id, { status: "completed", result: makeResult() });

      expect(await registry.updateStatus(task.id, { status: "failed", error: failure })).toBe(false);
      expect(await registry.updateStatus(task.id, { status: "downloading" })).toBe(false);

      const stored = registry.get(task.id);
      expect(stored?.status).toBe("completed");
      expect(stored?.error).toBeUndefined();
    });

    it("allows failing a task that never started", async () => {
      const { task } = await registry.submit(request);

      expect(await registry.updateStatus(task.id, { status: "failed", error: failure })).toBe(true);
      expect(registry.get(task.id)?.error?.kind).toBe("network");
    });

    it("finalizes progress on completion", async () => {
      const { task } = await registry.submit(request);
      await registry.updateStatus(task.id, { status: "downloading" });
      await registry.updateProgress(task.id, halfway);
      await registry.updateStatus(task.id, { status: "completed", result: makeResult() });

      expect(registry.get(task.id)?.progress).toEqual({
        ...halfway,
        stage: "finished",
        percentage: 100,
        etaSeconds: 0,
        formatted: { ...halfway.formatted, eta: "00:00", percentage: "100.0%" },
      });
    });

    it("clears progress and result on failure", async () => {
      const { task } = await registry.submit(request);
      await registry.updateStatus(task.id, { status: "downloading" });
      await registry.updateProgress(task.id, halfway);
      await registry.updateStatus(task.id, { status: "failed", error: failure });

      const stored = registry.get(task.id);
      expect(stored?.progress).toBeUndefined();
      expect(stored?.result).toBeUndefined();
      expect(stored?.error).toEqual(failure);
    });

    it("ignores unknown ids without creating a task", async () => {
      vi.spyOn(console, "warn").mockImplementation(() => {});

      expect(await registry.updateStatus("missing", { status: "downloading" })).toBe(false);
      expect(registry.list()).toEqual([]);
      expect(store.upserts).toBe(0);
    });

    it("advances updatedAt on every change", async () => {
      const { task } = await registry.submit(request);
      await registry.updateStatus(task.id, { status: "downloading" });

      const stored = registry.get(task.id);
      expect(stored?.createdAt).toBe("2026-01-01T00:00:00.000Z");
      expect(stored?.updatedAt).toBe("2026-01-01T00:00:01.000Z");
    });
  });

  describe("updateProgress", () => {
    it("ignores unknown and finished tasks", async () => {
      const { task } = await registry.submit(request);
      await registry.updateStatus(task.id, { status: "failed", error: failure });

      expect(await registry.updateProgress("missing", halfway)).toBe(false);
      expect(await registry.updateProgress(task.id, halfway)).toBe(false);
      expect(registry.get(task.id)?.progress).toBeUndefined();
    });
  });

  it("hands out copies", async () => {
    const { task } = await registry.submit(request);
    const copy = registry.get(task.id);
    if (!copy) throw new Error("task missing");

    copy.status = "completed";
    copy.url = "https://example.com/other";

    expect(registry.get(task.id)).toMatchObject({ status: "pending", url: request.url });
  });

  it("keeps serving from memory when the store fails", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    store.failUpserts = true;

    const { task, created } = await registry.submit(request);

    expect(created).toBe(true);
    expect(registry.get(task.id)?.status).toBe("pending");
    expect(await registry.updateStatus(task.id, { status: "downloading" })).toBe(true);
    expect(errorSpy).toHaveBeenCalledTimes(2);
    expect(store.records.size).toBe(0);
  });

  describe("load", () => {
    it("restores tasks and their dedup keys", async () => {
      const failed = makeTask({
        id: "00000000-0000-4000-8000-00000000000a",
        status: "failed",
        error: failure,
      });
      const completed = makeTask({
        id: "00000000-0000-4000-8000-00000000000b",
        status: "completed",
        result: makeResult(),
        createdAt: "2026-01-01T00:05:00.000Z",
      });
      const restored = new TaskRegistry(new MemoryTaskStore([completed, failed]));

      expect(await restored.load()).toBe(2);
      expect(restored.findByKey(request)?.id).toBe(completed.id);

      const { task, created } = await restored.submit(request);
      expect(created).toBe(false);
      expect(task.id).toBe(completed.id);
    });

    it("does not reuse a restored failed task", async () => {
      const failed = makeTask({ status: "failed", error: failure });
      const restored = new TaskRegistry(new MemoryTaskStore([failed]));
      await restored.load();

      expect(restored.findByKey(request)).toBeUndefined();
      expect((await restored.submit(request)).created).toBe(true);
    });
  });
});
