/**
 * Task Registry
 * Authoritative in-memory map of task id → task, mirrored to a TaskStore.
 *
 * Every mutation is applied to the map first and then written through to the
 * store before the call resolves. Store failures are logged and swallowed: the
 * running process keeps serving from memory.
 */

import { randomUUID } from "crypto";
import type { TaskStore } from "../../repositories/taskStore.js";
import {
  canTransition,
  dedupKey,
  isTerminal,
  type StatusUpdate,
  type Task,
  type TaskProgress,
  type TaskRequest,
} from "../../types/task.js";

export interface SubmitResult {
  task: Task;
  created: boolean;
}

export class TaskRegistry {
  private readonly tasks = new Map<string, Task>();
  /** dedup key → id of the newest task created for that key */
  private readonly keyIndex = new Map<string, string>();

  constructor(
    private readonly store: TaskStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Repopulates the map from the store. Called once at startup.
   */
  async load(): Promise<number> {
    const tasks = await this.store.loadAll();

    for (const task of tasks) {
      this.tasks.set(task.id, task);
      this.indexTask(task);
    }

    console.log(`[registry] Loaded ${tasks.length} task(s) from store`);
    return tasks.length;
  }

  /**
   * Returns the existing task for an equivalent request unless it failed;
   * otherwise creates a pending task.
   *
   * Lookup and insert run before the first await, so two submits of the same
   * key can never both create a task.
   */
  async submit(request: TaskRequest): Promise<SubmitResult> {
    const existing = this.findByKey(request);
    if (existing) {
      return { task: existing, created: false };
    }

    const timestamp = this.timestamp();
    const task: Task = {
      id: randomUUID(),
      url: request.url,
      outputPath: request.outputPath,
      format: request.format,
      status: "pending",
      createdAt: timestamp,
      updatedAt: timestamp,
    };

    this.tasks.set(task.id, task);
    this.keyIndex.set(dedupKey(task), task.id);
    console.log(`[registry] Created task ${task.id} for ${task.url}`);

    await this.persist(task);
    return { task: snapshot(task), created: true };
  }

  /**
   * Active (non-failed) task for the request's dedup key, if any.
   */
  findByKey(request: TaskRequest): Task | undefined {
    const id = this.keyIndex.get(dedupKey(request));
    const task = id ? this.tasks.get(id) : undefined;
    if (!task || task.status === "failed") {
      return undefined;
    }
    return snapshot(task);
  }

  get(id: string): Task | undefined {
    const task = this.tasks.get(id);
    return task ? snapshot(task) : undefined;
  }

  list(): Task[] {
    return Array.from(this.tasks.values(), snapshot);
  }

  /**
   * Replaces the progress snapshot. Ignored for unknown or finished tasks.
   */
  async updateProgress(id: string, progress: TaskProgress): Promise<boolean> {
    const task = this.tasks.get(id);
    if (!task || isTerminal(task.status)) {
      return false;
    }

    task.progress = { ...progress, formatted: { ...progress.formatted } };
    task.updatedAt = this.timestamp();

    await this.persist(task);
    return true;
  }

  /**
   * Moves a task along pending → downloading → completed | failed.
   * Unknown ids and backward or repeated transitions are rejected.
   */
  async updateStatus(id: string, update: StatusUpdate): Promise<boolean> {
    const task = this.tasks.get(id);
    if (!task) {
      console.warn(`[registry] Ignoring status '${update.status}' for unknown task ${id}`);
      return false;
    }

    if (!canTransition(task.status, update.status)) {
      console.warn(`[registry] Invalid transition for task ${id}: ${task.status} → ${update.status}`);
      return false;
    }

    task.status = update.status;
    switch (update.status) {
      case "downloading":
        break;
      case "completed":
        task.result = update.result;
        delete task.error;
        if (task.progress) {
          task.progress = finishedProgress(task.progress);
        }
        break;
      case "failed":
        task.error = update.error;
        delete task.result;
        delete task.progress;
        break;
    }
    task.updatedAt = this.timestamp();

    await this.persist(task);
    return true;
  }

  private indexTask(task: Task): void {
    const key = dedupKey(task);
    const currentId = this.keyIndex.get(key);
    const current = currentId ? this.tasks.get(currentId) : undefined;

    // Prefer an active task over a failed one; otherwise the newest wins.
    if (!current || current.status === "failed" || task.status !== "failed") {
      this.keyIndex.set(key, task.id);
    }
  }

  private async persist(task: Task): Promise<void> {
    try {
      await this.store.upsert(task);
    } catch (error) {
      console.error(`[registry] Failed to persist task ${task.id} (status ${task.status}):`, error);
    }
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}

function snapshot(task: Task): Task {
  return structuredClone(task);
}

function finishedProgress(progress: TaskProgress): TaskProgress {
  return {
    ...progress,
    stage: "finished",
    percentage: 100,
    etaSeconds: 0,
    ...(progress.streamCount !== undefined ? { streamIndex: progress.streamCount } : {}),
    formatted: { ...progress.formatted, eta: "00:00", percentage: "100.0%" },
  };
}
