/**
 * In-Process Dispatcher
 * FIFO queue with a fixed number of concurrent worker slots.
 */

import type { TaskDispatcher, TaskHandler } from "./types.js";

export interface InProcessDispatcherOptions {
  concurrency: number;
}

export class InProcessDispatcher implements TaskDispatcher {
  private handler: TaskHandler | null = null;
  private readonly queue: string[] = [];
  private active = 0;
  private closed = false;
  private idleWaiters: Array<() => void> = [];

  constructor(private readonly options: InProcessDispatcherOptions) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new Error(`Dispatcher concurrency must be a positive integer, got ${options.concurrency}`);
    }
  }

  start(handler: TaskHandler): void {
    this.handler = handler;
    console.log(`[dispatcher] In-process worker pool started (concurrency: ${this.options.concurrency})`);
  }

  async dispatch(taskId: string): Promise<void> {
    if (this.closed) {
      throw new Error("Dispatcher is closed");
    }
    if (!this.handler) {
      throw new Error("Dispatcher has no handler; call start() first");
    }

    this.queue.push(taskId);
    this.pump();
  }

  get activeCount(): number {
    return this.active;
  }

  get queuedCount(): number {
    return this.queue.length;
  }

  drain(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  async close(): Promise<void> {
    this.closed = true;
    await this.drain();
    console.log("[dispatcher] In-process worker pool closed");
  }

  private pump(): void {
    const handler = this.handler;
    if (!handler) return;

    while (this.active < this.options.concurrency && this.queue.length > 0) {
      const taskId = this.queue.shift();
      if (taskId === undefined) break;
      this.active++;
      void this.runSlot(handler, taskId);
    }
  }

  private async runSlot(handler: TaskHandler, taskId: string): Promise<void> {
    try {
      await handler(taskId);
    } catch (error) {
      console.error(`[dispatcher] ✗ Handler failed for task ${taskId}:`, error);
    } finally {
      this.active--;
      this.pump();
      if (this.isIdle()) this.notifyIdle();
    }
  }

  private isIdle(): boolean {
    return this.active === 0 && this.queue.length === 0;
  }

  private notifyIdle(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
