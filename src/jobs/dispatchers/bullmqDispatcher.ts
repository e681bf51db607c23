/**
 * BullMQ Dispatcher
 * Queues task ids in Redis and runs them on an in-process BullMQ worker.
 *
 * The worker has to live in the API process: the task registry it updates is
 * in-process memory.
 */

import { Queue, Worker, type Job } from "bullmq";
import type { Redis } from "ioredis";
import { setTimeout as sleep } from "timers/promises";
import type { TaskDispatcher, TaskHandler } from "./types.js";

export const DOWNLOAD_QUEUE_NAME = "downloads";
const DRAIN_POLL_MS = 1000;

export interface DownloadJobData {
  taskId: string;
}

export interface BullmqDispatcherOptions {
  connection: Redis;
  concurrency: number;
  queueName?: string;
}

export class BullmqDispatcher implements TaskDispatcher {
  private readonly queue: Queue<DownloadJobData>;
  private worker: Worker<DownloadJobData> | null = null;
  private readonly queueName: string;

  constructor(private readonly options: BullmqDispatcherOptions) {
    this.queueName = options.queueName ?? DOWNLOAD_QUEUE_NAME;
    this.queue = new Queue<DownloadJobData>(this.queueName, { connection: options.connection });
  }

  start(handler: TaskHandler): void {
    const worker = new Worker<DownloadJobData>(
      this.queueName,
      async (job: Job<DownloadJobData>) => {
        await handler(job.data.taskId);
      },
      {
        connection: this.options.connection,
        concurrency: this.options.concurrency,
        lockDuration: 600000, // 10 minutes
        lockRenewTime: 60000,
      }
    );

    worker.on("active", (job) => {
      console.log(`[dispatcher] Job became active: ${job.id}`);
    });

    worker.on("completed", (job) => {
      console.log(`[dispatcher] ✓ completed ${job.id}`);
    });

    worker.on("failed", (job, err) => {
      console.error(`[dispatcher] ✗ failed ${job?.id}`, err);
    });

    worker.on("error", (err) => {
      console.error("[dispatcher] Worker error:", err);
    });

    this.worker = worker;
    console.log(`[dispatcher] BullMQ worker started for queue '${this.queueName}' (concurrency: ${this.options.concurrency})`);
  }

  async dispatch(taskId: string): Promise<void> {
    if (!this.worker) {
      throw new Error("Dispatcher has no worker; call start() first");
    }

    // One attempt only: a failed download is a failed task, resubmission creates a new one.
    await this.queue.add(
      "download",
      { taskId },
      {
        jobId: taskId,
        attempts: 1,
        removeOnComplete: { age: 86400, count: 1000 },
        removeOnFail: { age: 86400, count: 100 },
      }
    );

    console.log(`[dispatcher] Task ${taskId} enqueued on '${this.queueName}'`);
  }

  async drain(): Promise<void> {
    while ((await this.pendingJobs()) > 0) {
      await sleep(DRAIN_POLL_MS);
    }
  }

  async close(): Promise<void> {
    // Worker.close() waits for active jobs to finish.
    await this.worker?.close();
    await this.queue.close();
    console.log(`[dispatcher] BullMQ queue '${this.queueName}' closed`);
  }

  private async pendingJobs(): Promise<number> {
    const counts = await this.queue.getJobCounts("waiting", "active", "delayed");
    return (counts.waiting ?? 0) + (counts.active ?? 0) + (counts.delayed ?? 0);
  }
}
