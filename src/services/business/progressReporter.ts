/**
 * Progress Reporter
 * Normalizes engine progress events into task progress snapshots and forwards
 * them to the registry in emission order.
 */

import type { EngineProgressEvent } from "../../types/engine.js";
import type { TaskProgress } from "../../types/task.js";
import { formatBytes, formatEta, formatPercentage, formatSpeed } from "../../utils/format.js";
import type { TaskRegistry } from "./taskRegistry.js";

const UNKNOWN = "unknown";

/** Only a completed task shows 100; merging and post-processing still follow the last stream. */
export const MAX_RUNNING_PERCENTAGE = 99.9;

export interface ProgressReporter {
  /** Engine callback. Never throws. */
  report(event: EngineProgressEvent): void;
  /** Resolves once every reported update has been written to the registry. */
  flush(): Promise<void>;
}

/** Which of the requested streams (video, audio) is downloading. Zero-based. */
export interface StreamPosition {
  index: number;
  count: number;
}

export function createProgressReporter(
  taskId: string,
  registry: Pick<TaskRegistry, "updateProgress">
): ProgressReporter {
  let previousPercentage = 0;
  let currentFile: string | undefined;
  const stream: StreamPosition = { index: 0, count: 1 };
  let queue: Promise<void> = Promise.resolve();

  return {
    report(event) {
      if (event.streamCount !== undefined) {
        stream.count = Math.max(stream.count, event.streamCount);
      }
      // Each stream is written to its own file; a new name means the next stream started.
      if (event.filename !== undefined) {
        if (currentFile !== undefined && event.filename !== currentFile) {
          stream.index++;
          stream.count = Math.max(stream.count, stream.index + 1);
        }
        currentFile = event.filename;
      }

      const progress = normalizeProgress(event, previousPercentage, stream);
      previousPercentage = progress.percentage;

      queue = queue
        .then(async () => {
          await registry.updateProgress(taskId, progress);
        })
        .catch((error) => {
          console.error(`[progress] Failed to record progress for task ${taskId}:`, error);
        });
    },
    flush() {
      return queue;
    },
  };
}

/**
 * Builds a snapshot from one engine event.
 * The percentage covers every requested stream, defaults to 0, never drops
 * below `previousPercentage` and stays under 100 while the task runs.
 * Unknown counters stay absent.
 */
export function normalizeProgress(
  event: EngineProgressEvent,
  previousPercentage = 0,
  stream: StreamPosition = { index: 0, count: 1 }
): TaskProgress {
  const totalBytes = event.totalBytes ?? event.totalBytesEstimate;
  const totalIsEstimate = event.totalBytes === undefined && event.totalBytesEstimate !== undefined;

  const streamPercentage = event.status === "finished" ? 100 : clamp(computePercentage(event, totalBytes), 0, 100);
  const count = Math.max(1, stream.count);
  const index = clamp(stream.index, 0, count - 1);
  const overall = (index * 100 + streamPercentage) / count;
  const percentage = round1(Math.max(previousPercentage, clamp(overall, 0, MAX_RUNNING_PERCENTAGE)));

  const progress: TaskProgress = {
    stage: event.status,
    percentage,
    formatted: {
      downloaded: event.downloadedBytes !== undefined ? formatBytes(event.downloadedBytes) : UNKNOWN,
      total: totalBytes !== undefined ? formatBytes(totalBytes) : UNKNOWN,
      speed: event.speed !== undefined ? formatSpeed(event.speed) : UNKNOWN,
      eta: event.eta !== undefined ? formatEta(event.eta) : UNKNOWN,
      percentage: formatPercentage(percentage),
    },
  };

  if (event.downloadedBytes !== undefined) progress.downloadedBytes = event.downloadedBytes;
  if (totalBytes !== undefined) {
    progress.totalBytes = totalBytes;
    progress.totalIsEstimate = totalIsEstimate;
  }
  if (event.speed !== undefined) progress.speedBytesPerSecond = event.speed;
  if (event.eta !== undefined) progress.etaSeconds = event.eta;
  if (event.filename !== undefined) progress.filename = event.filename;
  if (event.fragmentIndex !== undefined) progress.fragmentIndex = event.fragmentIndex;
  if (event.fragmentCount !== undefined) progress.fragmentCount = event.fragmentCount;
  if (count > 1) {
    progress.streamIndex = index + 1;
    progress.streamCount = count;
  }

  return progress;
}

function computePercentage(event: EngineProgressEvent, totalBytes: number | undefined): number {
  if (event.downloadedBytes !== undefined && totalBytes !== undefined && totalBytes > 0) {
    return (event.downloadedBytes / totalBytes) * 100;
  }
  if (event.fragmentIndex !== undefined && event.fragmentCount !== undefined && event.fragmentCount > 0) {
    return (event.fragmentIndex / event.fragmentCount) * 100;
  }
  return 0;
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
