/**
 * Task Types
 * Shapes shared by the registry, the stores and the HTTP layer.
 * Schemas double as decoders for persisted rows.
 */

import { z } from "zod";

export const TASK_STATUSES = ["pending", "downloading", "completed", "failed"] as const;
export const taskStatusSchema = z.enum(TASK_STATUSES);
export type TaskStatus = z.infer<typeof taskStatusSchema>;

export const ERROR_KINDS = [
  "network",
  "authentication",
  "cookie_expired",
  "format_unavailable",
  "source_restricted",
  "filesystem",
  "unknown",
] as const;
export const errorKindSchema = z.enum(ERROR_KINDS);
export type ErrorKind = z.infer<typeof errorKindSchema>;

export const progressStageSchema = z.enum(["downloading", "finished", "error"]);
export type ProgressStage = z.infer<typeof progressStageSchema>;

export const taskProgressSchema = z.object({
  stage: progressStageSchema,
  percentage: z.number().min(0).max(100),
  downloadedBytes: z.number().optional(),
  totalBytes: z.number().optional(),
  totalIsEstimate: z.boolean().optional(),
  speedBytesPerSecond: z.number().optional(),
  etaSeconds: z.number().optional(),
  filename: z.string().optional(),
  fragmentIndex: z.number().optional(),
  fragmentCount: z.number().optional(),
  /** 1-based, set when more than one stream is downloaded (video + audio). */
  streamIndex: z.number().optional(),
  streamCount: z.number().optional(),
  formatted: z.object({
    downloaded: z.string(),
    total: z.string(),
    speed: z.string(),
    eta: z.string(),
    percentage: z.string(),
  }),
});
export type TaskProgress = z.infer<typeof taskProgressSchema>;

export const taskResultSchema = z.object({
  filePath: z.string(),
  filename: z.string(),
  title: z.string().nullable(),
  videoId: z.string().nullable(),
  ext: z.string().nullable(),
  extractor: z.string().nullable(),
  webpageUrl: z.string().nullable(),
  durationSeconds: z.number().nullable(),
  filesizeBytes: z.number().nullable(),
  formatId: z.string().nullable(),
  uploader: z.string().nullable(),
  thumbnail: z.string().nullable(),
});
export type TaskResult = z.infer<typeof taskResultSchema>;

export const errorRecordSchema = z.object({
  kind: errorKindSchema,
  message: z.string(),
  timestamp: z.string(),
  trace: z.string(),
  context: z.record(z.string()),
  retryPossible: z.boolean(),
  suggestions: z.array(z.string()),
});
export type ErrorRecord = z.infer<typeof errorRecordSchema>;

/** The dedup key: two requests with the same triple describe the same work. */
export interface TaskRequest {
  url: string;
  outputPath: string;
  format: string;
}

export interface Task extends TaskRequest {
  id: string;
  status: TaskStatus;
  progress?: TaskProgress;
  result?: TaskResult;
  error?: ErrorRecord;
  createdAt: string;
  updatedAt: string;
}

/** Status changes accepted by the registry. Outcome payloads travel with their status. */
export type StatusUpdate =
  | { status: "downloading" }
  | { status: "completed"; result: TaskResult }
  | { status: "failed"; error: ErrorRecord };

/** Per-request credential material, passed to yt-dlp untouched. */
export type Credentials =
  | { kind: "cookieFile"; path: string }
  | { kind: "cookies"; content: string }
  | { kind: "cookiesFromBrowser"; profile: string };

export function isTerminal(status: TaskStatus): boolean {
  return status === "completed" || status === "failed";
}

const ALLOWED_TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ["downloading", "failed"],
  downloading: ["completed", "failed"],
  completed: [],
  failed: [],
};

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function dedupKey(request: TaskRequest): string {
  return JSON.stringify([request.url, request.outputPath, request.format]);
}
