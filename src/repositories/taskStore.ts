/**
 * Task Store
 * Durable mirror of the task registry. One row per task, keyed by id.
 */

import { z } from "zod";
import {
  errorRecordSchema,
  taskProgressSchema,
  taskResultSchema,
  taskStatusSchema,
  type Task,
} from "../types/task.js";

export interface TaskStore {
  /** Ensures the tasks table exists (or is reachable). */
  init(): Promise<void>;
  /** Reads every decodable row. Malformed rows are skipped with a warning. */
  loadAll(): Promise<Task[]>;
  /** Inserts or replaces the row for task.id in one statement. Throws on failure. */
  upsert(task: Task): Promise<void>;
  close(): Promise<void>;
}

/** Column layout shared by the SQLite table and the Postgres migration. */
export const taskRecordSchema = z
  .object({
    id: z.string().min(1),
    url: z.string(),
    output_path: z.string(),
    format: z.string(),
    status: taskStatusSchema,
    progress: taskProgressSchema.nullable(),
    result: taskResultSchema.nullable(),
    error: errorRecordSchema.nullable(),
    created_at: z.string(),
    updated_at: z.string(),
  })
  .superRefine((record, ctx) => {
    if (record.result && record.error) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "result and error are both set" });
    }
    if (record.status === "completed" && !record.result) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "completed task has no result" });
    }
    if (record.status === "failed" && !record.error) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "failed task has no error" });
    }
  });

export type TaskRecord = z.infer<typeof taskRecordSchema>;

export function toTaskRecord(task: Task): TaskRecord {
  return {
    id: task.id,
    url: task.url,
    output_path: task.outputPath,
    format: task.format,
    status: task.status,
    progress: task.progress ?? null,
    result: task.result ?? null,
    error: task.error ?? null,
    created_at: task.createdAt,
    updated_at: task.updatedAt,
  };
}

export function fromTaskRecord(record: TaskRecord): Task {
  const task: Task = {
    id: record.id,
    url: record.url,
    outputPath: record.output_path,
    format: record.format,
    status: record.status,
    createdAt: record.created_at,
    updatedAt: record.updated_at,
  };
  if (record.progress) task.progress = record.progress;
  if (record.result) task.result = record.result;
  if (record.error) task.error = record.error;
  return task;
}

/**
 * Decodes raw rows, dropping the ones that fail validation.
 */
export function decodeTaskRecords(rows: readonly unknown[], logPrefix: string): Task[] {
  const tasks: Task[] = [];

  for (const row of rows) {
    const parsed = taskRecordSchema.safeParse(row);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "row"}: ${issue.message}`);
      console.warn(`${logPrefix} Skipping malformed task row ${describeRowId(row)}: ${issues.join("; ")}`);
      continue;
    }
    tasks.push(fromTaskRecord(parsed.data));
  }

  return tasks;
}

function describeRowId(row: unknown): string {
  if (typeof row === "object" && row !== null && "id" in row && typeof row.id === "string") {
    return `'${row.id}'`;
  }
  return "(no id)";
}
