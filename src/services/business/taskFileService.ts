/**
 * Task File Service
 * Locates the downloaded file of a completed task.
 */

import { stat } from "fs/promises";
import type { TaskRegistry } from "./taskRegistry.js";
import { NotFoundError, TaskNotReadyError } from "../../utils/errors.js";

export interface TaskFile {
  path: string;
  filename: string;
}

/**
 * Throws NotFoundError for unknown tasks or files that are gone,
 * TaskNotReadyError for tasks that have not completed.
 */
export async function getTaskFile(registry: Pick<TaskRegistry, "get">, taskId: string): Promise<TaskFile> {
  const task = registry.get(taskId);
  if (!task) {
    throw new NotFoundError("Task", taskId);
  }

  if (task.status !== "completed" || !task.result) {
    throw new TaskNotReadyError(taskId, task.status);
  }

  const { filePath, filename } = task.result;
  const exists = await stat(filePath).then(
    (info) => info.isFile(),
    () => false
  );
  if (!exists) {
    throw new NotFoundError("Downloaded file for task", taskId);
  }

  return { path: filePath, filename };
}
