/**
 * Task Routes
 * Download submission, task status and file retrieval.
 */

import { Router } from "express";
import { createTaskController, type TaskControllerDeps } from "../controllers/taskController.js";
import { strictLimiter } from "../middlewares/rateLimiting.js";
import { submitDownloadSchema } from "../middlewares/schemas/downloadSchemas.js";
import { validateBody } from "../middlewares/validation.js";

export function createTasksRouter(deps: TaskControllerDeps): Router {
  const tasksRouter = Router();
  const controller = createTaskController(deps);

  /** Submit a download (deduplicated) */
  tasksRouter.post("/downloads", strictLimiter, validateBody(submitDownloadSchema), controller.submitDownload);

  /** List all tasks */
  tasksRouter.get("/tasks", controller.listTasks);

  /** Get a task snapshot */
  tasksRouter.get("/tasks/:id", controller.getTask);

  /** Download the file of a completed task */
  tasksRouter.get("/tasks/:id/file", controller.downloadTaskFile);

  return tasksRouter;
}
