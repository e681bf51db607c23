/**
 * Task Controller
 * Handles HTTP requests for submitting downloads and reading task state.
 */

import { Request, Response, NextFunction } from "express";
import path from "path";
import type { DownloadDefaults } from "../config/init.js";
import type { DownloadOrchestrator } from "../jobs/orchestrators/downloadOrchestrator.js";
import type { SubmitDownloadBody } from "../middlewares/schemas/downloadSchemas.js";
import type { TaskRegistry } from "../services/business/taskRegistry.js";
import { getTaskFile } from "../services/business/taskFileService.js";
import type { Credentials } from "../types/task.js";
import { NotFoundError } from "../utils/errors.js";

export interface TaskControllerDeps {
  registry: TaskRegistry;
  orchestrator: DownloadOrchestrator;
  defaults: DownloadDefaults;
}

export function createTaskController({ registry, orchestrator, defaults }: TaskControllerDeps) {
  /**
   * POST /downloads
   * Submits a download. 202 for new work, 200 when an equivalent task exists.
   */
  async function submitDownload(
    req: Request<Record<string, string>, unknown, SubmitDownloadBody>,
    res: Response,
    next: NextFunction
  ): Promise<void> {
    try {
      const body = req.body;

      const outcome = await orchestrator.submit({
        url: body.url,
        outputPath: path.resolve(body.outputPath ?? defaults.outputPath),
        format: body.format ?? defaults.format,
        credentials: toCredentials(body),
      });

      res.status(outcome.created ? 202 : 200).json({
        message: outcome.created ? "Download task created and queued" : "An equivalent task already exists",
        taskId: outcome.taskId,
        status: outcome.task.status,
        created: outcome.created,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /tasks
   */
  function listTasks(_req: Request, res: Response): void {
    res.status(200).json(registry.list());
  }

  /**
   * GET /tasks/:id
   */
  function getTask(req: Request<{ id: string }>, res: Response, next: NextFunction): void {
    const task = registry.get(req.params.id);
    if (!task) {
      next(new NotFoundError("Task", req.params.id));
      return;
    }
    res.status(200).json(task);
  }

  /**
   * GET /tasks/:id/file
   * Streams the downloaded file of a completed task.
   */
  async function downloadTaskFile(
    req: Request<{ id: string }>,
    res: Response,
    next: NextFunction
  ): Promise<void> {
    try {
      const file = await getTaskFile(registry, req.params.id);

      res.download(file.path, file.filename, (error) => {
        if (error) next(error);
      });
    } catch (error) {
      next(error);
    }
  }

  return { submitDownload, listTasks, getTask, downloadTaskFile };
}

function toCredentials(body: SubmitDownloadBody): Credentials | undefined {
  if (body.cookies !== undefined) return { kind: "cookies", content: body.cookies };
  if (body.cookieFile !== undefined) return { kind: "cookieFile", path: body.cookieFile };
  if (body.cookiesFromBrowser !== undefined) return { kind: "cookiesFromBrowser", profile: body.cookiesFromBrowser };
  return undefined;
}
