/**
 * Video Routes
 * Metadata lookups without creating a task.
 */

import { Router } from "express";
import { createVideoController } from "../controllers/videoController.js";
import type { DownloadOrchestrator } from "../jobs/orchestrators/downloadOrchestrator.js";

export function createVideosRouter(orchestrator: DownloadOrchestrator): Router {
  const videosRouter = Router();
  const controller = createVideoController(orchestrator);

  videosRouter.get("/info", controller.getVideoInfo);
  videosRouter.get("/formats", controller.listVideoFormats);

  return videosRouter;
}
