/**
 * Video Controller
 * Metadata lookups that go straight to the download engine.
 */

import { Request, Response, NextFunction } from "express";
import type { DownloadOrchestrator } from "../jobs/orchestrators/downloadOrchestrator.js";
import { videoQuerySchema } from "../middlewares/schemas/downloadSchemas.js";
import { parseQuery } from "../middlewares/validation.js";

export function createVideoController(orchestrator: DownloadOrchestrator) {
  /**
   * GET /videos/info?url=
   */
  async function getVideoInfo(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { url } = parseQuery(videoQuerySchema, req.query);
      res.status(200).json(await orchestrator.getInfo(url));
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /videos/formats?url=
   */
  async function listVideoFormats(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { url } = parseQuery(videoQuerySchema, req.query);
      res.status(200).json(await orchestrator.listFormats(url));
    } catch (error) {
      next(error);
    }
  }

  return { getVideoInfo, listVideoFormats };
}
