/**
 * Route Aggregator
 * Combines all routers into a single router.
 */

import { Router } from "express";
import type { AppContext } from "../config/init.js";
import { createHealthRouter } from "./health.js";
import { createTasksRouter } from "./tasks.js";
import { createVideosRouter } from "./videos.js";

export type RouterDeps = Pick<AppContext, "registry" | "orchestrator" | "defaults">;

export function createRouter(deps: RouterDeps): Router {
  const router = Router();

  /** Register all route modules */
  router.use(createHealthRouter(deps.registry));
  router.use(createTasksRouter(deps));
  router.use("/videos", createVideosRouter(deps.orchestrator));

  return router;
}
