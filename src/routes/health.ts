/**
 * Health Check Routes
 * Infrastructure endpoints for monitoring and orchestration.
 */

import { Router } from "express";
import type { TaskRegistry } from "../services/business/taskRegistry.js";
import type { TaskStatus } from "../types/task.js";

export function createHealthRouter(registry: TaskRegistry): Router {
  const healthRouter = Router();

  /** Simple health check endpoint. */
  healthRouter.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  /** Readiness check with task counts. Only mounted after initialization finished. */
  healthRouter.get("/ready", (_req, res) => {
    const counts: Record<TaskStatus, number> = { pending: 0, downloading: 0, completed: 0, failed: 0 };
    for (const task of registry.list()) {
      counts[task.status]++;
    }
    res.json({ ready: true, tasks: counts });
  });

  return healthRouter;
}
