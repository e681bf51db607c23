import express, { type Express } from "express";
import helmet from "helmet";
import cors from "cors";
import { createRouter, type RouterDeps } from "./routes/index.js";
import { apiLimiter } from "./middlewares/rateLimiting.js";
import { errorHandler } from "./middlewares/errorHandler.js";

/**
 * Builds the Express application around already-initialized services.
 * Configures global middleware and routes.
 */
export function createApp(deps: RouterDeps): Express {
  const app = express();

  /** Disable the X-Powered-By header to reduce fingerprinting. */
  app.disable("x-powered-by");

  /** Adds standard security headers. */
  app.use(helmet());
  /** Enables CORS so a browser UI on another origin can poll. */
  app.use(cors());
  /** Parses JSON request bodies; cookie text can be large. */
  app.use(express.json({ limit: "1mb" }));

  /** Rate limiting for all routes. */
  app.use(apiLimiter);

  /** Application routes. */
  app.use(createRouter(deps));

  /** Global error handler - MUST be last. */
  app.use(errorHandler);

  return app;
}
