/**
 * Environment Configuration
 * Validates and exports type-safe environment variables.
 * Fails fast at startup if a value is malformed; variables needed only by
 * an optional backend are read through the getters below.
 */

import path from "path";

export const TASK_STORES = ["sqlite", "supabase"] as const;
export type TaskStoreDriver = (typeof TASK_STORES)[number];

export const QUEUE_DRIVERS = ["memory", "redis"] as const;
export type QueueDriver = (typeof QUEUE_DRIVERS)[number];

/** Server configuration */
export const PORT = parseInt(process.env.PORT || "3000", 10);
export const NODE_ENV = process.env.NODE_ENV || "development";

/** Storage locations */
export const DATA_DIR = path.resolve(process.env.DATA_DIR || "./data");
export const DOWNLOAD_DIR = path.resolve(process.env.DOWNLOAD_DIR || "./downloads");
export const DATABASE_FILE = process.env.DATABASE_FILE || path.join(DATA_DIR, "tasks.db");

/** Download defaults */
export const DEFAULT_FORMAT = process.env.DEFAULT_FORMAT || "bestvideo+bestaudio/best";
export const DOWNLOAD_CONCURRENCY = getPositiveIntEnv("DOWNLOAD_CONCURRENCY", 3);

/** yt-dlp binary and default credentials */
export const YTDLP_PATH = process.env.YTDLP_PATH || "yt-dlp";
export const YTDLP_COOKIES = process.env.YTDLP_COOKIES;
export const YTDLP_COOKIES_FILE = process.env.YTDLP_COOKIES_FILE;

/** Backends */
export const TASK_STORE: TaskStoreDriver = getChoiceEnv("TASK_STORE", TASK_STORES, "sqlite");
export const QUEUE_DRIVER: QueueDriver = getChoiceEnv("QUEUE_DRIVER", QUEUE_DRIVERS, "memory");

/** Supabase configuration (TASK_STORE=supabase) */
export function getSupabaseEnv(): { url: string; serviceRoleKey: string } {
  return {
    url: getRequiredEnv("SUPABASE_URL"),
    serviceRoleKey: getRequiredEnv("SUPABASE_SERVICE_ROLE_KEY"),
  };
}

/** Redis configuration (QUEUE_DRIVER=redis) */
export function getRedisUrl(): string {
  return getRequiredEnv("REDIS_URL");
}

/**
 * Helper to safely retrieve required environment variables.
 * Throws immediately if variable is missing.
 */
function getRequiredEnv(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getChoiceEnv<T extends string>(key: string, choices: readonly T[], fallback: T): T {
  const value = process.env[key];
  if (!value) return fallback;

  const match = choices.find((choice) => choice === value);
  if (!match) {
    throw new Error(`Invalid ${key}: '${value}' (expected one of ${choices.join(", ")})`);
  }
  return match;
}

function getPositiveIntEnv(key: string, fallback: number): number {
  const value = process.env[key];
  if (!value) return fallback;

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`Invalid ${key}: '${value}' (expected a positive integer)`);
  }
  return parsed;
}
