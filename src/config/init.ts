/**
 * Application Initialization
 * Builds every service once and wires them together, then restores task state.
 */

import { BullmqDispatcher } from "../jobs/dispatchers/bullmqDispatcher.js";
import { InProcessDispatcher } from "../jobs/dispatchers/inProcessDispatcher.js";
import type { TaskDispatcher } from "../jobs/dispatchers/types.js";
import { DownloadOrchestrator } from "../jobs/orchestrators/downloadOrchestrator.js";
import { SqliteTaskStore } from "../repositories/sqliteTaskStore.js";
import { SupabaseTaskStore } from "../repositories/supabaseTaskStore.js";
import type { TaskStore } from "../repositories/taskStore.js";
import { ErrorClassifier } from "../services/business/errorClassifier.js";
import { TaskRegistry } from "../services/business/taskRegistry.js";
import { CredentialManager, writeDefaultCookieFile } from "../services/external/credentials.js";
import { YtDlpEngine } from "../services/external/ytdlp.js";
import {
  DATA_DIR,
  DATABASE_FILE,
  DEFAULT_FORMAT,
  DOWNLOAD_CONCURRENCY,
  DOWNLOAD_DIR,
  QUEUE_DRIVER,
  TASK_STORE,
  YTDLP_COOKIES,
  YTDLP_COOKIES_FILE,
  YTDLP_PATH,
  getRedisUrl,
  getSupabaseEnv,
} from "./env.js";
import { createRedisConnection } from "./redis.js";
import { createSupabaseClient } from "./supabase.js";

export interface AppContext {
  store: TaskStore;
  registry: TaskRegistry;
  orchestrator: DownloadOrchestrator;
  dispatcher: TaskDispatcher;
  defaults: DownloadDefaults;
}

export interface DownloadDefaults {
  outputPath: string;
  format: string;
}

/**
 * Initializes application dependencies on startup.
 */
export async function initializeApp(): Promise<AppContext> {
  console.log("[init] Initializing application...");

  try {
    const store = createTaskStore();
    await store.init();

    const registry = new TaskRegistry(store);
    await registry.load();

    const credentials = new CredentialManager({ defaultCookieFile: await resolveDefaultCookieFile() });
    await credentials.cleanupStale();

    const dispatcher = createDispatcher();
    const orchestrator = new DownloadOrchestrator({
      registry,
      engine: new YtDlpEngine(YTDLP_PATH),
      classifier: new ErrorClassifier(),
      dispatcher,
      credentials,
    });

    await orchestrator.recoverInterrupted();
    orchestrator.start();

    console.log(`[init] ✓ Application initialized (store: ${TASK_STORE}, queue: ${QUEUE_DRIVER})\n`);

    return {
      store,
      registry,
      orchestrator,
      dispatcher,
      defaults: { outputPath: DOWNLOAD_DIR, format: DEFAULT_FORMAT },
    };
  } catch (error) {
    console.error("[init] ✗ Application initialization failed:", error);
    throw error;
  }
}

function createTaskStore(): TaskStore {
  if (TASK_STORE === "supabase") {
    const { url, serviceRoleKey } = getSupabaseEnv();
    return new SupabaseTaskStore(createSupabaseClient(url, serviceRoleKey));
  }
  return new SqliteTaskStore(DATABASE_FILE);
}

function createDispatcher(): TaskDispatcher {
  if (QUEUE_DRIVER === "redis") {
    return new BullmqDispatcher({
      connection: createRedisConnection(getRedisUrl()),
      concurrency: DOWNLOAD_CONCURRENCY,
    });
  }
  return new InProcessDispatcher({ concurrency: DOWNLOAD_CONCURRENCY });
}

async function resolveDefaultCookieFile(): Promise<string | undefined> {
  if (YTDLP_COOKIES) {
    return writeDefaultCookieFile(YTDLP_COOKIES, DATA_DIR);
  }
  if (YTDLP_COOKIES_FILE) {
    console.log(`[init] Using default cookie file ${YTDLP_COOKIES_FILE}`);
    return YTDLP_COOKIES_FILE;
  }
  console.log("[init] No default cookies configured - running without authentication");
  return undefined;
}
