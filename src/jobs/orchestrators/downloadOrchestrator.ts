/**
 * Download Orchestrator
 * Owns the task lifecycle: admit → dedupe → dispatch → download → complete | fail.
 *
 * Engine failures never escape run(); they are classified and stored on the task.
 */

import type { CredentialManager, PreparedCredentials } from "../../services/external/credentials.js";
import type { ErrorClassifier } from "../../services/business/errorClassifier.js";
import { createProgressReporter, type ProgressReporter } from "../../services/business/progressReporter.js";
import type { TaskRegistry } from "../../services/business/taskRegistry.js";
import type { DownloadEngine, VideoFormat, VideoInfo } from "../../types/engine.js";
import type { Credentials, Task, TaskRequest, TaskResult } from "../../types/task.js";
import { EngineRequestError } from "../../utils/errors.js";
import type { TaskDispatcher } from "../dispatchers/types.js";

export interface SubmitDownloadInput extends TaskRequest {
  credentials?: Credentials;
}

export interface SubmitDownloadResult {
  taskId: string;
  created: boolean;
  task: Task;
}

export interface DownloadOrchestratorDeps {
  registry: TaskRegistry;
  engine: DownloadEngine;
  classifier: ErrorClassifier;
  dispatcher: TaskDispatcher;
  credentials: CredentialManager;
}

type EngineOutcome =
  | { ok: true; result: TaskResult }
  | { ok: false; failure: unknown; credentialsUsed: string };

const INTERRUPTED_MESSAGE = "Download interrupted by a server restart";

export class DownloadOrchestrator {
  /** Request credentials, held only until the task's worker has run. */
  private readonly pendingCredentials = new Map<string, Credentials>();

  constructor(private readonly deps: DownloadOrchestratorDeps) {}

  /**
   * Binds the worker entry point to the dispatcher.
   */
  start(): void {
    this.deps.dispatcher.start((taskId) => this.run(taskId));
  }

  /**
   * Admits a request. An equivalent pending, downloading or completed task is
   * returned as-is; otherwise a new task is created and handed to a worker.
   */
  async submit(input: SubmitDownloadInput): Promise<SubmitDownloadResult> {
    const { registry, dispatcher } = this.deps;
    const request: TaskRequest = { url: input.url, outputPath: input.outputPath, format: input.format };

    const { task, created } = await registry.submit(request);
    if (!created) {
      console.log(`[orchestrator] Duplicate request for ${request.url}, reusing task ${task.id} (${task.status})`);
      return { taskId: task.id, created: false, task };
    }

    if (input.credentials) {
      this.pendingCredentials.set(task.id, input.credentials);
    }

    try {
      await dispatcher.dispatch(task.id);
    } catch (error) {
      console.error(`[orchestrator] ✗ Could not dispatch task ${task.id}:`, error);
      this.pendingCredentials.delete(task.id);
      await registry.updateStatus(task.id, {
        status: "failed",
        error: this.deps.classifier.classify(error, this.contextFor(task, describeCredentials(input.credentials))),
      });
    }

    return { taskId: task.id, created: true, task: registry.get(task.id) ?? task };
  }

  /**
   * Worker entry. Runs one task to completion or failure; never throws for
   * engine or filesystem errors.
   */
  async run(taskId: string): Promise<void> {
    const { registry, classifier } = this.deps;

    const task = registry.get(taskId);
    if (!task) {
      console.warn(`[orchestrator] Task ${taskId} not found, skipping`);
      this.pendingCredentials.delete(taskId);
      return;
    }

    const started = await registry.updateStatus(taskId, { status: "downloading" });
    if (!started) {
      console.warn(`[orchestrator] Task ${taskId} is ${task.status}, not starting it`);
      this.pendingCredentials.delete(taskId);
      return;
    }

    console.log(`[orchestrator] downloading ${task.url} for task ${taskId}`);
    const reporter = createProgressReporter(taskId, registry);
    const outcome = await this.invokeEngine(task, reporter);
    await reporter.flush();

    if (outcome.ok) {
      await registry.updateStatus(taskId, { status: "completed", result: outcome.result });
      console.log(`[orchestrator] ✓ completed task ${taskId}: ${outcome.result.filePath}`);
      return;
    }

    const error = classifier.classify(outcome.failure, this.contextFor(task, outcome.credentialsUsed));
    await registry.updateStatus(taskId, { status: "failed", error });
    console.error(`[orchestrator] ✗ failed task ${taskId} [${error.kind}]: ${error.message}`);
  }

  /**
   * Fails tasks restored as pending or downloading: no worker survived the restart for them.
   */
  async recoverInterrupted(): Promise<number> {
    const { registry, classifier } = this.deps;
    const interrupted = registry
      .list()
      .filter((task) => task.status === "pending" || task.status === "downloading");

    for (const task of interrupted) {
      await registry.updateStatus(task.id, {
        status: "failed",
        error: classifier.classify(new Error(INTERRUPTED_MESSAGE), this.contextFor(task, "unknown")),
      });
    }

    if (interrupted.length > 0) {
      console.log(`[orchestrator] Marked ${interrupted.length} interrupted task(s) as failed`);
    }
    return interrupted.length;
  }

  async getInfo(url: string): Promise<VideoInfo> {
    try {
      return await this.deps.engine.getInfo(url, this.deps.credentials.defaults());
    } catch (error) {
      throw new EngineRequestError(this.deps.classifier.classify(error, { url, operation: "info" }));
    }
  }

  async listFormats(url: string): Promise<VideoFormat[]> {
    const info = await this.getInfo(url);
    return info.formats;
  }

  /**
   * The engine boundary: exceptions become a typed outcome here.
   * Per-task credential material is always released.
   */
  private async invokeEngine(task: Task, reporter: ProgressReporter): Promise<EngineOutcome> {
    const credentials = this.pendingCredentials.get(task.id);
    this.pendingCredentials.delete(task.id);

    let prepared: PreparedCredentials | undefined;
    try {
      prepared = await this.deps.credentials.prepare(task.id, credentials);
      const result = await this.deps.engine.download(
        {
          url: task.url,
          outputPath: task.outputPath,
          format: task.format,
          credentials: prepared.engine,
        },
        (event) => reporter.report(event)
      );
      return { ok: true, result };
    } catch (failure) {
      return { ok: false, failure, credentialsUsed: prepared?.description ?? describeCredentials(credentials) };
    } finally {
      await prepared?.release().catch((error: unknown) => {
        console.warn(`[orchestrator] Failed to clean up credentials for task ${task.id}:`, error);
      });
    }
  }

  private contextFor(task: Task, credentials: string): Record<string, string> {
    return {
      taskId: task.id,
      url: task.url,
      outputPath: task.outputPath,
      format: task.format,
      credentials,
    };
  }
}

function describeCredentials(credentials: Credentials | undefined): string {
  return credentials?.kind ?? "none";
}
