/**
 * Task Dispatcher
 * Runs task ids on background worker slots. Only the id crosses this boundary;
 * status always comes back through the registry.
 */

export type TaskHandler = (taskId: string) => Promise<void>;

export interface TaskDispatcher {
  /** Binds the worker entry point. Must be called once before dispatch(). */
  start(handler: TaskHandler): void;
  /** Admits a task id for background execution. Resolves once admitted, not once run. */
  dispatch(taskId: string): Promise<void>;
  /** Resolves when nothing is queued or running. */
  drain(): Promise<void>;
  /** Stops taking work and waits for running handlers. */
  close(): Promise<void>;
}
