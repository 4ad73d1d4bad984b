/**
 * Asynchronous task tracking.
 *
 * Every mutating call answers with a TaskStateUpdate; the task id inside it
 * is polled here until the operation settles.
 */

import type { CloudClient } from "../client.js";
import type { JsonValue } from "../core/types.js";
import { CloudError } from "../core/errors.js";
import { TERMINAL_TASK_STATUSES, segment, type TaskStateUpdate } from "./common.js";

export interface WaitForTaskOptions {
  /** Delay between polls in ms. Default 1000. */
  interval?: number;
  /** Give up after this many ms. Default 300000. */
  timeout?: number;
  /** Called with every state observed, including the final one. */
  onProgress?: (task: TaskStateUpdate) => void;
}

export class TasksHandler {
  constructor(private readonly client: CloudClient) {}

  getAllTasks(): Promise<TaskStateUpdate[]> {
    return this.client.get<TaskStateUpdate[]>("/tasks");
  }

  getAllTasksRaw(): Promise<JsonValue> {
    return this.client.getRaw("/tasks");
  }

  getTaskById(taskId: string): Promise<TaskStateUpdate> {
    return this.client.get<TaskStateUpdate>(`/tasks/${segment(taskId)}`);
  }

  /**
   * Polls a task until it reports processing-completed or processing-error
   * and resolves with that final state. Rejects with a task_timeout error
   * when the deadline passes first.
   */
  async waitForTask(taskId: string, options: WaitForTaskOptions = {}): Promise<TaskStateUpdate> {
    const interval = options.interval ?? 1000;
    const timeout = options.timeout ?? 300000;
    const deadline = Date.now() + timeout;

    for (;;) {
      const task = await this.getTaskById(taskId);
      options.onProgress?.(task);

      if (task.status !== undefined && TERMINAL_TASK_STATUSES.has(task.status)) {
        return task;
      }

      if (Date.now() + interval > deadline) {
        throw new CloudError(
          `Task ${taskId} did not complete within ${timeout}ms (last status: ${task.status ?? "unknown"})`,
          "task_timeout",
          { body: task }
        );
      }

      await new Promise((resolve) => setTimeout(resolve, interval));
    }
  }
}
