import type { EngineLogger } from "./logger.js";

type Task = () => void | Promise<void>;

/**
 * Single-writer execution context. Tasks run one at a time in enqueue order;
 * a task enqueued while another runs waits for it to settle, including any
 * awaits inside it.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  constructor(private readonly logger: EngineLogger) {}

  /**
   * Resolves or rejects with the task's own outcome. The queue itself keeps
   * going after a failed task.
   */
  run<T>(task: () => T | Promise<T>): Promise<T> {
    this.pending += 1;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => {
        this.pending -= 1;
      },
      () => {
        this.pending -= 1;
      },
    );
    return result;
  }

  /** Fire-and-forget variant for callbacks that have no caller to report to. */
  post(label: string, task: Task): void {
    this.run(task).catch((error: unknown) => {
      this.logger.error({ err: error, task: label }, "queued task failed");
    });
  }

  get size(): number {
    return this.pending;
  }

  /** Resolves once the queue is empty, including tasks enqueued meanwhile. */
  async drain(): Promise<void> {
    while (this.pending > 0) {
      await this.tail;
    }
  }
}
