/**
 * Background persistence queue.
 *
 * Commits conversation turns, memory observations and index writes off the
 * request path:
 * - tasks sharing a key run one at a time in submission order
 * - tasks under different keys run concurrently, in no particular order
 * - a failing task is retried with backoff, then dead-lettered
 *
 * Nothing is ever reported back to the submitter; failures are visible through
 * logs, `deadLetters()` and `stats()`.
 */
import { InvalidInputError, errorMessage } from "@domain/errors";
import { logEvent, logger } from "@infrastructure/logging/Logger";
import { DEFAULT_BACKOFF_MS, delay } from "@utils/retry";

export type PersistenceTask = () => Promise<void>;

export type DeadLetterReason = "failed" | "queue_full" | "shutdown";

export interface DeadLetter {
  id: number;
  key: string;
  label: string;
  reason: DeadLetterReason;
  attempts: number;
  error: string | null;
  at: string;
}

export interface QueueStats {
  pending: number;
  running: number;
  completed: number;
  failed: number;
  retried: number;
  cancelled: number;
  deadLettered: number;
}

export interface PersistenceQueueOptions {
  maxAttempts: number;
  /** Delay before attempt i (0-based); the last entry repeats. */
  backoffMs?: readonly number[];
  maxPending: number;
  deadLetterCapacity: number;
  isRetryable?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

interface QueuedTask {
  id: number;
  key: string;
  label: string;
  run: PersistenceTask;
  cancelled: boolean;
}

function defaultIsRetryable(error: unknown): boolean {
  return !(error instanceof InvalidInputError);
}

export class PersistenceQueue {
  private readonly queues = new Map<string, QueuedTask[]>();
  private readonly current = new Map<string, QueuedTask>();
  private readonly deadLetterLog: DeadLetter[] = [];
  private idleWaiters: Array<() => void> = [];

  private readonly maxAttempts: number;
  private readonly backoffMs: readonly number[];
  private readonly isRetryable: (error: unknown) => boolean;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;

  private nextId = 1;
  private closed = false;
  private readonly counters = {
    pending: 0,
    completed: 0,
    failed: 0,
    retried: 0,
    cancelled: 0,
    deadLettered: 0,
  };

  constructor(private readonly options: PersistenceQueueOptions) {
    this.maxAttempts = Math.max(1, Math.floor(options.maxAttempts));
    this.backoffMs =
      options.backoffMs && options.backoffMs.length > 0 ? options.backoffMs : DEFAULT_BACKOFF_MS;
    this.isRetryable = options.isRetryable ?? defaultIsRetryable;
    this.sleep = options.sleep ?? delay;
    this.now = options.now ?? (() => new Date());
  }

  /** Enqueues and returns immediately. */
  submit(key: string, task: PersistenceTask, label = "task"): void {
    const queued: QueuedTask = {
      id: this.nextId++,
      key,
      label,
      run: task,
      cancelled: false,
    };

    if (this.closed) {
      this.deadLetter(queued, "shutdown", 0, null);
      return;
    }

    if (this.counters.pending >= this.options.maxPending) {
      this.deadLetter(queued, "queue_full", 0, null);
      return;
    }

    const queue = this.queues.get(key);
    if (queue) {
      queue.push(queued);
    } else {
      this.queues.set(key, [queued]);
    }
    this.counters.pending++;

    if (!this.current.has(key)) {
      // drain() settles every task itself and never rejects.
      void this.drain(key);
    }
  }

  private async drain(key: string): Promise<void> {
    for (;;) {
      const task = this.queues.get(key)?.shift();
      if (!task) {
        break;
      }

      this.counters.pending--;
      this.current.set(key, task);
      try {
        await this.execute(task);
      } finally {
        this.current.delete(key);
      }
    }

    this.queues.delete(key);
    this.notifyIfIdle();
  }

  private backoffFor(attempt: number): number {
    return this.backoffMs[Math.min(attempt, this.backoffMs.length - 1)] ?? 0;
  }

  private async execute(task: QueuedTask): Promise<void> {
    let lastError: unknown = null;

    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      const wait = this.backoffFor(attempt);
      if (wait > 0) {
        await this.sleep(wait);
      }

      if (task.cancelled) {
        this.counters.cancelled++;
        logEvent("QUEUE_TASK_CANCELLED", { key: task.key, label: task.label, attempt });
        return;
      }

      try {
        await task.run();
        this.counters.completed++;
        return;
      } catch (error: unknown) {
        lastError = error;

        const exhausted = attempt + 1 >= this.maxAttempts;
        if (exhausted || !this.isRetryable(error)) {
          this.counters.failed++;
          this.deadLetter(task, "failed", attempt + 1, error);
          return;
        }

        this.counters.retried++;
        logger.log("warn", "QUEUE_TASK_RETRY", {
          key: task.key,
          label: task.label,
          attempt: attempt + 1,
          error: errorMessage(lastError),
        });
      }
    }
  }

  private deadLetter(
    task: QueuedTask,
    reason: DeadLetterReason,
    attempts: number,
    error: unknown
  ): void {
    const entry: DeadLetter = {
      id: task.id,
      key: task.key,
      label: task.label,
      reason,
      attempts,
      error: error === null ? null : errorMessage(error),
      at: this.now().toISOString(),
    };

    this.deadLetterLog.push(entry);
    while (this.deadLetterLog.length > Math.max(1, this.options.deadLetterCapacity)) {
      this.deadLetterLog.shift();
    }
    this.counters.deadLettered++;

    logger.log("error", "QUEUE_TASK_DEAD_LETTERED", { ...entry });
  }

  /**
   * Drops queued tasks for `key` and stops retries of the one running.
   * Effects already applied stay. Resolves the number of tasks dropped.
   */
  cancel(key: string): number {
    const queue = this.queues.get(key) ?? [];
    const dropped = queue.length;

    queue.length = 0;
    this.counters.pending -= dropped;
    this.counters.cancelled += dropped;

    const running = this.current.get(key);
    if (running) {
      running.cancelled = true;
    }

    if (dropped > 0) {
      logEvent("QUEUE_KEY_CANCELLED", { key, dropped });
    }
    this.notifyIfIdle();
    return dropped;
  }

  private isIdle(): boolean {
    return this.counters.pending === 0 && this.current.size === 0;
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) {
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }

  /** Resolves once nothing is queued or running. */
  onIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Stops accepting work. With `drain` (the default) waits for queued work to
   * finish; otherwise cancels everything still queued.
   */
  async shutdown(options: { drain?: boolean } = {}): Promise<void> {
    this.closed = true;

    if (options.drain === false) {
      for (const key of [...this.queues.keys()]) {
        this.cancel(key);
      }
    }

    await this.onIdle();
    logEvent("QUEUE_SHUTDOWN", { ...this.stats() });
  }

  deadLetters(): DeadLetter[] {
    return this.deadLetterLog.map((entry) => ({ ...entry }));
  }

  stats(): QueueStats {
    return {
      pending: this.counters.pending,
      running: this.current.size,
      completed: this.counters.completed,
      failed: this.counters.failed,
      retried: this.counters.retried,
      cancelled: this.counters.cancelled,
      deadLettered: this.counters.deadLettered,
    };
  }
}
