import {
  ConfigurationError,
  errorMessage,
  isRetryableError,
  withRetry,
  type Logger,
  type RetryOptions,
  type ScheduledTask,
  type UploadExecutor,
  type UploadOutcome,
} from '@vidfarm/shared';
import type { TaskStore } from './task-store.js';

export interface PublishWorkerOptions {
  /** Performs the platform submission. Required unless dryRun is on. */
  executor?: UploadExecutor;
  dryRun?: boolean;
  /** Restrict the worker to one platform's queue */
  platform?: string;
  pollIntervalMs?: number;
  retry?: Omit<RetryOptions, 'retryOn'>;
}

export interface WorkerRunSummary {
  picked: number;
  completed: number;
  failed: number;
}

/** Drains due tasks from the queue: pending → in_progress → completed | failed.
 * Transient upload failures are retried with backoff; the final error is stored on the task. */
export class PublishWorker {
  private dryRun: boolean;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;

  constructor(
    private store: TaskStore,
    private logger: Logger,
    private options: PublishWorkerOptions = {},
    private clock: () => Date = () => new Date(),
  ) {
    this.dryRun = options.dryRun ?? true;
    if (!this.dryRun && !options.executor) {
      throw new ConfigurationError('PublishWorker needs an upload executor when dryRun is off');
    }
  }

  async runOnce(now: Date = this.clock()): Promise<WorkerRunSummary> {
    const due = await this.store.getDue(now, this.options.platform);
    const summary: WorkerRunSummary = { picked: 0, completed: 0, failed: 0 };

    for (const task of due) {
      // another worker may have taken it since the read
      if (!(await this.store.claim(task.id))) continue;
      summary.picked++;

      let outcome: UploadOutcome;
      try {
        outcome = await this.publish(task);
      } catch (err) {
        const message = errorMessage(err);
        this.logger.error({ taskId: task.id, platform: task.platform, error: message }, 'Publish failed');
        summary.failed++;
        await this.record(task, 'failed', message);
        continue;
      }

      this.logger.info({ taskId: task.id, platform: task.platform, ...outcome }, 'Publish completed');
      summary.completed++;
      await this.record(task, 'completed');
    }

    if (summary.picked > 0) {
      this.logger.info(summary, 'Publish worker run finished');
    }
    return summary;
  }

  start(): void {
    if (this.timer) return;

    const interval = this.options.pollIntervalMs ?? 60_000;
    this.timer = setInterval(() => this.tick(), interval);
    this.logger.info({ interval, dryRun: this.dryRun, platform: this.options.platform }, 'Publish worker started');
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await this.inFlight;
    this.logger.info('Publish worker stopped');
  }

  private tick(): void {
    if (this.inFlight) return;

    this.inFlight = this.runOnce()
      .then(() => undefined)
      .catch((err: unknown) => {
        this.logger.error({ error: errorMessage(err) }, 'Publish worker run aborted');
      })
      .finally(() => {
        this.inFlight = null;
      });
  }

  /** A task whose outcome cannot be stored stays `in_progress`; the rest of the batch still runs. */
  private async record(task: ScheduledTask, status: 'completed' | 'failed', lastError: string | null = null) {
    try {
      await this.store.updateStatus(task.id, status, lastError);
    } catch (err) {
      this.logger.error(
        { taskId: task.id, platform: task.platform, status, error: errorMessage(err) },
        'Failed to record publish outcome',
      );
    }
  }

  private async publish(task: ScheduledTask): Promise<UploadOutcome> {
    const executor = this.options.executor;
    if (this.dryRun || !executor) {
      this.logger.info({ taskId: task.id, platform: task.platform, title: task.title }, 'DRY RUN: Would publish video');
      return { remoteId: `dry-run-${task.id}` };
    }

    return withRetry(() => executor.upload(task), this.logger, `upload:${task.platform}:${task.id}`, {
      ...this.options.retry,
      retryOn: isRetryableError,
    });
  }
}
