import { z } from 'zod';
import {
  StorageError,
  errorMessage,
  isVidfarmError,
  type DbExecutor,
  type Logger,
  type NewScheduledTask,
  type ScheduledTask,
  type TaskStatus,
} from '@vidfarm/shared';
import { publishTasks, eq, and, asc, lte, count, sql, type PublishTaskRow } from '@vidfarm/shared/db';

/** Durable queue of publish tasks.
 * `insert` is the only write the scheduling core performs; status updates belong to the publish worker. */
export interface TaskStore {
  /** Persist a new task with status `pending` and return its id */
  insert(task: NewScheduledTask): Promise<number>;
  /** Pending tasks, ascending by scheduled time (ties by id) */
  getPending(platform?: string): Promise<ScheduledTask[]>;
  /** Pending tasks whose scheduled time is at or before `now`, in queue order */
  getDue(now: Date, platform?: string): Promise<ScheduledTask[]>;
  getById(id: number): Promise<ScheduledTask | undefined>;
  /** Returns false when no task has that id */
  updateStatus(id: number, status: TaskStatus, lastError?: string | null): Promise<boolean>;
  /** Move a task from `pending` to `in_progress`. Returns false when it is gone or no longer pending,
   * so at most one caller wins each task. */
  claim(id: number): Promise<boolean>;
  /** Run `fn` while holding the platform's admission lock; callers on the same platform queue up.
   * `fn` must do its reads and writes through the store it is handed. */
  withPlatformLock<T>(platform: string, fn: (store: TaskStore) => Promise<T>): Promise<T>;
  count(): Promise<number>;
}

const tagListSchema = z.array(z.string());

/** Decode the stored tag list. Anything other than a JSON array of strings becomes [] so one bad
 * row cannot fail a whole queue read. */
export function decodeTags(raw: string | null, onInvalid?: (raw: string) => void): string[] {
  if (!raw) return [];

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    onInvalid?.(raw);
    return [];
  }

  const result = tagListSchema.safeParse(parsed);
  if (!result.success) {
    onInvalid?.(raw);
    return [];
  }
  return result.data;
}

export function encodeTags(tags: readonly string[]): string {
  return JSON.stringify(tags);
}

function toStorageError(operation: string, err: unknown): Error {
  if (isVidfarmError(err)) return err;
  return new StorageError(`Task store ${operation} failed: ${errorMessage(err)}`, { cause: err });
}

/** PostgreSQL-backed store (drizzle-orm over node-postgres). The serial primary key gives
 * unique, monotonically assigned ids under concurrent inserts; claims and platform locks hold
 * across processes sharing the database. */
export class DrizzleTaskStore implements TaskStore {
  constructor(
    private db: DbExecutor,
    private logger: Logger,
  ) {}

  async insert(task: NewScheduledTask): Promise<number> {
    try {
      const [row] = await this.db
        .insert(publishTasks)
        .values({
          videoPath: task.videoPath,
          title: task.title,
          description: task.description,
          tags: encodeTags(task.tags),
          platform: task.platform,
          accountId: task.accountId,
          scheduledTime: task.scheduledTime,
          status: 'pending',
        })
        .returning({ id: publishTasks.id });

      if (!row) throw new StorageError('Insert returned no id');
      return row.id;
    } catch (err) {
      const error = toStorageError('insert', err);
      this.logger.error({ platform: task.platform, error: error.message }, 'Failed to persist publish task');
      throw error;
    }
  }

  async getPending(platform?: string): Promise<ScheduledTask[]> {
    try {
      const rows = await this.db
        .select()
        .from(publishTasks)
        .where(
          and(
            eq(publishTasks.status, 'pending'),
            platform ? eq(publishTasks.platform, platform) : undefined,
          ),
        )
        .orderBy(asc(publishTasks.scheduledTime), asc(publishTasks.id));

      return rows.map((row) => this.toTask(row));
    } catch (err) {
      throw toStorageError('getPending', err);
    }
  }

  async getDue(now: Date, platform?: string): Promise<ScheduledTask[]> {
    try {
      const rows = await this.db
        .select()
        .from(publishTasks)
        .where(
          and(
            eq(publishTasks.status, 'pending'),
            lte(publishTasks.scheduledTime, now),
            platform ? eq(publishTasks.platform, platform) : undefined,
          ),
        )
        .orderBy(asc(publishTasks.scheduledTime), asc(publishTasks.id));

      return rows.map((row) => this.toTask(row));
    } catch (err) {
      throw toStorageError('getDue', err);
    }
  }

  async getById(id: number): Promise<ScheduledTask | undefined> {
    try {
      const [row] = await this.db
        .select()
        .from(publishTasks)
        .where(eq(publishTasks.id, id))
        .limit(1);

      return row ? this.toTask(row) : undefined;
    } catch (err) {
      throw toStorageError('getById', err);
    }
  }

  async updateStatus(id: number, status: TaskStatus, lastError: string | null = null): Promise<boolean> {
    try {
      const updated = await this.db
        .update(publishTasks)
        .set({ status, lastError, updatedTime: new Date() })
        .where(eq(publishTasks.id, id))
        .returning({ id: publishTasks.id });

      return updated.length > 0;
    } catch (err) {
      throw toStorageError('updateStatus', err);
    }
  }

  async claim(id: number): Promise<boolean> {
    try {
      const claimed = await this.db
        .update(publishTasks)
        .set({ status: 'in_progress', updatedTime: new Date() })
        .where(and(eq(publishTasks.id, id), eq(publishTasks.status, 'pending')))
        .returning({ id: publishTasks.id });

      return claimed.length > 0;
    } catch (err) {
      throw toStorageError('claim', err);
    }
  }

  async withPlatformLock<T>(platform: string, fn: (store: TaskStore) => Promise<T>): Promise<T> {
    try {
      return await this.db.transaction(async (tx) => {
        // released on commit or rollback
        await tx.execute(sql`select pg_advisory_xact_lock(hashtext(${platform}))`);
        return fn(new DrizzleTaskStore(tx, this.logger));
      });
    } catch (err) {
      throw toStorageError('withPlatformLock', err);
    }
  }

  async count(): Promise<number> {
    try {
      const [row] = await this.db.select({ value: count() }).from(publishTasks);
      return row?.value ?? 0;
    } catch (err) {
      throw toStorageError('count', err);
    }
  }

  private toTask(row: PublishTaskRow): ScheduledTask {
    return {
      id: row.id,
      videoPath: row.videoPath,
      title: row.title,
      description: row.description,
      tags: decodeTags(row.tags, (raw) =>
        this.logger.warn({ taskId: row.id, raw }, 'Undecodable tags, using empty list'),
      ),
      platform: row.platform,
      accountId: row.accountId,
      scheduledTime: row.scheduledTime,
      status: row.status,
      lastError: row.lastError,
      createdTime: row.createdTime,
      updatedTime: row.updatedTime,
    };
  }
}
