import type { NewScheduledTask, ScheduledTask, TaskStatus } from '@vidfarm/shared';
import { decodeTags, encodeTags, type TaskStore } from './task-store.js';

interface StoredTask extends Omit<ScheduledTask, 'tags'> {
  tags: string;
}

/** In-process TaskStore for dry runs and tests. Ids start at 1 and only grow. */
export class MemoryTaskStore implements TaskStore {
  private rows: StoredTask[] = [];
  private nextId = 1;
  private platformQueues = new Map<string, Promise<void>>();

  constructor(private clock: () => Date = () => new Date()) {}

  async insert(task: NewScheduledTask): Promise<number> {
    const now = this.clock();
    const id = this.nextId++;
    this.rows.push({
      ...task,
      id,
      tags: encodeTags(task.tags),
      scheduledTime: new Date(task.scheduledTime),
      status: 'pending',
      lastError: null,
      createdTime: now,
      updatedTime: now,
    });
    return id;
  }

  async getPending(platform?: string): Promise<ScheduledTask[]> {
    return this.query((row) => row.status === 'pending' && (!platform || row.platform === platform));
  }

  async getDue(now: Date, platform?: string): Promise<ScheduledTask[]> {
    return this.query(
      (row) =>
        row.status === 'pending' &&
        row.scheduledTime.getTime() <= now.getTime() &&
        (!platform || row.platform === platform),
    );
  }

  async getById(id: number): Promise<ScheduledTask | undefined> {
    const row = this.rows.find((r) => r.id === id);
    return row ? toTask(row) : undefined;
  }

  async updateStatus(id: number, status: TaskStatus, lastError: string | null = null): Promise<boolean> {
    const row = this.rows.find((r) => r.id === id);
    if (!row) return false;

    row.status = status;
    row.lastError = lastError;
    row.updatedTime = this.clock();
    return true;
  }

  async claim(id: number): Promise<boolean> {
    const row = this.rows.find((r) => r.id === id);
    if (!row || row.status !== 'pending') return false;

    row.status = 'in_progress';
    row.updatedTime = this.clock();
    return true;
  }

  async withPlatformLock<T>(platform: string, fn: (store: TaskStore) => Promise<T>): Promise<T> {
    const previous = this.platformQueues.get(platform) ?? Promise.resolve();
    const run = previous.then(() => fn(this));
    const settled = run.then(
      () => undefined,
      () => undefined,
    );
    this.platformQueues.set(platform, settled);

    try {
      return await run;
    } finally {
      if (this.platformQueues.get(platform) === settled) this.platformQueues.delete(platform);
    }
  }

  async count(): Promise<number> {
    return this.rows.length;
  }

  private query(predicate: (row: StoredTask) => boolean): ScheduledTask[] {
    return this.rows
      .filter(predicate)
      .sort((a, b) => a.scheduledTime.getTime() - b.scheduledTime.getTime() || a.id - b.id)
      .map(toTask);
  }
}

function toTask(row: StoredTask): ScheduledTask {
  return {
    ...row,
    tags: decodeTags(row.tags),
    scheduledTime: new Date(row.scheduledTime),
    createdTime: new Date(row.createdTime),
    updatedTime: new Date(row.updatedTime),
  };
}
