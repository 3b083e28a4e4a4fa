import { describe, it, expect, vi, beforeEach } from 'vitest';
import { InvalidRequestError, StorageError, type Logger } from '@vidfarm/shared';
import { PublishScheduler, parsePublishRequest } from './scheduler.js';
import { TimeSelector } from './time-selector.js';
import { MemoryTaskStore } from './memory-store.js';
import { DEFAULT_PLATFORM_POLICIES, buildPolicyTable } from './policies.js';
import type { TaskStore } from './task-store.js';

const mockLogger: Logger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
} as unknown as Logger;

// Local-clock dates: 2026-02-17 is a Tuesday
const at = (day: number, hour: number, minute = 0) => new Date(2026, 1, day, hour, minute);
const TUESDAY = 17;

const policies = buildPolicyTable(DEFAULT_PLATFORM_POLICIES);

const video = {
  videoPath: '/output/final/ep-001.mp4',
  title: 'Five headlines in sixty seconds',
  description: 'Daily roundup',
  tags: ['news', 'daily'],
};

function setup(options: { enforceCadence?: boolean; store?: TaskStore } = {}) {
  const selector = new TimeSelector(policies, mockLogger, { enforceCadence: options.enforceCadence });
  const store = options.store ?? new MemoryTaskStore();
  const scheduler = new PublishScheduler(selector, store, mockLogger, () => at(TUESDAY, 10, 30));
  return { selector, store, scheduler };
}

describe('PublishScheduler', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('schedules at the next optimal slot and confirms', async () => {
    const { scheduler } = setup();

    const result = await scheduler.scheduleVideoPublish(video, 'douyin', 1, at(TUESDAY, 10, 30));

    expect(result).toEqual({
      taskId: 1,
      scheduledTime: at(TUESDAY, 12),
      platform: 'douyin',
      accountId: 1,
      policy: 'known',
      status: 'scheduled',
    });
  });

  it('persists the request fields as a pending task', async () => {
    const { scheduler } = setup();
    await scheduler.scheduleVideoPublish(video, 'douyin', 1);

    const [task] = await scheduler.getPendingTasks();
    expect(task).toMatchObject({
      id: 1,
      videoPath: '/output/final/ep-001.mp4',
      title: 'Five headlines in sixty seconds',
      description: 'Daily roundup',
      tags: ['news', 'daily'],
      platform: 'douyin',
      accountId: 1,
      scheduledTime: at(TUESDAY, 12),
      status: 'pending',
    });
  });

  it('uses the injected clock when no time is given', async () => {
    const { scheduler } = setup();
    const result = await scheduler.scheduleVideoPublish(video, 'bilibili');
    expect(result.scheduledTime).toEqual(at(TUESDAY, 14));
    expect(result.accountId).toBeNull();
  });

  it('stores exactly what the time selector returns', async () => {
    const { scheduler, selector } = setup();
    const cases: Array<[string, Date]> = [
      ['douyin', at(TUESDAY, 22)],
      ['bilibili', at(21, 21)],
      ['douyin', at(20, 23, 45)],
      ['bilibili', at(22, 7, 5)],
    ];

    for (const [platform, now] of cases) {
      const result = await scheduler.scheduleVideoPublish(video, platform, undefined, now);
      expect(result.scheduledTime).toEqual(selector.nextSlot(platform, now));
    }
  });

  it('schedules unknown platforms within the next hour', async () => {
    const { scheduler } = setup();
    const now = at(TUESDAY, 10, 30);

    const result = await scheduler.scheduleVideoPublish(video, 'unknown_platform_xyz', undefined, now);

    expect(result.policy).toBe('default');
    expect(result.scheduledTime.getTime()).toBeGreaterThanOrEqual(now.getTime());
    expect(result.scheduledTime.getTime()).toBeLessThanOrEqual(now.getTime() + 3600_000);
  });

  it('defaults description and tags', async () => {
    const { scheduler } = setup();
    await scheduler.scheduleVideoPublish({ videoPath: 'clip.mp4', title: 'Clip' }, 'douyin');

    const [task] = await scheduler.getPendingTasks();
    expect(task.description).toBe('');
    expect(task.tags).toEqual([]);
  });

  it('rejects an empty title without writing a row', async () => {
    const { scheduler, store } = setup();
    await scheduler.scheduleVideoPublish(video, 'douyin');
    const before = await store.count();

    const err = await scheduler
      .scheduleVideoPublish({ ...video, title: '' }, 'douyin')
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(InvalidRequestError);
    expect(err).toHaveProperty('fields', ['title']);
    expect(err).toHaveProperty('message', 'Invalid publish request: title must not be empty');
    expect(await store.count()).toBe(before);
    expect(mockLogger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ platform: 'douyin' }),
      'Rejected publish request',
    );
  });

  it('rejects a blank video path', async () => {
    const { scheduler, store } = setup();

    await expect(
      scheduler.scheduleVideoPublish({ ...video, videoPath: '   ' }, 'douyin'),
    ).rejects.toMatchObject({ code: 'INVALID_REQUEST', fields: ['videoPath'] });
    expect(await store.count()).toBe(0);
  });

  it('returns pending tasks ordered by scheduled time', async () => {
    const { scheduler } = setup();
    await scheduler.scheduleVideoPublish(video, 'douyin', undefined, at(TUESDAY, 19)); // 21:00
    await scheduler.scheduleVideoPublish(video, 'douyin', undefined, at(TUESDAY, 8)); // 09:00
    await scheduler.scheduleVideoPublish(video, 'bilibili', undefined, at(TUESDAY, 13)); // 14:00

    const times = (await scheduler.getPendingTasks()).map((t) => t.scheduledTime);
    expect(times).toEqual([at(TUESDAY, 9), at(TUESDAY, 14), at(TUESDAY, 21)]);
  });

  it('does not take the platform lock without cadence enforcement', async () => {
    const store = new MemoryTaskStore();
    const lock = vi.spyOn(store, 'withPlatformLock');
    const { scheduler } = setup({ store });

    await scheduler.scheduleVideoPublish(video, 'douyin');

    expect(lock).not.toHaveBeenCalled();
  });

  it('filters pending tasks by platform', async () => {
    const { scheduler } = setup();
    await scheduler.scheduleVideoPublish(video, 'douyin');
    await scheduler.scheduleVideoPublish(video, 'bilibili');
    await scheduler.scheduleVideoPublish(video, 'douyin');

    const douyin = await scheduler.getPendingTasks('douyin');
    expect(douyin).toHaveLength(2);
    expect(douyin.every((t) => t.platform === 'douyin')).toBe(true);
  });

  it('propagates storage failures without retrying', async () => {
    const failure = new StorageError('disk full');
    const store: TaskStore = {
      insert: vi.fn().mockRejectedValue(failure),
      getPending: vi.fn().mockResolvedValue([]),
      getDue: vi.fn().mockResolvedValue([]),
      getById: vi.fn().mockResolvedValue(undefined),
      updateStatus: vi.fn().mockResolvedValue(false),
      claim: vi.fn().mockResolvedValue(false),
      withPlatformLock: (_platform, fn) => fn(store),
      count: vi.fn().mockResolvedValue(0),
    };
    const { scheduler } = setup({ store });

    await expect(scheduler.scheduleVideoPublish(video, 'douyin')).rejects.toBe(failure);
    expect(store.insert).toHaveBeenCalledTimes(1);
  });

  it('logs the admission with the policy kind', async () => {
    const { scheduler } = setup();
    await scheduler.scheduleVideoPublish(video, 'douyin', 3);

    expect(mockLogger.info).toHaveBeenCalledWith(
      {
        taskId: 1,
        platform: 'douyin',
        accountId: 3,
        scheduledTime: at(TUESDAY, 12).toISOString(),
        policy: 'known',
      },
      'Video publish scheduled',
    );
  });

  describe('with cadence enforcement', () => {
    it('spaces publishes on the same platform', async () => {
      const { scheduler } = setup({ enforceCadence: true });

      const first = await scheduler.scheduleVideoPublish(video, 'douyin');
      const second = await scheduler.scheduleVideoPublish(video, 'douyin');

      expect(first.scheduledTime).toEqual(at(TUESDAY, 12));
      expect(second.scheduledTime).toEqual(at(TUESDAY, 18));
    });

    it('keeps concurrent requests for one platform apart', async () => {
      const { scheduler } = setup({ enforceCadence: true });

      const [a, b] = await Promise.all([
        scheduler.scheduleVideoPublish(video, 'douyin', undefined, at(TUESDAY, 10, 30)),
        scheduler.scheduleVideoPublish(video, 'douyin', undefined, at(TUESDAY, 10, 30)),
      ]);

      expect(a.scheduledTime).toEqual(at(TUESDAY, 12));
      expect(b.scheduledTime).toEqual(at(TUESDAY, 18));
    });

    it('admits inside the platform lock', async () => {
      const store = new MemoryTaskStore();
      const lock = vi.spyOn(store, 'withPlatformLock');
      const { scheduler } = setup({ enforceCadence: true, store });

      await scheduler.scheduleVideoPublish(video, 'bilibili');

      expect(lock).toHaveBeenCalledWith('bilibili', expect.any(Function));
    });

    it('only counts tasks of the same account when one is given', async () => {
      const { scheduler } = setup({ enforceCadence: true });

      const a = await scheduler.scheduleVideoPublish(video, 'douyin', 1);
      const b = await scheduler.scheduleVideoPublish(video, 'douyin', 2);

      expect(a.scheduledTime).toEqual(at(TUESDAY, 12));
      expect(b.scheduledTime).toEqual(at(TUESDAY, 12));
    });
  });
});

describe('parsePublishRequest', () => {
  it('fills optional fields', () => {
    expect(parsePublishRequest({ videoPath: 'a.mp4', title: 'A', platform: 'douyin' })).toEqual({
      videoPath: 'a.mp4',
      title: 'A',
      description: '',
      tags: [],
      platform: 'douyin',
    });
  });

  it('reports every missing field', () => {
    expect(() => parsePublishRequest({ platform: 'douyin' })).toThrow(
      'Invalid publish request: videoPath is required; title is required',
    );
  });

  it('rejects a non-integer account id', () => {
    try {
      parsePublishRequest({ videoPath: 'a.mp4', title: 'A', platform: 'douyin', accountId: 1.5 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidRequestError);
      expect(err).toHaveProperty('fields', ['accountId']);
    }
  });
});
