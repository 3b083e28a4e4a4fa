import { z } from 'zod';
import {
  InvalidRequestError,
  type Logger,
  type ScheduledTask,
  type SchedulingResult,
  type VideoInfo,
  type VideoPublishRequest,
} from '@vidfarm/shared';
import type { TimeSelector } from './time-selector.js';
import type { TaskStore } from './task-store.js';

/** Admits a publish request, asks the TimeSelector for the next optimal slot and persists the
 * task as `pending`. Holds no state between calls besides the injected store.
 * Failures propagate unchanged; callers own retry policy. */

const nonBlank = (field: string) =>
  z
    .string({ required_error: `${field} is required` })
    .refine((v) => v.trim().length > 0, { message: `${field} must not be empty` });

const publishRequestSchema = z.object({
  videoPath: nonBlank('videoPath'),
  title: nonBlank('title'),
  description: z.string().default(''),
  tags: z.array(z.string()).default([]),
  platform: z.string({ required_error: 'platform is required' }),
  accountId: z.number().int().optional(),
});

/** Validate untrusted input (HTTP body, CLI flags) into a VideoPublishRequest */
export function parsePublishRequest(input: unknown): VideoPublishRequest {
  const result = publishRequestSchema.safeParse(input);
  if (!result.success) {
    const fields = [...new Set(result.error.issues.map((i) => i.path.join('.')))];
    const message = result.error.issues.map((i) => i.message).join('; ');
    throw new InvalidRequestError(`Invalid publish request: ${message}`, fields);
  }
  return result.data;
}

export class PublishScheduler {
  constructor(
    private selector: TimeSelector,
    private store: TaskStore,
    private logger: Logger,
    private clock: () => Date = () => new Date(),
  ) {}

  async schedule(request: VideoPublishRequest, now: Date = this.clock()): Promise<SchedulingResult> {
    let valid: VideoPublishRequest;
    try {
      valid = parsePublishRequest(request);
    } catch (err) {
      this.logger.warn({ platform: request.platform, err }, 'Rejected publish request');
      throw err;
    }

    // cadence checks read the queue before writing, so concurrent admissions on a platform take turns
    const { taskId, time, policy } = this.selector.enforcesCadence
      ? await this.store.withPlatformLock(valid.platform, (store) => this.admit(store, valid, now))
      : await this.admit(this.store, valid, now);
    const accountId = valid.accountId ?? null;

    this.logger.info(
      { taskId, platform: valid.platform, accountId, scheduledTime: time.toISOString(), policy: policy.kind },
      'Video publish scheduled',
    );

    return {
      taskId,
      scheduledTime: time,
      platform: valid.platform,
      accountId,
      policy: policy.kind,
      status: 'scheduled',
    };
  }

  /** Convenience form taking the video description and targeting separately */
  scheduleVideoPublish(
    videoInfo: VideoInfo,
    platform: string,
    accountId?: number,
    now?: Date,
  ): Promise<SchedulingResult> {
    return this.schedule(
      {
        videoPath: videoInfo.videoPath,
        title: videoInfo.title,
        description: videoInfo.description ?? '',
        tags: videoInfo.tags ?? [],
        platform,
        accountId,
      },
      now,
    );
  }

  getPendingTasks(platform?: string): Promise<ScheduledTask[]> {
    return this.store.getPending(platform);
  }

  private async admit(store: TaskStore, request: VideoPublishRequest, now: Date) {
    const occupied = this.selector.enforcesCadence
      ? await occupiedTimes(store, request.platform, request.accountId)
      : [];
    const { time, policy } = this.selector.select(request.platform, now, occupied);

    const taskId = await store.insert({
      videoPath: request.videoPath,
      title: request.title,
      description: request.description,
      tags: request.tags,
      platform: request.platform,
      accountId: request.accountId ?? null,
      scheduledTime: time,
    });
    return { taskId, time, policy };
  }
}

async function occupiedTimes(store: TaskStore, platform: string, accountId?: number): Promise<Date[]> {
  const pending = await store.getPending(platform);
  return pending
    .filter((t) => accountId === undefined || t.accountId === accountId)
    .map((t) => t.scheduledTime);
}
