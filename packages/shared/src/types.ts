// ─── Task Status ───

export const TASK_STATUSES = ['pending', 'in_progress', 'completed', 'failed'] as const;

export type TaskStatus = (typeof TASK_STATUSES)[number];

// ─── Platform Policies ───

/** Minutes since local midnight, e.g. 21:30 → 1290 */
export type MinuteOfDay = number;

export interface PlatformPolicy {
  weekdaySlots: readonly MinuteOfDay[];
  weekendSlots: readonly MinuteOfDay[];
  minIntervalSeconds: number;
  maxDaily: number;
}

export type PolicyTable = ReadonlyMap<string, PlatformPolicy>;

/** Result of looking a platform up in the policy table.
 * `default` means the generic one-hour-from-now rule applies. */
export type ResolvedPolicy =
  | { kind: 'known'; platform: string; policy: PlatformPolicy }
  | { kind: 'default'; platform: string };

// ─── Publish Requests ───

export interface VideoPublishRequest {
  videoPath: string;
  title: string;
  description: string;
  tags: string[];
  platform: string;
  accountId?: number;
}

/** Loose caller-facing shape; description and tags are optional */
export interface VideoInfo {
  videoPath: string;
  title: string;
  description?: string;
  tags?: string[];
}

// ─── Scheduled Tasks ───

export interface NewScheduledTask {
  videoPath: string;
  title: string;
  description: string;
  tags: string[];
  platform: string;
  accountId: number | null;
  scheduledTime: Date;
}

export interface ScheduledTask extends NewScheduledTask {
  id: number;
  status: TaskStatus;
  lastError: string | null;
  createdTime: Date;
  updatedTime: Date;
}

export interface SchedulingResult {
  taskId: number;
  scheduledTime: Date;
  platform: string;
  accountId: number | null;
  policy: ResolvedPolicy['kind'];
  status: 'scheduled';
}

// ─── Upload Collaborator ───

export interface UploadOutcome {
  remoteId?: string;
  url?: string;
}

/** Performs the actual platform submission (browser automation or API). */
export interface UploadExecutor {
  upload(task: ScheduledTask): Promise<UploadOutcome>;
}
