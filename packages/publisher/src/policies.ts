import { readFile } from 'fs/promises';
import { z } from 'zod';
import {
  ConfigurationError,
  errorMessage,
  type MinuteOfDay,
  type PlatformPolicy,
  type PolicyTable,
  type ResolvedPolicy,
} from '@vidfarm/shared';

/** Per-platform cadence rules. Slots are "HH:MM" on the process-local clock.
 * The table is parsed and validated once at startup; lookups never fail. */

const rawPolicySchema = z.object({
  weekdaySlots: z.array(z.string()).nonempty(),
  weekendSlots: z.array(z.string()).nonempty(),
  minIntervalSeconds: z.number().int().nonnegative(),
  maxDaily: z.number().int().positive(),
});

const rawTableSchema = z.record(z.string().min(1), rawPolicySchema);

export type RawPlatformPolicy = z.input<typeof rawPolicySchema>;

export const DEFAULT_PLATFORM_POLICIES: Readonly<Record<string, RawPlatformPolicy>> = {
  douyin: {
    weekdaySlots: ['09:00', '12:00', '18:00', '21:00'],
    weekendSlots: ['10:00', '14:00', '19:00', '22:00'],
    minIntervalSeconds: 3600,
    maxDaily: 5,
  },
  bilibili: {
    weekdaySlots: ['10:00', '14:00', '19:00', '22:00'],
    weekendSlots: ['11:00', '15:00', '20:00', '23:00'],
    minIntervalSeconds: 7200,
    maxDaily: 3,
  },
};

const SLOT_PATTERN = /^(\d{1,2}):(\d{2})$/;

export function parseSlot(value: string): MinuteOfDay {
  const match = SLOT_PATTERN.exec(value.trim());
  if (!match) {
    throw new ConfigurationError(`Invalid slot "${value}": expected HH:MM`);
  }

  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23 || minute > 59) {
    throw new ConfigurationError(`Invalid slot "${value}": out of range`);
  }

  return hour * 60 + minute;
}

export function formatSlot(minuteOfDay: MinuteOfDay): string {
  const hh = String(Math.floor(minuteOfDay / 60)).padStart(2, '0');
  const mm = String(minuteOfDay % 60).padStart(2, '0');
  return `${hh}:${mm}`;
}

function parseSlotList(platform: string, kind: string, values: string[]): readonly MinuteOfDay[] {
  const slots = values.map(parseSlot);

  for (let i = 1; i < slots.length; i++) {
    if (slots[i] <= slots[i - 1]) {
      throw new ConfigurationError(
        `${platform}.${kind} must be strictly increasing (${values[i - 1]} then ${values[i]})`,
      );
    }
  }

  return Object.freeze(slots);
}

/** Validate raw policy data and build the immutable lookup table */
export function buildPolicyTable(raw: unknown): PolicyTable {
  const result = rawTableSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new ConfigurationError(`Invalid platform policies:\n${issues}`);
  }

  const table = new Map<string, PlatformPolicy>();
  for (const [platform, policy] of Object.entries(result.data)) {
    table.set(
      platform,
      Object.freeze({
        weekdaySlots: parseSlotList(platform, 'weekdaySlots', policy.weekdaySlots),
        weekendSlots: parseSlotList(platform, 'weekendSlots', policy.weekendSlots),
        minIntervalSeconds: policy.minIntervalSeconds,
        maxDaily: policy.maxDaily,
      }),
    );
  }

  return table;
}

/** Load policies from a JSON file, or the built-in table when no path is given */
export async function loadPolicyTable(path?: string): Promise<PolicyTable> {
  if (!path) return buildPolicyTable(DEFAULT_PLATFORM_POLICIES);

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(`Cannot read platform policies from ${path}: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  return buildPolicyTable(raw);
}

export function resolvePolicy(table: PolicyTable, platform: string): ResolvedPolicy {
  const policy = table.get(platform);
  return policy ? { kind: 'known', platform, policy } : { kind: 'default', platform };
}
