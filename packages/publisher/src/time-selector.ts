import {
  NoSlotAvailableError,
  type Logger,
  type MinuteOfDay,
  type PlatformPolicy,
  type PolicyTable,
  type ResolvedPolicy,
} from '@vidfarm/shared';
import { resolvePolicy } from './policies.js';

/** Picks the next optimal publish time for a platform.
 *
 * Default behaviour: the first of today's slots strictly after `now`, otherwise tomorrow at the
 * first slot of the list chosen for today (tomorrow's own weekday/weekend type is not consulted).
 * Platforms without a policy publish one hour from now.
 *
 * With `enforceCadence`, slots that would break `maxDaily` or `minIntervalSeconds` against already
 * occupied times are skipped, each day uses its own slot list, and the search gives up after
 * `horizonDays`. */

export interface TimeSelectorOptions {
  enforceCadence?: boolean;
  horizonDays?: number;
}

export interface SlotSelection {
  time: Date;
  policy: ResolvedPolicy;
}

const DEFAULT_OPTIONS: Required<TimeSelectorOptions> = {
  enforceCadence: false,
  horizonDays: 14,
};

const FALLBACK_DELAY_MS = 3600_000;

export class TimeSelector {
  private options: Required<TimeSelectorOptions>;

  constructor(
    private policies: PolicyTable,
    private logger: Logger,
    options: TimeSelectorOptions = {},
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  get enforcesCadence(): boolean {
    return this.options.enforceCadence;
  }

  nextSlot(platform: string, now: Date, occupied: readonly Date[] = []): Date {
    return this.select(platform, now, occupied).time;
  }

  select(platform: string, now: Date, occupied: readonly Date[] = []): SlotSelection {
    const policy = resolvePolicy(this.policies, platform);

    if (policy.kind === 'default') {
      this.logger.debug({ platform }, 'No policy for platform, using one-hour fallback');
      return { time: new Date(now.getTime() + FALLBACK_DELAY_MS), policy };
    }

    const time = this.options.enforceCadence
      ? this.constrainedSlot(platform, policy.policy, now, occupied)
      : this.referenceSlot(policy.policy, now);

    return { time, policy };
  }

  private referenceSlot(policy: PlatformPolicy, now: Date): Date {
    const slots = slotsFor(policy, now);

    for (const slot of slots) {
      const candidate = atMinuteOfDay(now, slot);
      if (candidate.getTime() > now.getTime()) return candidate;
    }

    // rollover: same list, first slot, next calendar day
    return atMinuteOfDay(addDays(now, 1), slots[0]);
  }

  private constrainedSlot(
    platform: string,
    policy: PlatformPolicy,
    now: Date,
    occupied: readonly Date[],
  ): Date {
    const minGapMs = policy.minIntervalSeconds * 1000;

    for (let offset = 0; offset < this.options.horizonDays; offset++) {
      const day = addDays(now, offset);
      const usedToday = occupied.filter((t) => sameLocalDay(t, day)).length;
      if (usedToday >= policy.maxDaily) continue;

      for (const slot of slotsFor(policy, day)) {
        const candidate = atMinuteOfDay(day, slot);
        if (candidate.getTime() <= now.getTime()) continue;

        const tooClose = occupied.some(
          (t) => Math.abs(t.getTime() - candidate.getTime()) < minGapMs,
        );
        if (!tooClose) return candidate;
      }
    }

    this.logger.warn(
      { platform, horizonDays: this.options.horizonDays, occupied: occupied.length },
      'Cadence constraints leave no slot inside the horizon',
    );
    throw new NoSlotAvailableError(platform, this.options.horizonDays);
  }
}

export function isWeekend(date: Date): boolean {
  const day = date.getDay();
  return day === 0 || day === 6;
}

function slotsFor(policy: PlatformPolicy, date: Date): readonly MinuteOfDay[] {
  return isWeekend(date) ? policy.weekendSlots : policy.weekdaySlots;
}

function atMinuteOfDay(date: Date, minuteOfDay: MinuteOfDay): Date {
  const result = new Date(date);
  result.setHours(Math.floor(minuteOfDay / 60), minuteOfDay % 60, 0, 0);
  return result;
}

function addDays(date: Date, days: number): Date {
  const result = new Date(date);
  result.setDate(result.getDate() + days);
  return result;
}

function sameLocalDay(a: Date, b: Date): boolean {
  return (
    a.getFullYear() === b.getFullYear() &&
    a.getMonth() === b.getMonth() &&
    a.getDate() === b.getDate()
  );
}
