/**
 * Market Hours Gate — decides whether a fetch cycle should run.
 *
 * Pure functions over an injected clock reading and a static calendar
 * (weekdays, holidays, early closes) loaded from `server/data/marketCalendar.json`.
 * Session bounds are wall-clock times in the calendar's zone, half-open:
 * `[open, close)`.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import {
  addDaysToDateKey,
  dateKeyFromYmdParts,
  parseClockMinutes,
  weekdayOfDateKey,
  zonedDateTimeParts,
} from '../lib/dateUtils.js';

export interface MarketCalendar {
  timeZone: string;
  /** "HH:MM" */
  open: string;
  /** "HH:MM" */
  close: string;
  /** 0 = Sunday … 6 = Saturday */
  weekdays: ReadonlySet<number>;
  /** YYYY-MM-DD keys */
  holidays: ReadonlySet<string>;
  /** YYYY-MM-DD → "HH:MM" close on shortened sessions */
  earlyCloses: ReadonlyMap<string, string>;
}

export type MarketSessionReason = 'open' | 'weekend' | 'holiday' | 'pre-open' | 'after-close';

export interface MarketSession {
  open: boolean;
  reason: MarketSessionReason;
  /** Local session date in the calendar's zone */
  dateKey: string;
  /** "HH:MM" close that applies to `dateKey`, or null on a closed day */
  closeTime: string | null;
  /** Wall-clock minutes until the next session opens; absent while open */
  minutesUntilOpen?: number;
}

const ClockSchema = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'expected HH:MM');
const DateKeySchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');

const MarketCalendarFileSchema = z.object({
  timeZone: z.string().min(1),
  open: ClockSchema,
  close: ClockSchema,
  weekdays: z.array(z.number().int().min(0).max(6)).min(1),
  holidays: z.array(DateKeySchema).default([]),
  earlyCloses: z.record(DateKeySchema, ClockSchema).default({}),
});

export type MarketCalendarFile = z.input<typeof MarketCalendarFileSchema>;

export function buildMarketCalendar(raw: unknown): MarketCalendar {
  const file = MarketCalendarFileSchema.parse(raw);
  if (parseClockMinutes(file.open) >= parseClockMinutes(file.close)) {
    throw new Error(`Market calendar open (${file.open}) must be earlier than close (${file.close})`);
  }
  return {
    timeZone: file.timeZone,
    open: file.open,
    close: file.close,
    weekdays: new Set(file.weekdays),
    holidays: new Set(file.holidays),
    earlyCloses: new Map(Object.entries(file.earlyCloses)),
  };
}

/**
 * Read the bundled calendar. `overrides` replaces the zone and session bounds
 * (from configuration) while keeping the holiday tables.
 */
export function loadMarketCalendar(
  overrides: Partial<Pick<MarketCalendarFile, 'timeZone' | 'open' | 'close'>> = {},
  fileUrl: URL = new URL('../data/marketCalendar.json', import.meta.url),
): MarketCalendar {
  const raw: unknown = JSON.parse(readFileSync(fileUrl, 'utf8'));
  const base = MarketCalendarFileSchema.parse(raw);
  return buildMarketCalendar({
    ...base,
    timeZone: overrides.timeZone || base.timeZone,
    open: overrides.open || base.open,
    close: overrides.close || base.close,
  });
}

function isSessionDay(dateKey: string, calendar: MarketCalendar): boolean {
  return calendar.weekdays.has(weekdayOfDateKey(dateKey)) && !calendar.holidays.has(dateKey);
}

function closeTimeFor(dateKey: string, calendar: MarketCalendar): string {
  return calendar.earlyCloses.get(dateKey) ?? calendar.close;
}

function minutesUntilNextSession(
  dateKey: string,
  minuteOfDay: number,
  openMinute: number,
  calendar: MarketCalendar,
): number | undefined {
  let cursor = dateKey;
  for (let daysAhead = 1; daysAhead <= 15; daysAhead++) {
    cursor = addDaysToDateKey(cursor, 1);
    if (isSessionDay(cursor, calendar)) {
      return daysAhead * 24 * 60 - minuteOfDay + openMinute;
    }
  }
  return undefined;
}

export function describeMarketSession(now: Date, calendar: MarketCalendar): MarketSession {
  const parts = zonedDateTimeParts(now, calendar.timeZone);
  const dateKey = dateKeyFromYmdParts(parts.year, parts.month, parts.day);
  const minuteOfDay = parts.hour * 60 + parts.minute;
  const openMinute = parseClockMinutes(calendar.open);

  const closed = (reason: MarketSessionReason, closeTime: string | null, minutesUntilOpen?: number): MarketSession => ({
    open: false,
    reason,
    dateKey,
    closeTime,
    ...(minutesUntilOpen === undefined ? {} : { minutesUntilOpen }),
  });

  if (!calendar.weekdays.has(parts.weekday)) {
    return closed('weekend', null, minutesUntilNextSession(dateKey, minuteOfDay, openMinute, calendar));
  }
  if (calendar.holidays.has(dateKey)) {
    return closed('holiday', null, minutesUntilNextSession(dateKey, minuteOfDay, openMinute, calendar));
  }

  const closeTime = closeTimeFor(dateKey, calendar);
  if (minuteOfDay < openMinute) {
    return closed('pre-open', closeTime, openMinute - minuteOfDay);
  }
  if (minuteOfDay >= parseClockMinutes(closeTime)) {
    return closed('after-close', closeTime, minutesUntilNextSession(dateKey, minuteOfDay, openMinute, calendar));
  }
  return { open: true, reason: 'open', dateKey, closeTime };
}

export function isMarketOpen(now: Date, calendar: MarketCalendar): boolean {
  return describeMarketSession(now, calendar).open;
}
