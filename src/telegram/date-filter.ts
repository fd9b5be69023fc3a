/**
 * Date Window Filtering
 *
 * Narrows a lazily produced message sequence to an inclusive calendar-date
 * window, and parses/validates windows supplied by the entry points.
 *
 * @module telegram/date-filter
 */

import { z } from 'zod';
import { ArchivedMessage, DateWindow } from '../types';
import { InvalidDateWindowError } from '../errors/error-handler';

/**
 * Matches a calendar date in YYYY-MM-DD form
 */
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * A `YYYY-MM-DD` string naming a date that exists on the calendar
 * (rejects 2024-02-30 and friends)
 */
const calendarDateSchema = z
  .string()
  .trim()
  .regex(DATE_PATTERN)
  .refine((value) => {
    const parsed = new Date(`${value}T00:00:00.000Z`);
    return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
  });

/**
 * Raw window bounds as received from a query string or CLI flags
 */
export interface RawDateWindow {
  from?: string | null;
  to?: string | null;
}

/**
 * Parse and validate a date window
 *
 * Empty or missing bounds are treated as absent.
 *
 * @param raw - Optional `from` / `to` strings in YYYY-MM-DD form
 * @returns A validated DateWindow
 * @throws InvalidDateWindowError if a bound is malformed or from > to
 *
 * @example
 * parseDateWindow({ from: '2024-01-01', to: '2024-01-31' })
 * // { from: '2024-01-01', to: '2024-01-31' }
 *
 * parseDateWindow({})
 * // {}
 */
export function parseDateWindow(raw: RawDateWindow): DateWindow {
  const window: DateWindow = {};

  const from = parseBound(raw.from, 'from_date');
  const to = parseBound(raw.to, 'to_date');
  if (from !== undefined) {
    window.from = from;
  }
  if (to !== undefined) {
    window.to = to;
  }

  if (window.from !== undefined && window.to !== undefined && window.from > window.to) {
    throw new InvalidDateWindowError('from_date must not be after to_date.', 'from_date');
  }

  return window;
}

function parseBound(value: string | null | undefined, key: string): string | undefined {
  if (value === undefined || value === null || value.trim() === '') {
    return undefined;
  }
  const result = calendarDateSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidDateWindowError('Invalid date format. Use YYYY-MM-DD.', key);
  }
  return result.data;
}

/**
 * Get the UTC calendar date (YYYY-MM-DD) of an ISO timestamp
 */
export function utcDateOf(timestamp: string): string {
  return new Date(timestamp).toISOString().slice(0, 10);
}

/**
 * Check whether a message falls inside a window
 *
 * ISO calendar dates order lexicographically, so plain string comparison
 * is enough.
 */
export function isWithinWindow(message: ArchivedMessage, window: DateWindow): boolean {
  const date = utcDateOf(message.timestamp);
  if (window.from !== undefined && date < window.from) {
    return false;
  }
  if (window.to !== undefined && date > window.to) {
    return false;
  }
  return true;
}

/**
 * Lazily filter a message sequence down to a window
 *
 * Order-preserving and single-pass: each upstream message is pulled only
 * when the consumer asks for the next output. With both bounds absent every
 * message passes.
 *
 * @param messages - Upstream message sequence
 * @param window - Inclusive date window
 */
export async function* filterByWindow(
  messages: AsyncIterable<ArchivedMessage>,
  window: DateWindow
): AsyncGenerator<ArchivedMessage> {
  for await (const message of messages) {
    if (isWithinWindow(message, window)) {
      yield message;
    }
  }
}

/**
 * Unix time in seconds of midnight UTC at the start of a YYYY-MM-DD date
 */
export function startOfDayEpochSeconds(date: string): number {
  return Math.floor(Date.parse(`${date}T00:00:00.000Z`) / 1000);
}

/**
 * Unix time in seconds of midnight UTC at the start of the following day
 */
export function startOfNextDayEpochSeconds(date: string): number {
  return startOfDayEpochSeconds(date) + MS_PER_DAY / 1000;
}

/**
 * Window covering the single calendar day before `now`, where "day" is
 * judged in the given IANA time zone
 *
 * @example
 * // 07:30 UTC on 10 March 2024 is still 9 March in Los Angeles
 * previousDayWindow(new Date('2024-03-10T07:30:00Z'), 'America/Los_Angeles')
 * // { from: '2024-03-08', to: '2024-03-08' }
 */
export function previousDayWindow(now: Date, timeZone: string): DateWindow {
  const today = calendarDateIn(now, timeZone);
  const yesterday = new Date(Date.parse(`${today}T00:00:00.000Z`) - MS_PER_DAY)
    .toISOString()
    .slice(0, 10);
  return { from: yesterday, to: yesterday };
}

/**
 * Calendar date of an instant in a time zone
 *
 * @throws InvalidDateWindowError if the time zone is unknown
 */
export function calendarDateIn(instant: Date, timeZone: string): string {
  let formatter: Intl.DateTimeFormat;
  try {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
    });
  } catch {
    throw new InvalidDateWindowError(`Unknown time zone: ${timeZone}`, 'timezone');
  }

  const parts = formatter.formatToParts(instant);
  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? '';

  return `${part('year')}-${part('month')}-${part('day')}`;
}
