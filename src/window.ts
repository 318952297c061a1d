// Check window - which receipt times count for today's check
import { format, parseISO, subDays } from 'date-fns';
import { formatInTimeZone, fromZonedTime } from 'date-fns-tz';
import { DEFAULT_WINDOW_END_HOUR, DEFAULT_WINDOW_START_HOUR, sanitizeHour } from './settings.js';
import type { CheckWindow } from './types.js';

const DAY_FORMAT = 'yyyy-MM-dd';
const LABEL_FORMAT = 'yyyy-MM-dd HH:mm';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Calendar day of an instant in the given zone, as yyyy-MM-dd.
 */
export function calendarDay(instant: Date, timeZone: string): string {
  return formatInTimeZone(instant, timeZone, DAY_FORMAT);
}

/**
 * The calendar day before the given yyyy-MM-dd day.
 */
export function previousDay(day: string): string {
  return format(subDays(parseISO(day), 1), DAY_FORMAT);
}

/**
 * Instant of hour:minute on a calendar day, read as wall-clock time in the zone.
 */
export function atZonedTime(day: string, hour: number, minute: number, timeZone: string): Date {
  return fromZonedTime(`${day}T${pad(hour)}:${pad(minute)}:00.000`, timeZone);
}

/**
 * Compute the scan window for a check run at `now`.
 *
 * The window opens on the previous calendar day at `startHour` and closes today
 * at `endHour`, but never later than `now`. Backups run overnight, so this spans
 * "yesterday evening" through "this morning".
 *
 * Inverted configurations (end before start) are returned as-is and match nothing.
 */
export function computeCheckWindow(
  now: Date,
  startHour: unknown,
  endHour: unknown,
  timeZone: string
): CheckWindow {
  const start = sanitizeHour(startHour, DEFAULT_WINDOW_START_HOUR);
  const end = sanitizeHour(endHour, DEFAULT_WINDOW_END_HOUR);

  const today = calendarDay(now, timeZone);
  const windowStart = atZonedTime(previousDay(today), start, 0, timeZone);
  const endTarget = atZonedTime(today, end, 0, timeZone);
  const windowEnd = endTarget.getTime() > now.getTime() ? new Date(now.getTime()) : endTarget;

  return { start: windowStart, end: windowEnd };
}

/**
 * Inclusive on both ends.
 */
export function isWithinWindow(instant: Date, window: CheckWindow): boolean {
  const time = instant.getTime();
  return time >= window.start.getTime() && time <= window.end.getTime();
}

/**
 * Window bounds formatted in the zone, for notes and reports
 */
export function windowLabels(window: CheckWindow, timeZone: string): { start: string; end: string } {
  return {
    start: formatInTimeZone(window.start, timeZone, LABEL_FORMAT),
    end: formatInTimeZone(window.end, timeZone, LABEL_FORMAT),
  };
}

/**
 * Human label of the configured window hours, e.g. "16:00 (previous day) to 09:00"
 */
export function describeWindowHours(startHour: number, endHour: number): string {
  return `${pad(startHour)}:00 (previous day) to ${pad(endHour)}:00`;
}

/**
 * Format an instant as yyyy-MM-dd HH:mm in the zone
 */
export function formatInstant(instant: Date, timeZone: string): string {
  return formatInTimeZone(instant, timeZone, LABEL_FORMAT);
}
