import { format, fromUnixTime, isSameDay, isValid, parse, subDays } from 'date-fns';

const FLICKR_DATE_TIME = 'yyyy-MM-dd HH:mm:ss';

/**
 * Flickr reports upload dates as Unix seconds and taken dates as
 * `YYYY-MM-DD HH:MM:SS` wall-clock time. Both read as server-local time.
 */
export function parseTimestamp(value: string): Date | undefined {
  const date = /^\d+$/.test(value) ? fromUnixTime(Number(value)) : parse(value, FLICKR_DATE_TIME, new Date());
  return isValid(date) ? date : undefined;
}

/**
 * "Today at 3:45 PM", "Yesterday at 11:20 AM" or "Apr 15, 2025, 9:00 PM".
 * Values that are not a recognised timestamp are returned as they came.
 */
export function formatTimestamp(value: string, now: Date = new Date()): string {
  const date = parseTimestamp(value);
  if (!date) {
    return value;
  }

  if (isSameDay(date, now)) {
    return `Today at ${format(date, 'h:mm a')}`;
  }

  if (isSameDay(date, subDays(now, 1))) {
    return `Yesterday at ${format(date, 'h:mm a')}`;
  }

  return format(date, 'MMM d, yyyy, h:mm a');
}
