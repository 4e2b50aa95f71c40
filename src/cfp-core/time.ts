// Wall-clock helpers for slot boundaries. Times travel as `HH:MM:SS`
// strings, which order correctly under plain string comparison.

const TIME_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)(?::([0-5]\d))?$/;
const END_OF_DAY_PATTERN = /^24:00(?::00)?$/;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export interface TimeInterval {
  start: string;
  end: string;
}

/**
 * `9:00`-style input is rejected; `09:00` becomes `09:00:00`. `24:00` is
 * only accepted with `endOfDay`, for intervals that run to midnight.
 */
export function normalizeTime(value: string, options: { endOfDay?: boolean } = {}): string | null {
  if (options.endOfDay && END_OF_DAY_PATTERN.test(value)) return '24:00:00';
  const match = TIME_PATTERN.exec(value);
  if (!match) return null;
  return `${match[1]}:${match[2]}:${match[3] ?? '00'}`;
}

export function isCalendarDate(value: string): boolean {
  const match = DATE_PATTERN.exec(value);
  if (!match) return false;
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

/** Half-open intervals: touching ends (10:00 / 10:00) do not overlap. */
export function intervalsOverlap(a: TimeInterval, b: TimeInterval): boolean {
  return a.start < b.end && b.start < a.end;
}
