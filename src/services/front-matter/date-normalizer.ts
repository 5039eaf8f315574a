/**
 * Publication date normalization
 *
 * Attempts run in order; the first match wins. A string no attempt accepts is
 * returned unchanged. Values without an offset are read as UTC.
 */

export type DateParseResult = { ok: true; value: Date } | { ok: false };

export type DateParseAttempt = (input: string) => DateParseResult;

const FAILED: DateParseResult = { ok: false };

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?(Z|[+-]\d{2}:?\d{2})?$/;
const SPACED_DATETIME_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;
const DATE_ONLY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

interface DateParts {
  year: number;
  month: number;
  day: number;
  hour?: number;
  minute?: number;
  second?: number;
  millisecond?: number;
}

/**
 * Build a UTC date, rejecting components the calendar does not have (2023-02-30, 25:00)
 */
function utcDate(parts: DateParts): Date | undefined {
  const { year, month, day, hour = 0, minute = 0, second = 0, millisecond = 0 } = parts;
  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) {
    return undefined;
  }
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second, millisecond));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return undefined;
  }
  return date;
}

/**
 * Offset suffix in minutes east of UTC
 */
function offsetMinutes(suffix: string | undefined): number | undefined {
  if (suffix === undefined || suffix === 'Z') {
    return 0;
  }
  const match = /^([+-])(\d{2}):?(\d{2})$/.exec(suffix);
  if (!match) {
    return undefined;
  }
  const hours = Number(match[2]);
  const minutes = Number(match[3]);
  if (hours > 23 || minutes > 59) {
    return undefined;
  }
  return (match[1] === '-' ? -1 : 1) * (hours * 60 + minutes);
}

const parseIso: DateParseAttempt = (input) => {
  const match = ISO_PATTERN.exec(input);
  if (!match) {
    return FAILED;
  }
  const fraction = match[7] ?? '';
  const date = utcDate({
    year: Number(match[1]),
    month: Number(match[2]),
    day: Number(match[3]),
    hour: Number(match[4]),
    minute: Number(match[5]),
    second: Number(match[6] ?? 0),
    millisecond: fraction ? Number(fraction.padEnd(3, '0').slice(0, 3)) : 0,
  });
  const offset = offsetMinutes(match[8]);
  if (!date || offset === undefined) {
    return FAILED;
  }
  return { ok: true, value: new Date(date.getTime() - offset * 60_000) };
};

const parseSpacedDateTime: DateParseAttempt = (input) => {
  const match = SPACED_DATETIME_PATTERN.exec(input);
  if (!match) {
    return FAILED;
  }
  const date = utcDate({
    year: Number(match[1]),
    month: Number(match[2]),
    day: Number(match[3]),
    hour: Number(match[4]),
    minute: Number(match[5]),
    second: Number(match[6]),
  });
  return date ? { ok: true, value: date } : FAILED;
};

const parseDateOnly: DateParseAttempt = (input) => {
  const match = DATE_ONLY_PATTERN.exec(input);
  if (!match) {
    return FAILED;
  }
  const date = utcDate({ year: Number(match[1]), month: Number(match[2]), day: Number(match[3]) });
  return date ? { ok: true, value: date } : FAILED;
};

export const DATE_PARSE_ATTEMPTS: readonly DateParseAttempt[] = [
  parseIso,
  parseSpacedDateTime,
  parseDateOnly,
];

/**
 * Parse a date string with the first attempt that accepts it
 */
export function parseDate(input: string): DateParseResult {
  const trimmed = input.trim();
  for (const attempt of DATE_PARSE_ATTEMPTS) {
    const result = attempt(trimmed);
    if (result.ok) {
      return result;
    }
  }
  return FAILED;
}

/**
 * Normalize a front-matter date value. Dates and non-string values pass through.
 */
export function normalizeDate(value: unknown): unknown {
  if (typeof value !== 'string') {
    return value;
  }
  const result = parseDate(value);
  return result.ok ? result.value : value;
}
