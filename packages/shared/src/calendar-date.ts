export const ISO_DATE_FORMAT = 'YYYY-MM-DD';

const DATE_TOKENS = ['YYYY', 'MM', 'DD'] as const;
const TOKEN_PATTERNS: Record<(typeof DATE_TOKENS)[number], string> = {
  YYYY: '(?<year>\\d{4})',
  MM: '(?<month>\\d{2})',
  DD: '(?<day>\\d{2})',
};
const SEPARATORS = /^[-/.]*$/;
const DAY_MS = 24 * 60 * 60 * 1000;

const patterns = new Map<string, RegExp>();

/**
 * A layout holds YYYY, MM and DD exactly once each, optionally separated by `-`, `/` or `.`
 */
export function isSupportedDateFormat(format: string): boolean {
  let rest = format;
  for (const token of DATE_TOKENS) {
    if (rest.split(token).length !== 2) {
      return false;
    }
    rest = rest.replace(token, '');
  }
  return SEPARATORS.test(rest);
}

function patternFor(format: string): RegExp {
  const cached = patterns.get(format);
  if (cached) {
    return cached;
  }

  if (!isSupportedDateFormat(format)) {
    throw new Error(`unsupported date format: ${format}`);
  }

  let source = '';
  for (let index = 0; index < format.length; ) {
    const token = DATE_TOKENS.find((candidate) => format.startsWith(candidate, index));
    if (token) {
      source += TOKEN_PATTERNS[token];
      index += token.length;
    } else {
      source += `\\${format[index]}`;
      index += 1;
    }
  }

  const pattern = new RegExp(`^${source}$`);
  patterns.set(format, pattern);
  return pattern;
}

/**
 * Parses a calendar day laid out as `format` (default `YYYY-MM-DD`) into a UTC-midnight Date.
 * Returns null for anything else, including impossible days like 2024-02-30.
 *
 * @throws Error when `format` is not a supported layout
 */
export function parseCalendarDate(value: string, format: string = ISO_DATE_FORMAT): Date | null {
  const groups = patternFor(format).exec(value)?.groups;
  if (!groups) {
    return null;
  }

  const year = Number(groups.year);
  const month = Number(groups.month);
  const day = Number(groups.day);
  const date = new Date(Date.UTC(year, month - 1, day));

  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }

  return date;
}

export function formatCalendarDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

/**
 * Every calendar day in [start, end], inclusive. Empty when start > end.
 */
export function eachDay(start: Date, end: Date): Date[] {
  const days: Date[] = [];
  for (let current = startOfUtcDay(start); current <= end; current = addDays(current, 1)) {
    days.push(current);
  }
  return days;
}
