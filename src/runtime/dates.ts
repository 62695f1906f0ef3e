// Dates are UTC throughout so scripts see the same values on every host.

const ISO_DATE_RE =
  /^([+-]?\d{4,6})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2}))?(?:\.(\d+))?(Z|z|[+-]\d{2}:?\d{2})?)?$/;

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/**
 * Epoch milliseconds for a UTC calendar date. Out-of-range months and days
 * roll over; years 0 to 99 mean 1900 to 1999.
 */
export function utcFromComponents(
  year: number,
  monthZeroBased = 0,
  day = 1,
  hour = 0,
  minute = 0,
  second = 0,
  millisecond = 0
): number {
  return Date.UTC(year, monthZeroBased, day, hour, minute, second, millisecond);
}

/**
 * `Date.parse` for ISO-8601 style text: `YYYY-MM-DD`, optionally followed by
 * `THH:mm[:ss[.fff]]` and a `Z` or `+HH:mm` offset. Undefined when the text
 * does not match or names an impossible date.
 */
export function parseDateString(src: string): number | undefined {
  const match = ISO_DATE_RE.exec(src.trim());
  if (!match) return undefined;
  const [, yearText, monthText, dayText, hourText, minuteText, secondText, fraction, zone] = match;
  const year = Number(yearText);
  const month = Number(monthText);
  const day = Number(dayText);
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) return undefined;
  const hour = Number(hourText ?? 0);
  const minute = Number(minuteText ?? 0);
  const second = Number(secondText ?? 0);
  if (hour > 23 || minute > 59 || second > 59) return undefined;
  const millisecond = fraction ? Number(fraction.slice(0, 3).padEnd(3, "0")) : 0;
  let offsetMinutes = 0;
  if (zone && zone !== "Z" && zone !== "z") {
    const digits = zone.slice(1).replace(":", "");
    const tzHour = Number(digits.slice(0, 2));
    const tzMinute = Number(digits.slice(2));
    if (tzHour > 23 || tzMinute > 59) return undefined;
    offsetMinutes = (zone.startsWith("-") ? -1 : 1) * (tzHour * 60 + tzMinute);
  }
  const ms = Date.UTC(year, month - 1, day, hour, minute, second, millisecond);
  // Date.UTC maps two-digit years into the 1900s; ISO years are literal
  const fixed = year >= 0 && year <= 99 ? new Date(ms).setUTCFullYear(year) : ms;
  return fixed - offsetMinutes * 60_000;
}

/** ISO-8601 in UTC, or undefined for an invalid date. */
export function formatIsoDate(ms: number): string | undefined {
  if (!Number.isFinite(ms) || Math.abs(ms) > 8.64e15) return undefined;
  return new Date(ms).toISOString();
}

export interface DateParts {
  year: number;
  month: number;
  date: number;
  day: number;
  hours: number;
  minutes: number;
  seconds: number;
  milliseconds: number;
}

export function dateParts(ms: number): DateParts {
  const d = new Date(ms);
  return {
    year: d.getUTCFullYear(),
    month: d.getUTCMonth(),
    date: d.getUTCDate(),
    day: d.getUTCDay(),
    hours: d.getUTCHours(),
    minutes: d.getUTCMinutes(),
    seconds: d.getUTCSeconds(),
    milliseconds: d.getUTCMilliseconds(),
  };
}
