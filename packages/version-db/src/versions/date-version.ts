/**
 * Date versions: the `version-date` scheme.
 *
 * `YYYY-MM-DD` naming a real calendar day, optionally followed by numeric
 * disambiguators (`2021-01-01.2`) for several releases on one day.
 *
 * @module versions/date-version
 */

import { compareDigits } from './dot-version.js';

export interface DateVersion {
  readonly original: string;
  /** The `YYYY-MM-DD` part */
  readonly date: string;
  readonly disambiguators: readonly string[];
}

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})((?:\.(?:0|[1-9]\d*))*)$/;

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  switch (month) {
    case 2:
      return isLeapYear(year) ? 29 : 28;
    case 4:
    case 6:
    case 9:
    case 11:
      return 30;
    default:
      return 31;
  }
}

export function tryParseDate(text: string): DateVersion | undefined {
  const match = DATE_PATTERN.exec(text);
  if (!match) return undefined;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12) return undefined;
  if (day < 1 || day > daysInMonth(year, month)) return undefined;

  return {
    original: text,
    date: `${match[1]}-${match[2]}-${match[3]}`,
    disambiguators: match[4] === '' ? [] : match[4].slice(1).split('.'),
  };
}

/**
 * Chronological order, then disambiguators numerically (missing ones first)
 */
export function compareDateVersions(a: DateVersion, b: DateVersion): number {
  // Fixed-width ISO dates order lexically
  if (a.date !== b.date) return a.date < b.date ? -1 : 1;

  const shared = Math.min(a.disambiguators.length, b.disambiguators.length);
  for (let i = 0; i < shared; i++) {
    const result = compareDigits(a.disambiguators[i], b.disambiguators[i]);
    if (result !== 0) return result;
  }
  return Math.sign(a.disambiguators.length - b.disambiguators.length);
}
