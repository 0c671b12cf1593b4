import { ConfigurationError } from '../lib/errors.js';

const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
] as const;

/**
 * A calendar day in the forms the brief needs
 */
export interface BriefDate {
  year: number;
  /** 1-12 */
  month: number;
  day: number;
  /** 2024-10-05 */
  iso: string;
  /** 2024 October 5 */
  display: string;
  /** 2024_October_5, the portal page segment */
  portal: string;
}

const pad = (n: number) => n.toString().padStart(2, '0');

function isRealDate(year: number, month: number, day: number): boolean {
  const probe = new Date(Date.UTC(year, month - 1, day));
  return probe.getUTCFullYear() === year && probe.getUTCMonth() === month - 1 && probe.getUTCDate() === day;
}

export function briefDateFromParts(year: number, month: number, day: number): BriefDate {
  if (!isRealDate(year, month, day)) {
    throw new ConfigurationError(`Not a calendar date: ${year}-${pad(month)}-${pad(day)}`);
  }
  const display = `${year} ${MONTH_NAMES[month - 1]} ${day}`;
  return {
    year,
    month,
    day,
    iso: `${year}-${pad(month)}-${pad(day)}`,
    display,
    portal: display.replace(/ /g, '_'),
  };
}

/**
 * The calendar day `now` falls on in `timeZone`
 */
export function briefDateFor(now: Date, timeZone: string): BriefDate {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: 'numeric',
    day: 'numeric',
  }).formatToParts(now);

  const pick = (type: Intl.DateTimeFormatPartTypes): number => {
    const part = parts.find((p) => p.type === type);
    if (!part) {
      throw new ConfigurationError(`Could not resolve ${type} for time zone ${timeZone}`);
    }
    return parseInt(part.value, 10);
  };

  return briefDateFromParts(pick('year'), pick('month'), pick('day'));
}

/**
 * Parse a YYYY-MM-DD string
 */
export function parseBriefDate(iso: string): BriefDate {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(iso.trim());
  if (!match) {
    throw new ConfigurationError(`Expected a date as YYYY-MM-DD, got "${iso}"`);
  }
  return briefDateFromParts(parseInt(match[1], 10), parseInt(match[2], 10), parseInt(match[3], 10));
}
