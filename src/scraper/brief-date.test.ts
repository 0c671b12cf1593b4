import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../lib/errors.js';
import { briefDateFor, briefDateFromParts, parseBriefDate } from './brief-date.js';

describe('briefDateFromParts', () => {
  it('builds every form of the date', () => {
    expect(briefDateFromParts(2024, 10, 5)).toEqual({
      year: 2024,
      month: 10,
      day: 5,
      iso: '2024-10-05',
      display: '2024 October 5',
      portal: '2024_October_5',
    });
  });

  it('rejects days that do not exist', () => {
    expect(() => briefDateFromParts(2023, 2, 29)).toThrow(ConfigurationError);
  });
});

describe('briefDateFor', () => {
  const instant = new Date('2024-10-06T02:30:00Z');

  it('uses the calendar day in UTC', () => {
    expect(briefDateFor(instant, 'UTC').iso).toBe('2024-10-06');
  });

  it('uses the calendar day in the given time zone', () => {
    expect(briefDateFor(instant, 'America/New_York').portal).toBe('2024_October_5');
  });
});

describe('parseBriefDate', () => {
  it('accepts a leap day', () => {
    expect(parseBriefDate('2024-02-29').display).toBe('2024 February 29');
  });

  it('rejects other formats', () => {
    expect(() => parseBriefDate('10/05/2024')).toThrow('Expected a date as YYYY-MM-DD, got "10/05/2024"');
  });

  it('rejects impossible dates', () => {
    expect(() => parseBriefDate('2024-13-01')).toThrow('Not a calendar date: 2024-13-01');
  });
});
