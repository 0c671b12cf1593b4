import { describe, expect, it } from 'vitest';
import { inngestCron, nextOccurrence } from './schedule.js';

describe('nextOccurrence', () => {
  it('finds the evening run in UTC', () => {
    const next = nextOccurrence('0 20 * * *', 'UTC', new Date('2024-10-05T12:00:00Z'));
    expect(next.toISOString()).toBe('2024-10-05T20:00:00.000Z');
  });

  it('rolls over to the next day after the run time', () => {
    const next = nextOccurrence('0 20 * * *', 'UTC', new Date('2024-10-05T20:30:00Z'));
    expect(next.toISOString()).toBe('2024-10-06T20:00:00.000Z');
  });

  it('evaluates the expression in the configured time zone', () => {
    const next = nextOccurrence('0 20 * * *', 'America/New_York', new Date('2024-10-05T12:00:00Z'));
    expect(next.toISOString()).toBe('2024-10-06T00:00:00.000Z');
  });
});

describe('inngestCron', () => {
  it('prefixes the time zone', () => {
    expect(inngestCron('0 20 * * *', 'Europe/Paris')).toBe('TZ=Europe/Paris 0 20 * * *');
  });
});
