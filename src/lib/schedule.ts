import { CronExpressionParser } from 'cron-parser';

/**
 * Next time the cron expression fires after `from`, evaluated in `timeZone`
 */
export function nextOccurrence(cron: string, timeZone: string, from: Date = new Date()): Date {
  return CronExpressionParser.parse(cron, { currentDate: from, tz: timeZone }).next().toDate();
}

/**
 * Cron trigger string with the time zone prefix inngest understands
 */
export function inngestCron(cron: string, timeZone: string): string {
  return `TZ=${timeZone} ${cron}`;
}
