/**
 * Daily Brief Worker
 *
 * Two entry points to the same work:
 * - dailyBriefCron fires on the configured schedule
 * - dailyBriefOnDemand runs on a brief/run.requested event
 *
 * No retries: a retried run would resend messages that already went out.
 */
import type { GetStepTools } from 'inngest';
import { inngest } from '../inngest/client.js';
import { EVENTS, RunRequestedSchema, type RunRequestedEvent } from '../inngest/events.js';
import { getConfig, getScheduleConfig } from '../lib/config.js';
import { inngestCron } from '../lib/schedule.js';
import { DailyBriefPipeline } from '../pipeline/daily-brief.js';
import { briefDateFor, parseBriefDate } from '../scraper/brief-date.js';
import type { RunTrigger } from '../types/brief.js';

type StepTools = GetStepTools<typeof inngest>;

async function runDailyBrief(step: StepTools, trigger: RunTrigger, request: RunRequestedEvent) {
  const config = getConfig();

  // Resolved once so a re-executed function keeps the same day
  const iso = await step.run('resolve-date', () =>
    request.date ? parseBriefDate(request.date).iso : briefDateFor(new Date(), config.schedule.timezone).iso
  );
  const date = parseBriefDate(iso);
  const dryRun = request.dryRun ?? config.messaging.dryRun;
  const pipeline = DailyBriefPipeline.fromConfig(config, { dryRun });

  const run = await step.run('open-run', () => pipeline.openRun(date, { trigger, dryRun }));
  const events = await step.run('collect-events', () => pipeline.collect(date, run));
  return step.run('deliver-brief', () => pipeline.deliver(date, events, run));
}

const schedule = getScheduleConfig();

export const dailyBriefCron = inngest.createFunction(
  {
    id: 'daily-brief-cron',
    name: 'Daily Brief (scheduled)',
    concurrency: { limit: 1 },
    retries: 0,
  },
  { cron: inngestCron(schedule.cron, schedule.timezone) },
  async ({ step, logger }) => {
    logger.info(`Scheduled daily brief (${schedule.cron}, ${schedule.timezone})`);
    return runDailyBrief(step, 'cron', {});
  }
);

export const dailyBriefOnDemand = inngest.createFunction(
  {
    id: 'daily-brief-on-demand',
    name: 'Daily Brief (on demand)',
    concurrency: { limit: 1 },
    retries: 0,
  },
  { event: EVENTS.RUN_REQUESTED },
  async ({ event, step, logger }) => {
    const request = RunRequestedSchema.parse(event.data);
    logger.info(`Daily brief requested${request.date ? ` for ${request.date}` : ''}`);
    return runDailyBrief(step, 'event', request);
  }
);
