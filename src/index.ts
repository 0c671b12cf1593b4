/**
 * daily-brief - scheduled current-events digest
 *
 * Main entry point for the long-running server.
 * Serves the HTTP API and the Inngest functions via Express.
 */
import 'dotenv/config';
import { serve } from 'inngest/express';
import chalk from 'chalk';
import boxen from 'boxen';
import { inngest } from './inngest/client.js';
import { EVENTS } from './inngest/events.js';
import { getConfig, getRecipients } from './lib/config.js';
import { configureLogging, createLogger } from './lib/logger.js';
import { nextOccurrence } from './lib/schedule.js';
import { createApp } from './server.js';
import { dailyBriefCron, dailyBriefOnDemand } from './workers/daily-brief-worker.js';

const config = getConfig();
configureLogging(config.logging);
const log = createLogger('index');

const app = createApp({
  dataPath: config.paths.data,
  schedule: config.schedule,
  requestRun: async (request) => {
    const { ids } = await inngest.send({ name: EVENTS.RUN_REQUESTED, data: request });
    return ids;
  },
});

// Serve Inngest functions
app.use(
  '/api/inngest',
  serve({
    client: inngest,
    functions: [dailyBriefCron, dailyBriefOnDemand],
    signingKey: config.inngest.signingKey,
  })
);

const port = config.server.port;

// Start server
app.listen(port, () => {
  const next = nextOccurrence(config.schedule.cron, config.schedule.timezone);

  console.log(
    boxen(
      `${chalk.bold.cyan('daily-brief')} ${chalk.gray('v0.1.0')}\n\n` +
        `${chalk.green('▸')} Server:   ${chalk.yellow(`http://localhost:${port}`)}\n` +
        `${chalk.green('▸')} Inngest:  ${chalk.yellow(`http://localhost:${port}/api/inngest`)}\n` +
        `${chalk.green('▸')} Schedule: ${chalk.yellow(`${config.schedule.cron} (${config.schedule.timezone})`)}\n` +
        `${chalk.green('▸')} Next run: ${chalk.yellow(next.toISOString())}\n\n` +
        `${chalk.dim('Dashboard:')} ${chalk.blue(config.inngest.baseUrl)}`,
      {
        padding: 1,
        margin: 1,
        borderStyle: 'round',
        borderColor: 'cyan',
      }
    )
  );
  log.info(`Recipients configured: ${getRecipients().length}`);
});
