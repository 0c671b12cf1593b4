#!/usr/bin/env node
/**
 * daily-brief CLI
 *
 *   daily-brief run [--date YYYY-MM-DD] [--dry-run] [--mock-ai]
 *   daily-brief next
 *
 * `run` is what the CI workflow invokes. Exit status is 0 when the brief
 * went out and 1 when the run failed.
 */
import 'dotenv/config';
import { realpathSync } from 'node:fs';
import { parseArgs } from 'node:util';
import { pathToFileURL } from 'node:url';
import chalk from 'chalk';
import { loadConfig, type Config } from './lib/config.js';
import { toErrorMessage } from './lib/errors.js';
import { configureLogging, createLogger } from './lib/logger.js';
import { nextOccurrence } from './lib/schedule.js';
import { DailyBriefPipeline } from './pipeline/daily-brief.js';
import { briefDateFor, parseBriefDate } from './scraper/brief-date.js';

const log = createLogger('cli');

export const USAGE = `Usage: daily-brief <command> [options]

Commands:
  run      Scrape, summarize and deliver today's brief
  next     Print the next scheduled run
  help     Show this message

Options for run:
  --date YYYY-MM-DD   Brief for another day
  --dry-run           Log messages instead of sending them
  --mock-ai           Use canned model responses`;

export interface CliDependencies {
  loadConfig: () => Config;
  createPipeline: (config: Config, overrides: { dryRun?: boolean; useMock?: boolean }) => Pick<DailyBriefPipeline, 'run'>;
  print: (text: string) => void;
  now: () => Date;
}

const defaultDependencies: CliDependencies = {
  loadConfig: () => loadConfig(),
  createPipeline: (config, overrides) => DailyBriefPipeline.fromConfig(config, overrides),
  print: (text) => console.log(text),
  now: () => new Date(),
};

/**
 * Run the CLI and resolve to the process exit code
 */
export async function main(argv: string[], deps: CliDependencies = defaultDependencies): Promise<number> {
  let parsed;
  try {
    parsed = parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        date: { type: 'string' },
        'dry-run': { type: 'boolean', default: false },
        'mock-ai': { type: 'boolean', default: false },
        help: { type: 'boolean', short: 'h', default: false },
      },
    });
  } catch (err) {
    deps.print(`${toErrorMessage(err)}\n\n${USAGE}`);
    return 2;
  }

  const [command = 'help'] = parsed.positionals;
  if (parsed.values.help || command === 'help') {
    deps.print(USAGE);
    return 0;
  }

  if (command !== 'run' && command !== 'next') {
    deps.print(`Unknown command: ${command}\n\n${USAGE}`);
    return 2;
  }

  try {
    const config = deps.loadConfig();
    configureLogging(config.logging);

    if (command === 'next') {
      const next = nextOccurrence(config.schedule.cron, config.schedule.timezone, deps.now());
      deps.print(`${config.schedule.cron} (${config.schedule.timezone}) -> ${next.toISOString()}`);
      return 0;
    }

    const date = parsed.values.date
      ? parseBriefDate(parsed.values.date)
      : briefDateFor(deps.now(), config.schedule.timezone);

    const dryRun = parsed.values['dry-run'] || config.messaging.dryRun;
    const useMock = parsed.values['mock-ai'] || config.ai.useMock;

    log.info(`Starting daily brief for ${date.iso}`, { dryRun, useMock });
    const pipeline = deps.createPipeline(config, { dryRun, useMock });
    const report = await pipeline.run(date, { trigger: 'cli', dryRun });

    deps.print(
      chalk.green(
        `Delivered brief for ${report.date}: ${report.summarized}/${report.eventCount} events, ` +
          `${report.deliveries.sent} sent, ${report.deliveries.failed} failed`
      )
    );
    return 0;
  } catch (err) {
    log.error(`Daily brief failed: ${toErrorMessage(err)}`);
    return 1;
  } finally {
    log.debug('Main function execution finished');
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(realpathSync(process.argv[1])).href) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    }
  );
}
