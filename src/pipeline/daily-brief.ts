/**
 * Daily Brief Pipeline
 *
 * collect: scrape the day's events (no events is fatal)
 * deliver: header -> fact request -> one message per summarized event -> fact
 *
 * When run with a data path, every run gets a folder under data/runs/
 * with run.json, events.json, deliveries.json and report.json.
 */
import { createChatModel, type ChatModel } from '../ai/chat-model.js';
import { fetchInterestingFact, summarizeEvent } from '../ai/summarizer.js';
import type { Config } from '../lib/config.js';
import { NoEventsError, toErrorMessage } from '../lib/errors.js';
import { runPathFor, writeAsset } from '../lib/file-storage.js';
import { createLogger } from '../lib/logger.js';
import {
  createManifest,
  markRunCompleted,
  markRunFailed,
  markRunStarted,
  recordOutput,
  REPORT_FILENAME,
  updateStepStatus,
  writeManifest,
} from '../lib/run-manifest.js';
import { broadcast, type DeliveryRecord } from '../messaging/broadcaster.js';
import { createMessageChannel, type MessageChannel } from '../messaging/channel.js';
import { formatFactMessage, formatHeaderMessage, formatSummaryMessage } from '../messaging/format.js';
import type { BriefDate } from '../scraper/brief-date.js';
import { scrapeCurrentEvents, type ScrapedEvent, type ScrapeOptions } from '../scraper/current-events.js';
import type { BriefReport, BriefStepId, RunOutputRecord, RunTrigger, StepStatus } from '../types/brief.js';

const log = createLogger('daily-brief');

export interface DailyBriefDependencies {
  model: ChatModel;
  channel: MessageChannel;
  recipients: readonly string[];
  source: ScrapeOptions;
  factTemperature?: number;
  summaryTemperature?: number;
  statusCheckDelayMs?: number;
  /** Root of data/runs; runs are not recorded when null */
  dataPath: string | null;
  now?: () => Date;
}

export interface RunHandle {
  instanceId: string;
  runPath: string;
}

export interface OpenRunOptions {
  trigger: RunTrigger;
  dryRun?: boolean;
}

export interface PipelineOverrides {
  dryRun?: boolean;
  useMock?: boolean;
  fetch?: typeof fetch;
}

interface MessageDelivery {
  label: string;
  records: DeliveryRecord[];
}

const pad = (n: number) => n.toString().padStart(2, '0');

export class DailyBriefPipeline {
  private readonly now: () => Date;

  constructor(private readonly deps: DailyBriefDependencies) {
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Build a pipeline from configuration. Missing credentials raise
   * ConfigurationError before anything is scraped or sent.
   */
  static fromConfig(config: Config, overrides: PipelineOverrides = {}): DailyBriefPipeline {
    const dryRun = overrides.dryRun ?? config.messaging.dryRun;
    const useMock = overrides.useMock ?? config.ai.useMock;

    return new DailyBriefPipeline({
      model: createChatModel({ ...config.ai, useMock }),
      channel: createMessageChannel({ ...config.messaging, dryRun }),
      recipients: [...new Set(config.messaging.recipients)],
      source: {
        baseUrl: config.source.baseUrl,
        userAgent: config.source.userAgent,
        timeout: config.source.timeout,
        fetch: overrides.fetch,
      },
      factTemperature: config.ai.factTemperature,
      summaryTemperature: config.ai.summaryTemperature,
      statusCheckDelayMs: config.messaging.statusCheckDelayMs,
      dataPath: config.paths.data,
    });
  }

  /**
   * Create the run folder and manifest. Returns null when runs are not recorded.
   */
  async openRun(date: BriefDate, options: OpenRunOptions): Promise<RunHandle | null> {
    if (this.deps.dataPath === null) {
      return null;
    }

    const now = this.now();
    const time = `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
    const instanceId = `daily-brief-${date.iso}-${time}-${now.getUTCMilliseconds().toString().padStart(3, '0')}`;
    const runPath = runPathFor(this.deps.dataPath, instanceId);

    await writeManifest(runPath, createManifest(instanceId, date.iso, options.trigger, options.dryRun ?? false, now));
    await markRunStarted(runPath);
    log.info(`Created run ${instanceId}`, { runPath });

    return { instanceId, runPath };
  }

  /**
   * Scrape the events for a date
   */
  async collect(date: BriefDate, run: RunHandle | null = null): Promise<ScrapedEvent[]> {
    log.info(`Processing events for date: ${date.iso}`);

    return this.guard(run, async () => {
      await this.setStep(run, 'collect-events', 'running');

      let events: ScrapedEvent[];
      try {
        events = await scrapeCurrentEvents(date, this.deps.source);
        if (events.length === 0) {
          throw new NoEventsError(date.display);
        }
      } catch (err) {
        await this.setStep(run, 'collect-events', 'failed', toErrorMessage(err));
        throw err;
      }

      await this.saveAsset(run, 'events.json', 'collect-events', 'intermediate', events);
      await this.setStep(run, 'collect-events', 'completed');
      return events;
    });
  }

  /**
   * Send the brief for already collected events
   */
  async deliver(date: BriefDate, events: ScrapedEvent[], run: RunHandle | null = null): Promise<BriefReport> {
    const { model, channel, recipients } = this.deps;

    if (recipients.length === 0) {
      log.warn('No recipients configured; messages will not be sent');
    }

    return this.guard(run, async () => {
      const deliveries: MessageDelivery[] = [];
      const send = async (label: string, body: string): Promise<DeliveryRecord[]> => {
        const records = await broadcast(channel, recipients, body, {
          label,
          statusCheckDelayMs: this.deps.statusCheckDelayMs,
        });
        deliveries.push({ label, records });
        return records;
      };

      // 1. Header
      await this.setStep(run, 'send-header', 'running');
      await send('daily summary', formatHeaderMessage(date));
      await this.setStep(run, 'send-header', 'completed');

      // 2. Fact, requested before the events and sent last
      await this.setStep(run, 'fetch-fact', 'running');
      const fact = await fetchInterestingFact(model, this.deps.factTemperature);
      await this.setStep(run, 'fetch-fact', fact.ok ? 'completed' : 'failed', fact.ok ? undefined : fact.error);

      // 3. Events
      await this.setStep(run, 'summarize-events', 'running');
      const skipped: string[] = [];
      let summarized = 0;
      for (const event of events) {
        const result = await summarizeEvent(
          model,
          event,
          this.deps.summaryTemperature !== undefined ? { temperature: this.deps.summaryTemperature } : {}
        );
        if (!result.ok) {
          log.error(`Failed to generate summary for event: ${event.title}`, { reason: result.error });
          skipped.push(event.title);
          continue;
        }
        summarized += 1;
        await send(`summary "${event.title}"`, formatSummaryMessage(result.summary));
      }
      await this.setStep(run, 'summarize-events', 'completed');

      // 4. Fact
      let factDelivered = false;
      if (fact.ok) {
        await this.setStep(run, 'send-fact', 'running');
        const factRecords = await send('interesting fact', formatFactMessage(fact.fact));
        factDelivered = factRecords.some((r) => r.ok);
        await this.setStep(run, 'send-fact', 'completed');
      } else {
        log.error(`Skipping interesting fact: ${fact.error}`);
        await this.setStep(run, 'send-fact', 'skipped', fact.error);
      }

      const records = deliveries.flatMap((d) => d.records);
      const report: BriefReport = {
        instanceId: run?.instanceId ?? null,
        date: date.iso,
        eventCount: events.length,
        summarized,
        skipped,
        factDelivered,
        deliveries: {
          sent: records.filter((r) => r.ok).length,
          failed: records.filter((r) => !r.ok).length,
        },
      };

      await this.saveAsset(run, 'deliveries.json', 'summarize-events', 'intermediate', deliveries);
      await this.saveAsset(run, REPORT_FILENAME, 'send-fact', 'primary', report);
      if (run) {
        await markRunCompleted(run.runPath);
      }

      log.info('Daily brief delivered', {
        date: report.date,
        events: report.eventCount,
        summarized: report.summarized,
        sent: report.deliveries.sent,
        failed: report.deliveries.failed,
      });
      return report;
    });
  }

  /**
   * Collect and deliver in one go
   */
  async run(date: BriefDate, options: OpenRunOptions): Promise<BriefReport> {
    const run = await this.openRun(date, options);
    const events = await this.collect(date, run);
    return this.deliver(date, events, run);
  }

  /** Marks the run failed if `work` throws, then rethrows */
  private async guard<T>(run: RunHandle | null, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (err) {
      const message = toErrorMessage(err);
      log.error(`Error in daily brief: ${message}`, { error: err });
      if (run) {
        await markRunFailed(run.runPath, message);
      }
      throw err;
    }
  }

  private async setStep(run: RunHandle | null, stepId: BriefStepId, status: StepStatus, error?: string): Promise<void> {
    if (run) {
      await updateStepStatus(run.runPath, stepId, status, error);
    }
  }

  private async saveAsset(
    run: RunHandle | null,
    file: string,
    step: BriefStepId,
    type: RunOutputRecord['type'],
    data: unknown
  ): Promise<void> {
    if (!run) {
      return;
    }
    const size = await writeAsset(run.runPath, file, data);
    await recordOutput(run.runPath, { file, step, type, format: 'json', size });
  }
}
