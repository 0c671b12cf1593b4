/**
 * HTTP API: health, run history, schedule and manual triggers.
 * Inngest functions are mounted separately by index.ts.
 */
import express, { type Express } from 'express';
import { RunRequestedSchema, type RunRequestedEvent } from './inngest/events.js';
import { toErrorMessage } from './lib/errors.js';
import { listRuns, runPathFor } from './lib/file-storage.js';
import { createLogger } from './lib/logger.js';
import { readManifest } from './lib/run-manifest.js';
import { nextOccurrence } from './lib/schedule.js';
import { parseBriefDate } from './scraper/brief-date.js';

const log = createLogger('server');

const RUN_ID_PATTERN = /^[A-Za-z0-9-]+$/;

export interface AppDependencies {
  dataPath: string;
  schedule: { cron: string; timezone: string };
  /** Queue a brief run; resolves to the queued event ids */
  requestRun: (request: RunRequestedEvent) => Promise<string[]>;
  now?: () => Date;
}

export function createApp(deps: AppDependencies): Express {
  const app = express();
  const now = deps.now ?? (() => new Date());

  // Parse JSON bodies
  app.use(express.json());

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: now().toISOString() });
  });

  // Schedule and next occurrence
  app.get('/schedule', (_req, res) => {
    res.json({
      cron: deps.schedule.cron,
      timezone: deps.schedule.timezone,
      nextOccurrence: nextOccurrence(deps.schedule.cron, deps.schedule.timezone, now()).toISOString(),
    });
  });

  // Trigger a run
  app.post('/runs', async (req, res) => {
    const parsed = RunRequestedSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.issues.map((i) => i.message).join('; ') });
      return;
    }

    if (parsed.data.date) {
      try {
        parseBriefDate(parsed.data.date);
      } catch (err) {
        res.status(400).json({ error: toErrorMessage(err) });
        return;
      }
    }

    try {
      const ids = await deps.requestRun(parsed.data);
      log.info('Queued daily brief run', { ids, date: parsed.data.date ?? null });
      res.status(202).json({ success: true, ids });
    } catch (err) {
      log.error(`Failed to queue run: ${toErrorMessage(err)}`);
      res.status(500).json({ error: 'Failed to queue run', details: toErrorMessage(err) });
    }
  });

  // List recent runs
  app.get('/runs', async (_req, res) => {
    try {
      const runs = await listRuns(deps.dataPath);
      res.json(
        runs.map((run) => ({
          instanceId: run.instanceId,
          date: run.date,
          trigger: run.trigger,
          status: run.status,
          startedAt: run.startedAt,
          duration: run.duration ?? null,
        }))
      );
    } catch (err) {
      res.status(500).json({ error: 'Failed to list runs', details: toErrorMessage(err) });
    }
  });

  // Get a run manifest
  app.get('/runs/:id', async (req, res) => {
    const { id } = req.params;
    if (!RUN_ID_PATTERN.test(id)) {
      res.status(400).json({ error: 'Invalid run id' });
      return;
    }

    const manifest = await readManifest(runPathFor(deps.dataPath, id));
    if (!manifest) {
      res.status(404).json({ error: 'Run not found' });
      return;
    }
    res.json(manifest);
  });

  return app;
}
