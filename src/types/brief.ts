/**
 * Brief Type Definitions
 *
 * A run is one delivery of the daily brief. Each run folder under
 * data/runs/ holds a run.json manifest plus the assets it produced.
 */

export type RunStatus = 'pending' | 'running' | 'completed' | 'failed';
export type StepStatus = 'pending' | 'running' | 'completed' | 'failed' | 'skipped';

/** What started the run */
export type RunTrigger = 'cli' | 'cron' | 'event' | 'api';

export const BRIEF_STEPS = [
  { id: 'collect-events', name: 'Scrape current events' },
  { id: 'send-header', name: 'Send daily header' },
  { id: 'fetch-fact', name: 'Fetch interesting fact' },
  { id: 'summarize-events', name: 'Summarize and send events' },
  { id: 'send-fact', name: 'Send interesting fact' },
] as const;

export type BriefStepId = (typeof BRIEF_STEPS)[number]['id'];

/**
 * Step execution record in the manifest
 */
export interface RunStepRecord {
  id: BriefStepId;
  name: string;
  status: StepStatus;
  startedAt?: string; // ISO timestamp
  completedAt?: string;
  duration?: number; // milliseconds
  error?: string;
}

/**
 * Output file record
 */
export interface RunOutputRecord {
  file: string; // Filename in run folder
  step: BriefStepId;
  type: 'intermediate' | 'primary'; // Primary = final output
  format: 'json' | 'markdown' | 'text';
  size?: number; // bytes
}

/**
 * Run Manifest - self-documenting record of one brief delivery.
 * Stored as run.json in each run folder.
 */
export interface RunManifest {
  // Identity
  instanceId: string; // e.g., "daily-brief-2024-10-05-200004-000"
  date: string; // brief date, YYYY-MM-DD
  trigger: RunTrigger;
  dryRun: boolean;

  // Status
  status: RunStatus;
  startedAt: string;
  completedAt?: string;
  duration?: number;
  error?: string;

  steps: RunStepRecord[];
  outputs: RunOutputRecord[];
  primaryOutput: string;

  version: string;
}

export interface DeliveryTotals {
  sent: number;
  failed: number;
}

/**
 * Outcome of a delivered brief
 */
export interface BriefReport {
  instanceId: string | null;
  date: string;
  eventCount: number;
  summarized: number;
  skipped: string[];
  factDelivered: boolean;
  deliveries: DeliveryTotals;
}
