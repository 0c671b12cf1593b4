/**
 * Run Manifest Management
 *
 * Handles creation and updates of run.json manifest files.
 * The manifest makes each run folder self-documenting.
 */
import { readFile, writeFile, mkdir } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import type {
  BriefStepId,
  RunManifest,
  RunOutputRecord,
  RunStatus,
  RunStepRecord,
  RunTrigger,
  StepStatus,
} from '../types/brief.js';
import { BRIEF_STEPS } from '../types/brief.js';
import { createLogger } from './logger.js';

export const MANIFEST_FILENAME = 'run.json';
export const REPORT_FILENAME = 'report.json';
export const MANIFEST_VERSION = '1';

const log = createLogger('run-manifest');

/**
 * Create initial manifest for a new run
 */
export function createManifest(
  instanceId: string,
  date: string,
  trigger: RunTrigger,
  dryRun: boolean,
  now: Date = new Date()
): RunManifest {
  return {
    instanceId,
    date,
    trigger,
    dryRun,
    status: 'pending',
    startedAt: now.toISOString(),
    steps: BRIEF_STEPS.map(
      (step): RunStepRecord => ({
        id: step.id,
        name: step.name,
        status: 'pending',
      })
    ),
    outputs: [],
    primaryOutput: REPORT_FILENAME,
    version: MANIFEST_VERSION,
  };
}

/**
 * Read manifest from a run folder
 */
export async function readManifest(runPath: string): Promise<RunManifest | null> {
  const manifestPath = join(runPath, MANIFEST_FILENAME);
  if (!existsSync(manifestPath)) {
    return null;
  }
  try {
    return JSON.parse(await readFile(manifestPath, 'utf-8')) as RunManifest;
  } catch (err) {
    log.error(`Error reading manifest ${manifestPath}`, { error: err });
    return null;
  }
}

/**
 * Write manifest to a run folder
 */
export async function writeManifest(runPath: string, manifest: RunManifest): Promise<void> {
  await mkdir(runPath, { recursive: true });
  await writeFile(join(runPath, MANIFEST_FILENAME), JSON.stringify(manifest, null, 2), 'utf-8');
}

/**
 * Update run status
 */
export async function updateRunStatus(runPath: string, status: RunStatus, error?: string): Promise<void> {
  const manifest = await readManifest(runPath);
  if (!manifest) {
    log.warn(`Cannot update status - manifest not found: ${runPath}`);
    return;
  }

  manifest.status = status;

  if (status === 'completed' || status === 'failed') {
    manifest.completedAt = new Date().toISOString();
    manifest.duration = new Date(manifest.completedAt).getTime() - new Date(manifest.startedAt).getTime();
  }

  if (error) {
    manifest.error = error;
  }

  await writeManifest(runPath, manifest);
}

/**
 * Update step status
 */
export async function updateStepStatus(
  runPath: string,
  stepId: BriefStepId,
  status: StepStatus,
  error?: string
): Promise<void> {
  const manifest = await readManifest(runPath);
  if (!manifest) {
    log.warn(`Cannot update step - manifest not found: ${runPath}`);
    return;
  }

  const step = manifest.steps.find((s) => s.id === stepId);
  if (!step) {
    log.warn(`Step not found: ${stepId}`);
    return;
  }

  step.status = status;

  if (status === 'running') {
    step.startedAt = new Date().toISOString();
  }

  if (status === 'completed' || status === 'failed' || status === 'skipped') {
    step.completedAt = new Date().toISOString();
    if (step.startedAt) {
      step.duration = new Date(step.completedAt).getTime() - new Date(step.startedAt).getTime();
    }
  }

  if (error) {
    step.error = error;
  }

  await writeManifest(runPath, manifest);
}

/**
 * Record an output file
 */
export async function recordOutput(runPath: string, output: RunOutputRecord): Promise<void> {
  const manifest = await readManifest(runPath);
  if (!manifest) {
    log.warn(`Cannot record output - manifest not found: ${runPath}`);
    return;
  }

  // Remove existing entry for same file if present
  manifest.outputs = manifest.outputs.filter((o) => o.file !== output.file);
  manifest.outputs.push(output);

  await writeManifest(runPath, manifest);
}

/**
 * Mark run as started
 */
export async function markRunStarted(runPath: string): Promise<void> {
  await updateRunStatus(runPath, 'running');
}

/**
 * Mark run as completed
 */
export async function markRunCompleted(runPath: string): Promise<void> {
  await updateRunStatus(runPath, 'completed');
}

/**
 * Mark run as failed
 */
export async function markRunFailed(runPath: string, error: string): Promise<void> {
  await updateRunStatus(runPath, 'failed', error);
}
