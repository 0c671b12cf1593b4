/**
 * File Storage Operations
 *
 * Handles reading/writing run assets and listing run folders.
 */
import { readFile, writeFile, mkdir, readdir } from 'fs/promises';
import { existsSync } from 'fs';
import { join, dirname } from 'path';
import type { RunManifest } from '../types/brief.js';
import { MANIFEST_FILENAME, readManifest } from './run-manifest.js';

/**
 * Ensure directory exists
 */
async function ensureDir(path: string): Promise<void> {
  await mkdir(path, { recursive: true });
}

export function runsDir(dataPath: string): string {
  return join(dataPath, 'runs');
}

export function runPathFor(dataPath: string, instanceId: string): string {
  return join(runsDir(dataPath), instanceId);
}

/**
 * Read a JSON asset file
 */
export async function readAsset(runPath: string, assetPath: string): Promise<unknown> {
  const content = await readFile(join(runPath, assetPath), 'utf-8');
  return JSON.parse(content);
}

/**
 * Write a JSON asset file, returning its size in bytes
 */
export async function writeAsset(runPath: string, assetPath: string, data: unknown): Promise<number> {
  const fullPath = join(runPath, assetPath);
  const content = JSON.stringify(data, null, 2);
  await ensureDir(dirname(fullPath));
  await writeFile(fullPath, content, 'utf-8');
  return Buffer.byteLength(content, 'utf-8');
}

/**
 * All run manifests, newest first
 */
export async function listRuns(dataPath: string): Promise<RunManifest[]> {
  const dir = runsDir(dataPath);
  if (!existsSync(dir)) {
    return [];
  }

  const entries = await readdir(dir, { withFileTypes: true });
  const manifests = await Promise.all(
    entries
      .filter((entry) => entry.isDirectory() && existsSync(join(dir, entry.name, MANIFEST_FILENAME)))
      .map((entry) => readManifest(join(dir, entry.name)))
  );

  return manifests
    .filter((m): m is RunManifest => m !== null)
    .sort((a, b) => b.startedAt.localeCompare(a.startedAt));
}
