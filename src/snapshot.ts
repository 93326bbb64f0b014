import { execFile as execFileCb } from 'node:child_process';
import { existsSync, readdirSync } from 'node:fs';
import * as path from 'node:path';
import { promisify } from 'node:util';
import { isTrackedManifest } from './diff-parser.js';

const execFile = promisify(execFileCb);

/** Max buffer for a single manifest diff: 10MB */
const MAX_BUFFER = 10 * 1024 * 1024;

/** Tracked manifest names directly inside a requirements directory, sorted */
export function listTrackedManifests(dir: string): string[] {
  return readdirSync(dir).filter((name) => isTrackedManifest(name)).sort();
}

/**
 * Unified diff of two files via `git diff --no-index`.
 * git exits 1 when the files differ; that is a result, not a failure.
 */
async function diffFiles(oldPath: string, newPath: string): Promise<string> {
  try {
    const { stdout } = await execFile(
      'git',
      ['diff', '--no-index', '--no-color', '--', oldPath, newPath],
      { maxBuffer: MAX_BUFFER, encoding: 'utf-8' },
    );
    return stdout;
  } catch (error: unknown) {
    if (
      error instanceof Error &&
      'code' in error && error.code === 1 &&
      'stdout' in error && typeof error.stdout === 'string'
    ) {
      return error.stdout;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`git diff of ${oldPath} and ${newPath} failed: ${message}`);
  }
}

/**
 * Diff two snapshots of a requirements directory, restricted to tracked manifests.
 * A manifest present on one side only is diffed against /dev/null.
 */
export async function diffSnapshots(oldDir: string, newDir: string): Promise<string> {
  const names = [...new Set([...listTrackedManifests(oldDir), ...listTrackedManifests(newDir)])].sort();

  const parts: string[] = [];
  for (const name of names) {
    const oldPath = path.join(oldDir, name);
    const newPath = path.join(newDir, name);
    const diff = await diffFiles(
      existsSync(oldPath) ? oldPath : '/dev/null',
      existsSync(newPath) ? newPath : '/dev/null',
    );
    if (diff) parts.push(diff.replace(/\n$/, ''));
  }
  return parts.join('\n');
}
