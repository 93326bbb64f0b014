import { execFile as execFileCb } from 'node:child_process';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { promisify } from 'node:util';

const execFile = promisify(execFileCb);

/** Clone timeout: 5 minutes (the upstream repo is large even at --depth 1) */
const CLONE_TIMEOUT_MS = 300_000;

/**
 * Validate a user-supplied value is safe for use as a git argument.
 * Rejects values with dangerous patterns: leading dash (git flag injection),
 * path traversal (..), null bytes.
 * Does NOT restrict valid ref characters (dots, slashes, hyphens allowed).
 */
export function validateGitArg(value: string, label: string): void {
  if (!value) {
    throw new Error(`Error: ${label} is empty.`);
  }
  if (value.startsWith('-')) {
    throw new Error(
      `Error: ${label} '${value}' starts with a dash -- contains dangerous characters.`,
    );
  }
  if (value.includes('..')) {
    throw new Error(
      `Error: ${label} '${value}' contains path traversal sequence.`,
    );
  }
  if (value.includes('\0')) {
    throw new Error(
      `Error: ${label} contains null byte.`,
    );
  }
}

/**
 * Shallow-clone `repoUrl` at `ref` (tag or branch) into `targetDir`.
 * The target directory must not exist or must be empty.
 */
export async function cloneAtRef(repoUrl: string, ref: string, targetDir: string): Promise<void> {
  validateGitArg(repoUrl, 'Repository URL');
  validateGitArg(ref, 'Ref');

  const p = execFile(
    'git',
    [
      'clone',
      '--depth', '1',
      '--branch', ref,
      '--single-branch',
      '--',
      repoUrl,
      targetDir,
    ],
    { timeout: CLONE_TIMEOUT_MS },
  );

  // Prevent stdin hang (git may otherwise wait on a credential prompt)
  p.child.stdin?.end();

  try {
    await p;
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`git clone of ${repoUrl} at ${ref} failed: ${message}`);
  }
}

/**
 * Clone `repoUrl` at `ref` into a fresh temporary directory, run `fn` on the
 * checkout, and remove the directory afterwards whether or not `fn` succeeds.
 */
export async function withCheckout<T>(
  repoUrl: string,
  ref: string,
  fn: (checkoutDir: string) => Promise<T> | T,
): Promise<T> {
  const base = await mkdtemp(path.join(tmpdir(), 'reqtrack-'));
  const checkoutDir = path.join(base, 'repo');
  try {
    await cloneAtRef(repoUrl, ref, checkoutDir);
    return await fn(checkoutDir);
  } finally {
    await rm(base, { recursive: true, force: true });
  }
}
