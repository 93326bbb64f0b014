import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

const mockExecFile = vi.fn();

vi.mock('node:util', () => ({
  promisify: () => mockExecFile,
}));

vi.mock('node:child_process', () => ({
  execFile: vi.fn(),
}));

const { diffSnapshots, listTrackedManifests } = await import('../src/snapshot.js');

/** Error shaped like execFile's when git exits with `code` */
function exitError(code: number, stdout: string): Error {
  return Object.assign(new Error(`Command failed with exit code ${code}`), { code, stdout });
}

describe('snapshot diffing', () => {
  let base: string;
  let oldDir: string;
  let newDir: string;

  beforeEach(() => {
    base = mkdtempSync(join(tmpdir(), 'snapshot-'));
    oldDir = join(base, 'old');
    newDir = join(base, 'new');
    mkdirSync(oldDir);
    mkdirSync(newDir);
    writeFileSync(join(oldDir, 'cuda.txt'), 'torch==2.7.1\n');
    writeFileSync(join(oldDir, 'common.txt'), 'numpy\n');
    writeFileSync(join(oldDir, 'test.txt'), 'pytest==8.0.0\n');
    writeFileSync(join(newDir, 'cuda.txt'), 'torch==2.8.0\n');
    writeFileSync(join(newDir, 'tpu.txt'), 'jax==0.7.0\n');
    writeFileSync(join(newDir, 'cpu.txt'), 'torch==2.8.0+cpu\n');

    mockExecFile.mockReset();
  });

  afterEach(() => {
    rmSync(base, { recursive: true, force: true });
  });

  it('lists only tracked manifests, sorted', () => {
    expect(listTrackedManifests(oldDir)).toEqual(['common.txt', 'cuda.txt']);
    expect(listTrackedManifests(newDir)).toEqual(['cuda.txt', 'tpu.txt']);
  });

  it('diffs the union of tracked manifests against /dev/null where one side is missing', async () => {
    mockExecFile.mockImplementation((_cmd: string, args: string[]) =>
      Promise.reject(exitError(1, `diff ${args[4]} ${args[5]}\n`)),
    );

    const diff = await diffSnapshots(oldDir, newDir);

    expect(mockExecFile.mock.calls.map((c) => c[1])).toEqual([
      ['diff', '--no-index', '--no-color', '--', join(oldDir, 'common.txt'), '/dev/null'],
      ['diff', '--no-index', '--no-color', '--', join(oldDir, 'cuda.txt'), join(newDir, 'cuda.txt')],
      ['diff', '--no-index', '--no-color', '--', '/dev/null', join(newDir, 'tpu.txt')],
    ]);
    expect(diff).toBe([
      `diff ${join(oldDir, 'common.txt')} /dev/null`,
      `diff ${join(oldDir, 'cuda.txt')} ${join(newDir, 'cuda.txt')}`,
      `diff /dev/null ${join(newDir, 'tpu.txt')}`,
    ].join('\n'));
  });

  it('skips manifests that are identical', async () => {
    mockExecFile.mockImplementation((_cmd: string, args: string[]) =>
      args[4] === '/dev/null'
        ? Promise.reject(exitError(1, 'added\n'))
        : Promise.resolve({ stdout: '', stderr: '' }),
    );

    expect(await diffSnapshots(oldDir, newDir)).toBe('added');
  });

  it('fails on any other git exit status', async () => {
    mockExecFile.mockImplementation(() => Promise.reject(exitError(128, '')));

    await expect(diffSnapshots(oldDir, newDir)).rejects.toThrow(
      `git diff of ${join(oldDir, 'common.txt')} and /dev/null failed: Command failed with exit code 128`,
    );
  });
});
