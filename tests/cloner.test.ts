import { describe, it, expect, vi, beforeEach } from 'vitest';
import { join } from 'node:path';

// Mock node:child_process and node:util before importing cloner
const mockChild = { stdin: { end: vi.fn() } };
const mockExecFile = vi.fn();
const mockMkdtemp = vi.fn();
const mockRm = vi.fn();

// Make promisify return the mock directly so .child is accessible
vi.mock('node:util', () => ({
  promisify: () => mockExecFile,
}));

vi.mock('node:child_process', () => ({
  execFile: vi.fn(),
}));

vi.mock('node:fs/promises', () => ({
  mkdtemp: (prefix: string) => mockMkdtemp(prefix),
  rm: (target: string, options: unknown) => mockRm(target, options),
}));

function makePromiseWithChild() {
  return Object.assign(Promise.resolve({ stdout: '', stderr: '' }), { child: mockChild });
}

function makeRejectedWithChild(error: Error) {
  return Object.assign(Promise.reject(error), { child: mockChild });
}

const { cloneAtRef, withCheckout } = await import('../src/cloner.js');

const REPO = 'https://github.com/example/project.git';

describe('cloneAtRef', () => {
  beforeEach(() => {
    mockExecFile.mockReset();
    mockChild.stdin.end.mockClear();
    mockExecFile.mockImplementation(() => makePromiseWithChild());
  });

  it('passes 300_000ms timeout to execFile', async () => {
    await cloneAtRef(REPO, 'v0.10.1', '/tmp/target');

    expect(mockExecFile).toHaveBeenCalledOnce();
    const options = mockExecFile.mock.calls[0][2];
    expect(options).toEqual({ timeout: 300_000 });
  });

  it('calls git clone with a shallow single-branch checkout', async () => {
    await cloneAtRef(REPO, 'v0.10.1', '/tmp/clone-dir');

    const [command, args] = mockExecFile.mock.calls[0];
    expect(command).toBe('git');
    expect(args).toEqual([
      'clone',
      '--depth', '1',
      '--branch', 'v0.10.1',
      '--single-branch',
      '--',
      REPO,
      '/tmp/clone-dir',
    ]);
  });

  it('ends stdin to prevent hang', async () => {
    await cloneAtRef(REPO, 'main', '/tmp/dir');

    expect(mockChild.stdin.end).toHaveBeenCalledOnce();
  });

  it('rejects a ref that looks like a flag without running git', async () => {
    await expect(cloneAtRef(REPO, '--upload-pack=evil', '/tmp/dir')).rejects.toThrow('starts with a dash');
    expect(mockExecFile).not.toHaveBeenCalled();
  });

  it('names the repository and ref when git fails', async () => {
    mockExecFile.mockImplementation(() => makeRejectedWithChild(new Error('Remote branch v9 not found')));

    await expect(cloneAtRef(REPO, 'v9', '/tmp/dir')).rejects.toThrow(
      `git clone of ${REPO} at v9 failed: Remote branch v9 not found`,
    );
  });
});

describe('withCheckout', () => {
  beforeEach(() => {
    mockExecFile.mockReset();
    mockMkdtemp.mockReset();
    mockRm.mockReset();
    mockExecFile.mockImplementation(() => makePromiseWithChild());
    mockMkdtemp.mockResolvedValue('/tmp/reqtrack-abc');
    mockRm.mockResolvedValue(undefined);
  });

  it('clones into a repo directory under a fresh temp dir and returns the callback result', async () => {
    const result = await withCheckout(REPO, 'v0.10.1', (dir) => `checked out ${dir}`);

    expect(result).toBe(`checked out ${join('/tmp/reqtrack-abc', 'repo')}`);
    expect(mockMkdtemp.mock.calls[0][0]).toMatch(/reqtrack-$/);
    expect(mockExecFile.mock.calls[0][1].at(-1)).toBe(join('/tmp/reqtrack-abc', 'repo'));
  });

  it('removes the temp dir after the callback', async () => {
    await withCheckout(REPO, 'main', async () => 1);

    expect(mockRm).toHaveBeenCalledWith('/tmp/reqtrack-abc', { recursive: true, force: true });
  });

  it('removes the temp dir when the callback throws', async () => {
    await expect(
      withCheckout(REPO, 'main', () => {
        throw new Error('extract failed');
      }),
    ).rejects.toThrow('extract failed');

    expect(mockRm).toHaveBeenCalledOnce();
  });

  it('removes the temp dir when the clone fails', async () => {
    mockExecFile.mockImplementation(() => makeRejectedWithChild(new Error('network down')));

    await expect(withCheckout(REPO, 'main', () => 1)).rejects.toThrow('network down');
    expect(mockRm).toHaveBeenCalledOnce();
  });
});
