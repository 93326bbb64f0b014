import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  fromTicketFile,
  loadTicketFiles,
  ticketFileName,
  toTicketFile,
  writeTicketFiles,
} from '../src/ticket-store.js';
import type { ChangeRecord } from '../src/types.js';

const torch: ChangeRecord = {
  packageName: 'torch',
  oldVersion: '2.1.0',
  newVersion: '2.3.0',
  files: ['rocm.txt', 'cuda.txt', 'cuda.txt'],
};

const newpkg: ChangeRecord = { packageName: 'newpkg', oldVersion: null, newVersion: '1.0', files: ['common.txt'] };

describe('toTicketFile / fromTicketFile', () => {
  it('stores the file list sorted and de-duplicated', () => {
    expect(toTicketFile(torch, 'body')).toEqual({
      package_name: 'torch',
      old_version: '2.1.0',
      new_version: '2.3.0',
      files: ['cuda.txt', 'rocm.txt'],
      body_description: 'body',
    });
  });

  it('restores a record whose file order differs on disk', () => {
    const stored = fromTicketFile({
      package_name: 'torch',
      old_version: '2.1.0',
      new_version: null,
      files: ['rocm.txt', 'cuda.txt'],
      body_description: 'b',
    });
    expect(stored.record).toEqual({ packageName: 'torch', oldVersion: '2.1.0', newVersion: null, files: ['cuda.txt', 'rocm.txt'] });
    expect(stored.body).toBe('b');
  });
});

describe('ticketFileName', () => {
  it('replaces characters unsafe in file names', () => {
    expect(ticketFileName('foo/bar baz')).toBe('foo_bar_baz.json');
  });

  it('keeps dots, dashes and underscores', () => {
    expect(ticketFileName('zope.interface_x-y')).toBe('zope.interface_x-y.json');
  });
});

describe('writeTicketFiles / loadTicketFiles', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'ticket-store-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes one JSON file per package', () => {
    const written = writeTicketFiles(join(dir, 'out'), [
      { record: torch, body: 'torch body' },
      { record: newpkg, body: 'newpkg body' },
    ]);

    expect(written).toEqual([join(dir, 'out', 'torch.json'), join(dir, 'out', 'newpkg.json')]);
    const raw = JSON.parse(readFileSync(join(dir, 'out', 'newpkg.json'), 'utf-8'));
    expect(raw).toEqual({
      package_name: 'newpkg',
      old_version: null,
      new_version: '1.0',
      files: ['common.txt'],
      body_description: 'newpkg body',
    });
  });

  it('throws when the output directory cannot be created', () => {
    const blocker = join(dir, 'blocker');
    writeFileSync(blocker, 'not a directory', 'utf-8');

    expect(() => writeTicketFiles(join(blocker, 'out'), [{ record: newpkg, body: 'b' }])).toThrow();
  });

  it('round-trips records sorted by package name', () => {
    writeTicketFiles(dir, [
      { record: torch, body: 'torch body' },
      { record: newpkg, body: 'newpkg body' },
    ]);

    const { tickets, errors } = loadTicketFiles(dir);

    expect(errors).toEqual([]);
    expect(tickets.map((t) => t.record)).toEqual([
      newpkg,
      { ...torch, files: ['cuda.txt', 'rocm.txt'] },
    ]);
    expect(tickets.map((t) => t.body)).toEqual(['newpkg body', 'torch body']);
    expect(tickets.map((t) => t.source)).toEqual(['newpkg.json', 'torch.json']);
  });

  it('reports invalid files without dropping valid ones', () => {
    writeTicketFiles(dir, [{ record: newpkg, body: 'b' }]);
    writeFileSync(join(dir, 'broken.json'), '{ not json', 'utf-8');
    writeFileSync(join(dir, 'empty.json'), JSON.stringify({
      package_name: 'empty',
      old_version: null,
      new_version: null,
      files: [],
      body_description: '',
    }), 'utf-8');
    writeFileSync(join(dir, 'notes.txt'), 'ignored', 'utf-8');

    const { tickets, errors } = loadTicketFiles(dir);

    expect(tickets.map((t) => t.record.packageName)).toEqual(['newpkg']);
    expect(errors.map((e) => e.file)).toEqual(['broken.json', 'empty.json']);
    expect(errors[1].message).toContain('at least one of old_version and new_version must be set');
  });
});
