import { mkdirSync, readdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { TicketFileSchema, type TicketFile } from './schemas.js';
import type { ChangeRecord } from './types.js';

/** Persisted change plus its rendered body */
export interface StoredTicket {
  record: ChangeRecord;
  body: string;
  /** File the ticket was loaded from, when it came from disk */
  source?: string;
}

/** A ticket file that could not be loaded */
export interface TicketLoadError {
  file: string;
  message: string;
}

export function toTicketFile(record: ChangeRecord, body: string): TicketFile {
  return {
    package_name: record.packageName,
    old_version: record.oldVersion,
    new_version: record.newVersion,
    files: [...new Set(record.files)].sort(),
    body_description: body,
  };
}

export function fromTicketFile(file: TicketFile): StoredTicket {
  return {
    record: {
      packageName: file.package_name,
      oldVersion: file.old_version,
      newVersion: file.new_version,
      files: [...new Set(file.files)].sort(),
    },
    body: file.body_description,
  };
}

/** File name for a package's ticket; characters unsafe in file names become `_` */
export function ticketFileName(packageName: string): string {
  return `${packageName.replace(/[^A-Za-z0-9._-]/g, '_')}.json`;
}

/**
 * Write one JSON file per ticket into `dir` (created if missing).
 * Returns the written paths in input order.
 */
export function writeTicketFiles(dir: string, tickets: StoredTicket[]): string[] {
  mkdirSync(dir, { recursive: true });
  return tickets.map(({ record, body }) => {
    const path = join(dir, ticketFileName(record.packageName));
    writeFileSync(path, JSON.stringify(toTicketFile(record, body), null, 2) + '\n', 'utf-8');
    return path;
  });
}

/**
 * Load every `*.json` ticket in `dir`, sorted by package name.
 * Unreadable or invalid files are returned in `errors` instead of aborting the load.
 */
export function loadTicketFiles(dir: string): { tickets: StoredTicket[]; errors: TicketLoadError[] } {
  const tickets: StoredTicket[] = [];
  const errors: TicketLoadError[] = [];

  const names = readdirSync(dir).filter((name) => name.endsWith('.json')).sort();
  for (const name of names) {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(join(dir, name), 'utf-8'));
    } catch (error: unknown) {
      errors.push({ file: name, message: error instanceof Error ? error.message : String(error) });
      continue;
    }

    const parsed = TicketFileSchema.safeParse(raw);
    if (!parsed.success) {
      errors.push({ file: name, message: parsed.error.message });
      continue;
    }
    tickets.push({ ...fromTicketFile(parsed.data), source: name });
  }

  tickets.sort((a, b) => a.record.packageName.localeCompare(b.record.packageName));
  return { tickets, errors };
}
