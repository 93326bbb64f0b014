import pc from 'picocolors';
import { classifyChange } from './tickets.js';
import type { BatchSummary } from './jira.js';
import type { ChangeRecord, PrereqFailure, TicketRecord } from './types.js';

/** Lines of a ticket body shown in the details preview */
const BODY_PREVIEW_LINES = 15;

/**
 * Print prerequisite failures as red errors with actionable help.
 */
export function printErrors(failures: PrereqFailure[]): void {
  for (const f of failures) {
    console.error(pc.red(`✖ ${f.message}`));
    console.error(pc.dim(`  ${f.help}`));
  }
}

/**
 * Print a progress message without a trailing newline.
 * Goes to stderr so stdout stays clean for copy-paste output.
 */
export function printProgress(message: string): void {
  process.stderr.write(message);
}

/**
 * Complete a progress line by printing " done" in green with a newline.
 */
export function printProgressDone(): void {
  console.error(pc.green(' done'));
}

/**
 * Print a [debug] line in dimmed text. Only call when --verbose is active.
 */
export function printDebug(message: string): void {
  console.error(pc.dim(`[debug] ${message}`));
}

/** Print a non-fatal warning to stderr */
export function printWarning(message: string): void {
  console.error(pc.yellow(`⚠ ${message}`));
}

/**
 * Format milliseconds as human-readable duration.
 * Under 60s: "1.2s", over 60s: "1m 12s"
 */
export function formatDuration(ms: number): string {
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60_000);
  const seconds = ((ms % 60_000) / 1000).toFixed(0);
  return `${minutes}m ${seconds}s`;
}

/** `N/A` stands in for a missing side of a change */
function versionOrNA(version: string | null): string {
  return version ?? 'N/A';
}

/**
 * Print reconciled changes as `name: old -> new` lines under a count header.
 */
export function printChangeSummary(records: ChangeRecord[]): void {
  console.log(pc.bold(`Found ${records.length} package change${records.length === 1 ? '' : 's'}:`));
  for (const r of records) {
    console.log(`  ${r.packageName}: ${r.oldVersion ?? 'None'} -> ${r.newVersion ?? 'None'}`);
  }
}

/** First two files, then a `(+N more)` suffix */
export function summarizeFiles(files: string[]): string {
  const shown = files.slice(0, 2).join(', ');
  return files.length > 2 ? `${shown} (+${files.length - 2} more)` : shown;
}

/** One fixed-width preview row: package, old, new, change type, files */
export function formatTicketRow(record: ChangeRecord): string {
  return [
    record.packageName.padEnd(25),
    versionOrNA(record.oldVersion).padEnd(15),
    versionOrNA(record.newVersion).padEnd(15),
    classifyChange(record).padEnd(12),
    summarizeFiles(record.files),
  ].join(' ');
}

/**
 * Print the preview table of tickets about to be created.
 */
export function printTicketPreview(records: ChangeRecord[]): void {
  console.log(pc.bold('Ticket Preview'));
  console.log(`${'Package'.padEnd(25)} ${'Old Version'.padEnd(15)} ${'New Version'.padEnd(15)} ${'Change Type'.padEnd(12)} Files`);
  console.log('-'.repeat(80));
  for (const r of records) {
    console.log(formatTicketRow(r));
  }
  console.log();
  console.log(pc.bold(`Total tickets to create: ${records.length}`));
}

/**
 * Print the metadata of one ticket followed by the start of its body.
 */
export function printTicketDetails(ticket: TicketRecord): void {
  console.log(pc.bold(pc.cyan(`${ticket.packageName} ticket details`)));
  console.log(`Title: ${ticket.title}`);
  console.log(`Old Version: ${versionOrNA(ticket.oldVersion)}`);
  console.log(`New Version: ${versionOrNA(ticket.newVersion)}`);
  console.log(`Files: ${ticket.files.join(', ')}`);
  console.log(`Project: ${ticket.project}`);
  console.log(`Assignee: ${ticket.assignee || '(unassigned)'}`);
  console.log(`Components: ${ticket.components.join(', ')}`);
  console.log(`Label: ${ticket.label}`);
  console.log();

  const bodyLines = ticket.body.split('\n');
  for (const line of bodyLines.slice(0, BODY_PREVIEW_LINES)) {
    console.log(pc.dim(line));
  }
  if (bodyLines.length > BODY_PREVIEW_LINES) {
    console.log(pc.dim('... (truncated)'));
  }
}

/**
 * Print created / partial / failed counts and the tickets in each group.
 * Every non-created ticket is listed with its error.
 */
export function printBatchSummary(summary: BatchSummary): void {
  console.log();
  console.log(pc.bold('Submission Summary'));
  console.log(pc.green(`✔ Created: ${summary.created}`));
  if (summary.partial > 0) {
    console.log(pc.yellow(`⚠ Created without metadata: ${summary.partial}`));
  }
  if (summary.failed > 0) {
    console.log(pc.red(`✖ Failed: ${summary.failed}`));
  }

  for (const o of summary.outcomes) {
    switch (o.status) {
      case 'created':
        console.log(`  ${o.packageName}: ${o.id}`);
        break;
      case 'partial':
        console.log(`  ${o.packageName}: ${o.id} ${pc.yellow(`(metadata update failed: ${o.error})`)}`);
        break;
      case 'failed':
        console.log(`  ${o.packageName}: ${pc.red(`failed: ${o.error}`)}`);
        break;
    }
  }
}
