import { execFile as execFileCb } from 'node:child_process';
import { setTimeout as sleep } from 'node:timers/promises';
import { promisify } from 'node:util';
import { sanitizeError } from './errors.js';
import type { TicketRecord } from './types.js';

const execFile = promisify(execFileCb);

/** Per-command timeout for the jira CLI: 2 minutes */
const JIRA_TIMEOUT_MS = 2 * 60 * 1000;

/** Max buffer for jira CLI output: 1MB */
const MAX_BUFFER = 1024 * 1024;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Default pause between tickets when talking to a real tracker */
export const DEFAULT_SUBMIT_DELAY_MS = 1000;

/**
 * Destination for drafted tickets.
 * `create` resolves to the new ticket's key and rejects on any failure.
 */
export interface TicketSink {
  create(ticket: TicketRecord): Promise<string>;
  updateMetadata(id: string, ticket: TicketRecord): Promise<void>;
}

/** Result of submitting one ticket */
export type SubmissionOutcome =
  | { status: 'created'; packageName: string; id: string }
  | { status: 'partial'; packageName: string; id: string; error: string }
  | { status: 'failed'; packageName: string; error: string };

export interface BatchSummary {
  outcomes: SubmissionOutcome[];
  created: number;
  partial: number;
  failed: number;
}

/**
 * Pull an issue key (e.g. PROJ-123) out of tracker CLI output.
 * Prefers the key in a `/browse/` URL; otherwise only a bare key in `project` is accepted.
 */
export function extractTicketKey(output: string, project: string): string | null {
  const fromUrl = output.match(/\/browse\/([A-Z][A-Z0-9_]*-\d+)/);
  if (fromUrl) return fromUrl[1];
  const bare = output.match(new RegExp(`\\b(${escapeRegExp(project)}-\\d+)\\b`));
  return bare?.[1] ?? null;
}

/** Build the `jira epic create` argument list for a ticket */
export function buildCreateArgs(ticket: TicketRecord): string[] {
  return [
    'epic', 'create',
    '-p', ticket.project,
    '-n', ticket.title,
    '-s', ticket.title,
    '-b', ticket.body,
    '--no-input',
  ];
}

/** Build the `jira issue edit` argument list that sets a ticket's metadata */
export function buildEditArgs(id: string, ticket: TicketRecord): string[] {
  const args = ['issue', 'edit', id, '-s', ticket.title, '-y', 'Normal'];
  if (ticket.assignee) {
    args.push('-a', ticket.assignee);
  }
  args.push('-l', ticket.label);
  for (const component of ticket.components) {
    args.push('-C', component);
  }
  args.push('--no-input');
  return args;
}

/**
 * Ticket sink backed by the `jira` CLI.
 * Authentication comes from the CLI's own config and JIRA_API_TOKEN.
 */
export class JiraCliSink implements TicketSink {
  constructor(private readonly command = 'jira') {}

  private async run(args: string[]): Promise<string> {
    const p = execFile(this.command, args, {
      timeout: JIRA_TIMEOUT_MS,
      maxBuffer: MAX_BUFFER,
      encoding: 'utf-8',
    });
    // Prevent stdin hang
    p.child.stdin?.end();
    const { stdout } = await p;
    return stdout;
  }

  async create(ticket: TicketRecord): Promise<string> {
    let stdout: string;
    try {
      stdout = await this.run(buildCreateArgs(ticket));
    } catch (error: unknown) {
      throw new Error(`jira epic create failed for ${ticket.packageName}: ${sanitizeError(error)}`);
    }

    const id = extractTicketKey(stdout, ticket.project);
    if (!id) {
      throw new Error(`jira epic create for ${ticket.packageName} returned no ticket reference`);
    }
    return id;
  }

  async updateMetadata(id: string, ticket: TicketRecord): Promise<void> {
    try {
      await this.run(buildEditArgs(id, ticket));
    } catch (error: unknown) {
      throw new Error(`jira issue edit ${id} failed for ${ticket.packageName}: ${sanitizeError(error)}`);
    }
  }
}

/** Sink that records what it was asked to do and creates nothing */
export class DryRunSink implements TicketSink {
  readonly created: TicketRecord[] = [];
  readonly updated: Array<{ id: string; ticket: TicketRecord }> = [];

  async create(ticket: TicketRecord): Promise<string> {
    this.created.push(ticket);
    return `DRY-RUN-${this.created.length}`;
  }

  async updateMetadata(id: string, ticket: TicketRecord): Promise<void> {
    this.updated.push({ id, ticket });
  }
}

export interface SubmitOptions {
  /** Pause between tickets; skipped after the last one */
  delayMs?: number;
  /** Called before each ticket with its 1-based position */
  onProgress?: (ticket: TicketRecord, index: number, total: number) => void;
  /** Called after each ticket with its outcome */
  onOutcome?: (outcome: SubmissionOutcome) => void;
}

/**
 * Submit tickets one at a time: create, then update metadata.
 *
 * A failed create marks the ticket `failed`; a failed update after a
 * successful create marks it `partial` and keeps the key. Neither stops
 * the remaining tickets.
 */
export async function submitTickets(
  tickets: TicketRecord[],
  sink: TicketSink,
  options: SubmitOptions = {},
): Promise<BatchSummary> {
  const outcomes: SubmissionOutcome[] = [];
  const delayMs = options.delayMs ?? 0;

  for (let i = 0; i < tickets.length; i++) {
    const ticket = tickets[i];
    options.onProgress?.(ticket, i + 1, tickets.length);

    let outcome: SubmissionOutcome;
    let id: string | null = null;
    try {
      id = await sink.create(ticket);
      await sink.updateMetadata(id, ticket);
      outcome = { status: 'created', packageName: ticket.packageName, id };
    } catch (error: unknown) {
      outcome = id === null
        ? { status: 'failed', packageName: ticket.packageName, error: sanitizeError(error) }
        : { status: 'partial', packageName: ticket.packageName, id, error: sanitizeError(error) };
    }

    outcomes.push(outcome);
    options.onOutcome?.(outcome);

    if (delayMs > 0 && i < tickets.length - 1) {
      await sleep(delayMs);
    }
  }

  return {
    outcomes,
    created: outcomes.filter((o) => o.status === 'created').length,
    partial: outcomes.filter((o) => o.status === 'partial').length,
    failed: outcomes.filter((o) => o.status === 'failed').length,
  };
}
