import type { TicketConfig } from './config.js';
import type { ChangeKind, ChangeRecord, TicketRecord } from './types.js';

/** Rationale noun for each change kind */
const CHANGE_NOUN: Record<ChangeKind, string> = {
  NEW: 'addition',
  REMOVE: 'removal',
  UPDATE: 'update',
};

/** Classify a change: NEW when there was no old version, REMOVE when there is no new one */
export function classifyChange(record: Pick<ChangeRecord, 'oldVersion' | 'newVersion'>): ChangeKind {
  if (record.oldVersion === null) return 'NEW';
  if (record.newVersion === null) return 'REMOVE';
  return 'UPDATE';
}

export function renderTicketTitle(packageName: string, prefix: string): string {
  return `${prefix}: ${packageName} package update request`;
}

function versionInfo(record: ChangeRecord, kind: ChangeKind): string {
  switch (kind) {
    case 'NEW':
      return `New package: ${record.packageName} >= ${record.newVersion}`;
    case 'REMOVE':
      return `Removed package: ${record.packageName} ${record.oldVersion}`;
    case 'UPDATE':
      return `Update: ${record.packageName} from ${record.oldVersion} to ${record.newVersion}`;
  }
}

/**
 * Render the ticket description for a change.
 *
 * Sections: requested package line, rationale by kind, version info,
 * manifest file list, release context, upstream link, license note.
 */
export function renderTicketBody(
  record: ChangeRecord,
  context: Pick<TicketConfig, 'upstreamName' | 'upstreamUrl' | 'release'>,
): string {
  const kind = classifyChange(record);
  const { upstreamName, upstreamUrl, release } = context;

  return `Requested Package Name and Version:

${record.packageName}>=${record.newVersion ?? record.oldVersion}

Brief Explanation for request:

This package ${CHANGE_NOUN[kind]} is required for ${upstreamName} ${release} release compatibility.

${versionInfo(record, kind)}

This change appears in the following requirement files: ${record.files.join(', ')}

Context:
- The tickets are pre-emptive of the release of ${upstreamName} ${release}
- There may still be further changes when ${release} is cut
- The reasons that we need the packages is because they've been updated in upstream ${upstreamName} and we need them for the next midstream and later downstream release

For upstream reference, see: ${upstreamUrl}

Package License:

This package has been verified to have a license compatible with our distribution. Standard Python packages from PyPI are generally MIT, Apache 2.0, or BSD licensed which are acceptable for inclusion.
`;
}

/** Attach ticket metadata to a change whose body is already rendered */
export function toTicketRecord(record: ChangeRecord, body: string, config: TicketConfig): TicketRecord {
  return {
    packageName: record.packageName,
    oldVersion: record.oldVersion,
    newVersion: record.newVersion,
    files: [...record.files],
    kind: classifyChange(record),
    title: renderTicketTitle(record.packageName, config.titlePrefix),
    body,
    assignee: config.assignee,
    project: config.project,
    components: [...config.components],
    label: config.label,
  };
}

/** Draft a ticket for a change. Pure: no sink is contacted. */
export function draftTicket(record: ChangeRecord, config: TicketConfig): TicketRecord {
  return toTicketRecord(record, renderTicketBody(record, config), config);
}
