/** A version string as reported from a manifest or build file (not validated semver) */
export type VersionToken = string;

/** Reserved values marking a row that was intentionally left unresolved */
export const PLACEHOLDERS = ['[tbd]', '[Spyre]', '[TPU]'] as const;

export type Placeholder = (typeof PLACEHOLDERS)[number];

/** Label carried by structural blank rows in the spreadsheet column */
export const MARKER_LABEL = '[merged cells]';

/** One package declaration parsed from a manifest line */
export interface PackageDeclaration {
  name: string;
  version: VersionToken;
}

/**
 * Read-only view of a checked-out upstream tree.
 * Paths are relative to the repository root and use forward slashes.
 */
export interface SourceTree {
  readFile(relativePath: string): string | null;
}

/** A single resolved spreadsheet row */
export interface ResolvedComponentEntry {
  slot: number;
  label: string;
  value: string;
  marker: boolean;
}

/** Before/after versions of one package across a manifest diff */
export interface ChangeRecord {
  packageName: string;
  oldVersion: VersionToken | null;
  newVersion: VersionToken | null;
  /** Sorted, de-duplicated manifest file names */
  files: string[];
}

export type ChangeKind = 'NEW' | 'REMOVE' | 'UPDATE';

/** A drafted ticket ready for a sink */
export interface TicketRecord extends ChangeRecord {
  kind: ChangeKind;
  title: string;
  body: string;
  assignee: string;
  project: string;
  components: string[];
  label: string;
}

/** A prerequisite check failure with actionable help */
export interface PrereqFailure {
  name: string;
  message: string;
  help: string;
}

/** Per-file section of a git diff */
export interface DiffSection {
  filename: string;
  text: string;
}
