import type { PackageDeclaration, VersionToken } from './types.js';

/** Name (before optional extras) of a URL-pinned requirement: `pkg[extra] @ https://...` */
const URL_PIN_NAME_RE = /^([^\s[]+)(?:\[[^\]]+\])?\s*@/;

/** A full 40-character commit hash following an `@` */
const COMMIT_PIN_RE = /@([0-9a-f]{40})/;

/** First `N.N.N` or `N.N.N.devN` anywhere on a URL-pinned line */
const URL_VERSION_RE = /(\d+\.\d+\.\d+(?:\.dev\d+)?)/;

/** `name[extras]` followed by zero or more comma-separated comparison clauses */
const CONSTRAINED_RE =
  /^([a-zA-Z0-9_-]+)(?:\[[^\]]+\])?\s*([><=!]+\s*[\d.\w+]+(?:\s*,\s*[><=!]+\s*[\d.\w+]+)*)?/;

const VERSION_PATTERN = String.raw`\d+\.\d+(?:\.\d+)?(?:\+\w+|\.dev\d+)?`;

const LOWER_BOUND_RE = new RegExp(String.raw`>=?\s*(${VERSION_PATTERN})`);
const EXACT_RE = new RegExp(String.raw`==\s*(${VERSION_PATTERN})`);
const UPPER_BOUND_RE = /^\s*<=?\s*[\d.]+/;
const ANY_VERSION_RE = new RegExp(`(${VERSION_PATTERN})`);

const HEX_RE = /^[0-9a-f]+$/;

/** Length of the short commit form reported for git pins */
export const SHORT_COMMIT_LENGTH = 8;

/**
 * Reduce a hex commit hash to its short form.
 * Non-hex values and values already at or below the short length pass through unchanged.
 */
export function shortCommit(value: string): string {
  if (HEX_RE.test(value) && value.length > SHORT_COMMIT_LENGTH) {
    return value.slice(0, SHORT_COMMIT_LENGTH);
  }
  return value;
}

/**
 * Pick the single reportable version out of a constraint expression.
 *
 * Precedence: lower bound (`>=`/`>`) number, then `==` number, then the whole
 * text when it is an upper bound (`<`/`<=`), then any number, then the raw text.
 */
export function resolveConstraintVersion(constraint: string): VersionToken {
  const lower = constraint.match(LOWER_BOUND_RE);
  if (lower) return lower[1];

  const exact = constraint.match(EXACT_RE);
  if (exact) return exact[1];

  const trimmed = constraint.trim();
  if (UPPER_BOUND_RE.test(trimmed)) return trimmed;

  const any = constraint.match(ANY_VERSION_RE);
  return any ? any[1] : trimmed;
}

function parseUrlPinned(line: string): PackageDeclaration | null {
  const match = line.match(URL_PIN_NAME_RE);
  if (!match) return null;

  const commit = line.match(COMMIT_PIN_RE);
  if (commit) {
    return { name: match[1], version: shortCommit(commit[1]) };
  }

  const version = line.match(URL_VERSION_RE);
  return { name: match[1], version: version ? version[1] : 'unknown' };
}

/**
 * Parse one requirements-style line into a package name and reported version.
 *
 * Returns null for blank lines, comments, pip options and anything that is not
 * a package declaration.
 */
export function parsePackageLine(raw: string): PackageDeclaration | null {
  const line = raw.trim();
  if (!line || line.startsWith('#') || line.startsWith('-')) return null;

  if (line.includes('@') && line.includes('http')) {
    const pinned = parseUrlPinned(line);
    if (pinned) return pinned;
  }

  const match = line.match(CONSTRAINED_RE);
  if (!match) return null;

  const constraint = match[2];
  return {
    name: match[1],
    version: constraint ? resolveConstraintVersion(constraint) : 'latest',
  };
}
