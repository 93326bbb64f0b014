import { parsePackageLine } from './line-parser.js';
import type { SourceTree } from './types.js';

/** An extraction step: returns the value or null when it is not present */
export type Extractor = (tree: SourceTree) => string | null;

/** Directory holding the upstream Dockerfiles */
export const DOCKER_DIR = 'docker';

/** Directory holding the upstream requirements manifests */
export const REQUIREMENTS_DIR = 'requirements';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function stripQuotes(value: string): string {
  return value.replace(/^["']+/, '').replace(/["']+$/, '');
}

/**
 * Read an `ARG NAME=value` default from `docker/<dockerfile>`.
 * The first matching line wins; surrounding quotes are stripped.
 */
export function dockerArg(tree: SourceTree, dockerfile: string, name: string): string | null {
  const content = tree.readFile(`${DOCKER_DIR}/${dockerfile}`);
  if (content === null) return null;

  const re = new RegExp(`^\\s*ARG\\s+${escapeRegExp(name)}=(.+)$`);
  for (const line of content.split('\n')) {
    const match = line.trim().match(re);
    if (match) return stripQuotes(match[1].trim());
  }
  return null;
}

/**
 * Read a shell variable assignment from a script.
 *
 * Accepted forms, tried in order on each line:
 *   NAME=${NAME:-"value"}
 *   NAME=${NAME:-value}
 *   NAME="value"
 *   NAME=value
 */
export function scriptVar(tree: SourceTree, scriptPath: string, name: string): string | null {
  const content = tree.readFile(scriptPath);
  if (content === null) return null;

  const n = escapeRegExp(name);
  const patterns = [
    new RegExp(`^${n}=\\$\\{${n}:-"([^"]+)"\\}`),
    new RegExp(`^${n}=\\$\\{${n}:-([^"}\\s]+)\\}`),
    new RegExp(`^${n}="([^"]+)"`),
    new RegExp(`^${n}=([^\\s#]+)`),
  ];

  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    for (const re of patterns) {
      const match = trimmed.match(re);
      if (match) return match[1];
    }
  }
  return null;
}

/**
 * Find the reported version of `packageName` in `requirements/<file>`.
 * Names compare case-insensitively; the first declaration wins.
 */
export function manifestVersion(tree: SourceTree, file: string, packageName: string): string | null {
  const content = tree.readFile(`${REQUIREMENTS_DIR}/${file}`);
  if (content === null) return null;

  const wanted = packageName.toLowerCase();
  for (const line of content.split('\n')) {
    const decl = parsePackageLine(line);
    if (decl && decl.name.toLowerCase() === wanted) return decl.version;
  }
  return null;
}

/** Capture group 1 of `pattern` within an already-extracted value */
export function derive(value: string | null, pattern: RegExp): string | null {
  if (value === null) return null;
  const match = value.match(pattern);
  return match?.[1] ?? null;
}

/** Minimum Python from `requires-python = ">=X.Y..."` in pyproject.toml */
export function pyprojectPython(tree: SourceTree): string | null {
  const content = tree.readFile('pyproject.toml');
  if (content === null) return null;

  for (const line of content.split('\n')) {
    const match = line.trim().match(/^requires-python\s*=\s*">=(\d+\.\d+)/);
    if (match) return match[1];
  }
  return null;
}

/**
 * Run an extraction and fall back on null or on any thrown error.
 * The error goes to `onError`; it never becomes the returned value.
 */
export function attempt<T>(fn: () => T | null, fallback: T, onError?: (error: unknown) => void): T {
  try {
    const value = fn();
    return value === null ? fallback : value;
  } catch (error: unknown) {
    onError?.(error);
    return fallback;
  }
}
