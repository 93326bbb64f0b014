import { parsePackageLine } from './line-parser.js';
import type { ChangeRecord, DiffSection, VersionToken } from './types.js';

/** Matches a diff file header: diff --git a/path b/path */
export const FILE_HEADER_RE = /^diff --git a\/.+ b\/(.+)$/;

/** Manifest name fragments that put a requirements file under tracking */
const TRACKED_NAMES = ['common', 'build', 'cuda', 'rocm', 'tpu'];

/** Name fragments that exclude a requirements file even when it matches above */
const EXCLUDED_NAMES = ['test', 'nightly', 'cpu'];

/** Names produced by diff tooling continuation lines rather than real packages */
const IGNORED_PACKAGES = new Set(['', 'via']);

interface ChangeAccumulator {
  packageName: string;
  oldVersion: VersionToken | null;
  newVersion: VersionToken | null;
  files: Set<string>;
}

/**
 * File name shown in a `--- ` / `+++ ` header: last path segment,
 * ignoring a trailing tab-separated timestamp. Returns null for /dev/null.
 */
export function headerFilename(header: string): string | null {
  const path = header.slice(4).split('\t')[0].trim();
  if (path === '/dev/null') return null;
  const segments = path.split('/');
  return segments[segments.length - 1];
}

/** Whether a requirements file name is one whose changes we draft tickets for */
export function isTrackedManifest(path: string): boolean {
  const name = path.split('/').pop()?.toLowerCase() ?? '';
  if (!name.endsWith('.txt')) return false;
  if (EXCLUDED_NAMES.some((fragment) => name.includes(fragment))) return false;
  return TRACKED_NAMES.some((fragment) => name.includes(fragment));
}

/**
 * Reconcile a unified diff of requirements manifests into per-package changes.
 *
 * `-` lines set a package's old version and `+` lines its new version; the
 * current file (from the latest `---`/`+++` header) joins the package's file
 * set. Packages are matched case-insensitively: the map key is the
 * lower-cased name (`pyyaml`), while `packageName` keeps the first spelling
 * seen (`PyYAML`). Look records up with `name.toLowerCase()`.
 * Records whose old and new versions are equal are dropped. Iteration order
 * of the returned map is the order packages were first seen.
 */
export function reconcileDiff(diff: string): Map<string, ChangeRecord> {
  const changes = new Map<string, ChangeAccumulator>();
  let currentFile: string | null = null;

  const touch = (name: string): ChangeAccumulator => {
    const key = name.toLowerCase();
    let acc = changes.get(key);
    if (!acc) {
      acc = { packageName: name, oldVersion: null, newVersion: null, files: new Set() };
      changes.set(key, acc);
    }
    if (currentFile !== null) acc.files.add(currentFile);
    return acc;
  };

  for (const line of diff.split('\n')) {
    if (line.startsWith('--- ') || line.startsWith('+++ ')) {
      currentFile = headerFilename(line) ?? currentFile;
      continue;
    }

    const removed = line.startsWith('-') && !line.startsWith('---');
    const added = line.startsWith('+') && !line.startsWith('+++');
    if (!removed && !added) continue;

    const decl = parsePackageLine(line.slice(1));
    if (!decl || IGNORED_PACKAGES.has(decl.name)) continue;

    const acc = touch(decl.name);
    if (removed) {
      acc.oldVersion = decl.version;
    } else {
      acc.newVersion = decl.version;
    }
  }

  const result = new Map<string, ChangeRecord>();
  for (const [key, acc] of changes) {
    if (acc.oldVersion === acc.newVersion) continue;
    result.set(key, {
      packageName: acc.packageName,
      oldVersion: acc.oldVersion,
      newVersion: acc.newVersion,
      files: [...acc.files].sort(),
    });
  }
  return result;
}

/**
 * Split a git diff into per-file sections on `diff --git` headers.
 * Text before the first header is dropped.
 */
export function splitDiffByFile(diff: string): DiffSection[] {
  const sections: DiffSection[] = [];
  let current: { filename: string; lines: string[] } | null = null;

  for (const line of diff.split('\n')) {
    const fileMatch = line.match(FILE_HEADER_RE);
    if (fileMatch) {
      if (current) sections.push({ filename: current.filename, text: current.lines.join('\n') });
      current = { filename: fileMatch[1], lines: [line] };
      continue;
    }
    current?.lines.push(line);
  }

  if (current) sections.push({ filename: current.filename, text: current.lines.join('\n') });
  return sections;
}

/** Keep only the sections of a git diff that touch tracked requirements manifests */
export function filterManifestDiff(diff: string, requirementsDir = 'requirements'): string {
  return splitDiffByFile(diff)
    .filter((s) => s.filename.startsWith(`${requirementsDir}/`) && isTrackedManifest(s.filename))
    .map((s) => s.text)
    .join('\n');
}
