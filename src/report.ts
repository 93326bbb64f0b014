import { PLACEHOLDERS, type ResolvedComponentEntry } from './types.js';

export type VersionsFormat = 'simple' | 'validation' | 'csv';

const PLACEHOLDER_SET: ReadonlySet<string> = new Set(PLACEHOLDERS);

const RULE = '='.repeat(80);
const THIN_RULE = '-'.repeat(80);

/** True when the value is a concrete extracted token (not a placeholder or blank) */
export function isDetermined(value: string): boolean {
  return value !== '' && !PLACEHOLDER_SET.has(value);
}

function bySlot(entries: ResolvedComponentEntry[]): ResolvedComponentEntry[] {
  return [...entries].sort((a, b) => a.slot - b.slot);
}

/**
 * One line per slot, ready to paste into a spreadsheet column.
 * Marker slots become blank lines. With labels: `label: value`.
 */
export function formatSimple(entries: ResolvedComponentEntry[], showLabels = false): string {
  return bySlot(entries)
    .map((e) => {
      if (e.marker) return '';
      return showLabels ? `${e.label}: ${e.value}` : e.value;
    })
    .join('\n');
}

/**
 * Fixed-width table with a determined/placeholder status column and summary counters.
 * Marker slots are left out of both the table and the counts.
 */
export function formatValidation(entries: ResolvedComponentEntry[]): string {
  const rows = bySlot(entries).filter((e) => !e.marker);

  const lines: string[] = [
    RULE,
    'Component Version Extraction Report',
    RULE,
    `${'Row'.padEnd(5)} ${'Component'.padEnd(45)} ${'Version'.padEnd(20)} Status`,
    THIN_RULE,
  ];

  for (const e of rows) {
    const status = isDetermined(e.value) ? '✓' : '⚠';
    lines.push(`${String(e.slot).padEnd(5)} ${e.label.padEnd(45)} ${e.value.padEnd(20)} ${status}`);
  }

  const count = (value: string) => rows.filter((e) => e.value === value).length;

  lines.push(
    RULE,
    `Total components: ${rows.length}`,
    `Determined: ${rows.filter((e) => isDetermined(e.value)).length}`,
    `Spyre plugins: ${count('[Spyre]')}`,
    `TPU plugins: ${count('[TPU]')}`,
    `TBD: ${count('[tbd]')}`,
    RULE,
  );

  return lines.join('\n');
}

/** Quote a CSV field when it holds a comma, quote or newline */
export function csvField(value: string): string {
  if (/[",\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/** `row,label,value` lines; marker slots become blank lines */
export function formatCsv(entries: ResolvedComponentEntry[]): string {
  return bySlot(entries)
    .map((e) => (e.marker ? '' : [String(e.slot), e.label, e.value].map(csvField).join(',')))
    .join('\n');
}

export function formatVersions(
  entries: ResolvedComponentEntry[],
  format: VersionsFormat,
  showLabels = false,
): string {
  switch (format) {
    case 'validation':
      return formatValidation(entries);
    case 'csv':
      return formatCsv(entries);
    case 'simple':
      return formatSimple(entries, showLabels);
  }
}
