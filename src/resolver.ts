import { attempt } from './extractors.js';
import { COMPONENT_CATALOGUE, validateCatalogue, type ComponentSpec } from './catalogue.js';
import type { ResolvedComponentEntry, SourceTree } from './types.js';

export interface ResolveOptions {
  /** Called when an extractor throws; the row still resolves to its fallback */
  onExtractorError?: (spec: ComponentSpec, error: unknown) => void;
}

/** Resolve one catalogue row against a source tree */
export function resolveComponent(
  tree: SourceTree,
  spec: ComponentSpec,
  options: ResolveOptions = {},
): ResolvedComponentEntry {
  if (spec.marker) {
    return { slot: spec.slot, label: spec.label, value: '', marker: true };
  }

  let value: string = spec.fallback;
  for (const extractor of spec.attempts) {
    const found = attempt<string | null>(
      () => extractor(tree),
      null,
      (error) => options.onExtractorError?.(spec, error),
    );
    // An empty value (e.g. `ARG X=""`) counts as not found
    if (found !== null && found.trim() !== '') {
      value = found;
      break;
    }
  }

  return { slot: spec.slot, label: spec.label, value, marker: false };
}

/**
 * Resolve every row of the catalogue.
 * The result is ordered by slot no matter how the catalogue is declared.
 */
export function resolveAll(
  tree: SourceTree,
  catalogue: readonly ComponentSpec[] = COMPONENT_CATALOGUE,
  options: ResolveOptions = {},
): ResolvedComponentEntry[] {
  validateCatalogue(catalogue);
  return catalogue
    .map((spec) => resolveComponent(tree, spec, options))
    .sort((a, b) => a.slot - b.slot);
}
