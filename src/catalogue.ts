import { derive, dockerArg, manifestVersion, pyprojectPython, scriptVar, DOCKER_DIR, type Extractor } from './extractors.js';
import { shortCommit } from './line-parser.js';
import { MARKER_LABEL, type Placeholder } from './types.js';

/** One row of the release spreadsheet column */
export interface ComponentSpec {
  readonly slot: number;
  readonly label: string;
  /** Tried in order; the first non-null value wins */
  readonly attempts: readonly Extractor[];
  readonly fallback: Placeholder | '';
  /** Structural blank row (merged cells); never extracted */
  readonly marker?: boolean;
}

const EP_KERNELS_SCRIPT = 'tools/ep_kernels/install_python_libraries.sh';
const DEEPGEMM_SCRIPT = 'tools/install_deepgemm.sh';

function hashOrRef(value: string | null): string | null {
  return value === null ? null : shortCommit(value);
}

function row(slot: number, label: string, attempts: Extractor[], fallback: Placeholder = '[tbd]'): ComponentSpec {
  return { slot, label, attempts, fallback };
}

function gated(slot: number, label: string, placeholder: Placeholder): ComponentSpec {
  return { slot, label, attempts: [], fallback: placeholder };
}

function marker(slot: number): ComponentSpec {
  return { slot, label: MARKER_LABEL, attempts: [], fallback: '', marker: true };
}

const pkg = (file: string, name: string): Extractor => (tree) => manifestVersion(tree, file, name);

/**
 * Spreadsheet rows 16-43 of the release component-version mapping.
 * Rows 17, 21-23 and the `[Spyre]` variants are asserted, never extracted.
 */
export const COMPONENT_CATALOGUE: readonly ComponentSpec[] = [
  row(16, 'python', [
    (tree) => dockerArg(tree, 'Dockerfile', 'PYTHON_VERSION'),
    pyprojectPython,
  ]),
  row(17, 'RHEL', []),
  row(18, 'gcc [specific to Spyre]', [
    (tree) => derive(tree.readFile(`${DOCKER_DIR}/Dockerfile`), /gcc-(\d+)/),
  ]),
  row(19, 'CUDA', [(tree) => dockerArg(tree, 'Dockerfile', 'CUDA_VERSION')]),
  row(20, 'ROCM', [
    // rocm/dev-ubuntu-22.04:7.1-complete -> 7.1
    (tree) => derive(dockerArg(tree, 'Dockerfile.rocm_base', 'BASE_IMAGE'), /:(\d+\.\d+)/),
  ]),
  gated(21, 'Spyre x86 plugin', '[Spyre]'),
  gated(22, 'Spyre s390x plugin', '[Spyre]'),
  gated(23, 'Spyre ppc64le plugin', '[Spyre]'),
  marker(24),
  row(25, 'torch [CUDA]', [pkg('cuda.txt', 'torch')]),
  row(26, 'torch [ROCM]', [pkg('rocm-build.txt', 'torch'), pkg('rocm.txt', 'torch')]),
  // TPU builds may ship torch through a plugin instead of tpu.txt
  row(27, 'torch [TPU]', [pkg('tpu.txt', 'torch')], '[TPU]'),
  gated(28, 'torch [Spyre]', '[Spyre]'),
  marker(29),
  row(30, 'aiter [ROCM]', [(tree) => hashOrRef(dockerArg(tree, 'Dockerfile.rocm_base', 'AITER_BRANCH'))]),
  row(31, 'compressed-tensors [CUDA, ROCM, TPU, Spyre]', [pkg('common.txt', 'compressed-tensors')]),
  row(32, 'flashinfer [CUDA]', [pkg('cuda.txt', 'flashinfer-python'), pkg('cuda.txt', 'flashinfer')]),
  row(33, 'flash_attn [ROCM]', [(tree) => hashOrRef(dockerArg(tree, 'Dockerfile.rocm_base', 'FA_BRANCH'))]),
  row(34, 'nccl', [pkg('test.txt', 'nvidia-nccl-cu12')]),
  row(35, 'nvshmem', [(tree) => scriptVar(tree, EP_KERNELS_SCRIPT, 'NVSHMEM_VER')]),
  row(36, 'tokenizers [CUDA, ROCM, TPU from 3.2.1]', [pkg('common.txt', 'tokenizers')]),
  gated(37, 'tokenizers [Spyre]', '[Spyre]'),
  row(38, 'tpu-info [TPU]', [pkg('tpu.txt', 'tpu_info'), pkg('tpu.txt', 'tpu-info')], '[TPU]'),
  row(39, 'transformers [CUDA, ROCM, TPU from 3.2.1]', [pkg('common.txt', 'transformers')]),
  gated(40, 'transformers [Spyre]', '[Spyre]'),
  row(41, 'triton [CUDA, ROCM,TPU from 3.2.1]', [pkg('rocm-build.txt', 'triton'), pkg('test.txt', 'triton')]),
  gated(42, 'triton [Spyre]', '[Spyre]'),
  row(43, 'vllm-tgis-adapter [CUDA, ROCM, Spyre]', []),
];

/** Kernel and connector rows that follow the standard column */
export const EXTENDED_CATALOGUE: readonly ComponentSpec[] = [
  row(44, 'pplx-kernels', [(tree) => hashOrRef(scriptVar(tree, EP_KERNELS_SCRIPT, 'PPLX_COMMIT_HASH'))]),
  row(45, 'DeepEP', [(tree) => hashOrRef(scriptVar(tree, EP_KERNELS_SCRIPT, 'DEEPEP_COMMIT_HASH'))]),
  row(46, 'DeepGEMM', [(tree) => hashOrRef(scriptVar(tree, DEEPGEMM_SCRIPT, 'DEEPGEMM_GIT_REF'))]),
  row(47, 'nixl', [pkg('tpu.txt', 'nixl'), pkg('kv_connectors.txt', 'nixl')]),
];

/**
 * Check that slot ordinals are unique across the given catalogue.
 * Throws naming the first duplicated slot.
 */
export function validateCatalogue(catalogue: readonly ComponentSpec[]): void {
  const seen = new Map<number, string>();
  for (const spec of catalogue) {
    const existing = seen.get(spec.slot);
    if (existing !== undefined) {
      throw new Error(`Duplicate catalogue slot ${spec.slot}: '${existing}' and '${spec.label}'`);
    }
    seen.set(spec.slot, spec.label);
  }
}
