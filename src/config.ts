import { readFileSync } from 'node:fs';
import { z } from 'zod';

/** Default upstream repository cloned by `versions` */
export const DEFAULT_REPO_URL = 'https://github.com/vllm-project/vllm.git';

/** Ticket metadata and body context, overridable by a JSON config file and CLI flags */
export const TicketConfigSchema = z.object({
  assignee: z.string(),
  project: z.string().min(1),
  components: z.array(z.string().min(1)),
  label: z.string().min(1),
  titlePrefix: z.string().min(1),
  upstreamName: z.string().min(1),
  upstreamUrl: z.string().url(),
  release: z.string().min(1),
});

export type TicketConfig = z.infer<typeof TicketConfigSchema>;

export const DEFAULT_TICKET_CONFIG: TicketConfig = {
  assignee: '',
  project: 'AIPCC',
  components: ['Accelerator Enablement', 'Application Platform'],
  label: 'package',
  titlePrefix: 'builder',
  upstreamName: 'vLLM',
  upstreamUrl: 'https://github.com/vllm-project/vllm',
  release: 'next',
};

/** Partial config accepted from a file; unknown keys are rejected */
export const TicketConfigFileSchema = TicketConfigSchema.partial().strict();

/**
 * Merge defaults, an optional JSON config file, and explicit overrides (in that order).
 * Throws with the file path and validation message when the file is unreadable or invalid.
 */
export function loadTicketConfig(
  configPath?: string,
  overrides: Partial<TicketConfig> = {},
): TicketConfig {
  let fromFile: Partial<TicketConfig> = {};

  if (configPath) {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(configPath, 'utf-8'));
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Could not read config ${configPath}: ${message}`);
    }
    const parsed = TicketConfigFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`Invalid config ${configPath}: ${parsed.error.message}`);
    }
    fromFile = parsed.data;
  }

  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined),
  );

  const merged = TicketConfigSchema.safeParse({ ...DEFAULT_TICKET_CONFIG, ...fromFile, ...defined });
  if (!merged.success) {
    throw new Error(`Invalid ticket settings: ${merged.error.message}`);
  }
  return merged.data;
}
