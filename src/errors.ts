/** Exit code for missing prerequisites (git, jira CLI) */
export const EXIT_PREREQ = 1;

/** Exit code for invalid arguments, bad config, an unreadable diff or an unwritable output directory */
export const EXIT_INVALID_INPUT = 2;

/** Exit code for source provider failures (clone, GitHub compare, snapshot diff) */
export const EXIT_SOURCE_ERROR = 3;

/** Exit code when one or more tickets failed or were only partially created */
export const EXIT_SINK_ERROR = 4;

/**
 * Scrub secrets and credentials from a string.
 * Replaces known token/key patterns with [REDACTED].
 * Always scrubs -- no exceptions, even in --verbose mode.
 */
export function scrubSecrets(text: string): string {
  return text
    // GitHub classic tokens (ghp_, gho_, ghs_, ghr_, ghu_)
    .replace(/\b(ghp_|gho_|ghs_|ghr_|ghu_)[a-zA-Z0-9_]+/g, '[REDACTED]')
    // GitHub fine-grained PATs
    .replace(/\bgithub_pat_[a-zA-Z0-9_]+/g, '[REDACTED]')
    // Atlassian API tokens
    .replace(/\bATATT[a-zA-Z0-9_=-]+/g, '[REDACTED]')
    // JIRA_API_TOKEN=... in echoed environments or commands
    .replace(/(JIRA_API_TOKEN=)\S+/g, '$1[REDACTED]')
    // Bearer/token auth headers
    .replace(/(Bearer|token)\s+[a-zA-Z0-9._\-]+/gi, '$1 [REDACTED]')
    // URL-embedded credentials
    .replace(/https?:\/\/[^@\s]+@/g, 'https://[REDACTED]@');
}

/**
 * Extract a safe error message from an unknown error value.
 * Converts to string, then scrubs any embedded secrets.
 */
export function sanitizeError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return scrubSecrets(message);
}
