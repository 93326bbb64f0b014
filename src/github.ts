import { execFileSync } from 'node:child_process';
import { Octokit } from '@octokit/rest';

/** Owner and repository name parsed from an `owner/repo` slug */
export interface RepoSlug {
  owner: string;
  repo: string;
}

const SLUG_RE = /^([a-zA-Z0-9_.-]+)\/([a-zA-Z0-9_.-]+)$/;

/** Parse `owner/repo`; returns null for anything else */
export function parseRepoSlug(input: string): RepoSlug | null {
  const match = input.trim().match(SLUG_RE);
  if (!match) return null;
  return { owner: match[1], repo: match[2] };
}

/**
 * Find a GitHub token: GITHUB_TOKEN, then GH_TOKEN, then `gh auth token`.
 * Returns null when none is available; public repositories work without one.
 */
function getGitHubToken(): string | null {
  const fromEnv = process.env.GITHUB_TOKEN ?? process.env.GH_TOKEN;
  if (fromEnv) return fromEnv;

  try {
    const token = execFileSync('gh', ['auth', 'token'], {
      encoding: 'utf-8',
      stdio: ['pipe', 'pipe', 'pipe'],
    }).trim();
    return token || null;
  } catch {
    // gh missing or not logged in: fall back to unauthenticated requests
    return null;
  }
}

/**
 * Create an Octokit instance, authenticated when a token is available.
 */
export function createOctokit(): Octokit {
  const token = getGitHubToken();
  return token ? new Octokit({ auth: token }) : new Octokit();
}

/**
 * Fetch the unified diff between two refs of a repository.
 */
export async function fetchCompareDiff(
  octokit: Octokit,
  owner: string,
  repo: string,
  base: string,
  head: string,
): Promise<string> {
  const response = await octokit.repos.compareCommitsWithBasehead({
    owner,
    repo,
    basehead: `${base}...${head}`,
    mediaType: { format: 'diff' },
  }) as unknown as { data: string };

  return response.data;
}
