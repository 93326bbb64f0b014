import { execFileSync } from 'node:child_process';
import type { PrereqFailure } from './types.js';

/** External command a subcommand depends on */
export interface ToolRequirement {
  command: string;
  help: string;
}

export const GIT_REQUIREMENT: ToolRequirement = {
  command: 'git',
  help: 'Install it: https://git-scm.com/downloads',
};

export const JIRA_REQUIREMENT: ToolRequirement = {
  command: 'jira',
  help: 'Install it: https://github.com/ankitpokhrel/jira-cli, then run: jira init',
};

/**
 * Check that each required command is on the PATH and collect failures.
 * All failures are returned at once (not fail-fast).
 * Returns an empty array when all checks pass (silent on success).
 */
export function checkPrerequisites(requirements: ToolRequirement[]): PrereqFailure[] {
  const failures: PrereqFailure[] = [];
  const whichCmd = process.platform === 'win32' ? 'where' : 'which';

  for (const req of requirements) {
    try {
      execFileSync(whichCmd, [req.command], { stdio: 'pipe' });
    } catch {
      failures.push({
        name: req.command,
        message: `${req.command} CLI not found`,
        help: req.help,
      });
    }
  }

  return failures;
}
