#!/usr/bin/env node
import { readFileSync } from 'node:fs';
import { Command, InvalidArgumentError, Option } from 'commander';
import pc from 'picocolors';
import { COMPONENT_CATALOGUE, EXTENDED_CATALOGUE } from './catalogue.js';
import { withCheckout } from './cloner.js';
import { DEFAULT_REPO_URL, loadTicketConfig, type TicketConfig } from './config.js';
import { filterManifestDiff, reconcileDiff } from './diff-parser.js';
import { EXIT_INVALID_INPUT, EXIT_PREREQ, EXIT_SINK_ERROR, EXIT_SOURCE_ERROR, sanitizeError } from './errors.js';
import { createOctokit, fetchCompareDiff, parseRepoSlug } from './github.js';
import { DEFAULT_SUBMIT_DELAY_MS, DryRunSink, JiraCliSink, submitTickets, type TicketSink } from './jira.js';
import {
  formatDuration,
  printBatchSummary,
  printChangeSummary,
  printDebug,
  printErrors,
  printProgress,
  printProgressDone,
  printTicketDetails,
  printTicketPreview,
  printWarning,
} from './output.js';
import { checkPrerequisites, GIT_REQUIREMENT, JIRA_REQUIREMENT } from './prerequisites.js';
import { formatVersions, type VersionsFormat } from './report.js';
import { resolveAll } from './resolver.js';
import { diffSnapshots } from './snapshot.js';
import { DirectorySourceTree } from './source-tree.js';
import { loadTicketFiles, writeTicketFiles } from './ticket-store.js';
import { renderTicketBody, toTicketRecord } from './tickets.js';
import type { ResolvedComponentEntry } from './types.js';

/** Print an error with a dimmed detail line and exit */
function fail(message: string, error: unknown, code: number): never {
  console.error(pc.red(`✖ ${message}`));
  console.error(pc.dim('  ' + sanitizeError(error)));
  process.exit(code);
}

function parseDelay(value: string): number {
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer number of milliseconds.');
  }
  return ms;
}

/** Load ticket settings or exit with EXIT_INVALID_INPUT */
function ticketConfigOrExit(configPath: string | undefined, overrides: Partial<TicketConfig>): TicketConfig {
  try {
    return loadTicketConfig(configPath, overrides);
  } catch (error: unknown) {
    fail('Invalid ticket configuration', error, EXIT_INVALID_INPUT);
  }
}

const program = new Command();

program
  .name('reqtrack')
  .description('Track upstream dependency versions and draft package update tickets')
  .version('0.1.0');

program
  .command('versions')
  .description('Extract component versions for the release spreadsheet column')
  .option('--ref <ref>', 'Upstream tag or branch to extract from (e.g. v0.12.0, main)')
  .option('--repo-url <url>', 'Upstream repository URL', DEFAULT_REPO_URL)
  .option('--path <dir>', 'Use an existing checkout instead of cloning')
  .option('--show-labels', 'Show component names alongside values (simple output)')
  .option('--extended', 'Append kernel and connector rows after the standard column')
  .option('--verbose', 'Show debug info: timing, extraction warnings')
  .addOption(
    new Option('--output <format>', 'Output format: simple, validation, csv')
      .choices(['simple', 'validation', 'csv'])
      .default('simple'),
  )
  .action(async (options: {
    ref?: string; repoUrl: string; path?: string; showLabels?: boolean;
    extended?: boolean; verbose?: boolean; output: VersionsFormat;
  }) => {
    if (!options.ref && !options.path) {
      console.error(pc.red('✖ One of --ref or --path is required'));
      process.exit(EXIT_INVALID_INPUT);
    }

    const catalogue = options.extended
      ? [...COMPONENT_CATALOGUE, ...EXTENDED_CATALOGUE]
      : COMPONENT_CATALOGUE;

    const extract = (root: string): ResolvedComponentEntry[] =>
      resolveAll(DirectorySourceTree.open(root), catalogue, {
        onExtractorError: (spec, error) => {
          printWarning(`${spec.label}: extraction failed, using ${spec.fallback}: ${sanitizeError(error)}`);
        },
      });

    let entries: ResolvedComponentEntry[];
    if (options.path) {
      try {
        entries = extract(options.path);
      } catch (error: unknown) {
        fail(`Could not read checkout ${options.path}`, error, EXIT_SOURCE_ERROR);
      }
    } else {
      // 1. Check prerequisites
      const failures = checkPrerequisites([GIT_REQUIREMENT]);
      if (failures.length > 0) {
        printErrors(failures);
        process.exit(EXIT_PREREQ);
      }

      // 2. Clone at ref and extract
      const ref = options.ref ?? '';
      const start = performance.now();
      try {
        printProgress(`Cloning ${options.repoUrl} at ${ref}...`);
        entries = await withCheckout(options.repoUrl, ref, (dir) => {
          printProgressDone();
          return extract(dir);
        });
      } catch (error: unknown) {
        console.error();
        fail(`Could not check out ${ref}`, error, EXIT_SOURCE_ERROR);
      }
      if (options.verbose) {
        printDebug(`Clone + extract: ${formatDuration(performance.now() - start)}`);
      }
    }

    console.log(formatVersions(entries, options.output, options.showLabels));
  });

program
  .command('changes')
  .description('Reconcile a requirements diff into package changes and write ticket files')
  .option('--diff-file <file>', 'Unified diff of requirements manifests')
  .option('--github <owner/repo>', 'Compare two refs of a GitHub repository')
  .option('--base <ref>', 'Base ref for --github')
  .option('--head <ref>', 'Head ref for --github')
  .option('--old-dir <dir>', 'Old snapshot of the requirements directory')
  .option('--new-dir <dir>', 'New snapshot of the requirements directory')
  .option('--out-dir <dir>', 'Directory for ticket files', 'ticket_text')
  .option('--config <file>', 'JSON file with ticket settings')
  .option('--release <name>', 'Upstream release the changes are for (e.g. v0.10.1)')
  .option('--upstream-name <name>', 'Upstream project name used in ticket bodies')
  .option('--upstream-url <url>', 'Upstream project URL used in ticket bodies')
  .option('--verbose', 'Show debug info: timing, diff size')
  .action(async (options: {
    diffFile?: string; github?: string; base?: string; head?: string;
    oldDir?: string; newDir?: string; outDir: string; config?: string;
    release?: string; upstreamName?: string; upstreamUrl?: string; verbose?: boolean;
  }) => {
    const sources = [options.diffFile, options.github, options.oldDir ?? options.newDir].filter(Boolean);
    if (sources.length !== 1) {
      console.error(pc.red('✖ Give exactly one diff source: --diff-file, --github, or --old-dir/--new-dir'));
      process.exit(EXIT_INVALID_INPUT);
    }

    const config = ticketConfigOrExit(options.config, {
      release: options.release,
      upstreamName: options.upstreamName,
      upstreamUrl: options.upstreamUrl,
    });

    // 1. Obtain the diff
    let diff: string;
    const start = performance.now();
    if (options.diffFile) {
      try {
        diff = readFileSync(options.diffFile, 'utf-8');
      } catch (error: unknown) {
        fail(`Could not read ${options.diffFile}`, error, EXIT_INVALID_INPUT);
      }
    } else if (options.github) {
      const slug = parseRepoSlug(options.github);
      if (!slug || !options.base || !options.head) {
        console.error(pc.red('✖ --github needs owner/repo plus --base and --head'));
        process.exit(EXIT_INVALID_INPUT);
      }
      try {
        printProgress(`Comparing ${options.base}...${options.head}...`);
        const full = await fetchCompareDiff(createOctokit(), slug.owner, slug.repo, options.base, options.head);
        printProgressDone();
        diff = filterManifestDiff(full);
      } catch (error: unknown) {
        console.error();
        fail('Failed to fetch compare diff from GitHub', error, EXIT_SOURCE_ERROR);
      }
    } else {
      if (!options.oldDir || !options.newDir) {
        console.error(pc.red('✖ --old-dir and --new-dir must be given together'));
        process.exit(EXIT_INVALID_INPUT);
      }
      const failures = checkPrerequisites([GIT_REQUIREMENT]);
      if (failures.length > 0) {
        printErrors(failures);
        process.exit(EXIT_PREREQ);
      }
      try {
        diff = await diffSnapshots(options.oldDir, options.newDir);
      } catch (error: unknown) {
        fail('Failed to diff requirement snapshots', error, EXIT_SOURCE_ERROR);
      }
    }
    if (options.verbose) {
      printDebug(`Diff: ${diff.split('\n').length} lines in ${formatDuration(performance.now() - start)}`);
    }

    // 2. Reconcile and persist
    const records = [...reconcileDiff(diff).values()];
    printChangeSummary(records);

    let written: string[];
    try {
      written = writeTicketFiles(
        options.outDir,
        records.map((record) => ({ record, body: renderTicketBody(record, config) })),
      );
    } catch (error: unknown) {
      fail(`Could not write ticket files to ${options.outDir}`, error, EXIT_INVALID_INPUT);
    }
    console.log();
    console.log(pc.dim(`Generated ${written.length} ticket files in ${options.outDir}`));
  });

program
  .command('tickets')
  .description('Preview ticket files and create them in the tracker (dry run unless --submit)')
  .option('--ticket-dir <dir>', 'Directory containing ticket files', 'ticket_text')
  .option('--package <name>', 'Process only this package')
  .option('--preview-only', 'Only show the preview table')
  .option('--details', 'Show metadata and body preview for each ticket')
  .option('--submit', 'Create tickets with the jira CLI (default is a dry run)')
  .option('--delay <ms>', `Pause between tickets when submitting (default ${DEFAULT_SUBMIT_DELAY_MS})`, parseDelay)
  .option('--config <file>', 'JSON file with ticket settings')
  .option('--assignee <user>', 'Ticket assignee')
  .option('--project <key>', 'Tracker project key')
  .option('--component <name...>', 'Ticket components (repeatable)')
  .option('--label <label>', 'Ticket label')
  .option('--title-prefix <prefix>', 'Title prefix, as in "<prefix>: <package> package update request"')
  .option('--verbose', 'Show debug info: timing')
  .action(async (options: {
    ticketDir: string; package?: string; previewOnly?: boolean; details?: boolean;
    submit?: boolean; delay?: number; config?: string; assignee?: string; project?: string;
    component?: string[]; label?: string; titlePrefix?: string; verbose?: boolean;
  }) => {
    const config = ticketConfigOrExit(options.config, {
      assignee: options.assignee,
      project: options.project,
      components: options.component,
      label: options.label,
      titlePrefix: options.titlePrefix,
    });

    // 1. Load ticket files
    let loaded: ReturnType<typeof loadTicketFiles>;
    try {
      loaded = loadTicketFiles(options.ticketDir);
    } catch (error: unknown) {
      fail(`Could not read ticket directory ${options.ticketDir}`, error, EXIT_INVALID_INPUT);
    }
    for (const e of loaded.errors) {
      printWarning(`Skipping ${e.file}: ${e.message}`);
    }

    let stored = loaded.tickets;
    if (options.package) {
      const wanted = options.package.toLowerCase();
      stored = stored.filter((t) => t.record.packageName.toLowerCase() === wanted);
      if (stored.length === 0) {
        console.error(pc.red(`✖ Package '${options.package}' not found`));
        process.exit(EXIT_INVALID_INPUT);
      }
    }
    if (stored.length === 0) {
      console.error(pc.red('✖ No tickets found'));
      process.exit(EXIT_INVALID_INPUT);
    }

    // 2. Preview
    printTicketPreview(stored.map((t) => t.record));
    if (options.previewOnly) return;

    const tickets = stored.map((t) => toTicketRecord(t.record, t.body, config));
    if (options.details) {
      for (const ticket of tickets) {
        console.log();
        printTicketDetails(ticket);
      }
    }

    // 3. Submit (or dry run)
    let sink: TicketSink;
    if (options.submit) {
      const failures = checkPrerequisites([JIRA_REQUIREMENT]);
      if (failures.length > 0) {
        printErrors(failures);
        process.exit(EXIT_PREREQ);
      }
      sink = new JiraCliSink();
    } else {
      console.log();
      console.log(pc.yellow('Dry run: no tickets will be created (use --submit)'));
      sink = new DryRunSink();
    }

    const start = performance.now();
    const summary = await submitTickets(tickets, sink, {
      delayMs: options.submit ? (options.delay ?? DEFAULT_SUBMIT_DELAY_MS) : 0,
      onProgress: (ticket, index, total) => {
        console.log(pc.dim(`Processing ${ticket.packageName} (${index}/${total})`));
      },
    });
    printBatchSummary(summary);
    if (options.verbose) {
      printDebug(`Submit: ${formatDuration(performance.now() - start)}`);
    }

    if (summary.failed > 0 || summary.partial > 0) {
      process.exit(EXIT_SINK_ERROR);
    }
  });

await program.parseAsync();
