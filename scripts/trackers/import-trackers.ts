#!/usr/bin/env node

/**
 * CLI for the tracker import
 *
 * Downloads the public tracker list and appends new detectors to the kit
 * catalog. Existing kit sections are never rewritten; collisions are listed
 * so they can be widened by hand.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import Table from 'cli-table3';
import { getConfigSummary, getEnvironmentConfig, toLoggerSettings } from '../../backend/src/config/environment';
import { logger } from '../../backend/src/services/logger';
import { HttpTrackerFeed } from '../../backend/src/services/trackers/trackerFeed';
import { TrackerImporter, type ImportSummary, type MergeDecision } from '../../backend/src/services/trackers/trackerImporter';

interface CLIOptions {
  kitConfig?: string;
  url?: string;
  timeout?: string;
  dryRun: boolean;
  verbose: boolean;
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('import-trackers')
    .description('Merge the public tracker list into the kit pattern catalog')
    .version('1.0.0')
    .option('-k, --kit-config <file>', 'Kit catalog to append to (defaults to KIT_CONFIGFILE)')
    .option('-u, --url <url>', 'Tracker feed URL (defaults to TRACKER_FEED_URL)')
    .option('-t, --timeout <ms>', 'Request timeout in milliseconds')
    .option('-n, --dry-run', 'Show what would be added without writing', false)
    .option('-v, --verbose', 'Enable verbose logging', false)
    .action(async (options: CLIOptions) => {
      const config = getEnvironmentConfig({
        ...process.env,
        ...(options.kitConfig ? { KIT_CONFIGFILE: options.kitConfig } : {}),
        ...(options.url ? { TRACKER_FEED_URL: options.url } : {}),
        ...(options.timeout ? { TRACKER_FEED_TIMEOUT: options.timeout } : {})
      });

      logger.updateConfig(toLoggerSettings(config.logging));
      if (options.verbose) {
        logger.updateConfig({ level: 'debug' });
      }

      console.log(chalk.blue('Tracker import'));
      console.log(chalk.gray(`Feed: ${config.trackers.url}`));
      console.log(chalk.gray(`Kit catalog: ${config.catalogs.kit}`));
      if (options.verbose) {
        console.log(chalk.gray(JSON.stringify(getConfigSummary(config), null, 2)));
      }
      console.log();

      const importer = new TrackerImporter({
        kitCatalogPath: config.catalogs.kit,
        feed: new HttpTrackerFeed({ url: config.trackers.url, timeout: config.trackers.timeout }),
        provenance: config.trackers.provenance
      });

      const summary = await importer.importAndMerge({ dryRun: options.dryRun });
      displaySummary(summary, options.verbose);
    });

  return program;
}

function describeDecision(decision: MergeDecision): [string, string] {
  switch (decision.kind) {
    case 'added':
      return [chalk.green('added'), `${decision.section}: ${decision.pattern}`];
    case 'covered':
      return [chalk.gray('covered'), decision.fragment];
    case 'needs-widening':
      return [chalk.yellow('needs widening'), `${decision.section} lacks ${decision.fragment}`];
    case 'invalid-name':
      return [chalk.yellow('invalid name'), decision.section || '(empty)'];
    case 'noise':
      return [chalk.gray('noise'), ''];
  }
}

function displaySummary(summary: ImportSummary, verbose: boolean): void {
  if (summary.status === 'aborted') {
    console.log(chalk.yellow(`Import aborted: ${summary.reason ?? 'feed unavailable'}`));
    return;
  }

  const shown = verbose ? summary.decisions : summary.decisions.filter(decision => decision.kind === 'added' || decision.kind === 'needs-widening');

  if (shown.length > 0) {
    const table = new Table({
      head: ['Tracker', 'Decision', 'Details'],
      colWidths: [30, 18, 50],
      wordWrap: true
    });
    shown.forEach(decision => {
      const [label, details] = describeDecision(decision);
      table.push([decision.tracker, label, details]);
    });
    console.log(table.toString());
    console.log();
  }

  const verb = summary.dryRun ? 'Would append' : 'Appended';
  console.log(chalk.green(`${verb} ${summary.appended.length} tracker(s) out of ${summary.decisions.length}`));
}

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch(error => {
      console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error));
      process.exit(1);
    });
}
