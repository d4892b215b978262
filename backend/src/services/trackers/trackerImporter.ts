/**
 * Tracker Importer
 *
 * Folds a remote tracker list into the kit catalog. Only genuinely new
 * detectors are appended; existing sections are never rewritten, so detector
 * names stay stable across runs.
 *
 * Administrative operation: run it while no analysis is reading the kit
 * catalog.
 */

import { promises as fs } from 'fs';
import yaml from 'js-yaml';
import { PatternCatalog, isDetectorName } from '../catalog/patternCatalog';
import { createServiceLogger } from '../logger';
import { ConfigError, NetworkError } from '../../utils/errors';
import { canonicalPattern, canonicalSectionName, usableFragments } from './signature';
import type { TrackerDescriptor, TrackerFeed } from './trackerFeed';

const importLogger = createServiceLogger('tracker-importer');

export type MergeDecision =
  /** No fragment left once noise is removed */
  | { kind: 'noise'; tracker: string }
  /** A fragment is already part of some kit section */
  | { kind: 'covered'; tracker: string; fragment: string }
  /** Same detector name exists with a narrower or stale pattern: widen it by hand */
  | { kind: 'needs-widening'; tracker: string; section: string; fragment: string; localPattern: string }
  /** Display name reduces to nothing usable as a section name */
  | { kind: 'invalid-name'; tracker: string; section: string }
  | { kind: 'added'; tracker: string; section: string; pattern: string; description: string };

export interface NewKitSection {
  name: string;
  pattern: string;
  description: string;
}

export interface MergePlan {
  decisions: MergeDecision[];
  additions: NewKitSection[];
}

export interface ImportSummary {
  status: 'completed' | 'aborted';
  /** Set when the feed could not be fetched */
  reason?: string;
  decisions: MergeDecision[];
  /** Section names appended to the kit catalog (planned only, on a dry run) */
  appended: string[];
  dryRun: boolean;
}

export interface TrackerImporterOptions {
  /** Kit catalog file, read fresh and appended to */
  kitCatalogPath: string;
  feed: TrackerFeed;
  /** Label used in the description of imported sections */
  provenance: string;
  /** Date stamp for the appended block comment; defaults to now */
  now?: () => Date;
}

/**
 * Decide, per descriptor, what the kit catalog should get. Pure: the catalog
 * is not modified. Sections planned earlier in the same batch count as known.
 */
export function planTrackerMerge(
  trackers: readonly TrackerDescriptor[],
  catalog: PatternCatalog,
  provenance: string
): MergePlan {
  const batchFragments = new Set<string>();
  const batchPatterns = new Map<string, string>();
  const isKnownFragment = (fragment: string): boolean => catalog.containsPattern(fragment) || batchFragments.has(fragment);
  const knownPattern = (section: string): string | undefined =>
    catalog.hasSection(section) ? catalog.patternOf(section) : batchPatterns.get(section);

  const decisions: MergeDecision[] = [];
  const additions: NewKitSection[] = [];

  for (const tracker of trackers) {
    const fragments = usableFragments(tracker.code_signature);
    const [fragment] = fragments;
    if (fragment === undefined) {
      decisions.push({ kind: 'noise', tracker: tracker.name });
      continue;
    }

    // The first usable fragment settles the descriptor
    if (isKnownFragment(fragment)) {
      decisions.push({ kind: 'covered', tracker: tracker.name, fragment });
      continue;
    }

    const section = canonicalSectionName(tracker.name);
    const localPattern = knownPattern(section);
    if (localPattern !== undefined) {
      decisions.push({ kind: 'needs-widening', tracker: tracker.name, section, fragment, localPattern });
      continue;
    }

    if (!isDetectorName(section)) {
      decisions.push({ kind: 'invalid-name', tracker: tracker.name, section });
      continue;
    }

    const pattern = canonicalPattern(tracker.code_signature);
    const description = `${tracker.name} (from ${provenance})`;
    additions.push({ name: section, pattern, description });
    decisions.push({ kind: 'added', tracker: tracker.name, section, pattern, description });

    batchPatterns.set(section, pattern);
    fragments.forEach(known => batchFragments.add(known));
  }

  return { decisions, additions };
}

/**
 * YAML text for appended sections, headed by a provenance comment
 */
export function renderKitSections(additions: readonly NewKitSection[], provenance: string, importedAt: Date): string {
  const blocks: Record<string, { description: string; pattern: string }> = {};
  additions.forEach(addition => {
    blocks[addition.name] = { description: addition.description, pattern: addition.pattern };
  });

  const header = `# Imported from ${provenance} on ${importedAt.toISOString().slice(0, 10)}\n`;
  return header + yaml.dump(blocks, { lineWidth: -1 });
}

export class TrackerImporter {
  private readonly kitCatalogPath: string;
  private readonly feed: TrackerFeed;
  private readonly provenance: string;
  private readonly now: () => Date;

  constructor(options: TrackerImporterOptions) {
    this.kitCatalogPath = options.kitCatalogPath;
    this.feed = options.feed;
    this.provenance = options.provenance;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Fetch the feed and append new detectors to the kit catalog.
   * A feed failure aborts with a warning and leaves the catalog untouched;
   * a malformed payload or catalog raises ConfigError; write errors propagate.
   */
  async importAndMerge(options: { dryRun?: boolean } = {}): Promise<ImportSummary> {
    const dryRun = options.dryRun ?? false;
    const traceId = importLogger.generateTraceId();
    const timer = importLogger.startTimer('import_and_merge', traceId);

    const catalog = PatternCatalog.load('kit', this.kitCatalogPath);

    let trackers: TrackerDescriptor[];
    try {
      trackers = await this.feed.fetchTrackers();
    } catch (error) {
      if (error instanceof NetworkError) {
        importLogger.warn('feed_unavailable', `Cannot download trackers: ${error.message}`, traceId, {
          url: error.url,
          status: error.status
        });
        timer.end({ status: 'aborted' });
        return { status: 'aborted', reason: error.message, decisions: [], appended: [], dryRun };
      }
      throw error;
    }

    importLogger.debug('feed_fetched', `Fetched ${trackers.length} trackers from ${this.feed.url}`, traceId);

    const plan = planTrackerMerge(trackers, catalog, this.provenance);
    plan.decisions.forEach(decision => this.logDecision(decision, traceId));

    if (plan.additions.length > 0 && !dryRun) {
      await this.appendSections(catalog, plan.additions);
      importLogger.info('catalog_appended', `Appended ${plan.additions.length} trackers to ${this.kitCatalogPath}`, traceId);
    }

    timer.end({ status: 'completed', added: plan.additions.length });

    return {
      status: 'completed',
      decisions: plan.decisions,
      appended: plan.additions.map(addition => addition.name),
      dryRun
    };
  }

  /**
   * Append the rendered blocks after checking that the combined text still
   * loads with the previous sections followed by the new ones. A catalog
   * written as an empty document (`{}`, `~`) holds no section and is
   * replaced by the new blocks; any other text that cannot take a block
   * mapping raises ConfigError and nothing is written.
   */
  private async appendSections(catalog: PatternCatalog, additions: readonly NewKitSection[]): Promise<void> {
    const current = await fs.readFile(this.kitCatalogPath, 'utf-8');
    const separator = current.length === 0 || current.endsWith('\n') ? '' : '\n';
    const text = renderKitSections(additions, this.provenance, this.now());
    const appended = `${separator}${current.length > 0 ? '\n' : ''}${text}`;
    const expected = [...catalog.sections(), ...additions.map(addition => addition.name)];

    if (this.loadsAs(current + appended, expected)) {
      await fs.appendFile(this.kitCatalogPath, appended, 'utf-8');
      return;
    }

    if (catalog.size === 0 && this.loadsAs(text, expected)) {
      importLogger.info('catalog_replaced', `Replacing empty kit document in ${this.kitCatalogPath}`);
      await fs.writeFile(this.kitCatalogPath, text, 'utf-8');
      return;
    }

    throw new ConfigError(
      `Cannot append to kit catalog ${this.kitCatalogPath}: write it as a block mapping first`,
      this.kitCatalogPath
    );
  }

  private loadsAs(text: string, sections: readonly string[]): boolean {
    try {
      const loaded = PatternCatalog.parse('kit', this.kitCatalogPath, text).sections();
      return loaded.length === sections.length && loaded.every((name, index) => name === sections[index]);
    } catch (error) {
      if (error instanceof ConfigError) {
        return false;
      }
      throw error;
    }
  }

  private logDecision(decision: MergeDecision, traceId: string): void {
    switch (decision.kind) {
      case 'noise':
        importLogger.debug('tracker_noise', `No usable signature for tracker=${decision.tracker}`, traceId);
        break;
      case 'covered':
        importLogger.debug('tracker_covered', `Not adding tracker=${decision.tracker} as pattern=${decision.fragment} is already present`, traceId);
        break;
      case 'needs-widening':
        importLogger.warn('tracker_needs_widening', `You should add pattern=${decision.fragment} in tracker=${decision.tracker}`, traceId, {
          section: decision.section,
          localPattern: decision.localPattern
        });
        break;
      case 'invalid-name':
        importLogger.warn('tracker_invalid_name', `Cannot derive a section name from tracker=${decision.tracker}`, traceId, {
          section: decision.section
        });
        break;
      case 'added':
        importLogger.debug('tracker_added', `Adding tracker: ${decision.section}`, traceId, {
          pattern: decision.pattern
        });
        break;
    }
  }
}
