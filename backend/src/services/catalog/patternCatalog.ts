/**
 * Pattern Catalog
 *
 * Read-only view of one detector catalog (smali, wide, arm or kit). A catalog
 * is a YAML mapping of detector name to a block holding a `pattern` and an
 * optional `description`; section order in the file is preserved.
 */

import { readFileSync } from 'fs';
import yaml from 'js-yaml';
import { z } from 'zod';
import type { DetectorCategory } from '../../types/sample';
import { CatalogSectionNotFoundError, ConfigError } from '../../utils/errors';
import { createServiceLogger } from '../logger';
import { formatIssues } from '../../utils/validation/formatIssues';
import { isNoiseFragment, splitPattern } from './fragments';

const catalogLogger = createServiceLogger('pattern-catalog');

/**
 * Detector identifier, only obtainable by validating a name
 */
export type DetectorId = string & { readonly __brand: 'DetectorId' };

const DETECTOR_NAME = /^[A-Za-z0-9_][A-Za-z0-9_.-]*$/;

/**
 * Purely numeric names are refused: JavaScript objects list integer-like keys
 * first, which would break source order in reports.
 */
export function isDetectorName(name: string): name is DetectorId {
  return DETECTOR_NAME.test(name) && !/^\d+$/.test(name) && name !== '__proto__';
}

export interface CatalogSection {
  name: DetectorId;
  pattern: string;
  description?: string;
}

const sectionSchema = z
  .object({
    pattern: z.string().min(1, 'pattern must not be empty'),
    description: z.string().optional()
  })
  .passthrough();

const catalogDocumentSchema = z.record(z.string(), sectionSchema);

export class PatternCatalog {
  private readonly entries: ReadonlyMap<DetectorId, CatalogSection>;
  private readonly fragments: ReadonlySet<string>;

  private constructor(
    readonly category: DetectorCategory,
    readonly source: string,
    sections: CatalogSection[]
  ) {
    const entries = new Map<DetectorId, CatalogSection>();
    const fragments = new Set<string>();
    for (const section of sections) {
      entries.set(section.name, section);
      splitPattern(section.pattern).forEach(fragment => fragments.add(fragment));
    }
    this.entries = entries;
    this.fragments = fragments;
  }

  /**
   * Build a catalog from an already parsed YAML document
   */
  static fromDocument(category: DetectorCategory, source: string, document: unknown): PatternCatalog {
    if (document === undefined || document === null) {
      return new PatternCatalog(category, source, []);
    }

    const parsed = catalogDocumentSchema.safeParse(document);
    if (!parsed.success) {
      throw new ConfigError(`Malformed ${category} catalog ${source}: ${formatIssues(parsed.error).join('; ')}`, source);
    }

    const sections: CatalogSection[] = [];
    for (const [name, block] of Object.entries(parsed.data)) {
      if (!isDetectorName(name)) {
        throw new ConfigError(`Invalid detector name "${name}" in ${source}`, source);
      }
      const fragments = splitPattern(block.pattern);
      if (fragments.some(isNoiseFragment)) {
        throw new ConfigError(`Detector "${name}" in ${source} has an empty pattern fragment: ${block.pattern}`, source);
      }
      sections.push({ name, pattern: block.pattern, description: block.description });
    }

    return new PatternCatalog(category, source, sections);
  }

  /**
   * Parse catalog text; duplicated section names are rejected by the YAML loader
   */
  static parse(category: DetectorCategory, source: string, text: string): PatternCatalog {
    let document: unknown;
    try {
      document = yaml.load(text, { filename: source });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Cannot parse ${category} catalog ${source}: ${reason}`, source);
    }
    return PatternCatalog.fromDocument(category, source, document);
  }

  /**
   * Load a catalog from disk. No caching: each call reads the file again.
   */
  static load(category: DetectorCategory, filePath: string): PatternCatalog {
    let text: string;
    try {
      text = readFileSync(filePath, 'utf-8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Cannot read ${category} catalog ${filePath}: ${reason}`, filePath);
    }

    const catalog = PatternCatalog.parse(category, filePath, text);
    catalogLogger.debug('catalog_loaded', `Loaded ${catalog.size} ${category} sections`, undefined, {
      source: filePath
    });
    return catalog;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Detector names in source order
   */
  sections(): DetectorId[] {
    return Array.from(this.entries.keys());
  }

  hasSection(name: string): name is DetectorId {
    return isDetectorName(name) && this.entries.has(name);
  }

  /**
   * True when `fragment` is one of the `|`-separated fragments of any section
   */
  containsPattern(fragment: string): boolean {
    return this.fragments.has(fragment);
  }

  patternOf(name: string): string {
    return this.section(name).pattern;
  }

  section(name: string): CatalogSection {
    const section = this.hasSection(name) ? this.entries.get(name) : undefined;
    if (!section) {
      throw new CatalogSectionNotFoundError(name, this.source);
    }
    return section;
  }
}
