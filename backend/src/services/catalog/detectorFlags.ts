import type { DetectorCategory, DetectorFlagDocument } from '../../types/sample';
import { UnknownDetectorError } from '../../utils/errors';
import type { DetectorId, PatternCatalog } from './patternCatalog';

/**
 * Boolean "detected" flags for one category, keyed by the detector names a
 * catalog listed at the time of the snapshot. The key set is closed: setting
 * a detector the catalog did not list throws instead of adding a field.
 */
export class DetectorFlags {
  private readonly detectors: readonly DetectorId[];
  private readonly flags = new Map<string, boolean>();

  constructor(
    readonly category: DetectorCategory,
    detectors: readonly DetectorId[]
  ) {
    this.detectors = [...detectors];
    detectors.forEach(detector => this.flags.set(detector, false));
  }

  static fromCatalog(catalog: PatternCatalog): DetectorFlags {
    return new DetectorFlags(catalog.category, catalog.sections());
  }

  get size(): number {
    return this.flags.size;
  }

  has(name: string): name is DetectorId {
    return this.flags.has(name);
  }

  /**
   * Resolve a detector name against this snapshot
   */
  id(name: string): DetectorId {
    if (!this.has(name)) {
      throw new UnknownDetectorError(this.category, name);
    }
    return name;
  }

  set(detector: DetectorId, detected: boolean): void {
    if (!this.flags.has(detector)) {
      throw new UnknownDetectorError(this.category, detector);
    }
    this.flags.set(detector, detected);
  }

  /**
   * Mark a detector as matched, by name
   */
  detect(name: string): void {
    this.set(this.id(name), true);
  }

  isDetected(detector: DetectorId): boolean {
    return this.flags.get(detector) === true;
  }

  keys(): DetectorId[] {
    return [...this.detectors];
  }

  detected(): DetectorId[] {
    return this.keys().filter(detector => this.isDetected(detector));
  }

  toJSON(): DetectorFlagDocument {
    const document: DetectorFlagDocument = {};
    this.detectors.forEach(detector => {
      document[detector] = this.isDetected(detector);
    });
    return document;
  }
}
