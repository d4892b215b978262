/**
 * Sample Record
 *
 * Metadata gathered for one analyzed sample. Instances are reused across
 * samples: `reset()` reloads the four pattern catalogs and rebuilds every
 * field, so nothing from the previous sample survives.
 */

import { applies, type FieldTag } from '../config/applicability';
import type { CatalogConfig } from '../config/environment';
import { DetectorFlags } from '../services/catalog/detectorFlags';
import { PatternCatalog } from '../services/catalog/patternCatalog';
import { createServiceLogger } from '../services/logger';
import {
  DETECTOR_CATEGORIES,
  FileType,
  type CertificateProperties,
  type DetectorCategory,
  type DexProperties,
  type ManifestProperties,
  type SampleIdentity,
  type SampleReport,
  type SmaliExtras,
  type WideExtras
} from '../types/sample';
import { ConfigError, ValidationError } from '../utils/errors';
import { formatIssues } from '../utils/validation/formatIssues';
import { SMALI_EXTRA_KEYS, WIDE_EXTRA_KEYS, sampleReportSchema } from '../utils/validation/reportSchema';

const recordLogger = createServiceLogger('sample-record');

export interface SmaliProperties extends SmaliExtras {
  detectors: DetectorFlags;
}

export interface WideProperties extends WideExtras {
  detectors: DetectorFlags;
}

export type CatalogSnapshot = Record<DetectorCategory, PatternCatalog>;

/** Fixed fields living next to catalog flags; a section may not reuse these names */
const RESERVED_SECTION_NAMES: Record<DetectorCategory, readonly string[]> = {
  smali: SMALI_EXTRA_KEYS,
  wide: WIDE_EXTRA_KEYS,
  arm: [],
  kit: []
};

export function defaultCertificate(): CertificateProperties {
  return {
    av: false,
    algo: null,
    debug: false,
    dev: false,
    famous: false,
    serialno: null,
    country: 'unknown',
    owner: null,
    timestamp: null,
    year: 0,
    unknown_country: false
  };
}

export function defaultManifest(): ManifestProperties {
  return {
    activities: [],
    libraries: [],
    listens_incoming_sms: false,
    listens_outgoing_call: false,
    maxSDK: 0,
    main_activity: null,
    minSDK: 0,
    package_name: null,
    permissions: [],
    providers: [],
    receivers: [],
    services: [],
    swf: false,
    targetSDK: 0
  };
}

export function defaultDex(): DexProperties {
  return {
    magic: 0,
    odex: false,
    magic_unknown: false,
    bad_sha1: false,
    bad_adler32: false,
    big_header: false,
    thuxnder: false
  };
}

/**
 * Load all four catalogs, rejecting sections that shadow a fixed field
 */
export function loadCatalogSnapshot(sources: CatalogConfig): CatalogSnapshot {
  const load = (category: DetectorCategory): PatternCatalog => {
    const catalog = PatternCatalog.load(category, sources[category]);
    const clash = catalog.sections().find(name => RESERVED_SECTION_NAMES[category].includes(name));
    if (clash) {
      throw new ConfigError(`Section "${clash}" in ${catalog.source} clashes with a fixed ${category} field`, catalog.source);
    }
    return catalog;
  };

  return {
    smali: load('smali'),
    wide: load('wide'),
    arm: load('arm'),
    kit: load('kit')
  };
}

export interface SampleRecordOptions {
  /** Catalog file per category */
  catalogs: CatalogConfig;
  sha256?: string;
  sanitizedBasename?: string;
}

export class SampleRecord {
  sha256 = '';
  sanitizedBasename = '';

  fileSize = 0;
  fileSmall = false;
  filetype: FileType = FileType.UNKNOWN;
  fileNbClasses = 0;
  fileNbDir = 0;
  fileInnerzips = false;

  certificate: CertificateProperties = defaultCertificate();
  manifest: ManifestProperties = defaultManifest();
  smali: SmaliProperties = { detectors: new DetectorFlags('smali', []), packed: false, multidex: [] };
  wide: WideProperties = {
    detectors: new DetectorFlags('wide', []),
    app_name: null,
    phonenumbers: [],
    urls: [],
    base64_strings: [],
    apk_zip_url: false
  };
  arm = new DetectorFlags('arm', []);
  dex: DexProperties = defaultDex();
  kits = new DetectorFlags('kit', []);

  private readonly catalogSources: CatalogConfig;
  private snapshot: CatalogSnapshot | null = null;

  constructor(options: SampleRecordOptions) {
    this.catalogSources = { ...options.catalogs };
    this.reset({ sha256: options.sha256, sanitizedBasename: options.sanitizedBasename });
  }

  /**
   * Restore every field to its default and rebuild the catalog-driven flags.
   * Catalogs are read before anything is touched: a ConfigError leaves the
   * record exactly as it was.
   */
  reset(identity: Partial<SampleIdentity> = {}): void {
    const snapshot = loadCatalogSnapshot(this.catalogSources);

    this.sha256 = identity.sha256 ?? '';
    this.sanitizedBasename = identity.sanitizedBasename ?? '';

    this.fileSize = 0;
    this.fileSmall = false;
    this.filetype = FileType.UNKNOWN;
    this.fileNbClasses = 0;
    this.fileNbDir = 0;
    this.fileInnerzips = false;

    this.certificate = defaultCertificate();
    this.manifest = defaultManifest();
    this.smali = {
      detectors: DetectorFlags.fromCatalog(snapshot.smali),
      packed: false,
      multidex: []
    };
    this.wide = {
      detectors: DetectorFlags.fromCatalog(snapshot.wide),
      app_name: null,
      phonenumbers: [],
      urls: [],
      base64_strings: [],
      apk_zip_url: false
    };
    this.arm = DetectorFlags.fromCatalog(snapshot.arm);
    this.dex = defaultDex();
    this.kits = DetectorFlags.fromCatalog(snapshot.kit);

    this.snapshot = snapshot;

    recordLogger.debug('record_reset', 'Sample record reset', undefined, {
      sha256: this.sha256,
      sections: {
        smali: this.smali.detectors.size,
        wide: this.wide.detectors.size,
        arm: this.arm.size,
        kit: this.kits.size
      }
    });
  }

  get identity(): SampleIdentity {
    return { sha256: this.sha256, sanitizedBasename: this.sanitizedBasename };
  }

  /**
   * Catalog the current flags were built from
   */
  catalog(category: DetectorCategory): PatternCatalog {
    if (!this.snapshot) {
      throw new ConfigError(`No ${category} catalog loaded`);
    }
    return this.snapshot[category];
  }

  flags(category: DetectorCategory): DetectorFlags {
    switch (category) {
      case 'smali':
        return this.smali.detectors;
      case 'wide':
        return this.wide.detectors;
      case 'arm':
        return this.arm;
      case 'kit':
        return this.kits;
    }
  }

  isApplicable(field: FieldTag): boolean {
    return applies(field, this.filetype);
  }

  /**
   * Detected detector names per category
   */
  detections(): Record<DetectorCategory, string[]> {
    const result: Record<DetectorCategory, string[]> = { smali: [], wide: [], arm: [], kit: [] };
    DETECTOR_CATEGORIES.forEach(category => {
      result[category] = this.flags(category).detected();
    });
    return result;
  }

  /**
   * Report document mirroring the record; throws ValidationError when the
   * record no longer has the documented shape
   */
  toReport(): SampleReport {
    const report: SampleReport = {
      sanitized_basename: this.sanitizedBasename,
      file_nb_classes: this.fileNbClasses,
      file_nb_dir: this.fileNbDir,
      file_size: this.fileSize,
      file_small: this.fileSmall,
      filetype: this.filetype,
      file_innerzips: this.fileInnerzips,
      manifest_properties: structuredClone(this.manifest),
      smali_properties: {
        ...this.smali.detectors.toJSON(),
        packed: this.smali.packed,
        multidex: [...this.smali.multidex]
      },
      wide_properties: {
        app_name: this.wide.app_name,
        phonenumbers: [...this.wide.phonenumbers],
        urls: [...this.wide.urls],
        base64_strings: [...this.wide.base64_strings],
        apk_zip_url: this.wide.apk_zip_url,
        ...this.wide.detectors.toJSON()
      },
      arm_properties: this.arm.toJSON(),
      dex_properties: { ...this.dex },
      kits: this.kits.toJSON()
    };

    const checked = sampleReportSchema.safeParse(report);
    if (!checked.success) {
      throw new ValidationError(`Sample record ${this.sha256 || '<unidentified>'} has an unexpected shape`, formatIssues(checked.error));
    }

    return report;
  }
}
