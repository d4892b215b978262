/**
 * Domain Types: Sample Metadata
 *
 * Shapes of the metadata record kept for one analyzed Android sample and of
 * the documents it is externalized to (JSON report, database row).
 */

export const FileType = {
  APK: 'APK',
  DEX: 'DEX',
  ARM: 'ARM',
  CLASS: 'CLASS',
  ZIP: 'ZIP',
  RAR: 'RAR',
  UNKNOWN: 'UNKNOWN'
} as const;

export type FileType = (typeof FileType)[keyof typeof FileType];

export const FILE_TYPES: readonly FileType[] = Object.values(FileType);

/**
 * Catalog-backed categories: their keys come from an external pattern catalog
 */
export type DetectorCategory = 'smali' | 'wide' | 'arm' | 'kit';

export const DETECTOR_CATEGORIES: readonly DetectorCategory[] = ['smali', 'wide', 'arm', 'kit'];

/** Country code attached to a signing certificate; "unknown" when not resolved */
export type CountryCode = string;

export interface CertificateProperties {
  av: boolean;
  algo: string | null;
  debug: boolean;
  dev: boolean;
  famous: boolean;
  serialno: string | null;
  country: CountryCode;
  owner: string | null;
  timestamp: string | null;
  year: number;
  unknown_country: boolean;
}

export interface ManifestProperties {
  activities: string[];
  libraries: string[];
  listens_incoming_sms: boolean;
  listens_outgoing_call: boolean;
  maxSDK: number;
  main_activity: string | null;
  minSDK: number;
  package_name: string | null;
  permissions: string[];
  providers: string[];
  receivers: string[];
  services: string[];
  swf: boolean;
  targetSDK: number;
}

export interface DexProperties {
  magic: number;
  odex: boolean;
  magic_unknown: boolean;
  bad_sha1: boolean;
  bad_adler32: boolean;
  big_header: boolean;
  thuxnder: boolean;
}

/** Fixed fields of the smali category, next to its catalog-driven flags */
export interface SmaliExtras {
  /** Inferred downstream (no main activity + dynamic DEX loading), not catalog-driven */
  packed: boolean;
  multidex: string[];
}

/** Fixed fields of the wide category, next to its catalog-driven flags */
export interface WideExtras {
  app_name: string | null;
  phonenumbers: string[];
  urls: string[];
  base64_strings: string[];
  apk_zip_url: boolean;
}

export type DetectorFlagDocument = Record<string, boolean>;

/**
 * JSON report document. Key names are part of the external contract.
 */
export interface SampleReport {
  sanitized_basename: string;
  file_nb_classes: number;
  file_nb_dir: number;
  file_size: number;
  file_small: boolean;
  filetype: FileType;
  file_innerzips: boolean;
  manifest_properties: ManifestProperties;
  smali_properties: Record<string, boolean | string[]>;
  wide_properties: Record<string, boolean | string | string[] | null>;
  arm_properties: DetectorFlagDocument;
  dex_properties: DexProperties;
  kits: DetectorFlagDocument;
}

/**
 * One row of the `samples` table
 */
export interface SampleRow {
  sha256: string;
  sanitized_basename: string;
  file_nb_classes: number;
  file_nb_dir: number;
  file_size: number;
  file_small: number;
  filetype: string;
  file_innerzips: number;
  manifest_properties: string;
  smali_properties: string;
  wide_properties: string;
  arm_properties: string;
  dex_properties: string;
  kits: string;
}

export interface SampleIdentity {
  sha256: string;
  sanitizedBasename: string;
}
