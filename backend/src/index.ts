/**
 * droidmeta: metadata model for analyzed Android samples
 */

export * from './config';
export * from './types/sample';
export * from './utils/errors';
export { calculateFileHash, generateChecksum, identifySample, isValidSHA256, sanitizeBasename } from './utils/hash';
export { parseReport, ReportWriter, DEFAULT_REPORT_FILE } from './services/storage/reportWriter';
export { SampleWriter, SAMPLES_SCHEMA_SQL, toSampleRow, type WriteOutcome } from './services/storage/sampleWriter';
export { PatternCatalog, isDetectorName, type CatalogSection, type DetectorId } from './services/catalog/patternCatalog';
export { DetectorFlags } from './services/catalog/detectorFlags';
export {
  SampleRecord,
  loadCatalogSnapshot,
  defaultCertificate,
  defaultManifest,
  defaultDex,
  type CatalogSnapshot,
  type SampleRecordOptions,
  type SmaliProperties,
  type WideProperties
} from './models/sampleRecord';
export { canonicalizeSignature, canonicalPattern, canonicalSectionName, usableFragments } from './services/trackers/signature';
export { HttpTrackerFeed, parseTrackerList, type TrackerDescriptor, type TrackerFeed } from './services/trackers/trackerFeed';
export {
  TrackerImporter,
  planTrackerMerge,
  renderKitSections,
  type ImportSummary,
  type MergeDecision,
  type MergePlan,
  type NewKitSection
} from './services/trackers/trackerImporter';
export { createServiceLogger, logger, type LogLevel, type LoggerConfig } from './services/logger';
