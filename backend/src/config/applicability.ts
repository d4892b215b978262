/**
 * Field Applicability
 *
 * Declares, per metadata field, the file types for which the field carries a
 * meaning. A field that does not apply keeps its default value and should be
 * ignored by consumers.
 */

import { FileType } from '../types/sample';

export const FIELD_TAGS = [
  'file_size',
  'file_small',
  'file_nb_classes',
  'file_nb_dir',
  'file_innerzips',
  'cert',
  'manifest',
  'smali',
  'wide',
  'arm',
  'dex',
  'kit'
] as const;

export type FieldTag = (typeof FIELD_TAGS)[number];

const ANY_BINARY = [FileType.APK, FileType.DEX, FileType.ARM, FileType.CLASS, FileType.ZIP, FileType.RAR];

export const APPLICABILITY: Readonly<Record<FieldTag, ReadonlySet<FileType>>> = {
  file_size: new Set(ANY_BINARY),
  file_small: new Set(ANY_BINARY),
  file_nb_classes: new Set([FileType.APK, FileType.DEX]),
  file_nb_dir: new Set([FileType.APK, FileType.DEX]),
  file_innerzips: new Set([FileType.APK, FileType.ZIP, FileType.RAR]),
  cert: new Set([FileType.APK]),
  manifest: new Set([FileType.APK]),
  smali: new Set([FileType.APK, FileType.DEX]),
  wide: new Set([FileType.APK, FileType.DEX]),
  arm: new Set([FileType.APK, FileType.ARM]),
  dex: new Set([FileType.APK, FileType.DEX]),
  kit: new Set([FileType.APK, FileType.DEX])
};

export function applies(field: FieldTag, fileType: FileType): boolean {
  return APPLICABILITY[field].has(fileType);
}

/**
 * Fields meaningful for a given file type, in declaration order
 */
export function applicableFields(fileType: FileType): FieldTag[] {
  return FIELD_TAGS.filter(field => applies(field, fileType));
}
