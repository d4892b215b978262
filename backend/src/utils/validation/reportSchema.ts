/**
 * Zod schemas for the sample report document
 *
 * Used both to assert the shape of a freshly built report and to re-read a
 * report file. Catalog-driven categories accept any detector name; their
 * fixed extra fields are checked explicitly.
 */

import { z } from 'zod';
import { FileType } from '../../types/sample';

const countSchema = z.number().int().min(0);
const stringListSchema = z.array(z.string());

export const SMALI_EXTRA_KEYS = ['packed', 'multidex'] as const;
export const WIDE_EXTRA_KEYS = ['app_name', 'phonenumbers', 'urls', 'base64_strings', 'apk_zip_url'] as const;

export const manifestSchema = z
  .object({
    activities: stringListSchema,
    libraries: stringListSchema,
    listens_incoming_sms: z.boolean(),
    listens_outgoing_call: z.boolean(),
    maxSDK: z.number().int(),
    main_activity: z.string().nullable(),
    minSDK: z.number().int(),
    package_name: z.string().nullable(),
    permissions: stringListSchema,
    providers: stringListSchema,
    receivers: stringListSchema,
    services: stringListSchema,
    swf: z.boolean(),
    targetSDK: z.number().int()
  })
  .strict();

export const dexSchema = z
  .object({
    magic: z.number().int(),
    odex: z.boolean(),
    magic_unknown: z.boolean(),
    bad_sha1: z.boolean(),
    bad_adler32: z.boolean(),
    big_header: z.boolean(),
    thuxnder: z.boolean()
  })
  .strict();

export const detectorFlagsSchema = z.record(z.string(), z.boolean());

const smaliExtrasSchema = z
  .object({
    packed: z.boolean(),
    multidex: stringListSchema
  })
  .strict();

const wideExtrasSchema = z
  .object({
    app_name: z.string().nullable(),
    phonenumbers: stringListSchema,
    urls: stringListSchema,
    base64_strings: stringListSchema,
    apk_zip_url: z.boolean()
  })
  .strict();

/**
 * Category document: detector flags plus fixed extras, all at the same level
 */
function categorySchema<V extends z.ZodTypeAny>(
  valueSchema: V,
  extraKeys: readonly string[],
  extras: z.ZodTypeAny
) {
  return z.record(z.string(), valueSchema).superRefine((document, ctx) => {
    const fixed: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(document)) {
      if (extraKeys.includes(key)) {
        fixed[key] = value;
      } else if (typeof value !== 'boolean') {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: 'detector flag must be a boolean' });
      }
    }
    const result = extras.safeParse(fixed);
    if (!result.success) {
      result.error.issues.forEach(issue =>
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: issue.path, message: issue.message })
      );
    }
  });
}

export const smaliSchema = categorySchema(
  z.union([z.boolean(), stringListSchema]),
  SMALI_EXTRA_KEYS,
  smaliExtrasSchema
);

export const wideSchema = categorySchema(
  z.union([z.boolean(), z.string(), stringListSchema, z.null()]),
  WIDE_EXTRA_KEYS,
  wideExtrasSchema
);

export const sampleReportSchema = z
  .object({
    sanitized_basename: z.string(),
    file_nb_classes: countSchema,
    file_nb_dir: countSchema,
    file_size: countSchema,
    file_small: z.boolean(),
    filetype: z.nativeEnum(FileType),
    file_innerzips: z.boolean(),
    manifest_properties: manifestSchema,
    smali_properties: smaliSchema,
    wide_properties: wideSchema,
    arm_properties: detectorFlagsSchema,
    dex_properties: dexSchema,
    kits: detectorFlagsSchema
  })
  .strict();
