/**
 * Sample Writer
 *
 * Persists one row per analyzed sample into a SQLite database. The SHA-256
 * is the primary key: writing an already stored sample is reported as a
 * duplicate and leaves the existing row alone.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import type { SampleRecord } from '../../models/sampleRecord';
import type { SampleRow } from '../../types/sample';
import { DuplicateSampleError, ValidationError } from '../../utils/errors';
import { isValidSHA256 } from '../../utils/hash';
import { createServiceLogger } from '../logger';

const writerLogger = createServiceLogger('sample-writer');

export const SAMPLES_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS samples (
  sha256 TEXT PRIMARY KEY,
  sanitized_basename TEXT NOT NULL,
  file_nb_classes INTEGER NOT NULL DEFAULT 0,
  file_nb_dir INTEGER NOT NULL DEFAULT 0,
  file_size INTEGER NOT NULL DEFAULT 0,
  file_small INTEGER NOT NULL DEFAULT 0,
  filetype TEXT NOT NULL,
  file_innerzips INTEGER NOT NULL DEFAULT 0,
  manifest_properties TEXT NOT NULL,
  smali_properties TEXT NOT NULL,
  wide_properties TEXT NOT NULL,
  arm_properties TEXT NOT NULL,
  dex_properties TEXT NOT NULL,
  kits TEXT NOT NULL
);
`;

export type WriteOutcome = 'inserted' | 'duplicate';

const UNIQUE_VIOLATIONS = new Set(['SQLITE_CONSTRAINT_PRIMARYKEY', 'SQLITE_CONSTRAINT_UNIQUE']);

/**
 * Flatten a record into a `samples` row; sub-records become JSON text.
 * The key is stored in lower case so hex case never splits one sample.
 */
export function toSampleRow(record: SampleRecord): SampleRow {
  const report = record.toReport();
  return {
    sha256: record.sha256.toLowerCase(),
    sanitized_basename: report.sanitized_basename,
    file_nb_classes: report.file_nb_classes,
    file_nb_dir: report.file_nb_dir,
    file_size: report.file_size,
    file_small: report.file_small ? 1 : 0,
    filetype: report.filetype,
    file_innerzips: report.file_innerzips ? 1 : 0,
    manifest_properties: JSON.stringify(report.manifest_properties),
    smali_properties: JSON.stringify(report.smali_properties),
    wide_properties: JSON.stringify(report.wide_properties),
    arm_properties: JSON.stringify(report.arm_properties),
    dex_properties: JSON.stringify(report.dex_properties),
    kits: JSON.stringify(report.kits)
  };
}

export class SampleWriter {
  private readonly insert: Database.Statement<[SampleRow]>;
  private readonly selectOne: Database.Statement<[string], SampleRow>;
  private readonly countRows: Database.Statement<[], { total: number }>;

  constructor(private readonly db: Database.Database) {
    db.exec(SAMPLES_SCHEMA_SQL);
    this.insert = db.prepare<SampleRow>(`
      INSERT INTO samples (
        sha256, sanitized_basename, file_nb_classes, file_nb_dir, file_size, file_small,
        filetype, file_innerzips, manifest_properties, smali_properties, wide_properties,
        arm_properties, dex_properties, kits
      ) VALUES (
        @sha256, @sanitized_basename, @file_nb_classes, @file_nb_dir, @file_size, @file_small,
        @filetype, @file_innerzips, @manifest_properties, @smali_properties, @wide_properties,
        @arm_properties, @dex_properties, @kits
      )
    `);
    this.selectOne = db.prepare<[string], SampleRow>('SELECT * FROM samples WHERE sha256 = ?');
    this.countRows = db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM samples');
  }

  /**
   * Open (or create) a database file; `:memory:` keeps everything in process
   */
  static open(databasePath: string): SampleWriter {
    if (databasePath !== ':memory:') {
      mkdirSync(dirname(databasePath), { recursive: true });
    }
    const db = new Database(databasePath);
    db.pragma('journal_mode = WAL');
    return new SampleWriter(db);
  }

  /**
   * Insert the record. A sample already stored under the same SHA-256 is
   * logged and reported as 'duplicate'; any other database error propagates.
   */
  write(record: SampleRecord): WriteOutcome {
    if (!isValidSHA256(record.sha256)) {
      throw new ValidationError(`Cannot store a sample without a valid SHA-256 (got "${record.sha256}")`);
    }

    const row = toSampleRow(record);
    try {
      this.insert.run(row);
    } catch (error) {
      if (error instanceof Database.SqliteError && UNIQUE_VIOLATIONS.has(error.code)) {
        const duplicate = new DuplicateSampleError(row.sha256);
        writerLogger.debug('sample_duplicate', duplicate.message, undefined, { sha256: row.sha256 });
        return 'duplicate';
      }
      throw error;
    }

    writerLogger.debug('sample_written', `Stored sample ${row.sanitized_basename}`, undefined, { sha256: row.sha256 });
    return 'inserted';
  }

  findBySha256(sha256: string): SampleRow | undefined {
    return this.selectOne.get(sha256.toLowerCase());
  }

  count(): number {
    return this.countRows.get()?.total ?? 0;
  }

  close(): void {
    this.db.close();
  }
}
