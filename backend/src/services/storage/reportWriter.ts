/**
 * Report Writer
 *
 * Writes the JSON report of a sample record to a single file, overwriting
 * any previous report.
 */

import { promises as fs } from 'fs';
import { dirname } from 'path';
import type { SampleRecord } from '../../models/sampleRecord';
import type { SampleReport } from '../../types/sample';
import { ValidationError } from '../../utils/errors';
import { formatIssues } from '../../utils/validation/formatIssues';
import { sampleReportSchema } from '../../utils/validation/reportSchema';
import { createServiceLogger } from '../logger';

const reportLogger = createServiceLogger('report-writer');

export const DEFAULT_REPORT_FILE = 'report.json';

/**
 * Check that a decoded document is a sample report
 */
export function parseReport(value: unknown): SampleReport {
  const parsed = sampleReportSchema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError('Document is not a sample report', formatIssues(parsed.error));
  }
  return parsed.data;
}

export class ReportWriter {
  constructor(readonly reportPath: string = DEFAULT_REPORT_FILE) {}

  async write(record: SampleRecord): Promise<SampleReport> {
    const report = record.toReport();
    await fs.mkdir(dirname(this.reportPath), { recursive: true });
    await fs.writeFile(this.reportPath, `${JSON.stringify(report, null, 2)}\n`, 'utf-8');

    reportLogger.debug('report_written', `Report written to ${this.reportPath}`, undefined, {
      sha256: record.sha256
    });
    return report;
  }

  async read(): Promise<SampleReport> {
    const text = await fs.readFile(this.reportPath, 'utf-8');
    let document: unknown;
    try {
      document = JSON.parse(text);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ValidationError(`Report ${this.reportPath} is not valid JSON: ${reason}`);
    }
    return parseReport(document);
  }
}
