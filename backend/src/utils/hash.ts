/**
 * Sample identity helpers
 *
 * SHA-256 content hashes are the durable key of a sample; the sanitized
 * basename is only a display aid.
 */

import { createHash } from 'crypto';
import { promises as fs } from 'fs';
import * as path from 'path';
import type { SampleIdentity } from '../types/sample';

/**
 * Calculate SHA-256 hash of a file
 */
export async function calculateFileHash(filePath: string): Promise<string> {
  const fileBuffer = await fs.readFile(filePath);
  return generateChecksum(fileBuffer);
}

export function generateChecksum(content: string | Buffer): string {
  return createHash('sha256').update(content).digest('hex');
}

/**
 * Validate SHA256 hash format
 */
export function isValidSHA256(hash: string): boolean {
  return /^[a-f0-9]{64}$/i.test(hash);
}

/**
 * Basename of a sample path, restricted to `[A-Za-z0-9._-]`
 */
export function sanitizeBasename(filePath: string): string {
  const base = path.basename(filePath.replace(/\\/g, '/'));
  const cleaned = base.replace(/[^A-Za-z0-9._-]+/g, '_').replace(/^[._]+/, '');
  return cleaned.length > 0 ? cleaned : 'sample';
}

export async function identifySample(filePath: string): Promise<SampleIdentity> {
  return {
    sha256: await calculateFileHash(filePath),
    sanitizedBasename: sanitizeBasename(filePath)
  };
}
