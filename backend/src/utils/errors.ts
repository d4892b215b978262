/**
 * Error taxonomy for sample metadata handling.
 *
 * Every error carries a stable `code` so callers (and the CLI) can branch on
 * the kind of failure without string matching.
 */

export class SampleMetadataError extends Error {
  constructor(
    message: string,
    public readonly code: string
  ) {
    super(message);
    this.name = 'SampleMetadataError';
  }
}

/**
 * Malformed or missing configuration source (catalog file, feed payload, environment)
 */
export class ConfigError extends SampleMetadataError {
  constructor(message: string, public readonly source?: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

export class CatalogSectionNotFoundError extends SampleMetadataError {
  constructor(
    public readonly section: string,
    public readonly source: string
  ) {
    super(`Section "${section}" is not defined in ${source}`, 'NOT_FOUND');
    this.name = 'CatalogSectionNotFoundError';
  }
}

/**
 * Remote feed unreachable, timed out or answered with a non-success status
 */
export class NetworkError extends SampleMetadataError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number
  ) {
    super(message, 'NETWORK_ERROR');
    this.name = 'NetworkError';
  }
}

export class DuplicateSampleError extends SampleMetadataError {
  constructor(public readonly sha256: string) {
    super(`Sample ${sha256} is already stored`, 'DUPLICATE_SAMPLE');
    this.name = 'DuplicateSampleError';
  }
}

export class ValidationError extends SampleMetadataError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export class UnknownDetectorError extends ValidationError {
  constructor(
    public readonly category: string,
    public readonly detector: string
  ) {
    super(`Unknown ${category} detector: ${detector}`);
    this.name = 'UnknownDetectorError';
  }
}
