import type { StorageLocation } from '../models';

// The maintenance document could not be read (missing, denied, timed out or empty)
export class StorageUnavailableError extends Error {
  readonly bucket: string;
  readonly key: string;

  constructor(location: StorageLocation, message: string, options?: { cause?: unknown }) {
    super(`s3://${location.bucket}/${location.key}: ${message}`, options);
    this.name = 'StorageUnavailableError';
    this.bucket = location.bucket;
    this.key = location.key;
  }
}

// The downstream function could not be invoked or returned something unusable
export class DownstreamUnavailableError extends Error {
  readonly functionRef: string;

  constructor(functionRef: string, message: string, options?: { cause?: unknown }) {
    super(`${functionRef}: ${message}`, options);
    this.name = 'DownstreamUnavailableError';
    this.functionRef = functionRef;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
