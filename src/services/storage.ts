import { GetObjectCommand } from '@aws-sdk/client-s3';
import type { StorageLocation } from '../models';
import { describeError, StorageUnavailableError } from './errors';

export interface MaintenancePageStore {
  fetch(location: StorageLocation): Promise<string>;
}

// The part of S3Client this module depends on
export interface ObjectReader {
  send(
    command: GetObjectCommand,
    options?: { abortSignal?: AbortSignal },
  ): Promise<{ Body?: ObjectBody }>;
}

export interface ObjectBody {
  transformToString(encoding?: string): Promise<string>;
  destroy?(error?: Error): unknown; // present on the Node.js stream body
}

export class S3MaintenancePageStore implements MaintenancePageStore {
  constructor(
    private readonly client: ObjectReader,
    private readonly timeoutMs: number,
  ) {}

  async fetch(location: StorageLocation): Promise<string> {
    const signal = AbortSignal.timeout(this.timeoutMs);

    try {
      const response = await this.client.send(
        new GetObjectCommand({ Bucket: location.bucket, Key: location.key }),
        { abortSignal: signal },
      );

      if (!response.Body) {
        throw new StorageUnavailableError(location, 'object has no body');
      }

      // The deadline also covers reading the body stream
      const body = response.Body;
      return await withDeadline(body.transformToString('utf-8'), signal, () => body.destroy?.());
    } catch (error) {
      if (error instanceof StorageUnavailableError) {
        throw error;
      }
      const reason = signal.aborted
        ? `timed out after ${this.timeoutMs}ms`
        : describeError(error);
      throw new StorageUnavailableError(location, reason, { cause: error });
    }
  }
}

function withDeadline<T>(work: Promise<T>, signal: AbortSignal, cancel: () => void): Promise<T> {
  if (signal.aborted) {
    cancel();
    return Promise.reject(signal.reason);
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      cancel();
      reject(signal.reason);
    };
    signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}
