/**
 * Remote recordings: list the bucket within a lookback window, download into
 * the intake folder, and hand new files to the pipeline.
 */
import { join } from 'path';
import { isSupportedAudioFile } from '../config/env.js';
import type { CallStore } from '../store/callStore.js';
import type { AdapterResult, RemoteObjectRef, SyncReport } from '../types/index.js';
import { FileManager } from '../utils/fileManager.js';
import { errorMessage } from '../utils/errors.js';
import { logger as rootLogger } from '../utils/logger.js';
import type { BucketObject, ObjectBucket } from './s3Bucket.js';

const logger = rootLogger.child('s3');

const DAY_MS = 24 * 60 * 60 * 1000;

export interface ListOptions {
  /** Only objects modified within the last `sinceMs` milliseconds. */
  sinceMs?: number;
  limit?: number;
}

export interface BucketStats {
  location: string;
  totalObjects: number;
  audioObjects: number;
  totalSizeBytes: number;
  newestModified?: string;
}

const RETRYABLE_S3_ERRORS = new Set([
  'SlowDown',
  'RequestTimeout',
  'InternalError',
  'ServiceUnavailable',
  'TimeoutError',
  'AbortError',
]);

const RETRYABLE_NETWORK_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EPIPE', 'EAI_AGAIN']);

export function isRetryableBucketError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if (RETRYABLE_S3_ERRORS.has(error.name)) {
    return true;
  }
  if ('$fault' in error && error.$fault === 'server') {
    return true;
  }
  return 'code' in error && typeof error.code === 'string' && RETRYABLE_NETWORK_CODES.has(error.code);
}

export function filenameFromKey(key: string): string {
  const segments = key.split('/');
  return segments[segments.length - 1] ?? key;
}

export class RemoteSync {
  constructor(
    private readonly bucket: ObjectBucket,
    private readonly store: CallStore,
    private readonly intakeDir: string,
    private readonly lookbackDays: number,
    private readonly onDownloaded: (filename: string, key: string) => void,
    private readonly now: () => number = Date.now
  ) {}

  get location(): string {
    return this.bucket.location;
  }

  /**
   * Every audio object in the bucket prefix, across all pages, newest first.
   */
  async list(options: ListOptions = {}): Promise<RemoteObjectRef[]> {
    const cutoff = options.sinceMs !== undefined ? this.now() - options.sinceMs : undefined;
    const refs: RemoteObjectRef[] = [];

    let token: string | undefined;
    do {
      const page = await this.bucket.listPage(token);
      for (const object of page.objects) {
        const filename = filenameFromKey(object.key);
        if (!isSupportedAudioFile(filename)) {
          continue;
        }
        if (cutoff !== undefined && object.lastModified.getTime() < cutoff) {
          continue;
        }
        refs.push({
          key: object.key,
          filename,
          size: object.size,
          lastModified: object.lastModified,
          downloaded: await FileManager.fileExists(join(this.intakeDir, filename)),
        });
      }
      token = page.nextToken;
    } while (token);

    refs.sort((a, b) => b.lastModified.getTime() - a.lastModified.getTime());
    return options.limit !== undefined ? refs.slice(0, options.limit) : refs;
  }

  /**
   * Fetch one object into the intake folder. An existing local copy is kept.
   */
  async download(key: string): Promise<AdapterResult<string>> {
    const filename = filenameFromKey(key);
    if (!isSupportedAudioFile(filename)) {
      return { ok: false, retryable: false, error: `Unsupported file type: ${filename}` };
    }

    const destination = join(this.intakeDir, filename);
    if (await FileManager.fileExists(destination)) {
      logger.debug(`Already present locally: ${filename}`);
      return { ok: true, value: destination };
    }

    try {
      logger.info(`Downloading ${key}`);
      const body = await this.bucket.getObject(key);
      await FileManager.writeFileAtomic(destination, body);
      logger.success(`Downloaded ${filename} (${body.byteLength} bytes)`);
      return { ok: true, value: destination };
    } catch (error) {
      const retryable = isRetryableBucketError(error);
      const message = `Download of ${key} failed: ${errorMessage(error)}`;
      logger.warn(message);
      return { ok: false, retryable, error: message };
    }
  }

  /**
   * Download everything in the lookback window that isn't already local or
   * recorded. A failed object is counted and the batch continues.
   */
  async sync(): Promise<SyncReport> {
    const report: SyncReport = { downloaded: 0, skipped: 0, failed: 0 };
    const objects = await this.list({ sinceMs: this.lookbackDays * DAY_MS });
    logger.info(`Found ${objects.length} recording(s) in ${this.bucket.location} from the last ${this.lookbackDays} day(s)`);

    for (const object of objects) {
      if (object.downloaded || (await this.store.get(object.filename))) {
        report.skipped += 1;
        continue;
      }

      const result = await this.download(object.key);
      if (!result.ok) {
        report.failed += 1;
        continue;
      }

      report.downloaded += 1;
      this.onDownloaded(object.filename, object.key);
    }

    logger.info(
      `Sync finished: ${report.downloaded} downloaded, ${report.skipped} skipped, ${report.failed} failed`
    );
    return report;
  }

  async bucketStats(): Promise<BucketStats> {
    const all = await this.listAll();
    const audio = all.filter((object) => isSupportedAudioFile(filenameFromKey(object.key)));
    const newest = all.reduce<Date | undefined>(
      (latest, object) => (!latest || object.lastModified > latest ? object.lastModified : latest),
      undefined
    );
    return {
      location: this.bucket.location,
      totalObjects: all.length,
      audioObjects: audio.length,
      totalSizeBytes: all.reduce((sum, object) => sum + object.size, 0),
      newestModified: newest?.toISOString(),
    };
  }

  private async listAll(): Promise<BucketObject[]> {
    const objects: BucketObject[] = [];
    let token: string | undefined;
    do {
      const page = await this.bucket.listPage(token);
      objects.push(...page.objects);
      token = page.nextToken;
    } while (token);
    return objects;
  }
}
