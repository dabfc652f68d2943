/**
 * Object storage port and its S3 implementation.
 */
import { GetObjectCommand, ListObjectsV2Command, S3Client } from '@aws-sdk/client-s3';

export interface BucketObject {
  key: string;
  size: number;
  lastModified: Date;
}

export interface BucketPage {
  objects: BucketObject[];
  nextToken?: string;
}

export interface ObjectBucket {
  /** Bucket/prefix label for logs and status output. */
  readonly location: string;
  listPage(continuationToken?: string): Promise<BucketPage>;
  getObject(key: string): Promise<Uint8Array>;
}

export interface S3BucketOptions {
  region: string;
  bucket: string;
  prefix: string;
  timeoutMs: number;
  credentials: {
    accessKeyId: string;
    secretAccessKey: string;
    sessionToken?: string;
  };
}

export class S3ObjectBucket implements ObjectBucket {
  private client: S3Client;
  readonly location: string;

  constructor(private readonly options: S3BucketOptions) {
    this.client = new S3Client({ region: options.region, credentials: options.credentials });
    this.location = `s3://${options.bucket}/${options.prefix}`;
  }

  async listPage(continuationToken?: string): Promise<BucketPage> {
    const response = await this.client.send(
      new ListObjectsV2Command({
        Bucket: this.options.bucket,
        Prefix: this.options.prefix || undefined,
        ContinuationToken: continuationToken,
      }),
      { abortSignal: AbortSignal.timeout(this.options.timeoutMs) }
    );

    const objects: BucketObject[] = [];
    for (const item of response.Contents ?? []) {
      if (!item.Key || item.Key.endsWith('/')) {
        continue;
      }
      objects.push({
        key: item.Key,
        size: item.Size ?? 0,
        lastModified: item.LastModified ?? new Date(0),
      });
    }

    return {
      objects,
      nextToken: response.IsTruncated ? response.NextContinuationToken : undefined,
    };
  }

  async getObject(key: string): Promise<Uint8Array> {
    const response = await this.client.send(
      new GetObjectCommand({ Bucket: this.options.bucket, Key: key }),
      { abortSignal: AbortSignal.timeout(this.options.timeoutMs) }
    );
    if (!response.Body) {
      throw new Error(`Empty body for s3 object ${key}`);
    }
    return response.Body.transformToByteArray();
  }

  destroy(): void {
    this.client.destroy();
  }
}
