/**
 * AWS S3 Storage Implementation
 */

import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
} from '@aws-sdk/client-s3';
import { Config } from '../config';
import { Logger, errorMessage } from '../utils';

function isMissingObject(error: unknown): boolean {
  return error instanceof Error && (error.name === 'NotFound' || error.name === 'NoSuchKey');
}

export class S3Storage {
  private client: S3Client;
  private bucket: string;

  constructor() {
    this.bucket = Config.S3_BUCKET;

    this.client = new S3Client({
      region: Config.S3_REGION,
      credentials: {
        accessKeyId: Config.S3_ACCESS_KEY,
        secretAccessKey: Config.S3_SECRET_KEY,
      },
      ...(Config.S3_ENDPOINT
        ? {
            endpoint: Config.S3_ENDPOINT,
            forcePathStyle: true, // Required for MinIO and some S3-compatible services
          }
        : {}),
    });

    Logger.info('S3Storage initialized', {
      bucket: this.bucket,
      region: Config.S3_REGION,
      hasEndpoint: !!Config.S3_ENDPOINT,
    });
  }

  async put(key: string, data: Buffer | string, contentType: string): Promise<string> {
    try {
      const buffer = typeof data === 'string' ? Buffer.from(data, 'utf-8') : data;

      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: buffer,
          ContentType: contentType,
        })
      );

      const url = this.getPublicUrl(key);
      Logger.debug('S3 put successful', { key, size: buffer.length, url });
      return url;
    } catch (error) {
      Logger.error('S3 put failed', { key, error: errorMessage(error) });
      throw error;
    }
  }

  async get(key: string): Promise<Buffer> {
    try {
      const response = await this.client.send(
        new GetObjectCommand({
          Bucket: this.bucket,
          Key: key,
        })
      );

      if (!response.Body) {
        throw new Error('No data returned from S3');
      }

      const bytes = await response.Body.transformToByteArray();
      return Buffer.from(bytes);
    } catch (error) {
      if (isMissingObject(error)) {
        throw new Error(`S3 object not found: ${key}`);
      }
      Logger.error('S3 get failed', { key, error: errorMessage(error) });
      throw error;
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      await this.client.send(
        new HeadObjectCommand({
          Bucket: this.bucket,
          Key: key,
        })
      );
      return true;
    } catch (error) {
      if (isMissingObject(error)) {
        return false;
      }
      throw error;
    }
  }

  async list(prefix: string): Promise<Array<{
    path: string;
    url: string;
    size: number;
    uploadedAt: Date;
  }>> {
    const response = await this.client.send(
      new ListObjectsV2Command({
        Bucket: this.bucket,
        Prefix: prefix,
      })
    );

    const objects = response.Contents || [];

    return objects.map(obj => ({
      path: obj.Key || '',
      url: this.getPublicUrl(obj.Key || ''),
      size: obj.Size || 0,
      uploadedAt: obj.LastModified || new Date(),
    }));
  }

  private getPublicUrl(key: string): string {
    if (Config.S3_ENDPOINT) {
      const endpoint = Config.S3_ENDPOINT.replace(/\/$/, '');
      return `${endpoint}/${this.bucket}/${key}`;
    }
    return `https://${this.bucket}.s3.${Config.S3_REGION}.amazonaws.com/${key}`;
  }
}
