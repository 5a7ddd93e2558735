/**
 * Storage Tool - Abstraction over local disk, Vercel Blob and S3-compatible storage
 */

import { promises as fs, Dirent } from 'fs';
import path from 'path';
import { put, list } from '@vercel/blob';
import { Config, StorageBackend } from '../config';
import { Logger } from '../utils';
import { S3Storage } from './storage-s3';

export interface StorageObject {
  path: string;
  url: string;
  size: number;
  uploadedAt: Date;
}

export interface StorageOptions {
  backend?: StorageBackend;
  rootDir?: string;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class StorageTool {
  readonly backend: StorageBackend;
  private rootDir: string;
  private s3?: S3Storage;

  constructor(options: StorageOptions = {}) {
    this.backend = options.backend ?? Config.STORAGE_BACKEND;
    this.rootDir = path.resolve(options.rootDir ?? Config.DATA_DIR);
  }

  async put(
    storagePath: string,
    data: Buffer | string,
    contentType: string
  ): Promise<string> {
    Logger.debug('Storage put', { path: storagePath, size: data.length, contentType });

    switch (this.backend) {
      case 'vercel-blob':
        return this.putVercelBlob(storagePath, data, contentType);
      case 's3':
        return this.s3Client().put(storagePath, data, contentType);
      default:
        return this.putLocal(storagePath, data);
    }
  }

  async get(storagePath: string): Promise<Buffer> {
    Logger.debug('Storage get', { path: storagePath });

    switch (this.backend) {
      case 'vercel-blob':
        return this.getVercelBlob(storagePath);
      case 's3':
        return this.s3Client().get(storagePath);
      default:
        return fs.readFile(this.localPath(storagePath));
    }
  }

  async exists(storagePath: string): Promise<boolean> {
    switch (this.backend) {
      case 'vercel-blob': {
        const { blobs } = await list({ prefix: storagePath, limit: 1, token: this.blobToken() });
        return blobs.length > 0 && blobs[0].pathname === storagePath;
      }
      case 's3':
        return this.s3Client().exists(storagePath);
      default:
        try {
          await fs.access(this.localPath(storagePath));
          return true;
        } catch (error) {
          if (isNotFound(error)) {
            return false;
          }
          throw error;
        }
    }
  }

  async list(prefix: string): Promise<StorageObject[]> {
    switch (this.backend) {
      case 'vercel-blob': {
        const { blobs } = await list({ prefix, token: this.blobToken() });
        return blobs.map(blob => ({
          path: blob.pathname,
          url: blob.url,
          size: blob.size,
          uploadedAt: new Date(blob.uploadedAt),
        }));
      }
      case 's3':
        return this.s3Client().list(prefix);
      default:
        return this.listLocal(prefix);
    }
  }

  // Local disk implementation
  private localPath(storagePath: string): string {
    const resolved = path.resolve(this.rootDir, storagePath);
    if (resolved !== this.rootDir && !resolved.startsWith(this.rootDir + path.sep)) {
      throw new Error(`Storage path escapes data directory: ${storagePath}`);
    }
    return resolved;
  }

  private async putLocal(storagePath: string, data: Buffer | string): Promise<string> {
    const target = this.localPath(storagePath);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, data);
    return target;
  }

  private async listLocal(prefix: string): Promise<StorageObject[]> {
    const results: StorageObject[] = [];

    const walk = async (dir: string): Promise<void> => {
      let entries: Dirent[];
      try {
        entries = await fs.readdir(dir, { withFileTypes: true });
      } catch (error) {
        if (isNotFound(error)) {
          return;
        }
        throw error;
      }

      for (const entry of entries) {
        const full = path.join(dir, entry.name);
        if (entry.isDirectory()) {
          await walk(full);
          continue;
        }
        const relative = path.relative(this.rootDir, full).split(path.sep).join('/');
        if (!relative.startsWith(prefix)) {
          continue;
        }
        const stat = await fs.stat(full);
        results.push({
          path: relative,
          url: full,
          size: stat.size,
          uploadedAt: stat.mtime,
        });
      }
    };

    await walk(this.rootDir);
    return results.sort((a, b) => a.path.localeCompare(b.path));
  }

  // Vercel Blob implementation
  private blobToken(): string | undefined {
    return Config.BLOB_READ_WRITE_TOKEN || undefined;
  }

  private async putVercelBlob(
    storagePath: string,
    data: Buffer | string,
    contentType: string
  ): Promise<string> {
    const blob = await put(storagePath, data, {
      access: 'public',
      contentType,
      addRandomSuffix: false,
      token: this.blobToken(),
    });

    Logger.debug('Blob created', {
      pathname: blob.pathname,
      url: blob.url,
    });

    return blob.url;
  }

  private async getVercelBlob(storagePath: string): Promise<Buffer> {
    const { blobs } = await list({ prefix: storagePath, limit: 10, token: this.blobToken() });
    const exactMatch = blobs.find(b => b.pathname === storagePath);
    if (!exactMatch) {
      throw new Error(`Blob not found: ${storagePath}`);
    }

    const response = await fetch(exactMatch.url);
    if (!response.ok) {
      throw new Error(`Failed to fetch blob: ${response.statusText}`);
    }

    const arrayBuffer = await response.arrayBuffer();
    return Buffer.from(arrayBuffer);
  }

  private s3Client(): S3Storage {
    if (!this.s3) {
      this.s3 = new S3Storage();
    }
    return this.s3;
  }
}
