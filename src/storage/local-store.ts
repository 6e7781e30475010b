import { promises as fs } from 'fs';
import { dirname, resolve, sep } from 'path';
import { ObjectNotFoundError } from '../errors.js';
import type { ObjectStore } from './object-store.js';

const isMissingFile = (err: unknown) =>
  err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'EISDIR');

/** Buckets are directories under `root`; keys are relative paths inside them. */
export class LocalObjectStore implements ObjectStore {
  private readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  private pathFor(bucket: string, key: string): string {
    const bucketDir = resolve(this.root, bucket);
    const path = resolve(bucketDir, key);
    if (!bucketDir.startsWith(this.root + sep) || !path.startsWith(bucketDir + sep)) {
      throw new Error(`Object path escapes the storage root: ${bucket}/${key}`);
    }
    return path;
  }

  async fetch(bucket: string, key: string): Promise<Buffer> {
    const path = this.pathFor(bucket, key);
    try {
      return await fs.readFile(path);
    } catch (err) {
      if (isMissingFile(err)) throw new ObjectNotFoundError(bucket, key);
      throw err;
    }
  }

  async put(bucket: string, key: string, body: Buffer): Promise<string> {
    const path = this.pathFor(bucket, key);
    await fs.mkdir(dirname(path), { recursive: true });
    await fs.writeFile(path, body);
    return `file://${path}`;
  }
}
