import { GoogleAuth } from 'google-auth-library';
import { ObjectNotFoundError } from '../errors.js';
import { logger } from '../logger.js';
import type { ObjectStore } from './object-store.js';

const STORAGE_SCOPE = 'https://www.googleapis.com/auth/devstorage.read_write';

export type AccessTokenProvider = () => Promise<string>;

/** Access tokens from application default credentials. */
export const googleAccessTokenProvider = (scopes: string | string[] = STORAGE_SCOPE): AccessTokenProvider => {
  const auth = new GoogleAuth({ scopes });
  return async () => {
    const token = await auth.getAccessToken();
    if (!token) {
      throw new Error('Unable to acquire Google Cloud access token');
    }
    return token;
  };
};

const objectUrl = (bucket: string, key: string) =>
  `https://storage.googleapis.com/storage/v1/b/${encodeURIComponent(bucket)}/o/${encodeURIComponent(key)}`;

export class GcsObjectStore implements ObjectStore {
  constructor(private readonly getToken: AccessTokenProvider = googleAccessTokenProvider()) {}

  async fetch(bucket: string, key: string): Promise<Buffer> {
    const token = await this.getToken();
    const response = await fetch(`${objectUrl(bucket, key)}?alt=media`, {
      headers: { Authorization: `Bearer ${token}` },
    });

    if (response.status === 404) {
      throw new ObjectNotFoundError(bucket, key);
    }
    if (!response.ok) {
      const text = await response.text();
      throw new Error(`Failed to download from GCS: ${response.status} ${text}`);
    }
    return Buffer.from(await response.arrayBuffer());
  }

  async put(bucket: string, key: string, body: Buffer, contentType: string): Promise<string> {
    const token = await this.getToken();
    const url =
      `https://storage.googleapis.com/upload/storage/v1/b/${encodeURIComponent(bucket)}/o` +
      `?uploadType=media&name=${encodeURIComponent(key)}`;

    const response = await fetch(url, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${token}`,
        'Content-Type': contentType || 'application/octet-stream',
        'Content-Length': body.byteLength.toString(),
      },
      body: new Uint8Array(body),
    });

    if (!response.ok) {
      const text = await response.text();
      throw new Error(`Failed to upload to GCS: ${response.status} ${text}`);
    }

    const uri = `gs://${bucket}/${key}`;
    logger.debug({ uri, bytes: body.byteLength }, 'Uploaded object to GCS');
    return uri;
  }
}
