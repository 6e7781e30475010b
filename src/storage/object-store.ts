export interface ObjectStore {
  /** Throws ObjectNotFoundError when the key does not exist. */
  fetch(bucket: string, key: string): Promise<Buffer>;
  /** Returns a URI for the written object. */
  put(bucket: string, key: string, body: Buffer, contentType: string): Promise<string>;
}
