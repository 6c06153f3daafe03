import type { StorageProvider } from "../config";

export interface ObjectStore {
  readonly provider: StorageProvider | "memory";
  /** Uploads the body under `key` and returns its public URL. */
  put(key: string, body: Buffer, contentType: string): Promise<string>;
  remove(key: string): Promise<void>;
}

export class ObjectStoreError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "ObjectStoreError";
  }
}
