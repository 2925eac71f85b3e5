import type { UploadConfirmation } from "../core/archive.js";
import type { StorageKey } from "../core/ids.js";

export const DEFAULT_PRESIGN_TTL_SECONDS = 3600;

export interface ArtifactStore {
  upload(key: StorageKey, bytes: Uint8Array, contentType: string): Promise<UploadConfirmation>;
  /** Short-lived retrieval URL; the only read path the store exposes. */
  presignedUrl(key: StorageKey, ttlSeconds?: number): Promise<string>;
}

export class ObjectNotFoundError extends Error {
  constructor(readonly key: string) {
    super(`object not found: ${key}`);
    this.name = "ObjectNotFoundError";
  }
}
