import { createHash, createHmac, timingSafeEqual } from "crypto";
import { promises as fs } from "fs";
import path from "path";
import { pathToFileURL } from "url";
import type { UploadConfirmation } from "../core/archive.js";
import { isStorageKey, type StorageKey } from "../core/ids.js";
import { DEFAULT_PRESIGN_TTL_SECONDS, ObjectNotFoundError, type ArtifactStore } from "./artifactStore.js";

export class SignedUrlError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SignedUrlError";
  }
}

export interface LocalObjectStoreOptions {
  rootDir: string;
  signingSecret: string;
  /** Prefix of issued URLs; defaults to the root directory as a file:// URL. */
  baseUrl?: string;
  now?: () => number;
}

/** Filesystem object store with HMAC-signed, expiring retrieval URLs. */
export class LocalObjectStore implements ArtifactStore {
  private readonly rootDir: string;
  private readonly baseUrl: string;
  private readonly now: () => number;

  constructor(private readonly opts: LocalObjectStoreOptions) {
    if (!opts.signingSecret) throw new Error("LocalObjectStore requires a signing secret");
    this.rootDir = path.resolve(opts.rootDir);
    this.baseUrl = (opts.baseUrl ?? pathToFileURL(this.rootDir).href).replace(/\/+$/, "");
    this.now = opts.now ?? Date.now;
  }

  async init(): Promise<void> {
    await fs.mkdir(this.rootDir, { recursive: true });
  }

  objectPath(key: StorageKey): string {
    return path.join(this.rootDir, key);
  }

  async upload(key: StorageKey, bytes: Uint8Array, _contentType: string): Promise<UploadConfirmation> {
    const objectPath = this.objectPath(key);
    await fs.mkdir(path.dirname(objectPath), { recursive: true });

    // Written beside the target, then hard-linked into place: readers never see a
    // partial object and an existing object is never replaced (link fails with EEXIST).
    const partialPath = `${objectPath}.partial`;
    await fs.writeFile(partialPath, bytes, { flag: "wx" });
    try {
      await fs.link(partialPath, objectPath);
    } finally {
      await fs.rm(partialPath, { force: true });
    }

    return {
      key,
      sizeBytes: BigInt(bytes.byteLength),
      checksumSha256: `sha256:${createHash("sha256").update(bytes).digest("hex")}`,
      etag: null
    };
  }

  async presignedUrl(key: StorageKey, ttlSeconds: number = DEFAULT_PRESIGN_TTL_SECONDS): Promise<string> {
    try {
      await fs.access(this.objectPath(key));
    } catch {
      throw new ObjectNotFoundError(key);
    }
    const expires = Math.floor(this.now() / 1000) + ttlSeconds;
    const query = new URLSearchParams({ expires: String(expires), signature: this.sign(key, expires) });
    return `${this.baseUrl}/${key}?${query.toString()}`;
  }

  /** Check a URL issued by `presignedUrl` and return the key it grants. */
  verifySignedUrl(url: string): StorageKey {
    const prefix = `${this.baseUrl}/`;
    if (!url.startsWith(prefix)) throw new SignedUrlError("url was not issued by this store");

    const [key = "", query = ""] = url.slice(prefix.length).split("?", 2);
    if (!isStorageKey(key)) throw new SignedUrlError("url does not name a storage key");

    const params = new URLSearchParams(query);
    const expires = Number.parseInt(params.get("expires") ?? "", 10);
    const signature = params.get("signature") ?? "";
    if (!Number.isInteger(expires)) throw new SignedUrlError("url has no expiry");

    const expected = Buffer.from(this.sign(key, expires), "hex");
    const given = Buffer.from(signature, "hex");
    if (given.length !== expected.length || !timingSafeEqual(given, expected)) {
      throw new SignedUrlError("signature mismatch");
    }
    if (expires * 1000 <= this.now()) throw new SignedUrlError("url expired");
    return key;
  }

  private sign(key: string, expires: number): string {
    return createHmac("sha256", this.opts.signingSecret).update(`${key}\n${expires}`).digest("hex");
  }
}
