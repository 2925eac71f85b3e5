import { createHash } from "crypto";
import { GetObjectCommand, HeadObjectCommand, PutObjectCommand, S3Client, S3ServiceException } from "@aws-sdk/client-s3";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";
import type { UploadConfirmation } from "../core/archive.js";
import type { StorageKey } from "../core/ids.js";
import { DEFAULT_PRESIGN_TTL_SECONDS, ObjectNotFoundError, type ArtifactStore } from "./artifactStore.js";

export interface S3ObjectStoreOptions {
  bucket: string;
  endpoint: string;
  region: string;
  accessKeyId: string;
  secretAccessKey: string;
  forcePathStyle?: boolean;
}

export function createS3Client(opts: S3ObjectStoreOptions): S3Client {
  if (!opts.accessKeyId || !opts.secretAccessKey) {
    throw new Error("object store credentials cannot be empty");
  }
  return new S3Client({
    endpoint: opts.endpoint,
    region: opts.region,
    forcePathStyle: opts.forcePathStyle ?? false,
    credentials: { accessKeyId: opts.accessKeyId, secretAccessKey: opts.secretAccessKey }
  });
}

function isMissingObject(err: unknown): boolean {
  if (!(err instanceof S3ServiceException)) return false;
  return err.name === "NotFound" || err.name === "NoSuchKey" || err.$metadata.httpStatusCode === 404;
}

/** S3-compatible object store (AWS, DigitalOcean Spaces, MinIO). */
export class S3ObjectStore implements ArtifactStore {
  constructor(
    private readonly client: S3Client,
    private readonly bucket: string
  ) {}

  static fromOptions(opts: S3ObjectStoreOptions): S3ObjectStore {
    return new S3ObjectStore(createS3Client(opts), opts.bucket);
  }

  async upload(key: StorageKey, bytes: Uint8Array, contentType: string): Promise<UploadConfirmation> {
    const checksum = createHash("sha256").update(bytes).digest();
    const output = await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: bytes,
        ContentType: contentType,
        ContentLength: bytes.byteLength
      })
    );
    return {
      key,
      sizeBytes: BigInt(bytes.byteLength),
      checksumSha256: `sha256:${checksum.toString("hex")}`,
      etag: output.ETag ? output.ETag.replace(/"/g, "") : null
    };
  }

  async presignedUrl(key: StorageKey, ttlSeconds: number = DEFAULT_PRESIGN_TTL_SECONDS): Promise<string> {
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: key }));
    } catch (err) {
      if (isMissingObject(err)) throw new ObjectNotFoundError(key);
      throw err;
    }
    return getSignedUrl(this.client, new GetObjectCommand({ Bucket: this.bucket, Key: key }), { expiresIn: ttlSeconds });
  }
}
