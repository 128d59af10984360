import { GetObjectCommand, HeadObjectCommand, PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import path from 'path';
import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { nanoid } from 'nanoid';
import { notFound } from './errors.js';
import { sha256Bytes } from './utils.js';

export type StorageBackend = 'local' | 's3' | 'memory';

/**
 * Content-addressed storage for submitted solution archives. Handles are the sha256 hex
 * of the bytes, so writing the same archive twice yields the same handle.
 */
export interface BlobStore {
  put(bytes: Uint8Array): Promise<string>;
  /** Fails with not_found when nothing is stored under `handle`. */
  get(handle: string): Promise<Uint8Array>;
}

const HANDLE_RE = /^[a-f0-9]{64}$/;

function assertHandle(handle: string) {
  if (!HANDLE_RE.test(handle)) throw notFound('blob_not_found');
}

export function maxUploadBytes(): number {
  const raw = Number(process.env.MAX_UPLOAD_BYTES ?? 15 * 1024 * 1024);
  return Number.isFinite(raw) && raw > 0 ? Math.floor(raw) : 15 * 1024 * 1024;
}

export class MemoryBlobStore implements BlobStore {
  private readonly blobs = new Map<string, Uint8Array>();

  async put(bytes: Uint8Array): Promise<string> {
    const handle = sha256Bytes(bytes);
    this.blobs.set(handle, Uint8Array.from(bytes));
    return handle;
  }

  async get(handle: string): Promise<Uint8Array> {
    const bytes = this.blobs.get(handle);
    if (!bytes) throw notFound('blob_not_found');
    return Uint8Array.from(bytes);
  }

  get size() {
    return this.blobs.size;
  }
}

export class LocalBlobStore implements BlobStore {
  readonly rootDir: string;

  constructor(dir = process.env.STORAGE_LOCAL_DIR ?? './var/solutions') {
    this.rootDir = path.resolve(process.cwd(), dir);
  }

  pathForHandle(handle: string) {
    assertHandle(handle);
    // Two-level fan-out keeps directories small.
    const filePath = path.resolve(this.rootDir, handle.slice(0, 2), handle);
    if (!filePath.startsWith(this.rootDir)) throw notFound('blob_not_found');
    return filePath;
  }

  async put(bytes: Uint8Array): Promise<string> {
    const handle = sha256Bytes(bytes);
    const filePath = this.pathForHandle(handle);
    await mkdir(path.dirname(filePath), { recursive: true });
    // Write-then-rename so a crashed write never leaves a partial blob under a valid handle.
    const tmp = `${filePath}.${nanoid(8)}.tmp`;
    try {
      await writeFile(tmp, bytes);
      await rename(tmp, filePath);
    } catch (err) {
      await rm(tmp, { force: true });
      throw err;
    }
    return handle;
  }

  async get(handle: string): Promise<Uint8Array> {
    const filePath = this.pathForHandle(handle);
    try {
      return new Uint8Array(await readFile(filePath));
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') throw notFound('blob_not_found');
      throw err;
    }
  }
}

export interface S3BlobStoreOptions {
  bucket: string;
  prefix?: string;
  client?: S3Client;
}

export class S3BlobStore implements BlobStore {
  private readonly s3: S3Client;
  private readonly bucket: string;
  private readonly prefix: string;

  constructor(opts: S3BlobStoreOptions) {
    this.bucket = opts.bucket;
    this.prefix = (opts.prefix ?? 'solutions/').replace(/^\/+/, '');
    this.s3 = opts.client ?? s3ClientFromEnv();
  }

  private key(handle: string) {
    return `${this.prefix}${handle}`;
  }

  async put(bytes: Uint8Array): Promise<string> {
    const handle = sha256Bytes(bytes);
    const key = this.key(handle);
    try {
      await this.s3.send(new HeadObjectCommand({ Bucket: this.bucket, Key: key }));
      return handle;
    } catch (err) {
      if (!isS3NotFound(err)) throw err;
    }
    await this.s3.send(
      new PutObjectCommand({ Bucket: this.bucket, Key: key, Body: bytes, ContentType: 'application/zip' })
    );
    return handle;
  }

  async get(handle: string): Promise<Uint8Array> {
    assertHandle(handle);
    try {
      const res = await this.s3.send(new GetObjectCommand({ Bucket: this.bucket, Key: this.key(handle) }));
      if (!res.Body) throw notFound('blob_not_found');
      return await res.Body.transformToByteArray();
    } catch (err) {
      if (isS3NotFound(err)) throw notFound('blob_not_found');
      throw err;
    }
  }
}

function isS3NotFound(err: unknown): boolean {
  return err instanceof Error && (err.name === 'NoSuchKey' || err.name === 'NotFound');
}

function s3ClientFromEnv(): S3Client {
  const region = process.env.S3_REGION ?? 'us-east-1';
  const endpoint = process.env.STORAGE_ENDPOINT;
  const accessKeyId = process.env.S3_ACCESS_KEY_ID;
  const secretAccessKey = process.env.S3_SECRET_ACCESS_KEY;

  return new S3Client({
    region,
    endpoint,
    forcePathStyle: !!endpoint, // MinIO/R2-style endpoints
    credentials: accessKeyId && secretAccessKey ? { accessKeyId, secretAccessKey } : undefined,
  });
}

export function storageBackendFromEnv(): StorageBackend {
  const raw = String(process.env.STORAGE_BACKEND ?? 'local').trim().toLowerCase();
  if (raw === 'local' || raw === 's3' || raw === 'memory') return raw;
  throw new Error(`Unsupported STORAGE_BACKEND: ${raw}`);
}

export function createBlobStoreFromEnv(): BlobStore {
  const backend = storageBackendFromEnv();
  if (backend === 'memory') return new MemoryBlobStore();
  if (backend === 'local') return new LocalBlobStore();
  const bucket = process.env.S3_BUCKET;
  if (!bucket) throw new Error('S3_BUCKET is required when STORAGE_BACKEND=s3');
  return new S3BlobStore({ bucket, prefix: process.env.S3_PREFIX });
}
