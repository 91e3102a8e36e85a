// src/hash.ts
import { open, type FileHandle } from "node:fs/promises";
import { createHash, getHashes } from "node:crypto";
import { DEFAULT_CHUNK_SIZE } from "./constants.js";
import { ConfigError, describeError } from "./errors.js";
import type {
  ChecksumFunction,
  ChecksumOutcome,
  FileDescriptor,
} from "./types.js";

const ENCODING = "hex";

// Curated set we’re willing to expose
export const CURATED_HASH_ALGOS = [
  "sha1",
  "sha256",
  "sha512",
  "blake2b512",
  "blake2s256",
  "sha3-256",
  "sha3-512",
] as const;

export type HashAlg = (typeof CURATED_HASH_ALGOS)[number];

export function defaultHashAlg(): HashAlg {
  return "sha1";
}

let supportedHashes: HashAlg[] | null = null;
export function listSupportedHashes(): HashAlg[] {
  if (supportedHashes == null) {
    const avail = new Set(getHashes().map((s) => s.toLowerCase()));
    supportedHashes = CURATED_HASH_ALGOS.filter((a) => avail.has(a));
  }
  return supportedHashes;
}

/**
 * Normalize/validate requested algorithm against runtime support.
 * Accepts short shorthands "blake2b" -> blake2b512, "blake2s" -> blake2s256.
 */
export function normalizeHashAlg(requested?: string): HashAlg {
  const list = listSupportedHashes();
  if (!requested) return defaultHashAlg();
  const low = requested.toLowerCase();
  const exact = list.find((h) => h === low);
  if (exact) return exact;

  if (low === "blake2b") {
    const b = list.find((h) => h === "blake2b512");
    if (b) return b;
  }
  if (low === "blake2s") {
    const s = list.find((h) => h === "blake2s256");
    if (s) return s;
  }

  throw new ConfigError(
    `Unknown/unsupported hash algorithm "${requested}". Try one of:\n  ${list.join(", ")}`,
  );
}

// One-pass digest of an in-memory buffer.
export function digestBuffer(alg: string, data: Buffer | string): string {
  return createHash(alg).update(data).digest(ENCODING);
}

export interface ChunkedChecksumOptions {
  algorithm?: HashAlg;
  chunkSize?: number;
}

/**
 * Checksum a file by reading `ceil(size / chunkSize)` chunks, each of
 * `min(chunkSize, remaining)` bytes, into an incremental hash. Never reads
 * past the size captured at walk time. Failures come back as
 * `{ ok: false }` instead of throwing.
 */
export function createChunkedChecksum({
  algorithm = defaultHashAlg(),
  chunkSize = DEFAULT_CHUNK_SIZE,
}: ChunkedChecksumOptions = {}): ChecksumFunction {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ConfigError(`chunk size must be a positive integer, got ${chunkSize}`);
  }
  return (file) => chunkedDigest(algorithm, chunkSize, file);
}

async function chunkedDigest(
  alg: string,
  chunkSize: number,
  file: FileDescriptor,
): Promise<ChecksumOutcome> {
  let handle: FileHandle;
  try {
    handle = await open(file.path, "r");
  } catch (err) {
    return { ok: false, reason: describeError(err) };
  }
  try {
    const hash = createHash(alg);
    const blocks = Math.ceil(file.size / chunkSize);
    const buf = Buffer.allocUnsafe(Math.min(chunkSize, file.size));
    for (let i = 0; i < blocks; i++) {
      const offset = i * chunkSize;
      const length = Math.min(chunkSize, file.size - offset);
      const got = await readFully(handle, buf, length, offset);
      if (got < length) {
        return {
          ok: false,
          reason: `file ended at ${offset + got} bytes, expected ${file.size}`,
        };
      }
      hash.update(buf.subarray(0, length));
    }
    return { ok: true, digest: hash.digest(ENCODING) };
  } catch (err) {
    return { ok: false, reason: describeError(err) };
  } finally {
    await handle.close();
  }
}

// pread may return short counts; keep going until `length` bytes or EOF.
async function readFully(
  handle: FileHandle,
  buf: Buffer,
  length: number,
  position: number,
): Promise<number> {
  let filled = 0;
  while (filled < length) {
    const { bytesRead } = await handle.read(
      buf,
      filled,
      length - filled,
      position + filled,
    );
    if (bytesRead === 0) break;
    filled += bytesRead;
  }
  return filled;
}
