import * as crypto from "crypto";
import { createReadStream } from "fs";
import { Digest } from "../types";

/**
 * 128-bit content fingerprint
 */
export const DIGEST_ALGORITHM = "md5";
export const DIGEST_LENGTH = 16;

/**
 * Read size per chunk; large enough that a gigabyte takes about a thousand
 * reads
 */
export const DIGEST_CHUNK_SIZE = 1024 * 1024;

/**
 * Sentinel stored for files scanned without digesting
 */
export const EMPTY_DIGEST: Digest = Buffer.alloc(0);

/**
 * Stream a file through the hash in bounded chunks
 */
export async function digestFile(
  filePath: string,
  chunkSize: number = DIGEST_CHUNK_SIZE
): Promise<Digest> {
  const hash = crypto.createHash(DIGEST_ALGORITHM);
  const stream = createReadStream(filePath, { highWaterMark: chunkSize });
  for await (const chunk of stream) {
    hash.update(chunk);
  }
  return hash.digest();
}

/**
 * Hash in-memory content the same way digestFile hashes a file
 */
export function digestContent(content: string | Uint8Array): Digest {
  return crypto.createHash(DIGEST_ALGORITHM).update(content).digest();
}

export function isEmptyDigest(digest: Digest): boolean {
  return digest.length === 0;
}
