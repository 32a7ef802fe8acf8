/**
 * Content fingerprint. A zero-length buffer marks a file that was not digested.
 */
export type Digest = Buffer;

/**
 * Flat string map extracted from a matched path template or attached to an
 * import
 */
export type Tags = Record<string, string>;

/**
 * One file observed during a scan
 */
export interface FileRecord {
  digest: Digest;
  dirName: string; // POSIX path relative to the scanned root, "." at the root
  baseName: string;
  created: number; // seconds, fractional
  modified: number; // seconds, fractional
  size: number;
  archived: boolean;
  fileGroup?: string;
  fileType?: string;
  metadata: Tags;
}

/**
 * Snapshot version (metadata only, records are fetched separately)
 */
export interface FileImport {
  id: Buffer; // 16 bytes
  timestamp: number; // integer seconds
  name: string;
  tags: Tags;
}

/**
 * JSON shape of a file record in diff output
 */
export interface FileRecordJson {
  digest: string;
  dirName: string;
  baseName: string;
  fileName: string;
  created: number;
  modified: number;
  size: number;
  archived: boolean;
  fileGroup: string | null;
  fileType: string | null;
  metadata: Tags;
}
