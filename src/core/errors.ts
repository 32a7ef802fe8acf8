/**
 * Base class for every error raised by the snapshot engine
 */
export class SnapshotError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SnapshotError";
  }
}

/**
 * Malformed path template. Raised at compile time, never while matching.
 */
export class PatternError extends SnapshotError {
  readonly pattern: string;
  readonly reason: string;

  constructor(pattern: string, reason: string) {
    super(`Invalid path pattern '${pattern}': ${reason}`);
    this.name = "PatternError";
    this.pattern = pattern;
    this.reason = reason;
  }
}

/**
 * A file or directory could not be read during a scan
 */
export class ScanIOError extends SnapshotError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Unable to read '${path}': ${describeCause(cause)}`, { cause });
    this.name = "ScanIOError";
    this.path = path;
  }
}

/**
 * Persistence failure, carrying the attempted operation and statement
 */
export class StoreError extends SnapshotError {
  readonly operation: string;
  readonly sql?: string;

  constructor(operation: string, cause: unknown, sql?: string) {
    const lines = [`Store operation '${operation}' failed: ${describeCause(cause)}`];
    if (sql) {
      lines.push(
        "",
        "The following sql was attempted to be executed:",
        sql.trim()
      );
    }
    super(lines.join("\n"), { cause });
    this.name = "StoreError";
    this.operation = operation;
    this.sql = sql;
  }
}

export class NotFoundError extends SnapshotError {
  readonly importId: string;

  constructor(importId: Buffer) {
    const hex = importId.toString("hex");
    super(`Import not found: ${hex}`);
    this.name = "NotFoundError";
    this.importId = hex;
  }
}

/**
 * The import is already the latest of its lineage, so there is nothing to
 * diff it against
 */
export class NoNewerVersionError extends SnapshotError {
  readonly importId: string;

  constructor(importId: Buffer) {
    const hex = importId.toString("hex");
    super(`Import ${hex} is the latest version of its lineage; nothing to compare`);
    this.name = "NoNewerVersionError";
    this.importId = hex;
  }
}

export class TagFormatError extends SnapshotError {
  readonly entry: string;

  constructor(entry: string, reason = "expected key:value") {
    super(`Bad tag format '${entry}': ${reason}`);
    this.name = "TagFormatError";
    this.entry = entry;
  }
}

export class ConfigError extends SnapshotError {
  readonly errors: string[];

  constructor(errors: string[], source?: string) {
    const header = source
      ? `Invalid configuration in ${source}`
      : "Invalid configuration";
    super([header, ...errors.map((e) => `  - ${e}`)].join("\n"));
    this.name = "ConfigError";
    this.errors = errors;
  }
}

/**
 * Classification reached a branch a correct correspondence never produces
 */
export class ReconciliationError extends SnapshotError {
  constructor(message: string) {
    super(message);
    this.name = "ReconciliationError";
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
