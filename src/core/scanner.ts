import * as fs from "fs/promises";
import { FileRecord, Tags } from "../types";
import {
  assertReadableDirectory,
  createExcluder,
  splitPath,
  walkFiles,
  WalkEntry,
  WalkOptions,
} from "../utils/fs";
import { digestFile, EMPTY_DIGEST } from "../utils/digest";
import { Logger, silentLogger } from "../utils/logger";
import { PathTemplate } from "./path-template";
import { ArchivedPredicate, LabelCalculator } from "./policy";
import { ScanIOError } from "./errors";

/**
 * Named, ordered groups of path patterns. Earlier categories win.
 */
export type PatternGroups = Record<string, string[]>;

export interface ScanOptions {
  patternGroups?: PatternGroups;
  digest?: boolean;
  isArchived?: ArchivedPredicate;
  fileGroupOf?: LabelCalculator;
  fileTypeOf?: LabelCalculator;
  excludePatterns?: string[];
  /**
   * Record files no pattern matches (with empty metadata). Defaults to true.
   */
  includeUnmatched?: boolean;
  logger?: Logger;
  onError?: (error: ScanIOError) => void;
}

/**
 * A scanned file together with the category whose pattern matched it
 * (null when unmatched)
 */
export interface ScannedFile {
  category: string | null;
  record: FileRecord;
}

interface Classification {
  category: string;
  metadata: Tags;
}

interface CompiledGroup {
  category: string;
  templates: PathTemplate[];
}

const WALK_ALL = "**";

/**
 * Walks a root directory and turns every regular file into a FileRecord.
 *
 * Per-file read failures are logged, collected in `errors` and skipped; an
 * unreadable root directory aborts the walk with ScanIOError. Every method
 * performs a fresh walk.
 */
export class Scanner {
  readonly rootDir: string;
  readonly errors: ScanIOError[] = [];
  private readonly groups: CompiledGroup[];
  private readonly digestEnabled: boolean;
  private readonly includeUnmatched: boolean;
  private readonly isArchived?: ArchivedPredicate;
  private readonly fileGroupOf?: LabelCalculator;
  private readonly fileTypeOf?: LabelCalculator;
  private readonly walkOptions: WalkOptions;
  private readonly logger: Logger;
  private readonly onError?: (error: ScanIOError) => void;

  constructor(rootDir: string, options: ScanOptions = {}) {
    this.rootDir = rootDir;
    this.groups = Object.entries(options.patternGroups ?? {}).map(
      ([category, patterns]) => ({
        category,
        templates: patterns.map((pattern) => PathTemplate.compile(pattern)),
      })
    );
    this.digestEnabled = options.digest ?? true;
    this.includeUnmatched = options.includeUnmatched ?? true;
    this.isArchived = options.isArchived;
    this.fileGroupOf = options.fileGroupOf;
    this.fileTypeOf = options.fileTypeOf;
    this.logger = options.logger ?? silentLogger;
    this.onError = options.onError;
    this.walkOptions = {
      excluder: createExcluder(options.excludePatterns ?? []),
      onSkipped: (filePath, reason) =>
        this.logger.debug(`Skipped ${reason}: ${filePath}`),
      onUnreadableDirectory: (dirPath, error) =>
        this.report(new ScanIOError(dirPath, error)),
    };
  }

  /**
   * Category names in match order
   */
  get categories(): string[] {
    return this.groups.map((group) => group.category);
  }

  /**
   * First category whose pattern accepts the path, with its captures
   */
  classify(relativePath: string): Classification | null {
    for (const group of this.groups) {
      for (const template of group.templates) {
        const metadata = template.match(relativePath);
        if (metadata !== null) {
          return { category: group.category, metadata };
        }
      }
    }
    return null;
  }

  /**
   * Walk the whole tree once, classifying every file
   */
  async *scan(): AsyncGenerator<ScannedFile> {
    await this.assertRoot();
    const entries = walkFiles(this.rootDir, WALK_ALL, this.walkOptions);
    for await (const entry of entries) {
      const match = this.classify(entry.relativePath);
      if (match === null && !this.includeUnmatched) {
        continue;
      }
      const record = await this.buildRecord(entry, match);
      if (record !== null) {
        yield { category: match?.category ?? null, record };
      }
    }
  }

  /**
   * Walk the whole tree, keeping the files for which this category is the
   * first match. Uses the same traversal as scan(), so links are treated
   * alike and unreadable directories are reported in every mode.
   */
  async *scanCategory(category: string): AsyncGenerator<FileRecord> {
    if (!this.groups.some((g) => g.category === category)) {
      throw new Error(`Unknown match path category: ${category}`);
    }

    await this.assertRoot();
    const entries = walkFiles(this.rootDir, WALK_ALL, this.walkOptions);
    for await (const entry of entries) {
      const match = this.classify(entry.relativePath);
      if (match === null || match.category !== category) continue;

      const record = await this.buildRecord(entry, match);
      if (record !== null) {
        yield record;
      }
    }
  }

  /**
   * Walk the whole tree, keeping only files no category matches
   */
  async *scanUnmatched(): AsyncGenerator<FileRecord> {
    await this.assertRoot();
    const entries = walkFiles(this.rootDir, WALK_ALL, this.walkOptions);
    for await (const entry of entries) {
      if (this.classify(entry.relativePath) !== null) continue;
      const record = await this.buildRecord(entry, null);
      if (record !== null) {
        yield record;
      }
    }
  }

  private async assertRoot(): Promise<void> {
    try {
      await assertReadableDirectory(this.rootDir);
    } catch (error) {
      throw new ScanIOError(this.rootDir, error);
    }
  }

  private async buildRecord(
    entry: WalkEntry,
    match: Classification | null
  ): Promise<FileRecord | null> {
    this.logger.debug(`Fetched: ${entry.relativePath}`);
    try {
      const stats = await fs.stat(entry.fullPath);
      let digest = EMPTY_DIGEST;
      if (this.digestEnabled) {
        this.logger.debug(`Digest started: ${entry.relativePath}`);
        digest = await digestFile(entry.fullPath);
        this.logger.debug(`Digest ended: ${entry.relativePath}`);
      }

      const { dirName, baseName } = splitPath(entry.relativePath);
      const metadata = match?.metadata ?? {};
      const createdMs = stats.birthtimeMs > 0 ? stats.birthtimeMs : stats.ctimeMs;

      return {
        digest,
        dirName,
        baseName,
        created: createdMs / 1000,
        modified: stats.mtimeMs / 1000,
        size: stats.size,
        archived: match !== null && (this.isArchived?.(metadata) ?? false),
        fileGroup: match !== null ? this.fileGroupOf?.(metadata) : undefined,
        fileType: match !== null ? this.fileTypeOf?.(metadata) : undefined,
        metadata,
      };
    } catch (error) {
      this.report(new ScanIOError(entry.relativePath, error));
      return null;
    }
  }

  private report(error: ScanIOError): void {
    this.logger.warn(error.message);
    this.errors.push(error);
    this.onError?.(error);
  }
}

/**
 * Scan rootDir and yield one record per regular file
 */
export async function* scan(
  rootDir: string,
  options: ScanOptions = {}
): AsyncGenerator<FileRecord> {
  const scanner = new Scanner(rootDir, options);
  for await (const { record } of scanner.scan()) {
    yield record;
  }
}
