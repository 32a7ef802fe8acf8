import { DiffResult, FileRecord, SnapshotConfig } from "../types";
import { runTaskGroup, Task } from "../utils/concurrency";
import { Logger, silentLogger } from "../utils/logger";
import {
  NoNewerVersionError,
  NotFoundError,
  ScanIOError,
  SnapshotError,
} from "./errors";
import { archivedPredicate, labelCalculator } from "./policy";
import { ReconciliationEngine } from "./reconcile";
import { Scanner, ScanOptions } from "./scanner";
import { StoreFactory, VersionStore } from "./store";

/**
 * Label for files no category matches, in counts and logs
 */
export const UNMATCHED_LABEL = "(unmatched)";

export interface StoreSnapshotOptions {
  openStore: StoreFactory;
  logger?: Logger;
  /**
   * Called with each category (or UNMATCHED_LABEL) once its batch is stored
   */
  onBatch?: (label: string, count: number) => void;
}

export interface StoreSnapshotResult {
  importId: Buffer;
  /**
   * Files stored per category, UNMATCHED_LABEL included when recorded
   */
  counts: Record<string, number>;
  errors: ScanIOError[];
}

export interface DiffSnapshotOptions {
  compareDigests: boolean;
  logger?: Logger;
}

/**
 * Scanner settings for a resolved spec
 */
export function scanOptionsFor(
  config: SnapshotConfig,
  logger: Logger = silentLogger
): ScanOptions {
  return {
    patternGroups: config.matchPaths,
    digest: config.digest,
    isArchived: archivedPredicate(config.archivedBy),
    fileGroupOf: labelCalculator(config.fileGroupBy),
    fileTypeOf: labelCalculator(config.fileTypeBy),
    excludePatterns: config.excludePatterns,
    includeUnmatched: config.includeUnmatched,
    logger,
  };
}

async function collect(records: AsyncIterable<FileRecord>): Promise<FileRecord[]> {
  const collected: FileRecord[] = [];
  for await (const record of records) {
    collected.push(record);
  }
  return collected;
}

/**
 * Open a store handle for the duration of fn
 */
async function withStore<T>(
  openStore: StoreFactory,
  fn: (store: VersionStore) => Promise<T>
): Promise<T> {
  const store = openStore();
  try {
    return await fn(store);
  } finally {
    await store.close();
  }
}

/**
 * Scan the spec's root and persist it as a new import named after the spec.
 *
 * In multithread mode every category (and the unmatched files) is scanned
 * and stored by its own task on its own store handle; otherwise one walk
 * classifies everything and the batches are stored in category order. Both
 * modes store the same records.
 */
export async function storeSnapshot(
  config: SnapshotConfig,
  options: StoreSnapshotOptions
): Promise<StoreSnapshotResult> {
  const logger = options.logger ?? silentLogger;
  const { openStore } = options;

  const importId = await withStore(openStore, (store) =>
    store.createImport(config.name, config.metadata)
  );
  const hexId = importId.toString("hex");
  logger.info(`Storing ${config.rootDir} as ${config.name} (${hexId})`);

  const scanOptions = scanOptionsFor(config, logger.child("scan"));
  const categories = Object.keys(config.matchPaths);
  const counts: Record<string, number> = {};
  const errors: ScanIOError[] = [];
  // every task walks the whole tree, so each may report the same entry
  const collectErrors = (found: ScanIOError[]) => {
    for (const error of found) {
      if (!errors.some((known) => known.path === error.path)) {
        errors.push(error);
      }
    }
  };

  const storeBatch = async (
    store: VersionStore,
    label: string,
    records: FileRecord[]
  ): Promise<number> => {
    const count = await store.importFiles(importId, records);
    counts[label] = count;
    logger.debug(`Stored ${count} files for ${label}`);
    options.onBatch?.(label, count);
    return count;
  };

  if (config.multithread) {
    const task = (
      label: string,
      scan: (scanner: Scanner) => AsyncIterable<FileRecord>
    ): Task<number> => ({
      name: label,
      run: async () => {
        const scanner = new Scanner(config.rootDir, scanOptions);
        try {
          const records = await collect(scan(scanner));
          return await withStore(openStore, (store) =>
            storeBatch(store, label, records)
          );
        } finally {
          collectErrors(scanner.errors);
        }
      },
    });

    const tasks = categories.map((category) =>
      task(category, (scanner) => scanner.scanCategory(category))
    );
    if (config.includeUnmatched) {
      tasks.push(task(UNMATCHED_LABEL, (scanner) => scanner.scanUnmatched()));
    }
    await runTaskGroup(tasks, { concurrent: true });
  } else {
    const scanner = new Scanner(config.rootDir, scanOptions);
    const batches = new Map<string, FileRecord[]>(
      categories.map((category) => [category, []])
    );
    const unmatched: FileRecord[] = [];
    try {
      for await (const { category, record } of scanner.scan()) {
        const batch = category === null ? unmatched : batches.get(category);
        batch?.push(record);
      }
    } finally {
      collectErrors(scanner.errors);
    }

    await withStore(openStore, async (store) => {
      for (const [category, records] of batches) {
        await storeBatch(store, category, records);
      }
      if (config.includeUnmatched) {
        await storeBatch(store, UNMATCHED_LABEL, unmatched);
      }
    });
  }

  if (errors.length > 0) {
    logger.warn(`${errors.length} entries could not be read and were skipped`);
  }
  return { importId, counts, errors };
}

/**
 * Reconcile an import against the latest import of its lineage
 */
export async function diffSnapshot(
  store: VersionStore,
  importId: Buffer,
  options: DiffSnapshotOptions
): Promise<DiffResult> {
  const logger = options.logger ?? silentLogger;

  const fileImport = await store.fetchImport(importId);
  const latestId = await store.fetchLatestImportId(fileImport.name);
  if (latestId === null) {
    throw new NotFoundError(importId);
  }
  if (latestId.equals(importId)) {
    throw new NoNewerVersionError(importId);
  }

  const states = await store.fetchCorrespondence(
    importId,
    latestId,
    options.compareDigests
  );
  const engine = new ReconciliationEngine(
    { compareDigests: options.compareDigests },
    logger
  );
  const actions = engine.diffAll(states);
  logger.info(
    `Compared ${states.length} states between ${importId.toString("hex")} ` +
      `and ${latestId.toString("hex")}: ${actions.length} actions`
  );

  return { originalId: importId, newId: latestId, compared: states.length, actions };
}

const IMPORT_ID_PATTERN = /^[0-9a-f]{32}$/i;

/**
 * Parse a 32-digit hex import id as printed by the store command
 */
export function parseImportId(hex: string): Buffer {
  const trimmed = hex.trim().replace(/-/g, "");
  if (!IMPORT_ID_PATTERN.test(trimmed)) {
    throw new SnapshotError(`Invalid import id '${hex}': expected 32 hex digits`);
  }
  return Buffer.from(trimmed, "hex");
}
