import {
  Action,
  ActionType,
  CompareState,
  CompareStateType,
  FileRecord,
  MatchedState,
} from "../types";
import { joinPath } from "../utils/fs";
import { Logger, silentLogger } from "../utils/logger";
import { ReconciliationError } from "./errors";

export interface ReconcileOptions {
  /**
   * Identify content by digest. Otherwise by (size, modified).
   */
  compareDigests: boolean;
}

/**
 * Path identity
 */
export function pathKey(record: FileRecord): string {
  return `${record.dirName}\u0000${record.baseName}`;
}

/**
 * Content identity. Under compareDigests, an undigested record has none and
 * can only be matched by path.
 */
export function contentKey(
  record: FileRecord,
  options: ReconcileOptions
): string | undefined {
  if (options.compareDigests) {
    return record.digest.length === 0
      ? undefined
      : `digest:${record.digest.toString("hex")}`;
  }
  return `stat:${record.size}:${record.modified}`;
}

/**
 * Content equality for two records. Two undigested records at the same path
 * count as equal; an undigested record never equals a digested one.
 */
export function sameContent(
  a: FileRecord,
  b: FileRecord,
  options: ReconcileOptions
): boolean {
  if (options.compareDigests) {
    if (a.digest.length === 0 || b.digest.length === 0) {
      return a.digest.length === 0 && b.digest.length === 0;
    }
    return a.digest.equals(b.digest);
  }
  return a.size === b.size && a.modified === b.modified;
}

export function samePath(a: FileRecord, b: FileRecord): boolean {
  return a.dirName === b.dirName && a.baseName === b.baseName;
}

function comparePaths(a: FileRecord, b: FileRecord): number {
  const left = joinPath(a.dirName, a.baseName);
  const right = joinPath(b.dirName, b.baseName);
  return left < right ? -1 : left > right ? 1 : 0;
}

function stateOrderKey(state: CompareState): [FileRecord, FileRecord | null] {
  switch (state.type) {
    case CompareStateType.PREV_ONLY:
      return [state.original, null];
    case CompareStateType.NEXT_ONLY:
      return [state.new, null];
    case CompareStateType.MATCHED:
      return [state.original, state.new];
  }
}

function compareStates(a: CompareState, b: CompareState): number {
  const [a1, a2] = stateOrderKey(a);
  const [b1, b2] = stateOrderKey(b);
  const primary = comparePaths(a1, b1);
  if (primary !== 0 || a2 === null || b2 === null) {
    return primary;
  }
  return comparePaths(a2, b2);
}

/**
 * Relocation preference, best first: keep the file name, keep the
 * directory, anything
 */
const RELOCATION_RANKS: ReadonlyArray<(record: FileRecord) => string> = [
  (record) => record.baseName,
  (record) => record.dirName,
  () => "",
];

/**
 * Path-ordered records of one bucket, consumed front to back
 */
interface Cursor {
  records: FileRecord[];
  next: number;
}

function indexByPath(
  records: FileRecord[],
  side: string
): Map<string, FileRecord> {
  const index = new Map<string, FileRecord>();
  for (const record of records) {
    const key = pathKey(record);
    if (index.has(key)) {
      throw new ReconciliationError(
        `Duplicate path in ${side} import: ${joinPath(record.dirName, record.baseName)}`
      );
    }
    index.set(key, record);
  }
  return index;
}

function groupByContent(
  records: FileRecord[],
  options: ReconcileOptions
): Map<string, FileRecord[]> {
  const groups = new Map<string, FileRecord[]>();
  for (const record of records) {
    const key = contentKey(record, options);
    if (key === undefined) continue;
    const group = groups.get(key);
    if (group) {
      group.push(record);
    } else {
      groups.set(key, [record]);
    }
  }
  return groups;
}

function matched(
  original: FileRecord,
  next: FileRecord,
  isCopy: boolean
): MatchedState {
  return { type: CompareStateType.MATCHED, original, new: next, isCopy };
}

/**
 * Join two record sets into correspondence states.
 *
 * 1. Same path and same content: unchanged pair.
 * 2. Same content, different path, and no unchanged record with that
 *    content: previous records whose path is vacant in `next` (absent, or
 *    taken by another relocation) pair one-to-one with next-side records as
 *    relocations, best rank first, repeated until no pair is added.
 *    Remaining same-content next-side records are copies, unless an
 *    unclaimed previous record sits at their path.
 * 3. Same path, different content, neither side claimed yet: modified pair.
 * 4. Whatever is left is next-only (created) or previous-only (removed).
 *
 * Every next-side record lands in exactly one state, and every previous-side
 * record is the original of exactly one non-copy state.
 */
export function correspond(
  prev: FileRecord[],
  next: FileRecord[],
  options: ReconcileOptions
): CompareState[] {
  const prevByPath = indexByPath(prev, "previous");
  const nextByPath = indexByPath(next, "next");
  const sortedPrev = [...prev].sort(comparePaths);
  const sortedNext = [...next].sort(comparePaths);

  const states: CompareState[] = [];
  const claimedPrev = new Set<FileRecord>();
  const claimedNext = new Set<FileRecord>();
  const claim = (original: FileRecord, target: FileRecord, isCopy: boolean) => {
    states.push(matched(original, target, isCopy));
    claimedNext.add(target);
    if (!isCopy) claimedPrev.add(original);
  };

  // 1. unchanged
  const survivors = new Map<string, FileRecord>();
  for (const target of sortedNext) {
    const original = prevByPath.get(pathKey(target));
    if (original && sameContent(original, target, options)) {
      claim(original, target, false);
      const key = contentKey(original, options);
      if (key !== undefined && !survivors.has(key)) {
        survivors.set(key, original);
      }
    }
  }

  // 2. content correspondence: relocations until nothing changes, then copies
  const prevByContent = groupByContent(sortedPrev, options);
  const nextByContent = groupByContent(
    sortedNext.filter((record) => !claimedNext.has(record)),
    options
  );
  const isRelocatable = (source: FileRecord) => {
    if (claimedPrev.has(source)) return false;
    const occupant = nextByPath.get(pathKey(source));
    return occupant === undefined || claimedNext.has(occupant);
  };

  // Greedy over (rank, source path, target path): per rank, each source in
  // path order takes the first open target sharing its bucket key
  const relocate = (sources: FileRecord[], targets: FileRecord[]): boolean => {
    const movers = sources.filter(isRelocatable);
    if (movers.length === 0) return false;

    let added = false;
    for (const bucketKey of RELOCATION_RANKS) {
      const buckets = new Map<string, Cursor>();
      for (const target of targets) {
        if (claimedNext.has(target)) continue;
        const key = bucketKey(target);
        const cursor = buckets.get(key);
        if (cursor) {
          cursor.records.push(target);
        } else {
          buckets.set(key, { records: [target], next: 0 });
        }
      }
      if (buckets.size === 0) break;

      for (const source of movers) {
        if (claimedPrev.has(source)) continue;
        const cursor = buckets.get(bucketKey(source));
        if (cursor === undefined) continue;
        while (
          cursor.next < cursor.records.length &&
          claimedNext.has(cursor.records[cursor.next])
        ) {
          cursor.next++;
        }
        if (cursor.next < cursor.records.length) {
          claim(source, cursor.records[cursor.next], false);
          added = true;
        }
      }
    }
    return added;
  };

  let progress = true;
  while (progress) {
    progress = false;
    for (const [key, targets] of nextByContent) {
      const sources = prevByContent.get(key);
      if (!sources || survivors.has(key)) continue;
      if (relocate(sources, targets)) {
        progress = true;
      }
    }
  }

  for (const [key, targets] of nextByContent) {
    const sources = prevByContent.get(key);
    if (!sources) continue;
    const copySource =
      survivors.get(key) ??
      sources.find((source) => nextByPath.has(pathKey(source))) ??
      sources[0];

    for (const target of targets) {
      if (claimedNext.has(target)) continue;
      // a target replacing an unclaimed record at its path is a modification
      const occupant = prevByPath.get(pathKey(target));
      if (occupant && !claimedPrev.has(occupant)) continue;
      claim(copySource, target, true);
    }
  }

  // 3. modified in place
  for (const target of sortedNext) {
    if (claimedNext.has(target)) continue;
    const original = prevByPath.get(pathKey(target));
    if (original && !claimedPrev.has(original)) {
      claim(original, target, false);
    }
  }

  // 4. singletons
  for (const target of sortedNext) {
    if (!claimedNext.has(target)) {
      states.push({ type: CompareStateType.NEXT_ONLY, new: target });
    }
  }
  for (const original of sortedPrev) {
    if (!claimedPrev.has(original)) {
      states.push({ type: CompareStateType.PREV_ONLY, original });
    }
  }

  return states.sort(compareStates);
}

/**
 * Classify one correspondence state. Unchanged pairs yield null.
 */
export function classify(
  state: CompareState,
  options: ReconcileOptions
): Action | null {
  switch (state.type) {
    case CompareStateType.PREV_ONLY:
      return { type: ActionType.REMOVED, original: state.original };
    case CompareStateType.NEXT_ONLY:
      return { type: ActionType.CREATED, new: state.new };
    case CompareStateType.MATCHED:
      if (state.isCopy) {
        return { type: ActionType.COPIED, original: state.original, copy: state.new };
      }
      return diffRecords(state.original, state.new, options);
  }
}

/**
 * Classify a non-copy pair by which of its identities changed
 */
export function diffRecords(
  original: FileRecord,
  next: FileRecord,
  options: ReconcileOptions
): Action | null {
  const contentEqual = sameContent(original, next, options);
  const pathEqual = samePath(original, next);

  if (contentEqual && pathEqual) {
    return null;
  }

  if (contentEqual) {
    if (original.dirName !== next.dirName) {
      return next.archived
        ? {
            type: ActionType.ARCHIVED,
            original,
            newDirName: next.dirName,
            newMetadata: next.metadata,
          }
        : {
            type: ActionType.MOVED,
            original,
            newDirName: next.dirName,
            newMetadata: next.metadata,
          };
    }
    return {
      type: ActionType.RENAMED,
      original,
      newBaseName: next.baseName,
      newMetadata: next.metadata,
    };
  }

  if (pathEqual) {
    return {
      type: ActionType.MODIFIED,
      original,
      newModified: next.modified,
      newSize: next.size,
      newDigest: next.digest,
    };
  }

  throw new ReconciliationError(
    `Paired records share neither content nor path: ` +
      `${joinPath(original.dirName, original.baseName)} -> ` +
      `${joinPath(next.dirName, next.baseName)}`
  );
}

/**
 * Classify every state, dropping unchanged pairs
 */
export function diffAll(
  states: CompareState[],
  options: ReconcileOptions
): Action[] {
  const actions: Action[] = [];
  for (const state of states) {
    const action = classify(state, options);
    if (action !== null) {
      actions.push(action);
    }
  }
  return actions;
}

/**
 * Reconciles two imports' record sets into an ordered list of actions
 */
export class ReconciliationEngine {
  private readonly logger: Logger;

  constructor(
    private readonly options: ReconcileOptions,
    logger: Logger = silentLogger
  ) {
    this.logger = logger;
  }

  correspond(prev: FileRecord[], next: FileRecord[]): CompareState[] {
    return correspond(prev, next, this.options);
  }

  classify(state: CompareState): Action | null {
    return classify(state, this.options);
  }

  diffAll(states: CompareState[]): Action[] {
    const actions = diffAll(states, this.options);
    this.logger.debug(
      `Classified ${states.length} compared states into ${actions.length} actions`
    );
    return actions;
  }

  reconcile(prev: FileRecord[], next: FileRecord[]): Action[] {
    return this.diffAll(this.correspond(prev, next));
  }
}
