import { Digest, FileRecord, Tags } from "./records";

/**
 * Change classification between two snapshot versions
 */
export enum ActionType {
  CREATED = "Created",
  REMOVED = "Removed",
  COPIED = "Copied",
  MOVED = "Moved",
  RENAMED = "Renamed",
  ARCHIVED = "Archived",
  MODIFIED = "Modified",
}

export interface CreatedAction {
  type: ActionType.CREATED;
  new: FileRecord;
}

export interface RemovedAction {
  type: ActionType.REMOVED;
  original: FileRecord;
}

export interface CopiedAction {
  type: ActionType.COPIED;
  original: FileRecord;
  copy: FileRecord;
}

export interface MovedAction {
  type: ActionType.MOVED;
  original: FileRecord;
  newDirName: string;
  newMetadata: Tags;
}

export interface RenamedAction {
  type: ActionType.RENAMED;
  original: FileRecord;
  newBaseName: string;
  newMetadata: Tags;
}

export interface ArchivedAction {
  type: ActionType.ARCHIVED;
  original: FileRecord;
  newDirName: string;
  newMetadata: Tags;
}

export interface ModifiedAction {
  type: ActionType.MODIFIED;
  original: FileRecord;
  newModified: number;
  newSize: number;
  newDigest: Digest;
}

export type Action =
  | CreatedAction
  | RemovedAction
  | CopiedAction
  | MovedAction
  | RenamedAction
  | ArchivedAction
  | ModifiedAction;

/**
 * Correspondence between the records of two imports
 */
export enum CompareStateType {
  PREV_ONLY = "prev_only",
  NEXT_ONLY = "next_only",
  MATCHED = "matched",
}

export interface PrevOnlyState {
  type: CompareStateType.PREV_ONLY;
  original: FileRecord;
}

export interface NextOnlyState {
  type: CompareStateType.NEXT_ONLY;
  new: FileRecord;
}

export interface MatchedState {
  type: CompareStateType.MATCHED;
  original: FileRecord;
  new: FileRecord;
  isCopy: boolean;
}

export type CompareState = PrevOnlyState | NextOnlyState | MatchedState;

/**
 * Result of diffing an import against the latest import of its lineage
 */
export interface DiffResult {
  originalId: Buffer;
  newId: Buffer;
  compared: number;
  actions: Action[];
}
