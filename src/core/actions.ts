import {
  Action,
  ActionType,
  DiffResult,
  FileRecord,
  FileRecordJson,
} from "../types";
import { joinPath } from "../utils/fs";
import { assertNever } from "./policy";

/**
 * Project an original record forward through an action. Actions that do not
 * describe a change to the original (created, removed, copied) return it
 * untouched.
 */
export function applyAction(record: FileRecord, action: Action): FileRecord {
  switch (action.type) {
    case ActionType.CREATED:
    case ActionType.REMOVED:
    case ActionType.COPIED:
      return record;
    case ActionType.MOVED:
      return {
        ...record,
        dirName: action.newDirName,
        metadata: action.newMetadata,
      };
    case ActionType.ARCHIVED:
      return {
        ...record,
        dirName: action.newDirName,
        archived: true,
        metadata: action.newMetadata,
      };
    case ActionType.RENAMED:
      return {
        ...record,
        baseName: action.newBaseName,
        metadata: action.newMetadata,
      };
    case ActionType.MODIFIED:
      return {
        ...record,
        modified: action.newModified,
        size: action.newSize,
        digest: action.newDigest,
      };
    default:
      return assertNever(action, "action");
  }
}

export function recordToJson(record: FileRecord): FileRecordJson {
  return {
    digest: record.digest.toString("hex"),
    dirName: record.dirName,
    baseName: record.baseName,
    fileName: joinPath(record.dirName, record.baseName),
    created: record.created,
    modified: record.modified,
    size: record.size,
    archived: record.archived,
    fileGroup: record.fileGroup ?? null,
    fileType: record.fileType ?? null,
    metadata: record.metadata,
  };
}

export type ActionJson = { type: ActionType } & Record<string, unknown>;

/**
 * Action tagged by its variant name, with records nested as JSON
 */
export function actionToJson(action: Action): ActionJson {
  switch (action.type) {
    case ActionType.CREATED:
      return { type: action.type, new: recordToJson(action.new) };
    case ActionType.REMOVED:
      return { type: action.type, original: recordToJson(action.original) };
    case ActionType.COPIED:
      return {
        type: action.type,
        original: recordToJson(action.original),
        copy: recordToJson(action.copy),
      };
    case ActionType.MOVED:
    case ActionType.ARCHIVED:
      return {
        type: action.type,
        original: recordToJson(action.original),
        newDirName: action.newDirName,
        newMetadata: action.newMetadata,
      };
    case ActionType.RENAMED:
      return {
        type: action.type,
        original: recordToJson(action.original),
        newBaseName: action.newBaseName,
        newMetadata: action.newMetadata,
      };
    case ActionType.MODIFIED:
      return {
        type: action.type,
        original: recordToJson(action.original),
        newModified: action.newModified,
        newSize: action.newSize,
        newDigest: action.newDigest.toString("hex"),
      };
    default:
      return assertNever(action, "action");
  }
}

export interface DiffResultJson {
  originalId: string;
  newId: string;
  actions: ActionJson[];
}

export function diffResultToJson(result: DiffResult): DiffResultJson {
  return {
    originalId: result.originalId.toString("hex"),
    newId: result.newId.toString("hex"),
    actions: result.actions.map(actionToJson),
  };
}

/**
 * Path an action is about, for compact listings
 */
export function actionPath(action: Action): string {
  const record = action.type === ActionType.CREATED ? action.new : action.original;
  return joinPath(record.dirName, record.baseName);
}

/**
 * One line per action: `Moved  A/1.csv -> B/1.csv`
 */
export function describeAction(action: Action): string {
  const from = actionPath(action);
  switch (action.type) {
    case ActionType.CREATED:
    case ActionType.REMOVED:
    case ActionType.MODIFIED:
      return `${action.type} ${from}`;
    case ActionType.COPIED:
      return `${action.type} ${from} -> ${joinPath(action.copy.dirName, action.copy.baseName)}`;
    case ActionType.MOVED:
    case ActionType.ARCHIVED:
      return `${action.type} ${from} -> ${joinPath(action.newDirName, action.original.baseName)}`;
    case ActionType.RENAMED:
      return `${action.type} ${from} -> ${joinPath(action.original.dirName, action.newBaseName)}`;
    default:
      return assertNever(action, "action");
  }
}
