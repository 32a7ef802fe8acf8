import * as crypto from "crypto";
import * as fs from "fs";
import * as path from "path";
import Database from "better-sqlite3";
import {
  CompareState,
  FileImport,
  FileRecord,
  StoreConfig,
  Tags,
} from "../types";
import { EMPTY_DIGEST } from "../utils/digest";
import { Logger, silentLogger } from "../utils/logger";
import {
  deserializeTags,
  normalizeTagKeys,
  serializeTag,
  serializeTags,
  TAG_DELIMITER,
} from "../utils/tags";
import { NotFoundError, SnapshotError, StoreError } from "./errors";
import { correspond } from "./reconcile";

export const DEFAULT_IMPORT_TABLE = "file_import";
export const DEFAULT_FILE_INFO_TABLE = "file_info";

/**
 * Persistence for imports and their file records.
 *
 * An import becomes visible together with its (empty) record set, and each
 * importFiles call is all-or-nothing. Imports are never modified after
 * creation.
 */
export interface VersionStore {
  createImport(name: string, tags?: Tags): Promise<Buffer>;
  importFiles(importId: Buffer, records: Iterable<FileRecord>): Promise<number>;
  fetchImport(importId: Buffer): Promise<FileImport>;
  fetchLatestImportId(name: string): Promise<Buffer | null>;
  fetchLatestImportIdForTags(tags: Tags): Promise<Buffer | null>;
  fetchRecords(importId: Buffer): Promise<FileRecord[]>;
  fetchCorrespondence(
    prevId: Buffer,
    nextId: Buffer,
    compareDigests: boolean
  ): Promise<CompareState[]>;
  close(): Promise<void>;
}

/**
 * Opens a fresh handle. Concurrent workers each take their own.
 */
export type StoreFactory = () => VersionStore;

interface ImportRow {
  id: Buffer;
  timestamp: number;
  name: string;
  tags: string | null;
}

interface FileInfoRow {
  digest: Buffer | null;
  dir_name: string;
  base_name: string;
  created: number;
  modified: number;
  size: number;
  archived: number;
  file_group: string | null;
  file_type: string | null;
  tags: string | null;
}

type FileInfoParams = [
  Buffer,
  string,
  string,
  number,
  number,
  number,
  number,
  string | null,
  string | null,
  string,
  Buffer,
];

export interface SqliteStoreOptions extends Partial<StoreConfig> {
  dbFile: string;
  logger?: Logger;
  /**
   * Milliseconds since the epoch; import timestamps are whole seconds of it
   */
  clock?: () => number;
}

/**
 * Quote an identifier for interpolation into SQL
 */
export function nameLiteral(name: string): string {
  return "`" + name.replace(/`/g, "``") + "`";
}

/**
 * Fresh 128-bit import id
 */
export function newImportId(): Buffer {
  return Buffer.from(crypto.randomUUID().replace(/-/g, ""), "hex");
}

/**
 * VersionStore on an embedded SQLite database.
 */
export class SqliteVersionStore implements VersionStore {
  readonly importTable: string;
  readonly fileInfoTable: string;
  private readonly db: Database.Database;
  private readonly logger: Logger;
  private readonly clock: () => number;

  constructor(options: SqliteStoreOptions) {
    this.importTable = options.importTable ?? DEFAULT_IMPORT_TABLE;
    this.fileInfoTable = options.fileInfoTable ?? DEFAULT_FILE_INFO_TABLE;
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? Date.now;

    const sqlLogger = this.logger.child("sql");
    this.db = this.guard("open", undefined, () => {
      if (options.dbFile !== ":memory:") {
        fs.mkdirSync(path.dirname(options.dbFile), { recursive: true });
      }
      return new Database(options.dbFile, {
        verbose: (message?: unknown) => sqlLogger.debug(String(message)),
      });
    });
    this.guard("init", undefined, () => {
      this.db.pragma("foreign_keys = ON");
      this.db.pragma("journal_mode = WAL");
      this.db.pragma("busy_timeout = 5000");
    });
    this.initTables();
  }

  async createImport(name: string, tags: Tags = {}): Promise<Buffer> {
    const id = newImportId();
    const timestamp = Math.floor(this.clock() / 1000);
    const serialized = serializeTags(normalizeTagKeys(tags));

    const insertSql = `
INSERT INTO ${nameLiteral(this.importTable)} (\`id\`, \`timestamp\`, \`name\`, \`tags\`)
    VALUES (?, ?, ?, ?)`;
    const clearSql = `
DELETE FROM ${nameLiteral(this.fileInfoTable)} WHERE \`import_id\` = ?`;

    this.guard("createImport", insertSql, () => {
      const insert = this.db.prepare<[Buffer, number, string, string]>(insertSql);
      const clear = this.db.prepare<[Buffer]>(clearSql);
      this.db.transaction(() => {
        insert.run(id, timestamp, name, serialized);
        clear.run(id);
      })();
    });
    this.logger.info(`Created import ${id.toString("hex")} (${name})`);
    return id;
  }

  async importFiles(
    importId: Buffer,
    records: Iterable<FileRecord>
  ): Promise<number> {
    const sql = `
INSERT INTO ${nameLiteral(this.fileInfoTable)}
    ( \`digest\`
    , \`dir_name\`
    , \`base_name\`
    , \`created\`
    , \`modified\`
    , \`size\`
    , \`archived\`
    , \`file_group\`
    , \`file_type\`
    , \`tags\`
    , \`import_id\`
    ) VALUES
    ( ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ? )`;

    const count = this.guard("importFiles", sql, () => {
      const insert = this.db.prepare<FileInfoParams>(sql);
      return this.db.transaction((batch: Iterable<FileRecord>) => {
        let inserted = 0;
        for (const record of batch) {
          insert.run(...fileInfoParams(importId, record));
          inserted++;
        }
        return inserted;
      })(records);
    });
    this.logger.debug(
      `Imported ${count} files into ${importId.toString("hex")}`
    );
    return count;
  }

  async fetchImport(importId: Buffer): Promise<FileImport> {
    const sql = `
SELECT \`id\`, \`timestamp\`, \`name\`, \`tags\`
FROM ${nameLiteral(this.importTable)}
WHERE \`id\` = ?`;
    const row = this.guard("fetchImport", sql, () =>
      this.db.prepare<[Buffer], ImportRow>(sql).get(importId)
    );
    if (row === undefined) {
      throw new NotFoundError(importId);
    }
    return deserializeImport(row);
  }

  async fetchLatestImportId(name: string): Promise<Buffer | null> {
    const sql = `
SELECT \`id\`, \`timestamp\`, \`name\`, \`tags\`
FROM ${nameLiteral(this.importTable)}
WHERE \`name\` = ?
ORDER BY \`timestamp\` DESC, rowid DESC
LIMIT 1`;
    const row = this.guard("fetchLatestImportId", sql, () =>
      this.db.prepare<[string], ImportRow>(sql).get(name)
    );
    return row?.id ?? null;
  }

  /**
   * Latest import carrying every given tag. With no tags, the latest import
   * carrying none.
   */
  async fetchLatestImportIdForTags(tags: Tags): Promise<Buffer | null> {
    const normalized = normalizeTagKeys(tags);
    const keys = Object.keys(normalized).sort();
    const where =
      keys.length === 0
        ? "`tags` IS NULL OR LENGTH(`tags`) = 0"
        : keys.map(() => "INSTR(`tags`, ?) > 0").join(" AND ");
    const params = keys.map(
      (key) => TAG_DELIMITER + serializeTag(key, normalized[key]) + TAG_DELIMITER
    );
    const sql = `
SELECT \`id\`, \`timestamp\`, \`name\`, \`tags\`
FROM ${nameLiteral(this.importTable)}
WHERE ${where}
ORDER BY \`timestamp\` DESC, rowid DESC
LIMIT 1`;
    const row = this.guard("fetchLatestImportIdForTags", sql, () =>
      this.db.prepare<string[], ImportRow>(sql).get(...params)
    );
    return row?.id ?? null;
  }

  async fetchRecords(importId: Buffer): Promise<FileRecord[]> {
    await this.fetchImport(importId);
    const sql = `
SELECT \`digest\`, \`dir_name\`, \`base_name\`, \`created\`, \`modified\`,
       \`size\`, \`archived\`, \`file_group\`, \`file_type\`, \`tags\`
FROM ${nameLiteral(this.fileInfoTable)}
WHERE \`import_id\` = ?
ORDER BY \`dir_name\`, \`base_name\``;
    const rows = this.guard("fetchRecords", sql, () =>
      this.db.prepare<[Buffer], FileInfoRow>(sql).all(importId)
    );
    return rows.map(deserializeFileInfo);
  }

  /**
   * Loads both record sets and joins them in memory
   */
  async fetchCorrespondence(
    prevId: Buffer,
    nextId: Buffer,
    compareDigests: boolean
  ): Promise<CompareState[]> {
    const [prev, next] = await Promise.all([
      this.fetchRecords(prevId),
      this.fetchRecords(nextId),
    ]);
    this.logger.debug(
      `Comparing ${prev.length} previous with ${next.length} next records`
    );
    return correspond(prev, next, { compareDigests });
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }

  private initTables(): void {
    const importTable = nameLiteral(this.importTable);
    const fileInfoTable = nameLiteral(this.fileInfoTable);
    const index = (table: string, column: string) =>
      `CREATE INDEX IF NOT EXISTS ${nameLiteral(`${table}_${column}`)} ` +
      `ON ${nameLiteral(table)} (\`${column}\`);`;

    const sql = [
      `CREATE TABLE IF NOT EXISTS ${importTable}
    ( \`id\` BLOB PRIMARY KEY
    , \`timestamp\` INTEGER NOT NULL
    , \`name\` TEXT NOT NULL
    , \`tags\` TEXT
    );`,
      index(this.importTable, "timestamp"),
      index(this.importTable, "name"),
      `CREATE TABLE IF NOT EXISTS ${fileInfoTable}
    ( \`digest\` BLOB NOT NULL
    , \`dir_name\` TEXT NOT NULL
    , \`base_name\` TEXT NOT NULL
    , \`created\` REAL NOT NULL
    , \`modified\` REAL NOT NULL
    , \`size\` INTEGER NOT NULL
    , \`archived\` INTEGER NOT NULL
    , \`file_group\` TEXT NULL
    , \`file_type\` TEXT NULL
    , \`tags\` TEXT NULL
    , \`import_id\` BLOB NOT NULL
    , FOREIGN KEY(\`import_id\`) REFERENCES ${importTable}(\`id\`)
    );`,
      ...["import_id", "digest", "dir_name", "base_name", "file_group", "file_type"].map(
        (column) => index(this.fileInfoTable, column)
      ),
    ].join("\n");

    this.guard("initTables", sql, () => this.db.exec(sql));
  }

  /**
   * Run a statement, wrapping driver failures in StoreError. Errors that are
   * already ours pass through.
   */
  private guard<T>(operation: string, sql: string | undefined, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof SnapshotError) throw error;
      throw new StoreError(operation, error, sql);
    }
  }
}

function fileInfoParams(importId: Buffer, record: FileRecord): FileInfoParams {
  return [
    record.digest,
    record.dirName,
    record.baseName,
    record.created,
    record.modified,
    record.size,
    record.archived ? 1 : 0,
    record.fileGroup ?? null,
    record.fileType ?? null,
    serializeTags(record.metadata),
    importId,
  ];
}

function deserializeImport(row: ImportRow): FileImport {
  return {
    id: row.id,
    timestamp: row.timestamp,
    name: row.name,
    tags: deserializeTags(row.tags),
  };
}

function deserializeFileInfo(row: FileInfoRow): FileRecord {
  return {
    digest: row.digest ?? EMPTY_DIGEST,
    dirName: row.dir_name,
    baseName: row.base_name,
    created: row.created,
    modified: row.modified,
    size: row.size,
    archived: row.archived !== 0,
    fileGroup: row.file_group ?? undefined,
    fileType: row.file_type ?? undefined,
    metadata: deserializeTags(row.tags),
  };
}

/**
 * Store factory for a resolved store config
 */
export function sqliteStoreFactory(
  config: StoreConfig,
  logger: Logger = silentLogger
): StoreFactory {
  return () =>
    new SqliteVersionStore({
      dbFile: config.dbFile,
      importTable: config.importTable,
      fileInfoTable: config.fileInfoTable,
      logger,
    });
}
