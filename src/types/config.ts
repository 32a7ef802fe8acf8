import { Tags } from "./records";

/**
 * Default configuration file name, looked up in the working directory
 */
export const DEFAULT_CONFIG_FILE = "fs-snapshot.json";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

/**
 * Archival policy applied to a matched file's metadata
 */
export type ArchivedBy =
  | { kind: "not-archived" }
  | { kind: "has-metadata"; key: string; values: string[] };

/**
 * Label derivation policy applied to a matched file's metadata
 */
export type CalcBy = { kind: "no-calc" } | { kind: "from-metadata"; format: string };

/**
 * Version store connection settings
 */
export interface StoreConfig {
  dbFile: string;
  importTable: string;
  fileInfoTable: string;
}

/**
 * Fully resolved settings for one named snapshot spec
 */
export interface SnapshotConfig {
  name: string;
  rootDir: string;
  matchPaths: Record<string, string[]>;
  excludePatterns: string[];
  includeUnmatched: boolean;
  digest: boolean;
  compareDigests: boolean;
  multithread: boolean;
  metadata: Tags;
  archivedBy: ArchivedBy;
  fileGroupBy: CalcBy;
  fileTypeBy: CalcBy;
  store: StoreConfig;
  logFile?: string;
  logLevel: LogLevel;
}

/**
 * Spec section as written in the config file; every field is optional and
 * merged over the file defaults
 */
export interface SpecSection {
  root_dir?: string;
  match_paths?: Record<string, string[] | string>;
  exclude_patterns?: string[];
  include_unmatched?: boolean;
  digest?: boolean;
  compare_digests?: boolean;
  multithread?: boolean;
  metadata?: Tags;
  archived_by?: ArchivedBy;
  file_group_by?: CalcBy;
  file_type_by?: CalcBy;
  store?: {
    db_file?: string;
    import_table?: string;
    file_info_table?: string;
  };
  log_file?: string;
  log_level?: LogLevel;
}

/**
 * Config file structure
 */
export interface ConfigFile {
  defaults?: SpecSection;
  specs: Record<string, SpecSection>;
}

/**
 * CLI command options
 */
export interface CommandOptions {
  config?: string;
  verbose?: boolean;
  debug?: boolean;
}

/**
 * Diff command specific options
 */
export interface DiffOptions extends CommandOptions {
  compact?: boolean;
  summary?: boolean;
}

/**
 * Config command specific options
 */
export interface ConfigOptions extends CommandOptions {
  json?: boolean;
}
