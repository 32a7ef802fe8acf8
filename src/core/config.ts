import * as fs from "fs/promises";
import * as path from "path";
import {
  ArchivedBy,
  CalcBy,
  ConfigFile,
  DEFAULT_CONFIG_FILE,
  LogLevel,
  SnapshotConfig,
  SpecSection,
  Tags,
} from "../types";
import { pathExists } from "../utils/fs";
import { normalizeTagKeys, serializeTags } from "../utils/tags";
import { ConfigError } from "./errors";
import { PathTemplate } from "./path-template";
import { describePolicy } from "./policy";
import { DEFAULT_FILE_INFO_TABLE, DEFAULT_IMPORT_TABLE } from "./store";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Loads and resolves named snapshot specs from a JSON config file:
 *
 *   { "defaults": { ... }, "specs": { "<name>": { ... } } }
 *
 * Each spec is merged over the file defaults, which are merged over the
 * built-in defaults. Relative paths resolve against the config file's
 * directory.
 */
export class ConfigManager {
  static readonly CONFIG_FILENAME = DEFAULT_CONFIG_FILE;

  readonly configPath: string;

  constructor(configPath: string = ConfigManager.CONFIG_FILENAME) {
    this.configPath = path.resolve(configPath);
  }

  get configDir(): string {
    return path.dirname(this.configPath);
  }

  /**
   * Read and structurally check the config file
   */
  async loadFile(): Promise<ConfigFile> {
    if (!(await pathExists(this.configPath))) {
      throw new ConfigError(["config file not found"], this.configPath);
    }

    const content = await fs.readFile(this.configPath, "utf8");
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError([`not valid JSON: ${reason}`], this.configPath);
    }
    return parseConfigFile(raw, this.configPath);
  }

  async listSpecs(): Promise<string[]> {
    const file = await this.loadFile();
    return Object.keys(file.specs);
  }

  /**
   * Resolve and validate one named spec
   */
  async loadSpec(name: string): Promise<SnapshotConfig> {
    const file = await this.loadFile();
    const section = file.specs[name];
    if (section === undefined) {
      const known = Object.keys(file.specs);
      throw new ConfigError(
        [
          `spec '${name}' is not defined` +
            (known.length > 0 ? ` (available: ${known.join(", ")})` : ""),
        ],
        this.configPath
      );
    }

    let merged = this.getDefaultSection();
    if (file.defaults) {
      merged = this.mergeSections(merged, file.defaults);
    }
    merged = this.mergeSections(merged, section);

    const config = this.resolve(name, merged);
    const { valid, errors } = this.validate(config);
    if (!valid) {
      throw new ConfigError(errors, `${this.configPath} (spec '${name}')`);
    }
    return config;
  }

  /**
   * Built-in defaults
   */
  getDefaultSection(): SpecSection {
    return {
      root_dir: ".",
      match_paths: {},
      exclude_patterns: [],
      include_unmatched: true,
      digest: true,
      compare_digests: false,
      multithread: true,
      metadata: {},
      archived_by: { kind: "not-archived" },
      file_group_by: { kind: "no-calc" },
      file_type_by: { kind: "no-calc" },
      store: {
        db_file: "fs-snapshot.sqlite",
        import_table: DEFAULT_IMPORT_TABLE,
        file_info_table: DEFAULT_FILE_INFO_TABLE,
      },
      log_level: "warn",
    };
  }

  /**
   * Merge two sections. `store` and `metadata` merge key by key; every
   * other field is replaced as a whole.
   */
  mergeSections(base: SpecSection, override: SpecSection): SpecSection {
    const merged = mergeDefined(base, override);
    if (base.store && override.store) {
      merged.store = mergeDefined(base.store, override.store);
    }
    if (base.metadata && override.metadata) {
      merged.metadata = { ...base.metadata, ...override.metadata };
    }
    return merged;
  }

  /**
   * Turn a merged section into resolved settings
   */
  resolve(name: string, section: SpecSection): SnapshotConfig {
    const defaults = this.getDefaultSection();
    const store = mergeDefined(defaults.store ?? {}, section.store ?? {});

    const matchPaths: Record<string, string[]> = {};
    for (const [category, patterns] of Object.entries(section.match_paths ?? {})) {
      matchPaths[category] = typeof patterns === "string" ? [patterns] : patterns;
    }

    const dbFile = store.db_file ?? "fs-snapshot.sqlite";
    return {
      name,
      rootDir: path.resolve(this.configDir, section.root_dir ?? "."),
      matchPaths,
      excludePatterns: section.exclude_patterns ?? [],
      includeUnmatched: section.include_unmatched ?? true,
      digest: section.digest ?? true,
      compareDigests: section.compare_digests ?? false,
      multithread: section.multithread ?? true,
      metadata: section.metadata ?? {},
      archivedBy: section.archived_by ?? { kind: "not-archived" },
      fileGroupBy: section.file_group_by ?? { kind: "no-calc" },
      fileTypeBy: section.file_type_by ?? { kind: "no-calc" },
      store: {
        dbFile: dbFile === ":memory:" ? dbFile : path.resolve(this.configDir, dbFile),
        importTable: store.import_table ?? DEFAULT_IMPORT_TABLE,
        fileInfoTable: store.file_info_table ?? DEFAULT_FILE_INFO_TABLE,
      },
      logFile:
        section.log_file !== undefined
          ? path.resolve(this.configDir, section.log_file)
          : undefined,
      logLevel: section.log_level ?? "warn",
    };
  }

  /**
   * Validate resolved settings. Every match pattern is compiled here, so a
   * malformed pattern is reported before any scan starts.
   */
  validate(config: SnapshotConfig): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    for (const [category, patterns] of Object.entries(config.matchPaths)) {
      if (patterns.length === 0) {
        errors.push(`match_paths.${category} has no patterns`);
      }
      for (const pattern of patterns) {
        try {
          PathTemplate.compile(pattern);
        } catch (error) {
          errors.push(`match_paths.${category}: ${errorMessage(error)}`);
        }
      }
    }

    if (config.compareDigests && !config.digest) {
      errors.push("compare_digests requires digest to be enabled");
    }

    try {
      serializeTags(normalizeTagKeys(config.metadata));
    } catch (error) {
      errors.push(`metadata: ${errorMessage(error)}`);
    }

    if (config.archivedBy.kind === "has-metadata") {
      if (config.archivedBy.key.length === 0) {
        errors.push("archived_by.key must not be empty");
      }
      if (config.archivedBy.values.length === 0) {
        errors.push("archived_by.values must not be empty");
      }
    }

    for (const [field, policy] of [
      ["file_group_by", config.fileGroupBy],
      ["file_type_by", config.fileTypeBy],
    ] as const) {
      if (policy.kind === "from-metadata" && policy.format.length === 0) {
        errors.push(`${field}.format must not be empty`);
      }
    }

    const { importTable, fileInfoTable } = config.store;
    if (importTable.length === 0 || fileInfoTable.length === 0) {
      errors.push("store table names must not be empty");
    } else if (importTable === fileInfoTable) {
      errors.push("store.import_table and store.file_info_table must differ");
    }

    return {
      valid: errors.length === 0,
      errors,
    };
  }

  /**
   * Printable summary of resolved settings
   */
  describe(config: SnapshotConfig): Record<string, string> {
    const matchPaths = Object.entries(config.matchPaths).map(
      ([category, patterns]) => `${category}: ${patterns.join(", ")}`
    );
    return {
      name: config.name,
      root_dir: config.rootDir,
      match_paths: matchPaths.length > 0 ? matchPaths.join("; ") : "(none)",
      exclude_patterns: config.excludePatterns.join(", ") || "(none)",
      include_unmatched: String(config.includeUnmatched),
      digest: String(config.digest),
      compare_digests: String(config.compareDigests),
      multithread: String(config.multithread),
      metadata: serializeTags(config.metadata) || "(none)",
      archived_by: describePolicy(config.archivedBy),
      file_group_by: describePolicy(config.fileGroupBy),
      file_type_by: describePolicy(config.fileTypeBy),
      db_file: config.store.dbFile,
      import_table: config.store.importTable,
      file_info_table: config.store.fileInfoTable,
      log_file: config.logFile ?? "(stderr)",
      log_level: config.logLevel,
    };
  }
}

/**
 * Shallow merge that ignores fields the override leaves undefined
 */
function mergeDefined<T extends object>(base: T, override: T): T {
  const merged = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value !== undefined) {
      Object.assign(merged, { [key]: value });
    }
  }
  return merged;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Check the shape of a parsed config file, collecting every problem
 */
export function parseConfigFile(raw: unknown, source?: string): ConfigFile {
  const errors: string[] = [];
  if (!isObject(raw)) {
    throw new ConfigError(["top level must be an object"], source);
  }

  let defaults: SpecSection | undefined;
  if (raw.defaults !== undefined) {
    defaults = parseSection(raw.defaults, "defaults", errors);
  }

  const specs: Record<string, SpecSection> = {};
  if (!isObject(raw.specs)) {
    errors.push("specs must be an object of named spec sections");
  } else {
    for (const [name, value] of Object.entries(raw.specs)) {
      specs[name] = parseSection(value, `specs.${name}`, errors);
    }
  }

  for (const key of Object.keys(raw)) {
    if (key !== "defaults" && key !== "specs") {
      errors.push(`unknown top-level key '${key}'`);
    }
  }

  if (errors.length > 0) {
    throw new ConfigError(errors, source);
  }
  return { defaults, specs };
}

const SECTION_KEYS = new Set([
  "root_dir",
  "match_paths",
  "exclude_patterns",
  "include_unmatched",
  "digest",
  "compare_digests",
  "multithread",
  "metadata",
  "archived_by",
  "file_group_by",
  "file_type_by",
  "store",
  "log_file",
  "log_level",
]);

function parseSection(value: unknown, where: string, errors: string[]): SpecSection {
  const section: SpecSection = {};
  if (!isObject(value)) {
    errors.push(`${where} must be an object`);
    return section;
  }

  for (const key of Object.keys(value)) {
    if (!SECTION_KEYS.has(key)) {
      errors.push(`${where}: unknown key '${key}'`);
    }
  }

  section.root_dir = readString(value.root_dir, `${where}.root_dir`, errors);
  section.exclude_patterns = readStringArray(
    value.exclude_patterns,
    `${where}.exclude_patterns`,
    errors
  );
  section.include_unmatched = readBoolean(
    value.include_unmatched,
    `${where}.include_unmatched`,
    errors
  );
  section.digest = readBoolean(value.digest, `${where}.digest`, errors);
  section.compare_digests = readBoolean(
    value.compare_digests,
    `${where}.compare_digests`,
    errors
  );
  section.multithread = readBoolean(value.multithread, `${where}.multithread`, errors);
  section.metadata = readStringMap(value.metadata, `${where}.metadata`, errors);
  section.log_file = readString(value.log_file, `${where}.log_file`, errors);

  if (value.log_level !== undefined) {
    if (isLogLevel(value.log_level)) {
      section.log_level = value.log_level;
    } else {
      errors.push(`${where}.log_level must be one of ${LOG_LEVELS.join(", ")}`);
    }
  }

  if (value.match_paths !== undefined) {
    section.match_paths = readMatchPaths(value.match_paths, `${where}.match_paths`, errors);
  }
  if (value.archived_by !== undefined) {
    section.archived_by = readArchivedBy(value.archived_by, `${where}.archived_by`, errors);
  }
  if (value.file_group_by !== undefined) {
    section.file_group_by = readCalcBy(value.file_group_by, `${where}.file_group_by`, errors);
  }
  if (value.file_type_by !== undefined) {
    section.file_type_by = readCalcBy(value.file_type_by, `${where}.file_type_by`, errors);
  }

  if (value.store !== undefined) {
    if (!isObject(value.store)) {
      errors.push(`${where}.store must be an object`);
    } else {
      section.store = {
        db_file: readString(value.store.db_file, `${where}.store.db_file`, errors),
        import_table: readString(
          value.store.import_table,
          `${where}.store.import_table`,
          errors
        ),
        file_info_table: readString(
          value.store.file_info_table,
          `${where}.store.file_info_table`,
          errors
        ),
      };
    }
  }

  return section;
}

function readString(value: unknown, where: string, errors: string[]): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    errors.push(`${where} must be a string`);
    return undefined;
  }
  return value;
}

function readBoolean(value: unknown, where: string, errors: string[]): boolean | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") {
    errors.push(`${where} must be true or false`);
    return undefined;
  }
  return value;
}

function readStringArray(
  value: unknown,
  where: string,
  errors: string[]
): string[] | undefined {
  if (value === undefined) return undefined;
  if (!Array.isArray(value) || !value.every((item) => typeof item === "string")) {
    errors.push(`${where} must be a list of strings`);
    return undefined;
  }
  return value.filter((item): item is string => typeof item === "string");
}

function readStringMap(value: unknown, where: string, errors: string[]): Tags | undefined {
  if (value === undefined) return undefined;
  if (!isObject(value)) {
    errors.push(`${where} must be an object of strings`);
    return undefined;
  }
  const map: Tags = {};
  for (const [key, item] of Object.entries(value)) {
    if (typeof item !== "string") {
      errors.push(`${where}.${key} must be a string`);
      continue;
    }
    map[key] = item;
  }
  return map;
}

function readMatchPaths(
  value: unknown,
  where: string,
  errors: string[]
): Record<string, string[] | string> | undefined {
  if (!isObject(value)) {
    errors.push(`${where} must be an object of category to pattern list`);
    return undefined;
  }
  const groups: Record<string, string[] | string> = {};
  for (const [category, patterns] of Object.entries(value)) {
    if (typeof patterns === "string") {
      groups[category] = patterns;
      continue;
    }
    const list = readStringArray(patterns, `${where}.${category}`, errors);
    if (list !== undefined) {
      groups[category] = list;
    }
  }
  return groups;
}

function readArchivedBy(value: unknown, where: string, errors: string[]): ArchivedBy | undefined {
  if (!isObject(value)) {
    errors.push(`${where} must be an object with a 'kind'`);
    return undefined;
  }
  switch (value.kind) {
    case "not-archived":
      return { kind: "not-archived" };
    case "has-metadata": {
      const key = readString(value.key, `${where}.key`, errors);
      const values =
        typeof value.values === "string"
          ? [value.values]
          : readStringArray(value.values, `${where}.values`, errors);
      if (key === undefined || values === undefined) {
        if (key === undefined && value.key === undefined) {
          errors.push(`${where}.key is required`);
        }
        if (values === undefined && value.values === undefined) {
          errors.push(`${where}.values is required`);
        }
        return undefined;
      }
      return { kind: "has-metadata", key, values };
    }
    default:
      errors.push(`${where}.kind must be 'not-archived' or 'has-metadata'`);
      return undefined;
  }
}

function readCalcBy(value: unknown, where: string, errors: string[]): CalcBy | undefined {
  if (!isObject(value)) {
    errors.push(`${where} must be an object with a 'kind'`);
    return undefined;
  }
  switch (value.kind) {
    case "no-calc":
      return { kind: "no-calc" };
    case "from-metadata": {
      const format = readString(value.format, `${where}.format`, errors);
      if (format === undefined) {
        if (value.format === undefined) {
          errors.push(`${where}.format is required`);
        }
        return undefined;
      }
      return { kind: "from-metadata", format };
    }
    default:
      errors.push(`${where}.kind must be 'no-calc' or 'from-metadata'`);
      return undefined;
  }
}
