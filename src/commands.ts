import chalk from "chalk";
import {
  CommandOptions,
  ConfigOptions,
  DiffOptions,
  LogLevel,
  SnapshotConfig,
} from "./types";
import { ConfigManager } from "./core/config";
import { describeAction, diffResultToJson } from "./core/actions";
import { diffSnapshot, parseImportId, storeSnapshot } from "./core/snapshot";
import { sqliteStoreFactory, StoreFactory } from "./core/store";
import { createLogger, Logger } from "./utils/logger";
import { out } from "./cli/output";

/**
 * Shared context that commands can use
 */
interface CommandContext {
  config: SnapshotConfig;
  logger: Logger;
  openStore: StoreFactory;
}

/**
 * Where command results go. Progress and logs use stderr.
 */
export type Printer = (text: string) => void;

const stdout: Printer = (text) => {
  process.stdout.write(text + "\n");
};

function logLevelFor(config: SnapshotConfig, options: CommandOptions): LogLevel {
  if (options.debug) return "debug";
  if (options.verbose) return "info";
  return config.logLevel;
}

/**
 * Load the named spec and build its logger and store factory
 */
async function setupCommandContext(
  specName: string,
  options: CommandOptions
): Promise<CommandContext> {
  const manager = new ConfigManager(options.config);
  const config = await manager.loadSpec(specName);
  const logger = createLogger({
    level: logLevelFor(config, options),
    file: config.logFile,
    scope: specName,
  });
  return {
    config,
    logger,
    openStore: sqliteStoreFactory(config.store, logger.child("store")),
  };
}

/**
 * Scan a spec's root directory into a new import and print its id
 */
export async function store(
  specName: string,
  options: CommandOptions = {},
  print: Printer = stdout
): Promise<string> {
  const { config, logger, openStore } = await setupCommandContext(
    specName,
    options
  );

  out.task(`Storing ${config.name}`);
  const result = await storeSnapshot(config, {
    openStore,
    logger,
    onBatch: (label, count) => out.taskLine(`${label}: ${plural("file", count)}`),
  });
  out.done();

  const total = Object.values(result.counts).reduce((sum, n) => sum + n, 0);
  out.obj({
    Root: config.rootDir,
    Files: total,
    Skipped: result.errors.length > 0 ? result.errors.length : undefined,
  });
  if (result.errors.length > 0) {
    out.warnBlock("WARNINGS", `${plural("entry", result.errors.length)} unreadable`);
    for (const error of result.errors.slice(0, 10)) {
      out.warn(`  ${error.message}`);
    }
  }

  const hexId = result.importId.toString("hex");
  out.successBlock("STORED", hexId);
  print(hexId);
  return hexId;
}

/**
 * Reconcile an import against the latest import of its spec and print the
 * actions as JSON
 */
export async function diff(
  specName: string,
  importId: string,
  options: DiffOptions = {},
  print: Printer = stdout
): Promise<void> {
  const { config, logger, openStore } = await setupCommandContext(
    specName,
    options
  );
  const id = parseImportId(importId);

  out.task("Comparing");
  const store = openStore();
  try {
    const result = await diffSnapshot(store, id, {
      compareDigests: config.compareDigests,
      logger,
    });
    out.done(`Compared ${plural("entry", result.compared)}`);

    if (options.summary) {
      for (const action of result.actions) {
        print(describeAction(action));
      }
      return;
    }
    const json = diffResultToJson(result);
    print(JSON.stringify(json, null, options.compact ? undefined : 2));
  } finally {
    await store.close();
  }
}

/**
 * List the configured specs, or show one resolved spec
 */
export async function config(
  specName: string | undefined,
  options: ConfigOptions = {},
  print: Printer = stdout
): Promise<void> {
  const manager = new ConfigManager(options.config);

  if (specName === undefined) {
    for (const name of await manager.listSpecs()) {
      print(name);
    }
    return;
  }

  const resolved = await manager.loadSpec(specName);
  if (options.json) {
    print(JSON.stringify(resolved, null, 2));
    return;
  }

  const described = manager.describe(resolved);
  const width = Math.max(...Object.keys(described).map((key) => key.length));
  for (const [key, value] of Object.entries(described)) {
    print(`${chalk.dim(key.padEnd(width + 2))}${value}`);
  }
}

function plural(word: string, count: number): string {
  if (count === 1) return `${count} ${word}`;
  return word.endsWith("y")
    ? `${count} ${word.slice(0, -1)}ies`
    : `${count} ${word}s`;
}
