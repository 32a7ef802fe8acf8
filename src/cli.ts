#!/usr/bin/env node

import * as fs from "fs";
import * as path from "path";
import { Command } from "commander";
import chalk from "chalk";
import { config, diff, store } from "./commands";
import { CommandOptions, ConfigOptions, DiffOptions } from "./types";

/**
 * Wrapper for command actions with consistent error handling
 */
function withErrorHandling<T extends unknown[], R>(
  fn: (...args: T) => Promise<R>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(chalk.red(`Error: ${message}`));
      process.exit(1);
    }
  };
}

function readVersion(): string {
  const manifest: unknown = JSON.parse(
    fs.readFileSync(path.join(__dirname, "..", "package.json"), "utf8")
  );
  if (
    typeof manifest === "object" &&
    manifest !== null &&
    "version" in manifest &&
    typeof manifest.version === "string"
  ) {
    return manifest.version;
  }
  return "0.0.0";
}

const program = new Command();

program
  .name("fs-snapshot")
  .description("Snapshot file trees and diff snapshots into file actions")
  .version(readVersion(), "-V, --version", "output the version number");

program.configureHelp({
  styleTitle: (str) => chalk.bold(str),
  styleCommandText: (str) => chalk.white(str),
  styleCommandDescription: (str) => chalk.dim(str),
  styleDescriptionText: (str) => str,
  styleOptionText: (str) => chalk.green(str),
  styleArgumentText: (str) => chalk.cyan(str),
  styleSubcommandText: (str) => str,
  subcommandTerm: (cmd) => {
    const name = chalk.white(cmd.name());
    const args = cmd.registeredArguments
      .map((arg) =>
        arg.required
          ? chalk.cyan(`<${arg.name()}>`)
          : chalk.dim(`[${arg.name()}]`)
      )
      .join(" ");
    return args ? `${name} ${args}` : name;
  },
});

const CONFIG_OPTION = "-c, --config <file>";
const CONFIG_HELP = "Config file (default: ./fs-snapshot.json)";

// Store command
program
  .command("store")
  .summary("Scan a spec's root directory into a new import")
  .argument("<spec>", "Name of the spec in the config file")
  .option(CONFIG_OPTION, CONFIG_HELP)
  .option("-v, --verbose", "Log progress at info level")
  .option("--debug", "Log at debug level, including SQL")
  .action(
    withErrorHandling(async (spec: string, cmdOptions: CommandOptions) => {
      await store(spec, {
        config: cmdOptions.config,
        verbose: cmdOptions.verbose || false,
        debug: cmdOptions.debug || false,
      });
    })
  );

// Diff command
program
  .command("diff")
  .summary("Diff an import against the latest import of its spec")
  .argument("<spec>", "Name of the spec in the config file")
  .argument("<importId>", "Import id printed by the store command")
  .option(CONFIG_OPTION, CONFIG_HELP)
  .option("--compact", "Print JSON on a single line")
  .option("--summary", "Print one line per action instead of JSON")
  .option("-v, --verbose", "Log progress at info level")
  .option("--debug", "Log at debug level, including SQL")
  .action(
    withErrorHandling(
      async (spec: string, importId: string, cmdOptions: DiffOptions) => {
        await diff(spec, importId, {
          config: cmdOptions.config,
          compact: cmdOptions.compact || false,
          summary: cmdOptions.summary || false,
          verbose: cmdOptions.verbose || false,
          debug: cmdOptions.debug || false,
        });
      }
    )
  );

// Config command
program
  .command("config")
  .summary("List specs, or show one spec's resolved settings")
  .argument("[spec]", "Name of the spec to show")
  .option(CONFIG_OPTION, CONFIG_HELP)
  .option("--json", "Print the resolved settings as JSON")
  .action(
    withErrorHandling(
      async (spec: string | undefined, cmdOptions: ConfigOptions) => {
        await config(spec, {
          config: cmdOptions.config,
          json: cmdOptions.json || false,
        });
      }
    )
  );

// Show help if no arguments provided
if (!process.argv.slice(2).length) {
  program.outputHelp();
} else {
  program.parseAsync().catch((error: unknown) => {
    console.error(chalk.red(`Error: ${String(error)}`));
    process.exit(1);
  });
}
