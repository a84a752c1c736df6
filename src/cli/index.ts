#!/usr/bin/env node
/**
 * docpp CLI entry point
 *
 * Commands:
 * - expand - Expand directives in the given files (default)
 * - list   - List directive classes and their kinds
 */

import { Command } from "commander";

import { DirectiveResolver } from "../directives/registry.js";
import { logger } from "../lib/index.js";
import { preprocessFiles } from "../preprocessor/driver.js";
import { VERSION } from "../version.js";

import { loadConfig, parseList } from "./config.js";
import { formatCatalogs, formatError, formatSummary, isValidOutputFormat } from "./formatters.js";
import { loadCatalogs, shouldLoadBuiltin, watchOutput } from "./shared.js";

import type { CatalogSetup } from "./shared.js";

/**
 * Fail the run: report on stderr and set a non-zero exit code.
 * The process is left to exit on its own so stdout is flushed.
 */
function fail(error: unknown): void {
  console.error(formatError(error instanceof Error ? error : new Error(String(error))));
  process.exitCode = 1;
}

/**
 * Configure logging, read configuration and load catalogs
 */
async function setup(options: Record<string, unknown>): Promise<CatalogSetup | undefined> {
  const isQuiet = Boolean(options["quiet"]);
  const isVerbose = Boolean(options["verbose"]);

  const configResult = loadConfig({
    configPath: typeof options["config"] === "string" ? options["config"] : undefined,
  });
  if (!configResult.success) {
    fail(configResult.error);
    return undefined;
  }
  const config = configResult.data;

  if (isQuiet) {
    logger.configure({ level: "error" });
  } else if (isVerbose) {
    logger.configure({ level: "debug" });
  } else if (config.logLevel !== undefined) {
    logger.configure({ level: config.logLevel });
  }

  if (config.configFile !== undefined) {
    logger.debug(`Using config file: ${config.configFile}`);
  }

  const catalogPaths = [
    ...parseList(typeof options["catalogs"] === "string" ? options["catalogs"] : undefined),
    ...config.catalogs,
  ];
  // Commander sets builtin=false for --no-builtin
  const includeBuiltin = shouldLoadBuiltin(catalogPaths, config.builtin, options["builtin"] !== false);

  const loaded = await loadCatalogs(catalogPaths, includeBuiltin);
  if (!loaded.success) {
    fail(loaded.error);
    return undefined;
  }
  return loaded.data;
}

const program = new Command();

program
  .name("docpp")
  .description("Expand @CLASS_KIND@ directives in documentation sources")
  .version(VERSION);

program
  .command("expand [files...]", { isDefault: true })
  .description("Expand directives in the given files (standard input when none or '-') to standard output")
  .option("-c, --catalogs <paths>", "Catalog files or directories (comma-separated)")
  .option("--config <file>", "Configuration file")
  .option("--no-builtin", "Do not load the built-in catalogs")
  .option("-v, --verbose", "Verbose output")
  .option("-q, --quiet", "Quiet mode (errors only)")
  .action(async (files: string[], options: Record<string, unknown>) => {
    const catalogs = await setup(options);
    if (catalogs === undefined) {
      return;
    }

    const resolver = new DirectiveResolver(catalogs.registry);
    // Output errors are reported here; a run they abort rethrows the same error
    watchOutput(process.stdout, fail);
    try {
      const summary = await preprocessFiles(resolver, files, process.stdout);
      if (Boolean(options["verbose"])) {
        logger.success(formatSummary(summary));
      }
    } catch (error) {
      if (error !== process.stdout.errored) {
        fail(error);
      }
    }
  });

program
  .command("list")
  .description("List directive classes and the directives they answer to")
  .option("-o, --output <format>", "Output format: terminal, json", "terminal")
  .option("-c, --catalogs <paths>", "Catalog files or directories (comma-separated)")
  .option("--config <file>", "Configuration file")
  .option("--no-builtin", "Do not load the built-in catalogs")
  .option("-v, --verbose", "Verbose output")
  .option("-q, --quiet", "Quiet mode (errors only)")
  .action(async (options: Record<string, unknown>) => {
    const outputFormat = String(options["output"] ?? "terminal");
    if (!isValidOutputFormat(outputFormat)) {
      fail(new Error(`Invalid output format: ${outputFormat}. Use: terminal, json`));
      return;
    }

    const catalogs = await setup(options);
    if (catalogs === undefined) {
      return;
    }

    console.log(formatCatalogs(catalogs.store.list(), outputFormat));
  });

await program.parseAsync();
