import chalk from "chalk";

import { formatDirective } from "../directives/matcher.js";
import { DocppError } from "../lib/errors.js";

import type { CatalogSummary } from "../catalogs/schema/index.js";
import type { ProcessSummary } from "../preprocessor/driver.js";

/**
 * Output format types for listings
 */
export type OutputFormat = "terminal" | "json";

/**
 * Type colors for terminal output
 */
const TYPE_COLORS: Record<CatalogSummary["type"], typeof chalk> = {
  constants: chalk.blue,
  "query-fields": chalk.magenta,
};

/**
 * Format catalog list for terminal output with colors
 */
export function formatTerminal(catalogs: CatalogSummary[]): string {
  if (catalogs.length === 0) {
    return chalk.yellow("No directive classes registered.");
  }

  const lines: string[] = [];
  lines.push(chalk.bold.underline(`${catalogs.length} directive classes:`));

  for (const catalog of catalogs) {
    const typeColor = TYPE_COLORS[catalog.type];
    lines.push("");
    lines.push(`${chalk.white.bold(catalog.className)} ${typeColor(`[${catalog.type}]`)}`);
    if (catalog.description !== undefined) {
      lines.push(chalk.gray(`  ${catalog.description}`));
    }
    for (const kind of catalog.kinds) {
      lines.push(`  ${chalk.cyan(formatDirective(catalog.className, kind))}`);
    }
  }

  return lines.join("\n");
}

/**
 * Format catalog list as JSON, each kind with its directive marker
 */
export function formatJson(catalogs: CatalogSummary[]): string {
  return JSON.stringify(
    catalogs.map((catalog) => ({
      ...catalog,
      directives: catalog.kinds.map((kind) => formatDirective(catalog.className, kind)),
    })),
    null,
    2
  );
}

/**
 * Format catalogs in the specified output format
 */
export function formatCatalogs(catalogs: CatalogSummary[], format: OutputFormat): string {
  switch (format) {
    case "json":
      return formatJson(catalogs);
    case "terminal":
    default:
      return formatTerminal(catalogs);
  }
}

/**
 * Validate output format string
 */
export function isValidOutputFormat(format: string): format is OutputFormat {
  return ["terminal", "json"].includes(format);
}

/**
 * Format an error for terminal output, with its code when it has one
 */
export function formatError(error: Error): string {
  if (error instanceof DocppError) {
    return chalk.red(`Error [${error.code}]: ${error.message}`);
  }
  return chalk.red(`Error: ${error.message}`);
}

/**
 * One-line run summary
 */
export function formatSummary(summary: ProcessSummary): string {
  const sources = summary.sources.length === 1 ? "1 source" : `${summary.sources.length} sources`;
  return `${summary.linesRead} lines from ${sources}, ${summary.directivesExpanded} directives expanded`;
}
