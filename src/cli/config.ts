/**
 * Configuration Management
 *
 * Reads `docpp.config.{yaml,yml,json}` from the working directory (or an
 * explicit path) and merges environment overrides.
 */

import { existsSync, readFileSync } from "fs";
import { dirname, extname, join, resolve } from "path";

import YAML from "yaml";
import { z } from "zod";

import { ConfigError } from "../lib/errors.js";
import { isLogLevel, LOG_LEVEL_NAMES } from "../lib/logger.js";
import { ok, err, tryCatch } from "../lib/result.js";

import type { LogLevel } from "../lib/logger.js";
import type { Result } from "../lib/result.js";

/**
 * Configuration file names, in lookup order
 */
export const CONFIG_FILE_NAMES = ["docpp.config.yaml", "docpp.config.yml", "docpp.config.json"] as const;

/**
 * Catalog paths to add, comma-separated
 */
export const CATALOGS_ENV = "DOCPP_CATALOGS";

/**
 * Log level when no command-line flag selects one
 */
export const LOG_LEVEL_ENV = "DOCPP_LOG_LEVEL";

/**
 * Configuration file schema
 */
const ConfigFileSchema = z.object({
  /** Catalog files or directories, relative to the config file */
  catalogs: z.array(z.string().min(1)).default([]),
  /** Load the built-in catalog definitions; by default only when no catalogs are given */
  builtin: z.boolean().optional(),
  logLevel: z.enum(["debug", "info", "warn", "error", "silent"]).optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Configuration after merging file, environment and defaults
 */
export interface DocppConfig {
  /** Absolute catalog paths, environment entries first */
  catalogs: string[];
  /** Explicit choice from the config file */
  builtin?: boolean;
  logLevel?: LogLevel;
  /** File the configuration was read from, if any */
  configFile?: string;
}

export interface LoadConfigOptions {
  /** Directory searched for a config file; defaults to process.cwd() */
  cwd?: string;
  /** Explicit config file; it must exist */
  configPath?: string;
  /** Environment; defaults to process.env */
  env?: NodeJS.ProcessEnv;
}

/**
 * Find the config file in a directory
 */
export function findConfigFile(cwd: string): string | undefined {
  for (const name of CONFIG_FILE_NAMES) {
    const candidate = join(cwd, name);
    if (existsSync(candidate)) {
      return candidate;
    }
  }
  return undefined;
}

/**
 * Split a comma-separated list, dropping empty entries
 */
export function parseList(value: string | undefined): string[] {
  if (value === undefined) {
    return [];
  }
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function readConfigFile(filePath: string): Result<ConfigFile, ConfigError> {
  const parsed = tryCatch(() => {
    const content = readFileSync(filePath, "utf-8");
    return extname(filePath) === ".json" ? (JSON.parse(content) as unknown) : (YAML.parse(content) as unknown);
  });
  if (!parsed.success) {
    return err(
      new ConfigError(`Cannot read config file ${filePath}: ${parsed.error.message}`, {
        filePath,
      })
    );
  }

  // An empty YAML document parses to null
  const validation = ConfigFileSchema.safeParse(parsed.data ?? {});
  if (!validation.success) {
    return err(
      new ConfigError(`Invalid config file ${filePath}`, {
        filePath,
        issues: validation.error.issues,
      })
    );
  }
  return ok(validation.data);
}

/**
 * Load configuration.
 *
 * Environment values take precedence: `DOCPP_CATALOGS` entries come before
 * the file's catalogs and `DOCPP_LOG_LEVEL` replaces the file's log level.
 */
export function loadConfig(options: LoadConfigOptions = {}): Result<DocppConfig, ConfigError> {
  const cwd = resolve(options.cwd ?? process.cwd());
  const env = options.env ?? process.env;

  let configFile: string | undefined;
  if (options.configPath !== undefined) {
    configFile = resolve(cwd, options.configPath);
    if (!existsSync(configFile)) {
      return err(new ConfigError(`Config file not found: ${configFile}`, { filePath: configFile }));
    }
  } else {
    configFile = findConfigFile(cwd);
  }

  let file: ConfigFile = { catalogs: [] };
  if (configFile !== undefined) {
    const read = readConfigFile(configFile);
    if (!read.success) {
      return read;
    }
    file = read.data;
  }

  const envLevel = env[LOG_LEVEL_ENV];
  if (envLevel !== undefined && envLevel.length > 0 && !isLogLevel(envLevel)) {
    return err(
      new ConfigError(`Invalid ${LOG_LEVEL_ENV}: ${envLevel}. Use: ${LOG_LEVEL_NAMES.join(", ")}`, {
        value: envLevel,
      })
    );
  }

  const baseDir = configFile !== undefined ? dirname(configFile) : cwd;
  const catalogs = [
    ...parseList(env[CATALOGS_ENV]).map((entry) => resolve(cwd, entry)),
    ...file.catalogs.map((entry) => resolve(baseDir, entry)),
  ];

  const config: DocppConfig = { catalogs };
  if (file.builtin !== undefined) {
    config.builtin = file.builtin;
  }
  const logLevel = envLevel !== undefined && isLogLevel(envLevel) ? envLevel : file.logLevel;
  if (logLevel !== undefined) {
    config.logLevel = logLevel;
  }
  if (configFile !== undefined) {
    config.configFile = configFile;
  }
  return ok(config);
}
