/**
 * Shared CLI utilities
 */

import { existsSync } from "fs";
import { dirname, resolve } from "path";
import { fileURLToPath } from "url";

import { createCatalogStore } from "../catalogs/store/catalog-store.js";
import { DirectiveRegistry } from "../directives/registry.js";
import { logger } from "../lib/logger.js";
import { ok } from "../lib/result.js";

import type { Writable } from "stream";
import type { CatalogStore } from "../catalogs/store/catalog-store.js";
import type { ValidationError } from "../lib/errors.js";
import type { Result } from "../lib/result.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Get the path to built-in catalog definitions.
 * Tries multiple locations to support both development and production.
 */
export function getDefinitionsPath(): string {
  const candidates = [
    resolve(__dirname, "../catalogs/definitions"),
    resolve(__dirname, "../../src/catalogs/definitions"),
    resolve(process.cwd(), "src/catalogs/definitions"),
  ];

  for (const candidate of candidates) {
    if (existsSync(candidate)) {
      return candidate;
    }
  }

  // Nonexistent: loading reports the path
  return resolve(__dirname, "../catalogs/definitions");
}

/**
 * Whether the built-in catalogs are loaded.
 *
 * `--no-builtin` always skips them and an explicit `builtin` in the config
 * file decides next. Otherwise they stand in for user catalogs and are
 * loaded only when no catalog paths are given.
 */
export function shouldLoadBuiltin(
  catalogPaths: readonly string[],
  configured: boolean | undefined,
  enabledByFlag: boolean
): boolean {
  if (!enabledByFlag) {
    return false;
  }
  return configured ?? catalogPaths.length === 0;
}

export interface CatalogSetup {
  store: CatalogStore;
  registry: DirectiveRegistry;
}

/**
 * Load catalogs from the given paths (built-ins first when requested) and
 * register them as directive classes
 */
export async function loadCatalogs(
  paths: readonly string[],
  includeBuiltin: boolean
): Promise<Result<CatalogSetup, ValidationError>> {
  const store = createCatalogStore();
  const targets = includeBuiltin ? [getDefinitionsPath(), ...paths] : [...paths];

  for (const target of targets) {
    logger.debug(`Loading catalogs from: ${target}`);
    const loaded = await store.loadPath(target);
    if (!loaded.success) {
      return loaded;
    }
  }

  const registry = store.registerAll(new DirectiveRegistry());
  logger.debug(`Registered directive classes: ${registry.classes().join(", ") || "(none)"}`);
  return ok({ store, registry });
}

/**
 * Report the first error of an output stream (EPIPE when the reader goes
 * away). Returns a function that stops watching.
 */
export function watchOutput(output: Writable, onError: (error: Error) => void): () => void {
  let reported = false;
  const listener = (error: Error): void => {
    if (!reported) {
      reported = true;
      onError(error);
    }
  };
  output.on("error", listener);
  return () => {
    output.off("error", listener);
  };
}
