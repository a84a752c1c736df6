import fs from "fs/promises";
import path from "path";

import YAML from "yaml";

import { ValidationError } from "../../lib/errors.js";
import { logger } from "../../lib/logger.js";
import { ok, err, all, tryCatchAsync } from "../../lib/result.js";
import { renderConstants, renderQueryFields } from "../renderers.js";
import { CatalogSchema } from "../schema/index.js";

import type { DirectiveRegistry } from "../../directives/registry.js";
import type { Result } from "../../lib/result.js";
import type { Catalog, CatalogSummary, CatalogType } from "../schema/index.js";

const CATALOG_EXTENSIONS = new Set([".yaml", ".yml"]);

/**
 * Store for catalog definitions, keyed by directive class
 *
 * Provides:
 * - Validation on add and load
 * - Loading from YAML files and directories
 * - Registration of every catalog with a directive registry
 */
export class CatalogStore {
  /** Loaded catalogs by class name */
  private catalogs: Map<string, Catalog> = new Map();

  /** File each catalog was loaded from */
  private origins: Map<string, string> = new Map();

  get size(): number {
    return this.catalogs.size;
  }

  /**
   * Add a catalog. A class can only be defined once.
   */
  add(catalog: Catalog, origin?: string): Result<Catalog, ValidationError> {
    const validation = CatalogSchema.safeParse(catalog);
    if (!validation.success) {
      return err(
        new ValidationError("Invalid catalog", {
          className: catalog.class,
          issues: validation.error.issues,
        })
      );
    }

    const validated = validation.data;
    if (this.catalogs.has(validated.class)) {
      return err(
        new ValidationError(`Catalog for class ${validated.class} is already defined`, {
          className: validated.class,
          existing: this.origins.get(validated.class),
          duplicate: origin,
        })
      );
    }

    this.catalogs.set(validated.class, validated);
    if (origin !== undefined) {
      this.origins.set(validated.class, origin);
    }
    return ok(validated);
  }

  get(className: string): Catalog | undefined {
    return this.catalogs.get(className);
  }

  has(className: string): boolean {
    return this.catalogs.has(className);
  }

  /**
   * Summaries of all catalogs, sorted by class name, optionally of one type
   */
  list(type?: CatalogType): CatalogSummary[] {
    const summaries: CatalogSummary[] = [];
    for (const catalog of this.catalogs.values()) {
      if (type !== undefined && catalog.type !== type) continue;
      summaries.push({
        className: catalog.class,
        type: catalog.type,
        description: catalog.description,
        kinds: Object.keys(catalog.kinds),
      });
    }
    return summaries.sort((a, b) => a.className.localeCompare(b.className));
  }

  /**
   * Load a single catalog from a YAML file
   */
  async loadFromFile(filePath: string): Promise<Result<Catalog, ValidationError>> {
    const result = await tryCatchAsync(async () => {
      const content = await fs.readFile(filePath, "utf-8");
      return YAML.parse(content) as unknown;
    });

    if (!result.success) {
      return err(
        new ValidationError(`Failed to read catalog file: ${filePath}`, {
          filePath,
          cause: result.error.message,
        })
      );
    }

    const validation = CatalogSchema.safeParse(result.data);
    if (!validation.success) {
      return err(
        new ValidationError(`Invalid catalog in ${filePath}`, {
          filePath,
          issues: validation.error.issues,
        })
      );
    }

    logger.debug(`Loaded catalog ${validation.data.class} from ${filePath}`);
    return this.add(validation.data, filePath);
  }

  /**
   * Load every YAML catalog under a directory, in path order
   *
   * @returns Number of catalogs loaded
   */
  async loadFromDirectory(dirPath: string): Promise<Result<number, ValidationError>> {
    const files = await tryCatchAsync(() => this.findCatalogFiles(dirPath));
    if (!files.success) {
      return err(
        new ValidationError(`Failed to read catalog directory: ${dirPath}`, {
          dirPath,
          cause: files.error.message,
        })
      );
    }

    const results: Result<Catalog, ValidationError>[] = [];
    for (const file of files.data) {
      const loaded = await this.loadFromFile(file);
      results.push(loaded);
      if (!loaded.success) break;
    }

    const combined = all(results);
    if (!combined.success) {
      return combined;
    }
    return ok(combined.data.length);
  }

  /**
   * Load a file or a directory of catalogs
   *
   * @returns Number of catalogs loaded
   */
  async loadPath(target: string): Promise<Result<number, ValidationError>> {
    const stat = await tryCatchAsync(() => fs.stat(target));
    if (!stat.success) {
      return err(
        new ValidationError(`Catalog path not found: ${target}`, {
          path: target,
          cause: stat.error.message,
        })
      );
    }

    if (stat.data.isDirectory()) {
      return this.loadFromDirectory(target);
    }

    const loaded = await this.loadFromFile(target);
    return loaded.success ? ok(1) : loaded;
  }

  /**
   * Register every catalog as a directive class
   */
  registerAll(registry: DirectiveRegistry): DirectiveRegistry {
    for (const catalog of this.catalogs.values()) {
      switch (catalog.type) {
        case "constants":
          registry.register(catalog.class, catalog.kinds, renderConstants);
          break;
        case "query-fields":
          registry.register(catalog.class, catalog.kinds, renderQueryFields);
          break;
      }
    }
    return registry;
  }

  clear(): void {
    this.catalogs.clear();
    this.origins.clear();
  }

  private async findCatalogFiles(dirPath: string): Promise<string[]> {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    const files: string[] = [];

    for (const entry of entries) {
      const fullPath = path.join(dirPath, entry.name);
      if (entry.isDirectory()) {
        files.push(...(await this.findCatalogFiles(fullPath)));
      } else if (entry.isFile() && CATALOG_EXTENSIONS.has(path.extname(entry.name))) {
        files.push(fullPath);
      }
    }

    return files.sort();
  }
}

/**
 * Create a new empty catalog store
 */
export function createCatalogStore(): CatalogStore {
  return new CatalogStore();
}
