import { RenderError, UnknownClassError, UnknownKindError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";

import type { SourceLocation } from "../lib/errors.js";
import type { Directive } from "./matcher.js";

/**
 * A data source that renders the record set of one kind into lines
 */
export interface RenderableSource {
  /** Whether `kind` (lower-cased) is a key of this source */
  hasKind(kind: string): boolean;
  /** Known kinds, in declaration order */
  kinds(): string[];
  /**
   * Render the record set for `kind`. The sequence is finite and its order
   * stable; a throw, here or during iteration, is a render failure.
   */
  render(kind: string): Iterable<string>;
}

/**
 * Turns a record set into output lines
 */
export type RenderFunction<T> = (records: T) => Iterable<string>;

/**
 * Kind-keyed record sets, as a Map or a plain object
 */
export type DataSource<T> = ReadonlyMap<string, T> | Readonly<Record<string, T>>;

function isMap<T>(data: DataSource<T>): data is ReadonlyMap<string, T> {
  return data instanceof Map;
}

/**
 * RenderableSource over a kind-keyed table and a render function
 */
export class TableSource<T> implements RenderableSource {
  private readonly table: ReadonlyMap<string, { records: T }>;

  constructor(
    data: DataSource<T>,
    private readonly renderFn: RenderFunction<T>
  ) {
    const entries: [string, T][] = isMap(data) ? [...data.entries()] : Object.entries(data);
    this.table = new Map(entries.map(([kind, records]) => [kind, { records }]));
  }

  hasKind(kind: string): boolean {
    return this.table.has(kind);
  }

  kinds(): string[] {
    return [...this.table.keys()];
  }

  render(kind: string): Iterable<string> {
    const entry = this.table.get(kind);
    if (entry === undefined) {
      throw new Error(`No record set for kind '${kind}'`);
    }
    return this.renderFn(entry.records);
  }
}

/**
 * Class name to data source configuration.
 *
 * Built once at start-up, then handed to a {@link DirectiveResolver}.
 *
 * @example
 * ```typescript
 * const registry = new DirectiveRegistry();
 * registry.register("CONSTANTS", { doc: ["# Constants", "FOO = 1"] }, (lines) => lines);
 *
 * const resolver = new DirectiveResolver(registry);
 * [...resolver.resolveAndRender("CONSTANTS", "doc")]; // ["# Constants", "FOO = 1"]
 * ```
 */
export class DirectiveRegistry {
  private readonly entries: Map<string, RenderableSource> = new Map();

  get size(): number {
    return this.entries.size;
  }

  /**
   * Register a kind-keyed data source with its render function
   */
  register<T>(className: string, dataSource: DataSource<T>, renderFn: RenderFunction<T>): this {
    return this.registerSource(className, new TableSource(dataSource, renderFn));
  }

  /**
   * Register a renderable source. Re-registering a class replaces it.
   */
  registerSource(className: string, source: RenderableSource): this {
    if (this.entries.has(className)) {
      logger.debug(`Replacing directive class ${className}`);
    }
    this.entries.set(className, source);
    return this;
  }

  has(className: string): boolean {
    return this.entries.has(className);
  }

  get(className: string): RenderableSource | undefined {
    return this.entries.get(className);
  }

  /**
   * Registered class names, sorted
   */
  classes(): string[] {
    return [...this.entries.keys()].sort();
  }

  /**
   * Copy of the current entries
   */
  snapshot(): ReadonlyMap<string, RenderableSource> {
    return new Map(this.entries);
  }
}

/**
 * Resolves directives against a fixed snapshot of a registry
 */
export class DirectiveResolver {
  private readonly entries: ReadonlyMap<string, RenderableSource>;

  constructor(registry: DirectiveRegistry) {
    this.entries = registry.snapshot();
  }

  /**
   * Look up class and kind, then render.
   *
   * Class and kind are checked before anything is produced; the returned
   * iterable yields the source's lines unchanged and in order.
   *
   * @throws UnknownClassError when the class is not registered
   * @throws UnknownKindError when the kind is not in the class's source
   */
  resolveAndRender(className: string, kindKey: string, location?: SourceLocation): Iterable<string> {
    const source = this.entries.get(className);
    if (source === undefined) {
      throw new UnknownClassError(className, location);
    }
    if (!source.hasKind(kindKey)) {
      throw new UnknownKindError(className, kindKey, location);
    }
    return guardRender(source, className, kindKey, location);
  }

  /**
   * Resolve a matched directive
   */
  render(directive: Directive, location?: SourceLocation): Iterable<string> {
    return this.resolveAndRender(directive.className, directive.kindKey, location);
  }
}

function* guardRender(
  source: RenderableSource,
  className: string,
  kindKey: string,
  location?: SourceLocation
): Generator<string, void, undefined> {
  try {
    yield* source.render(kindKey);
  } catch (cause) {
    throw new RenderError(className, kindKey, cause, location);
  }
}
