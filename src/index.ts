/**
 * docpp - expands `@CLASS_KIND@` directives in documentation sources
 *
 * @packageDocumentation
 */

// Directives
export {
  matchDirective,
  isDirective,
  stripTerminator,
  formatDirective,
  DirectiveRegistry,
  DirectiveResolver,
  TableSource,
} from "./directives/index.js";

export type {
  Directive,
  RenderableSource,
  RenderFunction,
  DataSource,
} from "./directives/index.js";

// Preprocessing
export {
  Preprocessor,
  preprocessFiles,
  LineSplitter,
  splitLines,
  textLines,
  readSourceLines,
  STDIN_SOURCE,
} from "./preprocessor/index.js";

export type { PreprocessorState, ProcessSummary, SourceLine } from "./preprocessor/index.js";

// Catalogs
export {
  CatalogSchema,
  ConstantsCatalogSchema,
  QueryFieldsCatalogSchema,
  ConstantSchema,
  QueryFieldSchema,
  CATALOG_TYPES,
  FIELD_KINDS,
  CatalogStore,
  createCatalogStore,
  renderConstants,
  renderQueryFields,
  renderDefinitionList,
  compareNatural,
  niceSort,
} from "./catalogs/index.js";

export type {
  Catalog,
  CatalogSummary,
  CatalogType,
  Constant,
  ConstantsCatalog,
  FieldKind,
  QueryField,
  QueryFieldsCatalog,
} from "./catalogs/index.js";

// Library utilities
export {
  // Errors
  DocppError,
  ValidationError,
  ConfigError,
  UnknownClassError,
  UnknownKindError,
  RenderError,
  InputIOError,
  // Result
  ok,
  err,
  unwrap,
  unwrapOr,
  tryCatch,
  tryCatchAsync,
  // Logger
  logger,
} from "./lib/index.js";

export type { Result, LogLevel, SourceLocation } from "./lib/index.js";

export { VERSION } from "./version.js";
