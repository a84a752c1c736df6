// Schema exports
export {
  CatalogTypeSchema,
  FieldKindSchema,
  ClassNameSchema,
  KindKeySchema,
  ConstantSchema,
  QueryFieldSchema,
  ConstantsCatalogSchema,
  QueryFieldsCatalogSchema,
  CatalogSchema,
  CATALOG_TYPES,
  FIELD_KINDS,
} from "./schema/index.js";

export type {
  CatalogType,
  FieldKind,
  Constant,
  QueryField,
  ConstantsCatalog,
  QueryFieldsCatalog,
  Catalog,
  CatalogSummary,
} from "./schema/index.js";

// Renderers
export {
  renderConstants,
  renderQueryFields,
  renderDefinitionList,
  compareNatural,
  niceSort,
} from "./renderers.js";

// Store
export { CatalogStore, createCatalogStore } from "./store/catalog-store.js";
