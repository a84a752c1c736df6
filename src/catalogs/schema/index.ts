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
} from "./catalog.schema.js";

export type {
  CatalogType,
  FieldKind,
  Constant,
  QueryField,
  ConstantsCatalog,
  QueryFieldsCatalog,
  Catalog,
  CatalogSummary,
} from "./catalog.schema.js";
