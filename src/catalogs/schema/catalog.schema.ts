import { z } from "zod";

/**
 * Catalog types with a built-in renderer
 */
export const CatalogTypeSchema = z.enum(["constants", "query-fields"]);

/**
 * Data kinds of a query field
 */
export const FieldKindSchema = z.enum([
  "text",
  "number",
  "bool",
  "timestamp",
  "unit",
  "other",
]);

/**
 * Directive class names: uppercase with underscores, not ending in one
 */
const CLASS_NAME_PATTERN = /^[A-Z](?:[A-Z_]*[A-Z])?$/;

/**
 * Kind keys: the lower-cased kind token of a directive
 */
const KIND_KEY_PATTERN = /^[a-z]+$/;

/**
 * Constant names as they appear in code
 */
const CONSTANT_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Query field names, e.g. `name`, `disk.size/0`, `nic.mac/1`
 */
const FIELD_NAME_PATTERN = /^[a-z][a-z0-9_./]*$/;

export const ClassNameSchema = z
  .string()
  .regex(CLASS_NAME_PATTERN, "Class name must be uppercase letters and underscores, not ending in an underscore");

export const KindKeySchema = z
  .string()
  .regex(KIND_KEY_PATTERN, "Kind must contain only lowercase letters");

/**
 * A documented constant
 */
export const ConstantSchema = z.object({
  /** Constant name */
  name: z.string().regex(CONSTANT_NAME_PATTERN, "Invalid constant name"),

  /** Constant value */
  value: z.union([z.string(), z.number(), z.boolean()]),

  /** One-line description */
  doc: z.string().min(1).optional(),
});

/**
 * A field that can be requested from a query
 */
export const QueryFieldSchema = z.object({
  /** Field name used in queries */
  name: z.string().regex(FIELD_NAME_PATTERN, "Invalid field name"),

  /** Column title */
  title: z.string().min(1, "Title is required"),

  /** Value kind */
  kind: FieldKindSchema,

  /** One-line description */
  doc: z.string().min(1, "Doc is required"),
});

const CatalogBaseSchema = z.object({
  /** Directive class this catalog answers to */
  class: ClassNameSchema,

  /** Human-readable description */
  description: z.string().optional(),
});

function kindTable<T extends z.ZodTypeAny>(entry: T) {
  return z
    .record(KindKeySchema, z.array(entry))
    .refine((kinds) => Object.keys(kinds).length > 0, "At least one kind is required");
}

export const ConstantsCatalogSchema = CatalogBaseSchema.extend({
  type: z.literal("constants"),
  kinds: kindTable(ConstantSchema),
});

export const QueryFieldsCatalogSchema = CatalogBaseSchema.extend({
  type: z.literal("query-fields"),
  kinds: kindTable(QueryFieldSchema),
});

/**
 * Schema for a catalog definition file
 */
export const CatalogSchema = z.discriminatedUnion("type", [
  ConstantsCatalogSchema,
  QueryFieldsCatalogSchema,
]);

export type CatalogType = z.infer<typeof CatalogTypeSchema>;
export type FieldKind = z.infer<typeof FieldKindSchema>;
export type Constant = z.infer<typeof ConstantSchema>;
export type QueryField = z.infer<typeof QueryFieldSchema>;
export type ConstantsCatalog = z.infer<typeof ConstantsCatalogSchema>;
export type QueryFieldsCatalog = z.infer<typeof QueryFieldsCatalogSchema>;
export type Catalog = z.infer<typeof CatalogSchema>;

/**
 * Summary of a catalog for listings
 */
export interface CatalogSummary {
  className: string;
  type: CatalogType;
  description?: string;
  kinds: string[];
}

export const CATALOG_TYPES = CatalogTypeSchema.options;
export const FIELD_KINDS = FieldKindSchema.options;
