/**
 * Configuration Model
 *
 * Structural shape of a raw schema document. Nothing here is defaulted:
 * an optional key is either present or absent, so later stages can tell
 * "not specified" apart from "specified as the default".
 */

import { z } from "zod";

export const RELATIONSHIP_KINDS = [
  "belongsTo",
  "hasOne",
  "hasMany",
  "belongsToMany",
  "morphTo",
  "morphOne",
  "morphMany",
  "morphToMany",
] as const;

export type RelationshipKind = (typeof RELATIONSHIP_KINDS)[number];

export const RawDefaultSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.null(),
]);

export const RawEnumValueSchema = z.union([
  z.string(),
  z.object({
    value: z.string(),
    label: z.string().optional(),
  }),
]);

export const RawValidationRuleSchema = z.object({
  rule: z.string().min(1, "Validation rule name cannot be empty"),
  parameters: z.array(z.union([z.string(), z.number()])).optional(),
});

/** `all`, `{fillable: [...]}` or `{guarded: [...]}`; the capitalized spellings are accepted too */
export const RawFillableGuardedSchema = z.union([
  z.enum(["all", "All"]),
  z.object({ fillable: z.array(z.string()) }).strict(),
  z.object({ Fillable: z.array(z.string()) }).strict(),
  z.object({ guarded: z.array(z.string()) }).strict(),
  z.object({ Guarded: z.array(z.string()) }).strict(),
]);

export const RawFieldSchema = z.object({
  name: z.string(),
  /** Logical type; checked against the closed type set by the field resolver */
  type: z.string(),
  nullable: z.boolean().optional(),
  unique: z.boolean().optional(),
  index: z.boolean().optional(),
  unsigned: z.boolean().optional(),
  primary: z.boolean().optional(),
  autoIncrement: z.boolean().optional(),
  length: z.number().int().nonnegative().optional(),
  precision: z.number().int().nonnegative().optional(),
  scale: z.number().int().nonnegative().optional(),
  decimalPrecision: z
    .object({
      precision: z.number().int().nonnegative().optional(),
      scale: z.number().int().nonnegative().optional(),
    })
    .optional(),
  default: RawDefaultSchema.optional(),
  comment: z.string().optional(),
  enumValues: z.array(RawEnumValueSchema).optional(),
  castType: z.string().optional(),
  /** Marks this column as the id half of a morphTo pair */
  morphName: z.string().optional(),
  validationRules: z.array(RawValidationRuleSchema).optional(),
});

const relationshipCommon = {
  /** Accessor name override */
  name: z.string().optional(),
};

const cascade = {
  onDelete: z.string().optional(),
  onUpdate: z.string().optional(),
};

const BelongsToSchema = z.object({
  type: z.literal("belongsTo"),
  model: z.string(),
  foreignKey: z.string().optional(),
  localKey: z.string().optional(),
  ...relationshipCommon,
  ...cascade,
});

const HasOneSchema = z.object({
  type: z.literal("hasOne"),
  model: z.string(),
  foreignKey: z.string().optional(),
  localKey: z.string().optional(),
  ...relationshipCommon,
  ...cascade,
});

const HasManySchema = HasOneSchema.extend({ type: z.literal("hasMany") });

const BelongsToManySchema = z.object({
  type: z.literal("belongsToMany"),
  model: z.string(),
  pivotTable: z.string().optional(),
  foreignPivotKey: z.string().optional(),
  relatedPivotKey: z.string().optional(),
  pivotFields: z.array(z.string()).optional(),
  withTimestamps: z.boolean().optional(),
  ...relationshipCommon,
  ...cascade,
});

const MorphToSchema = z.object({
  type: z.literal("morphTo"),
  morphName: z.string().optional(),
  ...relationshipCommon,
});

const MorphOneSchema = z.object({
  type: z.literal("morphOne"),
  model: z.string(),
  morphName: z.string().optional(),
  localKey: z.string().optional(),
  ...relationshipCommon,
});

const MorphManySchema = MorphOneSchema.extend({ type: z.literal("morphMany") });

const MorphToManySchema = z.object({
  type: z.literal("morphToMany"),
  model: z.string(),
  morphName: z.string().optional(),
  pivotTable: z.string().optional(),
  relatedPivotKey: z.string().optional(),
  pivotFields: z.array(z.string()).optional(),
  withTimestamps: z.boolean().optional(),
  ...relationshipCommon,
});

export const RawRelationshipSchema = z.discriminatedUnion("type", [
  BelongsToSchema,
  HasOneSchema,
  HasManySchema,
  BelongsToManySchema,
  MorphToSchema,
  MorphOneSchema,
  MorphManySchema,
  MorphToManySchema,
]);

export const RawPivotSchema = z.object({
  name: z.string(),
  model1: z.string(),
  model2: z.string(),
  foreignKey1: z.string(),
  foreignKey2: z.string(),
  timestamps: z.boolean().optional(),
  additionalFields: z.array(RawFieldSchema).optional(),
});

export const RawEntitySchema = z.object({
  name: z.string(),
  table: z.string().optional(),
  fields: z.array(RawFieldSchema).optional(),
  relationships: z.array(RawRelationshipSchema).optional(),
  timestamps: z.boolean().optional(),
  softDeletes: z.boolean().optional(),
  traits: z.array(z.string()).optional(),
  pivotTables: z.array(RawPivotSchema).optional(),
  validationRules: z.array(RawValidationRuleSchema).optional(),
  fillableGuarded: RawFillableGuardedSchema.optional(),
});

export const RawOptionsSchema = z.object({
  outputDir: z.string().optional(),
  namespace: z.string().optional(),
  generateModels: z.boolean().optional(),
  generateControllers: z.boolean().optional(),
  generateResources: z.boolean().optional(),
  generateFactories: z.boolean().optional(),
  generateMigrations: z.boolean().optional(),
  generatePivotTables: z.boolean().optional(),
  generateValidationRules: z.boolean().optional(),
  generateDto: z.boolean().optional(),
  useDddStructure: z.boolean().optional(),
  databaseEngine: z.string().optional(),
  forceOverwrite: z.boolean().optional(),
});

export const RawDocumentSchema = RawOptionsSchema.extend({
  entities: z.array(RawEntitySchema).optional(),
  models: z.array(RawEntitySchema).optional(),
  pivotTables: z.array(RawPivotSchema).optional(),
}).superRefine((doc, ctx) => {
  if (doc.entities === undefined && doc.models === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["entities"],
      message: 'Required: a list of entity declarations under "entities" (or "models")',
    });
  }
});

export type RawEnumValue = z.infer<typeof RawEnumValueSchema>;
export type RawValidationRule = z.infer<typeof RawValidationRuleSchema>;
export type RawFillableGuarded = z.infer<typeof RawFillableGuardedSchema>;
export type RawDefault = z.infer<typeof RawDefaultSchema>;
export type RawField = z.infer<typeof RawFieldSchema>;
export type RawRelationship = z.infer<typeof RawRelationshipSchema>;
export type RawPivot = z.infer<typeof RawPivotSchema>;
export type RawEntity = z.infer<typeof RawEntitySchema>;
export type RawOptions = z.infer<typeof RawOptionsSchema>;
export type RawDocument = z.infer<typeof RawDocumentSchema>;

/**
 * Normalized raw schema handed to the resolver.
 */
export interface RawSchema {
  entities: RawEntity[];
  /** Top-level declarations first, then per-entity ones in entity order */
  pivotTables: RawPivot[];
  options: RawOptions;
  /** Key the entity list was read from, for error paths */
  entityKey: "entities" | "models";
}
