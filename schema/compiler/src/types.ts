/**
 * Resolved Schema Types
 *
 * The fully-resolved model handed to emitters. Every value here is
 * populated: inferred keys, pivot names and column orders are filled in
 * and nothing is left for an emitter to guess.
 */

import type { ResolutionError } from "../../validation-errors.js";

export type { RelationshipKind } from "./config-model.js";

export const TEXT_TYPES = ["string", "text", "mediumText", "longText"] as const;

export const INTEGER_TYPES = [
  "tinyInteger",
  "smallInteger",
  "mediumInteger",
  "integer",
  "bigInteger",
] as const;

export const FIELD_TYPES = [
  ...TEXT_TYPES,
  ...INTEGER_TYPES,
  "float",
  "decimal",
  "boolean",
  "date",
  "dateTime",
  "timestamp",
  "json",
  "uuid",
  "enum",
  "binary",
  "inet",
] as const;

export type FieldType = (typeof FIELD_TYPES)[number];
export type TextFieldType = (typeof TEXT_TYPES)[number] | "binary";
export type IntegerFieldType = (typeof INTEGER_TYPES)[number];
export type PlainFieldType =
  | "boolean"
  | "date"
  | "dateTime"
  | "timestamp"
  | "json"
  | "uuid"
  | "inet";

export type DefaultValue = string | number | boolean | null;

/** Where a field came from: the document, or synthesized by the resolver */
export type FieldOrigin = "declared" | "inferred";

/** A named validation rule with its arguments (`max:50` is `{rule: "max", parameters: ["50"]}`) */
export interface ValidationRule {
  readonly rule: string;
  readonly parameters: readonly string[];
}

export interface EnumValue {
  readonly value: string;
  readonly label: string;
}

interface FieldBase {
  readonly name: string;
  readonly nullable: boolean;
  readonly unique: boolean;
  readonly index: boolean;
  readonly primary: boolean;
  /** `null` when no default is declared; `{ value: null }` for an explicit null default */
  readonly default: { readonly value: DefaultValue } | null;
  readonly comment: string | null;
  readonly cast: string | null;
  readonly morphName: string | null;
  readonly validationRules: readonly ValidationRule[];
  readonly origin: FieldOrigin;
}

export interface TextField extends FieldBase {
  readonly type: TextFieldType;
  readonly length: number | null;
}

export interface IntegerField extends FieldBase {
  readonly type: IntegerFieldType;
  readonly unsigned: boolean;
  readonly autoIncrement: boolean;
}

export interface FloatField extends FieldBase {
  readonly type: "float";
  readonly unsigned: boolean;
}

export interface DecimalField extends FieldBase {
  readonly type: "decimal";
  readonly precision: number;
  readonly scale: number;
  readonly unsigned: boolean;
}

export interface EnumField extends FieldBase {
  readonly type: "enum";
  readonly values: readonly EnumValue[];
}

export interface PlainField extends FieldBase {
  readonly type: PlainFieldType;
}

export type Field =
  | TextField
  | IntegerField
  | FloatField
  | DecimalField
  | EnumField
  | PlainField;

export type CascadePolicy = "cascade" | "restrict" | "set-null" | "none";

interface RelationshipBase {
  /** Accessor name on the owning entity */
  readonly name: string;
  readonly owner: string;
}

interface CascadeRules {
  readonly onDelete: CascadePolicy;
  readonly onUpdate: CascadePolicy;
}

/** Owner holds `foreignKey`, pointing at `localKey` on the target */
export interface BelongsToRelationship extends RelationshipBase, CascadeRules {
  readonly kind: "belongsTo";
  readonly target: string;
  readonly foreignKey: string;
  readonly localKey: string;
}

/** Target holds `foreignKey`, pointing at `localKey` on the owner */
export interface HasRelationship extends RelationshipBase, CascadeRules {
  readonly kind: "hasOne" | "hasMany";
  readonly target: string;
  readonly foreignKey: string;
  readonly localKey: string;
}

export interface BelongsToManyRelationship extends RelationshipBase, CascadeRules {
  readonly kind: "belongsToMany";
  readonly target: string;
  readonly pivot: string;
  /** Pivot column referencing the owner */
  readonly foreignPivotKey: string;
  /** Pivot column referencing the target */
  readonly relatedPivotKey: string;
  readonly pivotFields: readonly string[];
}

/** Owner carries a `{type, id}` pair; the concrete target varies per record */
export interface MorphToRelationship extends RelationshipBase {
  readonly kind: "morphTo";
  readonly morphName: string;
  readonly typeColumn: string;
  readonly idColumn: string;
}

export interface MorphInboundRelationship extends RelationshipBase {
  readonly kind: "morphOne" | "morphMany";
  readonly target: string;
  readonly morphName: string;
  readonly typeColumn: string;
  readonly idColumn: string;
  readonly localKey: string;
}

export interface MorphToManyRelationship extends RelationshipBase {
  readonly kind: "morphToMany";
  readonly target: string;
  readonly morphName: string;
  readonly pivot: string;
  readonly relatedPivotKey: string;
  readonly pivotFields: readonly string[];
}

export type Relationship =
  | BelongsToRelationship
  | HasRelationship
  | BelongsToManyRelationship
  | MorphToRelationship
  | MorphInboundRelationship
  | MorphToManyRelationship;

export interface PrimaryKey {
  readonly name: string;
  readonly type: FieldType;
}

/** Which fields accept mass assignment */
export type FillableGuarded =
  | { readonly kind: "all" }
  | { readonly kind: "fillable"; readonly fields: readonly string[] }
  | { readonly kind: "guarded"; readonly fields: readonly string[] };

export interface Entity {
  readonly name: string;
  readonly table: string;
  readonly primaryKey: PrimaryKey;
  readonly fields: readonly Field[];
  readonly relationships: readonly Relationship[];
  readonly timestamps: boolean;
  readonly softDeletes: boolean;
  readonly traits: readonly string[];
  /** Rules that span several fields */
  readonly validationRules: readonly ValidationRule[];
  readonly fillableGuarded: FillableGuarded;
}

export interface PivotSide {
  readonly entity: string;
  readonly key: string;
}

export type PivotOrigin = "declared" | "inferred";

interface PivotBase {
  readonly name: string;
  readonly timestamps: boolean;
  /** Extra columns beyond the keys, in declaration order */
  readonly fields: readonly Field[];
  readonly origin: PivotOrigin;
  /** Relationships resolved through this pivot (`Post.tags`) */
  readonly usedBy: readonly string[];
}

/** Join table between two entities; `sides` is the column order */
export interface StandardPivot extends PivotBase {
  readonly kind: "standard";
  readonly sides: readonly [PivotSide, PivotSide];
}

/** Join table between one entity and any morphable owner */
export interface MorphPivot extends PivotBase {
  readonly kind: "morph";
  readonly morphName: string;
  readonly related: PivotSide;
  readonly morphKey: string;
  readonly morphType: string;
  readonly morphedBy: readonly string[];
}

export type Pivot = StandardPivot | MorphPivot;

export type EmissionStep =
  | { readonly kind: "entity"; readonly name: string }
  | { readonly kind: "pivot"; readonly name: string };

export interface GenerationOptions {
  readonly outputDir: string;
  readonly namespace: string;
  readonly generateModels: boolean;
  readonly generateControllers: boolean;
  readonly generateResources: boolean;
  readonly generateFactories: boolean;
  readonly generateMigrations: boolean;
  readonly generatePivotTables: boolean;
  readonly generateValidationRules: boolean;
  readonly generateDto: boolean;
  readonly useDddStructure: boolean;
  readonly databaseEngine: string;
  readonly forceOverwrite: boolean;
}

/**
 * Terminal artifact: entities and pivots in dependency-safe emission order.
 */
export interface ResolvedSchema {
  readonly entities: readonly Entity[];
  readonly pivots: readonly Pivot[];
  readonly order: readonly EmissionStep[];
  readonly options: GenerationOptions;
}

export type ResolutionResult =
  | {
      ok: true;
      schema: ResolvedSchema;
      warnings: ResolutionError[];
    }
  | {
      ok: false;
      errors: ResolutionError[];
      warnings: ResolutionError[];
    };

export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; errors: ResolutionError[] };
