/**
 * Schema Validator
 *
 * Final pass over the resolved schema. Checks:
 * - Entity, storage and field name uniqueness
 * - Relationship accessor uniqueness and target existence
 * - Identifier rules and reserved words
 * - Empty entities and unused pivot declarations
 * - Fillable/guarded lists naming real fields
 *
 * Every violation is collected; nothing short-circuits.
 */

import reservedWordData from "./compiler/src/data/reserved-words.json" with { type: "json" };
import type { Entity, Field, Pivot } from "./compiler/src/types.js";
import { suggestName } from "./compiler/src/suggest.js";
import {
  createError,
  createWarning,
  dedupeErrors,
  ErrorCode,
  type ErrorLocation,
  type ResolutionError,
  type ValidationResult,
} from "./validation-errors.js";

const RESERVED_WORDS: ReadonlySet<string> = new Set(reservedWordData.reservedWords);

export const MAX_IDENTIFIER_LENGTH = 64;
export const MAX_TABLE_NAME_LENGTH = 128;

export interface ValidatorOptions {
  /** Accept reserved words as entity and field names */
  allowReservedWords?: boolean;
  /** Check identifier and storage name syntax (default true) */
  validateIdentifiers?: boolean;
  /** Report warnings as errors */
  strict?: boolean;
}

export interface SchemaValidationInput {
  /** Every declared entity in document order, duplicates included */
  entities: readonly Entity[];
  pivots: readonly Pivot[];
  /** Key the entities were declared under, for error paths */
  entityKey?: string;
  /** Entities with declared fields that failed to resolve */
  incomplete?: ReadonlySet<Entity>;
}

export function isReservedWord(name: string): boolean {
  return RESERVED_WORDS.has(name.toLowerCase());
}

export class SchemaValidator {
  constructor(private options: ValidatorOptions = {}) {}

  validate(input: SchemaValidationInput): ValidationResult {
    const errors: ResolutionError[] = [];
    const warnings: ResolutionError[] = [];
    const entityKey = input.entityKey ?? "entities";
    const entityNames = new Set(input.entities.map((entity) => entity.name));

    // Validate names across the schema
    this.validateUniqueness(input, entityKey, errors);

    // Validate entities
    for (const entity of input.entities) {
      const complete = !(input.incomplete?.has(entity) ?? false);
      this.validateEntity(entity, `${entityKey}.${entity.name}`, entityNames, complete, errors);
    }

    // Validate pivots
    for (const pivot of input.pivots) {
      this.validatePivot(pivot, entityNames, errors, warnings);
    }

    const strict = this.options.strict ?? false;
    const finalErrors = dedupeErrors(
      strict ? [...errors, ...warnings.map((w) => ({ ...w, severity: "error" as const }))] : errors
    );
    const finalWarnings = strict ? [] : dedupeErrors(warnings);

    return {
      valid: finalErrors.length === 0,
      errors: finalErrors,
      warnings: finalWarnings,
    };
  }

  private validateUniqueness(
    input: SchemaValidationInput,
    entityKey: string,
    errors: ResolutionError[]
  ): void {
    const counts = new Map<string, number>();
    for (const entity of input.entities) {
      counts.set(entity.name, (counts.get(entity.name) ?? 0) + 1);
    }
    for (const [name, count] of counts) {
      if (count > 1) {
        errors.push(
          createError(
            ErrorCode.DUPLICATE_ENTITY_NAME,
            `Entity "${name}" is declared ${count} times`,
            { path: `${entityKey}.${name}`, entity: name }
          )
        );
      }
    }

    // Storage names are shared by entities and pivots
    const owners = new Map<string, string[]>();
    const claim = (table: string, owner: string) => {
      owners.set(table, [...(owners.get(table) ?? []), owner]);
    };
    for (const entity of input.entities) claim(entity.table, `entity "${entity.name}"`);
    for (const pivot of input.pivots) claim(pivot.name, `pivot "${pivot.name}"`);

    for (const [table, claimedBy] of owners) {
      if (claimedBy.length > 1) {
        errors.push(
          createError(
            ErrorCode.DUPLICATE_TABLE_NAME,
            `Storage name "${table}" is used by ${claimedBy.join(", ")}`,
            { path: `tables.${table}` },
            "Set an explicit table name on one of them"
          )
        );
      }
    }
  }

  private validateEntity(
    entity: Entity,
    basePath: string,
    entityNames: Set<string>,
    complete: boolean,
    errors: ResolutionError[]
  ): void {
    const at: ErrorLocation = { path: basePath, entity: entity.name };

    this.validateIdentifier(entity.name, `Entity name`, at, errors);
    this.validateTableName(entity.table, { ...at, path: `${basePath}.table` }, errors);

    // Check for reserved keywords
    if (!this.options.allowReservedWords && isReservedWord(entity.name)) {
      errors.push(
        createError(
          ErrorCode.RESERVED_WORD,
          `Entity name "${entity.name}" is a reserved keyword`,
          at,
          `Choose a different name like "${entity.name}Entity"`
        )
      );
    }

    // Entity must have fields
    if (complete && entity.fields.length === 0 && !entity.timestamps) {
      errors.push(
        createError(
          ErrorCode.EMPTY_ENTITY,
          `Entity "${entity.name}" must have at least one field or timestamps`,
          { ...at, path: `${basePath}.fields` }
        )
      );
    }

    this.validateFields(entity.fields, `${basePath}.fields`, at, errors);

    if (complete && entity.fillableGuarded.kind !== "all") {
      const { kind } = entity.fillableGuarded;
      const fieldNames = entity.fields.map((field) => field.name);
      for (const name of entity.fillableGuarded.fields) {
        if (fieldNames.includes(name)) continue;
        errors.push(
          createError(
            ErrorCode.UNKNOWN_FIELD,
            `Entity "${entity.name}" lists "${name}" as ${kind} but has no such field`,
            { ...at, path: `${basePath}.fillableGuarded`, field: name },
            suggestName(name, fieldNames, "fields")
          )
        );
      }
    }

    const relationshipNames = new Set<string>();
    for (const relationship of entity.relationships) {
      const relPath = `${basePath}.relationships.${relationship.name}`;
      const relAt: ErrorLocation = { path: relPath, entity: entity.name, relationship: relationship.name };

      this.validateIdentifier(relationship.name, "Relationship name", relAt, errors);

      if (relationshipNames.has(relationship.name)) {
        errors.push(
          createError(
            ErrorCode.DUPLICATE_RELATIONSHIP_NAME,
            `Duplicate relationship name "${relationship.name}" in entity "${entity.name}"`,
            relAt,
            "Give one of them an explicit name"
          )
        );
      }
      relationshipNames.add(relationship.name);

      if (relationship.kind !== "morphTo" && !entityNames.has(relationship.target)) {
        errors.push(
          createError(
            ErrorCode.UNKNOWN_TARGET_ENTITY,
            `Relationship "${relationship.name}" on "${entity.name}" references non-existent entity "${relationship.target}"`,
            relAt,
            suggestName(relationship.target, entityNames, "entities")
          )
        );
      }
    }
  }

  private validateFields(
    fields: readonly Field[],
    basePath: string,
    owner: ErrorLocation,
    errors: ResolutionError[]
  ): void {
    const fieldNames = new Set<string>();
    const ownerName = owner.entity ?? owner.pivot ?? "?";

    for (const field of fields) {
      const at: ErrorLocation = { ...owner, path: `${basePath}.${field.name}`, field: field.name };

      // Check for duplicate field names
      if (fieldNames.has(field.name)) {
        errors.push(
          createError(
            ErrorCode.DUPLICATE_FIELD_NAME,
            `Duplicate field name "${field.name}" in "${ownerName}"`,
            at
          )
        );
      }
      fieldNames.add(field.name);

      if (field.origin === "inferred") continue;

      this.validateIdentifier(field.name, "Field name", at, errors);

      if (field.name === "id" && !field.primary) {
        errors.push(
          createError(
            ErrorCode.RESERVED_FIELD_NAME,
            `Field "id" on "${ownerName}" is the implicit primary key and cannot be declared`,
            at,
            'Remove the field, or mark it "primary: true"'
          )
        );
      }

      if (!this.options.allowReservedWords && isReservedWord(field.name)) {
        errors.push(
          createError(
            ErrorCode.RESERVED_WORD,
            `Field name "${field.name}" is a reserved keyword`,
            at,
            "Choose a different name, or set allowReservedWords"
          )
        );
      }
    }
  }

  private validatePivot(
    pivot: Pivot,
    entityNames: Set<string>,
    errors: ResolutionError[],
    warnings: ResolutionError[]
  ): void {
    const basePath = `pivotTables.${pivot.name}`;
    const at: ErrorLocation = { path: basePath, pivot: pivot.name };

    this.validateTableName(pivot.name, at, errors);

    const sides = pivot.kind === "standard" ? pivot.sides : [pivot.related];
    for (const side of sides) {
      if (!entityNames.has(side.entity)) {
        errors.push(
          createError(
            ErrorCode.UNKNOWN_TARGET_ENTITY,
            `Pivot "${pivot.name}" references non-existent entity "${side.entity}"`,
            at,
            suggestName(side.entity, entityNames, "entities")
          )
        );
      }
    }

    const keyColumns =
      pivot.kind === "standard"
        ? pivot.sides.map((side) => side.key)
        : [pivot.related.key, pivot.morphKey, pivot.morphType];
    for (const field of pivot.fields) {
      if (keyColumns.includes(field.name)) {
        errors.push(
          createError(
            ErrorCode.DUPLICATE_FIELD_NAME,
            `Field "${field.name}" on pivot "${pivot.name}" collides with a key column`,
            { ...at, path: `${basePath}.additionalFields.${field.name}`, field: field.name }
          )
        );
      }
    }
    this.validateFields(pivot.fields, `${basePath}.additionalFields`, at, errors);

    if (pivot.origin === "declared" && pivot.usedBy.length === 0) {
      warnings.push(
        createWarning(
          ErrorCode.UNUSED_PIVOT_TABLE,
          `Pivot table "${pivot.name}" is declared but no relationship uses it`,
          at,
          `Add a belongsToMany relationship with pivotTable "${pivot.name}", or remove the declaration`
        )
      );
    }
  }

  private validateIdentifier(
    name: string,
    label: string,
    at: ErrorLocation,
    errors: ResolutionError[]
  ): void {
    if (this.options.validateIdentifiers === false) return;

    // Must start with letter or underscore
    if (!/^[a-zA-Z_]/.test(name)) {
      errors.push(
        createError(
          ErrorCode.INVALID_IDENTIFIER,
          `${label} "${name}" must start with a letter or underscore`,
          at
        )
      );
    }

    // Must contain only letters, numbers, and underscores
    if (!/^[a-zA-Z0-9_]*$/.test(name)) {
      errors.push(
        createError(
          ErrorCode.INVALID_IDENTIFIER,
          `${label} "${name}" contains invalid characters`,
          at,
          "Use only letters, numbers, and underscores"
        )
      );
    }

    // Length constraints
    if (name.length > MAX_IDENTIFIER_LENGTH) {
      errors.push(
        createError(
          ErrorCode.INVALID_IDENTIFIER,
          `${label} "${name}" exceeds maximum length of ${MAX_IDENTIFIER_LENGTH} characters`,
          at
        )
      );
    }
  }

  private validateTableName(name: string, at: ErrorLocation, errors: ResolutionError[]): void {
    if (this.options.validateIdentifiers === false) return;

    if (!/^[a-zA-Z0-9_]+$/.test(name)) {
      errors.push(
        createError(
          ErrorCode.INVALID_IDENTIFIER,
          `Storage name "${name}" contains invalid characters`,
          at,
          "Use only letters, numbers, and underscores"
        )
      );
    }

    if (name.length > MAX_TABLE_NAME_LENGTH) {
      errors.push(
        createError(
          ErrorCode.INVALID_IDENTIFIER,
          `Storage name "${name}" exceeds maximum length of ${MAX_TABLE_NAME_LENGTH} characters`,
          at
        )
      );
    }
  }
}
