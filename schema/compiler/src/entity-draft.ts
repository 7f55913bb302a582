/**
 * Entity drafts
 *
 * Mutable working copies of entities while relationships are resolved.
 * Every entity gets a header (name, storage name, primary key) before any
 * relationship is looked at, so forward references resolve.
 */

import type { RawEntity, RawFillableGuarded, RawSchema } from "./config-model.js";
import { resolveField, resolveValidationRules } from "./field-resolver.js";
import { tableName } from "./naming.js";
import type { ResolutionLog } from "./resolution-log.js";
import type { Entity, Field, FillableGuarded, PrimaryKey, Relationship } from "./types.js";
import type { ResolutionError } from "../../validation-errors.js";

export const DEFAULT_PRIMARY_KEY: PrimaryKey = { name: "id", type: "bigInteger" };

export interface EntityDraft {
  readonly name: string;
  readonly table: string;
  readonly primaryKey: PrimaryKey;
  /** Declaration index in the document */
  readonly index: number;
  /** Dotted location of the declaration (`entities.Post`) */
  readonly path: string;
  readonly raw: RawEntity;
  /** Some declared field failed to resolve and is missing from `fields` */
  readonly incomplete: boolean;
  fields: Field[];
  relationships: Relationship[];
}

export interface SchemaDraft {
  /** Every declared entity, duplicates included, in document order */
  readonly all: EntityDraft[];
  /** First declaration of each name */
  readonly byName: Map<string, EntityDraft>;
}

export function draftEntities(
  schema: RawSchema,
  log: ResolutionLog
): { draft: SchemaDraft; errors: ResolutionError[] } {
  const errors: ResolutionError[] = [];
  const all: EntityDraft[] = [];
  const byName = new Map<string, EntityDraft>();

  schema.entities.forEach((raw, index) => {
    const path = `${schema.entityKey}.${raw.name}`;
    const fields: Field[] = [];
    let incomplete = false;

    (raw.fields ?? []).forEach((rawField, i) => {
      const result = resolveField(rawField, {
        path: `${path}.fields[${i}]`,
        entity: raw.name,
      });
      if (result.ok) {
        fields.push(result.value);
      } else {
        incomplete = true;
        errors.push(...result.errors);
      }
    });

    const table = raw.table ?? tableName(raw.name);
    if (raw.table === undefined) {
      log.tableDerived(raw.name, table);
    }

    const primary = fields.find((field) => field.primary);
    const draft: EntityDraft = {
      name: raw.name,
      table,
      primaryKey: primary ? { name: primary.name, type: primary.type } : DEFAULT_PRIMARY_KEY,
      index,
      path,
      raw,
      incomplete,
      fields,
      relationships: [],
    };

    all.push(draft);
    if (!byName.has(raw.name)) {
      byName.set(raw.name, draft);
    }
  });

  return { draft: { all, byName }, errors };
}

export function findField(entity: EntityDraft, name: string): Field | undefined {
  return entity.fields.find((field) => field.name === name);
}

/**
 * Snapshot a draft as a resolved entity
 */
export function finishEntity(draft: EntityDraft): Entity {
  return {
    name: draft.name,
    table: draft.table,
    primaryKey: draft.primaryKey,
    fields: [...draft.fields],
    relationships: [...draft.relationships],
    timestamps: draft.raw.timestamps ?? false,
    softDeletes: draft.raw.softDeletes ?? false,
    traits: [...(draft.raw.traits ?? [])],
    validationRules: resolveValidationRules(draft.raw.validationRules),
    fillableGuarded: resolveFillableGuarded(draft.raw.fillableGuarded),
  };
}

export function resolveFillableGuarded(raw: RawFillableGuarded | undefined): FillableGuarded {
  if (raw === undefined || typeof raw === "string") {
    return { kind: "all" };
  }
  if ("fillable" in raw) return { kind: "fillable", fields: [...raw.fillable] };
  if ("Fillable" in raw) return { kind: "fillable", fields: [...raw.Fillable] };
  if ("guarded" in raw) return { kind: "guarded", fields: [...raw.guarded] };
  return { kind: "guarded", fields: [...raw.Guarded] };
}
