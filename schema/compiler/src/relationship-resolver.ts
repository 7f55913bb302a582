/**
 * Relationship Resolver
 *
 * Resolves each declared relationship against the whole schema: infers
 * missing keys, adds the key columns they imply, and joins many-to-many
 * relationships to their pivots.
 */

import type { RawRelationship } from "./config-model.js";
import { findField, type EntityDraft, type SchemaDraft } from "./entity-draft.js";
import { defaultCast, DEFAULT_STRING_LENGTH } from "./field-resolver.js";
import {
  foreignKeyName,
  morphIdColumn,
  morphTypeColumn,
  pluralAccessor,
  singularAccessor,
} from "./naming.js";
import type { PivotRegistry } from "./pivot-registry.js";
import type { ResolutionLog } from "./resolution-log.js";
import { suggestName } from "./suggest.js";
import type {
  BelongsToManyRelationship,
  BelongsToRelationship,
  CascadePolicy,
  Field,
  HasRelationship,
  IntegerField,
  MorphInboundRelationship,
  MorphToManyRelationship,
  MorphToRelationship,
  Outcome,
  Relationship,
} from "./types.js";
import {
  createError,
  ErrorCode,
  type ErrorLocation,
  type ResolutionError,
} from "../../validation-errors.js";

const CASCADE_POLICIES: Record<string, CascadePolicy> = {
  cascade: "cascade",
  restrict: "restrict",
  "set-null": "set-null",
  "set null": "set-null",
  set_null: "set-null",
  setnull: "set-null",
  none: "none",
  "no action": "none",
};

export const DEFAULT_CASCADE_POLICY: CascadePolicy = "restrict";

/**
 * `null` when the value names no known policy
 */
export function parseCascadePolicy(value: string): CascadePolicy | null {
  return CASCADE_POLICIES[value.trim().toLowerCase()] ?? null;
}

/**
 * Accessor name a relationship gets when none is declared
 */
export function accessorName(raw: RawRelationship): string {
  if (raw.name !== undefined) return raw.name;

  switch (raw.type) {
    case "belongsTo":
    case "hasOne":
    case "morphOne":
      return singularAccessor(raw.model);
    case "hasMany":
    case "belongsToMany":
    case "morphMany":
    case "morphToMany":
      return pluralAccessor(raw.model);
    case "morphTo":
      return raw.morphName ?? "morphable";
  }
}

function isIntegerField(field: Field): field is IntegerField {
  return (
    field.type === "tinyInteger" ||
    field.type === "smallInteger" ||
    field.type === "mediumInteger" ||
    field.type === "integer" ||
    field.type === "bigInteger"
  );
}

/**
 * Column that stores a reference to `referenced`. Integer keys are stored
 * unsigned; an undeclared primary key is an unsigned big integer.
 */
export function keyColumn(name: string, referenced: Field | undefined, nullable: boolean): Field {
  const common = {
    name,
    nullable,
    unique: false,
    index: true,
    primary: false,
    default: null,
    comment: null,
    morphName: null,
    validationRules: [],
    origin: "inferred" as const,
  };

  if (referenced === undefined) {
    return { ...common, type: "bigInteger", unsigned: true, autoIncrement: false, cast: "integer" };
  }
  if (isIntegerField(referenced)) {
    return { ...referenced, ...common, unsigned: true, autoIncrement: false, cast: "integer" };
  }
  return { ...referenced, ...common, cast: defaultCast(referenced.type) };
}

interface KeyColumnRequest {
  holder: EntityDraft;
  key: string;
  referenced: Field | undefined;
  selfReferential: boolean;
  setNull: boolean;
  relationship: string;
  location: ErrorLocation;
}

interface Cascade {
  onDelete: CascadePolicy;
  onUpdate: CascadePolicy;
}

export class RelationshipResolver {
  constructor(
    private draft: SchemaDraft,
    private pivots: PivotRegistry,
    private log: ResolutionLog
  ) {}

  /**
   * Resolve every relationship of every entity, in document order
   */
  resolveAll(): ResolutionError[] {
    const errors: ResolutionError[] = [];

    for (const owner of this.draft.all) {
      (owner.raw.relationships ?? []).forEach((raw, index) => {
        const result = this.resolve(raw, owner, index);
        if (result.ok) {
          owner.relationships.push(result.value);
        } else {
          errors.push(...result.errors);
        }
      });
      errors.push(...this.checkMorphFields(owner));
    }

    return errors;
  }

  resolve(raw: RawRelationship, owner: EntityDraft, index: number): Outcome<Relationship> {
    const name = accessorName(raw);
    const location: ErrorLocation = {
      path: `${owner.path}.relationships[${index}]`,
      entity: owner.name,
      relationship: name,
    };

    switch (raw.type) {
      case "belongsTo":
        return this.resolveBelongsTo(raw, owner, name, location);
      case "hasOne":
      case "hasMany":
        return this.resolveHas(raw, owner, name, location);
      case "belongsToMany":
        return this.resolveBelongsToMany(raw, owner, name, location);
      case "morphTo":
        return this.resolveMorphTo(raw, owner, name, location);
      case "morphOne":
      case "morphMany":
        return this.resolveMorphInbound(raw, owner, name, location);
      case "morphToMany":
        return this.resolveMorphToMany(raw, owner, name, location);
    }
  }

  private resolveBelongsTo(
    raw: Extract<RawRelationship, { type: "belongsTo" }>,
    owner: EntityDraft,
    name: string,
    location: ErrorLocation
  ): Outcome<BelongsToRelationship> {
    const target = this.lookupTarget(raw.model, owner, location);
    const cascade = this.parseCascade(raw, owner, location);
    if (!target.ok) return target;
    if (!cascade.ok) return cascade;

    const foreignKey = raw.foreignKey ?? foreignKeyName(target.value.name);
    if (raw.foreignKey === undefined) {
      this.log.keyInferred(owner.name, `${owner.name}.${name}`, foreignKey);
    }
    const localKey = raw.localKey ?? target.value.primaryKey.name;

    const errors = this.ensureKeyColumn({
      holder: owner,
      key: foreignKey,
      referenced: findField(target.value, localKey),
      selfReferential: target.value === owner,
      setNull: hasSetNull(cascade.value),
      relationship: `${owner.name}.${name}`,
      location,
    });
    if (errors.length > 0) return { ok: false, errors };

    return {
      ok: true,
      value: {
        kind: "belongsTo",
        name,
        owner: owner.name,
        target: target.value.name,
        foreignKey,
        localKey,
        ...cascade.value,
      },
    };
  }

  private resolveHas(
    raw: Extract<RawRelationship, { type: "hasOne" | "hasMany" }>,
    owner: EntityDraft,
    name: string,
    location: ErrorLocation
  ): Outcome<HasRelationship> {
    const target = this.lookupTarget(raw.model, owner, location);
    const cascade = this.parseCascade(raw, owner, location);
    if (!target.ok) return target;
    if (!cascade.ok) return cascade;

    const foreignKey = raw.foreignKey ?? foreignKeyName(owner.name);
    if (raw.foreignKey === undefined) {
      this.log.keyInferred(owner.name, `${owner.name}.${name}`, foreignKey);
    }
    const localKey = raw.localKey ?? owner.primaryKey.name;

    const errors = this.ensureKeyColumn({
      holder: target.value,
      key: foreignKey,
      referenced: findField(owner, localKey),
      selfReferential: target.value === owner,
      setNull: hasSetNull(cascade.value),
      relationship: `${owner.name}.${name}`,
      location,
    });
    if (errors.length > 0) return { ok: false, errors };

    return {
      ok: true,
      value: {
        kind: raw.type,
        name,
        owner: owner.name,
        target: target.value.name,
        foreignKey,
        localKey,
        ...cascade.value,
      },
    };
  }

  private resolveBelongsToMany(
    raw: Extract<RawRelationship, { type: "belongsToMany" }>,
    owner: EntityDraft,
    name: string,
    location: ErrorLocation
  ): Outcome<BelongsToManyRelationship> {
    const target = this.lookupTarget(raw.model, owner, location);
    const cascade = this.parseCascade(raw, owner, location);
    if (!target.ok) return target;
    if (!cascade.ok) return cascade;

    const relationship = `${owner.name}.${name}`;
    const attached = this.pivots.attach({
      owner: { entity: owner.name, table: owner.table },
      target: { entity: target.value.name, table: target.value.table },
      relationship,
      location,
      pivotTable: raw.pivotTable,
      foreignPivotKey: raw.foreignPivotKey,
      relatedPivotKey: raw.relatedPivotKey,
      withTimestamps: raw.withTimestamps,
    });
    if (!attached.ok) return attached;

    const pivotFields = raw.pivotFields ?? [];
    const errors = checkPivotFields(pivotFields, attached.value.fields, attached.value.pivot, location);
    if (errors.length > 0) return { ok: false, errors };

    return {
      ok: true,
      value: {
        kind: "belongsToMany",
        name,
        owner: owner.name,
        target: target.value.name,
        pivot: attached.value.pivot,
        foreignPivotKey: attached.value.foreignPivotKey,
        relatedPivotKey: attached.value.relatedPivotKey,
        pivotFields: [...pivotFields],
        ...cascade.value,
      },
    };
  }

  private resolveMorphTo(
    raw: Extract<RawRelationship, { type: "morphTo" }>,
    owner: EntityDraft,
    name: string,
    location: ErrorLocation
  ): Outcome<MorphToRelationship> {
    if (raw.morphName === undefined) {
      return {
        ok: false,
        errors: [missingMorphName(owner, "morphTo", location)],
      };
    }

    const morphName = raw.morphName;
    const typeColumn = morphTypeColumn(morphName);
    const idColumn = morphIdColumn(morphName);
    const reason = `${owner.name}.${name}`;

    if (findField(owner, typeColumn) === undefined) {
      owner.fields.push({
        name: typeColumn,
        type: "string",
        length: DEFAULT_STRING_LENGTH,
        nullable: false,
        unique: false,
        index: true,
        primary: false,
        default: null,
        comment: null,
        cast: null,
        morphName,
        validationRules: [],
        origin: "inferred",
      });
      this.log.fieldSynthesized(owner.name, typeColumn, reason);
    }
    if (findField(owner, idColumn) === undefined) {
      owner.fields.push({ ...keyColumn(idColumn, undefined, false), morphName });
      this.log.fieldSynthesized(owner.name, idColumn, reason);
    }

    return {
      ok: true,
      value: { kind: "morphTo", name, owner: owner.name, morphName, typeColumn, idColumn },
    };
  }

  private resolveMorphInbound(
    raw: Extract<RawRelationship, { type: "morphOne" | "morphMany" }>,
    owner: EntityDraft,
    name: string,
    location: ErrorLocation
  ): Outcome<MorphInboundRelationship> {
    const target = this.lookupTarget(raw.model, owner, location);
    if (!target.ok) return target;

    if (raw.morphName === undefined) {
      return { ok: false, errors: [missingMorphName(owner, raw.type, location)] };
    }

    const morphName = raw.morphName;
    const declared = morphToNames(target.value);
    if (!declared.includes(morphName)) {
      return {
        ok: false,
        errors: [
          createError(
            ErrorCode.UNMATCHED_MORPH_NAME,
            `${owner.name}.${name} uses morph name "${morphName}" but "${target.value.name}" declares no morphTo named "${morphName}"`,
            location,
            declared.length > 0
              ? suggestName(morphName, declared, "morph names")
              : `Declare a morphTo relationship with morphName "${morphName}" on "${target.value.name}"`
          ),
        ],
      };
    }

    return {
      ok: true,
      value: {
        kind: raw.type,
        name,
        owner: owner.name,
        target: target.value.name,
        morphName,
        typeColumn: morphTypeColumn(morphName),
        idColumn: morphIdColumn(morphName),
        localKey: raw.localKey ?? owner.primaryKey.name,
      },
    };
  }

  private resolveMorphToMany(
    raw: Extract<RawRelationship, { type: "morphToMany" }>,
    owner: EntityDraft,
    name: string,
    location: ErrorLocation
  ): Outcome<MorphToManyRelationship> {
    const target = this.lookupTarget(raw.model, owner, location);
    if (!target.ok) return target;

    if (raw.morphName === undefined) {
      return { ok: false, errors: [missingMorphName(owner, "morphToMany", location)] };
    }

    const attached = this.pivots.attachMorph({
      owner: owner.name,
      target: target.value.name,
      morphName: raw.morphName,
      relationship: `${owner.name}.${name}`,
      location,
      pivotTable: raw.pivotTable,
      relatedPivotKey: raw.relatedPivotKey,
      withTimestamps: raw.withTimestamps,
    });
    if (!attached.ok) return attached;

    const pivotFields = raw.pivotFields ?? [];
    const errors = checkPivotFields(pivotFields, attached.value.fields, attached.value.pivot, location);
    if (errors.length > 0) return { ok: false, errors };

    return {
      ok: true,
      value: {
        kind: "morphToMany",
        name,
        owner: owner.name,
        target: target.value.name,
        morphName: raw.morphName,
        pivot: attached.value.pivot,
        relatedPivotKey: attached.value.relatedPivotKey,
        pivotFields: [...pivotFields],
      },
    };
  }

  private lookupTarget(
    model: string,
    owner: EntityDraft,
    location: ErrorLocation
  ): Outcome<EntityDraft> {
    const target = this.draft.byName.get(model);
    if (target !== undefined) {
      return { ok: true, value: target };
    }

    return {
      ok: false,
      errors: [
        createError(
          ErrorCode.UNKNOWN_TARGET_ENTITY,
          `Relationship "${location.relationship ?? "?"}" on "${owner.name}" references non-existent entity "${model}"`,
          location,
          suggestName(model, this.draft.byName.keys(), "entities")
        ),
      ],
    };
  }

  private parseCascade(
    raw: { onDelete?: string; onUpdate?: string },
    owner: EntityDraft,
    location: ErrorLocation
  ): Outcome<Cascade> {
    const errors: ResolutionError[] = [];
    const read = (option: "onDelete" | "onUpdate"): CascadePolicy => {
      const value = raw[option];
      if (value === undefined) return DEFAULT_CASCADE_POLICY;

      const policy = parseCascadePolicy(value);
      if (policy === null) {
        errors.push(
          createError(
            ErrorCode.INVALID_CASCADE_POLICY,
            `Relationship "${location.relationship ?? "?"}" on "${owner.name}" has invalid ${option} policy "${value}"`,
            location,
            "Use one of: cascade, restrict, set-null, none"
          )
        );
        return DEFAULT_CASCADE_POLICY;
      }
      return policy;
    };

    const cascade = { onDelete: read("onDelete"), onUpdate: read("onUpdate") };
    return errors.length > 0 ? { ok: false, errors } : { ok: true, value: cascade };
  }

  /**
   * Make sure the key column exists on the entity that holds it, adding
   * it when undeclared.
   */
  private ensureKeyColumn(request: KeyColumnRequest): ResolutionError[] {
    const { holder, key } = request;
    const existing = findField(holder, key);

    if (existing === undefined) {
      holder.fields.push(
        keyColumn(key, request.referenced, request.selfReferential || request.setNull)
      );
      this.log.fieldSynthesized(holder.name, key, request.relationship);
      return [];
    }

    if (!request.setNull || existing.nullable) {
      return [];
    }

    if (existing.origin === "inferred") {
      holder.fields = holder.fields.map((field) =>
        field === existing ? { ...field, nullable: true } : field
      );
      return [];
    }

    return [
      createError(
        ErrorCode.CASCADE_POLICY_CONFLICT,
        `${request.relationship} uses set-null but "${holder.name}.${key}" is not nullable`,
        request.location,
        `Mark "${key}" as nullable or choose another policy`
      ),
    ];
  }

  /**
   * A field tagged with a morph name must belong to a morphTo of its own
   * entity.
   */
  private checkMorphFields(owner: EntityDraft): ResolutionError[] {
    const declared = morphToNames(owner);
    const errors: ResolutionError[] = [];

    (owner.raw.fields ?? []).forEach((field, index) => {
      if (field.morphName === undefined || declared.includes(field.morphName)) return;
      errors.push(
        createError(
          ErrorCode.UNMATCHED_MORPH_NAME,
          `Field "${field.name}" on "${owner.name}" uses morph name "${field.morphName}" but "${owner.name}" declares no morphTo named "${field.morphName}"`,
          { path: `${owner.path}.fields[${index}]`, entity: owner.name, field: field.name }
        )
      );
    });

    return errors;
  }
}

function hasSetNull(cascade: Cascade): boolean {
  return cascade.onDelete === "set-null" || cascade.onUpdate === "set-null";
}

function morphToNames(entity: EntityDraft): string[] {
  return (entity.raw.relationships ?? []).flatMap((relationship) =>
    relationship.type === "morphTo" && relationship.morphName !== undefined
      ? [relationship.morphName]
      : []
  );
}

function missingMorphName(
  owner: EntityDraft,
  kind: string,
  location: ErrorLocation
): ResolutionError {
  return createError(
    ErrorCode.UNMATCHED_MORPH_NAME,
    `${kind} relationship "${location.relationship ?? "?"}" on "${owner.name}" must declare a morph name`,
    location,
    "Add morphName to the relationship"
  );
}

function checkPivotFields(
  requested: readonly string[],
  available: readonly Field[],
  pivot: string,
  location: ErrorLocation
): ResolutionError[] {
  const names = available.map((field) => field.name);
  return requested
    .filter((field) => !names.includes(field))
    .map((field) =>
      createError(
        ErrorCode.UNKNOWN_PIVOT_FIELD,
        `Pivot "${pivot}" has no column "${field}"`,
        { ...location, pivot },
        names.length > 0
          ? suggestName(field, names, "pivot columns")
          : `Declare "${field}" in the additionalFields of pivot "${pivot}"`
      )
    );
}
