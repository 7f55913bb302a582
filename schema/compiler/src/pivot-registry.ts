/**
 * Pivot Registry
 *
 * Join tables keyed by storage name. A pivot is created the first time a
 * declaration or relationship names it; every later relationship that
 * reaches the same name, or names none and joins the same two entities,
 * joins that pivot. Keys must agree.
 */

import type { RawPivot } from "./config-model.js";
import { foreignKeyName, morphIdColumn, morphTypeColumn, pivotTableName, pluralize } from "./naming.js";
import type { ResolutionLog } from "./resolution-log.js";
import { suggestName } from "./suggest.js";
import type {
  Field,
  MorphPivot,
  Outcome,
  Pivot,
  PivotOrigin,
  PivotSide,
  StandardPivot,
} from "./types.js";
import {
  createError,
  ErrorCode,
  type ErrorLocation,
  type ResolutionError,
} from "../../validation-errors.js";

interface PivotDraftBase {
  name: string;
  timestamps: boolean;
  fields: Field[];
  origin: PivotOrigin;
  usedBy: string[];
}

interface StandardPivotDraft extends PivotDraftBase {
  kind: "standard";
  sides: [PivotSide, PivotSide];
}

interface MorphPivotDraft extends PivotDraftBase {
  kind: "morph";
  morphName: string;
  related: PivotSide;
  morphKey: string;
  morphType: string;
  morphedBy: string[];
}

type PivotDraft = StandardPivotDraft | MorphPivotDraft;

/** One side of a many-to-many join, as the relationship sees it */
export interface PivotParty {
  entity: string;
  table: string;
}

export interface StandardPivotRequest {
  owner: PivotParty;
  target: PivotParty;
  /** `Post.tags` */
  relationship: string;
  location: ErrorLocation;
  pivotTable?: string;
  foreignPivotKey?: string;
  relatedPivotKey?: string;
  withTimestamps?: boolean;
}

export interface StandardPivotAttachment {
  pivot: string;
  foreignPivotKey: string;
  relatedPivotKey: string;
  fields: readonly Field[];
}

export interface MorphPivotRequest {
  owner: string;
  target: string;
  morphName: string;
  relationship: string;
  location: ErrorLocation;
  pivotTable?: string;
  relatedPivotKey?: string;
  withTimestamps?: boolean;
}

export interface MorphPivotAttachment {
  pivot: string;
  relatedPivotKey: string;
  fields: readonly Field[];
}

export class PivotRegistry {
  private pivots = new Map<string, PivotDraft>();

  constructor(private log: ResolutionLog) {}

  /**
   * Pre-seed a pivot from an explicit declaration
   */
  declare(
    raw: RawPivot,
    fields: Field[],
    entityNames: ReadonlySet<string>
  ): ResolutionError[] {
    const path = `pivotTables.${raw.name}`;
    const errors: ResolutionError[] = [];

    for (const [key, model] of [
      ["model1", raw.model1],
      ["model2", raw.model2],
    ] as const) {
      if (!entityNames.has(model)) {
        errors.push(
          createError(
            ErrorCode.UNKNOWN_TARGET_ENTITY,
            `Pivot "${raw.name}" references non-existent entity "${model}"`,
            { path: `${path}.${key}`, pivot: raw.name },
            suggestName(model, entityNames, "entities")
          )
        );
      }
    }

    if (raw.model1 === raw.model2 && raw.foreignKey1 === raw.foreignKey2) {
      errors.push(
        createError(
          ErrorCode.PIVOT_KEY_CONFLICT,
          `Pivot "${raw.name}" joins "${raw.model1}" to itself with the same key "${raw.foreignKey1}" on both sides`,
          { path, pivot: raw.name },
          "Give foreignKey1 and foreignKey2 distinct names"
        )
      );
    }

    if (this.pivots.has(raw.name)) {
      errors.push(
        createError(
          ErrorCode.DUPLICATE_TABLE_NAME,
          `Pivot table "${raw.name}" is declared more than once`,
          { path, pivot: raw.name }
        )
      );
    }

    if (errors.length > 0) {
      return errors;
    }

    this.pivots.set(raw.name, {
      kind: "standard",
      name: raw.name,
      sides: [
        { entity: raw.model1, key: raw.foreignKey1 },
        { entity: raw.model2, key: raw.foreignKey2 },
      ],
      timestamps: raw.timestamps ?? false,
      fields,
      origin: "declared",
      usedBy: [],
    });
    this.log.pivotCreated(raw.name, `declared between ${raw.model1} and ${raw.model2}`);

    return [];
  }

  /**
   * Join a many-to-many relationship to its pivot, creating the pivot when
   * no declaration or earlier relationship has.
   */
  attach(request: StandardPivotRequest): Outcome<StandardPivotAttachment> {
    const name =
      request.pivotTable ??
      this.pivotJoining(request.owner.entity, request.target.entity) ??
      pivotTableName(request.owner.table, request.target.table);
    const existing = this.pivots.get(name);

    if (existing === undefined) {
      return this.createStandard(name, request);
    }

    if (existing.kind !== "standard") {
      return this.conflict(request.location, `Pivot "${name}" is polymorphic and cannot back ${request.relationship}`);
    }

    const [ownerSide, targetSide] = this.matchSides(existing, request);
    if (ownerSide === undefined || targetSide === undefined) {
      const joined = existing.sides.map((side) => side.entity).join(" and ");
      return this.conflict(
        request.location,
        `Pivot "${name}" joins ${joined}, not ${request.owner.entity} and ${request.target.entity}`
      );
    }

    const errors: ResolutionError[] = [];
    if (request.foreignPivotKey !== undefined && request.foreignPivotKey !== ownerSide.key) {
      errors.push(
        this.keyMismatch(request, name, "foreignPivotKey", request.foreignPivotKey, ownerSide.key)
      );
    }
    if (request.relatedPivotKey !== undefined && request.relatedPivotKey !== targetSide.key) {
      errors.push(
        this.keyMismatch(request, name, "relatedPivotKey", request.relatedPivotKey, targetSide.key)
      );
    }
    if (errors.length > 0) {
      return { ok: false, errors };
    }

    existing.usedBy.push(request.relationship);
    if (existing.origin === "inferred" && request.withTimestamps === true) {
      existing.timestamps = true;
    }
    this.log.pivotReused(name, request.relationship);

    return {
      ok: true,
      value: {
        pivot: name,
        foreignPivotKey: ownerSide.key,
        relatedPivotKey: targetSide.key,
        fields: existing.fields,
      },
    };
  }

  attachMorph(request: MorphPivotRequest): Outcome<MorphPivotAttachment> {
    const name = request.pivotTable ?? pluralize(request.morphName);
    const existing = this.pivots.get(name);

    if (existing === undefined) {
      return this.createMorph(name, request);
    }

    if (existing.kind !== "morph") {
      return this.conflict(request.location, `Pivot "${name}" is not polymorphic and cannot back ${request.relationship}`);
    }
    if (existing.morphName !== request.morphName) {
      return this.conflict(
        request.location,
        `Pivot "${name}" uses morph name "${existing.morphName}", not "${request.morphName}"`
      );
    }
    if (existing.related.entity !== request.target) {
      return this.conflict(
        request.location,
        `Pivot "${name}" relates "${existing.related.entity}", not "${request.target}"`
      );
    }
    if (request.relatedPivotKey !== undefined && request.relatedPivotKey !== existing.related.key) {
      return this.conflict(
        request.location,
        `${request.relationship} expects key "${request.relatedPivotKey}" on pivot "${name}", which uses "${existing.related.key}"`
      );
    }

    existing.usedBy.push(request.relationship);
    if (!existing.morphedBy.includes(request.owner)) {
      existing.morphedBy.push(request.owner);
    }
    if (request.withTimestamps === true) {
      existing.timestamps = true;
    }
    this.log.pivotReused(name, request.relationship);

    return {
      ok: true,
      value: { pivot: name, relatedPivotKey: existing.related.key, fields: existing.fields },
    };
  }

  /**
   * Pivots in registration order
   */
  list(): Pivot[] {
    return Array.from(this.pivots.values(), snapshot);
  }

  private createStandard(
    name: string,
    request: StandardPivotRequest
  ): Outcome<StandardPivotAttachment> {
    const foreignPivotKey = request.foreignPivotKey ?? foreignKeyName(request.owner.entity);
    const relatedPivotKey = request.relatedPivotKey ?? foreignKeyName(request.target.entity);

    if (foreignPivotKey === relatedPivotKey) {
      return this.conflict(
        request.location,
        `${request.relationship} would use "${foreignPivotKey}" for both sides of pivot "${name}"`,
        'Set foreignPivotKey and relatedPivotKey to distinct names, e.g. "parent_id" and "child_id"'
      );
    }

    const ownerSide: PivotSide = { entity: request.owner.entity, key: foreignPivotKey };
    const targetSide: PivotSide = { entity: request.target.entity, key: relatedPivotKey };
    const ownerFirst =
      request.owner.entity === request.target.entity || request.owner.table <= request.target.table;

    this.pivots.set(name, {
      kind: "standard",
      name,
      sides: ownerFirst ? [ownerSide, targetSide] : [targetSide, ownerSide],
      timestamps: request.withTimestamps ?? false,
      fields: [],
      origin: "inferred",
      usedBy: [request.relationship],
    });
    this.log.pivotCreated(name, `inferred for ${request.relationship}`);

    return {
      ok: true,
      value: { pivot: name, foreignPivotKey, relatedPivotKey, fields: [] },
    };
  }

  private createMorph(name: string, request: MorphPivotRequest): Outcome<MorphPivotAttachment> {
    const relatedPivotKey = request.relatedPivotKey ?? foreignKeyName(request.target);
    const morphKey = morphIdColumn(request.morphName);

    if (relatedPivotKey === morphKey) {
      return this.conflict(
        request.location,
        `${request.relationship} would use "${morphKey}" for both the related key and the morph key of pivot "${name}"`,
        "Set relatedPivotKey to a distinct name"
      );
    }

    this.pivots.set(name, {
      kind: "morph",
      name,
      morphName: request.morphName,
      related: { entity: request.target, key: relatedPivotKey },
      morphKey,
      morphType: morphTypeColumn(request.morphName),
      morphedBy: [request.owner],
      timestamps: request.withTimestamps ?? false,
      fields: [],
      origin: "inferred",
      usedBy: [request.relationship],
    });
    this.log.pivotCreated(name, `inferred for ${request.relationship}`);

    return { ok: true, value: { pivot: name, relatedPivotKey, fields: [] } };
  }

  /**
   * Name of the standard pivot already joining exactly these two entities,
   * when there is only one
   */
  private pivotJoining(owner: string, target: string): string | undefined {
    const matches = Array.from(this.pivots.values()).filter((pivot) => {
      if (pivot.kind !== "standard") return false;
      const [first, second] = pivot.sides;
      return (
        (first.entity === owner && second.entity === target) ||
        (first.entity === target && second.entity === owner)
      );
    });
    return matches.length === 1 ? matches[0].name : undefined;
  }

  /**
   * Pick the pivot side for each end of the relationship. For a pivot
   * joining an entity to itself the explicit keys decide, else the
   * declared order.
   */
  private matchSides(
    pivot: StandardPivotDraft,
    request: StandardPivotRequest
  ): [PivotSide | undefined, PivotSide | undefined] {
    const [first, second] = pivot.sides;

    if (request.owner.entity === request.target.entity) {
      if (first.entity !== request.owner.entity || second.entity !== request.owner.entity) {
        return [undefined, undefined];
      }
      const swap =
        request.foreignPivotKey === second.key || request.relatedPivotKey === first.key;
      return swap ? [second, first] : [first, second];
    }

    return [
      pivot.sides.find((side) => side.entity === request.owner.entity),
      pivot.sides.find((side) => side.entity === request.target.entity),
    ];
  }

  private keyMismatch(
    request: StandardPivotRequest,
    pivot: string,
    option: string,
    expected: string,
    actual: string
  ): ResolutionError {
    return createError(
      ErrorCode.PIVOT_KEY_CONFLICT,
      `${request.relationship} sets ${option} "${expected}" but pivot "${pivot}" uses "${actual}"`,
      request.location,
      `Remove ${option} or set it to "${actual}"`
    );
  }

  private conflict(location: ErrorLocation, message: string, suggestion?: string): { ok: false; errors: ResolutionError[] } {
    return {
      ok: false,
      errors: [createError(ErrorCode.PIVOT_KEY_CONFLICT, message, location, suggestion)],
    };
  }
}

function snapshot(draft: PivotDraft): Pivot {
  const base = {
    name: draft.name,
    timestamps: draft.timestamps,
    fields: [...draft.fields],
    origin: draft.origin,
    usedBy: [...draft.usedBy],
  };

  if (draft.kind === "standard") {
    const pivot: StandardPivot = {
      ...base,
      kind: "standard",
      sides: [{ ...draft.sides[0] }, { ...draft.sides[1] }],
    };
    return pivot;
  }

  const pivot: MorphPivot = {
    ...base,
    kind: "morph",
    morphName: draft.morphName,
    related: { ...draft.related },
    morphKey: draft.morphKey,
    morphType: draft.morphType,
    morphedBy: [...draft.morphedBy],
  };
  return pivot;
}
