/**
 * Schema Resolver Main Entry Point
 *
 * parse -> options -> fields -> relationships -> dependency order ->
 * validation -> frozen Resolved Schema
 */

export { SchemaParser, camelizeKeys, describePath } from "./parser.js";
export type { SchemaFormat } from "./parser.js";
export { resolveField, normalizeDefault, defaultCast } from "./field-resolver.js";
export { RelationshipResolver, parseCascadePolicy, accessorName, keyColumn } from "./relationship-resolver.js";
export { PivotRegistry } from "./pivot-registry.js";
export { DependencyGraph, buildDependencyGraph } from "./dependency-graph.js";
export { ResolutionLog } from "./resolution-log.js";
export type { ResolutionEvent, ResolutionEventType, ResolutionEventSink } from "./resolution-log.js";
export { DEFAULT_OPTIONS, loadOptions, optionsFromEnv } from "./options.js";
export { deepFreeze, serializeSchema } from "./resolved-schema.js";
export { formatReport } from "./report.js";
export * as naming from "./naming.js";
export * from "./types.js";
export * from "../../validation-errors.js";
export { SchemaValidator } from "../../validator.js";
export type { ValidatorOptions } from "../../validator.js";

import { readFile } from "fs/promises";
import type { RawSchema } from "./config-model.js";
import { buildDependencyGraph } from "./dependency-graph.js";
import { draftEntities, finishEntity } from "./entity-draft.js";
import { resolveField } from "./field-resolver.js";
import { loadOptions } from "./options.js";
import { SchemaParser, type SchemaFormat } from "./parser.js";
import { PivotRegistry } from "./pivot-registry.js";
import { RelationshipResolver } from "./relationship-resolver.js";
import { ResolutionLog } from "./resolution-log.js";
import { deepFreeze } from "./resolved-schema.js";
import type {
  EmissionStep,
  Entity,
  Field,
  GenerationOptions,
  Pivot,
  ResolutionResult,
  ResolvedSchema,
} from "./types.js";
import { SchemaValidator, type ValidatorOptions } from "../../validator.js";
import {
  dedupeErrors,
  ResolutionException,
  type ResolutionError,
} from "../../validation-errors.js";

export interface ResolveOptions extends ValidatorOptions {
  /** Receives every inference made during the run */
  log?: ResolutionLog;
  /** Environment for `SCHEMA_RESOLVER_*` options (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Options that win over the document and the environment */
  overrides?: Partial<GenerationOptions>;
}

/**
 * Main resolver class that runs the resolution pipeline
 */
export class SchemaResolver {
  private parser = new SchemaParser();

  constructor(private options: ResolveOptions = {}) {}

  /**
   * Resolve a schema from YAML or JSON text
   */
  resolve(content: string, format: SchemaFormat = "yaml"): ResolutionResult {
    const parsed = this.parser.parse(content, format);
    if (!parsed.ok) {
      return { ok: false, errors: parsed.errors, warnings: [] };
    }
    return this.resolveRaw(parsed.value);
  }

  /**
   * Resolve an already-decoded document
   */
  resolveValue(document: unknown): ResolutionResult {
    const parsed = this.parser.parseValue(document);
    if (!parsed.ok) {
      return { ok: false, errors: parsed.errors, warnings: [] };
    }
    return this.resolveRaw(parsed.value);
  }

  resolveRaw(raw: RawSchema): ResolutionResult {
    const log = this.options.log ?? new ResolutionLog();
    const errors: ResolutionError[] = [];

    const options = loadOptions(raw.options, this.options.env, this.options.overrides);
    if (!options.ok) {
      return { ok: false, errors: options.errors, warnings: [] };
    }

    // Fields and entity headers
    const { draft, errors: fieldErrors } = draftEntities(raw, log);
    errors.push(...fieldErrors);

    // Declared pivots
    const pivots = new PivotRegistry(log);
    const entityNames = new Set(draft.byName.keys());
    for (const rawPivot of raw.pivotTables) {
      const fields: Field[] = [];
      (rawPivot.additionalFields ?? []).forEach((rawField, i) => {
        const result = resolveField(rawField, {
          path: `pivotTables.${rawPivot.name}.additionalFields[${i}]`,
          pivot: rawPivot.name,
        });
        if (result.ok) {
          fields.push(result.value);
        } else {
          errors.push(...result.errors);
        }
      });
      errors.push(...pivots.declare(rawPivot, fields, entityNames));
    }

    // Relationships
    errors.push(...new RelationshipResolver(draft, pivots, log).resolveAll());

    const allEntities = draft.all.map(finishEntity);
    const incomplete = new Set(allEntities.filter((_, i) => draft.all[i].incomplete));
    const entities = Array.from(draft.byName.values(), finishEntity);
    const pivotList = pivots.list();

    // Emission order
    const graph = buildDependencyGraph(entities, pivotList, raw.entityKey);
    const sorted = graph.sort();
    let order: EmissionStep[] = [];
    if (sorted.ok) {
      order = sorted.value;
      log.orderComputed(order.map((step) => step.name));
    } else {
      errors.push(...sorted.errors);
    }

    // Whole-schema validation
    const validation = new SchemaValidator(this.options).validate({
      entities: allEntities,
      pivots: pivotList,
      entityKey: raw.entityKey,
      incomplete,
    });
    errors.push(...validation.errors);

    if (errors.length > 0) {
      return { ok: false, errors: dedupeErrors(errors), warnings: validation.warnings };
    }

    return {
      ok: true,
      schema: assemble(entities, pivotList, order, options.value),
      warnings: validation.warnings,
    };
  }

  /**
   * Resolve, throwing a ResolutionException that carries every error
   */
  resolveOrThrow(content: string, format: SchemaFormat = "yaml"): ResolvedSchema {
    const result = this.resolve(content, format);
    if (!result.ok) {
      throw new ResolutionException(result.errors, result.warnings);
    }
    return result.schema;
  }

  /**
   * Read and resolve a `.yaml`, `.yml` or `.json` file
   */
  async resolveFile(path: string): Promise<ResolutionResult> {
    const content = await readFile(path, "utf-8");
    return this.resolve(content, formatOf(path));
  }
}

export function formatOf(path: string): SchemaFormat {
  return path.toLowerCase().endsWith(".json") ? "json" : "yaml";
}

/**
 * Entities and pivots listed in emission order, frozen
 */
function assemble(
  entities: Entity[],
  pivots: Pivot[],
  order: EmissionStep[],
  options: GenerationOptions
): ResolvedSchema {
  const position = new Map(order.map((step, i) => [`${step.kind}:${step.name}`, i]));
  const rank = (kind: EmissionStep["kind"], name: string) => position.get(`${kind}:${name}`) ?? 0;

  return deepFreeze({
    entities: [...entities].sort((a, b) => rank("entity", a.name) - rank("entity", b.name)),
    pivots: [...pivots].sort((a, b) => rank("pivot", a.name) - rank("pivot", b.name)),
    order,
    options: { ...options },
  });
}

/**
 * Convenience function to resolve a schema in one call
 */
export function resolve(
  content: string,
  format: SchemaFormat = "yaml",
  options: ResolveOptions = {}
): ResolutionResult {
  return new SchemaResolver(options).resolve(content, format);
}

export function resolveOrThrow(
  content: string,
  format: SchemaFormat = "yaml",
  options: ResolveOptions = {}
): ResolvedSchema {
  return new SchemaResolver(options).resolveOrThrow(content, format);
}

export function resolveFile(path: string, options: ResolveOptions = {}): Promise<ResolutionResult> {
  return new SchemaResolver(options).resolveFile(path);
}
