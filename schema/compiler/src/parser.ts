/**
 * YAML/JSON Schema Parser
 *
 * Turns document text into the typed Configuration Model. Structural
 * problems come back as MalformedInput errors naming the entity, field,
 * relationship or pivot they sit in.
 */

import YAML from "yaml";
import type { ZodIssue } from "zod";
import {
  RawDocumentSchema,
  type RawDocument,
  type RawSchema,
} from "./config-model.js";
import { toCamelCase } from "./naming.js";
import type { Outcome } from "./types.js";
import {
  createError,
  ErrorCode,
  type ErrorLocation,
  type ResolutionError,
} from "../../validation-errors.js";

export type SchemaFormat = "yaml" | "json";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class SchemaParser {
  /**
   * Parse YAML or JSON text into the Configuration Model
   */
  parse(content: string, format: SchemaFormat = "yaml"): Outcome<RawSchema> {
    let raw: unknown;
    try {
      raw = format === "yaml" ? YAML.parse(content) : JSON.parse(content);
    } catch (error) {
      return {
        ok: false,
        errors: [
          createError(
            ErrorCode.MALFORMED_INPUT,
            `Could not parse ${format.toUpperCase()} document: ${(error as Error).message}`,
            { path: "(root)" }
          ),
        ],
      };
    }

    return this.parseValue(raw);
  }

  parseYAML(content: string): Outcome<RawSchema> {
    return this.parse(content, "yaml");
  }

  parseJSON(content: string): Outcome<RawSchema> {
    return this.parse(content, "json");
  }

  /**
   * Check an already-decoded document
   */
  parseValue(raw: unknown): Outcome<RawSchema> {
    const normalized = camelizeKeys(raw);
    const result = RawDocumentSchema.safeParse(normalized);

    if (!result.success) {
      return {
        ok: false,
        errors: result.error.issues.map((issue) =>
          this.issueToError(normalized, issue)
        ),
      };
    }

    return { ok: true, value: this.buildRawSchema(result.data) };
  }

  private buildRawSchema(doc: RawDocument): RawSchema {
    const { entities, models, pivotTables, ...options } = doc;
    const entityKey = entities !== undefined ? "entities" : "models";
    const entityList = entities ?? models ?? [];

    return {
      entities: entityList,
      pivotTables: [
        ...(pivotTables ?? []),
        ...entityList.flatMap((entity) => entity.pivotTables ?? []),
      ],
      options,
      entityKey,
    };
  }

  private issueToError(raw: unknown, issue: ZodIssue): ResolutionError {
    const location = describePath(raw, issue.path);
    const subject = describeSubject(location);
    return createError(
      ErrorCode.MALFORMED_INPUT,
      `${subject}: ${issue.message} at ${location.path}`,
      location
    );
  }
}

/**
 * snake_case keys become camelCase; values are left alone.
 */
export function camelizeKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(camelizeKeys);
  }
  if (isRecord(value)) {
    const out: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(value)) {
      const normalizedKey = key.includes("_") ? toCamelCase(key) : key;
      out[normalizedKey] = camelizeKeys(child);
    }
    return out;
  }
  return value;
}

const ENTITY_LIST_KEYS = new Set(["entities", "models"]);
const FIELD_LIST_KEYS = new Set(["fields", "additionalFields"]);

/**
 * Render a zod issue path as a dotted location, swapping list indexes for
 * declared names where the document has them.
 */
export function describePath(
  raw: unknown,
  path: (string | number)[]
): ErrorLocation {
  const location: ErrorLocation = { path: "" };
  let rendered = "";
  let node: unknown = raw;
  let parentKey: string | undefined;

  for (const segment of path) {
    if (typeof segment === "number") {
      const child: unknown = Array.isArray(node) ? node[segment] : undefined;
      const name = isRecord(child) && typeof child.name === "string" ? child.name : undefined;

      if (parentKey !== undefined && ENTITY_LIST_KEYS.has(parentKey) && name !== undefined) {
        rendered += `.${name}`;
        location.entity = name;
      } else {
        rendered += `[${segment}]`;
        if (parentKey !== undefined && FIELD_LIST_KEYS.has(parentKey) && name !== undefined) {
          location.field = name;
        } else if (parentKey === "relationships") {
          location.relationship = `relationships[${segment}]`;
        } else if (parentKey === "pivotTables" && name !== undefined) {
          location.pivot = name;
        }
      }
      node = child;
    } else {
      rendered += rendered.length === 0 ? segment : `.${segment}`;
      node = isRecord(node) ? node[segment] : undefined;
      parentKey = segment;
    }
  }

  location.path = rendered.length === 0 ? "(root)" : rendered;
  return location;
}

function describeSubject(location: ErrorLocation): string {
  const parts: string[] = [];
  if (location.entity !== undefined) parts.push(`entity "${location.entity}"`);
  if (location.pivot !== undefined) parts.push(`pivot "${location.pivot}"`);
  if (location.relationship !== undefined) parts.push(location.relationship);
  if (location.field !== undefined) parts.push(`field "${location.field}"`);
  return parts.length === 0 ? "Malformed document" : `Malformed ${parts.join(", ")}`;
}
