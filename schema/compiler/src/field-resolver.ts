/**
 * Field Type Resolver
 *
 * Maps a declared field onto the closed type set and fills in every
 * modifier, or reports all of the field's problems at once.
 */

import type { RawDefault, RawEnumValue, RawField, RawValidationRule } from "./config-model.js";
import { toTitleCase } from "./naming.js";
import { suggestName } from "./suggest.js";
import {
  FIELD_TYPES,
  INTEGER_TYPES,
  TEXT_TYPES,
  type DefaultValue,
  type EnumValue,
  type Field,
  type FieldType,
  type IntegerFieldType,
  type Outcome,
  type TextFieldType,
  type ValidationRule,
} from "./types.js";
import {
  createError,
  ErrorCode,
  type ErrorCodeType,
  type ErrorLocation,
  type ResolutionError,
} from "../../validation-errors.js";

export const DEFAULT_STRING_LENGTH = 255;

/**
 * Where the field sits: its owning entity (or pivot) and its path in the
 * document. Used only for error messages.
 */
export interface FieldContext {
  path: string;
  entity?: string;
  pivot?: string;
}

const FIELD_TYPE_SET: ReadonlySet<string> = new Set(FIELD_TYPES);
const INTEGER_TYPE_SET: ReadonlySet<string> = new Set(INTEGER_TYPES);
const LENGTH_TYPE_SET: ReadonlySet<string> = new Set([...TEXT_TYPES, "binary"]);

export function isFieldType(value: string): value is FieldType {
  return FIELD_TYPE_SET.has(value);
}

export function isIntegerType(type: FieldType): type is IntegerFieldType {
  return INTEGER_TYPE_SET.has(type);
}

export function isLengthType(type: FieldType): type is TextFieldType {
  return LENGTH_TYPE_SET.has(type);
}

export function isNumericType(type: FieldType): boolean {
  return isIntegerType(type) || type === "float" || type === "decimal";
}

/**
 * Cast hint an emitter can use for the field's value
 */
export function defaultCast(type: FieldType): string | null {
  if (type === "boolean") return "boolean";
  if (isIntegerType(type)) return "integer";
  if (type === "float" || type === "decimal") return "float";
  if (type === "json") return "array";
  if (type === "dateTime" || type === "timestamp") return "datetime";
  if (type === "date") return "date";
  return null;
}

/**
 * Rules pass through in declaration order; numeric parameters become strings.
 */
export function resolveValidationRules(declared: RawValidationRule[] | undefined): ValidationRule[] {
  return (declared ?? []).map((entry) => ({
    rule: entry.rule,
    parameters: (entry.parameters ?? []).map(String),
  }));
}

export function resolveField(raw: RawField, context: FieldContext): Outcome<Field> {
  const location: ErrorLocation = {
    path: context.path,
    field: raw.name,
    ...(context.entity !== undefined ? { entity: context.entity } : {}),
    ...(context.pivot !== undefined ? { pivot: context.pivot } : {}),
  };
  const label = `Field "${raw.name}" on "${context.entity ?? context.pivot ?? "?"}"`;
  const errors: ResolutionError[] = [];
  const fail = (code: ErrorCodeType, message: string, suggestion?: string) => {
    errors.push(createError(code, `${label}: ${message}`, location, suggestion));
  };

  const declaredType = raw.type;
  if (!isFieldType(declaredType)) {
    fail(
      ErrorCode.UNKNOWN_FIELD_TYPE,
      `unknown type "${declaredType}"`,
      suggestName(declaredType, FIELD_TYPES, "types")
    );
    return { ok: false, errors };
  }
  const type = declaredType;

  const nullable = raw.nullable ?? false;
  const primary = raw.primary ?? false;
  const unsigned = raw.unsigned ?? false;
  const autoIncrement = raw.autoIncrement ?? false;
  const precision = raw.decimalPrecision?.precision ?? raw.precision;
  const scale = raw.decimalPrecision?.scale ?? raw.scale;

  if (primary && nullable) {
    fail(ErrorCode.INVALID_FIELD_MODIFIER, "a primary key cannot be nullable");
  }
  if (autoIncrement && !isIntegerType(type)) {
    fail(ErrorCode.INVALID_FIELD_MODIFIER, `autoIncrement requires an integer type, not "${type}"`);
  }
  if (unsigned && !isNumericType(type)) {
    fail(ErrorCode.INVALID_FIELD_MODIFIER, `unsigned requires a numeric type, not "${type}"`);
  }
  if (raw.length !== undefined && !isLengthType(type)) {
    fail(ErrorCode.INVALID_FIELD_MODIFIER, `length does not apply to type "${type}"`);
  }
  if ((precision !== undefined || scale !== undefined) && type !== "decimal") {
    fail(ErrorCode.INVALID_FIELD_MODIFIER, `precision/scale only apply to decimal, not "${type}"`);
  }
  if (raw.enumValues !== undefined && type !== "enum") {
    fail(ErrorCode.INVALID_FIELD_MODIFIER, `enum values only apply to enum, not "${type}"`);
  }

  let enumValues: EnumValue[] = [];
  if (type === "enum") {
    enumValues = resolveEnumValues(raw.enumValues, fail);
  }

  if (type === "decimal") {
    if (precision === undefined || scale === undefined) {
      fail(ErrorCode.MISSING_DECIMAL_PRECISION, "decimal fields must declare precision and scale");
    } else if (precision === 0 || scale > precision) {
      fail(
        ErrorCode.INVALID_DECIMAL_PRECISION,
        `invalid decimal precision (precision=${precision}, scale=${scale})`,
        "Precision must be greater than 0 and at least the scale"
      );
    }
  }

  if (isLengthType(type) && raw.length === 0) {
    fail(ErrorCode.INVALID_FIELD_LENGTH, "length cannot be zero");
  }

  let defaultValue: { value: DefaultValue } | null = null;
  if (raw.default !== undefined) {
    const normalized = normalizeDefault(raw.default, {
      type,
      nullable,
      unsigned,
      enumValues: enumValues.map((v) => v.value),
    });
    if (normalized.ok) {
      defaultValue = { value: normalized.value };
    } else {
      fail(ErrorCode.INCOMPATIBLE_DEFAULT, `default ${JSON.stringify(raw.default)} ${normalized.reason}`);
    }
  }

  if (errors.length > 0) {
    return { ok: false, errors };
  }

  const base = {
    name: raw.name,
    nullable,
    unique: raw.unique ?? false,
    index: raw.index ?? false,
    primary,
    default: defaultValue,
    comment: raw.comment ?? null,
    cast: raw.castType ?? defaultCast(type),
    morphName: raw.morphName ?? null,
    validationRules: resolveValidationRules(raw.validationRules),
    origin: "declared" as const,
  };

  if (isLengthType(type)) {
    const length = raw.length ?? (type === "string" ? DEFAULT_STRING_LENGTH : null);
    return { ok: true, value: { ...base, type, length } };
  }
  if (isIntegerType(type)) {
    return { ok: true, value: { ...base, type, unsigned, autoIncrement } };
  }

  switch (type) {
    case "float":
      return { ok: true, value: { ...base, type, unsigned } };
    case "decimal":
      return {
        ok: true,
        value: { ...base, type, unsigned, precision: precision ?? 0, scale: scale ?? 0 },
      };
    case "enum":
      return { ok: true, value: { ...base, type, values: enumValues } };
    default:
      return { ok: true, value: { ...base, type } };
  }
}

function resolveEnumValues(
  declared: RawEnumValue[] | undefined,
  fail: (code: ErrorCodeType, message: string) => void
): EnumValue[] {
  if (declared === undefined || declared.length === 0) {
    fail(ErrorCode.MISSING_ENUM_VALUES, "enum fields must declare at least one value");
    return [];
  }

  const values: EnumValue[] = [];
  const seen = new Set<string>();
  const reported = new Set<string>();

  for (const entry of declared) {
    const value = typeof entry === "string" ? entry : entry.value;
    const label = typeof entry === "string" ? undefined : entry.label;

    if (value.trim().length === 0) {
      fail(ErrorCode.EMPTY_ENUM_VALUE, "enum values cannot be empty");
      continue;
    }
    if (seen.has(value)) {
      if (!reported.has(value)) {
        fail(ErrorCode.DUPLICATE_ENUM_VALUE, `enum value "${value}" is declared more than once`);
        reported.add(value);
      }
      continue;
    }
    seen.add(value);
    values.push({ value, label: label ?? toTitleCase(value) });
  }

  return values;
}

interface DefaultTarget {
  type: FieldType;
  nullable: boolean;
  unsigned: boolean;
  enumValues: string[];
}

type DefaultCheck = { ok: true; value: DefaultValue } | { ok: false; reason: string };

const INTEGER_PATTERN = /^-?\d+$/;
const NUMBER_PATTERN = /^-?\d+(\.\d+)?$/;

/**
 * Check a declared default against the field's type, normalizing numeric
 * and boolean strings.
 */
export function normalizeDefault(value: RawDefault, target: DefaultTarget): DefaultCheck {
  if (value === null) {
    return target.nullable
      ? { ok: true, value: null }
      : { ok: false, reason: "is null but the field is not nullable" };
  }

  const { type } = target;

  if (isIntegerType(type) || type === "float" || type === "decimal") {
    const integerOnly = isIntegerType(type);
    const pattern = integerOnly ? INTEGER_PATTERN : NUMBER_PATTERN;
    const numeric =
      typeof value === "number"
        ? value
        : typeof value === "string" && pattern.test(value.trim())
          ? Number(value.trim())
          : undefined;

    if (numeric === undefined || (integerOnly && !Number.isInteger(numeric))) {
      return { ok: false, reason: integerOnly ? "is not an integer" : "is not a number" };
    }
    if (target.unsigned && numeric < 0) {
      return { ok: false, reason: "is negative but the field is unsigned" };
    }
    if (integerOnly && !Number.isSafeInteger(numeric)) {
      // Past 2^53 only the written digits are exact
      return typeof value === "string"
        ? { ok: true, value: value.trim() }
        : { ok: false, reason: "is outside the safe integer range; write it as a string" };
    }
    return { ok: true, value: numeric };
  }

  if (type === "boolean") {
    if (typeof value === "boolean") return { ok: true, value };
    if (value === 1 || value === "1" || value === "true") return { ok: true, value: true };
    if (value === 0 || value === "0" || value === "false") return { ok: true, value: false };
    return { ok: false, reason: "is not a boolean" };
  }

  if (type === "enum") {
    const candidate = String(value);
    return target.enumValues.includes(candidate)
      ? { ok: true, value: candidate }
      : { ok: false, reason: `is not one of ${target.enumValues.join(", ")}` };
  }

  if (type === "json") {
    return { ok: true, value };
  }

  if (isLengthType(type)) {
    return typeof value === "boolean"
      ? { ok: false, reason: "is not a string" }
      : { ok: true, value: String(value) };
  }

  return typeof value === "string"
    ? { ok: true, value }
    : { ok: false, reason: "is not a string" };
}
