/**
 * Resolution Error Types
 *
 * Every problem found while resolving a schema is reported as a
 * `ResolutionError` value. Stages collect them instead of throwing so a
 * single run can report everything that is wrong with a document.
 */

export type ErrorSeverity = "error" | "warning";

export type ErrorCategory =
  | "MalformedInput"
  | "FieldError"
  | "RelationshipError"
  | "CyclicDependency"
  | "ValidationError";

export const ErrorCode = {
  // Structural (MalformedInput)
  MALFORMED_INPUT: "MalformedInput",
  INVALID_OPTION: "InvalidOption",

  // Field type / modifier (FieldError)
  UNKNOWN_FIELD_TYPE: "UnknownFieldType",
  MISSING_DECIMAL_PRECISION: "MissingDecimalPrecision",
  INVALID_DECIMAL_PRECISION: "InvalidDecimalPrecision",
  MISSING_ENUM_VALUES: "MissingEnumValues",
  DUPLICATE_ENUM_VALUE: "DuplicateEnumValue",
  EMPTY_ENUM_VALUE: "EmptyEnumValue",
  INVALID_FIELD_LENGTH: "InvalidFieldLength",
  INVALID_FIELD_MODIFIER: "InvalidFieldModifier",
  INCOMPATIBLE_DEFAULT: "IncompatibleDefault",

  // Relationship (RelationshipError)
  UNKNOWN_TARGET_ENTITY: "UnknownTargetEntity",
  PIVOT_KEY_CONFLICT: "PivotKeyConflict",
  UNMATCHED_MORPH_NAME: "UnmatchedMorphName",
  CASCADE_POLICY_CONFLICT: "CascadePolicyConflict",
  INVALID_CASCADE_POLICY: "InvalidCascadePolicy",
  UNKNOWN_PIVOT_FIELD: "UnknownPivotField",

  // Graph
  CYCLIC_DEPENDENCY: "CyclicDependency",

  // Whole-schema (ValidationError)
  DUPLICATE_ENTITY_NAME: "DuplicateEntityName",
  DUPLICATE_TABLE_NAME: "DuplicateTableName",
  DUPLICATE_FIELD_NAME: "DuplicateFieldName",
  DUPLICATE_RELATIONSHIP_NAME: "DuplicateRelationshipName",
  EMPTY_ENTITY: "EmptyEntity",
  INVALID_IDENTIFIER: "InvalidIdentifier",
  RESERVED_WORD: "ReservedWord",
  RESERVED_FIELD_NAME: "ReservedFieldName",
  UNKNOWN_FIELD: "UnknownField",
  UNUSED_PIVOT_TABLE: "UnusedPivotTable",
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

export const ErrorCategories: Record<ErrorCodeType, ErrorCategory> = {
  [ErrorCode.MALFORMED_INPUT]: "MalformedInput",
  [ErrorCode.INVALID_OPTION]: "MalformedInput",

  [ErrorCode.UNKNOWN_FIELD_TYPE]: "FieldError",
  [ErrorCode.MISSING_DECIMAL_PRECISION]: "FieldError",
  [ErrorCode.INVALID_DECIMAL_PRECISION]: "FieldError",
  [ErrorCode.MISSING_ENUM_VALUES]: "FieldError",
  [ErrorCode.DUPLICATE_ENUM_VALUE]: "FieldError",
  [ErrorCode.EMPTY_ENUM_VALUE]: "FieldError",
  [ErrorCode.INVALID_FIELD_LENGTH]: "FieldError",
  [ErrorCode.INVALID_FIELD_MODIFIER]: "FieldError",
  [ErrorCode.INCOMPATIBLE_DEFAULT]: "FieldError",

  [ErrorCode.UNKNOWN_TARGET_ENTITY]: "RelationshipError",
  [ErrorCode.PIVOT_KEY_CONFLICT]: "RelationshipError",
  [ErrorCode.UNMATCHED_MORPH_NAME]: "RelationshipError",
  [ErrorCode.CASCADE_POLICY_CONFLICT]: "RelationshipError",
  [ErrorCode.INVALID_CASCADE_POLICY]: "RelationshipError",
  [ErrorCode.UNKNOWN_PIVOT_FIELD]: "RelationshipError",

  [ErrorCode.CYCLIC_DEPENDENCY]: "CyclicDependency",

  [ErrorCode.DUPLICATE_ENTITY_NAME]: "ValidationError",
  [ErrorCode.DUPLICATE_TABLE_NAME]: "ValidationError",
  [ErrorCode.DUPLICATE_FIELD_NAME]: "ValidationError",
  [ErrorCode.DUPLICATE_RELATIONSHIP_NAME]: "ValidationError",
  [ErrorCode.EMPTY_ENTITY]: "ValidationError",
  [ErrorCode.INVALID_IDENTIFIER]: "ValidationError",
  [ErrorCode.RESERVED_WORD]: "ValidationError",
  [ErrorCode.RESERVED_FIELD_NAME]: "ValidationError",
  [ErrorCode.UNKNOWN_FIELD]: "ValidationError",
  [ErrorCode.UNUSED_PIVOT_TABLE]: "ValidationError",
};

/**
 * What an error is about. `path` is the dotted location in the input
 * document (`entities.Post.fields[2].type`).
 */
export interface ErrorLocation {
  path: string;
  entity?: string;
  field?: string;
  relationship?: string;
  pivot?: string;
}

export interface ResolutionError extends ErrorLocation {
  severity: ErrorSeverity;
  category: ErrorCategory;
  code: ErrorCodeType;
  message: string;
  suggestion?: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ResolutionError[];
  warnings: ResolutionError[];
}

export function createError(
  code: ErrorCodeType,
  message: string,
  location: ErrorLocation,
  suggestion?: string
): ResolutionError {
  return createIssue("error", code, message, location, suggestion);
}

export function createWarning(
  code: ErrorCodeType,
  message: string,
  location: ErrorLocation,
  suggestion?: string
): ResolutionError {
  return createIssue("warning", code, message, location, suggestion);
}

function createIssue(
  severity: ErrorSeverity,
  code: ErrorCodeType,
  message: string,
  location: ErrorLocation,
  suggestion?: string
): ResolutionError {
  const issue: ResolutionError = {
    severity,
    category: ErrorCategories[code],
    code,
    message,
    ...location,
  };
  if (suggestion !== undefined) {
    issue.suggestion = suggestion;
  }
  return issue;
}

/**
 * Collapse reports of the same problem at the same place, keeping the
 * first occurrence.
 */
export function dedupeErrors(errors: ResolutionError[]): ResolutionError[] {
  const seen = new Set<string>();
  return errors.filter((error) => {
    const key = `${error.code}\u0000${error.path}\u0000${error.message}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

export class ResolutionException extends Error {
  constructor(
    public errors: ResolutionError[],
    public warnings: ResolutionError[] = []
  ) {
    super(`Schema resolution failed with ${errors.length} error(s)`);
    this.name = "ResolutionException";
  }
}
