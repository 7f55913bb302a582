/**
 * Naming conventions
 *
 * Stateless helpers that turn entity names into storage names, key names
 * and accessor names. Every inferred name in a resolved schema goes
 * through here.
 */

const VOWELS = new Set(["a", "e", "i", "o", "u"]);

// Singular words that happen to end in "s"
const SINGULAR_S_ENDINGS = ["ss", "us", "is"];

/**
 * `UserProfile` -> `user_profile`, `HTTPServer` -> `http_server`,
 * `userID` -> `user_id`.
 */
export function toSnakeCase(input: string): string {
  const chars = Array.from(input);
  let result = "";

  for (let i = 0; i < chars.length; i++) {
    const ch = chars[i];
    if (ch === "-" || ch === " " || ch === "_") {
      if (result.length > 0 && !result.endsWith("_")) result += "_";
      continue;
    }

    const isUpper = ch !== ch.toLowerCase();
    if (isUpper && result.length > 0 && !result.endsWith("_")) {
      const prev = chars[i - 1];
      const next = chars[i + 1];
      const prevIsLowerOrDigit = prev !== prev.toUpperCase() || /[0-9]/.test(prev);
      const nextIsLower = next !== undefined && next !== next.toUpperCase();
      if (prevIsLowerOrDigit || nextIsLower) {
        result += "_";
      }
    }
    result += ch.toLowerCase();
  }

  return result.replace(/_+$/, "");
}

/**
 * `user_profile` -> `userProfile`, `UserProfile` -> `userProfile`.
 */
export function toCamelCase(input: string): string {
  const parts = toSnakeCase(input).split("_").filter((part) => part.length > 0);
  return parts
    .map((part, i) => (i === 0 ? part : part[0].toUpperCase() + part.slice(1)))
    .join("");
}

export function toPascalCase(input: string): string {
  const camel = toCamelCase(input);
  return camel.length === 0 ? camel : camel[0].toUpperCase() + camel.slice(1);
}

/**
 * `in_progress` -> `In Progress`
 */
export function toTitleCase(input: string): string {
  return toSnakeCase(input)
    .split("_")
    .filter((part) => part.length > 0)
    .map((part) => part[0].toUpperCase() + part.slice(1))
    .join(" ");
}

/**
 * Simple English pluralization.
 */
export function pluralize(word: string): string {
  if (word.length === 0) return word;
  const lower = word.toLowerCase();

  if (lower.endsWith("y") && !VOWELS.has(lower.charAt(lower.length - 2))) {
    return `${word.slice(0, -1)}ies`;
  }
  if (
    lower.endsWith("s") ||
    lower.endsWith("sh") ||
    lower.endsWith("ch") ||
    lower.endsWith("x") ||
    lower.endsWith("z")
  ) {
    return `${word}es`;
  }
  if (lower.endsWith("fe")) {
    return `${word.slice(0, -2)}ves`;
  }
  if (lower.endsWith("f")) {
    return `${word.slice(0, -1)}ves`;
  }
  return `${word}s`;
}

/**
 * Inverse of {@link pluralize} for the regular cases.
 */
export function singularize(word: string): string {
  if (word.length <= 1) return word;
  const lower = word.toLowerCase();

  if (lower.endsWith("ies") && word.length > 3) {
    return `${word.slice(0, -3)}y`;
  }
  if (lower.endsWith("ives") && word.length > 4) {
    return `${word.slice(0, -4)}ife`;
  }
  if (lower.endsWith("ves") && word.length > 3) {
    return `${word.slice(0, -3)}f`;
  }
  if (
    lower.endsWith("sses") ||
    lower.endsWith("shes") ||
    lower.endsWith("ches") ||
    lower.endsWith("xes") ||
    lower.endsWith("zes")
  ) {
    return word.slice(0, -2);
  }
  if (SINGULAR_S_ENDINGS.some((ending) => lower.endsWith(ending))) {
    return word;
  }
  if (lower.endsWith("s")) {
    return word.slice(0, -1);
  }
  return word;
}

/**
 * Snake case with the last segment singularized: `Comments` -> `comment`,
 * `BlogPost` -> `blog_post`, `Status` -> `status`.
 */
export function singularSnakeCase(name: string): string {
  const parts = toSnakeCase(name).split("_");
  const last = parts.length - 1;
  parts[last] = singularize(parts[last]);
  return parts.join("_");
}

/**
 * Storage name for an entity without an explicit one: `BlogPost` -> `blog_posts`.
 */
export function tableName(entityName: string): string {
  const parts = toSnakeCase(entityName).split("_");
  const last = parts.length - 1;
  parts[last] = pluralize(singularize(parts[last]));
  return parts.join("_");
}

/**
 * `{singular_snake_case(entity)}_id`
 */
export function foreignKeyName(entityName: string): string {
  return `${singularSnakeCase(entityName)}_id`;
}

/**
 * Canonical join table name: both storage names sorted by code unit and
 * joined with an underscore, so either side derives the same name.
 */
export function pivotTableName(firstTable: string, secondTable: string): string {
  return [firstTable, secondTable].sort().join("_");
}

export function morphTypeColumn(morphName: string): string {
  return `${morphName}_type`;
}

export function morphIdColumn(morphName: string): string {
  return `${morphName}_id`;
}

export function singularAccessor(entityName: string): string {
  return toCamelCase(entityName);
}

export function pluralAccessor(entityName: string): string {
  return pluralize(toCamelCase(entityName));
}
