/**
 * Resolution Report Tests
 */

import { describe, it, expect } from "vitest";
import { resolve } from "../src/index.js";
import { formatReport } from "../src/report.js";
import type { ResolutionResult } from "../src/types.js";
import { createError, createWarning, ErrorCode } from "../../validation-errors.js";

describe("formatReport", () => {
  it("should list errors, warnings and a summary", () => {
    const result: ResolutionResult = {
      ok: false,
      errors: [
        createError(
          ErrorCode.UNKNOWN_FIELD_TYPE,
          'Field "size" on "Post": unknown type "bigint"',
          { path: "entities.Post.fields[1]", entity: "Post", field: "size" },
          'Did you mean "bigInteger"?'
        ),
      ],
      warnings: [
        createWarning(
          ErrorCode.UNUSED_PIVOT_TABLE,
          'Pivot table "audits" is declared but no relationship uses it',
          { path: "pivotTables.audits", pivot: "audits" }
        ),
      ],
    };

    expect(formatReport(result)).toBe(
      [
        'error[UnknownFieldType] entities.Post.fields[1]: Field "size" on "Post": unknown type "bigint"',
        '  help: Did you mean "bigInteger"?',
        'warning[UnusedPivotTable] pivotTables.audits: Pivot table "audits" is declared but no relationship uses it',
        "Resolution failed with 1 error(s) and 1 warning(s)",
      ].join("\n")
    );
  });

  it("should summarize a successful resolution", () => {
    const result = resolve(
      `
entities:
  - name: User
    fields: [{ name: email, type: string }]
  - name: Post
    fields: [{ name: title, type: string }]
    relationships:
      - { type: belongsTo, model: User }
`,
      "yaml",
      { env: {} }
    );

    expect(formatReport(result)).toBe("Resolved 2 entities and 0 pivots with 0 warning(s)");
  });
});
