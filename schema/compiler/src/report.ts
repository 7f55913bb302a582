/**
 * Plain-text resolution report
 */

import type { ResolutionResult } from "./types.js";
import type { ResolutionError } from "../../validation-errors.js";

export function formatIssue(issue: ResolutionError): string {
  const line = `${issue.severity}[${issue.code}] ${issue.path}: ${issue.message}`;
  return issue.suggestion !== undefined ? `${line}\n  help: ${issue.suggestion}` : line;
}

/**
 * One entry per problem, errors first, then a summary line
 */
export function formatReport(result: ResolutionResult): string {
  const errors = result.ok ? [] : result.errors;
  const lines = [...errors, ...result.warnings].map(formatIssue);

  if (result.ok) {
    const { entities, pivots } = result.schema;
    lines.push(
      `Resolved ${entities.length} entit${entities.length === 1 ? "y" : "ies"} and ${pivots.length} pivot${pivots.length === 1 ? "" : "s"} with ${result.warnings.length} warning(s)`
    );
  } else {
    lines.push(
      `Resolution failed with ${errors.length} error(s) and ${result.warnings.length} warning(s)`
    );
  }

  return lines.join("\n");
}
