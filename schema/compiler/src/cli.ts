#!/usr/bin/env node
/**
 * Schema Resolver CLI
 *
 * Usage:
 *   schema-resolve <input.yaml> [output.json] [--verbose] [--strict]
 */

import { writeFileSync, mkdirSync } from "fs";
import { dirname } from "path";
import { formatReport, resolveFile, ResolutionLog, serializeSchema } from "./index.js";

async function main() {
  const args = process.argv.slice(2);
  const flags = new Set(args.filter((arg) => arg.startsWith("--")));
  const [inputFile, outputFile] = args.filter((arg) => !arg.startsWith("--"));

  if (inputFile === undefined) {
    console.error("Usage: schema-resolve <input.yaml|input.json> [output.json] [--verbose] [--strict]");
    console.error("");
    console.error("Examples:");
    console.error("  schema-resolve schema.yaml");
    console.error("  schema-resolve schema.yaml resolved.json --strict");
    process.exit(1);
  }

  const log = new ResolutionLog(
    flags.has("--verbose")
      ? (event) => console.error(`  · ${event.eventType.toLowerCase()}: ${event.detail}`)
      : undefined
  );

  try {
    if (outputFile !== undefined) console.log(`Resolving ${inputFile}...`);
    const result = await resolveFile(inputFile, { log, strict: flags.has("--strict") });

    if (!result.ok) {
      console.error(formatReport(result));
      process.exit(1);
    }

    const json = serializeSchema(result.schema);
    if (outputFile === undefined) {
      // stdout carries only the JSON
      if (result.warnings.length > 0) console.error(formatReport(result));
      console.log(json);
      return;
    }

    mkdirSync(dirname(outputFile), { recursive: true });
    writeFileSync(outputFile, `${json}\n`);
    console.log(formatReport(result));
    console.log(`✓ Wrote resolved schema: ${outputFile}`);
    console.log("");
    console.log("✨ Resolution complete!");
  } catch (error) {
    console.error("Error:", (error as Error).message);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error("Error:", (error as Error).message);
  process.exit(1);
});
