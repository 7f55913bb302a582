/**
 * Generation options
 *
 * Global settings that travel with a resolved schema to the emitters.
 * Values are layered: defaults, then the document, then the environment,
 * then explicit overrides.
 */

import type { RawOptions } from "./config-model.js";
import type { GenerationOptions, Outcome } from "./types.js";
import { createError, ErrorCode, type ResolutionError } from "../../validation-errors.js";

export const DEFAULT_OPTIONS: GenerationOptions = {
  outputDir: ".",
  namespace: "App\\Models",
  generateModels: true,
  generateControllers: true,
  generateResources: true,
  generateFactories: true,
  generateMigrations: true,
  generatePivotTables: true,
  generateValidationRules: true,
  generateDto: false,
  useDddStructure: false,
  databaseEngine: "mysql",
  forceOverwrite: false,
};

export const ENV_PREFIX = "SCHEMA_RESOLVER_";

/**
 * Options read from `SCHEMA_RESOLVER_*` variables. Unparseable booleans
 * read as false.
 */
export function optionsFromEnv(
  env: NodeJS.ProcessEnv = process.env
): Partial<GenerationOptions> {
  const options: { -readonly [K in keyof GenerationOptions]?: GenerationOptions[K] } = {};

  const outputDir = env[`${ENV_PREFIX}OUTPUT_DIR`];
  if (outputDir !== undefined) options.outputDir = outputDir;

  const namespace = env[`${ENV_PREFIX}NAMESPACE`];
  if (namespace !== undefined) options.namespace = namespace;

  const ddd = env[`${ENV_PREFIX}USE_DDD`];
  if (ddd !== undefined) options.useDddStructure = ddd === "true";

  const force = env[`${ENV_PREFIX}FORCE_OVERWRITE`];
  if (force !== undefined) options.forceOverwrite = force === "true";

  return options;
}

export function loadOptions(
  document: RawOptions,
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<GenerationOptions> = {}
): Outcome<GenerationOptions> {
  const options = [document, optionsFromEnv(env), overrides].reduce<GenerationOptions>(
    mergeOptions,
    DEFAULT_OPTIONS
  );

  const errors = validateOptions(options);
  return errors.length > 0 ? { ok: false, errors } : { ok: true, value: options };
}

export function validateOptions(options: GenerationOptions): ResolutionError[] {
  const errors: ResolutionError[] = [];

  if (options.outputDir.trim().length === 0) {
    errors.push(
      createError(ErrorCode.INVALID_OPTION, "Output directory cannot be empty", {
        path: "outputDir",
      })
    );
  }

  if (!isValidNamespace(options.namespace)) {
    errors.push(
      createError(
        ErrorCode.INVALID_OPTION,
        `Namespace "${options.namespace}" must be backslash-separated identifiers`,
        { path: "namespace" },
        'Use a form like "App\\Models"'
      )
    );
  }

  return errors;
}

export function isValidNamespace(namespace: string): boolean {
  if (namespace.length === 0) return false;
  return namespace.split("\\").every((part) => /^[A-Za-z_][A-Za-z0-9_]*$/.test(part));
}

function mergeOptions(
  base: GenerationOptions,
  layer: Partial<GenerationOptions>
): GenerationOptions {
  return {
    outputDir: layer.outputDir ?? base.outputDir,
    namespace: layer.namespace ?? base.namespace,
    generateModels: layer.generateModels ?? base.generateModels,
    generateControllers: layer.generateControllers ?? base.generateControllers,
    generateResources: layer.generateResources ?? base.generateResources,
    generateFactories: layer.generateFactories ?? base.generateFactories,
    generateMigrations: layer.generateMigrations ?? base.generateMigrations,
    generatePivotTables: layer.generatePivotTables ?? base.generatePivotTables,
    generateValidationRules: layer.generateValidationRules ?? base.generateValidationRules,
    generateDto: layer.generateDto ?? base.generateDto,
    useDddStructure: layer.useDddStructure ?? base.useDddStructure,
    databaseEngine: layer.databaseEngine ?? base.databaseEngine,
    forceOverwrite: layer.forceOverwrite ?? base.forceOverwrite,
  };
}
