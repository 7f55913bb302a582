/**
 * Generation Options Tests
 */

import { describe, it, expect } from "vitest";
import { DEFAULT_OPTIONS, isValidNamespace, loadOptions, optionsFromEnv } from "../src/options.js";

describe("options", () => {
  it("should fall back to defaults", () => {
    expect(loadOptions({}, {})).toEqual({ ok: true, value: DEFAULT_OPTIONS });
  });

  it("should layer document, environment and overrides", () => {
    const result = loadOptions(
      { namespace: "Doc\\Models", outputDir: "doc", generateDto: true },
      { SCHEMA_RESOLVER_NAMESPACE: "Env\\Models", SCHEMA_RESOLVER_OUTPUT_DIR: "env" },
      { outputDir: "override" }
    );

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.namespace).toBe("Env\\Models");
    expect(result.value.outputDir).toBe("override");
    expect(result.value.generateDto).toBe(true);
    expect(result.value.generateModels).toBe(true);
  });

  it("should read boolean environment flags", () => {
    expect(
      optionsFromEnv({
        SCHEMA_RESOLVER_USE_DDD: "true",
        SCHEMA_RESOLVER_FORCE_OVERWRITE: "yes",
      })
    ).toEqual({ useDddStructure: true, forceOverwrite: false });
  });

  it("should reject an empty output directory", () => {
    const result = loadOptions({ outputDir: "  " }, {});

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.errors).toEqual([
      expect.objectContaining({
        code: "InvalidOption",
        category: "MalformedInput",
        path: "outputDir",
        message: "Output directory cannot be empty",
      }),
    ]);
  });

  it("should reject a malformed namespace", () => {
    const result = loadOptions({ namespace: "App\\9Models" }, {});

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.errors[0]).toMatchObject({ code: "InvalidOption", path: "namespace" });
  });

  it("should validate namespace segments", () => {
    expect(isValidNamespace("App\\Models")).toBe(true);
    expect(isValidNamespace("Domain")).toBe(true);
    expect(isValidNamespace("App\\\\Models")).toBe(false);
    expect(isValidNamespace("")).toBe(false);
  });
});
