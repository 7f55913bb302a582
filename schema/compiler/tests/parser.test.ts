/**
 * Schema Parser Tests
 */

import { describe, it, expect } from "vitest";
import { camelizeKeys, describePath, SchemaParser } from "../src/parser.js";

describe("SchemaParser", () => {
  const parser = new SchemaParser();

  describe("Parsing", () => {
    it("should parse a YAML document with snake_case keys", () => {
      const result = parser.parseYAML(`
models:
  - name: Post
    soft_deletes: true
    fillable_guarded:
      fillable: [status]
    fields:
      - name: status
        type: enum
        enum_values: [draft, live]
        validation_rules:
          - rule: required
`);

      expect(result.ok).toBe(true);
      if (!result.ok) return;

      expect(result.value.entityKey).toBe("models");
      expect(result.value.entities[0].softDeletes).toBe(true);
      expect(result.value.entities[0].fillableGuarded).toEqual({ fillable: ["status"] });
      expect(result.value.entities[0].fields).toEqual([
        {
          name: "status",
          type: "enum",
          enumValues: ["draft", "live"],
          validationRules: [{ rule: "required" }],
        },
      ]);
    });

    it("should accept every fillable/guarded form", () => {
      const result = parser.parseYAML(`
entities:
  - name: A
    fillableGuarded: All
  - name: B
    fillableGuarded: { Guarded: [id] }
  - name: C
    fillableGuarded: { guarded: [] }
`);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.entities.map((entity) => entity.fillableGuarded)).toEqual([
        "All",
        { Guarded: ["id"] },
        { guarded: [] },
      ]);
    });

    it("should reject a validation rule without a name", () => {
      const result = parser.parseYAML(`
entities:
  - name: Post
    validationRules:
      - { rule: "", parameters: [title] }
`);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.errors).toEqual([
        expect.objectContaining({
          code: "MalformedInput",
          path: "entities.Post.validationRules[0].rule",
          entity: "Post",
          message:
            'Malformed entity "Post": Validation rule name cannot be empty at entities.Post.validationRules[0].rule',
        }),
      ]);
    });

    it("should parse a JSON document", () => {
      const result = parser.parseJSON(
        JSON.stringify({
          namespace: "Shop\\Models",
          entities: [{ name: "Order", fields: [{ name: "total", type: "integer" }] }],
        })
      );

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.entityKey).toBe("entities");
      expect(result.value.options).toEqual({ namespace: "Shop\\Models" });
    });

    it("should preserve absent keys instead of defaulting them", () => {
      const result = parser.parseYAML(`
entities:
  - name: User
    relationships:
      - type: hasMany
        model: Post
`);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.entities[0]).toEqual({
        name: "User",
        relationships: [{ type: "hasMany", model: "Post" }],
      });
    });

    it("should collect top-level pivots before entity pivots", () => {
      const result = parser.parseYAML(`
pivotTables:
  - { name: role_user, model1: Role, model2: User, foreignKey1: role_id, foreignKey2: user_id }
entities:
  - name: Team
    pivotTables:
      - { name: team_user, model1: Team, model2: User, foreignKey1: team_id, foreignKey2: user_id }
`);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.pivotTables.map((p) => p.name)).toEqual(["role_user", "team_user"]);
    });
  });

  describe("Malformed input", () => {
    it("should report unparseable YAML at the root", () => {
      const result = parser.parseYAML("entities: [");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]).toMatchObject({
        code: "MalformedInput",
        category: "MalformedInput",
        path: "(root)",
      });
      expect(result.errors[0].message).toMatch(/^Could not parse YAML document: /);
    });

    it("should report unparseable JSON", () => {
      const result = parser.parseJSON("{");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.errors[0].message).toMatch(/^Could not parse JSON document: /);
    });

    it("should require an entity list", () => {
      const result = parser.parseYAML("namespace: App");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.errors).toEqual([
        expect.objectContaining({
          code: "MalformedInput",
          path: "entities",
          message:
            'Malformed document: Required: a list of entity declarations under "entities" (or "models") at entities',
        }),
      ]);
    });

    it("should name the entity and field of a missing key", () => {
      const result = parser.parseYAML(`
entities:
  - name: Post
    fields:
      - name: title
`);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.errors).toEqual([
        expect.objectContaining({
          code: "MalformedInput",
          path: "entities.Post.fields[0].type",
          entity: "Post",
          field: "title",
          message: 'Malformed entity "Post", field "title": Required at entities.Post.fields[0].type',
        }),
      ]);
    });

    it("should reject an unknown relationship kind", () => {
      const result = parser.parseYAML(`
entities:
  - name: Post
    relationships:
      - type: hasLots
        model: Comment
`);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.errors[0]).toMatchObject({
        code: "MalformedInput",
        path: "entities.Post.relationships[0].type",
        entity: "Post",
        relationship: "relationships[0]",
      });
    });

    it("should reject keys of the wrong type", () => {
      const result = parser.parseYAML(`
entities:
  - name: Post
    timestamps: "yes"
`);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.errors[0]).toMatchObject({
        path: "entities.Post.timestamps",
        entity: "Post",
      });
    });
  });

  describe("Helpers", () => {
    it("should camelize nested keys but not values", () => {
      expect(
        camelizeKeys({ morph_name: "commentable", fields: [{ enum_values: ["in_review"] }] })
      ).toEqual({ morphName: "commentable", fields: [{ enumValues: ["in_review"] }] });
    });

    it("should fall back to indexes for unnamed entries", () => {
      expect(describePath({ entities: [{}] }, ["entities", 0, "name"])).toEqual({
        path: "entities[0].name",
      });
      expect(describePath({}, [])).toEqual({ path: "(root)" });
    });
  });
});
