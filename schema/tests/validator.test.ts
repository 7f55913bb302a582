/**
 * Schema Validator Tests
 */

import { describe, it, expect } from "vitest";
import { SchemaValidator } from "../validator.js";
import type {
  BelongsToRelationship,
  Entity,
  Pivot,
  StandardPivot,
  TextField,
} from "../compiler/src/types.js";

function field(name: string, overrides: Partial<TextField> = {}): TextField {
  return {
    name,
    type: "string",
    length: 255,
    nullable: false,
    unique: false,
    index: false,
    primary: false,
    default: null,
    comment: null,
    cast: null,
    morphName: null,
    validationRules: [],
    origin: "declared",
    ...overrides,
  };
}

function entity(name: string, overrides: Partial<Entity> = {}): Entity {
  return {
    name,
    table: `${name.toLowerCase()}s`,
    primaryKey: { name: "id", type: "bigInteger" },
    fields: [field("title")],
    relationships: [],
    timestamps: false,
    softDeletes: false,
    traits: [],
    validationRules: [],
    fillableGuarded: { kind: "all" },
    ...overrides,
  };
}

function belongsTo(owner: string, target: string, name: string): BelongsToRelationship {
  return {
    kind: "belongsTo",
    name,
    owner,
    target,
    foreignKey: `${target.toLowerCase()}_id`,
    localKey: "id",
    onDelete: "restrict",
    onUpdate: "restrict",
  };
}

function postsTags(overrides: Partial<StandardPivot> = {}): Pivot {
  return {
    kind: "standard",
    name: "posts_tags",
    sides: [
      { entity: "Post", key: "post_id" },
      { entity: "Tag", key: "tag_id" },
    ],
    timestamps: false,
    fields: [],
    origin: "inferred",
    usedBy: ["Post.tags"],
    ...overrides,
  };
}

describe("SchemaValidator", () => {
  const validator = new SchemaValidator();

  describe("Valid Schema", () => {
    it("should accept entities, relationships and pivots", () => {
      const result = validator.validate({
        entities: [
          entity("User"),
          entity("Post", { relationships: [belongsTo("Post", "User", "user")] }),
          entity("Tag"),
        ],
        pivots: [postsTags()],
      });

      expect(result).toEqual({ valid: true, errors: [], warnings: [] });
    });
  });

  describe("Name Uniqueness", () => {
    it("should reject an entity declared twice", () => {
      const result = validator.validate({
        entities: [entity("User"), entity("User")],
        pivots: [],
      });

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([
        expect.objectContaining({
          code: "DuplicateEntityName",
          message: 'Entity "User" is declared 2 times',
          path: "entities.User",
        }),
        expect.objectContaining({
          code: "DuplicateTableName",
          message: 'Storage name "users" is used by entity "User", entity "User"',
          path: "tables.users",
        }),
      ]);
    });

    it("should reject an entity and a pivot sharing a storage name", () => {
      const result = validator.validate({
        entities: [entity("Post"), entity("Tag"), entity("Link", { table: "posts_tags" })],
        pivots: [postsTags()],
      });

      expect(result.errors).toEqual([
        expect.objectContaining({
          code: "DuplicateTableName",
          message: 'Storage name "posts_tags" is used by entity "Link", pivot "posts_tags"',
          suggestion: "Set an explicit table name on one of them",
        }),
      ]);
    });

    it("should reject duplicate field names", () => {
      const result = validator.validate({
        entities: [entity("Post", { fields: [field("title"), field("title")] })],
        pivots: [],
      });

      expect(result.errors).toEqual([
        expect.objectContaining({
          code: "DuplicateFieldName",
          message: 'Duplicate field name "title" in "Post"',
          path: "entities.Post.fields.title",
          field: "title",
        }),
      ]);
    });

    it("should reject duplicate relationship names", () => {
      const result = validator.validate({
        entities: [
          entity("User"),
          entity("Post", {
            relationships: [belongsTo("Post", "User", "user"), belongsTo("Post", "User", "user")],
          }),
        ],
        pivots: [],
      });

      expect(result.errors).toEqual([
        expect.objectContaining({
          code: "DuplicateRelationshipName",
          message: 'Duplicate relationship name "user" in entity "Post"',
          path: "entities.Post.relationships.user",
        }),
      ]);
    });
  });

  describe("Identifiers", () => {
    it("should require a leading letter or underscore", () => {
      const result = validator.validate({
        entities: [entity("2Fast")],
        pivots: [],
      });

      expect(result.errors).toEqual([
        expect.objectContaining({
          code: "InvalidIdentifier",
          message: 'Entity name "2Fast" must start with a letter or underscore',
        }),
      ]);
    });

    it("should reject invalid characters in names and storage names", () => {
      const result = validator.validate({
        entities: [entity("Blog-Post")],
        pivots: [],
      });

      expect(result.errors.map((e) => e.message)).toEqual([
        'Entity name "Blog-Post" contains invalid characters',
        'Storage name "blog-posts" contains invalid characters',
      ]);
    });

    it("should limit identifier length", () => {
      const name = "A".repeat(65);
      const result = validator.validate({
        entities: [entity(name)],
        pivots: [],
      });

      expect(result.errors).toContainEqual(
        expect.objectContaining({
          message: `Entity name "${name}" exceeds maximum length of 64 characters`,
        })
      );
    });

    it("should skip identifier checks when disabled", () => {
      const result = new SchemaValidator({ validateIdentifiers: false }).validate({
        entities: [entity("Blog-Post")],
        pivots: [],
      });

      expect(result.valid).toBe(true);
    });
  });

  describe("Reserved Words", () => {
    it("should reject reserved entity names", () => {
      const result = validator.validate({
        entities: [entity("Class")],
        pivots: [],
      });

      expect(result.errors).toEqual([
        expect.objectContaining({
          code: "ReservedWord",
          message: 'Entity name "Class" is a reserved keyword',
          suggestion: 'Choose a different name like "ClassEntity"',
        }),
      ]);
    });

    it("should reject reserved field names", () => {
      const result = validator.validate({
        entities: [entity("Post", { fields: [field("function")] })],
        pivots: [],
      });

      expect(result.errors).toEqual([
        expect.objectContaining({
          code: "ReservedWord",
          message: 'Field name "function" is a reserved keyword',
          path: "entities.Post.fields.function",
        }),
      ]);
    });

    it("should accept reserved words when allowed", () => {
      const result = new SchemaValidator({ allowReservedWords: true }).validate({
        entities: [entity("Class", { fields: [field("function")] })],
        pivots: [],
      });

      expect(result.valid).toBe(true);
    });

    it("should reject a declared id that is not the primary key", () => {
      const result = validator.validate({
        entities: [entity("Post", { fields: [field("id")] })],
        pivots: [],
      });

      expect(result.errors).toEqual([
        expect.objectContaining({
          code: "ReservedFieldName",
          message: 'Field "id" on "Post" is the implicit primary key and cannot be declared',
        }),
      ]);
    });

    it("should not check inferred columns", () => {
      const result = validator.validate({
        entities: [entity("Post", { fields: [field("title"), field("class_id", { origin: "inferred" })] })],
        pivots: [],
      });

      expect(result.valid).toBe(true);
    });
  });

  describe("Entity Rules", () => {
    it("should require at least one field or timestamps", () => {
      const result = validator.validate({
        entities: [entity("Tag", { fields: [] })],
        pivots: [],
      });

      expect(result.errors).toEqual([
        expect.objectContaining({
          code: "EmptyEntity",
          message: 'Entity "Tag" must have at least one field or timestamps',
          path: "entities.Tag.fields",
        }),
      ]);
      expect(
        validator.validate({ entities: [entity("Tag", { fields: [], timestamps: true })], pivots: [] })
          .valid
      ).toBe(true);
    });

    it("should not call an entity empty when some of its fields failed to resolve", () => {
      const invoice = entity("Invoice", { fields: [] });
      const result = validator.validate({
        entities: [invoice],
        pivots: [],
        incomplete: new Set([invoice]),
      });

      expect(result).toEqual({ valid: true, errors: [], warnings: [] });
    });

    it("should reject fillable fields the entity does not have", () => {
      const result = validator.validate({
        entities: [
          entity("Post", { fillableGuarded: { kind: "fillable", fields: ["title", "slug"] } }),
        ],
        pivots: [],
      });

      expect(result.errors).toEqual([
        expect.objectContaining({
          code: "UnknownField",
          message: 'Entity "Post" lists "slug" as fillable but has no such field',
          path: "entities.Post.fillableGuarded",
          entity: "Post",
          field: "slug",
        }),
      ]);
    });

    it("should report relationships to unknown entities", () => {
      const result = validator.validate({
        entities: [entity("User"), entity("Post", { relationships: [belongsTo("Post", "Users", "owner")] })],
        pivots: [],
      });

      expect(result.errors).toEqual([
        expect.objectContaining({
          code: "UnknownTargetEntity",
          message: 'Relationship "owner" on "Post" references non-existent entity "Users"',
          suggestion: 'Did you mean "User"?',
        }),
      ]);
    });

    it("should use the declared entity key in paths", () => {
      const result = validator.validate({
        entities: [entity("Tag", { fields: [] })],
        pivots: [],
        entityKey: "models",
      });

      expect(result.errors[0].path).toBe("models.Tag.fields");
    });
  });

  describe("Pivot Rules", () => {
    it("should reject pivot sides that name unknown entities", () => {
      const result = validator.validate({
        entities: [entity("Post")],
        pivots: [postsTags()],
      });

      expect(result.errors).toEqual([
        expect.objectContaining({
          code: "UnknownTargetEntity",
          message: 'Pivot "posts_tags" references non-existent entity "Tag"',
          pivot: "posts_tags",
        }),
      ]);
    });

    it("should reject extra columns that collide with key columns", () => {
      const result = validator.validate({
        entities: [entity("Post"), entity("Tag")],
        pivots: [postsTags({ fields: [field("post_id")] })],
      });

      expect(result.errors).toEqual([
        expect.objectContaining({
          code: "DuplicateFieldName",
          message: 'Field "post_id" on pivot "posts_tags" collides with a key column',
          path: "pivotTables.posts_tags.additionalFields.post_id",
        }),
      ]);
    });

    it("should warn about declared pivots nothing uses", () => {
      const unused = postsTags({ origin: "declared", usedBy: [] });
      const result = validator.validate({
        entities: [entity("Post"), entity("Tag")],
        pivots: [unused],
      });

      expect(result.valid).toBe(true);
      expect(result.warnings).toEqual([
        expect.objectContaining({
          severity: "warning",
          code: "UnusedPivotTable",
          message: 'Pivot table "posts_tags" is declared but no relationship uses it',
        }),
      ]);
    });

    it("should report warnings as errors in strict mode", () => {
      const result = new SchemaValidator({ strict: true }).validate({
        entities: [entity("Post"), entity("Tag")],
        pivots: [postsTags({ origin: "declared", usedBy: [] })],
      });

      expect(result.valid).toBe(false);
      expect(result.warnings).toEqual([]);
      expect(result.errors).toEqual([
        expect.objectContaining({ severity: "error", code: "UnusedPivotTable" }),
      ]);
    });
  });
});
