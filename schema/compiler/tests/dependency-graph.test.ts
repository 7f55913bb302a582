/**
 * Dependency Graph Tests
 */

import { describe, it, expect } from "vitest";
import { buildDependencyGraph, DependencyGraph } from "../src/dependency-graph.js";
import type { EmissionStep, Entity, Pivot } from "../src/types.js";

const entity = (name: string): EmissionStep => ({ kind: "entity", name });
const pivot = (name: string): EmissionStep => ({ kind: "pivot", name });

function graphOf(names: string[]): DependencyGraph {
  const graph = new DependencyGraph();
  for (const name of names) graph.addNode(entity(name), `entities.${name}`);
  return graph;
}

describe("DependencyGraph", () => {
  describe("Ordering", () => {
    it("should place dependencies first", () => {
      const graph = graphOf(["Post", "User"]);
      graph.addDependency(entity("Post"), entity("User"), "Post.user");

      expect(graph.sort()).toEqual({ ok: true, value: [entity("User"), entity("Post")] });
    });

    it("should break ties by registration order", () => {
      const graph = graphOf(["C", "A", "B"]);
      graph.addDependency(entity("C"), entity("B"), "C.b");

      expect(graph.sort()).toEqual({
        ok: true,
        value: [entity("A"), entity("B"), entity("C")],
      });
    });

    it("should order pivots after both sides", () => {
      const graph = graphOf(["Post", "Tag"]);
      graph.addNode(pivot("posts_tags"), "pivotTables.posts_tags");
      graph.addDependency(pivot("posts_tags"), entity("Post"), "posts_tags.post_id");
      graph.addDependency(pivot("posts_tags"), entity("Tag"), "posts_tags.tag_id");

      expect(graph.sort()).toEqual({
        ok: true,
        value: [entity("Post"), entity("Tag"), pivot("posts_tags")],
      });
    });

    it("should set self-references aside", () => {
      const graph = graphOf(["Category"]);
      graph.addDependency(entity("Category"), entity("Category"), "Category.parent");

      expect(graph.getSelfReferences()).toEqual([
        { from: "entity:Category", to: "entity:Category", via: "Category.parent" },
      ]);
      expect(graph.getEdges()).toEqual([]);
      expect(graph.sort()).toEqual({ ok: true, value: [entity("Category")] });
    });

    it("should ignore edges to unknown nodes", () => {
      const graph = graphOf(["Post"]);
      graph.addDependency(entity("Post"), entity("Ghost"), "Post.ghost");

      expect(graph.dependenciesOf(entity("Post"))).toEqual([]);
    });
  });

  describe("Cycles", () => {
    it("should name the full cycle and the relationships in it", () => {
      const graph = graphOf(["A", "B"]);
      graph.addDependency(entity("A"), entity("B"), "A.b");
      graph.addDependency(entity("B"), entity("A"), "B.a");

      const result = graph.sort();
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.errors).toEqual([
        expect.objectContaining({
          code: "CyclicDependency",
          category: "CyclicDependency",
          path: "entities.A",
          entity: "A",
          message: "Circular dependency detected: A → B → A (via A.b, B.a)",
        }),
      ]);
    });

    it("should report a longer cycle once", () => {
      const graph = graphOf(["A", "B", "C", "D"]);
      graph.addDependency(entity("A"), entity("B"), "A.b");
      graph.addDependency(entity("B"), entity("C"), "B.c");
      graph.addDependency(entity("C"), entity("A"), "C.a");
      graph.addDependency(entity("D"), entity("A"), "D.a");

      const result = graph.sort();
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.errors.map((e) => e.message)).toEqual([
        "Circular dependency detected: A → B → C → A (via A.b, B.c, C.a)",
      ]);
    });

    it("should report every cycle through a shared node", () => {
      const graph = graphOf(["A", "B", "C"]);
      graph.addDependency(entity("A"), entity("B"), "A.b");
      graph.addDependency(entity("A"), entity("C"), "A.c");
      graph.addDependency(entity("B"), entity("C"), "B.c");
      graph.addDependency(entity("C"), entity("A"), "C.a");

      const result = graph.sort();
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.errors.map((e) => e.message)).toEqual([
        "Circular dependency detected: A → B → C → A (via A.b, B.c, C.a)",
        "Circular dependency detected: A → C → A (via A.c, C.a)",
      ]);
    });

    it("should report independent cycles separately", () => {
      const graph = graphOf(["A", "B", "C", "D"]);
      graph.addDependency(entity("A"), entity("B"), "A.b");
      graph.addDependency(entity("B"), entity("A"), "B.a");
      graph.addDependency(entity("C"), entity("D"), "C.d");
      graph.addDependency(entity("D"), entity("C"), "D.c");

      const result = graph.sort();
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.errors).toHaveLength(2);
    });
  });

  describe("buildDependencyGraph", () => {
    const base = {
      primaryKey: { name: "id", type: "bigInteger" as const },
      fields: [],
      timestamps: true,
      softDeletes: false,
      traits: [],
      validationRules: [],
      fillableGuarded: { kind: "all" } as const,
    };

    it("should point has-many edges from the key holder to the owner", () => {
      const entities: Entity[] = [
        {
          ...base,
          name: "Comment",
          table: "comments",
          relationships: [],
        },
        {
          ...base,
          name: "Post",
          table: "posts",
          relationships: [
            {
              kind: "hasMany",
              name: "comments",
              owner: "Post",
              target: "Comment",
              foreignKey: "post_id",
              localKey: "id",
              onDelete: "restrict",
              onUpdate: "restrict",
            },
          ],
        },
      ];

      const graph = buildDependencyGraph(entities, [], "entities");

      expect(graph.getEdges()).toEqual([
        { from: "entity:Comment", to: "entity:Post", via: "Post.comments" },
      ]);
      expect(graph.sort()).toEqual({ ok: true, value: [entity("Post"), entity("Comment")] });
    });

    it("should point polymorphic pivots at their related entity only", () => {
      const entities: Entity[] = [
        { ...base, name: "Post", table: "posts", relationships: [] },
        { ...base, name: "Tag", table: "tags", relationships: [] },
      ];
      const pivots: Pivot[] = [
        {
          kind: "morph",
          name: "taggables",
          morphName: "taggable",
          related: { entity: "Tag", key: "tag_id" },
          morphKey: "taggable_id",
          morphType: "taggable_type",
          morphedBy: ["Post"],
          timestamps: false,
          fields: [],
          origin: "inferred",
          usedBy: ["Post.tags"],
        },
      ];

      const graph = buildDependencyGraph(entities, pivots, "entities");

      expect(graph.dependenciesOf(pivot("taggables"))).toEqual([entity("Tag")]);
    });
  });
});
