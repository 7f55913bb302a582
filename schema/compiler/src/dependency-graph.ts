/**
 * Dependency Graph Builder
 *
 * An edge `A -> B` means A needs B to exist first. Nodes are entities and
 * pivots; the emission order lists every node after everything it needs,
 * breaking ties by registration order.
 */

import type { EmissionStep, Entity, Outcome, Pivot } from "./types.js";
import { createError, ErrorCode, type ResolutionError } from "../../validation-errors.js";

export interface DependencyEdge {
  from: string;
  to: string;
  /** Relationship or pivot column that induces the edge (`Post.author`) */
  via: string;
}

interface GraphNode {
  id: string;
  step: EmissionStep;
  index: number;
  path: string;
}

export function nodeId(step: EmissionStep): string {
  return `${step.kind}:${step.name}`;
}

export class DependencyGraph {
  private nodes = new Map<string, GraphNode>();
  private edges: DependencyEdge[] = [];
  private selfReferences: DependencyEdge[] = [];

  addNode(step: EmissionStep, path: string): void {
    const id = nodeId(step);
    if (this.nodes.has(id)) return;
    this.nodes.set(id, { id, step, index: this.nodes.size, path });
  }

  /**
   * Record that `from` needs `to`. Edges to unknown nodes are ignored; an
   * edge from a node to itself is kept apart and never blocks ordering.
   */
  addDependency(from: EmissionStep, to: EmissionStep, via: string): void {
    const edge = { from: nodeId(from), to: nodeId(to), via };
    if (!this.nodes.has(edge.from) || !this.nodes.has(edge.to)) return;

    if (edge.from === edge.to) {
      this.selfReferences.push(edge);
    } else {
      this.edges.push(edge);
    }
  }

  getEdges(): DependencyEdge[] {
    return [...this.edges];
  }

  getSelfReferences(): DependencyEdge[] {
    return [...this.selfReferences];
  }

  dependenciesOf(step: EmissionStep): EmissionStep[] {
    const id = nodeId(step);
    return this.sortedTargets(id).map((target) => this.node(target).step);
  }

  /**
   * Stable topological order, or one CyclicDependency error per cycle
   */
  sort(): Outcome<EmissionStep[]> {
    const emitted = new Set<string>();
    const order: EmissionStep[] = [];
    const pending = Array.from(this.nodes.values());

    while (pending.length > 0) {
      const next = pending.findIndex((node) =>
        this.sortedTargets(node.id).every((target) => emitted.has(target))
      );
      if (next === -1) break;

      const [node] = pending.splice(next, 1);
      emitted.add(node.id);
      order.push(node.step);
    }

    if (pending.length === 0) {
      return { ok: true, value: order };
    }

    return {
      ok: false,
      errors: this.findCycles(new Set(pending.map((node) => node.id))).map((cycle) =>
        this.cycleError(cycle)
      ),
    };
  }

  /**
   * Every elementary cycle among the given nodes. A cycle is found from its
   * earliest-registered node only, passing through later nodes, so each is
   * reported exactly once and always starts at the same node.
   */
  private findCycles(within: Set<string>): string[][] {
    const cycles: string[][] = [];
    const roots = Array.from(this.nodes.values()).filter((node) => within.has(node.id));

    for (const root of roots) {
      const onPath = new Set<string>([root.id]);

      const walk = (path: string[]): void => {
        const current = path[path.length - 1];
        for (const neighbor of this.sortedTargets(current)) {
          if (neighbor === root.id) {
            cycles.push([...path, root.id]);
            continue;
          }
          if (!within.has(neighbor) || onPath.has(neighbor)) continue;
          if (this.node(neighbor).index < root.index) continue;

          onPath.add(neighbor);
          walk([...path, neighbor]);
          onPath.delete(neighbor);
        }
      };

      walk([root.id]);
    }

    return cycles;
  }

  private cycleError(cycle: string[]): ResolutionError {
    const first = this.node(cycle[0]);
    const names = cycle.map((id) => this.node(id).step.name);
    const via = cycle.slice(0, -1).flatMap((from, i) =>
      this.edges
        .filter((edge) => edge.from === from && edge.to === cycle[i + 1])
        .map((edge) => edge.via)
    );

    const location =
      first.step.kind === "entity"
        ? { path: first.path, entity: first.step.name }
        : { path: first.path, pivot: first.step.name };

    return createError(
      ErrorCode.CYCLIC_DEPENDENCY,
      `Circular dependency detected: ${names.join(" → ")} (via ${via.join(", ")})`,
      location,
      "Make one of these keys nullable and point it the other way, or move it to a pivot"
    );
  }

  /**
   * Distinct dependency targets of a node, in node registration order
   */
  private sortedTargets(id: string): string[] {
    const targets = new Set(this.edges.filter((edge) => edge.from === id).map((edge) => edge.to));
    return Array.from(targets).sort((a, b) => this.node(a).index - this.node(b).index);
  }

  private node(id: string): GraphNode {
    const node = this.nodes.get(id);
    if (node === undefined) {
      throw new Error(`Unknown graph node "${id}"`);
    }
    return node;
  }
}

/**
 * Build the graph for resolved entities and pivots. Entities register in
 * document order, then pivots in registry order.
 */
export function buildDependencyGraph(
  entities: readonly Entity[],
  pivots: readonly Pivot[],
  entityKey: string
): DependencyGraph {
  const graph = new DependencyGraph();
  const entity = (name: string): EmissionStep => ({ kind: "entity", name });
  const pivotStep = (name: string): EmissionStep => ({ kind: "pivot", name });

  for (const e of entities) {
    graph.addNode(entity(e.name), `${entityKey}.${e.name}`);
  }
  for (const p of pivots) {
    graph.addNode(pivotStep(p.name), `pivotTables.${p.name}`);
  }

  for (const e of entities) {
    for (const relationship of e.relationships) {
      const via = `${e.name}.${relationship.name}`;
      switch (relationship.kind) {
        case "belongsTo":
          graph.addDependency(entity(e.name), entity(relationship.target), via);
          break;
        case "hasOne":
        case "hasMany":
          graph.addDependency(entity(relationship.target), entity(e.name), via);
          break;
        default:
          break;
      }
    }
  }

  for (const p of pivots) {
    if (p.kind === "standard") {
      for (const side of p.sides) {
        graph.addDependency(pivotStep(p.name), entity(side.entity), `${p.name}.${side.key}`);
      }
    } else {
      graph.addDependency(
        pivotStep(p.name),
        entity(p.related.entity),
        `${p.name}.${p.related.key}`
      );
    }
  }

  return graph;
}
