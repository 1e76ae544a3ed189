/**
 * Layer Assignment
 *
 * Longest-path layering from the graph's sources. Nodes are addressed by a
 * dense index (plan order) and the graph is held as adjacency lists built
 * once from the edge list.
 */

import type { FigurePlan } from "../types";
import type { LayerAssignment } from "./types";
import {
  DuplicateNodeError,
  LayoutDidNotConvergeError,
  UnknownNodeReferenceError,
} from "./errors";

export interface GraphIndex {
  /** Identifier per dense index */
  ids: string[];
  /** Dense index per identifier */
  index: Map<string, number>;
  /** Outgoing target indices per node, in edge order (duplicates kept) */
  outgoing: number[][];
  /** Number of incoming edges per node */
  incoming: number[];
}

const UNASSIGNED = -1;

/**
 * Build the dense adjacency structure, rejecting duplicate identifiers and
 * edges that name undeclared nodes
 */
export function indexGraph(plan: FigurePlan): GraphIndex {
  const ids: string[] = [];
  const index = new Map<string, number>();

  for (const node of plan.nodes) {
    if (index.has(node.id)) {
      throw new DuplicateNodeError(node.id);
    }
    index.set(node.id, ids.length);
    ids.push(node.id);
  }

  const outgoing: number[][] = ids.map(() => []);
  const incoming: number[] = ids.map(() => 0);

  for (const edge of plan.edges) {
    const source = index.get(edge.source);
    if (source === undefined) {
      throw new UnknownNodeReferenceError(edge.source, edge);
    }
    const target = index.get(edge.target);
    if (target === undefined) {
      throw new UnknownNodeReferenceError(edge.target, edge);
    }
    outgoing[source]?.push(target);
    incoming[target] = (incoming[target] ?? 0) + 1;
  }

  return { ids, index, outgoing, incoming };
}

/**
 * Nodes with no incoming edges, in plan order. A non-empty graph where every
 * node has a predecessor falls back to its first node.
 */
export function findSeeds(graph: GraphIndex): number[] {
  const seeds: number[] = [];
  graph.incoming.forEach((count, node) => {
    if (count === 0) seeds.push(node);
  });
  if (seeds.length === 0 && graph.ids.length > 0) {
    seeds.push(0);
  }
  return seeds;
}

/**
 * Drop the edges that close a cycle.
 *
 * Depth-first from the seeds, then from every remaining node in plan order.
 * An edge whose target is still on the DFS stack is a back edge; removing all
 * of them leaves an acyclic graph. Self-loops are always back edges.
 */
export function removeBackEdges(graph: GraphIndex, roots: readonly number[]): number[][] {
  const nodeCount = graph.ids.length;
  // 0 = unvisited, 1 = on stack, 2 = finished
  const state = new Uint8Array(nodeCount);
  const forward: number[][] = graph.outgoing.map(() => []);

  const visit = (root: number): void => {
    if (state[root] !== 0) return;
    state[root] = 1;
    const stack: Array<{ node: number; next: number }> = [{ node: root, next: 0 }];

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      if (!frame) break;
      const targets = graph.outgoing[frame.node] ?? [];

      if (frame.next >= targets.length) {
        state[frame.node] = 2;
        stack.pop();
        continue;
      }

      const target = targets[frame.next];
      frame.next += 1;
      if (target === undefined || state[target] === 1) continue;

      forward[frame.node]?.push(target);
      if (state[target] === 0) {
        state[target] = 1;
        stack.push({ node: target, next: 0 });
      }
    }
  };

  roots.forEach(visit);
  for (let node = 0; node < nodeCount; node++) visit(node);

  return forward;
}

/**
 * Assign every node a non-negative layer such that, for each edge kept after
 * back-edge removal, layer(target) >= layer(source) + 1.
 */
export function assignLayers(
  plan: FigurePlan,
  options: { maxIterations?: number } = {}
): LayerAssignment {
  const graph = indexGraph(plan);
  const nodeCount = graph.ids.length;
  const seeds = findSeeds(graph);
  const forward = removeBackEdges(graph, seeds);

  const maxIterations =
    options.maxIterations ?? nodeCount * nodeCount + plan.edges.length + 1;

  const layers: number[] = new Array<number>(nodeCount).fill(UNASSIGNED);
  const queue: number[] = [];
  for (const seed of seeds) {
    layers[seed] = 0;
    queue.push(seed);
  }

  let head = 0;
  let iterations = 0;
  while (head < queue.length) {
    iterations += 1;
    if (iterations > maxIterations) {
      throw new LayoutDidNotConvergeError(maxIterations);
    }

    const current = queue[head++];
    if (current === undefined) break;
    const proposed = (layers[current] ?? 0) + 1;

    for (const neighbor of forward[current] ?? []) {
      const assigned = layers[neighbor] ?? UNASSIGNED;
      if (assigned === UNASSIGNED || proposed > assigned) {
        layers[neighbor] = proposed;
        queue.push(neighbor);
      }
    }
  }

  const result = new Map<string, number>();
  graph.ids.forEach((id, node) => {
    const layer = layers[node] ?? UNASSIGNED;
    // Unreached: isolated, or only reachable from a component with no source
    result.set(id, layer === UNASSIGNED ? 0 : layer);
  });
  return result;
}
