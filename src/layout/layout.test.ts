/**
 * Layout Engine Tests
 */

import { describe, it, expect } from "vitest";
import { computeLayout, layoutPlan } from "./engine";
import {
  UnknownNodeReferenceError,
  DuplicateNodeError,
  LayoutDidNotConvergeError,
} from "./errors";
import { LAYOUT_SPACING, DEFAULT_CANVAS } from "./types";
import type { FigureEdge, FigureNode, FigurePlan, LayoutResult } from "../types";

function node(id: string, type = "process"): FigureNode {
  return { id, label: id.toUpperCase(), type, metadata: {} };
}

function edge(source: string, target: string, label?: string): FigureEdge {
  return label === undefined ? { source, target } : { source, target, label };
}

function plan(ids: string[], edges: Array<[string, string]>): FigurePlan {
  return {
    nodes: ids.map((id) => node(id)),
    edges: edges.map(([s, t]) => edge(s, t)),
  };
}

function positionOf(layout: LayoutResult, id: string): { x: number; y: number } {
  const found = layout.nodes.find((n) => n.id === id);
  if (!found) throw new Error(`missing node ${id}`);
  return { x: found.x, y: found.y };
}

describe("computeLayout", () => {
  it("lays out a linear chain left to right on the centre line", () => {
    const layout = computeLayout(plan(["a", "b", "c"], [["a", "b"], ["b", "c"]]));

    expect(positionOf(layout, "a")).toEqual({ x: 60, y: 300 });
    expect(positionOf(layout, "b")).toEqual({ x: 260, y: 300 });
    expect(positionOf(layout, "c")).toEqual({ x: 460, y: 300 });
  });

  it("stacks a fan-out symmetrically about the vertical centre", () => {
    const layout = computeLayout(plan(["a", "b", "c"], [["a", "b"], ["a", "c"]]));

    const b = positionOf(layout, "b");
    const c = positionOf(layout, "c");
    expect(b).toEqual({ x: 260, y: 230 });
    expect(c).toEqual({ x: 260, y: 370 });
    expect(c.y - b.y).toBe(LAYOUT_SPACING.vertical);
    expect((b.y + c.y) / 2).toBe(DEFAULT_CANVAS.height / 2);
  });

  it("places a single node at the margin and vertical centre", () => {
    const layout = computeLayout(plan(["solo"], []));

    expect(layout.nodes).toHaveLength(1);
    expect(positionOf(layout, "solo")).toEqual({ x: 60, y: 300 });
  });

  it("terminates on a two-node cycle and places both nodes", () => {
    const layout = computeLayout(plan(["a", "b"], [["a", "b"], ["b", "a"]]));

    expect(layout.nodes.map((n) => n.id).sort()).toEqual(["a", "b"]);
    expect(positionOf(layout, "a")).toEqual({ x: 60, y: 300 });
    expect(positionOf(layout, "b")).toEqual({ x: 260, y: 300 });
  });

  it("rejects an edge to an undeclared node", () => {
    const bad = plan(["a"], [["a", "ghost"]]);

    expect(() => computeLayout(bad)).toThrow(UnknownNodeReferenceError);
    try {
      computeLayout(bad);
    } catch (err) {
      expect(err).toBeInstanceOf(UnknownNodeReferenceError);
      if (err instanceof UnknownNodeReferenceError) {
        expect(err.nodeId).toBe("ghost");
        expect(err.message).toBe('Edge a -> ghost references unknown node "ghost"');
      }
    }
  });

  it("rejects an edge from an undeclared node", () => {
    expect(() => computeLayout(plan(["b"], [["ghost", "b"]]))).toThrow(
      'Edge ghost -> b references unknown node "ghost"'
    );
  });

  it("rejects duplicate node identifiers", () => {
    const dup: FigurePlan = { nodes: [node("a"), node("a")], edges: [] };
    expect(() => computeLayout(dup)).toThrow(DuplicateNodeError);
  });

  it("returns an empty result with the default canvas for an empty plan", () => {
    const layout = computeLayout({ nodes: [], edges: [] });

    expect(layout).toEqual({ width: 800, height: 600, nodes: [], edges: [] });
  });

  it("keeps the requested canvas size for an empty plan", () => {
    const layout = computeLayout({ nodes: [], edges: [] }, { canvas: { width: 1024, height: 768 } });

    expect(layout.width).toBe(1024);
    expect(layout.height).toBe(768);
  });

  it("centres against a custom canvas height", () => {
    const layout = computeLayout(plan(["solo"], []), { canvas: { width: 1000, height: 400 } });

    expect(positionOf(layout, "solo")).toEqual({ x: 60, y: 200 });
    expect(layout.width).toBe(1000);
  });

  it("clamps a tall column to the top margin", () => {
    const ids = ["a", "b", "c", "d", "e", "f"];
    const layout = computeLayout(plan(ids, []));

    expect(layout.nodes.map((n) => n.y)).toEqual([60, 200, 340, 480, 620, 760]);
    expect(new Set(layout.nodes.map((n) => n.x))).toEqual(new Set([60]));
  });

  it("orders nodes within a layer by identifier, not declaration order", () => {
    const layout = computeLayout(plan(["zeta", "alpha", "mid"], []));

    expect(layout.nodes.map((n) => n.id)).toEqual(["alpha", "mid", "zeta"]);
    expect(positionOf(layout, "alpha").y).toBe(160);
    expect(positionOf(layout, "mid").y).toBe(300);
    expect(positionOf(layout, "zeta").y).toBe(440);
  });

  it("uses the longer path when two paths reach the same node", () => {
    const layout = computeLayout(
      plan(["a", "b", "c", "d"], [["a", "d"], ["a", "b"], ["b", "c"], ["c", "d"]])
    );

    expect(positionOf(layout, "d").x).toBe(660);
  });

  it("handles self-loops and duplicate edges", () => {
    const layout = computeLayout(plan(["a", "b"], [["a", "a"], ["a", "b"], ["a", "b"]]));

    expect(positionOf(layout, "a")).toEqual({ x: 60, y: 300 });
    expect(positionOf(layout, "b")).toEqual({ x: 260, y: 300 });
  });

  it("puts disconnected nodes in the first column", () => {
    const layout = computeLayout(plan(["a", "b", "loner"], [["a", "b"]]));

    expect(positionOf(layout, "a")).toEqual({ x: 60, y: 230 });
    expect(positionOf(layout, "loner")).toEqual({ x: 60, y: 370 });
    expect(positionOf(layout, "b")).toEqual({ x: 260, y: 300 });
  });

  it("keeps every edge pointing right in an acyclic plan", () => {
    const dag = plan(
      ["src", "parse", "check", "emit", "report"],
      [["src", "parse"], ["parse", "check"], ["parse", "emit"], ["check", "emit"], ["src", "report"]]
    );
    const layout = computeLayout(dag);

    for (const e of dag.edges) {
      expect(positionOf(layout, e.target).x).toBeGreaterThan(positionOf(layout, e.source).x);
    }
  });

  it("covers every input node exactly once", () => {
    const cyclic = plan(
      ["a", "b", "c", "d", "e"],
      [["a", "b"], ["b", "c"], ["c", "a"], ["d", "e"], ["e", "d"]]
    );
    const layout = computeLayout(cyclic);

    expect(layout.nodes.map((n) => n.id).sort()).toEqual(["a", "b", "c", "d", "e"]);
  });

  it("is deterministic across runs", () => {
    const input = plan(
      ["k", "j", "i", "h"],
      [["h", "i"], ["i", "j"], ["j", "h"], ["k", "i"]]
    );

    expect(computeLayout(input)).toEqual(computeLayout(input));
  });

  it("copies node metadata and passes edges through", () => {
    const input: FigurePlan = {
      nodes: [{ id: "a", label: "A", type: "io", metadata: { owner: "team" } }],
      edges: [],
    };
    const layout = computeLayout(input);
    const placed = layout.nodes[0];

    expect(placed?.metadata).toEqual({ owner: "team" });
    expect(placed?.metadata).not.toBe(input.nodes[0]?.metadata);
    expect(placed?.type).toBe("io");
    expect(layout.edges).toBe(input.edges);
  });

  it("honours spacing overrides", () => {
    const layout = computeLayout(plan(["a", "b"], [["a", "b"]]), {
      spacing: { horizontal: 100, margin: 20 },
    });

    expect(positionOf(layout, "a").x).toBe(20);
    expect(positionOf(layout, "b").x).toBe(120);
  });

  it("fails when relaxation exceeds the iteration cap", () => {
    expect(() =>
      computeLayout(plan(["a", "b", "c"], [["a", "b"], ["b", "c"]]), { maxIterations: 1 })
    ).toThrow(LayoutDidNotConvergeError);
  });
});

describe("layoutPlan", () => {
  it("reports success with the layout", () => {
    const outcome = layoutPlan(plan(["a", "b"], [["a", "b"]]));

    expect(outcome.success).toBe(true);
    if (outcome.success) {
      expect(outcome.layout.nodes).toHaveLength(2);
      expect(outcome.duration).toBeGreaterThanOrEqual(0);
    }
  });

  it("reports layout errors with their code", () => {
    const outcome = layoutPlan(plan(["a"], [["a", "missing"]]));

    expect(outcome.success).toBe(false);
    if (!outcome.success) {
      expect(outcome.code).toBe("UNKNOWN_NODE_REFERENCE");
      expect(outcome.error).toContain('"missing"');
    }
  });
});
