/**
 * Column placement
 * Turns a layer assignment into centre coordinates on the canvas
 */

import type { CanvasSize, FigureNode, FigurePlan, PositionedNode } from "../types";
import type { LayerAssignment, LayoutSpacing } from "./types";
import { LayoutError } from "./errors";

/**
 * Group identifiers by layer; layers ascending, identifiers sorted within each
 */
export function groupByLayer(layers: LayerAssignment): string[][] {
  const groups = new Map<number, string[]>();
  for (const [id, layer] of layers) {
    const group = groups.get(layer);
    if (group) {
      group.push(id);
    } else {
      groups.set(layer, [id]);
    }
  }

  return [...groups.keys()]
    .sort((a, b) => a - b)
    .map((layer) => (groups.get(layer) ?? []).sort());
}

/**
 * Top of a column of `count` nodes, centred vertically but never above the margin
 */
export function columnStart(count: number, canvasHeight: number, spacing: LayoutSpacing): number {
  // k - 1 gaps, not max(1, k - 1): a lone node sits exactly at mid-height
  const span = spacing.vertical * Math.max(0, count - 1);
  return Math.max(spacing.margin, (canvasHeight - span) / 2);
}

/**
 * Place every node. Column index, not the raw layer value, drives x, so gaps
 * between layer numbers do not leave empty columns.
 */
export function placeNodes(
  plan: FigurePlan,
  layers: LayerAssignment,
  canvas: CanvasSize,
  spacing: LayoutSpacing
): PositionedNode[] {
  const lookup = new Map<string, FigureNode>();
  for (const node of plan.nodes) lookup.set(node.id, node);

  const positioned: PositionedNode[] = [];

  groupByLayer(layers).forEach((column, columnIndex) => {
    const x = spacing.margin + columnIndex * spacing.horizontal;
    const start = columnStart(column.length, canvas.height, spacing);

    column.forEach((id, row) => {
      const node = lookup.get(id);
      if (!node) {
        throw new LayoutError(`Layer assigned to undeclared node "${id}"`);
      }
      positioned.push({
        id: node.id,
        label: node.label,
        type: node.type,
        metadata: { ...node.metadata },
        x,
        y: start + row * spacing.vertical,
      });
    });
  });

  return positioned;
}
