/**
 * SVG Rendering
 * Turns a layout result into a standalone SVG document
 */

import type { FigureEdge, LayoutResult, PositionedNode } from "../types";
import { NODE_HEIGHT, NODE_WIDTH } from "../layout/types";
import {
  getShapeStyle,
  resolveStyles,
  type ShapeStyle,
  type ShapeStyleOverride,
  type StyleTable,
} from "../styling";
import { formatCoordinate, svgElement } from "../utils/svg-security";

export const LABEL_MAX_LENGTH = 22;
export const FONT_FAMILY = "Inter, Helvetica, Arial, sans-serif";
export const EDGE_COLOR = "#334155";

export interface RenderOptions {
  styles?: Readonly<Record<string, ShapeStyleOverride>>;
  /** Emitted as the document's <title> */
  title?: string;
}

export class RenderError extends Error {
  public readonly code = "RENDER_FAILED";

  constructor(message: string) {
    super(message);
    this.name = "RenderError";
  }
}

/**
 * Greedy word wrap. A word longer than the budget gets a line of its own.
 */
export function wrapLabel(label: string, maxLength: number = LABEL_MAX_LENGTH): string[] {
  const words = label.split(/\s+/).filter(Boolean);
  if (words.length === 0) return [""];

  const lines: string[] = [];
  let current: string[] = [];
  for (const word of words) {
    const tentative = [...current, word].join(" ");
    if (tentative.length <= maxLength) {
      current.push(word);
      continue;
    }
    if (current.length > 0) {
      lines.push(current.join(" "));
      current = [word];
    } else {
      lines.push(word);
    }
  }
  if (current.length > 0) lines.push(current.join(" "));
  return lines;
}

function nodeRect(node: PositionedNode, style: ShapeStyle): string {
  return svgElement("rect", {
    x: formatCoordinate(node.x - NODE_WIDTH / 2),
    y: formatCoordinate(node.y - NODE_HEIGHT / 2),
    width: formatCoordinate(NODE_WIDTH),
    height: formatCoordinate(NODE_HEIGHT),
    rx: "12",
    ry: "12",
    fill: style.fill,
    stroke: style.stroke,
    "stroke-width": style.strokeWidth,
  });
}

function nodeLabel(node: PositionedNode, style: ShapeStyle): string {
  const x = formatCoordinate(node.x);
  const attrs = {
    x,
    y: formatCoordinate(node.y),
    fill: style.textColor,
    "font-family": FONT_FAMILY,
    "font-size": "16px",
    "text-anchor": "middle",
    "dominant-baseline": "middle",
  };

  const lines = wrapLabel(node.label);
  if (lines.length === 1) {
    return svgElement("text", attrs, { text: lines[0] ?? "" });
  }
  const tspans = lines.map((line, index) =>
    svgElement("tspan", { x, dy: index === 0 ? "0" : "1.2em" }, { text: line })
  );
  return svgElement("text", attrs, { children: tspans });
}

function edgeElements(edge: FigureEdge, nodes: ReadonlyMap<string, PositionedNode>): string[] {
  const source = nodes.get(edge.source);
  const target = nodes.get(edge.target);
  if (!source || !target) {
    const missing = source ? edge.target : edge.source;
    throw new RenderError(`Edge ${edge.source} -> ${edge.target} references unplaced node "${missing}"`);
  }

  const line = svgElement("line", {
    x1: formatCoordinate(source.x),
    y1: formatCoordinate(source.y),
    x2: formatCoordinate(target.x),
    y2: formatCoordinate(target.y),
    stroke: EDGE_COLOR,
    "stroke-width": "2",
    "marker-end": "url(#arrow)",
    "data-label": edge.label || undefined,
  });
  if (!edge.label) return [line];

  const label = svgElement(
    "text",
    {
      class: "edge-label",
      x: formatCoordinate((source.x + target.x) / 2),
      y: formatCoordinate((source.y + target.y) / 2 - 8),
      fill: EDGE_COLOR,
      "font-family": FONT_FAMILY,
      "font-size": "12px",
      "text-anchor": "middle",
    },
    { text: edge.label }
  );
  return [line, label];
}

/**
 * Raw element strings: each node's box and label, then every edge
 */
export function buildSvgElements(layout: LayoutResult, styles: StyleTable = resolveStyles()): string[] {
  const elements: string[] = [];
  const byId = new Map<string, PositionedNode>();

  for (const node of layout.nodes) {
    byId.set(node.id, node);
    const style = getShapeStyle(styles, node.type);
    elements.push(nodeRect(node, style), nodeLabel(node, style));
  }

  for (const edge of layout.edges) {
    elements.push(...edgeElements(edge, byId));
  }
  return elements;
}

function arrowMarker(): string {
  const path = svgElement("path", { d: "M0,0 L0,7 L10,3.5 z", fill: EDGE_COLOR });
  const marker = svgElement(
    "marker",
    {
      id: "arrow",
      markerWidth: 10,
      markerHeight: 7,
      refX: 10,
      refY: 3.5,
      orient: "auto",
      markerUnits: "strokeWidth",
    },
    { children: [path] }
  );
  return svgElement("defs", {}, { children: [marker] });
}

/**
 * Serialize a layout as an SVG document string
 */
export function renderSvg(layout: LayoutResult, options: RenderOptions = {}): string {
  const elements = buildSvgElements(layout, resolveStyles(options.styles));
  const width = formatDimension(layout.width);
  const height = formatDimension(layout.height);

  const body = [
    ...(options.title ? [svgElement("title", {}, { text: options.title })] : []),
    arrowMarker(),
    ...elements,
  ];

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
    ...body.map((element) => `  ${element}`),
    "</svg>",
  ].join("\n");
}

function formatDimension(value: number): string {
  return String(Number.isFinite(value) && value >= 0 ? value : 0);
}
