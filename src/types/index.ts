/**
 * Figure Type Definitions
 */

// Categories the default style table knows about. Any other string is accepted
// and rendered with the "process" style.
export type KnownNodeType = "process" | "io" | "decision";

export interface FigureNode {
  id: string;
  label: string;
  type: string;
  // Opaque to layout, copied through to the result
  metadata: Record<string, string>;
}

export interface FigureEdge {
  source: string;
  target: string;
  label?: string;
}

/**
 * Position-free graph produced by the parser. Treated as read-only everywhere.
 */
export interface FigurePlan {
  readonly nodes: readonly FigureNode[];
  readonly edges: readonly FigureEdge[];
  readonly title?: string;
  readonly description?: string;
}

/**
 * A node with the centre point of its drawn shape
 */
export interface PositionedNode extends FigureNode {
  x: number;
  y: number;
}

export interface LayoutResult {
  width: number;
  height: number;
  nodes: PositionedNode[];
  edges: readonly FigureEdge[];
}

export interface CanvasSize {
  width: number;
  height: number;
}
