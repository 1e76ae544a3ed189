/**
 * Layout Types
 * Configuration and output types for the layered figure layout
 */

import type { CanvasSize, FigureEdge, LayoutResult } from "../types";

export interface LayoutSpacing {
  /** Distance between adjacent columns */
  horizontal: number;
  /** Distance between stacked nodes within a column */
  vertical: number;
  /** Canvas padding on the left and, as a floor, at the top */
  margin: number;
}

export interface LayoutOptions {
  canvas?: Partial<CanvasSize>;
  spacing?: Partial<LayoutSpacing>;
  /** Upper bound on queue pops during layer relaxation */
  maxIterations?: number;
}

/**
 * Result-object form of a layout run
 */
export type LayoutOutcome =
  | { success: true; layout: LayoutResult; duration: number }
  | { success: false; error: string; code: string; duration: number };

/** Layer per node identifier */
export type LayerAssignment = ReadonlyMap<string, number>;

export const LAYOUT_SPACING: Readonly<LayoutSpacing> = Object.freeze({
  horizontal: 200,
  vertical: 140,
  margin: 60,
});

export const DEFAULT_CANVAS: Readonly<CanvasSize> = Object.freeze({
  width: 800,
  height: 600,
});

// Drawn node box, used by the renderer
export const NODE_WIDTH = 160;
export const NODE_HEIGHT = 60;

/**
 * Validate a number is finite and non-negative, with a fallback default
 */
export function safePositiveNumber(value: number | undefined, defaultValue: number): number {
  if (value === undefined || !Number.isFinite(value) || value < 0) {
    return defaultValue;
  }
  return value;
}

export function resolveSpacing(spacing?: Partial<LayoutSpacing>): LayoutSpacing {
  return {
    horizontal: safePositiveNumber(spacing?.horizontal, LAYOUT_SPACING.horizontal),
    vertical: safePositiveNumber(spacing?.vertical, LAYOUT_SPACING.vertical),
    margin: safePositiveNumber(spacing?.margin, LAYOUT_SPACING.margin),
  };
}

export function resolveCanvas(canvas?: Partial<CanvasSize>): CanvasSize {
  return {
    width: safePositiveNumber(canvas?.width, DEFAULT_CANVAS.width),
    height: safePositiveNumber(canvas?.height, DEFAULT_CANVAS.height),
  };
}

export function describeEdge(edge: FigureEdge): string {
  return `${edge.source} -> ${edge.target}`;
}
