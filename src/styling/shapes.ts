/**
 * Node category styles
 * Fill and stroke per category, with "process" as the fallback
 */

import type { KnownNodeType } from "../types";
import { sanitizeColor } from "../utils/svg-security";

export interface ShapeStyle {
  fill: string;
  stroke: string;
  strokeWidth: number;
  textColor: string;
}

export type ShapeStyleOverride = Pick<ShapeStyle, "fill" | "stroke"> &
  Partial<Pick<ShapeStyle, "strokeWidth" | "textColor">>;

export type StyleTable = Readonly<Record<string, ShapeStyle>>;

export const FALLBACK_NODE_TYPE: KnownNodeType = "process";

const DEFAULT_STROKE_WIDTH = 2;
const DEFAULT_TEXT_COLOR = "#0f172a";

function shapeStyle(fill: string, stroke: string): ShapeStyle {
  return { fill, stroke, strokeWidth: DEFAULT_STROKE_WIDTH, textColor: DEFAULT_TEXT_COLOR };
}

export const DEFAULT_STYLES: Readonly<Record<KnownNodeType, ShapeStyle>> = Object.freeze({
  process: shapeStyle("#e0f2fe", "#0284c7"),
  io: shapeStyle("#ede9fe", "#7c3aed"),
  decision: shapeStyle("#fef3c7", "#f59e0b"),
});

/**
 * Merge caller overrides over the defaults. Override colors are sanitized
 * against the style they replace.
 */
export function resolveStyles(overrides: Readonly<Record<string, ShapeStyleOverride>> = {}): StyleTable {
  const table: Record<string, ShapeStyle> = { ...DEFAULT_STYLES };

  for (const [type, override] of Object.entries(overrides)) {
    const base = ownStyle(table, type) ?? DEFAULT_STYLES[FALLBACK_NODE_TYPE];
    table[type] = {
      fill: sanitizeColor(override.fill, base.fill),
      stroke: sanitizeColor(override.stroke, base.stroke),
      strokeWidth:
        override.strokeWidth !== undefined && Number.isFinite(override.strokeWidth) && override.strokeWidth >= 0
          ? override.strokeWidth
          : base.strokeWidth,
      textColor: sanitizeColor(override.textColor, base.textColor),
    };
  }

  return table;
}

/**
 * Style for a node category, falling back to the "process" entry
 */
export function getShapeStyle(table: StyleTable, type: string): ShapeStyle {
  return ownStyle(table, type) ?? ownStyle(table, FALLBACK_NODE_TYPE) ?? DEFAULT_STYLES[FALLBACK_NODE_TYPE];
}

// Categories such as "constructor" must not resolve to Object.prototype members
function ownStyle(table: StyleTable, type: string): ShapeStyle | undefined {
  return Object.hasOwn(table, type) ? table[type] : undefined;
}
