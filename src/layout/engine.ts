/**
 * Layout Engine
 * Plan in, positioned nodes out. Pure: no state survives between calls.
 */

import type { FigurePlan, LayoutResult } from "../types";
import type { LayoutOptions, LayoutOutcome } from "./types";
import { resolveCanvas, resolveSpacing } from "./types";
import { assignLayers } from "./layers";
import { placeNodes } from "./placement";
import { LayoutError } from "./errors";
import { createLogger } from "../logging";

const log = createLogger("layout");

/**
 * Compute a deterministic layered layout for a plan.
 *
 * @throws UnknownNodeReferenceError when an edge names an undeclared node
 * @throws DuplicateNodeError when two nodes share an identifier
 * @throws LayoutDidNotConvergeError when relaxation exceeds `maxIterations`
 */
export function computeLayout(plan: FigurePlan, options: LayoutOptions = {}): LayoutResult {
  const canvas = resolveCanvas(options.canvas);
  const spacing = resolveSpacing(options.spacing);

  const layers = assignLayers(plan, { maxIterations: options.maxIterations });
  const nodes = placeNodes(plan, layers, canvas, spacing);

  return {
    width: canvas.width,
    height: canvas.height,
    nodes,
    edges: plan.edges,
  };
}

/**
 * Same as computeLayout, but reports failures in the result instead of throwing
 */
export function layoutPlan(plan: FigurePlan, options: LayoutOptions = {}): LayoutOutcome {
  const startTime = performance.now();

  try {
    const layout = computeLayout(plan, options);
    const duration = performance.now() - startTime;
    log.debug("Layered layout completed", {
      nodes: layout.nodes.length,
      edges: layout.edges.length,
      durationMs: duration.toFixed(2),
    });
    return { success: true, layout, duration };
  } catch (err) {
    const duration = performance.now() - startTime;
    if (err instanceof LayoutError) {
      log.warn("Layered layout rejected", { code: err.code, error: err });
      return { success: false, error: err.message, code: err.code, duration };
    }
    throw err;
  }
}
