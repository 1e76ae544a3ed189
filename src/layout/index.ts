/**
 * Layout Module
 * Layered placement of figure plans
 */

export * from "./types";
export * from "./errors";
export { computeLayout, layoutPlan } from "./engine";
export { assignLayers, indexGraph, findSeeds, removeBackEdges, type GraphIndex } from "./layers";
export { placeNodes, groupByLayer, columnStart } from "./placement";
