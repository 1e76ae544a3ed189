/**
 * Layout Errors
 */

import type { FigureEdge } from "../types";
import { describeEdge } from "./types";

export class LayoutError extends Error {
  public readonly code: string = "LAYOUT_FAILED";

  constructor(message: string) {
    super(message);
    this.name = "LayoutError";
  }
}

/**
 * An edge names a node identifier that the plan does not declare
 */
export class UnknownNodeReferenceError extends LayoutError {
  public override readonly code = "UNKNOWN_NODE_REFERENCE";

  constructor(
    public readonly nodeId: string,
    public readonly edge: FigureEdge
  ) {
    super(`Edge ${describeEdge(edge)} references unknown node "${nodeId}"`);
    this.name = "UnknownNodeReferenceError";
  }
}

export class DuplicateNodeError extends LayoutError {
  public override readonly code = "DUPLICATE_NODE";

  constructor(public readonly nodeId: string) {
    super(`Node identifier "${nodeId}" is declared more than once`);
    this.name = "DuplicateNodeError";
  }
}

export class LayoutDidNotConvergeError extends LayoutError {
  public override readonly code = "LAYOUT_DID_NOT_CONVERGE";

  constructor(public readonly maxIterations: number) {
    super(`Layer assignment did not settle within ${maxIterations} iterations`);
    this.name = "LayoutDidNotConvergeError";
  }
}
