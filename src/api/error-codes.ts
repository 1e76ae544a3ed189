/**
 * Centralized API Error Codes
 *
 * Single source of truth for API error codes, status codes, and default messages.
 *
 * Usage:
 *   import { ApiError, errorFromCode } from "./error-codes";
 *   return errorFromCode(c, ApiError.NOT_FOUND);
 *   return errorFromCode(c, ApiError.VALIDATION_ERROR, "Custom message", issues);
 */

import type { Context } from "hono";
import { errorResponse, type ErrorStatus } from "./responses";

/**
 * Error definition with code, default status, and default message
 */
export interface ErrorDefinition {
  code: string;
  status: ErrorStatus;
  message: string;
}

export const ApiError = {
  // ==================== Client Errors (4xx) ====================

  // 400 Bad Request - Invalid input
  INVALID_JSON: {
    code: "INVALID_JSON",
    status: 400,
    message: "Invalid JSON in request body",
  },
  VALIDATION_ERROR: {
    code: "VALIDATION_ERROR",
    status: 400,
    message: "Validation failed",
  },
  PARSE_ERROR: {
    code: "PARSE_ERROR",
    status: 400,
    message: "Figure specification could not be parsed",
  },

  // 404 Not Found
  NOT_FOUND: {
    code: "NOT_FOUND",
    status: 404,
    message: "Resource not found",
  },

  // 413 Payload Too Large
  PAYLOAD_TOO_LARGE: {
    code: "PAYLOAD_TOO_LARGE",
    status: 413,
    message: "Request body too large",
  },

  // 422 Unprocessable Entity - well-formed plan that cannot be laid out
  UNKNOWN_NODE_REFERENCE: {
    code: "UNKNOWN_NODE_REFERENCE",
    status: 422,
    message: "An edge references a node that does not exist",
  },
  DUPLICATE_NODE: {
    code: "DUPLICATE_NODE",
    status: 422,
    message: "A node identifier is declared more than once",
  },
  LAYOUT_DID_NOT_CONVERGE: {
    code: "LAYOUT_DID_NOT_CONVERGE",
    status: 422,
    message: "Layer assignment did not settle",
  },

  // ==================== Server Errors (5xx) ====================

  INTERNAL_ERROR: {
    code: "INTERNAL_ERROR",
    status: 500,
    message: "Internal server error",
  },
  LAYOUT_FAILED: {
    code: "LAYOUT_FAILED",
    status: 500,
    message: "Failed to lay out figure",
  },
  RENDER_FAILED: {
    code: "RENDER_FAILED",
    status: 500,
    message: "Failed to render figure",
  },
} as const satisfies Record<string, ErrorDefinition>;

/**
 * Create an error response from a predefined error definition
 *
 * @param customMessage - overrides the default message
 */
export function errorFromCode(
  c: Context,
  error: ErrorDefinition,
  customMessage?: string,
  details?: unknown
) {
  return errorResponse(c, error.code, customMessage ?? error.message, error.status, details);
}

/**
 * Get error definition by code string (for dynamic lookup)
 */
export function getErrorByCode(code: string): ErrorDefinition | undefined {
  return Object.values(ApiError).find((e) => e.code === code);
}
