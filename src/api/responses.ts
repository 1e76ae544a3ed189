/**
 * Standardized API Response Formats
 *
 * Response Format Standards:
 * - Resource: { data: {...}, meta?: {...} }
 * - Error: { error: { code, message, details? } }
 * - SVG: raw markup with the SVG security headers
 */

import type { Context } from "hono";
import { getSvgSecurityHeaders } from "../utils/svg-security";

// ==================== Response Types ====================

export interface ResourceResponse<T> {
  data: T;
  meta?: ResponseMeta;
}

export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

export interface ResponseMeta {
  durationMs?: number;
  [key: string]: unknown;
}

export type ErrorStatus = 400 | 404 | 413 | 422 | 500;

// ==================== Response Builders ====================

/**
 * Build a resource response (single item)
 */
export function resourceResponse<T>(c: Context, data: T, meta?: ResponseMeta) {
  const response: ResourceResponse<T> = { data };
  if (meta && Object.keys(meta).length > 0) {
    response.meta = meta;
  }
  return c.json(response, 200);
}

/**
 * Build an error response
 */
export function errorResponse(
  c: Context,
  code: string,
  message: string,
  status: ErrorStatus = 400,
  details?: unknown
) {
  const response: ErrorResponse = {
    error: {
      code,
      message,
      ...(details !== undefined ? { details } : {}),
    },
  };
  return c.json(response, status);
}

export function validationErrorResponse(c: Context, message: string, details?: unknown) {
  return errorResponse(c, "VALIDATION_ERROR", message, 400, details);
}

/**
 * Send SVG markup with headers that keep it from running script in the browser
 */
export function svgResponse(c: Context, svg: string) {
  return c.body(svg, 200, getSvgSecurityHeaders());
}
