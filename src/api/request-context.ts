/**
 * Request Context using AsyncLocalStorage
 *
 * Provides request-scoped context that propagates through async operations.
 * The request ID doubles as the logging correlation ID, so every log line
 * written while handling a request carries it.
 */

import { AsyncLocalStorage } from "node:async_hooks";
import type { Context, Next } from "hono";
import { nanoid } from "nanoid";
import { createLogger, withCorrelationId } from "../logging";

const log = createLogger("request");

export interface RequestContext {
  /** Unique request identifier */
  requestId: string;
  /** Request start time (high-resolution) */
  startTime: number;
  path: string;
  method: string;
}

const requestContextStorage = new AsyncLocalStorage<RequestContext>();

export const REQUEST_ID_HEADER = "X-Request-Id";
export const RESPONSE_TIME_HEADER = "X-Response-Time";

/** Incoming IDs that do not match are replaced */
const REQUEST_ID_PATTERN = /^[\w-]{1,64}$/;

/**
 * Calculate elapsed time since request start
 */
export function getElapsedMs(): number {
  const ctx = requestContextStorage.getStore();
  if (!ctx) return 0;
  return performance.now() - ctx.startTime;
}

export function runWithContext<T>(context: RequestContext, fn: () => T): T {
  return requestContextStorage.run(context, () => withCorrelationId(context.requestId, fn));
}

export function createRequestContext(requestId: string, path: string, method: string): RequestContext {
  return {
    requestId,
    startTime: performance.now(),
    path,
    method,
  };
}

/**
 * Request context middleware for Hono
 *
 * Reuses a well-formed incoming X-Request-Id, otherwise generates one.
 */
export function requestContext(): (c: Context, next: Next) => Promise<void> {
  return async (c: Context, next: Next) => {
    const incoming = c.req.header(REQUEST_ID_HEADER);
    const requestId = incoming && REQUEST_ID_PATTERN.test(incoming) ? incoming : `req-${nanoid(12)}`;
    const context = createRequestContext(requestId, c.req.path, c.req.method);

    await runWithContext(context, async () => {
      try {
        await next();
      } finally {
        const elapsedMs = getElapsedMs();
        c.header(REQUEST_ID_HEADER, requestId);
        c.header(RESPONSE_TIME_HEADER, `${elapsedMs.toFixed(2)}ms`);
        log.debug("Request completed", {
          method: context.method,
          path: context.path,
          status: c.res.status,
          durationMs: elapsedMs.toFixed(2),
        });
      }
    });
  };
}
