/**
 * Figure Web Server
 * JSON API for parsing, laying out and rendering figures
 */

import { Hono } from "hono";
import { cors } from "hono/cors";
import { bodyLimit } from "hono/body-limit";
import { FigureGenerator } from "./figure";
import { layoutPlan, LayoutError } from "./layout";
import { FigureParseError } from "./parser";
import { RenderError } from "./render";
import {
  LayoutRequestSchema,
  ParseRequestSchema,
  RenderRequestSchema,
  ValidationError,
  parseOrThrow,
} from "./validation/schemas";
import { requestContext, REQUEST_ID_HEADER, RESPONSE_TIME_HEADER } from "./api/request-context";
import { resourceResponse, svgResponse, validationErrorResponse } from "./api/responses";
import { ApiError, errorFromCode, getErrorByCode } from "./api/error-codes";
import { config } from "./config";
import { createLogger } from "./logging";

const log = createLogger("web");

/** Largest accepted request body */
export const MAX_BODY_BYTES = 1024 * 1024;

const app = new Hono();

// Request context (must be first to track timing)
app.use("*", requestContext());

app.use(
  "/api/*",
  cors({
    origin: "*",
    allowMethods: ["GET", "POST", "OPTIONS"],
    allowHeaders: ["Content-Type", REQUEST_ID_HEADER],
    exposeHeaders: [REQUEST_ID_HEADER, RESPONSE_TIME_HEADER],
    maxAge: 86400,
  })
);

app.use(
  "/api/*",
  bodyLimit({
    maxSize: MAX_BODY_BYTES,
    onError: (c) => errorFromCode(c, ApiError.PAYLOAD_TOO_LARGE, `Request body too large. Max: ${MAX_BODY_BYTES / 1024}KB`),
  })
);

// Global error handler
app.onError((err, c) => {
  if (err instanceof ValidationError) {
    return errorFromCode(c, ApiError.VALIDATION_ERROR, err.message, err.details);
  }

  if (err instanceof FigureParseError) {
    return errorFromCode(
      c,
      ApiError.PARSE_ERROR,
      err.message,
      err.line === undefined ? undefined : { line: err.line }
    );
  }

  if (err instanceof LayoutError) {
    log.warn("Layout rejected", { code: err.code, error: err });
    return errorFromCode(c, getErrorByCode(err.code) ?? ApiError.LAYOUT_FAILED, err.message);
  }

  if (err instanceof SyntaxError) {
    return errorFromCode(c, ApiError.INVALID_JSON);
  }

  log.error("API error", { method: c.req.method, path: c.req.path, error: err });

  if (err instanceof RenderError) {
    return errorFromCode(c, ApiError.RENDER_FAILED, err.message);
  }

  const details = config.isProduction ? undefined : err.message;
  return errorFromCode(c, ApiError.INTERNAL_ERROR, undefined, details);
});

app.notFound((c) =>
  errorFromCode(c, ApiError.NOT_FOUND, `API endpoint not found: ${c.req.method} ${c.req.path}`)
);

app.get("/api/health", (c) => resourceResponse(c, { status: "ok" }));

// DSL text to plan
app.post("/api/parse", async (c) => {
  const body = parseOrThrow(ParseRequestSchema, await c.req.json<unknown>());
  const plan = new FigureGenerator().parse(body.spec);
  return resourceResponse(c, plan);
});

// Plan to positioned nodes, using the engine's own canvas default
app.post("/api/layout", async (c) => {
  const body = parseOrThrow(LayoutRequestSchema, await c.req.json<unknown>());

  const outcome = layoutPlan(body.plan, {
    canvas: body.canvas,
    maxIterations: config.layout.maxIterations,
  });
  if (!outcome.success) {
    return errorFromCode(c, getErrorByCode(outcome.code) ?? ApiError.LAYOUT_FAILED, outcome.error);
  }

  return resourceResponse(c, outcome.layout, { durationMs: Number(outcome.duration.toFixed(3)) });
});

// DSL text or plan to SVG
app.post("/api/render", async (c) => {
  const body = parseOrThrow(RenderRequestSchema, await c.req.json<unknown>());

  const generator = new FigureGenerator({
    ...(body.canvas ? { canvasWidth: body.canvas.width, canvasHeight: body.canvas.height } : {}),
    ...(body.styles ? { styles: body.styles } : {}),
  });

  const plan = body.spec !== undefined ? generator.parse(body.spec) : body.plan;
  if (!plan) {
    return validationErrorResponse(c, "Provide exactly one of 'spec' or 'plan'");
  }

  const svg = generator.render(generator.layout(plan), plan.title);
  log.info("Figure rendered", { nodes: plan.nodes.length, bytes: svg.length });
  return svgResponse(c, svg);
});

export { app };
