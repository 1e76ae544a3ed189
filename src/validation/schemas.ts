/**
 * Zod Validation Schemas
 *
 * Type-safe validation for plans arriving over the API and for CLI options.
 */

import { z } from "zod";

// ==================== Constants ====================

/**
 * Validation limits to keep layouts and SVG output at a sensible size
 */
export const LIMITS = {
  // String lengths
  ID_MAX: 100,
  LABEL_MAX: 1000,
  TYPE_MAX: 100,
  TITLE_MAX: 500,
  DESCRIPTION_MAX: 5000,
  SPEC_MAX: 200_000,
  METADATA_KEYS_MAX: 50,

  // Array sizes
  MAX_NODES: 1000,
  MAX_EDGES: 5000,
  MAX_STYLES: 50,

  // Canvas
  CANVAS_MIN: 1,
  CANVAS_MAX: 10000,
} as const;

// ==================== Base Schemas ====================

/**
 * Node identifiers follow the DSL's identifier rule
 */
export const NodeIdSchema = z
  .string()
  .min(1)
  .max(LIMITS.ID_MAX)
  .regex(/^[\w-]+$/, { message: "Identifiers may contain letters, digits, '_' and '-'" });

/**
 * Color validation - hex color or CSS color name
 */
export const ColorSchema = z.string().refine(
  (val) => /^#[0-9a-fA-F]{3,8}$/.test(val) || /^[a-zA-Z]+$/.test(val),
  { message: "Invalid color format. Use hex (#RGB, #RRGGBB, #RRGGBBAA) or CSS color name" }
);

export const CanvasSchema = z.object({
  width: z.number().min(LIMITS.CANVAS_MIN).max(LIMITS.CANVAS_MAX),
  height: z.number().min(LIMITS.CANVAS_MIN).max(LIMITS.CANVAS_MAX),
});

export const ShapeStyleSchema = z.object({
  fill: ColorSchema,
  stroke: ColorSchema,
  strokeWidth: z.number().min(0).max(50).optional(),
  textColor: ColorSchema.optional(),
});

export const StyleOverridesSchema = z
  .record(z.string().min(1).max(LIMITS.TYPE_MAX), ShapeStyleSchema)
  .refine((styles) => Object.keys(styles).length <= LIMITS.MAX_STYLES, {
    message: `At most ${LIMITS.MAX_STYLES} style overrides are allowed`,
  });

// ==================== Plan Schemas ====================

export const FigureNodeSchema = z.object({
  id: NodeIdSchema,
  label: z.string().max(LIMITS.LABEL_MAX),
  type: z.string().min(1).max(LIMITS.TYPE_MAX).default("process"),
  metadata: z
    .record(z.string().max(LIMITS.ID_MAX), z.string().max(LIMITS.LABEL_MAX))
    .refine((m) => Object.keys(m).length <= LIMITS.METADATA_KEYS_MAX, {
      message: `At most ${LIMITS.METADATA_KEYS_MAX} metadata keys are allowed`,
    })
    .default({}),
});

export const FigureEdgeSchema = z.object({
  source: NodeIdSchema,
  target: NodeIdSchema,
  label: z.string().max(LIMITS.LABEL_MAX).optional(),
});

/**
 * Structural checks only: dangling edges and duplicate identifiers are left to
 * the layout engine, which reports them with their own error codes
 */
export const FigurePlanSchema = z.object({
  nodes: z.array(FigureNodeSchema).max(LIMITS.MAX_NODES),
  edges: z.array(FigureEdgeSchema).max(LIMITS.MAX_EDGES).default([]),
  title: z.string().max(LIMITS.TITLE_MAX).optional(),
  description: z.string().max(LIMITS.DESCRIPTION_MAX).optional(),
});

// ==================== API Request Schemas ====================

export const ParseRequestSchema = z.object({
  spec: z.string().min(1, "Spec text is required").max(LIMITS.SPEC_MAX),
});

export const LayoutRequestSchema = z.object({
  plan: FigurePlanSchema,
  canvas: CanvasSchema.optional(),
});

/**
 * Render either DSL text or an already-structured plan
 */
export const RenderRequestSchema = z
  .object({
    spec: z.string().min(1).max(LIMITS.SPEC_MAX).optional(),
    plan: FigurePlanSchema.optional(),
    canvas: CanvasSchema.optional(),
    styles: StyleOverridesSchema.optional(),
  })
  .refine((req) => (req.spec === undefined) !== (req.plan === undefined), {
    message: "Provide exactly one of 'spec' or 'plan'",
  });

// ==================== CLI Schemas ====================

const positiveNumberString = (defaultValue: number) =>
  z.preprocess(
    (val) => val ?? String(defaultValue),
    z
      .string()
      .transform((s) => Number(s))
      .pipe(z.number().finite().min(LIMITS.CANVAS_MIN).max(LIMITS.CANVAS_MAX))
  );

export const CliOptionsSchema = z.object({
  spec: z.string().min(1, "A spec file path is required"),
  out: z.string().min(1).default("figure.svg"),
  width: positiveNumberString(960),
  height: positiveNumberString(640),
});

// ==================== Validation Helpers ====================

function formatIssues(issues: z.ZodIssue[]): string {
  return issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
      return `${path}${issue.message}`;
    })
    .join("; ");
}

/**
 * Validate and parse data, returning result with typed error
 */
export function validateRequest<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown
): { success: true; data: z.output<T> } | { success: false; error: string; details: z.ZodIssue[] } {
  const result = schema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    error: formatIssues(result.error.issues),
    details: result.error.issues,
  };
}

/**
 * Parse or throw a ValidationError
 */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, data: unknown): z.output<T> {
  const result = validateRequest(schema, data);
  if (!result.success) {
    throw new ValidationError(result.error, result.details);
  }
  return result.data;
}

/**
 * Custom validation error for API responses
 */
export class ValidationError extends Error {
  public readonly code = "VALIDATION_ERROR";
  public readonly status = 400;

  constructor(
    message: string,
    public readonly details: z.ZodIssue[]
  ) {
    super(message);
    this.name = "ValidationError";
  }
}
