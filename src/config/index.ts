/**
 * Centralized Configuration Module
 *
 * All environment variables are validated at startup using Zod schemas.
 * Fail fast if config is invalid.
 *
 * Usage:
 *   import { config } from "./config";
 *   console.log(config.figure.canvasWidth);
 */

import { z } from "zod";
import { createLogger } from "../logging";

const log = createLogger("config");

/**
 * Helper to create a port number schema with default
 */
const portSchema = (defaultPort: number) =>
  z.preprocess(
    (val) => val ?? String(defaultPort),
    z
      .string()
      .transform((s) => parseInt(s, 10))
      .pipe(z.number().int().min(1).max(65535))
  );

/**
 * Helper to create a number schema with default and range
 */
const numberSchema = (defaultValue: number, min: number, max: number) =>
  z.preprocess(
    (val) => val ?? String(defaultValue),
    z
      .string()
      .transform((s) => parseInt(s, 10))
      .pipe(z.number().int().min(min).max(max))
  );

/**
 * Environment variable schema with validation
 */
const envSchema = z.object({
  // Server configuration
  PORT: portSchema(8420),

  // Environment
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

  // Logging
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

  // Figure defaults
  FIGURE_CANVAS_WIDTH: numberSchema(960, 1, 10000),
  FIGURE_CANVAS_HEIGHT: numberSchema(640, 1, 10000),
  FIGURE_DEFAULT_NODE_TYPE: z.string().min(1).max(100).default("process"),

  // Layout hardening (unset = derived from graph size)
  LAYOUT_MAX_ITERATIONS: z
    .string()
    .transform((s) => parseInt(s, 10))
    .pipe(z.number().int().min(1))
    .optional(),
});

/**
 * Parse and validate environment variables
 */
function loadConfig(source: NodeJS.ProcessEnv = process.env) {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    log.error("Invalid configuration", {
      issues: result.error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
    });
    throw new ConfigurationError(
      `Invalid configuration: ${result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ")}`
    );
  }

  return result.data;
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * Group validated variables into the shape the rest of the code reads
 */
export function buildConfig(env: z.output<typeof envSchema>) {
  return {
    env: env.NODE_ENV,
    isProduction: env.NODE_ENV === "production",
    isTest: env.NODE_ENV === "test",

    server: {
      port: env.PORT,
    },

    logging: {
      level: env.LOG_LEVEL,
    },

    figure: {
      canvasWidth: env.FIGURE_CANVAS_WIDTH,
      canvasHeight: env.FIGURE_CANVAS_HEIGHT,
      defaultNodeType: env.FIGURE_DEFAULT_NODE_TYPE,
    },

    layout: {
      maxIterations: env.LAYOUT_MAX_ITERATIONS,
    },
  } as const;
}

/**
 * Validated configuration, loaded at import time so the process fails fast
 */
export const config = buildConfig(loadConfig());

/**
 * Get configuration summary for diagnostics
 */
export function getConfigSummary(): Record<string, unknown> {
  return {
    environment: config.env,
    server: { port: config.server.port },
    logging: { level: config.logging.level },
    figure: { ...config.figure },
    layout: { maxIterations: config.layout.maxIterations ?? "auto" },
  };
}

// Export for testing
export { envSchema, loadConfig };
