/**
 * Structured Logging Module Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import {
  logger,
  createLogger,
  getCorrelationId,
  isLogLevel,
  setLogLevel,
  withCorrelationId,
  LOG_CONFIG,
  type LogEntry,
  type LogLevel,
} from "./index";

// Helper to capture log output
function captureLogOutput() {
  const logs: LogEntry[] = [];
  const push = (output: unknown) => {
    if (typeof output === "string") logs.push(JSON.parse(output));
  };
  const spies = [
    vi.spyOn(console, "log").mockImplementation(push),
    vi.spyOn(console, "warn").mockImplementation(push),
    vi.spyOn(console, "error").mockImplementation(push),
  ];

  return {
    logs,
    restore: () => spies.forEach((spy) => spy.mockRestore()),
  };
}

describe("Structured Logging", () => {
  let capture: ReturnType<typeof captureLogOutput>;
  let previousLevel: LogLevel;

  beforeEach(() => {
    previousLevel = LOG_CONFIG.level;
    setLogLevel("debug");
    capture = captureLogOutput();
  });

  afterEach(() => {
    capture.restore();
    setLogLevel(previousLevel);
  });

  describe("logger", () => {
    it("logs info messages with required fields", () => {
      logger.info("Test message");

      expect(capture.logs).toHaveLength(1);
      const log = capture.logs[0];
      expect(log?.level).toBe("info");
      expect(log?.message).toBe("Test message");
      expect(log?.service).toBe(LOG_CONFIG.service);
      expect(log?.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T/);
    });

    it("logs with metadata", () => {
      logger.info("Layout computed", { nodes: 4, durationMs: "0.12" });

      expect(capture.logs[0]).toMatchObject({ nodes: 4, durationMs: "0.12" });
    });

    it("routes levels to the matching console method", () => {
      logger.warn("Warning message");
      logger.error("Error occurred");

      expect(capture.logs.map((l) => l.level)).toEqual(["warn", "error"]);
    });

    it("logs Error objects with details", () => {
      logger.error("Operation failed", new TypeError("Something failed"));

      expect(capture.logs[0]).toMatchObject({ errorName: "TypeError", errorMessage: "Something failed" });
    });

    it("flattens an error passed in metadata", () => {
      logger.error("Failed", { operation: "render", error: new Error("Nested error") });

      const log = capture.logs[0];
      expect(log?.operation).toBe("render");
      expect(log?.errorMessage).toBe("Nested error");
      expect(log).not.toHaveProperty("error");
    });

    it("stringifies non-Error values", () => {
      logger.error("Failed", { error: 42 });

      expect(capture.logs[0]?.errorValue).toBe("42");
    });
  });

  describe("levels", () => {
    it("drops messages below the configured level", () => {
      setLogLevel("warn");
      logger.debug("hidden");
      logger.info("hidden");
      logger.warn("shown");

      expect(capture.logs.map((l) => l.message)).toEqual(["shown"]);
    });

    it("recognizes level names", () => {
      expect(isLogLevel("debug")).toBe(true);
      expect(isLogLevel("trace")).toBe(false);
      expect(isLogLevel("toString")).toBe(false);
      expect(isLogLevel(1)).toBe(false);
    });
  });

  describe("createLogger", () => {
    it("creates module-scoped logger", () => {
      createLogger("layout").info("Placed");

      expect(capture.logs[0]?.module).toBe("layout");
    });

    it("preserves module through child loggers", () => {
      createLogger("layout").child({ plan: "p1" }).debug("Layered");

      expect(capture.logs[0]).toMatchObject({ module: "layout", plan: "p1", level: "debug" });
    });
  });

  describe("correlation ids", () => {
    it("stamps entries written inside withCorrelationId", () => {
      withCorrelationId("corr-1", () => {
        expect(getCorrelationId()).toBe("corr-1");
        logger.info("inside");
      });
      logger.info("outside");

      expect(capture.logs[0]?.correlationId).toBe("corr-1");
      expect(capture.logs[1]).not.toHaveProperty("correlationId");
    });

    it("prefers an id bound on a child logger", () => {
      withCorrelationId("corr-outer", () => {
        createLogger("web").child({ correlationId: "req-9" }).info("handled");
      });

      expect(capture.logs[0]).toMatchObject({ correlationId: "req-9", module: "web" });
    });
  });
});
