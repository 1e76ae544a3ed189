/**
 * Styling Module Tests
 */

import { describe, it, expect } from "vitest";
import { DEFAULT_STYLES, getShapeStyle, resolveStyles } from "./index";

describe("Shape styles", () => {
  it("ships styles for process, io and decision", () => {
    expect(DEFAULT_STYLES.process).toEqual({
      fill: "#e0f2fe",
      stroke: "#0284c7",
      strokeWidth: 2,
      textColor: "#0f172a",
    });
    expect(DEFAULT_STYLES.io.stroke).toBe("#7c3aed");
    expect(DEFAULT_STYLES.decision.fill).toBe("#fef3c7");
  });

  it("falls back to the process style for unknown categories", () => {
    const table = resolveStyles();
    expect(getShapeStyle(table, "database")).toEqual(DEFAULT_STYLES.process);
  });

  it("does not mistake Object.prototype members for categories", () => {
    const table = resolveStyles();
    expect(getShapeStyle(table, "constructor")).toEqual(DEFAULT_STYLES.process);
    expect(getShapeStyle(table, "toString")).toEqual(DEFAULT_STYLES.process);
    expect(getShapeStyle(table, "hasOwnProperty")).toEqual(DEFAULT_STYLES.process);
  });

  it("bases an override for a prototype-named category on the process style", () => {
    const table = resolveStyles({ constructor: { fill: "#123456", stroke: "bogus!" } });
    expect(getShapeStyle(table, "constructor")).toEqual({
      fill: "#123456",
      stroke: "#0284c7",
      strokeWidth: 2,
      textColor: "#0f172a",
    });
  });

  it("merges overrides over the defaults", () => {
    const table = resolveStyles({
      io: { fill: "#ffffff", stroke: "#000000", strokeWidth: 3 },
      storage: { fill: "#dcfce7", stroke: "#16a34a" },
    });

    expect(getShapeStyle(table, "io")).toEqual({
      fill: "#ffffff",
      stroke: "#000000",
      strokeWidth: 3,
      textColor: "#0f172a",
    });
    expect(getShapeStyle(table, "storage").fill).toBe("#dcfce7");
    expect(getShapeStyle(table, "decision")).toEqual(DEFAULT_STYLES.decision);
  });

  it("keeps the replaced color when an override color is unsafe", () => {
    const table = resolveStyles({
      process: { fill: "url(javascript:alert(1))", stroke: "red", strokeWidth: -1 },
    });

    expect(getShapeStyle(table, "process")).toEqual({
      fill: "#e0f2fe",
      stroke: "red",
      strokeWidth: 2,
      textColor: "#0f172a",
    });
  });

  it("does not mutate the default table", () => {
    resolveStyles({ process: { fill: "#000000", stroke: "#000000" } });
    expect(DEFAULT_STYLES.process.fill).toBe("#e0f2fe");
  });
});
