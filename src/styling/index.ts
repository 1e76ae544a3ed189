/**
 * Styling Module
 */

export * from "./shapes";
