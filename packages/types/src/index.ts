/**
 * Match Insights - Shared Types
 *
 * Zod schemas and inferred types for parser input, canonical match records
 * and the derived result bundle.
 */

export * from "./common";
export * from "./events";
export * from "./rounds";
export * from "./players";
export * from "./demo";
