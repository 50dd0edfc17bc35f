/**
 * Analysis Calculators - Pure functions over canonical match records
 *
 * @module analysis/calculators
 */

export * from "./kast.calculator";
export * from "./combat.calculator";
export * from "./clutch.calculator";
