/**
 * Numeric helpers shared by the calculators
 *
 * @module analysis/utils/math
 */

/**
 * Divide, resolving a zero denominator to 0
 */
export function safeDivide(numerator: number, denominator: number): number {
  if (denominator === 0) return 0;
  return numerator / denominator;
}

/**
 * Percentage of part over total, 0 when total is 0
 */
export function percentage(part: number, total: number): number {
  return safeDivide(part, total) * 100;
}

/**
 * Round to 1 decimal place
 */
export function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Round to 2 decimal places
 */
export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
