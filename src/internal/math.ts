/**
 * Integer Helpers
 *
 * Floor division and modulo that round toward negative infinity, so cycle
 * positions stay in [0, divisor) for negative day offsets.
 * (JS `%` keeps the sign of the dividend.)
 */

export function floorDiv(a: number, b: number): number {
  return Math.floor(a / b)
}

export function floorMod(a: number, b: number): number {
  return ((a % b) + b) % b
}
