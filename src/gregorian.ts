/**
 * Gregorian Calendar
 *
 * Pure functions mapping proleptic Gregorian dates to and from Julian Day Numbers.
 * A date's JDN is its ordinal day (0001-01-01 = 1) plus GREGORIAN_EPOCH_OFFSET.
 */

import { InvalidDateError, InvalidJdnError } from './errors'
import { floorDiv } from './internal/math'
import type { GregorianDate, Jdn } from './types'

// ============================================================================
// Range
// ============================================================================

export const GREGORIAN_EPOCH_OFFSET = 1721425

export const MIN_GREGORIAN_YEAR = 1
export const MAX_GREGORIAN_YEAR = 9999

/** JDN of 0001-01-01 */
export const MIN_JDN: Jdn = GREGORIAN_EPOCH_OFFSET + 1

/** JDN of 9999-12-31 */
export const MAX_JDN: Jdn = 5373484

export function isJdnInRange(jdn: number): boolean {
  return Number.isInteger(jdn) && jdn >= MIN_JDN && jdn <= MAX_JDN
}

export function assertJdnInRange(jdn: number): void {
  if (!isJdnInRange(jdn)) throw new InvalidJdnError(jdn)
}

// ============================================================================
// Calendar Rules
// ============================================================================

const MONTH_LENGTHS = [0, 31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const

export function isGregorianLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

export function daysInGregorianMonth(year: number, month: number): number {
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new InvalidDateError('gregorian', year, month, 1)
  }
  if (month === 2 && isGregorianLeapYear(year)) return 29
  return MONTH_LENGTHS[month] ?? 0
}

export function isValidGregorianDate(year: number, month: number, day: number): boolean {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) return false
  if (year < MIN_GREGORIAN_YEAR || year > MAX_GREGORIAN_YEAR) return false
  if (month < 1 || month > 12) return false
  return day >= 1 && day <= daysInGregorianMonth(year, month)
}

// ============================================================================
// Conversion
// ============================================================================

export function gregorianToJdn(year: number, month: number, day: number): Jdn {
  if (!isValidGregorianDate(year, month, day)) {
    throw new InvalidDateError('gregorian', year, month, day)
  }

  // March-based year puts the leap day at the end of the counted year
  const a = floorDiv(14 - month, 12)
  const y = year + 4800 - a
  const m = month + 12 * a - 3
  return (
    day +
    floorDiv(153 * m + 2, 5) +
    365 * y +
    floorDiv(y, 4) -
    floorDiv(y, 100) +
    floorDiv(y, 400) -
    32045
  )
}

export function jdnToGregorian(jdn: Jdn): GregorianDate {
  assertJdnInRange(jdn)

  const a = jdn + 32044
  const b = floorDiv(4 * a + 3, 146097)
  const c = a - floorDiv(146097 * b, 4)
  const d = floorDiv(4 * c + 3, 1461)
  const e = c - floorDiv(1461 * d, 4)
  const m = floorDiv(5 * e + 2, 153)
  return {
    year: 100 * b + d - 4800 + floorDiv(m, 10),
    month: m + 3 - 12 * floorDiv(m, 10),
    day: e - floorDiv(153 * m + 2, 5) + 1,
  }
}
