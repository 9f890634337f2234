/**
 * Ethiopian Calendar
 *
 * Twelve months of 30 days followed by Pagume, which has 5 days or 6 in a leap
 * year. Leap years recur every 4 years, so day arithmetic works on a 1461-day
 * cycle counted from ETHIOPIAN_EPOCH_OFFSET.
 */

import { InvalidDateError, InvalidJdnError } from './errors'
import { GREGORIAN_EPOCH_OFFSET } from './gregorian'
import { floorDiv, floorMod } from './internal/math'
import type { EthiopianDate, Jdn } from './types'

/** JDN one Ethiopian year before 1 Meskerem of year 1 */
export const ETHIOPIAN_EPOCH_OFFSET = 1723856

const CYCLE_DAYS = 1461
const YEAR_DAYS = 365
const MONTH_DAYS = 30

export const PAGUME = 13

/** Smallest JDN jdnToEthiopian accepts. No upper bound. */
export const MIN_ETHIOPIAN_JDN: Jdn = GREGORIAN_EPOCH_OFFSET

// ============================================================================
// Calendar Rules
// ============================================================================

export function isEthiopianLeapYear(year: number): boolean {
  return floorMod(year + 1, 4) === 0
}

export function daysInEthiopianMonth(year: number, month: number): number {
  if (!Number.isInteger(month) || month < 1 || month > PAGUME) {
    throw new InvalidDateError('ethiopian', year, month, 1)
  }
  if (month < PAGUME) return MONTH_DAYS
  return isEthiopianLeapYear(year) ? 6 : 5
}

export function isValidEthiopianDate(year: number, month: number, day: number): boolean {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) return false
  if (month < 1 || month > PAGUME) return false
  return day >= 1 && day <= daysInEthiopianMonth(year, month)
}

// ============================================================================
// Conversion
// ============================================================================

export function jdnToEthiopian(jdn: Jdn): EthiopianDate {
  if (!Number.isInteger(jdn) || jdn < MIN_ETHIOPIAN_JDN) throw new InvalidJdnError(jdn)

  const d = jdn - ETHIOPIAN_EPOCH_OFFSET
  const r = floorMod(d, CYCLE_DAYS)
  // r === 1460 is the leap day: day 366 of the last year in the cycle
  const n = floorMod(r, YEAR_DAYS) + YEAR_DAYS * floorDiv(r, CYCLE_DAYS - 1)
  return {
    year: 4 * floorDiv(d, CYCLE_DAYS) + floorDiv(r, YEAR_DAYS) - floorDiv(r, CYCLE_DAYS - 1),
    month: floorDiv(n, MONTH_DAYS) + 1,
    day: floorMod(n, MONTH_DAYS) + 1,
  }
}

/**
 * Inverse of jdnToEthiopian. Validates the triple but not the range: the
 * result may fall below MIN_ETHIOPIAN_JDN for very early years.
 */
export function ethiopianToJdn(year: number, month: number, day: number): Jdn {
  if (!isValidEthiopianDate(year, month, day)) {
    throw new InvalidDateError('ethiopian', year, month, day)
  }

  return (
    ETHIOPIAN_EPOCH_OFFSET +
    CYCLE_DAYS * floorDiv(year, 4) +
    YEAR_DAYS * floorMod(year, 4) +
    MONTH_DAYS * (month - 1) +
    (day - 1)
  )
}
