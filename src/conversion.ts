/**
 * Cross-Calendar Conversion
 *
 * Gregorian ⇄ Ethiopian through the JDN, plus day arithmetic on Ethiopian
 * dates. Errors from the underlying steps propagate unchanged.
 */

import { InvalidJdnError } from './errors'
import { ethiopianToJdn, jdnToEthiopian } from './ethiopian'
import { gregorianToJdn, jdnToGregorian } from './gregorian'
import type { EthiopianDate, GregorianDate } from './types'

// ============================================================================
// Conversion
// ============================================================================

export function gregorianToEthiopian(year: number, month: number, day: number): EthiopianDate {
  return jdnToEthiopian(gregorianToJdn(year, month, day))
}

export function ethiopianToGregorian(year: number, month: number, day: number): GregorianDate {
  return jdnToGregorian(ethiopianToJdn(year, month, day))
}

// ============================================================================
// Date Arithmetic (via JDN)
// ============================================================================

function jdnOf(date: EthiopianDate): number {
  return ethiopianToJdn(date.year, date.month, date.day)
}

export function addEthiopianDays(date: EthiopianDate, n: number): EthiopianDate {
  const jdn = jdnOf(date)
  if (!Number.isInteger(n)) throw new InvalidJdnError(jdn)
  return jdnToEthiopian(jdn + n)
}

export function ethiopianDaysBetween(a: EthiopianDate, b: EthiopianDate): number {
  return jdnOf(b) - jdnOf(a)
}

export function compareEthiopianDates(a: EthiopianDate, b: EthiopianDate): -1 | 0 | 1 {
  const delta = ethiopianDaysBetween(a, b)
  if (delta > 0) return -1
  if (delta < 0) return 1
  return 0
}
