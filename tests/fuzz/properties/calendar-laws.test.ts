/**
 * Property tests for calendar structure and failure behaviour.
 */
import { describe, it, expect } from 'vitest'
import * as fc from 'fast-check'
import {
  jdnGen,
  ethiopianDateGen,
  invalidGregorianTripleGen,
  invalidEthiopianTripleGen,
  outOfRangeJdnGen,
  belowEthiopianRangeJdnGen,
} from '../generators'
import { MAX_JDN, gregorianToJdn, jdnToGregorian, isValidGregorianDate } from '../../../src/gregorian'
import { ethiopianToJdn, jdnToEthiopian, isEthiopianLeapYear, isValidEthiopianDate } from '../../../src/ethiopian'
import {
  gregorianToEthiopian,
  ethiopianToGregorian,
  addEthiopianDays,
  ethiopianDaysBetween,
  compareEthiopianDates,
} from '../../../src/conversion'
import { InvalidDateError, InvalidJdnError } from '../../../src/errors'

// ============================================================================
// Structure
// ============================================================================

describe('Ethiopian calendar structure', () => {
  it('every in-range JDN yields a valid Ethiopian date', () => {
    fc.assert(
      fc.property(jdnGen(), (jdn) => {
        const { year, month, day } = jdnToEthiopian(jdn)
        expect(isValidEthiopianDate(year, month, day)).toBe(true)
      })
    )
  })

  it('Pagume 6 occurs only in leap years', () => {
    fc.assert(
      fc.property(jdnGen(), (jdn) => {
        const { year, month, day } = jdnToEthiopian(jdn)
        if (month === 13 && day === 6) expect(isEthiopianLeapYear(year)).toBe(true)
      })
    )
  })

  it('consecutive JDNs map to consecutive Ethiopian dates', () => {
    fc.assert(
      fc.property(jdnGen({ max: MAX_JDN - 1 }), (jdn) => {
        const today = jdnToEthiopian(jdn)
        const tomorrow = jdnToEthiopian(jdn + 1)
        expect(addEthiopianDays(today, 1)).toEqual(tomorrow)
        expect(compareEthiopianDates(today, tomorrow)).toBe(-1)
      })
    )
  })

  it('year length is 366 exactly for leap years', () => {
    fc.assert(
      fc.property(fc.integer({ min: -6, max: 9990 }), (year) => {
        const length = ethiopianDaysBetween({ year, month: 1, day: 1 }, { year: year + 1, month: 1, day: 1 })
        expect(length).toBe(isEthiopianLeapYear(year) ? 366 : 365)
      })
    )
  })

  it('addEthiopianDays and ethiopianDaysBetween agree', () => {
    fc.assert(
      fc.property(ethiopianDateGen({ minYear: 100, maxYear: 9000 }), fc.integer({ min: -20000, max: 20000 }), (date, n) => {
        expect(ethiopianDaysBetween(date, addEthiopianDays(date, n))).toBe(n)
      })
    )
  })
})

describe('Gregorian calendar structure', () => {
  it('every in-range JDN yields a valid Gregorian date', () => {
    fc.assert(
      fc.property(jdnGen(), (jdn) => {
        const { year, month, day } = jdnToGregorian(jdn)
        expect(isValidGregorianDate(year, month, day)).toBe(true)
      })
    )
  })
})

// ============================================================================
// Failure
// ============================================================================

describe('Failure behaviour', () => {
  it('invalid Gregorian triples throw InvalidDateError every time', () => {
    fc.assert(
      fc.property(invalidGregorianTripleGen(), ([year, month, day]) => {
        expect(() => gregorianToJdn(year, month, day)).toThrow(InvalidDateError)
        expect(() => gregorianToJdn(year, month, day)).toThrow(InvalidDateError)
        expect(() => gregorianToEthiopian(year, month, day)).toThrow(InvalidDateError)
      })
    )
  })

  it('invalid Ethiopian triples throw InvalidDateError every time', () => {
    fc.assert(
      fc.property(invalidEthiopianTripleGen(), ([year, month, day]) => {
        expect(() => ethiopianToJdn(year, month, day)).toThrow(InvalidDateError)
        expect(() => ethiopianToGregorian(year, month, day)).toThrow(InvalidDateError)
        expect(() => ethiopianToGregorian(year, month, day)).toThrow(InvalidDateError)
      })
    )
  })

  it('out-of-range JDNs throw InvalidJdnError from jdnToGregorian every time', () => {
    fc.assert(
      fc.property(outOfRangeJdnGen(), (jdn) => {
        expect(() => jdnToGregorian(jdn)).toThrow(InvalidJdnError)
        expect(() => jdnToGregorian(jdn)).toThrow(InvalidJdnError)
      })
    )
  })

  it('JDNs below the epoch offset throw InvalidJdnError from jdnToEthiopian every time', () => {
    fc.assert(
      fc.property(belowEthiopianRangeJdnGen(), (jdn) => {
        expect(() => jdnToEthiopian(jdn)).toThrow(InvalidJdnError)
        expect(() => jdnToEthiopian(jdn)).toThrow(InvalidJdnError)
      })
    )
  })

  it('JDNs past 9999-12-31 still map to Ethiopian dates', () => {
    fc.assert(
      fc.property(jdnGen({ min: MAX_JDN + 1, max: MAX_JDN + 1_000_000 }), (jdn) => {
        const { year, month, day } = jdnToEthiopian(jdn)
        expect(ethiopianToJdn(year, month, day)).toBe(jdn)
      })
    )
  })
})
