/**
 * Shared Types
 *
 * Value types passed between the Gregorian and Ethiopian modules.
 */

export type CalendarName = 'gregorian' | 'ethiopian'

/** Julian Day Number: continuous integer day count. */
export type Jdn = number

/** A year/month/day triple. Dates carry no identity beyond their value. */
export type CalendarDate = {
  readonly year: number
  readonly month: number
  readonly day: number
}

/** Proleptic Gregorian date, month 1-12. */
export type GregorianDate = CalendarDate

/** Ethiopian date, month 1-13 (13 is Pagume). */
export type EthiopianDate = CalendarDate
