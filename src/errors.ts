/**
 * Error system for the calendar converter.
 *
 * Every error class extends CalendarError, which carries a typed error code.
 * Composed conversions rethrow these unchanged.
 */

import type { CalendarName } from './types'

// ============================================================================
// Error Codes
// ============================================================================

export const CalendarErrorCode = {
  INVALID_DATE: 'INVALID_DATE',
  INVALID_JDN: 'INVALID_JDN',
} as const

export type CalendarErrorCode = (typeof CalendarErrorCode)[keyof typeof CalendarErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class CalendarError extends Error {
  readonly code: CalendarErrorCode

  constructor(code: CalendarErrorCode, message: string) {
    super(message)
    this.name = 'CalendarError'
    this.code = code
  }
}

// ============================================================================
// Date Errors
// ============================================================================

const CALENDAR_LABELS: Record<CalendarName, string> = {
  gregorian: 'Gregorian',
  ethiopian: 'Ethiopian',
}

/** The triple does not name a day that exists in `calendar`. */
export class InvalidDateError extends CalendarError {
  readonly calendar: CalendarName
  readonly year: number
  readonly month: number
  readonly day: number

  constructor(calendar: CalendarName, year: number, month: number, day: number) {
    super(
      CalendarErrorCode.INVALID_DATE,
      `Invalid ${CALENDAR_LABELS[calendar]} date: ${year}-${month}-${day}`
    )
    this.name = 'InvalidDateError'
    this.calendar = calendar
    this.year = year
    this.month = month
    this.day = day
  }
}

// ============================================================================
// JDN Errors
// ============================================================================

export class InvalidJdnError extends CalendarError {
  readonly jdn: number

  constructor(jdn: number) {
    super(CalendarErrorCode.INVALID_JDN, `Julian Day Number out of range: ${jdn}`)
    this.name = 'InvalidJdnError'
    this.jdn = jdn
  }
}
