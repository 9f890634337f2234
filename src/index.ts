/**
 * ethiopian-calendar-converter
 *
 * Public API exports
 */

// Error system
export {
  CalendarError, CalendarErrorCode,
  InvalidDateError, InvalidJdnError,
} from './errors'

// Value types
export type { CalendarName, CalendarDate, GregorianDate, EthiopianDate, Jdn } from './types'

// Gregorian calendar
export {
  GREGORIAN_EPOCH_OFFSET, MIN_GREGORIAN_YEAR, MAX_GREGORIAN_YEAR, MIN_JDN, MAX_JDN,
  isJdnInRange, assertJdnInRange,
  isGregorianLeapYear, daysInGregorianMonth, isValidGregorianDate,
  gregorianToJdn, jdnToGregorian,
} from './gregorian'

// Ethiopian calendar
export {
  ETHIOPIAN_EPOCH_OFFSET, PAGUME, MIN_ETHIOPIAN_JDN,
  isEthiopianLeapYear, daysInEthiopianMonth, isValidEthiopianDate,
  jdnToEthiopian, ethiopianToJdn,
} from './ethiopian'

// Cross-calendar conversion and day arithmetic
export {
  gregorianToEthiopian, ethiopianToGregorian,
  addEthiopianDays, ethiopianDaysBetween, compareEthiopianDates,
} from './conversion'

// Instants
export { ETHIOPIA_TIME_ZONE, jdnFromInstant, ethiopianDateOf } from './instant'
