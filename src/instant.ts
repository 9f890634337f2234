/**
 * Instants
 *
 * Resolves a JavaScript Date to the calendar day it falls on in an IANA time
 * zone, using Intl.DateTimeFormat. Only the day is kept; time of day is dropped.
 */

import { InvalidDateError } from './errors'
import { jdnToEthiopian } from './ethiopian'
import { gregorianToJdn } from './gregorian'
import type { EthiopianDate, GregorianDate, Jdn } from './types'

export const ETHIOPIA_TIME_ZONE = 'Africa/Addis_Ababa'

function gregorianDayAt(instant: Date, timeZone: string): GregorianDate {
  const ms = instant.getTime()
  if (Number.isNaN(ms)) throw new InvalidDateError('gregorian', NaN, NaN, NaN)

  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: 'numeric',
    day: 'numeric',
    era: 'short',
  })

  const parts = formatter.formatToParts(instant)
  const get = (type: Intl.DateTimeFormatPartTypes) => {
    const part = parts.find((p) => p.type === type)
    return part ? parseInt(part.value, 10) : NaN
  }

  const year = get('year')
  const month = get('month')
  const day = get('day')
  // Years before 1 come back as era years ("6 BC")
  const era = parts.find((p) => p.type === 'era')
  if (era?.value === 'BC') throw new InvalidDateError('gregorian', 1 - year, month, day)

  return { year, month, day }
}

export function jdnFromInstant(instant: Date, timeZone: string = 'UTC'): Jdn {
  const { year, month, day } = gregorianDayAt(instant, timeZone)
  return gregorianToJdn(year, month, day)
}

export function ethiopianDateOf(instant: Date, timeZone: string = ETHIOPIA_TIME_ZONE): EthiopianDate {
  return jdnToEthiopian(jdnFromInstant(instant, timeZone))
}
