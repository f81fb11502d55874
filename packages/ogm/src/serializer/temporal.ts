/**
 * Temporal Values
 *
 * Driver temporal types are converted into TemporalValue on the way out of
 * the database and rendered through the database's temporal constructors on
 * the way in.
 */

import {
  isDate,
  isDateTime,
  isDuration,
  isInt,
  isLocalDateTime,
  isLocalTime,
  isTime,
  type Integer,
} from 'neo4j-driver'

export type TemporalKind = 'date' | 'localTime' | 'time' | 'localDateTime' | 'dateTime' | 'duration'

const CONSTRUCTORS: Record<TemporalKind, string> = {
  date: 'date',
  localTime: 'localTime',
  time: 'time',
  localDateTime: 'localDateTime',
  dateTime: 'datetime',
  duration: 'duration',
}

export interface DurationComponents {
  months: number
  days: number
  seconds: number
  nanoseconds: number
}

interface TemporalZone {
  timeZoneId?: string
  offsetSeconds?: number
}

/**
 * A date, time, datetime or duration as the database understands it.
 *
 * Zoned kinds (`time`, `dateTime`) carry a zone id or a fixed offset;
 * local kinds carry neither.
 */
export class TemporalValue {
  readonly timeZoneId?: string
  readonly offsetSeconds?: number

  private constructor(
    readonly kind: TemporalKind,
    readonly iso: string,
    zone: TemporalZone = {},
    readonly duration?: DurationComponents,
  ) {
    this.timeZoneId = zone.timeZoneId
    this.offsetSeconds = zone.offsetSeconds
  }

  static date(iso: string): TemporalValue {
    return new TemporalValue('date', iso)
  }

  static localTime(iso: string): TemporalValue {
    return new TemporalValue('localTime', iso)
  }

  static time(iso: string, offsetSeconds: number): TemporalValue {
    return new TemporalValue('time', iso, { offsetSeconds })
  }

  static localDateTime(iso: string): TemporalValue {
    return new TemporalValue('localDateTime', iso)
  }

  static dateTime(iso: string, zone: TemporalZone): TemporalValue {
    return new TemporalValue('dateTime', iso, zone)
  }

  static duration(iso: string, components: DurationComponents): TemporalValue {
    return new TemporalValue('duration', iso, {}, components)
  }

  /** Instant of a JS Date, kept in UTC. */
  static fromDate(date: Date): TemporalValue {
    return new TemporalValue('dateTime', date.toISOString(), { offsetSeconds: 0 })
  }

  get zoned(): boolean {
    return this.timeZoneId !== undefined || this.offsetSeconds !== undefined
  }

  /** Cypher constructor call, e.g. `date('2024-01-31')`. */
  toCypher(): string {
    return `${CONSTRUCTORS[this.kind]}('${this.iso}')`
  }

  toString(): string {
    return this.iso
  }
}

type NumberLike = number | bigint | Integer

function toNumber(value: NumberLike): number {
  if (typeof value === 'number') return value
  if (typeof value === 'bigint') return Number(value)
  return value.toNumber()
}

/**
 * Convert a driver temporal value. Returns undefined for anything else.
 */
export function fromDriverTemporal(value: unknown): TemporalValue | undefined {
  if (isDateTime(value)) {
    const iso = value.toString()
    if (value.timeZoneId) {
      return TemporalValue.dateTime(iso, { timeZoneId: value.timeZoneId })
    }
    const offset = value.timeZoneOffsetSeconds
    return TemporalValue.dateTime(iso, { offsetSeconds: offset === undefined ? 0 : toNumber(offset) })
  }
  if (isLocalDateTime(value)) return TemporalValue.localDateTime(value.toString())
  if (isDate(value)) return TemporalValue.date(value.toString())
  if (isTime(value)) return TemporalValue.time(value.toString(), toNumber(value.timeZoneOffsetSeconds))
  if (isLocalTime(value)) return TemporalValue.localTime(value.toString())
  if (isDuration(value)) {
    return TemporalValue.duration(value.toString(), {
      months: toNumber(value.months),
      days: toNumber(value.days),
      seconds: toNumber(value.seconds),
      nanoseconds: toNumber(value.nanoseconds),
    })
  }
  return undefined
}

/**
 * Convert a driver Integer (or bigint) to a JS number when it fits, otherwise
 * to a bigint.
 */
export function fromDriverInteger(value: unknown): number | bigint | undefined {
  if (isInt(value)) {
    return value.inSafeRange() ? value.toNumber() : value.toBigInt()
  }
  if (typeof value === 'bigint') {
    return value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)
      ? Number(value)
      : value
  }
  return undefined
}
