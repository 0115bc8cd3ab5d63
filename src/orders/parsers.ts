import { InvalidOrderDateError } from './errors.js'

// Plain decimal with optional sign and exponent; no hex, binary or octal literals
const DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/

/**
 * Parses a money field from an export.
 * Returns null for absent, blank or malformed values so callers can skip the row.
 *
 * @example
 * parseMoney('1,234.56') // => 1234.56
 * parseMoney('  ')       // => null
 * parseMoney('abc')      // => null
 */
export const parseMoney = (raw: string | null | undefined): number | null => {
  if (raw === null || raw === undefined) return null

  const trimmed = raw.trim()
  if (!trimmed) return null

  const cleaned = trimmed.replaceAll(',', '')
  if (!DECIMAL.test(cleaned)) return null

  const value = Number(cleaned)
  return Number.isFinite(value) ? value : null
}

// YYYY-MM-DD, optional time with seconds and fraction, optional offset
const ISO_DATE_TIME =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?(?:[+-]\d{2}:?\d{2})?$/

/**
 * Parses an ISO-8601-like order date as a naive local date-time.
 * A trailing UTC designator is stripped and an explicit offset is ignored,
 * so the calendar fields always match what the export shows.
 *
 * @throws {InvalidOrderDateError} when the value is not a valid date
 */
export const parseOrderDate = (raw: string | null | undefined): Date => {
  const value = (raw ?? '').trim().replace(/[Zz]$/, '')
  const match = ISO_DATE_TIME.exec(value)
  if (!match) {
    throw new InvalidOrderDateError(raw ?? '')
  }

  const [, y, mo, d, h = '0', mi = '0', s = '0', fraction = '0'] = match
  const year = Number(y)
  const month = Number(mo)
  const day = Number(d)
  const hours = Number(h)
  const minutes = Number(mi)
  const seconds = Number(s)
  const millis = Number(fraction.padEnd(3, '0').slice(0, 3))

  if (hours > 23 || minutes > 59 || seconds > 59) {
    throw new InvalidOrderDateError(raw ?? '')
  }

  // setFullYear keeps years below 100 as written
  const date = new Date(0)
  date.setFullYear(year, month - 1, day)
  date.setHours(hours, minutes, seconds, millis)
  // Date rolls 2024-02-30 over to March; reject instead
  if (
    date.getFullYear() !== year ||
    date.getMonth() !== month - 1 ||
    date.getDate() !== day
  ) {
    throw new InvalidOrderDateError(raw ?? '')
  }

  return date
}
