import { resolve } from 'node:path'
import { loadOrders, loadRefunds } from '../orders/index.js'
import { applyRefunds, monthlyTotalsForYear, yearlyTotals } from '../reporting/net-spend.js'
import { formatMoney } from '../shared/format.js'
import type { AppConfig } from '../config/config-types.js'
import type { OrderBook, PeriodTotals, RefundTotals } from '../reporting/types.js'

export const NO_ORDERS_MESSAGE = 'No valid order data found.'

/**
 * Everything the interactive menu works on. Orders are mutated in place
 * when refunds are applied.
 */
export interface Session {
  ordersPath: string
  orders: OrderBook
  refundsLoaded: boolean
  /** Resolved paths of refund files already applied */
  refundSources: string[]
  currency: string
  chartWidth: number
}

export type SessionStart =
  | { success: true; session: Session }
  | { success: false; error: string; reason?: string }

export type MonthlyOutcome =
  | { kind: 'invalid'; message: string }
  | { kind: 'empty'; year: number; message: string }
  | { kind: 'chart'; year: number; totals: PeriodTotals }

export type RefundLoadOutcome =
  | { success: true; message: string; warnings: string[] }
  | { success: false; error: string }

/**
 * Loads the configured orders file and opens a session on it.
 * A load failure or an empty order book ends with NO_ORDERS_MESSAGE.
 */
export const startSession = async (config: AppConfig): Promise<SessionStart> => {
  const ordersPath = config.files.ordersPath

  let orders: OrderBook
  try {
    orders = await loadOrders(ordersPath)
  } catch (err) {
    return {
      success: false,
      error: NO_ORDERS_MESSAGE,
      reason: err instanceof Error ? err.message : String(err),
    }
  }

  if (orders.size === 0) {
    return { success: false, error: NO_ORDERS_MESSAGE }
  }

  return {
    success: true,
    session: {
      ordersPath,
      orders,
      refundsLoaded: false,
      refundSources: [],
      currency: config.display.currency,
      chartWidth: config.display.chartWidth,
    },
  }
}

export const yearlyHeading = (refundsLoaded: boolean): string =>
  refundsLoaded ? 'Yearly Totals (Net with Refunds)' : 'Yearly Totals'

/**
 * One line per year, oldest first.
 *
 * @example
 * yearlyLines(session) // => ['2024: $130.00', '2025: $10.00']
 */
export const yearlyLines = (session: Session): string[] => {
  const totals = yearlyTotals(session.orders)
  return [...totals.keys()]
    .sort((a, b) => a - b)
    .map((year) => `${year}: ${formatMoney(totals.get(year) ?? 0, session.currency)}`)
}

/**
 * Parses a typed year. Surrounding whitespace and a leading sign are allowed,
 * anything else that is not a whole number gives null.
 */
export const parseYear = (input: string): number | null => {
  const trimmed = input.trim()
  if (!/^[+-]?\d+$/.test(trimmed)) return null

  const year = Number(trimmed)
  return Number.isSafeInteger(year) ? year : null
}

export const monthlyOutcome = (session: Session, input: string): MonthlyOutcome => {
  const year = parseYear(input)
  if (year === null) {
    return { kind: 'invalid', message: 'Invalid year.' }
  }

  const totals = monthlyTotalsForYear(session.orders, year)
  if (totals.size === 0) {
    return { kind: 'empty', year, message: `No data found for ${year}.` }
  }

  return { kind: 'chart', year, totals }
}

const countMatched = (orders: OrderBook, refunds: RefundTotals): number =>
  [...refunds.keys()].filter((id) => orders.has(id)).length

/**
 * Loads a refunds file and applies it to the session's orders.
 *
 * Refunds are applied even when the file was applied before or holds
 * ids with no matching order; both cases come back as warnings.
 */
export const loadRefundsIntoSession = async (
  session: Session,
  path: string
): Promise<RefundLoadOutcome> => {
  const trimmed = path.trim()
  const result = await loadRefunds(trimmed)

  if (!result.success) {
    return { success: false, error: `Failed to load refunds file: ${result.error}` }
  }

  const refunds = result.data
  const source = resolve(trimmed)
  const warnings: string[] = []

  if (session.refundSources.includes(source)) {
    warnings.push(`${trimmed} was already applied. Its refunds are now counted twice.`)
  }

  const unmatched = refunds.size - countMatched(session.orders, refunds)
  if (unmatched > 0) {
    warnings.push(`${unmatched} refunded order ID(s) have no matching order and were ignored.`)
  }

  applyRefunds(session.orders, refunds)
  session.refundsLoaded = true
  session.refundSources.push(source)

  return {
    success: true,
    message: `Loaded refunds for ${refunds.size} orders.`,
    warnings,
  }
}
