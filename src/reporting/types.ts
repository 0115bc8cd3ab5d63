/**
 * Types for net spend reporting.
 *
 * Amounts are net spend (subtotal minus refunds) in plain currency units.
 */

export type { Order, OrderBook, RefundTotals } from '../orders/order-types.js'

/**
 * Net spend keyed by period: a calendar year, or a month (1-12) within one year.
 * Periods without orders are absent rather than zero.
 *
 * @example
 * const yearly: PeriodTotals = new Map([[2024, 130], [2025, 10]])
 */
export type PeriodTotals = Map<number, number>

/**
 * One row of the monthly bar chart.
 *
 * @example
 * const march: MonthBar = { month: 3, label: 'Mar', amount: 100, length: 40 }
 */
export interface MonthBar {
  /** Month number, 1-12 */
  month: number
  /** Three-letter month label */
  label: string
  /** Net amount for the month (0 when no orders) */
  amount: number
  /** Bar length in characters, scaled to the largest absolute amount */
  length: number
}

/**
 * Yearly totals as they are printed by the CLI.
 */
export interface YearlySummary {
  year: number
  net: number
}

/**
 * Monthly totals as they are printed by the CLI.
 */
export interface MonthlySummary {
  month: number
  label: string
  net: number
}
