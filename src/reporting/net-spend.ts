import type { Order, OrderBook, RefundTotals, PeriodTotals } from './types.js'

/**
 * Net amount of an order. Not clamped: refunds larger than the subtotal go negative.
 */
export const netAmount = (order: Order): number => order.subtotal - order.refund

const addToPeriod = (totals: PeriodTotals, period: number, amount: number) => {
  totals.set(period, (totals.get(period) ?? 0) + amount)
}

/**
 * Adds refund totals onto the matching orders, in place.
 * Refunds for ids that are not in the order book are dropped.
 *
 * Not idempotent: applying the same refunds twice counts them twice,
 * so call it once per refunds source.
 */
export const applyRefunds = (orders: OrderBook, refunds: RefundTotals): void => {
  for (const [orderId, amount] of refunds) {
    const order = orders.get(orderId)
    if (order) {
      order.refund += amount
    }
  }
}

/**
 * Sums net spend per calendar year of the order date.
 *
 * @example
 * yearlyTotals(orders) // => Map { 2024 => 130, 2025 => 10 }
 */
export const yearlyTotals = (orders: OrderBook): PeriodTotals => {
  const totals: PeriodTotals = new Map()

  for (const order of orders.values()) {
    addToPeriod(totals, order.orderDate.getFullYear(), netAmount(order))
  }

  return totals
}

/**
 * Sums net spend per month (1-12) for orders placed in the given year.
 * Returns an empty map when no order falls in that year.
 */
export const monthlyTotalsForYear = (orders: OrderBook, year: number): PeriodTotals => {
  const totals: PeriodTotals = new Map()

  for (const order of orders.values()) {
    if (order.orderDate.getFullYear() !== year) continue
    addToPeriod(totals, order.orderDate.getMonth() + 1, netAmount(order))
  }

  return totals
}
