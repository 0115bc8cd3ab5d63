/**
 * Types for order history and refund records.
 *
 * All monetary values are plain currency units as they appear in the
 * exports (12.5 = $12.50). No currency conversion happens anywhere.
 */

/**
 * A single purchase, keyed by its order identifier.
 *
 * @example
 * const order: Order = {
 *   orderId: '112-0000001-0000001',
 *   orderDate: new Date(2024, 2, 1, 9, 30),
 *   subtotal: 100,
 *   refund: 0,
 * }
 */
export interface Order {
  orderId: string
  /** Naive local date-time; any UTC designator in the export is dropped */
  orderDate: Date
  /** Subtotal from the first row seen for this order */
  subtotal: number
  /** Sum of refunds applied so far */
  refund: number
}

/** Orders by identifier, in first-seen order */
export type OrderBook = Map<string, Order>

/** Total refunded amount by order identifier */
export type RefundTotals = Map<string, number>

/**
 * Outcome of a load that reports failure instead of throwing.
 */
export type LoadResult<T> =
  | { success: true; data: T }
  | { success: false; error: string }

/**
 * Column names of the order history export.
 */
export const ORDER_COLUMNS = {
  ORDER_ID: 'Order ID',
  ORDER_DATE: 'Order Date',
  SUBTOTAL: 'Shipment Item Subtotal',
} as const

/**
 * Column names of the refunds export. Note the different header convention.
 */
export const REFUND_COLUMNS = {
  ORDER_ID: 'OrderID',
  AMOUNT: 'AmountRefunded',
} as const
