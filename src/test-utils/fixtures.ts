import type { Order, OrderBook } from '../orders/order-types.js'

/**
 * Creates a mock Order with sensible defaults
 */
export const createMockOrder = (overrides: Partial<Order> = {}): Order => ({
  orderId: `order-${Math.random().toString(36).slice(2, 8)}`,
  orderDate: new Date(2024, 0, 15, 12, 0, 0),
  subtotal: 10,
  refund: 0,
  ...overrides,
})

/**
 * Builds an order book from mock orders, keyed by their ids
 */
export const createOrderBook = (orders: Order[]): OrderBook =>
  new Map(orders.map((order) => [order.orderId, order]))

/**
 * Builds CSV text from a header row and data rows
 */
export const toCsv = (header: string[], rows: string[][]): string =>
  [header, ...rows]
    .map((cells) => cells.map((c) => (/[",\n]/.test(c) ? `"${c.replaceAll('"', '""')}"` : c)).join(','))
    .join('\n')

export const ORDER_HEADER = ['Website', 'Order ID', 'Order Date', 'Shipment Item Subtotal']

export const REFUND_HEADER = ['OrderID', 'RefundDate', 'AmountRefunded']
