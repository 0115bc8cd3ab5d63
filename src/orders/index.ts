/**
 * Order history and refund loading.
 */

export {
  loadOrders,
  loadRefunds,
  parseOrdersCsv,
  parseRefundsCsv,
  buildOrderBook,
  buildRefundTotals,
} from './order-loader.js'

export { parseMoney, parseOrderDate } from './parsers.js'

export { InvalidOrderDateError, MissingColumnError, CsvFormatError } from './errors.js'

export { ORDER_COLUMNS, REFUND_COLUMNS } from './order-types.js'

export type { Order, OrderBook, RefundTotals, LoadResult } from './order-types.js'
