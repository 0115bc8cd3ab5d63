import { parseCsvRows, readCsvFile, type CsvRow } from './csv-reader.js'
import { parseMoney, parseOrderDate } from './parsers.js'
import {
  ORDER_COLUMNS,
  REFUND_COLUMNS,
  type LoadResult,
  type OrderBook,
  type RefundTotals,
} from './order-types.js'

const REQUIRED_ORDER_COLUMNS = Object.values(ORDER_COLUMNS)
const REQUIRED_REFUND_COLUMNS = Object.values(REFUND_COLUMNS)

/**
 * Builds the order book from order history rows.
 *
 * Orders with several line items repeat their id; only the first row counts.
 * Rows with a blank or malformed subtotal are skipped, but a malformed date
 * throws and aborts the whole load.
 */
export const buildOrderBook = (rows: CsvRow[]): OrderBook => {
  const orders: OrderBook = new Map()

  for (const row of rows) {
    const orderId = row[ORDER_COLUMNS.ORDER_ID] ?? ''
    if (orders.has(orderId)) continue

    const subtotal = parseMoney(row[ORDER_COLUMNS.SUBTOTAL])
    if (subtotal === null) continue

    const orderDate = parseOrderDate(row[ORDER_COLUMNS.ORDER_DATE])

    orders.set(orderId, { orderId, orderDate, subtotal, refund: 0 })
  }

  return orders
}

/**
 * Sums refund rows per order id. Knows nothing about orders.
 */
export const buildRefundTotals = (rows: CsvRow[]): RefundTotals => {
  const refunds: RefundTotals = new Map()

  for (const row of rows) {
    const amount = parseMoney(row[REFUND_COLUMNS.AMOUNT])
    if (amount === null) continue

    const orderId = row[REFUND_COLUMNS.ORDER_ID] ?? ''
    refunds.set(orderId, (refunds.get(orderId) ?? 0) + amount)
  }

  return refunds
}

/**
 * Parses order history CSV text.
 *
 * @example
 * const orders = parseOrdersCsv(
 *   'Order ID,Order Date,Shipment Item Subtotal\nA,2024-03-01T10:00:00Z,"1,000.00"'
 * )
 * orders.get('A')?.subtotal // => 1000
 */
export const parseOrdersCsv = (content: string, source = 'orders file'): OrderBook =>
  buildOrderBook(parseCsvRows(content, REQUIRED_ORDER_COLUMNS, source))

/**
 * Parses refunds CSV text.
 */
export const parseRefundsCsv = (content: string, source = 'refunds file'): RefundTotals =>
  buildRefundTotals(parseCsvRows(content, REQUIRED_REFUND_COLUMNS, source))

/**
 * Loads the order history export.
 * Throws when the file is missing or unreadable, a column is missing,
 * or any kept row has a malformed date. The caller decides what to do.
 */
export const loadOrders = async (path: string): Promise<OrderBook> => {
  const rows = await readCsvFile(path, REQUIRED_ORDER_COLUMNS)
  return buildOrderBook(rows)
}

/**
 * Loads the refunds export. Failures come back as a result, never thrown.
 */
export const loadRefunds = async (path: string): Promise<LoadResult<RefundTotals>> => {
  try {
    const rows = await readCsvFile(path, REQUIRED_REFUND_COLUMNS)
    return { success: true, data: buildRefundTotals(rows) }
  } catch (err) {
    return {
      success: false,
      error: err instanceof Error ? err.message : String(err),
    }
  }
}
