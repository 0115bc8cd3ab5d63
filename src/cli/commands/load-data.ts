import { loadOrders, loadRefunds, type OrderBook } from '../../orders/index.js'
import { applyRefunds } from '../../reporting/net-spend.js'
import type { AppConfig } from '../../config/config-types.js'
import type { OutputFormatter } from '../output.js'

export interface OrderData {
  orders: OrderBook
  refundsApplied: boolean
}

/**
 * Loads the configured orders and, when a refunds file is configured, applies it.
 * Any failure ends the command through `formatter.error`.
 */
export const loadOrderData = async (
  config: AppConfig,
  formatter: OutputFormatter
): Promise<OrderData> => {
  const { ordersPath, refundsPath } = config.files

  formatter.progress(`Loading orders from ${ordersPath}...`)

  let orders: OrderBook
  try {
    orders = await loadOrders(ordersPath)
  } catch (err) {
    formatter.error(err instanceof Error ? err.message : String(err))
  }

  if (orders.size === 0) {
    formatter.error('No valid order data found.')
  }

  formatter.progress(`Loaded ${orders.size} orders`)

  if (!refundsPath) {
    return { orders, refundsApplied: false }
  }

  formatter.progress(`Loading refunds from ${refundsPath}...`)
  const result = await loadRefunds(refundsPath)
  if (!result.success) {
    formatter.error(`Failed to load refunds file: ${result.error}`)
  }

  const unmatched = [...result.data.keys()].filter((id) => !orders.has(id)).length
  if (unmatched > 0) {
    formatter.warn(`${unmatched} refunded order ID(s) have no matching order and were ignored.`)
  }

  applyRefunds(orders, result.data)
  formatter.progress(`Loaded refunds for ${result.data.size} orders.`)

  return { orders, refundsApplied: true }
}
