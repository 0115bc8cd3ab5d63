import type { MonthlyOptions } from '../args.js'
import type { AppConfig } from '../../config/config-types.js'
import { createFormatter, type CommandResult } from '../output.js'
import { monthlyTotalsForYear } from '../../reporting/net-spend.js'
import { MONTH_LABELS, formatBarChart } from '../../reporting/chart-data.js'
import type { MonthlySummary, PeriodTotals } from '../../reporting/types.js'
import { loadOrderData } from './load-data.js'

export interface MonthlyResult extends CommandResult {
  year: number
  currency: string
  refundsApplied: boolean
  months: MonthlySummary[]
}

/**
 * Months that have orders, January first.
 */
export const summarizeMonths = (totals: PeriodTotals): MonthlySummary[] =>
  [...totals.entries()]
    .sort(([a], [b]) => a - b)
    .map(([month, net]) => ({ month, label: MONTH_LABELS[month - 1] ?? String(month), net }))

/**
 * Monthly CLI command implementation.
 *
 * @example
 * order-spend monthly --year 2024 --format text
 */
export const monthlyCommand = async (options: MonthlyOptions, config: AppConfig): Promise<void> => {
  const formatter = createFormatter(options.format, options.quiet)
  const { orders, refundsApplied } = await loadOrderData(config, formatter)

  const totals = monthlyTotalsForYear(orders, options.year)
  if (totals.size === 0) {
    formatter.error(`No data found for ${options.year}.`)
  }

  const { currency, chartWidth } = config.display

  const result: MonthlyResult = {
    success: true,
    year: options.year,
    currency,
    refundsApplied,
    months: summarizeMonths(totals),
  }

  // Text mode gets the bar chart
  if (options.format === 'text') {
    result.formatted = formatBarChart(totals, options.year, chartWidth, currency)
  }

  formatter.success(result)
}
