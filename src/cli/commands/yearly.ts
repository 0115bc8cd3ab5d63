import type { YearlyOptions } from '../args.js'
import type { AppConfig } from '../../config/config-types.js'
import { createFormatter, type CommandResult } from '../output.js'
import { yearlyTotals } from '../../reporting/net-spend.js'
import { formatMoney, formatTable } from '../../shared/format.js'
import type { PeriodTotals, YearlySummary } from '../../reporting/types.js'
import { loadOrderData } from './load-data.js'

export interface YearlyResult extends CommandResult {
  currency: string
  refundsApplied: boolean
  years: YearlySummary[]
}

/**
 * Yearly totals as rows, oldest year first.
 */
export const summarizeYears = (totals: PeriodTotals): YearlySummary[] =>
  [...totals.entries()]
    .map(([year, net]) => ({ year, net }))
    .sort((a, b) => a.year - b.year)

export const formatYearlyText = (
  years: YearlySummary[],
  refundsApplied: boolean,
  currency: string
): string => {
  const heading = refundsApplied ? 'Yearly Totals (Net with Refunds)' : 'Yearly Totals'
  const rows = years.map((y) => [String(y.year), formatMoney(y.net, currency)])

  return [heading, '', formatTable(['Year', 'Net Spend'], rows)].join('\n')
}

/**
 * Yearly CLI command implementation.
 *
 * @example
 * order-spend yearly --refunds Retail.OrderHistory.Refunds.csv --format text
 */
export const yearlyCommand = async (options: YearlyOptions, config: AppConfig): Promise<void> => {
  const formatter = createFormatter(options.format, options.quiet)
  const { orders, refundsApplied } = await loadOrderData(config, formatter)

  const years = summarizeYears(yearlyTotals(orders))
  const currency = config.display.currency

  const result: YearlyResult = {
    success: true,
    currency,
    refundsApplied,
    years,
  }

  // Add formatted text for text mode
  if (options.format === 'text') {
    result.formatted = formatYearlyText(years, refundsApplied, currency)
  }

  formatter.success(result)
}
