/**
 * Net spend reporting.
 *
 * Merges refunds into orders and groups net spend by year or month.
 * Supports both CLI output (JSON/text) and the interactive session chart.
 */

export {
  applyRefunds,
  yearlyTotals,
  monthlyTotalsForYear,
  netAmount,
} from './net-spend.js'

export {
  MONTH_LABELS,
  buildMonthlyBars,
  barGlyph,
  formatBarChart,
  chartTitle,
} from './chart-data.js'

export { MonthlyChart, renderMonthlyChart } from './MonthlyChart.js'

export type { PeriodTotals, MonthBar, YearlySummary, MonthlySummary } from './types.js'
