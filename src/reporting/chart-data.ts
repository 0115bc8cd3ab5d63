import { formatMoney } from '../shared/format.js'
import type { MonthBar, PeriodTotals } from './types.js'

export const MONTH_LABELS = [
  'Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun',
  'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec',
] as const

const POSITIVE_GLYPH = '█'
const NEGATIVE_GLYPH = '▒'

export const barGlyph = (amount: number): string =>
  amount < 0 ? NEGATIVE_GLYPH : POSITIVE_GLYPH

export const chartTitle = (year: number): string => `Net Spend by Month - ${year}`

/**
 * Builds twelve bars (Jan-Dec) from monthly totals. Months without orders
 * get a zero bar. Lengths are scaled so the largest absolute amount fills `width`.
 *
 * @example
 * buildMonthlyBars(new Map([[3, 100], [7, 30]]), 10)[2]
 * // => { month: 3, label: 'Mar', amount: 100, length: 10 }
 */
export const buildMonthlyBars = (totals: PeriodTotals, width: number): MonthBar[] => {
  const amounts = MONTH_LABELS.map((_, i) => totals.get(i + 1) ?? 0)
  const largest = Math.max(...amounts.map(Math.abs)) || 1 // Prevent division by zero

  return MONTH_LABELS.map((label, i) => {
    const amount = amounts[i] ?? 0
    return {
      month: i + 1,
      label,
      amount,
      length: Math.round((Math.abs(amount) / largest) * width),
    }
  })
}

/**
 * Renders the monthly chart as plain text, one line per month.
 */
export const formatBarChart = (
  totals: PeriodTotals,
  year: number,
  width: number,
  currency = 'USD'
): string => {
  const bars = buildMonthlyBars(totals, width)
  const lines = bars.map((bar) => {
    return `${bar.label}  ${barGlyph(bar.amount).repeat(bar.length).padEnd(width)}  ${formatMoney(bar.amount, currency)}`
  })

  return [chartTitle(year), '', ...lines].join('\n')
}
