/**
 * Formats an amount as currency, e.g. 1234.5 => "$1,234.50".
 */
export const formatMoney = (amount: number, currency = 'USD'): string =>
  amount.toLocaleString('en-US', { style: 'currency', currency })

/**
 * Create a simple text table from data
 */
export const formatTable = (
  headers: string[],
  rows: string[][],
  columnWidths?: number[]
): string => {
  const widths = columnWidths || headers.map((h, i) => {
    const maxRowWidth = Math.max(0, ...rows.map(r => (r[i] || '').length))
    return Math.max(h.length, maxRowWidth)
  })

  const formatRow = (cells: string[]) =>
    cells.map((cell, i) => (cell || '').padEnd(widths[i] ?? 0)).join('  ').trimEnd()

  const headerLine = formatRow(headers)
  const separator = widths.map(w => '-'.repeat(w)).join('  ')
  const dataLines = rows.map(formatRow)

  return [headerLine, separator, ...dataLines].join('\n')
}
