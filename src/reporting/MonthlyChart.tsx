import React, { useEffect } from 'react'
import { Box, Text, render, useApp } from 'ink'
import { formatMoney } from '../shared/format.js'
import { barGlyph, buildMonthlyBars, chartTitle } from './chart-data.js'
import type { PeriodTotals } from './types.js'

interface MonthlyChartProps {
  totals: PeriodTotals
  year: number
  width: number
  currency: string
}

export const MonthlyChart = ({ totals, year, width, currency }: MonthlyChartProps) => {
  const bars = buildMonthlyBars(totals, width)

  return (
    <Box flexDirection="column" paddingX={1} borderStyle="single" borderColor="gray">
      <Text bold color="cyan">{chartTitle(year)}</Text>

      <Box marginTop={1} flexDirection="column">
        {bars.map((bar) => (
          <Box key={bar.month} gap={2}>
            <Text dimColor>{bar.label}</Text>
            <Box width={width}>
              <Text color={bar.amount < 0 ? 'red' : 'green'}>
                {barGlyph(bar.amount).repeat(bar.length)}
              </Text>
            </Box>
            <Text color={bar.amount < 0 ? 'red' : undefined}>
              {formatMoney(bar.amount, currency)}
            </Text>
          </Box>
        ))}
      </Box>
    </Box>
  )
}

const PrintOnce = (props: MonthlyChartProps) => {
  const { exit } = useApp()

  useEffect(() => {
    exit()
  }, [exit])

  return <MonthlyChart {...props} />
}

/**
 * Draws the chart once and resolves when Ink has flushed it,
 * so prompts can continue below it.
 */
export const renderMonthlyChart = async (props: MonthlyChartProps): Promise<void> => {
  const instance = render(<PrintOnce {...props} />)
  await instance.waitUntilExit()
}
