import * as p from '@clack/prompts'
import { renderMonthlyChart } from '../reporting/index.js'
import type { AppConfig } from '../config/config-types.js'
import {
  loadRefundsIntoSession,
  monthlyOutcome,
  startSession,
  yearlyHeading,
  yearlyLines,
  type Session,
} from './session.js'

type MenuChoice = 'yearly' | 'monthly' | 'refunds' | 'exit'

const MENU_OPTIONS: { value: MenuChoice; label: string }[] = [
  { value: 'yearly', label: 'View yearly totals' },
  { value: 'monthly', label: 'View monthly graph for a year' },
  { value: 'refunds', label: 'Load refunds CSV' },
  { value: 'exit', label: 'Exit' },
]

const showYearly = (session: Session) => {
  p.note(yearlyLines(session).join('\n'), yearlyHeading(session.refundsLoaded))
}

const showMonthly = async (session: Session) => {
  const input = await p.text({
    message: 'Enter year',
    placeholder: 'e.g. 2026',
  })

  if (p.isCancel(input)) return

  const outcome = monthlyOutcome(session, input)
  switch (outcome.kind) {
    case 'invalid':
      p.log.error(outcome.message)
      return
    case 'empty':
      p.log.warn(outcome.message)
      return
    case 'chart':
      await renderMonthlyChart({
        totals: outcome.totals,
        year: outcome.year,
        width: session.chartWidth,
        currency: session.currency,
      })
  }
}

const loadRefundsFromPrompt = async (session: Session, defaultPath?: string) => {
  const path = await p.text({
    message: 'Enter refunds CSV path',
    initialValue: defaultPath ?? '',
    validate: (value) => {
      if (!value.trim()) return 'Path is required'
    },
  })

  if (p.isCancel(path)) return

  const spinner = p.spinner()
  spinner.start('Loading refunds')
  const outcome = await loadRefundsIntoSession(session, path)

  if (!outcome.success) {
    spinner.stop('Refunds not loaded')
    p.log.error(outcome.error)
    return
  }

  spinner.stop(outcome.message)
  for (const warning of outcome.warnings) {
    p.log.warn(warning)
  }
}

/**
 * Runs the menu loop until the user exits or cancels.
 */
export const runMenu = async (session: Session, defaultRefundsPath?: string): Promise<void> => {
  while (true) {
    const choice = await p.select({
      message: session.refundsLoaded ? 'Select an option  (Refunds applied ✔)' : 'Select an option',
      options: MENU_OPTIONS,
    })

    if (p.isCancel(choice) || choice === 'exit') {
      p.outro('Goodbye 👋')
      return
    }

    switch (choice) {
      case 'yearly':
        showYearly(session)
        break
      case 'monthly':
        await showMonthly(session)
        break
      case 'refunds':
        await loadRefundsFromPrompt(session, defaultRefundsPath)
        break
    }
  }
}

/**
 * Interactive mode: load orders, then hand over to the menu.
 */
export const runInteractiveSession = async (config: AppConfig): Promise<void> => {
  p.intro('Order Spend')

  const spinner = p.spinner()
  spinner.start(`Loading order data from ${config.files.ordersPath}`)
  const start = await startSession(config)

  if (!start.success) {
    spinner.stop('Could not load orders')
    if (start.reason) {
      p.log.error(start.reason)
    }
    p.outro(start.error)
    return
  }

  spinner.stop(`Loaded ${start.session.orders.size} orders`)
  await runMenu(start.session, config.files.refundsPath)
}
