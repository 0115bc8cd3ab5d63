import * as p from '@clack/prompts'
import { existsSync } from 'node:fs'
import { CURRENCIES, DEFAULT_ORDERS_FILE, appConfigSchema, type AppConfig } from './config-types.js'
import { getConfigPath, saveConfig } from './config-service.js'

/**
 * Interactive setup wizard.
 * Asks for the export locations and display currency, then saves the config.
 */
export const runSetupWizard = async (
  current?: AppConfig,
  configPath = getConfigPath()
): Promise<AppConfig> => {
  p.intro('Welcome to Order Spend')

  const ordersPath = await p.text({
    message: 'Where is your order history CSV?',
    placeholder: DEFAULT_ORDERS_FILE,
    initialValue: current?.files.ordersPath ?? DEFAULT_ORDERS_FILE,
    validate: (value) => {
      if (!value) return 'Path is required'
    },
  })

  if (p.isCancel(ordersPath)) {
    p.cancel('Setup cancelled')
    process.exit(0)
  }

  if (!existsSync(ordersPath)) {
    p.log.warn(`${ordersPath} does not exist yet. You can still save it.`)
  }

  const refundsPath = await p.text({
    message: 'Refunds CSV (optional, used as the default when loading refunds)',
    placeholder: 'Leave empty to skip',
    initialValue: current?.files.refundsPath ?? '',
  })

  if (p.isCancel(refundsPath)) {
    p.cancel('Setup cancelled')
    process.exit(0)
  }

  const currency = await p.select({
    message: 'Display currency',
    initialValue: current?.display.currency ?? 'USD',
    options: CURRENCIES.map((c) => ({ value: c.value, label: c.label })),
  })

  if (p.isCancel(currency)) {
    p.cancel('Setup cancelled')
    process.exit(0)
  }

  const config = appConfigSchema.parse({
    files: {
      ordersPath,
      refundsPath: refundsPath || undefined,
    },
    display: {
      currency,
      chartWidth: current?.display.chartWidth,
    },
  })

  await saveConfig(config, configPath)

  p.outro(`Saved to ${configPath}`)

  return config
}
