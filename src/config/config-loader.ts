import { loadConfig as loadConfigFile } from './config-service.js'
import { appConfigSchema, type AppConfig } from './config-types.js'

/**
 * Environment variable names for CLI automation
 */
export const ENV_VARS = {
  ORDERS_FILE: 'ORDER_SPEND_ORDERS_FILE',
  REFUNDS_FILE: 'ORDER_SPEND_REFUNDS_FILE',
  CURRENCY: 'ORDER_SPEND_CURRENCY',
} as const

/**
 * Values given on the command line. They win over everything else.
 */
export interface ConfigOverrides {
  ordersPath?: string
  refundsPath?: string
  configPath?: string
}

export type ConfigSource = 'defaults' | 'env' | 'file' | 'mixed'

interface LoadConfigResult {
  config: AppConfig
  source: ConfigSource
}

/**
 * Load config from command-line overrides, environment variables and the config file.
 * Precedence: overrides > env vars > config file > schema defaults.
 */
export const loadConfigWithEnv = async (
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): Promise<LoadConfigResult> => {
  const fileConfig = await loadConfigFile(overrides.configPath)

  // Check what's available from env vars
  const envOrders = env[ENV_VARS.ORDERS_FILE] || undefined
  const envRefunds = env[ENV_VARS.REFUNDS_FILE] || undefined
  const envCurrency = env[ENV_VARS.CURRENCY] || undefined

  // Build merged config, letting the schema fill defaults
  const mergedConfig = {
    files: {
      ordersPath: overrides.ordersPath || envOrders || fileConfig?.files.ordersPath,
      refundsPath: overrides.refundsPath || envRefunds || fileConfig?.files.refundsPath,
    },
    display: {
      currency: envCurrency || fileConfig?.display.currency,
      chartWidth: fileConfig?.display.chartWidth,
    },
  }

  // Validate with zod schema
  const config = appConfigSchema.parse(mergedConfig)

  // Determine source
  const fromEnv = !!(envOrders || envRefunds || envCurrency)
  let source: ConfigSource
  if (fromEnv) {
    source = fileConfig ? 'mixed' : 'env'
  } else {
    source = fileConfig ? 'file' : 'defaults'
  }

  return { config, source }
}
