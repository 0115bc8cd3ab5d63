#!/usr/bin/env node
import { isConfigured } from './config/config-service.js'
import { runSetupWizard } from './config/setup-wizard.js'
import { parseArgs, type CommandAction, type InteractiveOptions } from './cli/args.js'
import { loadConfigWithEnv, type ConfigOverrides } from './config/config-loader.js'
import { yearlyCommand, monthlyCommand } from './cli/commands/index.js'
import { runInteractiveSession } from './session/index.js'

const toOverrides = (options: { orders?: string; refunds?: string; config?: string }): ConfigOverrides => ({
  ordersPath: options.orders,
  refundsPath: options.refunds,
  configPath: options.config,
})

const runInteractiveMode = async (options: InteractiveOptions) => {
  const overrides = toOverrides(options)
  const loaded = await loadConfigWithEnv(overrides)
  let config = loaded.config

  // First run with nothing configured, or forced
  const configured = await isConfigured(options.config)
  if (options.setup || (!configured && loaded.source === 'defaults' && !options.orders)) {
    await runSetupWizard(config, options.config)
    config = (await loadConfigWithEnv(overrides)).config
  }

  await runInteractiveSession(config)
}

const runCommand = async (action: CommandAction) => {
  if (action.command === 'interactive') {
    await runInteractiveMode(action.options)
    return
  }

  // Load config with env var and flag support
  const { config } = await loadConfigWithEnv(toOverrides(action.options))

  switch (action.command) {
    case 'yearly':
      await yearlyCommand(action.options, config)
      break
    case 'monthly':
      await monthlyCommand(action.options, config)
      break
  }
}

const main = async () => {
  try {
    // Parse command line arguments
    const action = parseArgs(process.argv)

    // If null, --help or --version was displayed
    if (!action) {
      process.exit(0)
    }

    await runCommand(action)
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error)
    process.exit(1)
  }
}

void main()
