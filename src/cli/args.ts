import { Command, CommanderError, InvalidArgumentError, Option } from 'commander'
import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { dirname, join } from 'node:path'
import { z } from 'zod'

const packageSchema = z.object({ version: z.string() })

const getVersion = (): string => {
  try {
    const __dirname = dirname(fileURLToPath(import.meta.url))
    const pkgPath = join(__dirname, '..', '..', 'package.json')
    return packageSchema.parse(JSON.parse(readFileSync(pkgPath, 'utf-8'))).version
  } catch {
    return '0.0.0'
  }
}

export type OutputFormat = 'json' | 'text'

export interface GlobalOptions {
  format: OutputFormat
  quiet: boolean
  config?: string
  orders?: string
  refunds?: string
}

export type YearlyOptions = GlobalOptions

export interface MonthlyOptions extends GlobalOptions {
  year: number
}

export interface InteractiveOptions {
  setup: boolean
  config?: string
  orders?: string
  refunds?: string
}

export type CommandAction =
  | { command: 'yearly'; options: YearlyOptions }
  | { command: 'monthly'; options: MonthlyOptions }
  | { command: 'interactive'; options: InteractiveOptions }

const parseYearArg = (value: string): number => {
  if (!/^\d{1,4}$/.test(value.trim())) {
    throw new InvalidArgumentError('Expected a year such as 2024.')
  }
  return Number(value.trim())
}

/**
 * Parse CLI arguments and return the command to execute
 * Returns null if --help or --version was displayed
 *
 * @example
 * parseArgs(['node', 'order-spend', 'monthly', '--year', '2024', '-f', 'text'])
 * // => { command: 'monthly', options: { year: 2024, format: 'text', quiet: false } }
 */
export const parseArgs = (argv: string[]): CommandAction | null => {
  let result: CommandAction | null = null

  const program = new Command()
    .name('order-spend')
    .description('Net spend per year and month from order history exports')
    .version(getVersion())
    // Throw instead of process.exit; subcommands inherit this
    .exitOverride()
    .enablePositionalOptions()
    .option('--setup', 'Run the setup wizard before starting', false)
    .option('--config <path>', 'Path to config file')
    .option('--orders <path>', 'Order history CSV')
    .option('--refunds <path>', 'Refunds CSV offered when loading refunds')
    .action((options: InteractiveOptions) => {
      // Default action when no subcommand is provided - run the menu
      result = { command: 'interactive', options }
    })

  // File options given before the subcommand land on the root program
  const withRootFiles = <T extends GlobalOptions>(options: T): T => {
    const root = program.opts<Pick<InteractiveOptions, 'config' | 'orders' | 'refunds'>>()
    return {
      ...options,
      config: options.config ?? root.config,
      orders: options.orders ?? root.orders,
      refunds: options.refunds ?? root.refunds,
    }
  }

  // Global options available to all subcommands
  const addGlobalOptions = (cmd: Command) => {
    return cmd
      .addOption(
        new Option('-f, --format <format>', 'Output format: json or text')
          .choices(['json', 'text'])
          .default('json')
      )
      .option('-q, --quiet', 'Suppress progress messages', false)
      .option('--config <path>', 'Path to config file')
      .option('--orders <path>', 'Order history CSV')
      .option('--refunds <path>', 'Refunds CSV to apply before totalling')
  }

  // Yearly command
  addGlobalOptions(
    program.command('yearly').description('Net spend per calendar year')
  ).action((options: YearlyOptions) => {
    result = { command: 'yearly', options: withRootFiles(options) }
  })

  // Monthly command
  addGlobalOptions(
    program
      .command('monthly')
      .description('Net spend per month of one year, with a bar chart in text mode')
      .requiredOption('-y, --year <year>', 'Year to report on', parseYearArg)
  ).action((options: MonthlyOptions) => {
    result = { command: 'monthly', options: withRootFiles(options) }
  })

  try {
    program.parse(argv)
  } catch (err: unknown) {
    // Commander throws on --help and --version, which is expected
    if (err instanceof CommanderError) {
      if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
        return null
      }
    }
    throw err
  }

  return result
}
