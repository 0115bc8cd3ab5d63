import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { CommanderError } from 'commander'
import { parseArgs } from '../args.js'

const argv = (...args: string[]) => ['node', 'order-spend', ...args]

describe('parseArgs', () => {
  beforeEach(() => {
    // Commander prints help, version and errors itself
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true)
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('starts the interactive session without a command', () => {
    expect(parseArgs(argv())).toEqual({
      command: 'interactive',
      options: { setup: false },
    })
  })

  it('passes --setup and file paths to the interactive session', () => {
    expect(parseArgs(argv('--setup', '--orders', 'o.csv', '--refunds', 'r.csv'))).toEqual({
      command: 'interactive',
      options: { setup: true, orders: 'o.csv', refunds: 'r.csv' },
    })
  })

  it('parses the yearly command with defaults', () => {
    expect(parseArgs(argv('yearly'))).toEqual({
      command: 'yearly',
      options: { format: 'json', quiet: false },
    })
  })

  it('parses yearly options', () => {
    expect(parseArgs(argv('yearly', '-f', 'text', '-q', '--refunds', 'r.csv'))).toEqual({
      command: 'yearly',
      options: { format: 'text', quiet: true, refunds: 'r.csv' },
    })
  })

  it('parses the monthly year as a number', () => {
    expect(parseArgs(argv('monthly', '--year', '2024', '--orders', 'o.csv'))).toEqual({
      command: 'monthly',
      options: { format: 'json', quiet: false, year: 2024, orders: 'o.csv' },
    })
  })

  it('passes file options given before the command on to it', () => {
    expect(parseArgs(argv('--orders', 'o.csv', '--config', 'c.json', 'yearly'))).toEqual({
      command: 'yearly',
      options: { format: 'json', quiet: false, orders: 'o.csv', config: 'c.json' },
    })
  })

  it('prefers file options given after the command', () => {
    expect(
      parseArgs(argv('--refunds', 'root.csv', 'monthly', '--year', '2024', '--refunds', 'sub.csv'))
    ).toEqual({
      command: 'monthly',
      options: { format: 'json', quiet: false, year: 2024, refunds: 'sub.csv' },
    })
  })

  it('requires --year for monthly', () => {
    expect(() => parseArgs(argv('monthly'))).toThrow(CommanderError)
  })

  it('rejects a year that is not a number', () => {
    expect(() => parseArgs(argv('monthly', '--year', 'soon'))).toThrow(CommanderError)
  })

  it('rejects an unknown output format', () => {
    expect(() => parseArgs(argv('yearly', '-f', 'xml'))).toThrow(CommanderError)
  })

  it('returns null after printing the version', () => {
    expect(parseArgs(argv('--version'))).toBeNull()
    expect(process.stdout.write).toHaveBeenCalledWith('0.1.0\n')
  })

  it('returns null after printing help', () => {
    expect(parseArgs(argv('--help'))).toBeNull()
  })
})
