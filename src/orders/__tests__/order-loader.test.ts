import { describe, it, expect, vi, beforeEach } from 'vitest'
import {
  loadOrders,
  loadRefunds,
  parseOrdersCsv,
  parseRefundsCsv,
} from '../order-loader.js'
import { InvalidOrderDateError, MissingColumnError } from '../errors.js'
import { ORDER_HEADER, REFUND_HEADER, toCsv } from '../../test-utils/fixtures.js'

// Mock node:fs/promises
vi.mock('node:fs/promises', () => ({
  readFile: vi.fn(),
}))

import { readFile } from 'node:fs/promises'

const mockReadFile = vi.mocked(readFile)

describe('parseOrdersCsv', () => {
  it('creates one order per id with zero refund', () => {
    const csv = toCsv(ORDER_HEADER, [
      ['Amazon.com', 'A', '2024-03-01T10:00:00Z', '100.00'],
      ['Amazon.com', 'B', '2024-07-01T10:00:00Z', '50.00'],
    ])

    const orders = parseOrdersCsv(csv)

    expect([...orders.keys()]).toEqual(['A', 'B'])
    expect(orders.get('A')?.subtotal).toBe(100)
    expect(orders.get('A')?.refund).toBe(0)
    expect(orders.get('B')?.orderDate.getMonth()).toBe(6)
  })

  it('keeps only the first row for a repeated order id', () => {
    const csv = toCsv(ORDER_HEADER, [
      ['Amazon.com', 'A', '2024-03-01T10:00:00Z', '100.00'],
      ['Amazon.com', 'A', '2025-06-01T10:00:00Z', '999.00'],
    ])

    const orders = parseOrdersCsv(csv)

    expect(orders.size).toBe(1)
    expect(orders.get('A')?.subtotal).toBe(100)
    expect(orders.get('A')?.orderDate.getFullYear()).toBe(2024)
  })

  it('skips rows with an unparseable subtotal', () => {
    const csv = toCsv(ORDER_HEADER, [
      ['Amazon.com', 'A', '2024-03-01T10:00:00Z', 'Not Available'],
      ['Amazon.com', 'B', '2024-03-02T10:00:00Z', '  '],
      ['Amazon.com', 'C', '2024-03-03T10:00:00Z', '7.50'],
    ])

    const orders = parseOrdersCsv(csv)

    expect([...orders.keys()]).toEqual(['C'])
  })

  it('lets a later valid row create an order whose first row was skipped', () => {
    const csv = toCsv(ORDER_HEADER, [
      ['Amazon.com', 'A', '2024-03-01T10:00:00Z', ''],
      ['Amazon.com', 'A', '2024-04-01T10:00:00Z', '20.00'],
    ])

    const orders = parseOrdersCsv(csv)

    expect(orders.get('A')?.subtotal).toBe(20)
    expect(orders.get('A')?.orderDate.getMonth()).toBe(3)
  })

  it('parses quoted amounts with thousands separators', () => {
    const csv = toCsv(ORDER_HEADER, [['Amazon.com', 'A', '2024-03-01T10:00:00Z', '1,234.56']])

    const orders = parseOrdersCsv(csv)

    expect(orders.get('A')?.subtotal).toBe(1234.56)
  })

  it('handles a byte-order mark before the header', () => {
    const csv = '\uFEFF' + toCsv(ORDER_HEADER, [['Amazon.com', 'A', '2024-03-01T10:00:00Z', '5']])

    const orders = parseOrdersCsv(csv)

    expect(orders.get('A')?.subtotal).toBe(5)
  })

  it('throws on a malformed date', () => {
    const csv = toCsv(ORDER_HEADER, [
      ['Amazon.com', 'A', '2024-03-01T10:00:00Z', '10'],
      ['Amazon.com', 'B', 'last tuesday', '10'],
    ])

    expect(() => parseOrdersCsv(csv)).toThrow(InvalidOrderDateError)
  })

  it('does not parse the date of a skipped row', () => {
    const csv = toCsv(ORDER_HEADER, [['Amazon.com', 'A', 'garbage', 'n/a']])

    expect(parseOrdersCsv(csv).size).toBe(0)
  })

  it('throws when a required column is missing', () => {
    const csv = toCsv(['Order ID', 'Order Date'], [['A', '2024-03-01T10:00:00Z']])

    expect(() => parseOrdersCsv(csv, 'orders.csv')).toThrow(
      'Missing required column "Shipment Item Subtotal" in orders.csv'
    )
  })

  it('returns an empty book for a header-only file', () => {
    expect(parseOrdersCsv(toCsv(ORDER_HEADER, [])).size).toBe(0)
  })
})

describe('parseRefundsCsv', () => {
  it('sums refunds per order id', () => {
    const csv = toCsv(REFUND_HEADER, [
      ['A', '2024-03-05', '10.00'],
      ['B', '2024-03-06', '4.00'],
      ['A', '2024-03-07', '2.50'],
    ])

    const refunds = parseRefundsCsv(csv)

    expect(refunds.get('A')).toBe(12.5)
    expect(refunds.get('B')).toBe(4)
  })

  it('skips rows with an unparseable amount', () => {
    const csv = toCsv(REFUND_HEADER, [
      ['A', '2024-03-05', ''],
      ['B', '2024-03-06', 'pending'],
      ['C', '2024-03-06', '1,000.00'],
    ])

    const refunds = parseRefundsCsv(csv)

    expect([...refunds.entries()]).toEqual([['C', 1000]])
  })

  it('keeps refunds for ids it has never seen as orders', () => {
    const csv = toCsv(REFUND_HEADER, [['UNKNOWN', '2024-03-05', '3.00']])

    expect(parseRefundsCsv(csv).get('UNKNOWN')).toBe(3)
  })

  it('throws MissingColumnError when AmountRefunded is absent', () => {
    const csv = toCsv(['OrderID', 'Refund'], [['A', '1']])

    expect(() => parseRefundsCsv(csv)).toThrow(MissingColumnError)
  })
})

describe('loadOrders', () => {
  beforeEach(() => {
    mockReadFile.mockReset()
  })

  it('reads the file as UTF-8 and builds the order book', async () => {
    mockReadFile.mockResolvedValue(
      toCsv(ORDER_HEADER, [['Amazon.com', 'A', '2024-03-01T10:00:00Z', '100.00']])
    )

    const orders = await loadOrders('orders.csv')

    expect(mockReadFile).toHaveBeenCalledWith('orders.csv', 'utf-8')
    expect(orders.get('A')?.subtotal).toBe(100)
  })

  it('propagates a missing file', async () => {
    mockReadFile.mockRejectedValue(new Error('ENOENT: no such file or directory'))

    await expect(loadOrders('missing.csv')).rejects.toThrow('ENOENT')
  })

  it('propagates a malformed date', async () => {
    mockReadFile.mockResolvedValue(toCsv(ORDER_HEADER, [['Amazon.com', 'A', '01/03/2024', '1']]))

    await expect(loadOrders('orders.csv')).rejects.toThrow(InvalidOrderDateError)
  })
})

describe('loadRefunds', () => {
  beforeEach(() => {
    mockReadFile.mockReset()
  })

  it('returns summed refunds on success', async () => {
    mockReadFile.mockResolvedValue(
      toCsv(REFUND_HEADER, [
        ['A', '2024-03-05', '5.00'],
        ['A', '2024-03-06', '5.00'],
      ])
    )

    const result = await loadRefunds('refunds.csv')

    expect(result.success).toBe(true)
    if (result.success) {
      expect(result.data.get('A')).toBe(10)
    }
  })

  it('returns a failure result when the file cannot be read', async () => {
    mockReadFile.mockRejectedValue(new Error('ENOENT: no such file or directory'))

    const result = await loadRefunds('missing.csv')

    expect(result).toEqual({ success: false, error: 'ENOENT: no such file or directory' })
  })

  it('returns a failure result when a column is missing', async () => {
    mockReadFile.mockResolvedValue(toCsv(['Order ID', 'Amount'], [['A', '1']]))

    const result = await loadRefunds('refunds.csv')

    expect(result).toEqual({
      success: false,
      error: 'Missing required column "OrderID" in refunds.csv',
    })
  })
})
