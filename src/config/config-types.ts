import { z } from 'zod'

export const DEFAULT_ORDERS_FILE = 'Retail.OrderHistory.1.csv'

export const appConfigSchema = z.object({
  files: z.object({
    ordersPath: z.string().min(1).default(DEFAULT_ORDERS_FILE),
    refundsPath: z.string().min(1).optional(),
  }),
  display: z.object({
    currency: z
      .string()
      .regex(/^[A-Za-z]{3}$/, 'Currency must be a three-letter ISO code')
      .toUpperCase()
      .default('USD'),
    chartWidth: z.number().int().min(10).max(120).default(40),
  }),
})

export type AppConfig = z.infer<typeof appConfigSchema>

export const CURRENCIES = [
  { value: 'USD', label: 'US Dollar ($)' },
  { value: 'EUR', label: 'Euro (€)' },
  { value: 'GBP', label: 'British Pound (£)' },
  { value: 'CAD', label: 'Canadian Dollar (CA$)' },
  { value: 'JPY', label: 'Japanese Yen (¥)' },
] as const
