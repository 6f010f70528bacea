// ---------------------------------------------------------------------------
// Settings handler — exchange-rate table, default rate, overpayment policy
// ---------------------------------------------------------------------------

import { Hono } from 'hono'
import { validator } from 'hono/validator'
import { z } from 'zod'
import { toCanonical, toDisplay, validateBillingSettings } from '@waybill/domain'
import type { BillingSettings } from '@waybill/domain'
import type { AppEnv } from '../types'
import { getBillingSettings, saveBillingSettings } from '../repositories'

const CurrencyBody = z.object({
  code: z.string().length(3).toUpperCase(),
  name: z.string().min(1),
  symbol: z.string().min(1),
  rate: z.number(),
})

// Omitted fields keep their current value.
const UpdateBillingSettingsBody = z.object({
  exchangeRates: z
    .object({
      canonical: z.string().length(3).toUpperCase(),
      currencies: z.array(CurrencyBody).min(1),
    })
    .optional(),
  defaultRate: z.number().optional(),
  overpaymentPolicy: z.enum(['ALLOW_CREDIT', 'REJECT']).optional(),
})

export const settingsHandler = new Hono<AppEnv>()

settingsHandler.get('/billing', async (c) => {
  const db = c.get('db')
  return c.json({ data: await getBillingSettings(db) })
})

settingsHandler.put(
  '/billing',
  validator('json', (value, c) => {
    const r = UpdateBillingSettingsBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    const db = c.get('db')
    const body = c.req.valid('json')
    const current = await getBillingSettings(db)
    const next: BillingSettings = {
      exchangeRates: body.exchangeRates ?? current.exchangeRates,
      defaultRate: body.defaultRate ?? current.defaultRate,
      overpaymentPolicy: body.overpaymentPolicy ?? current.overpaymentPolicy,
    }

    const errors = validateBillingSettings(next, current)
    if (errors.length > 0) {
      return c.json({ error: errors.join('; '), code: 'VALIDATION_ERROR' }, 400)
    }
    return c.json({ data: await saveBillingSettings(db, next) })
  },
)

// ---------------------------------------------------------------------------
// GET /settings/currencies/convert?amount=&from=&to=
// `from` defaults to the canonical currency.
// ---------------------------------------------------------------------------
settingsHandler.get('/currencies/convert', async (c) => {
  const db = c.get('db')
  const amount = Number(c.req.query('amount'))
  const to = c.req.query('to')
  if (!Number.isFinite(amount) || to === undefined) {
    return c.json({ error: 'amount and to are required', code: 'VALIDATION_ERROR' }, 400)
  }

  const { exchangeRates } = await getBillingSettings(db)
  const from = c.req.query('from') ?? exchangeRates.canonical
  const canonical = toCanonical(amount, from, exchangeRates)
  const converted = toDisplay(canonical.amount, to, exchangeRates)

  return c.json({ data: { from: { amount, currency: from }, canonical, to: converted } })
})
