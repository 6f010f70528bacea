import { z } from 'zod'
import { DEFAULT_BILLING_SETTINGS, OVERPAYMENT_POLICIES } from '@waybill/domain'
import type { BillingSettings, OverpaymentPolicy } from '@waybill/domain'
import type { Db } from '../db'

// ---------------------------------------------------------------------------
// Billing settings
//
// Stored as one JSON document under the `billing` key. A missing row means
// the tenant never changed anything and the defaults apply.
// ---------------------------------------------------------------------------

const BILLING_KEY = 'billing'

const StoredBillingSettings = z.object({
  exchangeRates: z.object({
    canonical: z.string(),
    currencies: z.array(
      z.object({
        code: z.string(),
        name: z.string(),
        symbol: z.string(),
        rate: z.number(),
      }),
    ),
  }),
  defaultRate: z.number(),
  overpaymentPolicy: z.string().refine(isOverpaymentPolicy),
})

function isOverpaymentPolicy(value: string): value is OverpaymentPolicy {
  return OVERPAYMENT_POLICIES.some((p) => p === value)
}

export async function getBillingSettings(db: Db): Promise<BillingSettings> {
  const row = db
    .prepare<{ key: string }, { value: string }>('SELECT value FROM settings WHERE key = @key')
    .get({ key: BILLING_KEY })
  if (!row) return DEFAULT_BILLING_SETTINGS

  const parsed = StoredBillingSettings.safeParse(JSON.parse(row.value))
  if (!parsed.success) {
    throw new Error(`Stored billing settings are unreadable: ${parsed.error.message}`)
  }
  return parsed.data
}

export async function saveBillingSettings(db: Db, settings: BillingSettings): Promise<BillingSettings> {
  db.prepare<{ key: string; value: string; updatedAt: string }>(
    `INSERT INTO settings (key, value, updated_at) VALUES (@key, @value, @updatedAt)
     ON CONFLICT (key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at`,
  ).run({ key: BILLING_KEY, value: JSON.stringify(settings), updatedAt: new Date().toISOString() })
  return settings
}
