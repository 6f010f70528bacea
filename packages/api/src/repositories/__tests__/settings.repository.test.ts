import { describe, it, expect, beforeEach } from 'vitest'
import { DEFAULT_BILLING_SETTINGS } from '@waybill/domain'
import type { BillingSettings } from '@waybill/domain'
import { openDatabase } from '../../db'
import type { Db } from '../../db'
import { getBillingSettings, saveBillingSettings } from '../settings.repository'

let db: Db

beforeEach(() => {
  db = openDatabase(':memory:')
})

describe('SettingsRepository', () => {
  it('returns the defaults when nothing was saved', async () => {
    expect(await getBillingSettings(db)).toEqual(DEFAULT_BILLING_SETTINGS)
  })

  it('reads back what was saved, replacing earlier values', async () => {
    const first: BillingSettings = { ...DEFAULT_BILLING_SETTINGS, defaultRate: 40 }
    const second: BillingSettings = {
      exchangeRates: {
        canonical: 'ZAR',
        currencies: [
          { code: 'ZAR', name: 'South African Rand', symbol: 'R', rate: 1 },
          { code: 'USD', name: 'US Dollar', symbol: '$', rate: 0.055 },
        ],
      },
      defaultRate: 42,
      overpaymentPolicy: 'REJECT',
    }

    await saveBillingSettings(db, first)
    await saveBillingSettings(db, second)
    expect(await getBillingSettings(db)).toEqual(second)
  })

  it('refuses a stored document it cannot read', async () => {
    db.prepare("INSERT INTO settings (key, value, updated_at) VALUES ('billing', '{\"defaultRate\":\"x\"}', '2026-01-01')").run()
    await expect(getBillingSettings(db)).rejects.toThrow('Stored billing settings are unreadable')
  })
})
