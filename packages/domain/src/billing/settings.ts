// ---------------------------------------------------------------------------
// Tenant billing settings
// ---------------------------------------------------------------------------

import { DEFAULT_EXCHANGE_RATES, validateExchangeRateTable } from './currency'
import type { ExchangeRateTable } from './currency'
import type { OverpaymentPolicy } from './reconciliation'

export interface BillingSettings {
  readonly exchangeRates: ExchangeRateTable
  /** Rate per chargeable kg for lines that arrive without one. */
  readonly defaultRate: number
  readonly overpaymentPolicy: OverpaymentPolicy
}

export const DEFAULT_BILLING_SETTINGS: BillingSettings = {
  exchangeRates: DEFAULT_EXCHANGE_RATES,
  defaultRate: 36,
  overpaymentPolicy: 'ALLOW_CREDIT',
}

/**
 * Validates a settings update against the current settings.
 * An empty array means the update may be saved.
 *
 * @rule The canonical currency is fixed: stored amounts are never rebased.
 */
export function validateBillingSettings(next: BillingSettings, current: BillingSettings): readonly string[] {
  const errors = [...validateExchangeRateTable(next.exchangeRates)]
  if (next.exchangeRates.canonical !== current.exchangeRates.canonical) {
    errors.push(`canonical currency is fixed at ${current.exchangeRates.canonical}`)
  }
  if (!Number.isFinite(next.defaultRate) || next.defaultRate < 0) {
    errors.push('defaultRate must be a non-negative number')
  }
  return errors
}
