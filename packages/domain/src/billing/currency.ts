// ---------------------------------------------------------------------------
// Currency projection
//
// Amounts are stored in one canonical currency. Display currencies are derived
// through an exchange-rate table that tenant owners edit at any time, so every
// conversion takes the table snapshot as an explicit argument instead of
// reading a module-level cache.
// ---------------------------------------------------------------------------

import { NotFoundError, ValidationError } from '../shared/errors'
import type { Money } from '../shared/types'

export interface CurrencyRate {
  /** ISO 4217 code, e.g. "KES". */
  readonly code: string
  readonly name: string
  readonly symbol: string
  /** Units of this currency per one unit of the canonical currency. */
  readonly rate: number
}

/**
 * @invariant The canonical currency is listed with rate 1.
 * @invariant Codes are unique and every rate is > 0.
 */
export interface ExchangeRateTable {
  readonly canonical: string
  readonly currencies: readonly CurrencyRate[]
}

export const DEFAULT_EXCHANGE_RATES: ExchangeRateTable = {
  canonical: 'ZAR',
  currencies: [
    { code: 'ZAR', name: 'South African Rand', symbol: 'R', rate: 1 },
    { code: 'KES', name: 'Kenyan Shilling', symbol: 'KES', rate: 6.67 },
  ],
}

/**
 * Returns a list of human-readable problems with the table.
 * An empty array means the table is valid.
 */
export function validateExchangeRateTable(table: ExchangeRateTable): readonly string[] {
  const errors: string[] = []
  const seen = new Set<string>()
  for (const c of table.currencies) {
    if (seen.has(c.code)) errors.push(`duplicate currency ${c.code}`)
    seen.add(c.code)
    if (!Number.isFinite(c.rate) || c.rate <= 0) errors.push(`rate for ${c.code} must be positive`)
  }
  const canonical = table.currencies.find((c) => c.code === table.canonical)
  if (!canonical) {
    errors.push(`canonical currency ${table.canonical} is not listed`)
  } else if (canonical.rate !== 1) {
    errors.push(`canonical currency ${table.canonical} must have rate 1`)
  }
  return errors
}

function lookupRate(code: string, table: ExchangeRateTable): number {
  const entry = table.currencies.find((c) => c.code === code)
  if (!entry) throw new NotFoundError(`Unknown currency ${code}`)
  if (!Number.isFinite(entry.rate) || entry.rate <= 0) {
    throw new ValidationError(`Exchange rate for ${code} must be positive, got ${entry.rate}`)
  }
  return entry.rate
}

/** Projects a canonical amount into `target`. The canonical currency maps to itself. */
export function toDisplay(canonicalAmount: number, target: string, table: ExchangeRateTable): Money {
  if (target === table.canonical) return { amount: canonicalAmount, currency: target }
  return { amount: canonicalAmount * lookupRate(target, table), currency: target }
}

/** Inverse of `toDisplay`: converts an amount in `source` back to canonical. */
export function toCanonical(amount: number, source: string, table: ExchangeRateTable): Money {
  if (source === table.canonical) return { amount, currency: table.canonical }
  return { amount: amount / lookupRate(source, table), currency: table.canonical }
}
