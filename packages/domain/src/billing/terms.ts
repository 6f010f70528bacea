// ---------------------------------------------------------------------------
// Payment terms and invoice numbering
// ---------------------------------------------------------------------------

import { ValidationError } from '../shared/errors'

export const DEFAULT_PAYMENT_TERMS_DAYS = 30

const DAY_MS = 86_400_000

/** Due date = issue date + the client's payment terms in days. */
export function calculateDueDate(issueDate: Date, termsDays: number = DEFAULT_PAYMENT_TERMS_DAYS): Date {
  if (!Number.isInteger(termsDays) || termsDays < 0) {
    throw new ValidationError(`payment terms must be a non-negative number of days, got ${termsDays}`)
  }
  return new Date(issueDate.getTime() + termsDays * DAY_MS)
}

const INVOICE_NUMBER = /^INV-(\d{4})-(\d+)$/

/** `formatInvoiceNumber(2026, 7)` → `"INV-2026-007"`. */
export function formatInvoiceNumber(year: number, sequence: number): string {
  return `INV-${year}-${String(sequence).padStart(3, '0')}`
}

/**
 * The number following `last` within `year`. Numbering restarts at 001 each
 * year; a `last` from another year (or none) starts a new sequence.
 */
export function nextInvoiceNumber(year: number, last: string | null): string {
  const match = last ? INVOICE_NUMBER.exec(last) : null
  if (!match || Number(match[1]) !== year) return formatInvoiceNumber(year, 1)
  return formatInvoiceNumber(year, Number(match[2]) + 1)
}
