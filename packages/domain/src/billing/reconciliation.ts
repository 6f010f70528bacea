// ---------------------------------------------------------------------------
// Payment reconciliation
//
// Status is derived from the accumulated payments against the computed total
// after every payment and again on every read:
//
//   paid > 0 and paid ≥ total   → PAID (terminal; lines locked)
//   0 < paid < total            → PARTIAL
//   paid = 0, past due          → OVERDUE (drafts included)
//   paid = 0 otherwise          → DRAFT while unsent, SENT once issued
// ---------------------------------------------------------------------------

import { ValidationError } from '../shared/errors'
import { formatAmount, MONEY_TOLERANCE } from '../shared/types'
import { toPaymentId } from './types'
import type { Invoice, InvoiceStatus, Payment, PaymentMethod } from './types'

// Float noise only; a payment one cent short is still short.
const EPSILON = 1e-9

/**
 * What to do with a payment that takes the paid amount past the total.
 *
 * ALLOW_CREDIT accepts it and reports the excess as client credit.
 * REJECT refuses it with a ValidationError.
 */
export type OverpaymentPolicy = 'ALLOW_CREDIT' | 'REJECT'

export const OVERPAYMENT_POLICIES: readonly OverpaymentPolicy[] = ['ALLOW_CREDIT', 'REJECT'] as const

/** True for an invoice that was never issued, including a draft gone overdue. */
export function isUnsent(invoice: Pick<Invoice, 'status' | 'sentAt'>): boolean {
  return invoice.status === 'DRAFT' || (invoice.status === 'OVERDUE' && invoice.sentAt === undefined)
}

export function deriveInvoiceStatus(invoice: Invoice, now: Date): InvoiceStatus {
  const { paidAmount, total } = invoice
  if (paidAmount > 0 && paidAmount >= total - EPSILON) return 'PAID'
  if (paidAmount > 0) return 'PARTIAL'
  if (now > invoice.dueDate) return 'OVERDUE'
  return isUnsent(invoice) ? 'DRAFT' : 'SENT'
}

/**
 * Re-evaluates the invoice status at `now`, stamping `paidAt` the first time
 * the invoice becomes PAID. Returns the same object when nothing changed.
 */
export function reconcileInvoice(invoice: Invoice, now: Date): Invoice {
  const status = deriveInvoiceStatus(invoice, now)
  if (status === invoice.status) return invoice
  return {
    ...invoice,
    status,
    ...(status === 'PAID' && invoice.paidAt === undefined ? { paidAt: now } : {}),
  }
}

/** Remaining unpaid balance, never below zero. */
export function calculateOutstanding(invoice: Pick<Invoice, 'total' | 'paidAmount'>): number {
  return Math.max(invoice.total - invoice.paidAmount, 0)
}

/** Amount paid beyond the total, held as client credit. */
export function calculateCredit(invoice: Pick<Invoice, 'total' | 'paidAmount'>): number {
  return Math.max(invoice.paidAmount - invoice.total, 0)
}

export function sumPayments(payments: readonly Pick<Payment, 'amount'>[]): number {
  return payments.reduce((sum, p) => sum + p.amount, 0)
}

export interface RecordPaymentInput {
  readonly amount: number
  readonly method: PaymentMethod
  readonly paidAt?: Date
  readonly reference?: string
  readonly notes?: string
}

export interface RecordPaymentOptions {
  readonly now: Date
  readonly overpaymentPolicy: OverpaymentPolicy
  readonly newId: () => string
}

export interface PaymentResult {
  readonly invoice: Invoice
  readonly payment: Payment
}

/**
 * Appends a payment and re-derives the invoice status.
 *
 * Identical payments are not deduplicated: recording the same payment twice
 * counts it twice.
 *
 * @throws {ValidationError} when `amount` is not positive, or when it would
 *         overpay the invoice under the REJECT policy.
 */
export function recordPayment(
  invoice: Invoice,
  input: RecordPaymentInput,
  options: RecordPaymentOptions,
): PaymentResult {
  if (!Number.isFinite(input.amount) || input.amount <= 0) {
    throw new ValidationError(`Payment amount must be positive, got ${input.amount}`)
  }

  const outstanding = calculateOutstanding(invoice)
  if (options.overpaymentPolicy === 'REJECT' && input.amount > outstanding + MONEY_TOLERANCE) {
    throw new ValidationError(
      `Payment of ${formatAmount(input.amount)} exceeds the outstanding balance of ${formatAmount(outstanding)}`,
    )
  }

  const payment: Payment = {
    id: toPaymentId(options.newId()),
    invoiceId: invoice.id,
    amount: input.amount,
    method: input.method,
    paidAt: input.paidAt ?? options.now,
    createdAt: options.now,
    ...(input.reference !== undefined ? { reference: input.reference } : {}),
    ...(input.notes !== undefined ? { notes: input.notes } : {}),
  }

  const next = reconcileInvoice(
    {
      ...invoice,
      payments: [...invoice.payments, payment],
      paidAmount: invoice.paidAmount + input.amount,
      updatedAt: options.now,
    },
    options.now,
  )

  return { invoice: next, payment }
}
