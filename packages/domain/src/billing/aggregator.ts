// ---------------------------------------------------------------------------
// Invoice aggregator
//
// The server-side recomputation is the only authoritative source of invoice
// totals. Editors compute totals locally for responsiveness and submit what
// they showed; a save whose submitted total drifts from the recomputation by
// more than MONEY_TOLERANCE is rejected outright.
// ---------------------------------------------------------------------------

import { StateError, TotalMismatchError, ValidationError } from '../shared/errors'
import { amountsMatch, assertNonNegative, toClientId, toTripId } from '../shared/types'
import { createLineItem } from './valuation'
import { isUnsent, reconcileInvoice } from './reconciliation'
import { toAdjustmentId } from './types'
import type {
  Adjustment,
  AdjustmentInput,
  Invoice,
  InvoiceId,
  LineItem,
  LineItemInput,
  PaymentTerms,
} from './types'

export interface InvoiceTotals {
  readonly subtotal: number
  readonly adjustmentTotal: number
  readonly total: number
}

/** +amount for a surcharge, -amount for a discount. */
export function signedAdjustmentAmount(adjustment: Pick<Adjustment, 'amount' | 'isAddition'>): number {
  return adjustment.isAddition ? adjustment.amount : -adjustment.amount
}

export function calculateInvoiceTotals(
  lineItems: readonly Pick<LineItem, 'amount'>[],
  adjustments: readonly Pick<Adjustment, 'amount' | 'isAddition'>[],
): InvoiceTotals {
  const subtotal = lineItems.reduce((sum, item) => sum + item.amount, 0)
  const adjustmentTotal = adjustments.reduce((sum, adj) => sum + signedAdjustmentAmount(adj), 0)
  return { subtotal, adjustmentTotal, total: subtotal + adjustmentTotal }
}

/**
 * Hard gate between the editor's total and the recomputed one.
 * A missing submitted total skips the comparison.
 *
 * @throws {TotalMismatchError} when the two differ by more than 0.01.
 */
export function assertTotalWithinTolerance(calculated: number, submitted: number | undefined): void {
  if (submitted === undefined) return
  if (!amountsMatch(calculated, submitted)) {
    throw new TotalMismatchError(calculated, submitted)
  }
}

export function createAdjustment(input: AdjustmentInput, newId: () => string): Adjustment {
  assertNonNegative('adjustment amount', input.amount)
  return {
    id: toAdjustmentId(input.id ?? newId()),
    description: input.description,
    amount: input.amount,
    isAddition: input.isAddition,
  }
}

// ---------------------------------------------------------------------------
// Save step
// ---------------------------------------------------------------------------

/** The editable part of an invoice as submitted by an editor. */
export interface InvoiceDraft {
  readonly clientId: string
  readonly tripId?: string
  readonly displayCurrency?: string
  readonly issueDate: Date
  readonly dueDate: Date
  readonly paymentTerms: PaymentTerms
  readonly paymentTermsCustom?: string
  readonly lineItems: readonly LineItemInput[]
  readonly adjustments: readonly AdjustmentInput[]
  /** The total the editor displayed; compared against the recomputation. */
  readonly total?: number
}

export interface ComposeContext {
  /** The invoice being replaced, or undefined when creating a new one. */
  readonly existing?: Invoice
  readonly id: InvoiceId
  readonly invoiceNumber: string
  /** Canonical storage currency. */
  readonly currency: string
  /** Rate applied to lines that arrive without one. */
  readonly defaultRate: number
  readonly now: Date
  readonly newId: () => string
}

function assertUniqueIds(kind: string, items: readonly { readonly id: string }[]): void {
  const seen = new Set<string>()
  for (const { id } of items) {
    if (seen.has(id)) throw new ValidationError(`Duplicate ${kind} id ${id}`)
    seen.add(id)
  }
}

function sameLines(existing: readonly LineItem[], next: readonly LineItem[]): boolean {
  if (existing.length !== next.length) return false
  return existing.every((item, i) => {
    const other = next[i]
    return (
      other !== undefined &&
      item.description === other.description &&
      item.quantity === other.quantity &&
      item.weight === other.weight &&
      item.length === other.length &&
      item.width === other.width &&
      item.height === other.height &&
      item.rate === other.rate &&
      amountsMatch(item.amount, other.amount)
    )
  })
}

function sameAdjustments(existing: readonly Adjustment[], next: readonly Adjustment[]): boolean {
  if (existing.length !== next.length) return false
  return existing.every((adj, i) => {
    const other = next[i]
    return (
      other !== undefined &&
      adj.description === other.description &&
      adj.amount === other.amount &&
      adj.isAddition === other.isAddition
    )
  })
}

/**
 * Produces the complete next state of an invoice from an editor's draft.
 *
 * Every line is validated and valued server-side, totals are recomputed, the
 * submitted total is checked against them, and a PAID invoice refuses any
 * change to its lines or adjustments. Nothing is returned (and so nothing can
 * be persisted) when any check fails.
 *
 * @throws {ValidationError} missing client, no line items, bad numeric input,
 *         or a line item or adjustment id used twice.
 * @throws {TotalMismatchError} submitted total outside tolerance.
 * @throws {StateError} lines or adjustments changed on a PAID invoice.
 */
export function composeInvoice(draft: InvoiceDraft, ctx: ComposeContext): Invoice {
  if (draft.clientId.trim() === '') {
    throw new ValidationError('clientId is required')
  }
  if (draft.lineItems.length === 0) {
    throw new ValidationError('An invoice needs at least one line item')
  }
  if (draft.dueDate < draft.issueDate) {
    throw new ValidationError('dueDate cannot be before issueDate')
  }

  const lineItems = draft.lineItems.map((input) => createLineItem(input, ctx.defaultRate, ctx.newId))
  const adjustments = draft.adjustments.map((input) => createAdjustment(input, ctx.newId))
  assertUniqueIds('line item', lineItems)
  assertUniqueIds('adjustment', adjustments)
  const totals = calculateInvoiceTotals(lineItems, adjustments)

  assertTotalWithinTolerance(totals.total, draft.total)

  const existing = ctx.existing
  if (existing?.status === 'PAID') {
    if (!sameLines(existing.lineItems, lineItems) || !sameAdjustments(existing.adjustments, adjustments)) {
      throw new StateError(`Invoice ${existing.invoiceNumber} is paid; its line items and adjustments are locked`)
    }
  }

  const next: Invoice = {
    id: ctx.id,
    invoiceNumber: ctx.invoiceNumber,
    clientId: toClientId(draft.clientId),
    currency: ctx.currency,
    issueDate: draft.issueDate,
    dueDate: draft.dueDate,
    paymentTerms: draft.paymentTerms,
    status: existing?.status ?? 'DRAFT',
    lineItems,
    adjustments,
    ...totals,
    paidAmount: existing?.paidAmount ?? 0,
    payments: existing?.payments ?? [],
    version: existing?.version ?? 0,
    createdAt: existing?.createdAt ?? ctx.now,
    updatedAt: ctx.now,
    ...(draft.tripId !== undefined ? { tripId: toTripId(draft.tripId) } : {}),
    ...(draft.displayCurrency !== undefined ? { displayCurrency: draft.displayCurrency } : {}),
    ...(draft.paymentTermsCustom !== undefined ? { paymentTermsCustom: draft.paymentTermsCustom } : {}),
    ...(existing?.sentAt !== undefined ? { sentAt: existing.sentAt } : {}),
    ...(existing?.paidAt !== undefined ? { paidAt: existing.paidAt } : {}),
  }

  // Totals may have moved under existing payments.
  return reconcileInvoice(next, ctx.now)
}

/**
 * Issues an unsent invoice to the client. A draft that went overdue before
 * it was sent can still be issued, and stays OVERDUE.
 *
 * @throws {StateError} when the invoice was already issued or paid.
 */
export function finalizeInvoice(invoice: Invoice, now: Date): Invoice {
  if (!isUnsent(invoice)) {
    throw new StateError(`Only unsent invoices can be finalized; ${invoice.invoiceNumber} is ${invoice.status}`)
  }
  return reconcileInvoice({ ...invoice, status: 'SENT', sentAt: now, updatedAt: now }, now)
}
