// ---------------------------------------------------------------------------
// Billing bounded context — types
// Handles invoices, line-item valuation, adjustments and payments.
// ---------------------------------------------------------------------------

import type { Brand, ClientId, TripId } from '../shared/types'

// ---------------------------------------------------------------------------
// Branded ID types
// ---------------------------------------------------------------------------

/** Uniquely identifies an Invoice aggregate. */
export type InvoiceId = Brand<string, 'InvoiceId'>

/** Uniquely identifies a line item within an Invoice. */
export type LineItemId = Brand<string, 'LineItemId'>

/** Uniquely identifies an adjustment within an Invoice. */
export type AdjustmentId = Brand<string, 'AdjustmentId'>

/** Uniquely identifies a Payment. */
export type PaymentId = Brand<string, 'PaymentId'>

export const toInvoiceId = (raw: string): InvoiceId => raw as InvoiceId
export const toLineItemId = (raw: string): LineItemId => raw as LineItemId
export const toAdjustmentId = (raw: string): AdjustmentId => raw as AdjustmentId
export const toPaymentId = (raw: string): PaymentId => raw as PaymentId

// ---------------------------------------------------------------------------
// Value objects
// ---------------------------------------------------------------------------

/**
 * Lifecycle status of an Invoice.
 *
 * PARTIAL is set when at least one payment exists but the balance > 0.
 * PAID is set when payments cover the total; line items are locked from then on.
 * OVERDUE is set when nothing has been paid and the due date has passed.
 */
export type InvoiceStatus = 'DRAFT' | 'SENT' | 'PARTIAL' | 'PAID' | 'OVERDUE'

export const INVOICE_STATUSES: readonly InvoiceStatus[] = [
  'DRAFT',
  'SENT',
  'PARTIAL',
  'PAID',
  'OVERDUE',
] as const

/** The method used to make a payment. */
export type PaymentMethod = 'CASH' | 'BANK_TRANSFER' | 'MOBILE_MONEY' | 'OTHER'

export const PAYMENT_METHODS: readonly PaymentMethod[] = [
  'CASH',
  'BANK_TRANSFER',
  'MOBILE_MONEY',
  'OTHER',
] as const

/** Commercial terms printed on the invoice. CUSTOM carries free text alongside. */
export type PaymentTerms = 'FULL_ON_RECEIPT' | 'FIFTY_FIFTY' | 'THIRTY_SEVENTY' | 'NET_30' | 'CUSTOM'

export const PAYMENT_TERMS: readonly PaymentTerms[] = [
  'FULL_ON_RECEIPT',
  'FIFTY_FIFTY',
  'THIRTY_SEVENTY',
  'NET_30',
  'CUSTOM',
] as const

/** Parcel dimensions in centimetres. Any of them may be unknown. */
export interface Dimensions {
  readonly length?: number
  readonly width?: number
  readonly height?: number
}

// ---------------------------------------------------------------------------
// Line items
// ---------------------------------------------------------------------------

interface LineItemBase extends Dimensions {
  readonly id: LineItemId
  readonly description: string
  /** Piece count. */
  readonly quantity: number
  /** Actual weight in kg. */
  readonly weight?: number
  /** Currency units per chargeable kg. */
  readonly rate: number
  /** Derived: shipping weight × rate. */
  readonly amount: number
  /** The parcel this line bills for, when it was generated from one. */
  readonly shipmentId?: string
}

/** A line item whose quantity and weight fields mean what they say. */
export interface StructuredLineItem extends LineItemBase {
  readonly kind: 'structured'
}

/**
 * A line item recovered from older data where the weight was stored in the
 * quantity field. After normalisation `weight` holds that value and `quantity`
 * is 1; the tag is kept so presentation can flag the row.
 */
export interface LegacyLineItem extends LineItemBase {
  readonly kind: 'legacy'
  readonly weight: number
}

export type LineItem = StructuredLineItem | LegacyLineItem

/**
 * A line item as submitted by an editor or read from storage, before
 * validation and valuation. `rate` falls back to the tenant default.
 */
export interface LineItemInput extends Dimensions {
  readonly id?: string
  readonly description: string
  readonly quantity?: number
  readonly weight?: number | null
  readonly rate?: number
  readonly shipmentId?: string
}

// ---------------------------------------------------------------------------
// Adjustments
// ---------------------------------------------------------------------------

/**
 * A discount (isAddition = false) or surcharge (isAddition = true) applied to
 * the invoice subtotal.
 *
 * @invariant `amount` must be ≥ 0; the sign comes from `isAddition`.
 */
export interface Adjustment {
  readonly id: AdjustmentId
  readonly description: string
  readonly amount: number
  readonly isAddition: boolean
}

export interface AdjustmentInput {
  readonly id?: string
  readonly description: string
  readonly amount: number
  readonly isAddition: boolean
}

// ---------------------------------------------------------------------------
// Aggregates
// ---------------------------------------------------------------------------

/**
 * A record of a single payment against an Invoice. Immutable once created.
 *
 * @invariant `amount` must be > 0.
 */
export interface Payment {
  readonly id: PaymentId
  readonly invoiceId: InvoiceId
  readonly amount: number
  readonly method: PaymentMethod
  readonly paidAt: Date
  readonly reference?: string
  readonly notes?: string
  readonly createdAt: Date
}

/**
 * The Invoice aggregate root.
 *
 * All monetary fields are in the canonical `currency`. `subtotal`,
 * `adjustmentTotal` and `total` are derived by the aggregator; `paidAmount` is
 * the sum of `payments`.
 *
 * @invariant `total` == `subtotal` + `adjustmentTotal`.
 * @invariant Once PAID, `lineItems` and `adjustments` are immutable.
 */
export interface Invoice {
  readonly id: InvoiceId
  readonly invoiceNumber: string
  readonly clientId: ClientId
  readonly tripId?: TripId
  readonly currency: string
  /** Currency the client prefers to see amounts in; projection only. */
  readonly displayCurrency?: string
  readonly issueDate: Date
  readonly dueDate: Date
  readonly paymentTerms: PaymentTerms
  readonly paymentTermsCustom?: string
  readonly status: InvoiceStatus
  readonly lineItems: readonly LineItem[]
  readonly adjustments: readonly Adjustment[]
  readonly subtotal: number
  readonly adjustmentTotal: number
  readonly total: number
  readonly paidAmount: number
  readonly payments: readonly Payment[]
  /** Incremented on every persisted change; used for lost-update detection. */
  readonly version: number
  readonly sentAt?: Date
  readonly paidAt?: Date
  readonly createdAt: Date
  readonly updatedAt: Date
}
