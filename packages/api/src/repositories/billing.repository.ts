import type {
  Adjustment,
  Invoice,
  InvoiceStatus,
  LineItem,
  Payment,
  PaymentMethod,
  PaymentTerms,
} from '@waybill/domain'
import {
  ConflictError,
  INVOICE_STATUSES,
  PAYMENT_METHODS,
  PAYMENT_TERMS,
  nextInvoiceNumber,
  normalizeLineItem,
  sumPayments,
  toAdjustmentId,
  toClientId,
  toInvoiceId,
  toPaymentId,
  toTripId,
} from '@waybill/domain'
import type { Db } from '../db'

// ---------------------------------------------------------------------------
// Row shapes
// ---------------------------------------------------------------------------

type InvoiceRow = {
  id: string
  invoice_number: string
  client_id: string
  trip_id: string | null
  currency: string
  display_currency: string | null
  issue_date: string
  due_date: string
  payment_terms: string
  payment_terms_custom: string | null
  status: string
  subtotal: number
  adjustment_total: number
  total: number
  version: number
  sent_at: string | null
  paid_at: string | null
  created_at: string
  updated_at: string
}

type LineItemRow = {
  invoice_id: string
  id: string
  position: number
  description: string
  quantity: number | null
  weight: number | null
  length: number | null
  width: number | null
  height: number | null
  rate: number
  amount: number
  shipment_id: string | null
}

type AdjustmentRow = {
  invoice_id: string
  id: string
  position: number
  description: string
  amount: number
  is_addition: number
}

type PaymentRow = {
  id: string
  invoice_id: string
  amount: number
  method: string
  paid_at: string
  reference: string | null
  notes: string | null
  created_at: string
}

// ---------------------------------------------------------------------------
// Mappers
// ---------------------------------------------------------------------------

function parseEnum<T extends string>(values: readonly T[], raw: string, field: string): T {
  const value = values.find((v) => v === raw)
  if (value === undefined) throw new Error(`Unexpected ${field} in storage: ${raw}`)
  return value
}

function mapLineItem(row: LineItemRow): LineItem {
  // Older rows carrying a weight in `quantity` are resolved here, once.
  return normalizeLineItem({
    id: row.id,
    description: row.description,
    quantity: row.quantity,
    weight: row.weight,
    rate: row.rate,
    amount: row.amount,
    ...(row.length != null ? { length: row.length } : {}),
    ...(row.width != null ? { width: row.width } : {}),
    ...(row.height != null ? { height: row.height } : {}),
    ...(row.shipment_id != null ? { shipmentId: row.shipment_id } : {}),
  })
}

function mapAdjustment(row: AdjustmentRow): Adjustment {
  return {
    id: toAdjustmentId(row.id),
    description: row.description,
    amount: row.amount,
    isAddition: row.is_addition === 1,
  }
}

function mapPayment(row: PaymentRow): Payment {
  return {
    id: toPaymentId(row.id),
    invoiceId: toInvoiceId(row.invoice_id),
    amount: row.amount,
    method: parseEnum<PaymentMethod>(PAYMENT_METHODS, row.method, 'payment method'),
    paidAt: new Date(row.paid_at),
    createdAt: new Date(row.created_at),
    ...(row.reference != null ? { reference: row.reference } : {}),
    ...(row.notes != null ? { notes: row.notes } : {}),
  }
}

function mapInvoice(
  row: InvoiceRow,
  lineItems: readonly LineItem[],
  adjustments: readonly Adjustment[],
  payments: readonly Payment[],
): Invoice {
  return {
    id: toInvoiceId(row.id),
    invoiceNumber: row.invoice_number,
    clientId: toClientId(row.client_id),
    currency: row.currency,
    issueDate: new Date(row.issue_date),
    dueDate: new Date(row.due_date),
    paymentTerms: parseEnum<PaymentTerms>(PAYMENT_TERMS, row.payment_terms, 'payment terms'),
    status: parseEnum<InvoiceStatus>(INVOICE_STATUSES, row.status, 'invoice status'),
    lineItems,
    adjustments,
    subtotal: row.subtotal,
    adjustmentTotal: row.adjustment_total,
    total: row.total,
    paidAmount: sumPayments(payments),
    payments,
    version: row.version,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
    ...(row.trip_id != null ? { tripId: toTripId(row.trip_id) } : {}),
    ...(row.display_currency != null ? { displayCurrency: row.display_currency } : {}),
    ...(row.payment_terms_custom != null ? { paymentTermsCustom: row.payment_terms_custom } : {}),
    ...(row.sent_at != null ? { sentAt: new Date(row.sent_at) } : {}),
    ...(row.paid_at != null ? { paidAt: new Date(row.paid_at) } : {}),
  }
}

function loadInvoice(db: Db, row: InvoiceRow): Invoice {
  const params = { invoiceId: row.id }
  const lines = db
    .prepare<typeof params, LineItemRow>(
      'SELECT * FROM invoice_line_items WHERE invoice_id = @invoiceId ORDER BY position ASC',
    )
    .all(params)
  const adjustments = db
    .prepare<typeof params, AdjustmentRow>(
      'SELECT * FROM invoice_adjustments WHERE invoice_id = @invoiceId ORDER BY position ASC',
    )
    .all(params)
  const payments = db
    .prepare<typeof params, PaymentRow>(
      'SELECT * FROM payments WHERE invoice_id = @invoiceId ORDER BY paid_at ASC, created_at ASC',
    )
    .all(params)
  return mapInvoice(row, lines.map(mapLineItem), adjustments.map(mapAdjustment), payments.map(mapPayment))
}

// ---------------------------------------------------------------------------
// Writers
// ---------------------------------------------------------------------------

function toInvoiceRow(invoice: Invoice, version: number): InvoiceRow {
  return {
    id: invoice.id,
    invoice_number: invoice.invoiceNumber,
    client_id: invoice.clientId,
    trip_id: invoice.tripId ?? null,
    currency: invoice.currency,
    display_currency: invoice.displayCurrency ?? null,
    issue_date: invoice.issueDate.toISOString(),
    due_date: invoice.dueDate.toISOString(),
    payment_terms: invoice.paymentTerms,
    payment_terms_custom: invoice.paymentTermsCustom ?? null,
    status: invoice.status,
    subtotal: invoice.subtotal,
    adjustment_total: invoice.adjustmentTotal,
    total: invoice.total,
    version,
    sent_at: invoice.sentAt?.toISOString() ?? null,
    paid_at: invoice.paidAt?.toISOString() ?? null,
    created_at: invoice.createdAt.toISOString(),
    updated_at: invoice.updatedAt.toISOString(),
  }
}

function replaceChildren(db: Db, invoice: Invoice): void {
  const params = { invoiceId: invoice.id }
  db.prepare<typeof params>('DELETE FROM invoice_line_items WHERE invoice_id = @invoiceId').run(params)
  db.prepare<typeof params>('DELETE FROM invoice_adjustments WHERE invoice_id = @invoiceId').run(params)

  const insertLine = db.prepare<LineItemRow>(
    `INSERT INTO invoice_line_items
       (invoice_id, id, position, description, quantity, weight, length, width, height, rate, amount, shipment_id)
     VALUES
       (@invoice_id, @id, @position, @description, @quantity, @weight, @length, @width, @height, @rate, @amount, @shipment_id)`,
  )
  invoice.lineItems.forEach((item, position) => {
    insertLine.run({
      invoice_id: invoice.id,
      id: item.id,
      position,
      description: item.description,
      quantity: item.quantity,
      weight: item.weight ?? null,
      length: item.length ?? null,
      width: item.width ?? null,
      height: item.height ?? null,
      rate: item.rate,
      amount: item.amount,
      shipment_id: item.shipmentId ?? null,
    })
  })

  const insertAdjustment = db.prepare<AdjustmentRow>(
    `INSERT INTO invoice_adjustments (invoice_id, id, position, description, amount, is_addition)
     VALUES (@invoice_id, @id, @position, @description, @amount, @is_addition)`,
  )
  invoice.adjustments.forEach((adj, position) => {
    insertAdjustment.run({
      invoice_id: invoice.id,
      id: adj.id,
      position,
      description: adj.description,
      amount: adj.amount,
      is_addition: adj.isAddition ? 1 : 0,
    })
  })
}

/**
 * Bumps the version of an invoice row, writing the given header fields, only
 * when the stored version still equals `expectedVersion`.
 *
 * @throws {ConflictError} when another writer got there first.
 */
function updateHeader(db: Db, invoice: Invoice, expectedVersion: number): number {
  const next = expectedVersion + 1
  const result = db
    .prepare<InvoiceRow & { expected_version: number }>(
      `UPDATE invoices SET
         invoice_number = @invoice_number,
         client_id = @client_id,
         trip_id = @trip_id,
         currency = @currency,
         display_currency = @display_currency,
         issue_date = @issue_date,
         due_date = @due_date,
         payment_terms = @payment_terms,
         payment_terms_custom = @payment_terms_custom,
         status = @status,
         subtotal = @subtotal,
         adjustment_total = @adjustment_total,
         total = @total,
         version = @version,
         sent_at = @sent_at,
         paid_at = @paid_at,
         updated_at = @updated_at
       WHERE id = @id AND version = @expected_version`,
    )
    .run({ ...toInvoiceRow(invoice, next), expected_version: expectedVersion })
  if (result.changes === 0) {
    throw new ConflictError(
      `Invoice ${invoice.invoiceNumber} was modified by someone else; reload and try again`,
    )
  }
  return next
}

// ---------------------------------------------------------------------------
// Repository
// ---------------------------------------------------------------------------

export async function findInvoiceById(db: Db, id: string): Promise<Invoice | null> {
  const row = db.prepare<{ id: string }, InvoiceRow>('SELECT * FROM invoices WHERE id = @id').get({ id })
  return row ? loadInvoice(db, row) : null
}

export type ListInvoicesOptions = {
  /** Omit to return every matching invoice. */
  limit?: number
  offset?: number
  clientId?: string
  tripId?: string
}

export async function listInvoices(db: Db, opts: ListInvoicesOptions = {}): Promise<Invoice[]> {
  const rows = db
    .prepare<{ clientId: string | null; tripId: string | null; limit: number; offset: number }, InvoiceRow>(
      `SELECT * FROM invoices
       WHERE (@clientId IS NULL OR client_id = @clientId)
         AND (@tripId IS NULL OR trip_id = @tripId)
       ORDER BY issue_date DESC, invoice_number DESC
       LIMIT @limit OFFSET @offset`,
    )
    .all({
      clientId: opts.clientId ?? null,
      tripId: opts.tripId ?? null,
      limit: opts.limit ?? -1,
      offset: opts.offset ?? 0,
    })
  return rows.map((row) => loadInvoice(db, row))
}

/**
 * Highest invoice number issued in `year`, compared numerically so that
 * INV-2026-1000 sorts after INV-2026-999.
 */
function findLastInvoiceNumber(db: Db, year: number): string | null {
  const prefix = `INV-${year}-`
  const row = db
    .prepare<{ pattern: string; start: number }, { invoice_number: string }>(
      `SELECT invoice_number FROM invoices
       WHERE invoice_number LIKE @pattern
       ORDER BY CAST(substr(invoice_number, @start) AS INTEGER) DESC
       LIMIT 1`,
    )
    .get({ pattern: `${prefix}%`, start: prefix.length + 1 })
  return row?.invoice_number ?? null
}

function insertRows(db: Db, invoice: Invoice): void {
  db.prepare<InvoiceRow>(
    `INSERT INTO invoices
       (id, invoice_number, client_id, trip_id, currency, display_currency, issue_date, due_date,
        payment_terms, payment_terms_custom, status, subtotal, adjustment_total, total, version,
        sent_at, paid_at, created_at, updated_at)
     VALUES
       (@id, @invoice_number, @client_id, @trip_id, @currency, @display_currency, @issue_date, @due_date,
        @payment_terms, @payment_terms_custom, @status, @subtotal, @adjustment_total, @total, @version,
        @sent_at, @paid_at, @created_at, @updated_at)`,
  ).run(toInvoiceRow(invoice, 1))
  replaceChildren(db, invoice)
}

/** Persists a composed invoice, under the number it already carries, at version 1. */
export async function insertInvoice(db: Db, invoice: Invoice): Promise<Invoice> {
  db.transaction(() => insertRows(db, invoice))()
  return { ...invoice, version: 1 }
}

/**
 * Allocates the next `INV-<year>-NNN` number and persists the invoice that
 * `compose` builds under it, at version 1. The lookup and the insert share
 * one write-locked transaction, so concurrent creates never draw the same
 * number. Anything `compose` throws rolls the transaction back.
 */
export async function insertNumberedInvoice(
  db: Db,
  year: number,
  compose: (invoiceNumber: string) => Invoice,
): Promise<Invoice> {
  const insert = db.transaction((): Invoice => {
    const invoice = compose(nextInvoiceNumber(year, findLastInvoiceNumber(db, year)))
    insertRows(db, invoice)
    return invoice
  })
  return { ...insert.immediate(), version: 1 }
}

/**
 * Replaces the stored state of an invoice (header, line items, adjustments).
 * Payments are never touched here.
 *
 * @throws {ConflictError} when the stored version is not `expectedVersion`.
 */
export async function saveInvoice(db: Db, invoice: Invoice, expectedVersion: number): Promise<Invoice> {
  const save = db.transaction((): number => {
    const version = updateHeader(db, invoice, expectedVersion)
    replaceChildren(db, invoice)
    return version
  })
  return { ...invoice, version: save() }
}

/**
 * Appends `payment` and writes the invoice's re-derived status in one
 * transaction.
 *
 * @throws {ConflictError} when the stored version is not `expectedVersion`.
 */
export async function appendPayment(
  db: Db,
  invoice: Invoice,
  payment: Payment,
  expectedVersion: number,
): Promise<Invoice> {
  const append = db.transaction((): number => {
    const version = updateHeader(db, invoice, expectedVersion)
    db.prepare<PaymentRow>(
      `INSERT INTO payments (id, invoice_id, amount, method, paid_at, reference, notes, created_at)
       VALUES (@id, @invoice_id, @amount, @method, @paid_at, @reference, @notes, @created_at)`,
    ).run({
      id: payment.id,
      invoice_id: payment.invoiceId,
      amount: payment.amount,
      method: payment.method,
      paid_at: payment.paidAt.toISOString(),
      reference: payment.reference ?? null,
      notes: payment.notes ?? null,
      created_at: payment.createdAt.toISOString(),
    })
    return version
  })
  return { ...invoice, version: append() }
}

/** Removes an invoice with its line items and adjustments. */
export async function deleteInvoice(db: Db, id: string, expectedVersion: number): Promise<void> {
  const result = db
    .prepare<{ id: string; expectedVersion: number }>('DELETE FROM invoices WHERE id = @id AND version = @expectedVersion')
    .run({ id, expectedVersion })
  if (result.changes === 0) {
    throw new ConflictError(`Invoice ${id} was modified by someone else; reload and try again`)
  }
}

export async function listPayments(
  db: Db,
  opts: { invoiceId?: string; limit?: number; offset?: number } = {},
): Promise<Payment[]> {
  const rows = db
    .prepare<{ invoiceId: string | null; limit: number; offset: number }, PaymentRow>(
      `SELECT * FROM payments
       WHERE (@invoiceId IS NULL OR invoice_id = @invoiceId)
       ORDER BY paid_at DESC, created_at DESC
       LIMIT @limit OFFSET @offset`,
    )
    .all({ invoiceId: opts.invoiceId ?? null, limit: opts.limit ?? 50, offset: opts.offset ?? 0 })
  return rows.map(mapPayment)
}
