// ---------------------------------------------------------------------------
// Billing handler — compose, save, finalize and pay invoices
//
// Every write goes through the domain's authoritative save step; the client's
// own totals are only ever compared against the recomputation, never stored.
// ---------------------------------------------------------------------------

import { randomUUID } from 'node:crypto'
import { Hono } from 'hono'
import { validator } from 'hono/validator'
import { z } from 'zod'
import {
  StateError,
  ValidationError,
  calculateDueDate,
  composeInvoice,
  finalizeInvoice,
  isUnsent,
  reconcileInvoice,
  recordPayment,
  toCanonical,
  toInvoiceId,
} from '@waybill/domain'
import type { BillingSettings, Invoice, InvoiceDraft } from '@waybill/domain'
import type { AppEnv } from '../types'
import { presentInvoice } from '../lib/present'
import {
  appendPayment,
  deleteInvoice,
  findClientById,
  findInvoiceById,
  findTripById,
  getBillingSettings,
  insertNumberedInvoice,
  listInvoices,
  saveInvoice,
} from '../repositories'

// ---------------------------------------------------------------------------
// Request bodies
// ---------------------------------------------------------------------------

// Range checks on numbers are left to the domain so the messages match.
const LineItemBody = z.object({
  id: z.string().min(1).optional(),
  description: z.string(),
  quantity: z.number().optional(),
  weight: z.number().nullable().optional(),
  length: z.number().optional(),
  width: z.number().optional(),
  height: z.number().optional(),
  rate: z.number().optional(),
  shipmentId: z.string().min(1).optional(),
})

const AdjustmentBody = z.object({
  id: z.string().min(1).optional(),
  description: z.string(),
  amount: z.number(),
  isAddition: z.boolean(),
})

const DateString = z.union([z.string().date(), z.string().datetime({ offset: true })])

const InvoiceBody = z.object({
  clientId: z.string().min(1),
  tripId: z.string().min(1).optional(),
  displayCurrency: z.string().min(1).optional(),
  issueDate: DateString.optional(),
  dueDate: DateString.optional(),
  paymentTerms: z.enum(['FULL_ON_RECEIPT', 'FIFTY_FIFTY', 'THIRTY_SEVENTY', 'NET_30', 'CUSTOM']).default('NET_30'),
  paymentTermsCustom: z.string().optional(),
  lineItems: z.array(LineItemBody),
  adjustments: z.array(AdjustmentBody).default([]),
  /** The total the editor displayed. */
  total: z.number().optional(),
})

const UpdateInvoiceBody = InvoiceBody.extend({
  expectedVersion: z.number().int().optional(),
})

const FinalizeBody = z.object({
  expectedVersion: z.number().int().optional(),
})

const RecordPaymentBody = z.object({
  amount: z.number(),
  /** Currency the amount was received in; defaults to the invoice currency. */
  currency: z.string().min(1).optional(),
  method: z.enum(['CASH', 'BANK_TRANSFER', 'MOBILE_MONEY', 'OTHER']),
  paidAt: DateString.optional(),
  reference: z.string().min(1).optional(),
  notes: z.string().optional(),
  expectedVersion: z.number().int().optional(),
})

const StatusQuery = z.enum(['DRAFT', 'SENT', 'PARTIAL', 'PAID', 'OVERDUE'])

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

type InvoiceBodyData = z.infer<typeof InvoiceBody>

function toDraft(body: InvoiceBodyData, issueDate: Date, dueDate: Date): InvoiceDraft {
  return {
    clientId: body.clientId,
    issueDate,
    dueDate,
    paymentTerms: body.paymentTerms,
    lineItems: body.lineItems,
    adjustments: body.adjustments,
    ...(body.tripId !== undefined ? { tripId: body.tripId } : {}),
    ...(body.displayCurrency !== undefined ? { displayCurrency: body.displayCurrency } : {}),
    ...(body.paymentTermsCustom !== undefined ? { paymentTermsCustom: body.paymentTermsCustom } : {}),
    ...(body.total !== undefined ? { total: body.total } : {}),
  }
}

function assertKnownCurrency(code: string | undefined, settings: BillingSettings): void {
  if (code === undefined) return
  if (!settings.exchangeRates.currencies.some((c) => c.code === code)) {
    throw new ValidationError(`Unknown currency ${code}`)
  }
}

/** A writer that sends no version is saving over whatever it just read. */
function expectedVersionOf(invoice: Invoice, expected: number | undefined): number {
  return expected ?? invoice.version
}

export const billingHandler = new Hono<AppEnv>()

// ---------------------------------------------------------------------------
// POST /invoices — create a draft
// ---------------------------------------------------------------------------
billingHandler.post(
  '/',
  validator('json', (value, c) => {
    const r = InvoiceBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    const db = c.get('db')
    const body = c.req.valid('json')

    const client = await findClientById(db, body.clientId)
    if (!client) return c.json({ error: 'Client not found', code: 'NOT_FOUND' }, 404)
    if (body.tripId !== undefined && !(await findTripById(db, body.tripId))) {
      return c.json({ error: 'Trip not found', code: 'NOT_FOUND' }, 404)
    }

    const settings = await getBillingSettings(db)
    const canonical = settings.exchangeRates.canonical
    // Clients billed in another currency see their invoices in it by default.
    const displayCurrency =
      body.displayCurrency ?? (client.defaultCurrency !== canonical ? client.defaultCurrency : undefined)
    assertKnownCurrency(displayCurrency, settings)

    const now = new Date()
    const issueDate = body.issueDate !== undefined ? new Date(body.issueDate) : now
    const dueDate =
      body.dueDate !== undefined ? new Date(body.dueDate) : calculateDueDate(issueDate, client.paymentTermsDays)
    const draft = toDraft(displayCurrency !== undefined ? { ...body, displayCurrency } : body, issueDate, dueDate)

    const saved = await insertNumberedInvoice(db, issueDate.getUTCFullYear(), (invoiceNumber) =>
      composeInvoice(draft, {
        id: toInvoiceId(randomUUID()),
        invoiceNumber,
        currency: canonical,
        defaultRate: client.defaultRate ?? settings.defaultRate,
        now,
        newId: randomUUID,
      }),
    )
    return c.json({ data: presentInvoice(saved) }, 201)
  },
)

// ---------------------------------------------------------------------------
// GET /invoices — statuses are re-derived on read
// ---------------------------------------------------------------------------
billingHandler.get('/', async (c) => {
  const db = c.get('db')
  const limit = Math.min(Number(c.req.query('limit') ?? '50'), 100)
  const offset = Number(c.req.query('offset') ?? '0')
  const clientId = c.req.query('clientId')
  const tripId = c.req.query('tripId')

  const statusParam = c.req.query('status')
  const status = statusParam !== undefined ? StatusQuery.safeParse(statusParam) : undefined
  if (status && !status.success) {
    return c.json({ error: `Unknown status ${statusParam}`, code: 'VALIDATION_ERROR' }, 400)
  }

  const now = new Date()
  const all = (
    await listInvoices(db, {
      ...(clientId !== undefined ? { clientId } : {}),
      ...(tripId !== undefined ? { tripId } : {}),
    })
  ).map((invoice) => reconcileInvoice(invoice, now))
  const wanted = status?.success ? status.data : undefined
  const matching = wanted !== undefined ? all.filter((invoice) => invoice.status === wanted) : all
  const data = matching.slice(offset, offset + limit).map((invoice) => presentInvoice(invoice))

  return c.json({ data, meta: { count: data.length, total: matching.length, limit, offset } })
})

// ---------------------------------------------------------------------------
// GET /invoices/:id — optional ?currency= projection
// ---------------------------------------------------------------------------
billingHandler.get('/:id', async (c) => {
  const db = c.get('db')
  const invoice = await findInvoiceById(db, c.req.param('id'))
  if (!invoice) return c.json({ error: 'Invoice not found', code: 'NOT_FOUND' }, 404)

  const reconciled = reconcileInvoice(invoice, new Date())
  const currency = c.req.query('currency') ?? reconciled.displayCurrency
  if (currency === undefined) return c.json({ data: presentInvoice(reconciled) })

  // The rate table is read fresh on every request.
  const settings = await getBillingSettings(db)
  return c.json({ data: presentInvoice(reconciled, { currency, rates: settings.exchangeRates }) })
})

// ---------------------------------------------------------------------------
// PUT /invoices/:id — authoritative save
// ---------------------------------------------------------------------------
billingHandler.put(
  '/:id',
  validator('json', (value, c) => {
    const r = UpdateInvoiceBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    const db = c.get('db')
    const body = c.req.valid('json')

    const existing = await findInvoiceById(db, c.req.param('id'))
    if (!existing) return c.json({ error: 'Invoice not found', code: 'NOT_FOUND' }, 404)

    const client = await findClientById(db, body.clientId)
    if (!client) return c.json({ error: 'Client not found', code: 'NOT_FOUND' }, 404)
    if (body.tripId !== undefined && !(await findTripById(db, body.tripId))) {
      return c.json({ error: 'Trip not found', code: 'NOT_FOUND' }, 404)
    }

    const settings = await getBillingSettings(db)
    assertKnownCurrency(body.displayCurrency, settings)

    const now = new Date()
    const issueDate = body.issueDate !== undefined ? new Date(body.issueDate) : existing.issueDate
    const dueDate = body.dueDate !== undefined ? new Date(body.dueDate) : existing.dueDate

    const next = composeInvoice(toDraft(body, issueDate, dueDate), {
      existing: reconcileInvoice(existing, now),
      id: existing.id,
      invoiceNumber: existing.invoiceNumber,
      currency: existing.currency,
      defaultRate: client.defaultRate ?? settings.defaultRate,
      now,
      newId: randomUUID,
    })

    const saved = await saveInvoice(db, next, expectedVersionOf(existing, body.expectedVersion))
    return c.json({ data: presentInvoice(saved) })
  },
)

// ---------------------------------------------------------------------------
// POST /invoices/:id/finalize — issue an unsent invoice
// ---------------------------------------------------------------------------
billingHandler.post(
  '/:id/finalize',
  validator('json', (value, c) => {
    const r = FinalizeBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    const db = c.get('db')
    const body = c.req.valid('json')

    const existing = await findInvoiceById(db, c.req.param('id'))
    if (!existing) return c.json({ error: 'Invoice not found', code: 'NOT_FOUND' }, 404)

    const now = new Date()
    const sent = finalizeInvoice(reconcileInvoice(existing, now), now)
    const saved = await saveInvoice(db, sent, expectedVersionOf(existing, body.expectedVersion))
    return c.json({ data: presentInvoice(saved) })
  },
)

// ---------------------------------------------------------------------------
// DELETE /invoices/:id — unsent invoices without payments only
// ---------------------------------------------------------------------------
billingHandler.delete('/:id', async (c) => {
  const db = c.get('db')
  const existing = await findInvoiceById(db, c.req.param('id'))
  if (!existing) return c.json({ error: 'Invoice not found', code: 'NOT_FOUND' }, 404)

  if (!isUnsent(existing) || existing.payments.length > 0) {
    throw new StateError(`Only unpaid, unsent invoices can be deleted; ${existing.invoiceNumber} is ${existing.status}`)
  }
  await deleteInvoice(db, existing.id, existing.version)
  return c.body(null, 204)
})

// ---------------------------------------------------------------------------
// POST /invoices/:id/payments
// ---------------------------------------------------------------------------
billingHandler.post(
  '/:id/payments',
  validator('json', (value, c) => {
    const r = RecordPaymentBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    const db = c.get('db')
    const body = c.req.valid('json')

    const existing = await findInvoiceById(db, c.req.param('id'))
    if (!existing) return c.json({ error: 'Invoice not found', code: 'NOT_FOUND' }, 404)

    const settings = await getBillingSettings(db)
    const amount =
      body.currency !== undefined && body.currency !== existing.currency
        ? toCanonical(body.amount, body.currency, settings.exchangeRates).amount
        : body.amount

    const now = new Date()
    const { invoice, payment } = recordPayment(
      reconcileInvoice(existing, now),
      {
        amount,
        method: body.method,
        ...(body.paidAt !== undefined ? { paidAt: new Date(body.paidAt) } : {}),
        ...(body.reference !== undefined ? { reference: body.reference } : {}),
        ...(body.notes !== undefined ? { notes: body.notes } : {}),
      },
      { now, overpaymentPolicy: settings.overpaymentPolicy, newId: randomUUID },
    )

    const saved = await appendPayment(db, invoice, payment, expectedVersionOf(existing, body.expectedVersion))
    return c.json({ data: { payment, invoice: presentInvoice(saved) } }, 201)
  },
)
