// ---------------------------------------------------------------------------
// Payments handler — the payment ledger across invoices
// Payments are recorded through POST /invoices/:id/payments.
// ---------------------------------------------------------------------------

import { Hono } from 'hono'
import type { AppEnv } from '../types'
import { listPayments } from '../repositories'

export const paymentsHandler = new Hono<AppEnv>()

paymentsHandler.get('/', async (c) => {
  const db = c.get('db')
  const limit = Math.min(Number(c.req.query('limit') ?? '50'), 100)
  const offset = Number(c.req.query('offset') ?? '0')
  const invoiceId = c.req.query('invoiceId')

  const data = await listPayments(db, { limit, offset, ...(invoiceId !== undefined ? { invoiceId } : {}) })
  return c.json({ data, meta: { count: data.length, limit, offset } })
})
