// ---------------------------------------------------------------------------
// Finance handler — receivables reports
//
// The reports re-derive invoice status against the request time, so an
// invoice that slipped past its due date since it was last written counts as
// overdue.
// ---------------------------------------------------------------------------

import { Hono } from 'hono'
import { listOverdueInvoices, summarizeClientStatements, summarizeTripWorksheet } from '@waybill/domain'
import type { AppEnv } from '../types'
import { findTripById, listInvoices } from '../repositories'

export const financeHandler = new Hono<AppEnv>()

financeHandler.get('/overdue', async (c) => {
  const db = c.get('db')
  const invoices = await listInvoices(db)
  return c.json({ data: listOverdueInvoices(invoices, new Date()) })
})

financeHandler.get('/client-statements', async (c) => {
  const db = c.get('db')
  const invoices = await listInvoices(db)
  return c.json({ data: summarizeClientStatements(invoices, new Date()) })
})

financeHandler.get('/trip-worksheet/:tripId', async (c) => {
  const db = c.get('db')
  const trip = await findTripById(db, c.req.param('tripId'))
  if (!trip) return c.json({ error: 'Trip not found', code: 'NOT_FOUND' }, 404)

  const invoices = await listInvoices(db, { tripId: trip.id })
  return c.json({ data: { trip, ...summarizeTripWorksheet(invoices, new Date()) } })
})
