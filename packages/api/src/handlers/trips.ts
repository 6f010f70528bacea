// ---------------------------------------------------------------------------
// Trips handler — minimal trip records invoices can be grouped under
// ---------------------------------------------------------------------------

import { Hono } from 'hono'
import { validator } from 'hono/validator'
import { z } from 'zod'
import type { AppEnv } from '../types'
import { createTrip, findTripById, findTripByNumber } from '../repositories'

const CreateTripBody = z.object({
  tripNumber: z.string().min(1),
})

export const tripsHandler = new Hono<AppEnv>()

tripsHandler.post(
  '/',
  validator('json', (value, c) => {
    const r = CreateTripBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    const db = c.get('db')
    const { tripNumber } = c.req.valid('json')
    if (await findTripByNumber(db, tripNumber)) {
      return c.json({ error: `Trip ${tripNumber} already exists`, code: 'CONFLICT' }, 409)
    }
    const trip = await createTrip(db, { tripNumber })
    return c.json({ data: trip }, 201)
  },
)

tripsHandler.get('/:id', async (c) => {
  const db = c.get('db')
  const trip = await findTripById(db, c.req.param('id'))
  if (!trip) return c.json({ error: 'Trip not found', code: 'NOT_FOUND' }, 404)
  return c.json({ data: trip })
})
