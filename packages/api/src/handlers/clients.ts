// ---------------------------------------------------------------------------
// Clients handler — minimal client records billing refers to
// ---------------------------------------------------------------------------

import { Hono } from 'hono'
import { validator } from 'hono/validator'
import { z } from 'zod'
import type { AppEnv } from '../types'
import { createClient, findClientById, listClients } from '../repositories'

const CreateClientBody = z.object({
  name: z.string().min(1),
  email: z.string().email().optional(),
  paymentTermsDays: z.number().int().min(0).optional(),
  defaultRate: z.number().min(0).optional(),
  defaultCurrency: z.string().length(3).optional(),
})

export const clientsHandler = new Hono<AppEnv>()

clientsHandler.post(
  '/',
  validator('json', (value, c) => {
    const r = CreateClientBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    const db = c.get('db')
    const body = c.req.valid('json')
    const client = await createClient(db, {
      name: body.name,
      ...(body.email !== undefined ? { email: body.email } : {}),
      ...(body.paymentTermsDays !== undefined ? { paymentTermsDays: body.paymentTermsDays } : {}),
      ...(body.defaultRate !== undefined ? { defaultRate: body.defaultRate } : {}),
      ...(body.defaultCurrency !== undefined ? { defaultCurrency: body.defaultCurrency } : {}),
    })
    return c.json({ data: client }, 201)
  },
)

clientsHandler.get('/', async (c) => {
  const db = c.get('db')
  const limit = Math.min(Number(c.req.query('limit') ?? '50'), 100)
  const offset = Number(c.req.query('offset') ?? '0')
  const data = await listClients(db, { limit, offset })
  return c.json({ data, meta: { count: data.length, limit, offset } })
})

clientsHandler.get('/:id', async (c) => {
  const db = c.get('db')
  const client = await findClientById(db, c.req.param('id'))
  if (!client) return c.json({ error: 'Client not found', code: 'NOT_FOUND' }, 404)
  return c.json({ data: client })
})
