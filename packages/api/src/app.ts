import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { logger } from 'hono/logger'
import type { AppEnv } from './types'
import { printRequest } from './lib/log'
import { handleError } from './lib/errors'
import { databaseMiddleware } from './middleware/database'
import { clientsHandler } from './handlers/clients'
import { tripsHandler } from './handlers/trips'
import { billingHandler } from './handlers/billing'
import { paymentsHandler } from './handlers/payments'
import { settingsHandler } from './handlers/settings'
import { financeHandler } from './handlers/finance'

const app = new Hono<AppEnv>()

// ---------------------------------------------------------------------------
// Global middleware (applies to all routes including /health)
// ---------------------------------------------------------------------------
app.use('*', logger(printRequest))
app.use('*', cors())

// ---------------------------------------------------------------------------
// Public routes
// ---------------------------------------------------------------------------
app.get('/health', (c) => {
  return c.json({ status: 'ok' as const, timestamp: new Date().toISOString() })
})

// ---------------------------------------------------------------------------
// Billing API — every route under /api/v1 has `c.get('db')` set.
// ---------------------------------------------------------------------------
const v1 = new Hono<AppEnv>()
v1.use('*', databaseMiddleware)

// Collaborator records
v1.route('/clients', clientsHandler)
v1.route('/trips', tripsHandler)

// Bounded-context routers
v1.route('/invoices', billingHandler)
v1.route('/payments', paymentsHandler)
v1.route('/settings', settingsHandler)
v1.route('/finance', financeHandler)

app.route('/api/v1', v1)

// ---------------------------------------------------------------------------
// Error and 404 fallbacks
// ---------------------------------------------------------------------------
app.onError(handleError)
app.notFound((c) => c.json({ error: 'Not found', code: 'NOT_FOUND' }, 404))

export { app }
