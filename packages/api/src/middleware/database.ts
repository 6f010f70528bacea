// ---------------------------------------------------------------------------
// Database middleware
//
// Populates `c.get('db')` for every route under /api/v1 so handlers and
// repositories never reach for the connection singleton themselves.
// ---------------------------------------------------------------------------

import type { Context, Next } from 'hono'
import type { AppEnv } from '../types'
import { getDb } from '../db'

export async function databaseMiddleware(c: Context<AppEnv>, next: Next): Promise<void> {
  c.set('db', getDb())
  await next()
}
