// ---------------------------------------------------------------------------
// Error → HTTP translation
//
// Handlers let domain errors propagate; `app.onError` passes them here so every
// route answers with the same `{ error, code }` shape.
// ---------------------------------------------------------------------------

import type { Context } from 'hono'
import { HTTPException } from 'hono/http-exception'
import { isDomainError } from '@waybill/domain'
import type { DomainError } from '@waybill/domain'
import { logError } from './log'

function statusFor(err: DomainError): 400 | 404 | 409 | 422 {
  switch (err.code) {
    case 'TOTAL_MISMATCH':
      return 422
    case 'NOT_FOUND':
      return 404
    case 'INVALID_STATE':
    case 'CONFLICT':
      return 409
    case 'VALIDATION_ERROR':
      return 400
  }
}

export function handleError(err: Error, c: Context): Response {
  if (isDomainError(err)) {
    return c.json({ error: err.message, code: err.code }, statusFor(err))
  }
  if (err instanceof HTTPException) {
    // Raised by hono itself, e.g. a request body that is not JSON.
    return c.json({ error: err.message, code: 'VALIDATION_ERROR' }, 400)
  }
  logError('Unhandled error', { method: c.req.method, path: c.req.path, error: err })
  return c.json({ error: 'Internal server error', code: 'INTERNAL_ERROR' }, 500)
}
