// ---------------------------------------------------------------------------
// Log sinks
//
// Request lines come from hono/logger through `printRequest`; unexpected
// failures go through `logError` with a context object. Both are muted when
// LOG_LEVEL=silent.
// ---------------------------------------------------------------------------

import { config } from '../config'

export function printRequest(message: string, ...rest: string[]): void {
  if (config.logLevel === 'silent') return
  console.log(message, ...rest)
}

export function logError(message: string, context: Record<string, unknown>): void {
  if (config.logLevel === 'silent') return
  console.error(message, context)
}
