// ---------------------------------------------------------------------------
// Node.js entry point
// ---------------------------------------------------------------------------

import { serve } from '@hono/node-server'
import { app } from './app'
import { config } from './config'
import { printRequest } from './lib/log'

serve({ fetch: app.fetch, port: config.port }, (info) => {
  printRequest(`waybill api listening on http://localhost:${info.port}`)
})
