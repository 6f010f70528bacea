// ---------------------------------------------------------------------------
// Hono application types
// ---------------------------------------------------------------------------

import type { Db } from './db'

/**
 * Variables injected into Hono context by the database middleware.
 * Every handler mounted under the /api/v1/* prefix can rely on `db` being set.
 */
export type AppVariables = {
  /** The open SQLite connection repositories run their statements on. */
  db: Db
}

/** Hono environment type used when constructing the app and all sub-routers. */
export type AppEnv = { Variables: AppVariables }
