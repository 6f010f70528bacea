import Database from 'better-sqlite3'
import { mkdirSync, readFileSync } from 'node:fs'
import { dirname } from 'node:path'
import { config } from './config'

// ---------------------------------------------------------------------------
// SQLite connection
//
// One connection per process, opened lazily. In development/test we re-use
// the same instance across hot reloads by attaching it to `globalThis`.
// ---------------------------------------------------------------------------

export type Db = Database.Database

const schema = readFileSync(new URL('../sql/schema.sql', import.meta.url), 'utf8')

/** Opens (creating if needed) a database file and applies the schema. */
export function openDatabase(filename: string): Db {
  if (filename !== ':memory:') {
    mkdirSync(dirname(filename), { recursive: true })
  }
  const db = new Database(filename)
  db.pragma('journal_mode = WAL')
  db.pragma('foreign_keys = ON')
  db.exec(schema)
  return db
}

const globalForDb = globalThis as unknown as { waybillDb: Db | undefined }

export function getDb(): Db {
  if (globalForDb.waybillDb) return globalForDb.waybillDb
  const db = openDatabase(config.databasePath)
  if (config.nodeEnv !== 'production') {
    globalForDb.waybillDb = db
  }
  return db
}
