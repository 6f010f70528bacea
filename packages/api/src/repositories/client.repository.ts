import { randomUUID } from 'node:crypto'
import { toClientId } from '@waybill/domain'
import type { ClientId } from '@waybill/domain'
import type { Db } from '../db'

// ---------------------------------------------------------------------------
// Client records
//
// Clients are owned by the client directory; billing keeps only what it needs
// to resolve a reference and to default the due date and the rate.
// ---------------------------------------------------------------------------

export interface Client {
  id: ClientId
  name: string
  email?: string
  paymentTermsDays: number
  defaultRate?: number
  defaultCurrency: string
  createdAt: Date
}

type ClientRow = {
  id: string
  name: string
  email: string | null
  payment_terms_days: number
  default_rate: number | null
  default_currency: string
  created_at: string
}

// ---------------------------------------------------------------------------
// Mappers
// ---------------------------------------------------------------------------

function mapClient(row: ClientRow): Client {
  return {
    id: toClientId(row.id),
    name: row.name,
    paymentTermsDays: row.payment_terms_days,
    defaultCurrency: row.default_currency,
    createdAt: new Date(row.created_at),
    ...(row.email != null ? { email: row.email } : {}),
    ...(row.default_rate != null ? { defaultRate: row.default_rate } : {}),
  }
}

// ---------------------------------------------------------------------------
// Repository
// ---------------------------------------------------------------------------

export type CreateClientInput = {
  name: string
  email?: string
  paymentTermsDays?: number
  defaultRate?: number
  defaultCurrency?: string
}

export async function createClient(db: Db, input: CreateClientInput): Promise<Client> {
  const row: ClientRow = {
    id: randomUUID(),
    name: input.name,
    email: input.email ?? null,
    payment_terms_days: input.paymentTermsDays ?? 30,
    default_rate: input.defaultRate ?? null,
    default_currency: input.defaultCurrency ?? 'ZAR',
    created_at: new Date().toISOString(),
  }
  db.prepare<ClientRow>(
    `INSERT INTO clients (id, name, email, payment_terms_days, default_rate, default_currency, created_at)
     VALUES (@id, @name, @email, @payment_terms_days, @default_rate, @default_currency, @created_at)`,
  ).run(row)
  return mapClient(row)
}

export async function findClientById(db: Db, id: string): Promise<Client | null> {
  const row = db.prepare<{ id: string }, ClientRow>('SELECT * FROM clients WHERE id = @id').get({ id })
  return row ? mapClient(row) : null
}

export async function listClients(db: Db, opts: { limit?: number; offset?: number } = {}): Promise<Client[]> {
  const rows = db
    .prepare<{ limit: number; offset: number }, ClientRow>(
      'SELECT * FROM clients ORDER BY name ASC LIMIT @limit OFFSET @offset',
    )
    .all({ limit: opts.limit ?? 50, offset: opts.offset ?? 0 })
  return rows.map(mapClient)
}
