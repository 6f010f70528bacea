import { randomUUID } from 'node:crypto'
import { toTripId } from '@waybill/domain'
import type { TripId } from '@waybill/domain'
import type { Db } from '../db'

export interface Trip {
  id: TripId
  tripNumber: string
  createdAt: Date
}

type TripRow = {
  id: string
  trip_number: string
  created_at: string
}

// ---------------------------------------------------------------------------
// Mappers
// ---------------------------------------------------------------------------

function mapTrip(row: TripRow): Trip {
  return {
    id: toTripId(row.id),
    tripNumber: row.trip_number,
    createdAt: new Date(row.created_at),
  }
}

// ---------------------------------------------------------------------------
// Repository
// ---------------------------------------------------------------------------

export async function createTrip(db: Db, input: { tripNumber: string }): Promise<Trip> {
  const row: TripRow = {
    id: randomUUID(),
    trip_number: input.tripNumber,
    created_at: new Date().toISOString(),
  }
  db.prepare<TripRow>('INSERT INTO trips (id, trip_number, created_at) VALUES (@id, @trip_number, @created_at)').run(
    row,
  )
  return mapTrip(row)
}

export async function findTripById(db: Db, id: string): Promise<Trip | null> {
  const row = db.prepare<{ id: string }, TripRow>('SELECT * FROM trips WHERE id = @id').get({ id })
  return row ? mapTrip(row) : null
}

export async function findTripByNumber(db: Db, tripNumber: string): Promise<Trip | null> {
  const row = db
    .prepare<{ tripNumber: string }, TripRow>('SELECT * FROM trips WHERE trip_number = @tripNumber')
    .get({ tripNumber })
  return row ? mapTrip(row) : null
}
