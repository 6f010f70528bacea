import { describe, it, expect, beforeEach } from 'vitest'
import { openDatabase } from '../../db'
import type { Db } from '../../db'
import { createClient, findClientById, listClients } from '../client.repository'
import { createTrip, findTripById, findTripByNumber } from '../trip.repository'

let db: Db

beforeEach(() => {
  db = openDatabase(':memory:')
})

describe('ClientRepository', () => {
  it('applies default terms and currency', async () => {
    const client = await createClient(db, { name: 'Test Freight' })
    expect(client.paymentTermsDays).toBe(30)
    expect(client.defaultCurrency).toBe('ZAR')
    expect(client.defaultRate).toBeUndefined()
  })

  it('finds a client by id', async () => {
    const client = await createClient(db, { name: 'Test Freight', email: 'billing@example.com', defaultRate: 40 })
    expect(await findClientById(db, client.id)).toEqual(client)
  })

  it('returns null for an unknown client', async () => {
    expect(await findClientById(db, 'missing')).toBeNull()
  })

  it('lists clients by name', async () => {
    await createClient(db, { name: 'Zulu Logistics' })
    await createClient(db, { name: 'Alpha Haulage' })
    expect((await listClients(db)).map((c) => c.name)).toEqual(['Alpha Haulage', 'Zulu Logistics'])
  })
})

describe('TripRepository', () => {
  it('finds a trip by id and by number', async () => {
    const trip = await createTrip(db, { tripNumber: 'TRIP-0042' })
    expect(await findTripById(db, trip.id)).toEqual(trip)
    expect(await findTripByNumber(db, 'TRIP-0042')).toEqual(trip)
    expect(await findTripByNumber(db, 'TRIP-0043')).toBeNull()
  })
})
