/**
 * Seed script: creates baseline data for local development.
 * Run with: npm run db:seed --workspace @waybill/api
 *
 * Idempotent: running twice is safe (skips when the seed trip is present).
 */
import { randomUUID } from 'node:crypto'
import { DEFAULT_BILLING_SETTINGS, calculateDueDate, composeInvoice, toInvoiceId } from '@waybill/domain'
import { getDb } from './db'
import {
  createClient,
  createTrip,
  findTripByNumber,
  getBillingSettings,
  insertNumberedInvoice,
  saveBillingSettings,
} from './repositories'

const SEED_TRIP = 'TRIP-SEED-001'

async function main(): Promise<void> {
  const db = getDb()
  console.log('Seeding database …')

  if (await findTripByNumber(db, SEED_TRIP)) {
    console.log('Seed data already present, nothing to do')
    return
  }

  // ---------------------------------------------------------------------------
  // Settings
  // ---------------------------------------------------------------------------
  await saveBillingSettings(db, DEFAULT_BILLING_SETTINGS)
  const settings = await getBillingSettings(db)

  // ---------------------------------------------------------------------------
  // Collaborators
  // ---------------------------------------------------------------------------
  const client = await createClient(db, { name: 'Sample Traders', email: 'accounts@example.com', paymentTermsDays: 14 })
  const trip = await createTrip(db, { tripNumber: SEED_TRIP })

  // ---------------------------------------------------------------------------
  // Invoice
  // ---------------------------------------------------------------------------
  const now = new Date()
  const year = now.getUTCFullYear()
  const saved = await insertNumberedInvoice(db, year, (invoiceNumber) =>
    composeInvoice(
      {
        clientId: client.id,
        tripId: trip.id,
        issueDate: now,
        dueDate: calculateDueDate(now, client.paymentTermsDays),
        paymentTerms: 'NET_30',
        lineItems: [
          { description: 'Carton of spares', weight: 10, length: 40, width: 30, height: 20 },
          { description: 'Bale of fabric', weight: 25, length: 80, width: 60, height: 50 },
        ],
        adjustments: [{ description: 'Loyalty discount', amount: 50, isAddition: false }],
      },
      {
        id: toInvoiceId(randomUUID()),
        invoiceNumber,
        currency: settings.exchangeRates.canonical,
        defaultRate: settings.defaultRate,
        now,
        newId: randomUUID,
      },
    ),
  )

  console.log(`Created ${saved.invoiceNumber} for ${client.name}, total ${saved.total.toFixed(2)} ${saved.currency}`)
}

main().catch((err: unknown) => {
  console.error('Seed failed', { error: err })
  process.exitCode = 1
})
