export * from './billing.repository'
export * from './client.repository'
export * from './trip.repository'
export * from './settings.repository'
