// ---------------------------------------------------------------------------
// Billing bounded context
// Values shipments into invoices, reconciles payments and projects currency.
// ---------------------------------------------------------------------------

export * from './types'
export * from './valuation'
export * from './aggregator'
export * from './reconciliation'
export * from './currency'
export * from './terms'
export * from './settings'
