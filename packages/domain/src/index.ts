// ---------------------------------------------------------------------------
// Public surface of the computation core.
// ---------------------------------------------------------------------------

export * from './shared/types'
export * from './shared/errors'
export * from './billing/index'
export * from './finance/index'
