// ---------------------------------------------------------------------------
// Shared primitives used across all bounded contexts.
// Nothing in this file may import from a sibling context.
// ---------------------------------------------------------------------------

import { ValidationError } from './errors'

// ---------------------------------------------------------------------------
// Branding utility
// ---------------------------------------------------------------------------

/** Nominal / branded type: prevents accidental substitution of e.g. ClientId for TripId. */
export type Brand<T, B extends string> = T & { readonly __brand: B }

// ---------------------------------------------------------------------------
// Collaborator ID types
// ---------------------------------------------------------------------------

/** Identifies a billed client (owned by the client directory). */
export type ClientId = Brand<string, 'ClientId'>

/** Identifies a trip that shipments travel on (owned by trip planning). */
export type TripId = Brand<string, 'TripId'>

export const toClientId = (raw: string): ClientId => raw as ClientId
export const toTripId = (raw: string): TripId => raw as TripId

// ---------------------------------------------------------------------------
// Money value object
// ---------------------------------------------------------------------------

/**
 * Immutable monetary value.
 *
 * @invariant `currency` must be an ISO 4217 code (e.g. "ZAR").
 */
export interface Money {
  readonly amount: number
  /** ISO 4217 currency code, e.g. "ZAR" */
  readonly currency: string
}

/**
 * Absolute tolerance, in currency units, under which two monetary amounts are
 * considered equal. Absorbs floating-point drift between client and server.
 */
export const MONEY_TOLERANCE = 0.01

/** Returns true when `a` and `b` differ by no more than MONEY_TOLERANCE. */
export function amountsMatch(a: number, b: number): boolean {
  return Math.abs(a - b) <= MONEY_TOLERANCE
}

/** Renders an amount with two decimals, e.g. `950` → `"950.00"`. */
export function formatAmount(amount: number): string {
  return amount.toFixed(2)
}

/**
 * Rejects a numeric input that is not a finite, non-negative number.
 *
 * @throws {ValidationError} naming `field` when the value is negative or NaN.
 */
export function assertNonNegative(field: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new ValidationError(`${field} must be a non-negative number, got ${value}`)
  }
}

/** Rounds to the nearest cent. Used for report figures only, never for stored amounts. */
export function roundCents(amount: number): number {
  return Math.round(amount * 100) / 100
}
