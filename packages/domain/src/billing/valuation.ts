// ---------------------------------------------------------------------------
// Line item valuation
//
// Chargeable ("shipping") weight is the greater of the actual weight and the
// volumetric weight L×W×H / 5000. A line's amount is shipping weight × rate.
//
// Only rate and quantity edits re-derive the amount. Measurement edits leave
// it alone until the caller asks for `revalueLineItem`, because dimensions are
// fixed once the parcel has been created.
// ---------------------------------------------------------------------------

import { ValidationError } from '../shared/errors'
import { assertNonNegative } from '../shared/types'
import { toLineItemId } from './types'
import type { Dimensions, LegacyLineItem, LineItem, LineItemId, LineItemInput, StructuredLineItem } from './types'

/** cm³ per chargeable kg. */
export const VOLUMETRIC_DIVISOR = 5000

/** Quantities above this, or with a fractional part, are weights in older rows. */
const LEGACY_QUANTITY_THRESHOLD = 10

// ---------------------------------------------------------------------------
// Weights
// ---------------------------------------------------------------------------

/**
 * Volumetric weight in kg. Zero when any dimension is missing or zero, so an
 * unmeasured parcel is billed on actual weight alone.
 */
export function calculateVolumetricWeight(dims: Dimensions): number {
  const { length, width, height } = dims
  if (!length || !width || !height) return 0
  return (length * width * height) / VOLUMETRIC_DIVISOR
}

export function calculateShippingWeight(item: Dimensions & { readonly weight?: number | undefined }): number {
  return Math.max(item.weight ?? 0, calculateVolumetricWeight(item))
}

function deriveAmount(item: Dimensions & { readonly weight?: number | undefined; readonly rate: number }): number {
  return calculateShippingWeight(item) * item.rate
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function validateQuantity(quantity: number): void {
  if (!Number.isInteger(quantity) || quantity < 0) {
    throw new ValidationError(`quantity must be a non-negative integer, got ${quantity}`)
  }
}

function validateMeasurements(m: Dimensions & { readonly weight?: number | null | undefined }): void {
  if (m.weight != null) assertNonNegative('weight', m.weight)
  if (m.length !== undefined) assertNonNegative('length', m.length)
  if (m.width !== undefined) assertNonNegative('width', m.width)
  if (m.height !== undefined) assertNonNegative('height', m.height)
}

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

/**
 * Validates an editor-supplied line and derives its amount.
 *
 * A missing rate falls back to `defaultRate` (the tenant or client default).
 *
 * @throws {ValidationError} on a negative weight, dimension or rate, or a
 *         quantity that is not a non-negative integer.
 */
export function createLineItem(input: LineItemInput, defaultRate: number, newId: () => string): StructuredLineItem {
  if (input.description.trim() === '') {
    throw new ValidationError('line item description is required')
  }
  const quantity = input.quantity ?? 1
  validateQuantity(quantity)
  validateMeasurements(input)
  const rate = input.rate ?? defaultRate
  assertNonNegative('rate', rate)

  const fields = {
    description: input.description,
    quantity,
    rate,
    ...(input.weight != null ? { weight: input.weight } : {}),
    ...(input.length !== undefined ? { length: input.length } : {}),
    ...(input.width !== undefined ? { width: input.width } : {}),
    ...(input.height !== undefined ? { height: input.height } : {}),
  }

  return {
    kind: 'structured',
    id: toLineItemId(input.id ?? newId()),
    ...fields,
    amount: deriveAmount(fields),
    ...(input.shipmentId !== undefined ? { shipmentId: input.shipmentId } : {}),
  }
}

/** A line item row exactly as persisted, before legacy resolution. */
export interface StoredLineItem extends Dimensions {
  readonly id: string
  readonly description: string
  readonly quantity: number | null
  readonly weight: number | null
  readonly rate: number
  readonly amount: number
  readonly shipmentId?: string
}

function isLegacyQuantity(quantity: number): boolean {
  return !Number.isInteger(quantity) || quantity > LEGACY_QUANTITY_THRESHOLD
}

/**
 * Resolves the legacy/structured variant of a stored line once, at load time.
 *
 * Older rows kept the weight in `quantity` and left `weight` empty. Those become
 * a LegacyLineItem with the value moved to `weight` and a quantity of 1. The
 * stored amount is kept as-is; reading never changes money.
 */
export function normalizeLineItem(row: StoredLineItem): LineItem {
  const common = {
    id: toLineItemId(row.id),
    description: row.description,
    rate: row.rate,
    amount: row.amount,
    ...(row.length !== undefined ? { length: row.length } : {}),
    ...(row.width !== undefined ? { width: row.width } : {}),
    ...(row.height !== undefined ? { height: row.height } : {}),
    ...(row.shipmentId !== undefined ? { shipmentId: row.shipmentId } : {}),
  }

  if (row.weight == null && row.quantity != null && isLegacyQuantity(row.quantity)) {
    const legacy: LegacyLineItem = { kind: 'legacy', ...common, quantity: 1, weight: row.quantity }
    return legacy
  }

  return {
    kind: 'structured',
    ...common,
    quantity: row.quantity ?? 1,
    ...(row.weight != null ? { weight: row.weight } : {}),
  }
}

// ---------------------------------------------------------------------------
// Edits
// ---------------------------------------------------------------------------

/** Sets the rate and re-derives the amount. Repeating the same rate is a no-op. */
export function setLineItemRate<T extends LineItem>(item: T, rate: number): T {
  assertNonNegative('rate', rate)
  return { ...item, rate, amount: deriveAmount({ ...item, rate }) }
}

/** Sets the piece count and re-derives the amount. */
export function setLineItemQuantity<T extends LineItem>(item: T, quantity: number): T {
  validateQuantity(quantity)
  return { ...item, quantity, amount: deriveAmount(item) }
}

export interface MeasurementPatch extends Dimensions {
  readonly weight?: number
}

/**
 * Updates weight and/or dimensions without touching the amount.
 * Call `revalueLineItem` to bill on the new measurements.
 */
export function updateLineItemMeasurements<T extends LineItem>(item: T, patch: MeasurementPatch): T {
  validateMeasurements(patch)
  return { ...item, ...patch }
}

/** Re-derives the amount from the item's current measurements and rate. */
export function revalueLineItem<T extends LineItem>(item: T): T {
  return { ...item, amount: deriveAmount(item) }
}

/** Applies one rate to every item whose id is in `ids`; others pass through untouched. */
export function applyBatchRate(
  items: readonly LineItem[],
  ids: ReadonlySet<LineItemId>,
  rate: number,
): LineItem[] {
  return items.map((item) => (ids.has(item.id) ? setLineItemRate(item, rate) : item))
}

/**
 * The per-kg rate that makes `items` add up to `targetTotal`.
 *
 * @throws {ValidationError} when the target is not positive or the items carry
 *         no chargeable weight.
 */
export function calculateRequiredRate(items: readonly LineItem[], targetTotal: number): number {
  if (!Number.isFinite(targetTotal) || targetTotal <= 0) {
    throw new ValidationError(`target total must be positive, got ${targetTotal}`)
  }
  const totalWeight = items.reduce((sum, item) => sum + calculateShippingWeight(item), 0)
  if (totalWeight <= 0) {
    throw new ValidationError('No chargeable weight to calculate a rate from')
  }
  return targetTotal / totalWeight
}
