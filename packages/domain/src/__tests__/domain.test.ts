import { describe, it, expect } from 'vitest'
import {
  // shared
  toClientId,
  amountsMatch,
  ValidationError,
  TotalMismatchError,
  StateError,
  NotFoundError,
  // valuation
  toLineItemId,
  toInvoiceId,
  calculateVolumetricWeight,
  calculateShippingWeight,
  createLineItem,
  normalizeLineItem,
  setLineItemRate,
  setLineItemQuantity,
  updateLineItemMeasurements,
  revalueLineItem,
  applyBatchRate,
  calculateRequiredRate,
  // aggregator
  calculateInvoiceTotals,
  assertTotalWithinTolerance,
  composeInvoice,
  finalizeInvoice,
  // reconciliation
  recordPayment,
  deriveInvoiceStatus,
  calculateOutstanding,
  calculateCredit,
  // currency
  DEFAULT_EXCHANGE_RATES,
  toDisplay,
  toCanonical,
  validateExchangeRateTable,
  validateBillingSettings,
  DEFAULT_BILLING_SETTINGS,
  type ComposeContext,
  type ExchangeRateTable,
  type Invoice,
  type InvoiceDraft,
  type StructuredLineItem,
} from '../index'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const NOW = new Date('2026-03-15T12:00:00Z')

function sequentialIds(prefix = 'gen'): () => string {
  let n = 0
  return () => `${prefix}-${++n}`
}

function makeLine(overrides: Partial<StructuredLineItem> = {}): StructuredLineItem {
  return {
    kind: 'structured',
    id: toLineItemId('li-1'),
    description: 'Parcel',
    quantity: 1,
    weight: 10,
    rate: 36,
    amount: 360,
    ...overrides,
  }
}

function makeInvoice(overrides: Partial<Invoice> = {}): Invoice {
  return {
    id: toInvoiceId('inv-1'),
    invoiceNumber: 'INV-2026-001',
    clientId: toClientId('client-1'),
    currency: 'ZAR',
    issueDate: new Date('2026-03-01T00:00:00Z'),
    dueDate: new Date('2026-03-31T00:00:00Z'),
    paymentTerms: 'NET_30',
    status: 'SENT',
    lineItems: [makeLine()],
    adjustments: [],
    subtotal: 360,
    adjustmentTotal: 0,
    total: 360,
    paidAmount: 0,
    payments: [],
    version: 1,
    createdAt: new Date('2026-03-01T00:00:00Z'),
    updatedAt: new Date('2026-03-01T00:00:00Z'),
    ...overrides,
  }
}

function makeDraft(overrides: Partial<InvoiceDraft> = {}): InvoiceDraft {
  return {
    clientId: 'client-1',
    issueDate: new Date('2026-03-01T00:00:00Z'),
    dueDate: new Date('2026-03-31T00:00:00Z'),
    paymentTerms: 'NET_30',
    lineItems: [
      { description: 'Parcel A', weight: 10, length: 40, width: 30, height: 20, rate: 36 },
      { description: 'Parcel B', weight: 17.5, rate: 36 },
    ],
    adjustments: [{ description: 'Loyalty discount', amount: 40, isAddition: false }],
    total: 950,
    ...overrides,
  }
}

function makeContext(overrides: Partial<ComposeContext> = {}): ComposeContext {
  return {
    id: toInvoiceId('inv-1'),
    invoiceNumber: 'INV-2026-001',
    currency: 'ZAR',
    defaultRate: 36,
    now: NOW,
    newId: sequentialIds(),
    ...overrides,
  }
}

const payOptions = { now: NOW, overpaymentPolicy: 'ALLOW_CREDIT' as const, newId: sequentialIds('pay') }

// ---------------------------------------------------------------------------
// 1. Valuation: volumetric and shipping weight
// ---------------------------------------------------------------------------
describe('calculateVolumetricWeight', () => {
  it('divides L×W×H by 5000', () => {
    expect(calculateVolumetricWeight({ length: 40, width: 30, height: 20 })).toBeCloseTo(4.8, 10)
  })

  it('is zero when a dimension is missing', () => {
    expect(calculateVolumetricWeight({ length: 40, width: 30 })).toBe(0)
  })

  it('is zero when a dimension is zero', () => {
    expect(calculateVolumetricWeight({ length: 40, width: 0, height: 20 })).toBe(0)
  })
})

describe('calculateShippingWeight', () => {
  it('uses the actual weight when it exceeds the volumetric weight', () => {
    expect(calculateShippingWeight({ weight: 10, length: 40, width: 30, height: 20 })).toBe(10)
  })

  it('uses the volumetric weight for a light, bulky parcel', () => {
    expect(calculateShippingWeight({ weight: 2, length: 50, width: 40, height: 30 })).toBeCloseTo(12, 10)
  })

  it('falls back to the actual weight when there are no dimensions', () => {
    expect(calculateShippingWeight({ weight: 7.25 })).toBe(7.25)
  })

  it('is zero with neither weight nor dimensions', () => {
    expect(calculateShippingWeight({})).toBe(0)
  })
})

// ---------------------------------------------------------------------------
// 2. Valuation: createLineItem
// ---------------------------------------------------------------------------
describe('createLineItem', () => {
  it('bills a 40×30×20 cm, 10 kg parcel at 36/kg as 360', () => {
    const item = createLineItem(
      { description: 'Box', weight: 10, length: 40, width: 30, height: 20, rate: 36 },
      50,
      () => 'li-new',
    )
    expect(item.kind).toBe('structured')
    expect(item.id).toBe('li-new')
    expect(item.quantity).toBe(1)
    expect(item.amount).toBe(360)
  })

  it('applies the default rate when none is given', () => {
    const item = createLineItem({ description: 'Box', weight: 5 }, 36, () => 'li-new')
    expect(item.rate).toBe(36)
    expect(item.amount).toBe(180)
  })

  it('keeps a supplied id', () => {
    expect(createLineItem({ id: 'li-7', description: 'Box', weight: 1 }, 36, () => 'unused').id).toBe('li-7')
  })

  it('rejects a negative weight', () => {
    expect(() => createLineItem({ description: 'Box', weight: -1 }, 36, () => 'x')).toThrow(ValidationError)
  })

  it('rejects a negative dimension', () => {
    expect(() => createLineItem({ description: 'Box', weight: 1, height: -20 }, 36, () => 'x')).toThrow(
      'height must be a non-negative number',
    )
  })

  it('rejects a negative rate', () => {
    expect(() => createLineItem({ description: 'Box', weight: 1, rate: -3 }, 36, () => 'x')).toThrow(ValidationError)
  })

  it('rejects a fractional quantity', () => {
    expect(() => createLineItem({ description: 'Box', quantity: 1.5 }, 36, () => 'x')).toThrow(
      'quantity must be a non-negative integer, got 1.5',
    )
  })

  it('rejects a blank description', () => {
    expect(() => createLineItem({ description: '  ', weight: 1 }, 36, () => 'x')).toThrow(ValidationError)
  })
})

// ---------------------------------------------------------------------------
// 3. Valuation: edits
// ---------------------------------------------------------------------------
describe('line item edits', () => {
  it('setLineItemRate re-derives the amount', () => {
    expect(setLineItemRate(makeLine(), 40).amount).toBe(400)
  })

  it('setLineItemRate is idempotent', () => {
    const once = setLineItemRate(makeLine(), 42.5)
    expect(setLineItemRate(once, 42.5)).toEqual(once)
  })

  it('setLineItemQuantity re-derives the amount from the shipping weight', () => {
    const item = setLineItemQuantity(makeLine({ amount: 1 }), 3)
    expect(item.quantity).toBe(3)
    expect(item.amount).toBe(360)
  })

  it('updateLineItemMeasurements leaves the amount alone', () => {
    const item = updateLineItemMeasurements(makeLine(), { weight: 20 })
    expect(item.weight).toBe(20)
    expect(item.amount).toBe(360)
  })

  it('revalueLineItem bills on the new measurements', () => {
    expect(revalueLineItem(updateLineItemMeasurements(makeLine(), { weight: 20 })).amount).toBe(720)
  })

  it('updateLineItemMeasurements rejects a negative dimension', () => {
    expect(() => updateLineItemMeasurements(makeLine(), { length: -1 })).toThrow(ValidationError)
  })

  it('applyBatchRate only touches the selected items', () => {
    const a = makeLine({ id: toLineItemId('li-a') })
    const b = makeLine({ id: toLineItemId('li-b'), weight: 5, amount: 180 })
    const [ra, rb] = applyBatchRate([a, b], new Set([toLineItemId('li-b')]), 50)
    expect(ra).toBe(a)
    expect(rb?.rate).toBe(50)
    expect(rb?.amount).toBe(250)
  })

  it('calculateRequiredRate divides the target by the total shipping weight', () => {
    const items = [makeLine({ weight: 10 }), makeLine({ id: toLineItemId('li-2'), weight: 15 })]
    expect(calculateRequiredRate(items, 1000)).toBe(40)
  })

  it('calculateRequiredRate rejects items without weight', () => {
    const { weight: _ignored, ...weightless } = makeLine()
    expect(() => calculateRequiredRate([weightless], 1000)).toThrow('No chargeable weight')
  })
})

// ---------------------------------------------------------------------------
// 4. Valuation: legacy normalisation
// ---------------------------------------------------------------------------
describe('normalizeLineItem', () => {
  it('moves a weight stored in quantity into weight', () => {
    const item = normalizeLineItem({
      id: 'li-9',
      description: 'Old row',
      quantity: 25.5,
      weight: null,
      rate: 36,
      amount: 918,
    })
    expect(item).toEqual({
      kind: 'legacy',
      id: 'li-9',
      description: 'Old row',
      quantity: 1,
      weight: 25.5,
      rate: 36,
      amount: 918,
    })
  })

  it('treats a small whole quantity without weight as a piece count', () => {
    const item = normalizeLineItem({ id: 'li-1', description: 'Row', quantity: 3, weight: null, rate: 36, amount: 0 })
    expect(item.kind).toBe('structured')
    expect(item.quantity).toBe(3)
    expect(item.weight).toBeUndefined()
  })

  it('leaves a row with a weight structured even when quantity is large', () => {
    const item = normalizeLineItem({ id: 'li-1', description: 'Row', quantity: 12, weight: 4, rate: 36, amount: 144 })
    expect(item.kind).toBe('structured')
    expect(item.quantity).toBe(12)
    expect(item.weight).toBe(4)
  })
})

// ---------------------------------------------------------------------------
// 5. Aggregator: totals and the mismatch gate
// ---------------------------------------------------------------------------
describe('calculateInvoiceTotals', () => {
  it('subtracts a discount from the subtotal', () => {
    const totals = calculateInvoiceTotals(
      [{ amount: 600 }, { amount: 400 }],
      [{ amount: 50, isAddition: false }],
    )
    expect(totals).toEqual({ subtotal: 1000, adjustmentTotal: -50, total: 950 })
  })

  it('adds a surcharge to the subtotal', () => {
    const totals = calculateInvoiceTotals([{ amount: 1000 }], [{ amount: 25, isAddition: true }])
    expect(totals.total).toBe(1025)
  })

  it('combines discounts and surcharges', () => {
    const totals = calculateInvoiceTotals(
      [{ amount: 1000 }],
      [
        { amount: 25, isAddition: true },
        { amount: 75, isAddition: false },
      ],
    )
    expect(totals.adjustmentTotal).toBe(-50)
    expect(totals.total).toBe(950)
  })
})

describe('assertTotalWithinTolerance', () => {
  it('accepts a difference of one cent', () => {
    expect(() => assertTotalWithinTolerance(950, 950.01)).not.toThrow()
  })

  it('rejects a difference above one cent and names both values', () => {
    expect(() => assertTotalWithinTolerance(950, 950.02)).toThrow(
      'Invoice total mismatch: calculated 950.00, submitted 950.02',
    )
  })

  it('raises a TotalMismatchError carrying both values', () => {
    try {
      assertTotalWithinTolerance(950, 900)
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(TotalMismatchError)
      expect(err).toBeInstanceOf(ValidationError)
      expect((err as TotalMismatchError).calculated).toBe(950)
      expect((err as TotalMismatchError).submitted).toBe(900)
    }
  })

  it('skips the comparison when no total was submitted', () => {
    expect(() => assertTotalWithinTolerance(950, undefined)).not.toThrow()
  })
})

// ---------------------------------------------------------------------------
// 6. Aggregator: composeInvoice / finalizeInvoice
// ---------------------------------------------------------------------------
describe('composeInvoice', () => {
  it('values every line and recomputes the totals', () => {
    const invoice = composeInvoice(makeDraft(), makeContext())
    expect(invoice.lineItems.map((li) => li.amount)).toEqual([360, 630])
    expect(invoice.subtotal).toBe(990)
    expect(invoice.adjustmentTotal).toBe(-40)
    expect(invoice.total).toBe(950)
    expect(invoice.status).toBe('DRAFT')
    expect(invoice.version).toBe(0)
    expect(invoice.paidAmount).toBe(0)
  })

  it('rejects a submitted total outside the tolerance', () => {
    expect(() => composeInvoice(makeDraft({ total: 960 }), makeContext())).toThrow(TotalMismatchError)
  })

  it('accepts a save without a submitted total', () => {
    const { total: _omitted, ...draft } = makeDraft()
    expect(composeInvoice(draft, makeContext()).total).toBe(950)
  })

  it('requires at least one line item', () => {
    expect(() => composeInvoice(makeDraft({ lineItems: [], total: 0 }), makeContext())).toThrow(
      'An invoice needs at least one line item',
    )
  })

  it('requires a client', () => {
    expect(() => composeInvoice(makeDraft({ clientId: '' }), makeContext())).toThrow('clientId is required')
  })

  it('rejects a negative adjustment amount', () => {
    const draft = makeDraft({ adjustments: [{ description: 'Bad', amount: -5, isAddition: true }] })
    expect(() => composeInvoice(draft, makeContext())).toThrow(ValidationError)
  })

  it('rejects two line items with the same id', () => {
    const draft = makeDraft({
      lineItems: [
        { id: 'same', description: 'Parcel A', weight: 10, rate: 36 },
        { id: 'same', description: 'Parcel B', weight: 5, rate: 36 },
      ],
    })
    expect(() => composeInvoice(draft, makeContext())).toThrow('Duplicate line item id same')
  })

  it('rejects two adjustments with the same id', () => {
    const draft = makeDraft({
      adjustments: [
        { id: 'adj', description: 'Fuel', amount: 10, isAddition: true },
        { id: 'adj', description: 'Discount', amount: 50, isAddition: false },
      ],
    })
    expect(() => composeInvoice(draft, makeContext())).toThrow('Duplicate adjustment id adj')
  })

  it('keeps payments and re-derives status when totals move under them', () => {
    const existing = makeInvoice({ total: 100, paidAmount: 100, status: 'PAID', lineItems: [] })
    const unlocked = { ...existing, status: 'SENT' as const }
    const next = composeInvoice(makeDraft(), makeContext({ existing: unlocked }))
    expect(next.paidAmount).toBe(100)
    expect(next.status).toBe('PARTIAL')
  })

  it('allows header edits on a paid invoice when the lines are unchanged', () => {
    const paid = makeInvoice({ status: 'PAID', paidAmount: 360, paidAt: NOW })
    const draft = makeDraft({
      lineItems: [{ description: 'Parcel', quantity: 1, weight: 10, rate: 36 }],
      adjustments: [],
      total: 360,
      dueDate: new Date('2026-04-30T00:00:00Z'),
    })
    const next = composeInvoice(draft, makeContext({ existing: paid }))
    expect(next.status).toBe('PAID')
    expect(next.dueDate).toEqual(new Date('2026-04-30T00:00:00Z'))
  })
})

describe('finalizeInvoice', () => {
  it('moves a draft to SENT and stamps sentAt', () => {
    const sent = finalizeInvoice(makeInvoice({ status: 'DRAFT' }), NOW)
    expect(sent.status).toBe('SENT')
    expect(sent.sentAt).toEqual(NOW)
  })

  it('refuses an invoice that is not a draft', () => {
    expect(() => finalizeInvoice(makeInvoice({ status: 'SENT' }), NOW)).toThrow(StateError)
  })

  it('issues a draft that went overdue before it was sent', () => {
    const draft = composeInvoice(makeDraft({ dueDate: new Date('2026-03-10T00:00:00Z') }), makeContext())
    expect(draft.status).toBe('OVERDUE')
    const sent = finalizeInvoice(draft, NOW)
    expect(sent.status).toBe('OVERDUE')
    expect(sent.sentAt).toEqual(NOW)
  })

  it('refuses an overdue invoice that was already sent', () => {
    const issued = makeInvoice({ status: 'OVERDUE', sentAt: new Date('2026-03-01T00:00:00Z') })
    expect(() => finalizeInvoice(issued, NOW)).toThrow(
      'Only unsent invoices can be finalized; INV-2026-001 is OVERDUE',
    )
  })
})

// ---------------------------------------------------------------------------
// 7. Reconciliation
// ---------------------------------------------------------------------------
describe('recordPayment', () => {
  it('marks a partially paid invoice PARTIAL', () => {
    const { invoice, payment } = recordPayment(makeInvoice({ total: 950 }), { amount: 400, method: 'CASH' }, payOptions)
    expect(invoice.status).toBe('PARTIAL')
    expect(invoice.paidAmount).toBe(400)
    expect(calculateOutstanding(invoice)).toBe(550)
    expect(payment.paidAt).toEqual(NOW)
    expect(invoice.payments).toHaveLength(1)
  })

  it('a 950 payment on a 950 invoice makes it PAID and locks the lines', () => {
    const ctx = makeContext()
    const draft = makeDraft()
    const sent = finalizeInvoice(composeInvoice(draft, ctx), NOW)
    const { invoice: paid } = recordPayment(sent, { amount: 950, method: 'BANK_TRANSFER' }, payOptions)
    expect(paid.status).toBe('PAID')
    expect(paid.paidAt).toEqual(NOW)

    const { total: _omitted, ...edit } = makeDraft({
      lineItems: [
        { description: 'Parcel A', weight: 10, length: 40, width: 30, height: 20, rate: 40 },
        { description: 'Parcel B', weight: 17.5, rate: 36 },
      ],
    })
    expect(() => composeInvoice(edit, { ...ctx, existing: paid })).toThrow(StateError)
  })

  it('rejects a zero amount', () => {
    expect(() => recordPayment(makeInvoice(), { amount: 0, method: 'CASH' }, payOptions)).toThrow(
      'Payment amount must be positive, got 0',
    )
  })

  it('rejects a negative amount', () => {
    expect(() => recordPayment(makeInvoice(), { amount: -10, method: 'CASH' }, payOptions)).toThrow(ValidationError)
  })

  it('tracks an overpayment as credit under ALLOW_CREDIT', () => {
    const { invoice } = recordPayment(makeInvoice(), { amount: 500, method: 'MOBILE_MONEY' }, payOptions)
    expect(invoice.status).toBe('PAID')
    expect(calculateOutstanding(invoice)).toBe(0)
    expect(calculateCredit(invoice)).toBe(140)
  })

  it('refuses an overpayment under REJECT', () => {
    expect(() =>
      recordPayment(makeInvoice(), { amount: 500, method: 'CASH' }, { ...payOptions, overpaymentPolicy: 'REJECT' }),
    ).toThrow('Payment of 500.00 exceeds the outstanding balance of 360.00')
  })

  it('accepts an exact payment under REJECT', () => {
    const { invoice } = recordPayment(
      makeInvoice(),
      { amount: 360, method: 'CASH' },
      { ...payOptions, overpaymentPolicy: 'REJECT' },
    )
    expect(invoice.status).toBe('PAID')
  })

  it('counts an identical payment twice', () => {
    const input = { amount: 100, method: 'CASH' as const, reference: 'RCPT-1' }
    const first = recordPayment(makeInvoice(), input, payOptions).invoice
    const second = recordPayment(first, input, payOptions).invoice
    expect(second.paidAmount).toBe(200)
    expect(second.payments).toHaveLength(2)
  })
})

describe('deriveInvoiceStatus', () => {
  const pastDue = new Date('2026-03-10T00:00:00Z')

  it('is OVERDUE when nothing is paid after the due date', () => {
    expect(deriveInvoiceStatus(makeInvoice({ dueDate: pastDue }), NOW)).toBe('OVERDUE')
  })

  it('stays SENT before the due date', () => {
    expect(deriveInvoiceStatus(makeInvoice(), NOW)).toBe('SENT')
  })

  it('makes an unpaid draft OVERDUE after the due date', () => {
    const draft = composeInvoice(
      makeDraft({ issueDate: new Date('2026-01-01T00:00:00Z'), dueDate: new Date('2026-01-31T00:00:00Z') }),
      makeContext({ now: new Date('2026-01-15T00:00:00Z') }),
    )
    expect(draft.status).toBe('DRAFT')
    expect(deriveInvoiceStatus(draft, new Date('2026-03-01T00:00:00Z'))).toBe('OVERDUE')
  })

  it('keeps a draft as DRAFT before the due date', () => {
    expect(deriveInvoiceStatus(makeInvoice({ status: 'DRAFT' }), NOW)).toBe('DRAFT')
  })

  it('returns an unsent overdue draft to DRAFT when the due date moves out', () => {
    expect(deriveInvoiceStatus(makeInvoice({ status: 'OVERDUE' }), NOW)).toBe('DRAFT')
  })

  it('is PARTIAL, not OVERDUE, once something is paid', () => {
    expect(deriveInvoiceStatus(makeInvoice({ dueDate: pastDue, paidAmount: 10 }), NOW)).toBe('PARTIAL')
  })

  it('returns an overdue invoice to SENT when the due date moves out', () => {
    const issued = makeInvoice({ status: 'OVERDUE', sentAt: new Date('2026-03-01T00:00:00Z') })
    expect(deriveInvoiceStatus(issued, NOW)).toBe('SENT')
  })
})

// ---------------------------------------------------------------------------
// 8. Currency projection
// ---------------------------------------------------------------------------
describe('currency projection', () => {
  it('projects 1000 ZAR to 6670 KES at 6.67', () => {
    const money = toDisplay(1000, 'KES', DEFAULT_EXCHANGE_RATES)
    expect(money.currency).toBe('KES')
    expect(money.amount).toBeCloseTo(6670, 8)
  })

  it('leaves canonical amounts unchanged', () => {
    expect(toDisplay(1000, 'ZAR', DEFAULT_EXCHANGE_RATES)).toEqual({ amount: 1000, currency: 'ZAR' })
  })

  it('round-trips through a display currency', () => {
    for (const x of [0, 0.01, 1, 950, 123456.78]) {
      const back = toCanonical(toDisplay(x, 'KES', DEFAULT_EXCHANGE_RATES).amount, 'KES', DEFAULT_EXCHANGE_RATES)
      expect(amountsMatch(back.amount, x)).toBe(true)
      expect(back.currency).toBe('ZAR')
    }
  })

  it('uses the table passed on each call', () => {
    const updated: ExchangeRateTable = {
      canonical: 'ZAR',
      currencies: [
        { code: 'ZAR', name: 'South African Rand', symbol: 'R', rate: 1 },
        { code: 'KES', name: 'Kenyan Shilling', symbol: 'KES', rate: 7 },
      ],
    }
    expect(toDisplay(100, 'KES', updated).amount).toBe(700)
    expect(toDisplay(100, 'KES', DEFAULT_EXCHANGE_RATES).amount).toBeCloseTo(667, 8)
  })

  it('rejects an unknown currency', () => {
    expect(() => toDisplay(1, 'USD', DEFAULT_EXCHANGE_RATES)).toThrow(NotFoundError)
  })

  it('rejects a zero rate', () => {
    const broken: ExchangeRateTable = {
      canonical: 'ZAR',
      currencies: [
        { code: 'ZAR', name: 'Rand', symbol: 'R', rate: 1 },
        { code: 'KES', name: 'Shilling', symbol: 'KES', rate: 0 },
      ],
    }
    expect(() => toCanonical(10, 'KES', broken)).toThrow(ValidationError)
  })
})

describe('validateExchangeRateTable', () => {
  it('accepts the default table', () => {
    expect(validateExchangeRateTable(DEFAULT_EXCHANGE_RATES)).toHaveLength(0)
  })

  it('flags a missing canonical currency and duplicates', () => {
    const errors = validateExchangeRateTable({
      canonical: 'USD',
      currencies: [
        { code: 'KES', name: 'Shilling', symbol: 'KES', rate: 6.67 },
        { code: 'KES', name: 'Shilling', symbol: 'KES', rate: 6.67 },
      ],
    })
    expect(errors).toContain('duplicate currency KES')
    expect(errors).toContain('canonical currency USD is not listed')
  })

  it('flags a canonical currency whose rate is not 1', () => {
    const errors = validateExchangeRateTable({
      canonical: 'ZAR',
      currencies: [{ code: 'ZAR', name: 'Rand', symbol: 'R', rate: 2 }],
    })
    expect(errors).toEqual(['canonical currency ZAR must have rate 1'])
  })
})

describe('validateBillingSettings', () => {
  it('accepts the defaults', () => {
    expect(validateBillingSettings(DEFAULT_BILLING_SETTINGS, DEFAULT_BILLING_SETTINGS)).toEqual([])
  })

  it('refuses to move the canonical currency', () => {
    const next = {
      ...DEFAULT_BILLING_SETTINGS,
      exchangeRates: {
        canonical: 'KES',
        currencies: [{ code: 'KES', name: 'Kenyan Shilling', symbol: 'KES', rate: 1 }],
      },
    }
    expect(validateBillingSettings(next, DEFAULT_BILLING_SETTINGS)).toEqual(['canonical currency is fixed at ZAR'])
  })

  it('rejects a negative default rate', () => {
    const next = { ...DEFAULT_BILLING_SETTINGS, defaultRate: -1 }
    expect(validateBillingSettings(next, DEFAULT_BILLING_SETTINGS)).toEqual(['defaultRate must be a non-negative number'])
  })
})
