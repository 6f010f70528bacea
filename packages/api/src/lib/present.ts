// ---------------------------------------------------------------------------
// Response shaping for invoices
// ---------------------------------------------------------------------------

import {
  calculateCredit,
  calculateOutstanding,
  calculateShippingWeight,
  calculateVolumetricWeight,
  toDisplay,
} from '@waybill/domain'
import type { ExchangeRateTable, Invoice, LineItem } from '@waybill/domain'

function presentLineItem(item: LineItem) {
  return {
    ...item,
    volumetricWeight: calculateVolumetricWeight(item),
    shippingWeight: calculateShippingWeight(item),
  }
}

/**
 * Adds the derived balances to an invoice. With `currency`, the monetary
 * figures are also projected through `rates` into a `display` block; the
 * canonical figures are always returned unchanged.
 */
export function presentInvoice(invoice: Invoice, projection?: { currency: string; rates: ExchangeRateTable }) {
  const outstanding = calculateOutstanding(invoice)
  const credit = calculateCredit(invoice)
  const base = {
    ...invoice,
    lineItems: invoice.lineItems.map(presentLineItem),
    outstanding,
    credit,
  }
  if (!projection) return base

  const project = (amount: number) => toDisplay(amount, projection.currency, projection.rates).amount
  return {
    ...base,
    display: {
      currency: projection.currency,
      subtotal: project(invoice.subtotal),
      adjustmentTotal: project(invoice.adjustmentTotal),
      total: project(invoice.total),
      paidAmount: project(invoice.paidAmount),
      outstanding: project(outstanding),
      credit: project(credit),
      lineItems: invoice.lineItems.map((item) => ({ id: item.id, amount: project(item.amount) })),
    },
  }
}
