// ---------------------------------------------------------------------------
// Finance bounded context
// Read-only collection reports built on reconciled invoices: overdue
// follow-ups, per-client statements and per-trip worksheets.
// ---------------------------------------------------------------------------

import type { ClientId } from '../shared/types'
import { roundCents } from '../shared/types'
import type { Invoice, InvoiceId } from '../billing/types'
import { calculateOutstanding, reconcileInvoice } from '../billing/reconciliation'

const DAY_MS = 86_400_000

// ---------------------------------------------------------------------------
// Overdue follow-ups
// ---------------------------------------------------------------------------

export interface OverdueInvoice {
  readonly invoiceId: InvoiceId
  readonly invoiceNumber: string
  readonly clientId: ClientId
  readonly dueDate: Date
  readonly daysOverdue: number
  readonly total: number
  readonly paidAmount: number
  readonly outstanding: number
}

export interface OverdueReport {
  readonly invoices: readonly OverdueInvoice[]
  readonly totalOverdue: number
  readonly count: number
}

/** Whole days between `dueDate` and `now`, floored; 0 when not yet due. */
export function daysOverdue(dueDate: Date, now: Date): number {
  return Math.max(Math.floor((now.getTime() - dueDate.getTime()) / DAY_MS), 0)
}

/**
 * Unpaid invoices past their due date, most overdue first. Drafts are
 * included once overdue, and partially paid invoices by their balance.
 */
export function listOverdueInvoices(invoices: readonly Invoice[], now: Date): OverdueReport {
  const rows: OverdueInvoice[] = []
  for (const raw of invoices) {
    const inv = reconcileInvoice(raw, now)
    if (inv.status === 'PAID') continue
    if (inv.dueDate >= now) continue
    const outstanding = calculateOutstanding(inv)
    if (outstanding <= 0) continue
    rows.push({
      invoiceId: inv.id,
      invoiceNumber: inv.invoiceNumber,
      clientId: inv.clientId,
      dueDate: inv.dueDate,
      daysOverdue: daysOverdue(inv.dueDate, now),
      total: inv.total,
      paidAmount: inv.paidAmount,
      outstanding,
    })
  }
  rows.sort((a, b) => b.daysOverdue - a.daysOverdue)
  const totalOverdue = roundCents(rows.reduce((sum, r) => sum + r.outstanding, 0))
  return { invoices: rows, totalOverdue, count: rows.length }
}

// ---------------------------------------------------------------------------
// Client statements
// ---------------------------------------------------------------------------

export interface ClientStatement {
  readonly clientId: ClientId
  readonly invoiceCount: number
  readonly totalOutstanding: number
  readonly overdueAmount: number
  readonly hasOverdue: boolean
}

export interface StatementSummary {
  readonly statements: readonly ClientStatement[]
  readonly totalOutstanding: number
  readonly overdueAmount: number
}

/** Groups unpaid invoices by client. Clients with nothing outstanding are omitted. */
export function summarizeClientStatements(invoices: readonly Invoice[], now: Date): StatementSummary {
  const byClient = new Map<ClientId, { count: number; outstanding: number; overdue: number }>()
  for (const raw of invoices) {
    const inv = reconcileInvoice(raw, now)
    const outstanding = calculateOutstanding(inv)
    if (inv.status === 'PAID' || outstanding <= 0) continue
    const entry = byClient.get(inv.clientId) ?? { count: 0, outstanding: 0, overdue: 0 }
    entry.count += 1
    entry.outstanding += outstanding
    if (inv.status === 'OVERDUE') entry.overdue += outstanding
    byClient.set(inv.clientId, entry)
  }

  const statements: ClientStatement[] = [...byClient.entries()]
    .map(([clientId, e]) => ({
      clientId,
      invoiceCount: e.count,
      totalOutstanding: roundCents(e.outstanding),
      overdueAmount: roundCents(e.overdue),
      hasOverdue: e.overdue > 0,
    }))
    .sort((a, b) => b.totalOutstanding - a.totalOutstanding)

  return {
    statements,
    totalOutstanding: roundCents(statements.reduce((sum, s) => sum + s.totalOutstanding, 0)),
    overdueAmount: roundCents(statements.reduce((sum, s) => sum + s.overdueAmount, 0)),
  }
}

// ---------------------------------------------------------------------------
// Trip worksheet
// ---------------------------------------------------------------------------

export interface TripWorksheetSummary {
  readonly totalRevenue: number
  readonly totalCollected: number
  readonly totalOutstanding: number
  /** Collected as a percentage of revenue, one decimal. */
  readonly collectionPercent: number
  readonly invoicesPaid: number
  readonly invoicesTotal: number
}

export function summarizeTripWorksheet(invoices: readonly Invoice[], now: Date): TripWorksheetSummary {
  let revenue = 0
  let collected = 0
  let outstanding = 0
  let paid = 0
  for (const raw of invoices) {
    const inv = reconcileInvoice(raw, now)
    revenue += inv.total
    collected += inv.paidAmount
    outstanding += calculateOutstanding(inv)
    if (inv.status === 'PAID') paid += 1
  }
  return {
    totalRevenue: roundCents(revenue),
    totalCollected: roundCents(collected),
    totalOutstanding: roundCents(outstanding),
    collectionPercent: revenue > 0 ? Math.round((collected / revenue) * 1000) / 10 : 0,
    invoicesPaid: paid,
    invoicesTotal: invoices.length,
  }
}
