/**
 * VAT amounts
 *
 * Money is computed in integer paisa and returned in taka with two decimals.
 */

import type { VatCommissionRate } from "../reference/ReferenceData"
import type { VatInvoiceItem } from "./VatInvoice"

export function toPaisa(amount: number): number {
  return Math.round(amount * 100)
}

export function fromPaisa(paisa: number): number {
  return paisa / 100
}

export function roundMoney(amount: number): number {
  return fromPaisa(toPaisa(amount))
}

export interface VatTotals {
  txnAmount: number
  vatAmount: number
  totalAmount: number
}

export function calculateVat(
  items: VatInvoiceItem[],
  vatPercentage: number,
  discountAmount: number,
  serviceChargesAmount: number
): VatTotals {
  const txnPaisa = items.reduce((sum, item) => sum + toPaisa(item.amount), 0)
  const vatPaisa = Math.round((txnPaisa * vatPercentage) / 100)
  const totalPaisa = txnPaisa + vatPaisa - toPaisa(discountAmount) + toPaisa(serviceChargesAmount)

  return {
    txnAmount: fromPaisa(txnPaisa),
    vatAmount: fromPaisa(vatPaisa),
    totalAmount: fromPaisa(totalPaisa),
  }
}

export function vatOn(amount: number, vatPercentage: number): number {
  return fromPaisa(Math.round((toPaisa(amount) * vatPercentage) / 100))
}

export interface RateScope {
  zoneId: string
  divisionId: string
  circleId: string
  serviceTypeId: string
}

function specificity(rate: VatCommissionRate): number {
  return (rate.circleId ? 4 : 0) + (rate.divisionId ? 2 : 0) + (rate.serviceTypeId ? 1 : 0)
}

/**
 * Most specific commission rate covering the scope: circle beats division
 * beats service type. Ties go to the lowest remote ID.
 */
export function resolveCommissionRate(
  rates: VatCommissionRate[],
  scope: RateScope
): VatCommissionRate | null {
  const candidates = rates.filter(
    (rate) =>
      rate.zoneId === scope.zoneId
      && (rate.divisionId === null || rate.divisionId === scope.divisionId)
      && (rate.circleId === null || rate.circleId === scope.circleId)
      && (rate.serviceTypeId === null || rate.serviceTypeId === scope.serviceTypeId)
  )

  if (candidates.length === 0) {
    return null
  }

  candidates.sort((a, b) => {
    const bySpecificity = specificity(b) - specificity(a)
    return bySpecificity !== 0 ? bySpecificity : a.remoteId.localeCompare(b.remoteId)
  })

  return candidates[0] ?? null
}
