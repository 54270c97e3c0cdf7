/**
 * Point-of-sale payloads, as sent by the POS on finalization and on return
 */

import type {
  PosTransaction,
  PosTransactionItem,
  VatInvoiceReturnInput,
} from "../application/invoice/VatInvoiceService"
import type { JsonObject } from "../shared/types"
import {
  objectList,
  optionalNumber,
  optionalString,
  requireNumber,
  requireString,
} from "./input"

function readItem(source: JsonObject): PosTransactionItem {
  const item: PosTransactionItem = {
    itemCode: requireString(source, "item_code"),
    itemName: optionalString(source, "item_name") ?? "",
    qty: requireNumber(source, "qty"),
    rate: requireNumber(source, "rate"),
  }
  const amount = optionalNumber(source, "amount")
  if (amount !== null) {
    item.amount = amount
  }
  return item
}

export function readPosTransaction(source: JsonObject): PosTransaction {
  return {
    sourceInvoiceNo: requireString(source, "name"),
    invoiceDate: requireString(source, "posting_date"),
    branchId: requireString(source, "branch_id"),
    serviceTypeId: requireString(source, "service_type_id"),
    customerId: optionalString(source, "customer"),
    orderId: optionalString(source, "order_id"),
    paymentMethod: optionalString(source, "payment_method"),
    items: objectList(source, "items").map(readItem),
    discountAmount: optionalNumber(source, "discount_amount") ?? 0,
    serviceChargesAmount: optionalNumber(source, "service_charges_amount") ?? 0,
  }
}

export function readReturnInput(source: JsonObject): VatInvoiceReturnInput {
  return {
    returnAgainst: optionalString(source, "return_against"),
    invoiceId: optionalString(source, "invoice_id"),
    returnInvoiceNo: requireString(source, "return_invoice_no"),
    returnDate: requireString(source, "return_date"),
    items: objectList(source, "items").map((line) => ({
      itemCode: requireString(line, "item_code"),
      qty: Math.abs(requireNumber(line, "qty")),
    })),
  }
}

/** A POS return carries the original transaction in return_against */
export function isReturnTransaction(source: JsonObject): boolean {
  return source.is_return === true || source.is_return === 1 || optionalString(source, "return_against") !== null
}
