/**
 * VAT Invoices API Handler (Lambda Function)
 *
 * GET /api/vat-invoices/{id} - Get single VAT invoice
 * POST /api/vat-invoices/{id}/sync - Submit one invoice to the tax authority
 * POST /api/vat-invoices/sync - Submit every Pending and Failed invoice
 * POST /api/vat-invoices/returns - Record a return against a synced invoice
 * GET /api/vat-invoices/{id}/schallan - Download the challan, ?format=pdf|xml
 */

import type { APIGatewayProxyEvent, APIGatewayProxyResult } from "aws-lambda"
import { getContext } from "../../context"
import { optionalString } from "../../input"
import { readReturnInput } from "../../posTransaction"
import { body, errorResponse, ok, pathParameter, query } from "../http"

export async function getVatInvoiceHandler(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    return ok(await getContext().invoices.getVatInvoice(pathParameter(event, "id")))
  } catch (error) {
    return errorResponse(error, "VatInvoicesAPI")
  }
}

/**
 * Remote rejections are part of the result, not an error response
 */
export async function syncVatInvoiceHandler(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const result = await getContext().invoices.syncVatInvoice(pathParameter(event, "id"))
    return ok(result, result.message)
  } catch (error) {
    return errorResponse(error, "VatInvoicesAPI")
  }
}

export async function autoSyncVatInvoicesHandler(): Promise<APIGatewayProxyResult> {
  try {
    const summary = await getContext().invoices.autoSyncVatInvoices()
    return ok(summary, `${summary.synced} of ${summary.total} VAT invoices synced`)
  } catch (error) {
    return errorResponse(error, "VatInvoicesAPI")
  }
}

export async function returnVatInvoiceHandler(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const invoice = await getContext().invoices.returnVatInvoice(readReturnInput(body(event)))
    return ok(invoice, `VAT invoice ${invoice.invoiceNumber} is now ${invoice.status}`)
  } catch (error) {
    return errorResponse(error, "VatInvoicesAPI")
  }
}

export async function downloadSchallanHandler(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const format = optionalString(query(event), "format") ?? "pdf"
    const result = await getContext().invoices.downloadSchallan(pathParameter(event, "id"), format)
    return ok(result)
  } catch (error) {
    return errorResponse(error, "VatInvoicesAPI")
  }
}
