/**
 * Reports API Handler (Lambda Function)
 *
 * GET /api/reports/vat-invoices - VAT invoice report with summary and chart
 * GET /api/reports/branch-wise-sales - Sales per branch
 * GET /api/reports/service-type-wise-sales - Sales per service type
 *
 * Common filters: from_date, to_date (YYYY-MM-DD, inclusive), status
 */

import type { APIGatewayProxyEvent, APIGatewayProxyResult } from "aws-lambda"
import type { ReportFilters } from "../../../application/report/ReportService"
import { VAT_INVOICE_STATUSES } from "../../../domain/invoice/VatInvoice"
import { ValidationError } from "../../../shared/errors"
import type { JsonObject } from "../../../shared/types"
import { getContext } from "../../context"
import { optionalString } from "../../input"
import { errorResponse, ok, query } from "../http"

function readFilters(params: JsonObject): ReportFilters {
  const status = optionalString(params, "status")
  const matched = status === null ? null : VAT_INVOICE_STATUSES.find((candidate) => candidate === status)
  if (matched === undefined) {
    throw new ValidationError(`Unknown status: ${status}`, "status")
  }

  return {
    fromDate: optionalString(params, "from_date"),
    toDate: optionalString(params, "to_date"),
    status: matched,
  }
}

export async function vatInvoiceReportHandler(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const params = query(event)
    const report = await getContext().reports.vatInvoiceReport({
      ...readFilters(params),
      invoiceNumber: optionalString(params, "invoice_number"),
      orderId: optionalString(params, "order_id"),
    })
    return ok(report)
  } catch (error) {
    return errorResponse(error, "ReportsAPI")
  }
}

export async function branchWiseSalesHandler(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const params = query(event)
    const rows = await getContext().reports.branchWiseSales({
      ...readFilters(params),
      branchId: optionalString(params, "branch_id"),
    })
    return ok(rows)
  } catch (error) {
    return errorResponse(error, "ReportsAPI")
  }
}

export async function serviceTypeWiseSalesHandler(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const params = query(event)
    const rows = await getContext().reports.serviceTypeWiseSales({
      ...readFilters(params),
      serviceTypeId: optionalString(params, "service_type_id"),
    })
    return ok(rows)
  } catch (error) {
    return errorResponse(error, "ReportsAPI")
  }
}
