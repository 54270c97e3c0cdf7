/**
 * Report Service
 *
 * VAT invoice report, branch-wise and service-type-wise sales. Reads stored
 * invoices only; nothing here calls the tax authority.
 */

import {
  VAT_INVOICE_STATUSES,
  hasChallan,
  isSyncable,
  type VatInvoice,
  type VatInvoiceRepository,
  type VatInvoiceStatus,
} from "../../domain/invoice/VatInvoice"
import { fromPaisa, toPaisa } from "../../domain/invoice/vatCalculation"
import type { ServiceTypeRepository } from "../../domain/reference/ReferenceData"
import type { RetailerBranchRepository } from "../../domain/retailer/Retailer"
import { ValidationError } from "../../shared/errors"

export interface ReportFilters {
  fromDate?: string | null
  toDate?: string | null
  status?: VatInvoiceStatus | null
}

export interface VatInvoiceReportFilters extends ReportFilters {
  invoiceNumber?: string | null
  orderId?: string | null
}

export interface BranchSalesFilters extends ReportFilters {
  branchId?: string | null
}

export interface ServiceTypeSalesFilters extends ReportFilters {
  serviceTypeId?: string | null
}

export interface VatInvoiceReportRow {
  id: string
  invoiceNumber: string
  invoiceDate: string
  branchId: string
  customerId: string | null
  orderId: string | null
  serviceTypeId: string
  status: VatInvoiceStatus
  challanId: string | null
  txnAmount: number
  vatAmount: number
  discountAmount: number
  totalAmount: number
  canSync: boolean
  canDownload: boolean
}

export interface VatInvoiceReportSummary {
  totalInvoices: number
  byStatus: Record<VatInvoiceStatus, number>
  transactionAmount: number
  totalSales: number
  totalVat: number
  totalDiscount: number
  uniqueCustomers: number
}

export interface ChartPoint {
  serviceTypeId: string
  serviceTypeName: string
  txnAmount: number
}

export interface VatInvoiceReport {
  rows: VatInvoiceReportRow[]
  summary: VatInvoiceReportSummary
  chart: ChartPoint[]
}

export interface SalesAggregate {
  invoiceCount: number
  txnAmount: number
  vatAmount: number
  discountAmount: number
  totalAmount: number
  returnedAmount: number
}

export interface BranchSalesRow extends SalesAggregate {
  branchId: string
  branchName: string
}

export interface ServiceTypeSalesRow extends SalesAggregate {
  serviceTypeId: string
  serviceTypeName: string
}

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/

interface PaisaTotals {
  invoiceCount: number
  txn: number
  vat: number
  discount: number
  total: number
  returned: number
}

function emptyTotals(): PaisaTotals {
  return { invoiceCount: 0, txn: 0, vat: 0, discount: 0, total: 0, returned: 0 }
}

function addInvoice(totals: PaisaTotals, invoice: VatInvoice): void {
  totals.invoiceCount++
  totals.txn += toPaisa(invoice.txnAmount)
  totals.vat += toPaisa(invoice.vatAmount)
  totals.discount += toPaisa(invoice.discountAmount)
  totals.total += toPaisa(invoice.totalAmount)
  totals.returned += toPaisa(invoice.returnedAmount)
}

function toAggregate(totals: PaisaTotals): SalesAggregate {
  return {
    invoiceCount: totals.invoiceCount,
    txnAmount: fromPaisa(totals.txn),
    vatAmount: fromPaisa(totals.vat),
    discountAmount: fromPaisa(totals.discount),
    totalAmount: fromPaisa(totals.total),
    returnedAmount: fromPaisa(totals.returned),
  }
}

function groupBy(invoices: VatInvoice[], key: (invoice: VatInvoice) => string): Map<string, PaisaTotals> {
  const groups = new Map<string, PaisaTotals>()
  for (const invoice of invoices) {
    const id = key(invoice)
    const totals = groups.get(id) ?? emptyTotals()
    addInvoice(totals, invoice)
    groups.set(id, totals)
  }
  return groups
}

function containsIgnoringCase(value: string | null, needle: string | null | undefined): boolean {
  if (!needle) {
    return true
  }
  return value !== null && value.toLowerCase().includes(needle.toLowerCase())
}

export class ReportService {
  constructor(
    private invoiceRepository: VatInvoiceRepository,
    private branchRepository: RetailerBranchRepository,
    private serviceTypeRepository: ServiceTypeRepository
  ) {}

  async vatInvoiceReport(filters: VatInvoiceReportFilters = {}): Promise<VatInvoiceReport> {
    const invoices = (await this.loadInvoices(filters)).filter(
      (invoice) =>
        containsIgnoringCase(invoice.invoiceNumber, filters.invoiceNumber)
        && containsIgnoringCase(invoice.orderId, filters.orderId)
    )

    invoices.sort(
      (a, b) => b.invoiceDate.localeCompare(a.invoiceDate) || b.createdAt.getTime() - a.createdAt.getTime()
    )

    const rows: VatInvoiceReportRow[] = invoices.map((invoice) => ({
      id: invoice.id,
      invoiceNumber: invoice.invoiceNumber,
      invoiceDate: invoice.invoiceDate,
      branchId: invoice.branchId,
      customerId: invoice.customerId,
      orderId: invoice.orderId,
      serviceTypeId: invoice.serviceTypeId,
      status: invoice.status,
      challanId: invoice.challanId,
      txnAmount: invoice.txnAmount,
      vatAmount: invoice.vatAmount,
      discountAmount: invoice.discountAmount,
      totalAmount: invoice.totalAmount,
      canSync: isSyncable(invoice.status),
      canDownload: hasChallan(invoice.status) && invoice.challanId !== null,
    }))

    const statusCounts: Record<VatInvoiceStatus, number> = {
      Pending: 0,
      Synced: 0,
      Failed: 0,
      Return: 0,
      "Partly Return": 0,
    }
    const totals = emptyTotals()
    const customers = new Set<string>()

    for (const invoice of invoices) {
      statusCounts[invoice.status]++
      addInvoice(totals, invoice)
      if (invoice.customerId) {
        customers.add(invoice.customerId)
      }
    }

    const serviceTypeNames = await this.serviceTypeNames()
    const chart: ChartPoint[] = [...groupBy(invoices, (invoice) => invoice.serviceTypeId)]
      .map(([serviceTypeId, group]) => ({
        serviceTypeId,
        serviceTypeName: serviceTypeNames.get(serviceTypeId) ?? serviceTypeId,
        txnAmount: fromPaisa(group.txn),
      }))
      .sort((a, b) => a.serviceTypeName.localeCompare(b.serviceTypeName))

    return {
      rows,
      summary: {
        totalInvoices: invoices.length,
        byStatus: statusCounts,
        transactionAmount: fromPaisa(totals.txn),
        totalSales: fromPaisa(totals.total),
        totalVat: fromPaisa(totals.vat),
        totalDiscount: fromPaisa(totals.discount),
        uniqueCustomers: customers.size,
      },
      chart,
    }
  }

  async branchWiseSales(filters: BranchSalesFilters = {}): Promise<BranchSalesRow[]> {
    const invoices = (await this.loadInvoices(filters)).filter(
      (invoice) => !filters.branchId || invoice.branchId === filters.branchId
    )

    const rows: BranchSalesRow[] = []
    for (const [branchId, totals] of groupBy(invoices, (invoice) => invoice.branchId)) {
      const branch = await this.branchRepository.findById(branchId)
      rows.push({
        branchId,
        branchName: branch?.branchName ?? branchId,
        ...toAggregate(totals),
      })
    }

    return rows.sort((a, b) => a.branchName.localeCompare(b.branchName))
  }

  async serviceTypeWiseSales(filters: ServiceTypeSalesFilters = {}): Promise<ServiceTypeSalesRow[]> {
    const invoices = (await this.loadInvoices(filters)).filter(
      (invoice) => !filters.serviceTypeId || invoice.serviceTypeId === filters.serviceTypeId
    )

    const serviceTypeNames = await this.serviceTypeNames()
    const rows: ServiceTypeSalesRow[] = [...groupBy(invoices, (invoice) => invoice.serviceTypeId)].map(
      ([serviceTypeId, totals]) => ({
        serviceTypeId,
        serviceTypeName: serviceTypeNames.get(serviceTypeId) ?? serviceTypeId,
        ...toAggregate(totals),
      })
    )

    return rows.sort(
      (a, b) => b.totalAmount - a.totalAmount || a.serviceTypeName.localeCompare(b.serviceTypeName)
    )
  }

  private async loadInvoices(filters: ReportFilters): Promise<VatInvoice[]> {
    const fromDate = filters.fromDate || null
    const toDate = filters.toDate || null

    if (fromDate && !DATE_PATTERN.test(fromDate)) {
      throw new ValidationError("from_date must be YYYY-MM-DD", "fromDate")
    }
    if (toDate && !DATE_PATTERN.test(toDate)) {
      throw new ValidationError("to_date must be YYYY-MM-DD", "toDate")
    }
    if (filters.status && !VAT_INVOICE_STATUSES.includes(filters.status)) {
      throw new ValidationError(`Unknown status: ${filters.status}`, "status")
    }

    const invoices = await this.invoiceRepository.findByInvoiceDateRange(fromDate, toDate)
    return invoices.filter((invoice) => !filters.status || invoice.status === filters.status)
  }

  private async serviceTypeNames(): Promise<Map<string, string>> {
    const serviceTypes = await this.serviceTypeRepository.findAll()
    return new Map(serviceTypes.map((serviceType) => [serviceType.remoteId, serviceType.name]))
  }
}
