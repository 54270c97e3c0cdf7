/**
 * VAT Invoice Service
 *
 * Lifecycle of VAT invoices: creation from point-of-sale transactions,
 * submission to the tax authority, returns and challan download.
 *
 * Key Features:
 * - One invoice per source transaction
 * - Remote and configuration failures during sync are stored on the
 *   invoice, never thrown
 * - Every exchange with the authority is appended to a bounded response log
 * - Charged amounts are fixed at creation; returns accumulate separately
 */

import type { VendorConfigurationRepository } from "../../domain/configuration/VendorConfiguration"
import {
  appendResponseLog,
  canTransition,
  compareByCreation,
  hasChallan,
  isSyncable,
  type ResponseLogEntry,
  type ResponseLogOperation,
  type VatInvoice,
  type VatInvoiceItem,
  type VatInvoiceRepository,
  type VatInvoiceReturnItem,
  type VatInvoiceStatus,
  truncateText,
} from "../../domain/invoice/VatInvoice"
import { calculateVat, fromPaisa, resolveCommissionRate, roundMoney, toPaisa, vatOn } from "../../domain/invoice/vatCalculation"
import type { VatCommissionRateRepository } from "../../domain/reference/ReferenceData"
import type {
  RetailerBranchRegistration,
  RetailerBranchRepository,
  RetailerRegistration,
  RetailerRepository,
} from "../../domain/retailer/Retailer"
import type { ChallanApiClient } from "../../infrastructure/authority/ChallanApiClient"
import type { AuthorityResult, SchallanFormat } from "../../infrastructure/authority/types"
import type { FileStore } from "../../infrastructure/files/FileStore"
import {
  AuthenticationError,
  ConfigurationError,
  ConflictError,
  NotFoundError,
  RemoteApiError,
  ValidationError,
  errorMessage,
} from "../../shared/errors"
import { readIdentifier } from "../../shared/types"

export interface PosTransactionItem {
  itemCode: string
  itemName: string
  qty: number
  rate: number
  /** Defaults to qty x rate */
  amount?: number
}

export interface PosTransaction {
  sourceInvoiceNo: string
  invoiceDate: string
  branchId: string
  serviceTypeId: string
  customerId?: string | null
  orderId?: string | null
  paymentMethod?: string | null
  items: PosTransactionItem[]
  discountAmount?: number
  serviceChargesAmount?: number
}

export interface VatInvoiceReturnInput {
  /** Source transaction number of the original sale */
  returnAgainst?: string | null
  invoiceId?: string | null
  returnInvoiceNo: string
  returnDate: string
  items: Array<{ itemCode: string; qty: number }>
}

export interface CreateVatInvoiceResult {
  invoice: VatInvoice
  created: boolean
  sync: VatInvoiceSyncResult | null
}

export interface VatInvoiceSyncResult {
  invoiceId: string
  success: boolean
  status: VatInvoiceStatus
  message: string
  challanId?: string
}

export interface AutoSyncSummary {
  total: number
  synced: number
  failed: number
  results: VatInvoiceSyncResult[]
  duration: number
}

export interface SchallanDownloadResult {
  invoiceId: string
  challanId: string
  format: SchallanFormat
  fileUrl: string
}

const SCHALLAN_FORMATS: readonly SchallanFormat[] = ["pdf", "xml"]
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/

function isSchallanFormat(value: string): value is SchallanFormat {
  return SCHALLAN_FORMATS.some((format) => format === value)
}

type AuthorityFailure = RemoteApiError | AuthenticationError | ConfigurationError

function isAuthorityFailure(error: unknown): error is AuthorityFailure {
  return error instanceof RemoteApiError || error instanceof AuthenticationError || error instanceof ConfigurationError
}

function failureStatus(error: AuthorityFailure): number {
  if (error instanceof RemoteApiError) {
    return error.remoteStatus
  }
  // No request reached the authority
  return error instanceof AuthenticationError ? error.statusCode : 0
}

function logEntry(
  operation: ResponseLogOperation,
  outcome: { success: true; result: AuthorityResult } | { success: false; error: AuthorityFailure }
): ResponseLogEntry {
  if (outcome.success) {
    return {
      operation,
      success: true,
      httpStatus: outcome.result.httpStatus,
      body: outcome.result.raw,
      message: outcome.result.message,
      at: new Date(),
    }
  }

  const { error } = outcome
  return {
    operation,
    success: false,
    httpStatus: failureStatus(error),
    body: error instanceof ConfigurationError ? null : error.responseBody ?? null,
    message: error.message,
    at: new Date(),
  }
}

interface ItemTotals {
  qty: number
  amountPaisa: number
}

function totalsByItem(items: Array<{ itemCode: string; qty: number; amount: number }>): Map<string, ItemTotals> {
  const totals = new Map<string, ItemTotals>()
  for (const item of items) {
    const current = totals.get(item.itemCode) ?? { qty: 0, amountPaisa: 0 }
    totals.set(item.itemCode, {
      qty: current.qty + item.qty,
      amountPaisa: current.amountPaisa + toPaisa(item.amount),
    })
  }
  return totals
}

export class VatInvoiceService {
  constructor(
    private invoiceRepository: VatInvoiceRepository,
    private retailerRepository: RetailerRepository,
    private branchRepository: RetailerBranchRepository,
    private vatCommissionRateRepository: VatCommissionRateRepository,
    private configurationRepository: VendorConfigurationRepository,
    private apiClient: ChallanApiClient,
    private fileStore: FileStore
  ) {}

  async getVatInvoice(id: string): Promise<VatInvoice> {
    const invoice = await this.invoiceRepository.findById(id)
    if (!invoice) {
      throw new NotFoundError("VAT invoice")
    }
    return invoice
  }

  async createFromPosTransaction(transaction: PosTransaction): Promise<CreateVatInvoiceResult> {
    if (!transaction.sourceInvoiceNo || !transaction.branchId || !transaction.serviceTypeId) {
      throw new ValidationError("source_invoice_no, branch_id and service_type_id are required")
    }
    if (!DATE_PATTERN.test(transaction.invoiceDate)) {
      throw new ValidationError("invoice_date must be YYYY-MM-DD", "invoiceDate")
    }
    if (!transaction.items || transaction.items.length === 0) {
      throw new ValidationError("A POS transaction needs at least one item", "items")
    }

    const existing = await this.invoiceRepository.findBySourceInvoiceNo(transaction.sourceInvoiceNo)
    if (existing) {
      console.log(`[VatInvoice] Invoice ${existing.id} already exists for ${transaction.sourceInvoiceNo}`)
      return { invoice: existing, created: false, sync: null }
    }

    const { branch, retailer } = await this.requireRegisteredBranch(transaction.branchId)

    const rates = await this.vatCommissionRateRepository.findAll()
    const rate = resolveCommissionRate(rates, {
      zoneId: branch.zoneId,
      divisionId: branch.divisionId,
      circleId: branch.circleId,
      serviceTypeId: transaction.serviceTypeId,
    })
    if (!rate) {
      throw new ValidationError(
        `No VAT commission rate covers branch ${branch.branchName} and service type ${transaction.serviceTypeId}`,
        "vatCommissionRateId"
      )
    }

    const items: VatInvoiceItem[] = transaction.items.map((item) => {
      if (!item.itemCode || !(item.qty > 0) || !(item.rate >= 0)) {
        throw new ValidationError(`Invalid item ${item.itemCode || "(no code)"}: qty must be positive, rate not negative`, "items")
      }
      return {
        itemCode: item.itemCode,
        itemName: item.itemName || item.itemCode,
        qty: item.qty,
        rate: item.rate,
        amount: roundMoney(item.amount ?? item.qty * item.rate),
      }
    })

    const discountAmount = roundMoney(transaction.discountAmount ?? 0)
    const serviceChargesAmount = roundMoney(transaction.serviceChargesAmount ?? 0)
    const totals = calculateVat(items, rate.rate, discountAmount, serviceChargesAmount)

    let invoice: VatInvoice
    try {
      invoice = await this.invoiceRepository.create({
        sourceInvoiceNo: transaction.sourceInvoiceNo,
        invoiceNumber: transaction.sourceInvoiceNo,
        invoiceDate: transaction.invoiceDate,
        retailerId: retailer.id,
        branchId: branch.id,
        customerId: transaction.customerId ?? null,
        orderId: transaction.orderId ?? null,
        serviceTypeId: transaction.serviceTypeId,
        paymentMethod: transaction.paymentMethod ?? null,
        items,
        txnAmount: totals.txnAmount,
        vatPercentage: rate.rate,
        vatAmount: totals.vatAmount,
        discountAmount,
        serviceChargesAmount,
        totalAmount: totals.totalAmount,
        vatCommissionRateId: rate.remoteId,
      })
    } catch (error) {
      if (!(error instanceof ConflictError)) {
        throw error
      }
      // Concurrent delivery of the same transaction won the write
      const winner = await this.invoiceRepository.findBySourceInvoiceNo(transaction.sourceInvoiceNo)
      if (!winner) {
        throw error
      }
      console.log(`[VatInvoice] Invoice ${winner.id} already exists for ${transaction.sourceInvoiceNo}`)
      return { invoice: winner, created: false, sync: null }
    }

    console.log(
      `[VatInvoice] Created ${invoice.id} for ${transaction.sourceInvoiceNo}: ` +
      `txn ${invoice.txnAmount}, VAT ${invoice.vatAmount} at ${invoice.vatPercentage}%`
    )

    const configuration = await this.configurationRepository.get()
    if (configuration?.syncSchedule !== "After Submit") {
      return { invoice, created: true, sync: null }
    }

    let sync: VatInvoiceSyncResult
    try {
      sync = await this.syncVatInvoice(invoice.id)
    } catch (error) {
      console.error(`[VatInvoice] Sync after submit of ${invoice.id} failed:`, error)
      sync = { invoiceId: invoice.id, success: false, status: invoice.status, message: errorMessage(error) }
    }
    return { invoice: await this.getVatInvoice(invoice.id), created: true, sync }
  }

  async syncVatInvoice(id: string): Promise<VatInvoiceSyncResult> {
    const invoice = await this.getVatInvoice(id)

    if (!isSyncable(invoice.status)) {
      return {
        invoiceId: invoice.id,
        success: true,
        status: invoice.status,
        message: "VAT invoice already synced",
        ...(invoice.challanId ? { challanId: invoice.challanId } : {}),
      }
    }

    const { branch, retailer } = await this.requireRegisteredBranch(invoice.branchId)

    let result: AuthorityResult
    try {
      const companyId = await this.apiClient.getCompanyId()
      result = await this.apiClient.submitChallan({
        company_id: companyId,
        invoice_no: invoice.invoiceNumber,
        invoice_date: invoice.invoiceDate,
        retailer_id: retailer.remoteRetailerId ?? "",
        branch_id: branch.remoteBranchId ?? "",
        customer_id: invoice.customerId,
        order_id: invoice.orderId,
        service_type_id: invoice.serviceTypeId,
        payment_method: invoice.paymentMethod,
        vat_commissionrate_id: invoice.vatCommissionRateId,
        txn_amount: invoice.txnAmount,
        total_sd_percentage: invoice.vatPercentage,
        total_sd_amount: invoice.vatAmount,
        total_discount_amount: invoice.discountAmount,
        total_service_charges_amount: invoice.serviceChargesAmount,
        total_amount: invoice.totalAmount,
        items: invoice.items.map((item) => ({
          item_code: item.itemCode,
          item_name: item.itemName,
          qty: item.qty,
          rate: item.rate,
          amount: item.amount,
        })),
      })
    } catch (error) {
      if (!isAuthorityFailure(error)) {
        throw error
      }
      return this.markFailed(invoice, error)
    }

    const challanId = readIdentifier(result.data, "challan_id")
    if (!challanId) {
      return this.markFailed(
        invoice,
        new RemoteApiError("Challan response carries no challan_id", result.httpStatus, result.raw)
      )
    }

    await this.invoiceRepository.update(invoice.id, {
      status: "Synced",
      challanId,
      lastError: null,
      responseLog: appendResponseLog(invoice.responseLog, logEntry("SUBMIT", { success: true, result })),
    })

    console.log(`[VatInvoice] ${invoice.id} synced, challan ${challanId}`)

    return {
      invoiceId: invoice.id,
      success: true,
      status: "Synced",
      message: result.message ?? "VAT invoice synced",
      challanId,
    }
  }

  /**
   * Sequential, oldest first. One invoice failing never stops the batch.
   */
  async autoSyncVatInvoices(): Promise<AutoSyncSummary> {
    const startTime = Date.now()
    const invoices = await this.invoiceRepository.findByStatuses(["Pending", "Failed"])
    invoices.sort(compareByCreation)

    console.log(`[VatInvoice] Auto sync of ${invoices.length} pending or failed invoices`)

    const results: VatInvoiceSyncResult[] = []
    for (const invoice of invoices) {
      try {
        results.push(await this.syncVatInvoice(invoice.id))
      } catch (error) {
        console.error(`[VatInvoice] Sync of ${invoice.id} failed:`, error)
        results.push({
          invoiceId: invoice.id,
          success: false,
          status: invoice.status,
          message: errorMessage(error),
        })
      }
    }

    const synced = results.filter((r) => r.success).length
    const summary: AutoSyncSummary = {
      total: results.length,
      synced,
      failed: results.length - synced,
      results,
      duration: Date.now() - startTime,
    }

    console.log(
      `[VatInvoice] Auto sync done: ${summary.synced} synced, ${summary.failed} failed in ${summary.duration}ms`
    )

    return summary
  }

  async returnVatInvoice(input: VatInvoiceReturnInput): Promise<VatInvoice> {
    if (!input.returnInvoiceNo) {
      throw new ValidationError("return_invoice_no is required", "returnInvoiceNo")
    }
    if (!DATE_PATTERN.test(input.returnDate)) {
      throw new ValidationError("return_date must be YYYY-MM-DD", "returnDate")
    }
    if (!input.items || input.items.length === 0) {
      throw new ValidationError("A return needs at least one item", "items")
    }

    const invoice = await this.findOriginal(input)

    if (invoice.status !== "Synced" && invoice.status !== "Partly Return") {
      throw new ValidationError(
        `VAT invoice ${invoice.invoiceNumber} is ${invoice.status}; only synced invoices can be returned`,
        "status"
      )
    }
    if (!invoice.challanId) {
      throw new ValidationError(`VAT invoice ${invoice.invoiceNumber} has no challan ID`, "challanId")
    }
    if (invoice.returns.some((entry) => entry.returnInvoiceNo === input.returnInvoiceNo)) {
      throw new ConflictError(`Return ${input.returnInvoiceNo} is already recorded on ${invoice.invoiceNumber}`)
    }

    const original = totalsByItem(invoice.items)
    const alreadyReturned = totalsByItem(invoice.returns.flatMap((entry) => entry.items))
    const requested = new Map<string, number>()

    for (const line of input.items) {
      if (!(line.qty > 0)) {
        throw new ValidationError(`Returned quantity of ${line.itemCode} must be positive`, "items")
      }
      if (!original.has(line.itemCode)) {
        throw new ValidationError(`Item ${line.itemCode} is not on VAT invoice ${invoice.invoiceNumber}`, "items")
      }
      requested.set(line.itemCode, (requested.get(line.itemCode) ?? 0) + line.qty)
    }

    const returnItems: VatInvoiceReturnItem[] = []
    for (const [itemCode, qty] of requested) {
      const sold = original.get(itemCode) ?? { qty: 0, amountPaisa: 0 }
      const previous = alreadyReturned.get(itemCode)?.qty ?? 0
      if (previous + qty > sold.qty) {
        throw new ValidationError(
          `Cannot return ${qty} of ${itemCode}: ${sold.qty - previous} of ${sold.qty} remain returnable`,
          "items"
        )
      }
      returnItems.push({
        itemCode,
        qty,
        amount: fromPaisa(Math.round((sold.amountPaisa * qty) / sold.qty)),
      })
    }

    const amount = fromPaisa(returnItems.reduce((sum, item) => sum + toPaisa(item.amount), 0))
    const vatAmount = vatOn(amount, invoice.vatPercentage)

    let result: AuthorityResult
    try {
      const companyId = await this.apiClient.getCompanyId()
      result = await this.apiClient.returnChallan({
        company_id: companyId,
        challan_id: invoice.challanId,
        invoice_no: invoice.invoiceNumber,
        return_invoice_no: input.returnInvoiceNo,
        return_date: input.returnDate,
        return_amount: amount,
        return_sd_amount: vatAmount,
        items: returnItems.map((item) => ({ item_code: item.itemCode, qty: item.qty, amount: item.amount })),
      })
    } catch (error) {
      if (isAuthorityFailure(error)) {
        await this.invoiceRepository.update(invoice.id, {
          responseLog: appendResponseLog(invoice.responseLog, logEntry("RETURN", { success: false, error })),
        })
        console.error(`[VatInvoice] Return ${input.returnInvoiceNo} of ${invoice.id} rejected: ${error.message}`)
      }
      throw error
    }

    const returns = [
      ...invoice.returns,
      {
        returnInvoiceNo: input.returnInvoiceNo,
        returnDate: input.returnDate,
        items: returnItems,
        amount,
        vatAmount,
        remoteReturnId: readIdentifier(result.data, "return_id"),
        createdAt: new Date(),
      },
    ]

    const returnedTotals = totalsByItem(returns.flatMap((entry) => entry.items))
    const fullyReturned = [...original].every(
      ([itemCode, sold]) => (returnedTotals.get(itemCode)?.qty ?? 0) >= sold.qty
    )
    const status: VatInvoiceStatus = fullyReturned ? "Return" : "Partly Return"

    if (!canTransition(invoice.status, status)) {
      throw new ConflictError(`VAT invoice cannot move from ${invoice.status} to ${status}`)
    }

    const updated = await this.invoiceRepository.update(invoice.id, {
      status,
      returns,
      returnedAmount: fromPaisa(toPaisa(invoice.returnedAmount) + toPaisa(amount)),
      returnedVatAmount: fromPaisa(toPaisa(invoice.returnedVatAmount) + toPaisa(vatAmount)),
      responseLog: appendResponseLog(invoice.responseLog, logEntry("RETURN", { success: true, result })),
    })

    console.log(`[VatInvoice] Return ${input.returnInvoiceNo} of ${invoice.id}: ${amount} (VAT ${vatAmount}), now ${status}`)

    return updated
  }

  async downloadSchallan(id: string, format: string = "pdf"): Promise<SchallanDownloadResult> {
    if (!isSchallanFormat(format)) {
      throw new ValidationError(`Unsupported schallan format: ${format}`, "format")
    }

    const invoice = await this.getVatInvoice(id)
    if (!hasChallan(invoice.status) || !invoice.challanId) {
      throw new ValidationError(
        `VAT invoice ${invoice.invoiceNumber} is ${invoice.status}; sync it before downloading the challan`,
        "status"
      )
    }

    const document = await this.apiClient.downloadSchallan(invoice.challanId, format)
    const fileUrl = document.kind === "url"
      ? document.url
      : await this.fileStore.write(`schallan-${invoice.challanId}.${format}`, document.content)

    return { invoiceId: invoice.id, challanId: invoice.challanId, format, fileUrl }
  }

  private async findOriginal(input: VatInvoiceReturnInput): Promise<VatInvoice> {
    if (input.invoiceId) {
      return this.getVatInvoice(input.invoiceId)
    }
    if (input.returnAgainst) {
      const invoice = await this.invoiceRepository.findBySourceInvoiceNo(input.returnAgainst)
      if (!invoice) {
        throw new NotFoundError(`VAT invoice for ${input.returnAgainst}`)
      }
      return invoice
    }
    throw new ValidationError("return_against or invoice_id is required", "returnAgainst")
  }

  private async markFailed(
    invoice: VatInvoice,
    error: AuthorityFailure
  ): Promise<VatInvoiceSyncResult> {
    await this.invoiceRepository.update(invoice.id, {
      status: "Failed",
      lastError: truncateText(error.message),
      responseLog: appendResponseLog(invoice.responseLog, logEntry("SUBMIT", { success: false, error })),
    })

    console.error(`[VatInvoice] ${invoice.id} failed to sync: ${error.message}`)

    return {
      invoiceId: invoice.id,
      success: false,
      status: "Failed",
      message: error.message,
    }
  }

  private async requireRegisteredBranch(
    branchId: string
  ): Promise<{ branch: RetailerBranchRegistration; retailer: RetailerRegistration }> {
    const branch = await this.branchRepository.findById(branchId)
    if (!branch) {
      throw new NotFoundError("Retailer branch registration")
    }
    if (!branch.remoteBranchId) {
      throw new ValidationError(
        `Branch ${branch.branchName} must be registered with the tax authority before issuing VAT invoices`,
        "branchId"
      )
    }

    const retailer = await this.retailerRepository.findById(branch.retailerId)
    if (!retailer) {
      throw new NotFoundError("Retailer registration")
    }
    if (!retailer.remoteRetailerId) {
      throw new ValidationError(
        `Retailer ${retailer.retailerName} must be registered with the tax authority before issuing VAT invoices`,
        "retailerId"
      )
    }

    return { branch, retailer }
  }
}
