/**
 * VAT Invoice Domain Entity
 *
 * VAT compliance record of one point-of-sale transaction. The charged amounts
 * are fixed at creation; returns accumulate in their own fields and every
 * exchange with the authority is appended to `responseLog`.
 */

export type VatInvoiceStatus = "Pending" | "Synced" | "Failed" | "Return" | "Partly Return"

export const VAT_INVOICE_STATUSES: readonly VatInvoiceStatus[] = [
  "Pending",
  "Synced",
  "Failed",
  "Return",
  "Partly Return",
]

const TRANSITIONS: Record<VatInvoiceStatus, readonly VatInvoiceStatus[]> = {
  Pending: ["Synced", "Failed"],
  Failed: ["Synced", "Failed"],
  Synced: ["Return", "Partly Return"],
  "Partly Return": ["Return", "Partly Return"],
  Return: [],
}

export function canTransition(from: VatInvoiceStatus, to: VatInvoiceStatus): boolean {
  return TRANSITIONS[from].includes(to)
}

export function isSyncable(status: VatInvoiceStatus): boolean {
  return status === "Pending" || status === "Failed"
}

export function hasChallan(status: VatInvoiceStatus): boolean {
  return status === "Synced" || status === "Return" || status === "Partly Return"
}

/** Oldest first, ties by ID */
export function compareByCreation(a: VatInvoice, b: VatInvoice): number {
  const byTime = a.createdAt.getTime() - b.createdAt.getTime()
  return byTime !== 0 ? byTime : a.id.localeCompare(b.id)
}

export interface VatInvoiceItem {
  itemCode: string
  itemName: string
  qty: number
  rate: number
  amount: number
}

export interface VatInvoiceReturnItem {
  itemCode: string
  qty: number
  amount: number
}

export interface VatInvoiceReturn {
  returnInvoiceNo: string
  returnDate: string
  items: VatInvoiceReturnItem[]
  amount: number
  vatAmount: number
  remoteReturnId: string | null
  createdAt: Date
}

export type ResponseLogOperation = "SUBMIT" | "RETURN"

export interface ResponseLogEntry {
  operation: ResponseLogOperation
  success: boolean
  httpStatus: number
  body: string | null
  message: string | null
  at: Date
}

/** Entries kept per invoice, newest last */
export const RESPONSE_LOG_LIMIT = 20
/** Characters kept of a logged body or message */
export const RESPONSE_TEXT_LIMIT = 4000

export function truncateText(text: string, limit: number = RESPONSE_TEXT_LIMIT): string {
  return text.length > limit ? `${text.slice(0, limit)}... [truncated ${text.length - limit} chars]` : text
}

/**
 * Append to the log held on the invoice record. Older entries beyond
 * RESPONSE_LOG_LIMIT are dropped and long texts truncated, so a record
 * retried many times stays a bounded size.
 */
export function appendResponseLog(log: ResponseLogEntry[], entry: ResponseLogEntry): ResponseLogEntry[] {
  const kept = {
    ...entry,
    body: entry.body === null ? null : truncateText(entry.body),
    message: entry.message === null ? null : truncateText(entry.message),
  }
  return [...log, kept].slice(-RESPONSE_LOG_LIMIT)
}

export interface VatInvoice {
  id: string
  sourceInvoiceNo: string
  invoiceNumber: string
  invoiceDate: string
  retailerId: string
  branchId: string
  customerId: string | null
  orderId: string | null
  serviceTypeId: string
  paymentMethod: string | null
  items: VatInvoiceItem[]
  txnAmount: number
  vatPercentage: number
  vatAmount: number
  discountAmount: number
  serviceChargesAmount: number
  totalAmount: number
  vatCommissionRateId: string
  status: VatInvoiceStatus
  challanId: string | null
  lastError: string | null
  returns: VatInvoiceReturn[]
  returnedAmount: number
  returnedVatAmount: number
  responseLog: ResponseLogEntry[]
  createdAt: Date
  updatedAt: Date
}

export type CreateVatInvoiceInput = Omit<
  VatInvoice,
  | "id"
  | "status"
  | "challanId"
  | "lastError"
  | "returns"
  | "returnedAmount"
  | "returnedVatAmount"
  | "responseLog"
  | "createdAt"
  | "updatedAt"
>

export interface UpdateVatInvoiceInput {
  status?: VatInvoiceStatus
  challanId?: string | null
  lastError?: string | null
  returns?: VatInvoiceReturn[]
  returnedAmount?: number
  returnedVatAmount?: number
  responseLog?: ResponseLogEntry[]
}

export interface VatInvoiceRepository {
  findById(id: string): Promise<VatInvoice | null>
  findBySourceInvoiceNo(sourceInvoiceNo: string): Promise<VatInvoice | null>
  findByStatuses(statuses: VatInvoiceStatus[]): Promise<VatInvoice[]>
  findByInvoiceDateRange(fromDate: string | null, toDate: string | null): Promise<VatInvoice[]>
  create(input: CreateVatInvoiceInput): Promise<VatInvoice>
  update(id: string, updates: UpdateVatInvoiceInput): Promise<VatInvoice>
}
