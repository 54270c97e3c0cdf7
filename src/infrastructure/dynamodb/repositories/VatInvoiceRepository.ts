/**
 * DynamoDB VAT Invoice Repository Implementation
 *
 * Uses the vat_invoices table with one GSI:
 * - status-index (GSI1): invoices by status, sorted by creation time
 *
 * Each invoice has a guard item PK=SK=SOURCE#<source invoice no> holding its
 * ID, written in the same transaction as the invoice. The conditional write
 * keeps one invoice per source transaction and lookups by source read it
 * consistently.
 */

import { randomUUID } from "crypto"
import { TransactionCanceledException } from "@aws-sdk/client-dynamodb"
import {
  GetCommand,
  PutCommand,
  QueryCommand,
  ScanCommand,
  TransactWriteCommand,
  type QueryCommandInput,
  type ScanCommandInput,
} from "@aws-sdk/lib-dynamodb"
import {
  VAT_INVOICE_STATUSES,
  compareByCreation,
  type CreateVatInvoiceInput,
  type ResponseLogEntry,
  type ResponseLogOperation,
  type UpdateVatInvoiceInput,
  type VatInvoice,
  type VatInvoiceItem,
  type VatInvoiceRepository,
  type VatInvoiceReturn,
  type VatInvoiceStatus,
} from "../../../domain/invoice/VatInvoice"
import { ConflictError, NotFoundError } from "../../../shared/errors"
import {
  readBoolean,
  readDate,
  readMapList,
  readNumber,
  readOptionalString,
  readString,
  type DocumentClient,
  type Item,
} from "../items"

function readStatus(item: Item): VatInvoiceStatus {
  const value = item.status
  return VAT_INVOICE_STATUSES.find((status) => status === value) ?? "Pending"
}

function readOperation(item: Item): ResponseLogOperation {
  return item.operation === "RETURN" ? "RETURN" : "SUBMIT"
}

function sourceKey(sourceInvoiceNo: string): Item {
  return {
    PK: `SOURCE#${sourceInvoiceNo}`,
    SK: `SOURCE#${sourceInvoiceNo}`,
  }
}

export class DynamoDBVatInvoiceRepository implements VatInvoiceRepository {
  constructor(
    private client: DocumentClient,
    private tableName: string = "vat_invoices"
  ) {}

  async findById(id: string): Promise<VatInvoice | null> {
    const command = new GetCommand({
      TableName: this.tableName,
      Key: {
        PK: `VAT_INVOICE#${id}`,
        SK: `VAT_INVOICE#${id}`,
      },
    })

    const response = await this.client.send(command)

    if (!response.Item) {
      return null
    }

    return this.mapItemToInvoice(response.Item)
  }

  async findBySourceInvoiceNo(sourceInvoiceNo: string): Promise<VatInvoice | null> {
    const command = new GetCommand({
      TableName: this.tableName,
      Key: sourceKey(sourceInvoiceNo),
      ConsistentRead: true,
    })

    const response = await this.client.send(command)
    const invoiceId = response.Item ? readOptionalString(response.Item, "invoice_id") : null

    return invoiceId ? this.findById(invoiceId) : null
  }

  async findByStatuses(statuses: VatInvoiceStatus[]): Promise<VatInvoice[]> {
    const invoices: VatInvoice[] = []

    for (const status of statuses) {
      const items = await this.queryAll({
        TableName: this.tableName,
        IndexName: "status-index",
        KeyConditionExpression: "GSI1PK = :gsi1pk",
        ExpressionAttributeValues: {
          ":gsi1pk": `STATUS#${status}`,
        },
      })
      invoices.push(...items)
    }

    return invoices.sort(compareByCreation)
  }

  async findByInvoiceDateRange(fromDate: string | null, toDate: string | null): Promise<VatInvoice[]> {
    // Skips the source guard items
    const filters = ["begins_with(PK, :prefix)"]
    const values: Item = { ":prefix": "VAT_INVOICE#" }

    if (fromDate && toDate) {
      filters.push("invoice_date BETWEEN :from AND :to")
      values[":from"] = fromDate
      values[":to"] = toDate
    } else if (fromDate) {
      filters.push("invoice_date >= :from")
      values[":from"] = fromDate
    } else if (toDate) {
      filters.push("invoice_date <= :to")
      values[":to"] = toDate
    }

    const input: ScanCommandInput = {
      TableName: this.tableName,
      FilterExpression: filters.join(" AND "),
      ExpressionAttributeValues: values,
    }

    const invoices: VatInvoice[] = []
    let exclusiveStartKey: Item | undefined

    do {
      const response = await this.client.send(
        new ScanCommand({ ...input, ExclusiveStartKey: exclusiveStartKey })
      )
      for (const item of response.Items ?? []) {
        invoices.push(this.mapItemToInvoice(item))
      }
      exclusiveStartKey = response.LastEvaluatedKey
    } while (exclusiveStartKey)

    return invoices
  }

  async create(input: CreateVatInvoiceInput): Promise<VatInvoice> {
    const now = new Date()

    const invoice: VatInvoice = {
      ...input,
      id: randomUUID(),
      status: "Pending",
      challanId: null,
      lastError: null,
      returns: [],
      returnedAmount: 0,
      returnedVatAmount: 0,
      responseLog: [],
      createdAt: now,
      updatedAt: now,
    }

    const command = new TransactWriteCommand({
      TransactItems: [
        {
          Put: {
            TableName: this.tableName,
            Item: { ...sourceKey(invoice.sourceInvoiceNo), invoice_id: invoice.id },
            ConditionExpression: "attribute_not_exists(PK)",
          },
        },
        {
          Put: {
            TableName: this.tableName,
            Item: this.mapInvoiceToItem(invoice),
            ConditionExpression: "attribute_not_exists(PK)",
          },
        },
      ],
    })

    try {
      await this.client.send(command)
    } catch (error) {
      if (error instanceof TransactionCanceledException) {
        throw new ConflictError(`A VAT invoice already exists for ${invoice.sourceInvoiceNo}`)
      }
      throw error
    }

    return invoice
  }

  async update(id: string, updates: UpdateVatInvoiceInput): Promise<VatInvoice> {
    const existing = await this.findById(id)
    if (!existing) {
      throw new NotFoundError("VAT invoice")
    }

    const updated = {
      ...existing,
      ...updates,
      updatedAt: new Date(),
    }

    const command = new PutCommand({
      TableName: this.tableName,
      Item: this.mapInvoiceToItem(updated),
    })

    await this.client.send(command)

    return updated
  }

  private async queryAll(input: QueryCommandInput): Promise<VatInvoice[]> {
    const invoices: VatInvoice[] = []
    let exclusiveStartKey: Item | undefined

    do {
      const response = await this.client.send(
        new QueryCommand({ ...input, ExclusiveStartKey: exclusiveStartKey })
      )
      for (const item of response.Items ?? []) {
        invoices.push(this.mapItemToInvoice(item))
      }
      exclusiveStartKey = response.LastEvaluatedKey
    } while (exclusiveStartKey)

    return invoices
  }

  private mapItemToInvoice(item: Item): VatInvoice {
    const items: VatInvoiceItem[] = readMapList(item, "items").map((line) => ({
      itemCode: readString(line, "item_code"),
      itemName: readString(line, "item_name"),
      qty: readNumber(line, "qty"),
      rate: readNumber(line, "rate"),
      amount: readNumber(line, "amount"),
    }))

    const returns: VatInvoiceReturn[] = readMapList(item, "returns").map((entry) => ({
      returnInvoiceNo: readString(entry, "return_invoice_no"),
      returnDate: readString(entry, "return_date"),
      items: readMapList(entry, "items").map((line) => ({
        itemCode: readString(line, "item_code"),
        qty: readNumber(line, "qty"),
        amount: readNumber(line, "amount"),
      })),
      amount: readNumber(entry, "amount"),
      vatAmount: readNumber(entry, "vat_amount"),
      remoteReturnId: readOptionalString(entry, "remote_return_id"),
      createdAt: readDate(entry, "created_at"),
    }))

    const responseLog: ResponseLogEntry[] = readMapList(item, "response_log").map((entry) => ({
      operation: readOperation(entry),
      success: readBoolean(entry, "success", false),
      httpStatus: readNumber(entry, "http_status"),
      body: readOptionalString(entry, "body"),
      message: readOptionalString(entry, "message"),
      at: readDate(entry, "at"),
    }))

    return {
      id: readString(item, "id"),
      sourceInvoiceNo: readString(item, "source_invoice_no"),
      invoiceNumber: readString(item, "invoice_number"),
      invoiceDate: readString(item, "invoice_date"),
      retailerId: readString(item, "retailer_id"),
      branchId: readString(item, "branch_id"),
      customerId: readOptionalString(item, "customer_id"),
      orderId: readOptionalString(item, "order_id"),
      serviceTypeId: readString(item, "service_type_id"),
      paymentMethod: readOptionalString(item, "payment_method"),
      items,
      txnAmount: readNumber(item, "txn_amount"),
      vatPercentage: readNumber(item, "vat_percentage"),
      vatAmount: readNumber(item, "vat_amount"),
      discountAmount: readNumber(item, "discount_amount"),
      serviceChargesAmount: readNumber(item, "service_charges_amount"),
      totalAmount: readNumber(item, "total_amount"),
      vatCommissionRateId: readString(item, "vat_commissionrate_id"),
      status: readStatus(item),
      challanId: readOptionalString(item, "challan_id"),
      lastError: readOptionalString(item, "last_error"),
      returns,
      returnedAmount: readNumber(item, "returned_amount"),
      returnedVatAmount: readNumber(item, "returned_vat_amount"),
      responseLog,
      createdAt: readDate(item, "created_at"),
      updatedAt: readDate(item, "updated_at"),
    }
  }

  private mapInvoiceToItem(invoice: VatInvoice): Item {
    const createdAt = invoice.createdAt.toISOString()

    const item: Item = {
      PK: `VAT_INVOICE#${invoice.id}`,
      SK: `VAT_INVOICE#${invoice.id}`,
      GSI1PK: `STATUS#${invoice.status}`,
      GSI1SK: `${createdAt}#${invoice.id}`,
      id: invoice.id,
      source_invoice_no: invoice.sourceInvoiceNo,
      invoice_number: invoice.invoiceNumber,
      invoice_date: invoice.invoiceDate,
      retailer_id: invoice.retailerId,
      branch_id: invoice.branchId,
      service_type_id: invoice.serviceTypeId,
      items: invoice.items.map((line) => ({
        item_code: line.itemCode,
        item_name: line.itemName,
        qty: line.qty,
        rate: line.rate,
        amount: line.amount,
      })),
      txn_amount: invoice.txnAmount,
      vat_percentage: invoice.vatPercentage,
      vat_amount: invoice.vatAmount,
      discount_amount: invoice.discountAmount,
      service_charges_amount: invoice.serviceChargesAmount,
      total_amount: invoice.totalAmount,
      vat_commissionrate_id: invoice.vatCommissionRateId,
      status: invoice.status,
      returns: invoice.returns.map((entry) => ({
        return_invoice_no: entry.returnInvoiceNo,
        return_date: entry.returnDate,
        items: entry.items.map((line) => ({
          item_code: line.itemCode,
          qty: line.qty,
          amount: line.amount,
        })),
        amount: entry.amount,
        vat_amount: entry.vatAmount,
        remote_return_id: entry.remoteReturnId,
        created_at: entry.createdAt.toISOString(),
      })),
      returned_amount: invoice.returnedAmount,
      returned_vat_amount: invoice.returnedVatAmount,
      response_log: invoice.responseLog.map((entry) => ({
        operation: entry.operation,
        success: entry.success,
        http_status: entry.httpStatus,
        body: entry.body,
        message: entry.message,
        at: entry.at.toISOString(),
      })),
      created_at: createdAt,
      updated_at: invoice.updatedAt.toISOString(),
    }

    if (invoice.customerId !== null) {
      item.customer_id = invoice.customerId
    }
    if (invoice.orderId !== null) {
      item.order_id = invoice.orderId
    }
    if (invoice.paymentMethod !== null) {
      item.payment_method = invoice.paymentMethod
    }
    if (invoice.challanId !== null) {
      item.challan_id = invoice.challanId
    }
    if (invoice.lastError !== null) {
      item.last_error = invoice.lastError
    }

    return item
  }
}
