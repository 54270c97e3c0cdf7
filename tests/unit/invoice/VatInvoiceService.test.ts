/**
 * VatInvoiceService Unit Tests
 */

import { VatInvoiceService, type PosTransaction } from "../../../src/application/invoice/VatInvoiceService"
import { RESPONSE_LOG_LIMIT, type ResponseLogEntry, type VatInvoice } from "../../../src/domain/invoice/VatInvoice"
import type { VendorConfiguration } from "../../../src/domain/configuration/VendorConfiguration"
import { ConfigurationError, ConflictError, NotFoundError, ValidationError } from "../../../src/shared/errors"
import { createAuthorityClient, onJson } from "../../helpers/authorityClient"
import { on, type Route } from "../../helpers/fetchStub"
import {
  InMemoryBranchRepository,
  InMemoryFileStore,
  InMemoryRetailerRepository,
  InMemoryVatInvoiceRepository,
  inMemoryReferenceRepositories,
  seedReferenceData,
  vatInvoice,
} from "../../helpers/inMemoryRepositories"

async function setup(routes: Route[], configuration: Partial<VendorConfiguration> = {}) {
  const { apiClient, calls, configurationRepository } = createAuthorityClient(routes, configuration)
  const references = inMemoryReferenceRepositories()
  await seedReferenceData(references)

  const retailers = new InMemoryRetailerRepository()
  const branches = new InMemoryBranchRepository()
  const invoices = new InMemoryVatInvoiceRepository()
  const fileStore = new InMemoryFileStore()

  const retailer = await retailers.create({
    retailerName: "Green Leaf Cafe",
    ownerName: "Test Owner",
    mobileNo: "01700000000",
    serviceTypeIds: ["ST1"],
    zoneId: "Z1",
    divisionId: "D1",
    circleId: "C1",
    vatCommissionRateId: "R1",
  })
  await retailers.update(retailer.id, { status: "Registered", remoteRetailerId: "RT-1" })

  const branch = await branches.create({
    retailerId: retailer.id,
    branchName: "Main",
    zoneId: "Z1",
    divisionId: "D1",
    circleId: "C1",
  })
  await branches.update(branch.id, { status: "Registered", remoteBranchId: "BR-1" })

  const service = new VatInvoiceService(
    invoices,
    retailers,
    branches,
    references.vatCommissionRates,
    configurationRepository,
    apiClient,
    fileStore
  )

  const storeInvoice = (overrides: Partial<VatInvoice> = {}) =>
    invoices.put(vatInvoice({ retailerId: retailer.id, branchId: branch.id, ...overrides }))

  return { service, invoices, branches, fileStore, calls, branchId: branch.id, storeInvoice }
}

function transaction(branchId: string, overrides: Partial<PosTransaction> = {}): PosTransaction {
  return {
    sourceInvoiceNo: "POS-0001",
    invoiceDate: "2026-03-10",
    branchId,
    serviceTypeId: "ST1",
    customerId: "CUST-1",
    items: [
      { itemCode: "ITEM-A", itemName: "Tea", qty: 2, rate: 50 },
      { itemCode: "ITEM-B", itemName: "Cake", qty: 1, rate: 80, amount: 75 },
    ],
    discountAmount: 5,
    serviceChargesAmount: 10,
    ...overrides,
  }
}

const challanAccepted = onJson("/integration/vat_invoice", () => ({
  status: "success",
  message: "Challan created",
  data: { challan_id: "CH-9" },
}))

function returnRoute(): Route {
  return onJson("/integration/vat_invoice_return", () => ({ status: "success", data: { return_id: "RET-1" } }))
}

describe("VatInvoiceService", () => {
  describe("createFromPosTransaction", () => {
    it("should compute totals with the most specific commission rate", async () => {
      const { service, branchId } = await setup([])

      const { invoice, created, sync } = await service.createFromPosTransaction(transaction(branchId))

      expect(created).toBe(true)
      expect(sync).toBeNull()
      expect(invoice).toMatchObject({
        status: "Pending",
        invoiceNumber: "POS-0001",
        vatCommissionRateId: "R2",
        vatPercentage: 10,
        txnAmount: 175,
        vatAmount: 17.5,
        discountAmount: 5,
        serviceChargesAmount: 10,
        totalAmount: 197.5,
      })
      expect(invoice.items.map((item) => item.amount)).toEqual([100, 75])
    })

    it("should return the existing invoice for a repeated transaction", async () => {
      const { service, invoices, branchId } = await setup([])

      const first = await service.createFromPosTransaction(transaction(branchId))
      const second = await service.createFromPosTransaction(transaction(branchId))

      expect(second.created).toBe(false)
      expect(second.invoice.id).toBe(first.invoice.id)
      expect(invoices.records.size).toBe(1)
    })

    it("should return the stored invoice when a concurrent delivery wins the write", async () => {
      const { service, invoices, branchId, storeInvoice } = await setup([])
      const stored = storeInvoice({ sourceInvoiceNo: "POS-0001" })
      jest.spyOn(invoices, "findBySourceInvoiceNo").mockResolvedValueOnce(null)

      const result = await service.createFromPosTransaction(transaction(branchId))

      expect(result).toEqual({ invoice: stored, created: false, sync: null })
      expect(invoices.records.size).toBe(1)
    })

    it("should reject a branch not registered with the authority", async () => {
      const { service, branches, branchId } = await setup([])
      await branches.update(branchId, { remoteBranchId: null })

      await expect(service.createFromPosTransaction(transaction(branchId))).rejects.toThrow(
        "Branch Main must be registered with the tax authority before issuing VAT invoices"
      )
    })

    it("should reject a branch no commission rate covers", async () => {
      const { service, branches, branchId } = await setup([])
      const branch = branches.records.get(branchId)
      if (branch) {
        branches.records.set(branchId, { ...branch, zoneId: "Z9" })
      }

      await expect(service.createFromPosTransaction(transaction(branchId))).rejects.toMatchObject({
        field: "vatCommissionRateId",
      })
    })

    it("should reject malformed transactions", async () => {
      const { service, branchId } = await setup([])

      await expect(service.createFromPosTransaction(transaction(branchId, { invoiceDate: "10/03/2026" }))).rejects.toThrow(
        new ValidationError("invoice_date must be YYYY-MM-DD", "invoiceDate")
      )
      await expect(service.createFromPosTransaction(transaction(branchId, { items: [] }))).rejects.toThrow(
        "A POS transaction needs at least one item"
      )
      await expect(
        service.createFromPosTransaction(
          transaction(branchId, { items: [{ itemCode: "ITEM-A", itemName: "Tea", qty: 0, rate: 50 }] })
        )
      ).rejects.toThrow("Invalid item ITEM-A: qty must be positive, rate not negative")
    })

    it("should sync right away under the After Submit schedule", async () => {
      const { service, branchId } = await setup([challanAccepted], { syncSchedule: "After Submit" })

      const { invoice, sync } = await service.createFromPosTransaction(transaction(branchId))

      expect(sync).toEqual({
        invoiceId: invoice.id,
        success: true,
        status: "Synced",
        message: "Challan created",
        challanId: "CH-9",
      })
      expect(invoice).toMatchObject({ status: "Synced", challanId: "CH-9" })
    })

    it("should still create the invoice when sync after submit cannot authenticate", async () => {
      const { service, calls, branchId } = await setup([challanAccepted], {
        syncSchedule: "After Submit",
        clientSecret: null,
      })

      const { invoice, created, sync } = await service.createFromPosTransaction(transaction(branchId))

      expect(created).toBe(true)
      expect(sync).toEqual({
        invoiceId: invoice.id,
        success: false,
        status: "Failed",
        message: "Client secret is not configured on the POS Vendor Configuration",
      })
      expect(invoice).toMatchObject({
        status: "Failed",
        lastError: "Client secret is not configured on the POS Vendor Configuration",
      })
      expect(invoice.responseLog).toEqual([
        expect.objectContaining({ operation: "SUBMIT", success: false, httpStatus: 0, body: null }),
      ])
      expect(calls).toHaveLength(0)
    })
  })

  describe("syncVatInvoice", () => {
    it("should move a failed invoice to Synced and keep the challan ID", async () => {
      const { service, calls, storeInvoice } = await setup([challanAccepted])
      const stored = storeInvoice({ status: "Failed", lastError: "Timeout" })

      const result = await service.syncVatInvoice(stored.id)
      const invoice = await service.getVatInvoice(stored.id)

      expect(result).toMatchObject({ success: true, status: "Synced", challanId: "CH-9" })
      expect(invoice).toMatchObject({ status: "Synced", challanId: "CH-9", lastError: null })
      expect(invoice.responseLog).toHaveLength(1)
      expect(invoice.responseLog[0]).toMatchObject({ operation: "SUBMIT", success: true, httpStatus: 200 })

      const request = calls.find((call) => call.url.endsWith("/integration/vat_invoice"))
      expect(JSON.parse(String(request?.body))).toMatchObject({
        company_id: "C1",
        invoice_no: stored.invoiceNumber,
        retailer_id: "RT-1",
        branch_id: "BR-1",
        txn_amount: 100,
        total_sd_percentage: 15,
        total_sd_amount: 15,
        total_amount: 115,
        items: [{ item_code: "ITEM-A", item_name: "Item A", qty: 2, rate: 50, amount: 100 }],
      })
    })

    it("should store a rejection on the invoice instead of throwing", async () => {
      const { service, storeInvoice } = await setup([
        onJson("/integration/vat_invoice", () => ({ status: "error", message: "Duplicate invoice_no" }), 422),
      ])
      const stored = storeInvoice()

      const result = await service.syncVatInvoice(stored.id)
      const invoice = await service.getVatInvoice(stored.id)

      expect(result).toEqual({ invoiceId: stored.id, success: false, status: "Failed", message: "Duplicate invoice_no" })
      expect(invoice).toMatchObject({ status: "Failed", lastError: "Duplicate invoice_no", challanId: null })
      expect(invoice.responseLog[0]).toMatchObject({ operation: "SUBMIT", success: false, httpStatus: 422 })
    })

    it("should store a disabled configuration on the invoice", async () => {
      const { service, storeInvoice } = await setup([challanAccepted], { disabled: true })
      const stored = storeInvoice()

      const result = await service.syncVatInvoice(stored.id)

      expect(result).toEqual({
        invoiceId: stored.id,
        success: false,
        status: "Failed",
        message: "POS Vendor Configuration is disabled",
      })
      await expect(service.getVatInvoice(stored.id)).resolves.toMatchObject({
        status: "Failed",
        lastError: "POS Vendor Configuration is disabled",
      })
    })

    it("should keep the response log bounded across repeated failures", async () => {
      const { service, storeInvoice } = await setup([
        onJson("/integration/vat_invoice", () => ({ status: "error", message: "Service unavailable" }), 503),
      ])
      const history: ResponseLogEntry[] = Array.from({ length: RESPONSE_LOG_LIMIT }, (_, index) => ({
        operation: "SUBMIT",
        success: false,
        httpStatus: 503,
        body: null,
        message: `attempt ${index}`,
        at: new Date(Date.UTC(2026, 2, 10, index)),
      }))
      const stored = storeInvoice({ status: "Failed", responseLog: history })

      await service.syncVatInvoice(stored.id)
      const invoice = await service.getVatInvoice(stored.id)

      expect(invoice.responseLog).toHaveLength(RESPONSE_LOG_LIMIT)
      expect(invoice.responseLog[0]?.message).toBe("attempt 1")
      expect(invoice.responseLog[RESPONSE_LOG_LIMIT - 1]).toMatchObject({
        httpStatus: 503,
        message: "Service unavailable",
      })
    })

    it("should fail when the answer carries no challan ID", async () => {
      const { service, storeInvoice } = await setup([
        onJson("/integration/vat_invoice", () => ({ status: "success", data: {} })),
      ])
      const stored = storeInvoice()

      const result = await service.syncVatInvoice(stored.id)

      expect(result).toMatchObject({ success: false, message: "Challan response carries no challan_id" })
    })

    it("should not resubmit a synced invoice", async () => {
      const { service, calls, storeInvoice } = await setup([])
      const stored = storeInvoice({ status: "Synced", challanId: "CH-1" })

      const result = await service.syncVatInvoice(stored.id)

      expect(result).toEqual({
        invoiceId: stored.id,
        success: true,
        status: "Synced",
        message: "VAT invoice already synced",
        challanId: "CH-1",
      })
      expect(calls).toHaveLength(0)
    })

    it("should reject an unknown invoice", async () => {
      const { service } = await setup([])

      await expect(service.syncVatInvoice("missing")).rejects.toBeInstanceOf(NotFoundError)
    })
  })

  describe("autoSyncVatInvoices", () => {
    it("should sync oldest first and count one rejection without stopping", async () => {
      const submitted: string[] = []
      const { service, storeInvoice } = await setup([
        on("/integration/vat_invoice", (init) => {
          const payload: unknown = JSON.parse(String(init.body))
          const invoiceNo = typeof payload === "object" && payload !== null && "invoice_no" in payload
            ? String(payload.invoice_no)
            : ""
          submitted.push(invoiceNo)
          const body = invoiceNo === "POS-BAD"
            ? { status: "error", message: "Rejected" }
            : { status: "success", data: { challan_id: `CH-${invoiceNo}` } }
          return new Response(JSON.stringify(body), {
            status: invoiceNo === "POS-BAD" ? 400 : 200,
            headers: { "Content-Type": "application/json" },
          })
        }),
      ])

      const numbers = ["POS-3", "POS-BAD", "POS-1", "POS-4", "POS-2"]
      numbers.forEach((invoiceNumber, index) =>
        storeInvoice({
          invoiceNumber,
          createdAt: new Date(Date.UTC(2026, 2, 10, 8, 0, [2, 4, 0, 3, 1][index])),
          status: invoiceNumber === "POS-4" ? "Failed" : "Pending",
        })
      )
      storeInvoice({ invoiceNumber: "POS-DONE", status: "Synced", challanId: "CH-0" })

      const summary = await service.autoSyncVatInvoices()

      expect(summary).toMatchObject({ total: 5, synced: 4, failed: 1 })
      expect(submitted).toEqual(["POS-1", "POS-2", "POS-3", "POS-4", "POS-BAD"])
    })
  })

  describe("returnVatInvoice", () => {
    it("should record a half return as Partly Return and keep the charged VAT", async () => {
      const { service, storeInvoice } = await setup([returnRoute()])
      const stored = storeInvoice({ status: "Synced", challanId: "CH-1" })

      const invoice = await service.returnVatInvoice({
        invoiceId: stored.id,
        returnInvoiceNo: "RET-0001",
        returnDate: "2026-03-11",
        items: [{ itemCode: "ITEM-A", qty: 1 }],
      })

      expect(invoice).toMatchObject({
        status: "Partly Return",
        txnAmount: 100,
        vatAmount: 15,
        returnedAmount: 50,
        returnedVatAmount: 7.5,
      })
      expect(invoice.returns[0]).toMatchObject({
        returnInvoiceNo: "RET-0001",
        amount: 50,
        vatAmount: 7.5,
        remoteReturnId: "RET-1",
        items: [{ itemCode: "ITEM-A", qty: 1, amount: 50 }],
      })
    })

    it("should move to Return once every item is returned", async () => {
      const { service, storeInvoice } = await setup([returnRoute()])
      const stored = storeInvoice({ status: "Synced", challanId: "CH-1", sourceInvoiceNo: "POS-77" })

      await service.returnVatInvoice({
        returnAgainst: "POS-77",
        returnInvoiceNo: "RET-0001",
        returnDate: "2026-03-11",
        items: [{ itemCode: "ITEM-A", qty: 1 }],
      })
      const invoice = await service.returnVatInvoice({
        returnAgainst: "POS-77",
        returnInvoiceNo: "RET-0002",
        returnDate: "2026-03-12",
        items: [{ itemCode: "ITEM-A", qty: 1 }],
      })

      expect(invoice.id).toBe(stored.id)
      expect(invoice).toMatchObject({ status: "Return", returnedAmount: 100, returnedVatAmount: 15 })
      expect(invoice.returns).toHaveLength(2)
    })

    it("should refuse to return more than was sold", async () => {
      const { service, storeInvoice } = await setup([returnRoute()])
      const stored = storeInvoice({ status: "Synced", challanId: "CH-1" })

      await expect(
        service.returnVatInvoice({
          invoiceId: stored.id,
          returnInvoiceNo: "RET-0001",
          returnDate: "2026-03-11",
          items: [{ itemCode: "ITEM-A", qty: 3 }],
        })
      ).rejects.toThrow("Cannot return 3 of ITEM-A: 2 of 2 remain returnable")
    })

    it("should refuse a repeated return number", async () => {
      const { service, storeInvoice } = await setup([returnRoute()])
      const stored = storeInvoice({ status: "Synced", challanId: "CH-1" })
      const input = {
        invoiceId: stored.id,
        returnInvoiceNo: "RET-0001",
        returnDate: "2026-03-11",
        items: [{ itemCode: "ITEM-A", qty: 1 }],
      }

      await service.returnVatInvoice(input)

      await expect(service.returnVatInvoice(input)).rejects.toBeInstanceOf(ConflictError)
    })

    it("should refuse invoices that were never synced", async () => {
      const { service, storeInvoice } = await setup([])
      const stored = storeInvoice({ status: "Pending" })

      await expect(
        service.returnVatInvoice({
          invoiceId: stored.id,
          returnInvoiceNo: "RET-0001",
          returnDate: "2026-03-11",
          items: [{ itemCode: "ITEM-A", qty: 1 }],
        })
      ).rejects.toMatchObject({ field: "status" })
    })

    it("should log a rejected return and leave the status alone", async () => {
      const { service, storeInvoice } = await setup([
        onJson("/integration/vat_invoice_return", () => ({ status: "error", message: "Challan closed" }), 400),
      ])
      const stored = storeInvoice({ status: "Synced", challanId: "CH-1" })

      await expect(
        service.returnVatInvoice({
          invoiceId: stored.id,
          returnInvoiceNo: "RET-0001",
          returnDate: "2026-03-11",
          items: [{ itemCode: "ITEM-A", qty: 1 }],
        })
      ).rejects.toThrow("Challan closed")

      const invoice = await service.getVatInvoice(stored.id)
      expect(invoice.status).toBe("Synced")
      expect(invoice.returns).toEqual([])
      expect(invoice.responseLog[0]).toMatchObject({ operation: "RETURN", success: false, message: "Challan closed" })
    })

    it("should log a return that fails before reaching the authority", async () => {
      const { service, calls, storeInvoice } = await setup([returnRoute()], { clientSecret: null })
      const stored = storeInvoice({ status: "Synced", challanId: "CH-1" })

      await expect(
        service.returnVatInvoice({
          invoiceId: stored.id,
          returnInvoiceNo: "RET-0001",
          returnDate: "2026-03-11",
          items: [{ itemCode: "ITEM-A", qty: 1 }],
        })
      ).rejects.toBeInstanceOf(ConfigurationError)

      const invoice = await service.getVatInvoice(stored.id)
      expect(invoice.status).toBe("Synced")
      expect(invoice.responseLog).toEqual([
        expect.objectContaining({
          operation: "RETURN",
          success: false,
          httpStatus: 0,
          message: "Client secret is not configured on the POS Vendor Configuration",
        }),
      ])
      expect(calls).toHaveLength(0)
    })
  })

  describe("downloadSchallan", () => {
    it("should return the authority's link", async () => {
      const { service, storeInvoice } = await setup([
        onJson("/integration/schallan", () => ({ status: "success", data: { file_url: "https://files.test/ch.pdf" } })),
      ])
      const stored = storeInvoice({ status: "Synced", challanId: "CH-1" })

      await expect(service.downloadSchallan(stored.id)).resolves.toEqual({
        invoiceId: stored.id,
        challanId: "CH-1",
        format: "pdf",
        fileUrl: "https://files.test/ch.pdf",
      })
    })

    it("should store a streamed file", async () => {
      const { service, fileStore, storeInvoice } = await setup([
        on("/integration/schallan", () => new Response("<challan/>", { headers: { "Content-Type": "application/xml" } })),
      ])
      const stored = storeInvoice({ status: "Partly Return", challanId: "CH-1" })

      const result = await service.downloadSchallan(stored.id, "xml")

      expect(result.fileUrl).toBe("memory://schallan-CH-1.xml")
      expect(fileStore.files.get("schallan-CH-1.xml")?.toString()).toBe("<challan/>")
    })

    it("should refuse unsynced invoices and unknown formats", async () => {
      const { service, storeInvoice } = await setup([])
      const pending = storeInvoice()
      const synced = storeInvoice({ status: "Synced", challanId: "CH-1" })

      await expect(service.downloadSchallan(pending.id)).rejects.toMatchObject({ field: "status" })
      await expect(service.downloadSchallan(synced.id, "docx")).rejects.toThrow("Unsupported schallan format: docx")
    })
  })
})
