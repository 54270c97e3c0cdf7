/**
 * ChallanApiClient Unit Tests
 */

import { ChallanApiClient, parseEnvelope } from "../../../src/infrastructure/authority/ChallanApiClient"
import { TokenManager } from "../../../src/infrastructure/authority/TokenManager"
import { AuthenticationError, RemoteApiError } from "../../../src/shared/errors"
import { jsonResponse, on, stubFetch, tokenXml, xmlResponse, type Route } from "../../helpers/fetchStub"
import { InMemoryVendorConfigurationRepository, vendorConfiguration } from "../../helpers/inMemoryRepositories"

const tokenRoute = on("/integration/vendor_authenticate", () => xmlResponse(tokenXml("fresh-token")))

function createClient(...routes: Route[]) {
  const stub = stubFetch(tokenRoute, ...routes)
  const repository = new InMemoryVendorConfigurationRepository(
    vendorConfiguration({
      accessToken: "stored-token",
      tokenExpiresAt: new Date("2099-01-01T00:00:00Z"),
      companyId: "C1",
    })
  )
  const tokenManager = new TokenManager(repository, { fetchFn: stub.fetchFn })
  return { client: new ChallanApiClient(tokenManager, stub.fetchFn), ...stub }
}

function callsTo(calls: Array<{ url: string }>, path: string): number {
  return calls.filter((call) => new URL(call.url).pathname.endsWith(path)).length
}

describe("ChallanApiClient", () => {
  describe("parseEnvelope", () => {
    it("should read status, message and data", () => {
      expect(parseEnvelope('{"status":"success","message":"ok","data":[1]}')).toEqual({
        status: "success",
        message: "ok",
        data: [1],
      })
    })

    it("should return null for non-JSON and non-object bodies", () => {
      expect(parseEnvelope("<html>")).toBeNull()
      expect(parseEnvelope("[1,2]")).toBeNull()
    })
  })

  describe("listing", () => {
    it("should send the stored bearer token and return the rows", async () => {
      const rows = [{ zone_id: "Z1", zone_name: "Dhaka" }]
      const { client, calls } = createClient(on("/integration/zones", () => jsonResponse({ status: "success", data: rows })))

      await expect(client.listZones()).resolves.toEqual(rows)

      expect(calls).toHaveLength(1)
      expect(calls[0]?.url).toBe("https://authority.test/integration/zones")
      expect(calls[0]?.headers.get("Authorization")).toBe("Bearer stored-token")
      expect(calls[0]?.headers.get("Content-Type")).toBe("application/json")
    })

    it("should pass the parent filter as a query parameter", async () => {
      const { client, calls } = createClient(on("/integration/divisions", () => jsonResponse({ data: [] })))

      await client.listDivisions("R1")

      expect(calls[0]?.url).toBe("https://authority.test/integration/divisions?vat_commissionrate_id=R1")
    })

    it("should reject a payload whose data is not a list", async () => {
      const { client } = createClient(on("/integration/zones", () => jsonResponse({ status: "success", data: {} })))

      await expect(client.listZones()).rejects.toThrow("Unexpected zones payload: data is not a list")
    })
  })

  describe("401 handling", () => {
    it("should refresh the token and retry exactly once", async () => {
      let attempts = 0
      const { client, calls } = createClient(
        on("/integration/zones", () => {
          attempts++
          return attempts === 1
            ? jsonResponse({ status: "error", message: "token expired" }, 401)
            : jsonResponse({ status: "success", data: [] })
        })
      )

      await expect(client.listZones()).resolves.toEqual([])

      expect(callsTo(calls, "/integration/vendor_authenticate")).toBe(1)
      expect(callsTo(calls, "/integration/zones")).toBe(2)
      expect(calls[2]?.headers.get("Authorization")).toBe("Bearer fresh-token")
    })

    it("should release the rejected response before retrying", async () => {
      const responses: Response[] = []
      const { client } = createClient(
        on("/integration/zones", () => {
          const response = responses.length === 0
            ? jsonResponse({ status: "error", message: "token expired" }, 401)
            : jsonResponse({ status: "success", data: [] })
          responses.push(response)
          return response
        })
      )

      await client.listZones()

      expect(responses).toHaveLength(2)
      expect(responses[0]?.bodyUsed).toBe(true)
    })

    it("should fail with AuthenticationError on a second 401", async () => {
      const { client, calls } = createClient(
        on("/integration/zones", () => jsonResponse({ status: "error", message: "invalid token" }, 401))
      )

      const error = await client.listZones().catch((e: unknown) => e)

      expect(error).toBeInstanceOf(AuthenticationError)
      expect(error).toMatchObject({
        message: "Tax authority rejected the refreshed access token for /integration/zones",
      })
      expect(callsTo(calls, "/integration/vendor_authenticate")).toBe(1)
      expect(callsTo(calls, "/integration/zones")).toBe(2)
    })
  })

  describe("remote errors", () => {
    it("should keep the remote message verbatim", async () => {
      const body = { status: "error", message: "Invalid circle for division D9" }
      const { client } = createClient(on("/integration/retailer_branch_registration", () => jsonResponse(body, 200)))

      const error = await client
        .registerBranch({
          company_id: "C1",
          retailer_id: "R123",
          branch_name: "Main",
          branch_address: null,
          zone_id: "Z1",
          division_id: "D9",
          circle_id: "C7",
        })
        .catch((e: unknown) => e)

      expect(error).toBeInstanceOf(RemoteApiError)
      expect(error).toMatchObject({
        message: "Invalid circle for division D9",
        remoteStatus: 200,
        responseBody: JSON.stringify(body),
        statusCode: 502,
      })
    })

    it("should use the raw body when the answer is not JSON", async () => {
      const { client } = createClient(
        on("/integration/service_types", () => new Response("Service Unavailable", { status: 503 }))
      )

      await expect(client.listServiceTypes()).rejects.toMatchObject({
        message: "Service Unavailable",
        remoteStatus: 503,
      })
    })

    it("should mark network failures", async () => {
      const { client } = createClient(on("/integration/zones", () => {
        throw new TypeError("fetch failed")
      }))

      const error = await client.listZones().catch((e: unknown) => e)

      expect(error).toBeInstanceOf(RemoteApiError)
      expect(error).toMatchObject({
        message: "Network error calling /integration/zones: fetch failed",
        remoteStatus: 0,
        code: "NETWORK_ERROR",
      })
      expect(error instanceof RemoteApiError && error.isNetworkError).toBe(true)
    })
  })

  describe("submissions", () => {
    it("should post the challan payload as JSON", async () => {
      const { client, calls } = createClient(
        on("/integration/vat_invoice", () =>
          jsonResponse({ status: "success", message: "Challan created", data: { challan_id: "CH-1" } })
        )
      )

      const result = await client.submitChallan({
        company_id: "C1",
        invoice_no: "POS-1",
        invoice_date: "2026-03-10",
        retailer_id: "R123",
        branch_id: "B9",
        customer_id: null,
        order_id: null,
        service_type_id: "ST1",
        payment_method: "Cash",
        vat_commissionrate_id: "R1",
        txn_amount: 100,
        total_sd_percentage: 15,
        total_sd_amount: 15,
        total_discount_amount: 0,
        total_service_charges_amount: 0,
        total_amount: 115,
        items: [{ item_code: "ITEM-A", item_name: "Item A", qty: 2, rate: 50, amount: 100 }],
      })

      expect(result).toMatchObject({ data: { challan_id: "CH-1" }, message: "Challan created", httpStatus: 200 })
      expect(calls[0]?.method).toBe("POST")
      expect(typeof calls[0]?.body === "string" ? JSON.parse(calls[0].body) : null).toMatchObject({
        invoice_no: "POS-1",
        total_sd_amount: 15,
      })
    })

    it("should leave the multipart content type to fetch", async () => {
      const { client, calls } = createClient(
        on("/integration/retailer_document_upload", () => jsonResponse({ status: "success", data: {} }))
      )
      const form = new FormData()
      form.append("retailer_id", "R123")

      await client.uploadDocument(form)

      expect(calls[0]?.headers.get("Content-Type")).toBeNull()
      expect(calls[0]?.body).toBe(form)
    })
  })

  describe("downloadSchallan", () => {
    it("should return the file URL from a JSON answer", async () => {
      const { client, calls } = createClient(
        on("/integration/schallan", () =>
          jsonResponse({ status: "success", data: { file_url: "https://authority.test/files/CH-1.pdf" } })
        )
      )

      await expect(client.downloadSchallan("CH-1", "pdf")).resolves.toEqual({
        kind: "url",
        url: "https://authority.test/files/CH-1.pdf",
      })
      expect(calls[0]?.url).toBe("https://authority.test/integration/schallan?challan_id=CH-1&format=pdf")
    })

    it("should return the content of a binary answer", async () => {
      const { client } = createClient(
        on("/integration/schallan", () =>
          new Response("%PDF-1.4", { status: 200, headers: { "Content-Type": "application/pdf" } })
        )
      )

      const document = await client.downloadSchallan("CH-1", "pdf")

      expect(document.kind).toBe("file")
      if (document.kind === "file") {
        expect(document.content.toString()).toBe("%PDF-1.4")
        expect(document.contentType).toBe("application/pdf")
      }
    })
  })
})
