/**
 * VAT Smart Challan API Client
 *
 * Every outbound call to the tax authority goes through here.
 *
 * Key Features:
 * - Bearer token from the TokenManager on every request
 * - Exactly one forced refresh and retry when the authority answers 401
 * - JSON envelope { status, message, data } unwrapped, rejections raised
 *   as RemoteApiError with the remote message verbatim
 */

import { AuthenticationError, RemoteApiError, errorMessage } from "../../shared/errors"
import { isJsonObject } from "../../shared/types"
import { pooledFetch, type FetchFn } from "./httpClient"
import type { TokenManager } from "./TokenManager"
import type {
  AuthorityEnvelope,
  AuthorityResult,
  AuthoritySession,
  BranchRegistrationPayload,
  ChallanPayload,
  ChallanReturnPayload,
  RetailerRegistrationPayload,
  SchallanDocument,
  SchallanFormat,
} from "./types"

export function parseEnvelope(raw: string): AuthorityEnvelope | null {
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    return null
  }

  if (!isJsonObject(parsed)) {
    return null
  }

  return {
    status: typeof parsed.status === "string" ? parsed.status : null,
    message: typeof parsed.message === "string" ? parsed.message : null,
    data: parsed.data,
  }
}

function withQuery(path: string, params: Record<string, string | null | undefined>): string {
  const query = new URLSearchParams()
  for (const [key, value] of Object.entries(params)) {
    if (value) {
      query.set(key, value)
    }
  }
  const encoded = query.toString()
  return encoded ? `${path}?${encoded}` : path
}

export class ChallanApiClient {
  constructor(
    private tokenManager: TokenManager,
    private fetchFn: FetchFn = pooledFetch
  ) {}

  async getCompanyId(): Promise<string | null> {
    const session = await this.tokenManager.getSession()
    return session.companyId
  }

  async listZones(): Promise<unknown[]> {
    return this.listRows("/integration/zones", "zones")
  }

  async listDivisions(vatCommissionRateId?: string | null): Promise<unknown[]> {
    return this.listRows(
      withQuery("/integration/divisions", { vat_commissionrate_id: vatCommissionRateId }),
      "divisions"
    )
  }

  async listCircles(divisionId?: string | null): Promise<unknown[]> {
    return this.listRows(withQuery("/integration/circles", { division_id: divisionId }), "circles")
  }

  async listVatCommissionRates(zoneId?: string | null): Promise<unknown[]> {
    return this.listRows(
      withQuery("/integration/vat_commission_rates", { zone_id: zoneId }),
      "VAT commission rates"
    )
  }

  async listServiceTypes(): Promise<unknown[]> {
    return this.listRows("/integration/service_types", "service types")
  }

  async registerRetailer(payload: RetailerRegistrationPayload): Promise<AuthorityResult> {
    return this.requestJson("/integration/retailer_registration", {
      method: "POST",
      body: JSON.stringify(payload),
    })
  }

  async registerBranch(payload: BranchRegistrationPayload): Promise<AuthorityResult> {
    return this.requestJson("/integration/retailer_branch_registration", {
      method: "POST",
      body: JSON.stringify(payload),
    })
  }

  async uploadDocument(form: FormData): Promise<AuthorityResult> {
    return this.requestJson("/integration/retailer_document_upload", {
      method: "POST",
      body: form,
    })
  }

  async submitChallan(payload: ChallanPayload): Promise<AuthorityResult> {
    return this.requestJson("/integration/vat_invoice", {
      method: "POST",
      body: JSON.stringify(payload),
    })
  }

  async returnChallan(payload: ChallanReturnPayload): Promise<AuthorityResult> {
    return this.requestJson("/integration/vat_invoice_return", {
      method: "POST",
      body: JSON.stringify(payload),
    })
  }

  /**
   * Rendered challan. The authority either links to it or streams the file.
   */
  async downloadSchallan(challanId: string, format: SchallanFormat): Promise<SchallanDocument> {
    const endpoint = withQuery("/integration/schallan", { challan_id: challanId, format })
    const response = await this.fetchWithAuth(endpoint, { method: "GET" })
    const contentType = response.headers.get("content-type") ?? ""

    if (!response.ok || contentType.includes("json")) {
      const raw = await response.text()
      const envelope = this.unwrap(endpoint, response.status, response.ok, raw)
      const fileUrl = isJsonObject(envelope.data) ? envelope.data.file_url : undefined
      if (typeof fileUrl !== "string" || fileUrl === "") {
        throw new RemoteApiError(`No file_url in schallan response for ${challanId}`, response.status, raw)
      }
      return { kind: "url", url: fileUrl }
    }

    const content = Buffer.from(await response.arrayBuffer())
    return {
      kind: "file",
      content,
      contentType: contentType || (format === "pdf" ? "application/pdf" : "application/xml"),
    }
  }

  /**
   * Fetch with authentication
   * Retries once with a forced token refresh on 401
   */
  protected async fetchWithAuth(endpoint: string, options: RequestInit = {}): Promise<Response> {
    const session = await this.tokenManager.getSession()
    const response = await this.send(session, endpoint, options)

    if (response.status !== 401) {
      return response
    }

    console.warn(`[ChallanApi] 401 from ${endpoint}, refreshing token and retrying once`)
    await response.body?.cancel()
    const refreshed = await this.tokenManager.getSession(true)
    const retried = await this.send(refreshed, endpoint, options)

    if (retried.status === 401) {
      const body = await retried.text()
      throw new AuthenticationError(
        `Tax authority rejected the refreshed access token for ${endpoint}`,
        body
      )
    }

    return retried
  }

  private async send(
    session: AuthoritySession,
    endpoint: string,
    options: RequestInit
  ): Promise<Response> {
    const headers = new Headers(options.headers)
    headers.set("Authorization", `Bearer ${session.accessToken}`)
    if (!(options.body instanceof FormData) && !headers.has("Content-Type")) {
      headers.set("Content-Type", "application/json")
    }

    try {
      return await this.fetchFn(`${session.baseUrl}${endpoint}`, { ...options, headers })
    } catch (error) {
      throw new RemoteApiError(
        `Network error calling ${endpoint}: ${errorMessage(error)}`,
        0,
        null,
        "NETWORK_ERROR"
      )
    }
  }

  private async requestJson(endpoint: string, options: RequestInit = {}): Promise<AuthorityResult> {
    const response = await this.fetchWithAuth(endpoint, options)
    const raw = await response.text()
    const envelope = this.unwrap(endpoint, response.status, response.ok, raw)

    return {
      data: envelope.data,
      message: envelope.message,
      httpStatus: response.status,
      raw,
    }
  }

  private unwrap(endpoint: string, httpStatus: number, ok: boolean, raw: string): AuthorityEnvelope {
    const envelope = parseEnvelope(raw)
    const accepted = envelope !== null
      && (envelope.status === null || envelope.status.toLowerCase() === "success")

    if (!ok || !envelope || !accepted) {
      const message = envelope?.message || raw || `HTTP ${httpStatus} from ${endpoint}`
      throw new RemoteApiError(message, httpStatus, raw)
    }

    return envelope
  }

  private async listRows(endpoint: string, label: string): Promise<unknown[]> {
    const result = await this.requestJson(endpoint, { method: "GET" })
    if (!Array.isArray(result.data)) {
      throw new RemoteApiError(`Unexpected ${label} payload: data is not a list`, result.httpStatus, result.raw)
    }
    return result.data
  }
}
