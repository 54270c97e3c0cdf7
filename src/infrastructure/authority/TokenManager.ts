/**
 * Token Manager
 *
 * Obtains and refreshes the bearer token for the tax authority API.
 *
 * - Token and expiry are kept on the vendor configuration record
 * - The record is read on every session, so saved changes apply to every
 *   running instance on its next call
 * - Refreshes when the token is absent, expired, inside the expiry buffer,
 *   or when the caller forces it after a 401
 * - Concurrent refreshes are not locked; every refresh yields a valid token
 */

import type {
  VendorConfiguration,
  VendorConfigurationRepository,
} from "../../domain/configuration/VendorConfiguration"
import { AuthenticationError, ConfigurationError, errorMessage } from "../../shared/errors"
import { pooledFetch, type FetchFn } from "./httpClient"
import { parseTokenResponse } from "./tokenResponse"
import type { AuthoritySession } from "./types"

export interface TokenManagerOptions {
  expiryBufferSeconds?: number
  defaultBaseUrl?: string | null
  fetchFn?: FetchFn
  now?: () => Date
}

interface Credentials {
  baseUrl: string
  clientId: string
  clientSecret: string
}

export class TokenManager {
  private readonly expiryBufferMs: number
  private readonly defaultBaseUrl: string | null
  private readonly fetchFn: FetchFn
  private readonly now: () => Date

  constructor(
    private configurationRepository: VendorConfigurationRepository,
    options: TokenManagerOptions = {}
  ) {
    this.expiryBufferMs = (options.expiryBufferSeconds ?? 60) * 1000
    this.defaultBaseUrl = options.defaultBaseUrl ?? null
    this.fetchFn = options.fetchFn ?? pooledFetch
    this.now = options.now ?? (() => new Date())
  }

  async getValidToken(forceRefresh: boolean = false): Promise<string> {
    const session = await this.getSession(forceRefresh)
    return session.accessToken
  }

  /**
   * Token plus the base URL and company ID every request needs
   */
  async getSession(forceRefresh: boolean = false): Promise<AuthoritySession> {
    const configuration = await this.loadConfiguration()
    const credentials = this.requireCredentials(configuration)

    if (
      !forceRefresh
      && configuration.accessToken
      && this.isUnexpired(configuration.tokenExpiresAt)
    ) {
      return {
        accessToken: configuration.accessToken,
        baseUrl: credentials.baseUrl,
        companyId: configuration.companyId,
      }
    }

    return this.refresh(credentials)
  }

  private isUnexpired(expiresAt: Date | null): boolean {
    if (!expiresAt) {
      return false
    }
    return expiresAt.getTime() > this.now().getTime() + this.expiryBufferMs
  }

  private async loadConfiguration(): Promise<VendorConfiguration> {
    const configuration = await this.configurationRepository.get()

    if (!configuration) {
      throw new ConfigurationError(
        "No POS Vendor Configuration found. Create one with base URL, client ID and client secret."
      )
    }

    if (configuration.disabled) {
      throw new ConfigurationError("POS Vendor Configuration is disabled", "disabled")
    }

    return configuration
  }

  private requireCredentials(configuration: VendorConfiguration): Credentials {
    const baseUrl = configuration.baseUrl || this.defaultBaseUrl
    if (!baseUrl) {
      throw new ConfigurationError(
        "Base URL is not configured. Set it on the POS Vendor Configuration or in CHALLAN_API_BASE_URL.",
        "baseUrl"
      )
    }
    if (!configuration.clientId) {
      throw new ConfigurationError("Client ID is not configured on the POS Vendor Configuration", "clientId")
    }
    if (!configuration.clientSecret) {
      throw new ConfigurationError(
        "Client secret is not configured on the POS Vendor Configuration",
        "clientSecret"
      )
    }

    return {
      baseUrl: baseUrl.replace(/\/+$/, ""),
      clientId: configuration.clientId,
      clientSecret: configuration.clientSecret,
    }
  }

  private async refresh(credentials: Credentials): Promise<AuthoritySession> {
    const url = `${credentials.baseUrl}/integration/vendor_authenticate`
    const basic = Buffer.from(`${credentials.clientId}:${credentials.clientSecret}`).toString("base64")

    console.log(`[TokenManager] Requesting new access token from ${url}`)

    let response: Response
    try {
      response = await this.fetchFn(url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Basic ${basic}`,
        },
      })
    } catch (error) {
      throw new AuthenticationError(`Failed to authenticate vendor: ${errorMessage(error)}`)
    }

    const raw = await response.text()

    if (response.status === 401 || response.status === 403) {
      throw new AuthenticationError(
        "Failed to authenticate vendor: the tax authority rejected the client ID or client secret",
        raw
      )
    }

    if (!response.ok) {
      throw new AuthenticationError(
        `Failed to authenticate vendor: HTTP ${response.status}: ${raw}`,
        raw
      )
    }

    const token = parseTokenResponse(raw)
    await this.configurationRepository.saveToken(token)

    console.log(
      `[TokenManager] Access token refreshed, expires ${token.tokenExpiresAt?.toISOString() ?? "unknown"}`
    )

    return {
      accessToken: token.accessToken,
      baseUrl: credentials.baseUrl,
      companyId: token.companyId,
    }
  }
}
