/**
 * Vendor Configuration Service
 *
 * Operator-facing read and write of the tax authority credentials.
 */

import {
  INVOICE_SYNC_SCHEDULES,
  type SaveVendorConfigurationInput,
  type VendorConfiguration,
  type VendorConfigurationRepository,
} from "../../domain/configuration/VendorConfiguration"
import type { TokenManager } from "../../infrastructure/authority/TokenManager"
import { ValidationError } from "../../shared/errors"
import type { OperationResult } from "../../shared/types"

export type VendorConfigurationView = Omit<VendorConfiguration, "clientSecret" | "accessToken"> & {
  hasClientSecret: boolean
  hasAccessToken: boolean
}

function toView(configuration: VendorConfiguration): VendorConfigurationView {
  const { clientSecret, accessToken, ...rest } = configuration
  return {
    ...rest,
    hasClientSecret: Boolean(clientSecret),
    hasAccessToken: Boolean(accessToken),
  }
}

function normalizeBaseUrl(value: string | null | undefined): string | null {
  if (value === undefined || value === null || value.trim() === "") {
    return null
  }

  let url: URL
  try {
    url = new URL(value.trim())
  } catch {
    throw new ValidationError(`Invalid base URL: ${value}`, "baseUrl")
  }
  if (url.protocol !== "https:" && url.protocol !== "http:") {
    throw new ValidationError("Base URL must use http or https", "baseUrl")
  }

  return value.trim().replace(/\/+$/, "")
}

function normalizeCredential(value: string | null | undefined): string | null {
  if (value === undefined || value === null) {
    return null
  }
  const trimmed = value.trim()
  return trimmed === "" ? null : trimmed
}

export class VendorConfigurationService {
  constructor(
    private configurationRepository: VendorConfigurationRepository,
    private tokenManager: TokenManager
  ) {}

  async getConfiguration(): Promise<VendorConfigurationView | null> {
    const configuration = await this.configurationRepository.get()
    return configuration ? toView(configuration) : null
  }

  /**
   * Fields left undefined keep their stored value. A changed base URL or
   * credential drops the stored token.
   */
  async saveConfiguration(input: SaveVendorConfigurationInput): Promise<VendorConfigurationView> {
    if (input.syncSchedule !== undefined && !INVOICE_SYNC_SCHEDULES.includes(input.syncSchedule)) {
      throw new ValidationError(`Unknown sync schedule: ${input.syncSchedule}`, "syncSchedule")
    }

    const existing = await this.configurationRepository.get()

    const baseUrl = input.baseUrl !== undefined ? normalizeBaseUrl(input.baseUrl) : existing?.baseUrl ?? null
    const clientId = input.clientId !== undefined ? normalizeCredential(input.clientId) : existing?.clientId ?? null
    const clientSecret =
      input.clientSecret !== undefined ? normalizeCredential(input.clientSecret) : existing?.clientSecret ?? null

    const credentialsChanged =
      !existing
      || existing.baseUrl !== baseUrl
      || existing.clientId !== clientId
      || existing.clientSecret !== clientSecret

    const kept = existing && !credentialsChanged ? existing : null

    const configuration: VendorConfiguration = {
      baseUrl,
      clientId,
      clientSecret,
      accessToken: kept?.accessToken ?? null,
      tokenExpiresAt: kept?.tokenExpiresAt ?? null,
      companyId: kept?.companyId ?? null,
      disabled: input.disabled ?? existing?.disabled ?? false,
      syncSchedule: input.syncSchedule ?? existing?.syncSchedule ?? "Scheduled",
      updatedAt: new Date(),
    }

    const saved = await this.configurationRepository.save(configuration)

    if (credentialsChanged) {
      console.log("[VendorConfiguration] Credentials changed, stored token cleared")
    }

    return toView(saved)
  }

  async fetchPosVendorToken(): Promise<OperationResult & { tokenExpiresAt: Date | null }> {
    await this.tokenManager.getValidToken(true)
    const configuration = await this.configurationRepository.get()

    return {
      success: true,
      message: "Access token refreshed",
      tokenExpiresAt: configuration?.tokenExpiresAt ?? null,
    }
  }
}
