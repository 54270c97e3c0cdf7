/**
 * Vendor Configuration Domain Entity
 *
 * Single record holding the tax authority credentials and the current access
 * token. Created by an operator; the token fields are rewritten by the token
 * manager on every refresh.
 */

export type InvoiceSyncSchedule = "After Submit" | "Scheduled"

export const INVOICE_SYNC_SCHEDULES: readonly InvoiceSyncSchedule[] = ["After Submit", "Scheduled"]

export interface VendorConfiguration {
  baseUrl: string | null
  clientId: string | null
  clientSecret: string | null
  accessToken: string | null
  tokenExpiresAt: Date | null
  companyId: string | null
  disabled: boolean
  syncSchedule: InvoiceSyncSchedule
  updatedAt: Date
}

export interface SaveVendorConfigurationInput {
  baseUrl?: string | null
  clientId?: string | null
  clientSecret?: string | null
  disabled?: boolean
  syncSchedule?: InvoiceSyncSchedule
}

export interface StoredToken {
  accessToken: string
  tokenExpiresAt: Date | null
  companyId: string | null
}

export interface VendorConfigurationRepository {
  get(): Promise<VendorConfiguration | null>
  save(configuration: VendorConfiguration): Promise<VendorConfiguration>
  saveToken(token: StoredToken): Promise<void>
}
