/**
 * Environment configuration
 *
 * Table names and runtime settings. Credentials for the tax authority live in
 * the vendor configuration record, not here.
 */

export interface EnvConfig {
  configTable: string
  referenceTable: string
  registrationTable: string
  vatInvoiceTable: string
  challanApiBaseUrl: string | null
  tokenExpiryBufferSeconds: number
  fileStoreDir: string
  fileStorePublicUrl: string | null
}

function readInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") {
    return fallback
  }
  const parsed = parseInt(value, 10)
  return Number.isNaN(parsed) ? fallback : parsed
}

function readOptional(value: string | undefined): string | null {
  return value && value.trim() !== "" ? value.trim() : null
}

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  return {
    configTable: env.CONFIG_TABLE || "config",
    referenceTable: env.REFERENCE_TABLE || "reference_data",
    registrationTable: env.REGISTRATION_TABLE || "registrations",
    vatInvoiceTable: env.VAT_INVOICE_TABLE || "vat_invoices",
    challanApiBaseUrl: readOptional(env.CHALLAN_API_BASE_URL),
    tokenExpiryBufferSeconds: readInt(env.TOKEN_EXPIRY_BUFFER_SECONDS, 60),
    fileStoreDir: env.FILE_STORE_DIR || "/tmp/vat-challan-files",
    fileStorePublicUrl: readOptional(env.FILE_STORE_PUBLIC_URL),
  }
}
