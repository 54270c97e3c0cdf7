/**
 * Shared Types
 */

export interface ApiResponse<T = unknown> {
  success: boolean
  data?: T
  error?: string
  message?: string
}

/**
 * Result of a remote-callable operation: a success flag and a message the
 * operator can read.
 */
export interface OperationResult {
  success: boolean
  message: string
}

export type JsonObject = Record<string, unknown>

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

/**
 * Identifier field of a remote payload. Numbers are kept as strings,
 * blank strings count as absent.
 */
export function readIdentifier(data: unknown, field: string): string | null {
  if (!isJsonObject(data)) {
    return null
  }
  const value = data[field]
  if (typeof value === "number") {
    return String(value)
  }
  return typeof value === "string" && value.trim() !== "" ? value.trim() : null
}
