/**
 * Typed readers for request bodies, query strings and event details.
 * Keys are the snake_case names callers send.
 */

import { ValidationError } from "../shared/errors"
import { isJsonObject, type JsonObject } from "../shared/types"

export function parseJsonObject(raw: string | null | undefined, label: string = "Request body"): JsonObject {
  if (!raw) {
    return {}
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    throw new ValidationError(`${label} is not valid JSON`)
  }

  if (!isJsonObject(parsed)) {
    throw new ValidationError(`${label} must be a JSON object`)
  }
  return parsed
}

export function optionalString(source: JsonObject, key: string): string | null {
  const value = source[key]
  if (value === undefined || value === null || value === "") {
    return null
  }
  if (typeof value === "number") {
    return String(value)
  }
  if (typeof value !== "string") {
    throw new ValidationError(`${key} must be a string`, key)
  }
  return value.trim() === "" ? null : value.trim()
}

export function requireString(source: JsonObject, key: string): string {
  const value = optionalString(source, key)
  if (value === null) {
    throw new ValidationError(`${key} is required`, key)
  }
  return value
}

export function optionalNumber(source: JsonObject, key: string): number | null {
  const value = source[key]
  if (value === undefined || value === null || value === "") {
    return null
  }
  const parsed = typeof value === "string" ? Number(value) : value
  if (typeof parsed !== "number" || !Number.isFinite(parsed)) {
    throw new ValidationError(`${key} must be a number`, key)
  }
  return parsed
}

export function requireNumber(source: JsonObject, key: string): number {
  const value = optionalNumber(source, key)
  if (value === null) {
    throw new ValidationError(`${key} is required`, key)
  }
  return value
}

/** Accepts booleans and the strings / numbers 1, 0, true, false */
export function optionalBoolean(source: JsonObject, key: string): boolean | null {
  const value = source[key]
  if (value === undefined || value === null || value === "") {
    return null
  }
  if (typeof value === "boolean") {
    return value
  }
  if (value === 1 || value === "1" || value === "true") {
    return true
  }
  if (value === 0 || value === "0" || value === "false") {
    return false
  }
  throw new ValidationError(`${key} must be a boolean`, key)
}

/** A JSON array of strings, or a comma-separated string */
export function stringList(source: JsonObject, key: string): string[] {
  const value = source[key]
  if (value === undefined || value === null || value === "") {
    return []
  }
  if (typeof value === "string") {
    return value.split(",").map((entry) => entry.trim()).filter((entry) => entry !== "")
  }
  if (!Array.isArray(value)) {
    throw new ValidationError(`${key} must be a list`, key)
  }
  return value.map((entry, index) => {
    if (typeof entry === "number") {
      return String(entry)
    }
    if (typeof entry !== "string" || entry.trim() === "") {
      throw new ValidationError(`${key}[${index}] must be a non-empty string`, key)
    }
    return entry.trim()
  })
}

export function objectList(source: JsonObject, key: string): JsonObject[] {
  const value = source[key]
  if (value === undefined || value === null) {
    return []
  }
  if (!Array.isArray(value)) {
    throw new ValidationError(`${key} must be a list`, key)
  }
  return value.map((entry, index) => {
    if (!isJsonObject(entry)) {
      throw new ValidationError(`${key}[${index}] must be an object`, key)
    }
    return entry
  })
}

/** Query string or path parameters as a JsonObject */
export function fromParameters(parameters: Record<string, string | undefined> | null): JsonObject {
  const result: JsonObject = {}
  for (const [key, value] of Object.entries(parameters ?? {})) {
    if (value !== undefined) {
      result[key] = value
    }
  }
  return result
}
