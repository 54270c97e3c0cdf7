/**
 * Token endpoint response parsing
 *
 * The authenticate endpoint answers in XML:
 * <response><access_token/><expiry_time/><company_id/></response>
 */

import { XMLParser, XMLValidator } from "fast-xml-parser"
import type { StoredToken } from "../../domain/configuration/VendorConfiguration"
import { AuthenticationError } from "../../shared/errors"
import { isJsonObject } from "../../shared/types"

const parser = new XMLParser({
  parseTagValue: false,
  trimValues: true,
})

function findElement(node: unknown, name: string): string | null {
  if (Array.isArray(node)) {
    for (const child of node) {
      const found = findElement(child, name)
      if (found !== null) {
        return found
      }
    }
    return null
  }

  if (!isJsonObject(node)) {
    return null
  }

  if (name in node) {
    const value = node[name]
    if (typeof value === "string") {
      return value.trim() === "" ? null : value.trim()
    }
    if (isJsonObject(value)) {
      const text = value["#text"]
      if (typeof text === "string" && text.trim() !== "") {
        return text.trim()
      }
    }
  }

  for (const child of Object.values(node)) {
    const found = findElement(child, name)
    if (found !== null) {
      return found
    }
  }
  return null
}

const LOCAL_DATETIME = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2}):(\d{2})$/

/**
 * `YYYY-MM-DD HH:mm:ss` is read on the local clock, anything else through
 * Date.parse. Unparsable values give null.
 */
export function parseExpiry(value: string | null): Date | null {
  if (!value) {
    return null
  }

  const match = LOCAL_DATETIME.exec(value.trim())
  if (match) {
    const [, year, month, day, hour, minute, second] = match.map(Number)
    return new Date(year, month - 1, day, hour, minute, second)
  }

  const timestamp = Date.parse(value)
  return Number.isNaN(timestamp) ? null : new Date(timestamp)
}

export function parseTokenResponse(raw: string): StoredToken {
  if (XMLValidator.validate(raw) !== true) {
    throw new AuthenticationError(`Failed to parse XML: ${raw}`, raw)
  }

  const document: unknown = parser.parse(raw)
  const accessToken = findElement(document, "access_token")

  if (!accessToken) {
    throw new AuthenticationError(`No access_token found in response: ${raw}`, raw)
  }

  return {
    accessToken,
    tokenExpiresAt: parseExpiry(findElement(document, "expiry_time")),
    companyId: findElement(document, "company_id"),
  }
}
