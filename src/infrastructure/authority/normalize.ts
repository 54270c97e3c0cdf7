/**
 * Normalizers for the authority's master-data rows
 *
 * Each function turns one raw row into the fields we store, or throws a
 * ValidationError describing what is missing.
 */

import type {
  Circle,
  Division,
  ReferenceInput,
  ServiceType,
  VatCommissionRate,
  Zone,
} from "../../domain/reference/ReferenceData"
import { ValidationError } from "../../shared/errors"
import { isJsonObject, type JsonObject } from "../../shared/types"

function asRow(raw: unknown): JsonObject {
  if (!isJsonObject(raw)) {
    throw new ValidationError("Row is not an object")
  }
  return raw
}

function optionalId(row: JsonObject, key: string): string | null {
  const value = row[key]
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value)
  }
  if (typeof value === "string" && value.trim() !== "") {
    return value.trim()
  }
  return null
}

function requiredId(row: JsonObject, key: string): string {
  const value = optionalId(row, key)
  if (value === null) {
    throw new ValidationError(`Missing ${key}`, key)
  }
  return value
}

function requiredName(row: JsonObject, key: string): string {
  const value = row[key]
  if (typeof value !== "string" || value.trim() === "") {
    throw new ValidationError(`Missing ${key}`, key)
  }
  return value.trim()
}

function requiredNumber(row: JsonObject, key: string): number {
  const value = row[key]
  const parsed = typeof value === "string" && value.trim() !== "" ? Number(value) : value
  if (typeof parsed !== "number" || !Number.isFinite(parsed)) {
    throw new ValidationError(`Invalid ${key}: ${String(value)}`, key)
  }
  return parsed
}

export function normalizeZone(raw: unknown): ReferenceInput<Zone> {
  const row = asRow(raw)
  return {
    remoteId: requiredId(row, "zone_id"),
    name: requiredName(row, "zone_name"),
  }
}

export function normalizeDivision(raw: unknown): ReferenceInput<Division> {
  const row = asRow(raw)
  return {
    remoteId: requiredId(row, "division_id"),
    name: requiredName(row, "division_name"),
    zoneId: requiredId(row, "zone_id"),
    vatCommissionRateId: optionalId(row, "vat_commissionrate_id"),
  }
}

/** `zoneId` is null when the row leaves it to the parent division. */
export type CircleRow = Omit<ReferenceInput<Circle>, "zoneId"> & { zoneId: string | null }

export function normalizeCircle(raw: unknown): CircleRow {
  const row = asRow(raw)
  return {
    remoteId: requiredId(row, "circle_id"),
    name: requiredName(row, "circle_name"),
    divisionId: requiredId(row, "division_id"),
    zoneId: optionalId(row, "zone_id"),
  }
}

export function normalizeVatCommissionRate(raw: unknown): ReferenceInput<VatCommissionRate> {
  const row = asRow(raw)
  const rate = requiredNumber(row, "rate")
  if (rate < 0) {
    throw new ValidationError(`Invalid rate: ${rate}`, "rate")
  }
  const name = row.vat_commissionrate_name
  return {
    remoteId: requiredId(row, "vat_commissionrate_id"),
    name: typeof name === "string" && name.trim() !== "" ? name.trim() : `${rate}%`,
    rate,
    zoneId: requiredId(row, "zone_id"),
    divisionId: optionalId(row, "division_id"),
    circleId: optionalId(row, "circle_id"),
    serviceTypeId: optionalId(row, "service_type_id"),
  }
}

export function normalizeServiceType(raw: unknown): ReferenceInput<ServiceType> {
  const row = asRow(raw)
  return {
    remoteId: optionalId(row, "service_type_code") ?? requiredId(row, "service_type_id"),
    name: requiredName(row, "service_type_name"),
  }
}
