/**
 * Jurisdiction hierarchy checks
 *
 * Zone -> VAT commission rate -> division -> circle. These replace the
 * dependent dropdown filters of the registration forms.
 */

import type { Circle, Division, VatCommissionRate, Zone } from "./ReferenceData"
import { ValidationError } from "../../shared/errors"

type Parent = Zone | Division | VatCommissionRate
type Child = Division | Circle | VatCommissionRate

function isCircle(record: Child): record is Circle {
  return "divisionId" in record && !("rate" in record)
}

function isRate(record: Child | Parent): record is VatCommissionRate {
  return "rate" in record
}

function isDivision(record: Child | Parent): record is Division {
  return "vatCommissionRateId" in record
}

/**
 * Whether `child` may be selected under `parent`.
 *
 * - zone -> division / commission rate / circle: same zone
 * - division -> circle: circle's division
 * - commission rate -> division: division carries no rate, or this one
 */
export function validChild(parent: Parent, child: Child): boolean {
  if (isRate(parent)) {
    return isDivision(child)
      && child.zoneId === parent.zoneId
      && (child.vatCommissionRateId === null || child.vatCommissionRateId === parent.remoteId)
  }

  if (isDivision(parent)) {
    return isCircle(child) && child.divisionId === parent.remoteId
  }

  return child.zoneId === parent.remoteId
}

export interface JurisdictionSelection {
  zone: Zone
  division: Division
  circle: Circle
  vatCommissionRate?: VatCommissionRate
}

/**
 * Throws a ValidationError naming the first field that does not belong to
 * its parent.
 */
export function validateJurisdiction(selection: JurisdictionSelection): void {
  const { zone, division, circle, vatCommissionRate } = selection

  if (vatCommissionRate && !validChild(zone, vatCommissionRate)) {
    throw new ValidationError(
      `VAT commission rate ${vatCommissionRate.remoteId} does not belong to zone ${zone.remoteId}`,
      "vatCommissionRateId"
    )
  }

  if (!validChild(zone, division)) {
    throw new ValidationError(
      `Division ${division.remoteId} does not belong to zone ${zone.remoteId}`,
      "divisionId"
    )
  }

  if (vatCommissionRate && !validChild(vatCommissionRate, division)) {
    throw new ValidationError(
      `Division ${division.remoteId} is not covered by VAT commission rate ${vatCommissionRate.remoteId}`,
      "divisionId"
    )
  }

  if (!validChild(division, circle)) {
    throw new ValidationError(
      `Circle ${circle.remoteId} does not belong to division ${division.remoteId}`,
      "circleId"
    )
  }
}
