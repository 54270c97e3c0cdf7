/**
 * Reference Data API Handler (Lambda Function)
 *
 * POST /api/reference/{entity}/sync - Sync one entity (or "all") from the tax authority
 * GET /api/reference/{entity} - List stored rows, ?force_refresh=1 re-syncs first
 *
 * Entities: zone, division, circle, vat_commission_rate, service_type
 */

import type { APIGatewayProxyEvent, APIGatewayProxyResult } from "aws-lambda"
import { ValidationError } from "../../../shared/errors"
import { getContext } from "../../context"
import { optionalBoolean, optionalString } from "../../input"
import { errorResponse, ok, pathParameter, query } from "../http"

const ENTITIES = ["zone", "division", "circle", "vat_commission_rate", "service_type"] as const

type EntityParam = (typeof ENTITIES)[number]

function readEntity(event: APIGatewayProxyEvent): EntityParam {
  const value = pathParameter(event, "entity")
  const entity = ENTITIES.find((candidate) => candidate === value)
  if (!entity) {
    throw new ValidationError(`Unknown reference entity: ${value}`, "entity")
  }
  return entity
}

export async function syncReferenceHandler(
  event: APIGatewayProxyEvent
): Promise<APIGatewayProxyResult> {
  try {
    const { referenceSync } = getContext()
    const params = query(event)

    if (event.pathParameters?.entity === "all") {
      const summary = await referenceSync.syncAll()
      return ok(summary, `${summary.successful} of ${summary.results.length} reference syncs succeeded`)
    }

    const entity = readEntity(event)
    const result =
      entity === "zone" ? await referenceSync.syncZones()
      : entity === "division" ? await referenceSync.syncDivisions(optionalString(params, "vat_commissionrate_id"))
      : entity === "circle" ? await referenceSync.syncCircles(optionalString(params, "division_id"))
      : entity === "vat_commission_rate" ? await referenceSync.syncVatCommissionRates(optionalString(params, "zone_id"))
      : await referenceSync.syncServiceTypes()

    return ok(
      result,
      `Synced ${result.total} ${entity} rows: ${result.created} created, ${result.updated} updated, ${result.skipped} skipped`
    )
  } catch (error) {
    return errorResponse(error, "ReferenceAPI")
  }
}

export async function listReferenceHandler(
  event: APIGatewayProxyEvent
): Promise<APIGatewayProxyResult> {
  try {
    const { referenceData } = getContext()
    const entity = readEntity(event)
    const params = query(event)
    const forceRefresh = optionalBoolean(params, "force_refresh") ?? false

    const rows =
      entity === "zone" ? await referenceData.listZones(forceRefresh)
      : entity === "division"
        ? await referenceData.listDivisions(forceRefresh, optionalString(params, "vat_commissionrate_id"))
      : entity === "circle" ? await referenceData.listCircles(forceRefresh, optionalString(params, "division_id"))
      : entity === "vat_commission_rate"
        ? await referenceData.listVatCommissionRates(forceRefresh, optionalString(params, "zone_id"))
      : await referenceData.listServiceTypes(forceRefresh)

    return ok(rows)
  } catch (error) {
    return errorResponse(error, "ReferenceAPI")
  }
}
