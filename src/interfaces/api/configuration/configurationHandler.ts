/**
 * Vendor Configuration API Handler (Lambda Function)
 *
 * GET /api/configuration - Current configuration, without the client secret
 * PUT /api/configuration - Save base URL, credentials, disabled flag, sync schedule
 * POST /api/configuration/token - Force a new access token
 */

import type { APIGatewayProxyEvent, APIGatewayProxyResult } from "aws-lambda"
import {
  INVOICE_SYNC_SCHEDULES,
  type SaveVendorConfigurationInput,
} from "../../../domain/configuration/VendorConfiguration"
import { ValidationError } from "../../../shared/errors"
import type { JsonObject } from "../../../shared/types"
import { getContext } from "../../context"
import { optionalBoolean, optionalString } from "../../input"
import { body, errorResponse, ok } from "../http"

function readSaveInput(source: JsonObject): SaveVendorConfigurationInput {
  const input: SaveVendorConfigurationInput = {}

  if ("base_url" in source) {
    input.baseUrl = optionalString(source, "base_url")
  }
  if ("client_id" in source) {
    input.clientId = optionalString(source, "client_id")
  }
  if ("client_secret" in source) {
    input.clientSecret = optionalString(source, "client_secret")
  }

  const disabled = optionalBoolean(source, "disabled")
  if (disabled !== null) {
    input.disabled = disabled
  }

  const schedule = optionalString(source, "sync_schedule")
  if (schedule !== null) {
    const syncSchedule = INVOICE_SYNC_SCHEDULES.find((candidate) => candidate === schedule)
    if (!syncSchedule) {
      throw new ValidationError(
        `sync_schedule must be one of ${INVOICE_SYNC_SCHEDULES.join(", ")}`,
        "syncSchedule"
      )
    }
    input.syncSchedule = syncSchedule
  }

  return input
}

export async function getConfigurationHandler(): Promise<APIGatewayProxyResult> {
  try {
    const configuration = await getContext().configuration.getConfiguration()
    return ok(configuration, configuration ? undefined : "No POS Vendor Configuration saved yet")
  } catch (error) {
    return errorResponse(error, "ConfigurationAPI")
  }
}

export async function saveConfigurationHandler(
  event: APIGatewayProxyEvent
): Promise<APIGatewayProxyResult> {
  try {
    const saved = await getContext().configuration.saveConfiguration(readSaveInput(body(event)))
    return ok(saved, "POS Vendor Configuration saved")
  } catch (error) {
    return errorResponse(error, "ConfigurationAPI")
  }
}

export async function fetchTokenHandler(): Promise<APIGatewayProxyResult> {
  try {
    const result = await getContext().configuration.fetchPosVendorToken()
    return ok({ tokenExpiresAt: result.tokenExpiresAt }, result.message)
  } catch (error) {
    return errorResponse(error, "ConfigurationAPI")
  }
}
