/**
 * API Gateway response helpers
 */

import type { APIGatewayProxyEvent, APIGatewayProxyResult } from "aws-lambda"
import { AppError, ConfigurationError, RemoteApiError, ValidationError } from "../../shared/errors"
import type { ApiResponse, JsonObject } from "../../shared/types"
import { fromParameters, parseJsonObject } from "../input"

export function jsonResponse(statusCode: number, body: ApiResponse & JsonObject): APIGatewayProxyResult {
  return {
    statusCode,
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  }
}

export function ok(data: unknown, message?: string): APIGatewayProxyResult {
  return jsonResponse(200, { success: true, ...(message ? { message } : {}), data })
}

export function created(data: unknown, message?: string): APIGatewayProxyResult {
  return jsonResponse(201, { success: true, ...(message ? { message } : {}), data })
}

/**
 * AppError subclasses answer with their own status; anything else is logged
 * and answered with 500.
 */
export function errorResponse(error: unknown, tag: string): APIGatewayProxyResult {
  if (error instanceof AppError) {
    const body: ApiResponse & JsonObject = { success: false, error: error.message }
    if (error.code) {
      body.code = error.code
    }
    if ((error instanceof ValidationError || error instanceof ConfigurationError) && error.field) {
      body.field = error.field
    }
    if (error instanceof RemoteApiError) {
      body.remoteStatus = error.remoteStatus
    }
    console.warn(`[${tag}] ${error.name}: ${error.message}`)
    return jsonResponse(error.statusCode, body)
  }

  console.error(`[${tag}] Error:`, error)
  return jsonResponse(500, { success: false, error: "Internal server error" })
}

export function body(event: APIGatewayProxyEvent): JsonObject {
  return parseJsonObject(event.body)
}

export function query(event: APIGatewayProxyEvent): JsonObject {
  return fromParameters(event.queryStringParameters)
}

export function pathParameter(event: APIGatewayProxyEvent, name: string): string {
  const value = event.pathParameters?.[name]
  if (!value) {
    throw new ValidationError(`Missing path parameter: ${name}`, name)
  }
  return value
}
