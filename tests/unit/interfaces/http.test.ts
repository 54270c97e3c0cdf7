/**
 * API response helper Unit Tests
 */

import { created, errorResponse, ok, pathParameter } from "../../../src/interfaces/api/http"
import { NotFoundError, RemoteApiError, ValidationError } from "../../../src/shared/errors"
import { apiEvent } from "../../helpers/apiEvent"

describe("http", () => {
  it("should wrap data in a success envelope", () => {
    expect(ok({ id: "1" }, "Done")).toEqual({
      statusCode: 200,
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ success: true, message: "Done", data: { id: "1" } }),
    })
    expect(created([]).statusCode).toBe(201)
    expect(JSON.parse(created([]).body)).toEqual({ success: true, data: [] })
  })

  it("should answer app errors with their own status", () => {
    const validation = errorResponse(new ValidationError("zone_id is required", "zone_id"), "Test")
    const remote = errorResponse(new RemoteApiError("Service unavailable", 503), "Test")
    const missing = errorResponse(new NotFoundError("VAT invoice"), "Test")

    expect(validation.statusCode).toBe(400)
    expect(JSON.parse(validation.body)).toEqual({
      success: false,
      error: "zone_id is required",
      code: "VALIDATION_ERROR",
      field: "zone_id",
    })
    expect(remote.statusCode).toBe(502)
    expect(JSON.parse(remote.body)).toMatchObject({ code: "REMOTE_API_ERROR", remoteStatus: 503 })
    expect(missing.statusCode).toBe(404)
  })

  it("should hide unexpected errors behind a 500", () => {
    const response = errorResponse(new Error("boom"), "Test")

    expect(response.statusCode).toBe(500)
    expect(JSON.parse(response.body)).toEqual({ success: false, error: "Internal server error" })
    expect(console.error).toHaveBeenCalledWith("[Test] Error:", new Error("boom"))
  })

  it("should require path parameters", () => {
    expect(pathParameter(apiEvent({ pathParameters: { id: "abc" } }), "id")).toBe("abc")
    expect(() => pathParameter(apiEvent(), "id")).toThrow("Missing path parameter: id")
  })
})
