/**
 * Retailers API Handler (Lambda Function)
 *
 * GET /api/retailers - List retailer registrations
 * POST /api/retailers - Register a retailer with the tax authority
 * GET /api/retailers/{id} - Get single retailer registration
 * POST /api/retailers/{id}/resubmit - Resubmit a Draft or Failed retailer
 * POST /api/retailers/{id}/documents - Upload a document (file_path, document_category_key)
 * GET /api/branches - List branches, ?retailer_id= filters
 * POST /api/branches - Register a branch
 * POST /api/branches/{id}/resubmit - Resubmit a Draft or Failed branch
 */

import type { APIGatewayProxyEvent, APIGatewayProxyResult } from "aws-lambda"
import type { CreateBranchInput, CreateRetailerInput } from "../../../domain/retailer/Retailer"
import type { JsonObject } from "../../../shared/types"
import { getContext } from "../../context"
import { optionalString, requireString, stringList } from "../../input"
import { body, created, errorResponse, ok, pathParameter, query } from "../http"

function readRetailerInput(source: JsonObject): CreateRetailerInput {
  return {
    retailerName: requireString(source, "retailer_name"),
    ownerName: requireString(source, "owner_name"),
    mobileNo: requireString(source, "mobile_no"),
    email: optionalString(source, "email"),
    nidNo: optionalString(source, "nid_no"),
    binNo: optionalString(source, "bin_no"),
    tinNo: optionalString(source, "tin_no"),
    tradeLicenseNo: optionalString(source, "trade_license_no"),
    businessAddress: optionalString(source, "business_address"),
    serviceTypeIds: stringList(source, "service_type_ids"),
    zoneId: requireString(source, "zone_id"),
    divisionId: requireString(source, "division_id"),
    circleId: requireString(source, "circle_id"),
    vatCommissionRateId: requireString(source, "vat_commissionrate_id"),
  }
}

function readBranchInput(source: JsonObject): CreateBranchInput {
  return {
    retailerId: requireString(source, "retailer_id"),
    branchName: requireString(source, "branch_name"),
    branchAddress: optionalString(source, "branch_address"),
    zoneId: requireString(source, "zone_id"),
    divisionId: requireString(source, "division_id"),
    circleId: requireString(source, "circle_id"),
  }
}

export async function listRetailersHandler(): Promise<APIGatewayProxyResult> {
  try {
    return ok(await getContext().registration.listRetailers())
  } catch (error) {
    return errorResponse(error, "RetailersAPI")
  }
}

export async function getRetailerHandler(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    return ok(await getContext().registration.getRetailer(pathParameter(event, "id")))
  } catch (error) {
    return errorResponse(error, "RetailersAPI")
  }
}

export async function registerRetailerHandler(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const result = await getContext().registration.registerRetailer(readRetailerInput(body(event)))
    return created(result, result.message)
  } catch (error) {
    return errorResponse(error, "RetailersAPI")
  }
}

export async function resubmitRetailerHandler(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const result = await getContext().registration.resubmitRetailer(pathParameter(event, "id"))
    return ok(result, result.message)
  } catch (error) {
    return errorResponse(error, "RetailersAPI")
  }
}

export async function uploadFileHandler(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const source = body(event)
    const result = await getContext().registration.uploadFile(
      requireString(source, "file_path"),
      pathParameter(event, "id"),
      requireString(source, "document_category_key")
    )
    return ok(result, result.message)
  } catch (error) {
    return errorResponse(error, "RetailersAPI")
  }
}

export async function listBranchesHandler(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const retailerId = optionalString(query(event), "retailer_id")
    return ok(await getContext().registration.listBranches(retailerId ?? undefined))
  } catch (error) {
    return errorResponse(error, "RetailersAPI")
  }
}

export async function registerBranchHandler(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const result = await getContext().registration.registerBranch(readBranchInput(body(event)))
    return created(result, result.message)
  } catch (error) {
    return errorResponse(error, "RetailersAPI")
  }
}

export async function resubmitBranchHandler(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const result = await getContext().registration.resubmitBranch(pathParameter(event, "id"))
    return ok(result, result.message)
  } catch (error) {
    return errorResponse(error, "RetailersAPI")
  }
}
