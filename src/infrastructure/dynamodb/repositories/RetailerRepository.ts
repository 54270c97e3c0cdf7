/**
 * DynamoDB Retailer Registration Repository
 *
 * Uses the registrations table, partition RETAILER.
 */

import { randomUUID } from "crypto"
import { GetCommand, PutCommand, QueryCommand } from "@aws-sdk/lib-dynamodb"
import {
  DOCUMENT_CATEGORY_KEYS,
  type CreateRetailerInput,
  type RegistrationStatus,
  type RetailerDocument,
  type RetailerRegistration,
  type RetailerRepository,
  type UpdateRetailerInput,
} from "../../../domain/retailer/Retailer"
import { NotFoundError } from "../../../shared/errors"
import {
  readDate,
  readMap,
  readOptionalString,
  readString,
  readStringList,
  type DocumentClient,
  type Item,
} from "../items"

const REGISTRATION_STATUSES: readonly RegistrationStatus[] = ["Draft", "Registered", "Existing", "Failed"]

export function readRegistrationStatus(item: Item): RegistrationStatus {
  const value = item.status
  return REGISTRATION_STATUSES.find((status) => status === value) ?? "Draft"
}

export class DynamoDBRetailerRepository implements RetailerRepository {
  constructor(
    private client: DocumentClient,
    private tableName: string = "registrations"
  ) {}

  async findById(id: string): Promise<RetailerRegistration | null> {
    const command = new GetCommand({
      TableName: this.tableName,
      Key: {
        PK: "RETAILER",
        SK: id,
      },
    })

    const response = await this.client.send(command)

    if (!response.Item) {
      return null
    }

    return this.mapItemToRetailer(response.Item)
  }

  async findAll(): Promise<RetailerRegistration[]> {
    const retailers: RetailerRegistration[] = []
    let exclusiveStartKey: Item | undefined

    do {
      const command = new QueryCommand({
        TableName: this.tableName,
        KeyConditionExpression: "PK = :pk",
        ExpressionAttributeValues: {
          ":pk": "RETAILER",
        },
        ExclusiveStartKey: exclusiveStartKey,
      })

      const response = await this.client.send(command)
      for (const item of response.Items ?? []) {
        retailers.push(this.mapItemToRetailer(item))
      }
      exclusiveStartKey = response.LastEvaluatedKey
    } while (exclusiveStartKey)

    return retailers
  }

  async create(input: CreateRetailerInput): Promise<RetailerRegistration> {
    const now = new Date()

    const retailer: RetailerRegistration = {
      id: randomUUID(),
      retailerName: input.retailerName,
      ownerName: input.ownerName,
      mobileNo: input.mobileNo,
      email: input.email ?? null,
      nidNo: input.nidNo ?? null,
      binNo: input.binNo ?? null,
      tinNo: input.tinNo ?? null,
      tradeLicenseNo: input.tradeLicenseNo ?? null,
      businessAddress: input.businessAddress ?? null,
      serviceTypeIds: input.serviceTypeIds,
      zoneId: input.zoneId,
      divisionId: input.divisionId,
      circleId: input.circleId,
      vatCommissionRateId: input.vatCommissionRateId,
      status: "Draft",
      remoteRetailerId: null,
      lastMessage: null,
      lastApiResponse: null,
      documents: {},
      createdAt: now,
      updatedAt: now,
    }

    const command = new PutCommand({
      TableName: this.tableName,
      Item: this.mapRetailerToItem(retailer),
      ConditionExpression: "attribute_not_exists(PK) AND attribute_not_exists(SK)",
    })

    await this.client.send(command)

    return retailer
  }

  async update(id: string, updates: UpdateRetailerInput): Promise<RetailerRegistration> {
    const existing = await this.findById(id)
    if (!existing) {
      throw new NotFoundError("Retailer registration")
    }

    const updated = {
      ...existing,
      ...updates,
      updatedAt: new Date(),
    }

    const command = new PutCommand({
      TableName: this.tableName,
      Item: this.mapRetailerToItem(updated),
    })

    await this.client.send(command)

    return updated
  }

  private mapItemToRetailer(item: Item): RetailerRegistration {
    const storedDocuments = readMap(item, "documents")
    const documents: RetailerRegistration["documents"] = {}

    for (const category of DOCUMENT_CATEGORY_KEYS) {
      const document = readMap(storedDocuments, category)
      if (Object.keys(document).length === 0) {
        continue
      }
      const entry: RetailerDocument = {
        fileUrl: readOptionalString(document, "file_url"),
        message: readOptionalString(document, "message"),
        uploadedAt: readDate(document, "uploaded_at"),
      }
      documents[category] = entry
    }

    return {
      id: readString(item, "SK"),
      retailerName: readString(item, "retailer_name"),
      ownerName: readString(item, "owner_name"),
      mobileNo: readString(item, "mobile_no"),
      email: readOptionalString(item, "email"),
      nidNo: readOptionalString(item, "nid_no"),
      binNo: readOptionalString(item, "bin_no"),
      tinNo: readOptionalString(item, "tin_no"),
      tradeLicenseNo: readOptionalString(item, "trade_license_no"),
      businessAddress: readOptionalString(item, "business_address"),
      serviceTypeIds: readStringList(item, "service_type_ids"),
      zoneId: readString(item, "zone_id"),
      divisionId: readString(item, "division_id"),
      circleId: readString(item, "circle_id"),
      vatCommissionRateId: readString(item, "vat_commissionrate_id"),
      status: readRegistrationStatus(item),
      remoteRetailerId: readOptionalString(item, "remote_retailer_id"),
      lastMessage: readOptionalString(item, "last_message"),
      lastApiResponse: readOptionalString(item, "last_api_response"),
      documents,
      createdAt: readDate(item, "created_at"),
      updatedAt: readDate(item, "updated_at"),
    }
  }

  private mapRetailerToItem(retailer: RetailerRegistration): Item {
    const documents: Item = {}
    for (const category of DOCUMENT_CATEGORY_KEYS) {
      const document = retailer.documents[category]
      if (!document) {
        continue
      }
      documents[category] = {
        file_url: document.fileUrl,
        message: document.message,
        uploaded_at: document.uploadedAt.toISOString(),
      }
    }

    const item: Item = {
      PK: "RETAILER",
      SK: retailer.id,
      retailer_name: retailer.retailerName,
      owner_name: retailer.ownerName,
      mobile_no: retailer.mobileNo,
      service_type_ids: retailer.serviceTypeIds,
      zone_id: retailer.zoneId,
      division_id: retailer.divisionId,
      circle_id: retailer.circleId,
      vat_commissionrate_id: retailer.vatCommissionRateId,
      status: retailer.status,
      documents,
      created_at: retailer.createdAt.toISOString(),
      updated_at: retailer.updatedAt.toISOString(),
    }

    const optional: Array<[string, string | null]> = [
      ["email", retailer.email],
      ["nid_no", retailer.nidNo],
      ["bin_no", retailer.binNo],
      ["tin_no", retailer.tinNo],
      ["trade_license_no", retailer.tradeLicenseNo],
      ["business_address", retailer.businessAddress],
      ["remote_retailer_id", retailer.remoteRetailerId],
      ["last_message", retailer.lastMessage],
      ["last_api_response", retailer.lastApiResponse],
    ]
    for (const [key, value] of optional) {
      if (value !== null) {
        item[key] = value
      }
    }

    return item
  }
}
