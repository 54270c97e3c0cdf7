/**
 * DynamoDB Retailer Branch Repository
 *
 * Uses the registrations table, partition BRANCH, with retailer-index
 * (GSI1) for the branches of one retailer.
 */

import { randomUUID } from "crypto"
import { GetCommand, PutCommand, QueryCommand, type QueryCommandInput } from "@aws-sdk/lib-dynamodb"
import type {
  CreateBranchInput,
  RetailerBranchRegistration,
  RetailerBranchRepository,
  UpdateBranchInput,
} from "../../../domain/retailer/Retailer"
import { NotFoundError } from "../../../shared/errors"
import { readDate, readOptionalString, readString, type DocumentClient, type Item } from "../items"
import { readRegistrationStatus } from "./RetailerRepository"

export class DynamoDBRetailerBranchRepository implements RetailerBranchRepository {
  constructor(
    private client: DocumentClient,
    private tableName: string = "registrations"
  ) {}

  async findById(id: string): Promise<RetailerBranchRegistration | null> {
    const command = new GetCommand({
      TableName: this.tableName,
      Key: {
        PK: "BRANCH",
        SK: id,
      },
    })

    const response = await this.client.send(command)

    if (!response.Item) {
      return null
    }

    return this.mapItemToBranch(response.Item)
  }

  async findByRetailerId(retailerId: string): Promise<RetailerBranchRegistration[]> {
    return this.queryAll({
      TableName: this.tableName,
      IndexName: "retailer-index",
      KeyConditionExpression: "GSI1PK = :gsi1pk",
      ExpressionAttributeValues: {
        ":gsi1pk": `RETAILER#${retailerId}`,
      },
    })
  }

  async findAll(): Promise<RetailerBranchRegistration[]> {
    return this.queryAll({
      TableName: this.tableName,
      KeyConditionExpression: "PK = :pk",
      ExpressionAttributeValues: {
        ":pk": "BRANCH",
      },
    })
  }

  async create(input: CreateBranchInput): Promise<RetailerBranchRegistration> {
    const now = new Date()

    const branch: RetailerBranchRegistration = {
      id: randomUUID(),
      retailerId: input.retailerId,
      branchName: input.branchName,
      branchAddress: input.branchAddress ?? null,
      zoneId: input.zoneId,
      divisionId: input.divisionId,
      circleId: input.circleId,
      status: "Draft",
      remoteBranchId: null,
      lastMessage: null,
      lastApiResponse: null,
      createdAt: now,
      updatedAt: now,
    }

    const command = new PutCommand({
      TableName: this.tableName,
      Item: this.mapBranchToItem(branch),
      ConditionExpression: "attribute_not_exists(PK) AND attribute_not_exists(SK)",
    })

    await this.client.send(command)

    return branch
  }

  async update(id: string, updates: UpdateBranchInput): Promise<RetailerBranchRegistration> {
    const existing = await this.findById(id)
    if (!existing) {
      throw new NotFoundError("Retailer branch registration")
    }

    const updated = {
      ...existing,
      ...updates,
      updatedAt: new Date(),
    }

    const command = new PutCommand({
      TableName: this.tableName,
      Item: this.mapBranchToItem(updated),
    })

    await this.client.send(command)

    return updated
  }

  private async queryAll(input: QueryCommandInput): Promise<RetailerBranchRegistration[]> {
    const branches: RetailerBranchRegistration[] = []
    let exclusiveStartKey: Item | undefined

    do {
      const response = await this.client.send(
        new QueryCommand({ ...input, ExclusiveStartKey: exclusiveStartKey })
      )
      for (const item of response.Items ?? []) {
        branches.push(this.mapItemToBranch(item))
      }
      exclusiveStartKey = response.LastEvaluatedKey
    } while (exclusiveStartKey)

    return branches
  }

  private mapItemToBranch(item: Item): RetailerBranchRegistration {
    return {
      id: readString(item, "SK"),
      retailerId: readString(item, "retailer_id"),
      branchName: readString(item, "branch_name"),
      branchAddress: readOptionalString(item, "branch_address"),
      zoneId: readString(item, "zone_id"),
      divisionId: readString(item, "division_id"),
      circleId: readString(item, "circle_id"),
      status: readRegistrationStatus(item),
      remoteBranchId: readOptionalString(item, "remote_branch_id"),
      lastMessage: readOptionalString(item, "last_message"),
      lastApiResponse: readOptionalString(item, "last_api_response"),
      createdAt: readDate(item, "created_at"),
      updatedAt: readDate(item, "updated_at"),
    }
  }

  private mapBranchToItem(branch: RetailerBranchRegistration): Item {
    const item: Item = {
      PK: "BRANCH",
      SK: branch.id,
      GSI1PK: `RETAILER#${branch.retailerId}`,
      GSI1SK: `BRANCH#${branch.id}`,
      retailer_id: branch.retailerId,
      branch_name: branch.branchName,
      zone_id: branch.zoneId,
      division_id: branch.divisionId,
      circle_id: branch.circleId,
      status: branch.status,
      created_at: branch.createdAt.toISOString(),
      updated_at: branch.updatedAt.toISOString(),
    }

    if (branch.branchAddress !== null) {
      item.branch_address = branch.branchAddress
    }
    if (branch.remoteBranchId !== null) {
      item.remote_branch_id = branch.remoteBranchId
    }
    if (branch.lastMessage !== null) {
      item.last_message = branch.lastMessage
    }
    if (branch.lastApiResponse !== null) {
      item.last_api_response = branch.lastApiResponse
    }

    return item
  }
}
