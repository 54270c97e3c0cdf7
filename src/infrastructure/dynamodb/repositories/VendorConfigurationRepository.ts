/**
 * DynamoDB Vendor Configuration Repository
 *
 * The configuration is a single item in the config table.
 */

import { GetCommand, PutCommand, UpdateCommand } from "@aws-sdk/lib-dynamodb"
import {
  INVOICE_SYNC_SCHEDULES,
  type InvoiceSyncSchedule,
  type StoredToken,
  type VendorConfiguration,
  type VendorConfigurationRepository,
} from "../../../domain/configuration/VendorConfiguration"
import {
  readBoolean,
  readDate,
  readOptionalDate,
  readOptionalString,
  type DocumentClient,
  type Item,
} from "../items"

const KEY = {
  PK: "VENDOR_CONFIGURATION",
  SK: "DEFAULT",
}

function readSchedule(item: Item): InvoiceSyncSchedule {
  const value = item.sync_schedule
  return INVOICE_SYNC_SCHEDULES.find((schedule) => schedule === value) ?? "Scheduled"
}

export class DynamoDBVendorConfigurationRepository implements VendorConfigurationRepository {
  constructor(
    private client: DocumentClient,
    private tableName: string = "config"
  ) {}

  async get(): Promise<VendorConfiguration | null> {
    const command = new GetCommand({
      TableName: this.tableName,
      Key: KEY,
    })

    const response = await this.client.send(command)

    if (!response.Item) {
      return null
    }

    return this.mapItemToConfiguration(response.Item)
  }

  async save(configuration: VendorConfiguration): Promise<VendorConfiguration> {
    const saved = { ...configuration, updatedAt: new Date() }

    const command = new PutCommand({
      TableName: this.tableName,
      Item: this.mapConfigurationToItem(saved),
    })

    await this.client.send(command)

    return saved
  }

  async saveToken(token: StoredToken): Promise<void> {
    const values: Item = {
      ":token": token.accessToken,
      ":updated": new Date().toISOString(),
    }
    const assignments = ["access_token = :token", "updated_at = :updated"]
    const removals: string[] = []

    if (token.tokenExpiresAt) {
      assignments.push("token_expires_at = :expires")
      values[":expires"] = token.tokenExpiresAt.toISOString()
    } else {
      removals.push("token_expires_at")
    }

    if (token.companyId !== null) {
      assignments.push("company_id = :company")
      values[":company"] = token.companyId
    } else {
      removals.push("company_id")
    }

    const command = new UpdateCommand({
      TableName: this.tableName,
      Key: KEY,
      UpdateExpression:
        `SET ${assignments.join(", ")}` + (removals.length > 0 ? ` REMOVE ${removals.join(", ")}` : ""),
      ExpressionAttributeValues: values,
    })

    await this.client.send(command)
  }

  private mapItemToConfiguration(item: Item): VendorConfiguration {
    return {
      baseUrl: readOptionalString(item, "base_url"),
      clientId: readOptionalString(item, "client_id"),
      clientSecret: readOptionalString(item, "client_secret"),
      accessToken: readOptionalString(item, "access_token"),
      tokenExpiresAt: readOptionalDate(item, "token_expires_at"),
      companyId: readOptionalString(item, "company_id"),
      disabled: readBoolean(item, "disabled", false),
      syncSchedule: readSchedule(item),
      updatedAt: readDate(item, "updated_at"),
    }
  }

  private mapConfigurationToItem(configuration: VendorConfiguration): Item {
    const item: Item = {
      ...KEY,
      disabled: configuration.disabled,
      sync_schedule: configuration.syncSchedule,
      updated_at: configuration.updatedAt.toISOString(),
    }

    if (configuration.baseUrl !== null) {
      item.base_url = configuration.baseUrl
    }
    if (configuration.clientId !== null) {
      item.client_id = configuration.clientId
    }
    if (configuration.clientSecret !== null) {
      item.client_secret = configuration.clientSecret
    }
    if (configuration.accessToken !== null) {
      item.access_token = configuration.accessToken
    }
    if (configuration.tokenExpiresAt !== null) {
      item.token_expires_at = configuration.tokenExpiresAt.toISOString()
    }
    if (configuration.companyId !== null) {
      item.company_id = configuration.companyId
    }

    return item
  }
}
