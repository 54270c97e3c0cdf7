/**
 * DynamoDB Reference Data Repository Base
 *
 * All master data shares one table. The partition key is the entity kind
 * (ZONE, DIVISION, ...) and the sort key the authority's identifier, so an
 * upsert lookup is a single GetItem and listing a kind is one Query.
 */

import { GetCommand, PutCommand, QueryCommand } from "@aws-sdk/lib-dynamodb"
import type {
  ReferenceEntity,
  ReferenceInput,
  ReferenceRecord,
  RemoteRecordRepository,
} from "../../../domain/reference/ReferenceData"
import { NotFoundError } from "../../../shared/errors"
import { readDate, readString, type DocumentClient, type Item } from "../items"

export abstract class DynamoDBReferenceRepository<T extends ReferenceRecord>
  implements RemoteRecordRepository<T>
{
  protected abstract readonly entity: ReferenceEntity
  protected abstract readonly label: string

  constructor(
    protected client: DocumentClient,
    protected tableName: string = "reference_data"
  ) {}

  async findByRemoteId(remoteId: string): Promise<T | null> {
    const command = new GetCommand({
      TableName: this.tableName,
      Key: {
        PK: this.entity,
        SK: remoteId,
      },
    })

    const response = await this.client.send(command)

    if (!response.Item) {
      return null
    }

    return this.mapItem(response.Item)
  }

  async findAll(): Promise<T[]> {
    const records: T[] = []
    let exclusiveStartKey: Item | undefined

    do {
      const command = new QueryCommand({
        TableName: this.tableName,
        KeyConditionExpression: "PK = :pk",
        ExpressionAttributeValues: {
          ":pk": this.entity,
        },
        ExclusiveStartKey: exclusiveStartKey,
      })

      const response = await this.client.send(command)
      for (const item of response.Items ?? []) {
        records.push(this.mapItem(item))
      }
      exclusiveStartKey = response.LastEvaluatedKey
    } while (exclusiveStartKey)

    return records
  }

  async create(input: ReferenceInput<T>): Promise<T> {
    const now = new Date()
    const record = this.build(input, now)

    const command = new PutCommand({
      TableName: this.tableName,
      Item: this.toItem(record),
      ConditionExpression: "attribute_not_exists(PK) AND attribute_not_exists(SK)",
    })

    await this.client.send(command)

    return record
  }

  async update(remoteId: string, updates: Partial<ReferenceInput<T>>): Promise<T> {
    const existing = await this.findByRemoteId(remoteId)
    if (!existing) {
      throw new NotFoundError(this.label)
    }

    const updated: T = {
      ...existing,
      ...updates,
      remoteId: existing.remoteId,
      updatedAt: new Date(),
    }

    const command = new PutCommand({
      TableName: this.tableName,
      Item: this.toItem(updated),
    })

    await this.client.send(command)

    return updated
  }

  protected abstract build(input: ReferenceInput<T>, now: Date): T

  /** Entity-specific attributes, beyond keys, name and timestamps */
  protected abstract mapAttributes(record: T): Item

  protected abstract mapItem(item: Item): T

  protected mapBase(item: Item): ReferenceRecord {
    return {
      remoteId: readString(item, "SK"),
      name: readString(item, "name"),
      createdAt: readDate(item, "created_at"),
      updatedAt: readDate(item, "updated_at"),
    }
  }

  private toItem(record: T): Item {
    return {
      PK: this.entity,
      SK: record.remoteId,
      name: record.name,
      created_at: record.createdAt.toISOString(),
      updated_at: record.updatedAt.toISOString(),
      ...this.mapAttributes(record),
    }
  }
}
