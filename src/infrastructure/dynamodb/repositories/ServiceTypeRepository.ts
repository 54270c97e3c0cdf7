/**
 * DynamoDB Service Type Repository
 *
 * The sort key is the authority's service type code.
 */

import type { ReferenceInput, ServiceType } from "../../../domain/reference/ReferenceData"
import type { Item } from "../items"
import { DynamoDBReferenceRepository } from "./ReferenceRepository"

export class DynamoDBServiceTypeRepository extends DynamoDBReferenceRepository<ServiceType> {
  protected readonly entity = "SERVICE_TYPE"
  protected readonly label = "Service type"

  protected build(input: ReferenceInput<ServiceType>, now: Date): ServiceType {
    return { ...input, createdAt: now, updatedAt: now }
  }

  protected mapAttributes(): Item {
    return {}
  }

  protected mapItem(item: Item): ServiceType {
    return this.mapBase(item)
  }
}
