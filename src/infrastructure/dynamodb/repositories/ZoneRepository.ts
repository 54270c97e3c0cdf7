/**
 * DynamoDB Zone Repository
 */

import type { ReferenceInput, Zone } from "../../../domain/reference/ReferenceData"
import type { Item } from "../items"
import { DynamoDBReferenceRepository } from "./ReferenceRepository"

export class DynamoDBZoneRepository extends DynamoDBReferenceRepository<Zone> {
  protected readonly entity = "ZONE"
  protected readonly label = "Zone"

  protected build(input: ReferenceInput<Zone>, now: Date): Zone {
    return { ...input, createdAt: now, updatedAt: now }
  }

  protected mapAttributes(): Item {
    return {}
  }

  protected mapItem(item: Item): Zone {
    return this.mapBase(item)
  }
}
