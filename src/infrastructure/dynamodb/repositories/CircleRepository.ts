/**
 * DynamoDB Circle Repository
 */

import type { Circle, ReferenceInput } from "../../../domain/reference/ReferenceData"
import { readString, type Item } from "../items"
import { DynamoDBReferenceRepository } from "./ReferenceRepository"

export class DynamoDBCircleRepository extends DynamoDBReferenceRepository<Circle> {
  protected readonly entity = "CIRCLE"
  protected readonly label = "Circle"

  protected build(input: ReferenceInput<Circle>, now: Date): Circle {
    return { ...input, createdAt: now, updatedAt: now }
  }

  protected mapAttributes(circle: Circle): Item {
    return {
      division_id: circle.divisionId,
      zone_id: circle.zoneId,
    }
  }

  protected mapItem(item: Item): Circle {
    return {
      ...this.mapBase(item),
      divisionId: readString(item, "division_id"),
      zoneId: readString(item, "zone_id"),
    }
  }
}
