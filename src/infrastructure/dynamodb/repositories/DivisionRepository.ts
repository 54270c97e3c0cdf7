/**
 * DynamoDB Division Repository
 */

import type { Division, ReferenceInput } from "../../../domain/reference/ReferenceData"
import { readOptionalString, readString, type Item } from "../items"
import { DynamoDBReferenceRepository } from "./ReferenceRepository"

export class DynamoDBDivisionRepository extends DynamoDBReferenceRepository<Division> {
  protected readonly entity = "DIVISION"
  protected readonly label = "Division"

  protected build(input: ReferenceInput<Division>, now: Date): Division {
    return { ...input, createdAt: now, updatedAt: now }
  }

  protected mapAttributes(division: Division): Item {
    const item: Item = {
      zone_id: division.zoneId,
    }

    if (division.vatCommissionRateId !== null) {
      item.vat_commissionrate_id = division.vatCommissionRateId
    }

    return item
  }

  protected mapItem(item: Item): Division {
    return {
      ...this.mapBase(item),
      zoneId: readString(item, "zone_id"),
      vatCommissionRateId: readOptionalString(item, "vat_commissionrate_id"),
    }
  }
}
