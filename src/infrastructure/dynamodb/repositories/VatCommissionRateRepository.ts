/**
 * DynamoDB VAT Commission Rate Repository
 */

import type { ReferenceInput, VatCommissionRate } from "../../../domain/reference/ReferenceData"
import { readNumber, readOptionalString, readString, type Item } from "../items"
import { DynamoDBReferenceRepository } from "./ReferenceRepository"

export class DynamoDBVatCommissionRateRepository extends DynamoDBReferenceRepository<VatCommissionRate> {
  protected readonly entity = "VAT_COMMISSION_RATE"
  protected readonly label = "VAT commission rate"

  protected build(input: ReferenceInput<VatCommissionRate>, now: Date): VatCommissionRate {
    return { ...input, createdAt: now, updatedAt: now }
  }

  protected mapAttributes(rate: VatCommissionRate): Item {
    const item: Item = {
      rate: rate.rate,
      zone_id: rate.zoneId,
    }

    if (rate.divisionId !== null) {
      item.division_id = rate.divisionId
    }
    if (rate.circleId !== null) {
      item.circle_id = rate.circleId
    }
    if (rate.serviceTypeId !== null) {
      item.service_type_id = rate.serviceTypeId
    }

    return item
  }

  protected mapItem(item: Item): VatCommissionRate {
    return {
      ...this.mapBase(item),
      rate: readNumber(item, "rate"),
      zoneId: readString(item, "zone_id"),
      divisionId: readOptionalString(item, "division_id"),
      circleId: readOptionalString(item, "circle_id"),
      serviceTypeId: readOptionalString(item, "service_type_id"),
    }
  }
}
