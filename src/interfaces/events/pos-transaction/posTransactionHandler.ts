/**
 * POS Transaction Lambda Handler
 *
 * EventBridge trigger: a point-of-sale transaction was finalized.
 * Sales create a VAT invoice (synced immediately under the "After Submit"
 * schedule); returns are recorded against the original invoice.
 */

import type { EventBridgeEvent } from "aws-lambda"
import { isJsonObject } from "../../../shared/types"
import { ValidationError } from "../../../shared/errors"
import { getContext } from "../../context"
import { isReturnTransaction, readPosTransaction, readReturnInput } from "../../posTransaction"

export async function handler(
  event: EventBridgeEvent<"POS Transaction Submitted", unknown>
): Promise<void> {
  console.log(`[PosTransaction] Event ${event.id} received from ${event.source}`)

  try {
    const detail = event.detail
    if (!isJsonObject(detail)) {
      throw new ValidationError("POS transaction event carries no detail object")
    }

    const { invoices } = getContext()

    if (isReturnTransaction(detail)) {
      const invoice = await invoices.returnVatInvoice(readReturnInput(detail))
      console.log(`[PosTransaction] Return recorded on ${invoice.id}, status ${invoice.status}`)
      return
    }

    const result = await invoices.createFromPosTransaction(readPosTransaction(detail))
    console.log(
      `[PosTransaction] VAT invoice ${result.invoice.id} ${result.created ? "created" : "already existed"}` +
      (result.sync ? `, sync: ${result.sync.status} (${result.sync.message})` : "")
    )
  } catch (error) {
    console.error("[PosTransaction] Error:", error)
    throw error
  }
}
