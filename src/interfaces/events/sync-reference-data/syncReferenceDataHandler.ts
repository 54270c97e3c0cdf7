/**
 * Reference Data Sync Lambda Handler
 *
 * EventBridge trigger: scheduled (daily). Mirrors zones, commission rates,
 * divisions, circles and service types from the tax authority.
 */

import type { EventBridgeEvent } from "aws-lambda"
import { getContext } from "../../context"

export async function handler(
  event: EventBridgeEvent<"Scheduled Event", unknown>
): Promise<void> {
  console.log(`[ReferenceSync] Scheduled run ${event.id}`)

  try {
    const summary = await getContext().referenceSync.syncAll()

    console.log("[ReferenceSync] Sync completed:", JSON.stringify(summary, null, 2))

    if (summary.failed > 0) {
      throw new Error(
        `${summary.failed} reference data syncs failed. Check logs for details.`
      )
    }
  } catch (error) {
    console.error("[ReferenceSync] Error:", error)
    throw error
  }
}
