/**
 * VAT Invoice Auto Sync Lambda Handler
 *
 * EventBridge trigger: scheduled. Submits every Pending and Failed invoice.
 * Individual failures stay on their invoices; the run itself only fails
 * when the batch could not start.
 */

import type { EventBridgeEvent } from "aws-lambda"
import { getContext } from "../../context"

export async function handler(
  event: EventBridgeEvent<"Scheduled Event", unknown>
): Promise<void> {
  console.log(`[AutoSyncVatInvoices] Scheduled run ${event.id}`)

  try {
    const configuration = await getContext().configuration.getConfiguration()
    if (configuration?.disabled) {
      console.log("[AutoSyncVatInvoices] POS Vendor Configuration is disabled. Skipping sync.")
      return
    }

    const summary = await getContext().invoices.autoSyncVatInvoices()

    console.log(
      `[AutoSyncVatInvoices] Sync completed: ${summary.synced} synced, ${summary.failed} failed of ${summary.total}`
    )
  } catch (error) {
    console.error("[AutoSyncVatInvoices] Error:", error)
    throw error
  }
}
