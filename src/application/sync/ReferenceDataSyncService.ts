/**
 * Reference Data Sync Service
 *
 * Mirrors the tax authority's master data into the reference table.
 *
 * Key Features:
 * - Upsert keyed by the authority's identifier, safe to re-run
 * - Malformed rows are skipped and reported, the batch continues
 * - Unchanged rows are not rewritten
 * - Division and circle rows keep their parent linkage
 */

import type { ChallanApiClient } from "../../infrastructure/authority/ChallanApiClient"
import {
  normalizeCircle,
  normalizeDivision,
  normalizeServiceType,
  normalizeVatCommissionRate,
  normalizeZone,
} from "../../infrastructure/authority/normalize"
import type {
  CircleRepository,
  DivisionRepository,
  ReferenceEntity,
  ReferenceInput,
  ReferenceRecord,
  RemoteRecordRepository,
  ServiceTypeRepository,
  VatCommissionRateRepository,
  ZoneRepository,
} from "../../domain/reference/ReferenceData"
import { ValidationError, errorMessage } from "../../shared/errors"

export interface ReferenceRepositories {
  zones: ZoneRepository
  divisions: DivisionRepository
  circles: CircleRepository
  vatCommissionRates: VatCommissionRateRepository
  serviceTypes: ServiceTypeRepository
}

export interface ReferenceSyncResult {
  entity: ReferenceEntity
  success: boolean
  total: number
  created: number
  updated: number
  unchanged: number
  skipped: number
  errors: string[]
  duration: number
  error?: string
}

export interface ReferenceSyncSummary {
  successful: number
  failed: number
  results: ReferenceSyncResult[]
  duration: number
}

type UpsertOutcome = "created" | "updated" | "unchanged"

function sameFields<T extends ReferenceRecord>(existing: T, input: ReferenceInput<T>): boolean {
  const current = new Map<string, unknown>(Object.entries(existing))
  return Object.entries(input).every(([key, value]) => current.get(key) === value)
}

export class ReferenceDataSyncService {
  constructor(
    private apiClient: ChallanApiClient,
    private repositories: ReferenceRepositories
  ) {}

  async syncZones(): Promise<ReferenceSyncResult> {
    return this.syncRows("ZONE", () => this.apiClient.listZones(), (raw) =>
      this.upsert(this.repositories.zones, normalizeZone(raw))
    )
  }

  async syncServiceTypes(): Promise<ReferenceSyncResult> {
    return this.syncRows("SERVICE_TYPE", () => this.apiClient.listServiceTypes(), (raw) =>
      this.upsert(this.repositories.serviceTypes, normalizeServiceType(raw))
    )
  }

  async syncVatCommissionRates(zoneId?: string | null): Promise<ReferenceSyncResult> {
    return this.syncRows(
      "VAT_COMMISSION_RATE",
      () => this.apiClient.listVatCommissionRates(zoneId),
      (raw) => this.upsert(this.repositories.vatCommissionRates, normalizeVatCommissionRate(raw))
    )
  }

  async syncDivisions(vatCommissionRateId?: string | null): Promise<ReferenceSyncResult> {
    return this.syncRows(
      "DIVISION",
      () => this.apiClient.listDivisions(vatCommissionRateId),
      (raw) => this.upsert(this.repositories.divisions, normalizeDivision(raw))
    )
  }

  async syncCircles(divisionId?: string | null): Promise<ReferenceSyncResult> {
    return this.syncRows(
      "CIRCLE",
      () => this.apiClient.listCircles(divisionId),
      async (raw) => {
        const row = normalizeCircle(raw)
        let zoneId = row.zoneId

        if (zoneId === null) {
          const division = await this.repositories.divisions.findByRemoteId(row.divisionId)
          if (!division) {
            throw new ValidationError(
              `Circle ${row.remoteId} has no zone_id and division ${row.divisionId} is not synced`,
              "zone_id"
            )
          }
          zoneId = division.zoneId
        }

        return this.upsert(this.repositories.circles, { ...row, zoneId })
      }
    )
  }

  /**
   * Parents before children, so circles can resolve their zone
   */
  async syncAll(): Promise<ReferenceSyncSummary> {
    const startTime = Date.now()
    const routines: Array<[ReferenceEntity, () => Promise<ReferenceSyncResult>]> = [
      ["SERVICE_TYPE", () => this.syncServiceTypes()],
      ["ZONE", () => this.syncZones()],
      ["VAT_COMMISSION_RATE", () => this.syncVatCommissionRates()],
      ["DIVISION", () => this.syncDivisions()],
      ["CIRCLE", () => this.syncCircles()],
    ]

    const results: ReferenceSyncResult[] = []
    for (const [entity, routine] of routines) {
      try {
        results.push(await routine())
      } catch (error) {
        console.error(`[ReferenceSync] ${entity} sync failed:`, error)
        results.push({
          entity,
          success: false,
          total: 0,
          created: 0,
          updated: 0,
          unchanged: 0,
          skipped: 0,
          errors: [],
          duration: 0,
          error: errorMessage(error),
        })
      }
    }

    const successful = results.filter((r) => r.success).length

    return {
      successful,
      failed: results.length - successful,
      results,
      duration: Date.now() - startTime,
    }
  }

  private async upsert<T extends ReferenceRecord>(
    repository: RemoteRecordRepository<T>,
    input: ReferenceInput<T>
  ): Promise<UpsertOutcome> {
    const existing = await repository.findByRemoteId(input.remoteId)

    if (!existing) {
      await repository.create(input)
      return "created"
    }

    if (sameFields(existing, input)) {
      return "unchanged"
    }

    await repository.update(input.remoteId, input)
    return "updated"
  }

  private async syncRows(
    entity: ReferenceEntity,
    fetchRows: () => Promise<unknown[]>,
    upsertRow: (raw: unknown) => Promise<UpsertOutcome>
  ): Promise<ReferenceSyncResult> {
    const startTime = Date.now()

    console.log(`[ReferenceSync] Fetching ${entity} rows`)
    const rows = await fetchRows()

    const result: ReferenceSyncResult = {
      entity,
      success: true,
      total: rows.length,
      created: 0,
      updated: 0,
      unchanged: 0,
      skipped: 0,
      errors: [],
      duration: 0,
    }

    for (const [index, raw] of rows.entries()) {
      try {
        const outcome = await upsertRow(raw)
        result[outcome]++
      } catch (error) {
        if (!(error instanceof ValidationError)) {
          throw error
        }
        result.skipped++
        result.errors.push(`Row ${index}: ${error.message}`)
        console.warn(`[ReferenceSync] Skipping ${entity} row ${index}: ${error.message}`)
      }
    }

    result.duration = Date.now() - startTime

    console.log(
      `[ReferenceSync] ${entity}: ${result.total} rows ` +
      `(${result.created} created, ${result.updated} updated, ${result.unchanged} unchanged, ` +
      `${result.skipped} skipped) in ${result.duration}ms`
    )

    return result
  }
}
