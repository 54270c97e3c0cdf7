/**
 * Reference Data Service
 *
 * Cached listing of master data and jurisdiction lookups. Stored rows are
 * served as-is; the matching sync runs first when the caller forces it or
 * nothing has been stored yet.
 */

import type {
  Circle,
  Division,
  ReferenceRecord,
  RemoteRecordRepository,
  ServiceType,
  VatCommissionRate,
  Zone,
} from "../../domain/reference/ReferenceData"
import { validateJurisdiction } from "../../domain/reference/hierarchy"
import { NotFoundError } from "../../shared/errors"
import type { ReferenceDataSyncService, ReferenceRepositories } from "../sync/ReferenceDataSyncService"

export interface JurisdictionIds {
  zoneId: string
  divisionId: string
  circleId: string
  vatCommissionRateId?: string | null
}

export interface ResolvedJurisdiction {
  zone: Zone
  division: Division
  circle: Circle
  vatCommissionRate: VatCommissionRate | null
}

function byName<T extends ReferenceRecord>(a: T, b: T): number {
  return a.name.localeCompare(b.name) || a.remoteId.localeCompare(b.remoteId)
}

export class ReferenceDataService {
  constructor(
    private repositories: ReferenceRepositories,
    private syncService: ReferenceDataSyncService
  ) {}

  async listZones(forceRefresh: boolean = false): Promise<Zone[]> {
    return this.cached(this.repositories.zones, forceRefresh, () => this.syncService.syncZones())
  }

  async listServiceTypes(forceRefresh: boolean = false): Promise<ServiceType[]> {
    return this.cached(this.repositories.serviceTypes, forceRefresh, () =>
      this.syncService.syncServiceTypes()
    )
  }

  async listVatCommissionRates(forceRefresh: boolean = false, zoneId?: string | null): Promise<VatCommissionRate[]> {
    const rates = await this.cached(this.repositories.vatCommissionRates, forceRefresh, () =>
      this.syncService.syncVatCommissionRates()
    )
    return zoneId ? rates.filter((rate) => rate.zoneId === zoneId) : rates
  }

  /**
   * Divisions open to every rate (no vatCommissionRateId) are kept under a
   * rate filter.
   */
  async listDivisions(forceRefresh: boolean = false, vatCommissionRateId?: string | null): Promise<Division[]> {
    const divisions = await this.cached(this.repositories.divisions, forceRefresh, () =>
      this.syncService.syncDivisions()
    )
    if (!vatCommissionRateId) {
      return divisions
    }
    return divisions.filter(
      (division) => division.vatCommissionRateId === null || division.vatCommissionRateId === vatCommissionRateId
    )
  }

  async listCircles(forceRefresh: boolean = false, divisionId?: string | null): Promise<Circle[]> {
    const circles = await this.cached(this.repositories.circles, forceRefresh, () =>
      this.syncService.syncCircles()
    )
    return divisionId ? circles.filter((circle) => circle.divisionId === divisionId) : circles
  }

  async getServiceType(remoteId: string): Promise<ServiceType> {
    return this.require(this.repositories.serviceTypes, remoteId, "Service type")
  }

  /**
   * Loads every selected record and checks they belong together
   */
  async resolveJurisdiction(ids: JurisdictionIds): Promise<ResolvedJurisdiction> {
    const zone = await this.require(this.repositories.zones, ids.zoneId, "Zone")
    const division = await this.require(this.repositories.divisions, ids.divisionId, "Division")
    const circle = await this.require(this.repositories.circles, ids.circleId, "Circle")
    const vatCommissionRate = ids.vatCommissionRateId
      ? await this.require(this.repositories.vatCommissionRates, ids.vatCommissionRateId, "VAT commission rate")
      : null

    validateJurisdiction({
      zone,
      division,
      circle,
      vatCommissionRate: vatCommissionRate ?? undefined,
    })

    return { zone, division, circle, vatCommissionRate }
  }

  private async require<T extends ReferenceRecord>(
    repository: RemoteRecordRepository<T>,
    remoteId: string,
    label: string
  ): Promise<T> {
    const record = await repository.findByRemoteId(remoteId)
    if (!record) {
      throw new NotFoundError(`${label} ${remoteId}`)
    }
    return record
  }

  private async cached<T extends ReferenceRecord>(
    repository: RemoteRecordRepository<T>,
    forceRefresh: boolean,
    sync: () => Promise<unknown>
  ): Promise<T[]> {
    if (!forceRefresh) {
      const stored = await repository.findAll()
      if (stored.length > 0) {
        return stored.sort(byName)
      }
    }

    await sync()
    const rows = await repository.findAll()
    return rows.sort(byName)
  }
}
