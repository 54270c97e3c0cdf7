/**
 * Reference Data Domain Entities
 *
 * Master data mirrored from the tax authority: the zone / division / circle
 * hierarchy, VAT commission rates and service types. Rows are created and
 * updated only by the sync routines and are keyed by the identifier the
 * authority assigns.
 */

export type ReferenceEntity =
  | "ZONE"
  | "DIVISION"
  | "CIRCLE"
  | "VAT_COMMISSION_RATE"
  | "SERVICE_TYPE"

export interface ReferenceRecord {
  remoteId: string
  name: string
  createdAt: Date
  updatedAt: Date
}

export type Zone = ReferenceRecord

export interface Division extends ReferenceRecord {
  zoneId: string
  vatCommissionRateId: string | null
}

export interface Circle extends ReferenceRecord {
  divisionId: string
  zoneId: string
}

/**
 * `rate` is a percentage. Division, circle and service type narrow the scope
 * of the rate when set.
 */
export interface VatCommissionRate extends ReferenceRecord {
  rate: number
  zoneId: string
  divisionId: string | null
  circleId: string | null
  serviceTypeId: string | null
}

export type ServiceType = ReferenceRecord

/** Fields that come from the authority, without local timestamps. */
export type ReferenceInput<T extends ReferenceRecord> = Omit<T, "createdAt" | "updatedAt">

/**
 * Repository used uniformly by every sync routine. Lookups go by the remote
 * identifier only.
 */
export interface RemoteRecordRepository<T extends ReferenceRecord> {
  findByRemoteId(remoteId: string): Promise<T | null>
  findAll(): Promise<T[]>
  create(input: ReferenceInput<T>): Promise<T>
  update(remoteId: string, updates: Partial<ReferenceInput<T>>): Promise<T>
}

export type ZoneRepository = RemoteRecordRepository<Zone>
export type DivisionRepository = RemoteRecordRepository<Division>
export type CircleRepository = RemoteRecordRepository<Circle>
export type VatCommissionRateRepository = RemoteRecordRepository<VatCommissionRate>
export type ServiceTypeRepository = RemoteRecordRepository<ServiceType>
