/**
 * Service wiring for the Lambda handlers
 *
 * Built once per container from the environment and reused across warm
 * invocations.
 */

import { DynamoDBClient } from "@aws-sdk/client-dynamodb"
import { DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb"
import { VendorConfigurationService } from "../application/configuration/VendorConfigurationService"
import { VatInvoiceService } from "../application/invoice/VatInvoiceService"
import { ReferenceDataService } from "../application/reference/ReferenceDataService"
import { ReportService } from "../application/report/ReportService"
import { RetailerRegistrationService } from "../application/retailer/RetailerRegistrationService"
import { ReferenceDataSyncService } from "../application/sync/ReferenceDataSyncService"
import { ChallanApiClient } from "../infrastructure/authority/ChallanApiClient"
import { pooledFetch, type FetchFn } from "../infrastructure/authority/httpClient"
import { TokenManager } from "../infrastructure/authority/TokenManager"
import type { DocumentClient } from "../infrastructure/dynamodb/items"
import { DynamoDBCircleRepository } from "../infrastructure/dynamodb/repositories/CircleRepository"
import { DynamoDBDivisionRepository } from "../infrastructure/dynamodb/repositories/DivisionRepository"
import { DynamoDBRetailerBranchRepository } from "../infrastructure/dynamodb/repositories/RetailerBranchRepository"
import { DynamoDBRetailerRepository } from "../infrastructure/dynamodb/repositories/RetailerRepository"
import { DynamoDBServiceTypeRepository } from "../infrastructure/dynamodb/repositories/ServiceTypeRepository"
import { DynamoDBVatCommissionRateRepository } from "../infrastructure/dynamodb/repositories/VatCommissionRateRepository"
import { DynamoDBVatInvoiceRepository } from "../infrastructure/dynamodb/repositories/VatInvoiceRepository"
import { DynamoDBVendorConfigurationRepository } from "../infrastructure/dynamodb/repositories/VendorConfigurationRepository"
import { DynamoDBZoneRepository } from "../infrastructure/dynamodb/repositories/ZoneRepository"
import { LocalFileStore } from "../infrastructure/files/FileStore"
import { loadEnvConfig, type EnvConfig } from "../shared/config/env"

export interface AppContext {
  tokenManager: TokenManager
  apiClient: ChallanApiClient
  referenceSync: ReferenceDataSyncService
  referenceData: ReferenceDataService
  configuration: VendorConfigurationService
  registration: RetailerRegistrationService
  invoices: VatInvoiceService
  reports: ReportService
}

export function createDocumentClient(): DocumentClient {
  return DynamoDBDocumentClient.from(new DynamoDBClient({}), {
    marshallOptions: { removeUndefinedValues: true },
  })
}

export function createContext(
  env: EnvConfig = loadEnvConfig(),
  client: DocumentClient = createDocumentClient(),
  fetchFn: FetchFn = pooledFetch
): AppContext {
  const configurationRepository = new DynamoDBVendorConfigurationRepository(client, env.configTable)
  const references = {
    zones: new DynamoDBZoneRepository(client, env.referenceTable),
    divisions: new DynamoDBDivisionRepository(client, env.referenceTable),
    circles: new DynamoDBCircleRepository(client, env.referenceTable),
    vatCommissionRates: new DynamoDBVatCommissionRateRepository(client, env.referenceTable),
    serviceTypes: new DynamoDBServiceTypeRepository(client, env.referenceTable),
  }
  const retailerRepository = new DynamoDBRetailerRepository(client, env.registrationTable)
  const branchRepository = new DynamoDBRetailerBranchRepository(client, env.registrationTable)
  const invoiceRepository = new DynamoDBVatInvoiceRepository(client, env.vatInvoiceTable)
  const fileStore = new LocalFileStore(env.fileStoreDir, env.fileStorePublicUrl)

  const tokenManager = new TokenManager(configurationRepository, {
    expiryBufferSeconds: env.tokenExpiryBufferSeconds,
    defaultBaseUrl: env.challanApiBaseUrl,
    fetchFn,
  })
  const apiClient = new ChallanApiClient(tokenManager, fetchFn)
  const referenceSync = new ReferenceDataSyncService(apiClient, references)
  const referenceData = new ReferenceDataService(references, referenceSync)

  return {
    tokenManager,
    apiClient,
    referenceSync,
    referenceData,
    configuration: new VendorConfigurationService(configurationRepository, tokenManager),
    registration: new RetailerRegistrationService(
      retailerRepository,
      branchRepository,
      referenceData,
      apiClient,
      fileStore
    ),
    invoices: new VatInvoiceService(
      invoiceRepository,
      retailerRepository,
      branchRepository,
      references.vatCommissionRates,
      configurationRepository,
      apiClient,
      fileStore
    ),
    reports: new ReportService(invoiceRepository, branchRepository, references.serviceTypes),
  }
}

let context: AppContext | null = null

export function getContext(): AppContext {
  if (!context) {
    context = createContext()
  }
  return context
}
