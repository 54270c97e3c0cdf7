/**
 * Retailer Registration Service
 *
 * Registers retailers and their branches with the tax authority and uploads
 * their supporting documents.
 *
 * - A Draft record is stored before the call and amended with the answer
 * - "Already exists" answers keep the authority's identifier (status Existing)
 * - Other rejections mark the record Failed and propagate
 */

import {
  DOCUMENT_CATEGORY_KEYS,
  type CreateBranchInput,
  type CreateRetailerInput,
  type DocumentCategoryKey,
  type RegistrationStatus,
  type RetailerBranchRegistration,
  type RetailerBranchRepository,
  type RetailerRegistration,
  type RetailerRepository,
} from "../../domain/retailer/Retailer"
import { parseEnvelope, type ChallanApiClient } from "../../infrastructure/authority/ChallanApiClient"
import type { AuthorityResult } from "../../infrastructure/authority/types"
import type { FileStore } from "../../infrastructure/files/FileStore"
import { ConflictError, NotFoundError, RemoteApiError, ValidationError } from "../../shared/errors"
import { readIdentifier } from "../../shared/types"
import type { ReferenceDataService } from "../reference/ReferenceDataService"

export interface RegistrationResult<T> {
  registration: T
  remoteId: string | null
  message: string
}

export interface UploadResult {
  status: "Uploaded"
  fileUrl: string | null
  message: string
}

type Submission =
  | { status: "Registered" | "Existing"; remoteId: string | null; message: string; raw: string | null }
  | { status: "Failed"; error: RemoteApiError }

const EXISTING_ID_PATTERN = /\bid\s*[:=]\s*([A-Za-z0-9_-]+)/i
const ALREADY_EXISTS_PATTERN = /already exist/i

function isAlreadyExists(error: RemoteApiError): boolean {
  return error.remoteStatus === 409 || ALREADY_EXISTS_PATTERN.test(error.message)
}

function idFromMessage(message: string): string | null {
  return message.match(EXISTING_ID_PATTERN)?.[1] ?? null
}

/**
 * Existing identifier from an "already exists" rejection: `data.<field>` of
 * the body first, then `id=R123` / `id: R123` in the message.
 */
export function existingRemoteId(error: RemoteApiError, field: string): string | null {
  const envelope = error.responseBody ? parseEnvelope(error.responseBody) : null
  const fromBody = envelope ? readIdentifier(envelope.data, field) : null
  if (fromBody) {
    return fromBody
  }

  return idFromMessage(error.message)
}

function isDocumentCategory(value: string): value is DocumentCategoryKey {
  return DOCUMENT_CATEGORY_KEYS.some((key) => key === value)
}

function ensureResubmittable(status: RegistrationStatus, label: string): void {
  if (status === "Registered" || status === "Existing") {
    throw new ConflictError(`${label} is already registered with the tax authority`)
  }
}

export class RetailerRegistrationService {
  constructor(
    private retailerRepository: RetailerRepository,
    private branchRepository: RetailerBranchRepository,
    private referenceDataService: ReferenceDataService,
    private apiClient: ChallanApiClient,
    private fileStore: FileStore
  ) {}

  async getRetailer(id: string): Promise<RetailerRegistration> {
    const retailer = await this.retailerRepository.findById(id)
    if (!retailer) {
      throw new NotFoundError("Retailer registration")
    }
    return retailer
  }

  async listRetailers(): Promise<RetailerRegistration[]> {
    const retailers = await this.retailerRepository.findAll()
    return retailers.sort((a, b) => a.retailerName.localeCompare(b.retailerName))
  }

  async getBranch(id: string): Promise<RetailerBranchRegistration> {
    const branch = await this.branchRepository.findById(id)
    if (!branch) {
      throw new NotFoundError("Retailer branch registration")
    }
    return branch
  }

  async listBranches(retailerId?: string): Promise<RetailerBranchRegistration[]> {
    const branches = retailerId
      ? await this.branchRepository.findByRetailerId(retailerId)
      : await this.branchRepository.findAll()
    return branches.sort((a, b) => a.branchName.localeCompare(b.branchName))
  }

  async registerRetailer(input: CreateRetailerInput): Promise<RegistrationResult<RetailerRegistration>> {
    if (
      !input.retailerName
      || !input.ownerName
      || !input.mobileNo
      || !input.zoneId
      || !input.divisionId
      || !input.circleId
      || !input.vatCommissionRateId
    ) {
      throw new ValidationError(
        "retailer_name, owner_name, mobile_no, zone_id, division_id, circle_id and vat_commissionrate_id are required"
      )
    }
    if (!input.serviceTypeIds || input.serviceTypeIds.length === 0) {
      throw new ValidationError("At least one service type is required", "serviceTypeIds")
    }

    await this.validateRetailerReferences(input)

    const draft = await this.retailerRepository.create(input)
    console.log(`[RetailerRegistration] Draft retailer ${draft.id} stored, submitting`)

    return this.submitRetailer(draft)
  }

  async resubmitRetailer(id: string): Promise<RegistrationResult<RetailerRegistration>> {
    const retailer = await this.getRetailer(id)
    ensureResubmittable(retailer.status, `Retailer ${retailer.retailerName}`)

    await this.validateRetailerReferences(retailer)

    return this.submitRetailer(retailer)
  }

  async registerBranch(input: CreateBranchInput): Promise<RegistrationResult<RetailerBranchRegistration>> {
    if (!input.retailerId || !input.branchName || !input.zoneId || !input.divisionId || !input.circleId) {
      throw new ValidationError("retailer_id, branch_name, zone_id, division_id and circle_id are required")
    }

    const retailer = await this.requireRegisteredRetailer(input.retailerId, "adding branches")
    await this.referenceDataService.resolveJurisdiction(input)

    const draft = await this.branchRepository.create(input)
    console.log(`[RetailerRegistration] Draft branch ${draft.id} stored for retailer ${retailer.id}, submitting`)

    return this.submitBranch(draft, retailer)
  }

  async resubmitBranch(id: string): Promise<RegistrationResult<RetailerBranchRegistration>> {
    const branch = await this.getBranch(id)
    ensureResubmittable(branch.status, `Branch ${branch.branchName}`)

    const retailer = await this.requireRegisteredRetailer(branch.retailerId, "adding branches")
    await this.referenceDataService.resolveJurisdiction(branch)

    return this.submitBranch(branch, retailer)
  }

  async uploadFile(filePath: string, retailerId: string, documentCategoryKey: string): Promise<UploadResult> {
    if (!filePath) {
      throw new ValidationError("file_path is required", "filePath")
    }
    if (!isDocumentCategory(documentCategoryKey)) {
      throw new ValidationError(
        `Unknown document category: ${documentCategoryKey}. Expected one of ${DOCUMENT_CATEGORY_KEYS.join(", ")}`,
        "documentCategoryKey"
      )
    }

    const retailer = await this.requireRegisteredRetailer(retailerId, "uploading documents")
    const file = await this.fileStore.read(filePath)

    const form = new FormData()
    form.append("retailer_id", retailer.remoteRetailerId ?? "")
    form.append("document_category_key", documentCategoryKey)
    form.append("file", new Blob([new Uint8Array(file.content)], { type: file.contentType }), file.fileName)

    const result = await this.apiClient.uploadDocument(form)
    const fileUrl = readIdentifier(result.data, "file_url")
    const message = result.message ?? "Document uploaded"

    const documents = { ...retailer.documents }
    documents[documentCategoryKey] = { fileUrl, message, uploadedAt: new Date() }
    await this.retailerRepository.update(retailer.id, { documents })

    console.log(`[RetailerRegistration] Uploaded ${documentCategoryKey} for retailer ${retailer.id}`)

    return { status: "Uploaded", fileUrl, message }
  }

  private async validateRetailerReferences(
    input: Pick<CreateRetailerInput, "serviceTypeIds" | "zoneId" | "divisionId" | "circleId" | "vatCommissionRateId">
  ): Promise<void> {
    for (const serviceTypeId of input.serviceTypeIds) {
      await this.referenceDataService.getServiceType(serviceTypeId)
    }
    await this.referenceDataService.resolveJurisdiction(input)
  }

  private async requireRegisteredRetailer(retailerId: string, action: string): Promise<RetailerRegistration> {
    const retailer = await this.retailerRepository.findById(retailerId)
    if (!retailer) {
      throw new NotFoundError("Retailer registration")
    }
    if (!retailer.remoteRetailerId) {
      throw new ValidationError(
        `Retailer ${retailer.retailerName} must be registered with the tax authority before ${action}`,
        "retailerId"
      )
    }
    return retailer
  }

  private async submitRetailer(retailer: RetailerRegistration): Promise<RegistrationResult<RetailerRegistration>> {
    const companyId = await this.apiClient.getCompanyId()

    const submission = await this.submit("retailer_id", () =>
      this.apiClient.registerRetailer({
        company_id: companyId,
        retailer_name: retailer.retailerName,
        owner_name: retailer.ownerName,
        mobile_no: retailer.mobileNo,
        email: retailer.email,
        nid_no: retailer.nidNo,
        bin_no: retailer.binNo,
        tin_no: retailer.tinNo,
        trade_license_no: retailer.tradeLicenseNo,
        business_address: retailer.businessAddress,
        service_type_ids: retailer.serviceTypeIds,
        zone_id: retailer.zoneId,
        division_id: retailer.divisionId,
        circle_id: retailer.circleId,
        vat_commissionrate_id: retailer.vatCommissionRateId,
      })
    )

    if (submission.status === "Failed") {
      await this.retailerRepository.update(retailer.id, {
        status: "Failed",
        lastMessage: submission.error.message,
        lastApiResponse: submission.error.responseBody,
      })
      console.error(`[RetailerRegistration] Retailer ${retailer.id} rejected: ${submission.error.message}`)
      throw submission.error
    }

    const registration = await this.retailerRepository.update(retailer.id, {
      status: submission.status,
      remoteRetailerId: submission.remoteId,
      lastMessage: submission.message,
      lastApiResponse: submission.raw,
    })

    console.log(
      `[RetailerRegistration] Retailer ${retailer.id} ${submission.status} as ${submission.remoteId ?? "unknown id"}`
    )

    return { registration, remoteId: submission.remoteId, message: submission.message }
  }

  private async submitBranch(
    branch: RetailerBranchRegistration,
    retailer: RetailerRegistration
  ): Promise<RegistrationResult<RetailerBranchRegistration>> {
    const companyId = await this.apiClient.getCompanyId()

    const submission = await this.submit("branch_id", () =>
      this.apiClient.registerBranch({
        company_id: companyId,
        retailer_id: retailer.remoteRetailerId ?? "",
        branch_name: branch.branchName,
        branch_address: branch.branchAddress,
        zone_id: branch.zoneId,
        division_id: branch.divisionId,
        circle_id: branch.circleId,
      })
    )

    if (submission.status === "Failed") {
      await this.branchRepository.update(branch.id, {
        status: "Failed",
        lastMessage: submission.error.message,
        lastApiResponse: submission.error.responseBody,
      })
      console.error(`[RetailerRegistration] Branch ${branch.id} rejected: ${submission.error.message}`)
      throw submission.error
    }

    const registration = await this.branchRepository.update(branch.id, {
      status: submission.status,
      remoteBranchId: submission.remoteId,
      lastMessage: submission.message,
      lastApiResponse: submission.raw,
    })

    console.log(
      `[RetailerRegistration] Branch ${branch.id} ${submission.status} as ${submission.remoteId ?? "unknown id"}`
    )

    return { registration, remoteId: submission.remoteId, message: submission.message }
  }

  private async submit(idField: string, send: () => Promise<AuthorityResult>): Promise<Submission> {
    let result: AuthorityResult
    try {
      result = await send()
    } catch (error) {
      if (!(error instanceof RemoteApiError) || error.isNetworkError) {
        throw error
      }
      if (isAlreadyExists(error)) {
        return {
          status: "Existing",
          remoteId: existingRemoteId(error, idField),
          message: error.message,
          raw: error.responseBody,
        }
      }
      return { status: "Failed", error }
    }

    const remoteId = readIdentifier(result.data, idField)

    // Some answers report a duplicate inside a success envelope
    if (result.message && ALREADY_EXISTS_PATTERN.test(result.message)) {
      return {
        status: "Existing",
        remoteId: remoteId ?? idFromMessage(result.message),
        message: result.message,
        raw: result.raw,
      }
    }

    if (!remoteId) {
      return {
        status: "Failed",
        error: new RemoteApiError(`Registration response carries no ${idField}`, result.httpStatus, result.raw),
      }
    }

    return {
      status: "Registered",
      remoteId,
      message: result.message ?? "Registered",
      raw: result.raw,
    }
  }
}
