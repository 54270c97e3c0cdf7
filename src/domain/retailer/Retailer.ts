/**
 * Retailer Domain Entities
 *
 * Retailers and their branches as registered with the tax authority. Records
 * are amended, never deleted: each submission stores the authority's answer.
 */

export type RegistrationStatus = "Draft" | "Registered" | "Existing" | "Failed"

export type DocumentCategoryKey =
  | "nid_document"
  | "business_identification_number"
  | "trade_license"
  | "tax_identification"

export const DOCUMENT_CATEGORY_KEYS: readonly DocumentCategoryKey[] = [
  "nid_document",
  "business_identification_number",
  "trade_license",
  "tax_identification",
]

export interface RetailerDocument {
  fileUrl: string | null
  message: string | null
  uploadedAt: Date
}

export interface RetailerRegistration {
  id: string
  retailerName: string
  ownerName: string
  mobileNo: string
  email: string | null
  nidNo: string | null
  binNo: string | null
  tinNo: string | null
  tradeLicenseNo: string | null
  businessAddress: string | null
  serviceTypeIds: string[]
  zoneId: string
  divisionId: string
  circleId: string
  vatCommissionRateId: string
  status: RegistrationStatus
  remoteRetailerId: string | null
  lastMessage: string | null
  lastApiResponse: string | null
  documents: Partial<Record<DocumentCategoryKey, RetailerDocument>>
  createdAt: Date
  updatedAt: Date
}

export interface CreateRetailerInput {
  retailerName: string
  ownerName: string
  mobileNo: string
  email?: string | null
  nidNo?: string | null
  binNo?: string | null
  tinNo?: string | null
  tradeLicenseNo?: string | null
  businessAddress?: string | null
  serviceTypeIds: string[]
  zoneId: string
  divisionId: string
  circleId: string
  vatCommissionRateId: string
}

export interface UpdateRetailerInput {
  status?: RegistrationStatus
  remoteRetailerId?: string | null
  lastMessage?: string | null
  lastApiResponse?: string | null
  documents?: Partial<Record<DocumentCategoryKey, RetailerDocument>>
}

export interface RetailerBranchRegistration {
  id: string
  retailerId: string
  branchName: string
  branchAddress: string | null
  zoneId: string
  divisionId: string
  circleId: string
  status: RegistrationStatus
  remoteBranchId: string | null
  lastMessage: string | null
  lastApiResponse: string | null
  createdAt: Date
  updatedAt: Date
}

export interface CreateBranchInput {
  retailerId: string
  branchName: string
  branchAddress?: string | null
  zoneId: string
  divisionId: string
  circleId: string
}

export interface UpdateBranchInput {
  status?: RegistrationStatus
  remoteBranchId?: string | null
  lastMessage?: string | null
  lastApiResponse?: string | null
}

export interface RetailerRepository {
  findById(id: string): Promise<RetailerRegistration | null>
  findAll(): Promise<RetailerRegistration[]>
  create(input: CreateRetailerInput): Promise<RetailerRegistration>
  update(id: string, updates: UpdateRetailerInput): Promise<RetailerRegistration>
}

export interface RetailerBranchRepository {
  findById(id: string): Promise<RetailerBranchRegistration | null>
  findByRetailerId(retailerId: string): Promise<RetailerBranchRegistration[]>
  findAll(): Promise<RetailerBranchRegistration[]>
  create(input: CreateBranchInput): Promise<RetailerBranchRegistration>
  update(id: string, updates: UpdateBranchInput): Promise<RetailerBranchRegistration>
}
