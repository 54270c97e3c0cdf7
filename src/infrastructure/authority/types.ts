/**
 * Tax Authority API Types
 *
 * Request payloads use the authority's own field names and are sent as-is.
 */

export interface AuthorityEnvelope {
  status: string | null
  message: string | null
  data: unknown
}

export interface AuthorityResult {
  data: unknown
  message: string | null
  httpStatus: number
  raw: string
}

export interface AuthoritySession {
  accessToken: string
  baseUrl: string
  companyId: string | null
}

export type SchallanFormat = "pdf" | "xml"

export type SchallanDocument =
  | { kind: "url"; url: string }
  | { kind: "file"; content: Buffer; contentType: string }

export interface RetailerRegistrationPayload {
  company_id: string | null
  retailer_name: string
  owner_name: string
  mobile_no: string
  email: string | null
  nid_no: string | null
  bin_no: string | null
  tin_no: string | null
  trade_license_no: string | null
  business_address: string | null
  service_type_ids: string[]
  zone_id: string
  division_id: string
  circle_id: string
  vat_commissionrate_id: string
}

export interface BranchRegistrationPayload {
  company_id: string | null
  retailer_id: string
  branch_name: string
  branch_address: string | null
  zone_id: string
  division_id: string
  circle_id: string
}

export interface ChallanItemPayload {
  item_code: string
  item_name: string
  qty: number
  rate: number
  amount: number
}

export interface ChallanPayload {
  company_id: string | null
  invoice_no: string
  invoice_date: string
  retailer_id: string
  branch_id: string
  customer_id: string | null
  order_id: string | null
  service_type_id: string
  payment_method: string | null
  vat_commissionrate_id: string
  txn_amount: number
  total_sd_percentage: number
  total_sd_amount: number
  total_discount_amount: number
  total_service_charges_amount: number
  total_amount: number
  items: ChallanItemPayload[]
}

export interface ChallanReturnPayload {
  company_id: string | null
  challan_id: string
  invoice_no: string
  return_invoice_no: string
  return_date: string
  return_amount: number
  return_sd_amount: number
  items: Array<{ item_code: string; qty: number; amount: number }>
}
