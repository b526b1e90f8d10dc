/**
 * Registry record and column definitions shared by every artifact.
 */

/** Schema version stamped into the versioned export */
export const SCHEMA_VERSION = '1.0.0'

/** Canonical TOIL ID: `T4L-TOIL-<3 digits>` followed by one or more `-<A-Z0-9>` segments */
export const TOIL_ID_PATTERN = /^T4L-TOIL-\d{3}(?:-[A-Z0-9]+)+$/

export interface ProductRecord {
  toil_id: string
  product_name: string
  category: string
  lead_creator: string
  status: string
  license_state: string
  aliases?: string[]
  legacy_ids?: string[]
}

export type ScalarField = Exclude<keyof ProductRecord, ListField>
export type ListField = 'aliases' | 'legacy_ids'
export type ProductField = keyof ProductRecord

export interface ColumnDefinition<F extends ProductField = ProductField> {
  header: string
  field: F
}

/**
 * Index table columns, in export key order.
 */
export const PRODUCT_COLUMNS = [
  { header: 'TOIL ID', field: 'toil_id' },
  { header: 'Product Name', field: 'product_name' },
  { header: 'Category', field: 'category' },
  { header: 'Lead Creator', field: 'lead_creator' },
  { header: 'Status', field: 'status' },
  { header: 'License State', field: 'license_state' },
  { header: 'Aliases (Optional)', field: 'aliases' },
  { header: 'Legacy IDs (Optional)', field: 'legacy_ids' },
] as const satisfies readonly ColumnDefinition[]

export type ColumnHeader = (typeof PRODUCT_COLUMNS)[number]['header']

export const REQUIRED_HEADERS: readonly ColumnHeader[] = PRODUCT_COLUMNS.map((column) => column.header)

export const LIST_FIELDS: readonly ListField[] = ['aliases', 'legacy_ids']

/** Fields that must be non-empty; category may be blank */
export const REQUIRED_FIELDS: readonly ScalarField[] = [
  'toil_id',
  'product_name',
  'lead_creator',
  'status',
  'license_state',
]

export function isListField(field: ProductField): field is ListField {
  return field === 'aliases' || field === 'legacy_ids'
}

export interface VersionedExport {
  schema_version: string
  products: ProductRecord[]
}

export function isValidToilId(id: string): boolean {
  return TOIL_ID_PATTERN.test(id)
}
