import { ERROR_CODES, type ErrorCode } from './errors.js'
import type { ParsedTableRow } from './markdown-table.js'
import {
  PRODUCT_COLUMNS,
  REQUIRED_FIELDS,
  isValidToilId,
  type ProductField,
  type ProductRecord,
} from './types.js'

export interface RowIssue {
  line: number
  field: ProductField
  code: ErrorCode
  message: string
}

export type NormalizeRowResult =
  | { ok: true; product: ProductRecord }
  | { ok: false; issues: RowIssue[] }

export interface NormalizeRowsResult {
  products: ProductRecord[]
  issues: RowIssue[]
}

function headerFor(field: ProductField): string {
  const column = PRODUCT_COLUMNS.find((candidate) => candidate.field === field)
  return column ? column.header : field
}

/**
 * Split a comma-separated cell into trimmed, non-empty items.
 */
export function parseOptionalList(value: string): string[] {
  return value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
}

export function normalizeRow(row: ParsedTableRow): NormalizeRowResult {
  const cell = (field: ProductField): string => (row.cells[headerFor(field)] ?? '').trim()

  const product: ProductRecord = {
    toil_id: cell('toil_id'),
    product_name: cell('product_name'),
    category: cell('category'),
    lead_creator: cell('lead_creator'),
    status: cell('status'),
    license_state: cell('license_state'),
  }

  const aliases = parseOptionalList(cell('aliases'))
  if (aliases.length > 0) {
    product.aliases = aliases
  }
  const legacyIds = parseOptionalList(cell('legacy_ids'))
  if (legacyIds.length > 0) {
    product.legacy_ids = legacyIds
  }

  const issues: RowIssue[] = []
  if (!isValidToilId(product.toil_id)) {
    issues.push({
      line: row.line,
      field: 'toil_id',
      code: ERROR_CODES.INVALID_TOIL_ID,
      message: `Invalid TOIL ID format at line ${row.line}: '${product.toil_id}'`,
    })
  }

  for (const field of REQUIRED_FIELDS) {
    if (field === 'toil_id') continue
    if (!product[field]) {
      issues.push({
        line: row.line,
        field,
        code: ERROR_CODES.MISSING_REQUIRED_FIELD,
        message: `Missing required field '${headerFor(field)}' at line ${row.line}`,
      })
    }
  }

  return issues.length > 0 ? { ok: false, issues } : { ok: true, product }
}

export function normalizeRows(rows: ParsedTableRow[]): NormalizeRowsResult {
  const products: ProductRecord[] = []
  const issues: RowIssue[] = []

  for (const row of rows) {
    const result = normalizeRow(row)
    if (result.ok) {
      products.push(result.product)
    } else {
      issues.push(...result.issues)
    }
  }

  return { products, issues }
}

/**
 * TOIL IDs that occur more than once, in first-repeat order.
 */
export function findDuplicateIds(ids: readonly string[]): string[] {
  const seen = new Set<string>()
  const duplicates: string[] = []
  for (const id of ids) {
    if (seen.has(id) && !duplicates.includes(id)) {
      duplicates.push(id)
    }
    seen.add(id)
  }
  return duplicates
}
