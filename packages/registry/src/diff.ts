import { canonicalJson } from './json.js'
import { PRODUCT_COLUMNS, type ProductRecord } from './types.js'

export interface FieldChange {
  field: string
  expected: unknown
  actual: unknown
}

export interface ProductChange {
  toil_id: string
  fields: FieldChange[]
}

export interface ProductListDiff {
  /** IDs present in the expected list only */
  missing: string[]
  /** IDs present in the actual list only */
  unexpected: string[]
  changed: ProductChange[]
  orderDiffers: boolean
  /** Set when the lists differ in length for reasons other than missing/unexpected IDs (duplicates) */
  countMismatch: { expected: number; actual: number } | null
}

export interface DiffLabels {
  expected: string
  actual: string
}

const FIELD_ORDER: string[] = PRODUCT_COLUMNS.map((column) => column.field)

function byFieldOrder(a: string, b: string): number {
  const ai = FIELD_ORDER.indexOf(a)
  const bi = FIELD_ORDER.indexOf(b)
  if (ai === -1 && bi === -1) return a.localeCompare(b)
  if (ai === -1) return 1
  if (bi === -1) return -1
  return ai - bi
}

function indexById(products: ProductRecord[]): Map<string, ProductRecord> {
  const map = new Map<string, ProductRecord>()
  for (const product of products) {
    if (!map.has(product.toil_id)) {
      map.set(product.toil_id, product)
    }
  }
  return map
}

function fieldValue(product: ProductRecord, field: string): unknown {
  return Object.entries(product).find(([key]) => key === field)?.[1]
}

function diffFields(expected: ProductRecord, actual: ProductRecord): FieldChange[] {
  const fields = [...new Set([...Object.keys(expected), ...Object.keys(actual)])].sort(byFieldOrder)
  const changes: FieldChange[] = []
  for (const field of fields) {
    const expectedValue = fieldValue(expected, field)
    const actualValue = fieldValue(actual, field)
    if (canonicalJson(expectedValue) !== canonicalJson(actualValue)) {
      changes.push({ field, expected: expectedValue, actual: actualValue })
    }
  }
  return changes
}

/**
 * Compare two product lists keyed by TOIL ID.
 */
export function diffProductLists(expected: ProductRecord[], actual: ProductRecord[]): ProductListDiff {
  const expectedById = indexById(expected)
  const actualById = indexById(actual)

  const missing = [...expectedById.keys()].filter((id) => !actualById.has(id))
  const unexpected = [...actualById.keys()].filter((id) => !expectedById.has(id))

  const changed: ProductChange[] = []
  for (const [id, expectedProduct] of expectedById) {
    const actualProduct = actualById.get(id)
    if (!actualProduct) continue
    const fields = diffFields(expectedProduct, actualProduct)
    if (fields.length > 0) {
      changed.push({ toil_id: id, fields })
    }
  }

  const commonExpected = [...expectedById.keys()].filter((id) => actualById.has(id))
  const commonActual = [...actualById.keys()].filter((id) => expectedById.has(id))
  const orderDiffers = commonExpected.join('\n') !== commonActual.join('\n')

  const countMismatch =
    missing.length === 0 && unexpected.length === 0 && expected.length !== actual.length
      ? { expected: expected.length, actual: actual.length }
      : null

  return { missing, unexpected, changed, orderDiffers, countMismatch }
}

export function isEmptyDiff(diff: ProductListDiff): boolean {
  return (
    diff.missing.length === 0 &&
    diff.unexpected.length === 0 &&
    diff.changed.length === 0 &&
    !diff.orderDiffers &&
    diff.countMismatch === null
  )
}

function show(value: unknown): string {
  return value === undefined ? '(absent)' : JSON.stringify(value)
}

export function describeDiff(diff: ProductListDiff, labels: DiffLabels): string[] {
  const lines: string[] = []
  for (const id of diff.missing) {
    lines.push(`${id}: missing from ${labels.actual}`)
  }
  for (const id of diff.unexpected) {
    lines.push(`${id}: not in ${labels.expected}`)
  }
  for (const change of diff.changed) {
    for (const field of change.fields) {
      lines.push(
        `${change.toil_id}: ${field.field} differs (${labels.expected}: ${show(field.expected)}, ${labels.actual}: ${show(field.actual)})`
      )
    }
  }
  if (diff.orderDiffers) {
    lines.push(`product order differs between ${labels.expected} and ${labels.actual}`)
  }
  if (diff.countMismatch) {
    lines.push(
      `product count differs (${labels.expected}: ${diff.countMismatch.expected}, ${labels.actual}: ${diff.countMismatch.actual})`
    )
  }
  return lines
}
