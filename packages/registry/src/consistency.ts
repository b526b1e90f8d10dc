/**
 * Cross-artifact consistency checks.
 *
 * Compares the canonical index table against the record files and both JSON
 * exports. Works on an in-memory snapshot; reading the files is the caller's
 * job.
 */

import { describeDiff, diffProductLists } from './diff.js'
import { isRegistryError } from './errors.js'
import { LEGACY_EXPORT_PATH, VERSIONED_EXPORT_PATH, parseLegacyExport, parseVersionedExport } from './exports.js'
import { isPlainObject, jsonEqual, safeJsonParse } from './json.js'
import { parseProductTable, type ParsedTable } from './markdown-table.js'
import { findDuplicateIds, normalizeRows } from './normalize.js'
import { legacyExportSchema } from './schemas.js'
import type { ProductRecord } from './types.js'

export const INDEX_PATH = 'index/TOIL_Product_Index.md'
export const RECORDS_DIR = 'records'

export interface SnapshotFile {
  /** Path relative to the registry root, used in messages */
  path: string
  /** File contents, or null when the file does not exist */
  text: string | null
}

export interface RegistrySnapshot {
  index: SnapshotFile
  recordsDir: string
  /** TOIL IDs that have a `<recordsDir>/<id>.md` file */
  recordIds: string[]
  legacyExport: SnapshotFile
  versionedExport: SnapshotFile
}

export interface ConsistencyIssue {
  message: string
  details?: string[]
}

export interface ConsistencyReport {
  errors: ConsistencyIssue[]
  warnings: ConsistencyIssue[]
  /** Products derived from the index (valid rows only) */
  products: ProductRecord[]
}

export function createSnapshot(overrides: Partial<RegistrySnapshot> = {}): RegistrySnapshot {
  return {
    index: { path: INDEX_PATH, text: null },
    recordsDir: RECORDS_DIR,
    recordIds: [],
    legacyExport: { path: LEGACY_EXPORT_PATH, text: null },
    versionedExport: { path: VERSIONED_EXPORT_PATH, text: null },
    ...overrides,
  }
}

function asProductList(value: unknown): ProductRecord[] | null {
  const parsed = legacyExportSchema.safeParse(value)
  return parsed.success ? parsed.data : null
}

/** Raw JSON value of an export, or undefined when missing or unparseable. */
function rawJson(file: SnapshotFile): unknown {
  if (file.text === null) return undefined
  const parsed = safeJsonParse(file.text)
  return parsed.ok ? parsed.value : undefined
}

function checkExportsDrift(snapshot: RegistrySnapshot, errors: ConsistencyIssue[]): void {
  const legacy = rawJson(snapshot.legacyExport)
  const versioned = rawJson(snapshot.versionedExport)
  if (!Array.isArray(legacy) || !isPlainObject(versioned) || !Array.isArray(versioned.products)) {
    return
  }
  if (jsonEqual(legacy, versioned.products)) {
    return
  }

  const legacyProducts = asProductList(legacy)
  const versionedProducts = asProductList(versioned.products)
  const details =
    legacyProducts && versionedProducts
      ? describeDiff(diffProductLists(versionedProducts, legacyProducts), {
          expected: `${snapshot.versionedExport.path} products`,
          actual: snapshot.legacyExport.path,
        })
      : []

  errors.push({
    message: 'Legacy export does not match v1 products list (exports drift)',
    ...(details.length > 0 && { details }),
  })
}

function checkExportFreshness(
  products: ProductRecord[],
  indexPath: string,
  exportPath: string,
  exportProducts: ProductRecord[],
  errors: ConsistencyIssue[]
): void {
  if (jsonEqual(products, exportProducts)) {
    return
  }
  const details = describeDiff(diffProductLists(products, exportProducts), {
    expected: indexPath,
    actual: exportPath,
  })
  errors.push({
    message: `${exportPath} is out of date with ${indexPath} (run \`registry build\`)`,
    ...(details.length > 0 && { details }),
  })
}

export function checkRegistryConsistency(snapshot: RegistrySnapshot): ConsistencyReport {
  const errors: ConsistencyIssue[] = []
  const warnings: ConsistencyIssue[] = []
  const indexPath = snapshot.index.path

  if (snapshot.index.text === null) {
    errors.push({ message: `${indexPath}: file not found` })
    return { errors, warnings, products: [] }
  }

  let table: ParsedTable
  try {
    table = parseProductTable(snapshot.index.text)
  } catch (error) {
    if (!isRegistryError(error)) throw error
    errors.push({ message: `${indexPath}: ${error.message}` })
    return { errors, warnings, products: [] }
  }

  if (table.rows.length === 0) {
    errors.push({ message: 'Index table has zero rows' })
  }

  const { products, issues } = normalizeRows(table.rows)
  for (const issue of issues) {
    errors.push({ message: issue.message })
  }

  const ids = table.rows.map((row) => (row.cells['TOIL ID'] ?? '').trim())
  const recordIds = new Set(snapshot.recordIds)
  for (const id of ids) {
    if (id && !recordIds.has(id)) {
      errors.push({ message: `Missing record file: ${snapshot.recordsDir}/${id}.md` })
    }
  }

  const duplicates = findDuplicateIds(ids)
  for (const id of duplicates) {
    errors.push({ message: `Duplicate TOIL ID in index: ${id}` })
  }

  const indexIds = new Set(ids)
  for (const id of [...snapshot.recordIds].sort()) {
    if (!indexIds.has(id)) {
      warnings.push({ message: `Record file has no index row: ${snapshot.recordsDir}/${id}.md` })
    }
  }

  const { legacyExport, versionedExport } = snapshot
  let legacyProducts: ProductRecord[] | null = null
  let versionedProducts: ProductRecord[] | null = null

  if (legacyExport.text === null) {
    errors.push({ message: `Missing export: ${legacyExport.path}` })
  } else {
    const parsed = parseLegacyExport(legacyExport.text, legacyExport.path)
    if (parsed.ok) {
      legacyProducts = parsed.value
    } else {
      errors.push(...parsed.errors.map((message) => ({ message })))
    }
  }

  if (versionedExport.text === null) {
    errors.push({ message: `Missing export: ${versionedExport.path}` })
  } else {
    const parsed = parseVersionedExport(versionedExport.text, versionedExport.path)
    if (parsed.ok) {
      versionedProducts = parsed.value.products
    } else {
      errors.push(...parsed.errors.map((message) => ({ message })))
    }
  }

  checkExportsDrift(snapshot, errors)

  // Freshness is only meaningful when every index row produced a product
  if (issues.length === 0 && duplicates.length === 0 && table.rows.length > 0) {
    if (legacyProducts) {
      checkExportFreshness(products, indexPath, legacyExport.path, legacyProducts, errors)
    }
    if (versionedProducts) {
      checkExportFreshness(products, indexPath, versionedExport.path, versionedProducts, errors)
    }
  }

  return { errors, warnings, products }
}

export function isConsistent(report: ConsistencyReport): boolean {
  return report.errors.length === 0
}

/**
 * Human-readable report, newline-terminated.
 */
export function formatConsistencyReport(report: ConsistencyReport): string {
  if (report.errors.length === 0) {
    return 'Registry validation passed.\n'
  }
  const lines = ['Registry validation failed:']
  for (const issue of report.errors) {
    lines.push(`- ${issue.message}`)
    for (const detail of issue.details ?? []) {
      lines.push(`    ${detail}`)
    }
  }
  return lines.join('\n') + '\n'
}
