/**
 * Product pack parsing.
 *
 * A product pack is a folder in the products repository holding a README.md
 * (and optionally a metadata.json). The README carries the TOIL ID somewhere
 * in its text plus `Key: Value` metadata lines; metadata.json, when present,
 * overrides both.
 */

import { ERROR_CODES, RegistryError, formatZodIssues } from './errors.js'
import { safeJsonParse } from './json.js'
import { findDuplicateIds, parseOptionalList } from './normalize.js'
import { packMetadataSchema, type PackMetadata } from './schemas.js'
import { isValidToilId, type ListField, type ProductRecord, type ScalarField } from './types.js'

const TOIL_ID_IN_TEXT = /T4L-TOIL-\d{3}(?:-[A-Z0-9]+)+/
const METADATA_LINE = /^\s*[-*]?\s*([^:]+?)\s*:\s*(.+)$/
const LINE_BREAK = /[\r\n]/

const METADATA_KEYS = new Map<string, ScalarField | ListField>([
  ['product name', 'product_name'],
  ['category', 'category'],
  ['lead creator', 'lead_creator'],
  ['status', 'status'],
  ['license state', 'license_state'],
  ['aliases', 'aliases'],
  ['legacy ids', 'legacy_ids'],
])

export const PACK_DEFAULTS = {
  category: '',
  lead_creator: 'Ariel Martin',
  status: 'Active',
  license_state: 'Open for Licensing',
} as const

export interface ProductPackInput {
  folderName: string
  readme: string
  /** Parsed metadata.json, when the pack has one */
  metadata?: PackMetadata
  /** Used in error messages */
  readmePath?: string
  metadataPath?: string
}

/**
 * Collect `Key: Value` lines (optionally bulleted) whose key is a known
 * product field. Later lines win.
 */
export function extractPackMetadata(lines: string[]): PackMetadata {
  const metadata: PackMetadata = {}
  for (const line of lines) {
    const match = METADATA_LINE.exec(line)
    if (!match) continue

    const field = METADATA_KEYS.get(match[1].trim().toLowerCase())
    if (!field) continue

    const value = match[2].trim()
    if (field === 'aliases' || field === 'legacy_ids') {
      metadata[field] = parseOptionalList(value)
    } else {
      metadata[field] = value
    }
  }
  return metadata
}

export function parsePackMetadataJson(text: string, label: string): PackMetadata {
  const json = safeJsonParse(text)
  if (!json.ok) {
    throw new RegistryError(ERROR_CODES.INVALID_PACK, `${label} is invalid JSON: ${json.error}`)
  }
  const parsed = packMetadataSchema.safeParse(json.value)
  if (!parsed.success) {
    throw new RegistryError(ERROR_CODES.INVALID_PACK, `${label} has invalid metadata`, {
      issues: formatZodIssues(parsed.error),
    })
  }
  return parsed.data
}

/** `clean-drain_device` → `Clean Drain Device` */
export function titleCaseFolder(name: string): string {
  return name
    .replace(/[-_]/g, ' ')
    .replace(/[A-Za-z]+/g, (word) => word[0].toUpperCase() + word.slice(1).toLowerCase())
}

function cleanList(values: string[] | undefined): string[] {
  return (values ?? []).map((value) => value.trim()).filter((value) => value.length > 0)
}

/**
 * Table cells are single lines. README values are split per line already, so
 * only metadata.json can carry a line break.
 */
function assertSingleLine(product: ProductRecord, source: string): void {
  for (const [field, value] of Object.entries(product)) {
    const values: unknown[] = Array.isArray(value) ? value : [value]
    if (values.some((item) => typeof item === 'string' && LINE_BREAK.test(item))) {
      throw new RegistryError(ERROR_CODES.INVALID_PACK, `${source}: ${field} contains a line break`, {
        field,
      })
    }
  }
}

function firstNonEmpty(...values: Array<string | undefined>): string | undefined {
  return values.find((value) => value !== undefined && value.trim().length > 0)?.trim()
}

export function buildPackProduct(input: ProductPackInput): ProductRecord {
  const readmeLabel = input.readmePath ?? `${input.folderName}/README.md`
  const fromReadme = extractPackMetadata(input.readme.split(/\r?\n/))
  const fromJson: PackMetadata = input.metadata ?? {}

  const toilId = firstNonEmpty(fromJson.toil_id) ?? TOIL_ID_IN_TEXT.exec(input.readme)?.[0]
  if (!toilId) {
    throw new RegistryError(ERROR_CODES.INVALID_PACK, `No TOIL ID found in ${readmeLabel}`)
  }
  if (!isValidToilId(toilId)) {
    throw new RegistryError(ERROR_CODES.INVALID_TOIL_ID, `Invalid TOIL ID in ${input.folderName}: '${toilId}'`)
  }

  const product: ProductRecord = {
    toil_id: toilId,
    product_name:
      firstNonEmpty(fromJson.product_name, fromReadme.product_name) ?? titleCaseFolder(input.folderName),
    category: firstNonEmpty(fromJson.category, fromReadme.category) ?? PACK_DEFAULTS.category,
    lead_creator:
      firstNonEmpty(fromJson.lead_creator, fromReadme.lead_creator) ?? PACK_DEFAULTS.lead_creator,
    status: firstNonEmpty(fromJson.status, fromReadme.status) ?? PACK_DEFAULTS.status,
    license_state:
      firstNonEmpty(fromJson.license_state, fromReadme.license_state) ?? PACK_DEFAULTS.license_state,
  }

  const jsonAliases = cleanList(fromJson.aliases)
  const aliases = jsonAliases.length > 0 ? jsonAliases : cleanList(fromReadme.aliases)
  if (aliases.length > 0) {
    product.aliases = aliases
  }

  const jsonLegacyIds = cleanList(fromJson.legacy_ids)
  const legacyIds = jsonLegacyIds.length > 0 ? jsonLegacyIds : cleanList(fromReadme.legacy_ids)
  if (legacyIds.length > 0) {
    product.legacy_ids = legacyIds
  }

  assertSingleLine(product, input.metadataPath ?? `${input.folderName}/metadata.json`)
  return product
}

export function compareToilIds(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

export function sortProducts(products: ProductRecord[]): ProductRecord[] {
  return [...products].sort((a, b) => compareToilIds(a.toil_id, b.toil_id))
}

export function assertUniqueToilIds(products: ProductRecord[]): void {
  const duplicates = findDuplicateIds(products.map((product) => product.toil_id))
  if (duplicates.length > 0) {
    throw new RegistryError(
      ERROR_CODES.DUPLICATE_TOIL_ID,
      `Duplicate TOIL IDs across product packs: ${duplicates.join(', ')}`,
      { duplicates }
    )
  }
}
