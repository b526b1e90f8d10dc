import { formatZodIssues } from './errors.js'
import { isPlainObject, safeJsonParse } from './json.js'
import { legacyExportSchema } from './schemas.js'
import { SCHEMA_VERSION, type ProductRecord, type VersionedExport } from './types.js'

export const LEGACY_EXPORT_PATH = 'exports/product_index.json'
export const VERSIONED_EXPORT_PATH = 'exports/product_index_v1.json'

export type ExportParseResult<T> = { ok: true; value: T } | { ok: false; errors: string[] }

export function buildLegacyExport(products: ProductRecord[]): ProductRecord[] {
  return products.map((product) => ({ ...product }))
}

export function buildVersionedExport(products: ProductRecord[]): VersionedExport {
  return {
    schema_version: SCHEMA_VERSION,
    products: buildLegacyExport(products),
  }
}

/**
 * Two-space indented JSON with a trailing newline. Non-ASCII text is
 * written as-is.
 */
export function serializeExport(value: ProductRecord[] | VersionedExport): string {
  return JSON.stringify(value, null, 2) + '\n'
}

function describeValue(value: unknown): string {
  return value === undefined ? 'nothing' : JSON.stringify(value)
}

function parseProducts(raw: unknown, label: string): ExportParseResult<ProductRecord[]> {
  const parsed = legacyExportSchema.safeParse(raw)
  if (!parsed.success) {
    return {
      ok: false,
      errors: formatZodIssues(parsed.error).map((issue) => `${label} has a malformed product entry (${issue})`),
    }
  }
  return { ok: true, value: parsed.data }
}

export function parseLegacyExport(
  text: string,
  label: string = LEGACY_EXPORT_PATH
): ExportParseResult<ProductRecord[]> {
  const json = safeJsonParse(text)
  if (!json.ok) {
    return { ok: false, errors: [`${label} is invalid JSON: ${json.error}`] }
  }
  if (!Array.isArray(json.value)) {
    return { ok: false, errors: [`${label} must be a JSON list`] }
  }
  return parseProducts(json.value, label)
}

export function parseVersionedExport(
  text: string,
  label: string = VERSIONED_EXPORT_PATH
): ExportParseResult<VersionedExport> {
  const json = safeJsonParse(text)
  if (!json.ok) {
    return { ok: false, errors: [`${label} is invalid JSON: ${json.error}`] }
  }
  const raw = json.value
  if (!isPlainObject(raw)) {
    return { ok: false, errors: [`${label} must be a JSON object`] }
  }

  const errors: string[] = []
  if (raw.schema_version !== SCHEMA_VERSION) {
    errors.push(
      `${label} schema_version must be ${SCHEMA_VERSION} (got ${describeValue(raw.schema_version)})`
    )
  }

  const unknownKeys = Object.keys(raw).filter((key) => key !== 'schema_version' && key !== 'products')
  if (unknownKeys.length > 0) {
    errors.push(`${label} has unexpected top-level keys: ${unknownKeys.join(', ')}`)
  }

  if (!Array.isArray(raw.products) || raw.products.length === 0) {
    errors.push(`${label} products must be a non-empty list`)
    return { ok: false, errors }
  }

  const products = parseProducts(raw.products, label)
  if (!products.ok) {
    return { ok: false, errors: [...errors, ...products.errors] }
  }
  if (errors.length > 0) {
    return { ok: false, errors }
  }

  return { ok: true, value: { schema_version: SCHEMA_VERSION, products: products.value } }
}
