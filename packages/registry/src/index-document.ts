import { isValidToilId, type ProductRecord } from './types.js'

export const AUTO_GENERATED_MARKER = '<!-- AUTO-GENERATED: PRODUCT INDEX TABLE (DO NOT EDIT BELOW) -->'

/**
 * Index of the first line that is the auto-generated marker on its own
 * (surrounding whitespace allowed), or -1. The table parser and the merge
 * below both locate the generated section through this.
 */
export function findMarkerLine(lines: readonly string[]): number {
  return lines.findIndex((line) => line.trim() === AUTO_GENERATED_MARKER)
}

/**
 * Replace everything after the auto-generated marker line with `table`. Text
 * before the marker is kept (right-trimmed); without a marker the whole
 * existing document becomes the prefix.
 */
export function mergeGeneratedTable(existing: string, table: string): string {
  const lines = existing.split(/\r?\n/)
  const markerLine = findMarkerLine(lines)
  const prefix = (markerLine === -1 ? existing : lines.slice(0, markerLine).join('\n')).trimEnd()
  return prefix + (prefix ? '\n\n' : '') + AUTO_GENERATED_MARKER + '\n\n' + table
}

export function recordFileName(toilId: string): string {
  return `${toilId}.md`
}

/**
 * TOIL ID of a record file name (`T4L-TOIL-001-ABC.md`), or null for other
 * files such as `README.md`.
 */
export function toilIdFromRecordFile(fileName: string): string | null {
  if (!fileName.endsWith('.md')) return null
  const id = fileName.slice(0, -'.md'.length)
  return isValidToilId(id) ? id : null
}

export function renderRecordStub(product: ProductRecord): string {
  const lines = [
    `# ${product.product_name}`,
    '',
    `- TOIL ID: ${product.toil_id}`,
    `- Category: ${product.category}`,
    `- Lead Creator: ${product.lead_creator}`,
    `- Status: ${product.status}`,
    `- License State: ${product.license_state}`,
  ]
  if (product.aliases?.length) {
    lines.push(`- Aliases: ${product.aliases.join(', ')}`)
  }
  if (product.legacy_ids?.length) {
    lines.push(`- Legacy IDs: ${product.legacy_ids.join(', ')}`)
  }
  return lines.join('\n') + '\n'
}
