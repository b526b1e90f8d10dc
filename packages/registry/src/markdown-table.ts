import { ERROR_CODES, RegistryError } from './errors.js'
import { findMarkerLine } from './index-document.js'
import { PRODUCT_COLUMNS, REQUIRED_HEADERS, type ProductRecord } from './types.js'

export interface ParsedTableRow {
  /** 1-based line number in the source document */
  line: number
  /** Cell text keyed by header label */
  cells: Record<string, string>
}

export interface ParsedTable {
  /** 1-based line number of the canonical header row */
  headerLine: number
  headers: string[]
  rows: ParsedTableRow[]
}

const SEPARATOR_CELL = /^:?-{3,}:?$/

const TABLE_SEPARATOR =
  '|-------|-------------|----------|--------------|--------|---------------|-------------------|-----------------------|'

function isTableLine(line: string): boolean {
  return line.trim().startsWith('|')
}

/**
 * Split a pipe-delimited row into trimmed cells. One leading and one trailing
 * pipe are dropped; `\|` is a literal pipe inside a cell.
 */
export function splitRow(line: string): string[] {
  let body = line.trim()
  if (body.startsWith('|')) {
    body = body.slice(1)
  }
  if (body.endsWith('|') && !body.endsWith('\\|')) {
    body = body.slice(0, -1)
  }

  const cells: string[] = []
  let current = ''
  for (let i = 0; i < body.length; i++) {
    const ch = body[i]
    if (ch === '\\' && body[i + 1] === '|') {
      current += '|'
      i++
      continue
    }
    if (ch === '|') {
      cells.push(current.trim())
      current = ''
      continue
    }
    current += ch
  }
  cells.push(current.trim())
  return cells
}

export function isSeparatorRow(cells: string[]): boolean {
  return cells.length > 0 && cells.every((cell) => SEPARATOR_CELL.test(cell.trim()))
}

function hasRequiredHeaders(cells: string[]): boolean {
  return REQUIRED_HEADERS.every((header) => cells.includes(header))
}

/**
 * Index (0-based) of the canonical header row: the first table line whose
 * cells include every required column header. When the document has an
 * auto-generated marker, the search starts after it. Returns -1 when there
 * is none.
 */
export function findHeaderRow(lines: string[]): number {
  const markerIndex = findMarkerLine(lines)
  const isHeader = (line: string, index: number): boolean =>
    index > markerIndex && isTableLine(line) && hasRequiredHeaders(splitRow(line))
  return lines.findIndex(isHeader)
}

export function parseProductTable(markdown: string): ParsedTable {
  const lines = markdown.split(/\r?\n/)
  const headerIndex = findHeaderRow(lines)
  if (headerIndex === -1) {
    throw new RegistryError(
      ERROR_CODES.TABLE_NOT_FOUND,
      'No product index table found with expected headers.',
      { expectedHeaders: [...REQUIRED_HEADERS] }
    )
  }

  const headers = splitRow(lines[headerIndex])
  const rows: ParsedTableRow[] = []

  let i = headerIndex + 1
  if (i < lines.length && isTableLine(lines[i]) && isSeparatorRow(splitRow(lines[i]))) {
    i++
  }

  for (; i < lines.length && isTableLine(lines[i]); i++) {
    const cells = splitRow(lines[i])
    if (isSeparatorRow(cells)) {
      continue
    }

    const lineNumber = i + 1
    if (cells.length !== headers.length) {
      throw new RegistryError(ERROR_CODES.MALFORMED_ROW, `Malformed row at line ${lineNumber}`, {
        line: lineNumber,
        expectedCells: headers.length,
        actualCells: cells.length,
      })
    }

    const record: Record<string, string> = {}
    headers.forEach((header, index) => {
      // First occurrence wins when a header label repeats
      if (!Object.hasOwn(record, header)) {
        record[header] = cells[index]
      }
    })
    rows.push({ line: lineNumber, cells: record })
  }

  return { headerLine: headerIndex + 1, headers, rows }
}

function escapeCell(value: string): string {
  return value.replace(/\|/g, '\\|')
}

function cellValue(product: ProductRecord, field: (typeof PRODUCT_COLUMNS)[number]['field']): string {
  const value = product[field]
  if (Array.isArray(value)) {
    return value.join(', ')
  }
  return value ?? ''
}

/**
 * Render products as the canonical index table, newline-terminated.
 */
export function renderProductTable(products: ProductRecord[]): string {
  const header = `| ${PRODUCT_COLUMNS.map((column) => column.header).join(' | ')} |`
  const rows = products.map(
    (product) =>
      `| ${PRODUCT_COLUMNS.map((column) => escapeCell(cellValue(product, column.field))).join(' | ')} |`
  )
  return [header, TABLE_SEPARATOR, ...rows].join('\n') + '\n'
}
