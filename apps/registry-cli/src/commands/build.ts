import { relative } from 'node:path'
import {
  ERROR_CODES,
  INDEX_PATH,
  LEGACY_EXPORT_PATH,
  RegistryError,
  VERSIONED_EXPORT_PATH,
  buildLegacyExport,
  buildVersionedExport,
  findDuplicateIds,
  normalizeRows,
  parseProductTable,
  serializeExport,
} from '@toil-registry/core'
import type { ILogger } from '@toil-registry/logger'
import { EXIT_CODES, type ExitCode } from '../exit-codes.js'
import { readTextIfExists, writeTextFile } from '../files.js'
import { resolveFromRoot } from '../paths.js'

export interface BuildCommandArgs {
  root: string
  source?: string
  legacyOutput?: string
  v1Output?: string
  /** Compare instead of writing */
  check?: boolean
  logger: ILogger
}

interface PlannedOutput {
  path: string
  content: string
}

export async function runBuildCommand(args: BuildCommandArgs): Promise<ExitCode> {
  const log = args.logger
  const sourcePath = resolveFromRoot(args.root, args.source ?? INDEX_PATH)
  const display = (path: string) => relative(args.root, path) || path

  const markdown = readTextIfExists(sourcePath)
  if (markdown === null) {
    throw new RegistryError(ERROR_CODES.FILE_NOT_FOUND, `Index not found: ${sourcePath}`)
  }

  const table = parseProductTable(markdown)
  const { products, issues } = normalizeRows(table.rows)
  for (const issue of issues) {
    log.error(issue.message, { code: issue.code, field: issue.field, line: issue.line })
  }
  const duplicates = findDuplicateIds(table.rows.map((row) => (row.cells['TOIL ID'] ?? '').trim()))
  for (const id of duplicates) {
    log.error(`Duplicate TOIL ID in index: ${id}`, { code: ERROR_CODES.DUPLICATE_TOIL_ID })
  }
  if (issues.length > 0 || duplicates.length > 0) {
    return EXIT_CODES.FAILED
  }

  const outputs: PlannedOutput[] = [
    {
      path: resolveFromRoot(args.root, args.legacyOutput ?? LEGACY_EXPORT_PATH),
      content: serializeExport(buildLegacyExport(products)),
    },
    {
      path: resolveFromRoot(args.root, args.v1Output ?? VERSIONED_EXPORT_PATH),
      content: serializeExport(buildVersionedExport(products)),
    },
  ]

  if (args.check) {
    let stale = 0
    for (const output of outputs) {
      const current = readTextIfExists(output.path)
      if (current === null) {
        stale++
        log.error('Export missing', { path: display(output.path) })
      } else if (current !== output.content) {
        stale++
        log.error('Export out of date with index', { path: display(output.path) })
      }
    }
    if (stale > 0) {
      return EXIT_CODES.FAILED
    }
    log.info('Exports up to date', { products: products.length })
    return EXIT_CODES.OK
  }

  for (const output of outputs) {
    writeTextFile(output.path, output.content)
    log.debug('Wrote export', { path: display(output.path) })
  }
  log.info('Exports written', {
    products: products.length,
    source: display(sourcePath),
    outputs: outputs.map((output) => display(output.path)),
  })
  return EXIT_CODES.OK
}
