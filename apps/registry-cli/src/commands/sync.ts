import { existsSync } from 'node:fs'
import { join, relative } from 'node:path'
import {
  ERROR_CODES,
  INDEX_PATH,
  LEGACY_EXPORT_PATH,
  RECORDS_DIR,
  RegistryError,
  VERSIONED_EXPORT_PATH,
  assertUniqueToilIds,
  buildLegacyExport,
  buildVersionedExport,
  mergeGeneratedTable,
  recordFileName,
  renderProductTable,
  renderRecordStub,
  serializeExport,
  sortProducts,
} from '@toil-registry/core'
import type { ILogger } from '@toil-registry/logger'
import { EXIT_CODES, type ExitCode } from '../exit-codes.js'
import { readTextIfExists, writeTextFile } from '../files.js'
import { resolveFromRoot } from '../paths.js'
import {
  discoverProductPacks,
  readProductPack,
  resolveProductsRepo,
  type GitRunner,
} from '../products-repo.js'

export interface SyncCommandArgs {
  root: string
  products?: string
  repoUrl: string
  jsonOutput?: string
  v1Output?: string
  markdownOutput?: string
  recordsDir?: string
  /** Write stub record files for products that have none */
  writeRecords: boolean
  git?: GitRunner
  tempParent?: string
  logger: ILogger
}

export async function runSyncCommand(args: SyncCommandArgs): Promise<ExitCode> {
  const log = args.logger
  const display = (path: string) => relative(args.root, path) || path

  const repo = resolveProductsRepo({
    explicitPath: args.products,
    root: args.root,
    repoUrl: args.repoUrl,
    git: args.git,
    logger: log,
    tempParent: args.tempParent,
  })

  try {
    log.info('Reading product packs', { source: repo.source, path: repo.path })
    const packs = discoverProductPacks(repo.path)
    if (packs.length === 0) {
      throw new RegistryError(ERROR_CODES.INVALID_PACK, `No product packs found in ${repo.path}`)
    }

    const products = sortProducts(packs.map((pack) => readProductPack(pack)))
    assertUniqueToilIds(products)

    const legacyPath = resolveFromRoot(args.root, args.jsonOutput ?? LEGACY_EXPORT_PATH)
    const versionedPath = resolveFromRoot(args.root, args.v1Output ?? VERSIONED_EXPORT_PATH)
    const markdownPath = resolveFromRoot(args.root, args.markdownOutput ?? INDEX_PATH)

    writeTextFile(legacyPath, serializeExport(buildLegacyExport(products)))
    writeTextFile(versionedPath, serializeExport(buildVersionedExport(products)))
    writeTextFile(
      markdownPath,
      mergeGeneratedTable(readTextIfExists(markdownPath) ?? '', renderProductTable(products))
    )

    let createdRecords = 0
    if (args.writeRecords) {
      const recordsDir = resolveFromRoot(args.root, args.recordsDir ?? RECORDS_DIR)
      for (const product of products) {
        const recordPath = join(recordsDir, recordFileName(product.toil_id))
        if (existsSync(recordPath)) continue
        writeTextFile(recordPath, renderRecordStub(product))
        createdRecords++
        log.debug('Created record stub', { path: display(recordPath) })
      }
    }

    log.info('Registry synced from product packs', {
      products: products.length,
      createdRecords,
      outputs: [legacyPath, versionedPath, markdownPath].map(display),
    })
    return EXIT_CODES.OK
  } finally {
    repo.cleanup()
  }
}
