/**
 * Locating and reading the external products repository.
 *
 * Resolution order: explicit path, then a `products` directory beside the
 * registry root, then a shallow git clone into a temp directory that is
 * removed by `cleanup()`.
 */

import { spawnSync } from 'node:child_process'
import { existsSync, mkdtempSync, readFileSync, readdirSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { basename, join, resolve } from 'node:path'
import {
  ERROR_CODES,
  RegistryError,
  buildPackProduct,
  parsePackMetadataJson,
  type ProductRecord,
} from '@toil-registry/core'
import type { ILogger } from '@toil-registry/logger'
import { isDirectory } from './files.js'

export interface GitResult {
  status: number | null
  stdout: string
  stderr: string
  error?: Error
}

export type GitRunner = (args: string[], cwd: string) => GitResult

export const runGit: GitRunner = (args, cwd) => {
  const result = spawnSync('git', args, {
    cwd,
    encoding: 'utf-8',
    stdio: ['ignore', 'pipe', 'pipe'],
    shell: process.platform === 'win32',
  })
  return {
    status: result.status,
    stdout: result.stdout ?? '',
    stderr: result.stderr ?? '',
    error: result.error,
  }
}

export type ProductsRepoSource = 'explicit' | 'sibling' | 'clone'

export interface ProductsRepo {
  path: string
  source: ProductsRepoSource
  /** Removes a temporary clone; no-op otherwise */
  cleanup(): void
}

export interface ResolveProductsRepoOptions {
  explicitPath?: string
  root: string
  repoUrl: string
  git?: GitRunner
  logger?: ILogger
  /** Parent directory for temporary clones */
  tempParent?: string
}

const noop = () => {}

export function resolveProductsRepo(options: ResolveProductsRepoOptions): ProductsRepo {
  if (options.explicitPath) {
    const path = resolve(options.root, options.explicitPath)
    if (!isDirectory(path)) {
      throw new RegistryError(ERROR_CODES.FILE_NOT_FOUND, `Products repository not found: ${path}`)
    }
    return { path, source: 'explicit', cleanup: noop }
  }

  const sibling = resolve(options.root, '..', 'products')
  if (isDirectory(sibling)) {
    return { path: sibling, source: 'sibling', cleanup: noop }
  }

  const git = options.git ?? runGit
  const target = mkdtempSync(join(options.tempParent ?? tmpdir(), 'toil-products-'))
  const cleanup = () => rmSync(target, { recursive: true, force: true })

  options.logger?.info('Cloning products repository', { url: options.repoUrl })
  const result = git(['clone', '--depth', '1', options.repoUrl, target], options.root)
  if (result.status !== 0) {
    cleanup()
    const reason = result.error?.message ?? (result.stderr.trim() || `exit status ${String(result.status)}`)
    throw new RegistryError(ERROR_CODES.EXTERNAL_COMMAND_FAILED, `git clone failed: ${reason}`, {
      url: options.repoUrl,
    })
  }

  return { path: target, source: 'clone', cleanup }
}

/**
 * Child directories of the products repository that hold a README.md,
 * sorted by name.
 */
export function discoverProductPacks(productsRepo: string): string[] {
  return readdirSync(productsRepo, { withFileTypes: true })
    .filter((entry) => entry.isDirectory() && existsSync(join(productsRepo, entry.name, 'README.md')))
    .map((entry) => entry.name)
    .sort()
    .map((name) => join(productsRepo, name))
}

export function readProductPack(packDir: string): ProductRecord {
  const folderName = basename(packDir)
  const readmePath = join(packDir, 'README.md')
  const metadataPath = join(packDir, 'metadata.json')

  const metadata = existsSync(metadataPath)
    ? parsePackMetadataJson(readFileSync(metadataPath, 'utf8'), `${folderName}/metadata.json`)
    : undefined

  return buildPackProduct({
    folderName,
    readme: readFileSync(readmePath, 'utf8'),
    metadata,
    readmePath: `${folderName}/README.md`,
    metadataPath: `${folderName}/metadata.json`,
  })
}
