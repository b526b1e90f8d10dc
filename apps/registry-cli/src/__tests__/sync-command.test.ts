import { existsSync, mkdirSync, readFileSync, readdirSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { afterEach, describe, expect, it, vi } from 'vitest'
import {
  AUTO_GENERATED_MARKER,
  buildVersionedExport,
  renderProductTable,
  renderRecordStub,
  serializeExport,
} from '@toil-registry/core'
import { createMemoryLogger } from '@toil-registry/logger'
import { runSyncCommand } from '../commands/sync.js'
import { runValidateCommand } from '../commands/validate.js'
import type { GitRunner } from '../products-repo.js'
import { DRAIN, FAN, INDEX_PREFIX, createWorkspace, indexMarkdown, type Workspace } from './helpers.js'

const FAN_README = '# Solar Fan Kit\n\nTOIL ID: T4L-TOIL-002-SFK\n\n- Category: Energy\n- Status: Prototype\n'
const DRAIN_README = 'Registered as T4L-TOIL-001-CDD.\n\nAliases: DrainClean T Adapter\n'
const DRAIN_METADATA = JSON.stringify({ category: 'HVAC Hardware', legacy_ids: ['T4L-2025-001'] })

function packFiles(dir: string): Record<string, string> {
  return {
    [`${dir}/solar-fan-kit/README.md`]: FAN_README,
    [`${dir}/clean-drain-device/README.md`]: DRAIN_README,
    [`${dir}/clean-drain-device/metadata.json`]: DRAIN_METADATA,
    [`${dir}/notes/todo.txt`]: 'not a pack\n',
  }
}

describe('runSyncCommand', () => {
  let workspace: Workspace

  afterEach(() => {
    workspace.cleanup()
  })

  const read = (path: string) => readFileSync(join(workspace.root, path), 'utf8')

  it('builds exports, the index table and record stubs from product packs', async () => {
    workspace = createWorkspace({
      ...packFiles('packs'),
      'registry/index/TOIL_Product_Index.md': `${INDEX_PREFIX}\n${AUTO_GENERATED_MARKER}\n\nstale\n`,
      'registry/records/T4L-TOIL-002-SFK.md': 'hand-written\n',
    })
    const { logger, entries } = createMemoryLogger('registry')

    const code = await runSyncCommand({
      root: workspace.root,
      products: '../packs',
      repoUrl: 'https://example.com/unused.git',
      writeRecords: true,
      logger,
    })

    expect(code).toBe(0)
    expect(read('exports/product_index.json')).toBe(serializeExport([DRAIN, FAN]))
    expect(read('exports/product_index_v1.json')).toBe(serializeExport(buildVersionedExport([DRAIN, FAN])))
    expect(read('index/TOIL_Product_Index.md')).toBe(indexMarkdown([DRAIN, FAN]))
    expect(read('records/T4L-TOIL-001-CDD.md')).toBe(renderRecordStub(DRAIN))
    expect(read('records/T4L-TOIL-002-SFK.md')).toBe('hand-written\n')
    expect(entries[0]).toMatchObject({ message: 'Reading product packs', source: 'explicit' })
    expect(entries.at(-1)).toMatchObject({
      message: 'Registry synced from product packs',
      products: 2,
      createdRecords: 1,
      outputs: ['exports/product_index.json', 'exports/product_index_v1.json', 'index/TOIL_Product_Index.md'],
    })

    const report: string[] = []
    await runValidateCommand({ root: workspace.root, logger, write: (text) => report.push(text) })
    expect(report.join('')).toBe('Registry validation passed.\n')
  })

  it('skips record stubs when asked and honours output paths', async () => {
    workspace = createWorkspace(packFiles('packs'))
    const { logger } = createMemoryLogger('registry')

    await runSyncCommand({
      root: workspace.root,
      products: '../packs',
      repoUrl: 'https://example.com/unused.git',
      jsonOutput: 'out/products.json',
      v1Output: 'out/products_v1.json',
      markdownOutput: 'out/INDEX.md',
      writeRecords: false,
      logger,
    })

    expect(read('out/products.json')).toBe(serializeExport([DRAIN, FAN]))
    expect(read('out/INDEX.md')).toBe(`${AUTO_GENERATED_MARKER}\n\n${renderProductTable([DRAIN, FAN])}`)
    expect(existsSync(join(workspace.root, 'records'))).toBe(false)
  })

  it('uses a products directory beside the registry root', async () => {
    workspace = createWorkspace(packFiles('products'))
    const { logger, entries } = createMemoryLogger('registry')

    await runSyncCommand({
      root: workspace.root,
      repoUrl: 'https://example.com/unused.git',
      writeRecords: false,
      logger,
    })

    expect(entries[0]).toMatchObject({ source: 'sibling', path: join(workspace.base, 'products') })
  })

  it('clones the products repository and removes the clone afterwards', async () => {
    workspace = createWorkspace()
    const tempParent = join(workspace.base, 'tmp')
    mkdirSync(tempParent)
    const git = vi.fn<GitRunner>((args) => {
      const target = args[4]
      mkdirSync(join(target, 'solar-fan-kit'), { recursive: true })
      writeFileSync(join(target, 'solar-fan-kit', 'README.md'), FAN_README)
      return { status: 0, stdout: '', stderr: '' }
    })
    const { logger } = createMemoryLogger('registry')

    const code = await runSyncCommand({
      root: workspace.root,
      repoUrl: 'https://example.com/products.git',
      writeRecords: false,
      git,
      tempParent,
      logger,
    })

    expect(code).toBe(0)
    expect(git).toHaveBeenCalledWith(
      ['clone', '--depth', '1', 'https://example.com/products.git', expect.stringContaining('toil-products-')],
      workspace.root
    )
    expect(read('exports/product_index.json')).toBe(serializeExport([FAN]))
    expect(readdirSync(tempParent)).toEqual([])
  })

  it('reports a failed clone', async () => {
    workspace = createWorkspace()
    const tempParent = join(workspace.base, 'tmp')
    mkdirSync(tempParent)
    const git = vi.fn<GitRunner>(() => ({ status: 128, stdout: '', stderr: 'fatal: repository not found\n' }))
    const { logger } = createMemoryLogger('registry')

    await expect(
      runSyncCommand({
        root: workspace.root,
        repoUrl: 'https://example.com/missing.git',
        writeRecords: false,
        git,
        tempParent,
        logger,
      })
    ).rejects.toMatchObject({
      code: 'EXTERNAL_COMMAND_FAILED',
      message: 'git clone failed: fatal: repository not found',
    })
    expect(readdirSync(tempParent)).toEqual([])
  })

  it('rejects metadata.json values that would break the index table', async () => {
    workspace = createWorkspace({
      'packs/solar-fan-kit/README.md': FAN_README,
      'packs/solar-fan-kit/metadata.json': JSON.stringify({ product_name: 'Solar\nFan Kit' }),
    })
    const { logger } = createMemoryLogger('registry')

    await expect(
      runSyncCommand({ root: workspace.root, products: '../packs', repoUrl: 'x', writeRecords: true, logger })
    ).rejects.toMatchObject({
      code: 'INVALID_PACK',
      message: 'solar-fan-kit/metadata.json: product_name contains a line break',
    })
    expect(existsSync(join(workspace.root, 'index'))).toBe(false)
  })

  it('rejects a products repository without packs', async () => {
    workspace = createWorkspace({ 'packs/notes/todo.txt': 'nothing\n' })
    const { logger } = createMemoryLogger('registry')

    await expect(
      runSyncCommand({ root: workspace.root, products: '../packs', repoUrl: 'x', writeRecords: true, logger })
    ).rejects.toMatchObject({ code: 'INVALID_PACK' })
    expect(existsSync(join(workspace.root, 'exports'))).toBe(false)
  })

  it('rejects duplicate TOIL IDs across packs', async () => {
    workspace = createWorkspace({
      'packs/solar-fan-kit/README.md': FAN_README,
      'packs/solar-fan-kit-v2/README.md': FAN_README,
    })
    const { logger } = createMemoryLogger('registry')

    await expect(
      runSyncCommand({ root: workspace.root, products: '../packs', repoUrl: 'x', writeRecords: true, logger })
    ).rejects.toMatchObject({
      code: 'DUPLICATE_TOIL_ID',
      message: 'Duplicate TOIL IDs across product packs: T4L-TOIL-002-SFK',
    })
  })

  it('rejects a missing explicit products path', async () => {
    workspace = createWorkspace()
    const { logger } = createMemoryLogger('registry')

    await expect(
      runSyncCommand({ root: workspace.root, products: '../nowhere', repoUrl: 'x', writeRecords: true, logger })
    ).rejects.toMatchObject({ code: 'FILE_NOT_FOUND' })
  })
})
