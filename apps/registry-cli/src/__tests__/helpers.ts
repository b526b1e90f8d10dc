import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { dirname, join } from 'node:path'
import { mergeGeneratedTable, renderProductTable, type ProductRecord } from '@toil-registry/core'

export const DRAIN: ProductRecord = {
  toil_id: 'T4L-TOIL-001-CDD',
  product_name: 'Clean Drain Device',
  category: 'HVAC Hardware',
  lead_creator: 'Ariel Martin',
  status: 'Active',
  license_state: 'Open for Licensing',
  aliases: ['DrainClean T Adapter'],
  legacy_ids: ['T4L-2025-001'],
}

export const FAN: ProductRecord = {
  toil_id: 'T4L-TOIL-002-SFK',
  product_name: 'Solar Fan Kit',
  category: 'Energy',
  lead_creator: 'Ariel Martin',
  status: 'Prototype',
  license_state: 'Open for Licensing',
}

export const INDEX_PREFIX = '# TOIL Product Index\n\nIntro.\n'

export function indexMarkdown(products: ProductRecord[]): string {
  return mergeGeneratedTable(INDEX_PREFIX, renderProductTable(products))
}

export interface Workspace {
  /** Temp directory holding the registry and its neighbours */
  base: string
  /** Registry root (`<base>/registry`) */
  root: string
  write(path: string, content: string): void
  cleanup(): void
}

/**
 * A throwaway directory tree. The registry root sits one level down so the
 * `products` sibling lookup only sees what a test creates.
 */
export function createWorkspace(files: Record<string, string> = {}): Workspace {
  const base = mkdtempSync(join(tmpdir(), 'registry-cli-'))
  const root = join(base, 'registry')
  mkdirSync(root)

  const write = (path: string, content: string) => {
    const full = join(base, path)
    mkdirSync(dirname(full), { recursive: true })
    writeFileSync(full, content, 'utf8')
  }
  for (const [path, content] of Object.entries(files)) {
    write(path, content)
  }

  return {
    base,
    root,
    write,
    cleanup: () => rmSync(base, { recursive: true, force: true }),
  }
}
