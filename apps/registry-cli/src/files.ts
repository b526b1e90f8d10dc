import { existsSync, mkdirSync, readFileSync, readdirSync, statSync, writeFileSync } from 'node:fs'
import { dirname } from 'node:path'
import { toilIdFromRecordFile } from '@toil-registry/core'

export function readTextIfExists(path: string): string | null {
  if (!existsSync(path)) {
    return null
  }
  return readFileSync(path, 'utf8')
}

/** Write a UTF-8 file, creating parent directories. */
export function writeTextFile(path: string, content: string): void {
  mkdirSync(dirname(path), { recursive: true })
  writeFileSync(path, content, 'utf8')
}

export function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory()
}

/**
 * TOIL IDs of the `.md` files directly inside `recordsDir`, sorted. A missing
 * directory has no records.
 */
export function listRecordIds(recordsDir: string): string[] {
  if (!isDirectory(recordsDir)) {
    return []
  }
  const ids: string[] = []
  for (const entry of readdirSync(recordsDir, { withFileTypes: true })) {
    if (!entry.isFile()) continue
    const id = toilIdFromRecordFile(entry.name)
    if (id) ids.push(id)
  }
  return ids.sort()
}
