import { resolve } from 'node:path'
import {
  INDEX_PATH,
  LEGACY_EXPORT_PATH,
  RECORDS_DIR,
  VERSIONED_EXPORT_PATH,
  type RegistrySnapshot,
} from '@toil-registry/core'
import { listRecordIds, readTextIfExists } from './files.js'

/** Artifact locations relative to the registry root */
export interface RegistryLayout {
  indexPath: string
  recordsDir: string
  legacyExportPath: string
  versionedExportPath: string
}

export const DEFAULT_LAYOUT: RegistryLayout = {
  indexPath: INDEX_PATH,
  recordsDir: RECORDS_DIR,
  legacyExportPath: LEGACY_EXPORT_PATH,
  versionedExportPath: VERSIONED_EXPORT_PATH,
}

export function loadRegistrySnapshot(
  root: string,
  layout: RegistryLayout = DEFAULT_LAYOUT
): RegistrySnapshot {
  const read = (path: string) => ({ path, text: readTextIfExists(resolve(root, path)) })

  return {
    index: read(layout.indexPath),
    recordsDir: layout.recordsDir,
    recordIds: listRecordIds(resolve(root, layout.recordsDir)),
    legacyExport: read(layout.legacyExportPath),
    versionedExport: read(layout.versionedExportPath),
  }
}
