import { describe, expect, it } from 'vitest'
import {
  checkRegistryConsistency,
  createSnapshot,
  formatConsistencyReport,
  isConsistent,
  type RegistrySnapshot,
} from '../consistency.js'
import { buildVersionedExport, serializeExport } from '../exports.js'
import type { ProductRecord } from '../types.js'
import { DRAIN, DRAIN_ROW, FAN, FAN_ROW, indexDocument } from './fixtures.js'

function snapshotOf(rows: string[], products: ProductRecord[], recordIds: string[]): RegistrySnapshot {
  return createSnapshot({
    index: { path: 'index/TOIL_Product_Index.md', text: indexDocument(rows) },
    recordIds,
    legacyExport: { path: 'exports/product_index.json', text: serializeExport(products) },
    versionedExport: {
      path: 'exports/product_index_v1.json',
      text: serializeExport(buildVersionedExport(products)),
    },
  })
}

const consistent = () =>
  snapshotOf([DRAIN_ROW, FAN_ROW], [DRAIN, FAN], [DRAIN.toil_id, FAN.toil_id])

function messages(snapshot: RegistrySnapshot): string[] {
  return checkRegistryConsistency(snapshot).errors.map((issue) => issue.message)
}

describe('checkRegistryConsistency', () => {
  it('passes a consistent registry', () => {
    const report = checkRegistryConsistency(consistent())

    expect(report.errors).toEqual([])
    expect(report.warnings).toEqual([])
    expect(report.products).toEqual([DRAIN, FAN])
    expect(isConsistent(report)).toBe(true)
  })

  it('stops when the index is missing', () => {
    expect(messages(createSnapshot())).toEqual(['index/TOIL_Product_Index.md: file not found'])
  })

  it('stops when the index has no product table', () => {
    const snapshot = { ...consistent(), index: { path: 'index/TOIL_Product_Index.md', text: '# Index\n' } }
    expect(messages(snapshot)).toEqual([
      'index/TOIL_Product_Index.md: No product index table found with expected headers.',
    ])
  })

  it('reports an empty table', () => {
    expect(messages(snapshotOf([], [], []))).toEqual([
      'Index table has zero rows',
      'exports/product_index_v1.json products must be a non-empty list',
    ])
  })

  it('reports rows without a record file', () => {
    expect(messages(snapshotOf([DRAIN_ROW, FAN_ROW], [DRAIN, FAN], [DRAIN.toil_id]))).toEqual([
      'Missing record file: records/T4L-TOIL-002-SFK.md',
    ])
  })

  it('warns about record files without an index row', () => {
    const report = checkRegistryConsistency(
      snapshotOf([FAN_ROW], [FAN], [FAN.toil_id, 'T4L-TOIL-009-OLD'])
    )

    expect(report.errors).toEqual([])
    expect(report.warnings).toEqual([{ message: 'Record file has no index row: records/T4L-TOIL-009-OLD.md' }])
  })

  it('reports duplicate IDs in the index', () => {
    expect(messages(snapshotOf([FAN_ROW, FAN_ROW], [FAN, FAN], [FAN.toil_id]))).toEqual([
      'Duplicate TOIL ID in index: T4L-TOIL-002-SFK',
    ])
  })

  it('reports invalid rows', () => {
    const row = '| T4L-TOIL-2-SFK | Solar Fan Kit | Energy | Ariel Martin | Prototype | Open for Licensing |  |  |'
    expect(messages(snapshotOf([row], [FAN], ['T4L-TOIL-2-SFK']))).toEqual([
      "Invalid TOIL ID format at line 7: 'T4L-TOIL-2-SFK'",
    ])
  })

  it('reports missing exports', () => {
    const snapshot = {
      ...consistent(),
      legacyExport: { path: 'exports/product_index.json', text: null },
      versionedExport: { path: 'exports/product_index_v1.json', text: null },
    }
    expect(messages(snapshot)).toEqual([
      'Missing export: exports/product_index.json',
      'Missing export: exports/product_index_v1.json',
    ])
  })

  it('reports drift between the two exports and against the index', () => {
    const snapshot = {
      ...consistent(),
      versionedExport: {
        path: 'exports/product_index_v1.json',
        text: serializeExport(buildVersionedExport([DRAIN, { ...FAN, status: 'Retired' }])),
      },
    }

    expect(checkRegistryConsistency(snapshot).errors).toEqual([
      {
        message: 'Legacy export does not match v1 products list (exports drift)',
        details: [
          'T4L-TOIL-002-SFK: status differs (exports/product_index_v1.json products: "Retired", exports/product_index.json: "Prototype")',
        ],
      },
      {
        message: 'exports/product_index_v1.json is out of date with index/TOIL_Product_Index.md (run `registry build`)',
        details: [
          'T4L-TOIL-002-SFK: status differs (index/TOIL_Product_Index.md: "Prototype", exports/product_index_v1.json: "Retired")',
        ],
      },
    ])
  })

  it('reports both exports as stale when the index changes', () => {
    const snapshot = snapshotOf([DRAIN_ROW, FAN_ROW], [FAN], [DRAIN.toil_id, FAN.toil_id])
    expect(messages(snapshot)).toEqual([
      'exports/product_index.json is out of date with index/TOIL_Product_Index.md (run `registry build`)',
      'exports/product_index_v1.json is out of date with index/TOIL_Product_Index.md (run `registry build`)',
    ])
  })
})

describe('formatConsistencyReport', () => {
  it('prints a pass line', () => {
    expect(formatConsistencyReport({ errors: [], warnings: [], products: [] })).toBe(
      'Registry validation passed.\n'
    )
  })

  it('lists errors with indented details', () => {
    const text = formatConsistencyReport({
      errors: [{ message: 'first', details: ['a', 'b'] }, { message: 'second' }],
      warnings: [{ message: 'ignored' }],
      products: [],
    })
    expect(text).toBe('Registry validation failed:\n- first\n    a\n    b\n- second\n')
  })
})
