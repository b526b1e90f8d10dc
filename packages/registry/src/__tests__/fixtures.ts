import { AUTO_GENERATED_MARKER } from '../index-document.js'
import type { ProductRecord } from '../types.js'

export const HEADER_ROW =
  '| TOIL ID | Product Name | Category | Lead Creator | Status | License State | Aliases (Optional) | Legacy IDs (Optional) |'
export const SEPARATOR_ROW =
  '|-------|-------------|----------|--------------|--------|---------------|-------------------|-----------------------|'

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

export const DRAIN_ROW =
  '| T4L-TOIL-001-CDD | Clean Drain Device | HVAC Hardware | Ariel Martin | Active | Open for Licensing | DrainClean T Adapter | T4L-2025-001 |'
export const FAN_ROW =
  '| T4L-TOIL-002-SFK | Solar Fan Kit | Energy | Ariel Martin | Prototype | Open for Licensing |  |  |'

export function indexDocument(rows: string[], prefix = '# TOIL Product Index'): string {
  return [prefix, '', AUTO_GENERATED_MARKER, '', HEADER_ROW, SEPARATOR_ROW, ...rows, ''].join('\n')
}
