import { z } from 'zod'

const listSchema = z.array(z.string())

export const productRecordSchema = z
  .object({
    toil_id: z.string(),
    product_name: z.string(),
    category: z.string(),
    lead_creator: z.string(),
    status: z.string(),
    license_state: z.string(),
    aliases: listSchema.optional(),
    legacy_ids: listSchema.optional(),
  })
  .strict()

export const legacyExportSchema = z.array(productRecordSchema)

/**
 * Optional `metadata.json` inside a product pack. Every field is optional;
 * present fields override README metadata. Unknown keys are ignored.
 */
export const packMetadataSchema = z
  .object({
    toil_id: z.string().optional(),
    product_name: z.string().optional(),
    category: z.string().optional(),
    lead_creator: z.string().optional(),
    status: z.string().optional(),
    license_state: z.string().optional(),
    aliases: listSchema.optional(),
    legacy_ids: listSchema.optional(),
  })

export type PackMetadata = z.infer<typeof packMetadataSchema>
