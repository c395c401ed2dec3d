import vine from '@vinejs/vine'

// ============================================
// Registry request schemas
// ============================================
//
// These check the shape of HTTP bodies only. Length and range bounds are
// enforced by the registry itself so callers receive the registry's own
// error kinds.

/**
 * Create / update body schema
 */
export const assetContentSchema = vine.object({
    name: vine.string(),
    sizeBytes: vine.number(),
    description: vine.string(),
    tags: vine.array(vine.string())
})

/**
 * Transfer body schema
 */
export const transferSchema = vine.object({
    newOwner: vine.string()
})

// ============================================
// Compiled validators (for performance)
// ============================================

export const validateAssetContentBody = vine.compile(assetContentSchema)
export const validateTransferBody = vine.compile(transferSchema)
