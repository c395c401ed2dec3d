export { validateData, type FieldError } from './validate.js'
export { assetContentSchema, transferSchema, validateAssetContentBody, validateTransferBody } from './schemas.js'
export {
    ASSET_LIMITS,
    utf8ByteLength,
    validateAssetContent,
    validateTags,
    isWellFormedPrincipal,
    assertPrincipal,
    isAssetId
} from './asset_rules.js'
