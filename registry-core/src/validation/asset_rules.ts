/**
 * @fileoverview Field rules shared by every registry write
 *
 * Lengths are measured in UTF-8 bytes. Checks run in a fixed order
 * (name, size, description, tags) and the first violation is thrown.
 */

import type { AssetContent, AssetId, Principal } from '../types/registry.js'
import {
    CapacityExceededError,
    FormatValidationError,
    InvalidParametersError,
    type RegistryErrorClass
} from '../errors/index.js'

export const ASSET_LIMITS = {
    nameMaxBytes: 64,
    descriptionMaxBytes: 128,
    /** Exclusive upper bound of sizeBytes */
    sizeBytesLimit: 1_000_000_000,
    maxTags: 10,
    tagMaxBytes: 32,
    principalMaxLength: 128
} as const

const CONTROL_OR_WHITESPACE = /[\s\x00-\x1F\x7F]/

export function utf8ByteLength(value: string): number {
    return Buffer.byteLength(value, 'utf8')
}

function hasByteLengthWithin(value: unknown, maxBytes: number): value is string {
    if (typeof value !== 'string') return false
    const length = utf8ByteLength(value)
    return length > 0 && length <= maxBytes
}

/**
 * Checks the content fields of a create or update call.
 *
 * @returns A copy of the content, safe to store
 * @throws InvalidParametersError when name or description length is out of bounds
 * @throws CapacityExceededError when sizeBytes is outside 1..999,999,999
 * @throws FormatValidationError when the tag list has the wrong count or a tag the wrong length
 */
export function validateAssetContent(content: AssetContent): AssetContent {
    const { name, sizeBytes, description, tags } = content

    if (!hasByteLengthWithin(name, ASSET_LIMITS.nameMaxBytes)) {
        throw new InvalidParametersError(`name must be 1 to ${ASSET_LIMITS.nameMaxBytes} bytes`, { field: 'name' })
    }

    if (!Number.isInteger(sizeBytes) || sizeBytes <= 0 || sizeBytes >= ASSET_LIMITS.sizeBytesLimit) {
        throw new CapacityExceededError(`sizeBytes must be an integer between 1 and ${ASSET_LIMITS.sizeBytesLimit - 1}`, {
            field: 'sizeBytes'
        })
    }

    if (!hasByteLengthWithin(description, ASSET_LIMITS.descriptionMaxBytes)) {
        throw new InvalidParametersError(`description must be 1 to ${ASSET_LIMITS.descriptionMaxBytes} bytes`, {
            field: 'description'
        })
    }

    return { name, sizeBytes, description, tags: validateTags(tags) }
}

/**
 * Checks the tag list on its own.
 *
 * @throws FormatValidationError
 */
export function validateTags(tags: unknown): string[] {
    if (!Array.isArray(tags) || tags.length === 0 || tags.length > ASSET_LIMITS.maxTags) {
        throw new FormatValidationError(`tags must contain 1 to ${ASSET_LIMITS.maxTags} entries`, { field: 'tags' })
    }

    const checked: string[] = []
    for (const [index, tag] of tags.entries()) {
        if (!hasByteLengthWithin(tag, ASSET_LIMITS.tagMaxBytes)) {
            throw new FormatValidationError(`tags[${index}] must be 1 to ${ASSET_LIMITS.tagMaxBytes} bytes`, {
                field: 'tags',
                index
            })
        }
        checked.push(tag)
    }
    return checked
}

/**
 * A principal is any non-empty string of at most 128 characters without
 * whitespace or control characters.
 */
export function isWellFormedPrincipal(value: unknown): value is Principal {
    return (
        typeof value === 'string' &&
        value.length > 0 &&
        value.length <= ASSET_LIMITS.principalMaxLength &&
        !CONTROL_OR_WHITESPACE.test(value)
    )
}

export function assertPrincipal(
    value: unknown,
    field: string,
    ErrorClass: RegistryErrorClass = InvalidParametersError
): Principal {
    if (!isWellFormedPrincipal(value)) {
        throw new ErrorClass(`${field} is not a well-formed principal`, { field })
    }
    return value
}

/** Asset ids are positive safe integers. */
export function isAssetId(value: unknown): value is AssetId {
    return typeof value === 'number' && Number.isSafeInteger(value) && value > 0
}
