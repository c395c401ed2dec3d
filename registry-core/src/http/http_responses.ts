/**
 * @fileoverview HTTP response utilities for consistent API responses
 */

import type { DataResponse } from './types.js'

/**
 * HTTP status codes used by the registry endpoints.
 */
export const HttpStatus = {
    OK: 200,
    CREATED: 201,
    BAD_REQUEST: 400,
    UNAUTHORIZED: 401,
    FORBIDDEN: 403,
    NOT_FOUND: 404,
    CONFLICT: 409,
    UNPROCESSABLE_ENTITY: 422,
    INTERNAL_SERVER_ERROR: 500
} as const

export type HttpStatusCode = (typeof HttpStatus)[keyof typeof HttpStatus]

/**
 * Creates a JSON response with the specified status and data.
 *
 * @example
 * ```typescript
 * return jsonResponse(201, { assetId: 7 })
 * ```
 */
export function jsonResponse(status: number, data: object): DataResponse {
    return {
        status,
        content: JSON.stringify(data),
        headers: { 'Content-Type': 'application/json' }
    }
}

/**
 * Creates a successful JSON response (HTTP 200).
 */
export function successResponse(data: object): DataResponse {
    return jsonResponse(HttpStatus.OK, data)
}
