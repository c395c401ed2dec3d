/**
 * Error classes for the asset registry
 * Every registry operation fails with exactly one of the domain errors below
 */

/**
 * Discriminator naming each domain failure of a registry operation.
 */
export type RegistryErrorKind =
    | 'InsufficientPrivileges'
    | 'AssetNotFound'
    | 'DuplicateEntry'
    | 'InvalidParameters'
    | 'CapacityExceeded'
    | 'AccessDenied'
    | 'PermissionDenied'
    | 'ContentRestricted'
    | 'FormatValidation'

/**
 * Base error class for all registry errors
 */
export abstract class RegistryError extends Error {
    abstract readonly code: string
    abstract readonly statusCode: number
    readonly timestamp: Date = new Date()
    readonly context?: Record<string, unknown>

    constructor(message: string, context?: Record<string, unknown>) {
        super(message)
        this.name = this.constructor.name
        this.context = context
        // Maintains proper stack trace for where our error was thrown (only available on V8)
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor)
        }
    }

    toJSON(): Record<string, unknown> {
        return {
            error: {
                code: this.code,
                message: this.message,
                timestamp: this.timestamp.toISOString(),
                ...(this.context && { context: this.context }),
                ...(process.env.NODE_ENV !== 'production' && { stack: this.stack })
            }
        }
    }
}

/**
 * Base class for the failures a registry operation reports to its caller.
 */
export abstract class RegistryOperationError extends RegistryError {
    abstract readonly kind: RegistryErrorKind
}

/**
 * Reserved for administrator-gated operations (403)
 */
export class InsufficientPrivilegesError extends RegistryOperationError {
    readonly kind = 'InsufficientPrivileges' as const
    readonly code = 'INSUFFICIENT_PRIVILEGES' as const
    readonly statusCode = 403 as const
}

/**
 * The referenced asset does not exist (404)
 */
export class AssetNotFoundError extends RegistryOperationError {
    readonly kind = 'AssetNotFound' as const
    readonly code = 'ASSET_NOT_FOUND' as const
    readonly statusCode = 404 as const
}

/**
 * Identifier collision while inserting an asset (409)
 */
export class DuplicateEntryError extends RegistryOperationError {
    readonly kind = 'DuplicateEntry' as const
    readonly code = 'DUPLICATE_ENTRY' as const
    readonly statusCode = 409 as const
}

/**
 * Name or description length out of bounds, malformed principal (400)
 */
export class InvalidParametersError extends RegistryOperationError {
    readonly kind = 'InvalidParameters' as const
    readonly code = 'INVALID_PARAMETERS' as const
    readonly statusCode = 400 as const
}

/**
 * Declared size outside the accepted range (400)
 */
export class CapacityExceededError extends RegistryOperationError {
    readonly kind = 'CapacityExceeded' as const
    readonly code = 'CAPACITY_EXCEEDED' as const
    readonly statusCode = 400 as const
}

/**
 * Reserved, not raised by any current operation (403)
 */
export class AccessDeniedError extends RegistryOperationError {
    readonly kind = 'AccessDenied' as const
    readonly code = 'ACCESS_DENIED' as const
    readonly statusCode = 403 as const
}

/**
 * Caller is not the current owner of the asset it tries to mutate (403)
 */
export class PermissionDeniedError extends RegistryOperationError {
    readonly kind = 'PermissionDenied' as const
    readonly code = 'PERMISSION_DENIED' as const
    readonly statusCode = 403 as const
}

/**
 * Caller neither owns the asset nor holds a read grant (403)
 */
export class ContentRestrictedError extends RegistryOperationError {
    readonly kind = 'ContentRestricted' as const
    readonly code = 'CONTENT_RESTRICTED' as const
    readonly statusCode = 403 as const
}

/**
 * Tag list violates count or per-tag length constraints (400)
 */
export class FormatValidationError extends RegistryOperationError {
    readonly kind = 'FormatValidation' as const
    readonly code = 'FORMAT_VALIDATION' as const
    readonly statusCode = 400 as const
}

/**
 * Request body or parameters have the wrong shape (422)
 */
export class ValidationError extends RegistryError {
    readonly code = 'VALIDATION_ERROR' as const
    readonly statusCode = 422 as const
}

/**
 * Caller identity could not be resolved (401)
 */
export class AuthenticationError extends RegistryError {
    readonly code = 'AUTHENTICATION_ERROR' as const
    readonly statusCode = 401 as const
}

/**
 * Configuration error (500)
 */
export class ConfigurationError extends RegistryError {
    readonly code = 'CONFIGURATION_ERROR' as const
    readonly statusCode = 500 as const
}

/**
 * Database operation failed (500)
 */
export class DatabaseError extends RegistryError {
    readonly code = 'DATABASE_ERROR' as const
    readonly statusCode = 500 as const
}

/**
 * Type guard to check if an error is a RegistryError
 */
export function isRegistryError(error: unknown): error is RegistryError {
    return error instanceof RegistryError
}

/**
 * Type guard for the domain failures of registry operations
 */
export function isRegistryOperationError(error: unknown): error is RegistryOperationError {
    return error instanceof RegistryOperationError
}

/**
 * Constructor of a concrete registry error class.
 */
export type RegistryErrorClass = new (message: string, context?: Record<string, unknown>) => RegistryError

/**
 * Wraps an unknown error into a RegistryError
 */
export function wrapError(error: unknown, ErrorClass: RegistryErrorClass = DatabaseError): RegistryError {
    if (error instanceof RegistryError) {
        return error
    }

    const message = error instanceof Error ? error.message : String(error)
    const context = error instanceof Error ? { originalError: error.name } : undefined

    return new ErrorClass(message, context)
}
