import { errors } from '@vinejs/vine'
import { ValidationError } from '../errors/index.js'

interface CompiledValidator<T> {
    validate: (data: unknown) => Promise<T>
}

export interface FieldError {
    field: string
    message: string
}

function toFieldErrors(messages: unknown): FieldError[] {
    if (!Array.isArray(messages)) return []
    return messages.flatMap(entry =>
        typeof entry?.field === 'string' && typeof entry?.message === 'string'
            ? [{ field: entry.field, message: entry.message }]
            : []
    )
}

/**
 * Validates data using a pre-compiled VineJS validator.
 * @param validator - Compiled VineJS validator
 * @param data - Data to validate
 * @param context - Optional context for error messages
 * @returns Validated and typed data
 * @throws ValidationError if validation fails
 */
export async function validateData<T>(validator: CompiledValidator<T>, data: unknown, context?: string): Promise<T> {
    try {
        return await validator.validate(data)
    } catch (error) {
        if (error instanceof errors.E_VALIDATION_ERROR) {
            const fieldErrors = toFieldErrors(error.messages)
            const messages = fieldErrors.map(e => `${e.field}: ${e.message}`).join(', ')

            throw new ValidationError(context ? `${context}: ${messages}` : messages, {
                errors: fieldErrors
            })
        }
        throw error
    }
}
