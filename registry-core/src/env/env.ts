/**
 * @fileoverview Environment variable validation and configuration management
 *
 * Type-safe parsing of environment variables for string, number, boolean and
 * enum values.
 */

import { ConfigurationError } from '../errors/index.js'

export type EnvSource = Record<string, string | undefined>

export interface StringOptions {
    format?: 'url' | 'email'
}

export interface NumberOptions {
    /** Reject values with a fractional part */
    integer?: boolean
    min?: number
    max?: number
}

interface Presence<T> {
    optional?: boolean
    default?: T
}

/**
 * Reads environment variables with format validation.
 *
 * A variable that is unset or empty is missing. Missing variables throw
 * unless the read is `optional` or has a `default`.
 *
 * @example
 * ```typescript
 * const env = new Env(process.env)
 *
 * const port = env.number('REGISTRY_PORT', { integer: true, default: 3000 })
 * const url = env.string('API_URL', { format: 'url', optional: true })
 * const mode = env.enum('AUTH_MODE', ['gateway', 'jwt', 'none'] as const, { default: 'gateway' })
 * ```
 */
export class Env {
    readonly #rawEnv: EnvSource

    constructor(rawEnv: EnvSource = process.env) {
        this.#rawEnv = rawEnv
    }

    /**
     * @throws {ConfigurationError} When the value is missing or fails its format
     */
    string(key: string, opts: StringOptions & { default: string }): string
    string(key: string, opts: StringOptions & { optional: true }): string | undefined
    string(key: string, opts?: StringOptions): string
    string(key: string, opts: StringOptions & Presence<string> = {}): string | undefined {
        return this.#read(key, opts, value => {
            if (opts.format === 'url' && !/^https?:\/\/.+$/.test(value)) {
                throw new ConfigurationError(`Invalid URL format for ${key}`)
            }
            if (opts.format === 'email' && !/^[^\s@]+@[^\s@]+\.[^\s@]+$/.test(value)) {
                throw new ConfigurationError(`Invalid email format for ${key}`)
            }
            return value
        })
    }

    /**
     * @throws {ConfigurationError} When the value is missing, not a number or out of range
     */
    number(key: string, opts: NumberOptions & { default: number }): number
    number(key: string, opts: NumberOptions & { optional: true }): number | undefined
    number(key: string, opts?: NumberOptions): number
    number(key: string, opts: NumberOptions & Presence<number> = {}): number | undefined {
        return this.#read(key, opts, value => {
            const parsed = Number(value)
            if (Number.isNaN(parsed) || value.trim() === '') {
                throw new ConfigurationError(`Invalid number format for ${key}`)
            }
            if (opts.integer && !Number.isInteger(parsed)) {
                throw new ConfigurationError(`Invalid integer format for ${key}`)
            }
            if ((opts.min !== undefined && parsed < opts.min) || (opts.max !== undefined && parsed > opts.max)) {
                throw new ConfigurationError(
                    `Value for ${key} must be between ${opts.min ?? '-Infinity'} and ${opts.max ?? 'Infinity'}`
                )
            }
            return parsed
        })
    }

    /**
     * Accepts 'true'/'false' or '1'/'0' (case-insensitive).
     */
    boolean(key: string, opts: { default: boolean }): boolean
    boolean(key: string, opts: { optional: true }): boolean | undefined
    boolean(key: string): boolean
    boolean(key: string, opts: Presence<boolean> = {}): boolean | undefined {
        return this.#read(key, opts, value => {
            const lowerValue = value.toLowerCase()
            if (lowerValue === 'true' || lowerValue === '1') return true
            if (lowerValue === 'false' || lowerValue === '0') return false
            throw new ConfigurationError(`Invalid boolean format for ${key}, expected true/false or 1/0`)
        })
    }

    enum<V extends string>(key: string, values: readonly V[], opts: { default: V }): V
    enum<V extends string>(key: string, values: readonly V[], opts: { optional: true }): V | undefined
    enum<V extends string>(key: string, values: readonly V[]): V
    enum<V extends string>(key: string, values: readonly V[], opts: Presence<V> = {}): V | undefined {
        return this.#read(key, opts, value => {
            const match = values.find(candidate => candidate === value)
            if (match === undefined) {
                throw new ConfigurationError(`Invalid value for ${key}, expected one of ${values.join(', ')}`)
            }
            return match
        })
    }

    #read<T>(key: string, opts: Presence<T>, parse: (value: string) => T): T | undefined {
        const value = this.#rawEnv[key]

        if (value === undefined || value === '') {
            if (opts.default !== undefined) return opts.default
            if (opts.optional) return undefined
            throw new ConfigurationError(`Missing environment variable: ${key}`)
        }

        return parse(value)
    }
}
