/**
 * @fileoverview Caller resolution for the HTTP surface
 *
 * The registry trusts the caller identity it is given. Over HTTP that
 * identity comes from an AuthProvider reading the request headers.
 */

import type { Principal } from '../types/registry.js'

/**
 * Authentication mode.
 *
 * - `gateway`: identity forwarded by an API gateway in the x-user-id header
 * - `jwt`: Bearer token verified locally
 * - `none`: fixed anonymous principal (development/testing only)
 */
export type AuthMode = 'gateway' | 'jwt' | 'none'

/**
 * JWT-specific configuration options.
 */
export interface JwtConfig {
    /** Secret key for HMAC algorithms (HS256, HS384, HS512) */
    secret?: string
    /** Public key for RSA/EC algorithms (RS256, ES256, ...) */
    publicKey?: string
    /** JWT algorithm (default: 'HS256') */
    algorithm?: string
    issuer?: string
    audience?: string
    /** Claim holding the principal (default: 'sub', nested paths allowed) */
    principalClaim?: string
}

export interface AuthProviderConfig {
    mode: AuthMode
    /** Header read in gateway mode (default: 'x-user-id') */
    gatewayHeader?: string
    /** Required when mode is 'jwt' */
    jwt?: JwtConfig
    /** Principal used in 'none' mode (default: 'anonymous') */
    anonymousPrincipal?: Principal
}

/**
 * Request-like object for authentication parsing.
 */
export interface AuthRequest {
    headers: Record<string, string | string[] | undefined>
}

export interface AuthProvider {
    /**
     * @returns The caller, or null if the request carries no usable identity
     */
    resolveCaller(req: AuthRequest): Principal | null

    /** Quick check that credentials are present, without verifying them. */
    hasValidAuth(req: AuthRequest): boolean
}

export function getHeader(headers: AuthRequest['headers'], name: string): string | null {
    const value = headers[name]
    if (!value) return null
    return Array.isArray(value) ? (value[0] ?? null) : value
}
