import jwt from 'jsonwebtoken'
import type { AuthProvider, AuthProviderConfig, AuthRequest } from '../auth_provider.js'
import { getHeader } from '../auth_provider.js'
import type { Principal } from '../../types/registry.js'
import { isWellFormedPrincipal } from '../../validation/asset_rules.js'

const SUPPORTED_ALGORITHMS: readonly jwt.Algorithm[] = [
    'HS256',
    'HS384',
    'HS512',
    'RS256',
    'RS384',
    'RS512',
    'ES256',
    'ES384',
    'ES512',
    'PS256',
    'PS384',
    'PS512'
]

function isAlgorithm(value: string): value is jwt.Algorithm {
    return SUPPORTED_ALGORITHMS.some(algorithm => algorithm === value)
}

/**
 * Verifies a Bearer token from the Authorization header and takes the
 * caller from a claim (default `sub`).
 *
 * @example
 * ```typescript
 * const provider = new JwtAuthProvider({
 *     mode: 'jwt',
 *     jwt: { secret: process.env.JWT_SECRET, principalClaim: 'stx_address' }
 * })
 * ```
 */
export class JwtAuthProvider implements AuthProvider {
    readonly #secret: string
    readonly #algorithm: jwt.Algorithm
    readonly #issuer?: string
    readonly #audience?: string
    readonly #principalClaim: string

    constructor(config: AuthProviderConfig) {
        if (!config.jwt) {
            throw new Error('JWT configuration required for JWT auth mode')
        }

        const { jwt: jwtConfig } = config

        // Secret or public key
        if (jwtConfig.publicKey) {
            this.#secret = jwtConfig.publicKey
        } else if (jwtConfig.secret) {
            this.#secret = jwtConfig.secret
        } else {
            throw new Error('JWT secret or publicKey required')
        }

        const algorithm = jwtConfig.algorithm || 'HS256'
        if (!isAlgorithm(algorithm)) {
            throw new Error(`Unsupported JWT algorithm: ${algorithm}`)
        }

        this.#algorithm = algorithm
        this.#issuer = jwtConfig.issuer
        this.#audience = jwtConfig.audience
        this.#principalClaim = jwtConfig.principalClaim || 'sub'
    }

    resolveCaller(req: AuthRequest): Principal | null {
        const token = this.#extractToken(req)
        if (!token) return null

        let decoded: string | jwt.JwtPayload
        try {
            decoded = jwt.verify(token, this.#secret, {
                algorithms: [this.#algorithm],
                issuer: this.#issuer,
                audience: this.#audience
            })
        } catch {
            // Token invalid or expired
            return null
        }

        if (typeof decoded === 'string') return null

        const principal = this.#extractClaim(decoded, this.#principalClaim)
        return isWellFormedPrincipal(principal) ? principal : null
    }

    hasValidAuth(req: AuthRequest): boolean {
        return !!this.#extractToken(req)
    }

    #extractToken(req: AuthRequest): string | null {
        const authHeader = getHeader(req.headers, 'authorization')
        if (!authHeader) return null

        // Format: "Bearer <token>"
        const [scheme, token, ...rest] = authHeader.split(' ')
        if (rest.length > 0 || !token || scheme?.toLowerCase() !== 'bearer') {
            return null
        }

        return token
    }

    #extractClaim(payload: jwt.JwtPayload, path: string): unknown {
        let current: unknown = payload

        for (const part of path.split('.')) {
            if (typeof current !== 'object' || current === null) return undefined
            current = Reflect.get(current, part)
        }

        return current
    }
}
