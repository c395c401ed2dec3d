import type { AuthProvider, AuthRequest } from '../auth_provider.js'
import { getHeader } from '../auth_provider.js'
import type { Principal } from '../../types/registry.js'
import { isWellFormedPrincipal } from '../../validation/asset_rules.js'

/**
 * Reads the caller from a header set by an upstream gateway (APISIX, KrakenD)
 * after it has authenticated the request.
 */
export class GatewayAuthProvider implements AuthProvider {
    readonly #header: string

    constructor(header = 'x-user-id') {
        this.#header = header.toLowerCase()
    }

    resolveCaller(req: AuthRequest): Principal | null {
        const value = getHeader(req.headers, this.#header)
        return isWellFormedPrincipal(value) ? value : null
    }

    hasValidAuth(req: AuthRequest): boolean {
        return !!getHeader(req.headers, this.#header)
    }
}
