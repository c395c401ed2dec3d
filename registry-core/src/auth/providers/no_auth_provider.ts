import type { AuthProvider, AuthRequest } from '../auth_provider.js'
import type { Principal } from '../../types/registry.js'

/**
 * Treats every request as coming from one fixed principal.
 * Development and testing only.
 */
export class NoAuthProvider implements AuthProvider {
    readonly #principal: Principal

    constructor(anonymousPrincipal: Principal = 'anonymous') {
        this.#principal = anonymousPrincipal
    }

    resolveCaller(_req: AuthRequest): Principal | null {
        return this.#principal
    }

    hasValidAuth(_req: AuthRequest): boolean {
        return true
    }
}
