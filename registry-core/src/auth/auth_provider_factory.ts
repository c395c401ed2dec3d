import * as fs from 'fs'
import type { AuthProvider, AuthProviderConfig } from './auth_provider.js'
import { GatewayAuthProvider } from './providers/gateway_auth_provider.js'
import { JwtAuthProvider } from './providers/jwt_auth_provider.js'
import { NoAuthProvider } from './providers/no_auth_provider.js'

/**
 * Builds the AuthProvider matching a configuration.
 *
 * @example
 * ```typescript
 * const provider = AuthProviderFactory.create({ mode: 'gateway' })
 * const caller = provider.resolveCaller(req)
 * ```
 */
export class AuthProviderFactory {
    static create(config: AuthProviderConfig): AuthProvider {
        switch (config.mode) {
            case 'gateway':
                return new GatewayAuthProvider(config.gatewayHeader)

            case 'jwt':
                return new JwtAuthProvider(config)

            case 'none':
                return new NoAuthProvider(config.anonymousPrincipal)
        }
    }

    /**
     * Reads a PEM public key from disk for RS/ES/PS algorithms.
     */
    static readPublicKey(path: string): string {
        return fs.readFileSync(path, 'utf-8')
    }
}
