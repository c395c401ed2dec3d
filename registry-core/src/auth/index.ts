export type { AuthProvider, AuthRequest, AuthMode, AuthProviderConfig, JwtConfig } from './auth_provider.js'
export { getHeader } from './auth_provider.js'
export { AuthProviderFactory } from './auth_provider_factory.js'
export { GatewayAuthProvider } from './providers/gateway_auth_provider.js'
export { JwtAuthProvider } from './providers/jwt_auth_provider.js'
export { NoAuthProvider } from './providers/no_auth_provider.js'
