/**
 * @fileoverview Types shared by the HTTP surface
 */

/**
 * Supported HTTP methods for registry endpoints.
 */
export type HttpMethod = 'get' | 'post' | 'put' | 'delete' | 'patch'

/**
 * Framework-independent view of an incoming request.
 *
 * An Express `Request` satisfies this interface, as does a plain object in tests.
 */
export interface RegistryRequest {
    headers: Record<string, string | string[] | undefined>
    params: Record<string, string>
    body?: unknown
}

/**
 * Standard response format returned by endpoint handlers.
 *
 * @example
 * ```typescript
 * const response: DataResponse = {
 *   status: 201,
 *   content: JSON.stringify({ assetId: 1 }),
 *   headers: { 'Content-Type': 'application/json' }
 * }
 * ```
 */
export interface DataResponse {
    /** HTTP status code (200, 400, 401, 404, 500, etc.) */
    status: number
    /** Response body (string for JSON) */
    content: Buffer | string
    headers?: Record<string, string>
}

/**
 * An HTTP endpoint exposed by a component.
 */
export interface Endpoint {
    method: HttpMethod
    /** URL path pattern (e.g., '/registry/assets/:id') */
    path: string
    handler: (req: RegistryRequest) => Promise<DataResponse>
}

/**
 * Components that can expose HTTP endpoints.
 */
export interface Servable {
    getEndpoints(): Endpoint[]
}

/**
 * Request as seen by the route wrapper; adds the method used in log lines.
 */
export interface RouteRequest extends RegistryRequest {
    method: string
}

/**
 * The part of an Express `Response` the route wrapper writes to.
 */
export interface RouteResponse {
    status(code: number): RouteResponse
    set(headers: Record<string, string>): RouteResponse
    send(body: Buffer | string): unknown
    json(body: object): unknown
}

export type RouteHandler = (req: RouteRequest, res: RouteResponse) => Promise<void>

/**
 * Anything endpoints can be registered on. An Express `Router` qualifies.
 */
export type EndpointRouter = Record<HttpMethod, (path: string, handler: RouteHandler) => unknown>
