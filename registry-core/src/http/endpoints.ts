/**
 * @fileoverview HTTP endpoint exposure utilities
 *
 * Registers the endpoints of servable components on an Express router and
 * maps thrown errors to JSON error responses.
 */

import { randomUUID } from 'node:crypto'
import type { EndpointRouter, RouteRequest, RouteResponse, Servable } from './types.js'
import { isRegistryError } from '../errors/index.js'
import { HttpStatus } from './http_responses.js'
import { Logger } from '../utils/logger.js'

function requestIdOf(req: RouteRequest): string {
    const header = req.headers['x-request-id']
    return typeof header === 'string' && header.length > 0 ? header : randomUUID()
}

/**
 * Registers every endpoint of the given components on a router.
 *
 * Registry errors are answered with their own status code and
 * `{ error: { code, message, timestamp, context? }, requestId }`. Anything
 * else becomes a 500 `INTERNAL_ERROR`. Failures are logged through `logger`.
 *
 * @throws {Error} When an unsupported HTTP method is encountered
 *
 * @example
 * ```typescript
 * const router = express.Router()
 * exposeEndpoints(router, [new RegistryHandler(registry, auth, sequence)], logger.child('Endpoints'))
 * app.use(router)
 * ```
 */
export function exposeEndpoints(
    router: EndpointRouter,
    servables: Servable[],
    logger: Logger = new Logger('Endpoints')
): void {
    for (const servable of servables) {
        for (const ep of servable.getEndpoints()) {
            if (typeof router[ep.method] !== 'function') {
                throw new Error(`Unsupported HTTP method: ${ep.method}`)
            }

            router[ep.method](ep.path, async (req: RouteRequest, res: RouteResponse) => {
                try {
                    const result = await ep.handler(req)
                    res.status(result.status)
                        .set(result.headers ?? {})
                        .send(result.content)
                } catch (error) {
                    const requestId = requestIdOf(req)

                    if (isRegistryError(error)) {
                        logger.warn(`[${requestId}] ${req.method} ${ep.path} - ${error.message}`, {
                            requestId,
                            code: error.code
                        })
                        res.status(error.statusCode).json({ ...error.toJSON(), requestId })
                        return
                    }

                    logger.error(
                        `[${requestId}] ${req.method} ${ep.path} - ${error instanceof Error ? error.message : String(error)}`,
                        { requestId, stack: error instanceof Error ? error.stack : undefined }
                    )

                    const isProduction = process.env.NODE_ENV === 'production'
                    res.status(HttpStatus.INTERNAL_SERVER_ERROR).json({
                        error: {
                            code: 'INTERNAL_ERROR',
                            message: isProduction
                                ? 'Internal server error'
                                : error instanceof Error
                                  ? error.message
                                  : String(error),
                            requestId,
                            timestamp: new Date().toISOString()
                        }
                    })
                }
            })
        }
    }
}
