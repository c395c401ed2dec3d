import type { Server } from 'node:http'
import type { ErrorRequestHandler } from 'express'
import express from 'express'
import cors from 'cors'

import type { AuthProvider } from '../auth/auth_provider.js'
import type { AssetRegistry } from '../registry/asset_registry.js'
import { ClockSequence, type SequenceSource } from '../registry/sequence_source.js'
import { RegistryHandler } from '../http/registry_handler.js'
import { exposeEndpoints } from '../http/endpoints.js'
import { HttpStatus } from '../http/http_responses.js'
import { Logger } from '../utils/logger.js'

export interface RegistryEngineOptions {
    registry: AssetRegistry
    auth: AuthProvider
    /** Source of the block height stamped on new assets (default: one block per second) */
    sequence?: SequenceSource
    /** Path prefix of the registry routes (default: '/registry') */
    basePath?: string
    server?: {
        port: number
        host?: string
    }
    /** Allowed CORS origin (default: reflect the request origin) */
    corsOrigin?: string | boolean
    logger?: Logger
}

const rejectMalformedJson: ErrorRequestHandler = (err: unknown, _req, res, next) => {
    if (err instanceof SyntaxError) {
        res.status(HttpStatus.BAD_REQUEST).json({
            error: {
                code: 'MALFORMED_JSON',
                message: 'Request body is not valid JSON',
                timestamp: new Date().toISOString()
            }
        })
        return
    }
    next(err)
}

/**
 * Serves an AssetRegistry over HTTP.
 *
 * Routes:
 * - `GET /health`
 * - the registry routes of {@link RegistryHandler} under `basePath`
 *
 * @example
 * ```typescript
 * const registry = await AssetRegistry.initialize(store, { administrator: 'ST1ADMIN' })
 * const engine = new RegistryEngine({
 *     registry,
 *     auth: AuthProviderFactory.create({ mode: 'gateway' }),
 *     server: { port: 3000 }
 * })
 *
 * await engine.start()
 * ```
 */
export class RegistryEngine {
    readonly #options: RegistryEngineOptions
    readonly #logger: Logger
    #server?: Server
    #isShuttingDown = false

    constructor(options: RegistryEngineOptions) {
        this.#options = options
        this.#logger = options.logger ?? new Logger('RegistryEngine')
    }

    /**
     * Builds the Express application with CORS, JSON body parsing and all routes.
     */
    createApp(): express.Express {
        const { registry, auth, sequence = new ClockSequence(), basePath, corsOrigin = true } = this.#options

        const app = express()
        const router = express.Router()

        app.use(
            cors({
                origin: corsOrigin,
                methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
                allowedHeaders: ['Content-Type', 'Authorization', 'x-user-id', 'x-request-id']
            })
        )
        app.use(express.json())
        app.use(rejectMalformedJson)

        router.get('/health', (_req, res) => {
            res.json({ status: 'ok' })
        })

        exposeEndpoints(
            router,
            [new RegistryHandler(registry, auth, sequence, { basePath })],
            this.#logger.child('Endpoints')
        )

        app.use(router)
        return app
    }

    /**
     * Starts listening. Resolves once the server accepts connections.
     */
    async start(): Promise<void> {
        const { port, host = '0.0.0.0' } = this.#options.server ?? { port: 3000 }
        const app = this.createApp()

        await new Promise<void>((resolve, reject) => {
            const server = app.listen(port, host, () => resolve())
            server.once('error', reject)
            this.#server = server
        })

        this.#logger.info(`Listening on ${host}:${this.getPort() ?? port}`)
    }

    /**
     * @returns The bound port, or undefined if the server is not started
     */
    getPort(): number | undefined {
        const address = this.#server?.address()
        return address && typeof address === 'object' ? address.port : undefined
    }

    /**
     * Closes the HTTP server, then the registry store.
     *
     * @throws Error listing every step that failed
     */
    async stop(): Promise<void> {
        if (this.#isShuttingDown) {
            this.#logger.warn('Shutdown already in progress')
            return
        }
        this.#isShuttingDown = true
        const startTime = Date.now()
        const errors: Error[] = []

        const server = this.#server
        if (server) {
            try {
                await new Promise<void>((resolve, reject) => {
                    server.close(error => (error ? reject(error) : resolve()))
                })
            } catch (error) {
                errors.push(this.#wrapError('Server close', error))
            }
            this.#server = undefined
        }

        try {
            await this.#options.registry.close()
        } catch (error) {
            errors.push(this.#wrapError('Store', error))
        }

        const duration = Date.now() - startTime
        if (errors.length > 0) {
            const summary = errors.map(e => e.message).join(', ')
            this.#logger.error(`Shutdown completed with ${errors.length} errors in ${duration}ms`, summary)
            throw new Error(`Shutdown failed: ${summary}`)
        }
        this.#logger.info(`Shutdown completed in ${duration}ms`)
    }

    #wrapError(context: string, error: unknown): Error {
        const message = error instanceof Error ? error.message : String(error)
        return new Error(`${context}: ${message}`)
    }
}
