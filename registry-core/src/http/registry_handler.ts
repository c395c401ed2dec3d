/**
 * @fileoverview HTTP endpoints for the asset registry
 *
 * Translates requests into registry operations. The caller comes from the
 * configured AuthProvider and the block height from a SequenceSource; errors
 * are left to propagate so exposeEndpoints can map them to status codes.
 */

import type { AuthProvider } from '../auth/auth_provider.js'
import type { AssetRegistry } from '../registry/asset_registry.js'
import type { SequenceSource } from '../registry/sequence_source.js'
import type { AssetId, CallContext } from '../types/registry.js'
import type { DataResponse, Endpoint, RegistryRequest, Servable } from './types.js'
import { AssetNotFoundError, AuthenticationError } from '../errors/index.js'
import { isAssetId } from '../validation/asset_rules.js'
import { validateData } from '../validation/validate.js'
import { validateAssetContentBody, validateTransferBody } from '../validation/schemas.js'
import { HttpStatus, jsonResponse, successResponse } from './http_responses.js'

export interface RegistryHandlerOptions {
    /** Path prefix of every registry route (default '/registry') */
    basePath?: string
}

const DECIMAL_ID = /^[0-9]+$/

/**
 * Parses the `:id` route parameter. Anything that is not a positive decimal
 * integer cannot name an asset.
 */
export function parseAssetId(raw: string | undefined): AssetId {
    const id = raw !== undefined && DECIMAL_ID.test(raw) ? Number(raw) : NaN
    if (!isAssetId(id)) {
        throw new AssetNotFoundError(`Asset ${raw ?? ''} not found`, { assetId: raw })
    }
    return id
}

/**
 * Exposes the registry operations over HTTP.
 *
 * | Method | Path                                | Operation              |
 * |--------|-------------------------------------|------------------------|
 * | POST   | /assets                             | createDigitalAsset     |
 * | PUT    | /assets/:id                         | updateDigitalAsset     |
 * | POST   | /assets/:id/transfer                | transferAssetOwnership |
 * | DELETE | /assets/:id                         | deleteDigitalAsset     |
 * | GET    | /assets/:id                         | getAssetInformation    |
 * | GET    | /assets/:id/owner                   | getAssetOwner          |
 * | GET    | /assets/:id/access/:principal       | verifyAccessStatus     |
 * | GET    | /statistics                         | getRegistryStatistics  |
 */
export class RegistryHandler implements Servable {
    readonly #registry: AssetRegistry
    readonly #auth: AuthProvider
    readonly #sequence: SequenceSource
    readonly #basePath: string

    constructor(
        registry: AssetRegistry,
        auth: AuthProvider,
        sequence: SequenceSource,
        options: RegistryHandlerOptions = {}
    ) {
        this.#registry = registry
        this.#auth = auth
        this.#sequence = sequence
        this.#basePath = (options.basePath ?? '/registry').replace(/\/+$/, '')
    }

    getEndpoints(): Endpoint[] {
        const base = this.#basePath
        return [
            { method: 'post', path: `${base}/assets`, handler: req => this.handleCreate(req) },
            { method: 'put', path: `${base}/assets/:id`, handler: req => this.handleUpdate(req) },
            { method: 'post', path: `${base}/assets/:id/transfer`, handler: req => this.handleTransfer(req) },
            { method: 'delete', path: `${base}/assets/:id`, handler: req => this.handleDelete(req) },
            { method: 'get', path: `${base}/assets/:id`, handler: req => this.handleGetAsset(req) },
            { method: 'get', path: `${base}/assets/:id/owner`, handler: req => this.handleGetOwner(req) },
            {
                method: 'get',
                path: `${base}/assets/:id/access/:principal`,
                handler: req => this.handleAccessStatus(req)
            },
            { method: 'get', path: `${base}/statistics`, handler: req => this.handleStatistics(req) }
        ]
    }

    async handleCreate(req: RegistryRequest): Promise<DataResponse> {
        const ctx = this.#context(req)
        const content = await validateData(validateAssetContentBody, req.body, 'Invalid asset content')
        const assetId = await this.#registry.createDigitalAsset(ctx, content)
        return jsonResponse(HttpStatus.CREATED, { assetId })
    }

    async handleUpdate(req: RegistryRequest): Promise<DataResponse> {
        const ctx = this.#context(req)
        const assetId = parseAssetId(req.params.id)
        const content = await validateData(validateAssetContentBody, req.body, 'Invalid asset content')
        await this.#registry.updateDigitalAsset(ctx, assetId, content)
        return successResponse({ success: true })
    }

    async handleTransfer(req: RegistryRequest): Promise<DataResponse> {
        const ctx = this.#context(req)
        const assetId = parseAssetId(req.params.id)
        const { newOwner } = await validateData(validateTransferBody, req.body, 'Invalid transfer request')
        await this.#registry.transferAssetOwnership(ctx, assetId, newOwner)
        return successResponse({ success: true })
    }

    async handleDelete(req: RegistryRequest): Promise<DataResponse> {
        const ctx = this.#context(req)
        await this.#registry.deleteDigitalAsset(ctx, parseAssetId(req.params.id))
        return successResponse({ success: true })
    }

    async handleGetAsset(req: RegistryRequest): Promise<DataResponse> {
        const ctx = this.#context(req)
        const record = await this.#registry.getAssetInformation(ctx, parseAssetId(req.params.id))
        return successResponse(record)
    }

    async handleGetOwner(req: RegistryRequest): Promise<DataResponse> {
        const ctx = this.#context(req)
        const owner = await this.#registry.getAssetOwner(ctx, parseAssetId(req.params.id))
        return successResponse({ owner })
    }

    async handleAccessStatus(req: RegistryRequest): Promise<DataResponse> {
        const ctx = this.#context(req)
        const assetId = parseAssetId(req.params.id)
        const status = await this.#registry.verifyAccessStatus(ctx, assetId, req.params.principal ?? '')
        return successResponse(status)
    }

    async handleStatistics(req: RegistryRequest): Promise<DataResponse> {
        const ctx = this.#context(req)
        const statistics = await this.#registry.getRegistryStatistics(ctx)
        return successResponse(statistics)
    }

    #context(req: RegistryRequest): CallContext {
        if (!this.#auth.hasValidAuth(req)) {
            throw new AuthenticationError('Authentication required')
        }
        const caller = this.#auth.resolveCaller(req)
        if (caller === null) {
            throw new AuthenticationError('Invalid authentication credentials')
        }
        return { caller, blockHeight: this.#sequence.current() }
    }
}
