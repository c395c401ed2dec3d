import { test } from '@japa/runner'
import fs from 'fs/promises'
import path from 'path'
import os from 'os'
import { AssetRegistry } from '../../src/registry/asset_registry.js'
import { MemoryRegistryStore } from '../../src/store/adapters/memory_registry_store.js'
import { KnexRegistryStore } from '../../src/store/adapters/knex_registry_store.js'
import {
    AssetNotFoundError,
    CapacityExceededError,
    ConfigurationError,
    ContentRestrictedError,
    FormatValidationError,
    InvalidParametersError,
    PermissionDeniedError
} from '../../src/errors/index.js'
import {
    ADMIN,
    ALICE,
    BOB,
    CAROL,
    FailingRegistryStore,
    captureError,
    ctx,
    expectError,
    sampleContent
} from '../mocks/index.js'

async function createRegistry(): Promise<AssetRegistry> {
    return AssetRegistry.initialize(new MemoryRegistryStore(), { administrator: ADMIN })
}

test.group('AssetRegistry - initialization', () => {
    test('records the administrator', async ({ assert }) => {
        const registry = await createRegistry()

        const stats = await registry.getRegistryStatistics(ctx(CAROL))

        assert.deepEqual(stats, { totalAssetsRegistered: 0, systemAdministrator: ADMIN })
    })

    test('keeps the first administrator when initialized again', async ({ assert }) => {
        const store = new MemoryRegistryStore()
        await AssetRegistry.initialize(store, { administrator: ADMIN })

        const again = await AssetRegistry.initialize(store, { administrator: BOB })
        const stats = await again.getRegistryStatistics(ctx(BOB))

        assert.equal(stats.systemAdministrator, ADMIN)
    })

    test('rejects a malformed administrator', async ({ assert }) => {
        const error = await captureError(
            AssetRegistry.initialize(new MemoryRegistryStore(), { administrator: 'not a principal' })
        )

        assert.instanceOf(error, ConfigurationError)
    })
})

test.group('AssetRegistry - scenarios', () => {
    test('creating an asset returns id 1 and counts it', async ({ assert }) => {
        const registry = await createRegistry()

        const assetId = await registry.createDigitalAsset(ctx(ALICE), sampleContent())
        const stats = await registry.getRegistryStatistics(ctx(ALICE))

        assert.equal(assetId, 1)
        assert.equal(stats.totalAssetsRegistered, 1)
    })

    test('only the owner can read an asset nobody was granted', async ({ assert }) => {
        const registry = await createRegistry()
        await registry.createDigitalAsset(ctx(ALICE), sampleContent())

        const error = await captureError(registry.getAssetInformation(ctx(BOB), 1))
        const record = await registry.getAssetInformation(ctx(ALICE), 1)

        assert.instanceOf(error, ContentRestrictedError)
        assert.deepEqual(record, {
            assetId: 1,
            name: 'doc',
            owner: ALICE,
            sizeBytes: 100,
            createdAt: 100,
            description: 'x',
            tags: ['a']
        })
    })

    test('after a transfer only the new owner may update', async ({ assert }) => {
        const registry = await createRegistry()
        await registry.createDigitalAsset(ctx(ALICE), sampleContent())

        assert.isTrue(await registry.transferAssetOwnership(ctx(ALICE), 1, BOB))

        const error = await captureError(registry.updateDigitalAsset(ctx(ALICE), 1, sampleContent({ name: 'mine' })))
        assert.instanceOf(error, PermissionDeniedError)

        assert.isTrue(await registry.updateDigitalAsset(ctx(BOB), 1, sampleContent({ name: 'ours' })))
        assert.equal((await registry.getAssetInformation(ctx(BOB), 1)).name, 'ours')
    })

    test('a deleted asset is not found afterwards', async ({ assert }) => {
        const registry = await createRegistry()
        await registry.createDigitalAsset(ctx(ALICE), sampleContent())

        assert.isTrue(await registry.deleteDigitalAsset(ctx(ALICE), 1))

        const error = await captureError(registry.getAssetInformation(ctx(ALICE), 1))
        assert.instanceOf(error, AssetNotFoundError)
    })
})

test.group('AssetRegistry - identifiers', () => {
    test('ids increase by one and are never reused after deletion', async ({ assert }) => {
        const registry = await createRegistry()

        const first = await registry.createDigitalAsset(ctx(ALICE), sampleContent())
        const second = await registry.createDigitalAsset(ctx(BOB), sampleContent())
        await registry.deleteDigitalAsset(ctx(BOB), second)
        const third = await registry.createDigitalAsset(ctx(ALICE), sampleContent())

        assert.deepEqual([first, second, third], [1, 2, 3])
    })

    test('total counts creations, not live assets', async ({ assert }) => {
        const registry = await createRegistry()
        await registry.createDigitalAsset(ctx(ALICE), sampleContent())
        await registry.createDigitalAsset(ctx(ALICE), sampleContent())
        await registry.deleteDigitalAsset(ctx(ALICE), 1)

        const stats = await registry.getRegistryStatistics(ctx(ALICE))

        assert.equal(stats.totalAssetsRegistered, 2)
    })

    test('concurrent creations receive distinct consecutive ids', async ({ assert }) => {
        const registry = await createRegistry()

        const ids = await Promise.all(
            [ALICE, BOB, CAROL, ALICE, BOB].map(caller => registry.createDigitalAsset(ctx(caller), sampleContent()))
        )

        assert.deepEqual([...ids].sort((a, b) => a - b), [1, 2, 3, 4, 5])
    })

    test('failed creations do not consume an id', async ({ assert }) => {
        const registry = await createRegistry()

        await captureError(registry.createDigitalAsset(ctx(ALICE), sampleContent({ name: '' })))
        const assetId = await registry.createDigitalAsset(ctx(ALICE), sampleContent())

        assert.equal(assetId, 1)
    })

    test('createdAt is the block height of the creating call', async ({ assert }) => {
        const registry = await createRegistry()
        await registry.createDigitalAsset(ctx(ALICE, 4321), sampleContent())

        await registry.updateDigitalAsset(ctx(ALICE, 5000), 1, sampleContent({ description: 'later' }))
        const record = await registry.getAssetInformation(ctx(ALICE, 6000), 1)

        assert.equal(record.createdAt, 4321)
        assert.equal(record.owner, ALICE)
        assert.equal(record.description, 'later')
    })
})

test.group('AssetRegistry - authorization', () => {
    test('non-owners get PermissionDenied on every mutation', async ({ assert }) => {
        const registry = await createRegistry()
        await registry.createDigitalAsset(ctx(ALICE), sampleContent())

        const errors = await Promise.all([
            captureError(registry.updateDigitalAsset(ctx(BOB), 1, sampleContent())),
            captureError(registry.transferAssetOwnership(ctx(BOB), 1, BOB)),
            captureError(registry.deleteDigitalAsset(ctx(BOB), 1))
        ])

        for (const error of errors) {
            assert.instanceOf(error, PermissionDeniedError)
        }
        assert.equal((await registry.getAssetOwner(ctx(BOB), 1)), ALICE)
    })

    test('existence is checked before ownership', async ({ assert }) => {
        const registry = await createRegistry()

        const error = await captureError(registry.updateDigitalAsset(ctx(BOB), 9, sampleContent()))

        assert.instanceOf(error, AssetNotFoundError)
    })

    test('ownership is checked before field validation', async ({ assert }) => {
        const registry = await createRegistry()
        await registry.createDigitalAsset(ctx(ALICE), sampleContent())

        const error = await captureError(registry.updateDigitalAsset(ctx(BOB), 1, sampleContent({ name: '' })))

        assert.instanceOf(error, PermissionDeniedError)
    })

    test('update reports field errors to the owner', async ({ assert }) => {
        const registry = await createRegistry()
        await registry.createDigitalAsset(ctx(ALICE), sampleContent())

        const nameError = await captureError(registry.updateDigitalAsset(ctx(ALICE), 1, sampleContent({ name: 'n'.repeat(65) })))
        const sizeError = await captureError(registry.updateDigitalAsset(ctx(ALICE), 1, sampleContent({ sizeBytes: 0 })))
        const tagError = await captureError(registry.updateDigitalAsset(ctx(ALICE), 1, sampleContent({ tags: [] })))

        assert.instanceOf(nameError, InvalidParametersError)
        assert.instanceOf(sizeError, CapacityExceededError)
        assert.instanceOf(tagError, FormatValidationError)
        assert.deepEqual(await registry.getAssetInformation(ctx(ALICE), 1), {
            assetId: 1,
            name: 'doc',
            owner: ALICE,
            sizeBytes: 100,
            createdAt: 100,
            description: 'x',
            tags: ['a']
        })
    })

    test('transfer rejects a malformed new owner', async ({ assert }) => {
        const registry = await createRegistry()
        await registry.createDigitalAsset(ctx(ALICE), sampleContent())

        const error = expectError(
            await captureError(registry.transferAssetOwnership(ctx(ALICE), 1, '')),
            InvalidParametersError
        )

        assert.equal(error.message, 'newOwner is not a well-formed principal')
        assert.equal(await registry.getAssetOwner(ctx(ALICE), 1), ALICE)
    })

    test('transfer to self keeps the owner', async ({ assert }) => {
        const registry = await createRegistry()
        await registry.createDigitalAsset(ctx(ALICE), sampleContent())

        await registry.transferAssetOwnership(ctx(ALICE), 1, ALICE)

        assert.equal(await registry.getAssetOwner(ctx(BOB), 1), ALICE)
    })

    test('malformed ids are reported as not found', async ({ assert }) => {
        const registry = await createRegistry()
        await registry.createDigitalAsset(ctx(ALICE), sampleContent())

        for (const assetId of [0, -1, 1.5, Number.NaN]) {
            assert.instanceOf(await captureError(registry.getAssetOwner(ctx(ALICE), assetId)), AssetNotFoundError)
        }
    })
})

test.group('AssetRegistry - access status', () => {
    test('the creator is owner and holds a grant', async ({ assert }) => {
        const registry = await createRegistry()
        await registry.createDigitalAsset(ctx(ALICE), sampleContent())

        const status = await registry.verifyAccessStatus(ctx(CAROL), 1, ALICE)

        assert.deepEqual(status, { hasGrantedAccess: true, isAssetOwner: true, canReadAsset: true })
    })

    test('principals without a grant are denied by default', async ({ assert }) => {
        const registry = await createRegistry()
        await registry.createDigitalAsset(ctx(ALICE), sampleContent())

        const status = await registry.verifyAccessStatus(ctx(ALICE), 1, BOB)

        assert.deepEqual(status, { hasGrantedAccess: false, isAssetOwner: false, canReadAsset: false })
    })

    test('ownership and grants stay separate after a transfer', async ({ assert }) => {
        const registry = await createRegistry()
        await registry.createDigitalAsset(ctx(ALICE), sampleContent())
        await registry.transferAssetOwnership(ctx(ALICE), 1, BOB)

        const newOwner = await registry.verifyAccessStatus(ctx(ALICE), 1, BOB)
        const previousOwner = await registry.verifyAccessStatus(ctx(ALICE), 1, ALICE)

        assert.deepEqual(newOwner, { hasGrantedAccess: false, isAssetOwner: true, canReadAsset: true })
        assert.deepEqual(previousOwner, { hasGrantedAccess: true, isAssetOwner: false, canReadAsset: true })

        // The new owner reads through ownership, the creator through its grant
        assert.equal((await registry.getAssetInformation(ctx(BOB), 1)).owner, BOB)
        assert.equal((await registry.getAssetInformation(ctx(ALICE), 1)).owner, BOB)
    })

    test('status of a missing asset is AssetNotFound', async ({ assert }) => {
        const registry = await createRegistry()

        assert.instanceOf(await captureError(registry.verifyAccessStatus(ctx(ALICE), 1, ALICE)), AssetNotFoundError)
    })

    test('reads are repeatable and leave state untouched', async ({ assert }) => {
        const registry = await createRegistry()
        await registry.createDigitalAsset(ctx(ALICE), sampleContent())
        const before = await registry.getRegistryStatistics(ctx(ALICE))

        const firstRead = await registry.getAssetInformation(ctx(ALICE), 1)
        firstRead.tags.push('local-change')
        const secondRead = await registry.getAssetInformation(ctx(ALICE), 1)
        const firstStatus = await registry.verifyAccessStatus(ctx(ALICE), 1, BOB)
        const secondStatus = await registry.verifyAccessStatus(ctx(ALICE), 1, BOB)

        assert.deepEqual(secondRead.tags, ['a'])
        assert.deepEqual(firstStatus, secondStatus)
        assert.deepEqual(await registry.getRegistryStatistics(ctx(ALICE)), before)
    })
})

test.group('AssetRegistry - atomicity', () => {
    test('a failure after the insert rolls back record, grant and counter', async ({ assert }) => {
        const store = new FailingRegistryStore()
        const registry = await AssetRegistry.initialize(store, { administrator: ADMIN })
        store.failOn.add('setReadAccess')

        const error = expectError(await captureError(registry.createDigitalAsset(ctx(ALICE), sampleContent())), Error)
        assert.equal(error.message, 'Injected failure in setReadAccess')

        store.failOn.clear()
        assert.equal((await registry.getRegistryStatistics(ctx(ALICE))).totalAssetsRegistered, 0)
        assert.instanceOf(await captureError(registry.getAssetOwner(ctx(ALICE), 1)), AssetNotFoundError)
        assert.equal(await registry.createDigitalAsset(ctx(ALICE), sampleContent()), 1)
    })

    test('a failed transfer leaves the owner unchanged', async ({ assert }) => {
        const store = new FailingRegistryStore()
        const registry = await AssetRegistry.initialize(store, { administrator: ADMIN })
        await registry.createDigitalAsset(ctx(ALICE), sampleContent())
        store.failOn.add('replaceAsset')

        await captureError(registry.transferAssetOwnership(ctx(ALICE), 1, BOB))
        store.failOn.clear()

        assert.equal(await registry.getAssetOwner(ctx(ALICE), 1), ALICE)
    })

})

test.group('AssetRegistry - over SQLite', group => {
    let registry: AssetRegistry
    let tempDir: string

    group.each.setup(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'registry-flow-'))
        const store = KnexRegistryStore.forSQLite({ filename: path.join(tempDir, 'registry.db') })
        registry = await AssetRegistry.initialize(store, { administrator: ADMIN })
    })

    group.each.teardown(async () => {
        await registry.close()
        await fs.rm(tempDir, { recursive: true, force: true })
    })

    test('create, read, transfer and delete', async ({ assert }) => {
        const assetId = await registry.createDigitalAsset(ctx(ALICE, 12), sampleContent({ tags: ['mesh', 'terrain'] }))
        assert.equal(assetId, 1)

        assert.deepEqual(await registry.getAssetInformation(ctx(ALICE), 1), {
            assetId: 1,
            name: 'doc',
            owner: ALICE,
            sizeBytes: 100,
            createdAt: 12,
            description: 'x',
            tags: ['mesh', 'terrain']
        })
        assert.instanceOf(await captureError(registry.getAssetInformation(ctx(BOB), 1)), ContentRestrictedError)

        await registry.transferAssetOwnership(ctx(ALICE), 1, BOB)
        assert.instanceOf(
            await captureError(registry.updateDigitalAsset(ctx(ALICE), 1, sampleContent())),
            PermissionDeniedError
        )
        assert.deepEqual(await registry.verifyAccessStatus(ctx(CAROL), 1, ALICE), {
            hasGrantedAccess: true,
            isAssetOwner: false,
            canReadAsset: true
        })

        await registry.deleteDigitalAsset(ctx(BOB), 1)
        assert.instanceOf(await captureError(registry.getAssetOwner(ctx(BOB), 1)), AssetNotFoundError)
        assert.deepEqual(await registry.getRegistryStatistics(ctx(BOB)), {
            totalAssetsRegistered: 1,
            systemAdministrator: ADMIN
        })
    })

    test('unknown ids beyond the 32-bit range are not found', async ({ assert }) => {
        const error = await captureError(registry.getAssetOwner(ctx(ALICE), 3_000_000_000))

        assert.instanceOf(error, AssetNotFoundError)
    })

    test('a rejected creation leaves the counter untouched', async ({ assert }) => {
        await captureError(registry.createDigitalAsset(ctx(ALICE), sampleContent({ sizeBytes: 1_000_000_000 })))

        assert.equal((await registry.getRegistryStatistics(ctx(ALICE))).totalAssetsRegistered, 0)
        assert.equal(await registry.createDigitalAsset(ctx(ALICE), sampleContent()), 1)
    })
})
