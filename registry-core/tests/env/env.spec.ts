import { test } from '@japa/runner'
import { Env } from '../../src/env/env.js'
import { ConfigurationError } from '../../src/errors/index.js'
import { captureErrorSync, expectError } from '../mocks/index.js'

function messageOf(fn: () => unknown): string {
    return expectError(captureErrorSync(fn), ConfigurationError).message
}

test.group('Env - presence', () => {
    test('missing or empty required values throw', ({ assert }) => {
        const env = new Env({ EMPTY: '' })

        assert.equal(messageOf(() => env.string('ABSENT')), 'Missing environment variable: ABSENT')
        assert.equal(messageOf(() => env.string('EMPTY')), 'Missing environment variable: EMPTY')
    })

    test('optional values come back undefined and defaults fill in', ({ assert }) => {
        const env = new Env({ EMPTY: '' })

        assert.isUndefined(env.string('ABSENT', { optional: true }))
        assert.equal(env.string('EMPTY', { default: 'fallback' }), 'fallback')
        assert.equal(env.number('ABSENT', { default: 3000 }), 3000)
        assert.isFalse(env.boolean('ABSENT', { default: false }))
    })

    test('reads from process.env by default', ({ assert, cleanup }) => {
        process.env.REGISTRY_ENV_PROBE = 'probe'
        cleanup(() => {
            delete process.env.REGISTRY_ENV_PROBE
        })

        assert.equal(new Env().string('REGISTRY_ENV_PROBE'), 'probe')
    })
})

test.group('Env - string', () => {
    test('checks url and email formats', ({ assert }) => {
        const env = new Env({
            GOOD_URL: 'https://registry.example.com',
            BAD_URL: 'ftp://registry.example.com',
            GOOD_MAIL: 'ops@example.com',
            BAD_MAIL: 'ops@'
        })

        assert.equal(env.string('GOOD_URL', { format: 'url' }), 'https://registry.example.com')
        assert.equal(env.string('GOOD_MAIL', { format: 'email' }), 'ops@example.com')
        assert.equal(messageOf(() => env.string('BAD_URL', { format: 'url' })), 'Invalid URL format for BAD_URL')
        assert.equal(messageOf(() => env.string('BAD_MAIL', { format: 'email' })), 'Invalid email format for BAD_MAIL')
    })
})

test.group('Env - number', () => {
    test('parses numbers and rejects text', ({ assert }) => {
        const env = new Env({ PORT: '8080', RATIO: '0.5', WORD: 'eight', BLANK: '  ' })

        assert.strictEqual(env.number('PORT'), 8080)
        assert.strictEqual(env.number('RATIO'), 0.5)
        assert.equal(messageOf(() => env.number('WORD')), 'Invalid number format for WORD')
        assert.equal(messageOf(() => env.number('BLANK')), 'Invalid number format for BLANK')
    })

    test('enforces integers and bounds', ({ assert }) => {
        const env = new Env({ RATIO: '0.5', PORT: '70000', NEG: '-1' })

        assert.equal(messageOf(() => env.number('RATIO', { integer: true })), 'Invalid integer format for RATIO')
        assert.equal(
            messageOf(() => env.number('PORT', { min: 0, max: 65535 })),
            'Value for PORT must be between 0 and 65535'
        )
        assert.equal(messageOf(() => env.number('NEG', { min: 0 })), 'Value for NEG must be between 0 and Infinity')
    })
})

test.group('Env - boolean and enum', () => {
    test('accepts true/false and 1/0 in any case', ({ assert }) => {
        const env = new Env({ A: 'TRUE', B: '0', C: '1', D: 'False', E: 'yes' })

        assert.isTrue(env.boolean('A'))
        assert.isFalse(env.boolean('B'))
        assert.isTrue(env.boolean('C'))
        assert.isFalse(env.boolean('D'))
        assert.equal(messageOf(() => env.boolean('E')), 'Invalid boolean format for E, expected true/false or 1/0')
    })

    test('restricts values to the listed ones', ({ assert }) => {
        const env = new Env({ MODE: 'jwt', BAD: 'oauth' })
        const modes = ['gateway', 'jwt', 'none'] as const

        assert.equal(env.enum('MODE', modes), 'jwt')
        assert.equal(env.enum('ABSENT', modes, { default: 'gateway' }), 'gateway')
        assert.equal(messageOf(() => env.enum('BAD', modes)), 'Invalid value for BAD, expected one of gateway, jwt, none')
    })
})
