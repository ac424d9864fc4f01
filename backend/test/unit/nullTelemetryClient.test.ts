/**
 * Tests for NullTelemetryClient used in local play and test mode
 */

import { Container } from 'inversify'
import assert from 'node:assert'
import { describe, test } from 'node:test'
import 'reflect-metadata'
import { TOKENS } from '../../src/di/tokens.js'
import { setupContainer } from '../../src/inversify.config.js'
import type { ITelemetryClient } from '../../src/telemetry/ITelemetryClient.js'
import { NullTelemetryClient } from '../../src/telemetry/NullTelemetryClient.js'

describe('NullTelemetryClient', () => {
    test('should be a no-op for all telemetry operations', () => {
        const client = new NullTelemetryClient()

        assert.doesNotThrow(() => {
            client.trackEvent({ name: 'World.Room.Described' })
            client.trackException({ exception: new Error('test') })
            client.trackTrace({ message: 'test' })
            client.flush()
        })
    })

    test('is bound when no connection string is configured', async () => {
        const container = new Container()
        await setupContainer(container, { config: { serviceName: 'zuul-local', isTestMode: false } })

        const client = container.get<ITelemetryClient>(TOKENS.TelemetryClient)
        assert.ok(client instanceof NullTelemetryClient)
        assert.strictEqual(container.get(TOKENS.TelemetryClient), client)
    })
})
