import { NotFoundException } from '@zuul/shared'
import { Container } from 'inversify'
import assert from 'node:assert'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { describe, test } from 'node:test'
import 'reflect-metadata'
import { TOKENS } from '../../src/di/tokens.js'
import { createWorld } from '../../src/index.js'
import { setupContainer } from '../../src/inversify.config.js'
import { InMemoryRoomRepository } from '../../src/repos/roomRepository.memory.js'
import { ActorMovementService } from '../../src/services/ActorMovementService.js'
import { RoomDescriptionService } from '../../src/services/RoomDescriptionService.js'
import { TrapdoorService } from '../../src/services/TrapdoorService.js'
import { NullTelemetryClient } from '../../src/telemetry/NullTelemetryClient.js'
import { TelemetryService } from '../../src/telemetry/TelemetryService.js'
import { getTestContainer, TEST_CONFIG } from '../helpers/testContainer.js'
import { MockTelemetryClient } from '../mocks/MockTelemetryClient.js'

describe('Container registration', () => {
    test('resolves every service as a singleton', async () => {
        const { container } = await getTestContainer()
        for (const service of [TelemetryService, RoomDescriptionService, ActorMovementService, TrapdoorService]) {
            assert.strictEqual(container.get(service), container.get(service))
        }
    })

    test('room repository token and class share one arena', async () => {
        const { container } = await getTestContainer()
        assert.strictEqual(container.get(TOKENS.RoomRepository), container.get(InMemoryRoomRepository))
    })

    test('test mode falls back to the null telemetry client', async () => {
        const container = new Container()
        await setupContainer(container, { config: { ...TEST_CONFIG, appInsightsConnectionString: 'InstrumentationKey=test-key' } })
        assert.ok(container.get(TOKENS.TelemetryClient) instanceof NullTelemetryClient)
    })

    test('exposes the configuration', async () => {
        const { container } = await getTestContainer()
        assert.deepStrictEqual(container.get(TOKENS.WorldConfig), TEST_CONFIG)
    })
})

describe('createWorld', () => {
    test('seeds the starter world and reports it', async () => {
        const telemetry = new MockTelemetryClient()
        const { container, seed } = await createWorld({ config: TEST_CONFIG, telemetryClient: telemetry })

        assert.equal(seed.roomsCreated, 7)
        assert.equal(container.get(InMemoryRoomRepository).size(), 7)
        assert.deepStrictEqual(telemetry.eventNames(), ['World.Seed.Completed'])
        assert.equal(telemetry.events[0].properties?.exitsCreated, 12)
    })

    test('uses the configured blueprint file', async () => {
        const dir = await mkdtemp(join(tmpdir(), 'zuul-world-'))
        try {
            const file = join(dir, 'world.json')
            await writeFile(file, JSON.stringify([{ id: 'only', description: 'in the only room' }]), 'utf-8')
            const { container, seed } = await createWorld({ config: { ...TEST_CONFIG, seedBlueprintPath: file } })

            assert.equal(seed.roomsCreated, 1)
            const text = await container.get(RoomDescriptionService).describe('only')
            assert.equal(text, 'You are in the only room.\nExits:')
        } finally {
            await rm(dir, { recursive: true, force: true })
        }
    })

    test('reports blueprint warnings as traces', async () => {
        const dir = await mkdtemp(join(tmpdir(), 'zuul-world-'))
        try {
            const file = join(dir, 'world.json')
            const blueprint = [{ id: 'well', description: 'by a well', exits: [{ direction: 'wish', to: 'well', reciprocal: true }] }]
            await writeFile(file, JSON.stringify(blueprint), 'utf-8')
            const telemetry = new MockTelemetryClient()
            await createWorld({ config: { ...TEST_CONFIG, seedBlueprintPath: file }, telemetryClient: telemetry })

            assert.deepStrictEqual(telemetry.traces, [
                {
                    message: 'seedWorld: no opposite for direction',
                    severity: 2,
                    properties: { service: 'zuul-test', direction: 'wish', roomId: 'well' }
                }
            ])
        } finally {
            await rm(dir, { recursive: true, force: true })
        }
    })

    test('reports a failed seed as an exception and rethrows', async () => {
        const dir = await mkdtemp(join(tmpdir(), 'zuul-world-'))
        try {
            const file = join(dir, 'world.json')
            await writeFile(file, JSON.stringify([{ id: 'a', description: 'in room a', exits: [{ direction: 'up', to: 'sky' }] }]), 'utf-8')
            const telemetry = new MockTelemetryClient()

            await assert.rejects(
                createWorld({ config: { ...TEST_CONFIG, seedBlueprintPath: file }, telemetryClient: telemetry }),
                NotFoundException
            )
            assert.equal(telemetry.exceptions.length, 1)
            assert.ok(telemetry.exceptions[0].exception instanceof NotFoundException)
            assert.deepStrictEqual(telemetry.exceptions[0].properties, { seedBlueprintPath: file })
            assert.deepStrictEqual(telemetry.eventNames(), [])
        } finally {
            await rm(dir, { recursive: true, force: true })
        }
    })
})
