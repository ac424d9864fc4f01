// reflect-metadata MUST be imported first for InversifyJS decorator metadata to work
import 'reflect-metadata'
import { Container } from 'inversify'
import { TOKENS } from './di/tokens.js'
import { setupContainer, type SetupContainerOptions } from './inversify.config.js'
import type { IRoomRepository } from './repos/roomRepository.js'
import { loadBlueprintFile, seedWorld, type SeedWorldResult } from './seeding/seedWorld.js'
import { TelemetryService } from './telemetry/TelemetryService.js'
import { loadWorldConfig } from './worldConfig.js'

export { TOKENS } from './di/tokens.js'
export { setupContainer, type SetupContainerOptions } from './inversify.config.js'
export type { IRoomRepository } from './repos/roomRepository.js'
export { InMemoryRoomRepository } from './repos/roomRepository.memory.js'
export { loadBlueprintFile, seedWorld, type SeedWorldOptions, type SeedWorldResult } from './seeding/seedWorld.js'
export { ActorMovementService, type ActorMoveOutcome } from './services/ActorMovementService.js'
export { RoomDescriptionService } from './services/RoomDescriptionService.js'
export { TrapdoorService } from './services/TrapdoorService.js'
export type { ITelemetryClient } from './telemetry/ITelemetryClient.js'
export { NullTelemetryClient } from './telemetry/NullTelemetryClient.js'
export { TelemetryService } from './telemetry/TelemetryService.js'
export { loadWorldConfig, type IWorldConfig } from './worldConfig.js'

export interface WorldHost {
    container: Container
    seed: SeedWorldResult
}

/**
 * Build a ready-to-play world: container bindings, then rooms seeded from the configured
 * blueprint (ZUUL_SEED_BLUEPRINT) or the bundled starter world.
 * Seeding failures are reported through telemetry and rethrown.
 */
export async function createWorld(opts: SetupContainerOptions = {}): Promise<WorldHost> {
    const config = opts.config ?? loadWorldConfig()
    const container = new Container()
    await setupContainer(container, { ...opts, config })

    const roomRepository = container.get<IRoomRepository>(TOKENS.RoomRepository)
    const telemetry = container.get(TelemetryService)
    let seed: SeedWorldResult
    try {
        const blueprint = config.seedBlueprintPath ? await loadBlueprintFile(config.seedBlueprintPath) : undefined
        seed = await seedWorld({
            roomRepository,
            blueprint,
            warn: (message, properties) => telemetry.trackWarning(message, properties)
        })
    } catch (error) {
        if (error instanceof Error) {
            telemetry.trackException(error, { seedBlueprintPath: config.seedBlueprintPath })
        }
        throw error
    }

    telemetry.trackGameEventStrict('World.Seed.Completed', { ...seed })

    return { container, seed }
}
