/**
 * Inversify Container Configuration
 *
 * Binds configuration, telemetry, the in-memory room arena and the world services.
 * Tests pass their own telemetry client (see test/helpers/testContainer.ts).
 */
import { Container } from 'inversify'
import 'reflect-metadata'
import { TOKENS } from './di/tokens.js'
import type { IRoomRepository } from './repos/roomRepository.js'
import { InMemoryRoomRepository } from './repos/roomRepository.memory.js'
import { ActorMovementService } from './services/ActorMovementService.js'
import { RoomDescriptionService } from './services/RoomDescriptionService.js'
import { TrapdoorService } from './services/TrapdoorService.js'
import type { ITelemetryClient } from './telemetry/ITelemetryClient.js'
import { NullTelemetryClient } from './telemetry/NullTelemetryClient.js'
import { TelemetryService } from './telemetry/TelemetryService.js'
import { type IWorldConfig, loadWorldConfig } from './worldConfig.js'

export interface SetupContainerOptions {
    config?: IWorldConfig
    /** Overrides the environment-selected client (tests inject a mock here). */
    telemetryClient?: ITelemetryClient
}

/**
 * In test mode (NODE_ENV=test) or without a connection string, uses NullTelemetryClient.
 */
export const setupContainer = async (container: Container, opts: SetupContainerOptions = {}) => {
    const config = opts.config ?? loadWorldConfig()
    container.bind<IWorldConfig>(TOKENS.WorldConfig).toConstantValue(config)

    if (opts.telemetryClient) {
        container.bind<ITelemetryClient>(TOKENS.TelemetryClient).toConstantValue(opts.telemetryClient)
    } else if (!config.isTestMode && config.appInsightsConnectionString) {
        // Never load real Application Insights in test mode
        const appInsightsModule = await import('applicationinsights')
        const appInsights = appInsightsModule.default
        appInsights.setup(config.appInsightsConnectionString).setAutoCollectConsole(true).setSendLiveMetrics(false).start()
        container.bind<ITelemetryClient>(TOKENS.TelemetryClient).toConstantValue(appInsights.defaultClient)
    } else {
        container.bind<ITelemetryClient>(TOKENS.TelemetryClient).to(NullTelemetryClient).inSingletonScope()
    }

    // Consistency policy: concrete services use class-based injection only (no string token).
    container.bind<TelemetryService>(TelemetryService).toSelf().inSingletonScope()

    container.bind(InMemoryRoomRepository).toSelf().inSingletonScope()
    container.bind<IRoomRepository>(TOKENS.RoomRepository).toService(InMemoryRoomRepository)

    container.bind(RoomDescriptionService).toSelf().inSingletonScope()
    container.bind(ActorMovementService).toSelf().inSingletonScope()
    container.bind(TrapdoorService).toSelf().inSingletonScope()

    return container
}
