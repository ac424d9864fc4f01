/**
 * Telemetry Service - Central service for emitting game telemetry events
 *
 * Provides enriched telemetry methods that wrap ITelemetryClient.
 * World services inject this service rather than the raw client.
 */
import { type GameEventName, isGameEventName } from '@zuul/shared'
import type { Contracts } from 'applicationinsights'
import { inject, injectable } from 'inversify'
import { randomUUID } from 'node:crypto'
import { TOKENS } from '../di/tokens.js'
import type { IWorldConfig } from '../worldConfig.js'
import type { ITelemetryClient } from './ITelemetryClient.js'

/** Application Insights severity for warnings (Verbose 0 … Critical 4). */
const SEVERITY_WARNING: Contracts.SeverityLevel = 2

export interface GameTelemetryOptions {
    playerGuid?: string | null
    serviceOverride?: string
    correlationId?: string | null
}

@injectable()
export class TelemetryService {
    constructor(
        @inject(TOKENS.TelemetryClient) private client: ITelemetryClient,
        @inject(TOKENS.WorldConfig) private config: IWorldConfig
    ) {}

    /**
     * Track a game event with automatic enrichment
     * @param name - Event name (should be from GAME_EVENT_NAMES)
     */
    trackGameEvent(name: string, properties?: Record<string, unknown>, opts?: GameTelemetryOptions): void {
        const finalProps: Record<string, unknown> = { ...properties }

        if (finalProps.service === undefined) {
            finalProps.service = opts?.serviceOverride || this.config.serviceName
        }

        if (opts?.playerGuid && finalProps.playerGuid === undefined) {
            finalProps.playerGuid = opts.playerGuid
        }

        // Always attach correlationId; generate if not supplied
        if (finalProps.correlationId === undefined) {
            finalProps.correlationId = opts?.correlationId || randomUUID()
        }

        this.client.trackEvent({ name, properties: finalProps })
    }

    /**
     * Track a game event with strict name validation
     * Unknown names are replaced by a Telemetry.EventName.Invalid event
     */
    trackGameEventStrict(name: GameEventName, properties: Record<string, unknown>, opts?: GameTelemetryOptions): void {
        if (!isGameEventName(name)) {
            this.trackGameEvent('Telemetry.EventName.Invalid', { requested: name })
            return
        }
        this.trackGameEvent(name, properties, opts)
    }

    /** Non-fatal diagnostic; shows up as a Warning trace. */
    trackWarning(message: string, properties?: Record<string, unknown>): void {
        this.client.trackTrace({
            message,
            severity: SEVERITY_WARNING,
            properties: { service: this.config.serviceName, ...properties }
        })
    }

    trackException(error: Error, properties?: Record<string, unknown>): void {
        this.client.trackException({ exception: error, properties })
    }
}
