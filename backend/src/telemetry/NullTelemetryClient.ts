import type { Contracts } from 'applicationinsights'
import { injectable } from 'inversify'
import type { ITelemetryClient } from './ITelemetryClient.js'

/**
 * Null implementation of ITelemetryClient for local play and tests.
 * Every call is a no-op, so nothing touches the network.
 */
@injectable()
export class NullTelemetryClient implements ITelemetryClient {
    // eslint-disable-next-line @typescript-eslint/no-unused-vars
    trackEvent(telemetry: Contracts.EventTelemetry): void {
        // no-op
    }

    // eslint-disable-next-line @typescript-eslint/no-unused-vars
    trackException(telemetry: Contracts.ExceptionTelemetry): void {
        // no-op
    }

    // eslint-disable-next-line @typescript-eslint/no-unused-vars
    trackTrace(telemetry: Contracts.TraceTelemetry): void {
        // no-op
    }

    // eslint-disable-next-line @typescript-eslint/no-unused-vars
    flush(options?: { callback?: (response: string) => void; isAppCrashing?: boolean }): void {
        // no-op
    }
}
