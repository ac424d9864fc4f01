/**
 * Centralized Inversify tokens (string identifiers).
 *
 * Concrete services bind by class; interfaces and configuration bind through these strings.
 */
export const TOKENS = {
    // Core
    WorldConfig: 'WorldConfig',
    TelemetryClient: 'ITelemetryClient',

    // Repositories
    RoomRepository: 'IRoomRepository'
} as const
